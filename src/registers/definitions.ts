import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import Decimal from "decimal.js";
import { z } from "zod";
import { RegisterMapError } from "../errors";
import {
  compareDescriptors,
  groupIntoRequests,
  MAX_REGISTERS_PER_REQUEST,
  type PlanOptions,
  type RequestGroup,
} from "./requestPlanner";

export const REGISTER_KINDS = ["holding", "input"] as const;
export type RegisterKind = (typeof REGISTER_KINDS)[number];

export const DECODE_RULES = ["unsigned16", "signed16", "signed32", "enumerated-status"] as const;
export type DecodeRule = (typeof DECODE_RULES)[number];

export type RefreshPolicy = "every-cycle" | "once";

export interface RegisterGroup {
  id: string;
  unit: string | null;
  deviceClass: string | null;
  stateClass: string | null;
  icon: string | null;
  forceUpdate: boolean;
}

export interface RegisterDescriptor {
  key: string;
  name: string;
  address: number;
  wordCount: 1 | 2;
  rule: DecodeRule;
  kind: RegisterKind;
  scale: Decimal;
  unit: string | null;
  enabledByDefault: boolean;
  group: string;
  refresh: RefreshPolicy;
  statusTable: string | null;
  statusLabels: ReadonlyMap<number, string> | null;
}

export interface DeviceInfo {
  manufacturer: string;
  model: string;
}

const WORDS_BY_RULE: Record<DecodeRule, 1 | 2> = {
  unsigned16: 1,
  signed16: 1,
  signed32: 2,
  "enumerated-status": 1,
};

const groupSchema = z.object({
  unit: z.string().nullable().default(null),
  deviceClass: z.string().nullable().default(null),
  stateClass: z.string().nullable().default(null),
  icon: z.string().nullable().default(null),
  forceUpdate: z.boolean().default(false),
});

const descriptorSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/, "key must be lower-case snake case"),
  name: z.string().min(1),
  address: z.number().int().min(0).max(0xffff),
  words: z.number().int().optional(),
  rule: z.enum(DECODE_RULES),
  kind: z.enum(REGISTER_KINDS).default("holding"),
  scale: z.number().positive().default(1),
  unit: z.string().optional(),
  enabled: z.boolean().default(true),
  group: z.string().min(1),
  statusTable: z.string().optional(),
  refresh: z.enum(["every-cycle", "once"]).default("every-cycle"),
});

const registerMapSchema = z.object({
  version: z.string().min(1),
  device: z.object({
    manufacturer: z.string(),
    model: z.string(),
  }),
  groups: z.record(groupSchema),
  statusTables: z.record(z.record(z.string().regex(/^\d+$/), z.string())).default({}),
  registers: z.array(descriptorSchema).min(1),
});

export type RegisterMapJson = z.input<typeof registerMapSchema>;

export class RegisterMap {
  private readonly byKey: ReadonlyMap<string, RegisterDescriptor>;

  constructor(
    readonly version: string,
    readonly device: DeviceInfo,
    private readonly descriptors: readonly RegisterDescriptor[],
    private readonly groups: ReadonlyMap<string, RegisterGroup>,
    private readonly maxRegistersPerRequest: number = MAX_REGISTERS_PER_REQUEST,
  ) {
    this.byKey = new Map(descriptors.map((d) => [d.key, d]));
  }

  all(): readonly RegisterDescriptor[] {
    return this.descriptors;
  }

  /** Enabled descriptors ordered by register kind, address, then key. */
  describeEnabled(): readonly RegisterDescriptor[] {
    return this.descriptors.filter((d) => d.enabledByDefault).sort(compareDescriptors);
  }

  describe(key: string): RegisterDescriptor | undefined {
    return this.byKey.get(key);
  }

  group(id: string): RegisterGroup | undefined {
    return this.groups.get(id);
  }

  groupIntoRequests(
    descriptors: readonly RegisterDescriptor[],
    options: PlanOptions = {},
  ): RequestGroup[] {
    return groupIntoRequests(descriptors, {
      maxRegistersPerRequest: this.maxRegistersPerRequest,
      ...options,
    });
  }
}

/**
 * Validates raw register map data and builds an immutable RegisterMap.
 * Throws RegisterMapError listing every problem found.
 */
export function loadRegisterMap(
  source: unknown,
  options: { maxRegistersPerRequest?: number } = {},
): RegisterMap {
  const parsed = registerMapSchema.safeParse(source);
  if (!parsed.success) {
    throw new RegisterMapError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  const maxRegistersPerRequest = options.maxRegistersPerRequest ?? MAX_REGISTERS_PER_REQUEST;
  const issues: string[] = [];
  const seen = new Set<string>();

  const groups = new Map<string, RegisterGroup>(
    Object.entries(data.groups).map(([id, group]) => [id, { id, ...group }]),
  );

  const tables = new Map<string, ReadonlyMap<number, string>>(
    Object.entries(data.statusTables).map(([name, entries]) => [
      name,
      new Map(Object.entries(entries).map(([code, label]) => [Number(code), label])),
    ]),
  );

  const descriptors: RegisterDescriptor[] = [];
  for (const reg of data.registers) {
    const expectedWords = WORDS_BY_RULE[reg.rule];
    const wordCount = reg.words ?? expectedWords;

    if (seen.has(reg.key)) {
      issues.push(`${reg.key}: duplicate key`);
    }
    seen.add(reg.key);

    if (wordCount !== expectedWords) {
      issues.push(`${reg.key}: rule ${reg.rule} needs ${expectedWords} word(s), got ${wordCount}`);
      continue;
    }
    if (wordCount > maxRegistersPerRequest) {
      issues.push(`${reg.key}: ${wordCount} words exceed the ${maxRegistersPerRequest} register request limit`);
    }
    if (reg.address + wordCount - 1 > 0xffff) {
      issues.push(`${reg.key}: address range ends beyond 0xFFFF`);
    }

    const group = groups.get(reg.group);
    if (!group) {
      issues.push(`${reg.key}: unknown group ${reg.group}`);
    }

    let statusLabels: ReadonlyMap<number, string> | null = null;
    if (reg.rule === "enumerated-status") {
      const table = reg.statusTable ? tables.get(reg.statusTable) : undefined;
      if (!table) {
        issues.push(`${reg.key}: enumerated-status needs an existing statusTable`);
      } else {
        statusLabels = table;
      }
    } else if (reg.statusTable) {
      issues.push(`${reg.key}: statusTable is only valid for enumerated-status`);
    }

    descriptors.push(
      Object.freeze({
        key: reg.key,
        name: reg.name,
        address: reg.address,
        wordCount: expectedWords,
        rule: reg.rule,
        kind: reg.kind,
        scale: new Decimal(reg.scale),
        unit: reg.unit ?? group?.unit ?? null,
        enabledByDefault: reg.enabled,
        group: reg.group,
        refresh: reg.refresh,
        statusTable: reg.statusTable ?? null,
        statusLabels,
      }),
    );
  }

  if (issues.length > 0) {
    throw new RegisterMapError(issues);
  }

  return new RegisterMap(
    data.version,
    data.device,
    Object.freeze(descriptors),
    groups,
    maxRegistersPerRequest,
  );
}

export function loadRegisterMapFile(
  path: string,
  options: { maxRegistersPerRequest?: number } = {},
): RegisterMap {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new RegisterMapError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return loadRegisterMap(raw, options);
}

export const BUNDLED_REGISTER_MAP_PATH = fileURLToPath(new URL("./ovumAcp.json", import.meta.url));

export function loadBundledRegisterMap(options: { maxRegistersPerRequest?: number } = {}): RegisterMap {
  return loadRegisterMapFile(BUNDLED_REGISTER_MAP_PATH, options);
}
