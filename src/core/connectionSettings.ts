import net from "net";
import { z } from "zod";
import { ConfigurationError } from "../errors";

export const DEFAULT_PORT = 502;
export const DEFAULT_UNIT_ID = 247;
export const DEFAULT_SCAN_INTERVAL_SECONDS = 60;

export interface ConnectionSettings {
  host: string;
  port: number;
  /** Modbus unit identifier; older stacks call it "slave" or "device id". */
  unitId: number;
  intervalSeconds: number;
}

export function isValidHost(host: string): boolean {
  if (net.isIP(host) !== 0) {
    return true;
  }
  return host.split(".").every((label) => label.length > 0 && /^[a-zA-Z\d-]+$/.test(label));
}

const unitIdSchema = z.coerce.number().int().min(0).max(255);

export const connectionSettingsInputSchema = z
  .object({
    host: z.string().trim().min(1, "host is required").refine(isValidHost, "host must be an IP address or hostname"),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
    unitId: unitIdSchema.optional(),
    slave: unitIdSchema.optional(),
    deviceId: unitIdSchema.optional(),
    intervalSeconds: z.coerce.number().int().min(1).max(86_400).default(DEFAULT_SCAN_INTERVAL_SECONDS),
  })
  .transform((input, ctx): ConnectionSettings => {
    const ids = [input.unitId, input.slave, input.deviceId].filter((id): id is number => id !== undefined);
    if (new Set(ids).size > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["unitId"],
        message: "unitId, slave and deviceId name the same field and must agree",
      });
      return z.NEVER;
    }
    return {
      host: input.host,
      port: input.port,
      unitId: ids[0] ?? DEFAULT_UNIT_ID,
      intervalSeconds: input.intervalSeconds,
    };
  });

export function parseConnectionSettings(input: unknown): ConnectionSettings {
  const parsed = connectionSettingsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function sameEndpoint(a: ConnectionSettings, b: ConnectionSettings): boolean {
  return a.host === b.host && a.port === b.port && a.unitId === b.unitId;
}

/**
 * Shared holder for the live connection descriptor. The scheduler reads the
 * interval from here at every cycle boundary instead of capturing it once.
 */
export class ConnectionSettingsHolder {
  private value: Readonly<ConnectionSettings>;

  constructor(initial: ConnectionSettings) {
    this.value = Object.freeze({ ...initial });
  }

  get current(): Readonly<ConnectionSettings> {
    return this.value;
  }

  replace(next: ConnectionSettings): void {
    this.value = Object.freeze({ ...next });
  }

  replaceInterval(intervalSeconds: number): void {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new ConfigurationError([`intervalSeconds: must be positive, got ${intervalSeconds}`]);
    }
    this.value = Object.freeze({ ...this.value, intervalSeconds });
  }

  intervalMs(): number {
    return this.value.intervalSeconds * 1000;
  }
}
