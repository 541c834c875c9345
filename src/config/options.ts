import { existsSync, readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_PORT, DEFAULT_SCAN_INTERVAL_SECONDS, DEFAULT_UNIT_ID } from "../core/connectionSettings";
import { ConfigurationError } from "../errors";
import { MAX_REGISTERS_PER_REQUEST } from "../registers/requestPlanner";

const DEFAULT_OPTIONS_PATH = "/data/options.json";
const DEFAULT_DATA_DIR = "/data";

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const configSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default("info"),
  webPort: z.coerce.number().int().min(1).max(65535).default(8000),
  corsOrigins: z.array(z.string().min(1)).default(["*"]),
  databasePath: z.string().min(1),
  registerMapPath: z.string().min(1).nullable().default(null),
  modbus: z.object({
    host: z.string().trim().min(1).nullable().default(null),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
    unitId: z.coerce.number().int().min(0).max(255).default(DEFAULT_UNIT_ID),
    scanIntervalSeconds: z.coerce.number().int().min(1).max(86_400).default(DEFAULT_SCAN_INTERVAL_SECONDS),
    timeoutMs: z.coerce.number().int().min(100).max(120_000).default(10_000),
    interRequestDelayMs: z.coerce.number().int().min(0).max(10_000).default(200),
    reconnectBaseMs: z.coerce.number().int().min(100).default(1_000),
    reconnectMaxMs: z.coerce.number().int().min(100).default(60_000),
    maxRegistersPerRequest: z.coerce.number().int().min(2).max(MAX_REGISTERS_PER_REQUEST).default(MAX_REGISTERS_PER_REQUEST),
    maxGap: z.coerce.number().int().min(0).max(MAX_REGISTERS_PER_REQUEST).default(20),
  }),
  mqtt: z.object({
    host: z.string().trim().min(1).nullable().default(null),
    port: z.coerce.number().int().min(1).max(65535).default(1883),
    user: z.string().nullable().default(null),
    password: z.string().nullable().default(null),
    baseTopic: z.string().min(1).default("heatpump/ovum"),
    discoveryPrefix: z.string().min(1).default("homeassistant"),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

let config: AppConfig | null = null;

function readOptionsFile(optionsPath: string): Record<string, unknown> {
  if (!existsSync(optionsPath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(optionsPath, "utf8"));
  } catch (error) {
    throw new ConfigurationError([`${optionsPath}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError([`${optionsPath}: expected a JSON object`]);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function firstDefined(...values: unknown[]): unknown {
  return values.find((value) => value !== undefined && value !== null && value !== "");
}

/**
 * The unit identifier may arrive as unit_id, slave or device_id. They name the
 * same field, so differing values are a configuration error.
 */
function resolveUnitId(candidates: Array<[string, unknown]>): unknown {
  const present = candidates.filter(([, value]) => value !== undefined && value !== null && value !== "");
  const distinct = new Set(present.map(([, value]) => String(value)));
  if (distinct.size > 1) {
    throw new ConfigurationError([
      `unit id given with conflicting values: ${present.map(([name, value]) => `${name}=${String(value)}`).join(", ")}`,
    ]);
  }
  return present[0]?.[1];
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env, optionsPath?: string): AppConfig {
  const file = readOptionsFile(optionsPath ?? envValue(env, "OPTIONS_PATH") ?? DEFAULT_OPTIONS_PATH);
  const dataDir = envValue(env, "DATA_DIR") ?? DEFAULT_DATA_DIR;

  const raw = {
    logLevel: firstDefined(envValue(env, "LOG_LEVEL"), file.log_level),
    webPort: firstDefined(envValue(env, "PORT"), file.web_port),
    corsOrigins: firstDefined(splitList(envValue(env, "CORS_ORIGINS")), file.cors_origins),
    databasePath: firstDefined(envValue(env, "DATABASE_PATH"), file.database_path) ?? path.join(dataDir, "bridge.db"),
    registerMapPath: firstDefined(envValue(env, "REGISTER_MAP_PATH"), file.register_map_path),
    modbus: {
      host: firstDefined(envValue(env, "MODBUS_HOST"), file.modbus_host),
      port: firstDefined(envValue(env, "MODBUS_PORT"), file.modbus_port),
      unitId: resolveUnitId([
        ["MODBUS_UNIT_ID", envValue(env, "MODBUS_UNIT_ID")],
        ["MODBUS_SLAVE", envValue(env, "MODBUS_SLAVE")],
        ["MODBUS_DEVICE_ID", envValue(env, "MODBUS_DEVICE_ID")],
      ]) ??
        resolveUnitId([
          ["unit_id", file.unit_id],
          ["slave", file.slave],
          ["device_id", file.device_id],
        ]),
      scanIntervalSeconds: firstDefined(envValue(env, "SCAN_INTERVAL"), file.scan_interval),
      timeoutMs: firstDefined(envValue(env, "MODBUS_TIMEOUT_MS"), file.timeout_ms),
      interRequestDelayMs: firstDefined(envValue(env, "MODBUS_REQUEST_DELAY_MS"), file.request_delay_ms),
      reconnectBaseMs: firstDefined(envValue(env, "MODBUS_RECONNECT_BASE_MS"), file.reconnect_base_ms),
      reconnectMaxMs: firstDefined(envValue(env, "MODBUS_RECONNECT_MAX_MS"), file.reconnect_max_ms),
      maxRegistersPerRequest: firstDefined(envValue(env, "MODBUS_MAX_REGISTERS"), file.max_registers_per_request),
      maxGap: firstDefined(envValue(env, "MODBUS_MAX_GAP"), file.max_gap),
    },
    mqtt: {
      host: firstDefined(envValue(env, "MQTT_HOST"), file.mqtt_host),
      port: firstDefined(envValue(env, "MQTT_PORT"), file.mqtt_port),
      user: firstDefined(envValue(env, "MQTT_USER"), file.mqtt_user),
      password: firstDefined(envValue(env, "MQTT_PASSWORD"), file.mqtt_password),
      baseTopic: firstDefined(envValue(env, "MQTT_BASE_TOPIC"), file.mqtt_base_topic),
      discoveryPrefix: firstDefined(envValue(env, "MQTT_DISCOVERY_PREFIX"), file.mqtt_discovery_prefix),
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  if (parsed.data.modbus.reconnectMaxMs < parsed.data.modbus.reconnectBaseMs) {
    throw new ConfigurationError(["modbus.reconnectMaxMs: must not be lower than reconnectBaseMs"]);
  }

  config = Object.freeze(parsed.data);
  return config;
}

export function getConfig(): AppConfig {
  if (!config) {
    throw new Error("Configuration not loaded; call loadConfig() first");
  }
  return config;
}
