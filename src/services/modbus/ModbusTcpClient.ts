import ModbusRTU from "modbus-serial";
import type { Logger } from "pino";
import {
  BridgeError,
  ConnectionLostError,
  ProtocolError,
  RequestTimeoutError,
  isTransportError,
} from "../../errors";
import type { RegisterKind } from "../../registers/definitions";
import { ReconnectBackoff } from "./backoff";

export interface ConnectionTarget {
  host: string;
  port: number;
  unitId: number;
}

export interface ModbusTcpConfig {
  timeoutMs?: number;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  now?: () => number;
}

/** What the poll scheduler needs from a Modbus session. */
export interface TransportSession {
  connect(target: ConnectionTarget): Promise<void>;
  readRegisters(start: number, count: number, kind?: RegisterKind): Promise<number[]>;
  close(): Promise<void>;
  isConnected(): boolean;
  currentTarget(): ConnectionTarget | null;
  consecutiveFailures(): number;
  backoffDelayMs(): number;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const CLOSE_TIMEOUT_MS = 2_000;
const CONNECTION_ERRNOS = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

function stringProperty(value: unknown, name: string): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const prop: unknown = Reflect.get(value, name);
  return typeof prop === "string" ? prop : undefined;
}

function numberProperty(value: unknown, name: string): number | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const prop: unknown = Reflect.get(value, name);
  return typeof prop === "number" ? prop : undefined;
}

/** Maps modbus-serial and socket errors onto the bridge's error taxonomy. */
export function classifyModbusError(error: unknown, context: string): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const exceptionCode = numberProperty(error, "modbusCode");
  if (exceptionCode !== undefined) {
    return new ProtocolError(`Device exception ${exceptionCode} ${context}: ${message}`, exceptionCode, {
      cause: error,
    });
  }

  const errno = stringProperty(error, "errno") ?? stringProperty(error, "code");
  if ((error instanceof Error && error.name === "TransactionTimedOutError") || errno === "ETIMEDOUT") {
    return new RequestTimeoutError(`Request timed out ${context}`, { cause: error });
  }
  if ((errno && CONNECTION_ERRNOS.has(errno)) || /port not open/i.test(message)) {
    return new ConnectionLostError(`Connection lost ${context}: ${message}`, { cause: error });
  }

  return new ProtocolError(`Invalid response ${context}: ${message}`, null, { cause: error });
}

export class ModbusTcpClient implements TransportSession {
  private client: ModbusRTU | null = null;
  private connected = false;
  private target: ConnectionTarget | null = null;
  private readonly backoff: ReconnectBackoff;
  private readonly timeoutMs: number;

  constructor(
    private readonly cfg: ModbusTcpConfig,
    private readonly logger: Logger,
  ) {
    this.timeoutMs = cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.backoff = new ReconnectBackoff({
      baseMs: cfg.reconnectBaseMs ?? 1_000,
      maxMs: cfg.reconnectMaxMs ?? 60_000,
      now: cfg.now,
    });
  }

  async connect(target: ConnectionTarget): Promise<void> {
    await this.safeDisconnect();
    this.target = { ...target };
    await this.open(this.target);
  }

  private open(target: ConnectionTarget): Promise<void> {
    const client = new ModbusRTU();
    client.setTimeout(this.timeoutMs);
    this.client = client;

    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (error: BridgeError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.connected = false;
        const delay = this.backoff.recordFailure();
        this.logger.warn(
          { err: error, host: target.host, port: target.port, retryInMs: delay },
          "Modbus TCP connect failed",
        );
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new RequestTimeoutError(`Connecting to ${target.host}:${target.port} timed out`));
        void this.safeDisconnect();
      }, this.timeoutMs);

      this.logger.info({ host: target.host, port: target.port }, "Connecting Modbus TCP");
      client.connectTCP(target.host, { port: target.port }, (err?: Error) => {
        if (err) {
          fail(classifyModbusError(err, `connecting to ${target.host}:${target.port}`));
          return;
        }
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        client.setID(target.unitId);
        this.connected = true;
        this.logger.info({ unitId: target.unitId }, "Modbus TCP connected");
        resolve();
      });
    });
  }

  async readRegisters(start: number, count: number, kind: RegisterKind = "holding"): Promise<number[]> {
    const context = `reading ${count} ${kind} register(s) at ${start}`;
    if (!this.target) {
      throw new ConnectionLostError(`No Modbus target configured while ${context}`);
    }

    let client = this.client;
    if (!this.connected || !client || !client.isOpen) {
      this.connected = false;
      const waitMs = this.backoff.remainingMs();
      if (waitMs > 0) {
        throw new ConnectionLostError(
          `Reconnect deferred for ${waitMs} ms after ${this.backoff.consecutiveFailures} failure(s)`,
        );
      }
      this.logger.info({ failures: this.backoff.consecutiveFailures }, "Modbus TCP reconnecting");
      await this.safeDisconnect();
      await this.open(this.target);
      client = this.client;
      if (!client) {
        throw new ConnectionLostError(`Modbus client closed while ${context}`);
      }
    }

    try {
      const response =
        kind === "input"
          ? await client.readInputRegisters(start, count)
          : await client.readHoldingRegisters(start, count);
      const words = Array.from(response.data);
      if (words.length !== count) {
        throw new ProtocolError(`Expected ${count} register(s) at ${start}, received ${words.length}`, null);
      }
      this.backoff.reset();
      this.logger.debug({ start, count, kind }, "Modbus read ok");
      return words;
    } catch (err) {
      const error = classifyModbusError(err, context);
      if (isTransportError(error)) {
        const delay = this.backoff.recordFailure();
        this.logger.warn({ err: error, start, count, retryInMs: delay }, "Modbus transport failure");
        await this.safeDisconnect();
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.target = null;
    await this.safeDisconnect();
  }

  async safeDisconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;
    const wasConnected = this.connected;
    this.connected = false;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, CLOSE_TIMEOUT_MS);
      try {
        client.close(() => {
          clearTimeout(timer);
          resolve();
        });
      } catch (e) {
        clearTimeout(timer);
        this.logger.warn({ e }, "Modbus TCP disconnect error");
        resolve();
      }
    });
    if (wasConnected) {
      this.logger.info("Modbus TCP disconnected");
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  currentTarget(): ConnectionTarget | null {
    return this.target ? { ...this.target } : null;
  }

  consecutiveFailures(): number {
    return this.backoff.consecutiveFailures;
  }

  backoffDelayMs(): number {
    return this.backoff.remainingMs();
  }
}
