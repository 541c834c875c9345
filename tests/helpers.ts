import type { Logger } from "pino";
import { createLogger } from "../src/logger";
import { loadRegisterMap, type RegisterMap, type RegisterMapJson } from "../src/registers/definitions";
import type { RegisterKind } from "../src/registers/definitions";
import type { ConnectionTarget, TransportSession } from "../src/services/modbus/ModbusTcpClient";

export function silentLogger(): Logger {
  return createLogger("silent");
}

export const TEST_MAP_JSON: RegisterMapJson = {
  version: "test-1",
  device: { manufacturer: "Test Heat", model: "HP-1" },
  groups: {
    temperature: { unit: "°C", deviceClass: "temperature", stateClass: "measurement" },
    energy: { unit: "kWh", deviceClass: "energy", stateClass: "total_increasing" },
    information: {},
  },
  statusTables: {
    operating_mode: { "0": "Off", "1": "Heating", "2": "Cooling" },
  },
  registers: [
    { key: "outdoor_temp", name: "Outdoor temperature", address: 100, rule: "signed16", scale: 0.1, group: "temperature" },
    { key: "operating_mode", name: "Operating mode", address: 101, rule: "enumerated-status", statusTable: "operating_mode", group: "information" },
    { key: "energy_total", name: "Energy total", address: 200, words: 2, rule: "signed32", scale: 0.01, group: "energy" },
  ],
};

export function testRegisterMap(): RegisterMap {
  return loadRegisterMap(TEST_MAP_JSON);
}

export type ReadHandler = (start: number, count: number, kind: RegisterKind) => Promise<number[]>;

/** In-process stand-in for a Modbus TCP session backed by a register table. */
export class FakeSession implements TransportSession {
  readonly memory = new Map<number, number>();
  readonly reads: Array<{ start: number; count: number; kind: RegisterKind }> = [];
  readonly connects: ConnectionTarget[] = [];
  closes = 0;
  failures = 0;
  backoffMs = 0;
  connectError: Error | null = null;
  handler: ReadHandler | null = null;
  private target: ConnectionTarget | null = null;
  private connected = false;

  async connect(target: ConnectionTarget): Promise<void> {
    this.connects.push({ ...target });
    this.target = { ...target };
    if (this.connectError) {
      this.connected = false;
      throw this.connectError;
    }
    this.connected = true;
  }

  async readRegisters(start: number, count: number, kind: RegisterKind = "holding"): Promise<number[]> {
    this.reads.push({ start, count, kind });
    if (this.handler) {
      return this.handler(start, count, kind);
    }
    return this.readMemory(start, count);
  }

  readMemory(start: number, count: number): number[] {
    return Array.from({ length: count }, (_, i) => this.memory.get(start + i) ?? 0);
  }

  async close(): Promise<void> {
    this.closes += 1;
    this.target = null;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  currentTarget(): ConnectionTarget | null {
    return this.target ? { ...this.target } : null;
  }

  consecutiveFailures(): number {
    return this.failures;
  }

  backoffDelayMs(): number {
    return this.backoffMs;
  }
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}
