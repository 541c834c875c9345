import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ConnectionSettingsHolder } from "../../../src/core/connectionSettings";
import { ConnectionLostError, ProtocolError, RequestTimeoutError } from "../../../src/errors";
import { loadRegisterMap } from "../../../src/registers/definitions";
import { ModbusTcpClient, classifyModbusError } from "../../../src/services/modbus/ModbusTcpClient";
import { PollScheduler, type CycleSummary } from "../../../src/services/pollScheduler";
import { SnapshotStore } from "../../../src/services/snapshotStore";
import { TEST_MAP_JSON, silentLogger } from "../../helpers";

type ReadCall = { fc: 3 | 4; start: number; count: number };

interface FakeModbusState {
  instances: Array<{ isOpen: boolean; unitId: number; timeoutMs: number; closed: number }>;
  calls: ReadCall[];
  connectError: Error | null;
  read: ((call: ReadCall) => Promise<{ data: number[] }>) | null;
}

const modbus = vi.hoisted(() => {
  const state: FakeModbusState = { instances: [], calls: [], connectError: null, read: null };
  return state;
});

vi.mock("modbus-serial", () => {
  class FakeModbusRTU {
    isOpen = false;
    unitId = -1;
    timeoutMs = 0;
    closed = 0;

    constructor() {
      modbus.instances.push(this);
    }

    setTimeout(ms: number) {
      this.timeoutMs = ms;
    }

    setID(id: number) {
      this.unitId = id;
    }

    connectTCP(_host: string, _options: { port: number }, callback: (err?: Error) => void) {
      queueMicrotask(() => {
        if (modbus.connectError) {
          callback(modbus.connectError);
          return;
        }
        this.isOpen = true;
        callback();
      });
    }

    readHoldingRegisters(start: number, count: number) {
      return this.respond({ fc: 3, start, count });
    }

    readInputRegisters(start: number, count: number) {
      return this.respond({ fc: 4, start, count });
    }

    close(callback: () => void) {
      this.isOpen = false;
      this.closed += 1;
      callback();
    }

    private respond(call: { fc: 3 | 4; start: number; count: number }) {
      modbus.calls.push(call);
      if (modbus.read) return modbus.read(call);
      return Promise.resolve({ data: Array.from({ length: call.count }, (_, i) => call.start + i) });
    }
  }
  return { default: FakeModbusRTU };
});

const target = { host: "192.0.2.10", port: 502, unitId: 247 };

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function timeoutError(): Error {
  const timeout = new Error("Timed out");
  timeout.name = "TransactionTimedOutError";
  return timeout;
}

describe("ModbusTcpClient", () => {
  let now = 0;

  beforeEach(() => {
    modbus.instances.length = 0;
    modbus.calls.length = 0;
    modbus.connectError = null;
    modbus.read = null;
    now = 50_000;
  });

  function createClient() {
    return new ModbusTcpClient({ timeoutMs: 3_000, now: () => now }, silentLogger());
  }

  test("connects with the configured unit id and timeout", async () => {
    const client = createClient();
    await client.connect(target);

    expect(client.isConnected()).toBe(true);
    expect(client.currentTarget()).toEqual(target);
    expect(modbus.instances[0]).toMatchObject({ unitId: 247, timeoutMs: 3_000, isOpen: true });
  });

  test("reads holding registers by default and input registers on request", async () => {
    const client = createClient();
    await client.connect(target);

    await expect(client.readRegisters(100, 3)).resolves.toEqual([100, 101, 102]);
    await expect(client.readRegisters(10, 1, "input")).resolves.toEqual([10]);
    expect(modbus.calls).toEqual<ReadCall[]>([
      { fc: 3, start: 100, count: 3 },
      { fc: 4, start: 10, count: 1 },
    ]);
  });

  test("device exceptions surface as protocol errors without dropping the link", async () => {
    const client = createClient();
    await client.connect(target);
    modbus.read = () => Promise.reject(Object.assign(new Error("Illegal data address"), { modbusCode: 2 }));

    const error = await client.readRegisters(9000, 1).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ exceptionCode: 2 });
    expect(client.isConnected()).toBe(true);
    expect(client.consecutiveFailures()).toBe(0);
  });

  test("short responses are protocol errors", async () => {
    const client = createClient();
    await client.connect(target);
    modbus.read = () => Promise.resolve({ data: [1] });

    await expect(client.readRegisters(0, 2)).rejects.toThrow("Expected 2 register(s) at 0, received 1");
  });

  test("socket failures drop the connection without delaying the next attempt", async () => {
    const client = createClient();
    await client.connect(target);
    modbus.read = () => Promise.reject(errnoError("read ECONNRESET", "ECONNRESET"));

    await expect(client.readRegisters(0, 1)).rejects.toBeInstanceOf(ConnectionLostError);
    expect(client.isConnected()).toBe(false);
    expect(client.consecutiveFailures()).toBe(1);
    expect(client.backoffDelayMs()).toBe(0);
    expect(modbus.instances[0]?.closed).toBe(1);
  });

  test("the read after a single failure reconnects immediately", async () => {
    const client = createClient();
    await client.connect(target);
    modbus.read = () => Promise.reject(errnoError("read ECONNRESET", "ECONNRESET"));
    await expect(client.readRegisters(0, 1)).rejects.toBeInstanceOf(ConnectionLostError);
    modbus.read = null;

    await expect(client.readRegisters(5, 1)).resolves.toEqual([5]);
    expect(modbus.instances).toHaveLength(2);
    expect(client.isConnected()).toBe(true);
    expect(client.consecutiveFailures()).toBe(0);
  });

  test("repeated failures defer reconnects until the backoff window has passed", async () => {
    const client = createClient();
    await client.connect(target);
    modbus.read = () => Promise.reject(errnoError("read ECONNRESET", "ECONNRESET"));
    await expect(client.readRegisters(0, 1)).rejects.toBeInstanceOf(ConnectionLostError);
    await expect(client.readRegisters(0, 1)).rejects.toBeInstanceOf(ConnectionLostError);
    expect(modbus.instances).toHaveLength(2);
    expect(client.consecutiveFailures()).toBe(2);
    modbus.read = null;

    await expect(client.readRegisters(0, 1)).rejects.toThrow("Reconnect deferred for 1000 ms after 2 failure(s)");
    expect(modbus.instances).toHaveLength(2);

    now += 1_000;
    await expect(client.readRegisters(5, 1)).resolves.toEqual([5]);
    expect(modbus.instances).toHaveLength(3);
    expect(client.consecutiveFailures()).toBe(0);
  });

  test("timeouts are classified and count as transport failures", async () => {
    const client = createClient();
    await client.connect(target);
    modbus.read = () => Promise.reject(timeoutError());

    await expect(client.readRegisters(0, 1)).rejects.toBeInstanceOf(RequestTimeoutError);
    expect(client.consecutiveFailures()).toBe(1);
  });

  test("a refused connect rejects and records a failure", async () => {
    modbus.connectError = errnoError("connect ECONNREFUSED", "ECONNREFUSED");
    const client = createClient();

    await expect(client.connect(target)).rejects.toBeInstanceOf(ConnectionLostError);
    expect(client.isConnected()).toBe(false);
    expect(client.consecutiveFailures()).toBe(1);
    expect(client.currentTarget()).toEqual(target);
  });

  test("reading without a target fails fast", async () => {
    await expect(createClient().readRegisters(0, 1)).rejects.toThrow(ConnectionLostError);
    expect(modbus.instances).toHaveLength(0);
  });

  test("close forgets the target", async () => {
    const client = createClient();
    await client.connect(target);
    await client.close();

    expect(client.isConnected()).toBe(false);
    expect(client.currentTarget()).toBeNull();
    expect(modbus.instances[0]?.closed).toBe(1);
  });
});

describe("ModbusTcpClient driven by the poll scheduler", () => {
  const registerMap = loadRegisterMap({
    ...TEST_MAP_JSON,
    registers: [
      { key: "flow_temp", name: "Flow temperature", address: 100, rule: "unsigned16", group: "information" },
      { key: "return_temp", name: "Return temperature", address: 200, rule: "unsigned16", group: "information" },
      { key: "compressor_hours", name: "Compressor hours", address: 300, rule: "unsigned16", group: "information" },
    ],
  });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-15T10:00:00.000Z"));
    modbus.instances.length = 0;
    modbus.calls.length = 0;
    modbus.connectError = null;
    modbus.read = null;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("a single timeout on a middle group leaves the groups before and after it fresh", async () => {
    let timedOut = false;
    modbus.read = (call) => {
      if (call.start === 200 && !timedOut) {
        timedOut = true;
        return Promise.reject(timeoutError());
      }
      return Promise.resolve({ data: Array.from({ length: call.count }, (_, i) => call.start + i) });
    };

    const logger = silentLogger();
    const client = new ModbusTcpClient({ timeoutMs: 3_000 }, logger);
    const store = new SnapshotStore(logger);
    const holder = new ConnectionSettingsHolder({ host: "192.0.2.10", port: 502, unitId: 247, intervalSeconds: 60 });
    const scheduler = new PollScheduler(client, registerMap, store, holder, logger, { interRequestDelayMs: 200 });

    const cycle = new Promise<CycleSummary>((resolve) => {
      const off = scheduler.onCycleComplete((summary) => {
        off();
        resolve(summary);
      });
    });
    scheduler.start();
    await vi.advanceTimersByTimeAsync(400);
    const summary = await cycle;

    expect(summary).toMatchObject({
      groups: 3,
      attemptedGroups: 3,
      failedGroups: 1,
      transportFailures: 1,
      registersOk: 2,
      registersFailed: 1,
      nextState: "idle",
      nextDelayMs: 60_000,
    });
    const { values, failures } = store.currentSnapshot();
    expect(values.flow_temp).toMatchObject({ value: 100, stale: false });
    expect(values.compressor_hours).toMatchObject({ value: 300, stale: false });
    expect(values.return_temp).toBeUndefined();
    expect(Object.keys(failures)).toEqual(["return_temp"]);
    expect(failures.return_temp?.error).toBe("Request timed out reading 1 holding register(s) at 200");
    expect(modbus.instances).toHaveLength(2);
    expect(client.consecutiveFailures()).toBe(0);

    await scheduler.stop();
  });
});

describe("classifyModbusError", () => {
  test("maps errno codes to connection loss", () => {
    expect(classifyModbusError(errnoError("x", "EHOSTUNREACH"), "ctx")).toBeInstanceOf(ConnectionLostError);
    expect(classifyModbusError(new Error("Port Not Open"), "ctx")).toBeInstanceOf(ConnectionLostError);
  });

  test("maps ETIMEDOUT to a timeout", () => {
    expect(classifyModbusError(errnoError("x", "ETIMEDOUT"), "ctx")).toBeInstanceOf(RequestTimeoutError);
  });

  test("unknown failures become protocol errors without an exception code", () => {
    const error = classifyModbusError("garbled frame", "reading");
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ exceptionCode: null });
  });

  test("bridge errors pass through unchanged", () => {
    const original = new RequestTimeoutError("already classified");
    expect(classifyModbusError(original, "ctx")).toBe(original);
  });
});
