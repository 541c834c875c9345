import type { Logger } from "pino";
import type { ConnectionSettings, ConnectionSettingsHolder } from "../core/connectionSettings";
import { decode } from "../decoding/decoder";
import { describeError, isTransportError } from "../errors";
import type { RegisterDescriptor, RegisterMap } from "../registers/definitions";
import { sliceWords, type RequestGroup } from "../registers/requestPlanner";
import type { TransportSession } from "./modbus/ModbusTcpClient";
import type { RegisterResult, SnapshotStore } from "./snapshotStore";

export type SchedulerState = "idle" | "polling" | "backing-off" | "stopped";

export interface PollSchedulerOptions {
  /** Pause between two requests of the same cycle. */
  interRequestDelayMs?: number;
  maxGap?: number;
  now?: () => Date;
}

export interface CycleSummary {
  cycle: number;
  startedAt: string;
  finishedAt: string;
  groups: number;
  attemptedGroups: number;
  failedGroups: number;
  transportFailures: number;
  registersOk: number;
  registersFailed: number;
  cancelled: boolean;
  nextState: SchedulerState;
  nextDelayMs: number | null;
}

export type CycleListener = (summary: CycleSummary) => void;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PollScheduler {
  private state: SchedulerState = "stopped";
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;
  private cycleCount = 0;
  private inFlight: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private lastCycle: CycleSummary | null = null;
  private readonly cycleListeners = new Set<CycleListener>();
  private readonly now: () => Date;

  constructor(
    private readonly session: TransportSession,
    private readonly registerMap: RegisterMap,
    private readonly store: SnapshotStore,
    private readonly settings: ConnectionSettingsHolder,
    private readonly logger: Logger,
    private readonly options: PollSchedulerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  getState(): SchedulerState {
    return this.state;
  }

  getLastCycle(): CycleSummary | null {
    return this.lastCycle;
  }

  onCycleComplete(listener: CycleListener): () => void {
    this.cycleListeners.add(listener);
    return () => {
      this.cycleListeners.delete(listener);
    };
  }

  /** Starts polling immediately. A no-op unless the scheduler is stopped. */
  start(settings?: ConnectionSettings): void {
    if (this.state !== "stopped") {
      this.logger.debug({ state: this.state }, "Poll scheduler already running");
      return;
    }
    if (settings) {
      this.settings.replace(settings);
    }

    const generation = ++this.generation;
    const pendingStop = this.stopping;
    this.state = "polling";
    const { host, port, unitId, intervalSeconds } = this.settings.current;
    this.logger.info({ host, port, unitId, intervalSeconds }, "Starting poll scheduler");

    this.inFlight = (async () => {
      if (pendingStop) {
        await pendingStop;
      }
      await this.runCycle(generation);
    })();
  }

  /**
   * Cancels any scheduled cycle. A cycle in flight finishes its current
   * request, commits what it gathered and issues nothing further; the session
   * is closed afterwards.
   */
  stop(): Promise<void> {
    this.generation += 1;
    this.state = "stopped";
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const inFlight = this.inFlight;
    const stopping = (async () => {
      if (inFlight) {
        await inFlight;
      }
      await this.session.close();
      this.logger.info("Stopped poll scheduler");
    })();

    this.stopping = stopping;
    const clear = () => {
      if (this.stopping === stopping) {
        this.stopping = null;
      }
    };
    void stopping.then(clear, clear);
    return stopping;
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation && this.state !== "stopped";
  }

  private async runCycle(generation: number): Promise<void> {
    if (!this.isCurrent(generation)) return;
    this.state = "polling";

    let summary: Omit<CycleSummary, "nextState" | "nextDelayMs">;
    try {
      summary = await this.executeCycle(generation);
    } catch (error) {
      this.logger.error({ error }, "Poll cycle crashed");
      const at = this.now().toISOString();
      summary = {
        cycle: this.cycleCount,
        startedAt: at,
        finishedAt: at,
        groups: 0,
        attemptedGroups: 0,
        failedGroups: 0,
        transportFailures: 0,
        registersOk: 0,
        registersFailed: 0,
        cancelled: false,
      };
    }
    const current = this.isCurrent(generation);

    const intervalMs = this.settings.intervalMs();
    const backingOff =
      !summary.cancelled &&
      summary.attemptedGroups > 0 &&
      summary.transportFailures === summary.attemptedGroups;
    const delay = backingOff ? Math.max(intervalMs, this.session.backoffDelayMs()) : intervalMs;

    if (current) {
      this.state = backingOff ? "backing-off" : "idle";
    }
    this.lastCycle = {
      ...summary,
      nextState: current ? this.state : "stopped",
      nextDelayMs: current ? delay : null,
    };
    this.notifyCycle(this.lastCycle);

    if (!current) return;

    if (backingOff) {
      this.logger.warn(
        { cycle: summary.cycle, delayMs: delay, failures: this.session.consecutiveFailures() },
        "All register groups failed; backing off",
      );
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runCycle(generation);
    }, delay);
  }

  private dueDescriptors(): RegisterDescriptor[] {
    const values = this.store.currentSnapshot().values;
    return this.registerMap.describeEnabled().filter((descriptor) => {
      if (descriptor.refresh !== "once") return true;
      const known = values[descriptor.key];
      return !known || known.stale;
    });
  }

  private async ensureSession(): Promise<void> {
    const settings = this.settings.current;
    const target = this.session.currentTarget();
    if (target && target.host === settings.host && target.port === settings.port && target.unitId === settings.unitId) {
      return;
    }
    try {
      await this.session.connect({ host: settings.host, port: settings.port, unitId: settings.unitId });
    } catch (err) {
      // reads below fail fast while the session backs off
      this.logger.debug({ err }, "Initial connect failed");
    }
  }

  private async executeCycle(generation: number): Promise<Omit<CycleSummary, "nextState" | "nextDelayMs">> {
    const cycle = ++this.cycleCount;
    const startedAt = this.now();
    const interRequestDelayMs = this.options.interRequestDelayMs ?? 0;

    await this.ensureSession();

    const groups = this.registerMap.groupIntoRequests(this.dueDescriptors(), {
      maxGap: this.options.maxGap,
    });
    this.logger.debug({ cycle, groups: groups.length }, "Poll cycle started");

    const results: RegisterResult[] = [];
    let attemptedGroups = 0;
    let failedGroups = 0;
    let transportFailures = 0;
    let cancelled = false;

    for (const group of groups) {
      if (attemptedGroups > 0 && interRequestDelayMs > 0) {
        await sleep(interRequestDelayMs);
      }
      if (!this.isCurrent(generation)) {
        cancelled = true;
        break;
      }

      attemptedGroups += 1;
      try {
        const words = await this.session.readRegisters(group.start, group.count, group.kind);
        const decodedAt = this.now();
        for (const descriptor of group.descriptors) {
          results.push(this.decodeDescriptor(group, descriptor, words, decodedAt));
        }
      } catch (err) {
        failedGroups += 1;
        if (isTransportError(err)) {
          transportFailures += 1;
        }
        const message = describeError(err);
        this.logger.warn(
          { err, cycle, start: group.start, count: group.count, kind: group.kind },
          "Register group read failed",
        );
        for (const descriptor of group.descriptors) {
          results.push({ key: descriptor.key, ok: false, error: message });
        }
      }
    }

    const finishedAt = this.now();
    if (results.length > 0) {
      this.store.update(results, finishedAt);
    }

    const registersOk = results.filter((r) => r.ok).length;
    this.logger.debug(
      { cycle, attemptedGroups, failedGroups, registersOk, cancelled },
      "Poll cycle finished",
    );

    return {
      cycle,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      groups: groups.length,
      attemptedGroups,
      failedGroups,
      transportFailures,
      registersOk,
      registersFailed: results.length - registersOk,
      cancelled,
    };
  }

  private decodeDescriptor(
    group: RequestGroup,
    descriptor: RegisterDescriptor,
    words: readonly number[],
    decodedAt: Date,
  ): RegisterResult {
    try {
      const { unknownStatusCode, ...value } = decode(descriptor, sliceWords(group, descriptor, words), decodedAt);
      if (unknownStatusCode !== undefined) {
        this.logger.warn({ key: descriptor.key, code: unknownStatusCode }, "Unknown status code");
      }
      return { key: descriptor.key, ok: true, value };
    } catch (err) {
      this.logger.warn({ err, key: descriptor.key }, "Register decode failed");
      return { key: descriptor.key, ok: false, error: describeError(err) };
    }
  }

  private notifyCycle(summary: CycleSummary): void {
    for (const listener of Array.from(this.cycleListeners)) {
      try {
        listener(summary);
      } catch (error) {
        this.logger.error({ error }, "Cycle listener failed");
      }
    }
  }
}
