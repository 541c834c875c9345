import type { Logger } from "pino";
import type { RegisterMap } from "../registers/definitions";
import type { TransportSession } from "../services/modbus/ModbusTcpClient";
import {
  PollScheduler,
  type CycleListener,
  type CycleSummary,
  type PollSchedulerOptions,
  type SchedulerState,
} from "../services/pollScheduler";
import { SnapshotStore, type Snapshot, type SnapshotListener } from "../services/snapshotStore";
import { Mutex } from "../utils/mutex";
import {
  ConnectionSettingsHolder,
  DEFAULT_PORT,
  DEFAULT_SCAN_INTERVAL_SECONDS,
  DEFAULT_UNIT_ID,
  parseConnectionSettings,
  sameEndpoint,
  type ConnectionSettings,
} from "./connectionSettings";

export type ConfigureOutcome = "unchanged" | "interval-updated" | "restarted" | "configured";

export interface HeatPumpHubOptions {
  session: TransportSession;
  registerMap: RegisterMap;
  logger: Logger;
  initialSettings: ConnectionSettings | null;
  scheduler?: PollSchedulerOptions;
  /** Called after a new descriptor has been applied. */
  persist?: (settings: ConnectionSettings) => void;
}

export interface HubStatus {
  configured: boolean;
  running: boolean;
  state: SchedulerState;
  settings: ConnectionSettings | null;
  connected: boolean;
  consecutiveFailures: number;
  backoffDelayMs: number;
  snapshotCycle: number;
  updatedAt: string | null;
  lastCycle: CycleSummary | null;
}

const UNCONFIGURED: ConnectionSettings = {
  host: "",
  port: DEFAULT_PORT,
  unitId: DEFAULT_UNIT_ID,
  intervalSeconds: DEFAULT_SCAN_INTERVAL_SECONDS,
};

/**
 * Owns the transport session, snapshot store and poll scheduler for one
 * heat pump. Configuration changes are serialised so a reconnect never races
 * another reconnect.
 */
export class HeatPumpHub {
  readonly registerMap: RegisterMap;
  private readonly session: TransportSession;
  private readonly store: SnapshotStore;
  private readonly settings: ConnectionSettingsHolder;
  private readonly scheduler: PollScheduler;
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly persist?: (settings: ConnectionSettings) => void;
  private configured: boolean;
  private running = false;

  constructor(options: HeatPumpHubOptions) {
    this.registerMap = options.registerMap;
    this.session = options.session;
    this.logger = options.logger;
    this.persist = options.persist;
    this.configured = options.initialSettings !== null;
    this.settings = new ConnectionSettingsHolder(options.initialSettings ?? UNCONFIGURED);
    this.store = new SnapshotStore(options.logger);
    this.scheduler = new PollScheduler(
      options.session,
      options.registerMap,
      this.store,
      this.settings,
      options.logger,
      options.scheduler,
    );
  }

  start(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.running = true;
      if (!this.configured) {
        this.logger.warn("Heat pump connection not configured; polling waits for settings");
        return;
      }
      this.scheduler.start();
    });
  }

  stop(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.running = false;
      await this.scheduler.stop();
    });
  }

  /**
   * Validates and applies a new connection descriptor. An interval-only change
   * takes effect at the next cycle boundary; a new endpoint stops the session,
   * clears the snapshot and polls the new device.
   */
  configure(input: unknown): Promise<ConfigureOutcome> {
    return this.mutex.runExclusive(async () => {
      const next = parseConnectionSettings(input);
      const previous = this.settings.current;

      if (this.configured && sameEndpoint(previous, next)) {
        if (previous.intervalSeconds === next.intervalSeconds) {
          return "unchanged";
        }
        this.settings.replaceInterval(next.intervalSeconds);
        this.persist?.(next);
        this.logger.info(
          { from: previous.intervalSeconds, to: next.intervalSeconds },
          "Scan interval updated",
        );
        return "interval-updated";
      }

      const wasConfigured = this.configured;
      if (wasConfigured) {
        await this.scheduler.stop();
        this.store.reset();
      }
      this.settings.replace(next);
      this.configured = true;
      this.persist?.(next);
      this.logger.info(
        { host: next.host, port: next.port, unitId: next.unitId, intervalSeconds: next.intervalSeconds },
        "Connection settings applied",
      );
      if (this.running) {
        this.scheduler.start();
      }
      return wasConfigured ? "restarted" : "configured";
    });
  }

  currentSnapshot(): Snapshot {
    return this.store.currentSnapshot();
  }

  currentSettings(): ConnectionSettings | null {
    return this.configured ? { ...this.settings.current } : null;
  }

  subscribe(listener: SnapshotListener): () => void {
    return this.store.subscribe(listener);
  }

  onCycleComplete(listener: CycleListener): () => void {
    return this.scheduler.onCycleComplete(listener);
  }

  status(): HubStatus {
    const snapshot = this.store.currentSnapshot();
    return {
      configured: this.configured,
      running: this.running,
      state: this.scheduler.getState(),
      settings: this.currentSettings(),
      connected: this.session.isConnected(),
      consecutiveFailures: this.session.consecutiveFailures(),
      backoffDelayMs: this.session.backoffDelayMs(),
      snapshotCycle: snapshot.cycle,
      updatedAt: snapshot.updatedAt,
      lastCycle: this.scheduler.getLastCycle(),
    };
  }
}
