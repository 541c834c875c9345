import type { Logger } from "pino";
import type { DecodedValue } from "../decoding/decoder";

export interface RegisterFailure {
  key: string;
  error: string;
  at: string;
  consecutiveFailures: number;
}

export interface Snapshot {
  cycle: number;
  updatedAt: string | null;
  values: Readonly<Record<string, Readonly<DecodedValue>>>;
  failures: Readonly<Record<string, Readonly<RegisterFailure>>>;
}

export type RegisterResult =
  | { key: string; ok: true; value: DecodedValue }
  | { key: string; ok: false; error: string };

export type SnapshotListener = (snapshot: Snapshot) => void;

const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  cycle: 0,
  updatedAt: null,
  values: Object.freeze({}),
  failures: Object.freeze({}),
});

export class SnapshotStore {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(private readonly logger: Logger) {}

  currentSnapshot(): Snapshot {
    return this.snapshot;
  }

  /**
   * Merges one cycle's results into a new snapshot. A failed register keeps
   * its last good value, flagged stale; registers absent from `results` are
   * carried over untouched. The new snapshot replaces the old one in a single
   * assignment.
   */
  update(results: readonly RegisterResult[], cycleAt: Date = new Date()): Snapshot {
    const previous = this.snapshot;
    const values: Record<string, Readonly<DecodedValue>> = { ...previous.values };
    const failures: Record<string, Readonly<RegisterFailure>> = { ...previous.failures };
    const at = cycleAt.toISOString();

    for (const result of results) {
      if (result.ok) {
        const { lastError: _ignored, ...fresh } = result.value;
        values[result.key] = Object.freeze({ ...fresh, key: result.key, stale: false });
        delete failures[result.key];
        continue;
      }

      const prior = values[result.key];
      if (prior) {
        values[result.key] = Object.freeze({ ...prior, stale: true, lastError: result.error });
      }
      failures[result.key] = Object.freeze({
        key: result.key,
        error: result.error,
        at,
        consecutiveFailures: (previous.failures[result.key]?.consecutiveFailures ?? 0) + 1,
      });
    }

    const next: Snapshot = Object.freeze({
      cycle: previous.cycle + 1,
      updatedAt: at,
      values: Object.freeze(values),
      failures: Object.freeze(failures),
    });
    this.snapshot = next;
    this.notify(next);
    return next;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  reset(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }

  private notify(snapshot: Snapshot): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error({ error }, "Snapshot listener failed");
      }
    }
  }
}
