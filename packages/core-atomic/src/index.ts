import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import type { ILogger } from "@lotto-stake/core-logging";
import { NoopLogger } from "@lotto-stake/core-logging";
import type { Clock, LotteryEvent, LotteryEventInput } from "@lotto-stake/core-types";

export interface Snapshotable<S> {
  snapshot(): S;
  restore(state: S): void;
}

export type LotteryEventListener = (event: LotteryEvent) => void;

type Checkpoint = () => () => void;

/**
 * Per-operation record of inverse writes for components whose history only grows. Rollback
 * cost follows what the operation touched, not the size of the component.
 */
export class UndoLog {
  private entries: Array<() => void> | null = null;
  private readonly touched = new Set<object>();

  /** Starts recording; the returned function undoes everything recorded since, newest first. */
  begin(): () => void {
    const entries: Array<() => void> = [];
    this.entries = entries;
    this.touched.clear();
    return () => {
      for (let idx = entries.length - 1; idx >= 0; idx -= 1) {
        entries[idx]();
      }
    };
  }

  end(): void {
    this.entries = null;
    this.touched.clear();
  }

  record(undo: () => void): void {
    this.entries?.push(undo);
  }

  /** Saves the own fields of `target` the first time it is written in an operation. */
  touch(target: object): void {
    if (!this.entries || this.touched.has(target)) return;
    this.touched.add(target);
    const saved = { ...target };
    this.entries.push(() => {
      Object.assign(target, saved);
    });
  }

  /** Map values must not be undefined. */
  setEntry<K, V>(map: Map<K, V>, key: K, value: V): void {
    const previous = map.get(key);
    this.record(() => {
      if (previous === undefined) {
        map.delete(key);
      } else {
        map.set(key, previous);
      }
    });
    map.set(key, value);
  }

  push<T>(list: T[], item: T): void {
    const length = list.length;
    this.record(() => {
      list.length = length;
    });
    list.push(item);
  }
}

/**
 * Single writer for every state-mutating entry point.
 *
 * A call either commits completely or leaves every registered participant exactly as it was.
 * Nested guarded calls (for example from a token receiver hook) are rejected with REENTRANT_CALL,
 * and so are internal writes made from code running under `callExternal`.
 * Events are buffered during the call and published only after it commits.
 */
export class AtomicExecutor {
  private readonly participants = new Map<string, Checkpoint>();
  private readonly listeners = new Set<LotteryEventListener>();
  private readonly journals: UndoLog[] = [];
  private active: string | null = null;
  private externalDepth = 0;
  private pending: LotteryEventInput[] = [];
  private sequence = 0;

  constructor(private readonly clock: Clock, private readonly logger: ILogger = new NoopLogger()) {}

  /** Whole-state checkpoint per operation; for components with bounded state. */
  register<S>(name: string, participant: Snapshotable<S>): void {
    this.addParticipant(name, () => {
      const state = participant.snapshot();
      return () => participant.restore(state);
    });
  }

  /** Returns the log the component must write through; rollback replays it. */
  registerJournaled(name: string): UndoLog {
    const log = new UndoLog();
    this.addParticipant(name, () => log.begin());
    this.journals.push(log);
    return log;
  }

  get inProgress(): string | null {
    return this.active;
  }

  get lastSequence(): number {
    return this.sequence;
  }

  restoreSequence(sequence: number): void {
    if (this.active) {
      throw new LotteryError(LotteryErrorCode.REENTRANT_CALL, "Cannot restore the journal sequence during an operation");
    }
    this.sequence = sequence;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.active) {
      throw new LotteryError(LotteryErrorCode.REENTRANT_CALL, `${operation} called while ${this.active} is in progress`, {
        operation,
        activeOperation: this.active,
      });
    }

    const rollbacks = Array.from(this.participants.values(), (checkpoint) => checkpoint());
    this.active = operation;
    this.pending = [];
    let committed: LotteryEventInput[] = [];
    try {
      const result = fn();
      committed = this.pending;
      return result;
    } catch (err) {
      for (const rollback of rollbacks) {
        rollback();
      }
      throw err;
    } finally {
      this.active = null;
      this.externalDepth = 0;
      this.pending = [];
      for (const journal of this.journals) {
        journal.end();
      }
      if (committed.length) {
        this.publish(committed);
      }
    }
  }

  /**
   * Throws unless called from inside a guarded operation by the components themselves; code running
   * under `callExternal` is rejected.
   */
  assertInProgress(caller: string): void {
    if (!this.active) {
      throw new LotteryError(LotteryErrorCode.NO_ACTIVE_OPERATION, `${caller} must run inside a guarded operation`);
    }
    if (this.externalDepth > 0) {
      throw new LotteryError(LotteryErrorCode.REENTRANT_CALL, `${caller} called from a hook while ${this.active} is in progress`, {
        operation: caller,
        activeOperation: this.active,
      });
    }
  }

  /** Runs third-party code (receiver hooks) inside the operation without write access. */
  callExternal<T>(fn: () => T): T {
    this.externalDepth += 1;
    try {
      return fn();
    } finally {
      this.externalDepth -= 1;
    }
  }

  emit(event: LotteryEventInput): void {
    this.assertInProgress(`emit(${event.type})`);
    this.pending.push(event);
  }

  subscribe(listener: LotteryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private addParticipant(name: string, checkpoint: Checkpoint): void {
    if (this.participants.has(name)) {
      throw new Error(`AtomicExecutor: participant '${name}' already registered`);
    }
    this.participants.set(name, checkpoint);
  }

  private publish(inputs: LotteryEventInput[]): void {
    const occurredAt = this.clock.now();
    const events = inputs.map<LotteryEvent>((input) => {
      this.sequence += 1;
      return {
        sequence: this.sequence,
        type: input.type,
        occurredAt,
        roundId: input.roundId ?? null,
        account: input.account ?? null,
        amount: input.amount ?? null,
        meta: input.meta ?? {},
      };
    });

    for (const event of events) {
      for (const listener of Array.from(this.listeners)) {
        try {
          listener(event);
        } catch (err) {
          // the operation has already committed; a failing subscriber cannot undo it
          this.logger.error("lottery.event.listener_failed", {
            sequence: event.sequence,
            type: event.type,
            err: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }
  }
}
