import type { AdminParameter, ScheduledOperation, WithdrawalSource } from "@lotto-stake/core-admin";
import type { LotteryPersistenceConfig } from "@lotto-stake/core-config";
import { isLotteryError } from "@lotto-stake/core-errors";
import type { GiftDistribution } from "@lotto-stake/core-gifts";
import type { ILotteryEventRepository } from "@lotto-stake/core-ledger";
import type { ILogger } from "@lotto-stake/core-logging";
import type { IMetrics } from "@lotto-stake/core-metrics";
import type { ILockManager } from "@lotto-stake/core-redis";
import type { PlacedBet } from "@lotto-stake/core-rounds";
import type { Address, LotteryEvent, RequestId, RoundId } from "@lotto-stake/core-types";
import type { LotteryStateStore } from "./state-store";
import type { LotterySystem } from "./system";

export const LOTTERY_SERVICE = Symbol("LOTTERY_SERVICE");

export interface LotteryServiceDeps {
  system: LotterySystem;
  lockManager: ILockManager;
  events: ILotteryEventRepository;
  stateStore: LotteryStateStore;
  logger: ILogger;
  metrics: IMetrics;
  persistence: LotteryPersistenceConfig;
}

export interface LotteryOperationResult<T> {
  result: T;
  events: LotteryEvent[];
}

/**
 * Async entry point for hosts. Serializes operations through the lock manager, then journals
 * the committed events and saves a snapshot before releasing the lock. Events committed by
 * direct calls on the system are journaled with the next operation.
 */
export class LotteryService {
  private readonly committed: LotteryEvent[] = [];
  private readonly unsubscribe: () => void;

  constructor(private readonly deps: LotteryServiceDeps) {
    this.unsubscribe = deps.system.executor.subscribe((event) => {
      this.committed.push(event);
    });
  }

  get system(): LotterySystem {
    return this.deps.system;
  }

  /** Restores the last saved snapshot, if any. */
  async restore(): Promise<boolean> {
    return this.deps.lockManager.withLock(this.deps.persistence.lockKey, this.deps.persistence.lockTtlMs, async () => {
      const restored = await this.deps.stateStore.load(this.deps.system);
      const journaled = await this.deps.events.latestSequence();
      if (restored && journaled > this.deps.system.executor.lastSequence) {
        this.deps.logger.warn("lottery.state.behind_journal", {
          snapshotSequence: this.deps.system.executor.lastSequence,
          journalSequence: journaled,
        });
      }
      this.deps.logger.info("lottery.state.restored", { restored, sequence: this.deps.system.executor.lastSequence });
      return restored;
    });
  }

  async execute<T>(operation: string, fn: (system: LotterySystem) => T): Promise<LotteryOperationResult<T>> {
    const { lockManager, persistence, logger, metrics } = this.deps;
    return lockManager.withLock(persistence.lockKey, persistence.lockTtlMs, async () => {
      const start = Date.now();
      let result: T;
      try {
        result = fn(this.deps.system);
      } catch (err) {
        const status = isLotteryError(err) ? "rejected" : "failed";
        metrics.increment("lottery_operations_total", { operation, status });
        if (isLotteryError(err)) {
          logger.warn("lottery.operation.rejected", { operation, code: err.code, message: err.message, details: err.details });
        } else {
          logger.error("lottery.operation.failed", { operation, err: err instanceof Error ? err.message : String(err) });
        }
        throw err;
      }

      const events = this.committed.splice(0, this.committed.length);
      try {
        await this.deps.events.append(events);
        await this.deps.stateStore.save(this.deps.system);
      } catch (err) {
        metrics.increment("lottery_operations_total", { operation, status: "persist_failed" });
        logger.error("lottery.operation.persist_failed", {
          operation,
          fromSequence: events[0]?.sequence,
          toSequence: events[events.length - 1]?.sequence,
          err: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }

      metrics.increment("lottery_operations_total", { operation, status: "success" });
      metrics.observe("lottery_operation_duration_ms", Date.now() - start, { operation });
      logger.info("lottery.operation.committed", { operation, events: events.map((event) => event.type) });
      return { result, events };
    });
  }

  // ---------- typed operations ----------

  stake(account: Address, amount: bigint) {
    return this.execute("token.stake", (system) => system.token.stake(account, amount));
  }

  unstake(account: Address, amount: bigint) {
    return this.execute("token.unstake", (system) => system.token.unstake(account, amount));
  }

  approve(owner: Address, spender: Address, amount: bigint) {
    return this.execute("token.approve", (system) => system.token.approve(owner, spender, amount));
  }

  placeBet(bettor: Address, numbers: readonly number[], amount: bigint): Promise<LotteryOperationResult<PlacedBet>> {
    return this.execute("rounds.placeBet", (system) => system.rounds.placeBet(bettor, numbers, amount));
  }

  endRound(caller: Address): Promise<LotteryOperationResult<RequestId>> {
    return this.execute("rounds.endRound", (system) => system.rounds.endRound(caller));
  }

  deliverRandomness(caller: Address, requestId: RequestId, values: readonly bigint[]) {
    return this.execute("randomness.deliver", (system) => system.randomness.deliver(caller, requestId, values));
  }

  emergencyDraw(caller: Address, roundId: RoundId, numbers: readonly number[]) {
    return this.execute("rounds.emergencyDraw", (system) => system.rounds.emergencyDraw(caller, roundId, numbers));
  }

  claimWinnings(caller: Address, roundId: RoundId, betIndices: readonly number[]): Promise<LotteryOperationResult<bigint>> {
    return this.execute("rounds.claimWinnings", (system) => system.rounds.claimWinnings(caller, roundId, betIndices));
  }

  fundReserve(caller: Address, amount: bigint) {
    return this.execute("gifts.fundReserve", (system) => system.gifts.fundReserve(caller, amount));
  }

  distributeGifts(caller: Address, roundId: RoundId): Promise<LotteryOperationResult<GiftDistribution>> {
    return this.execute("gifts.distributeGifts", (system) => system.gifts.distributeGifts(caller, roundId));
  }

  scheduleParameter(caller: Address, parameter: AdminParameter, value: bigint): Promise<LotteryOperationResult<ScheduledOperation>> {
    return this.execute("admin.schedule", (system) => system.admin.schedule(caller, parameter, value));
  }

  executeParameter(caller: Address, parameter: AdminParameter, value: bigint) {
    return this.execute("admin.execute", (system) => system.admin.execute(caller, parameter, value));
  }

  emergencyWithdraw(caller: Address, source: WithdrawalSource, to: Address, amount: bigint) {
    return this.execute("admin.emergencyWithdraw", (system) => system.admin.emergencyWithdraw(caller, source, to, amount));
  }

  setPaused(caller: Address, paused: boolean) {
    return this.execute(paused ? "admin.pause" : "admin.unpause", (system) =>
      paused ? system.admin.pause(caller) : system.admin.unpause(caller)
    );
  }

  setEmergencyMode(caller: Address, enabled: boolean) {
    return this.execute("admin.setEmergencyMode", (system) => system.admin.setEmergencyMode(caller, enabled));
  }

  listAccountEvents(account: Address, limit?: number, offset?: number): Promise<LotteryEvent[]> {
    return this.deps.events.listForAccount(account, limit, offset);
  }

  listRoundEvents(roundId: RoundId, limit?: number, offset?: number): Promise<LotteryEvent[]> {
    return this.deps.events.listForRound(roundId, limit, offset);
  }

  close(): void {
    this.unsubscribe();
  }
}
