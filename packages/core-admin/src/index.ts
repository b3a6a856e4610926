import { createHash } from "crypto";
import type { IAccessControl } from "@lotto-stake/core-access";
import type { AtomicExecutor, Snapshotable } from "@lotto-stake/core-atomic";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import { type Address, type Clock, SECONDS_PER_HOUR, isUint256 } from "@lotto-stake/core-types";

export type AdminParameter = "MAX_PAYOUT_PER_ROUND" | "GIFT_RECIPIENTS_PER_ROUND" | "GIFT_CREATOR_AMOUNT" | "GIFT_USER_AMOUNT";

export const ADMIN_PARAMETERS: AdminParameter[] = [
  "MAX_PAYOUT_PER_ROUND",
  "GIFT_RECIPIENTS_PER_ROUND",
  "GIFT_CREATOR_AMOUNT",
  "GIFT_USER_AMOUNT",
];

export type WithdrawalSource = "PRIZE_POOL" | "GIFT_RESERVE";

export interface ScheduledOperation {
  operationId: string;
  parameter: AdminParameter;
  value: bigint;
  scheduledAt: number;
  executeTime: number;
  scheduledBy: Address;
}

export interface AdminGatewayConfig {
  timelockDelay: number;
}

export const DEFAULT_ADMIN_CONFIG: AdminGatewayConfig = {
  timelockDelay: 24 * SECONDS_PER_HOUR,
};

// Targets the gateway writes through; each method requires an active guarded operation.

export interface IPauseControl {
  setPaused(paused: boolean): void;
}

export interface IEmergencyModeControl {
  applyEmergencyMode(enabled: boolean): void;
  settleTransfer(from: Address, to: Address, amount: bigint): void;
}

export interface IPayoutCapControl {
  readonly address: Address;
  setMaxPayoutPerRound(value: bigint): void;
}

export interface IGiftConfigControl {
  setRecipientsPerRound(count: number): void;
  setCreatorAmount(amount: bigint): void;
  setUserAmount(amount: bigint): void;
  withdrawReserve(to: Address, amount: bigint): void;
}

export interface AdminGatewayDeps {
  executor: AtomicExecutor;
  access: IAccessControl;
  pause: IPauseControl;
  token: IEmergencyModeControl;
  rounds: IPayoutCapControl;
  gifts: IGiftConfigControl;
  clock: Clock;
}

export interface AdminGatewayState {
  scheduled: Map<string, ScheduledOperation>;
}

export function operationIdFor(parameter: AdminParameter, value: bigint): string {
  return "0x" + createHash("sha256").update(`${parameter}:${value.toString()}`).digest("hex");
}

export class AdminGateway implements Snapshotable<AdminGatewayState> {
  private state: AdminGatewayState = { scheduled: new Map() };
  private readonly config: AdminGatewayConfig;

  constructor(private readonly deps: AdminGatewayDeps, config: Partial<AdminGatewayConfig> = {}) {
    this.config = { ...DEFAULT_ADMIN_CONFIG, ...config };
    if (!Number.isInteger(this.config.timelockDelay) || this.config.timelockDelay < 0) {
      throw new Error("AdminGateway: timelockDelay must be a non-negative integer");
    }
    deps.executor.register("admin", this);
  }

  get timelockDelay(): number {
    return this.config.timelockDelay;
  }

  getScheduledOperation(parameter: AdminParameter, value: bigint): ScheduledOperation | null {
    const operation = this.state.scheduled.get(operationIdFor(parameter, value));
    return operation ? { ...operation } : null;
  }

  scheduledOperations(): ScheduledOperation[] {
    return Array.from(this.state.scheduled.values(), (operation) => ({ ...operation }));
  }

  /** Rescheduling an identical change restarts its timelock. */
  schedule(caller: Address, parameter: AdminParameter, value: bigint): ScheduledOperation {
    return this.deps.executor.run("admin.schedule", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      validateParameter(parameter, value);
      const now = this.deps.clock.now();
      const operation: ScheduledOperation = {
        operationId: operationIdFor(parameter, value),
        parameter,
        value,
        scheduledAt: now,
        executeTime: now + this.config.timelockDelay,
        scheduledBy: caller,
      };
      this.state.scheduled.set(operation.operationId, operation);
      this.deps.executor.emit({
        type: "OPERATION_SCHEDULED",
        account: caller,
        amount: value,
        meta: { operationId: operation.operationId, parameter, executeTime: operation.executeTime },
      });
      return { ...operation };
    });
  }

  execute(caller: Address, parameter: AdminParameter, value: bigint): void {
    this.deps.executor.run("admin.execute", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      const operation = this.requireScheduled(parameter, value);
      if (this.deps.clock.now() < operation.executeTime) {
        throw new LotteryError(LotteryErrorCode.TIMELOCK_NOT_READY, "Timelock has not elapsed", {
          operationId: operation.operationId,
          executeTime: operation.executeTime,
        });
      }
      this.apply(parameter, value);
      this.state.scheduled.delete(operation.operationId);
      this.deps.executor.emit({ type: "OPERATION_EXECUTED", account: caller, amount: value, meta: { operationId: operation.operationId, parameter } });
      this.deps.executor.emit({ type: "PARAMETER_UPDATED", amount: value, meta: { parameter } });
    });
  }

  cancel(caller: Address, parameter: AdminParameter, value: bigint): void {
    this.deps.executor.run("admin.cancel", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      const operation = this.requireScheduled(parameter, value);
      this.state.scheduled.delete(operation.operationId);
      this.deps.executor.emit({ type: "OPERATION_CANCELLED", account: caller, meta: { operationId: operation.operationId, parameter } });
    });
  }

  pause(caller: Address): void {
    this.deps.executor.run("admin.pause", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      this.deps.pause.setPaused(true);
      this.deps.executor.emit({ type: "PAUSED", account: caller });
    });
  }

  unpause(caller: Address): void {
    this.deps.executor.run("admin.unpause", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      this.deps.pause.setPaused(false);
      this.deps.executor.emit({ type: "UNPAUSED", account: caller });
    });
  }

  emergencyWithdraw(caller: Address, source: WithdrawalSource, to: Address, amount: bigint): void {
    this.deps.executor.run("admin.emergencyWithdraw", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      if (amount <= 0n) {
        throw new LotteryError(amount === 0n ? LotteryErrorCode.ZERO_AMOUNT : LotteryErrorCode.INVALID_PARAMETER, "Withdrawal amount must be positive");
      }
      if (source === "GIFT_RESERVE") {
        this.deps.gifts.withdrawReserve(to, amount);
      } else {
        this.deps.token.settleTransfer(this.deps.rounds.address, to, amount);
      }
      this.deps.executor.emit({ type: "EMERGENCY_WITHDRAWAL", account: to, amount, meta: { source, withdrawnBy: caller } });
    });
  }

  setEmergencyMode(caller: Address, enabled: boolean): void {
    this.deps.executor.run("admin.setEmergencyMode", () => {
      this.deps.access.requireRole(caller, "ADMIN");
      this.deps.token.applyEmergencyMode(enabled);
    });
  }

  snapshot(): AdminGatewayState {
    return structuredClone(this.state);
  }

  restore(state: AdminGatewayState): void {
    this.state = structuredClone(state);
  }

  private requireScheduled(parameter: AdminParameter, value: bigint): ScheduledOperation {
    const operationId = operationIdFor(parameter, value);
    const operation = this.state.scheduled.get(operationId);
    if (!operation) {
      throw new LotteryError(LotteryErrorCode.OPERATION_NOT_SCHEDULED, `${parameter}=${value} is not scheduled`, { operationId, parameter });
    }
    return operation;
  }

  private apply(parameter: AdminParameter, value: bigint): void {
    switch (parameter) {
      case "MAX_PAYOUT_PER_ROUND":
        this.deps.rounds.setMaxPayoutPerRound(value);
        return;
      case "GIFT_RECIPIENTS_PER_ROUND":
        this.deps.gifts.setRecipientsPerRound(Number(value));
        return;
      case "GIFT_CREATOR_AMOUNT":
        this.deps.gifts.setCreatorAmount(value);
        return;
      case "GIFT_USER_AMOUNT":
        this.deps.gifts.setUserAmount(value);
        return;
    }
  }
}

export function isAdminParameter(value: string): value is AdminParameter {
  return ADMIN_PARAMETERS.some((parameter) => parameter === value);
}

function validateParameter(parameter: AdminParameter, value: bigint): void {
  if (!isAdminParameter(parameter)) {
    throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, `Unknown parameter ${String(parameter)}`);
  }
  if (value <= 0n) {
    throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, `${parameter} must be positive`, { parameter });
  }
  if (parameter === "GIFT_RECIPIENTS_PER_ROUND" && value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, "GIFT_RECIPIENTS_PER_ROUND is too large", { parameter });
  }
  if (!isUint256(value)) {
    throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, `${parameter} must fit in uint256`, { parameter });
  }
}
