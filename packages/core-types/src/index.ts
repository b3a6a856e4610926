import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";

export type Address = string;

export type RoundId = number;

export type RequestId = string;

export const TOKEN_DECIMALS = 18;
export const TOKEN_UNIT = 10n ** 18n;
export const MAX_UINT256 = (1n << 256n) - 1n;

export const SECONDS_PER_HOUR = 60 * 60;
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

export interface Clock {
  /** Current unix time in seconds. */
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new Error("ManualClock: cannot move backwards");
    }
    this.current += Math.floor(seconds);
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new Error("ManualClock: cannot move backwards");
    }
    this.current = Math.floor(timestamp);
  }
}

export function toTokenUnits(whole: bigint | number | string): bigint {
  return BigInt(whole) * TOKEN_UNIT;
}

export function formatTokenUnits(amount: bigint): string {
  const whole = amount / TOKEN_UNIT;
  const fraction = amount % TOKEN_UNIT;
  if (fraction === 0n) return whole.toString();
  const padded = fraction.toString().padStart(TOKEN_DECIMALS, "0").replace(/0+$/, "");
  return `${whole}.${padded}`;
}

// uint256 arithmetic: fail instead of wrapping

export function checkedAdd(a: bigint, b: bigint): bigint {
  const result = a + b;
  if (result > MAX_UINT256) {
    throw new LotteryError(LotteryErrorCode.ARITHMETIC_OVERFLOW, "uint256 addition overflow", { a: a.toString(), b: b.toString() });
  }
  if (result < 0n) {
    throw new LotteryError(LotteryErrorCode.ARITHMETIC_UNDERFLOW, "uint256 addition underflow", { a: a.toString(), b: b.toString() });
  }
  return result;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  const result = a - b;
  if (result < 0n) {
    throw new LotteryError(LotteryErrorCode.ARITHMETIC_UNDERFLOW, "uint256 subtraction underflow", { a: a.toString(), b: b.toString() });
  }
  return result;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  const result = a * b;
  if (result > MAX_UINT256) {
    throw new LotteryError(LotteryErrorCode.ARITHMETIC_OVERFLOW, "uint256 multiplication overflow", { a: a.toString(), b: b.toString() });
  }
  if (result < 0n) {
    throw new LotteryError(LotteryErrorCode.ARITHMETIC_UNDERFLOW, "uint256 multiplication underflow", { a: a.toString(), b: b.toString() });
  }
  return result;
}

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

export type LotteryEventType =
  | "TOKENS_MINTED"
  | "TOKENS_TRANSFERRED"
  | "APPROVAL"
  | "TOKENS_STAKED"
  | "TOKENS_UNSTAKED"
  | "EMERGENCY_UNSTAKED"
  | "TOKENS_BURNED"
  | "AUTHORIZATION_CHANGED"
  | "EMERGENCY_MODE_CHANGED"
  | "ROLE_GRANTED"
  | "ROLE_REVOKED"
  | "PAUSED"
  | "UNPAUSED"
  | "RANDOMNESS_REQUESTED"
  | "RANDOMNESS_FULFILLED"
  | "ROUND_STARTED"
  | "BET_PLACED"
  | "DRAW_REQUESTED"
  | "NUMBERS_DRAWN"
  | "STALE_RANDOMNESS_IGNORED"
  | "WINNINGS_CLAIMED"
  | "RESERVE_FUNDED"
  | "GIFT_SENT"
  | "GIFTS_DISTRIBUTED"
  | "OPERATION_SCHEDULED"
  | "OPERATION_EXECUTED"
  | "OPERATION_CANCELLED"
  | "PARAMETER_UPDATED"
  | "EMERGENCY_WITHDRAWAL";

export interface LotteryEventInput {
  type: LotteryEventType;
  roundId?: RoundId;
  account?: Address;
  amount?: bigint;
  meta?: Record<string, unknown>;
}

/** A committed entry of the append-only journal. */
export interface LotteryEvent {
  sequence: number;
  type: LotteryEventType;
  occurredAt: number;
  roundId: RoundId | null;
  account: Address | null;
  amount: bigint | null;
  meta: Record<string, unknown>;
}
