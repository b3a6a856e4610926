export enum LotteryErrorCode {
  // validation
  ZERO_AMOUNT = "ZERO_AMOUNT",
  INVALID_NUMBERS = "INVALID_NUMBERS",
  INVALID_BET_INDEX = "INVALID_BET_INDEX",
  INVALID_RANDOM_VALUES = "INVALID_RANDOM_VALUES",
  INVALID_PARAMETER = "INVALID_PARAMETER",
  // eligibility
  BELOW_MINIMUM = "BELOW_MINIMUM",
  BET_BELOW_MINIMUM = "BET_BELOW_MINIMUM",
  INSUFFICIENT_BALANCE = "INSUFFICIENT_BALANCE",
  INSUFFICIENT_STAKED = "INSUFFICIENT_STAKED",
  INSUFFICIENT_TRANSFERABLE = "INSUFFICIENT_TRANSFERABLE",
  INSUFFICIENT_ALLOWANCE = "INSUFFICIENT_ALLOWANCE",
  DURATION_NOT_MET = "DURATION_NOT_MET",
  NOT_ELIGIBLE = "NOT_ELIGIBLE",
  // state
  ROUND_NOT_FOUND = "ROUND_NOT_FOUND",
  ROUND_NOT_OPEN = "ROUND_NOT_OPEN",
  ROUND_NOT_ENDED = "ROUND_NOT_ENDED",
  ROUND_ALREADY_DRAWN = "ROUND_ALREADY_DRAWN",
  DRAW_ALREADY_REQUESTED = "DRAW_ALREADY_REQUESTED",
  EMERGENCY_DRAW_TOO_EARLY = "EMERGENCY_DRAW_TOO_EARLY",
  NUMBERS_NOT_DRAWN = "NUMBERS_NOT_DRAWN",
  ALREADY_CLAIMED = "ALREADY_CLAIMED",
  NO_WINNINGS = "NO_WINNINGS",
  GIFTS_ALREADY_DISTRIBUTED = "GIFTS_ALREADY_DISTRIBUTED",
  INVALID_REQUEST = "INVALID_REQUEST",
  EMERGENCY_MODE_DISABLED = "EMERGENCY_MODE_DISABLED",
  OPERATION_NOT_SCHEDULED = "OPERATION_NOT_SCHEDULED",
  TIMELOCK_NOT_READY = "TIMELOCK_NOT_READY",
  PAUSED = "PAUSED",
  NOT_PAUSED = "NOT_PAUSED",
  REENTRANT_CALL = "REENTRANT_CALL",
  NO_ACTIVE_OPERATION = "NO_ACTIVE_OPERATION",
  // capacity
  EXCEEDS_MAXIMUM = "EXCEEDS_MAXIMUM",
  EXCEEDS_MAX_BET = "EXCEEDS_MAX_BET",
  EXCEEDS_MAX_SUPPLY = "EXCEEDS_MAX_SUPPLY",
  PAYOUT_EXCEEDS_MAXIMUM = "PAYOUT_EXCEEDS_MAXIMUM",
  INSUFFICIENT_RESERVE = "INSUFFICIENT_RESERVE",
  ARITHMETIC_OVERFLOW = "ARITHMETIC_OVERFLOW",
  ARITHMETIC_UNDERFLOW = "ARITHMETIC_UNDERFLOW",
  // authorization
  UNAUTHORIZED = "UNAUTHORIZED",
}

export type LotteryErrorCategory = "VALIDATION" | "ELIGIBILITY" | "STATE" | "CAPACITY" | "AUTHORIZATION";

export interface LotteryErrorPayload {
  error: LotteryErrorCode;
  category: LotteryErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

const CATEGORY_BY_CODE: Record<LotteryErrorCode, LotteryErrorCategory> = {
  [LotteryErrorCode.ZERO_AMOUNT]: "VALIDATION",
  [LotteryErrorCode.INVALID_NUMBERS]: "VALIDATION",
  [LotteryErrorCode.INVALID_BET_INDEX]: "VALIDATION",
  [LotteryErrorCode.INVALID_RANDOM_VALUES]: "VALIDATION",
  [LotteryErrorCode.INVALID_PARAMETER]: "VALIDATION",
  [LotteryErrorCode.BELOW_MINIMUM]: "ELIGIBILITY",
  [LotteryErrorCode.BET_BELOW_MINIMUM]: "ELIGIBILITY",
  [LotteryErrorCode.INSUFFICIENT_BALANCE]: "ELIGIBILITY",
  [LotteryErrorCode.INSUFFICIENT_STAKED]: "ELIGIBILITY",
  [LotteryErrorCode.INSUFFICIENT_TRANSFERABLE]: "ELIGIBILITY",
  [LotteryErrorCode.INSUFFICIENT_ALLOWANCE]: "ELIGIBILITY",
  [LotteryErrorCode.DURATION_NOT_MET]: "ELIGIBILITY",
  [LotteryErrorCode.NOT_ELIGIBLE]: "ELIGIBILITY",
  [LotteryErrorCode.ROUND_NOT_FOUND]: "STATE",
  [LotteryErrorCode.ROUND_NOT_OPEN]: "STATE",
  [LotteryErrorCode.ROUND_NOT_ENDED]: "STATE",
  [LotteryErrorCode.ROUND_ALREADY_DRAWN]: "STATE",
  [LotteryErrorCode.DRAW_ALREADY_REQUESTED]: "STATE",
  [LotteryErrorCode.EMERGENCY_DRAW_TOO_EARLY]: "STATE",
  [LotteryErrorCode.NUMBERS_NOT_DRAWN]: "STATE",
  [LotteryErrorCode.ALREADY_CLAIMED]: "STATE",
  [LotteryErrorCode.NO_WINNINGS]: "STATE",
  [LotteryErrorCode.GIFTS_ALREADY_DISTRIBUTED]: "STATE",
  [LotteryErrorCode.INVALID_REQUEST]: "STATE",
  [LotteryErrorCode.EMERGENCY_MODE_DISABLED]: "STATE",
  [LotteryErrorCode.OPERATION_NOT_SCHEDULED]: "STATE",
  [LotteryErrorCode.TIMELOCK_NOT_READY]: "STATE",
  [LotteryErrorCode.PAUSED]: "STATE",
  [LotteryErrorCode.NOT_PAUSED]: "STATE",
  [LotteryErrorCode.REENTRANT_CALL]: "STATE",
  [LotteryErrorCode.NO_ACTIVE_OPERATION]: "STATE",
  [LotteryErrorCode.EXCEEDS_MAXIMUM]: "CAPACITY",
  [LotteryErrorCode.EXCEEDS_MAX_BET]: "CAPACITY",
  [LotteryErrorCode.EXCEEDS_MAX_SUPPLY]: "CAPACITY",
  [LotteryErrorCode.PAYOUT_EXCEEDS_MAXIMUM]: "CAPACITY",
  [LotteryErrorCode.INSUFFICIENT_RESERVE]: "CAPACITY",
  [LotteryErrorCode.ARITHMETIC_OVERFLOW]: "CAPACITY",
  [LotteryErrorCode.ARITHMETIC_UNDERFLOW]: "CAPACITY",
  [LotteryErrorCode.UNAUTHORIZED]: "AUTHORIZATION",
};

export class LotteryError extends Error {
  constructor(public readonly code: LotteryErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "LotteryError";
  }

  get category(): LotteryErrorCategory {
    return errorCategory(this.code);
  }

  toPayload(): LotteryErrorPayload {
    return lotteryErrorPayload(this.code, this.message, this.details);
  }
}

export function errorCategory(code: LotteryErrorCode): LotteryErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export function lotteryErrorPayload(code: LotteryErrorCode, message: string, details?: Record<string, unknown>): LotteryErrorPayload {
  return { error: code, category: errorCategory(code), message, details };
}

export function isLotteryError(err: unknown, code?: LotteryErrorCode): err is LotteryError {
  if (!(err instanceof LotteryError)) return false;
  return code === undefined || err.code === code;
}
