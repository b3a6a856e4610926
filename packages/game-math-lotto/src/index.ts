import { createHash } from "crypto";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";

export interface LottoMathConfig {
  mathVersion: string;
  numbersPerTicket: number;
  minNumber: number;
  maxNumber: number;
  /** Deducted from every computed payout, in basis points. */
  houseEdgeBps: number;
  payoutMultipliers: Record<number, bigint>; // matches -> multiplier
}

export const BPS_DENOMINATOR = 10_000n;

export const DEFAULT_LOTTO_CONFIG: LottoMathConfig = {
  mathVersion: "v1",
  numbersPerTicket: 5,
  minNumber: 1,
  maxNumber: 49,
  houseEdgeBps: 500,
  payoutMultipliers: { 5: 800n, 4: 80n, 3: 8n, 2: 2n },
};

export class LottoMathEngine {
  private readonly config: LottoMathConfig;

  constructor(config: Partial<LottoMathConfig> = {}) {
    this.config = this.validateConfig({ ...DEFAULT_LOTTO_CONFIG, ...config });
  }

  get numbersPerTicket(): number {
    return this.config.numbersPerTicket;
  }

  get houseEdgeBps(): number {
    return this.config.houseEdgeBps;
  }

  get mathVersion(): string {
    return this.config.mathVersion;
  }

  /**
   * Canonical encoding only: exactly `numbersPerTicket` integers within range, strictly ascending
   * (which also rules out duplicates). Unsorted input is rejected, never normalized.
   */
  validateNumbers(numbers: readonly number[]): number[] {
    const reason = this.findViolation(numbers);
    if (reason) {
      throw new LotteryError(LotteryErrorCode.INVALID_NUMBERS, `Invalid numbers: ${reason}`, { numbers: [...numbers] });
    }
    return [...numbers];
  }

  isValidNumbers(numbers: readonly number[]): boolean {
    return this.findViolation(numbers) === null;
  }

  /**
   * Reduces each random value to `value mod range + min`; a value that lands on an already drawn
   * number is re-hashed until it does not. The result is sorted ascending.
   */
  drawNumbers(values: readonly bigint[]): number[] {
    const count = this.config.numbersPerTicket;
    if (values.length < count) {
      throw new LotteryError(LotteryErrorCode.INVALID_RANDOM_VALUES, `At least ${count} random values are required`);
    }

    const range = BigInt(this.config.maxNumber - this.config.minNumber + 1);
    const drawn = new Set<number>();
    for (let idx = 0; idx < count; idx += 1) {
      let value = values[idx];
      let attempt = 0;
      let candidate = Number(value % range) + this.config.minNumber;
      while (drawn.has(candidate)) {
        attempt += 1;
        value = rehash(value, attempt);
        candidate = Number(value % range) + this.config.minNumber;
      }
      drawn.add(candidate);
    }

    return Array.from(drawn).sort((a, b) => a - b);
  }

  countMatches(picks: readonly number[], winning: readonly number[]): number {
    const winningSet = new Set(winning);
    return picks.filter((pick) => winningSet.has(pick)).length;
  }

  multiplierFor(matches: number): bigint {
    return this.config.payoutMultipliers[matches] ?? 0n;
  }

  /** amount × multiplier × (10000 − houseEdgeBps) / 10000, rounded down. */
  payoutFor(amount: bigint, matches: number): bigint {
    const multiplier = this.multiplierFor(matches);
    if (multiplier === 0n) return 0n;
    return (amount * multiplier * (BPS_DENOMINATOR - BigInt(this.config.houseEdgeBps))) / BPS_DENOMINATOR;
  }

  estimateMaxPayout(amount: bigint): bigint {
    return this.payoutFor(amount, this.config.numbersPerTicket);
  }

  netOfHouseEdge(amount: bigint): bigint {
    return (amount * (BPS_DENOMINATOR - BigInt(this.config.houseEdgeBps))) / BPS_DENOMINATOR;
  }

  // ---------- validation ----------

  private findViolation(numbers: readonly number[]): string | null {
    if (!Array.isArray(numbers) || numbers.length !== this.config.numbersPerTicket) {
      return `exactly ${this.config.numbersPerTicket} numbers are required`;
    }
    for (let idx = 0; idx < numbers.length; idx += 1) {
      const value = numbers[idx];
      if (!Number.isInteger(value)) {
        return `numbers[${idx}] is not an integer`;
      }
      if (value < this.config.minNumber || value > this.config.maxNumber) {
        return `numbers[${idx}] must be between ${this.config.minNumber} and ${this.config.maxNumber}`;
      }
      if (idx > 0 && value === numbers[idx - 1]) {
        return `numbers[${idx}] is a duplicate`;
      }
      if (idx > 0 && value < numbers[idx - 1]) {
        return "numbers must be in ascending order";
      }
    }
    return null;
  }

  private validateConfig(config: LottoMathConfig): LottoMathConfig {
    if (!Number.isInteger(config.minNumber) || !Number.isInteger(config.maxNumber) || config.minNumber < 1) {
      throw new Error("Lotto: minNumber/maxNumber must be positive integers");
    }
    if (!Number.isInteger(config.numbersPerTicket) || config.numbersPerTicket <= 0) {
      throw new Error("Lotto: numbersPerTicket must be a positive integer");
    }
    if (config.maxNumber - config.minNumber + 1 < config.numbersPerTicket) {
      throw new Error("Lotto: number range is smaller than numbersPerTicket");
    }
    if (!Number.isInteger(config.houseEdgeBps) || config.houseEdgeBps < 0 || config.houseEdgeBps >= 10_000) {
      throw new Error("Lotto: houseEdgeBps must be an integer in [0, 10000)");
    }
    for (const [matches, multiplier] of Object.entries(config.payoutMultipliers)) {
      if (multiplier < 0n) {
        throw new Error(`Lotto: multiplier for ${matches} matches must not be negative`);
      }
    }
    return { ...config, payoutMultipliers: { ...config.payoutMultipliers } };
  }
}

function rehash(value: bigint, attempt: number): bigint {
  const digest = createHash("sha256").update(`${value.toString(16)}:${attempt}`).digest("hex");
  return BigInt(`0x${digest}`);
}

/**
 * Deterministic partial Fisher–Yates shuffle keyed by `seed`. Anyone who knows the seed can
 * reproduce the selection, so it must not be treated as an unpredictable draw.
 */
export function selectGiftRecipients<T>(candidates: readonly T[], count: number, seed: string): T[] {
  const pool = [...candidates];
  if (count >= pool.length) return pool;
  if (count <= 0) return [];

  for (let step = 0; step < count; step += 1) {
    const remaining = BigInt(pool.length - step);
    const digest = createHash("sha256").update(`${seed}:${step}`).digest("hex");
    const swapWith = step + Number(BigInt(`0x${digest}`) % remaining);
    const current = pool[step];
    pool[step] = pool[swapWith];
    pool[swapWith] = current;
  }
  return pool.slice(0, count);
}
