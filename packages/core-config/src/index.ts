import type { Role } from "@lotto-stake/core-access";
import { type AdminGatewayConfig, DEFAULT_ADMIN_CONFIG } from "@lotto-stake/core-admin";
import { DEFAULT_GIFT_CONFIG, type GiftDistributorConfig, MAX_RECIPIENTS_PER_ROUND } from "@lotto-stake/core-gifts";
import { DEFAULT_ROUND_ENGINE_CONFIG, type RoundEngineConfig } from "@lotto-stake/core-rounds";
import { DEFAULT_TOKEN_LEDGER_CONFIG, type TokenLedgerConfig } from "@lotto-stake/core-token";
import { type Address, TOKEN_DECIMALS, TOKEN_UNIT } from "@lotto-stake/core-types";
import { DEFAULT_LOTTO_CONFIG } from "@lotto-stake/game-math-lotto";

export type GrantedRole = Exclude<Role, "OWNER">;

export interface LotteryPersistenceConfig {
  stateKey: string;
  lockKey: string;
  lockTtlMs: number;
}

export interface LotteryConfig {
  owner: Address;
  roles: Record<GrantedRole, Address[]>;
  token: TokenLedgerConfig;
  rounds: RoundEngineConfig;
  houseEdgeBps: number;
  gifts: GiftDistributorConfig;
  admin: AdminGatewayConfig;
  persistence: LotteryPersistenceConfig;
}

export const LOTTERY_CONFIG = Symbol("LOTTERY_CONFIG");

/** Reads one raw setting; `process.env`, a plain record or Nest's ConfigService all fit. */
export type ConfigReader = (key: string) => string | undefined;

export type ConfigSource = ConfigReader | Record<string, string | undefined>;

export function defaultLotteryConfig(): LotteryConfig {
  return {
    owner: "lottery:owner",
    roles: { ADMIN: [], OPERATOR: [], DISTRIBUTOR: [], ORACLE: [] },
    token: { ...DEFAULT_TOKEN_LEDGER_CONFIG },
    rounds: { ...DEFAULT_ROUND_ENGINE_CONFIG },
    houseEdgeBps: DEFAULT_LOTTO_CONFIG.houseEdgeBps,
    gifts: { ...DEFAULT_GIFT_CONFIG, roundDuration: DEFAULT_ROUND_ENGINE_CONFIG.roundDuration },
    admin: { ...DEFAULT_ADMIN_CONFIG },
    persistence: { stateKey: "lottery:state", lockKey: "lottery:lock", lockTtlMs: 5_000 },
  };
}

/**
 * Builds the runtime configuration from `LOTTERY_*` settings. Token amounts are given in whole
 * tokens (up to 18 decimals), durations in seconds. Unset keys keep their defaults.
 */
export function loadLotteryConfig(source: ConfigSource = process.env): LotteryConfig {
  const read: ConfigReader = typeof source === "function" ? source : (key) => source[key];
  const defaults = defaultLotteryConfig();
  const env = new EnvParser(read);

  const roundDuration = env.seconds("LOTTERY_ROUND_DURATION_SECONDS", defaults.rounds.roundDuration, 1);
  const minStake = env.tokens("LOTTERY_MIN_STAKE", defaults.token.minStake);

  const config: LotteryConfig = {
    owner: env.address("LOTTERY_OWNER", defaults.owner),
    roles: {
      ADMIN: env.addressList("LOTTERY_ADMINS"),
      OPERATOR: env.addressList("LOTTERY_OPERATORS"),
      DISTRIBUTOR: env.addressList("LOTTERY_DISTRIBUTORS"),
      ORACLE: env.addressList("LOTTERY_ORACLES"),
    },
    token: {
      ...defaults.token,
      minStake,
      maxStakePerUser: env.tokens("LOTTERY_MAX_STAKE_PER_USER", defaults.token.maxStakePerUser),
      minStakeDuration: env.seconds("LOTTERY_MIN_STAKE_DURATION_SECONDS", defaults.token.minStakeDuration, 0),
      maxSupply: env.tokens("LOTTERY_MAX_SUPPLY", defaults.token.maxSupply),
    },
    rounds: {
      address: env.address("LOTTERY_PRIZE_POOL_ADDRESS", defaults.rounds.address),
      roundDuration,
      minBet: env.tokens("LOTTERY_MIN_BET", defaults.rounds.minBet),
      maxBetPerUserPerRound: env.tokens("LOTTERY_MAX_BET_PER_USER_PER_ROUND", defaults.rounds.maxBetPerUserPerRound),
      minStakeAmount: env.tokens("LOTTERY_MIN_STAKE_AMOUNT", minStake),
      consecutivePlayRequirement: env.integer("LOTTERY_CONSECUTIVE_PLAY_REQUIREMENT", defaults.rounds.consecutivePlayRequirement, 1, 1_000),
      emergencyDrawDelay: env.seconds("LOTTERY_EMERGENCY_DRAW_DELAY_SECONDS", defaults.rounds.emergencyDrawDelay, 0),
      maxPayoutPerRound: env.tokens("LOTTERY_MAX_PAYOUT_PER_ROUND", defaults.rounds.maxPayoutPerRound),
    },
    houseEdgeBps: env.integer("LOTTERY_HOUSE_EDGE_BPS", defaults.houseEdgeBps, 0, 9_999),
    gifts: {
      address: env.address("LOTTERY_GIFT_RESERVE_ADDRESS", defaults.gifts.address),
      creator: env.address("LOTTERY_CREATOR_ADDRESS", defaults.gifts.creator),
      recipientsPerRound: env.integer("LOTTERY_GIFT_RECIPIENTS_PER_ROUND", defaults.gifts.recipientsPerRound, 1, MAX_RECIPIENTS_PER_ROUND),
      creatorAmount: env.tokens("LOTTERY_GIFT_CREATOR_AMOUNT", defaults.gifts.creatorAmount),
      userAmount: env.tokens("LOTTERY_GIFT_USER_AMOUNT", defaults.gifts.userAmount),
      giftCooldown: env.seconds("LOTTERY_GIFT_COOLDOWN_SECONDS", defaults.gifts.giftCooldown, 0),
      roundDuration,
    },
    admin: {
      timelockDelay: env.seconds("LOTTERY_TIMELOCK_DELAY_SECONDS", defaults.admin.timelockDelay, 0),
    },
    persistence: {
      stateKey: env.string("LOTTERY_STATE_KEY", defaults.persistence.stateKey),
      lockKey: env.string("LOTTERY_LOCK_KEY", defaults.persistence.lockKey),
      lockTtlMs: env.integer("LOTTERY_LOCK_TTL_MS", defaults.persistence.lockTtlMs, 1, 600_000),
    },
  };

  if (config.token.maxStakePerUser < config.token.minStake) {
    throw new Error("LotteryConfig: LOTTERY_MAX_STAKE_PER_USER must be >= LOTTERY_MIN_STAKE");
  }
  if (config.rounds.maxBetPerUserPerRound < config.rounds.minBet) {
    throw new Error("LotteryConfig: LOTTERY_MAX_BET_PER_USER_PER_ROUND must be >= LOTTERY_MIN_BET");
  }
  return config;
}

const TOKEN_AMOUNT_PATTERN = new RegExp(`^(\\d+)(?:\\.(\\d{1,${TOKEN_DECIMALS}}))?$`);

/** "12.5" -> 12.5 × 10^18 base units. */
export function parseTokenAmount(input: string): bigint {
  const match = TOKEN_AMOUNT_PATTERN.exec(input.trim());
  if (!match) {
    throw new Error(`'${input}' is not a token amount`);
  }
  const whole = BigInt(match[1]);
  const fraction = match[2] ? BigInt(match[2].padEnd(TOKEN_DECIMALS, "0")) : 0n;
  return whole * TOKEN_UNIT + fraction;
}

class EnvParser {
  constructor(private readonly read: ConfigReader) {}

  string(key: string, fallback: string): string {
    const raw = this.raw(key);
    return raw ?? fallback;
  }

  address(key: string, fallback: Address): Address {
    return this.string(key, fallback);
  }

  addressList(key: string): Address[] {
    const raw = this.raw(key);
    if (raw === undefined) return [];
    return Array.from(new Set(raw.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0)));
  }

  integer(key: string, fallback: number, min: number, max: number): number {
    const raw = this.raw(key);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new Error(`LotteryConfig: ${key} must be an integer between ${min} and ${max}`);
    }
    return value;
  }

  seconds(key: string, fallback: number, min: number): number {
    return this.integer(key, fallback, min, Number.MAX_SAFE_INTEGER);
  }

  tokens(key: string, fallback: bigint): bigint {
    const raw = this.raw(key);
    if (raw === undefined) return fallback;
    let value: bigint;
    try {
      value = parseTokenAmount(raw);
    } catch (err) {
      throw new Error(`LotteryConfig: ${key} must be a token amount (${err instanceof Error ? err.message : String(err)})`);
    }
    if (value <= 0n) {
      throw new Error(`LotteryConfig: ${key} must be greater than zero`);
    }
    return value;
  }

  private raw(key: string): string | undefined {
    const value = this.read(key);
    if (value === undefined || value.trim() === "") return undefined;
    return value.trim();
  }
}
