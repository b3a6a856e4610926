import { type LotteryConfig, defaultLotteryConfig } from "@lotto-stake/core-config";
import { SeededRandomnessOracle } from "@lotto-stake/core-randomness";
import { type Address, MAX_UINT256, ManualClock, toTokenUnits } from "@lotto-stake/core-types";
import { type LotterySystem, createLotterySystem } from "@lotto-stake/lottery-core";
import { InMemoryLogger } from "./test-helpers";

export const OWNER = "owner";
export const ADMIN = "admin";
export const OPERATOR = "operator";
export const DISTRIBUTOR = "distributor";
export const ORACLE = "oracle";

export const TEST_SERVER_SEED = "test-server-seed";
export const START_TIME = 1_700_000_000;

export interface LotteryHarness {
  system: LotterySystem;
  clock: ManualClock;
  oracle: SeededRandomnessOracle;
  logger: InMemoryLogger;
  /** Mints whole tokens to `account`. */
  fund(account: Address, wholeTokens: number): void;
  /** Funds, stakes and approves the prize pool without limit. */
  makeBettor(account: Address, options?: { balance?: number; stake?: number }): void;
  fundPool(wholeTokens: number): void;
  fundReserve(wholeTokens: number): void;
}

export function testLotteryConfig(customize?: (config: LotteryConfig) => void): LotteryConfig {
  const config = defaultLotteryConfig();
  config.owner = OWNER;
  config.roles = { ADMIN: [ADMIN], OPERATOR: [OPERATOR], DISTRIBUTOR: [DISTRIBUTOR], ORACLE: [ORACLE] };
  customize?.(config);
  return config;
}

export function createLotteryHarness(customize?: (config: LotteryConfig) => void): LotteryHarness {
  const clock = new ManualClock(START_TIME);
  const logger = new InMemoryLogger();
  const system = createLotterySystem(testLotteryConfig(customize), { clock, logger });
  const oracle = new SeededRandomnessOracle(system.randomness, system.executor, { address: ORACLE, serverSeed: TEST_SERVER_SEED });

  const fund = (account: Address, wholeTokens: number) => system.token.mint(OWNER, account, toTokenUnits(wholeTokens));

  return {
    system,
    clock,
    oracle,
    logger,
    fund,
    makeBettor(account, options = {}) {
      fund(account, options.balance ?? 1_000);
      system.token.stake(account, toTokenUnits(options.stake ?? 100));
      system.token.approve(account, system.rounds.address, MAX_UINT256);
    },
    fundPool(wholeTokens) {
      fund(system.rounds.address, wholeTokens);
    },
    fundReserve(wholeTokens) {
      const sponsor = "reserve-sponsor";
      fund(sponsor, wholeTokens);
      system.token.approve(sponsor, system.gifts.address, toTokenUnits(wholeTokens));
      system.gifts.fundReserve(sponsor, toTokenUnits(wholeTokens));
    },
  };
}
