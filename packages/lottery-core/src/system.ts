import { type AccessState, AccessControl, PauseSwitch, type PauseState } from "@lotto-stake/core-access";
import { AdminGateway, type AdminGatewayState } from "@lotto-stake/core-admin";
import { AtomicExecutor } from "@lotto-stake/core-atomic";
import type { LotteryConfig } from "@lotto-stake/core-config";
import { GiftDistributor, type GiftReserveState } from "@lotto-stake/core-gifts";
import type { ILogger } from "@lotto-stake/core-logging";
import { NoopLogger } from "@lotto-stake/core-logging";
import { RandomnessGateway, type RandomnessGatewayState } from "@lotto-stake/core-randomness";
import { RoundEngine, type RoundEngineState } from "@lotto-stake/core-rounds";
import { TokenLedger, type TokenLedgerState } from "@lotto-stake/core-token";
import type { Clock } from "@lotto-stake/core-types";
import { LottoMathEngine } from "@lotto-stake/game-math-lotto";

export const LOTTERY_SYSTEM = Symbol("LOTTERY_SYSTEM");
export const CLOCK = Symbol("CLOCK");

export const STATE_VERSION = 1;

export interface LotterySystemState {
  version: number;
  sequence: number;
  access: AccessState;
  pause: PauseState;
  token: TokenLedgerState;
  randomness: RandomnessGatewayState;
  rounds: RoundEngineState;
  gifts: GiftReserveState;
  admin: AdminGatewayState;
}

export interface LotterySystemDeps {
  clock: Clock;
  logger?: ILogger;
}

export interface LotterySystem {
  readonly config: LotteryConfig;
  readonly clock: Clock;
  readonly executor: AtomicExecutor;
  readonly access: AccessControl;
  readonly pause: PauseSwitch;
  readonly token: TokenLedger;
  readonly randomness: RandomnessGateway;
  readonly rounds: RoundEngine;
  readonly gifts: GiftDistributor;
  readonly admin: AdminGateway;
  readonly math: LottoMathEngine;
  exportState(): LotterySystemState;
  importState(state: LotterySystemState): void;
}

/** Wires every component around one executor; round 1 opens at the clock's current time. */
export function createLotterySystem(config: LotteryConfig, deps: LotterySystemDeps): LotterySystem {
  const logger = deps.logger ?? new NoopLogger();
  const { clock } = deps;
  const executor = new AtomicExecutor(clock, logger);
  const access = new AccessControl(executor, config.owner, config.roles);
  const pause = new PauseSwitch(executor);
  const math = new LottoMathEngine({ houseEdgeBps: config.houseEdgeBps });
  const token = new TokenLedger(executor, access, clock, config.token);
  const randomness = new RandomnessGateway(executor, access, clock);
  const rounds = new RoundEngine({ executor, access, pause, token, randomness, clock, logger, math }, config.rounds);
  const gifts = new GiftDistributor({ executor, access, token, rounds, clock, logger }, config.gifts);
  const admin = new AdminGateway({ executor, access, pause, token, rounds, gifts, clock }, config.admin);

  return {
    config,
    clock,
    executor,
    access,
    pause,
    token,
    randomness,
    rounds,
    gifts,
    admin,
    math,
    exportState: () => ({
      version: STATE_VERSION,
      sequence: executor.lastSequence,
      access: access.snapshot(),
      pause: pause.snapshot(),
      token: token.snapshot(),
      randomness: randomness.snapshot(),
      rounds: rounds.snapshot(),
      gifts: gifts.snapshot(),
      admin: admin.snapshot(),
    }),
    importState: (state) => {
      if (state.version !== STATE_VERSION) {
        throw new Error(`Unsupported lottery state version ${state.version}`);
      }
      executor.restoreSequence(state.sequence);
      access.restore(state.access);
      pause.restore(state.pause);
      token.restore(state.token);
      randomness.restore(state.randomness);
      rounds.restore(state.rounds);
      gifts.restore(state.gifts);
      admin.restore(state.admin);
    },
  };
}
