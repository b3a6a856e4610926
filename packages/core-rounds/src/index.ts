import type { IAccessControl, IPauseGuard } from "@lotto-stake/core-access";
import type { AtomicExecutor, Snapshotable, UndoLog } from "@lotto-stake/core-atomic";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import type { ILogger } from "@lotto-stake/core-logging";
import { NoopLogger } from "@lotto-stake/core-logging";
import type { IRandomnessConsumer, IRandomnessRequester, RandomnessRequestRecord } from "@lotto-stake/core-randomness";
import type { ITokenSettlementPort } from "@lotto-stake/core-token";
import {
  type Address,
  type Clock,
  type RequestId,
  type RoundId,
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  checkedAdd,
  toTokenUnits,
} from "@lotto-stake/core-types";
import { LottoMathEngine } from "@lotto-stake/game-math-lotto";

export interface RoundEngineConfig {
  /** Address holding the prize pool; bets are pulled into it and winnings paid from it. */
  address: Address;
  roundDuration: number;
  minBet: bigint;
  maxBetPerUserPerRound: bigint;
  /** Minimum staking weight a bettor must hold. */
  minStakeAmount: bigint;
  consecutivePlayRequirement: number;
  /** Grace period after `endTime` before an operator may draw manually. */
  emergencyDrawDelay: number;
  maxPayoutPerRound: bigint;
}

export const DEFAULT_ROUND_ENGINE_CONFIG: RoundEngineConfig = {
  address: "lottery:prize-pool",
  roundDuration: 7 * SECONDS_PER_DAY,
  minBet: toTokenUnits(1),
  maxBetPerUserPerRound: toTokenUnits(1_000),
  minStakeAmount: toTokenUnits(10),
  consecutivePlayRequirement: 3,
  emergencyDrawDelay: SECONDS_PER_HOUR,
  maxPayoutPerRound: toTokenUnits(1_000_000),
};

export type RoundState = "OPEN" | "CLOSED" | "AWAITING_DRAW" | "DRAWN";

export type DrawSource = "ORACLE" | "EMERGENCY";

export interface Round {
  id: RoundId;
  startTime: number;
  endTime: number;
  winningNumbers: number[];
  drawn: boolean;
  drawnAt: number | null;
  drawSource: DrawSource | null;
  totalBetAmount: bigint;
  /** Bets net of the house edge. */
  totalPrizePool: bigint;
  totalClaimed: bigint;
  participants: Address[];
  betCount: number;
  giftsDistributed: boolean;
  pendingRequestId: RequestId | null;
}

export interface Bet {
  roundId: RoundId;
  index: number;
  bettor: Address;
  numbers: number[];
  amount: bigint;
  placedAt: number;
  matchCount: number | null;
  claimed: boolean;
}

export interface PlayerStats {
  totalBets: bigint;
  betCount: number;
  totalWinnings: bigint;
  consecutiveRounds: number;
  lastParticipatedRound: RoundId | null;
  lastGiftRound: RoundId | null;
  eligibleForGift: boolean;
}

export interface PlacedBet {
  roundId: RoundId;
  index: number;
}

export interface RoundEngineState {
  rounds: Round[];
  bets: Map<string, Bet>;
  userRoundTotals: Map<string, bigint>;
  userBetIndices: Map<string, number[]>;
  players: Map<Address, PlayerStats>;
  maxPayoutPerRound: bigint;
}

/** Narrow surface the gift distributor writes through. */
export interface IGiftBookkeeping {
  getRound(roundId: RoundId): Round | null;
  getPlayerStats(account: Address): PlayerStats;
  markGiftsDistributed(roundId: RoundId): void;
  recordGift(account: Address, roundId: RoundId): void;
}

export interface RoundEngineDeps {
  executor: AtomicExecutor;
  access: IAccessControl;
  pause: IPauseGuard;
  token: ITokenSettlementPort;
  randomness: IRandomnessRequester;
  clock: Clock;
  logger?: ILogger;
  math?: LottoMathEngine;
}

const betKey = (roundId: RoundId, index: number) => `${roundId}:${index}`;
const userKey = (roundId: RoundId, account: Address) => `${roundId}:${account}`;

const emptyStats = (): PlayerStats => ({
  totalBets: 0n,
  betCount: 0,
  totalWinnings: 0n,
  consecutiveRounds: 0,
  lastParticipatedRound: null,
  lastGiftRound: null,
  eligibleForGift: false,
});

export class RoundEngine implements IRandomnessConsumer, IGiftBookkeeping, Snapshotable<RoundEngineState> {
  private state: RoundEngineState;
  private readonly config: RoundEngineConfig;
  private readonly executor: AtomicExecutor;
  private readonly access: IAccessControl;
  private readonly pause: IPauseGuard;
  private readonly token: ITokenSettlementPort;
  private readonly randomness: IRandomnessRequester;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly math: LottoMathEngine;
  private readonly undo: UndoLog;

  constructor(deps: RoundEngineDeps, config: Partial<RoundEngineConfig> = {}) {
    this.config = validateConfig({ ...DEFAULT_ROUND_ENGINE_CONFIG, ...config });
    this.executor = deps.executor;
    this.access = deps.access;
    this.pause = deps.pause;
    this.token = deps.token;
    this.randomness = deps.randomness;
    this.clock = deps.clock;
    this.logger = deps.logger ?? new NoopLogger();
    this.math = deps.math ?? new LottoMathEngine();

    this.state = {
      rounds: [newRound(1, this.clock.now(), this.config.roundDuration)],
      bets: new Map(),
      userRoundTotals: new Map(),
      userBetIndices: new Map(),
      players: new Map(),
      maxPayoutPerRound: this.config.maxPayoutPerRound,
    };
    this.randomness.setConsumer(this);
    this.undo = this.executor.registerJournaled("rounds");
  }

  // ---------- views ----------

  get settings(): Readonly<RoundEngineConfig> {
    return this.config;
  }

  get address(): Address {
    return this.config.address;
  }

  get currentRoundId(): RoundId {
    return this.state.rounds.length;
  }

  get maxPayoutPerRound(): bigint {
    return this.state.maxPayoutPerRound;
  }

  getRound(roundId: RoundId): Round | null {
    const round = this.state.rounds[roundId - 1];
    return round ? copyRound(round) : null;
  }

  getCurrentRound(): Round {
    return copyRound(this.currentRound());
  }

  getRoundState(roundId: RoundId): RoundState {
    return this.stateOf(this.roundRecord(roundId));
  }

  getBet(roundId: RoundId, index: number): Bet | null {
    const bet = this.state.bets.get(betKey(roundId, index));
    return bet ? { ...bet, numbers: [...bet.numbers] } : null;
  }

  getRoundBets(roundId: RoundId): Bet[] {
    const round = this.state.rounds[roundId - 1];
    if (!round) return [];
    const bets: Bet[] = [];
    for (let index = 0; index < round.betCount; index += 1) {
      const bet = this.getBet(roundId, index);
      if (bet) bets.push(bet);
    }
    return bets;
  }

  getUserBetIndices(roundId: RoundId, account: Address): number[] {
    return [...(this.state.userBetIndices.get(userKey(roundId, account)) ?? [])];
  }

  getUserRoundTotal(roundId: RoundId, account: Address): bigint {
    return this.state.userRoundTotals.get(userKey(roundId, account)) ?? 0n;
  }

  getPlayerStats(account: Address): PlayerStats {
    const stats = this.state.players.get(account);
    return stats ? { ...stats } : emptyStats();
  }

  /** Unclaimed winnings of `account` in a drawn round; zero otherwise. */
  getClaimableWinnings(roundId: RoundId, account: Address): bigint {
    const round = this.state.rounds[roundId - 1];
    if (!round?.drawn) return 0n;
    let total = 0n;
    for (const index of this.state.userBetIndices.get(userKey(roundId, account)) ?? []) {
      const bet = this.state.bets.get(betKey(roundId, index));
      if (!bet || bet.claimed) continue;
      total += this.math.payoutFor(bet.amount, bet.matchCount ?? 0);
    }
    return total;
  }

  /** Sum of every winning payout in the round, claimed or not. */
  getRoundPayoutTotal(roundId: RoundId): bigint {
    const round = this.roundRecord(roundId);
    if (!round.drawn) return 0n;
    let total = 0n;
    for (let index = 0; index < round.betCount; index += 1) {
      const bet = this.state.bets.get(betKey(roundId, index));
      if (!bet) continue;
      total = checkedAdd(total, this.math.payoutFor(bet.amount, bet.matchCount ?? 0));
    }
    return total;
  }

  // ---------- betting ----------

  placeBet(bettor: Address, numbers: readonly number[], amount: bigint): PlacedBet {
    return this.executor.run("rounds.placeBet", () => {
      this.pause.assertNotPaused("placeBet");
      const picks = this.math.validateNumbers(numbers);
      if (amount === 0n) {
        throw new LotteryError(LotteryErrorCode.ZERO_AMOUNT, "Bet amount must be greater than zero");
      }
      if (amount < this.config.minBet) {
        throw new LotteryError(LotteryErrorCode.BET_BELOW_MINIMUM, "Bet is below the minimum", {
          minBet: this.config.minBet.toString(),
        });
      }

      const round = this.currentRound();
      const state = this.stateOf(round);
      if (state !== "OPEN") {
        throw new LotteryError(LotteryErrorCode.ROUND_NOT_OPEN, `Round ${round.id} is ${state}`, { roundId: round.id, state });
      }

      const totalKey = userKey(round.id, bettor);
      const previousTotal = this.state.userRoundTotals.get(totalKey) ?? 0n;
      const nextTotal = checkedAdd(previousTotal, amount);
      if (nextTotal > this.config.maxBetPerUserPerRound) {
        throw new LotteryError(LotteryErrorCode.EXCEEDS_MAX_BET, "Bets in this round would exceed the per-user maximum", {
          maxBetPerUserPerRound: this.config.maxBetPerUserPerRound.toString(),
          alreadyBet: previousTotal.toString(),
        });
      }
      const weight = this.token.stakingWeight(bettor);
      if (weight < this.config.minStakeAmount) {
        throw new LotteryError(LotteryErrorCode.NOT_ELIGIBLE, "Staking weight is below the betting requirement", {
          stakingWeight: weight.toString(),
          minStakeAmount: this.config.minStakeAmount.toString(),
        });
      }

      this.token.settleTransferFrom(this.config.address, bettor, this.config.address, amount);

      const index = round.betCount;
      this.undo.setEntry(this.state.bets, betKey(round.id, index), {
        roundId: round.id,
        index,
        bettor,
        numbers: picks,
        amount,
        placedAt: this.clock.now(),
        matchCount: null,
        claimed: false,
      });
      this.undo.touch(round);
      round.betCount += 1;
      round.totalBetAmount = checkedAdd(round.totalBetAmount, amount);
      round.totalPrizePool = checkedAdd(round.totalPrizePool, this.math.netOfHouseEdge(amount));
      if (previousTotal === 0n) {
        this.undo.push(round.participants, bettor);
      }
      this.undo.setEntry(this.state.userRoundTotals, totalKey, nextTotal);
      this.undo.setEntry(this.state.userBetIndices, totalKey, [...(this.state.userBetIndices.get(totalKey) ?? []), index]);
      this.recordParticipation(bettor, round.id, amount);

      this.executor.emit({ type: "BET_PLACED", roundId: round.id, account: bettor, amount, meta: { index, numbers: picks } });

      if (this.clock.now() >= round.endTime) {
        this.requestDraw(round, bettor);
      }
      return { roundId: round.id, index };
    });
  }

  // ---------- drawing ----------

  /** Anyone may close an ended round; the draw completes when randomness arrives. */
  endRound(caller: Address): RequestId {
    return this.executor.run("rounds.endRound", () => {
      const round = this.currentRound();
      if (round.drawn) {
        throw new LotteryError(LotteryErrorCode.ROUND_ALREADY_DRAWN, `Round ${round.id} is already drawn`, { roundId: round.id });
      }
      if (round.pendingRequestId) {
        throw new LotteryError(LotteryErrorCode.DRAW_ALREADY_REQUESTED, `Round ${round.id} is awaiting randomness`, {
          roundId: round.id,
          requestId: round.pendingRequestId,
        });
      }
      if (this.clock.now() < round.endTime) {
        throw new LotteryError(LotteryErrorCode.ROUND_NOT_ENDED, `Round ${round.id} ends at ${round.endTime}`, {
          roundId: round.id,
          endTime: round.endTime,
        });
      }
      return this.requestDraw(round, caller);
    });
  }

  /** Invoked by the randomness gateway inside its delivery operation. */
  onRandomnessFulfilled(request: RandomnessRequestRecord, values: readonly bigint[]): void {
    this.executor.assertInProgress("RoundEngine.onRandomnessFulfilled");
    const round = this.roundRecord(request.roundId);
    if (round.drawn || round.pendingRequestId !== request.requestId) {
      this.logger.warn("lottery.randomness.stale", {
        roundId: round.id,
        requestId: request.requestId,
        drawSource: round.drawSource,
      });
      this.executor.emit({ type: "STALE_RANDOMNESS_IGNORED", roundId: round.id, meta: { requestId: request.requestId } });
      return;
    }
    this.completeDraw(round, this.math.drawNumbers(values), "ORACLE");
  }

  /** Operator fallback when the oracle never delivers. */
  emergencyDraw(caller: Address, roundId: RoundId, numbers: readonly number[]): void {
    this.executor.run("rounds.emergencyDraw", () => {
      this.access.requireRole(caller, "OPERATOR");
      const round = this.roundRecord(roundId);
      if (round.drawn) {
        throw new LotteryError(LotteryErrorCode.ROUND_ALREADY_DRAWN, `Round ${round.id} is already drawn`, { roundId });
      }
      const allowedAfter = round.endTime + this.config.emergencyDrawDelay;
      if (this.clock.now() <= allowedAfter) {
        throw new LotteryError(LotteryErrorCode.EMERGENCY_DRAW_TOO_EARLY, "Emergency draw window has not opened", {
          roundId,
          allowedAfter,
        });
      }
      const winning = this.math.validateNumbers(numbers);
      this.completeDraw(round, winning, "EMERGENCY");
    });
  }

  // ---------- claiming ----------

  /**
   * Pays every listed bet the caller owns that matched at least two numbers. Bets of other
   * accounts and losing bets are skipped; a claimed bet fails the whole call.
   */
  claimWinnings(caller: Address, roundId: RoundId, betIndices: readonly number[]): bigint {
    return this.executor.run("rounds.claimWinnings", () => {
      this.pause.assertNotPaused("claimWinnings");
      const round = this.roundRecord(roundId);
      if (!round.drawn) {
        throw new LotteryError(LotteryErrorCode.NUMBERS_NOT_DRAWN, `Round ${roundId} has not been drawn`, { roundId });
      }

      let payout = 0n;
      const paidIndices: number[] = [];
      for (const index of betIndices) {
        if (!Number.isInteger(index) || index < 0 || index >= round.betCount) {
          throw new LotteryError(LotteryErrorCode.INVALID_BET_INDEX, `Bet index ${index} is out of range`, { roundId, index });
        }
        const bet = this.state.bets.get(betKey(roundId, index));
        if (!bet || bet.bettor !== caller) continue;
        if (bet.claimed) {
          throw new LotteryError(LotteryErrorCode.ALREADY_CLAIMED, `Bet ${index} was already claimed`, { roundId, index });
        }
        const amount = this.math.payoutFor(bet.amount, bet.matchCount ?? 0);
        if (amount === 0n) continue;
        this.undo.touch(bet);
        bet.claimed = true;
        payout = checkedAdd(payout, amount);
        paidIndices.push(index);
      }

      if (payout === 0n) {
        throw new LotteryError(LotteryErrorCode.NO_WINNINGS, "Nothing to claim", { roundId });
      }
      const roundTotal = this.getRoundPayoutTotal(roundId);
      if (roundTotal > this.state.maxPayoutPerRound) {
        throw new LotteryError(LotteryErrorCode.PAYOUT_EXCEEDS_MAXIMUM, "Round payouts exceed the per-round cap", {
          roundId,
          roundTotal: roundTotal.toString(),
          maxPayoutPerRound: this.state.maxPayoutPerRound.toString(),
        });
      }

      this.undo.touch(round);
      round.totalClaimed = checkedAdd(round.totalClaimed, payout);
      const stats = this.statsFor(caller);
      this.undo.touch(stats);
      stats.totalWinnings = checkedAdd(stats.totalWinnings, payout);
      this.executor.emit({ type: "WINNINGS_CLAIMED", roundId, account: caller, amount: payout, meta: { betIndices: paidIndices } });
      this.token.settleTransfer(this.config.address, caller, payout);
      return payout;
    });
  }

  // ---------- internal (admin / gifts) ----------

  setMaxPayoutPerRound(value: bigint): void {
    this.executor.assertInProgress("RoundEngine.setMaxPayoutPerRound");
    if (value <= 0n) {
      throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, "maxPayoutPerRound must be positive");
    }
    const previous = this.state.maxPayoutPerRound;
    this.undo.record(() => {
      this.state.maxPayoutPerRound = previous;
    });
    this.state.maxPayoutPerRound = value;
  }

  markGiftsDistributed(roundId: RoundId): void {
    this.executor.assertInProgress("RoundEngine.markGiftsDistributed");
    const round = this.roundRecord(roundId);
    if (round.giftsDistributed) {
      throw new LotteryError(LotteryErrorCode.GIFTS_ALREADY_DISTRIBUTED, `Gifts for round ${roundId} were already distributed`, {
        roundId,
      });
    }
    this.undo.touch(round);
    round.giftsDistributed = true;
  }

  recordGift(account: Address, roundId: RoundId): void {
    this.executor.assertInProgress("RoundEngine.recordGift");
    const stats = this.statsFor(account);
    this.undo.touch(stats);
    stats.lastGiftRound = roundId;
  }

  snapshot(): RoundEngineState {
    return structuredClone(this.state);
  }

  restore(state: RoundEngineState): void {
    this.state = structuredClone(state);
  }

  // ---------- internals ----------

  private requestDraw(round: Round, requestedBy: Address): RequestId {
    const request = this.randomness.request(round.id, this.math.numbersPerTicket);
    this.undo.touch(round);
    round.pendingRequestId = request.requestId;
    this.executor.emit({ type: "DRAW_REQUESTED", roundId: round.id, meta: { requestId: request.requestId, requestedBy } });
    return request.requestId;
  }

  private completeDraw(round: Round, winningNumbers: number[], source: DrawSource): void {
    const now = this.clock.now();
    this.undo.touch(round);
    round.winningNumbers = winningNumbers;
    round.drawn = true;
    round.drawnAt = now;
    round.drawSource = source;
    const requestId = round.pendingRequestId;
    round.pendingRequestId = null;

    for (let index = 0; index < round.betCount; index += 1) {
      const bet = this.state.bets.get(betKey(round.id, index));
      if (bet) {
        this.undo.touch(bet);
        bet.matchCount = this.math.countMatches(bet.numbers, winningNumbers);
      }
    }

    this.executor.emit({ type: "NUMBERS_DRAWN", roundId: round.id, meta: { winningNumbers, source, requestId } });
    this.logger.info("lottery.round.drawn", { roundId: round.id, source, betCount: round.betCount });

    if (round.id === this.currentRoundId) {
      const next = newRound(round.id + 1, now, this.config.roundDuration);
      this.undo.push(this.state.rounds, next);
      this.executor.emit({ type: "ROUND_STARTED", roundId: next.id, meta: { startTime: next.startTime, endTime: next.endTime } });
    }
  }

  /** Increments on back-to-back rounds, resets to 1 after a gap, counts a round once. */
  private recordParticipation(account: Address, roundId: RoundId, amount: bigint): void {
    const stats = this.statsFor(account);
    this.undo.touch(stats);
    stats.totalBets = checkedAdd(stats.totalBets, amount);
    stats.betCount += 1;
    if (stats.lastParticipatedRound === roundId) return;

    stats.consecutiveRounds = stats.lastParticipatedRound === roundId - 1 ? stats.consecutiveRounds + 1 : 1;
    stats.lastParticipatedRound = roundId;
    stats.eligibleForGift = stats.consecutiveRounds >= this.config.consecutivePlayRequirement;
  }

  private stateOf(round: Round): RoundState {
    if (round.drawn) return "DRAWN";
    if (round.pendingRequestId) return "AWAITING_DRAW";
    return this.clock.now() < round.endTime ? "OPEN" : "CLOSED";
  }

  private currentRound(): Round {
    return this.roundRecord(this.currentRoundId);
  }

  private roundRecord(roundId: RoundId): Round {
    const round = Number.isInteger(roundId) ? this.state.rounds[roundId - 1] : undefined;
    if (!round) {
      throw new LotteryError(LotteryErrorCode.ROUND_NOT_FOUND, `Round ${roundId} does not exist`, { roundId });
    }
    return round;
  }

  private statsFor(account: Address): PlayerStats {
    const existing = this.state.players.get(account);
    if (existing) return existing;
    const created = emptyStats();
    this.undo.setEntry(this.state.players, account, created);
    return created;
  }
}

function newRound(id: RoundId, startTime: number, duration: number): Round {
  return {
    id,
    startTime,
    endTime: startTime + duration,
    winningNumbers: [],
    drawn: false,
    drawnAt: null,
    drawSource: null,
    totalBetAmount: 0n,
    totalPrizePool: 0n,
    totalClaimed: 0n,
    participants: [],
    betCount: 0,
    giftsDistributed: false,
    pendingRequestId: null,
  };
}

function copyRound(round: Round): Round {
  return { ...round, winningNumbers: [...round.winningNumbers], participants: [...round.participants] };
}

function validateConfig(config: RoundEngineConfig): RoundEngineConfig {
  if (!Number.isInteger(config.roundDuration) || config.roundDuration <= 0) {
    throw new Error("RoundEngine: roundDuration must be a positive integer");
  }
  if (config.minBet <= 0n || config.maxBetPerUserPerRound < config.minBet) {
    throw new Error("RoundEngine: require 0 < minBet <= maxBetPerUserPerRound");
  }
  if (!Number.isInteger(config.consecutivePlayRequirement) || config.consecutivePlayRequirement < 1) {
    throw new Error("RoundEngine: consecutivePlayRequirement must be >= 1");
  }
  if (!Number.isInteger(config.emergencyDrawDelay) || config.emergencyDrawDelay < 0) {
    throw new Error("RoundEngine: emergencyDrawDelay must be a non-negative integer");
  }
  if (config.maxPayoutPerRound <= 0n) {
    throw new Error("RoundEngine: maxPayoutPerRound must be positive");
  }
  return config;
}
