import type { IAccessControl } from "@lotto-stake/core-access";
import type { AtomicExecutor, Snapshotable, UndoLog } from "@lotto-stake/core-atomic";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import type { ILogger } from "@lotto-stake/core-logging";
import { NoopLogger } from "@lotto-stake/core-logging";
import type { IGiftBookkeeping, Round } from "@lotto-stake/core-rounds";
import type { ITokenSettlementPort } from "@lotto-stake/core-token";
import { type Address, type Clock, type RoundId, SECONDS_PER_DAY, checkedAdd, checkedMul, checkedSub, toTokenUnits } from "@lotto-stake/core-types";
import { selectGiftRecipients } from "@lotto-stake/game-math-lotto";

export interface GiftDistributorConfig {
  /** Address holding the reserve tokens. */
  address: Address;
  creator: Address;
  recipientsPerRound: number;
  creatorAmount: bigint;
  userAmount: bigint;
  giftCooldown: number;
  roundDuration: number;
}

export const DEFAULT_GIFT_CONFIG: GiftDistributorConfig = {
  address: "lottery:gift-reserve",
  creator: "lottery:creator",
  recipientsPerRound: 5,
  creatorAmount: toTokenUnits(100),
  userAmount: toTokenUnits(10),
  giftCooldown: 28 * SECONDS_PER_DAY,
  roundDuration: 7 * SECONDS_PER_DAY,
};

export interface GiftConfigView {
  creator: Address;
  recipientsPerRound: number;
  creatorAmount: bigint;
  userAmount: bigint;
  cooldownRounds: number;
}

export interface GiftDistribution {
  roundId: RoundId;
  creator: Address;
  creatorAmount: bigint;
  recipients: Address[];
  userAmount: bigint;
  eligibleCount: number;
  totalPaid: bigint;
  distributedAt: number;
}

export interface GiftReserveState {
  reserveBalance: bigint;
  recipientsPerRound: number;
  creatorAmount: bigint;
  userAmount: bigint;
  distributions: Map<RoundId, GiftDistribution>;
}

export interface GiftDistributorDeps {
  executor: AtomicExecutor;
  access: IAccessControl;
  token: ITokenSettlementPort;
  rounds: IGiftBookkeeping;
  clock: Clock;
  logger?: ILogger;
}

export const MAX_RECIPIENTS_PER_ROUND = 1_000;

export class GiftDistributor implements Snapshotable<GiftReserveState> {
  private state: GiftReserveState;
  private readonly config: GiftDistributorConfig;
  private readonly cooldownRounds: number;
  private readonly logger: ILogger;
  private readonly undo: UndoLog;

  constructor(private readonly deps: GiftDistributorDeps, config: Partial<GiftDistributorConfig> = {}) {
    this.config = validateConfig({ ...DEFAULT_GIFT_CONFIG, ...config });
    this.cooldownRounds = Math.floor(this.config.giftCooldown / this.config.roundDuration);
    this.logger = deps.logger ?? new NoopLogger();
    this.state = {
      reserveBalance: 0n,
      recipientsPerRound: this.config.recipientsPerRound,
      creatorAmount: this.config.creatorAmount,
      userAmount: this.config.userAmount,
      distributions: new Map(),
    };
    this.undo = deps.executor.registerJournaled("gifts");
  }

  get address(): Address {
    return this.config.address;
  }

  get reserveBalance(): bigint {
    return this.state.reserveBalance;
  }

  /** Creator amount plus a full set of recipients. */
  get giftCost(): bigint {
    return checkedAdd(this.state.creatorAmount, checkedMul(BigInt(this.state.recipientsPerRound), this.state.userAmount));
  }

  getGiftConfig(): GiftConfigView {
    return {
      creator: this.config.creator,
      recipientsPerRound: this.state.recipientsPerRound,
      creatorAmount: this.state.creatorAmount,
      userAmount: this.state.userAmount,
      cooldownRounds: this.cooldownRounds,
    };
  }

  getDistribution(roundId: RoundId): GiftDistribution | null {
    const distribution = this.state.distributions.get(roundId);
    return distribution ? { ...distribution, recipients: [...distribution.recipients] } : null;
  }

  /** Whether `account` would be in the candidate pool for a distribution of `roundId`. */
  isEligibleRecipient(account: Address, roundId: RoundId): boolean {
    if (account === this.config.creator) return false;
    const stats = this.deps.rounds.getPlayerStats(account);
    if (!stats.eligibleForGift) return false;
    return stats.lastGiftRound === null || roundId - stats.lastGiftRound > this.cooldownRounds;
  }

  fundReserve(caller: Address, amount: bigint): void {
    this.deps.executor.run("gifts.fundReserve", () => {
      requirePositive(amount);
      this.deps.token.settleTransferFrom(this.config.address, caller, this.config.address, amount);
      this.undo.touch(this.state);
      this.state.reserveBalance = checkedAdd(this.state.reserveBalance, amount);
      this.deps.executor.emit({ type: "RESERVE_FUNDED", account: caller, amount });
    });
  }

  distributeGifts(caller: Address, roundId: RoundId): GiftDistribution {
    return this.deps.executor.run("gifts.distributeGifts", () => {
      this.deps.access.requireRole(caller, "DISTRIBUTOR");
      const round = this.deps.rounds.getRound(roundId);
      if (!round) {
        throw new LotteryError(LotteryErrorCode.ROUND_NOT_FOUND, `Round ${roundId} does not exist`, { roundId });
      }
      if (!round.drawn) {
        throw new LotteryError(LotteryErrorCode.NUMBERS_NOT_DRAWN, `Round ${roundId} has not been drawn`, { roundId });
      }
      if (round.giftsDistributed) {
        throw new LotteryError(LotteryErrorCode.GIFTS_ALREADY_DISTRIBUTED, `Gifts for round ${roundId} were already distributed`, {
          roundId,
        });
      }
      const cost = this.giftCost;
      if (this.state.reserveBalance < cost) {
        throw new LotteryError(LotteryErrorCode.INSUFFICIENT_RESERVE, "Gift reserve cannot cover a full distribution", {
          reserveBalance: this.state.reserveBalance.toString(),
          giftCost: cost.toString(),
        });
      }

      this.deps.rounds.markGiftsDistributed(roundId);
      let totalPaid = this.pay(this.config.creator, this.state.creatorAmount, roundId);

      const eligible = round.participants.filter((account) => this.isEligibleRecipient(account, roundId));
      const recipients =
        eligible.length > this.state.recipientsPerRound
          ? selectGiftRecipients(eligible, this.state.recipientsPerRound, this.selectionSeed(round))
          : eligible;
      for (const recipient of recipients) {
        totalPaid = checkedAdd(totalPaid, this.pay(recipient, this.state.userAmount, roundId));
        this.deps.rounds.recordGift(recipient, roundId);
      }

      const distribution: GiftDistribution = {
        roundId,
        creator: this.config.creator,
        creatorAmount: this.state.creatorAmount,
        recipients: [...recipients],
        userAmount: this.state.userAmount,
        eligibleCount: eligible.length,
        totalPaid,
        distributedAt: this.deps.clock.now(),
      };
      this.undo.setEntry(this.state.distributions, roundId, distribution);
      this.deps.executor.emit({
        type: "GIFTS_DISTRIBUTED",
        roundId,
        amount: totalPaid,
        meta: { recipients: distribution.recipients, eligibleCount: eligible.length },
      });
      this.logger.info("lottery.gifts.distributed", { roundId, recipients: recipients.length, eligible: eligible.length });
      return { ...distribution, recipients: [...distribution.recipients] };
    });
  }

  // ---------- internal (admin) ----------

  setRecipientsPerRound(count: number): void {
    this.deps.executor.assertInProgress("GiftDistributor.setRecipientsPerRound");
    if (!Number.isInteger(count) || count < 1 || count > MAX_RECIPIENTS_PER_ROUND) {
      throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, `recipientsPerRound must be an integer in [1, ${MAX_RECIPIENTS_PER_ROUND}]`);
    }
    this.undo.touch(this.state);
    this.state.recipientsPerRound = count;
  }

  setCreatorAmount(amount: bigint): void {
    this.deps.executor.assertInProgress("GiftDistributor.setCreatorAmount");
    requirePositive(amount);
    this.undo.touch(this.state);
    this.state.creatorAmount = amount;
  }

  setUserAmount(amount: bigint): void {
    this.deps.executor.assertInProgress("GiftDistributor.setUserAmount");
    requirePositive(amount);
    this.undo.touch(this.state);
    this.state.userAmount = amount;
  }

  withdrawReserve(to: Address, amount: bigint): void {
    this.deps.executor.assertInProgress("GiftDistributor.withdrawReserve");
    requirePositive(amount);
    if (amount > this.state.reserveBalance) {
      throw new LotteryError(LotteryErrorCode.INSUFFICIENT_RESERVE, "Withdrawal exceeds the gift reserve", {
        reserveBalance: this.state.reserveBalance.toString(),
      });
    }
    this.undo.touch(this.state);
    this.state.reserveBalance = checkedSub(this.state.reserveBalance, amount);
    this.deps.token.settleTransfer(this.config.address, to, amount);
  }

  snapshot(): GiftReserveState {
    return structuredClone(this.state);
  }

  restore(state: GiftReserveState): void {
    this.state = structuredClone(state);
  }

  private pay(to: Address, amount: bigint, roundId: RoundId): bigint {
    this.undo.touch(this.state);
    this.state.reserveBalance = checkedSub(this.state.reserveBalance, amount);
    this.deps.token.settleTransfer(this.config.address, to, amount);
    this.deps.executor.emit({ type: "GIFT_SENT", roundId, account: to, amount });
    return amount;
  }

  // Public inputs only: anyone can recompute the selection.
  private selectionSeed(round: Round): string {
    return `${round.winningNumbers.join(",")}:${round.id}:${this.deps.clock.now()}`;
  }
}

function requirePositive(amount: bigint): void {
  if (amount === 0n) {
    throw new LotteryError(LotteryErrorCode.ZERO_AMOUNT, "Amount must be greater than zero");
  }
  if (amount < 0n) {
    throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, "Amount cannot be negative");
  }
}

function validateConfig(config: GiftDistributorConfig): GiftDistributorConfig {
  if (!Number.isInteger(config.recipientsPerRound) || config.recipientsPerRound < 1 || config.recipientsPerRound > MAX_RECIPIENTS_PER_ROUND) {
    throw new Error("GiftDistributor: recipientsPerRound out of range");
  }
  if (config.creatorAmount <= 0n || config.userAmount <= 0n) {
    throw new Error("GiftDistributor: gift amounts must be positive");
  }
  if (!Number.isInteger(config.roundDuration) || config.roundDuration <= 0 || config.giftCooldown < 0) {
    throw new Error("GiftDistributor: invalid cooldown or round duration");
  }
  return config;
}
