import { defaultLotteryConfig } from "@lotto-stake/core-config";
import { LotteryErrorCode, isLotteryError } from "@lotto-stake/core-errors";
import { SeededRandomnessOracle, deriveRandomValues } from "@lotto-stake/core-randomness";
import { type Address, MAX_UINT256, ManualClock, toTokenUnits } from "@lotto-stake/core-types";
import { createLotterySystem } from "@lotto-stake/lottery-core";

export interface LotterySimOptions {
  rounds: number;
  players: number;
  /** Whole tokens per bet. */
  bet: number;
  seed: string;
  /** Whole tokens placed in the gift reserve up front. */
  giftReserve: number;
  houseEdgeBps?: number;
}

export interface LotterySimResult {
  rounds: number;
  players: number;
  totalBet: bigint;
  totalPayout: bigint;
  rtp: number;
  /** Bets per match count. */
  matchCounts: Record<number, number>;
  cappedClaims: number;
  giftDistributions: number;
  giftRecipients: number;
  giftsPaid: bigint;
}

const SIM_OWNER = "sim:owner";
const SIM_ADMIN = "sim:admin";
const SIM_ORACLE = "sim:oracle";
const SIM_DISTRIBUTOR = "sim:distributor";

export function calculateRTP(totalPayout: bigint, totalBet: bigint): number {
  return Number((totalPayout * 10_000n) / (totalBet === 0n ? 1n : totalBet)) / 100;
}

/**
 * Plays whole rounds against a fresh system on a manual clock: every player bets each round,
 * the seeded oracle draws, winners claim and the distributor hands out gifts while the reserve lasts.
 */
export function runLotterySimulation(options: LotterySimOptions): LotterySimResult {
  const config = defaultLotteryConfig();
  config.owner = SIM_OWNER;
  config.roles = { ADMIN: [SIM_ADMIN], OPERATOR: [], DISTRIBUTOR: [SIM_DISTRIBUTOR], ORACLE: [SIM_ORACLE] };
  config.houseEdgeBps = options.houseEdgeBps ?? config.houseEdgeBps;

  const clock = new ManualClock();
  const system = createLotterySystem(config, { clock });
  const oracle = new SeededRandomnessOracle(system.randomness, system.executor, { address: SIM_ORACLE, serverSeed: options.seed });
  const bet = toTokenUnits(options.bet);

  const players: Address[] = Array.from({ length: options.players }, (_, idx) => `sim:player-${idx + 1}`);
  for (const player of players) {
    system.token.mint(SIM_OWNER, player, bet * BigInt(options.rounds) + system.token.settings.minStake);
    system.token.stake(player, system.token.settings.minStake);
    system.token.approve(player, system.rounds.address, MAX_UINT256);
  }
  system.token.mint(SIM_OWNER, system.rounds.address, config.rounds.maxPayoutPerRound);
  if (options.giftReserve > 0) {
    const reserve = toTokenUnits(options.giftReserve);
    system.token.mint(SIM_OWNER, SIM_ADMIN, reserve);
    system.token.approve(SIM_ADMIN, system.gifts.address, reserve);
    system.gifts.fundReserve(SIM_ADMIN, reserve);
  }

  const matchCounts: Record<number, number> = {};
  let totalBet = 0n;
  let totalPayout = 0n;
  let cappedClaims = 0;
  let giftDistributions = 0;
  let giftRecipients = 0;
  let giftsPaid = 0n;

  for (let played = 0; played < options.rounds; played += 1) {
    const roundId = system.rounds.currentRoundId;
    players.forEach((player, idx) => {
      const picks = system.math.drawNumbers(deriveRandomValues(options.seed, `${player}:${roundId}:${idx}`, system.math.numbersPerTicket));
      system.rounds.placeBet(player, picks, bet);
      totalBet += bet;
    });

    clock.set(system.rounds.getCurrentRound().endTime);
    oracle.fulfill(system.rounds.endRound(SIM_ADMIN));

    for (const placed of system.rounds.getRoundBets(roundId)) {
      const matches = placed.matchCount ?? 0;
      matchCounts[matches] = (matchCounts[matches] ?? 0) + 1;
    }
    for (const player of players) {
      if (system.rounds.getClaimableWinnings(roundId, player) === 0n) continue;
      try {
        totalPayout += system.rounds.claimWinnings(player, roundId, system.rounds.getUserBetIndices(roundId, player));
      } catch (err) {
        if (!isLotteryError(err, LotteryErrorCode.PAYOUT_EXCEEDS_MAXIMUM)) throw err;
        cappedClaims += 1;
      }
    }

    if (system.gifts.reserveBalance >= system.gifts.giftCost) {
      const distribution = system.gifts.distributeGifts(SIM_DISTRIBUTOR, roundId);
      giftDistributions += 1;
      giftRecipients += distribution.recipients.length;
      giftsPaid += distribution.totalPaid;
    }
  }

  oracle.detach();
  return {
    rounds: options.rounds,
    players: options.players,
    totalBet,
    totalPayout,
    rtp: calculateRTP(totalPayout, totalBet),
    matchCounts,
    cappedClaims,
    giftDistributions,
    giftRecipients,
    giftsPaid,
  };
}
