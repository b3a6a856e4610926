import { beforeEach, describe, expect, it } from "vitest";
import { LotteryErrorCode } from "@lotto-stake/core-errors";
import { deriveRandomValues } from "@lotto-stake/core-randomness";
import { type LotteryEvent, SECONDS_PER_DAY, toTokenUnits } from "@lotto-stake/core-types";
import {
  ADMIN,
  type LotteryHarness,
  OPERATOR,
  START_TIME,
  TEST_SERVER_SEED,
  createLotteryHarness,
} from "../../../apps/test-utils/lottery-harness";
import { errorCodeOf } from "../../../apps/test-utils/test-helpers";

const ROUND_ONE_END = START_TIME + 7 * SECONDS_PER_DAY;
const PICKS = [1, 5, 15, 25, 35];

describe("RoundEngine", () => {
  let h: LotteryHarness;
  let events: LotteryEvent[];

  beforeEach(() => {
    h = createLotteryHarness();
    events = [];
    h.system.executor.subscribe((event) => events.push(event));
  });

  const rounds = () => h.system.rounds;
  const token = () => h.system.token;

  /** Closes the current round and lets the oracle draw it. */
  function drawCurrentRound(): void {
    h.clock.set(rounds().getCurrentRound().endTime);
    rounds().endRound("keeper");
    h.oracle.fulfillAll();
  }

  function emergencyDrawRoundOne(numbers: number[]): void {
    h.clock.set(ROUND_ONE_END + 3_601);
    rounds().emergencyDraw(OPERATOR, 1, numbers);
  }

  it("opens round 1 on construction", () => {
    const round = rounds().getCurrentRound();
    expect(rounds().currentRoundId).toBe(1);
    expect(round.startTime).toBe(START_TIME);
    expect(round.endTime).toBe(ROUND_ONE_END);
    expect(round.winningNumbers).toEqual([]);
    expect(rounds().getRoundState(1)).toBe("OPEN");
  });

  describe("placeBet", () => {
    it("pulls the stake-backed bet into the prize pool and records it", () => {
      h.makeBettor("alice");
      const placed = rounds().placeBet("alice", PICKS, toTokenUnits(10));

      expect(placed).toEqual({ roundId: 1, index: 0 });
      expect(token().balanceOf("alice")).toBe(toTokenUnits(990));
      expect(token().availableBalanceOf("alice")).toBe(toTokenUnits(890));
      expect(token().balanceOf(rounds().address)).toBe(toTokenUnits(10));

      const round = rounds().getCurrentRound();
      expect(round.totalBetAmount).toBe(toTokenUnits(10));
      expect(round.totalPrizePool).toBe(toTokenUnits(95) / 10n);
      expect(round.participants).toEqual(["alice"]);
      expect(round.betCount).toBe(1);
      expect(rounds().getBet(1, 0)).toEqual({
        roundId: 1,
        index: 0,
        bettor: "alice",
        numbers: PICKS,
        amount: toTokenUnits(10),
        placedAt: START_TIME,
        matchCount: null,
        claimed: false,
      });
      expect(events.find((event) => event.type === "BET_PLACED")).toMatchObject({
        roundId: 1,
        account: "alice",
        amount: toTokenUnits(10),
        meta: { index: 0, numbers: PICKS },
      });
    });

    it("lists participants once however many bets they place", () => {
      h.makeBettor("alice");
      h.makeBettor("bob");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      rounds().placeBet("bob", [2, 4, 6, 8, 10], toTokenUnits(5));
      rounds().placeBet("alice", [3, 6, 9, 12, 15], toTokenUnits(7));

      expect(rounds().getCurrentRound().participants).toEqual(["alice", "bob"]);
      expect(rounds().getUserBetIndices(1, "alice")).toEqual([0, 2]);
      expect(rounds().getRoundBets(1).map((bet) => bet.bettor)).toEqual(["alice", "bob", "alice"]);
      expect(rounds().getUserRoundTotal(1, "alice")).toBe(toTokenUnits(17));
      expect(rounds().getPlayerStats("alice")).toMatchObject({ betCount: 2, totalBets: toTokenUnits(17), consecutiveRounds: 1 });
    });

    it("rejects non-canonical numbers without moving tokens", () => {
      h.makeBettor("alice");
      for (const numbers of [[5, 1, 15, 25, 35], [1, 1, 15, 25, 35], [0, 5, 15, 25, 35], [1, 5, 15, 25, 50], [1, 5, 15, 25]]) {
        expect(errorCodeOf(() => rounds().placeBet("alice", numbers, toTokenUnits(10)))).toBe(LotteryErrorCode.INVALID_NUMBERS);
      }
      expect(token().balanceOf("alice")).toBe(toTokenUnits(1_000));
      expect(rounds().getCurrentRound().betCount).toBe(0);
    });

    it("enforces amount limits", () => {
      h.makeBettor("alice", { balance: 2_000 });
      expect(errorCodeOf(() => rounds().placeBet("alice", PICKS, 0n))).toBe(LotteryErrorCode.ZERO_AMOUNT);
      expect(errorCodeOf(() => rounds().placeBet("alice", PICKS, toTokenUnits(1) - 1n))).toBe(LotteryErrorCode.BET_BELOW_MINIMUM);

      rounds().placeBet("alice", PICKS, toTokenUnits(600));
      expect(errorCodeOf(() => rounds().placeBet("alice", PICKS, toTokenUnits(500)))).toBe(LotteryErrorCode.EXCEEDS_MAX_BET);
      rounds().placeBet("alice", PICKS, toTokenUnits(400));
      expect(rounds().getUserRoundTotal(1, "alice")).toBe(toTokenUnits(1_000));
    });

    it("requires enough staking weight and an allowance", () => {
      h.fund("bob", 100);
      token().approve("bob", rounds().address, toTokenUnits(100));
      expect(errorCodeOf(() => rounds().placeBet("bob", PICKS, toTokenUnits(5)))).toBe(LotteryErrorCode.NOT_ELIGIBLE);

      h.fund("carol", 100);
      token().stake("carol", toTokenUnits(10));
      expect(errorCodeOf(() => rounds().placeBet("carol", PICKS, toTokenUnits(5)))).toBe(LotteryErrorCode.INSUFFICIENT_ALLOWANCE);
      expect(token().balanceOf("carol")).toBe(toTokenUnits(100));
    });

    it("is blocked while paused", () => {
      h.makeBettor("alice");
      h.system.admin.pause(ADMIN);
      expect(errorCodeOf(() => rounds().placeBet("alice", PICKS, toTokenUnits(10)))).toBe(LotteryErrorCode.PAUSED);
      h.system.admin.unpause(ADMIN);
      expect(rounds().placeBet("alice", PICKS, toTokenUnits(10))).toEqual({ roundId: 1, index: 0 });
    });

    it("rejects bets once the round has ended", () => {
      h.makeBettor("alice");
      h.clock.set(ROUND_ONE_END);
      expect(rounds().getRoundState(1)).toBe("CLOSED");
      expect(errorCodeOf(() => rounds().placeBet("alice", PICKS, toTokenUnits(10)))).toBe(LotteryErrorCode.ROUND_NOT_OPEN);
    });

    it("requests the draw when the round ends while the bet is recorded", () => {
      h.makeBettor("alice");
      token().setReceiver(rounds().address, { onTokensReceived: () => h.clock.set(ROUND_ONE_END) });
      rounds().placeBet("alice", PICKS, toTokenUnits(10));

      expect(rounds().getRoundState(1)).toBe("AWAITING_DRAW");
      expect(h.oracle.pendingRequests()).toHaveLength(1);
      expect(events.map((event) => event.type)).toContain("DRAW_REQUESTED");
    });
  });

  describe("drawing", () => {
    it("closes an ended round and draws from the delivered randomness", () => {
      h.makeBettor("alice");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));

      expect(errorCodeOf(() => rounds().endRound("keeper"))).toBe(LotteryErrorCode.ROUND_NOT_ENDED);
      h.clock.set(ROUND_ONE_END);
      const requestId = rounds().endRound("keeper");
      expect(rounds().getRoundState(1)).toBe("AWAITING_DRAW");
      expect(rounds().getRound(1)?.pendingRequestId).toBe(requestId);
      expect(errorCodeOf(() => rounds().endRound("keeper"))).toBe(LotteryErrorCode.DRAW_ALREADY_REQUESTED);

      h.clock.advance(30);
      h.oracle.fulfill(requestId);

      const expected = h.system.math.drawNumbers(deriveRandomValues(TEST_SERVER_SEED, requestId, 5));
      const drawn = rounds().getRound(1);
      expect(drawn?.winningNumbers).toEqual(expected);
      expect(drawn?.drawn).toBe(true);
      expect(drawn?.drawSource).toBe("ORACLE");
      expect(drawn?.drawnAt).toBe(ROUND_ONE_END + 30);
      expect(drawn?.pendingRequestId).toBeNull();
      expect(rounds().getBet(1, 0)?.matchCount).toBe(h.system.math.countMatches(PICKS, expected));

      expect(rounds().currentRoundId).toBe(2);
      expect(rounds().getCurrentRound().startTime).toBe(ROUND_ONE_END + 30);
      expect(rounds().getRoundState(2)).toBe("OPEN");
      expect(events.filter((event) => event.type === "ROUND_STARTED").map((event) => event.roundId)).toEqual([2]);
    });

    it("leaves the round awaiting when the oracle never answers", () => {
      h.clock.set(ROUND_ONE_END);
      rounds().endRound("keeper");
      h.clock.advance(SECONDS_PER_DAY);
      expect(rounds().getRoundState(1)).toBe("AWAITING_DRAW");
      expect(rounds().currentRoundId).toBe(1);
    });

    it("restricts emergency draws to operators after the grace period", () => {
      expect(errorCodeOf(() => rounds().emergencyDraw("alice", 1, PICKS))).toBe(LotteryErrorCode.UNAUTHORIZED);
      expect(errorCodeOf(() => rounds().emergencyDraw(OPERATOR, 9, PICKS))).toBe(LotteryErrorCode.ROUND_NOT_FOUND);

      h.clock.set(ROUND_ONE_END + 3_600);
      expect(errorCodeOf(() => rounds().emergencyDraw(OPERATOR, 1, PICKS))).toBe(LotteryErrorCode.EMERGENCY_DRAW_TOO_EARLY);

      h.clock.advance(1);
      expect(errorCodeOf(() => rounds().emergencyDraw(OPERATOR, 1, [35, 25, 15, 5, 1]))).toBe(LotteryErrorCode.INVALID_NUMBERS);
      rounds().emergencyDraw(OPERATOR, 1, PICKS);
      expect(rounds().getRound(1)).toMatchObject({ drawn: true, drawSource: "EMERGENCY", winningNumbers: PICKS });
      expect(errorCodeOf(() => rounds().emergencyDraw(OPERATOR, 1, PICKS))).toBe(LotteryErrorCode.ROUND_ALREADY_DRAWN);
    });

    it("consumes a late oracle delivery for an emergency-drawn round without redrawing", () => {
      h.clock.set(ROUND_ONE_END);
      const requestId = rounds().endRound("keeper");
      emergencyDrawRoundOne(PICKS);
      expect(rounds().getRound(1)?.pendingRequestId).toBeNull();

      h.oracle.fulfill(requestId);

      expect(rounds().getRound(1)?.winningNumbers).toEqual(PICKS);
      expect(rounds().currentRoundId).toBe(2);
      expect(h.system.randomness.getRequest(requestId)?.status).toBe("FULFILLED");
      expect(events.map((event) => event.type)).toContain("STALE_RANDOMNESS_IGNORED");
      expect(h.logger.messages("warn")).toEqual(["lottery.randomness.stale"]);
    });
  });

  describe("claimWinnings", () => {
    it("pays 7600 tokens for five matches on a 10 token bet", () => {
      h.makeBettor("alice");
      h.clock.advance(24 * 60 * 60 + 1);
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      emergencyDrawRoundOne(PICKS);

      expect(rounds().getBet(1, 0)?.matchCount).toBe(5);
      expect(rounds().getClaimableWinnings(1, "alice")).toBe(toTokenUnits(7_600));

      h.fundPool(10_000);
      expect(rounds().claimWinnings("alice", 1, [0])).toBe(toTokenUnits(7_600));
      expect(token().balanceOf("alice")).toBe(toTokenUnits(8_590));
      expect(token().balanceOf(rounds().address)).toBe(toTokenUnits(2_410));
      expect(rounds().getClaimableWinnings(1, "alice")).toBe(0n);
      expect(rounds().getRound(1)?.totalClaimed).toBe(toTokenUnits(7_600));
      expect(rounds().getPlayerStats("alice").totalWinnings).toBe(toTokenUnits(7_600));
    });

    it("only pays bets with at least two matches", () => {
      h.makeBettor("alice");
      h.makeBettor("bob");
      rounds().placeBet("alice", [1, 2, 3, 10, 11], toTokenUnits(10));
      rounds().placeBet("bob", [20, 21, 22, 23, 24], toTokenUnits(10));
      emergencyDrawRoundOne([1, 2, 3, 4, 5]);

      expect(rounds().getClaimableWinnings(1, "alice")).toBe(toTokenUnits(76));
      expect(rounds().getClaimableWinnings(1, "bob")).toBe(0n);
      expect(rounds().getRoundPayoutTotal(1)).toBe(toTokenUnits(76));
      expect(errorCodeOf(() => rounds().claimWinnings("bob", 1, [1]))).toBe(LotteryErrorCode.NO_WINNINGS);
    });

    it("skips bets owned by someone else and rejects a second claim", () => {
      h.makeBettor("alice");
      h.makeBettor("bob");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      rounds().placeBet("bob", PICKS, toTokenUnits(10));
      emergencyDrawRoundOne(PICKS);
      h.fundPool(20_000);

      expect(rounds().claimWinnings("alice", 1, [0, 1])).toBe(toTokenUnits(7_600));
      expect(rounds().getBet(1, 1)?.claimed).toBe(false);
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.ALREADY_CLAIMED);
      expect(errorCodeOf(() => rounds().claimWinnings("bob", 1, [1, 1]))).toBe(LotteryErrorCode.ALREADY_CLAIMED);
      expect(rounds().getBet(1, 1)?.claimed).toBe(false);
      expect(rounds().claimWinnings("bob", 1, [1])).toBe(toTokenUnits(7_600));
    });

    it("validates the round and indices", () => {
      h.makeBettor("alice");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 7, [0]))).toBe(LotteryErrorCode.ROUND_NOT_FOUND);
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.NUMBERS_NOT_DRAWN);

      emergencyDrawRoundOne(PICKS);
      h.fundPool(10_000);
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [1]))).toBe(LotteryErrorCode.INVALID_BET_INDEX);
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [-1]))).toBe(LotteryErrorCode.INVALID_BET_INDEX);

      h.system.admin.pause(ADMIN);
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.PAUSED);
      expect(rounds().getClaimableWinnings(1, "alice")).toBe(toTokenUnits(7_600));
    });

    it("refuses payouts when the round total exceeds the cap", () => {
      h = createLotteryHarness((config) => {
        config.rounds.maxPayoutPerRound = toTokenUnits(1_000);
      });
      h.makeBettor("alice");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      emergencyDrawRoundOne(PICKS);
      h.fundPool(10_000);

      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.PAYOUT_EXCEEDS_MAXIMUM);
      expect(rounds().getBet(1, 0)?.claimed).toBe(false);
      expect(token().balanceOf("alice")).toBe(toTokenUnits(990));
    });

    it("rolls the claim back when the payout hook re-enters", () => {
      h.makeBettor("alice");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      emergencyDrawRoundOne(PICKS);
      h.fundPool(10_000);
      token().setReceiver("alice", { onTokensReceived: () => rounds().claimWinnings("alice", 1, [0]) });

      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.REENTRANT_CALL);
      expect(rounds().getBet(1, 0)?.claimed).toBe(false);
      expect(token().balanceOf("alice")).toBe(toTokenUnits(990));
      expect(rounds().getRound(1)?.totalClaimed).toBe(0n);

      token().setReceiver("alice", null);
      expect(rounds().claimWinnings("alice", 1, [0])).toBe(toTokenUnits(7_600));
    });

    it("refuses internal writes made from a payout hook", () => {
      h.makeBettor("alice");
      rounds().placeBet("alice", PICKS, toTokenUnits(10));
      emergencyDrawRoundOne(PICKS);
      h.fundPool(10_000);
      token().setReceiver("alice", {
        onTokensReceived: () => token().settleTransfer(rounds().address, "alice", toTokenUnits(1_000)),
      });

      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.REENTRANT_CALL);
      expect(token().balanceOf("alice")).toBe(toTokenUnits(990));
      expect(rounds().getPlayerStats("alice").totalWinnings).toBe(0n);

      token().setReceiver("alice", { onTokensReceived: () => rounds().setMaxPayoutPerRound(1n) });
      expect(errorCodeOf(() => rounds().claimWinnings("alice", 1, [0]))).toBe(LotteryErrorCode.REENTRANT_CALL);
      expect(rounds().maxPayoutPerRound).toBe(h.system.config.rounds.maxPayoutPerRound);
    });
  });

  describe("consecutive play", () => {
    it("counts back-to-back rounds and resets after a gap", () => {
      h.makeBettor("alice", { balance: 5_000 });
      for (let idx = 0; idx < 3; idx += 1) {
        rounds().placeBet("alice", PICKS, toTokenUnits(1));
        drawCurrentRound();
      }
      expect(rounds().getPlayerStats("alice")).toMatchObject({ consecutiveRounds: 3, lastParticipatedRound: 3, eligibleForGift: true });

      drawCurrentRound();
      rounds().placeBet("alice", PICKS, toTokenUnits(1));
      expect(rounds().currentRoundId).toBe(5);
      expect(rounds().getPlayerStats("alice")).toMatchObject({ consecutiveRounds: 1, lastParticipatedRound: 5, eligibleForGift: false });
    });
  });
});
