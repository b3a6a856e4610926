import { beforeEach, describe, expect, it } from "vitest";
import { LotteryErrorCode } from "@lotto-stake/core-errors";
import { SECONDS_PER_DAY, SECONDS_PER_HOUR, toTokenUnits } from "@lotto-stake/core-types";
import { ADMIN, type LotteryHarness, OWNER, START_TIME, createLotteryHarness } from "../../../apps/test-utils/lottery-harness";
import { errorCodeOf } from "../../../apps/test-utils/test-helpers";

describe("TokenLedger", () => {
  let h: LotteryHarness;

  beforeEach(() => {
    h = createLotteryHarness();
  });

  const token = () => h.system.token;

  describe("supply", () => {
    it("only lets the owner mint, up to the cap", () => {
      h = createLotteryHarness((config) => {
        config.token.maxSupply = toTokenUnits(1_000);
      });
      expect(errorCodeOf(() => token().mint("alice", "alice", toTokenUnits(1)))).toBe(LotteryErrorCode.UNAUTHORIZED);
      token().mint(OWNER, "alice", toTokenUnits(1_000));
      expect(errorCodeOf(() => token().mint(OWNER, "alice", 1n))).toBe(LotteryErrorCode.EXCEEDS_MAX_SUPPLY);
      expect(token().totalSupply).toBe(toTokenUnits(1_000));
    });

    it("burns from the caller's free balance", () => {
      h.fund("alice", 100);
      token().stake("alice", toTokenUnits(60));
      expect(errorCodeOf(() => token().burn("alice", toTokenUnits(41)))).toBe(LotteryErrorCode.INSUFFICIENT_TRANSFERABLE);
      token().burn("alice", toTokenUnits(40));
      expect(token().balanceOf("alice")).toBe(toTokenUnits(60));
      expect(token().totalSupply).toBe(toTokenUnits(60));
      expect(token().totalBurned).toBe(toTokenUnits(40));
    });
  });

  describe("transfers", () => {
    it("keeps staked tokens in place", () => {
      h.fund("alice", 1_000);
      token().stake("alice", toTokenUnits(100));
      expect(errorCodeOf(() => token().transfer("alice", "bob", toTokenUnits(901)))).toBe(LotteryErrorCode.INSUFFICIENT_TRANSFERABLE);
      token().transfer("alice", "bob", toTokenUnits(900));
      expect(token().getAccount("alice")).toEqual({
        address: "alice",
        balance: toTokenUnits(100),
        availableBalance: 0n,
        stakedAmount: toTokenUnits(100),
        stakingStartedAt: START_TIME,
        isAuthorizedBurner: false,
        isAuthorizedTransferor: false,
      });
      expect(token().balanceOf("bob")).toBe(toTokenUnits(900));
    });

    it("lets an authorized transferor move staked tokens and shrinks the stake", () => {
      h.fund("alice", 100);
      token().stake("alice", toTokenUnits(100));
      token().setAuthorizedTransferor(OWNER, "alice", true);
      token().transfer("alice", "bob", toTokenUnits(30));

      expect(token().balanceOf("alice")).toBe(toTokenUnits(70));
      expect(token().stakedOf("alice")).toBe(toTokenUnits(70));
      expect(token().totalStaked).toBe(toTokenUnits(70));
    });

    it("spends allowances on transferFrom", () => {
      h.fund("alice", 100);
      token().approve("alice", "spender", toTokenUnits(30));
      expect(errorCodeOf(() => token().transferFrom("spender", "alice", "bob", toTokenUnits(31)))).toBe(
        LotteryErrorCode.INSUFFICIENT_ALLOWANCE
      );
      token().transferFrom("spender", "alice", "bob", toTokenUnits(20));
      expect(token().allowance("alice", "spender")).toBe(toTokenUnits(10));
      expect(token().balanceOf("bob")).toBe(toTokenUnits(20));
    });

    it("keeps allowances apart for addresses that concatenate alike", () => {
      h.fund("a", 100);
      h.fund("a->b", 100);
      token().approve("a->b", "c", toTokenUnits(100));

      expect(token().allowance("a", "b->c")).toBe(0n);
      expect(errorCodeOf(() => token().transferFrom("b->c", "a", "mallory", toTokenUnits(100)))).toBe(
        LotteryErrorCode.INSUFFICIENT_ALLOWANCE
      );
      expect(token().balanceOf("a")).toBe(toTokenUnits(100));
      expect(token().allowance("a->b", "c")).toBe(toTokenUnits(100));
    });

    it("rejects zero amounts", () => {
      h.fund("alice", 10);
      expect(errorCodeOf(() => token().transfer("alice", "bob", 0n))).toBe(LotteryErrorCode.ZERO_AMOUNT);
    });

    it("rolls back a transfer whose receiver hook re-enters", () => {
      h.fund("alice", 100);
      token().setReceiver("bob", { onTokensReceived: () => token().transfer("bob", "carol", toTokenUnits(1)) });

      expect(errorCodeOf(() => token().transfer("alice", "bob", toTokenUnits(10)))).toBe(LotteryErrorCode.REENTRANT_CALL);
      expect(token().balanceOf("alice")).toBe(toTokenUnits(100));
      expect(token().balanceOf("bob")).toBe(0n);
    });
  });

  describe("burnFrom", () => {
    beforeEach(() => {
      h.fund("alice", 100);
      token().setAuthorizedBurner(OWNER, "burner", true);
    });

    it("requires the burner flag and an allowance", () => {
      expect(errorCodeOf(() => token().burnFrom("stranger", "alice", toTokenUnits(1)))).toBe(LotteryErrorCode.UNAUTHORIZED);
      expect(errorCodeOf(() => token().burnFrom("burner", "alice", toTokenUnits(1)))).toBe(LotteryErrorCode.INSUFFICIENT_ALLOWANCE);

      token().approve("alice", "burner", toTokenUnits(50));
      token().burnFrom("burner", "alice", toTokenUnits(50));
      expect(token().balanceOf("alice")).toBe(toTokenUnits(50));
      expect(token().allowance("alice", "burner")).toBe(0n);
      expect(token().totalBurned).toBe(toTokenUnits(50));
    });

    it("burns staked tokens without an allowance when the burner is also a transferor", () => {
      token().stake("alice", toTokenUnits(100));
      token().setAuthorizedTransferor(OWNER, "burner", true);
      token().burnFrom("burner", "alice", toTokenUnits(60));

      expect(token().balanceOf("alice")).toBe(toTokenUnits(40));
      expect(token().stakedOf("alice")).toBe(toTokenUnits(40));
      expect(token().totalSupply).toBe(toTokenUnits(40));
    });
  });

  describe("staking", () => {
    it("enforces the minimum, the free balance and the per-user cap", () => {
      h = createLotteryHarness((config) => {
        config.token.maxStakePerUser = toTokenUnits(200);
      });
      h.fund("alice", 300);
      expect(errorCodeOf(() => token().stake("alice", toTokenUnits(9)))).toBe(LotteryErrorCode.BELOW_MINIMUM);
      expect(errorCodeOf(() => token().stake("alice", toTokenUnits(301)))).toBe(LotteryErrorCode.INSUFFICIENT_BALANCE);
      token().stake("alice", toTokenUnits(150));
      expect(errorCodeOf(() => token().stake("alice", toTokenUnits(60)))).toBe(LotteryErrorCode.EXCEEDS_MAXIMUM);
      token().stake("alice", toTokenUnits(50));
      expect(token().stakedOf("alice")).toBe(toTokenUnits(200));
      expect(token().totalStaked).toBe(toTokenUnits(200));
    });

    it("locks a stake for the minimum duration", () => {
      h.fund("alice", 100);
      token().stake("alice", toTokenUnits(100));
      expect(token().isEligibleForBenefits("alice")).toBe(false);
      expect(errorCodeOf(() => token().unstake("alice", toTokenUnits(10)))).toBe(LotteryErrorCode.DURATION_NOT_MET);

      h.clock.advance(24 * SECONDS_PER_HOUR);
      expect(token().isEligibleForBenefits("alice")).toBe(true);
      expect(errorCodeOf(() => token().unstake("alice", toTokenUnits(101)))).toBe(LotteryErrorCode.INSUFFICIENT_STAKED);
      token().unstake("alice", toTokenUnits(100));
      expect(token().getAccount("alice")).toMatchObject({ stakedAmount: 0n, stakingStartedAt: 0, availableBalance: toTokenUnits(100) });
    });

    it("restarts the lock when more is staked", () => {
      h.fund("alice", 100);
      token().stake("alice", toTokenUnits(50));
      h.clock.advance(24 * SECONDS_PER_HOUR);
      token().stake("alice", toTokenUnits(10));
      expect(errorCodeOf(() => token().unstake("alice", toTokenUnits(10)))).toBe(LotteryErrorCode.DURATION_NOT_MET);
    });

    it("boosts the weight of older stakes up to twice the stake", () => {
      h.fund("alice", 100);
      token().stake("alice", toTokenUnits(100));
      expect(token().stakingWeight("alice")).toBe(toTokenUnits(100));

      h.clock.advance(7 * SECONDS_PER_DAY);
      expect(token().stakingWeight("alice")).toBe(toTokenUnits(100));
      h.clock.advance(11.5 * SECONDS_PER_DAY);
      expect(token().stakingWeight("alice")).toBe(toTokenUnits(150));
      h.clock.advance(11.5 * SECONDS_PER_DAY);
      expect(token().stakingWeight("alice")).toBe(toTokenUnits(200));
      h.clock.advance(100 * SECONDS_PER_DAY);
      expect(token().stakingWeight("alice")).toBe(toTokenUnits(200));
      expect(token().stakingWeight("nobody")).toBe(0n);
    });

    it("allows an immediate exit only in emergency mode", () => {
      h.fund("alice", 100);
      token().stake("alice", toTokenUnits(80));
      expect(errorCodeOf(() => token().emergencyUnstake("alice"))).toBe(LotteryErrorCode.EMERGENCY_MODE_DISABLED);

      h.system.admin.setEmergencyMode(ADMIN, true);
      expect(token().isEligibleForBenefits("alice")).toBe(true);
      token().emergencyUnstake("alice");
      expect(token().stakedOf("alice")).toBe(0n);
      expect(token().totalStaked).toBe(0n);
      expect(errorCodeOf(() => token().emergencyUnstake("alice"))).toBe(LotteryErrorCode.INSUFFICIENT_STAKED);
    });
  });

  it("refuses settlement calls outside an operation", () => {
    h.fund("alice", 10);
    expect(errorCodeOf(() => token().settleTransfer("alice", "bob", toTokenUnits(1)))).toBe(LotteryErrorCode.NO_ACTIVE_OPERATION);
  });
});
