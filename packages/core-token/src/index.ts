import type { IAccessControl } from "@lotto-stake/core-access";
import type { AtomicExecutor, Snapshotable } from "@lotto-stake/core-atomic";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import {
  type Address,
  type Clock,
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  checkedAdd,
  checkedSub,
  toTokenUnits,
} from "@lotto-stake/core-types";

export interface TokenLedgerConfig {
  minStake: bigint;
  maxStakePerUser: bigint;
  /** Seconds a stake must age before it can be withdrawn or count for benefits. */
  minStakeDuration: number;
  maxSupply: bigint;
  /** Up to this age the weight equals the stake. */
  weightBoostStart: number;
  /** From this age on the weight is twice the stake. */
  weightBoostFull: number;
}

export const DEFAULT_TOKEN_LEDGER_CONFIG: TokenLedgerConfig = {
  minStake: toTokenUnits(10),
  maxStakePerUser: toTokenUnits(1_000_000),
  minStakeDuration: 24 * SECONDS_PER_HOUR,
  maxSupply: toTokenUnits(1_000_000_000),
  weightBoostStart: 7 * SECONDS_PER_DAY,
  weightBoostFull: 30 * SECONDS_PER_DAY,
};

export interface TokenAccountView {
  address: Address;
  balance: bigint;
  availableBalance: bigint;
  stakedAmount: bigint;
  stakingStartedAt: number;
  isAuthorizedBurner: boolean;
  isAuthorizedTransferor: boolean;
}

export interface TokenTransfer {
  from: Address;
  to: Address;
  amount: bigint;
}

/** Contract-style recipient callback, invoked synchronously after the recipient is credited. */
export interface ITokenReceiver {
  onTokensReceived(transfer: TokenTransfer): void;
}

/**
 * Narrow interface for components that move tokens from inside their own guarded operation.
 * Calling these outside an operation fails with NO_ACTIVE_OPERATION.
 */
export interface ITokenSettlementPort {
  settleTransfer(from: Address, to: Address, amount: bigint): void;
  settleTransferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
  stakingWeight(account: Address): bigint;
  balanceOf(account: Address): bigint;
}

interface TokenAccountRecord {
  balance: bigint;
  stakedAmount: bigint;
  stakingStartedAt: number;
}

export interface TokenLedgerState {
  accounts: Map<Address, TokenAccountRecord>;
  /** owner -> spender -> amount */
  allowances: Map<Address, Map<Address, bigint>>;
  burners: Set<Address>;
  transferors: Set<Address>;
  totalSupply: bigint;
  totalStaked: bigint;
  totalBurned: bigint;
  emergencyMode: boolean;
}

export class TokenLedger implements ITokenSettlementPort, Snapshotable<TokenLedgerState> {
  private state: TokenLedgerState = {
    accounts: new Map(),
    allowances: new Map(),
    burners: new Set(),
    transferors: new Set(),
    totalSupply: 0n,
    totalStaked: 0n,
    totalBurned: 0n,
    emergencyMode: false,
  };
  private readonly receivers = new Map<Address, ITokenReceiver>();
  private readonly config: TokenLedgerConfig;

  constructor(
    private readonly executor: AtomicExecutor,
    private readonly access: IAccessControl,
    private readonly clock: Clock,
    config: Partial<TokenLedgerConfig> = {}
  ) {
    this.config = validateConfig({ ...DEFAULT_TOKEN_LEDGER_CONFIG, ...config });
    executor.register("token", this);
  }

  // ---------- views ----------

  get settings(): Readonly<TokenLedgerConfig> {
    return this.config;
  }

  get totalSupply(): bigint {
    return this.state.totalSupply;
  }

  get totalStaked(): bigint {
    return this.state.totalStaked;
  }

  get totalBurned(): bigint {
    return this.state.totalBurned;
  }

  get emergencyMode(): boolean {
    return this.state.emergencyMode;
  }

  balanceOf(account: Address): bigint {
    return this.state.accounts.get(account)?.balance ?? 0n;
  }

  stakedOf(account: Address): bigint {
    return this.state.accounts.get(account)?.stakedAmount ?? 0n;
  }

  availableBalanceOf(account: Address): bigint {
    const record = this.state.accounts.get(account);
    return record ? record.balance - record.stakedAmount : 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.state.allowances.get(owner)?.get(spender) ?? 0n;
  }

  isAuthorizedBurner(account: Address): boolean {
    return this.state.burners.has(account);
  }

  isAuthorizedTransferor(account: Address): boolean {
    return this.state.transferors.has(account);
  }

  getAccount(account: Address): TokenAccountView {
    const record = this.state.accounts.get(account);
    return {
      address: account,
      balance: record?.balance ?? 0n,
      availableBalance: record ? record.balance - record.stakedAmount : 0n,
      stakedAmount: record?.stakedAmount ?? 0n,
      stakingStartedAt: record?.stakingStartedAt ?? 0,
      isAuthorizedBurner: this.isAuthorizedBurner(account),
      isAuthorizedTransferor: this.isAuthorizedTransferor(account),
    };
  }

  /**
   * Time-boosted stake: equal to the stake up to `weightBoostStart`, rising linearly to twice
   * the stake at `weightBoostFull`, flat afterwards.
   */
  stakingWeight(account: Address): bigint {
    const record = this.state.accounts.get(account);
    if (!record || record.stakedAmount === 0n) return 0n;

    const staked = record.stakedAmount;
    const duration = Math.max(0, this.clock.now() - record.stakingStartedAt);
    const { weightBoostStart, weightBoostFull } = this.config;
    if (duration <= weightBoostStart) return staked;
    if (duration >= weightBoostFull) return staked * 2n;
    return staked + (staked * BigInt(duration - weightBoostStart)) / BigInt(weightBoostFull - weightBoostStart);
  }

  isEligibleForBenefits(account: Address): boolean {
    const record = this.state.accounts.get(account);
    if (!record || record.stakedAmount < this.config.minStake) return false;
    return this.state.emergencyMode || this.stakeDurationMet(record);
  }

  // ---------- token operations ----------

  mint(caller: Address, to: Address, amount: bigint): void {
    this.executor.run("token.mint", () => {
      this.access.requireRole(caller, "OWNER");
      requirePositive(amount);
      const nextSupply = checkedAdd(this.state.totalSupply, amount);
      if (nextSupply > this.config.maxSupply) {
        throw new LotteryError(LotteryErrorCode.EXCEEDS_MAX_SUPPLY, "Mint would exceed the maximum supply", {
          maxSupply: this.config.maxSupply.toString(),
        });
      }
      this.state.totalSupply = nextSupply;
      this.credit(to, amount);
      this.executor.emit({ type: "TOKENS_MINTED", account: to, amount });
      this.notifyReceiver({ from: caller, to, amount });
    });
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.executor.run("token.transfer", () => {
      this.move(caller, to, amount, this.isAuthorizedTransferor(caller));
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.executor.run("token.approve", () => {
      if (amount < 0n) {
        throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, "Allowance cannot be negative");
      }
      this.setAllowance(caller, spender, amount);
      this.executor.emit({ type: "APPROVAL", account: caller, amount, meta: { spender } });
    });
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.executor.run("token.transferFrom", () => {
      this.moveAsSpender(caller, from, to, amount);
    });
  }

  burn(caller: Address, amount: bigint): void {
    this.executor.run("token.burn", () => {
      this.burnInternal(caller, amount, this.isAuthorizedTransferor(caller), caller);
    });
  }

  /** Authorized burn: only flagged burners; allowance is consumed unless the burner is also a transferor. */
  burnFrom(caller: Address, account: Address, amount: bigint): void {
    this.executor.run("token.burnFrom", () => {
      if (!this.isAuthorizedBurner(caller)) {
        throw new LotteryError(LotteryErrorCode.UNAUTHORIZED, `${caller} is not an authorized burner`, { account: caller });
      }
      requirePositive(amount);
      const privileged = this.isAuthorizedTransferor(caller);
      if (!privileged) {
        this.spendAllowance(account, caller, amount);
      }
      this.burnInternal(account, amount, privileged, caller);
    });
  }

  setAuthorizedBurner(caller: Address, account: Address, authorized: boolean): void {
    this.executor.run("token.setAuthorizedBurner", () => {
      this.access.requireRole(caller, "OWNER");
      toggle(this.state.burners, account, authorized);
      this.executor.emit({ type: "AUTHORIZATION_CHANGED", account, meta: { kind: "burner", authorized } });
    });
  }

  setAuthorizedTransferor(caller: Address, account: Address, authorized: boolean): void {
    this.executor.run("token.setAuthorizedTransferor", () => {
      this.access.requireRole(caller, "OWNER");
      toggle(this.state.transferors, account, authorized);
      this.executor.emit({ type: "AUTHORIZATION_CHANGED", account, meta: { kind: "transferor", authorized } });
    });
  }

  /** At most one receiver per account; pass null to remove it. */
  setReceiver(account: Address, receiver: ITokenReceiver | null): void {
    if (receiver) {
      this.receivers.set(account, receiver);
    } else {
      this.receivers.delete(account);
    }
  }

  // ---------- staking ----------

  stake(account: Address, amount: bigint): void {
    this.executor.run("token.stake", () => {
      requirePositive(amount);
      if (amount < this.config.minStake) {
        throw new LotteryError(LotteryErrorCode.BELOW_MINIMUM, "Stake is below the minimum", {
          minStake: this.config.minStake.toString(),
        });
      }
      const record = this.recordFor(account);
      if (record.balance - record.stakedAmount < amount) {
        throw new LotteryError(LotteryErrorCode.INSUFFICIENT_BALANCE, "Available balance is lower than the stake");
      }
      const nextStaked = checkedAdd(record.stakedAmount, amount);
      if (nextStaked > this.config.maxStakePerUser) {
        throw new LotteryError(LotteryErrorCode.EXCEEDS_MAXIMUM, "Stake would exceed the per-user maximum", {
          maxStakePerUser: this.config.maxStakePerUser.toString(),
        });
      }
      record.stakedAmount = nextStaked;
      record.stakingStartedAt = this.clock.now();
      this.state.totalStaked = checkedAdd(this.state.totalStaked, amount);
      this.executor.emit({ type: "TOKENS_STAKED", account, amount });
    });
  }

  unstake(account: Address, amount: bigint): void {
    this.executor.run("token.unstake", () => {
      requirePositive(amount);
      const record = this.recordFor(account);
      if (amount > record.stakedAmount) {
        throw new LotteryError(LotteryErrorCode.INSUFFICIENT_STAKED, "Cannot unstake more than is staked");
      }
      if (!this.state.emergencyMode && !this.stakeDurationMet(record)) {
        throw new LotteryError(LotteryErrorCode.DURATION_NOT_MET, "Minimum staking duration has not elapsed", {
          unlocksAt: record.stakingStartedAt + this.config.minStakeDuration,
        });
      }
      this.releaseStake(record, amount);
      this.executor.emit({ type: "TOKENS_UNSTAKED", account, amount });
    });
  }

  emergencyUnstake(account: Address): void {
    this.executor.run("token.emergencyUnstake", () => {
      if (!this.state.emergencyMode) {
        throw new LotteryError(LotteryErrorCode.EMERGENCY_MODE_DISABLED, "Emergency unstake requires emergency mode");
      }
      const record = this.recordFor(account);
      const amount = record.stakedAmount;
      if (amount === 0n) {
        throw new LotteryError(LotteryErrorCode.INSUFFICIENT_STAKED, "Nothing is staked");
      }
      this.releaseStake(record, amount);
      this.executor.emit({ type: "EMERGENCY_UNSTAKED", account, amount });
    });
  }

  // ---------- settlement port ----------

  settleTransfer(from: Address, to: Address, amount: bigint): void {
    this.executor.assertInProgress("TokenLedger.settleTransfer");
    this.move(from, to, amount, this.isAuthorizedTransferor(from));
  }

  settleTransferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    this.executor.assertInProgress("TokenLedger.settleTransferFrom");
    this.moveAsSpender(spender, from, to, amount);
  }

  /** Internal: the admin gateway owns the switch. */
  applyEmergencyMode(enabled: boolean): void {
    this.executor.assertInProgress("TokenLedger.applyEmergencyMode");
    this.state.emergencyMode = enabled;
    this.executor.emit({ type: "EMERGENCY_MODE_CHANGED", meta: { enabled } });
  }

  snapshot(): TokenLedgerState {
    return structuredClone(this.state);
  }

  restore(state: TokenLedgerState): void {
    this.state = structuredClone(state);
  }

  // ---------- internals ----------

  private moveAsSpender(spender: Address, from: Address, to: Address, amount: bigint): void {
    requirePositive(amount);
    const privileged = this.isAuthorizedTransferor(spender);
    if (!privileged) {
      this.spendAllowance(from, spender, amount);
    }
    this.move(from, to, amount, privileged);
  }

  /**
   * Regular moves may not touch staked capital. Privileged moves may; if they leave the
   * balance below the stake, the stake shrinks to the balance.
   */
  private move(from: Address, to: Address, amount: bigint, privileged: boolean): void {
    requirePositive(amount);
    const source = this.recordFor(from);
    if (source.balance < amount) {
      throw new LotteryError(LotteryErrorCode.INSUFFICIENT_BALANCE, `${from} has insufficient balance`, {
        account: from,
        balance: source.balance.toString(),
        amount: amount.toString(),
      });
    }
    if (!privileged && source.balance - amount < source.stakedAmount) {
      throw new LotteryError(LotteryErrorCode.INSUFFICIENT_TRANSFERABLE, "Staked tokens cannot be transferred", {
        account: from,
        available: (source.balance - source.stakedAmount).toString(),
      });
    }

    source.balance = checkedSub(source.balance, amount);
    if (source.balance < source.stakedAmount) {
      this.releaseStake(source, source.stakedAmount - source.balance);
    }
    this.credit(to, amount);
    this.executor.emit({ type: "TOKENS_TRANSFERRED", account: from, amount, meta: { to, privileged } });
    this.notifyReceiver({ from, to, amount });
  }

  private burnInternal(account: Address, amount: bigint, privileged: boolean, burnedBy: Address): void {
    requirePositive(amount);
    const record = this.recordFor(account);
    if (record.balance < amount) {
      throw new LotteryError(LotteryErrorCode.INSUFFICIENT_BALANCE, `${account} has insufficient balance to burn`);
    }
    if (!privileged && record.balance - amount < record.stakedAmount) {
      throw new LotteryError(LotteryErrorCode.INSUFFICIENT_TRANSFERABLE, "Staked tokens cannot be burned");
    }
    record.balance = checkedSub(record.balance, amount);
    if (record.balance < record.stakedAmount) {
      this.releaseStake(record, record.stakedAmount - record.balance);
    }
    this.state.totalSupply = checkedSub(this.state.totalSupply, amount);
    this.state.totalBurned = checkedAdd(this.state.totalBurned, amount);
    this.executor.emit({ type: "TOKENS_BURNED", account, amount, meta: { burnedBy } });
  }

  private spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current < amount) {
      throw new LotteryError(LotteryErrorCode.INSUFFICIENT_ALLOWANCE, `${spender} may not spend ${amount} from ${owner}`, {
        owner,
        spender,
        allowance: current.toString(),
      });
    }
    this.setAllowance(owner, spender, current - amount);
  }

  private setAllowance(owner: Address, spender: Address, amount: bigint): void {
    let bySpender = this.state.allowances.get(owner);
    if (!bySpender) {
      bySpender = new Map();
      this.state.allowances.set(owner, bySpender);
    }
    bySpender.set(spender, amount);
  }

  private releaseStake(record: TokenAccountRecord, amount: bigint): void {
    record.stakedAmount = checkedSub(record.stakedAmount, amount);
    this.state.totalStaked = checkedSub(this.state.totalStaked, amount);
    if (record.stakedAmount === 0n) {
      record.stakingStartedAt = 0;
    }
  }

  private credit(account: Address, amount: bigint): void {
    const record = this.recordFor(account);
    record.balance = checkedAdd(record.balance, amount);
  }

  private notifyReceiver(transfer: TokenTransfer): void {
    const receiver = this.receivers.get(transfer.to);
    if (receiver) {
      this.executor.callExternal(() => receiver.onTokensReceived(transfer));
    }
  }

  private stakeDurationMet(record: TokenAccountRecord): boolean {
    return this.clock.now() >= record.stakingStartedAt + this.config.minStakeDuration;
  }

  private recordFor(account: Address): TokenAccountRecord {
    const existing = this.state.accounts.get(account);
    if (existing) return existing;
    const created: TokenAccountRecord = { balance: 0n, stakedAmount: 0n, stakingStartedAt: 0 };
    this.state.accounts.set(account, created);
    return created;
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

function toggle(set: Set<Address>, account: Address, enabled: boolean): void {
  if (enabled) {
    set.add(account);
  } else {
    set.delete(account);
  }
}

function validateConfig(config: TokenLedgerConfig): TokenLedgerConfig {
  if (config.minStake <= 0n) {
    throw new Error("TokenLedger: minStake must be positive");
  }
  if (config.maxStakePerUser < config.minStake) {
    throw new Error("TokenLedger: maxStakePerUser must be >= minStake");
  }
  if (!Number.isInteger(config.minStakeDuration) || config.minStakeDuration < 0) {
    throw new Error("TokenLedger: minStakeDuration must be a non-negative integer");
  }
  if (config.weightBoostFull <= config.weightBoostStart) {
    throw new Error("TokenLedger: weightBoostFull must be greater than weightBoostStart");
  }
  return config;
}
