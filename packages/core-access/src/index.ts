import type { AtomicExecutor, Snapshotable } from "@lotto-stake/core-atomic";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import type { Address } from "@lotto-stake/core-types";

export type Role = "OWNER" | "ADMIN" | "OPERATOR" | "DISTRIBUTOR" | "ORACLE";

export const ALL_ROLES: Role[] = ["OWNER", "ADMIN", "OPERATOR", "DISTRIBUTOR", "ORACLE"];

export interface IAccessControl {
  hasRole(account: Address, role: Role): boolean;
  requireRole(account: Address, role: Role): void;
}

export interface AccessState {
  roles: Map<Address, Set<Role>>;
}

export class AccessControl implements IAccessControl, Snapshotable<AccessState> {
  private state: AccessState = { roles: new Map() };

  constructor(private readonly executor: AtomicExecutor, owner: Address, bootstrap: Partial<Record<Role, Address[]>> = {}) {
    this.addRole(owner, "OWNER");
    for (const role of ALL_ROLES) {
      for (const account of bootstrap[role] ?? []) {
        this.addRole(account, role);
      }
    }
    executor.register("access", this);
  }

  hasRole(account: Address, role: Role): boolean {
    return this.state.roles.get(account)?.has(role) ?? false;
  }

  requireRole(account: Address, role: Role): void {
    if (!this.hasRole(account, role)) {
      throw new LotteryError(LotteryErrorCode.UNAUTHORIZED, `${account} is missing role ${role}`, { account, role });
    }
  }

  rolesOf(account: Address): Role[] {
    return ALL_ROLES.filter((role) => this.hasRole(account, role));
  }

  membersOf(role: Role): Address[] {
    return Array.from(this.state.roles.entries())
      .filter(([, roles]) => roles.has(role))
      .map(([account]) => account);
  }

  grantRole(caller: Address, role: Role, account: Address): void {
    this.executor.run("access.grantRole", () => {
      this.requireRole(caller, "OWNER");
      if (this.hasRole(account, role)) return;
      this.addRole(account, role);
      this.executor.emit({ type: "ROLE_GRANTED", account, meta: { role, grantedBy: caller } });
    });
  }

  revokeRole(caller: Address, role: Role, account: Address): void {
    this.executor.run("access.revokeRole", () => {
      this.requireRole(caller, "OWNER");
      if (role === "OWNER" && account === caller && this.membersOf("OWNER").length === 1) {
        throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, "The last owner cannot revoke itself");
      }
      const roles = this.state.roles.get(account);
      if (!roles?.has(role)) return;
      roles.delete(role);
      this.executor.emit({ type: "ROLE_REVOKED", account, meta: { role, revokedBy: caller } });
    });
  }

  snapshot(): AccessState {
    return structuredClone(this.state);
  }

  restore(state: AccessState): void {
    this.state = structuredClone(state);
  }

  private addRole(account: Address, role: Role): void {
    const roles = this.state.roles.get(account) ?? new Set<Role>();
    roles.add(role);
    this.state.roles.set(account, roles);
  }
}

export interface IPauseGuard {
  readonly paused: boolean;
  assertNotPaused(operation: string): void;
}

export interface PauseState {
  paused: boolean;
}

/** Flag consulted by betting and claiming; toggled only through the admin gateway. */
export class PauseSwitch implements IPauseGuard, Snapshotable<PauseState> {
  private state: PauseState = { paused: false };

  constructor(private readonly executor: AtomicExecutor) {
    executor.register("pause", this);
  }

  get paused(): boolean {
    return this.state.paused;
  }

  assertNotPaused(operation: string): void {
    if (this.state.paused) {
      throw new LotteryError(LotteryErrorCode.PAUSED, `${operation} is unavailable while paused`);
    }
  }

  /** Internal: callers must already hold the guard and have checked the admin role. */
  setPaused(paused: boolean): void {
    this.executor.assertInProgress("PauseSwitch.setPaused");
    if (this.state.paused === paused) {
      throw new LotteryError(paused ? LotteryErrorCode.PAUSED : LotteryErrorCode.NOT_PAUSED, paused ? "Already paused" : "Not paused");
    }
    this.state.paused = paused;
  }

  snapshot(): PauseState {
    return { ...this.state };
  }

  restore(state: PauseState): void {
    this.state = { ...state };
  }
}
