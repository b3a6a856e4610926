import { describe, expect, it } from "vitest";
import { AtomicExecutor } from "@lotto-stake/core-atomic";
import { LotteryErrorCode } from "@lotto-stake/core-errors";
import { type LotteryEvent, ManualClock } from "@lotto-stake/core-types";
import { errorCodeOf } from "../../../apps/test-utils/test-helpers";
import { AccessControl, PauseSwitch } from "@lotto-stake/core-access";

function setup() {
  const executor = new AtomicExecutor(new ManualClock());
  const access = new AccessControl(executor, "root", { ADMIN: ["ops"], ORACLE: ["vrf"] });
  const pause = new PauseSwitch(executor);
  const events: LotteryEvent[] = [];
  executor.subscribe((event) => events.push(event));
  return { executor, access, pause, events };
}

describe("AccessControl", () => {
  it("bootstraps the owner and the configured roles", () => {
    const { access } = setup();
    expect(access.rolesOf("root")).toEqual(["OWNER"]);
    expect(access.membersOf("ADMIN")).toEqual(["ops"]);
    expect(access.hasRole("vrf", "ORACLE")).toBe(true);
    expect(access.hasRole("vrf", "ADMIN")).toBe(false);
  });

  it("lets only owners grant and revoke", () => {
    const { access, events } = setup();
    expect(errorCodeOf(() => access.grantRole("ops", "OPERATOR", "keeper"))).toBe(LotteryErrorCode.UNAUTHORIZED);

    access.grantRole("root", "OPERATOR", "keeper");
    access.grantRole("root", "OPERATOR", "keeper");
    expect(access.rolesOf("keeper")).toEqual(["OPERATOR"]);

    access.revokeRole("root", "OPERATOR", "keeper");
    access.revokeRole("root", "OPERATOR", "keeper");
    expect(access.hasRole("keeper", "OPERATOR")).toBe(false);
    expect(events.map((event) => [event.type, event.account, event.meta["role"]])).toEqual([
      ["ROLE_GRANTED", "keeper", "OPERATOR"],
      ["ROLE_REVOKED", "keeper", "OPERATOR"],
    ]);
  });

  it("keeps at least one owner", () => {
    const { access } = setup();
    expect(errorCodeOf(() => access.revokeRole("root", "OWNER", "root"))).toBe(LotteryErrorCode.INVALID_PARAMETER);

    access.grantRole("root", "OWNER", "backup");
    access.revokeRole("root", "OWNER", "root");
    expect(access.membersOf("OWNER")).toEqual(["backup"]);
  });
});

describe("PauseSwitch", () => {
  it("only flips inside an operation and rejects no-op switches", () => {
    const { executor, pause } = setup();
    expect(errorCodeOf(() => pause.setPaused(true))).toBe(LotteryErrorCode.NO_ACTIVE_OPERATION);

    executor.run("test.pause", () => pause.setPaused(true));
    expect(pause.paused).toBe(true);
    expect(errorCodeOf(() => pause.assertNotPaused("placeBet"))).toBe(LotteryErrorCode.PAUSED);
    expect(errorCodeOf(() => executor.run("test.pause", () => pause.setPaused(true)))).toBe(LotteryErrorCode.PAUSED);

    executor.run("test.unpause", () => pause.setPaused(false));
    expect(errorCodeOf(() => executor.run("test.unpause", () => pause.setPaused(false)))).toBe(LotteryErrorCode.NOT_PAUSED);
    expect(() => pause.assertNotPaused("placeBet")).not.toThrow();
  });
});
