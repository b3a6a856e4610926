import { createHash } from "crypto";
import type { IAccessControl } from "@lotto-stake/core-access";
import type { AtomicExecutor, Snapshotable, UndoLog } from "@lotto-stake/core-atomic";
import { LotteryError, LotteryErrorCode } from "@lotto-stake/core-errors";
import { type Address, type Clock, type RequestId, type RoundId, isUint256 } from "@lotto-stake/core-types";

export type RandomnessRequestStatus = "REQUESTED" | "FULFILLED";

export interface RandomnessRequestRecord {
  requestId: RequestId;
  roundId: RoundId;
  numValues: number;
  status: RandomnessRequestStatus;
  requestedAt: number;
  fulfilledAt: number | null;
}

export interface IRandomnessConsumer {
  onRandomnessFulfilled(request: RandomnessRequestRecord, values: readonly bigint[]): void;
}

export interface IRandomnessRequester {
  request(roundId: RoundId, numValues: number): RandomnessRequestRecord;
  setConsumer(consumer: IRandomnessConsumer): void;
}

export interface RandomnessGatewayState {
  requests: Map<RequestId, RandomnessRequestRecord>;
  nonce: number;
}

export const MAX_VALUES_PER_REQUEST = 500;

export class RandomnessGateway implements IRandomnessRequester, Snapshotable<RandomnessGatewayState> {
  private state: RandomnessGatewayState = { requests: new Map(), nonce: 0 };
  private consumer: IRandomnessConsumer | null = null;
  private readonly undo: UndoLog;

  constructor(private readonly executor: AtomicExecutor, private readonly access: IAccessControl, private readonly clock: Clock) {
    this.undo = executor.registerJournaled("randomness");
  }

  setConsumer(consumer: IRandomnessConsumer): void {
    this.consumer = consumer;
  }

  /** Internal: issued by the round engine while it holds the guard. */
  request(roundId: RoundId, numValues: number): RandomnessRequestRecord {
    this.executor.assertInProgress("RandomnessGateway.request");
    if (!Number.isInteger(numValues) || numValues <= 0 || numValues > MAX_VALUES_PER_REQUEST) {
      throw new LotteryError(LotteryErrorCode.INVALID_PARAMETER, `numValues must be an integer in [1, ${MAX_VALUES_PER_REQUEST}]`);
    }

    this.undo.touch(this.state);
    this.state.nonce += 1;
    const requestedAt = this.clock.now();
    const requestId = "0x" + createHash("sha256").update(`${this.state.nonce}:${roundId}:${numValues}:${requestedAt}`).digest("hex");
    const record: RandomnessRequestRecord = {
      requestId,
      roundId,
      numValues,
      status: "REQUESTED",
      requestedAt,
      fulfilledAt: null,
    };
    this.undo.setEntry(this.state.requests, requestId, record);
    this.executor.emit({ type: "RANDOMNESS_REQUESTED", roundId, meta: { requestId, numValues } });
    return { ...record };
  }

  /**
   * Inbound oracle callback. Each outstanding request accepts exactly one delivery; the flag is
   * cleared before the consumer runs.
   */
  deliver(caller: Address, requestId: RequestId, values: readonly bigint[]): void {
    this.executor.run("randomness.deliver", () => {
      this.access.requireRole(caller, "ORACLE");
      const record = this.state.requests.get(requestId);
      if (!record || record.status !== "REQUESTED") {
        throw new LotteryError(LotteryErrorCode.INVALID_REQUEST, `Request ${requestId} is not outstanding`, { requestId });
      }
      if (values.length !== record.numValues) {
        throw new LotteryError(LotteryErrorCode.INVALID_RANDOM_VALUES, `Expected ${record.numValues} values, received ${values.length}`, {
          requestId,
        });
      }
      if (!values.every((value) => isUint256(value))) {
        throw new LotteryError(LotteryErrorCode.INVALID_RANDOM_VALUES, "Random values must fit in uint256", { requestId });
      }
      if (!this.consumer) {
        throw new Error("RandomnessGateway: no consumer registered");
      }

      this.undo.touch(record);
      record.status = "FULFILLED";
      record.fulfilledAt = this.clock.now();
      this.executor.emit({ type: "RANDOMNESS_FULFILLED", roundId: record.roundId, meta: { requestId } });
      this.consumer.onRandomnessFulfilled({ ...record }, [...values]);
    });
  }

  getRequest(requestId: RequestId): RandomnessRequestRecord | null {
    const record = this.state.requests.get(requestId);
    return record ? { ...record } : null;
  }

  isOutstanding(requestId: RequestId): boolean {
    return this.state.requests.get(requestId)?.status === "REQUESTED";
  }

  outstandingRequests(): RandomnessRequestRecord[] {
    return Array.from(this.state.requests.values())
      .filter((record) => record.status === "REQUESTED")
      .map((record) => ({ ...record }));
  }

  snapshot(): RandomnessGatewayState {
    return structuredClone(this.state);
  }

  restore(state: RandomnessGatewayState): void {
    this.state = structuredClone(state);
  }
}
