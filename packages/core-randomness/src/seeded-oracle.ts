import { createHash, createHmac, randomBytes } from "crypto";
import type { AtomicExecutor } from "@lotto-stake/core-atomic";
import type { Address, LotteryEvent, RequestId } from "@lotto-stake/core-types";
import type { RandomnessGateway } from "./gateway";

export function generateServerSeed(): string {
  return randomBytes(32).toString("hex");
}

export function hashServerSeed(serverSeed: string): string {
  return createHash("sha256").update(serverSeed).digest("hex");
}

export function deriveRandomValues(serverSeed: string, requestId: RequestId, count: number): bigint[] {
  const values: bigint[] = [];
  for (let index = 0; index < count; index += 1) {
    const digest = createHmac("sha256", serverSeed).update(`${requestId}:${index}`).digest("hex");
    values.push(BigInt(`0x${digest}`));
  }
  return values;
}

export function verifyRandomValues(params: { serverSeed: string; requestId: RequestId; values: readonly bigint[] }): boolean {
  const expected = deriveRandomValues(params.serverSeed, params.requestId, params.values.length);
  return expected.every((value, idx) => value === params.values[idx]);
}

export interface SeededRandomnessOracleOptions {
  /** Must hold the ORACLE role. */
  address: Address;
  serverSeed?: string;
}

/**
 * Local stand-in for a verifiable randomness service: commits to a seed hash up front and answers
 * requests only when told to, so non-delivery stays observable.
 */
export class SeededRandomnessOracle {
  readonly address: Address;
  readonly serverSeedHash: string;
  private readonly serverSeed: string;
  private readonly pending: RequestId[] = [];
  private readonly unsubscribe: () => void;

  constructor(private readonly gateway: RandomnessGateway, executor: AtomicExecutor, options: SeededRandomnessOracleOptions) {
    this.address = options.address;
    this.serverSeed = options.serverSeed ?? generateServerSeed();
    this.serverSeedHash = hashServerSeed(this.serverSeed);
    this.unsubscribe = executor.subscribe((event) => this.onEvent(event));
  }

  pendingRequests(): RequestId[] {
    return this.pending.filter((requestId) => this.gateway.isOutstanding(requestId));
  }

  fulfill(requestId: RequestId): bigint[] {
    const request = this.gateway.getRequest(requestId);
    if (!request) {
      throw new Error(`SeededRandomnessOracle: unknown request ${requestId}`);
    }
    const values = deriveRandomValues(this.serverSeed, requestId, request.numValues);
    this.gateway.deliver(this.address, requestId, values);
    this.forget(requestId);
    return values;
  }

  fulfillAll(): RequestId[] {
    const fulfilled: RequestId[] = [];
    for (const requestId of this.pendingRequests()) {
      this.fulfill(requestId);
      fulfilled.push(requestId);
    }
    return fulfilled;
  }

  revealServerSeed(): string {
    return this.serverSeed;
  }

  detach(): void {
    this.unsubscribe();
  }

  private onEvent(event: LotteryEvent): void {
    if (event.type !== "RANDOMNESS_REQUESTED") return;
    const requestId = event.meta["requestId"];
    if (typeof requestId === "string") {
      this.pending.push(requestId);
    }
  }

  private forget(requestId: RequestId): void {
    const idx = this.pending.indexOf(requestId);
    if (idx >= 0) {
      this.pending.splice(idx, 1);
    }
  }
}
