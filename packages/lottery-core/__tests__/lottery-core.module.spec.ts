import { afterEach, describe, expect, it } from "vitest";
import { Test, type TestingModule } from "@nestjs/testing";
import { DB_CLIENT } from "@lotto-stake/core-db";
import { LOTTERY_EVENT_REPOSITORY, PgLotteryEventRepository } from "@lotto-stake/core-ledger";
import { LOGGER } from "@lotto-stake/core-logging";
import { METRICS } from "@lotto-stake/core-metrics";
import { type IKeyValueStore, KEY_VALUE_STORE } from "@lotto-stake/core-redis";
import { ManualClock, toTokenUnits } from "@lotto-stake/core-types";
import { LOTTERY_SERVICE, LOTTERY_SYSTEM, LotteryCoreModule, LotteryService, type LotterySystem } from "@lotto-stake/lottery-core";
import { OWNER, START_TIME, testLotteryConfig } from "../../../apps/test-utils/lottery-harness";
import { InMemoryLogger, RecordingMetrics, createDbClient } from "../../../apps/test-utils/test-helpers";

describe("LotteryCoreModule", () => {
  let moduleRef: TestingModule | undefined;

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = undefined;
  });

  async function compile(logger: InMemoryLogger, metrics: RecordingMetrics) {
    moduleRef = await Test.createTestingModule({
      imports: [
        LotteryCoreModule.register({
          config: testLotteryConfig(),
          clock: new ManualClock(START_TIME),
          redis: { driver: "memory" },
        }),
      ],
    })
      .overrideProvider(DB_CLIENT)
      .useValue(createDbClient())
      .overrideProvider(LOGGER)
      .useValue(logger)
      .overrideProvider(METRICS)
      .useValue(metrics)
      .compile();
    return moduleRef;
  }

  it("wires the service around one system and restores on startup", async () => {
    const logger = new InMemoryLogger();
    const metrics = new RecordingMetrics();
    const ref = await compile(logger, metrics);

    const service = ref.get<LotteryService>(LOTTERY_SERVICE);
    const system = ref.get<LotterySystem>(LOTTERY_SYSTEM);
    expect(service).toBeInstanceOf(LotteryService);
    expect(service.system).toBe(system);
    expect(ref.get(LOTTERY_EVENT_REPOSITORY)).toBeInstanceOf(PgLotteryEventRepository);
    expect(logger.messages()).toEqual(["lottery.state.restored"]);

    system.token.mint(OWNER, "alice", toTokenUnits(100));
    await service.stake("alice", toTokenUnits(20));

    expect(metrics.count("lottery_operations_total", { operation: "token.stake", status: "success" })).toBe(1);
    expect((await service.listAccountEvents("alice")).map((event) => event.type)).toEqual(["TOKENS_STAKED", "TOKENS_MINTED"]);
    expect(await ref.get<IKeyValueStore>(KEY_VALUE_STORE).get("lottery:state")).toMatchObject({ version: 1, sequence: 2 });
  });
});
