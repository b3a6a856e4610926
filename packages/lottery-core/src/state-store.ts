import type { IKeyValueStore } from "@lotto-stake/core-redis";
import type { LotterySystem, LotterySystemState } from "./system";

export const LOTTERY_STATE_STORE = Symbol("LOTTERY_STATE_STORE");

/** Whole-system snapshot under a single key. */
export class LotteryStateStore {
  constructor(private readonly store: IKeyValueStore, private readonly key = "lottery:state") {}

  async save(system: LotterySystem): Promise<void> {
    await this.store.set(this.key, system.exportState());
  }

  /** Returns false when nothing has been saved yet. */
  async load(system: LotterySystem): Promise<boolean> {
    const state = await this.store.get<LotterySystemState>(this.key);
    if (!state) return false;
    system.importState(state);
    return true;
  }
}
