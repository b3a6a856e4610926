import type { IDbClient } from "@lotto-stake/core-db";
import type { Address, LotteryEvent, LotteryEventType, RoundId } from "@lotto-stake/core-types";

/** Append-only journal of committed lottery events. */
export interface ILotteryEventRepository {
  append(events: readonly LotteryEvent[]): Promise<void>;
  listForAccount(account: Address, limit?: number, offset?: number): Promise<LotteryEvent[]>;
  listForRound(roundId: RoundId, limit?: number, offset?: number): Promise<LotteryEvent[]>;
  latestSequence(): Promise<number>;
}

export const LOTTERY_EVENT_REPOSITORY = Symbol("LOTTERY_EVENT_REPOSITORY");

// amount holds any uint256
export const LOTTERY_EVENTS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS lottery_events (
    sequence BIGINT PRIMARY KEY,
    type TEXT NOT NULL,
    occurred_at BIGINT NOT NULL,
    round_id INTEGER,
    account TEXT,
    amount NUMERIC(78, 0),
    meta TEXT NOT NULL
  )
`;

export class PgLotteryEventRepository implements ILotteryEventRepository {
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly db: IDbClient) {}

  /** Runs the DDL once per repository; later calls share the first result. */
  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema();
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    try {
      await this.db.query(LOTTERY_EVENTS_SCHEMA);
    } catch (err) {
      this.schemaReady = null;
      throw err;
    }
  }

  async append(events: readonly LotteryEvent[]): Promise<void> {
    if (!events.length) return;
    await this.db.transaction(async (tx) => {
      for (const event of events) {
        await tx.query(
          `INSERT INTO lottery_events (sequence, type, occurred_at, round_id, account, amount, meta)
           VALUES ($1,$2,$3,$4,$5,$6,$7)`,
          [
            event.sequence,
            event.type,
            event.occurredAt,
            event.roundId,
            event.account,
            event.amount === null ? null : event.amount.toString(),
            stringifyMeta(event.meta),
          ]
        );
      }
    });
  }

  async listForAccount(account: Address, limit = 100, offset = 0): Promise<LotteryEvent[]> {
    const rows = await this.db.query<Row>(
      `SELECT * FROM lottery_events WHERE account = $1 ORDER BY sequence DESC LIMIT $2 OFFSET $3`,
      [account, limit, offset]
    );
    return rows.map(mapRow);
  }

  async listForRound(roundId: RoundId, limit = 100, offset = 0): Promise<LotteryEvent[]> {
    const rows = await this.db.query<Row>(
      `SELECT * FROM lottery_events WHERE round_id = $1 ORDER BY sequence DESC LIMIT $2 OFFSET $3`,
      [roundId, limit, offset]
    );
    return rows.map(mapRow);
  }

  async latestSequence(): Promise<number> {
    const rows = await this.db.query<{ latest: string | number | null }>(`SELECT MAX(sequence) AS latest FROM lottery_events`);
    const latest = rows[0]?.latest;
    return latest === null || latest === undefined ? 0 : Number(latest);
  }
}

export class InMemoryLotteryEventRepository implements ILotteryEventRepository {
  private readonly events: LotteryEvent[] = [];

  async append(events: readonly LotteryEvent[]): Promise<void> {
    for (const event of events) {
      if (this.events.some((existing) => existing.sequence === event.sequence)) {
        throw new Error(`Event ${event.sequence} is already journaled`);
      }
    }
    this.events.push(...events.map((event) => ({ ...event, meta: { ...event.meta } })));
  }

  async listForAccount(account: Address, limit = 100, offset = 0): Promise<LotteryEvent[]> {
    return this.page((event) => event.account === account, limit, offset);
  }

  async listForRound(roundId: RoundId, limit = 100, offset = 0): Promise<LotteryEvent[]> {
    return this.page((event) => event.roundId === roundId, limit, offset);
  }

  async latestSequence(): Promise<number> {
    return this.events.reduce((latest, event) => Math.max(latest, event.sequence), 0);
  }

  all(): LotteryEvent[] {
    return [...this.events].sort((a, b) => a.sequence - b.sequence);
  }

  private page(filter: (event: LotteryEvent) => boolean, limit: number, offset: number): LotteryEvent[] {
    return this.events
      .filter(filter)
      .sort((a, b) => b.sequence - a.sequence)
      .slice(offset, offset + limit);
  }
}

interface Row {
  sequence: string | number;
  type: LotteryEventType;
  occurred_at: string | number;
  round_id: number | null;
  account: string | null;
  amount: string | number | null;
  meta: Record<string, unknown> | string | null;
}

function mapRow(row: Row): LotteryEvent {
  return {
    sequence: Number(row.sequence),
    type: row.type,
    occurredAt: Number(row.occurred_at),
    roundId: row.round_id === null ? null : Number(row.round_id),
    account: row.account,
    amount: row.amount === null ? null : BigInt(row.amount),
    meta: parseMeta(row.meta),
  };
}

function stringifyMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value));
}

function parseMeta(meta: Row["meta"]): Record<string, unknown> {
  if (meta === null) return {};
  if (typeof meta !== "string") return meta;
  const parsed: unknown = JSON.parse(meta);
  return isRecord(parsed) ? parsed : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
