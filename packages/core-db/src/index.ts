import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Pool } from "pg";

export type SqlParam = string | number | boolean | null | Date;

export interface IDbClient {
  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]>;
  transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T>;
}

export const DB_CLIENT = Symbol("DB_CLIENT");

export class PgDbClient implements IDbClient {
  constructor(private readonly pool: Pool) {}

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const result = await this.pool.query(sql, params);
    return result.rows as T[];
  }

  async transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const txClient: IDbClient = {
        query: async <R = Record<string, unknown>>(sql: string, params: SqlParam[] = []) => {
          const result = await client.query(sql, params);
          return result.rows as R[];
        },
        transaction: async () => {
          throw new Error("Nested transactions are not supported in PgDbClient");
        },
      };
      const result = await fn(txClient);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
}

export interface DbModuleOptions {
  connectionString?: string;
  maxConnections?: number;
}

export const dbModuleOptionsToken = Symbol("DB_MODULE_OPTIONS");

/**
 * Provides DB_CLIENT, or null when no connection string is configured so callers can
 * fall back to in-memory storage.
 */
@Global()
@Module({})
export class DbModule {
  static forRoot(options: DbModuleOptions = {}) {
    return {
      module: DbModule,
      imports: [ConfigModule.forRoot({ isGlobal: true })],
      providers: [
        {
          provide: dbModuleOptionsToken,
          useValue: options,
        },
        {
          provide: DB_CLIENT,
          inject: [ConfigService, dbModuleOptionsToken],
          useFactory: (config: ConfigService, opts: DbModuleOptions) => {
            const connectionString = opts.connectionString ?? config.get<string>("DATABASE_URL");
            if (!connectionString) {
              return null;
            }
            const pool = new Pool({
              connectionString,
              max: opts.maxConnections ?? (Number(config.get("DB_MAX_CONNECTIONS")) || 10),
            });
            return new PgDbClient(pool);
          },
        },
      ],
      exports: [DB_CLIENT],
    };
  }
}
