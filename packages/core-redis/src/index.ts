import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Redis } from "ioredis";
import { randomUUID } from "crypto";

export interface IKeyValueStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  setNx(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  incr(key: string, ttlSeconds?: number): Promise<number>;
  del(key: string): Promise<void>;
}

export interface ILockManager {
  withLock<T>(key: string, ttlMs: number, fn: () => Promise<T>): Promise<T>;
}

export const REDIS_CLIENT = Symbol("REDIS_CLIENT");
export const KEY_VALUE_STORE = Symbol("KEY_VALUE_STORE");
export const LOCK_MANAGER = Symbol("LOCK_MANAGER");

const BIGINT_FLAG = "__ls_bigint__";
const MAP_FLAG = "__ls_map__";
const SET_FLAG = "__ls_set__";

export function serializeForRedis(value: unknown): string {
  const replacer = (input: unknown): unknown => {
    if (typeof input === "bigint") {
      return { [BIGINT_FLAG]: input.toString() };
    }
    if (input instanceof Map) {
      return { [MAP_FLAG]: Array.from(input.entries(), ([key, val]) => [replacer(key), replacer(val)]) };
    }
    if (input instanceof Set) {
      return { [SET_FLAG]: Array.from(input.values(), (item) => replacer(item)) };
    }
    if (Array.isArray(input)) {
      return input.map((item) => replacer(item));
    }
    if (input && typeof input === "object") {
      return Object.entries(input).reduce<Record<string, unknown>>((acc, [key, val]) => {
        acc[key] = replacer(val);
        return acc;
      }, {});
    }
    return input;
  };

  return JSON.stringify(replacer(value));
}

export function deserializeFromRedis<T>(payload: string | null): T | null {
  if (!payload) return null;
  const reviver = (input: unknown): unknown => {
    if (Array.isArray(input)) {
      return input.map((item) => reviver(item));
    }
    if (input && typeof input === "object") {
      const obj = input as Record<string, unknown>;
      const keys = Object.keys(obj);
      if (keys.length === 1) {
        const flagged = obj[BIGINT_FLAG];
        if (typeof flagged === "string") {
          return BigInt(flagged);
        }
        const mapEntries = obj[MAP_FLAG];
        if (Array.isArray(mapEntries)) {
          return new Map(
            mapEntries.map((entry): [unknown, unknown] => {
              if (!Array.isArray(entry) || entry.length !== 2) {
                throw new Error("Malformed map entry in stored payload");
              }
              return [reviver(entry[0]), reviver(entry[1])];
            })
          );
        }
        const setItems = obj[SET_FLAG];
        if (Array.isArray(setItems)) {
          return new Set(setItems.map((item) => reviver(item)));
        }
      }
      return Object.entries(obj).reduce<Record<string, unknown>>((acc, [key, val]) => {
        acc[key] = reviver(val);
        return acc;
      }, {});
    }
    return input;
  };

  return reviver(JSON.parse(payload)) as T;
}

export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    const result = await this.redis.get(key);
    return deserializeFromRedis<T>(result);
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = serializeForRedis(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, "EX", ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async setNx(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const payload = serializeForRedis(value);
    if (ttlSeconds) {
      const response = await this.redis.set(key, payload, "EX", ttlSeconds, "NX");
      return response === "OK";
    }
    const response = await this.redis.set(key, payload, "NX");
    return response === "OK";
  }

  async incr(key: string, ttlSeconds?: number): Promise<number> {
    const value = await this.redis.incr(key);
    if (ttlSeconds) {
      await this.redis.expire(key, ttlSeconds);
    }
    return value;
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

export class RedisLockManager implements ILockManager {
  constructor(private readonly redis: Redis) {}

  async withLock<T>(key: string, ttlMs: number, fn: () => Promise<T>): Promise<T> {
    const token = randomUUID();
    const acquired = await this.redis.set(key, token, "PX", ttlMs, "NX");
    if (!acquired) {
      throw new Error(`Failed to acquire lock for ${key}`);
    }

    try {
      return await fn();
    } finally {
      const script = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;
      await this.redis.eval(script, 1, key, token);
    }
  }
}

/** Process-local store for single-node deployments and tests. Values round-trip through the same codec as Redis. */
export class InMemoryKeyValueStore implements IKeyValueStore {
  private readonly store = new Map<string, string>();

  async get<T>(key: string): Promise<T | null> {
    return deserializeFromRedis<T>(this.store.get(key) ?? null);
  }

  async set<T>(key: string, value: T): Promise<void> {
    this.store.set(key, serializeForRedis(value));
  }

  async setNx(key: string, value: string): Promise<boolean> {
    if (this.store.has(key)) return false;
    this.store.set(key, serializeForRedis(value));
    return true;
  }

  async incr(key: string): Promise<number> {
    const current = deserializeFromRedis<number>(this.store.get(key) ?? null) ?? 0;
    const next = current + 1;
    this.store.set(key, serializeForRedis(next));
    return next;
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }
}

/**
 * Queues callers per key instead of failing fast, so racing operations run one after another.
 * The TTL is ignored: a holder can only be lost with the process itself.
 */
export class InProcessLockManager implements ILockManager {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, _ttlMs: number, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export interface RedisModuleOptions {
  /** "memory" keeps everything in process; defaults to REDIS_DRIVER or "redis". */
  driver?: "redis" | "memory";
  url?: string;
  keyPrefix?: string;
}

export const redisModuleOptionsToken = Symbol("REDIS_MODULE_OPTIONS");

function resolveDriver(config: ConfigService, options?: RedisModuleOptions): "redis" | "memory" {
  const raw = options?.driver ?? config.get<string>("REDIS_DRIVER") ?? "redis";
  return raw === "memory" ? "memory" : "redis";
}

@Global()
@Module({})
export class RedisModule {
  static forRoot(options: RedisModuleOptions = {}) {
    return {
      module: RedisModule,
      imports: [ConfigModule.forRoot({ isGlobal: true })],
      providers: [
        {
          provide: redisModuleOptionsToken,
          useValue: options,
        },
        {
          provide: REDIS_CLIENT,
          inject: [ConfigService, redisModuleOptionsToken],
          useFactory: (config: ConfigService, opts: RedisModuleOptions) => {
            if (resolveDriver(config, opts) === "memory") {
              return null;
            }
            const url = opts.url ?? config.get<string>("REDIS_URL") ?? "redis://localhost:6379";
            const client = new Redis(url, {
              keyPrefix: opts.keyPrefix ?? config.get<string>("REDIS_KEY_PREFIX") ?? "ls:",
            });
            client.on("error", (err) => {
              console.error("Redis connection error", err);
            });
            return client;
          },
        },
        {
          provide: KEY_VALUE_STORE,
          inject: [REDIS_CLIENT],
          useFactory: (redis: Redis | null) => (redis ? new RedisKeyValueStore(redis) : new InMemoryKeyValueStore()),
        },
        {
          provide: LOCK_MANAGER,
          inject: [REDIS_CLIENT],
          useFactory: (redis: Redis | null) => (redis ? new RedisLockManager(redis) : new InProcessLockManager()),
        },
      ],
      exports: [REDIS_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER],
    };
  }
}
