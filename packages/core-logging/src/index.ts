import { Global, Module } from "@nestjs/common";
import pino, { type DestinationStream, type Logger as PinoLoggerInstance } from "pino";

export interface ILogger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export const LOGGER = Symbol("LOGGER");

export interface PinoLoggerOptions {
  level?: string;
  name?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

export class PinoLogger implements ILogger {
  private readonly logger: PinoLoggerInstance;

  constructor(options: PinoLoggerOptions = {}) {
    const pinoOptions = {
      name: options.name ?? "lotto-stake",
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      // token amounts are bigint
      formatters: {
        log: (object: Record<string, unknown>) => stringifyBigints(object),
      },
    };
    this.logger = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(meta, msg);
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.warn(meta, msg);
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.error(meta, msg);
  }
}

export class NoopLogger implements ILogger {
  info(): void {}
  warn(): void {}
  error(): void {}
}

function stringifyBigints(object: Record<string, unknown>): Record<string, unknown> {
  return Object.entries(object).reduce<Record<string, unknown>>((acc, [key, value]) => {
    acc[key] = toLogValue(value);
    return acc;
  }, {});
}

function toLogValue(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toLogValue);
  if (value !== null && typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toLogValue(entry)]));
  }
  return value;
}

@Global()
@Module({
  providers: [
    {
      provide: LOGGER,
      useFactory: () => new PinoLogger(),
    },
  ],
  exports: [LOGGER],
})
export class LoggingModule {}
