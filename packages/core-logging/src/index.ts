import { Global, Module } from "@nestjs/common";
import pino, { DestinationStream, Logger as PinoLoggerInstance } from "pino";

export interface ILogger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export interface LogContext extends Record<string, unknown> {
  accountId?: string;
  game?: string;
  historyId?: string;
  coinRequestId?: string;
}

export const LOGGER = Symbol("LOGGER");

/** Top-level bigint fields become decimal strings; JSON has no bigint. */
export function toLogFields(meta: Record<string, unknown>): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    fields[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return fields;
}

export function createPinoInstance(destination?: DestinationStream): PinoLoggerInstance {
  const options = { level: process.env.LOG_LEVEL ?? "info", base: { service: "coin-casino" } };
  return destination ? pino(options, destination) : pino(options);
}

export class PinoLogger implements ILogger {
  private readonly logger: PinoLoggerInstance;

  constructor(instance?: PinoLoggerInstance) {
    this.logger = instance ?? createPinoInstance();
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(toLogFields(meta), msg);
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.warn(toLogFields(meta), msg);
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.error(toLogFields(meta), msg);
  }

  child(bindings: LogContext): PinoLogger {
    return new PinoLogger(this.logger.child(toLogFields(bindings)));
  }
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
