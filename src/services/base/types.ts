// src/services/base/types.ts

export type LogMeta = Record<string, unknown>;

/** The subset of a winston logger the services write to. */
export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

export interface ServiceConfig {
    logger: Logger;
}
