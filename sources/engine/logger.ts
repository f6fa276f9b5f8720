/**
 * Structured logging on pino
 *
 * Configuration:
 *   MUTATIONS_LOG_LEVEL - minimum level (default "info", "silent" under Vitest)
 *
 * Usage:
 *   const logger = createRootLogger();
 *   const coordinator = new MutationCoordinator({
 *       collection: 'notifications',
 *       sink: createLogSink(createLogger('notifications', logger)),
 *   });
 */

import pino from 'pino';
import type { Logger } from 'pino';

function resolveLevel(): string {
    if (process.env.MUTATIONS_LOG_LEVEL) {
        return process.env.MUTATIONS_LOG_LEVEL;
    }
    const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
    return isTest ? 'silent' : 'info';
}

export type RootLoggerOptions = {
    /** Overrides MUTATIONS_LOG_LEVEL */
    level?: string;
};

/**
 * Application logger; create one and pass it to every feature
 */
export function createRootLogger(options: RootLoggerOptions = {}): Logger {
    return pino({
        level: options.level ?? resolveLevel(),
        base: { system: 'mutations' },
    });
}

/**
 * Child logger tagged with the feature that owns it
 * Without a parent a fresh root logger is created
 */
export function createLogger(feature: string, parent: Logger = createRootLogger()): Logger {
    return parent.child({ feature });
}
