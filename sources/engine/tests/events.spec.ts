/**
 * Level 2: Event sinks
 * Tests for routing coordinator events to pino levels
 */

import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { createLogSink, createLogger, createRootLogger, fanOut, type CoordinatorEvent } from '../index';

type LogLine = { level: number; msg: string; [field: string]: unknown };

function memoryLogger() {
    const lines: LogLine[] = [];
    const logger = pino(
        { level: 'debug', base: undefined, timestamp: false },
        {
            write(message: string) {
                lines.push(JSON.parse(message));
            },
        },
    );
    return { logger, lines };
}

describe('Event sinks', () => {
    it('should log confirmations at info with the event fields', () => {
        const { logger, lines } = memoryLogger();
        const sink = createLogSink(logger);

        sink({
            type: 'mutation_confirmed',
            updateId: 'u1',
            entityType: 'notification',
            entityId: 'n1',
            via: 'response',
            overridden: false,
        });

        expect(lines).toEqual([{
            level: 30,
            msg: 'mutation_confirmed',
            updateId: 'u1',
            entityType: 'notification',
            entityId: 'n1',
            via: 'response',
            overridden: false,
        }]);
    });

    it('should log rollbacks and failures at warn', () => {
        const { logger, lines } = memoryLogger();
        const sink = createLogSink(logger);

        sink({
            type: 'mutation_rolled_back',
            updateId: 'u1',
            entityType: 'saved-item',
            entityId: '42',
            category: 'conflict',
            reason: 'server-conflict',
        });
        sink({ type: 'page_failed', collection: 'feed', offset: 0, category: 'network' });

        expect(lines.map((line) => [line.level, line.msg])).toEqual([
            [40, 'mutation_rolled_back'],
            [40, 'page_failed'],
        ]);
    });

    it('should log routine pushes at debug and removals at warn', () => {
        const { logger, lines } = memoryLogger();
        const sink = createLogSink(logger);
        const push = {
            type: 'push_applied',
            entityType: 'listing',
            entityId: '7',
            kind: 'upsert',
            pendingUpdateId: null,
            removed: false,
        } satisfies CoordinatorEvent;

        sink(push);
        sink({ ...push, kind: 'delete', removed: true });
        sink({ ...push, pendingUpdateId: 'u3' });

        expect(lines.map((line) => line.level)).toEqual([20, 40, 40]);
    });

    it('should log bookkeeping at debug', () => {
        const { logger, lines } = memoryLogger();

        createLogSink(logger)({ type: 'late_response_ignored', updateId: 'u9' });

        expect(lines).toEqual([{ level: 20, msg: 'late_response_ignored', updateId: 'u9' }]);
    });

    it('should tag child loggers with their feature', () => {
        const logger = createLogger('notifications');
        expect(logger.bindings()).toMatchObject({ feature: 'notifications' });
    });

    it('should derive feature loggers from the parent it is given', () => {
        const { logger, lines } = memoryLogger();

        createLogSink(createLogger('feed', logger))({ type: 'action_queued', entityType: 'saved-item', entityId: '42', queued: 2 });

        expect(lines).toEqual([{
            level: 30,
            msg: 'action_queued',
            feature: 'feed',
            entityType: 'saved-item',
            entityId: '42',
            queued: 2,
        }]);
    });

    it('should create root loggers at the requested level', () => {
        expect(createRootLogger({ level: 'warn' }).level).toBe('warn');
        expect(createRootLogger({ level: 'debug' }).bindings()).toEqual({ system: 'mutations' });
    });

    it('should deliver each event to every sink', () => {
        const first = vi.fn();
        const second = vi.fn();
        const event: CoordinatorEvent = { type: 'late_response_ignored', updateId: 'u1' };

        fanOut(first, second)(event);

        expect(first).toHaveBeenCalledWith(event);
        expect(second).toHaveBeenCalledWith(event);
    });
});
