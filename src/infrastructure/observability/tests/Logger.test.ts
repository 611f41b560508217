import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsoleLogger, NullLogger, isLogLevel, type LogLevel } from '../Logger.js';
import { PetLogError } from '../../../shared/errors/PetLogError.js';

function capture(): { sink: (level: LogLevel, line: string) => void; entries: () => unknown[]; levels: LogLevel[] } {
    const lines: string[] = [];
    const levels: LogLevel[] = [];
    return {
        sink: (level, line) => {
            levels.push(level);
            lines.push(line);
        },
        entries: () => lines.map(line => JSON.parse(line)),
        levels,
    };
}

describe('ConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should write one JSON line with the inherited context', () => {
        const output = capture();
        const logger = new ConsoleLogger({ context: { service: 'petlog' }, minLevel: 'info', sink: output.sink })
            .child({ component: 'Test' });

        logger.info('Pet log loaded', { pets: 2 });

        expect(output.levels).toEqual(['info']);
        expect(output.entries()).toEqual([{
            timestamp: expect.any(String),
            level: 'info',
            message: 'Pet log loaded',
            service: 'petlog',
            component: 'Test',
            pets: 2,
        }]);
    });

    it('should keep the minimum level in child loggers', () => {
        const output = capture();
        const logger = new ConsoleLogger({ minLevel: 'warn', sink: output.sink }).child({ component: 'Test' });

        logger.info('Pet log loaded');
        logger.warn('Pet log snapshot was not written');

        expect(output.levels).toEqual(['warn']);
    });

    it('should leave out undefined context fields', () => {
        const output = capture();
        const logger = new ConsoleLogger({ sink: output.sink });

        logger.debug('Pet log changed', { entityType: 'pet', entityId: undefined });

        expect(output.entries()[0]).not.toHaveProperty('entityId');
    });

    it('should include the error name, message and code', () => {
        const output = capture();
        const logger = new ConsoleLogger({ context: { service: 'petlog' }, sink: output.sink });

        logger.error('Failed to load pet log data', PetLogError.parse('Duplicate id in pets: p-1'));

        expect(output.entries()[0]).toMatchObject({
            level: 'error',
            message: 'Failed to load pet log data',
            error: {
                name: 'PetLogError',
                message: 'Duplicate id in pets: p-1',
                code: 'PARSE_ERROR',
            },
        });
    });

    it('should follow the cause of an error', () => {
        const output = capture();
        const logger = new ConsoleLogger({ sink: output.sink });
        const cause = Object.assign(new Error('permission denied'), { code: 'EACCES' });

        logger.error('Write failed', new Error('Snapshot write failed', { cause }));

        expect(output.entries()[0]).toMatchObject({
            error: {
                message: 'Snapshot write failed',
                cause: { name: 'Error', message: 'permission denied', code: 'EACCES' },
            },
        });
    });

    it('should default to the console method named by the level', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const logger = new ConsoleLogger({ minLevel: 'info' });

        logger.debug('Pet log snapshot written');
        logger.warn('Pet log snapshot was not written');

        expect(debug).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0]?.[0]).toContain('"level":"warn"');
    });
});

describe('NullLogger', () => {
    it('should return itself as child', () => {
        const logger = new NullLogger();
        expect(logger.child({ component: 'Test' })).toBe(logger);
    });
});

describe('isLogLevel', () => {
    it('should accept the four levels only', () => {
        expect(isLogLevel('warn')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(undefined)).toBe(false);
    });
});
