import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { logger } from './Logger';

describe('logger', () => {
    beforeEach(() => {
        logger.clear();
        logger.setConsoleOutput(false);
    });

    afterEach(() => {
        logger.setConsoleOutput(true);
        logger.clear();
    });

    it('buffers entries with their level', () => {
        logger.warn('[Circle] radius coerced', 5);
        logger.error(new Error('boom'));

        const entries = logger.getEntries();
        expect(entries).toHaveLength(2);
        expect(entries[0].level).toBe('warn');
        expect(entries[0].message).toBe('[Circle] radius coerced 5');
        expect(entries[1].message).toBe('Error: boom');
    });

    it('serializes objects as JSON', () => {
        logger.info({ kind: 'arc' });
        expect(logger.getEntries()[0].message).toBe('{"kind":"arc"}');
    });

    it('formats the buffer with upper-case level tags', () => {
        logger.log('hello');
        expect(logger.getLogs()).toMatch(/\[LOG\] hello$/);
    });

    it('keeps only the most recent 1000 entries', () => {
        for (let i = 0; i < 1005; i++) logger.log(`entry ${i}`);
        const entries = logger.getEntries();
        expect(entries).toHaveLength(1000);
        expect(entries[0].message).toBe('entry 5');
    });
});
