import { describe, it, expect, vi, afterEach } from 'vitest';
import { ErrorHandler, ErrorSeverity } from '../../src/shared/utils/index.js';
import { DecodeError } from '../../src/screendiff/errors.js';

describe('ErrorHandler', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('handle()', () => {
        it('should carry the code of screen diff errors', () => {
            const info = ErrorHandler.handle(
                new DecodeError('a.png', 'bad header'),
                { component: 'Test' },
                ErrorSeverity.SILENT
            );

            expect(info.message).toBe('a.png: bad header');
            expect(info.code).toBe('DECODE');
        });

        it('should warn with a component prefix', () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

            ErrorHandler.handle('plain failure', { component: 'Runner', operation: 'pair' }, ErrorSeverity.WARNING);

            expect(warn).toHaveBeenCalledWith('[Runner.pair] Warning: plain failure');
        });

        it('should re-throw critical errors', () => {
            vi.spyOn(console, 'error').mockImplementation(() => undefined);

            expect(() => ErrorHandler.handle(new Error('boom'), { component: 'Runner' }, ErrorSeverity.CRITICAL))
                .toThrow('boom');
        });
    });

    describe('safeExecuteSync()', () => {
        it('should return the default value on failure', () => {
            const value = ErrorHandler.safeExecuteSync(
                () => { throw new Error('nope'); },
                { component: 'Test' },
                42,
                ErrorSeverity.SILENT
            );

            expect(value).toBe(42);
        });
    });
});
