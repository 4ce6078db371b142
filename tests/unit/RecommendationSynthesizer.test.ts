import { describe, it, expect, beforeEach } from 'vitest';
import { RecommendationSynthesizer, VerdictEntry } from '../../src/screendiff/RecommendationSynthesizer.js';
import { ConfigurationError } from '../../src/screendiff/errors.js';

describe('RecommendationSynthesizer', () => {
    let synthesizer: RecommendationSynthesizer;

    beforeEach(() => {
        synthesizer = new RecommendationSynthesizer();
    });

    describe('synthesize()', () => {
        it('should report all clear when every pair matches', () => {
            const result = synthesizer.synthesize([
                { key: '01-home', rms: 0, verdict: 'MATCH' },
                { key: '02-list', rms: 12.5, verdict: 'MATCH' }
            ]);

            expect(result.outcome).toBe('ALL_CLEAR');
            expect(result.counts).toEqual({ MATCH: 2, MINOR_DIFF: 0, MAJOR_DIFF: 0 });
            expect(result.total).toBe(2);
            expect(result.guidance).toHaveLength(1);
            expect(result.followUp).toEqual([]);
            expect(result.divergencePoint).toBeUndefined();
        });

        it('should ask for review when only minor diffs exist', () => {
            const result = synthesizer.synthesize([
                { key: '01-home', rms: 3, verdict: 'MATCH' },
                { key: '02-list', rms: 25.1, verdict: 'MINOR_DIFF' },
                { key: '03-detail', rms: 22, verdict: 'MINOR_DIFF' }
            ]);

            expect(result.outcome).toBe('REVIEW_NEEDED');
            expect(result.headline).toBe('Review needed');
            expect(result.followUp).toEqual([
                { key: '02-list', rms: 25.1 },
                { key: '03-detail', rms: 22 }
            ]);
            expect(result.guidance.join(' ')).toContain('cosmetic or functional');
            expect(result.divergencePoint).toBeUndefined();
        });

        it('should let a single major diff outrank several minor diffs', () => {
            const entries: VerdictEntry[] = [
                { key: '01-home', rms: 23, verdict: 'MINOR_DIFF' },
                { key: '02-list', rms: 24, verdict: 'MINOR_DIFF' },
                { key: '03-detail', rms: 80, verdict: 'MAJOR_DIFF' },
                { key: '04-save', rms: 1, verdict: 'MATCH' }
            ];

            const result = synthesizer.synthesize(entries);

            expect(result.outcome).toBe('SCRIPTS_NEED_UPDATE');
            expect(result.counts).toEqual({ MATCH: 1, MINOR_DIFF: 2, MAJOR_DIFF: 1 });
            expect(result.followUp).toEqual([{ key: '03-detail', rms: 80 }]);
        });

        it('should pick scripts need update whatever the verdict order', () => {
            const orders: VerdictEntry[][] = [
                [
                    { key: 'a', rms: 0, verdict: 'MATCH' },
                    { key: 'b', rms: 25, verdict: 'MINOR_DIFF' },
                    { key: 'c', rms: 40, verdict: 'MAJOR_DIFF' }
                ],
                [
                    { key: 'a', rms: 40, verdict: 'MAJOR_DIFF' },
                    { key: 'b', rms: 25, verdict: 'MINOR_DIFF' },
                    { key: 'c', rms: 0, verdict: 'MATCH' }
                ],
                [
                    { key: 'a', rms: 25, verdict: 'MINOR_DIFF' },
                    { key: 'b', rms: 40, verdict: 'MAJOR_DIFF' },
                    { key: 'c', rms: 0, verdict: 'MATCH' }
                ]
            ];

            for (const entries of orders) {
                expect(synthesizer.synthesize(entries).outcome).toBe('SCRIPTS_NEED_UPDATE');
            }
        });

        it('should name the first major diff as divergence point and list every major diff', () => {
            const result = synthesizer.synthesize([
                { key: '01-login', rms: 2, verdict: 'MATCH' },
                { key: '02-menu', rms: 31, verdict: 'MAJOR_DIFF' },
                { key: '03-list', rms: 26, verdict: 'MINOR_DIFF' },
                { key: '04-detail', rms: 90.5, verdict: 'MAJOR_DIFF' }
            ]);

            expect(result.divergencePoint).toBe('02-menu');
            expect(result.followUp).toEqual([
                { key: '02-menu', rms: 31 },
                { key: '04-detail', rms: 90.5 }
            ]);
            expect(result.guidance[0]).toBe('The script run diverges from exploration at "02-menu".');
        });

        it('should refuse to recommend anything for zero pairs', () => {
            expect(() => synthesizer.synthesize([])).toThrow(ConfigurationError);
            expect(() => synthesizer.synthesize([])).toThrow('No explore/script screenshot pairs found.');
        });
    });
});
