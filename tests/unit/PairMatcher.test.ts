import { describe, it, expect } from 'vitest';
import { PairMatcher, baseKey, isImageFile } from '../../src/screendiff/PairMatcher.js';
import { flatKey } from '../../src/screendiff/RunResolver.js';

describe('PairMatcher', () => {
    const matcher = new PairMatcher();

    describe('baseKey()', () => {
        it('should strip folder and extension', () => {
            expect(baseKey('/runs/a/explore/01-home.png')).toBe('01-home');
            expect(baseKey('02.step.two.webp')).toBe('02.step.two');
        });
    });

    describe('isImageFile()', () => {
        it('should accept image extensions case-insensitively', () => {
            expect(isImageFile('a.PNG')).toBe(true);
            expect(isImageFile('a.jpeg')).toBe(true);
            expect(isImageFile('notes.txt')).toBe(false);
            expect(isImageFile('report.md')).toBe(false);
        });
    });

    describe('match()', () => {
        it('should pair screenshots with the same base name', () => {
            const result = matcher.match(
                { name: 'explore', files: ['e/02-list.png', 'e/01-login.png'] },
                { name: 'script', files: ['s/01-login.png', 's/02-list.png'] }
            );

            expect(result.pairs).toEqual([
                { key: '01-login', explore: 'e/01-login.png', script: 's/01-login.png' },
                { key: '02-list', explore: 'e/02-list.png', script: 's/02-list.png' }
            ]);
            expect(result.unmatched).toHaveLength(0);
            expect(result.duplicates).toHaveLength(0);
        });

        it('should report keys present on one side only as unmatched', () => {
            const result = matcher.match(
                { name: 'explore', files: ['e/01-home.png', 'e/02-list.png'] },
                { name: 'script', files: ['s/02-list.png', 's/03-detail.png'] }
            );

            expect(result.pairs.map(p => p.key)).toEqual(['02-list']);
            expect(result.unmatched).toEqual([
                { key: '01-home', explore: 'e/01-home.png', script: undefined },
                { key: '03-detail', explore: undefined, script: 's/03-detail.png' }
            ]);
        });

        it('should match names exactly', () => {
            const result = matcher.match(
                { name: 'explore', files: ['e/Login.png'] },
                { name: 'script', files: ['s/login.png'] }
            );

            expect(result.pairs).toHaveLength(0);
            expect(result.unmatched.map(p => p.key)).toEqual(['Login', 'login']);
        });

        it('should order keys by code unit, not locale', () => {
            const files = ['b.png', 'B.png', 'a.png', '10.png', '9.png'];
            const result = matcher.match(
                { name: 'explore', files: files.map(f => `e/${f}`) },
                { name: 'script', files: files.map(f => `s/${f}`) }
            );

            expect(result.pairs.map(p => p.key)).toEqual(['10', '9', 'B', 'a', 'b']);
        });

        it('should keep the first path when a key repeats on one side', () => {
            const result = matcher.match(
                { name: 'explore', files: ['e/01-home.webp', 'e/01-home.png'] },
                { name: 'script', files: ['s/01-home.png'] }
            );

            expect(result.pairs).toEqual([{ key: '01-home', explore: 'e/01-home.png', script: 's/01-home.png' }]);
            expect(result.duplicates).toEqual([
                { key: '01-home', side: 'explore', kept: 'e/01-home.png', ignored: 'e/01-home.webp' }
            ]);
        });

        it('should ignore non-image files', () => {
            const result = matcher.match(
                { name: 'explore', files: ['e/01-home.png', 'e/01-home.json'] },
                { name: 'script', files: ['s/01-home.png', 's/notes.txt'] }
            );

            expect(result.pairs).toHaveLength(1);
            expect(result.unmatched).toHaveLength(0);
        });

        it('should use the side key function and drop files it rejects', () => {
            const files = ['shots/explore-01-home.png', 'shots/script-01-home.png', 'shots/other.png'];
            const result = matcher.match(
                { name: 'explore', files, keyOf: flatKey('explore') },
                { name: 'script', files, keyOf: flatKey('script') }
            );

            expect(result.pairs).toEqual([
                { key: '01-home', explore: 'shots/explore-01-home.png', script: 'shots/script-01-home.png' }
            ]);
            expect(result.unmatched).toHaveLength(0);
        });

        it('should return nothing for empty sides', () => {
            const result = matcher.match({ name: 'explore', files: [] }, { name: 'script', files: [] });

            expect(result).toEqual({ pairs: [], unmatched: [], duplicates: [] });
        });
    });
});
