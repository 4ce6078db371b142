import { describe, it, expect } from 'vitest';
import { combineRms, countChangedPixels, diff, toRgba } from '../../src/screendiff/DiffEngine.js';
import { NormalizedImage } from '../../src/screendiff/types.js';

function solid(width: number, height: number, value: number): NormalizedImage {
    return { width, height, data: new Uint8Array(width * height * 3).fill(value) };
}

describe('DiffEngine', () => {
    describe('diff()', () => {
        it('should score identical images as exactly 0 with an all-zero diff image', () => {
            const image: NormalizedImage = { width: 2, height: 1, data: Uint8Array.from([10, 20, 30, 40, 50, 60]) };

            const result = diff(image, { ...image, data: Uint8Array.from(image.data) });

            expect(result.rms).toBe(0);
            expect(result.channelRms).toEqual([0, 0, 0]);
            expect(Array.from(result.image.data)).toEqual([0, 0, 0, 0, 0, 0]);
        });

        it('should score black against white as 255', () => {
            const result = diff(solid(2, 2, 0), solid(2, 2, 255));

            expect(result.channelRms).toEqual([255, 255, 255]);
            expect(result.rms).toBe(255);
            expect(Array.from(result.image.data)).toEqual(new Array(12).fill(255));
        });

        it('should combine per-channel RMS values by their RMS', () => {
            const a = solid(2, 1, 0);
            const b: NormalizedImage = { width: 2, height: 1, data: Uint8Array.from([10, 0, 0, 0, 0, 0]) };

            const result = diff(a, b);

            // red: sqrt((100 + 0) / 2), green and blue: 0
            expect(result.channelRms[0]).toBeCloseTo(Math.sqrt(50), 10);
            expect(result.channelRms[1]).toBe(0);
            expect(result.channelRms[2]).toBe(0);
            expect(result.rms).toBeCloseTo(Math.sqrt(50 / 3), 10);
        });

        it('should store absolute differences', () => {
            const a: NormalizedImage = { width: 1, height: 1, data: Uint8Array.from([200, 5, 100]) };
            const b: NormalizedImage = { width: 1, height: 1, data: Uint8Array.from([50, 25, 100]) };

            expect(Array.from(diff(a, b).image.data)).toEqual([150, 20, 0]);
        });

        it('should be symmetric', () => {
            const a: NormalizedImage = { width: 2, height: 1, data: Uint8Array.from([0, 90, 13, 255, 1, 70]) };
            const b: NormalizedImage = { width: 2, height: 1, data: Uint8Array.from([40, 10, 200, 3, 1, 77]) };

            expect(diff(a, b).rms).toBe(diff(b, a).rms);
            expect(Array.from(diff(a, b).image.data)).toEqual(Array.from(diff(b, a).image.data));
        });

        it('should score an empty canvas as 0', () => {
            expect(diff(solid(0, 0, 0), solid(0, 0, 0)).rms).toBe(0);
        });

        it('should refuse images of different sizes', () => {
            expect(() => diff(solid(1, 1, 0), solid(2, 1, 0))).toThrow('normalize first');
        });
    });

    describe('combineRms()', () => {
        it('should take the root of the mean of squares', () => {
            expect(combineRms([3, 4])).toBeCloseTo(Math.sqrt(12.5), 10);
            expect(combineRms([255, 255, 255])).toBe(255);
            expect(combineRms([])).toBe(0);
        });
    });

    describe('toRgba()', () => {
        it('should add an opaque alpha channel', () => {
            const rgba = toRgba({ width: 2, height: 1, data: Uint8Array.from([1, 2, 3, 4, 5, 6]) });

            expect(Array.from(rgba)).toEqual([1, 2, 3, 255, 4, 5, 6, 255]);
        });
    });

    describe('countChangedPixels()', () => {
        it('should count no pixels for identical images', () => {
            expect(countChangedPixels(solid(3, 3, 120), solid(3, 3, 120), 0.1)).toBe(0);
        });

        it('should count every pixel of black against white', () => {
            expect(countChangedPixels(solid(2, 2, 0), solid(2, 2, 255), 0.1)).toBe(4);
        });
    });
});
