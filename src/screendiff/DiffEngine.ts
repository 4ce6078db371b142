import pixelmatch from 'pixelmatch';
import { DiffComputation, NormalizedImage } from './types.js';

const CHANNELS = 3;

/**
 * Per-channel absolute difference of two same-sized RGB images, scored as
 * the RMS of the three per-channel RMS values.
 */
export function diff(a: NormalizedImage, b: NormalizedImage): DiffComputation {
    if (a.width !== b.width || a.height !== b.height) {
        throw new Error(`Cannot diff ${a.width}x${a.height} against ${b.width}x${b.height}; normalize first`);
    }

    const pixelCount = a.width * a.height;
    const data = new Uint8Array(pixelCount * CHANNELS);
    const sumSquares = [0, 0, 0];

    for (let i = 0; i < data.length; i++) {
        const delta = Math.abs(a.data[i] - b.data[i]);
        data[i] = delta;
        sumSquares[i % CHANNELS] += delta * delta;
    }

    const channelRms: [number, number, number] = [
        channelRmsOf(sumSquares[0], pixelCount),
        channelRmsOf(sumSquares[1], pixelCount),
        channelRmsOf(sumSquares[2], pixelCount)
    ];

    return {
        image: { width: a.width, height: a.height, data },
        rms: combineRms(channelRms),
        channelRms
    };
}

function channelRmsOf(sumSquares: number, pixelCount: number): number {
    return pixelCount === 0 ? 0 : Math.sqrt(sumSquares / pixelCount);
}

/** sqrt(sum of squares / count) over the channel values, not over raw samples */
export function combineRms(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const sum = values.reduce((acc, v) => acc + v * v, 0);
    return Math.sqrt(sum / values.length);
}

export function toRgba(image: NormalizedImage): Uint8Array {
    const pixelCount = image.width * image.height;
    const rgba = new Uint8Array(pixelCount * 4);
    for (let p = 0; p < pixelCount; p++) {
        rgba[p * 4] = image.data[p * 3];
        rgba[p * 4 + 1] = image.data[p * 3 + 1];
        rgba[p * 4 + 2] = image.data[p * 3 + 2];
        rgba[p * 4 + 3] = 255;
    }
    return rgba;
}

/**
 * Pixels pixelmatch considers perceptually different at the given YIQ
 * threshold. Reported next to the RMS score, never used to classify.
 */
export function countChangedPixels(a: NormalizedImage, b: NormalizedImage, threshold: number): number {
    if (a.width === 0 || a.height === 0) return 0;
    return pixelmatch(toRgba(a), toRgba(b), null, a.width, a.height, { threshold });
}
