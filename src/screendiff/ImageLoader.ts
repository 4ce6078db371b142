/**
 * ImageLoader
 *
 * Decodes screenshots with sharp into packed RGB pixels and pads two images
 * onto a shared canvas when their sizes differ.
 */

import sharp from 'sharp';
import { FileSystemHelper } from '../shared/utils/index.js';
import { DecodeError, describeError } from './errors.js';
import { NormalizedImage, NormalizedPair } from './types.js';

/**
 * Collapse any supported channel layout to RGB. Grayscale is replicated to
 * the three channels; alpha is dropped, not composited.
 */
export function toRgb(data: Uint8Array, width: number, height: number, channels: number): Uint8Array {
    const pixelCount = width * height;
    if (data.length < pixelCount * channels) {
        throw new Error(`Expected ${pixelCount * channels} bytes for ${width}x${height}x${channels}, got ${data.length}`);
    }

    const rgb = new Uint8Array(pixelCount * 3);

    switch (channels) {
        case 1:
        case 2:
            for (let p = 0; p < pixelCount; p++) {
                const luminance = data[p * channels];
                rgb[p * 3] = luminance;
                rgb[p * 3 + 1] = luminance;
                rgb[p * 3 + 2] = luminance;
            }
            return rgb;
        case 3:
        case 4:
            for (let p = 0; p < pixelCount; p++) {
                rgb[p * 3] = data[p * channels];
                rgb[p * 3 + 1] = data[p * channels + 1];
                rgb[p * 3 + 2] = data[p * channels + 2];
            }
            return rgb;
        default:
            throw new Error(`Unsupported channel count: ${channels}`);
    }
}

export async function load(filePath: string): Promise<NormalizedImage> {
    if (!FileSystemHelper.isFile(filePath)) {
        throw new DecodeError(filePath, 'file not found');
    }

    try {
        const { data, info } = await sharp(filePath).raw().toBuffer({ resolveWithObject: true });
        return {
            width: info.width,
            height: info.height,
            data: toRgb(data, info.width, info.height, info.channels)
        };
    } catch (error) {
        throw new DecodeError(filePath, describeError(error), { cause: error });
    }
}

function padTo(image: NormalizedImage, width: number, height: number): NormalizedImage {
    if (image.width === width && image.height === height) return image;

    // Zero-filled canvas, source copied row by row at (0,0)
    const data = new Uint8Array(width * height * 3);
    const rowBytes = image.width * 3;
    for (let y = 0; y < image.height; y++) {
        data.set(image.data.subarray(y * rowBytes, (y + 1) * rowBytes), y * width * 3);
    }
    return { width, height, data };
}

/**
 * Bring two images to the same size without scaling. A shorter page
 * therefore shows up as difference along the padded border.
 */
export function normalizePair(a: NormalizedImage, b: NormalizedImage): NormalizedPair {
    if (a.width === b.width && a.height === b.height) {
        return { a, b, sizeMismatch: false };
    }

    const width = Math.max(a.width, b.width);
    const height = Math.max(a.height, b.height);

    return {
        a: padTo(a, width, height),
        b: padTo(b, width, height),
        sizeMismatch: true
    };
}
