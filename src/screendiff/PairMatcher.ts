/**
 * PairMatcher
 *
 * Groups explore and script screenshots that share a key. Keys come from the
 * file name (base name minus extension unless the side supplies its own rule)
 * and are matched exactly. Everything is returned in code-unit key order so
 * reports and divergence points do not depend on locale or listing order.
 */

import * as path from 'path';
import { CaptureSide, CompletePair, DuplicateCapture, PairingResult, ScreenshotPair } from './types.js';

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.gif', '.tif', '.tiff', '.bmp', '.avif'];

export function isImageFile(file: string): boolean {
    return IMAGE_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

export function baseKey(file: string): string {
    const name = path.basename(file);
    return name.slice(0, name.length - path.extname(name).length);
}

export function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export class PairMatcher {
    match(explore: CaptureSide, script: CaptureSide): PairingResult {
        const duplicates: DuplicateCapture[] = [];
        const exploreByKey = this.index(explore, duplicates);
        const scriptByKey = this.index(script, duplicates);

        const keys = [...new Set([...exploreByKey.keys(), ...scriptByKey.keys()])].sort(compareKeys);

        const pairs: CompletePair[] = [];
        const unmatched: ScreenshotPair[] = [];

        for (const key of keys) {
            const explorePath = exploreByKey.get(key);
            const scriptPath = scriptByKey.get(key);

            if (explorePath !== undefined && scriptPath !== undefined) {
                pairs.push(Object.freeze({ key, explore: explorePath, script: scriptPath }));
            } else {
                unmatched.push(Object.freeze({ key, explore: explorePath, script: scriptPath }));
            }
        }

        return { pairs, unmatched, duplicates };
    }

    private index(side: CaptureSide, duplicates: DuplicateCapture[]): Map<string, string> {
        const keyOf = side.keyOf ?? baseKey;
        const byKey = new Map<string, string>();

        // Sorted so the first path wins deterministically when a key repeats
        const files = side.files.filter(isImageFile).sort(compareKeys);

        for (const file of files) {
            const key = keyOf(file);
            if (key === null || key === '') continue;

            const kept = byKey.get(key);
            if (kept !== undefined) {
                duplicates.push({ key, side: side.name, kept, ignored: file });
                continue;
            }
            byKey.set(key, file);
        }

        return byKey;
    }
}

export function matchPairs(explore: CaptureSide, script: CaptureSide): PairingResult {
    return new PairMatcher().match(explore, script);
}
