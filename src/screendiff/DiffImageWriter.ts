import * as fs from 'fs';
import * as path from 'path';
import { PNG } from 'pngjs';
import { FileSystemHelper } from '../shared/utils/index.js';
import { toRgba } from './DiffEngine.js';
import { NormalizedImage } from './types.js';

export interface DiffImageWriter {
    /** Persist a diff image under `fileName` and return where it went */
    write(fileName: string, image: NormalizedImage): string;
}

const KEPT_CHAR = /^[\p{L}\p{N}._-]$/u;

/**
 * File-safe form of a key. Letters, digits, `.`, `_` and `-` stay as they
 * are; every other character becomes `%XX` per UTF-8 byte, so two keys never
 * encode to the same name.
 */
export function encodeKey(key: string): string {
    let encoded = '';
    for (const ch of key) {
        if (KEPT_CHAR.test(ch)) {
            encoded += ch;
            continue;
        }
        for (const byte of Buffer.from(ch, 'utf-8')) {
            encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
        }
    }
    return encoded;
}

export function diffFileName(key: string): string {
    return `diff-${encodeKey(key)}.png`;
}

/**
 * Diff file names for one run, in key order. Names that only differ in case
 * would share a file on case-insensitive file systems, so later keys get a
 * `~N` suffix (`~` never appears in an encoded key).
 */
export function assignDiffFileNames(keys: readonly string[]): Map<string, string> {
    const names = new Map<string, string>();
    const taken = new Set<string>();

    for (const key of keys) {
        const encoded = encodeKey(key);
        let name = `diff-${encoded}.png`;
        for (let n = 2; taken.has(name.toLowerCase()); n++) {
            name = `diff-${encoded}~${n}.png`;
        }
        taken.add(name.toLowerCase());
        names.set(key, name);
    }

    return names;
}

export function encodePng(image: NormalizedImage): Buffer {
    const png = new PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(toRgba(image));
    return PNG.sync.write(png);
}

export class PngDiffWriter implements DiffImageWriter {
    constructor(private readonly outputDir: string) {}

    write(fileName: string, image: NormalizedImage): string {
        FileSystemHelper.ensureDir(this.outputDir);
        const target = path.join(this.outputDir, fileName);
        fs.writeFileSync(target, encodePng(image));
        return target;
    }
}
