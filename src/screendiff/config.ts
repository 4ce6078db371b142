/**
 * Defaults and environment handling for screenshot diff runs.
 * CLI flags override environment variables, which override the defaults.
 */

import { ConfigurationError } from './errors.js';

// ============================================================
// CLASSIFICATION THRESHOLDS (RMS over 0-255 channel values)
// ============================================================

export const THRESHOLDS = {
    /**
     * Below this the difference is rendering noise (font smoothing and
     * anti-aliasing between rendering engines).
     */
    MATCH: 22.0,

    /** At or above this the screens show different content */
    REVIEW: 30.0,
} as const;

// ============================================================
// RUN DEFAULTS
// ============================================================

export const DEFAULTS = {
    /** pixelmatch YIQ threshold for the changed-pixel count (0-1) */
    PIXEL_THRESHOLD: 0.1,

    /** Pairs compared at once; 1 keeps the run strictly sequential */
    CONCURRENCY: 1,

    /** Folder under the capture root that receives timestamped diff runs */
    DIFFS_DIR: 'diffs',

    REPORT_FILE: 'report.md',

    SUMMARY_FILE: 'summary.json',
} as const;

export const ENV_KEYS = {
    ROOT: 'SCREENDIFF_ROOT',
    MATCH_THRESHOLD: 'SCREENDIFF_MATCH_THRESHOLD',
    REVIEW_THRESHOLD: 'SCREENDIFF_REVIEW_THRESHOLD',
    PIXEL_THRESHOLD: 'SCREENDIFF_PIXEL_THRESHOLD',
    CONCURRENCY: 'SCREENDIFF_CONCURRENCY',
} as const;

export interface ScreenDiffConfig {
    root: string;
    matchThreshold: number;
    reviewThreshold: number;
    pixelThreshold: number;
    concurrency: number;
}

/** Raw string settings, as they arrive from commander */
export interface ConfigOverrides {
    root?: string;
    matchThreshold?: string;
    reviewThreshold?: string;
    pixelThreshold?: string;
    concurrency?: string;
}

type Env = Record<string, string | undefined>;

function parseNumber(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
    }
    return value;
}

export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): ScreenDiffConfig {
    const config: ScreenDiffConfig = {
        root: overrides.root ?? env[ENV_KEYS.ROOT] ?? 'screenshots',
        matchThreshold: parseNumber(
            'match threshold',
            overrides.matchThreshold ?? env[ENV_KEYS.MATCH_THRESHOLD],
            THRESHOLDS.MATCH
        ),
        reviewThreshold: parseNumber(
            'review threshold',
            overrides.reviewThreshold ?? env[ENV_KEYS.REVIEW_THRESHOLD],
            THRESHOLDS.REVIEW
        ),
        pixelThreshold: parseNumber(
            'pixel threshold',
            overrides.pixelThreshold ?? env[ENV_KEYS.PIXEL_THRESHOLD],
            DEFAULTS.PIXEL_THRESHOLD
        ),
        concurrency: parseNumber(
            'concurrency',
            overrides.concurrency ?? env[ENV_KEYS.CONCURRENCY],
            DEFAULTS.CONCURRENCY
        ),
    };

    if (config.pixelThreshold < 0 || config.pixelThreshold > 1) {
        throw new ConfigurationError(`pixel threshold must be between 0 and 1, got ${config.pixelThreshold}`);
    }
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
        throw new ConfigurationError(`concurrency must be a positive integer, got ${config.concurrency}`);
    }

    return config;
}
