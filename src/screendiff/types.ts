export type CaptureSideName = 'explore' | 'script';

export type Verdict = 'MATCH' | 'MINOR_DIFF' | 'MAJOR_DIFF';

export type Outcome = 'ALL_CLEAR' | 'REVIEW_NEEDED' | 'SCRIPTS_NEED_UPDATE';

/**
 * One side of a capture run: a folder listing plus the rule that turns a
 * file name into a pair key. A key function returning null drops the file.
 */
export interface CaptureSide {
    name: CaptureSideName;
    files: string[];
    keyOf?: (file: string) => string | null;
}

export type ScreenshotPair = Readonly<{
    key: string;
    explore?: string;
    script?: string;
}>;

export type CompletePair = Readonly<{
    key: string;
    explore: string;
    script: string;
}>;

export interface DuplicateCapture {
    key: string;
    side: CaptureSideName;
    kept: string;
    ignored: string;
}

export interface PairingResult {
    /** Complete pairs in key order */
    pairs: CompletePair[];
    /** Keys present on one side only, in key order */
    unmatched: ScreenshotPair[];
    duplicates: DuplicateCapture[];
}

/** Packed RGB pixels, `width * height * 3` bytes */
export interface NormalizedImage {
    width: number;
    height: number;
    data: Uint8Array;
}

export interface NormalizedPair {
    a: NormalizedImage;
    b: NormalizedImage;
    sizeMismatch: boolean;
}

export interface ImageSize {
    width: number;
    height: number;
}

export interface DiffComputation {
    image: NormalizedImage;
    rms: number;
    channelRms: [number, number, number];
}

export interface DiffResult {
    key: string;
    rms: number;
    channelRms: [number, number, number];
    sizeMismatch: boolean;
    exploreSize: ImageSize;
    scriptSize: ImageSize;
    diffImagePath: string;
    changedPixels: number;
    totalPixels: number;
    explorePath: string;
    scriptPath: string;
}

export interface Thresholds {
    matchThreshold: number;
    reviewThreshold: number;
}

export interface ReportEntry {
    key: string;
    result: DiffResult;
    verdict: Verdict;
}

export interface SkippedPair {
    key: string;
    explore: string;
    script: string;
    reason: string;
}

export interface ScoredPair {
    key: string;
    rms: number;
}

export interface Recommendation {
    outcome: Outcome;
    counts: Record<Verdict, number>;
    total: number;
    headline: string;
    guidance: string[];
    /** First MAJOR_DIFF key in key order */
    divergencePoint?: string;
    followUp: ScoredPair[];
}

export type RunReport = Readonly<{
    runId: string;
    generatedAt: string;
    exploreDir: string;
    scriptDir: string;
    outputDir: string;
    thresholds: Thresholds;
    entries: readonly ReportEntry[];
    skipped: readonly SkippedPair[];
    unmatched: readonly ScreenshotPair[];
    duplicates: readonly DuplicateCapture[];
    recommendation: Recommendation;
}>;
