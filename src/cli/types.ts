/**
 * CLI Command Types
 *
 * Option shapes as commander hands them to the action handler.
 */

/**
 * Options for the compare command
 */
export interface CompareOptions {
    explore?: string;
    script?: string;
    layout: string;
    output?: string;
    matchThreshold?: string;
    reviewThreshold?: string;
    pixelThreshold?: string;
    concurrency?: string;
    failOn?: string;
    json: boolean;
    quiet: boolean;
}

export type FailOn = 'minor' | 'major';
