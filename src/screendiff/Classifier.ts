import { THRESHOLDS } from './config.js';
import { ConfigurationError } from './errors.js';
import { Thresholds, Verdict } from './types.js';

export const VERDICT_LABELS: Record<Verdict, { label: string; description: string }> = {
    MATCH: { label: 'MATCH', description: 'rendering noise' },
    MINOR_DIFF: { label: 'MINOR DIFF', description: 'possible change, needs review' },
    MAJOR_DIFF: { label: 'MAJOR DIFF', description: 'different content' }
};

export class Classifier {
    readonly thresholds: Thresholds;

    constructor(thresholds: Partial<Thresholds> = {}) {
        const matchThreshold = thresholds.matchThreshold ?? THRESHOLDS.MATCH;
        const reviewThreshold = thresholds.reviewThreshold ?? THRESHOLDS.REVIEW;

        if (!Number.isFinite(matchThreshold) || !Number.isFinite(reviewThreshold)) {
            throw new ConfigurationError('Thresholds must be finite numbers');
        }
        if (matchThreshold < 0) {
            throw new ConfigurationError(`Match threshold must not be negative, got ${matchThreshold}`);
        }
        if (matchThreshold >= reviewThreshold) {
            throw new ConfigurationError(
                `Match threshold (${matchThreshold}) must be below review threshold (${reviewThreshold})`
            );
        }

        this.thresholds = { matchThreshold, reviewThreshold };
    }

    classify(rms: number): Verdict {
        if (rms < this.thresholds.matchThreshold) return 'MATCH';
        if (rms < this.thresholds.reviewThreshold) return 'MINOR_DIFF';
        return 'MAJOR_DIFF';
    }
}
