/**
 * RecommendationSynthesizer
 *
 * Turns the ordered per-pair verdicts of a run into one outcome and the
 * guidance that goes at the end of the report. MAJOR_DIFF dominates
 * MINOR_DIFF no matter how many of each there are.
 */

import { ConfigurationError } from './errors.js';
import { Outcome, Recommendation, ScoredPair, Verdict } from './types.js';

export interface VerdictEntry {
    key: string;
    rms: number;
    verdict: Verdict;
}

export const OUTCOME_HEADLINES: Record<Outcome, string> = {
    SCRIPTS_NEED_UPDATE: 'Scripts need update',
    REVIEW_NEEDED: 'Review needed',
    ALL_CLEAR: 'All clear'
};

export class RecommendationSynthesizer {
    synthesize(entries: readonly VerdictEntry[]): Recommendation {
        if (entries.length === 0) {
            throw new ConfigurationError('No explore/script screenshot pairs found.');
        }

        const counts: Record<Verdict, number> = { MATCH: 0, MINOR_DIFF: 0, MAJOR_DIFF: 0 };
        for (const entry of entries) {
            counts[entry.verdict]++;
        }

        const majors = this.scored(entries, 'MAJOR_DIFF');
        if (majors.length > 0) {
            const divergencePoint = majors[0].key;
            return {
                outcome: 'SCRIPTS_NEED_UPDATE',
                counts,
                total: entries.length,
                headline: OUTCOME_HEADLINES.SCRIPTS_NEED_UPDATE,
                guidance: [
                    `The script run diverges from exploration at "${divergencePoint}".`,
                    'Update the scripted steps from that point on, then capture again.',
                    `${majors.length} pair(s) show different content:`
                ],
                divergencePoint,
                followUp: majors
            };
        }

        const minors = this.scored(entries, 'MINOR_DIFF');
        if (minors.length > 0) {
            return {
                outcome: 'REVIEW_NEEDED',
                counts,
                total: entries.length,
                headline: OUTCOME_HEADLINES.REVIEW_NEEDED,
                guidance: [
                    'No pair shows different content, but some differ beyond rendering noise.',
                    'Check each of them by eye and decide whether the change is cosmetic or functional:'
                ],
                followUp: minors
            };
        }

        return {
            outcome: 'ALL_CLEAR',
            counts,
            total: entries.length,
            headline: OUTCOME_HEADLINES.ALL_CLEAR,
            guidance: ['Every pair is within rendering noise; the scripts reproduce the explored flow.'],
            followUp: []
        };
    }

    private scored(entries: readonly VerdictEntry[], verdict: Verdict): ScoredPair[] {
        return entries
            .filter(entry => entry.verdict === verdict)
            .map(entry => ({ key: entry.key, rms: entry.rms }));
    }
}
