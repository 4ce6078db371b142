import { ConfigurationError, type Outcome } from '../screendiff/index.js';
import type { FailOn } from './types.js';

/** Exit code for a finished run: 2 when the outcome reaches --fail-on */
export function exitCodeFor(outcome: Outcome, failOn: FailOn | undefined): number {
    if (failOn === 'major') return outcome === 'SCRIPTS_NEED_UPDATE' ? 2 : 0;
    if (failOn === 'minor') return outcome === 'ALL_CLEAR' ? 0 : 2;
    return 0;
}

export function parseFailOn(raw: string | undefined): FailOn | undefined {
    if (raw === undefined) return undefined;
    if (raw === 'minor' || raw === 'major') return raw;
    throw new ConfigurationError(`--fail-on must be "minor" or "major", got "${raw}"`);
}
