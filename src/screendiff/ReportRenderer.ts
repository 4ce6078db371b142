/**
 * ReportRenderer
 *
 * Builds the Markdown report for a finished run. No I/O here; the runner
 * decides where the text goes.
 */

import { VERDICT_LABELS } from './Classifier.js';
import { DiffResult, ReportEntry, RunReport } from './types.js';

export function formatScore(value: number): string {
    return value.toFixed(2);
}

export function sizeNote(result: DiffResult): string {
    if (!result.sizeMismatch) return '';
    const { exploreSize: e, scriptSize: s } = result;
    return `(size mismatch: explore ${e.width}x${e.height} vs script ${s.width}x${s.height})`;
}

function renderEntry(entry: ReportEntry): string[] {
    const { result } = entry;
    const verdict = VERDICT_LABELS[entry.verdict];
    const [r, g, b] = result.channelRms;
    const changedShare = result.totalPixels === 0 ? 0 : (result.changedPixels / result.totalPixels) * 100;

    return [
        `## ${entry.key}`,
        '',
        `- verdict: ${verdict.label} (${verdict.description})`,
        `- explore: ${result.explorePath}`,
        `- script: ${result.scriptPath}`,
        `- diff: ${result.diffImagePath}`,
        `- rms: ${formatScore(result.rms)} ${sizeNote(result)}`.trimEnd(),
        `- channel rms: r ${formatScore(r)}, g ${formatScore(g)}, b ${formatScore(b)}`,
        `- changed pixels: ${result.changedPixels} / ${result.totalPixels} (${formatScore(changedShare)}%)`,
        ''
    ];
}

export function renderReport(report: RunReport): string {
    const { recommendation: rec, thresholds } = report;
    const lines: string[] = [
        '# Screenshot Diff Report',
        '',
        `- run: ${report.runId}`,
        `- generated: ${report.generatedAt}`,
        `- explore: ${report.exploreDir}`,
        `- script: ${report.scriptDir}`,
        `- thresholds: match < ${formatScore(thresholds.matchThreshold)}, major >= ${formatScore(thresholds.reviewThreshold)}`,
        ''
    ];

    for (const entry of report.entries) {
        lines.push(...renderEntry(entry));
    }

    if (report.skipped.length > 0) {
        lines.push('## Skipped pairs', '');
        for (const skipped of report.skipped) {
            lines.push(`- ${skipped.key}: ${skipped.reason}`);
        }
        lines.push('');
    }

    if (report.unmatched.length > 0) {
        lines.push('## Unmatched screenshots', '');
        for (const pair of report.unmatched) {
            const present = pair.explore !== undefined ? `explore only (${pair.explore})` : `script only (${pair.script ?? ''})`;
            lines.push(`- ${pair.key}: ${present}`);
        }
        lines.push('');
    }

    if (report.duplicates.length > 0) {
        lines.push('## Ignored duplicates', '');
        for (const dup of report.duplicates) {
            lines.push(`- ${dup.key} (${dup.side}): kept ${dup.kept}, ignored ${dup.ignored}`);
        }
        lines.push('');
    }

    lines.push(
        '## Recommendation',
        '',
        `- MATCH ${rec.counts.MATCH} / MINOR_DIFF ${rec.counts.MINOR_DIFF} / MAJOR_DIFF ${rec.counts.MAJOR_DIFF} out of ${rec.total} compared pairs`,
        '',
        `**${rec.headline}**`,
        '',
        ...rec.guidance
    );

    if (rec.followUp.length > 0) {
        lines.push('');
        for (const pair of rec.followUp) {
            lines.push(`- ${pair.key}: rms ${formatScore(pair.rms)}`);
        }
    }

    lines.push('');
    return lines.join('\n');
}
