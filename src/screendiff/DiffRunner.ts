/**
 * DiffRunner
 *
 * Compares every explore/script pair of one capture run and writes the
 * diff images, the Markdown report and a JSON summary. A screenshot that
 * fails to load only skips its own pair.
 */

import * as path from 'path';
import { ErrorHandler, ErrorSeverity, FileSystemHelper } from '../shared/utils/index.js';
import { Classifier } from './Classifier.js';
import { DEFAULTS } from './config.js';
import { countChangedPixels, diff } from './DiffEngine.js';
import { DiffImageWriter, PngDiffWriter, assignDiffFileNames, diffFileName } from './DiffImageWriter.js';
import { ConfigurationError } from './errors.js';
import { load, normalizePair } from './ImageLoader.js';
import { PairMatcher } from './PairMatcher.js';
import { RecommendationSynthesizer } from './RecommendationSynthesizer.js';
import { renderReport } from './ReportRenderer.js';
import { ResolvedRun, RunResolver } from './RunResolver.js';
import {
    CompletePair,
    DiffResult,
    NormalizedImage,
    ReportEntry,
    RunReport,
    SkippedPair,
    Thresholds
} from './types.js';

export type ImageSource = (filePath: string) => Promise<NormalizedImage>;

export interface DiffRunnerOptions {
    outputDir: string;
    thresholds?: Partial<Thresholds>;
    /** pixelmatch threshold for the changed-pixel count */
    pixelThreshold?: number;
    concurrency?: number;
    /** Write summary.json next to the report */
    writeJson?: boolean;
    quiet?: boolean;
    loadImage?: ImageSource;
    diffWriter?: DiffImageWriter;
    now?: () => Date;
}

export interface RunArtifacts {
    report: RunReport;
    reportPath: string;
    summaryPath?: string;
}

type PairOutcome =
    | { kind: 'compared'; result: DiffResult }
    | { kind: 'skipped'; skipped: SkippedPair };

/**
 * Run `task` over `items` with at most `limit` in flight. Results keep the
 * order of `items` whatever order the tasks finish in.
 */
export async function mapInOrder<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await task(items[index], index);
        }
    };

    const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
    await Promise.all(workers);
    return results;
}

export class DiffRunner {
    private readonly classifier: Classifier;
    private readonly matcher = new PairMatcher();
    private readonly synthesizer = new RecommendationSynthesizer();
    private readonly options: Required<Omit<DiffRunnerOptions, 'thresholds'>>;

    constructor(options: DiffRunnerOptions) {
        this.classifier = new Classifier(options.thresholds);
        this.options = {
            outputDir: options.outputDir,
            pixelThreshold: options.pixelThreshold ?? DEFAULTS.PIXEL_THRESHOLD,
            concurrency: options.concurrency ?? DEFAULTS.CONCURRENCY,
            writeJson: options.writeJson ?? true,
            quiet: options.quiet ?? false,
            loadImage: options.loadImage ?? load,
            diffWriter: options.diffWriter ?? new PngDiffWriter(options.outputDir),
            now: options.now ?? (() => new Date())
        };
    }

    /**
     * Resolve the capture run, compare it and write every artifact
     */
    async run(resolver: RunResolver, onProgress?: (current: number, total: number, key: string) => void): Promise<RunArtifacts> {
        const report = await this.compare(resolver.resolve(), onProgress);
        return this.writeArtifacts(report);
    }

    /**
     * Compare a resolved run without writing the report
     */
    async compare(run: ResolvedRun, onProgress?: (current: number, total: number, key: string) => void): Promise<RunReport> {
        const pairing = this.matcher.match(run.explore, run.script);
        this.log(`[DiffRunner] Run ${run.runId}: ${pairing.pairs.length} pair(s), ${pairing.unmatched.length} unmatched`);

        if (pairing.pairs.length === 0) {
            throw new ConfigurationError('No explore/script screenshot pairs found.');
        }

        for (const pair of pairing.unmatched) {
            this.log(`[DiffRunner] Unmatched: ${pair.key} (${pair.explore !== undefined ? 'explore' : 'script'} only)`);
        }

        // Names are fixed up front so concurrent writes never race for one file
        const fileNames = assignDiffFileNames(pairing.pairs.map(pair => pair.key));

        let done = 0;
        const outcomes = await mapInOrder(pairing.pairs, this.options.concurrency, async pair => {
            const outcome = await this.comparePair(pair, fileNames.get(pair.key) ?? diffFileName(pair.key));
            done++;
            onProgress?.(done, pairing.pairs.length, pair.key);
            return outcome;
        });

        const entries: ReportEntry[] = [];
        const skipped: SkippedPair[] = [];
        for (const outcome of outcomes) {
            if (outcome.kind === 'skipped') {
                skipped.push(outcome.skipped);
                continue;
            }
            entries.push({
                key: outcome.result.key,
                result: outcome.result,
                verdict: this.classifier.classify(outcome.result.rms)
            });
        }

        if (entries.length === 0) {
            const reasons = skipped.map(s => `  - ${s.key}: ${s.reason}`).join('\n');
            throw new ConfigurationError(`No screenshot pair could be compared:\n${reasons}`);
        }

        const recommendation = this.synthesizer.synthesize(
            entries.map(entry => ({ key: entry.key, rms: entry.result.rms, verdict: entry.verdict }))
        );

        return Object.freeze({
            runId: run.runId,
            generatedAt: this.options.now().toISOString(),
            exploreDir: run.exploreDir,
            scriptDir: run.scriptDir,
            outputDir: this.options.outputDir,
            thresholds: this.classifier.thresholds,
            entries,
            skipped,
            unmatched: pairing.unmatched,
            duplicates: pairing.duplicates,
            recommendation
        });
    }

    writeArtifacts(report: RunReport): RunArtifacts {
        const reportPath = path.join(this.options.outputDir, DEFAULTS.REPORT_FILE);
        FileSystemHelper.writeText(reportPath, renderReport(report));
        this.log(`[DiffRunner] Wrote ${reportPath}`);

        if (!this.options.writeJson) {
            return { report, reportPath };
        }

        const summaryPath = path.join(this.options.outputDir, DEFAULTS.SUMMARY_FILE);
        FileSystemHelper.writeJSON(summaryPath, report);
        return { report, reportPath, summaryPath };
    }

    private async comparePair(pair: CompletePair, fileName: string): Promise<PairOutcome> {
        try {
            const explore = await this.options.loadImage(pair.explore);
            const script = await this.options.loadImage(pair.script);

            const normalized = normalizePair(explore, script);
            if (normalized.sizeMismatch) {
                this.log(
                    `[DiffRunner] ⚠️ ${pair.key}: size mismatch ` +
                    `(explore ${explore.width}x${explore.height} vs script ${script.width}x${script.height}), padding`
                );
            }

            const computed = diff(normalized.a, normalized.b);
            const diffImagePath = this.options.diffWriter.write(fileName, computed.image);

            return {
                kind: 'compared',
                result: {
                    key: pair.key,
                    rms: computed.rms,
                    channelRms: computed.channelRms,
                    sizeMismatch: normalized.sizeMismatch,
                    exploreSize: { width: explore.width, height: explore.height },
                    scriptSize: { width: script.width, height: script.height },
                    diffImagePath,
                    changedPixels: countChangedPixels(normalized.a, normalized.b, this.options.pixelThreshold),
                    totalPixels: computed.image.width * computed.image.height,
                    explorePath: pair.explore,
                    scriptPath: pair.script
                }
            };
        } catch (error) {
            const info = ErrorHandler.handle(
                error,
                { component: 'DiffRunner', operation: 'comparePair', data: { key: pair.key } },
                this.options.quiet ? ErrorSeverity.SILENT : ErrorSeverity.WARNING
            );
            return {
                kind: 'skipped',
                skipped: { key: pair.key, explore: pair.explore, script: pair.script, reason: info.message }
            };
        }
    }

    private log(message: string): void {
        if (!this.options.quiet) console.log(message);
    }
}
