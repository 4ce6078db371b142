#!/usr/bin/env node
import { program } from 'commander';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { exitCodeFor, parseFailOn } from './cli/exitCode.js';
import type { CompareOptions } from './cli/types.js';
import {
    ConfigurationError,
    DEFAULTS,
    DiffRunner,
    ExplicitRunResolver,
    OUTCOME_HEADLINES,
    createResolver,
    fileSystemLister,
    formatRunTimestamp,
    loadConfig,
    type LayoutName,
    type RunResolver
} from './screendiff/index.js';

dotenv.config();

const LAYOUTS: readonly LayoutName[] = ['auto', 'flat', 'runs'];

function parseLayout(raw: string): LayoutName {
    const layout = LAYOUTS.find(name => name === raw);
    if (!layout) {
        throw new ConfigurationError(`--layout must be one of ${LAYOUTS.join(', ')}, got "${raw}"`);
    }
    return layout;
}

program
    .name('screendiff')
    .description('Compare explore and script screenshots and recommend script updates')
    .version('1.0.0')
    .argument('[root]', 'Capture root (run folders or flat explore-/script- files)')
    .option('--explore <dir>', 'Explore captures folder (use with --script)')
    .option('--script <dir>', 'Script captures folder (use with --explore)')
    .option('--layout <layout>', 'Capture layout: auto | flat | runs', 'auto')
    .option('--output <dir>', 'Output folder for diff images and report')
    .option('--match-threshold <number>', 'RMS below this is rendering noise')
    .option('--review-threshold <number>', 'RMS at or above this is different content')
    .option('--pixel-threshold <number>', 'pixelmatch threshold (0-1) for the changed-pixel count')
    .option('--concurrency <number>', 'Pairs compared at once')
    .option('--fail-on <level>', 'Exit with code 2 on: minor | major')
    .option('--no-json', 'Skip summary.json')
    .option('--quiet', 'Only print the outcome', false)
    .action(async (root: string | undefined, options: CompareOptions) => {
        try {
            const config = loadConfig({
                root,
                matchThreshold: options.matchThreshold,
                reviewThreshold: options.reviewThreshold,
                pixelThreshold: options.pixelThreshold,
                concurrency: options.concurrency
            });
            const failOn = parseFailOn(options.failOn);
            const timestamp = formatRunTimestamp(new Date());

            let resolver: RunResolver;
            if (options.explore || options.script) {
                if (!options.explore || !options.script) {
                    throw new ConfigurationError('--explore and --script must be given together');
                }
                resolver = new ExplicitRunResolver(options.explore, options.script, fileSystemLister, timestamp);
            } else {
                resolver = createResolver(config.root, parseLayout(options.layout));
            }

            const outputDir = options.output ?? path.join(config.root, DEFAULTS.DIFFS_DIR, timestamp);

            const runner = new DiffRunner({
                outputDir,
                thresholds: { matchThreshold: config.matchThreshold, reviewThreshold: config.reviewThreshold },
                pixelThreshold: config.pixelThreshold,
                concurrency: config.concurrency,
                writeJson: options.json,
                quiet: options.quiet
            });

            if (!options.quiet) {
                console.log('🔍 Screenshot Diff');
                console.log(`   Root: ${config.root}`);
                console.log(`   Output: ${outputDir}`);
                console.log('');
            }

            const { report, reportPath } = await runner.run(resolver, (current, total, key) => {
                if (!options.quiet) console.log(`   [${current}/${total}] ${key}`);
            });

            const rec = report.recommendation;
            const icon = rec.outcome === 'ALL_CLEAR' ? '✅' : rec.outcome === 'REVIEW_NEEDED' ? '⚠️' : '❌';
            console.log('');
            console.log(`${icon} ${OUTCOME_HEADLINES[rec.outcome]}`);
            console.log(`   MATCH ${rec.counts.MATCH} / MINOR_DIFF ${rec.counts.MINOR_DIFF} / MAJOR_DIFF ${rec.counts.MAJOR_DIFF} out of ${rec.total}`);
            if (rec.divergencePoint) {
                console.log(`   Divergence point: ${rec.divergencePoint}`);
            }
            if (report.skipped.length > 0) {
                console.log(`   Skipped: ${report.skipped.length}`);
            }
            console.log(`   Report: ${reportPath}`);

            process.exitCode = exitCodeFor(rec.outcome, failOn);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`❌ ${message}`);
            process.exitCode = 1;
        }
    });

await program.parseAsync();
