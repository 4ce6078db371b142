export { Classifier, VERDICT_LABELS } from './Classifier.js';
export { DEFAULTS, ENV_KEYS, THRESHOLDS, loadConfig, type ConfigOverrides, type ScreenDiffConfig } from './config.js';
export { combineRms, countChangedPixels, diff } from './DiffEngine.js';
export { PngDiffWriter, assignDiffFileNames, diffFileName, encodeKey, encodePng, type DiffImageWriter } from './DiffImageWriter.js';
export { DiffRunner, mapInOrder, type DiffRunnerOptions, type ImageSource, type RunArtifacts } from './DiffRunner.js';
export { ConfigurationError, DecodeError, ScreenDiffError } from './errors.js';
export { load, normalizePair, toRgb } from './ImageLoader.js';
export { PairMatcher, matchPairs } from './PairMatcher.js';
export { OUTCOME_HEADLINES, RecommendationSynthesizer, type VerdictEntry } from './RecommendationSynthesizer.js';
export { renderReport } from './ReportRenderer.js';
export {
    ExplicitRunResolver,
    FlatRunResolver,
    LatestRunResolver,
    createResolver,
    fileSystemLister,
    formatRunTimestamp,
    type DirectoryLister,
    type LayoutName,
    type ResolvedRun,
    type RunResolver
} from './RunResolver.js';
export type * from './types.js';
