/**
 * Run resolution
 *
 * Finds the explore and script captures for one comparison run. Three
 * layouts are supported:
 *   - runs:     <root>/<run>/explore/*.png and <root>/<run>/script/*.png, newest run wins
 *   - flat:     <root>/explore-<key>.png next to <root>/script-<key>.png, run id is the folder name
 *   - explicit: two folders given directly
 * Folder access goes through a DirectoryLister so tests can hand in listings.
 */

import * as path from 'path';
import { FileSystemHelper } from '../shared/utils/index.js';
import { ConfigurationError } from './errors.js';
import { compareKeys, isImageFile } from './PairMatcher.js';
import { CaptureSide, CaptureSideName } from './types.js';

export interface DirectoryLister {
    exists(dirPath: string): boolean;
    /** File names (not paths) directly inside the folder */
    listFiles(dirPath: string): string[];
    /** Sub-folder names directly inside the folder */
    listDirs(dirPath: string): string[];
}

export const fileSystemLister: DirectoryLister = {
    exists: dirPath => FileSystemHelper.isDirectory(dirPath),
    listFiles: dirPath => FileSystemHelper.listFiles(dirPath, name => FileSystemHelper.isFile(path.join(dirPath, name))),
    listDirs: dirPath => FileSystemHelper.listDirs(dirPath)
};

export interface ResolvedRun {
    runId: string;
    exploreDir: string;
    scriptDir: string;
    explore: CaptureSide;
    script: CaptureSide;
}

export interface RunResolver {
    resolve(): ResolvedRun;
}

export type LayoutName = 'auto' | 'flat' | 'runs';

const FLAT_NAME = /^(explore|script)-(.+)\.[^.]+$/;

export function flatKey(side: CaptureSideName): (file: string) => string | null {
    return (file: string) => {
        const match = FLAT_NAME.exec(path.basename(file));
        if (!match || match[1] !== side) return null;
        return match[2];
    };
}

/** Local time as YYYYMMDD-HHMMSS */
export function formatRunTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function listSide(lister: DirectoryLister, dir: string, name: CaptureSideName, keyOf?: (file: string) => string | null): CaptureSide {
    const files = lister.listFiles(dir).map(file => path.join(dir, file));
    return keyOf ? { name, files, keyOf } : { name, files };
}

function requireRoot(lister: DirectoryLister, root: string): void {
    if (!lister.exists(root)) {
        throw new ConfigurationError(`Capture root not found: ${root}`);
    }
}

export class LatestRunResolver implements RunResolver {
    constructor(
        private readonly root: string,
        private readonly lister: DirectoryLister = fileSystemLister
    ) {}

    /** Run folders that hold both capture sides, oldest first */
    candidates(): string[] {
        requireRoot(this.lister, this.root);
        return this.lister.listDirs(this.root)
            .filter(run => {
                const subDirs = this.lister.listDirs(path.join(this.root, run));
                return subDirs.includes('explore') && subDirs.includes('script');
            })
            .sort(compareKeys);
    }

    resolve(): ResolvedRun {
        const runs = this.candidates();
        const runId = runs[runs.length - 1];
        if (runId === undefined) {
            throw new ConfigurationError(`No run folders with explore/ and script/ found under ${this.root}`);
        }

        const exploreDir = path.join(this.root, runId, 'explore');
        const scriptDir = path.join(this.root, runId, 'script');
        return {
            runId,
            exploreDir,
            scriptDir,
            explore: listSide(this.lister, exploreDir, 'explore'),
            script: listSide(this.lister, scriptDir, 'script')
        };
    }
}

export class FlatRunResolver implements RunResolver {
    constructor(
        private readonly root: string,
        private readonly lister: DirectoryLister = fileSystemLister,
        private readonly runId: string = path.basename(path.resolve(root))
    ) {}

    resolve(): ResolvedRun {
        requireRoot(this.lister, this.root);
        return {
            runId: this.runId,
            exploreDir: this.root,
            scriptDir: this.root,
            explore: listSide(this.lister, this.root, 'explore', flatKey('explore')),
            script: listSide(this.lister, this.root, 'script', flatKey('script'))
        };
    }
}

export class ExplicitRunResolver implements RunResolver {
    constructor(
        private readonly exploreDir: string,
        private readonly scriptDir: string,
        private readonly lister: DirectoryLister = fileSystemLister,
        private readonly runId: string = formatRunTimestamp(new Date())
    ) {}

    resolve(): ResolvedRun {
        for (const dir of [this.exploreDir, this.scriptDir]) {
            if (!this.lister.exists(dir)) {
                throw new ConfigurationError(`Capture folder not found: ${dir}`);
            }
        }
        return {
            runId: this.runId,
            exploreDir: this.exploreDir,
            scriptDir: this.scriptDir,
            explore: listSide(this.lister, this.exploreDir, 'explore'),
            script: listSide(this.lister, this.scriptDir, 'script')
        };
    }
}

/**
 * Pick the layout for `root`. `auto` means flat when prefixed screenshots sit
 * directly in the root, run folders otherwise.
 */
export function createResolver(root: string, layout: LayoutName = 'auto', lister: DirectoryLister = fileSystemLister): RunResolver {
    if (layout === 'flat') return new FlatRunResolver(root, lister);
    if (layout === 'runs') return new LatestRunResolver(root, lister);

    requireRoot(lister, root);
    const hasFlatCaptures = lister.listFiles(root).some(file => isImageFile(file) && FLAT_NAME.test(file));
    return hasFlatCaptures ? new FlatRunResolver(root, lister) : new LatestRunResolver(root, lister);
}
