/**
 * File System Helper
 *
 * Folder listing for capture discovery and writing of run artifacts.
 * Lookups fall back to empty results; writes throw.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';

export class FileSystemHelper {
    /**
     * Ensure a directory exists, creating it if necessary
     */
    static ensureDir(dirPath: string): void {
        if (fs.existsSync(dirPath)) return;
        fs.mkdirSync(dirPath, { recursive: true });
    }

    /**
     * Write text, creating the parent directory first
     */
    static writeText(filePath: string, content: string): void {
        this.ensureDir(path.dirname(filePath));
        fs.writeFileSync(filePath, content, 'utf-8');
    }

    static writeJSON(filePath: string, data: unknown): void {
        this.writeText(filePath, JSON.stringify(data, null, 2));
    }

    /**
     * List entry names in a directory with optional filter
     */
    static listFiles(
        dirPath: string,
        filter?: (filename: string) => boolean
    ): string[] {
        if (!fs.existsSync(dirPath)) return [];

        return ErrorHandler.safeExecuteSync(
            () => {
                const files = fs.readdirSync(dirPath);
                return filter ? files.filter(filter) : files;
            },
            { component: 'FileSystemHelper', operation: 'listFiles', data: { dirPath } },
            [],
            ErrorSeverity.WARNING
        );
    }

    /**
     * Names of the sub-directories of a directory
     */
    static listDirs(dirPath: string): string[] {
        if (!fs.existsSync(dirPath)) return [];

        return ErrorHandler.safeExecuteSync(
            () => fs.readdirSync(dirPath, { withFileTypes: true })
                .filter(entry => entry.isDirectory())
                .map(entry => entry.name),
            { component: 'FileSystemHelper', operation: 'listDirs', data: { dirPath } },
            [],
            ErrorSeverity.WARNING
        );
    }

    /**
     * Get file stats safely
     */
    static safeStats(filePath: string): fs.Stats | null {
        if (!fs.existsSync(filePath)) return null;

        return ErrorHandler.safeExecuteSync(
            () => fs.statSync(filePath),
            { component: 'FileSystemHelper', operation: 'safeStats', data: { filePath } },
            null,
            ErrorSeverity.SILENT
        );
    }

    static isDirectory(filePath: string): boolean {
        const stats = this.safeStats(filePath);
        return stats?.isDirectory() ?? false;
    }

    static isFile(filePath: string): boolean {
        const stats = this.safeStats(filePath);
        return stats?.isFile() ?? false;
    }
}

export default FileSystemHelper;
