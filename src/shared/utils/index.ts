/**
 * Shared Utilities
 *
 * Error handling and file system helpers.
 */

export {
    ErrorHandler,
    ErrorSeverity,
    type ErrorContext,
    type ErrorInfo
} from './ErrorHandler.js';

export {
    FileSystemHelper
} from './FileSystemHelper.js';
