/**
 * Centralized Error Handler
 *
 * Consistent logging of handled errors with severity levels. Per-pair
 * failures are logged here and turned into skips; configuration failures
 * are re-thrown.
 */

export enum ErrorSeverity {
    /** No logging */
    SILENT = 'silent',
    /** Warning only - for recoverable failures */
    WARNING = 'warning',
    /** Error logging - for significant failures with recovery */
    ERROR = 'error',
    /** Critical - re-throws after logging */
    CRITICAL = 'critical'
}

export interface ErrorContext {
    /** Component or function name */
    component: string;
    /** Operation being performed */
    operation?: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

export interface ErrorInfo {
    message: string;
    stack?: string;
    code?: string;
    context: ErrorContext;
    timestamp: string;
}

function errorCode(error: Error): string | undefined {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
}

export class ErrorHandler {
    private static formatContext(ctx: ErrorContext): string {
        const parts = [ctx.component];
        if (ctx.operation) parts.push(ctx.operation);
        return `[${parts.join('.')}]`;
    }

    /**
     * Handle an error with specified severity
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = error instanceof Error ? error : new Error(String(error));
        const prefix = this.formatContext(context);

        const errorInfo: ErrorInfo = {
            message: err.message,
            stack: err.stack,
            code: errorCode(err),
            context,
            timestamp: new Date().toISOString()
        };

        switch (severity) {
            case ErrorSeverity.SILENT:
                break;

            case ErrorSeverity.WARNING:
                console.warn(`${prefix} Warning: ${err.message}`);
                break;

            case ErrorSeverity.ERROR:
                console.error(`${prefix} Error: ${err.message}`);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                break;

            case ErrorSeverity.CRITICAL:
                console.error(`${prefix} CRITICAL: ${err.message}`);
                console.error(`${prefix} Stack:`, err.stack);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                throw err;
        }

        return errorInfo;
    }

    /**
     * Safely execute a sync function with error handling
     */
    static safeExecuteSync<T>(
        fn: () => T,
        context: ErrorContext,
        defaultValue: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): T {
        try {
            return fn();
        } catch (error) {
            this.handle(error, context, severity);
            return defaultValue;
        }
    }
}

export default ErrorHandler;
