/**
 * Error classes for failures that end a run.
 * Per-file problems are never thrown; they come back as results.
 */

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
    code?: string;
    details?: Record<string, unknown>;

    constructor(message: string, code?: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'PipelineError';
        this.code = code;
        this.details = details;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toString(): string {
        const parts = [this.message];
        if (this.code) {
            parts.push(`(code: ${this.code})`);
        }
        return parts.join(' ');
    }
}

/**
 * Configuration values that cannot describe a valid run
 */
export class ConfigError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'config_invalid', details);
        this.name = 'ConfigError';
    }
}

/**
 * The stream-copy merge step failed; the merged file must be treated as absent
 */
export class ConcatError extends PipelineError {
    exitCode: number | null;
    stderrTail: string;

    constructor(message: string, exitCode: number | null, stderrTail = '') {
        super(message, 'concat_failed', { exitCode });
        this.name = 'ConcatError';
        this.exitCode = exitCode;
        this.stderrTail = stderrTail;
    }

    toString(): string {
        const base = super.toString();
        return this.exitCode === null ? base : `${base} (exit: ${this.exitCode})`;
    }
}
