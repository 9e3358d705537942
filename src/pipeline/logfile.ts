import fs from 'fs-extra';
import path from 'path';
import { isLogLevel, levelAtLeast, type LogLevel } from './log';

const RUN_LOG = /^run-\d+\.log$/;

/** Newest `run-<ms>.log` in the scratch dir, or null when there is none. */
export async function latestRunLog(scratchDir: string): Promise<string | null> {
    if (!(await fs.pathExists(scratchDir))) return null;
    const names = (await fs.readdir(scratchDir)).filter((f) => RUN_LOG.test(f));
    if (!names.length) return null;
    // Millisecond stamps only sort lexically while they have the same width
    names.sort((a, b) => Number(a.slice(4, -4)) - Number(b.slice(4, -4)));
    return path.join(scratchDir, names[names.length - 1]);
}

/**
 * Keeps JSON log lines at or above `min`. Lines that are not JSON pass
 * through untouched; blank lines are dropped.
 */
export function filterLogLines(lines: readonly string[], min: LogLevel): string[] {
    const out: string[] = [];
    for (const raw of lines) {
        const line = raw.trim();
        if (!line) continue;
        let level: unknown;
        try {
            const parsed: unknown = JSON.parse(line);
            level =
                typeof parsed === 'object' && parsed !== null && 'level' in parsed
                    ? parsed.level
                    : undefined;
        } catch {
            out.push(line);
            continue;
        }
        if (typeof level !== 'string' || !isLogLevel(level) || levelAtLeast(level, min)) {
            out.push(line);
        }
    }
    return out;
}

export interface LineBuffer {
    /** Complete lines in `chunk` plus whatever was held back from earlier chunks. */
    push(chunk: string): string[];
    /** The held-back partial line, if any. */
    flush(): string[];
}

// Reads of a growing file can end mid-line; the tail waits for its newline.
export function createLineBuffer(): LineBuffer {
    let pending = '';
    return {
        push(chunk) {
            const parts = (pending + chunk).split(/\r?\n/);
            pending = parts.pop() ?? '';
            return parts;
        },
        flush() {
            const rest = pending;
            pending = '';
            return rest ? [rest] : [];
        },
    };
}
