import { execa } from 'execa';
import type { CommandOutcome, CommandRunner, PipelineDeps } from './types';

export interface FailedRun {
    exitCode: number | null;
    stdout: string;
    stderr: string;
    message: string;
}

// execa rejects with an Error carrying exitCode/stdout/stderr; a spawn
// failure (ENOENT, EACCES) leaves exitCode undefined.
export function readFailure(e: unknown): FailedRun {
    if (typeof e !== 'object' || e === null) {
        return { exitCode: null, stdout: '', stderr: '', message: String(e) };
    }
    const exitCode = 'exitCode' in e && typeof e.exitCode === 'number' ? e.exitCode : null;
    const stdout = 'stdout' in e && typeof e.stdout === 'string' ? e.stdout : '';
    const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
    const message =
        'shortMessage' in e && typeof e.shortMessage === 'string'
            ? e.shortMessage
            : e instanceof Error
              ? e.message
              : String(e);
    return { exitCode, stdout, stderr, message };
}

/**
 * Runs one external command to completion and reports how it went.
 * Never throws: a missing binary comes back with `exitCode: null` and
 * `spawnError` set, a non-zero exit with `ok: false`.
 */
export const runCommand: CommandRunner = async (command, args) => {
    try {
        const res = await execa(command, [...args], { stdin: 'ignore' });
        return {
            command,
            args,
            exitCode: res.exitCode,
            stdout: res.stdout,
            stderr: res.stderr,
            ok: true,
        };
    } catch (e) {
        const failed = readFailure(e);
        return {
            command,
            args,
            exitCode: failed.exitCode,
            stdout: failed.stdout,
            stderr: failed.stderr,
            ok: false,
            spawnError: failed.exitCode === null ? failed.message : undefined,
        };
    }
};

export const defaultDeps: PipelineDeps = { run: runCommand };

/** Short human-readable reason for a failed command, for logs and results. */
export function describeFailure(outcome: CommandOutcome, maxChars = 400): string {
    if (outcome.exitCode === null) {
        return `${outcome.command} could not be started: ${outcome.spawnError || 'unknown error'}`;
    }
    const tail = outcome.stderr.trim().slice(-maxChars);
    return tail
        ? `${outcome.command} exited with code ${outcome.exitCode}: ${tail}`
        : `${outcome.command} exited with code ${outcome.exitCode}`;
}
