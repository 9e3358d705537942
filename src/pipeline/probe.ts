import path from 'path';
import type { RunConfig } from './env';
import { defaultDeps, describeFailure } from './exec';
import { debug, warn } from './log';
import type { PipelineDeps, ProbeResult } from './types';

export function ffprobeArgs(filePath: string): string[] {
    return [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-show_entries',
        'stream=width,height',
        '-of',
        'csv=s=x:p=0',
        filePath,
    ];
}

/**
 * Reads `WxH` from ffprobe's csv output. Some containers append extra
 * separators (`1920x1080x`), so only the leading pair is taken.
 */
export function parseDimensions(stdout: string): ProbeResult {
    const line = stdout
        .split(/\r?\n/)
        .map((l) => l.trim())
        .find(Boolean);
    if (!line) {
        return { ok: false, reason: 'no video stream reported' };
    }
    const m = line.match(/^(\d+)x(\d+)/);
    if (!m) {
        return { ok: false, reason: `unparsable dimensions: ${line.slice(0, 80)}` };
    }
    const width = Number(m[1]);
    const height = Number(m[2]);
    if (width <= 0 || height <= 0) {
        return { ok: false, reason: `invalid dimensions ${width}x${height}` };
    }
    return { ok: true, dimensions: { width, height } };
}

export async function probeDimensions(
    filePath: string,
    config: RunConfig,
    deps: PipelineDeps = defaultDeps
): Promise<ProbeResult> {
    const outcome = await deps.run(config.ffprobeBin, ffprobeArgs(filePath));
    const result: ProbeResult = outcome.ok
        ? parseDimensions(outcome.stdout)
        : { ok: false, reason: describeFailure(outcome) };
    if (result.ok) {
        debug('probe.ok', { file: filePath, ...result.dimensions });
    } else {
        warn('probe.fail', { file: path.basename(filePath), reason: result.reason });
    }
    return result;
}
