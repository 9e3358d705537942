import path from 'path';
import type { RunConfig } from './env';
import { defaultDeps, describeFailure } from './exec';
import { isPortrait, planFilters, toFilterExpression } from './filters';
import { info, warn } from './log';
import { probeDimensions } from './probe';
import { profileArgs } from './profiles';
import type {
    EncodingProfile,
    FilterChain,
    NormalizationResult,
    PipelineDeps,
    SourceClip,
} from './types';

export function transcodeArgs(
    sourcePath: string,
    outputPath: string,
    filters: FilterChain,
    profile: EncodingProfile
): string[] {
    return [
        '-hide_banner',
        '-loglevel',
        'error',
        '-nostdin',
        '-y',
        '-i',
        sourcePath,
        '-vf',
        toFilterExpression(filters),
        ...profileArgs(profile),
        outputPath,
    ];
}

/**
 * Brings one clip onto the canvas with the active profile. Per-file
 * problems are returned, never thrown; on a transcode failure whatever
 * ffmpeg left at `outputPath` stays there and must not be referenced.
 */
export async function normalizeClip(
    sourcePath: string,
    outputPath: string,
    profile: EncodingProfile,
    config: RunConfig,
    deps: PipelineDeps = defaultDeps
): Promise<NormalizationResult> {
    const file = path.basename(sourcePath);
    const probe = await probeDimensions(sourcePath, config, deps);
    if (!probe.ok) {
        return { ok: false, sourcePath, outputPath, stage: 'probe', reason: probe.reason };
    }

    const clip: SourceClip = { path: sourcePath, dimensions: probe.dimensions };
    const { dimensions } = clip;
    const filters = planFilters(dimensions, config.canvas);
    info('normalize.start', {
        file,
        width: dimensions.width,
        height: dimensions.height,
        rotate: isPortrait(dimensions),
        codec: profile.videoCodec,
    });

    const outcome = await deps.run(
        config.ffmpegBin,
        transcodeArgs(clip.path, outputPath, filters, profile)
    );
    if (!outcome.ok) {
        const reason = describeFailure(outcome);
        warn('normalize.fail', { file, exitCode: outcome.exitCode, reason });
        return { ok: false, sourcePath, outputPath, stage: 'transcode', reason };
    }

    info('normalize.done', { file, output: path.basename(outputPath) });
    return { ok: true, sourcePath, outputPath, dimensions, filters };
}
