import fs from 'fs-extra';
import type { RunConfig } from './env';
import { ConcatError } from './errors';
import { defaultDeps, describeFailure } from './exec';
import { info, startStep } from './log';
import type { PipelineDeps } from './types';

export function concatArgs(listPath: string, outputPath: string): string[] {
    return [
        '-hide_banner',
        '-loglevel',
        'error',
        '-nostdin',
        '-f',
        'concat',
        '-safe',
        '0',
        '-i',
        listPath,
        '-c',
        'copy',
        outputPath,
    ];
}

/**
 * Stream-copies every clip in the list into one file. No re-encode, so it
 * only works because every normalized clip shares codec parameters.
 * Throws ConcatError on failure; there is no partial result.
 */
export async function concatClips(
    listPath: string,
    outputPath: string,
    config: RunConfig,
    deps: PipelineDeps = defaultDeps
): Promise<void> {
    if (await fs.pathExists(outputPath)) {
        info('concat.replace', { output: outputPath });
        await fs.remove(outputPath);
    }
    const timer = startStep('concat', { list: listPath, output: outputPath });
    const outcome = await deps.run(config.ffmpegBin, concatArgs(listPath, outputPath));
    if (!outcome.ok) {
        throw new ConcatError(
            `Merging into ${outputPath} failed. ${describeFailure(outcome)}`,
            outcome.exitCode,
            outcome.stderr.slice(-800)
        );
    }
    timer.end();
}
