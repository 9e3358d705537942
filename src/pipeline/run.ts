import fs from 'fs-extra';
import path from 'path';
import type { RunConfig } from './env';
import { concatClips } from './concat';
import { defaultDeps } from './exec';
import { closeLogFile, info, setLogFile, type StepTimer, startStep, warn } from './log';
import { createManifestEntry, writeManifest } from './manifest';
import { normalizeClip } from './normalize';
import { discoverClips } from './scan';
import type {
    BatchOutcome,
    EncodingProfile,
    ManifestEntry,
    NormalizationResult,
    PipelineDeps,
} from './types';

interface NormalizedBatch {
    results: NormalizationResult[];
    manifest: ManifestEntry[];
}

export function processedName(index: number): string {
    return `processed_${String(index).padStart(4, '0')}.mp4`;
}

function pendingName(scanIndex: number): string {
    return `pending_${String(scanIndex).padStart(4, '0')}.mp4`;
}

/** Pool size for a run: never more workers than files, and hardware encoders get the session cap. */
export function effectiveConcurrency(
    config: RunConfig,
    profile: EncodingProfile,
    candidates: number
): number {
    let limit = config.concurrency;
    if (profile.mode === 'hardware') {
        limit = Math.min(limit, config.hardwareSessionLimit);
    }
    return Math.max(1, Math.min(limit, candidates));
}

export async function resetScratch(scratchDir: string): Promise<void> {
    await fs.remove(scratchDir);
    await fs.ensureDir(scratchDir);
}

function skipNotice(result: NormalizationResult) {
    if (result.ok) return;
    warn('batch.skip', {
        file: path.basename(result.sourcePath),
        stage: result.stage,
        reason: result.reason,
    });
}

// Output index counts successes so far, keeping scratch names contiguous.
async function normalizeSequential(
    candidates: string[],
    profile: EncodingProfile,
    config: RunConfig,
    deps: PipelineDeps,
    timer: StepTimer
): Promise<NormalizedBatch> {
    const results: NormalizationResult[] = [];
    const manifest: ManifestEntry[] = [];
    for (const [i, sourcePath] of candidates.entries()) {
        const outputPath = path.join(config.scratchDir, processedName(manifest.length));
        const result = await normalizeClip(sourcePath, outputPath, profile, config, deps);
        results.push(result);
        if (result.ok) {
            manifest.push(createManifestEntry(sourcePath, result.outputPath));
        } else {
            skipNotice(result);
        }
        timer.eta(i + 1, candidates.length);
    }
    return { results, manifest };
}

/**
 * Encodes with a bounded worker pool into per-scan-index files, then renames
 * the successes in scan order. Completion order never reaches the manifest.
 */
async function normalizePooled(
    candidates: string[],
    profile: EncodingProfile,
    config: RunConfig,
    deps: PipelineDeps,
    timer: StepTimer,
    concurrency: number
): Promise<NormalizedBatch> {
    const slots: Array<NormalizationResult | undefined> = candidates.map(() => undefined);
    const active: Promise<void>[] = [];
    let completed = 0;

    async function runOne(idx: number) {
        const outputPath = path.join(config.scratchDir, pendingName(idx));
        slots[idx] = await normalizeClip(candidates[idx], outputPath, profile, config, deps);
        completed += 1;
        timer.eta(completed, candidates.length);
    }

    let idx = 0;
    while (idx < candidates.length) {
        while (active.length < concurrency && idx < candidates.length) {
            const p: Promise<void> = runOne(idx).finally(() => {
                const pos = active.indexOf(p);
                if (pos >= 0) active.splice(pos, 1);
            });
            active.push(p);
            idx++;
        }
        if (active.length) await Promise.race(active);
    }
    await Promise.all(active);

    const results: NormalizationResult[] = [];
    const manifest: ManifestEntry[] = [];
    for (const result of slots) {
        if (!result) continue;
        if (!result.ok) {
            skipNotice(result);
            results.push(result);
            continue;
        }
        const target = path.join(config.scratchDir, processedName(manifest.length));
        await fs.move(result.outputPath, target, { overwrite: true });
        results.push({ ...result, outputPath: target });
        manifest.push(createManifestEntry(result.sourcePath, target));
    }
    return { results, manifest };
}

/**
 * Normalize everything, then merge. Per-file failures only shrink the
 * manifest; a failed merge throws ConcatError.
 */
export async function runBatch(
    config: RunConfig,
    profile: EncodingProfile,
    deps: PipelineDeps = defaultDeps
): Promise<BatchOutcome> {
    await resetScratch(config.scratchDir);
    const runLogPath = path.join(config.scratchDir, `run-${Date.now()}.log`);
    setLogFile(runLogPath);
    try {
        info('batch.start', {
            inputDir: config.inputDir,
            scratchDir: config.scratchDir,
            output: config.outputFile,
            canvas: `${config.canvas.width}x${config.canvas.height}`,
            profile: profile.label,
            log: runLogPath,
        });

        const candidates = await discoverClips(config);
        if (!candidates.length) {
            warn('batch.empty', { reason: 'no files found', inputDir: config.inputDir });
            return { status: 'no-input', candidates };
        }

        const concurrency = effectiveConcurrency(config, profile, candidates.length);
        const timer = startStep('batch.normalize', { total: candidates.length, concurrency });
        const { results, manifest } =
            concurrency > 1
                ? await normalizePooled(candidates, profile, config, deps, timer, concurrency)
                : await normalizeSequential(candidates, profile, config, deps, timer);
        timer.end({ ok: manifest.length, failed: results.length - manifest.length });

        if (!manifest.length) {
            warn('batch.empty', { reason: 'no clip normalized', attempted: candidates.length });
            return { status: 'nothing-merged', candidates, results };
        }

        const listPath = path.join(config.scratchDir, config.listFileName);
        await writeManifest(manifest, listPath);
        await concatClips(listPath, config.outputFile, config, deps);
        info('batch.complete', {
            output: config.outputFile,
            clips: manifest.length,
            skipped: results.length - manifest.length,
        });
        return {
            status: 'merged',
            candidates,
            results,
            manifest,
            listPath,
            outputPath: config.outputFile,
        };
    } finally {
        closeLogFile();
    }
}
