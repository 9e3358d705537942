import * as dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from './errors';
import type { TargetCanvas } from './types';
dotenv.config();

export const ENV = {
    inputDir: process.env.INPUT_DIR || '.',
    // Wiped and recreated at the start of every run
    scratchDir: process.env.SCRATCH_DIR || 'processed_temp',
    outputFile: process.env.OUTPUT_FILE || 'final_merged_video.mp4',
    videoExts: (process.env.VIDEO_EXTS || 'mp4,mov,avi,mkv,flv,ts').split(','),
    targetWidth: Number(process.env.TARGET_WIDTH || 1920),
    targetHeight: Number(process.env.TARGET_HEIGHT || 1080),
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    // Empty means "ask" on a TTY, software otherwise
    encodeMode: process.env.ENCODE_MODE || '',
    concurrency: Number(process.env.NORMALIZE_CONCURRENCY || 1),
    // Consumer NVENC parts refuse more than a handful of parallel sessions
    hardwareSessionLimit: Number(process.env.HW_SESSION_LIMIT || 3),
    logLevel: process.env.LOG_LEVEL || 'info',
};

export interface RunConfig {
    readonly inputDir: string;
    readonly scratchDir: string;
    readonly outputFile: string;
    readonly extensions: readonly string[];
    readonly canvas: TargetCanvas;
    readonly ffmpegBin: string;
    readonly ffprobeBin: string;
    readonly concurrency: number;
    readonly hardwareSessionLimit: number;
    readonly listFileName: string;
}

export interface ConfigOverrides {
    inputDir?: string;
    scratchDir?: string;
    outputFile?: string;
    extensions?: readonly string[];
    width?: number;
    height?: number;
    ffmpegBin?: string;
    ffprobeBin?: string;
    concurrency?: number;
    hardwareSessionLimit?: number;
}

function positiveInt(name: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive integer, got ${value}`, { [name]: value });
    }
    return value;
}

export function normalizeExtensions(exts: readonly string[]): string[] {
    const out: string[] = [];
    for (const raw of exts) {
        const ext = raw.trim().replace(/^\.+/, '').toLowerCase();
        if (ext && !out.includes(ext)) out.push(ext);
    }
    return out;
}

function isWithin(parent: string, child: string): boolean {
    const rel = path.relative(parent, child);
    return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Builds the run configuration once, at process start. Every path is made
 * absolute and the result is frozen; components only ever read it.
 */
export function createConfig(overrides: ConfigOverrides = {}, base = ENV): RunConfig {
    const inputDir = path.resolve(overrides.inputDir ?? base.inputDir);
    const scratchDir = path.resolve(overrides.scratchDir ?? base.scratchDir);
    const outputFile = path.resolve(overrides.outputFile ?? base.outputFile);

    // The scratch dir is deleted wholesale on every run
    if (isWithin(scratchDir, inputDir)) {
        throw new ConfigError(
            `Scratch directory ${scratchDir} must not be (or contain) the input directory ${inputDir}`,
            { scratchDir, inputDir }
        );
    }
    if (isWithin(scratchDir, outputFile)) {
        throw new ConfigError(`Output file ${outputFile} must live outside the scratch directory`, {
            scratchDir,
            outputFile,
        });
    }

    const extensions = normalizeExtensions(overrides.extensions ?? base.videoExts);
    if (!extensions.length) {
        throw new ConfigError('At least one video extension is required');
    }

    const canvas: TargetCanvas = Object.freeze({
        width: positiveInt('width', overrides.width ?? base.targetWidth),
        height: positiveInt('height', overrides.height ?? base.targetHeight),
    });

    return Object.freeze({
        inputDir,
        scratchDir,
        outputFile,
        extensions: Object.freeze(extensions),
        canvas,
        ffmpegBin: overrides.ffmpegBin ?? base.ffmpegBin,
        ffprobeBin: overrides.ffprobeBin ?? base.ffprobeBin,
        concurrency: positiveInt('concurrency', overrides.concurrency ?? base.concurrency),
        hardwareSessionLimit: positiveInt(
            'hardwareSessionLimit',
            overrides.hardwareSessionLimit ?? base.hardwareSessionLimit
        ),
        listFileName: 'file_list.txt',
    });
}
