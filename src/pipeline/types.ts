export interface TargetCanvas {
    readonly width: number;
    readonly height: number;
}

export interface Dimensions {
    readonly width: number;
    readonly height: number;
}

export type ProbeResult =
    | { ok: true; dimensions: Dimensions }
    | { ok: false; reason: string };

export type EncodeMode = 'software' | 'hardware';

export interface QualitySetting {
    readonly flag: '-crf' | '-cq';
    readonly value: number;
}

export interface EncodingProfile {
    readonly mode: EncodeMode;
    readonly label: string;
    readonly videoCodec: string;
    readonly preset: string;
    readonly quality: QualitySetting;
    readonly rateControl?: string;
    readonly audioCodec: string;
    readonly audioSampleRate: number;
    readonly audioChannels: number;
    readonly audioBitrate: string;
    readonly frameRate: number;
    // Same timescale on every clip keeps stream-copied durations sane.
    readonly videoTrackTimescale: number;
}

export type FilterChain = readonly string[];

export interface SourceClip {
    path: string;
    dimensions: Dimensions;
}

export type FailureStage = 'probe' | 'transcode';

export type NormalizationResult =
    | {
          ok: true;
          sourcePath: string;
          outputPath: string;
          dimensions: Dimensions;
          filters: FilterChain;
      }
    | {
          ok: false;
          sourcePath: string;
          outputPath: string;
          stage: FailureStage;
          reason: string;
      };

export interface ManifestEntry {
    sourcePath: string;
    normalizedPath: string; // absolute, forward slashes
}

export interface CommandOutcome {
    command: string;
    args: readonly string[];
    exitCode: number | null; // null when the process never started
    stdout: string;
    stderr: string;
    ok: boolean;
    spawnError?: string;
}

export type CommandRunner = (
    command: string,
    args: readonly string[]
) => Promise<CommandOutcome>;

export interface PipelineDeps {
    run: CommandRunner;
}

export type BatchOutcome =
    | { status: 'no-input'; candidates: string[] }
    | {
          status: 'nothing-merged';
          candidates: string[];
          results: NormalizationResult[];
      }
    | {
          status: 'merged';
          candidates: string[];
          results: NormalizationResult[];
          manifest: ManifestEntry[];
          listPath: string;
          outputPath: string;
      };
