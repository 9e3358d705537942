import type { EncodeMode, EncodingProfile } from './types';

// Identical audio on every clip is what lets the concat step stream-copy.
const SHARED = {
    audioCodec: 'aac',
    audioSampleRate: 44100,
    audioChannels: 2,
    audioBitrate: '192k',
    frameRate: 30,
    videoTrackTimescale: 15360,
} as const;

export const SOFTWARE_PROFILE: EncodingProfile = Object.freeze({
    mode: 'software',
    label: 'CPU (libx264)',
    videoCodec: 'libx264',
    preset: 'fast',
    quality: Object.freeze({ flag: '-crf', value: 23 }),
    ...SHARED,
});

// NVENC has no CRF; -cq 26 lands close to libx264 -crf 23.
export const HARDWARE_PROFILE: EncodingProfile = Object.freeze({
    mode: 'hardware',
    label: 'NVIDIA GPU (h264_nvenc)',
    videoCodec: 'h264_nvenc',
    preset: 'p4',
    quality: Object.freeze({ flag: '-cq', value: 26 }),
    rateControl: 'vbr',
    ...SHARED,
});

const HARDWARE_INPUTS = new Set(['2', 'hardware', 'gpu', 'nvenc']);

/** Anything not recognised as hardware falls back to software. */
export function parseEncodeMode(input: string | undefined | null): EncodeMode {
    const v = (input ?? '').trim().toLowerCase();
    return HARDWARE_INPUTS.has(v) ? 'hardware' : 'software';
}

export function selectProfile(input: string | undefined | null): EncodingProfile {
    return parseEncodeMode(input) === 'hardware' ? HARDWARE_PROFILE : SOFTWARE_PROFILE;
}

export function profileArgs(profile: EncodingProfile): string[] {
    const args = [
        '-c:v',
        profile.videoCodec,
        '-preset',
        profile.preset,
        profile.quality.flag,
        String(profile.quality.value),
    ];
    if (profile.rateControl) {
        args.push('-rc', profile.rateControl);
    }
    args.push(
        '-r',
        String(profile.frameRate),
        '-video_track_timescale',
        String(profile.videoTrackTimescale),
        '-c:a',
        profile.audioCodec,
        '-ar',
        String(profile.audioSampleRate),
        '-ac',
        String(profile.audioChannels),
        '-b:a',
        profile.audioBitrate
    );
    return args;
}
