import { describe, it, expect, vi } from 'vitest';
import { createConfig } from '../src/pipeline/env';
import { normalizeClip, transcodeArgs } from '../src/pipeline/normalize';
import { HARDWARE_PROFILE, profileArgs, SOFTWARE_PROFILE } from '../src/pipeline/profiles';
import type { CommandOutcome } from '../src/pipeline/types';

const config = createConfig({ ffprobeBin: 'ffprobe', ffmpegBin: 'ffmpeg', width: 1920, height: 1080 });
const SCALE_PAD =
  'scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2,setsar=1';

function scripted(probe: Partial<CommandOutcome>, encode: Partial<CommandOutcome> = {}) {
  const run = vi.fn(async (command: string, args: readonly string[]) => ({
    command,
    args,
    exitCode: 0,
    stdout: '',
    stderr: '',
    ok: true,
    ...(command === 'ffprobe' ? probe : encode),
  }));
  return { run };
}

describe('normalizeClip', () => {
  it('rotates and encodes a portrait clip in one ffmpeg call', async () => {
    const deps = scripted({ stdout: '1080x1920\n' });
    const result = await normalizeClip('/in/phone.mov', '/tmp/s/processed_0000.mp4', SOFTWARE_PROFILE, config, deps);

    expect(result).toEqual({
      ok: true,
      sourcePath: '/in/phone.mov',
      outputPath: '/tmp/s/processed_0000.mp4',
      dimensions: { width: 1080, height: 1920 },
      filters: ['transpose=2', SCALE_PAD],
    });
    expect(deps.run).toHaveBeenCalledTimes(2);
    expect(deps.run.mock.calls[1]).toEqual([
      'ffmpeg',
      [
        '-hide_banner',
        '-loglevel',
        'error',
        '-nostdin',
        '-y',
        '-i',
        '/in/phone.mov',
        '-vf',
        `transpose=2,${SCALE_PAD}`,
        ...profileArgs(SOFTWARE_PROFILE),
        '/tmp/s/processed_0000.mp4',
      ],
    ]);
  });

  it('passes the hardware profile through', async () => {
    const deps = scripted({ stdout: '1280x720' });
    await normalizeClip('/in/a.mp4', '/tmp/s/out.mp4', HARDWARE_PROFILE, config, deps);
    const args = deps.run.mock.calls[1][1];
    expect(args).toEqual(transcodeArgs('/in/a.mp4', '/tmp/s/out.mp4', [SCALE_PAD], HARDWARE_PROFILE));
    expect(args.slice(args.indexOf('-c:v'), args.indexOf('-c:v') + 2)).toEqual(['-c:v', 'h264_nvenc']);
  });

  it('never runs ffmpeg when the probe fails', async () => {
    const deps = scripted({ exitCode: 1, ok: false, stderr: 'Invalid data found when processing input' });
    const result = await normalizeClip('/in/broken.mp4', '/tmp/s/out.mp4', SOFTWARE_PROFILE, config, deps);

    expect(result).toEqual({
      ok: false,
      sourcePath: '/in/broken.mp4',
      outputPath: '/tmp/s/out.mp4',
      stage: 'probe',
      reason: 'ffprobe exited with code 1: Invalid data found when processing input',
    });
    expect(deps.run).toHaveBeenCalledTimes(1);
  });

  it('reports a failed encode without throwing', async () => {
    const deps = scripted({ stdout: '1920x1080' }, { exitCode: 1, ok: false, stderr: 'Conversion failed!\n' });
    const result = await normalizeClip('/in/a.mkv', '/tmp/s/out.mp4', HARDWARE_PROFILE, config, deps);

    expect(result).toEqual({
      ok: false,
      sourcePath: '/in/a.mkv',
      outputPath: '/tmp/s/out.mp4',
      stage: 'transcode',
      reason: 'ffmpeg exited with code 1: Conversion failed!',
    });
  });
});
