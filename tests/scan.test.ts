import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { createConfig } from '../src/pipeline/env';
import { discoverClips } from '../src/pipeline/scan';
import { makeWorkspace } from './helpers/fakeEngine';

const DEFAULT_EXTS = ['mp4', 'mov', 'avi', 'mkv', 'flv', 'ts'];
let cleanup: (() => Promise<void>) | null = null;

afterEach(async () => {
  if (cleanup) await cleanup();
  cleanup = null;
});

describe('discoverClips', () => {
  it('orders by extension list, then by name, matching case-insensitively', async () => {
    const ws = await makeWorkspace(['b.mp4', 'a.mp4', 'c.MOV', 'd.mkv', 'e.ts', 'notes.txt', 'noext']);
    cleanup = ws.cleanup;
    const config = createConfig({
      inputDir: ws.inputDir,
      scratchDir: ws.scratchDir,
      outputFile: ws.outputFile,
      extensions: DEFAULT_EXTS,
    });

    const found = await discoverClips(config);
    expect(found).toEqual(['a.mp4', 'b.mp4', 'c.MOV', 'd.mkv', 'e.ts'].map((f) => path.join(ws.inputDir, f)));
  });

  it('follows a custom extension order', async () => {
    const ws = await makeWorkspace(['a.mp4', 'b.mkv', 'c.avi']);
    cleanup = ws.cleanup;
    const config = createConfig({
      inputDir: ws.inputDir,
      scratchDir: ws.scratchDir,
      outputFile: ws.outputFile,
      extensions: ['mkv', '.MP4'],
    });

    expect(await discoverClips(config)).toEqual([path.join(ws.inputDir, 'b.mkv'), path.join(ws.inputDir, 'a.mp4')]);
  });

  it('skips the merged output and directories', async () => {
    const ws = await makeWorkspace(['clip.mp4', 'final_merged_video.mp4']);
    cleanup = ws.cleanup;
    await fs.ensureDir(path.join(ws.inputDir, 'folder.mp4'));
    const config = createConfig({
      inputDir: ws.inputDir,
      scratchDir: ws.scratchDir,
      outputFile: path.join(ws.inputDir, 'final_merged_video.mp4'),
      extensions: DEFAULT_EXTS,
    });

    expect(await discoverClips(config)).toEqual([path.join(ws.inputDir, 'clip.mp4')]);
  });

  it('includes symlinked clips but not dangling or directory links', async () => {
    const ws = await makeWorkspace(['b.mp4']);
    cleanup = ws.cleanup;
    const real = path.join(ws.root, 'real.mp4');
    await fs.writeFile(real, 'video');
    await fs.symlink(real, path.join(ws.inputDir, 'a.mp4'));
    await fs.symlink(path.join(ws.root, 'gone.mp4'), path.join(ws.inputDir, 'c.mp4'));
    await fs.ensureDir(path.join(ws.root, 'clips'));
    await fs.symlink(path.join(ws.root, 'clips'), path.join(ws.inputDir, 'd.mp4'));
    const config = createConfig({
      inputDir: ws.inputDir,
      scratchDir: ws.scratchDir,
      outputFile: ws.outputFile,
      extensions: DEFAULT_EXTS,
    });

    expect(await discoverClips(config)).toEqual([path.join(ws.inputDir, 'a.mp4'), path.join(ws.inputDir, 'b.mp4')]);
  });

  it('returns nothing for a missing input directory', async () => {
    const ws = await makeWorkspace([]);
    cleanup = ws.cleanup;
    const config = createConfig({
      inputDir: path.join(ws.root, 'absent'),
      scratchDir: ws.scratchDir,
      outputFile: ws.outputFile,
    });

    expect(await discoverClips(config)).toEqual([]);
  });
});
