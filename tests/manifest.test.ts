import { describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  createManifestEntry,
  formatManifestLine,
  renderManifest,
  toPosixAbsolute,
  writeManifest,
} from '../src/pipeline/manifest';

describe('manifest', () => {
  it('formats a concat-demuxer line', () => {
    expect(formatManifestLine({ sourcePath: '/in/a.mp4', normalizedPath: '/tmp/s/processed_0000.mp4' })).toBe(
      "file '/tmp/s/processed_0000.mp4'"
    );
  });

  it('escapes single quotes the way the demuxer reads them', () => {
    expect(formatManifestLine({ sourcePath: 'x', normalizedPath: "/tmp/it's/a.mp4" })).toBe(
      "file '/tmp/it'\\''s/a.mp4'"
    );
  });

  it('stores absolute forward-slash paths', () => {
    expect(toPosixAbsolute('/data\\clips\\a.mp4')).toBe('/data/clips/a.mp4');
    expect(createManifestEntry('/in/a.mp4', 'scratch/processed_0000.mp4')).toEqual({
      sourcePath: '/in/a.mp4',
      normalizedPath: path.resolve('scratch/processed_0000.mp4'),
    });
  });

  it('joins lines in insertion order without a trailing newline', () => {
    const entries = [
      { sourcePath: '/in/c.mkv', normalizedPath: '/s/processed_0000.mp4' },
      { sourcePath: '/in/a.mp4', normalizedPath: '/s/processed_0001.mp4' },
    ];
    expect(renderManifest(entries)).toBe("file '/s/processed_0000.mp4'\nfile '/s/processed_0001.mp4'");
    expect(renderManifest([])).toBe('');
  });

  it('writes the list file as UTF-8', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reelmerge-manifest-'));
    try {
      const listPath = path.join(dir, 'nested', 'file_list.txt');
      const entries = [{ sourcePath: '/in/é.mp4', normalizedPath: '/s/clipé.mp4' }];
      expect(await writeManifest(entries, listPath)).toBe(listPath);
      expect(await fs.readFile(listPath, 'utf8')).toBe("file '/s/clipé.mp4'");
    } finally {
      await fs.remove(dir);
    }
  });
});
