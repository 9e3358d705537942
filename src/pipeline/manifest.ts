import fs from 'fs-extra';
import path from 'path';
import type { ManifestEntry } from './types';

export function toPosixAbsolute(p: string): string {
    return path.resolve(p).replace(/\\/g, '/');
}

export function createManifestEntry(sourcePath: string, normalizedPath: string): ManifestEntry {
    return { sourcePath, normalizedPath: toPosixAbsolute(normalizedPath) };
}

/**
 * One concat-demuxer line. Inside single quotes the demuxer only
 * understands `'\''` for a literal quote.
 */
export function formatManifestLine(entry: ManifestEntry): string {
    return `file '${entry.normalizedPath.replace(/'/g, "'\\''")}'`;
}

export function renderManifest(entries: readonly ManifestEntry[]): string {
    return entries.map(formatManifestLine).join('\n');
}

export async function writeManifest(
    entries: readonly ManifestEntry[],
    listPath: string
): Promise<string> {
    await fs.outputFile(listPath, renderManifest(entries), 'utf8');
    return listPath;
}
