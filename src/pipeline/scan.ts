import fs from 'fs-extra';
import path from 'path';
import type { RunConfig } from './env';
import { debug } from './log';

function extensionOf(name: string): string {
    return path.extname(name).replace(/^\./, '').toLowerCase();
}

// Dangling links and links to directories are not clips.
async function isLinkedFile(linkPath: string): Promise<boolean> {
    try {
        return (await fs.stat(linkPath)).isFile();
    } catch {
        return false;
    }
}

/**
 * Candidate inputs in the order they will be processed: grouped by the
 * configured extension order, by file name within a group. The merged
 * output itself is never a candidate, so reruns in place don't eat it.
 */
export async function discoverClips(config: RunConfig): Promise<string[]> {
    if (!(await fs.pathExists(config.inputDir))) {
        return [];
    }
    const entries = await fs.readdir(config.inputDir, { withFileTypes: true });
    const names: string[] = [];
    for (const e of entries) {
        if (e.isFile() || (e.isSymbolicLink() && (await isLinkedFile(path.join(config.inputDir, e.name))))) {
            names.push(e.name);
        }
    }
    names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const found: string[] = [];
    for (const ext of config.extensions) {
        for (const name of names) {
            if (extensionOf(name) !== ext) continue;
            const abs = path.resolve(config.inputDir, name);
            if (abs === config.outputFile) {
                debug('scan.skipOutput', { file: abs });
                continue;
            }
            found.push(abs);
        }
    }
    return found;
}
