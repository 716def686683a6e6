import fs from 'fs-extra';
import path from 'path';
import type { TransferTask } from '../types/index.js';
import { LocalIOError, PathError, withCause } from '../utils/errors.js';

export interface UploadRoot {
    kind: 'file' | 'directory';
    /** Absolute path of the root. */
    path: string;
    /** Base name of the root, kept as the top-level remote directory for directory uploads. */
    name: string;
}

export interface LocalEntry {
    localPath: string;
    relativePath: string;
}

/**
 * Fails with a PathError unless `rootPath` is an existing regular file or
 * directory. Runs before any connection is opened.
 */
export async function inspectUploadRoot(rootPath: string): Promise<UploadRoot> {
    const absolute = path.resolve(rootPath);
    const stats = await fs.stat(absolute).catch((err: unknown) => {
        throw new PathError(withCause(`Path does not exist: ${rootPath}`, err), { cause: err });
    });

    if (stats.isFile()) {
        return { kind: 'file', path: absolute, name: path.basename(absolute) };
    }
    if (stats.isDirectory()) {
        return { kind: 'directory', path: absolute, name: path.basename(absolute) };
    }
    throw new PathError(`Not a regular file or directory: ${rootPath}`);
}

async function collectFiles(root: string, dir: string, out: LocalEntry[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
        throw new LocalIOError(withCause(`Failed to read directory: ${dir}`, err), { cause: err });
    });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        const localPath = path.join(dir, entry.name);
        // Symbolic links are never followed or uploaded.
        if (entry.isDirectory()) {
            await collectFiles(root, localPath, out);
        } else if (entry.isFile()) {
            out.push({
                localPath,
                relativePath: path.relative(root, localPath).split(path.sep).join(path.posix.sep),
            });
        }
    }
}

/**
 * Lists the files under an upload root in a stable order: directory entries
 * sorted by name, depth first.
 */
export async function walkUploadRoot(root: UploadRoot): Promise<LocalEntry[]> {
    if (root.kind === 'file') {
        return [{ localPath: root.path, relativePath: root.name }];
    }
    const out: LocalEntry[] = [];
    await collectFiles(root.path, root.path, out);
    return out;
}

/**
 * A single file lands directly in `remoteBase`; a directory keeps its own name
 * one level down: `<remoteBase>/<root name>/<relative path>`.
 */
export function planTransferTasks(root: UploadRoot, entries: LocalEntry[], remoteBase: string): TransferTask[] {
    const base = root.kind === 'file' ? remoteBase : path.posix.join(remoteBase, root.name);
    return entries.map(entry => ({
        localPath: entry.localPath,
        relativePath: entry.relativePath,
        remotePath: path.posix.join(base, entry.relativePath),
    }));
}
