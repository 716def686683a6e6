import path from 'path';
import type { TransferClient } from './transfer/TransferClient.js';
import { RemoteDirError, withCause } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export const REMOTE_DIR_MODE = 0o755;

const logger = createLogger('remote-dir');

function isFloor(dir: string): boolean {
    return dir === '/' || dir === '.' || dir === path.posix.dirname(dir);
}

/**
 * Makes sure `dir` and all of its ancestors exist on the remote side.
 * One instance belongs to one session; the set of directories it has seen is
 * only a shortcut and never leaks to another destination.
 */
export class RemotePathResolver {
    private knownDirs: Set<string> = new Set();

    constructor(private client: TransferClient) { }

    async ensureDir(remoteDir: string): Promise<void> {
        const target = path.posix.normalize(remoteDir);
        if (this.knownDirs.has(target)) {
            return;
        }

        // Climb until an existing ancestor (or the root) is found, then create top-down.
        const missing: string[] = [];
        let current = target;
        while (!isFloor(current) && !(await this.exists(current))) {
            missing.push(current);
            current = path.posix.dirname(current);
        }

        for (const dir of missing.reverse()) {
            logger.debug(`Creating directory: ${dir}`);
            try {
                await this.client.mkdir(dir, REMOTE_DIR_MODE);
            } catch (err) {
                // A concurrent session to the same server may have created it first.
                if (!(await this.createdElsewhere(dir))) {
                    throw new RemoteDirError(withCause(`Failed to create remote directory: ${dir}`, err), { cause: err });
                }
            }
            this.knownDirs.add(dir);
        }
        this.knownDirs.add(target);
    }

    private async exists(dir: string): Promise<boolean> {
        if (this.knownDirs.has(dir)) {
            return true;
        }
        const stats = await this.client.stat(dir).catch((err: unknown) => {
            throw new RemoteDirError(withCause(`Failed to inspect remote directory: ${dir}`, err), { cause: err });
        });
        if (stats === null) {
            return false;
        }
        this.knownDirs.add(dir);
        return true;
    }

    private async createdElsewhere(dir: string): Promise<boolean> {
        try {
            const stats = await this.client.stat(dir);
            return stats !== null && stats.isDirectory;
        } catch (err) {
            logger.debug(withCause(`Re-checking ${dir} after a failed mkdir`, err));
            return false;
        }
    }
}
