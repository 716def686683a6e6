import path from 'path';
import { performance } from 'perf_hooks';
import type { Destination, TransferObserver, TransferStats, TransferSummary } from '../types/index.js';
import type { TransferClient } from './transfer/TransferClient.js';
import { TransferClientFactory, type ClientFactory } from './transfer/TransferClientFactory.js';
import { openSession } from './SessionAuthenticator.js';
import { RemotePathResolver } from './RemotePathResolver.js';
import { streamFile, CHUNK_SIZE } from './FileStreamer.js';
import { inspectUploadRoot, planTransferTasks, walkUploadRoot } from './TreeWalker.js';
import { isTransferError, withCause } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('transfer');

export interface TransferOptions {
    /** Private key used by every destination without a password. */
    sshKeyPath?: string;
    observer?: TransferObserver;
    readyTimeout?: number;
    chunkSize?: number;
}

/**
 * Uploads one local file or directory tree to a single destination over one
 * session. Files go strictly one after another, in walk order.
 */
export class TransferService {
    constructor(private createClient: ClientFactory = TransferClientFactory.createClient) { }

    public async transfer(destination: Destination, localPath: string, options: TransferOptions = {}): Promise<TransferStats> {
        const startTime = performance.now();
        try {
            return await this.run(destination, localPath, options, startTime);
        } catch (err) {
            if (isTransferError(err) && !err.destination) {
                err.destination = destination.name;
            }
            throw err;
        }
    }

    private async run(destination: Destination, localPath: string, options: TransferOptions, startTime: number): Promise<TransferStats> {
        const { observer } = options;
        const root = await inspectUploadRoot(localPath);

        const client = await openSession(destination, {
            createClient: this.createClient,
            sshKeyPath: options.sshKeyPath,
            readyTimeout: options.readyTimeout,
        });

        let totalBytes = 0;
        try {
            const entries = await walkUploadRoot(root);
            const tasks = planTransferTasks(root, entries, destination.remotePath);
            const resolver = new RemotePathResolver(client);
            logger.debug(`${destination.name}: ${tasks.length} file(s) to upload`);

            for (const [index, task] of tasks.entries()) {
                observer?.onFileStart?.(destination.name, task, index + 1, tasks.length);
                await resolver.ensureDir(path.posix.dirname(task.remotePath));
                const bytes = await streamFile(client, task.localPath, task.remotePath, options.chunkSize ?? CHUNK_SIZE);
                totalBytes += bytes;
                observer?.onFileComplete?.(destination.name, task, bytes);
            }

            const summary: TransferSummary = root.kind === 'file'
                ? { kind: 'file', fileName: root.name }
                : { kind: 'directory', fileCount: tasks.length };
            observer?.onComplete?.(destination.name, summary);
        } finally {
            await this.closeSession(client, destination.name);
        }

        return {
            bytesTransferred: totalBytes,
            durationSecs: (performance.now() - startTime) / 1000,
        };
    }

    private async closeSession(client: TransferClient, name: string): Promise<void> {
        try {
            await client.close();
        } catch (err) {
            logger.warn(withCause(`Failed to close session to ${name}`, err));
        }
    }
}
