import fs from 'fs-extra';
import type { RemoteFileWriter, TransferClient } from './transfer/TransferClient.js';
import { LocalIOError, RemoteIOError, withCause } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export const CHUNK_SIZE = 256 * 1024;

const logger = createLogger('streamer');

async function openRemote(client: TransferClient, remotePath: string): Promise<RemoteFileWriter> {
    try {
        return await client.openWrite(remotePath);
    } catch (err) {
        throw new RemoteIOError(withCause(`Failed to create remote file: ${remotePath}`, err), remotePath, { cause: err });
    }
}

async function pump(fd: number, writer: RemoteFileWriter, localPath: string, remotePath: string, chunkSize: number): Promise<number> {
    const buffer = Buffer.alloc(chunkSize);
    let total = 0;

    for (;;) {
        let bytesRead: number;
        try {
            ({ bytesRead } = await fs.read(fd, buffer, 0, chunkSize, null));
        } catch (err) {
            throw new LocalIOError(withCause(`Failed to read local file: ${localPath}`, err), { cause: err });
        }
        if (bytesRead === 0) {
            return total;
        }

        // The buffer is reused, so each chunk must be fully written before the next read.
        const chunk = buffer.subarray(0, bytesRead);
        let written: number;
        try {
            written = await writer.write(chunk);
        } catch (err) {
            throw new RemoteIOError(withCause(`Failed to write to remote file: ${remotePath}`, err), remotePath, { cause: err });
        }
        if (written !== bytesRead) {
            throw new RemoteIOError(`Short write to remote file: ${remotePath} (${written} of ${bytesRead} bytes)`, remotePath);
        }
        total += bytesRead;
    }
}

/**
 * Copies one local file to `remotePath`, whose parent directory must already
 * exist. Resolves with the number of bytes copied.
 */
export async function streamFile(
    client: TransferClient,
    localPath: string,
    remotePath: string,
    chunkSize: number = CHUNK_SIZE,
): Promise<number> {
    logger.debug(`Uploading: ${localPath} -> ${remotePath}`);

    let fd: number;
    try {
        fd = await fs.open(localPath, 'r');
    } catch (err) {
        throw new LocalIOError(withCause(`Failed to open local file: ${localPath}`, err), { cause: err });
    }

    try {
        const writer = await openRemote(client, remotePath);
        let total: number;
        try {
            total = await pump(fd, writer, localPath, remotePath, chunkSize);
        } catch (err) {
            await writer.close().catch((closeErr: unknown) => {
                logger.debug(withCause(`Closing ${remotePath} after a failed upload also failed`, closeErr));
            });
            throw err;
        }

        try {
            await writer.close();
        } catch (err) {
            throw new RemoteIOError(withCause(`Failed to finish remote file: ${remotePath}`, err), remotePath, { cause: err });
        }
        return total;
    } finally {
        await fs.close(fd).catch((closeErr: unknown) => {
            logger.debug(withCause(`Failed to close local file: ${localPath}`, closeErr));
        });
    }
}
