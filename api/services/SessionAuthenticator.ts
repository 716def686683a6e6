import fs from 'fs-extra';
import type { Destination } from '../types/index.js';
import type { AuthOptions, TransferClient } from './transfer/TransferClient.js';
import type { ClientFactory } from './transfer/TransferClientFactory.js';
import { AuthError, withCause } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('auth');

export interface SessionOptions {
    createClient: ClientFactory;
    /** Private key file, read only when the destination uses key auth. */
    sshKeyPath?: string;
    readyTimeout?: number;
}

async function resolveAuth(destination: Destination, sshKeyPath: string | undefined): Promise<AuthOptions> {
    const credential = destination.credential;
    switch (credential.type) {
        case 'password':
            return { method: 'password', password: credential.password };
        case 'privateKey': {
            if (!sshKeyPath) {
                throw new AuthError('SSH key authentication failed: no private key path configured');
            }
            try {
                return { method: 'publickey', privateKey: await fs.readFile(sshKeyPath) };
            } catch (err) {
                throw new AuthError(withCause(`SSH key authentication failed: cannot read ${sshKeyPath}`, err), { cause: err });
            }
        }
    }
}

/**
 * Opens an authenticated session to one destination. Every step is a hard
 * failure; the client is closed before the error propagates.
 */
export async function openSession(destination: Destination, options: SessionOptions): Promise<TransferClient> {
    const client = options.createClient();
    try {
        const auth = await resolveAuth(destination, options.sshKeyPath);
        logger.debug(`Authenticating ${destination.username}@${destination.host} with ${auth.method}`);

        await client.connect({
            host: destination.host,
            port: destination.port,
            username: destination.username,
            auth,
            readyTimeout: options.readyTimeout,
        });

        // Some backends resolve the auth call yet leave the session unauthenticated.
        if (!client.authenticated) {
            throw new AuthError('Authentication failed');
        }
    } catch (err) {
        if (!client.closed) {
            await client.close();
        }
        throw err;
    }

    logger.debug(`Authenticated to ${destination.name}`);
    return client;
}
