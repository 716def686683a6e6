import PQueue from 'p-queue';
import type { Destination, TransferStats } from '../types/index.js';
import { TransferService, type TransferOptions } from './TransferService.js';
import { toTransferError, type TransferError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('fanout');

export interface DestinationSuccess {
    destination: string;
    stats: TransferStats;
}

export interface DestinationFailure {
    destination: string;
    error: TransferError;
}

export interface FanoutReport {
    successes: DestinationSuccess[];
    failures: DestinationFailure[];
    /** True only when every destination succeeded. */
    ok: boolean;
}

/**
 * Runs one transfer per destination, all at once, and waits for every one of
 * them to settle. A failing destination never stops the others.
 */
export class FanoutService {
    constructor(private transferService: TransferService = new TransferService()) { }

    public async run(destinations: readonly Destination[], localPath: string, options: TransferOptions = {}): Promise<FanoutReport> {
        const queue = new PQueue({ concurrency: Math.max(1, destinations.length) });

        const settled = await Promise.allSettled(
            destinations.map(destination =>
                queue.add(async () => {
                    const stats = await this.transferService.transfer(destination, localPath, options);
                    options.observer?.onDestinationComplete?.(destination.name, stats);
                    return stats;
                }, { throwOnTimeout: true })
            )
        );

        const successes: DestinationSuccess[] = [];
        const failures: DestinationFailure[] = [];

        settled.forEach((result, index) => {
            const destination = destinations[index].name;
            if (result.status === 'fulfilled') {
                logger.debug(`Completed upload to ${destination}`);
                successes.push({ destination, stats: result.value });
            } else {
                const error = toTransferError(result.reason, destination);
                logger.info(`Upload to ${destination} failed: ${error.message}`);
                failures.push({ destination, error });
            }
        });

        return { successes, failures, ok: failures.length === 0 };
    }
}
