import type { TransferClient } from './TransferClient.js';
import { SftpClientAdapter } from './SftpClientAdapter.js';

export type ClientFactory = () => TransferClient;

export class TransferClientFactory {
    static createClient(): TransferClient {
        return new SftpClientAdapter();
    }
}
