import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { AppConfig, DestinationRecord } from '../types/index.js';
import type { Prompter } from '../utils/Prompter.js';
import type { ConfigStore } from './ConfigStore.js';
import { ConfigError } from '../utils/errors.js';

type Print = (line: string) => void;

const MENU = [
    'Add a new destination',
    'Edit an existing destination',
    'Delete a destination',
    'Start fresh (delete all and reconfigure)',
    'Cancel',
] as const;

export function describeDestination(record: DestinationRecord): string {
    return `${record.name} (${record.host})`;
}

/**
 * Interactive creation and editing of the stored configuration. All input goes
 * through a Prompter so the flow can be scripted.
 */
export class SetupWizard {
    constructor(
        private store: ConfigStore,
        private prompter: Prompter,
        private print: Print = line => console.log(line),
    ) { }

    async run(): Promise<AppConfig> {
        const existing = await this.store.load();
        if (!existing) {
            return this.setupFresh();
        }

        this.print('\n⚠️  Configuration already exists!\n');
        const choice = await this.prompter.select('What would you like to do?', MENU, 0);
        switch (choice) {
            case 0:
                return this.addDestination(existing);
            case 1:
                return this.editDestination(existing);
            case 2:
                return this.deleteDestination(existing);
            case 3: {
                const confirmed = await this.prompter.confirm('⚠️  This will delete all your existing settings. Are you sure?', false);
                if (confirmed) {
                    return this.setupFresh();
                }
                this.print('\nCancelled.\n');
                return existing;
            }
            default:
                this.print('\nCancelled.\n');
                return existing;
        }
    }

    async setupFresh(): Promise<AppConfig> {
        this.print("\n🚀 Welcome to sftp-fanout! Let's get you set up.\n");

        const sshKeyPath = await this.askKeyPath();
        this.print(`\n✓ SSH key configured: ${sshKeyPath}\n`);

        const destinations: DestinationRecord[] = [];
        for (;;) {
            this.print('Setting up a remote destination...\n');
            destinations.push(await this.askDestination());
            if (!(await this.prompter.confirm('Add another destination?', false))) {
                break;
            }
            this.print('');
        }

        const config: AppConfig = { ssh_key_path: sshKeyPath, destinations };
        await this.store.save(config);
        this.print('\n✓ Configuration saved! You are ready to upload.\n');
        return config;
    }

    private async addDestination(config: AppConfig): Promise<AppConfig> {
        this.print('\n📦 Adding a new destination...\n');
        const updated: AppConfig = {
            ...config,
            destinations: [...config.destinations, await this.askDestination()],
        };
        await this.store.save(updated);
        this.print('\n✓ Destination added!\n');
        return updated;
    }

    private async editDestination(config: AppConfig): Promise<AppConfig> {
        if (config.destinations.length === 0) {
            this.print('\nNo destinations configured.\n');
            return config;
        }
        const index = await this.prompter.select(
            'Select destination to edit',
            config.destinations.map(describeDestination),
            0,
        );
        this.print(`\n📝 Editing ${config.destinations[index].name}...\n`);

        const replacement = await this.askDestination();
        const updated: AppConfig = {
            ...config,
            destinations: config.destinations.map((d, i) => (i === index ? replacement : d)),
        };
        await this.store.save(updated);
        this.print('\n✓ Destination updated!\n');
        return updated;
    }

    private async deleteDestination(config: AppConfig): Promise<AppConfig> {
        if (config.destinations.length === 0) {
            this.print('\nNo destinations configured.\n');
            return config;
        }
        const index = await this.prompter.select(
            'Select destination to delete',
            config.destinations.map(describeDestination),
            0,
        );
        const name = config.destinations[index].name;

        if (!(await this.prompter.confirm(`Delete '${name}'?`, false))) {
            this.print('\nCancelled.\n');
            return config;
        }
        const updated: AppConfig = {
            ...config,
            destinations: config.destinations.filter((_, i) => i !== index),
        };
        await this.store.save(updated);
        this.print(`\n✓ Destination '${name}' deleted!\n`);
        return updated;
    }

    private async askKeyPath(): Promise<string> {
        const defaultKey = path.join(os.homedir(), '.ssh', 'id_ed25519');
        const keyPath = await this.prompter.input('Path to your SSH private key', defaultKey);
        if (!(await fs.pathExists(keyPath))) {
            throw new ConfigError(`SSH key not found at: ${keyPath}`);
        }
        return keyPath;
    }

    private async askDestination(): Promise<DestinationRecord> {
        const name = await this.prompter.input('Name for this connection');
        const host = await this.prompter.input('Server address (e.g., example.com or 192.168.1.1)');
        const port = await this.askPort();
        const username = await this.prompter.input('Username');
        const remotePath = await this.prompter.input('Remote folder path (e.g., /home/user/uploads)');

        const record: DestinationRecord = { name, host, port, username, remote_path: remotePath };
        if (await this.prompter.confirm('Use password authentication? (otherwise SSH key will be used)', false)) {
            record.password = await this.prompter.password('Password');
        }
        return record;
    }

    private async askPort(): Promise<number> {
        for (;;) {
            const answer = await this.prompter.input('SSH port', '22');
            const port = Number(answer);
            if (Number.isInteger(port) && port >= 1 && port <= 65535) {
                return port;
            }
            this.print(`Invalid port: ${answer}`);
        }
    }
}
