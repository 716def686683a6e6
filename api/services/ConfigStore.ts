import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import type { AppConfig, Destination, DestinationRecord } from '../types/index.js';
import { ConfigError, withCause } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const CONFIG_FILENAME = 'config.json';

const logger = createLogger('config');

export const DestinationRecordSchema = z.object({
    name: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).default(22),
    username: z.string().min(1),
    remote_path: z.string().min(1),
    password: z.string().optional(),
});

export const AppConfigSchema = z.object({
    ssh_key_path: z.string(),
    destinations: z.array(DestinationRecordSchema),
});

export function defaultConfigDir(): string {
    const fromEnv = process.env.SFTP_FANOUT_CONFIG_DIR;
    if (fromEnv && fromEnv.trim() !== '') {
        return fromEnv;
    }
    return path.join(os.homedir(), '.config', 'sftp-fanout');
}

export function toDestination(record: DestinationRecord): Destination {
    return {
        name: record.name,
        host: record.host,
        port: record.port,
        username: record.username,
        remotePath: record.remote_path,
        credential: record.password !== undefined
            ? { type: 'password', password: record.password }
            : { type: 'privateKey' },
    };
}

export function toRecord(destination: Destination): DestinationRecord {
    const record: DestinationRecord = {
        name: destination.name,
        host: destination.host,
        port: destination.port,
        username: destination.username,
        remote_path: destination.remotePath,
    };
    if (destination.credential.type === 'password') {
        record.password = destination.credential.password;
    }
    return record;
}

export class ConfigStore {
    private readonly dir: string;

    constructor(dir: string = defaultConfigDir()) {
        this.dir = dir;
    }

    get path(): string {
        return path.join(this.dir, CONFIG_FILENAME);
    }

    async load(): Promise<AppConfig | null> {
        const configPath = this.path;
        if (!(await fs.pathExists(configPath))) {
            return null;
        }

        let raw: unknown;
        try {
            raw = await fs.readJson(configPath);
        } catch (err) {
            throw new ConfigError(withCause(`Failed to read config file ${configPath}`, err), { cause: err });
        }

        const parsed = AppConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid config file ${configPath}: ${issues}`);
        }
        logger.debug(`Loaded ${parsed.data.destinations.length} destination(s) from ${configPath}`);
        return parsed.data;
    }

    async save(config: AppConfig): Promise<void> {
        const configPath = this.path;
        try {
            await fs.ensureDir(this.dir);
            await fs.writeJson(configPath, config, { spaces: 2 });
        } catch (err) {
            throw new ConfigError(withCause(`Failed to write config file ${configPath}`, err), { cause: err });
        }
        logger.debug(`Saved config to ${configPath}`);
    }
}
