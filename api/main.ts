import yargs from 'yargs';
import { ConfigStore } from './services/ConfigStore.js';
import { FanoutService } from './services/FanoutService.js';
import { ReadlinePrompter } from './utils/Prompter.js';
import { setLogLevel } from './utils/logger.js';
import type { CommandContext } from './commands/context.js';
import { setupCommand } from './commands/setup.js';
import { uploadCommand } from './commands/upload.js';

export const USAGE = `
sftp-fanout - Upload files to remote servers

USAGE:
    sftp-fanout <FILE_OR_FOLDER>    Upload a file or folder
    sftp-fanout --setup             Run setup wizard
    sftp-fanout --help              Show detailed help

EXAMPLES:
    sftp-fanout cool-picture.png              Upload a single file
    sftp-fanout my_files/tuesday/             Upload a folder and its contents
    sftp-fanout document.pdf --interactive    Choose destination interactively

Get started by running: sftp-fanout --setup
`;

export function createContext(): CommandContext {
    return {
        store: new ConfigStore(),
        fanout: new FanoutService(),
        openPrompter: () => new ReadlinePrompter(),
        print: line => console.log(line),
        printError: line => console.error(line),
    };
}

/**
 * Parses `argv` (without the node and script entries) and runs the matching
 * command. Resolves with the process exit code.
 */
export async function main(argv: string[], ctx: CommandContext = createContext()): Promise<number> {
    const args = await yargs(argv)
        .scriptName('sftp-fanout')
        .command('$0 [path]', 'Upload a file or folder to remote servers via SFTP', y =>
            y.positional('path', { type: 'string', describe: 'File or folder to upload' })
        )
        .option('setup', { type: 'boolean', default: false, describe: 'Re-run the setup wizard' })
        .option('interactive', { alias: 'i', type: 'boolean', default: false, describe: 'Select destination interactively' })
        .option('verbose', { alias: 'v', type: 'boolean', default: false, describe: 'Enable verbose logging' })
        .strict()
        .help()
        .parse();

    if (args.verbose) {
        setLogLevel('debug');
    }

    if (args.setup) {
        return setupCommand(ctx);
    }
    const target = typeof args.path === 'string' && args.path !== '' ? args.path : undefined;
    if (!target) {
        ctx.print(USAGE);
        return 0;
    }
    return uploadCommand({ path: target, interactive: args.interactive }, ctx);
}
