import type { AppConfig, Destination } from '../types/index.js';
import { toDestination } from '../services/ConfigStore.js';
import { SetupWizard, describeDestination } from '../services/SetupWizard.js';
import { ConsoleProgress, printReport } from '../utils/report.js';
import { type CommandContext, withPrompter } from './context.js';

export interface UploadArgs {
    path: string;
    interactive: boolean;
}

async function loadOrSetup(ctx: CommandContext): Promise<AppConfig> {
    const config = await ctx.store.load();
    if (config) {
        return config;
    }
    ctx.print('No configuration found. Running setup...\n');
    return withPrompter(ctx, prompter => new SetupWizard(ctx.store, prompter, ctx.print).run());
}

async function chooseDestinations(ctx: CommandContext, config: AppConfig, interactive: boolean): Promise<Destination[]> {
    if (!interactive) {
        return config.destinations.map(toDestination);
    }
    const index = await withPrompter(ctx, prompter =>
        prompter.select('Select destination', config.destinations.map(describeDestination), 0)
    );
    return [toDestination(config.destinations[index])];
}

export async function uploadCommand(args: UploadArgs, ctx: CommandContext): Promise<number> {
    const config = await loadOrSetup(ctx);
    if (config.destinations.length === 0) {
        ctx.printError("Error: No destinations configured. Run 'sftp-fanout --setup' to add one.");
        return 1;
    }

    const destinations = await chooseDestinations(ctx, config, args.interactive);
    if (destinations.length > 1) {
        ctx.print(`\n📦 Uploading to ${destinations.length} destinations\n`);
    } else {
        ctx.print(`\n📦 Uploading to ${destinations[0].name} (${destinations[0].host})\n`);
    }

    const report = await ctx.fanout.run(destinations, args.path, {
        sshKeyPath: config.ssh_key_path,
        observer: new ConsoleProgress(ctx.print),
    });
    return printReport(report, ctx.print, ctx.printError);
}
