import { SetupWizard } from '../services/SetupWizard.js';
import { type CommandContext, withPrompter } from './context.js';

export async function setupCommand(ctx: CommandContext): Promise<number> {
    await withPrompter(ctx, prompter => new SetupWizard(ctx.store, prompter, ctx.print).run());
    return 0;
}
