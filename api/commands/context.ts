import type { ConfigStore } from '../services/ConfigStore.js';
import type { FanoutService } from '../services/FanoutService.js';
import type { Prompter } from '../utils/Prompter.js';

export interface CommandContext {
    store: ConfigStore;
    fanout: FanoutService;
    /** Called lazily so non-interactive runs never touch stdin. */
    openPrompter: () => Prompter;
    print: (line: string) => void;
    printError: (line: string) => void;
}

export async function withPrompter<T>(ctx: CommandContext, fn: (prompter: Prompter) => Promise<T>): Promise<T> {
    const prompter = ctx.openPrompter();
    try {
        return await fn(prompter);
    } finally {
        prompter.close();
    }
}
