import type { TransferObserver, TransferStats, TransferSummary, TransferTask } from '../types/index.js';
import type { DestinationFailure, FanoutReport } from '../services/FanoutService.js';

const MIB = 1024 * 1024;

type Print = (line: string) => void;

export function formatStats(name: string, stats: TransferStats): string {
    const mb = stats.bytesTransferred / MIB;
    const speed = stats.durationSecs > 0 ? mb / stats.durationSecs : 0;
    return `📊 ${name}: ${mb.toFixed(2)} MB in ${stats.durationSecs.toFixed(1)}s (${speed.toFixed(2)} MB/s)`;
}

export function formatFailure(failure: DestinationFailure): string {
    return `${failure.destination}: [${failure.error.code}] ${failure.error.message}`;
}

/**
 * Prints the outcome of a run. Errors go to `printError`; the return value is
 * the process exit code.
 */
export function printReport(report: FanoutReport, print: Print, printError: Print): number {
    if (!report.ok) {
        for (const success of report.successes) {
            print(formatStats(success.destination, success.stats));
        }
        printError('\n❌ Errors occurred:');
        for (const failure of report.failures) {
            printError(`  ${formatFailure(failure)}`);
        }
        return 1;
    }

    print('');
    for (const success of report.successes) {
        print(formatStats(success.destination, success.stats));
    }
    print('\n✨ Done!\n');
    return 0;
}

/** Line-per-event progress for terminals, one prefix per destination. */
export class ConsoleProgress implements TransferObserver {
    constructor(private print: Print = line => console.log(line)) { }

    onFileStart(destination: string, task: TransferTask, index: number, total: number): void {
        this.print(`[${destination}] Uploading ${task.relativePath} (${index}/${total})`);
    }

    onComplete(destination: string, summary: TransferSummary): void {
        const what = summary.kind === 'file' ? summary.fileName : `${summary.fileCount} files`;
        this.print(`[${destination}] ✓ Uploaded ${what}`);
    }

    onDestinationComplete(destination: string): void {
        this.print(`✓ Completed upload to ${destination}`);
    }
}
