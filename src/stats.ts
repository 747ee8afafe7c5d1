import type { TransferTask } from './downloader';
import type { TransferReport } from './scheduler';

export interface RunStats {
    total: number;
    success: number;
    failed: number;
    skipped: number;
    bytesWritten: number;
}

export interface SkippedTask {
    task: TransferTask;
    reason: string;
}

/**
 * Single point where a run's counters change. One aggregator per run; the
 * counters only ever grow.
 */
export class RunAggregator {
    private readonly stats: RunStats = {
        total: 0,
        success: 0,
        failed: 0,
        skipped: 0,
        bytesWritten: 0,
    };
    private readonly skippedTasks: SkippedTask[] = [];

    record({ outcome }: TransferReport): void {
        this.stats.total++;
        if (outcome.kind === 'failed') {
            this.stats.failed++;
            return;
        }
        this.stats.success++;
        this.stats.bytesWritten += outcome.bytesWritten;
    }

    skip(task: TransferTask, reason: string): void {
        this.stats.total++;
        this.stats.skipped++;
        this.skippedTasks.push({ task, reason });
    }

    snapshot(): Readonly<RunStats> {
        return Object.freeze({ ...this.stats });
    }

    skips(): readonly SkippedTask[] {
        return this.skippedTasks;
    }

    hasFailures(): boolean {
        return this.stats.failed > 0;
    }
}
