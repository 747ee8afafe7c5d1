import type { Logger } from 'pino';
import type { TransferOutcome, TransferTask } from './downloader';
import { describeError } from './errors';

export type TransferFn = (task: TransferTask, signal?: AbortSignal) => Promise<TransferOutcome>;

export interface TransferReport {
    task: TransferTask;
    outcome: TransferOutcome;
}

export interface SchedulerRunOptions {
    maxWorkers: number;
    signal?: AbortSignal;
    // Called once per task, in completion order
    onOutcome?: (report: TransferReport) => void;
}

/**
 * Bounded pool of workers pulling transfers from a shared queue. Tasks are
 * admitted in submission order and reported as they finish.
 */
export class DownloadScheduler {
    constructor(
        private readonly transfer: TransferFn,
        private readonly logger: Logger,
    ) { }

    async run(tasks: readonly TransferTask[], options: SchedulerRunOptions): Promise<TransferReport[]> {
        const { maxWorkers, signal, onOutcome } = options;
        if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
            throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
        }

        const reports: TransferReport[] = [];
        let cursor = 0;

        const report = (task: TransferTask, outcome: TransferOutcome): void => {
            const entry = { task, outcome };
            reports.push(entry);
            onOutcome?.(entry);
        };

        const worker = async (): Promise<void> => {
            while (cursor < tasks.length) {
                const task = tasks[cursor++];

                if (signal?.aborted) {
                    report(task, { kind: 'failed', reason: 'cancelled before start', category: 'cancelled' });
                    continue;
                }

                report(task, await this.runOne(task, signal));
            }
        };

        const workerCount = Math.min(maxWorkers, tasks.length);
        this.logger.debug(`Scheduling ${tasks.length} transfers on ${workerCount} workers`);
        await Promise.all(Array.from({ length: workerCount }, () => worker()));

        return reports;
    }

    private async runOne(task: TransferTask, signal?: AbortSignal): Promise<TransferOutcome> {
        try {
            return await this.transfer(task, signal);
        } catch (error) {
            const reason = describeError(error);
            this.logger.error(`Exception during download of ${task.localPath}: ${reason}`);
            return { kind: 'failed', reason, category: 'local-io' };
        }
    }
}
