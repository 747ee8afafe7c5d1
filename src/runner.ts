import fs from 'fs-extra';
import path from 'path';
import type { Logger } from 'pino';
import { setTimeout as sleep } from 'timers/promises';
import { CONFIG, type DataType } from './config';
import type { Downloader, TransferOutcome, TransferTask } from './downloader';
import type { DumpIndexClient, RemoteFile } from './dumps';
import { isAbortError } from './errors';
import { type Period, assertPeriod } from './period';
import { createProgressReporter } from './progress';
import { DownloadScheduler, type TransferReport } from './scheduler';
import { RunAggregator, type RunStats, type SkippedTask } from './stats';

export interface PeriodDownloadOptions {
    resume: boolean;
    maxWorkers: number;
    maxFiles?: number;
    // Extra rounds for transfers that failed with a transient network error
    retries?: number;
    retryDelayMs?: number;
    signal?: AbortSignal;
}

export interface PeriodRunResult {
    period: Period;
    dataType: DataType;
    directory: string;
    stats: Readonly<RunStats>;
    reports: TransferReport[];
    skipped: readonly SkippedTask[];
    hasFailures: boolean;
}

function isHttpUrl(value: string): boolean {
    try {
        const { protocol } = new URL(value);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}

function isRetryable(outcome: TransferOutcome): boolean {
    return outcome.kind === 'failed' && outcome.category === 'network';
}

export class PeriodDownloader {
    private readonly scheduler: DownloadScheduler;

    constructor(
        private readonly index: DumpIndexClient,
        private readonly downloader: Downloader,
        private readonly logger: Logger,
        private readonly outputDir: string,
    ) {
        this.scheduler = new DownloadScheduler(
            (task, signal) => this.downloader.transfer(task, {
                signal,
                onProgress: createProgressReporter(this.logger),
            }),
            this.logger,
        );
    }

    async downloadPeriod(period: Period, dataType: DataType, options: PeriodDownloadOptions): Promise<PeriodRunResult> {
        assertPeriod(period);
        const directory = path.join(this.outputDir, dataType, period);
        const aggregator = new RunAggregator();

        this.logger.info(`Fetching file list for ${period}...`);
        const listing = await this.index.listFiles(period, dataType);

        if (listing.files.length === 0) {
            this.logger.warn(`No files found for period ${period}`);
            return {
                period,
                dataType,
                directory,
                stats: aggregator.snapshot(),
                reports: [],
                skipped: [],
                hasFailures: false,
            };
        }

        let files = listing.files;
        if (options.maxFiles && options.maxFiles > 0) {
            files = files.slice(0, options.maxFiles);
            this.logger.info(`Limiting to first ${files.length} files`);
        }
        this.logger.info(`Found ${files.length} files for ${period}`);

        await fs.ensureDir(directory);

        const tasks = await this.plan(files, directory, options.resume, aggregator);
        const reports = await this.schedule(tasks, options, aggregator);

        const stats = aggregator.snapshot();
        this.logger.info(
            `Period ${period} completed: ${stats.success} successful, ${stats.failed} failed, ${stats.skipped} skipped`,
        );

        return {
            period,
            dataType,
            directory,
            stats,
            reports,
            skipped: aggregator.skips(),
            hasFailures: aggregator.hasFailures(),
        };
    }

    private async plan(
        files: RemoteFile[],
        directory: string,
        resume: boolean,
        aggregator: RunAggregator,
    ): Promise<TransferTask[]> {
        const tasks: TransferTask[] = [];

        for (const file of files) {
            const task: TransferTask = {
                url: file.url,
                localPath: path.join(directory, file.name),
                resume,
            };

            if (!isHttpUrl(task.url)) {
                this.logger.warn(`Skipping invalid URL: ${task.url}`);
                aggregator.skip(task, 'invalid url');
                continue;
            }

            if (!resume && await fs.pathExists(task.localPath)) {
                this.logger.info(`Skipping existing file: ${task.localPath}`);
                aggregator.skip(task, 'exists');
                continue;
            }

            tasks.push(task);
        }

        return tasks;
    }

    private async schedule(
        tasks: TransferTask[],
        options: PeriodDownloadOptions,
        aggregator: RunAggregator,
    ): Promise<TransferReport[]> {
        const retries = options.retries ?? 0;
        const retryDelayMs = options.retryDelayMs ?? CONFIG.RETRY_DELAY_MS;
        const finalReports: TransferReport[] = [];
        let pending = tasks;

        for (let round = 0; pending.length > 0; round++) {
            const retryable: TransferTask[] = [];
            const canRetry = round < retries;

            await this.scheduler.run(pending, {
                maxWorkers: options.maxWorkers,
                signal: options.signal,
                onOutcome: report => {
                    if (canRetry && !options.signal?.aborted && isRetryable(report.outcome)) {
                        retryable.push(report.task);
                        return;
                    }
                    finalReports.push(report);
                    aggregator.record(report);
                },
            });

            pending = retryable;
            if (pending.length > 0) {
                const delay = retryDelayMs * Math.pow(2, round);
                this.logger.warn(
                    `${pending.length} transfers failed, retrying in ${delay}ms (round ${round + 1}/${retries})`,
                );
                await this.backoff(delay, options.signal);
            }
        }

        return finalReports;
    }

    // An interrupt ends the wait early; the next round then reports the pending tasks as cancelled
    private async backoff(delay: number, signal?: AbortSignal): Promise<void> {
        try {
            await sleep(delay, undefined, { signal });
        } catch (error) {
            if (!isAbortError(error)) throw error;
        }
    }
}
