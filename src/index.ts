#!/usr/bin/env node
import { Command, Option } from 'commander';
import fs from 'fs-extra';
import {
    CONFIG,
    DATA_TYPES,
    type DataType,
    parseNonNegativeInt,
    parsePositiveInt,
    resolveDataType,
} from './config';
import { Downloader } from './downloader';
import { DumpIndexClient } from './dumps';
import { createHttpClient } from './http';
import { createLogger } from './logger';
import { validatePeriodFormat } from './period';
import { PeriodDownloader } from './runner';

type CliOptions = {
    list?: boolean;
    period?: string;
    type: DataType;
    outputDir: string;
    workers: number;
    maxFiles?: number;
    resume: boolean;
    chunkSize: number;
    retries: number;
    timeout: number;
    logLevel: string;
};

const program = new Command();

program
    .name('pageview-dump-fetcher')
    .description('Download Wikipedia pageview logs from the Wikimedia public dumps')
    .version('1.0.0')
    .option('-l, --list', 'list available periods and exit')
    .option('-p, --period <YYYY-MM>', 'period to download, e.g. 2024-01')
    .option('-t, --type <type>', 'data type: pageviews or ez', resolveDataType, 'pageviews')
    .option('-o, --output-dir <dir>', 'output directory', CONFIG.OUTPUT_DIR)
    .option('-w, --workers <number>', 'number of parallel downloads', parsePositiveInt, CONFIG.MAX_WORKERS)
    .option('-m, --max-files <number>', 'maximum number of files to download for the period', parsePositiveInt)
    .option('--no-resume', 'disable resuming partially downloaded files')
    .option('--chunk-size <bytes>', 'write chunk size in bytes', parsePositiveInt, CONFIG.CHUNK_SIZE)
    .option('--retries <number>', 'extra rounds for transfers that failed on the network', parseNonNegativeInt, 0)
    .option('--timeout <ms>', 'per-request timeout in milliseconds', parsePositiveInt, CONFIG.REQUEST_TIMEOUT_MS)
    .addOption(new Option('--log-level <level>', 'log level').choices(['debug', 'info', 'warn', 'error']).default('info'))
    .addHelpText('after', `
Examples:
  $ pageview-dump-fetcher --list
  $ pageview-dump-fetcher --period 2024-01
  $ pageview-dump-fetcher --period 2024-01 --type ez
  $ pageview-dump-fetcher --period 2024-01 --max-files 10 --workers 8`)
    .parse(process.argv);

const options = program.opts<CliOptions>();

const logger = createLogger({ level: options.logLevel });

async function main() {
    const http = createHttpClient({ timeoutMs: options.timeout });
    const index = new DumpIndexClient(http, logger);

    await fs.ensureDir(options.outputDir);

    if (options.list) {
        await listPeriods(index, options.type);
        return;
    }

    if (!options.period) {
        logger.error('--period is required (or use --list to see available periods)');
        process.exitCode = 1;
        return;
    }

    if (!validatePeriodFormat(options.period)) {
        logger.error('Period must be in YYYY-MM format (e.g. 2024-01)');
        process.exitCode = 1;
        return;
    }

    logger.info(
        `Period: ${options.period} | Type: ${options.type} | Output: ${options.outputDir} | ` +
        `Workers: ${options.workers} | Resume: ${options.resume ? 'Yes' : 'No'}`,
    );

    const controller = new AbortController();
    process.on('SIGINT', () => {
        if (controller.signal.aborted) {
            process.exit(130);
        }
        logger.warn('Interrupt received: no new downloads will start, partial files are kept for resume. Press Ctrl+C again to exit now.');
        controller.abort();
    });

    const downloader = new Downloader(http, logger, { chunkSize: options.chunkSize });
    const runner = new PeriodDownloader(index, downloader, logger, options.outputDir);

    const startTime = Date.now();
    const { stats, skipped, hasFailures } = await runner.downloadPeriod(options.period, options.type, {
        resume: options.resume,
        maxWorkers: options.workers,
        maxFiles: options.maxFiles,
        retries: options.retries,
        signal: controller.signal,
    });

    const elapsed = (Date.now() - startTime) / 1000;
    logger.info(`Download completed in ${elapsed.toFixed(1)} seconds`);
    logger.info(
        `Total: ${stats.success} successful, ${stats.failed} failed, ${stats.skipped} skipped ` +
        `(${stats.bytesWritten} bytes written)`,
    );

    for (const { task, reason } of skipped) {
        logger.debug(`Skipped ${task.localPath} (${reason})`);
    }

    if (hasFailures) {
        process.exitCode = 1;
    }
}

async function listPeriods(index: DumpIndexClient, dataType: DataType) {
    logger.info(`Fetching available periods for ${DATA_TYPES[dataType].description}...`);
    const periods = await index.discoverPeriods(dataType);

    if (periods.length === 0) {
        logger.info('No periods found');
        return;
    }

    logger.info(`Available periods (${periods.length} total):`);
    periods.forEach((period, i) => {
        logger.info(`${String(i + 1).padStart(3)}. ${period}`);
    });
}

main().catch(err => {
    logger.error(err, 'Run aborted');
    process.exitCode = 1;
});
