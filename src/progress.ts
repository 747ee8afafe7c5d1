import type { Logger } from 'pino';
import type { TransferProgress } from './downloader';

export interface ProgressReporterOptions {
    stepPercent?: number;
    // Used when the server declares no length
    stepBytes?: number;
}

/**
 * Builds an `onProgress` callback for one transfer that logs at debug level
 * each time the next percentage (or byte) step is crossed.
 */
export function createProgressReporter(
    logger: Logger,
    options: ProgressReporterOptions = {},
): (progress: TransferProgress) => void {
    const stepPercent = options.stepPercent ?? 10;
    const stepBytes = options.stepBytes ?? 10 * 1024 * 1024;
    let nextPercent = stepPercent;
    let nextBytes = stepBytes;

    return ({ file, bytes, total, percent }) => {
        if (total !== undefined && percent !== undefined) {
            if (percent < nextPercent) return;
            nextPercent = (Math.floor(percent / stepPercent) + 1) * stepPercent;
            logger.debug(`${file}: ${percent.toFixed(1)}% (${bytes}/${total} bytes)`);
            return;
        }

        if (bytes < nextBytes) return;
        nextBytes = (Math.floor(bytes / stepBytes) + 1) * stepBytes;
        logger.debug(`${file}: ${bytes} bytes downloaded`);
    };
}
