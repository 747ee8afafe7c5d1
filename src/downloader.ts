import type { AxiosInstance, AxiosResponse } from 'axios';
import fs from 'fs-extra';
import path from 'path';
import type { Logger } from 'pino';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { CONFIG } from './config';
import { classifyFailure, type FailureCategory } from './errors';

export interface TransferTask {
    url: string;
    localPath: string;
    resume: boolean;
}

export type TransferOutcome =
    | { kind: 'completed'; bytesWritten: number }
    | { kind: 'resumed'; offset: number; bytesWritten: number }
    | { kind: 'already-complete'; bytesWritten: 0 }
    | { kind: 'failed'; reason: string; category: FailureCategory; status?: number };

export interface TransferProgress {
    file: string;
    // Bytes on disk so far, including a resumed prefix
    bytes: number;
    total?: number;
    percent?: number;
}

export interface TransferOptions {
    signal?: AbortSignal;
    onProgress?: (progress: TransferProgress) => void;
}

export interface DownloaderOptions {
    chunkSize?: number;
}

function contentLength(response: AxiosResponse): number | undefined {
    const raw = response.headers['content-length'];
    if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
    const length = Number(raw);
    return Number.isSafeInteger(length) && length >= 0 ? length : undefined;
}

function progressOf(file: string, bytes: number, total: number | undefined): TransferProgress {
    if (!total) return { file, bytes };
    return { file, bytes, total, percent: (bytes / total) * 100 };
}

/**
 * Streams one remote file to one local path. With `resume` set, an existing
 * partial file is continued through a `Range` request; the outcome is always
 * returned as a value and partial files are never removed here.
 */
export class Downloader {
    private readonly chunkSize: number;

    constructor(
        private readonly http: AxiosInstance,
        private readonly logger: Logger,
        options: DownloaderOptions = {},
    ) {
        const chunkSize = options.chunkSize ?? CONFIG.CHUNK_SIZE;
        if (!Number.isInteger(chunkSize) || chunkSize < 1) {
            throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
        }
        this.chunkSize = chunkSize;
    }

    async transfer(task: TransferTask, options: TransferOptions = {}): Promise<TransferOutcome> {
        const file = path.basename(task.localPath);

        try {
            const offset = task.resume ? await this.existingSize(task.localPath) : 0;

            const response = await this.http.get<Readable>(task.url, {
                headers: offset > 0 ? { Range: `bytes=${offset}-` } : {},
                responseType: 'stream',
                // Bytes on disk must match the remote bytes for ranges to line up
                decompress: false,
                signal: options.signal,
                validateStatus: () => true,
            });
            const { status } = response;

            if (status === 416 && offset > 0) {
                response.data.destroy();
                this.logger.info(`File ${file} already complete`);
                return { kind: 'already-complete', bytesWritten: 0 };
            }

            if (status !== 200 && status !== 206) {
                response.data.destroy();
                const category: FailureCategory = status >= 500 ? 'network' : 'server';
                this.logger.error(`Error downloading ${file}: HTTP ${status}`);
                return { kind: 'failed', reason: `HTTP ${status}`, category, status };
            }

            const append = status === 206 && offset > 0;
            if (append) {
                this.logger.info(`Resuming download of ${file} from byte ${offset}`);
            } else if (offset > 0) {
                // The partial bytes cannot be trusted once the server ignores the range
                this.logger.info(`Server doesn't support resume, restarting ${file}`);
            } else {
                this.logger.info(`Starting download of ${file}`);
            }

            const startAt = append ? offset : 0;
            const declared = contentLength(response);
            const total = declared === undefined ? undefined : declared + startAt;
            const chunkSize = this.chunkSize;
            const onProgress = options.onProgress;
            let bytesWritten = 0;

            await pipeline(
                response.data,
                async function* (source: AsyncIterable<Buffer>) {
                    for await (const chunk of source) {
                        for (let start = 0; start < chunk.length; start += chunkSize) {
                            const piece = chunk.subarray(start, start + chunkSize);
                            bytesWritten += piece.length;
                            onProgress?.(progressOf(file, startAt + bytesWritten, total));
                            yield piece;
                        }
                    }
                },
                fs.createWriteStream(task.localPath, {
                    flags: append ? 'a' : 'w',
                    highWaterMark: chunkSize,
                }),
            );

            this.logger.info(`Completed: ${file} (${startAt + bytesWritten} bytes)`);
            return append
                ? { kind: 'resumed', offset, bytesWritten }
                : { kind: 'completed', bytesWritten };
        } catch (error) {
            const failure = classifyFailure(error);
            this.logger.error(`Error downloading ${file}: ${failure.reason}`);
            return { kind: 'failed', ...failure };
        }
    }

    private async existingSize(localPath: string): Promise<number> {
        if (!(await fs.pathExists(localPath))) return 0;
        const stats = await fs.stat(localPath);
        return stats.isFile() ? stats.size : 0;
    }
}
