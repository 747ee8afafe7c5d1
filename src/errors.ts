import axios from 'axios';

export type FailureCategory = 'network' | 'server' | 'local-io' | 'cancelled';

export interface FailureDetails {
    reason: string;
    category: FailureCategory;
}

export class InvalidPeriodError extends Error {
    constructor(readonly period: string) {
        super(`Period must be in YYYY-MM format (e.g. 2024-01), got "${period}"`);
        this.name = 'InvalidPeriodError';
    }
}

export class ListingError extends Error {
    constructor(readonly url: string, cause: unknown) {
        super(`Failed to fetch listing ${url}: ${describeError(cause)}`, { cause });
        this.name = 'ListingError';
    }
}

// errno codes raised by the file system rather than the socket
const LOCAL_IO_CODES = new Set([
    'ENOSPC',
    'EACCES',
    'EPERM',
    'EROFS',
    'EISDIR',
    'ENOENT',
    'ENOTDIR',
    'EMFILE',
    'EDQUOT',
]);

export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return `HTTP ${error.response.status}: ${error.message}`;
        }
        return error.code ? `${error.code}: ${error.message}` : error.message;
    }
    if (error instanceof Error) {
        const code = errorCode(error);
        return code && !error.message.includes(code) ? `${code}: ${error.message}` : error.message;
    }
    return String(error);
}

export function isAbortError(error: unknown): boolean {
    if (axios.isCancel(error)) return true;
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

export function classifyFailure(error: unknown): FailureDetails {
    const reason = describeError(error);
    if (isAbortError(error)) {
        return { reason, category: 'cancelled' };
    }
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined && status >= 400 && status < 500) {
            return { reason, category: 'server' };
        }
        return { reason, category: 'network' };
    }
    const code = errorCode(error);
    if (code && LOCAL_IO_CODES.has(code)) {
        return { reason, category: 'local-io' };
    }
    return { reason, category: 'network' };
}
