import { InvalidArgumentError } from 'commander';

export type DataType = 'pageviews' | 'pagecounts-ez';

export interface DataTypeInfo {
    id: DataType;
    alias: string;
    endpoint: string;
    // Anchor pattern for downloadable files; group 1 is the filename
    filePattern: RegExp;
    description: string;
}

export const CONFIG = {
    DUMPS_BASE_URL: 'https://dumps.wikimedia.org/other/',
    OUTPUT_DIR: './wiki_logs',
    MAX_WORKERS: 4,
    CHUNK_SIZE: 8192,
    // Each attempt is bounded; a timeout is reported like any other failure
    REQUEST_TIMEOUT_MS: 5 * 60 * 1000,
    RETRY_DELAY_MS: 2000,
    USER_AGENT: 'pageview-dump-fetcher/1.0 (Educational/Research Purpose)',
};

export const DATA_TYPES: Record<DataType, DataTypeInfo> = {
    pageviews: {
        id: 'pageviews',
        alias: 'pageviews',
        endpoint: `${CONFIG.DUMPS_BASE_URL}pageviews/`,
        filePattern: /<a href="(pageviews-\d{10}\.gz)"/g,
        description: 'Hourly pageviews (gzip)',
    },
    'pagecounts-ez': {
        id: 'pagecounts-ez',
        alias: 'ez',
        endpoint: `${CONFIG.DUMPS_BASE_URL}pagecounts-ez/`,
        filePattern: /<a href="(pagecounts-\d{8}\.bz2)"/g,
        description: 'Daily compressed pagecounts (bzip2)',
    },
};

export function isDataType(value: string): value is DataType {
    return Object.prototype.hasOwnProperty.call(DATA_TYPES, value);
}

/**
 * Accepts either the CLI alias (`pageviews`, `ez`) or the collection name.
 */
export function resolveDataType(value: string): DataType {
    if (isDataType(value)) return value;
    const match = Object.values(DATA_TYPES).find(info => info.alias === value);
    if (!match) {
        const known = Object.values(DATA_TYPES).map(info => info.alias).join(', ');
        throw new InvalidArgumentError(`Unknown data type "${value}". Expected one of: ${known}`);
    }
    return match.id;
}

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
    }
    return parsed;
}

export function parseNonNegativeInt(value: string): number {
    if (value.trim() === '0') return 0;
    return parsePositiveInt(value);
}
