import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { DATA_TYPES, type DataType } from './config';
import { ListingError, describeError } from './errors';
import { PERIOD_LINK, YEAR_LINK, extractLinks } from './listing';
import { type Period, assertPeriod, periodYear } from './period';

export interface RemoteFile {
    name: string;
    period: Period;
    dataType: DataType;
    url: string;
}

export interface FileListing {
    files: RemoteFile[];
    // Directory URL the file URLs were resolved against
    baseUrl: string;
}

export function periodUrl(period: Period, dataType: DataType): string {
    const endpoint = DATA_TYPES[dataType].endpoint;
    return new URL(`${periodYear(period)}/${period}/`, endpoint).toString();
}

export class DumpIndexClient {
    constructor(
        private readonly http: AxiosInstance,
        private readonly logger: Logger,
    ) { }

    /**
     * Walks the year directories of a collection and returns every `YYYY-MM`
     * period found, deduplicated and sorted. A year whose listing cannot be
     * fetched is logged and skipped; failure to fetch the collection root
     * rejects with a {@link ListingError}.
     */
    async discoverPeriods(dataType: DataType): Promise<Period[]> {
        const endpoint = DATA_TYPES[dataType].endpoint;

        let rootHtml: string;
        try {
            rootHtml = await this.fetchListing(endpoint);
        } catch (error) {
            throw new ListingError(endpoint, error);
        }

        const years = extractLinks(rootHtml, YEAR_LINK);
        this.logger.debug(`Found ${years.length} year directories under ${endpoint}`);

        const periods = new Set<Period>();
        for (const year of years) {
            const yearUrl = new URL(`${year}/`, endpoint).toString();
            try {
                const yearHtml = await this.fetchListing(yearUrl);
                for (const period of extractLinks(yearHtml, PERIOD_LINK)) {
                    periods.add(period);
                }
            } catch (error) {
                this.logger.warn(`Could not fetch months for year ${year}: ${describeError(error)}`);
            }
        }

        return Array.from(periods).sort();
    }

    async listFiles(period: Period, dataType: DataType): Promise<FileListing> {
        assertPeriod(period);
        const baseUrl = periodUrl(period, dataType);

        let html: string;
        try {
            html = await this.fetchListing(baseUrl);
        } catch (error) {
            this.logger.error(`Error fetching files for period ${period}: ${describeError(error)}`);
            return { files: [], baseUrl };
        }

        const files = extractLinks(html, DATA_TYPES[dataType].filePattern).map(name => ({
            name,
            period,
            dataType,
            url: new URL(name, baseUrl).toString(),
        }));

        return { files, baseUrl };
    }

    private async fetchListing(url: string): Promise<string> {
        const response = await this.http.get<string>(url, { responseType: 'text' });
        return typeof response.data === 'string' ? response.data : '';
    }
}
