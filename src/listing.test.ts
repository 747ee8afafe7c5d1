import { describe, it, expect } from 'vitest';
import { DATA_TYPES } from './config';
import { PERIOD_LINK, YEAR_LINK, extractLinks } from './listing';
import { directoryIndex } from './testing/fake-dump-server';

describe('extractLinks', () => {
    it('returns year directories in document order', () => {
        const html = directoryIndex(['2016/', '2015/', 'readme.html', '2017/']);
        expect(extractLinks(html, YEAR_LINK)).toEqual(['2016', '2015', '2017']);
    });

    it('does not deduplicate repeated entries', () => {
        const html = directoryIndex(['2015-05/', '2015-05/', '2015-06/']);
        expect(extractLinks(html, PERIOD_LINK)).toEqual(['2015-05', '2015-05', '2015-06']);
    });

    it('does not confuse periods with years', () => {
        const html = directoryIndex(['2015-05/', '2015/']);
        expect(extractLinks(html, YEAR_LINK)).toEqual(['2015']);
        expect(extractLinks(html, PERIOD_LINK)).toEqual(['2015-05']);
    });

    it('returns an empty array for empty or unrelated bodies', () => {
        expect(extractLinks('', YEAR_LINK)).toEqual([]);
        expect(extractLinks('<html><body><p>Service unavailable</p></body></html>', PERIOD_LINK)).toEqual([]);
        expect(extractLinks('not html at all', DATA_TYPES.pageviews.filePattern)).toEqual([]);
    });

    it('filters pageview files by the hourly shape', () => {
        const html = directoryIndex([
            'pageviews-2024010100.gz',
            'projectviews-2024010100',
            'pageviews-20240101.gz',
            'pageviews-2024010101.gz',
            'md5sums.txt',
        ]);
        expect(extractLinks(html, DATA_TYPES.pageviews.filePattern)).toEqual([
            'pageviews-2024010100.gz',
            'pageviews-2024010101.gz',
        ]);
    });

    it('filters pagecounts-ez files by the daily shape', () => {
        const html = directoryIndex(['pagecounts-20160101.bz2', 'pagecounts-2016-01-views-ge-5.bz2', 'pagecounts-20160102.bz2']);
        expect(extractLinks(html, DATA_TYPES['pagecounts-ez'].filePattern)).toEqual([
            'pagecounts-20160101.bz2',
            'pagecounts-20160102.bz2',
        ]);
    });

    it('gives the same result when a shared pattern is reused', () => {
        const html = directoryIndex(['2015/', '2016/']);
        expect(extractLinks(html, YEAR_LINK)).toEqual(['2015', '2016']);
        expect(extractLinks(html, YEAR_LINK)).toEqual(['2015', '2016']);
    });

    it('returns the whole match when the pattern has no group', () => {
        expect(extractLinks('a1 b2 a3', /a\d/)).toEqual(['a1', 'a3']);
    });
});
