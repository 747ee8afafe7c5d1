import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import type { TransferOutcome, TransferTask } from './downloader';
import { DownloadScheduler, type TransferReport } from './scheduler';

const logger = pino({ level: 'silent' });

const task = (name: string): TransferTask => ({
    url: `https://dumps.example.test/${name}`,
    localPath: `/tmp/${name}`,
    resume: true,
});

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('DownloadScheduler', () => {
    it('never runs more than maxWorkers transfers at once and reports every task', async () => {
        let inFlight = 0;
        let maxInFlight = 0;
        const scheduler = new DownloadScheduler(async () => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await sleep(5);
            inFlight--;
            return { kind: 'completed', bytesWritten: 1 };
        }, logger);
        const tasks = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map(task);

        const reports = await scheduler.run(tasks, { maxWorkers: 3 });

        expect(maxInFlight).toBe(3);
        expect(reports).toHaveLength(7);
        expect(reports.map(r => r.task.url).sort()).toEqual(tasks.map(t => t.url).sort());
    });

    it('admits tasks in submission order', async () => {
        const started: string[] = [];
        const scheduler = new DownloadScheduler(async t => {
            started.push(t.localPath);
            await sleep(1);
            return { kind: 'completed', bytesWritten: 0 };
        }, logger);

        await scheduler.run(['a', 'b', 'c', 'd'].map(task), { maxWorkers: 2 });

        expect(started).toEqual(['/tmp/a', '/tmp/b', '/tmp/c', '/tmp/d']);
    });

    it('reports outcomes in completion order', async () => {
        const delays: Record<string, number> = { '/tmp/a': 40, '/tmp/b': 5, '/tmp/c': 5 };
        const scheduler = new DownloadScheduler(async t => {
            await sleep(delays[t.localPath]);
            return { kind: 'completed', bytesWritten: 0 };
        }, logger);
        const seen: string[] = [];

        const reports = await scheduler.run(['a', 'b', 'c'].map(task), {
            maxWorkers: 2,
            onOutcome: report => seen.push(report.task.localPath),
        });

        expect(seen).toEqual(['/tmp/b', '/tmp/c', '/tmp/a']);
        expect(reports.map(r => r.task.localPath)).toEqual(seen);
    });

    it('turns a thrown error into a failed outcome without stopping siblings', async () => {
        const scheduler = new DownloadScheduler(async t => {
            if (t.localPath === '/tmp/b') {
                throw new Error('boom');
            }
            return { kind: 'completed', bytesWritten: 3 };
        }, logger);

        const reports = await scheduler.run(['a', 'b', 'c'].map(task), { maxWorkers: 1 });

        expect(reports).toEqual([
            { task: task('a'), outcome: { kind: 'completed', bytesWritten: 3 } },
            { task: task('b'), outcome: { kind: 'failed', reason: 'boom', category: 'local-io' } },
            { task: task('c'), outcome: { kind: 'completed', bytesWritten: 3 } },
        ]);
    });

    it('stops admitting tasks after the signal aborts and still reports each one', async () => {
        const controller = new AbortController();
        const transfer = vi.fn(async (): Promise<TransferOutcome> => {
            controller.abort();
            return { kind: 'completed', bytesWritten: 1 };
        });
        const scheduler = new DownloadScheduler(transfer, logger);
        const onOutcome = vi.fn<(report: TransferReport) => void>();

        const reports = await scheduler.run(['a', 'b', 'c'].map(task), {
            maxWorkers: 1,
            signal: controller.signal,
            onOutcome,
        });

        expect(transfer).toHaveBeenCalledTimes(1);
        expect(transfer).toHaveBeenCalledWith(task('a'), controller.signal);
        expect(onOutcome).toHaveBeenCalledTimes(3);
        expect(reports.map(r => r.outcome)).toEqual([
            { kind: 'completed', bytesWritten: 1 },
            { kind: 'failed', reason: 'cancelled before start', category: 'cancelled' },
            { kind: 'failed', reason: 'cancelled before start', category: 'cancelled' },
        ]);
    });

    it('returns immediately for an empty task list', async () => {
        const transfer = vi.fn(async (): Promise<TransferOutcome> => ({ kind: 'completed', bytesWritten: 0 }));
        const scheduler = new DownloadScheduler(transfer, logger);

        await expect(scheduler.run([], { maxWorkers: 4 })).resolves.toEqual([]);
        expect(transfer).not.toHaveBeenCalled();
    });

    it.each([0, -1, 1.5])('rejects maxWorkers %s', async maxWorkers => {
        const scheduler = new DownloadScheduler(async () => ({ kind: 'completed', bytesWritten: 0 }), logger);
        await expect(scheduler.run([task('a')], { maxWorkers })).rejects.toBeInstanceOf(RangeError);
    });
});
