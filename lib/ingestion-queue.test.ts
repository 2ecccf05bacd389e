import { afterEach, describe, expect, it, vi } from 'vitest';
import { IngestionQueue, type IngestionStage } from './ingestion-queue';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('IngestionQueue', () => {
  it('records every stage of a successful job', async () => {
    const queue = new IngestionQueue();
    const stages: IngestionStage[] = [];
    queue.subscribe(job => stages.push(job.stage));

    queue.enqueue('doc-1', async progress => {
      progress('extracting');
      progress('chunking');
      progress('embedding');
      return 4;
    });
    const job = await queue.waitFor('doc-1');

    expect(stages).toEqual(['queued', 'extracting', 'chunking', 'embedding', 'indexed']);
    expect(job).toMatchObject({ documentId: 'doc-1', stage: 'indexed', chunkCount: 4 });
  });

  it('turns a rejected task into a failed job', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const queue = new IngestionQueue();

    queue.enqueue('doc-1', async () => {
      throw new Error('No content extracted from empty.pdf');
    });

    await expect(queue.waitFor('doc-1')).resolves.toMatchObject({
      stage: 'failed',
      error: 'No content extracted from empty.pdf',
    });
  });

  it('runs at most `concurrency` jobs at once', async () => {
    const queue = new IngestionQueue(1);
    const first = deferred<number>();
    const started: string[] = [];

    queue.enqueue('doc-1', () => {
      started.push('doc-1');
      return first.promise;
    });
    queue.enqueue('doc-2', async () => {
      started.push('doc-2');
      return 1;
    });

    expect(started).toEqual(['doc-1']);
    expect(queue.getJob('doc-2')?.stage).toBe('queued');

    first.resolve(2);
    await queue.onIdle();

    expect(started).toEqual(['doc-1', 'doc-2']);
    expect(queue.getJob('doc-2')?.stage).toBe('indexed');
  });

  it('refuses a second job for a document still in flight', () => {
    const queue = new IngestionQueue();
    const pending = deferred<number>();
    queue.enqueue('doc-1', () => pending.promise);

    expect(() => queue.enqueue('doc-1', async () => 1)).toThrow('Document doc-1 is already being ingested');
    pending.resolve(1);
  });

  it('forgets finished jobs but keeps running ones', async () => {
    const queue = new IngestionQueue();
    const gate = deferred<number>();
    queue.enqueue('doc-1', async () => 1);
    queue.enqueue('doc-2', () => gate.promise);
    await queue.waitFor('doc-1');

    expect(queue.forget('doc-1')).toBe(true);
    expect(queue.getJob('doc-1')).toBeUndefined();
    expect(queue.forget('doc-2')).toBe(false);
    expect(queue.getJob('doc-2')?.stage).toBe('queued');
    expect(queue.forget('unknown')).toBe(false);

    gate.resolve(3);
    await queue.onIdle();
  });

  it('rejects waiting on an unknown document', async () => {
    await expect(new IngestionQueue().waitFor('missing')).rejects.toThrow('No ingestion job for document missing');
  });

  it('drops a listener that throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const queue = new IngestionQueue();
    const listener = vi.fn(() => {
      throw new Error('listener broke');
    });
    queue.subscribe(listener);

    queue.enqueue('doc-1', async () => 1);
    await queue.waitFor('doc-1');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(queue.getJob('doc-1')?.stage).toBe('indexed');
  });

  it('resolves onIdle immediately when empty', async () => {
    await expect(new IngestionQueue().onIdle()).resolves.toBeUndefined();
  });
});
