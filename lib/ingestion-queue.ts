import { errorMessage } from './errors';

export type IngestionStage = 'queued' | 'extracting' | 'chunking' | 'embedding' | 'indexed' | 'failed';

export interface IngestionJob {
  documentId: string;
  stage: IngestionStage;
  chunkCount?: number;
  error?: string;
  updatedAt: Date;
}

export type IngestionListener = (job: IngestionJob) => void;

/** Reports progress from inside a task; terminal stages are set by the queue. */
export type ProgressReporter = (stage: 'extracting' | 'chunking' | 'embedding') => void;

/** Resolves with the number of chunks indexed. */
export type IngestionTask = (progress: ProgressReporter) => Promise<number>;

interface PendingJob {
  documentId: string;
  task: IngestionTask;
}

const isTerminal = (stage: IngestionStage) => stage === 'indexed' || stage === 'failed';

/**
 * Background work queue for document ingestion. Jobs run outside the request
 * that enqueued them, at most `concurrency` at a time, and every state
 * transition is recorded and broadcast to subscribers.
 */
export class IngestionQueue {
  private readonly jobs = new Map<string, IngestionJob>();
  private readonly pending: PendingJob[] = [];
  private readonly listeners = new Set<IngestionListener>();
  private readonly waiters = new Map<string, ((job: IngestionJob) => void)[]>();
  private idleWaiters: (() => void)[] = [];
  private running = 0;

  constructor(private readonly concurrency = 2) {}

  enqueue(documentId: string, task: IngestionTask): IngestionJob {
    const existing = this.jobs.get(documentId);
    if (existing && !isTerminal(existing.stage)) {
      throw new Error(`Document ${documentId} is already being ingested`);
    }

    this.pending.push({ documentId, task });
    const job = this.transition(documentId, { stage: 'queued' });
    this.pump();
    return job;
  }

  getJob(documentId: string): IngestionJob | undefined {
    const job = this.jobs.get(documentId);
    return job && { ...job };
  }

  /** Drops the record of a finished job. Jobs still queued or running are kept. */
  forget(documentId: string): boolean {
    const job = this.jobs.get(documentId);
    if (!job || !isTerminal(job.stage)) {
      return false;
    }
    return this.jobs.delete(documentId);
  }

  /** Resolves once the document's job reaches `indexed` or `failed`. */
  waitFor(documentId: string): Promise<IngestionJob> {
    const job = this.jobs.get(documentId);
    if (!job) {
      return Promise.reject(new Error(`No ingestion job for document ${documentId}`));
    }
    if (isTerminal(job.stage)) {
      return Promise.resolve({ ...job });
    }
    return new Promise(resolve => {
      this.waiters.set(documentId, [...(this.waiters.get(documentId) ?? []), resolve]);
    });
  }

  /** Resolves when nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  subscribe(listener: IngestionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private pump(): void {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) break;
      this.running++;
      void this.execute(next);
    }
    if (this.running === 0 && this.pending.length === 0) {
      const idle = this.idleWaiters;
      this.idleWaiters = [];
      idle.forEach(resolve => resolve());
    }
  }

  // Never rejects: failures become the job's `failed` state.
  private async execute({ documentId, task }: PendingJob): Promise<void> {
    try {
      const chunkCount = await task(stage => {
        this.transition(documentId, { stage });
      });
      this.transition(documentId, { stage: 'indexed', chunkCount });
    } catch (error) {
      console.error(`[QUEUE] Ingestion of document ${documentId} failed:`, error);
      this.transition(documentId, { stage: 'failed', error: errorMessage(error) });
    } finally {
      this.running--;
      this.pump();
    }
  }

  private transition(documentId: string, update: Pick<IngestionJob, 'stage' | 'chunkCount' | 'error'>): IngestionJob {
    const job: IngestionJob = { documentId, ...update, updatedAt: new Date() };
    this.jobs.set(documentId, job);
    console.log(`[QUEUE] Document ${documentId} -> ${job.stage}`);

    for (const listener of this.listeners) {
      try {
        listener({ ...job });
      } catch (error) {
        console.error('[QUEUE] Error notifying listener:', error);
        this.listeners.delete(listener);
      }
    }

    if (isTerminal(job.stage)) {
      const waiting = this.waiters.get(documentId) ?? [];
      this.waiters.delete(documentId);
      waiting.forEach(resolve => resolve({ ...job }));
    }
    return { ...job };
  }
}
