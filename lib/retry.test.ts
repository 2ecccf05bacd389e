import { afterEach, describe, expect, it, vi } from 'vitest';
import { EmbeddingProviderError, ExtractionFailedError, isRetryableIngestionError } from './errors';
import { withRetry } from './retry';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new EmbeddingProviderError('timeout'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(operation, { attempts: 3, delayMs: 0, label: 'Indexing a.txt' })).resolves.toBe('done');

    expect(operation).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('[RETRY] Indexing a.txt failed (attempt 1 of 3): timeout');
  });

  it('gives up after the last attempt', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new EmbeddingProviderError('timeout'));

    await expect(withRetry(operation, { attempts: 3, delayMs: 0 })).rejects.toBeInstanceOf(EmbeddingProviderError);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the predicate rejects', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new ExtractionFailedError('corrupt'));

    await expect(
      withRetry(operation, { attempts: 3, delayMs: 0, retryIf: isRetryableIngestionError }),
    ).rejects.toBeInstanceOf(ExtractionFailedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
