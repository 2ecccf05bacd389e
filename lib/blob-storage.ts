import { del, list, put } from '@vercel/blob';
import { NotFoundError } from './errors';

export interface BlobStorage {
  put(key: string, bytes: Uint8Array, contentType?: string): Promise<void>;
  get(key: string): Promise<Uint8Array>;
  delete(key: string): Promise<void>;
}

const CONTENT_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  txt: 'text/plain',
  md: 'text/markdown',
};

export function contentTypeFor(fileType: string): string {
  return CONTENT_TYPES[fileType] ?? 'application/octet-stream';
}

export class VercelBlobStorage implements BlobStorage {
  constructor(
    private readonly token: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async put(key: string, bytes: Uint8Array, contentType?: string): Promise<void> {
    const blob = await put(key, Buffer.from(bytes), {
      access: 'public',
      contentType,
      addRandomSuffix: false,
      token: this.token,
    });
    console.log(`[BLOB] Uploaded ${key} (${bytes.byteLength} bytes) to ${blob.url}`);
  }

  async get(key: string): Promise<Uint8Array> {
    const url = await this.resolveUrl(key);
    const response = await this.fetchImpl(url);
    if (!response.ok) {
      throw new Error(`Failed to download blob ${key}: ${response.status} ${response.statusText}`);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  async delete(key: string): Promise<void> {
    const url = await this.resolveUrl(key);
    await del(url, { token: this.token });
    console.log(`[BLOB] Deleted ${key}`);
  }

  private async resolveUrl(key: string): Promise<string> {
    const { blobs } = await list({ prefix: key, token: this.token });
    const blob = blobs.find(candidate => candidate.pathname === key);
    if (!blob) {
      throw new NotFoundError('Blob', key);
    }
    return blob.url;
  }
}

export class MemoryBlobStorage implements BlobStorage {
  private readonly blobs = new Map<string, Uint8Array>();

  async put(key: string, bytes: Uint8Array): Promise<void> {
    this.blobs.set(key, new Uint8Array(bytes));
  }

  async get(key: string): Promise<Uint8Array> {
    const bytes = this.blobs.get(key);
    if (!bytes) {
      throw new NotFoundError('Blob', key);
    }
    return new Uint8Array(bytes);
  }

  async delete(key: string): Promise<void> {
    if (!this.blobs.delete(key)) {
      throw new NotFoundError('Blob', key);
    }
  }

  has(key: string): boolean {
    return this.blobs.has(key);
  }
}
