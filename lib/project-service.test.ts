import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryBlobStorage } from './blob-storage';
import { DocumentService } from './document-service';
import { NotFoundError, ValidationError } from './errors';
import { IngestionQueue } from './ingestion-queue';
import { MemoryDatabase } from './memory-database';
import { MemoryVectorStore } from './memory-vector-store';
import { ProjectService } from './project-service';
import { HashingEmbedder } from './testing/fakes';
import { TextExtractor } from './text-extraction';
import { RecursiveTextSplitter } from './text-splitter';
import { eq } from './vector-filter';

function setup() {
  const db = new MemoryDatabase();
  const store = new MemoryVectorStore(new HashingEmbedder());
  const documents = new DocumentService({
    db,
    vectorIndex: store,
    blobStorage: new MemoryBlobStorage(),
    queue: new IngestionQueue(),
    extractor: new TextExtractor(),
    splitter: new RecursiveTextSplitter(),
    maxFileSizeMb: 50,
    retry: { attempts: 1, delayMs: 0 },
  });
  return { db, store, documents, projects: new ProjectService(db, documents) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ProjectService', () => {
  it('creates and summarizes projects', async () => {
    const { documents, projects } = setup();
    const project = await projects.createProject({ name: '  Legal  ', description: 'Contracts' });
    const document = await documents.ingestDocument(project.id, 'nda.txt', 'txt', new TextEncoder().encode('Terms.'));
    await documents.waitForIngestion(document.id);

    expect(await projects.getProject(project.id)).toMatchObject({
      name: 'Legal',
      description: 'Contracts',
      documentCount: 1,
      chatCount: 0,
    });
    const { projects: listed, total } = await projects.listProjects();
    expect(total).toBe(1);
    expect(listed[0].documentCount).toBe(1);
  });

  it('validates names', async () => {
    const { projects } = setup();
    await expect(projects.createProject({ name: ' ' })).rejects.toBeInstanceOf(ValidationError);
    const project = await projects.createProject({ name: 'Legal' });
    await expect(projects.updateProject(project.id, { name: '' })).rejects.toBeInstanceOf(ValidationError);
    expect((await projects.updateProject(project.id, { description: 'Updated' })).description).toBe('Updated');
    await expect(projects.updateProject('missing', { name: 'x' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('deletes documents with their vectors before the project', async () => {
    const { db, store, documents, projects } = setup();
    const project = await projects.createProject({ name: 'Legal' });
    const document = await documents.ingestDocument(project.id, 'nda.txt', 'txt', new TextEncoder().encode('Terms.'));
    await documents.waitForIngestion(document.id);
    await db.chats.create({ projectId: project.id, name: 'Chat', documentIds: [document.id] });

    await projects.deleteProject(project.id);

    expect(store.size).toBe(0);
    expect(documents.getIngestionStatus(document.id)).toBeUndefined();
    expect(await store.search('Terms', 5, eq('projectId', project.id))).toEqual([]);
    await expect(projects.getProject(project.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await db.chats.countByProject(project.id)).toBe(0);
  });
});
