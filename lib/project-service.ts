import type { DocumentService } from './document-service';
import { NotFoundError, ValidationError } from './errors';
import type { Database } from './repositories';
import type { Page, Project } from './types';

export interface ProjectSummary extends Project {
  documentCount: number;
  chatCount: number;
}

export class ProjectService {
  constructor(
    private readonly db: Database,
    private readonly documents: DocumentService,
  ) {}

  async createProject(input: { name: string; description?: string }): Promise<Project> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('Project name must not be empty');
    }
    const project = await this.db.projects.create({ name, description: input.description });
    console.log(`[PROJECT] Created project ${project.id} (${name})`);
    return project;
  }

  async getProject(projectId: string): Promise<ProjectSummary> {
    const project = await this.db.projects.getById(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    return this.summarize(project);
  }

  async listProjects(page: Page = {}): Promise<{ projects: ProjectSummary[]; total: number }> {
    const [projects, total] = await Promise.all([this.db.projects.list(page), this.db.projects.count()]);
    return { projects: await Promise.all(projects.map(project => this.summarize(project))), total };
  }

  async updateProject(projectId: string, changes: { name?: string; description?: string }): Promise<Project> {
    if (changes.name !== undefined && !changes.name.trim()) {
      throw new ValidationError('Project name must not be empty');
    }
    const project = await this.db.projects.getById(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    return this.db.projects.update(projectId, { ...changes, name: changes.name?.trim() });
  }

  /** Removes every document (vectors and files included), then the project's chats and messages. */
  async deleteProject(projectId: string): Promise<void> {
    const project = await this.db.projects.getById(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }

    const documents = await this.db.documents.listByProject(projectId);
    for (const document of documents) {
      await this.documents.deleteDocument(document.id);
    }
    await this.db.projects.delete(projectId);
    console.log(`[PROJECT] Deleted project ${projectId} with ${documents.length} documents`);
  }

  private async summarize(project: Project): Promise<ProjectSummary> {
    const [documentCount, chatCount] = await Promise.all([
      this.db.documents.countByProject(project.id),
      this.db.chats.countByProject(project.id),
    ]);
    return { ...project, documentCount, chatCount };
  }
}
