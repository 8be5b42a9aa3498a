/**
 * ProjectCatalog — read-only lookup of loaded project definitions.
 */

import type { ProjectMetadata, ProjectSummary } from '../../project/schema.js';

export class ProjectCatalog {
  private projects: Map<string, ProjectMetadata>;

  constructor(projects: Iterable<ProjectMetadata>) {
    this.projects = new Map();
    for (const project of projects) {
      this.projects.set(project.id, project);
    }
  }

  get(id: string): ProjectMetadata | undefined {
    return this.projects.get(id);
  }

  has(id: string): boolean {
    return this.projects.has(id);
  }

  ids(): string[] {
    return [...this.projects.keys()].sort();
  }

  list(): ProjectSummary[] {
    return [...this.projects.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map(({ id, displayName, artist }) => ({ id, displayName, artist }));
  }

  get size(): number {
    return this.projects.size;
  }
}
