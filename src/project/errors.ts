export type ProjectErrorCode = 'PROJECT_NOT_FOUND' | 'PROJECT_LOAD_FAILED' | 'CATALOG_EMPTY';

export class ProjectError extends Error {
  readonly code: ProjectErrorCode;

  constructor(code: ProjectErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ProjectNotFoundError extends ProjectError {
  readonly projectId: string;

  constructor(projectId: string, available: string[] = []) {
    super('PROJECT_NOT_FOUND', `Project '${projectId}' not found. Available projects: [${available.join(', ')}]`);
    this.projectId = projectId;
  }
}

export class ProjectLoadError extends ProjectError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('PROJECT_LOAD_FAILED', `Failed to load project ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
