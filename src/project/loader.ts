import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { ProjectSchema, type ProjectMetadata } from './schema.js';
import { ProjectError, ProjectLoadError, errorMessage } from './errors.js';

/**
 * Parse a time signature of the form "N/D".
 * Returns null when the string does not hold two integers around a slash.
 */
export function parseTimeSignature(value: string): { num: number; den: number } | null {
  if (!value.includes('/')) return null;
  const [numPart, denPart] = value.split('/');
  const num = parseStrictInt(numPart);
  const den = parseStrictInt(denPart);
  if (num === null || den === null) return null;
  return { num, den };
}

function parseStrictInt(part: string): number | null {
  const trimmed = part.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

export async function loadProject(projectPath: string): Promise<ProjectMetadata> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(projectPath, 'utf-8'));
  } catch (err) {
    throw new ProjectLoadError(projectPath, errorMessage(err), err);
  }

  const parsed = ProjectSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ProjectLoadError(projectPath, issues.join('; '), parsed.error);
  }

  const document = parsed.data;
  const meta = document.meta;
  const id = document.id ?? basename(projectPath, extname(projectPath));

  return {
    id,
    displayName: meta?.title ?? id,
    artist: meta?.artist ?? '',
    bpm: meta?.bpm ?? meta?.tempo,
    timeSig: meta?.timeSig,
    sourcePath: projectPath,
    document,
  };
}

/**
 * Load every project definition under `path` (a directory of *.json files,
 * or a single file). Entries that fail to load are logged and skipped;
 * an empty result is an error.
 */
export async function loadProjectCatalog(path: string): Promise<ProjectMetadata[]> {
  let files: string[];
  try {
    const info = await stat(path);
    if (info.isDirectory()) {
      const entries = await readdir(path, { withFileTypes: true });
      files = entries
        .filter(e => e.isFile() && extname(e.name).toLowerCase() === '.json')
        .map(e => join(path, e.name))
        .sort();
    } else {
      files = [path];
    }
  } catch (err) {
    throw new ProjectError('CATALOG_EMPTY', `Project path ${path} is not readable: ${errorMessage(err)}`, { cause: err });
  }

  const projects: ProjectMetadata[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    try {
      const project = await loadProject(file);
      if (seen.has(project.id)) {
        console.warn(`[catalog] Skipping ${file}: duplicate project id '${project.id}'`);
        continue;
      }
      seen.add(project.id);
      projects.push(project);
    } catch (err) {
      if (!(err instanceof ProjectLoadError)) throw err;
      console.warn(`[catalog] ${err.message}`);
    }
  }

  if (projects.length === 0) {
    throw new ProjectError('CATALOG_EMPTY', `No loadable projects found in ${path}`);
  }
  return projects;
}
