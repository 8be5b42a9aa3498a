import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadProject, loadProjectCatalog, parseTimeSignature } from '../loader.js';
import { ProjectLoadError } from '../errors.js';

describe('parseTimeSignature', () => {
  it('reads numerator and denominator', () => {
    expect(parseTimeSignature('3/4')).toEqual({ num: 3, den: 4 });
    expect(parseTimeSignature(' 6 / 8 ')).toEqual({ num: 6, den: 8 });
  });

  it('ignores anything after a second slash', () => {
    expect(parseTimeSignature('7/8/extra')).toEqual({ num: 7, den: 8 });
  });

  it('returns null for malformed input', () => {
    expect(parseTimeSignature('waltz')).toBeNull();
    expect(parseTimeSignature('3/x')).toBeNull();
    expect(parseTimeSignature('/4')).toBeNull();
    expect(parseTimeSignature('3.5/4')).toBeNull();
    expect(parseTimeSignature('')).toBeNull();
  });
});

describe('project catalog loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transport-relay-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeProject(name: string, content: unknown) {
    const path = join(dir, name);
    await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  it('reads metadata from a project file', async () => {
    const path = await writeProject('a.json', {
      id: 'alpha',
      meta: { title: 'Alpha Song', artist: 'Test Band', bpm: 96, timeSig: '6/8' },
      sections: [{ name: 'verse', bars: 8 }],
    });

    const project = await loadProject(path);

    expect(project).toMatchObject({
      id: 'alpha', displayName: 'Alpha Song', artist: 'Test Band', bpm: 96, timeSig: '6/8', sourcePath: path,
    });
    expect(project.document.sections).toEqual([{ name: 'verse', bars: 8 }]);
  });

  it('falls back to the file name, tempo alias and empty artist', async () => {
    const path = await writeProject('groove.json', { meta: { bpm: 'fast', tempo: 100, timeSig: 44 } });

    const project = await loadProject(path);

    expect(project).toMatchObject({ id: 'groove', displayName: 'groove', artist: '', bpm: 100 });
    expect(project.timeSig).toBeUndefined();
  });

  it('reads a tempo written as a numeric string', async () => {
    const path = await writeProject('quoted.json', { meta: { bpm: '90', timeSig: '3/4' } });
    expect((await loadProject(path)).bpm).toBe(90);
  });

  it('rejects unparseable files with a load error', async () => {
    const path = await writeProject('broken.json', '{ "meta": ');
    await expect(loadProject(path)).rejects.toBeInstanceOf(ProjectLoadError);
  });

  it('skips malformed entries and non-json files', async () => {
    await writeProject('a.json', { id: 'alpha' });
    await writeProject('b.json', 'not json');
    await writeProject('c.json', { meta: { title: 'Charlie' } });
    await writeProject('d.txt', { id: 'ignored' });
    await writeProject('e.json', [1, 2, 3]);

    const projects = await loadProjectCatalog(dir);

    expect(projects.map(p => p.id)).toEqual(['alpha', 'c']);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('keeps the first of two projects sharing an id', async () => {
    await writeProject('a.json', { id: 'same', meta: { title: 'First' } });
    await writeProject('b.json', { id: 'same', meta: { title: 'Second' } });

    const projects = await loadProjectCatalog(dir);

    expect(projects).toHaveLength(1);
    expect(projects[0].displayName).toBe('First');
  });

  it('accepts a single file path', async () => {
    const path = await writeProject('solo.json', { meta: { bpm: 140 } });
    const projects = await loadProjectCatalog(path);
    expect(projects.map(p => p.id)).toEqual(['solo']);
  });

  it('fails when nothing can be loaded', async () => {
    await writeProject('b.json', 'not json');
    await expect(loadProjectCatalog(dir)).rejects.toMatchObject({ code: 'CATALOG_EMPTY' });
    await expect(loadProjectCatalog(join(dir, 'missing'))).rejects.toMatchObject({ code: 'CATALOG_EMPTY' });
  });
});
