import { writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError } from '../control-plane/errors.js';
import { ProjectRegistry } from '../state/project-registry.js';
import { makeTempDir, type TempDir } from './helpers/fakes.js';

describe('ProjectRegistry', () => {
  let tmp: TempDir;
  let registry: ProjectRegistry;

  beforeEach(() => {
    tmp = makeTempDir();
    registry = new ProjectRegistry(join(tmp.path, 'home', 'projects.json'));
  });

  afterEach(() => tmp.cleanup());

  it('is empty before anything is added', async () => {
    await expect(registry.list()).resolves.toEqual([]);
  });

  it('adds a project under a slug of its name with absolute paths', async () => {
    const project = await registry.add(
      { name: 'Acme Payments', regulationPath: 'reg.json', procedurePaths: ['docs/backup.md'] },
      new Date('2026-02-01T10:00:00.000Z')
    );

    expect(project).toEqual({
      id: 'acme-payments',
      name: 'Acme Payments',
      regulationPath: resolve('reg.json'),
      procedurePaths: [resolve('docs/backup.md')],
      createdAt: '2026-02-01T10:00:00.000Z',
    });
    await expect(new ProjectRegistry(registry.path).list()).resolves.toEqual([project]);
  });

  it('refuses a second project with the same id', async () => {
    await registry.add({ name: 'Acme', regulationPath: 'reg.json', procedurePaths: [] });

    await expect(registry.add({ name: 'ACME', regulationPath: 'reg.json', procedurePaths: [] })).rejects.toThrow(
      'a project with id "acme" already exists'
    );
  });

  it('finds projects by id or by name', async () => {
    await registry.add({ name: 'Acme Payments', regulationPath: 'reg.json', procedurePaths: [] });

    expect((await registry.get('acme-payments'))?.name).toBe('Acme Payments');
    expect((await registry.get('Acme Payments'))?.id).toBe('acme-payments');
    expect(await registry.get('unknown')).toBeUndefined();
  });

  it('removes a project', async () => {
    await registry.add({ name: 'Acme', regulationPath: 'reg.json', procedurePaths: [] });
    await registry.add({ name: 'Globex', regulationPath: 'reg.json', procedurePaths: [] });

    expect((await registry.remove('acme'))?.name).toBe('Acme');
    expect((await registry.list()).map((p) => p.id)).toEqual(['globex']);
    expect(await registry.remove('acme')).toBeUndefined();
  });

  it('refuses to read a corrupt registry', async () => {
    const corrupt = new ProjectRegistry(join(tmp.path, 'projects.json'));
    writeFileSync(corrupt.path, '{"projects": [');

    await expect(corrupt.list()).rejects.toBeInstanceOf(PersistenceError);
  });
});
