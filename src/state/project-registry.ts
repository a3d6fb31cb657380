import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../control-plane/errors.js';
import type { Project } from '../control-plane/types.js';
import { slugify } from '../utils/id.js';

const ProjectSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  regulationPath: z.string().min(1),
  procedurePaths: z.array(z.string()),
  createdAt: z.string(),
});

const RegistryFileSchema = z.object({
  projects: z.array(ProjectSchema),
});

export interface NewProject {
  name: string;
  regulationPath: string;
  procedurePaths: string[];
}

/** Maps project ids to their inputs. Backed by one JSON file. */
export class ProjectRegistry {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async list(): Promise<Project[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch {
      return [];
    }
    if (raw.trim().length === 0) return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(this.path, `project registry is not valid JSON: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const parsed = RegistryFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(this.path, 'project registry has an unexpected shape');
    }
    return parsed.data.projects;
  }

  /** Looks a project up by id, falling back to an exact name match. */
  async get(idOrName: string): Promise<Project | undefined> {
    const projects = await this.list();
    return projects.find((p) => p.id === idOrName) ?? projects.find((p) => p.name === idOrName);
  }

  async add(input: NewProject, now: Date = new Date()): Promise<Project> {
    const projects = await this.list();
    const id = slugify(input.name);
    if (projects.some((p) => p.id === id)) {
      throw new Error(`a project with id "${id}" already exists`);
    }

    const project: Project = {
      id,
      name: input.name,
      regulationPath: resolve(input.regulationPath),
      procedurePaths: input.procedurePaths.map((p) => resolve(p)),
      createdAt: now.toISOString(),
    };
    await this.write([...projects, project]);
    return project;
  }

  async remove(idOrName: string): Promise<Project | undefined> {
    const projects = await this.list();
    const target = projects.find((p) => p.id === idOrName) ?? projects.find((p) => p.name === idOrName);
    if (!target) return undefined;
    await this.write(projects.filter((p) => p !== target));
    return target;
  }

  private async write(projects: Project[]): Promise<void> {
    const tempPath = `${this.path}.tmp.${process.pid}`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, JSON.stringify({ projects }, null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.path);
    } catch (err) {
      throw new PersistenceError(this.path, `cannot write project registry: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
