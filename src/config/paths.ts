import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export interface ProjectPaths {
  runState: string;
  indexDir: string;
}

export function resolveHome(explicit?: string, env: Record<string, string | undefined> = process.env): string {
  const fromEnv = env.REGAUDIT_HOME?.trim();
  return resolve(explicit ?? (fromEnv ? fromEnv : join(homedir(), '.regaudit')));
}

export function registryPath(home: string): string {
  return join(home, 'projects.json');
}

export function cacheDir(home: string): string {
  return join(home, 'cache');
}

export function projectPaths(home: string, projectId: string): ProjectPaths {
  const root = join(home, 'projects', projectId);
  return {
    runState: join(root, 'run.json'),
    indexDir: join(root, 'index'),
  };
}
