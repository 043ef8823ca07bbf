import { existsSync } from 'node:fs';
import { chmod, copyFile, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { IProjectConfig } from './config.js';
import { renderEnvFile } from './env-file.js';

/**
 * Template files stored under a name npm would otherwise drop or rename when
 * the CLI is published.
 */
const RENAMED_FILES: Record<string, string> = {
  gitignore: '.gitignore'
};

export class ScaffoldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScaffoldError';
  }
}

/**
 * Nearest directory at or above `startDir` that holds a package.json. The
 * CLI runs from `src/` in the workspace and from `dist/<path>/src/` once built.
 *
 * @throws ScaffoldError when the filesystem root is reached first
 */
export function findPackageRoot(startDir: string): string {
  let dir = startDir;
  while (!existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ScaffoldError(`No package.json found above ${startDir}`);
    }
    dir = parent;
  }
  return dir;
}

export const DEFAULT_TEMPLATE_DIR = path.join(
  findPackageRoot(path.dirname(fileURLToPath(import.meta.url))),
  'template'
);

const packageJsonSchema = z.record(z.unknown());

/**
 * @returns True when the directory is missing or has no entries
 */
export async function isEmptyDirectory(dir: string): Promise<boolean> {
  try {
    const entries = await readdir(dir);
    return entries.length === 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
}

/**
 * Refuse to write into a non-empty directory unless forced.
 *
 * @throws ScaffoldError
 */
export async function assertTargetAvailable(targetDir: string, force: boolean): Promise<void> {
  if (!force && !(await isEmptyDirectory(targetDir))) {
    throw new ScaffoldError(`Directory ${targetDir} is not empty; use --force to write into it anyway`);
  }
}

async function copyTemplate(sourceDir: string, targetDir: string, relative: string, written: string[]): Promise<void> {
  await mkdir(path.join(targetDir, relative), { recursive: true });
  const entries = await readdir(path.join(sourceDir, relative), { withFileTypes: true });

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const from = path.join(relative, entry.name);
    if (entry.isDirectory()) {
      await copyTemplate(sourceDir, targetDir, from, written);
      continue;
    }
    const to = path.join(relative, RENAMED_FILES[entry.name] ?? entry.name);
    await copyFile(path.join(sourceDir, from), path.join(targetDir, to));
    written.push(to);
  }
}

export interface IScaffoldOptions {
  targetDir: string;
  templateDir?: string;
  force: boolean;
}

/**
 * Write the project: template files, the project name in package.json and
 * a `.env` readable by the owner only.
 *
 * @returns Paths written, relative to the target directory
 */
export async function scaffoldProject(config: IProjectConfig, options: IScaffoldOptions): Promise<string[]> {
  const { targetDir } = options;
  await assertTargetAvailable(targetDir, options.force);

  const written: string[] = [];
  await copyTemplate(options.templateDir ?? DEFAULT_TEMPLATE_DIR, targetDir, '', written);

  const packagePath = path.join(targetDir, 'package.json');
  const pkg = packageJsonSchema.parse(JSON.parse(await readFile(packagePath, 'utf8')));
  await writeFile(packagePath, JSON.stringify({ ...pkg, name: config.projectName }, null, 2) + '\n');

  const envPath = path.join(targetDir, '.env');
  await writeFile(envPath, renderEnvFile(config), { mode: 0o600 });
  // mode only applies when the file is created
  await chmod(envPath, 0o600);
  written.push('.env');

  return written;
}
