/// <reference types="vitest" />

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createApp, type ICreateAppOptions } from '../create-app.js';
import type { PackageManager } from '../config.js';
import { FakeChecker, ScriptedPrompter, TEST_TOKEN } from './fakes.js';

describe('createApp', () => {
  let cwd: string;
  let checker: FakeChecker;
  let install: Mock<(packageManager: PackageManager, cwd: string) => Promise<void>>;
  let output: string[];

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), 'create-enfyra-app-run-'));
    checker = new FakeChecker();
    install = vi.fn<(packageManager: PackageManager, cwd: string) => Promise<void>>(async () => undefined);
    output = [];
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  function run(options: Partial<ICreateAppOptions>, answers: Array<string | boolean | null> = []) {
    return createApp(
      { yes: false, skipChecks: false, skipInstall: false, force: false, cwd, ...options },
      {
        prompter: new ScriptedPrompter(answers),
        checker,
        install,
        print: line => output.push(line),
        generateToken: () => TEST_TOKEN
      }
    );
  }

  it('should scaffold and install with --yes', async () => {
    const code = await run({ yes: true, projectName: 'shop', packageManager: 'pnpm' });

    const targetDir = path.join(cwd, 'shop');
    expect(code).toBe(0);
    expect(install).toHaveBeenCalledWith('pnpm', targetDir);
    expect(await readFile(path.join(targetDir, '.env'), 'utf8')).toContain('REDIS_NAMESPACE=shop\n');
    expect(output).toContain(`Created shop in ${targetDir}`);
    expect(output.slice(-3)).toEqual(['Next steps:', '  cd shop', '  pnpm run start']);
  });

  it('should skip installation when asked to', async () => {
    const code = await run({ yes: true, projectName: 'shop', skipInstall: true });

    expect(code).toBe(0);
    expect(install).not.toHaveBeenCalled();
    expect(output).toContain(`Skipped dependency installation; run "npm install" in ${path.join(cwd, 'shop')}.`);
  });

  it('should report a failed installation with exit code 1', async () => {
    install.mockRejectedValueOnce(new Error('npm install exited with code 1'));

    const code = await run({ yes: true, projectName: 'shop' });

    expect(code).toBe(1);
    expect(output).toContain('Dependency installation failed: npm install exited with code 1');
    expect(await readdir(path.join(cwd, 'shop'))).toContain('.env');
  });

  it('should write nothing when the wizard is aborted', async () => {
    checker.checkMongo.mockResolvedValueOnce({ ok: false, error: 'connect ECONNREFUSED 127.0.0.1:27017' });

    const code = await run({}, ['shop', 'npm', '', 'abort']);

    expect(code).toBe(1);
    expect(output[output.length - 1]).toBe('Aborted');
    expect(await readdir(cwd)).toEqual([]);
    expect(install).not.toHaveBeenCalled();
  });

  it('should stop before asking anything when the target is not empty', async () => {
    await mkdir(path.join(cwd, 'shop'));
    await writeFile(path.join(cwd, 'shop', 'index.js'), '');

    const code = await run({ projectName: 'shop' });

    expect(code).toBe(1);
    expect(output).toEqual([`Directory ${path.join(cwd, 'shop')} is not empty; use --force to write into it anyway`]);
    expect(checker.checkMongo).not.toHaveBeenCalled();
  });
});
