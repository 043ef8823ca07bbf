import { spawn } from 'node:child_process';
import type { PackageManager } from './config.js';

/**
 * Run `<packageManager> install` in the project directory with the output
 * passed through to the terminal.
 *
 * @throws When the package manager cannot be started or exits non-zero
 */
export function installDependencies(packageManager: PackageManager, cwd: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(packageManager, ['install'], {
      cwd,
      stdio: 'inherit',
      // npm, yarn and pnpm are .cmd shims on Windows
      shell: process.platform === 'win32'
    });

    child.once('error', reject);
    child.once('close', (code: number | null) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`${packageManager} install exited with code ${code ?? 'null'}`));
      }
    });
  });
}
