import path from 'node:path';
import type { PackageManager } from './config.js';
import type { IConnectivityChecker } from './checks.js';
import type { IPrompter } from './prompts.js';
import { getLogger } from './log.js';
import { assertTargetAvailable, scaffoldProject, ScaffoldError } from './scaffold.js';
import { runWizard, WizardAbortedError } from './wizard.js';

export interface ICreateAppOptions {
  projectName?: string;
  packageManager?: PackageManager;
  yes: boolean;
  skipChecks: boolean;
  skipInstall: boolean;
  force: boolean;

  /**
   * Directory the project folder is created in.
   */
  cwd: string;
  templateDir?: string;
  userAgent?: string;
}

export interface ICreateAppDependencies {
  prompter: IPrompter;
  checker: IConnectivityChecker;
  install: (packageManager: PackageManager, cwd: string) => Promise<void>;
  print: (line: string) => void;
  generateToken?: () => string;
}

/**
 * Run the wizard and scaffold the project.
 *
 * @returns Process exit code: 0 on success, 1 when aborted or failed
 */
export async function createApp(options: ICreateAppOptions, deps: ICreateAppDependencies): Promise<number> {
  const log = getLogger('create-app');
  const { print } = deps;

  try {
    // Fail before any question when the name was given and the folder is taken
    if (options.projectName) {
      await assertTargetAvailable(path.resolve(options.cwd, options.projectName), options.force);
    }

    const config = await runWizard(options, deps);
    const targetDir = path.resolve(options.cwd, config.projectName);

    const files = await scaffoldProject(config, {
      targetDir,
      templateDir: options.templateDir,
      force: options.force
    });
    log.info({ targetDir, files }, 'Project scaffolded');
    print(`Created ${config.projectName} in ${targetDir}`);

    if (options.skipInstall) {
      print(`Skipped dependency installation; run "${config.packageManager} install" in ${targetDir}.`);
    } else {
      print(`Installing dependencies with ${config.packageManager}...`);
      try {
        await deps.install(config.packageManager, targetDir);
      } catch (error) {
        log.error({ error }, 'Dependency installation failed');
        print(`Dependency installation failed: ${error instanceof Error ? error.message : String(error)}`);
        print(`The project was written; run "${config.packageManager} install" in ${targetDir} to retry.`);
        return 1;
      }
    }

    print('');
    print('Next steps:');
    print(`  cd ${config.projectName}`);
    print(`  ${config.packageManager} run start`);
    return 0;
  } catch (error) {
    if (error instanceof WizardAbortedError || error instanceof ScaffoldError) {
      print(error.message);
      return 1;
    }
    throw error;
  }
}
