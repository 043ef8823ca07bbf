import { randomBytes } from 'node:crypto';
import type { z } from 'zod';
import {
  DEFAULT_PORT,
  DEFAULT_PROJECT_NAME,
  DEFAULT_REDIS_URL,
  PACKAGE_MANAGERS,
  adminTokenSchema,
  defaultMongodbUri,
  detectPackageManager,
  mongodbUriSchema,
  portSchema,
  projectNameSchema,
  redactCredentials,
  redisNamespaceSchema,
  redisUrlSchema,
  validatorFor,
  type IProjectConfig,
  type PackageManager
} from './config.js';
import type { CheckResult, IConnectivityChecker } from './checks.js';
import type { IPrompter } from './prompts.js';

export interface IWizardOptions {
  projectName?: string;
  packageManager?: PackageManager;

  /**
   * Accept every default without prompting.
   */
  yes: boolean;
  skipChecks: boolean;

  /**
   * Value of `npm_config_user_agent`, used to preselect the package manager.
   */
  userAgent?: string;
}

export interface IWizardDependencies {
  prompter: IPrompter;
  checker: IConnectivityChecker;
  print: (line: string) => void;
  generateToken?: () => string;
}

type CheckFailureAction = 'retry' | 'continue' | 'abort';

/**
 * Raised when the user aborts or cancels the wizard.
 */
export class WizardAbortedError extends Error {
  constructor(message = 'Aborted') {
    super(message);
    this.name = 'WizardAbortedError';
  }
}

export function generateAdminToken(): string {
  return randomBytes(24).toString('hex');
}

/**
 * Collects the project configuration.
 *
 * Every question has a default. With `yes` the defaults are taken as they
 * are, and a failed connectivity check aborts instead of offering a retry.
 *
 * @throws WizardAbortedError when the user aborts, cancels a prompt or
 *   declines the summary
 */
export async function runWizard(options: IWizardOptions, deps: IWizardDependencies): Promise<IProjectConfig> {
  const { prompter, checker, print } = deps;

  async function ask<T>(message: string, initial: string, schema: z.ZodType<T>): Promise<T> {
    let current = initial;
    for (;;) {
      const answer = options.yes ? current : await prompter.input({ message, default: current, validate: validatorFor(schema) });
      if (answer === null) {
        throw new WizardAbortedError('Cancelled');
      }
      const parsed = schema.safeParse(answer);
      if (parsed.success) {
        return parsed.data;
      }
      const issue = parsed.error.issues[0]?.message ?? 'Invalid value';
      if (options.yes) {
        throw new WizardAbortedError(`${message}: ${issue}`);
      }
      print(`  ${issue}`);
      current = answer;
    }
  }

  /**
   * Ask for a connection string until it passes the check or the user
   * decides to continue without it.
   */
  async function askChecked(
    service: string,
    message: string,
    initial: string,
    schema: z.ZodType<string>,
    check: (value: string) => Promise<CheckResult>
  ): Promise<string> {
    let current = initial;
    for (;;) {
      const value = await ask(message, current, schema);
      if (options.skipChecks) {
        return value;
      }

      print(`Checking ${service} at ${redactCredentials(value)}...`);
      const result = await check(value);
      if (result.ok) {
        print(`${service} is reachable.`);
        return value;
      }

      print(`${service} check failed: ${result.error}`);
      if (options.yes) {
        throw new WizardAbortedError(`${service} is not reachable; rerun with --skip-checks to continue without it`);
      }

      const action = await prompter.select<CheckFailureAction>({
        message: `${service} is not reachable. What now?`,
        choices: [
          { value: 'retry', name: 'Retry', description: 'enter the value again' },
          { value: 'continue', name: 'Continue anyway' },
          { value: 'abort', name: 'Abort' }
        ]
      });
      if (action === null || action === 'abort') {
        throw new WizardAbortedError();
      }
      if (action === 'continue') {
        return value;
      }
      current = value;
    }
  }

  const projectName = await ask('Project name', options.projectName ?? DEFAULT_PROJECT_NAME, projectNameSchema);

  let packageManager = options.packageManager ?? detectPackageManager(options.userAgent);
  if (!options.yes && !options.packageManager) {
    const preferred = packageManager;
    const choice = await prompter.select<PackageManager>({
      message: 'Package manager',
      // Detected manager first so it is preselected
      choices: [preferred, ...PACKAGE_MANAGERS.filter(name => name !== preferred)].map(name => ({
        value: name,
        name
      }))
    });
    if (choice === null) {
      throw new WizardAbortedError('Cancelled');
    }
    packageManager = choice;
  }

  const mongodbUri = await askChecked('MongoDB', 'MongoDB URI', defaultMongodbUri(projectName), mongodbUriSchema, uri =>
    checker.checkMongo(uri)
  );
  const redisUrl = await askChecked('Redis', 'Redis URL', DEFAULT_REDIS_URL, redisUrlSchema, url =>
    checker.checkRedis(url)
  );
  const redisNamespace = await ask('Redis key namespace', projectName, redisNamespaceSchema);
  const port = await ask('HTTP port', String(DEFAULT_PORT), portSchema);
  const adminToken = await ask('Admin API token', (deps.generateToken ?? generateAdminToken)(), adminTokenSchema);

  const config: IProjectConfig = {
    projectName,
    packageManager,
    mongodbUri,
    redisUrl,
    redisNamespace,
    port,
    adminToken
  };

  print('');
  for (const line of summarize(config)) {
    print(line);
  }
  print('');

  if (!options.yes) {
    const confirmed = await prompter.confirm({ message: 'Create the project with these settings?', default: true });
    if (confirmed !== true) {
      throw new WizardAbortedError();
    }
  }

  return config;
}

/**
 * Summary lines shown before confirmation. The admin token is shortened.
 */
export function summarize(config: IProjectConfig): string[] {
  return [
    `  Project:          ${config.projectName}`,
    `  Package manager:  ${config.packageManager}`,
    `  MongoDB URI:      ${redactCredentials(config.mongodbUri)}`,
    `  Redis URL:        ${redactCredentials(config.redisUrl)}`,
    `  Redis namespace:  ${config.redisNamespace}`,
    `  HTTP port:        ${config.port}`,
    `  Admin API token:  ${config.adminToken.slice(0, 6)}...`
  ];
}
