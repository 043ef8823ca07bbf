#!/usr/bin/env node
import { Command, Option } from 'commander';
import { ConnectivityChecker } from './checks.js';
import { PACKAGE_MANAGERS, packageManagerSchema } from './config.js';
import { createApp } from './create-app.js';
import { installDependencies } from './install.js';
import { getLogger } from './log.js';
import { EnquirerPrompter } from './prompts.js';

type CliOptions = {
  yes?: boolean;
  skipChecks?: boolean;
  skipInstall?: boolean;
  force?: boolean;
  packageManager?: string;
};

const program = new Command();

program
  .name('create-enfyra-app')
  .description('Create an Enfyra server project and write its .env')
  .version('1.0.0')
  .argument('[project-name]', 'Project folder and package name')
  .option('-y, --yes', 'Accept every default without prompting')
  .option('--skip-checks', 'Do not test the MongoDB and Redis connections')
  .option('--skip-install', 'Do not install dependencies')
  .option('-f, --force', 'Write into a non-empty directory')
  .addOption(new Option('--package-manager <name>', 'Package manager used to install').choices(PACKAGE_MANAGERS))
  .action(async (projectName: string | undefined, options: CliOptions) => {
    const packageManager =
      options.packageManager === undefined ? undefined : packageManagerSchema.parse(options.packageManager);

    process.exitCode = await createApp(
      {
        projectName,
        packageManager,
        yes: options.yes ?? false,
        skipChecks: options.skipChecks ?? false,
        skipInstall: options.skipInstall ?? false,
        force: options.force ?? false,
        cwd: process.cwd(),
        userAgent: process.env.npm_config_user_agent
      },
      {
        prompter: new EnquirerPrompter(),
        checker: new ConnectivityChecker(),
        install: installDependencies,
        print: line => console.log(line)
      }
    );
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  getLogger().error({ error }, 'create-enfyra-app failed');
  const details = error instanceof Error && error.message ? error.message : 'unknown error';
  console.error(`create-enfyra-app failed: ${details}`);
  process.exit(1);
}
