#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { copyFileSync, existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { TestbedConfigLoader, loadDefaultConfig } from './config';
import { createLogger } from './logging';
import { Environment, ensureEnvironment, inspectEnvironment, teardownEnvironment } from './orchestration';
import type { TestbedConfig } from './types';

const PACKAGE_ROOT = join(__dirname, '..');
const SAMPLE_CONFIG = join(PACKAGE_ROOT, 'templates', 'vcd-testbed.sample.yml');

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(PACKAGE_ROOT, 'package.json'), 'utf8'));
  if (manifest !== null && typeof manifest === 'object' && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

async function loadConfig(path: string | undefined): Promise<TestbedConfig> {
  return path ? new TestbedConfigLoader().load(resolve(process.cwd(), path)) : loadDefaultConfig();
}

function createEnvironment(config: TestbedConfig, verbose: boolean): Environment {
  const logger = createLogger({
    name: 'vcd-testbed',
    filename: config.logging.default_log_filename,
    console: verbose,
    level: verbose ? 'debug' : 'info'
  });
  return Environment.init(config, { logger });
}

function fail(spinner: Ora, title: string, error: unknown, verbose = false): void {
  spinner.fail(title);
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  if (verbose) {
    console.error(error);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('vcd-testbed')
  .description('Provision and tear down a vCloud Director test environment')
  .version(readVersion());

program
  .command('ensure')
  .description('Create whatever part of the test environment is missing')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-v, --verbose', 'Log every step to the console')
  .option('--dry-run', 'Validate the configuration and report what exists without changing anything')
  .action(async (options: { config?: string; verbose?: boolean; dryRun?: boolean }) => {
    const spinner = ora('Loading configuration...').start();
    const verbose = options.verbose ?? false;
    let environment: Environment | null = null;

    try {
      const config = await loadConfig(options.config);
      environment = createEnvironment(config, verbose);

      if (options.dryRun) {
        spinner.text = `Inspecting ${config.vcd.host} (dry run)...`;
        const entries = await inspectEnvironment(environment);
        spinner.succeed('Dry run completed - configuration is valid');
        for (const entry of entries) {
          const state = entry.href ? chalk.green('present') : chalk.yellow('would be created');
          console.log(`  ${entry.kind.padEnd(12)} ${entry.name.padEnd(30)} ${state}`);
        }
        return;
      }

      spinner.text = `Provisioning on ${config.vcd.host}...`;
      const { report } = await ensureEnvironment(environment);
      spinner.succeed('Test environment is ready');

      for (const resource of report.resources) {
        const status = resource.status === 'created' ? chalk.green('created') : chalk.gray('reused');
        console.log(`  ${resource.kind.padEnd(12)} ${resource.name.padEnd(30)} ${status}`);
      }
      console.log(chalk.gray(`\nRun ${report.metadata.runId} took ${report.metadata.duration ?? 0}ms`));
    } catch (error) {
      fail(spinner, 'Provisioning failed', error, verbose);
    } finally {
      await environment?.reset();
    }
  });

program
  .command('teardown')
  .description('Delete the test vApp and VDC')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-f, --force', 'Tear down even in developer mode')
  .action(async (options: { config?: string; force?: boolean }) => {
    const spinner = ora('Loading configuration...').start();
    let environment: Environment | null = null;

    try {
      const config = await loadConfig(options.config);
      environment = createEnvironment(config, false);

      spinner.text = `Tearing down on ${config.vcd.host}...`;
      const report = await teardownEnvironment(environment, { force: options.force ?? false });
      if (report.skipped) {
        spinner.warn('Developer mode is on, nothing was deleted (use --force to override)');
        return;
      }

      spinner.succeed('Teardown completed');
      for (const { kind, name } of report.deleted) {
        console.log(`  ${kind.padEnd(12)} ${name.padEnd(30)} ${chalk.red('deleted')}`);
      }
      for (const { kind, name } of report.alreadyAbsent) {
        console.log(`  ${kind.padEnd(12)} ${name.padEnd(30)} ${chalk.gray('already absent')}`);
      }
    } catch (error) {
      fail(spinner, 'Teardown failed', error);
    } finally {
      await environment?.reset();
    }
  });

program
  .command('status')
  .description('Show which parts of the test environment exist')
  .option('-c, --config <path>', 'Path to configuration file')
  .action(async (options: { config?: string }) => {
    const spinner = ora('Checking test environment...').start();
    let environment: Environment | null = null;

    try {
      const config = await loadConfig(options.config);
      environment = createEnvironment(config, false);
      const entries = await inspectEnvironment(environment);
      spinner.succeed(`Status of the test environment on ${config.vcd.host}`);

      for (const entry of entries) {
        const state = entry.href ? chalk.green('present') : chalk.red('missing');
        console.log(`  ${entry.kind.padEnd(12)} ${entry.name.padEnd(30)} ${state}`);
      }
    } catch (error) {
      fail(spinner, 'Status check failed', error);
    } finally {
      await environment?.reset();
    }
  });

program
  .command('init')
  .description('Write a sample configuration file')
  .option('-o, --output <path>', 'Output configuration file path', 'vcd-testbed.yml')
  .action((options: { output: string }) => {
    const spinner = ora('Writing sample configuration...').start();

    try {
      if (existsSync(options.output)) {
        throw new Error(`${options.output} already exists`);
      }
      copyFileSync(SAMPLE_CONFIG, options.output);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\nNext steps:'));
      console.log('1. Fill in the vCloud Director host and credentials');
      console.log('2. Put the OVF template next to the configuration file');
      console.log(`3. Run: ${chalk.cyan(`vcd-testbed ensure -c ${options.output}`)}`);
    } catch (error) {
      fail(spinner, 'Initialization failed', error);
    }
  });

program.on('command:*', () => {
  console.error(chalk.red('Invalid command. See --help for available commands.'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
