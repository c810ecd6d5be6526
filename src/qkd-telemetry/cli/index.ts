#!/usr/bin/env node
/**
 * QKD Telemetry CLI
 *
 * Generates raw per-scenario telemetry and consolidates it into the
 * feature dataset.
 */

import { join } from 'path';
import { Command, Option, OptionValues } from 'commander';
import chalk from 'chalk';
import { ALL_FAULT_TYPES } from '../types/common';
import { consolidate, CONSOLIDATED_FILE, expectedFileName } from '../dataset/consolidator';
import { defaultOutputPath, generateDataset } from '../engines/scenario-runner';
import { ConfigurationError, KernelError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  ConsolidateOptionsSchema,
  RunAllOptionsSchema,
  SimulateOptionsSchema,
  parseOptions,
  toSimulationConfig,
} from './options';

const log = createLogger('cli');

const DEFAULT_DATA_DIR = './data';

/**
 * Report a failed command and set a non-zero exit code
 */
function fail(error: unknown): void {
  if (error instanceof ConfigurationError || error instanceof KernelError) {
    log.error(`${chalk.bold(error.code)} ${error.message}`);
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}

function addSimulationOptions(command: Command): Command {
  return command
    .option('--duration <ps>', 'Simulated time in ps', '1e12')
    .option('--fault-start <ps>', 'Fault trigger time in ps (default: half the duration)')
    .option('--sample-interval <ps>', 'Telemetry sampling interval in ps', '1e10')
    .option('--seed <n>', 'Random seed', '42')
    .addOption(
      new Option('--degrade-mode <mode>', 'When the degrade attenuation applies')
        .choices(['step', 'build'])
        .default('step')
    );
}

function runConsolidation(dataDir: string, output: string): void {
  const result = consolidate(dataDir, output);
  if (!result.ok) {
    // Nothing to merge is reported, not fatal
    log.warn(result.error.message);
    return;
  }
  console.log(chalk.green(`\n✓ ${result.value.rowCount} rows from ${result.value.files.length} files`));
}

/**
 * Build the command tree
 */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name('qkd-telemetry')
    .description('QKD network fault telemetry generator')
    .version('1.0.0');

  addSimulationOptions(
    program
      .command('simulate')
      .description('Run one scenario and write its raw telemetry CSV')
      .addOption(
        new Option('-f, --fault <type>', 'Scenario to simulate')
          .choices([...ALL_FAULT_TYPES])
          .makeOptionMandatory()
      )
      .option('-o, --output <path>', 'Output CSV (default: data/dataset_<fault>.csv)')
  ).action((raw: OptionValues) => {
    try {
      const options = parseOptions(SimulateOptionsSchema, raw);
      const output = options.output ?? defaultOutputPath(options.fault);
      generateDataset({ ...toSimulationConfig(options), faultType: options.fault }, output);
    } catch (error) {
      fail(error);
    }
  });

  program
    .command('consolidate')
    .description('Merge the per-scenario CSVs into one feature dataset')
    .option('-d, --data-dir <dir>', 'Directory holding dataset_<fault>.csv files', DEFAULT_DATA_DIR)
    .option('-o, --output <path>', `Output CSV (default: <data-dir>/${CONSOLIDATED_FILE})`)
    .action((raw: OptionValues) => {
      try {
        const options = parseOptions(ConsolidateOptionsSchema, raw);
        runConsolidation(options.dataDir, options.output ?? join(options.dataDir, CONSOLIDATED_FILE));
      } catch (error) {
        fail(error);
      }
    });

  addSimulationOptions(
    program
      .command('run-all')
      .description('Simulate all six scenarios, then consolidate')
      .option('-d, --data-dir <dir>', 'Output directory', DEFAULT_DATA_DIR)
  ).action((raw: OptionValues) => {
    try {
      const options = parseOptions(RunAllOptionsSchema, raw);
      const config = toSimulationConfig(options);
      for (const fault of ALL_FAULT_TYPES) {
        console.log(chalk.bold(`\n▶ ${fault}`));
        generateDataset({ ...config, faultType: fault }, join(options.dataDir, expectedFileName(fault)));
      }
      runConsolidation(options.dataDir, join(options.dataDir, CONSOLIDATED_FILE));
    } catch (error) {
      fail(error);
    }
  });

  return program;
}

if (require.main === module) {
  buildProgram().parse(process.argv);
}
