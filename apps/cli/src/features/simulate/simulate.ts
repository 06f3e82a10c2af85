import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { formatZodIssues, getErrorMessage } from '@levy/core';
import type { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { SimulateCommandOptionsSchema } from '../shared/schemas.js';

import { SimulateHandler } from './simulate-handler.js';
import { ScenarioSchema, type SimulationReport } from './simulate-types.js';

/**
 * Simulate command options validated by Zod at CLI boundary
 */
export type SimulateCommandOptions = z.infer<typeof SimulateCommandOptionsSchema>;

export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate')
    .description('Run a scenario file of transfers and policy changes against a fresh token')
    .argument('<scenario>', 'Path to the scenario JSON file')
    .option('--json', 'Output results in JSON format')
    .option('--strict', 'Exit with an error if any operation is rejected')
    .addHelpText(
      'after',
      `
Examples:
  $ levy simulate examples/launch.json
  $ levy simulate examples/launch.json --json --strict
`
    )
    .action(async (scenarioPath: string, rawOptions: unknown) => {
      await executeSimulateCommand(scenarioPath, rawOptions);
    });
}

async function executeSimulateCommand(scenarioPath: string, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = SimulateCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('simulate', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const resolved = path.resolve(scenarioPath);
  let raw: string;
  try {
    raw = await readFile(resolved, 'utf8');
  } catch (error) {
    output.error('simulate', new Error(`Cannot read ${resolved}: ${getErrorMessage(error)}`), ExitCodes.NOT_FOUND);
    return;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    output.error(
      'simulate',
      new Error(`${resolved} is not valid JSON: ${getErrorMessage(error)}`),
      ExitCodes.VALIDATION_ERROR
    );
    return;
  }

  const scenario = ScenarioSchema.safeParse(json);
  if (!scenario.success) {
    output.error(
      'simulate',
      new Error(`Invalid scenario:\n${formatZodIssues(scenario.error)}`),
      ExitCodes.VALIDATION_ERROR,
      scenario.error.issues
    );
    return;
  }

  const result = new SimulateHandler().execute(scenario.data);
  if (result.isErr()) {
    output.error('simulate', result.error, ExitCodes.VALIDATION_ERROR);
    return;
  }

  const report = result.value;
  if (output.isJsonMode()) {
    output.json('simulate', report, { scenario: resolved });
  } else {
    displayReport(output, report, options.strict === true);
  }

  if (options.strict && report.rejected > 0) {
    process.exitCode = ExitCodes.GENERAL_ERROR;
  }
}

function displayReport(output: OutputManager, report: SimulationReport, strict: boolean): void {
  output.intro(`levy simulate · ${report.token.name} (${report.token.symbol})`);

  for (const outcome of report.outcomes) {
    const label = `#${outcome.index + 1} ${outcome.op}`;
    if (outcome.status === 'committed') {
      output.log(`${pc.green('✓')} ${label}: ${outcome.summary}`);
    } else {
      output.log(`${pc.red('✗')} ${label}: ${pc.red(outcome.code ?? 'REJECTED')} ${pc.dim(outcome.summary)}`);
    }
  }

  const width = Math.max(0, ...report.holders.map((holder) => holder.balance.length));
  output.note(
    report.holders.map((holder) => `${holder.account}  ${holder.balance.padStart(width)}`).join('\n') || '(no holders)',
    `Holders · supply ${report.token.totalSupply}`
  );

  if (strict && report.rejected > 0) {
    output.warn(`--strict: ${report.rejected} rejected operation(s), exiting with an error`);
  }

  const summary = `${report.committed} committed, ${report.rejected} rejected · policy v${report.policyVersion}`;
  output.outro(report.rejected > 0 ? pc.yellow(summary) : pc.green(summary));
}
