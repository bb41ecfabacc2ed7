#!/usr/bin/env -S npx tsx
/**
 * qseqc — experiment compiler command line
 *
 * Usage:
 *   npx tsx qseqc.ts <experiment.json> <setup.json> [settings.json] [options]
 *
 * Options:
 *   --verbose   Show warnings in full, the results shape and the schedule manifest summary
 *   --listing   Show the program listing of every device
 *   --simulate  Run the programs in the simulator and report end times and stalls
 *   --json      Output compile result as JSON
 *   --quiet     Only show errors
 */
import { readFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { formatProgram } from './src/core/codegen/serializer';
import { compileExperiment } from './src/core/compiler';
import type { CompilationResult } from './src/core/compiler';
import { tinyToSeconds } from './src/core/constants';
import type { CompilerError } from './src/core/errors';
import { parseExperiment } from './src/core/experiment/serializer';
import { parseSettings } from './src/core/settings';
import { parseSetup } from './src/core/setup/topology';
import { simulate } from './src/core/simulator/simulator';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const USAGE = [
  'qseqc — pulse experiment compiler',
  '',
  'Usage: qseqc <experiment.json> <setup.json> [settings.json] [options]',
  '',
  'Options:',
  '  --verbose   Show warnings in full, the results shape and the manifest summary',
  '  --listing   Show the program listing of every device',
  '  --simulate  Run the programs in the simulator',
  '  --json      Output compile result as JSON',
  '  --quiet     Only show errors',
];

class CliError extends Error {}

// ---- Input ----

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch {
    throw new CliError(`Error: cannot read file '${path}'`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CliError(`Error: '${path}' is not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
}

function formatError(err: CompilerError): string {
  const node = err.nodeId ? ` ${err.nodeId}` : '';
  const window = err.window ? ` @ ${err.window.start}..${err.window.end}` : '';
  return `[${err.code}]${node}${window}: ${err.message}`;
}

function reportErrors(out: CliOutput, file: string, errors: readonly CompilerError[]): number {
  out.error(`\x1b[31m✗ ${file}: ${errors.length} error(s)\x1b[0m`);
  for (const err of errors) out.error(`  ${formatError(err)}`);
  return 1;
}

// ---- Output ----

function jsonResult(file: string, result: CompilationResult): string {
  return JSON.stringify({
    file,
    experiment: result.experiment,
    hash: result.hash,
    errors: result.errors.map(e => ({ code: e.code, nodeId: e.nodeId, window: e.window, message: e.message })),
    warnings: result.warnings,
    programs: result.programs,
    manifest: result.manifest,
    resultsShape: result.resultsShape,
  }, null, 2);
}

function printSummary(out: CliOutput, result: CompilationResult): void {
  out.log(`  hash ${result.hash.slice(0, 12)}`);
  for (const p of result.programs) {
    const instructions = p.programs.reduce((n, rt) => n + rt.instructions.length, 0);
    out.log(
      `  ${p.device.padEnd(10)} ${p.deviceClass.padEnd(6)} ${p.waveforms.length} waveform(s), ` +
      `${p.commandTable.length} command table entr${p.commandTable.length === 1 ? 'y' : 'ies'}, ` +
      `${p.programs.length} program(s), ${instructions} instruction(s)`,
    );
  }
}

function printVerbose(out: CliOutput, result: CompilationResult): void {
  const shape = result.resultsShape;
  if (shape) {
    out.log('');
    out.log(`  \x1b[1mResults (${shape.acquisitionType}, ${shape.averagingMode}):\x1b[0m`);
    for (const h of shape.handles) {
      out.log(`    ${h.handle.padEnd(12)} [${h.shape.join(', ')}]  ${h.axes.map(a => `${a.name}:${a.kind}`).join(' ')}`);
    }
  }
  const manifest = result.manifest;
  if (manifest) {
    out.log('');
    out.log(`  \x1b[1mSchedule:\x1b[0m ${manifest.steps.length} step(s), ${manifest.entries.length} window(s)` +
      `${manifest.truncated ? ' (truncated)' : ''}, system grid ${manifest.systemGrid}`);
    for (const step of manifest.steps) {
      out.log(`    step ${step.index} [${step.indices.join(', ')}] ends at ${tinyToSeconds(step.end)} s`);
    }
  }
}

function printSimulation(out: CliOutput, result: CompilationResult): void {
  const { events, finished, stalled } = simulate(result.programs);
  out.log('');
  out.log(`  \x1b[1mSimulation:\x1b[0m ${events.length} event(s)`);
  for (const [device, time] of Object.entries(finished)) {
    out.log(`    ${device.padEnd(10)} done at ${tinyToSeconds(time)} s`);
  }
  for (const s of stalled) {
    out.log(`    \x1b[31m${s.device.padEnd(10)} stalled at ${tinyToSeconds(s.time)} s waiting for marker ${s.marker}\x1b[0m`);
  }
}

// ---- Main ----

export function main(argv: readonly string[], out: CliOutput): number {
  const flags = new Set(argv.filter(a => a.startsWith('--')));
  const files = argv.filter(a => !a.startsWith('--'));

  if (files.length < 2) {
    for (const line of USAGE) out.error(line);
    return 1;
  }

  const [experimentPath, setupPath] = files;
  const settingsPath: string | undefined = files[2];
  const verbose = flags.has('--verbose');
  const quiet = flags.has('--quiet');

  let inputs: { experiment: unknown; setup: unknown; settings: unknown };
  try {
    inputs = {
      experiment: readJson(experimentPath),
      setup: readJson(setupPath),
      settings: settingsPath === undefined ? {} : readJson(settingsPath),
    };
  } catch (err) {
    if (!(err instanceof CliError)) throw err;
    out.error(err.message);
    return 1;
  }

  const { experiment, errors: experimentErrors } = parseExperiment(inputs.experiment);
  if (!experiment) return reportErrors(out, experimentPath, experimentErrors);
  const { setup, errors: setupErrors } = parseSetup(inputs.setup);
  if (!setup) return reportErrors(out, setupPath, setupErrors);
  const { settings, errors: settingsErrors } = parseSettings(inputs.settings);
  if (!settings) return reportErrors(out, settingsPath ?? experimentPath, settingsErrors);

  const result = compileExperiment(experiment, setup, settings);

  if (flags.has('--json')) {
    out.log(jsonResult(experimentPath, result));
    return result.errors.length > 0 ? 1 : 0;
  }

  if (result.errors.length > 0) return reportErrors(out, experimentPath, result.errors);

  if (quiet) {
    out.log(`\x1b[32m✓ ${experimentPath}\x1b[0m`);
    return 0;
  }

  out.log(`\x1b[32m✓ ${experimentPath}\x1b[0m — compiled successfully`);
  for (const w of result.warnings) {
    out.log(verbose ? `  \x1b[33mwarning [${w.code}]${w.nodeId ? ` ${w.nodeId}` : ''}: ${w.message}\x1b[0m` : `  \x1b[33mwarning: ${w.message}\x1b[0m`);
  }
  out.log('');
  printSummary(out, result);

  if (verbose) printVerbose(out, result);

  if (flags.has('--listing')) {
    for (const p of result.programs) {
      out.log('');
      for (const line of formatProgram(p).split('\n')) out.log(`    ${line}`);
    }
  }

  if (flags.has('--simulate')) printSimulation(out, result);
  return 0;
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = main(process.argv.slice(2), {
    log: line => console.log(line),
    error: line => console.error(line),
  });
}
