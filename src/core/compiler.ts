/**
 * Compiler main pipeline.
 * settings → resolve signals → resolve feedback → schedule → (programs, manifest, results shape)
 *
 * Every stage reports through an error list; the first stage that reports
 * anything stops the run and the result carries no device programs.
 */
import { contentHash } from './canonical';
import { generatePrograms } from './codegen/emitter';
import { collectErrors } from './errors';
import type { CompilerError } from './errors';
import type { Experiment } from './experiment/ir';
import { resolveFeedback } from './feedback/feedback';
import { buildResultsShape } from './results/shape';
import type { ResultsShape } from './results/shape';
import { buildManifest } from './scheduler/manifest';
import type { ScheduleManifest } from './scheduler/manifest';
import { scheduleExperiment } from './scheduler/scheduler';
import { parseSettings } from './settings';
import type { CompilerSettingsInput } from './settings';
import { resolveSignals } from './setup/resolver';
import type { DeviceSetup } from './setup/topology';
import type { CompileWarning, DeviceProgram } from './types';

export interface CompilationResult {
  experiment: string;
  /** sha-256 of the canonical inputs */
  hash: string;
  programs: DeviceProgram[];
  manifest?: ScheduleManifest;
  resultsShape?: ResultsShape;
  warnings: CompileWarning[];
  errors: CompilerError[];
}

/** Content hash of everything a compilation depends on. */
export function compilationKey(experiment: Experiment, setup: DeviceSetup, settings: CompilerSettingsInput = {}): string {
  return contentHash({ experiment, setup, settings });
}

function runPipeline(
  experiment: Experiment,
  setup: DeviceSetup,
  settingsInput: CompilerSettingsInput,
  hash: string,
): CompilationResult {
  const warnings: CompileWarning[] = [];
  const failed = (errors: CompilerError[]): CompilationResult => ({
    experiment: experiment.uid,
    hash,
    programs: [],
    warnings,
    errors,
  });

  const { settings, errors: settingsErrors } = parseSettings(settingsInput);
  if (!settings) return failed(settingsErrors);

  const resolve = resolveSignals(experiment, setup);
  warnings.push(...resolve.warnings);
  if (!resolve.result || resolve.errors.length > 0) return failed(resolve.errors);
  const resolved = resolve.result;

  const feedback = resolveFeedback(resolved, settings);
  warnings.push(...feedback.warnings);
  if (feedback.errors.length > 0) return failed(feedback.errors);

  const scheduled = scheduleExperiment(resolved, feedback.bindings);
  warnings.push(...scheduled.warnings);
  if (!scheduled.schedule || scheduled.errors.length > 0) return failed(scheduled.errors);
  const schedule = scheduled.schedule;

  const { programs, errors: codegenErrors } = generatePrograms(resolved, schedule, settings);
  if (codegenErrors.length > 0) return failed(codegenErrors);

  const { shape, errors: shapeErrors } = buildResultsShape(resolved, schedule);
  if (!shape || shapeErrors.length > 0) return failed(shapeErrors);

  return {
    experiment: experiment.uid,
    hash,
    programs,
    manifest: buildManifest(schedule, settings),
    resultsShape: shape,
    warnings,
    errors: [],
  };
}

/**
 * Compile an experiment against a device setup. Compiler errors are returned,
 * never thrown; anything else thrown is a bug and propagates.
 */
export function compileExperiment(
  experiment: Experiment,
  setup: DeviceSetup,
  settings: CompilerSettingsInput = {},
): CompilationResult {
  const hash = compilationKey(experiment, setup, settings);
  const { value, errors } = collectErrors(() => runPipeline(experiment, setup, settings, hash));
  return value ?? { experiment: experiment.uid, hash, programs: [], warnings: [], errors };
}

/** Like compileExperiment, but throws the first compiler error. */
export function compileOrThrow(
  experiment: Experiment,
  setup: DeviceSetup,
  settings: CompilerSettingsInput = {},
): CompilationResult {
  const result = compileExperiment(experiment, setup, settings);
  if (result.errors.length > 0) throw result.errors[0];
  return result;
}
