/**
 * Experiment declarations as JSON.
 *
 * Parsing validates the document with zod and then replays it through the
 * ExperimentBuilder, so a JSON experiment passes exactly the structural checks
 * of one declared in code. Operation uids are not stored; the builder derives
 * them again from their position.
 */
import { z } from 'zod';
import { collectErrors, StructureError } from '../errors';
import type { CompilerError } from '../errors';
import { PulseFunction, sampledPulse } from '../pulse/library';
import type { PulseDescriptor } from '../pulse/library';
import { formatIssues } from '../settings';
import { CalibrationRecordSchema } from '../setup/topology';
import { ExperimentBuilder } from './builder';
import type { SectionOptions } from './builder';
import { AcquisitionType, AveragingMode, RepetitionMode, SectionAlignment, isSectionLike } from './ir';
import type { Experiment, ExperimentNode, SectionFields } from './ir';
import { linearSweepParameter, sweepParameter } from './parameter';
import type { ParameterValue, SweepParameter } from './parameter';

// ---- JSON shapes ----

export type ValueJson = number | { kind: 'parameter'; uid: string };

interface SectionJsonFields {
  uid?: string;
  alignment?: SectionAlignment;
  length?: ValueJson;
  playAfter?: string[];
  onSystemGrid?: boolean;
  trigger?: Record<string, { state: number }>;
  children: NodeJson[];
}

export type NodeJson =
  | (SectionJsonFields & { kind: 'section' })
  | (SectionJsonFields & { kind: 'sweep'; parameters: string[]; resetOscillatorPhase?: boolean })
  | (SectionJsonFields & {
      kind: 'acquire_loop_rt';
      count: number;
      averagingMode?: AveragingMode;
      acquisitionType?: AcquisitionType;
      repetitionMode?: RepetitionMode;
      repetitionTime?: number;
      resetOscillatorPhase?: boolean;
    })
  | (SectionJsonFields & { kind: 'match'; handle: string; local?: boolean; feedbackDelay?: number })
  | (SectionJsonFields & { kind: 'case'; state: number })
  | {
      kind: 'play';
      signal: string;
      /** Pulse uid */
      pulse: string;
      amplitude?: ValueJson;
      phase?: ValueJson;
      length?: ValueJson;
      incrementOscillatorPhase?: ValueJson;
      setOscillatorPhase?: ValueJson;
    }
  | { kind: 'delay'; signal: string; time: ValueJson }
  | { kind: 'acquire'; signal: string; handle: string; kernel?: string; length?: ValueJson }
  | { kind: 'reserve'; signal: string };

// ---- Schemas ----

const ValueSchema = z.union([
  z.number(),
  z.object({ kind: z.literal('parameter'), uid: z.string().min(1) }).strict(),
]);

const sectionShape = {
  uid: z.string().min(1).optional(),
  alignment: z.nativeEnum(SectionAlignment).optional(),
  length: ValueSchema.optional(),
  playAfter: z.array(z.string()).optional(),
  onSystemGrid: z.boolean().optional(),
  trigger: z.record(z.object({ state: z.number().int() }).strict()).optional(),
  children: z.array(z.lazy(() => NodeSchema)),
};

export const NodeSchema: z.ZodType<NodeJson> = z.lazy(() => z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('section'), ...sectionShape }).strict(),
  z.object({
    kind: z.literal('sweep'),
    ...sectionShape,
    parameters: z.array(z.string().min(1)),
    resetOscillatorPhase: z.boolean().optional(),
  }).strict(),
  z.object({
    kind: z.literal('acquire_loop_rt'),
    ...sectionShape,
    count: z.number(),
    averagingMode: z.nativeEnum(AveragingMode).optional(),
    acquisitionType: z.nativeEnum(AcquisitionType).optional(),
    repetitionMode: z.nativeEnum(RepetitionMode).optional(),
    repetitionTime: z.number().optional(),
    resetOscillatorPhase: z.boolean().optional(),
  }).strict(),
  z.object({
    kind: z.literal('match'),
    ...sectionShape,
    handle: z.string(),
    local: z.boolean().optional(),
    feedbackDelay: z.number().optional(),
  }).strict(),
  z.object({ kind: z.literal('case'), ...sectionShape, state: z.number() }).strict(),
  z.object({
    kind: z.literal('play'),
    signal: z.string(),
    pulse: z.string().min(1),
    amplitude: ValueSchema.optional(),
    phase: ValueSchema.optional(),
    length: ValueSchema.optional(),
    incrementOscillatorPhase: ValueSchema.optional(),
    setOscillatorPhase: ValueSchema.optional(),
  }).strict(),
  z.object({ kind: z.literal('delay'), signal: z.string(), time: ValueSchema }).strict(),
  z.object({
    kind: z.literal('acquire'),
    signal: z.string(),
    handle: z.string(),
    kernel: z.string().min(1).optional(),
    length: ValueSchema.optional(),
  }).strict(),
  z.object({ kind: z.literal('reserve'), signal: z.string() }).strict(),
]));

const PulseSchema = z.object({
  fn: z.nativeEnum(PulseFunction),
  length: z.number().positive().optional(),
  amplitude: z.number().default(1),
  params: z.record(z.number()).default({}),
  samples: z.object({ re: z.array(z.number()), im: z.array(z.number()) }).strict().optional(),
}).strict();

const ParameterSchema = z.union([
  z.object({ values: z.array(z.number()), axisName: z.string().optional() }).strict(),
  z.object({
    start: z.number(),
    stop: z.number(),
    count: z.number(),
    axisName: z.string().optional(),
  }).strict(),
]);

export const ExperimentJsonSchema = z.object({
  uid: z.string().min(1),
  signals: z.array(z.string().min(1)),
  pulses: z.record(PulseSchema).default({}),
  parameters: z.record(ParameterSchema).default({}),
  signalCalibration: z.record(CalibrationRecordSchema).default({}),
  /** Children of the root section */
  root: z.array(NodeSchema),
}).strict();

export type ExperimentJson = z.infer<typeof ExperimentJsonSchema>;

// ---- Parse ----

interface Tables {
  pulses: ReadonlyMap<string, PulseDescriptor>;
  parameters: ReadonlyMap<string, SweepParameter>;
}

function pulseFromJson(uid: string, json: z.infer<typeof PulseSchema>): PulseDescriptor {
  if (json.fn === PulseFunction.SAMPLED) {
    if (!json.samples) throw new StructureError(`Sampled pulse '${uid}' has no samples`, { nodeId: uid });
    return sampledPulse({ uid, re: json.samples.re, im: json.samples.im, amplitude: json.amplitude });
  }
  if (json.length === undefined) throw new StructureError(`Pulse '${uid}' needs a length`, { nodeId: uid });
  return Object.freeze({
    uid,
    fn: json.fn,
    length: json.length,
    amplitude: json.amplitude,
    params: Object.freeze({ ...json.params }),
  });
}

function parameterFromJson(uid: string, json: z.infer<typeof ParameterSchema>): SweepParameter {
  if ('values' in json) return sweepParameter({ uid, values: json.values, axisName: json.axisName });
  return linearSweepParameter({ uid, start: json.start, stop: json.stop, count: json.count, axisName: json.axisName });
}

function lookup<T>(table: ReadonlyMap<string, T>, uid: string, what: string): T {
  const value = table.get(uid);
  if (value === undefined) throw new StructureError(`Unknown ${what} '${uid}'`, { nodeId: uid });
  return value;
}

function sectionOptions(node: SectionJsonFields): SectionOptions {
  return {
    uid: node.uid,
    alignment: node.alignment,
    length: node.length,
    playAfter: node.playAfter,
    onSystemGrid: node.onSystemGrid,
    trigger: node.trigger,
  };
}

function replay(b: ExperimentBuilder, nodes: readonly NodeJson[], tables: Tables): void {
  for (const node of nodes) {
    switch (node.kind) {
      case 'section':
        b.section(sectionOptions(node), x => replay(x, node.children, tables));
        break;
      case 'sweep':
        b.sweep({
          ...sectionOptions(node),
          parameters: node.parameters.map(uid => lookup(tables.parameters, uid, 'parameter')),
          resetOscillatorPhase: node.resetOscillatorPhase,
        }, x => replay(x, node.children, tables));
        break;
      case 'acquire_loop_rt':
        b.acquireLoopRt({
          ...sectionOptions(node),
          count: node.count,
          averagingMode: node.averagingMode,
          acquisitionType: node.acquisitionType,
          repetitionMode: node.repetitionMode,
          repetitionTime: node.repetitionTime,
          resetOscillatorPhase: node.resetOscillatorPhase,
        }, x => replay(x, node.children, tables));
        break;
      case 'match':
        b.match({
          ...sectionOptions(node),
          handle: node.handle,
          local: node.local,
          feedbackDelay: node.feedbackDelay,
        }, x => replay(x, node.children, tables));
        break;
      case 'case':
        b.case(node.state, x => replay(x, node.children, tables), sectionOptions(node));
        break;
      case 'play':
        b.play(node.signal, lookup(tables.pulses, node.pulse, 'pulse'), {
          amplitude: node.amplitude,
          phase: node.phase,
          length: node.length,
          incrementOscillatorPhase: node.incrementOscillatorPhase,
          setOscillatorPhase: node.setOscillatorPhase,
        });
        break;
      case 'delay':
        b.delay(node.signal, node.time);
        break;
      case 'acquire':
        b.acquire(node.signal, node.handle, {
          kernel: node.kernel === undefined ? undefined : lookup(tables.pulses, node.kernel, 'pulse'),
          length: node.length,
        });
        break;
      case 'reserve':
        b.reserve(node.signal);
        break;
    }
  }
}

function buildFromJson(json: ExperimentJson): Experiment {
  const tables: Tables = {
    pulses: new Map(Object.entries(json.pulses).map(([uid, p]) => [uid, pulseFromJson(uid, p)])),
    parameters: new Map(Object.entries(json.parameters).map(([uid, p]) => [uid, parameterFromJson(uid, p)])),
  };
  const b = new ExperimentBuilder({ uid: json.uid, signals: json.signals });
  replay(b, json.root, tables);
  // Calibration may reference parameters, which the sweeps above registered
  for (const [signal, calibration] of Object.entries(json.signalCalibration)) {
    b.setCalibration(signal, calibration);
  }
  return b.build();
}

export function parseExperiment(input: unknown): { experiment?: Experiment; errors: CompilerError[] } {
  const parsed = ExperimentJsonSchema.safeParse(input);
  if (!parsed.success) {
    return { errors: [new StructureError(`Invalid experiment: ${formatIssues(parsed.error.issues)}`)] };
  }
  const { value, errors } = collectErrors(() => buildFromJson(parsed.data));
  return { experiment: value, errors };
}

// ---- Serialize ----

function valueToJson(value: ParameterValue): ValueJson;
function valueToJson(value: ParameterValue | undefined): ValueJson | undefined;
function valueToJson(value: ParameterValue | undefined): ValueJson | undefined {
  if (value === undefined || typeof value === 'number') return value;
  return { kind: 'parameter', uid: value.uid };
}

function sectionFieldsToJson(node: SectionFields): SectionJsonFields {
  return {
    uid: node.uid,
    alignment: node.alignment,
    length: valueToJson(node.length),
    playAfter: [...node.playAfter],
    onSystemGrid: node.onSystemGrid,
    trigger: Object.fromEntries(Object.entries(node.trigger).map(([s, t]) => [s, { state: t.state }])),
    children: node.children.map(nodeToJson),
  };
}

function nodeToJson(node: ExperimentNode): NodeJson {
  if (isSectionLike(node)) {
    const fields = sectionFieldsToJson(node);
    switch (node.kind) {
      case 'section':
        return { kind: 'section', ...fields };
      case 'sweep':
        return { kind: 'sweep', ...fields, parameters: [...node.parameters], resetOscillatorPhase: node.resetOscillatorPhase };
      case 'acquire_loop_rt':
        return {
          kind: 'acquire_loop_rt',
          ...fields,
          count: node.count,
          averagingMode: node.averagingMode,
          acquisitionType: node.acquisitionType,
          repetitionMode: node.repetitionMode,
          repetitionTime: node.repetitionTime,
          resetOscillatorPhase: node.resetOscillatorPhase,
        };
      case 'match':
        return { kind: 'match', ...fields, handle: node.handle, local: node.local, feedbackDelay: node.feedbackDelay };
      case 'case':
        return { kind: 'case', ...fields, state: node.state };
    }
  }
  switch (node.kind) {
    case 'play':
      return {
        kind: 'play',
        signal: node.signal,
        pulse: node.pulse.uid,
        amplitude: valueToJson(node.amplitude),
        phase: valueToJson(node.phase),
        length: valueToJson(node.length),
        incrementOscillatorPhase: valueToJson(node.incrementOscillatorPhase),
        setOscillatorPhase: valueToJson(node.setOscillatorPhase),
      };
    case 'delay':
      return { kind: 'delay', signal: node.signal, time: valueToJson(node.time) };
    case 'acquire':
      return { kind: 'acquire', signal: node.signal, handle: node.handle, kernel: node.kernel?.uid, length: valueToJson(node.length) };
    case 'reserve':
      return { kind: 'reserve', signal: node.signal };
  }
}

/** JSON document that parseExperiment turns back into an equal experiment. */
export function experimentToJson(experiment: Experiment): ExperimentJson {
  const pulses: ExperimentJson['pulses'] = {};
  for (const [uid, p] of experiment.pulses) {
    pulses[uid] = {
      fn: p.fn,
      length: p.length,
      amplitude: p.amplitude,
      params: { ...p.params },
      samples: p.samples && { re: [...p.samples.re], im: [...p.samples.im] },
    };
  }
  const parameters: ExperimentJson['parameters'] = {};
  for (const [uid, p] of experiment.parameters) parameters[uid] = { values: [...p.values], axisName: p.axisName };

  const signalCalibration: ExperimentJson['signalCalibration'] = {};
  for (const [signal, c] of Object.entries(experiment.signalCalibration)) {
    signalCalibration[signal] = {
      oscillator: c.oscillator && {
        uid: c.oscillator.uid,
        frequency: valueToJson(c.oscillator.frequency),
        modulation: c.oscillator.modulation,
      },
      localOscillatorFrequency: valueToJson(c.localOscillatorFrequency),
      portDelay: c.portDelay,
      range: c.range,
      threshold: typeof c.threshold === 'object' ? [...c.threshold] : c.threshold,
    };
  }

  return {
    uid: experiment.uid,
    signals: [...experiment.signals],
    pulses,
    parameters,
    signalCalibration,
    root: experiment.root.children.map(nodeToJson),
  };
}
