/**
 * Code generator: turns the schedule into one device program per instrument.
 *
 * For every near-time step each device walks the scheduled tree once and
 * emits, in time order, the plays, acquisitions, trigger changes, loops and
 * branches that involve it, with waits filling the gaps. Sections are
 * flattened; loops and matches are emitted as blocks that must not overlap
 * anything else on the device. Real-time programs are deduplicated across
 * near-time steps by content hash.
 */
import { contentHash } from '../canonical';
import { START_MARKER, tinyToSeconds } from '../constants';
import {
  GridViolationError,
  StructureError,
  UnsupportedConstructError,
  collectErrors,
} from '../errors';
import type { CompilerError } from '../errors';
import { ModulationType } from '../experiment/ir';
import type { PlayOperation } from '../experiment/ir';
import type { ParameterValue, SweepParameter } from '../experiment/parameter';
import type { FeedbackBinding } from '../feedback/feedback';
import type { PulseDescriptor } from '../pulse/library';
import { forEachScheduled } from '../scheduler/schedule';
import type {
  NearTimeStep,
  ScheduledExperiment,
  ScheduledLoop,
  ScheduledMatch,
  ScheduledNode,
  ScheduledOperation,
} from '../scheduler/schedule';
import type { ResolvedDevice, ResolvedExperiment, ResolvedSignal } from '../setup/resolver';
import type { CompilerSettings } from '../settings';
import type {
  ChannelSettings,
  DeviceProgram,
  Instruction,
  NearTimeStepRef,
  NodeSetting,
  RealtimeProgram,
} from '../types';
import { ProgramBuilder } from './builder';
import { CommandTable, WaveformTable } from './waveforms';

// ---- Emitter context ----

/** A parameter stepped by a compressed hardware loop */
interface LoopBinding {
  loop: string;
  values: readonly number[];
}

type Resolved = number | LoopBinding;

interface EmitContext {
  resolved: ResolvedExperiment;
  device: ResolvedDevice;
  waveforms: WaveformTable;
  commandTable: CommandTable;
  /** Global feedback bindings keyed by the acquire that feeds them */
  globalSources: ReadonlyMap<string, readonly FeedbackBinding[]>;
  builder: ProgramBuilder;
  /** Sequencer time in tiny samples */
  cursor: number;
  labelCounter: number;
}

interface Frame {
  /** Added to scheduled times: iteration offset of code-unrolled loops */
  offset: number;
  env: ReadonlyMap<string, number>;
  loops: ReadonlyMap<string, LoopBinding>;
}

type Item =
  | { kind: 'op'; time: number; node: ScheduledOperation }
  | { kind: 'marker'; time: number; marker: number }
  | { kind: 'trigger'; time: number; port: number; value: number }
  | { kind: 'loop'; time: number; node: ScheduledLoop }
  | { kind: 'match'; time: number; node: ScheduledMatch };

export interface CodegenResult {
  programs: DeviceProgram[];
  errors: CompilerError[];
}

function nextLabel(ctx: EmitContext, prefix: string): string {
  return `${prefix}#${ctx.labelCounter++}`;
}

function signalOf(ctx: EmitContext, uid: string): ResolvedSignal {
  const signal = ctx.resolved.signals.get(uid);
  if (!signal) throw new StructureError(`Signal '${uid}' was not resolved`, { nodeId: uid });
  return signal;
}

function parameterOf(ctx: EmitContext, uid: string, nodeId: string): SweepParameter {
  const param = ctx.resolved.experiment.parameters.get(uid);
  if (!param) throw new StructureError(`Unknown parameter '${uid}'`, { nodeId });
  return param;
}

// ---- Values ----

function resolveValue(value: ParameterValue, frame: Frame, nodeId: string): Resolved {
  if (typeof value === 'number') return value;
  const bound = frame.env.get(value.uid);
  if (bound !== undefined) return bound;
  const loop = frame.loops.get(value.uid);
  if (loop) return loop;
  throw new StructureError(`Parameter '${value.uid}' of '${nodeId}' is not bound here`, { nodeId });
}

function fixedValue(value: Resolved, what: string, nodeId: string): number {
  if (typeof value === 'number') return value;
  throw new UnsupportedConstructError(`${what} of '${nodeId}' cannot change inside real-time loop '${value.loop}'`, { nodeId });
}

function valueAt(value: Resolved, k: number): number {
  return typeof value === 'number' ? value : value.values[k];
}

function exportValue(value: ParameterValue): number | { parameter: string } {
  return typeof value === 'number' ? value : { parameter: value.uid };
}

// ---- Timeline ----

/** Wait until `time`; the sequencer can only move forward. */
function advance(ctx: EmitContext, time: number, nodeId: string): void {
  const delta = time - ctx.cursor;
  if (delta < 0) {
    throw new UnsupportedConstructError(
      `'${nodeId}' starts inside a loop or branch that runs until ${ctx.cursor} on '${ctx.device.uid}'`,
      { nodeId, window: { start: time, end: ctx.cursor } },
    );
  }
  if (delta % ctx.device.tinyPerSample !== 0) {
    throw new GridViolationError(
      `'${nodeId}' at ${time} is not on a sample boundary of '${ctx.device.uid}'`,
      { nodeId, window: { start: ctx.cursor, end: time } },
    );
  }
  ctx.builder.wait(delta / ctx.device.tinyPerSample);
  ctx.cursor = time;
}

function collectItems(ctx: EmitContext, nodes: readonly ScheduledNode[], out: Item[]): void {
  const device = ctx.device.uid;
  for (const node of nodes) {
    switch (node.type) {
      case 'operation':
        if (node.device !== device) break;
        if (node.kind === 'play' || node.kind === 'acquire') out.push({ kind: 'op', time: node.start, node });
        if (node.kind === 'acquire') {
          for (const binding of ctx.globalSources.get(node.uid) ?? []) {
            if (binding.marker !== undefined) out.push({ kind: 'marker', time: node.end, marker: binding.marker });
          }
        }
        break;
      case 'section': {
        const triggers: { port: number; value: number }[] = [];
        for (const [uid, spec] of Object.entries(node.trigger)) {
          const signal = signalOf(ctx, uid);
          if (signal.device === device) triggers.push({ port: signal.port, value: spec.state });
        }
        for (const t of triggers) out.push({ kind: 'trigger', time: node.start, port: t.port, value: t.value });
        collectItems(ctx, node.children, out);
        for (const t of triggers) out.push({ kind: 'trigger', time: node.end, port: t.port, value: 0 });
        break;
      }
      case 'loop':
        if (node.devices.includes(device)) out.push({ kind: 'loop', time: node.start, node });
        break;
      case 'match':
        if (node.devices.includes(device)) out.push({ kind: 'match', time: node.start, node });
        break;
    }
  }
}

function emitBody(ctx: EmitContext, nodes: readonly ScheduledNode[], frame: Frame): void {
  const items: Item[] = [];
  collectItems(ctx, nodes, items);
  items.sort((a, b) => a.time - b.time);
  for (const item of items) {
    switch (item.kind) {
      case 'op':
        advance(ctx, item.time + frame.offset, item.node.uid);
        if (item.node.op.kind === 'play') emitPlay(ctx, item.node, item.node.op, frame);
        else emitAcquire(ctx, item.node, frame);
        break;
      case 'marker':
        advance(ctx, item.time + frame.offset, `marker ${item.marker}`);
        ctx.builder.emit({ op: 'sync', mode: 'emit', marker: item.marker });
        break;
      case 'trigger':
        advance(ctx, item.time + frame.offset, `trigger ${item.port}`);
        ctx.builder.emit({ op: 'setTrigger', port: item.port, value: item.value });
        break;
      case 'loop':
        advance(ctx, item.time + frame.offset, item.node.uid);
        emitLoop(ctx, item.node, frame);
        break;
      case 'match':
        advance(ctx, item.time + frame.offset, item.node.uid);
        emitMatch(ctx, item.node, frame);
        break;
    }
  }
}

// ---- Operations ----

function modulationFrequency(signal: ResolvedSignal, frame: Frame, nodeId: string): number {
  const osc = signal.calibration.oscillator;
  if (!osc || osc.modulation !== ModulationType.SOFTWARE) return 0;
  return fixedValue(resolveValue(osc.frequency, frame, nodeId), 'Software oscillator frequency', nodeId);
}

/** The pulse stretched to an explicit play length; sampled pulses are padded instead. */
function shapedPulse(op: PlayOperation, frame: Frame): PulseDescriptor {
  if (op.length === undefined || op.pulse.samples) return op.pulse;
  return { ...op.pulse, length: fixedValue(resolveValue(op.length, frame, op.uid), 'Length', op.uid) };
}

function emitPlay(ctx: EmitContext, node: ScheduledOperation, op: PlayOperation, frame: Frame): void {
  const signal = signalOf(ctx, node.signal);
  const { capabilities: caps, deviceClass, uid: device } = ctx.device;
  const osc = signal.calibration.oscillator;
  const amplitude = resolveValue(node.amplitude, frame, node.uid);
  const phase = resolveValue(node.phase, frame, node.uid);
  const setPhase = node.setOscillatorPhase === undefined ? undefined : resolveValue(node.setOscillatorPhase, frame, node.uid);
  const incPhase = node.incrementOscillatorPhase === undefined
    ? undefined
    : resolveValue(node.incrementOscillatorPhase, frame, node.uid);
  const base = {
    pulse: shapedPulse(op, frame),
    role: 'playback' as const,
    lengthSamples: node.lengthSamples,
    modulationFrequency: modulationFrequency(signal, frame, node.uid),
  };

  const swept: LoopBinding[] = [];
  for (const v of [amplitude, phase, setPhase, incPhase]) {
    if (v !== undefined && typeof v !== 'number') swept.push(v);
  }
  const oscillatorPhase = setPhase !== undefined || incPhase !== undefined;

  if (swept.length === 0 && !oscillatorPhase) {
    const waveform = ctx.waveforms.add({ ...base, amplitude: valueAt(amplitude, 0), phase: valueAt(phase, 0) });
    ctx.builder.emit({ op: 'play', signal: signal.signal, port: signal.port, waveform });
    return;
  }

  if (new Set(swept.map(b => b.loop)).size > 1) {
    throw new UnsupportedConstructError(`Play '${node.uid}' depends on parameters of two real-time loops`, { nodeId: node.uid });
  }
  if (!caps.commandTable) {
    throw new UnsupportedConstructError(
      `Device '${device}' (${deviceClass}) has no command table for ${swept.length > 0 ? 'the real-time sweep' : 'the oscillator phase'} of '${node.uid}'`,
      { nodeId: node.uid },
    );
  }
  if (swept.length > 0 && !caps.realtimeParameterSweep) {
    throw new UnsupportedConstructError(
      `Device '${device}' (${deviceClass}) cannot sweep parameters of '${node.uid}' in real time`,
      { nodeId: node.uid },
    );
  }
  const hardwareOscillator = osc?.modulation === ModulationType.HARDWARE ? osc.index : undefined;
  if (oscillatorPhase && hardwareOscillator === undefined) {
    throw new UnsupportedConstructError(
      `Oscillator phase change of '${node.uid}' needs a hardware oscillator on signal '${signal.signal}'`,
      { nodeId: node.uid },
    );
  }

  const waveform = ctx.waveforms.add({ ...base, amplitude: 1, phase: 0 });
  const entryAt = (k: number): number => ctx.commandTable.add({
    waveform,
    amplitude: valueAt(amplitude, k),
    phase: valueAt(phase, k),
    oscillator: hardwareOscillator,
    setOscillatorPhase: setPhase === undefined ? undefined : valueAt(setPhase, k),
    incrementOscillatorPhase: incPhase === undefined ? undefined : valueAt(incPhase, k),
  });
  const loop = swept.length > 0 ? swept[0] : undefined;
  ctx.builder.emit({
    op: 'play',
    signal: signal.signal,
    port: signal.port,
    waveform,
    commandTable: loop ? { loop: loop.loop, entries: loop.values.map((_, k) => entryAt(k)) } : entryAt(0),
  });
}

function emitAcquire(ctx: EmitContext, node: ScheduledOperation, frame: Frame): void {
  const op = node.op;
  if (op.kind !== 'acquire') return;
  const signal = signalOf(ctx, node.signal);
  const kernel = op.kernel && ctx.waveforms.add({
    pulse: op.kernel,
    role: 'kernel',
    lengthSamples: node.lengthSamples,
    amplitude: 1,
    phase: 0,
    modulationFrequency: modulationFrequency(signal, frame, node.uid),
  });
  ctx.builder.emit({
    op: 'acquire',
    signal: signal.signal,
    port: signal.port,
    handle: op.handle,
    samples: node.lengthSamples,
    kernel,
  });
}

// ---- Control flow ----

function iterationPrologue(ctx: EmitContext, loop: ScheduledLoop, index: number | undefined): void {
  if (loop.resetOscillatorPhase) ctx.builder.emit({ op: 'resetOscillatorPhase' });
  for (const sweep of loop.oscillatorSweeps) {
    if (sweep.device !== ctx.device.uid) continue;
    ctx.builder.emit({
      op: 'setOscillatorFrequency',
      oscillator: sweep.oscillator,
      frequency: index === undefined ? { loop: loop.uid, values: [...sweep.values] } : sweep.values[index],
    });
  }
}

function bind(env: ReadonlyMap<string, number>, params: readonly SweepParameter[], k: number): Map<string, number> {
  const next = new Map(env);
  for (const p of params) next.set(p.uid, p.values[k]);
  return next;
}

function emitLoop(ctx: EmitContext, loop: ScheduledLoop, frame: Frame): void {
  const start = loop.start + frame.offset;
  const params = loop.parameters.map(uid => parameterOf(ctx, uid, loop.uid));
  const template = loop.iterations[0];

  if (loop.compressed && ctx.device.capabilities.nativeLoops) {
    ctx.builder.emit({ op: 'loop', loop: loop.uid, count: loop.count });
    const body = nextLabel(ctx, loop.uid);
    ctx.builder.label(body);
    const loops = new Map(frame.loops);
    for (const p of params) loops.set(p.uid, { loop: loop.uid, values: p.values });
    iterationPrologue(ctx, loop, undefined);
    emitBody(ctx, template.children, { ...frame, loops });
    advance(ctx, start + loop.iterationLength, loop.uid);
    ctx.builder.emitEndLoop(loop.uid, body);
    ctx.cursor = loop.end + frame.offset;
    return;
  }

  if (loop.compressed) {
    for (let k = 0; k < loop.count; k++) {
      iterationPrologue(ctx, loop, k);
      emitBody(ctx, template.children, {
        offset: frame.offset + k * loop.iterationLength,
        env: bind(frame.env, params, k),
        loops: frame.loops,
      });
      advance(ctx, start + (k + 1) * loop.iterationLength, loop.uid);
    }
    return;
  }

  for (const it of loop.iterations) {
    iterationPrologue(ctx, loop, it.index);
    emitBody(ctx, it.children, { ...frame, env: bind(frame.env, params, it.index) });
    advance(ctx, it.end + frame.offset, loop.uid);
  }
}

function emitMatch(ctx: EmitContext, match: ScheduledMatch, frame: Frame): void {
  const binding = match.binding;
  const caseLabels = match.cases.map(c => nextLabel(ctx, `${match.uid}/${c.state}`));
  const end = nextLabel(ctx, `${match.uid}/end`);
  ctx.builder.emitBranch(
    { handle: binding.handle, source: binding.path, marker: binding.marker },
    binding.states.map(state => {
      const i = match.cases.findIndex(c => c.state === state);
      return i >= 0 ? caseLabels[i] : end;
    }),
  );
  const start = ctx.cursor;
  match.cases.forEach((c, i) => {
    ctx.builder.label(caseLabels[i]);
    ctx.cursor = start;
    emitBody(ctx, c.children, frame);
    advance(ctx, match.end + frame.offset, c.uid);
    if (i < match.cases.length - 1) ctx.builder.emitJump(end);
  });
  ctx.builder.label(end);
}

// ---- Device programs ----

function emitStep(ctx: EmitContext, step: NearTimeStep, startSync: 'emit' | 'await' | undefined): Instruction[] {
  ctx.builder = new ProgramBuilder();
  ctx.cursor = 0;
  ctx.labelCounter = 0;
  if (startSync) ctx.builder.emit({ op: 'sync', mode: startSync, marker: START_MARKER });
  // Outputs behind shorter filter chains wait for the slowest one
  if (ctx.device.startDelay > 0) ctx.builder.wait(ctx.device.startDelay / ctx.device.tinyPerSample);
  emitBody(ctx, [step.root], { offset: 0, env: new Map(Object.entries(step.values)), loops: new Map() });
  advance(ctx, step.root.end, step.root.uid);
  ctx.builder.emit({ op: 'end' });
  const errors: CompilerError[] = [];
  ctx.builder.resolveForwardRefs(errors, ctx.device.uid);
  if (errors.length > 0) throw errors[0];
  return ctx.builder.build();
}

/** Instrument node values the host writes before running a near-time step. */
function nodeSettings(ctx: EmitContext, step: NearTimeStep): NodeSetting[] {
  const settings = new Map<string, number>();
  for (const uid of ctx.device.signals) {
    const signal = signalOf(ctx, uid);
    const { oscillator, localOscillatorFrequency: lo } = signal.calibration;
    if (oscillator?.index !== undefined && typeof oscillator.frequency !== 'number') {
      const value = step.values[oscillator.frequency.uid];
      if (value !== undefined) settings.set(`/${ctx.device.uid}/oscs/${oscillator.index}/freq`, value);
    }
    if (lo !== undefined && typeof lo !== 'number') {
      const value = step.values[lo.uid];
      if (value !== undefined) settings.set(`/${ctx.device.uid}/${signal.direction}s/${signal.port}/lo_freq`, value);
    }
  }
  return [...settings]
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([path, value]) => ({ path, value }));
}

function channelSettings(ctx: EmitContext): ChannelSettings[] {
  return ctx.device.signals.map(uid => {
    const signal = signalOf(ctx, uid);
    const c = signal.calibration;
    return {
      signal: signal.signal,
      line: signal.line,
      port: signal.port,
      direction: signal.direction,
      portDelay: tinyToSeconds(c.portDelay),
      range: c.range,
      localOscillatorFrequency: c.localOscillatorFrequency === undefined ? undefined : exportValue(c.localOscillatorFrequency),
      oscillator: c.oscillator && {
        uid: c.oscillator.uid,
        modulation: c.oscillator.modulation,
        index: c.oscillator.index,
        frequency: exportValue(c.oscillator.frequency),
      },
      thresholds: c.thresholds.length > 0 ? [...c.thresholds] : undefined,
      precompensation: signal.precompensation,
    };
  });
}

function deviceHandles(device: string, schedule: ScheduledExperiment): string[] {
  const handles = new Set<string>();
  for (const step of schedule.steps) {
    forEachScheduled([step.root], node => {
      if (node.type === 'operation' && node.device === device && node.op.kind === 'acquire') handles.add(node.op.handle);
    });
  }
  return [...handles].sort();
}

function generateDeviceProgram(
  resolved: ResolvedExperiment,
  schedule: ScheduledExperiment,
  device: ResolvedDevice,
  settings: CompilerSettings,
  globalSources: ReadonlyMap<string, readonly FeedbackBinding[]>,
): DeviceProgram {
  const ctx: EmitContext = {
    resolved,
    device,
    waveforms: new WaveformTable(device.capabilities.samplingRate, settings.phaseResolutionBits),
    commandTable: new CommandTable(settings.phaseResolutionBits),
    globalSources,
    builder: new ProgramBuilder(),
    cursor: 0,
    labelCounter: 0,
  };
  let startSync: 'emit' | 'await' | undefined;
  if (resolved.hub) startSync = 'await';
  else if (resolved.devices.size > 1) startSync = resolved.leader === device.uid ? 'emit' : 'await';

  const programs: RealtimeProgram[] = [];
  const byHash = new Map<string, number>();
  const nearTimeSteps: NearTimeStepRef[] = schedule.steps.map(step => {
    const instructions = emitStep(ctx, step, startSync);
    const hash = contentHash(instructions);
    let id = byHash.get(hash);
    if (id === undefined) {
      id = programs.length;
      programs.push({ id, instructions });
      byHash.set(hash, id);
    }
    return { indices: [...step.indices], program: id, nodeSettings: nodeSettings(ctx, step) };
  });

  return {
    device: device.uid,
    deviceClass: device.deviceClass,
    samplingRate: device.capabilities.samplingRate,
    waveforms: ctx.waveforms.list(),
    commandTable: ctx.commandTable.list(),
    programs,
    nearTimeSteps,
    channels: channelSettings(ctx),
    handles: deviceHandles(device.uid, schedule),
  };
}

/** The hub starts every device and relays global feedback markers. */
function generateHubProgram(hub: ResolvedDevice, schedule: ScheduledExperiment, bindings: readonly FeedbackBinding[]): DeviceProgram {
  const instructions: Instruction[] = [{ op: 'sync', mode: 'emit', marker: START_MARKER }];
  for (const b of bindings) {
    if (b.marker !== undefined) instructions.push({ op: 'relay', marker: b.marker, from: b.acquireDevice, to: [...b.playbackDevices] });
  }
  instructions.push({ op: 'end' });
  return {
    device: hub.uid,
    deviceClass: hub.deviceClass,
    samplingRate: hub.capabilities.samplingRate,
    waveforms: [],
    commandTable: [],
    programs: [{ id: 0, instructions }],
    nearTimeSteps: schedule.steps.map(step => ({ indices: [...step.indices], program: 0, nodeSettings: [] })),
    channels: [],
    handles: [],
  };
}

export function generatePrograms(
  resolved: ResolvedExperiment,
  schedule: ScheduledExperiment,
  settings: CompilerSettings,
): CodegenResult {
  const globalBindings = new Map<string, FeedbackBinding>();
  for (const step of schedule.steps) {
    forEachScheduled([step.root], node => {
      if (node.type === 'match' && node.binding.path === 'global') globalBindings.set(node.uid, node.binding);
    });
  }
  const bindings = [...globalBindings.values()].sort((a, b) => (a.marker ?? 0) - (b.marker ?? 0));
  const globalSources = new Map<string, FeedbackBinding[]>();
  for (const b of bindings) globalSources.set(b.acquire, [...(globalSources.get(b.acquire) ?? []), b]);

  const programs: DeviceProgram[] = [];
  const errors: CompilerError[] = [];
  for (const device of resolved.devices.values()) {
    const { value, errors: deviceErrors } = collectErrors(
      () => generateDeviceProgram(resolved, schedule, device, settings, globalSources),
    );
    if (value) programs.push(value);
    errors.push(...deviceErrors);
  }
  if (resolved.hub) programs.push(generateHubProgram(resolved.hub, schedule, bindings));
  return errors.length > 0 ? { programs: [], errors } : { programs, errors };
}
