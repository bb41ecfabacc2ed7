/**
 * Scheduler: assigns every operation an absolute start and end time.
 *
 * One depth-first pass per near-time step keeps a cursor per logical signal
 * line. A child starts at the latest cursor of the lines it touches, after
 * the ends of its play-after siblings and, for a match, after the feedback
 * delay has elapsed; the start is then rounded up to the child's grid.
 * RIGHT-aligned sections lay their children out once to learn their lengths
 * and then place them backwards from the section end.
 *
 * Real-time sweeps whose parameters change timing are unrolled; all others
 * are compressed into one iteration template.
 */
import { secondsToTiny } from '../constants';
import {
  GridViolationError,
  SchedulingConflictError,
  StructureError,
  UnknownHandleError,
  UnsupportedConstructError,
  collectErrors,
} from '../errors';
import type { CompilerError } from '../errors';
import { AveragingMode, ModulationType, RepetitionMode, SectionAlignment, isOperation, isSectionLike } from '../experiment/ir';
import type {
  AcquireLoopNode,
  ExperimentNode,
  MatchNode,
  SectionLike,
  SectionNode,
  SweepNode,
} from '../experiment/ir';
import { parameterUids } from '../experiment/parameter';
import type { ParameterValue, SweepParameter } from '../experiment/parameter';
import type { FeedbackBinding } from '../feedback/feedback';
import { pulseLengthSamples } from '../pulse/library';
import type { ResolvedDevice, ResolvedExperiment, ResolvedOperation, ResolvedSignal } from '../setup/resolver';
import type { CompileWarning } from '../types';
import { ceilToGrid, floorToGrid, lcmAll } from './grid';
import type {
  NearTimeAxis,
  NearTimeStep,
  OscillatorSweep,
  ScheduledCase,
  ScheduledExperiment,
  ScheduledIteration,
  ScheduledLoop,
  ScheduledMatch,
  ScheduledNode,
  ScheduledOperation,
  ScheduledSection,
} from './schedule';

type Node = ExperimentNode<ResolvedOperation>;
type Section = SectionLike<ResolvedOperation>;

interface NodeInfo {
  lines: Set<string>;
  devices: Set<string>;
  grid: number;
  /** Parameters that change the duration of something in the subtree */
  timingParameters: Set<string>;
  /** A sweep lies strictly inside the node */
  containsSweep: boolean;
}

interface Context {
  rtLoop: AcquireLoopNode<ResolvedOperation>;
  env: ReadonlyMap<string, number>;
  /** End time of each acquire in the current real-time pass */
  acquireEnds: Map<string, number>;
  /** Layout pass for RIGHT alignment: feedback constraints are not applied */
  provisional: boolean;
}

interface Laid {
  nodes: ScheduledNode[];
  end: number;
}

interface Interval {
  uid: string;
  channel: string;
  start: number;
  end: number;
  /** Match uid → case state for operations inside a case */
  cases: ReadonlyMap<string, number>;
}

export interface ScheduleResult {
  schedule?: ScheduledExperiment;
  errors: CompilerError[];
  warnings: CompileWarning[];
}

/** Near-time sweeps on the way from the root to the real-time loop, outermost first. */
function findRealtimePath(
  node: Section,
  sweeps: SweepNode<ResolvedOperation>[] = [],
): { sweeps: SweepNode<ResolvedOperation>[]; rtLoop: AcquireLoopNode<ResolvedOperation> } | undefined {
  if (node.kind === 'acquire_loop_rt') return { sweeps, rtLoop: node };
  const path = node.kind === 'sweep' ? [...sweeps, node] : sweeps;
  for (const child of node.children) {
    if (!isSectionLike(child)) continue;
    const found = findRealtimePath(child, path);
    if (found) return found;
  }
  return undefined;
}

/** Index tuples of a cartesian product, last axis fastest. */
function productIndices(counts: readonly number[]): number[][] {
  let result: number[][] = [[]];
  for (const count of counts) {
    const next: number[][] = [];
    for (const prefix of result) {
      for (let i = 0; i < count; i++) next.push([...prefix, i]);
    }
    result = next;
  }
  return result;
}

export function scheduleExperiment(
  resolved: ResolvedExperiment,
  feedback: ReadonlyMap<string, FeedbackBinding>,
): ScheduleResult {
  return new Scheduler(resolved, feedback).run();
}

class Scheduler {
  private readonly info = new Map<Node, NodeInfo>();
  private readonly warnings = new Map<string, CompileWarning>();
  private shotLength: number | undefined;
  private maxShot = 0;

  constructor(
    private readonly resolved: ResolvedExperiment,
    private readonly feedback: ReadonlyMap<string, FeedbackBinding>,
  ) {}

  run(): ScheduleResult {
    const experiment = this.resolved.experiment;
    const path = findRealtimePath(experiment.root);
    if (!path) {
      return {
        errors: [new StructureError(`Experiment '${experiment.uid}' has no real-time acquisition loop`, { nodeId: experiment.uid })],
        warnings: [],
      };
    }
    const { sweeps, rtLoop } = path;
    this.analyze(rtLoop);

    const axes: NearTimeAxis[] = sweeps.map(s => ({
      uid: s.uid,
      parameters: [...s.parameters],
      count: this.parameter(s.parameters[0], s.uid).values.length,
    }));

    const steps: NearTimeStep[] = [];
    for (const indices of productIndices(axes.map(a => a.count))) {
      const values: Record<string, number> = {};
      axes.forEach((axis, i) => {
        for (const uid of axis.parameters) values[uid] = this.parameter(uid, axis.uid).values[indices[i]];
      });
      const env = new Map(Object.entries(values));
      const { value, errors } = collectErrors(() => this.scheduleStep(rtLoop, env));
      if (!value) return { errors, warnings: [...this.warnings.values()] };
      steps.push({ index: steps.length, indices, values, root: value });
    }

    return {
      schedule: {
        uid: experiment.uid,
        systemGrid: this.resolved.systemGrid,
        rtLoop: rtLoop.uid,
        count: rtLoop.count,
        averagingMode: rtLoop.averagingMode,
        acquisitionType: rtLoop.acquisitionType,
        repetitionMode: rtLoop.repetitionMode,
        nearTimeAxes: axes,
        steps,
      },
      errors: [],
      warnings: [...this.warnings.values()],
    };
  }

  // ---- Lookups ----

  private parameter(uid: string, nodeId: string): SweepParameter {
    const param = this.resolved.experiment.parameters.get(uid);
    if (!param) throw new StructureError(`Unknown parameter '${uid}'`, { nodeId });
    return param;
  }

  private device(uid: string): ResolvedDevice {
    const device = this.resolved.devices.get(uid);
    if (!device) throw new StructureError(`Device '${uid}' is not part of the setup`, { nodeId: uid });
    return device;
  }

  private signal(uid: string): ResolvedSignal {
    const signal = this.resolved.signals.get(uid);
    if (!signal) throw new StructureError(`Signal '${uid}' was not resolved`, { nodeId: uid });
    return signal;
  }

  private warn(warning: CompileWarning): void {
    this.warnings.set(`${warning.code}:${warning.nodeId ?? ''}`, warning);
  }

  /** Bound value of a parameter, or the reference itself inside a compressed loop. */
  private value(value: ParameterValue, ctx: Context): ParameterValue {
    if (typeof value === 'number') return value;
    return ctx.env.get(value.uid) ?? value;
  }

  private timing(value: ParameterValue, ctx: Context, nodeId: string): number {
    const bound = this.value(value, ctx);
    if (typeof bound !== 'number') {
      throw new StructureError(`Parameter '${bound.uid}' of '${nodeId}' has no value in this iteration`, { nodeId });
    }
    return bound;
  }

  private explicitLength(node: Section, ctx: Context): number | undefined {
    if (node.length === undefined) return undefined;
    const seconds = this.timing(node.length, ctx, node.uid);
    if (seconds < 0) throw new StructureError(`Section '${node.uid}' has a negative length`, { nodeId: node.uid });
    return secondsToTiny(seconds);
  }

  // ---- Static analysis ----

  private infoOf(node: Node): NodeInfo {
    return this.info.get(node) ?? this.analyze(node);
  }

  private oscillatorSweeps(node: SweepNode<ResolvedOperation>): OscillatorSweep[] {
    const sweeps: OscillatorSweep[] = [];
    for (const uid of node.parameters) {
      for (const signal of this.resolved.signals.values()) {
        const osc = signal.calibration.oscillator;
        if (!osc || osc.modulation !== ModulationType.HARDWARE || osc.index === undefined) continue;
        if (typeof osc.frequency === 'number' || osc.frequency.uid !== uid) continue;
        if (sweeps.some(s => s.device === signal.device && s.oscillator === osc.index)) continue;
        sweeps.push({
          device: signal.device,
          signal: signal.signal,
          oscillator: osc.index,
          parameter: uid,
          values: [...this.parameter(uid, node.uid).values],
        });
      }
    }
    return sweeps;
  }

  private analyze(node: Node): NodeInfo {
    let info: NodeInfo;
    if (isOperation(node)) {
      const device = this.device(node.device);
      const timing = node.kind === 'delay'
        ? parameterUids(node.time)
        : node.kind === 'play' || node.kind === 'acquire' ? parameterUids(node.length) : [];
      info = {
        lines: new Set([node.line]),
        devices: new Set([node.device]),
        grid: device.grid,
        timingParameters: new Set(timing),
        containsSweep: false,
      };
    } else {
      const lines = new Set<string>();
      const devices = new Set<string>();
      const timing = new Set(parameterUids(node.length));
      const grids: number[] = [];
      let containsSweep = false;
      for (const child of node.children) {
        const ci = this.analyze(child);
        for (const l of ci.lines) lines.add(l);
        for (const d of ci.devices) devices.add(d);
        for (const p of ci.timingParameters) timing.add(p);
        grids.push(ci.grid);
        containsSweep ||= ci.containsSweep || child.kind === 'sweep';
      }
      for (const s of Object.keys(node.trigger)) {
        const signal = this.signal(s);
        lines.add(signal.line);
        devices.add(signal.device);
        grids.push(this.device(signal.device).grid);
      }
      if (node.kind === 'sweep') {
        for (const sweep of this.oscillatorSweeps(node)) {
          devices.add(sweep.device);
          grids.push(this.device(sweep.device).grid);
        }
      }
      if (node.onSystemGrid || node.kind === 'acquire_loop_rt' || node.kind === 'match') {
        grids.push(this.resolved.systemGrid);
      }
      info = {
        lines,
        devices,
        grid: grids.length > 0 ? lcmAll(grids) : this.resolved.systemGrid,
        timingParameters: timing,
        containsSweep,
      };
    }
    this.info.set(node, info);
    return info;
  }

  // ---- Near-time step ----

  private scheduleStep(rtLoop: AcquireLoopNode<ResolvedOperation>, env: ReadonlyMap<string, number>): ScheduledSection {
    if (rtLoop.repetitionMode === RepetitionMode.AUTO) {
      this.shotLength = undefined;
      this.maxShot = 0;
      this.scheduleRealtimeLoop(rtLoop, env);
      this.shotLength = this.maxShot;
    }
    const root = this.scheduleRealtimeLoop(rtLoop, env);
    this.verifyChannels(root.children);
    return root;
  }

  private scheduleRealtimeLoop(rtLoop: AcquireLoopNode<ResolvedOperation>, env: ReadonlyMap<string, number>): ScheduledSection {
    const ctx: Context = { rtLoop, env, acquireEnds: new Map(), provisional: false };
    const info = this.infoOf(rtLoop);
    let children: ScheduledNode[];
    let end: number;
    if (rtLoop.averagingMode === AveragingMode.SEQUENTIAL && info.containsSweep) {
      // the averaging loop moves inside every innermost sweep
      this.checkSequentialContent(rtLoop, rtLoop.children);
      const laid = this.layout(rtLoop.uid, rtLoop.children, rtLoop.alignment, 0, undefined, info.grid, ctx);
      children = laid.nodes;
      end = laid.end;
    } else {
      const loop = this.scheduleAverageLoop(rtLoop, `${rtLoop.uid}/average`, rtLoop, 0, info.grid, !info.containsSweep, undefined, ctx);
      children = [loop];
      end = loop.end;
    }
    return {
      type: 'section',
      uid: rtLoop.uid,
      kind: 'acquire_loop_rt',
      start: 0,
      end,
      grid: info.grid,
      devices: [...info.devices].sort(),
      trigger: rtLoop.trigger,
      children,
    };
  }

  /** Under SEQUENTIAL averaging only innermost sweeps repeat, so nothing may run outside them. */
  private checkSequentialContent(rtLoop: AcquireLoopNode<ResolvedOperation>, nodes: readonly Node[]): void {
    for (const node of nodes) {
      if (isOperation(node)) {
        throw new UnsupportedConstructError(
          `'${node.uid}' lies outside every innermost sweep of '${rtLoop.uid}'; sequential averaging would run it once instead of ${rtLoop.count} times`,
          { nodeId: node.uid },
        );
      }
      if (node.kind === 'sweep' && !this.infoOf(node).containsSweep) continue;
      this.checkSequentialContent(rtLoop, node.children);
    }
  }

  // ---- Layout ----

  /**
   * Lay out children inside [start, end) and return the section end: the
   * explicit length when given, otherwise the content rounded up to the grid.
   */
  private layout(
    owner: string,
    children: readonly Node[],
    alignment: SectionAlignment,
    start: number,
    explicit: number | undefined,
    grid: number,
    ctx: Context,
  ): Laid {
    if (explicit !== undefined && explicit % grid !== 0) {
      throw new GridViolationError(
        `Length of '${owner}' (${explicit} tiny samples) is not a multiple of its grid (${grid})`,
        { nodeId: owner, window: { start, end: start + explicit } },
      );
    }
    if (alignment === SectionAlignment.RIGHT) return this.rightPack(owner, children, start, explicit, grid, ctx);

    const packed = this.leftPack(children, start, ctx);
    const content = packed.end - start;
    if (explicit !== undefined && content > explicit) {
      throw new SchedulingConflictError(
        `Content of '${owner}' needs ${content} tiny samples but its length is ${explicit}`,
        { nodeId: owner, window: { start, end: packed.end } },
      );
    }
    return { nodes: packed.nodes, end: start + (explicit ?? ceilToGrid(content, grid)) };
  }

  private leftPack(children: readonly Node[], start: number, ctx: Context): Laid {
    const cursors = new Map<string, number>();
    const ends = new Map<string, number>();
    const nodes: ScheduledNode[] = [];
    let end = start;
    for (const child of children) {
      const info = this.infoOf(child);
      let earliest = start;
      for (const line of info.lines) earliest = Math.max(earliest, cursors.get(line) ?? start);
      if (isSectionLike(child)) {
        for (const ref of child.playAfter) earliest = Math.max(earliest, ends.get(ref) ?? start);
      }
      const scheduled = this.scheduleChild(child, earliest, ctx);
      for (const line of info.lines) cursors.set(line, scheduled.end);
      if (isSectionLike(child)) ends.set(child.uid, scheduled.end);
      end = Math.max(end, scheduled.end);
      nodes.push(scheduled);
    }
    return { nodes, end };
  }

  private rightPack(
    owner: string,
    children: readonly Node[],
    start: number,
    explicit: number | undefined,
    grid: number,
    ctx: Context,
  ): Laid {
    const dry = this.leftPack(children, 0, { ...ctx, provisional: true, acquireEnds: new Map(ctx.acquireEnds) });
    const lengths = dry.nodes.map(n => n.end - n.start);
    if (explicit !== undefined && dry.end > explicit) {
      throw new SchedulingConflictError(
        `Content of '${owner}' needs ${dry.end} tiny samples but its length is ${explicit}`,
        { nodeId: owner, window: { start, end: start + dry.end } },
      );
    }

    let length = explicit ?? ceilToGrid(dry.end, grid);
    let positions = this.placeBackwards(children, lengths, start + length);
    for (let attempt = 0; Math.min(start, ...positions) < start; attempt++) {
      if (explicit !== undefined || attempt > 64) {
        throw new SchedulingConflictError(`Content of '${owner}' does not fit its right-aligned length`, {
          nodeId: owner,
          window: { start, end: start + length },
        });
      }
      length += ceilToGrid(start - Math.min(...positions), grid);
      positions = this.placeBackwards(children, lengths, start + length);
    }

    const nodes = children.map((child, i) => {
      const scheduled = this.scheduleChild(child, positions[i], ctx);
      if (scheduled.start !== positions[i]) {
        throw new SchedulingConflictError(
          `'${child.uid}' cannot start at its right-aligned position in '${owner}'; the feedback delay pushes it later`,
          { nodeId: child.uid, window: { start: positions[i], end: scheduled.start } },
        );
      }
      return scheduled;
    });
    return { nodes, end: start + length };
  }

  private placeBackwards(children: readonly Node[], lengths: readonly number[], end: number): number[] {
    const cursors = new Map<string, number>();
    const bound = new Map<string, number>();
    const positions = new Array<number>(children.length).fill(end);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      const info = this.infoOf(child);
      let latest = end;
      for (const line of info.lines) latest = Math.min(latest, cursors.get(line) ?? end);
      if (isSectionLike(child)) latest = Math.min(latest, bound.get(child.uid) ?? end);
      const s = floorToGrid(latest - lengths[i], info.grid);
      positions[i] = s;
      for (const line of info.lines) cursors.set(line, s);
      if (isSectionLike(child)) {
        for (const ref of child.playAfter) bound.set(ref, Math.min(bound.get(ref) ?? end, s));
      }
    }
    return positions;
  }

  // ---- Nodes ----

  private scheduleChild(node: Node, earliest: number, ctx: Context): ScheduledNode {
    if (isOperation(node)) return this.scheduleOperation(node, earliest, ctx);
    switch (node.kind) {
      case 'section':
        return this.scheduleSection(node, earliest, ctx);
      case 'sweep':
        return this.scheduleSweep(node, earliest, ctx);
      case 'match':
        return this.scheduleMatch(node, earliest, ctx);
      case 'case':
      case 'acquire_loop_rt':
        throw new StructureError(`Unexpected ${node.kind} '${node.uid}'`, { nodeId: node.uid });
    }
  }

  private playbackSamples(samples: number, device: ResolvedDevice, nodeId: string): number {
    const caps = device.capabilities;
    let n = samples;
    if (n < caps.minWaveformLength) {
      this.warn({
        code: 'waveform_padded',
        nodeId,
        message: `Waveform of '${nodeId}' padded from ${n} to ${caps.minWaveformLength} samples on '${device.uid}'`,
      });
      n = caps.minWaveformLength;
    }
    n = ceilToGrid(n, caps.sampleMultiple);
    if (n > caps.maxWaveformLength) {
      throw new UnsupportedConstructError(
        `Waveform of '${nodeId}' needs ${n} samples, more than '${device.uid}' holds (${caps.maxWaveformLength})`,
        { nodeId },
      );
    }
    return n;
  }

  private scheduleOperation(op: ResolvedOperation, earliest: number, ctx: Context): ScheduledOperation {
    const device = this.device(op.device);
    const signal = this.signal(op.signal);
    const rate = device.capabilities.samplingRate;
    const start = ceilToGrid(earliest, device.grid);
    let samples = 0;
    let duration = 0;
    switch (op.kind) {
      case 'play': {
        const raw = op.length !== undefined
          ? Math.round(this.timing(op.length, ctx, op.uid) * rate)
          : pulseLengthSamples(op.pulse, rate);
        samples = this.playbackSamples(raw, device, op.uid);
        duration = samples * device.tinyPerSample;
        break;
      }
      case 'acquire': {
        const raw = op.length !== undefined
          ? Math.round(this.timing(op.length, ctx, op.uid) * rate)
          : op.kernel ? pulseLengthSamples(op.kernel, rate) : 0;
        samples = ceilToGrid(Math.max(raw, 1), device.capabilities.sampleMultiple);
        duration = samples * device.tinyPerSample;
        break;
      }
      case 'delay': {
        const tiny = secondsToTiny(this.timing(op.time, ctx, op.uid));
        if (tiny < 0) throw new StructureError(`Delay '${op.uid}' has a negative duration`, { nodeId: op.uid });
        duration = ceilToGrid(tiny, device.grid);
        samples = duration / device.tinyPerSample;
        break;
      }
      case 'reserve':
        break;
    }
    const end = start + duration;
    if (op.kind === 'acquire') ctx.acquireEnds.set(op.uid, end);
    const play = op.kind === 'play' ? op : undefined;
    return {
      type: 'operation',
      uid: op.uid,
      kind: op.kind,
      signal: op.signal,
      line: op.line,
      device: op.device,
      channel: signal.channel,
      start,
      end,
      lengthSamples: samples,
      amplitude: this.value(play?.amplitude ?? 1, ctx),
      phase: this.value(play?.phase ?? 0, ctx),
      setOscillatorPhase: play?.setOscillatorPhase === undefined ? undefined : this.value(play.setOscillatorPhase, ctx),
      incrementOscillatorPhase: play?.incrementOscillatorPhase === undefined
        ? undefined
        : this.value(play.incrementOscillatorPhase, ctx),
      op,
    };
  }

  private scheduleSection(node: SectionNode<ResolvedOperation>, earliest: number, ctx: Context): ScheduledSection {
    const info = this.infoOf(node);
    const start = ceilToGrid(earliest, info.grid);
    const laid = this.layout(node.uid, node.children, node.alignment, start, this.explicitLength(node, ctx), info.grid, ctx);
    return {
      type: 'section',
      uid: node.uid,
      kind: 'section',
      start,
      end: laid.end,
      grid: info.grid,
      devices: [...info.devices].sort(),
      trigger: node.trigger,
      children: laid.nodes,
    };
  }

  /** Iteration length of a shot under the repetition mode. */
  private shot(content: number, grid: number, owner: string, start: number, rtLoop: AcquireLoopNode<ResolvedOperation>): number {
    const fastest = ceilToGrid(content, grid);
    switch (rtLoop.repetitionMode) {
      case RepetitionMode.FASTEST:
        return fastest;
      case RepetitionMode.CONSTANT: {
        const length = ceilToGrid(secondsToTiny(rtLoop.repetitionTime ?? 0), grid);
        if (content > length) {
          throw new SchedulingConflictError(
            `Shot of '${owner}' takes ${content} tiny samples, longer than the repetition time (${length})`,
            { nodeId: owner, window: { start, end: start + content } },
          );
        }
        return length;
      }
      case RepetitionMode.AUTO:
        this.maxShot = Math.max(this.maxShot, fastest);
        return this.shotLength === undefined ? fastest : ceilToGrid(Math.max(this.shotLength, fastest), grid);
    }
  }

  private scheduleAverageLoop(
    body: Section,
    uid: string,
    rtLoop: AcquireLoopNode<ResolvedOperation>,
    earliest: number,
    grid: number,
    innermost: boolean,
    explicit: number | undefined,
    ctx: Context,
  ): ScheduledLoop {
    const start = ceilToGrid(earliest, grid);
    const laid = this.layout(uid, body.children, body.alignment, start, explicit, grid, ctx);
    const content = laid.end - start;
    const iterationLength = innermost ? this.shot(content, grid, uid, start, rtLoop) : ceilToGrid(content, grid);
    return {
      type: 'loop',
      uid,
      loopType: 'average',
      count: rtLoop.count,
      parameters: [],
      compressed: true,
      iterationLength,
      start,
      end: start + rtLoop.count * iterationLength,
      grid,
      devices: [...this.infoOf(body).devices].sort(),
      resetOscillatorPhase: rtLoop.resetOscillatorPhase,
      oscillatorSweeps: [],
      iterations: [{ index: 0, start, end: start + iterationLength, children: laid.nodes }],
    };
  }

  private scheduleSweep(node: SweepNode<ResolvedOperation>, earliest: number, ctx: Context): ScheduledLoop {
    const rtLoop = ctx.rtLoop;
    const info = this.infoOf(node);
    const grid = info.grid;
    const start = ceilToGrid(earliest, grid);
    const params = node.parameters.map(uid => this.parameter(uid, node.uid));
    const count = params[0].values.length;
    const unrolled = node.parameters.some(p => info.timingParameters.has(p));
    const innermost = !info.containsSweep;
    const averageInside = innermost && rtLoop.averagingMode === AveragingMode.SEQUENTIAL;

    const iterate = (iterStart: number, iterCtx: Context, index: number): ScheduledIteration => {
      const explicit = this.explicitLength(node, iterCtx);
      if (averageInside) {
        const avg = this.scheduleAverageLoop(node, `${node.uid}/average`, rtLoop, iterStart, grid, true, explicit, iterCtx);
        return { index, start: iterStart, end: avg.end, children: [avg] };
      }
      const laid = this.layout(node.uid, node.children, node.alignment, iterStart, explicit, grid, iterCtx);
      const length = innermost
        ? this.shot(laid.end - iterStart, grid, node.uid, iterStart, rtLoop)
        : ceilToGrid(laid.end - iterStart, grid);
      return { index, start: iterStart, end: iterStart + length, children: laid.nodes };
    };

    const iterations: ScheduledIteration[] = [];
    let end: number;
    let iterationLength: number;
    if (unrolled) {
      let t = start;
      for (let k = 0; k < count; k++) {
        const env = new Map(ctx.env);
        for (const p of params) env.set(p.uid, p.values[k]);
        const it = iterate(t, { ...ctx, env }, k);
        iterations.push(it);
        t = it.end;
      }
      end = t;
      iterationLength = iterations.length > 0 ? iterations[0].end - iterations[0].start : 0;
    } else {
      const it = iterate(start, ctx, 0);
      iterations.push(it);
      iterationLength = it.end - it.start;
      end = start + count * iterationLength;
    }

    return {
      type: 'loop',
      uid: node.uid,
      loopType: 'sweep',
      count,
      parameters: [...node.parameters],
      compressed: !unrolled,
      iterationLength,
      start,
      end,
      grid,
      devices: [...info.devices].sort(),
      resetOscillatorPhase: node.resetOscillatorPhase,
      oscillatorSweeps: this.oscillatorSweeps(node),
      iterations,
    };
  }

  private scheduleMatch(node: MatchNode<ResolvedOperation>, earliest: number, ctx: Context): ScheduledMatch {
    const binding = this.feedback.get(node.uid);
    if (!binding) throw new UnknownHandleError(`Match '${node.uid}' is not bound to an acquisition`, { nodeId: node.uid });
    const info = this.infoOf(node);
    const grid = info.grid;
    let lower = earliest;
    if (!ctx.provisional) {
      const acquireEnd = ctx.acquireEnds.get(binding.acquire);
      if (acquireEnd === undefined) {
        throw new UnknownHandleError(
          `Acquire '${binding.acquire}' feeding match '${node.uid}' is not scheduled before it`,
          { nodeId: node.uid },
        );
      }
      lower = Math.max(lower, acquireEnd + binding.delay);
    }
    const start = ceilToGrid(lower, grid);

    const cases: ScheduledCase[] = [];
    let end = start;
    for (const c of node.children) {
      const laid = this.layout(c.uid, c.children, c.alignment, start, this.explicitLength(c, ctx), this.infoOf(c).grid, ctx);
      cases.push({ uid: c.uid, state: c.state, empty: false, start, end: laid.end, children: laid.nodes });
      end = Math.max(end, laid.end);
    }
    for (const state of binding.emptyStates) {
      cases.push({ uid: `${node.uid}/empty_${state}`, state, empty: true, start, end: start + grid, children: [] });
      end = Math.max(end, start + grid);
    }

    const explicit = this.explicitLength(node, ctx);
    if (explicit !== undefined) {
      if (explicit % grid !== 0) {
        throw new GridViolationError(
          `Length of '${node.uid}' (${explicit} tiny samples) is not a multiple of its grid (${grid})`,
          { nodeId: node.uid, window: { start, end: start + explicit } },
        );
      }
      if (end - start > explicit) {
        throw new SchedulingConflictError(
          `Cases of '${node.uid}' need ${end - start} tiny samples but its length is ${explicit}`,
          { nodeId: node.uid, window: { start, end } },
        );
      }
      end = start + explicit;
    } else {
      end = start + ceilToGrid(end - start, grid);
    }
    for (const c of cases) c.end = end;
    cases.sort((a, b) => a.state - b.state);

    return {
      type: 'match',
      uid: node.uid,
      handle: node.handle,
      start,
      end,
      grid,
      devices: [...info.devices].sort(),
      binding,
      cases,
    };
  }

  // ---- Verification ----

  /** No two play/acquire windows may overlap on one physical channel. */
  private verifyChannels(nodes: readonly ScheduledNode[]): void {
    const intervals: Interval[] = [];
    this.collectIntervals(nodes, intervals, new Map());
    const byChannel = new Map<string, Interval[]>();
    for (const iv of intervals) {
      if (iv.end <= iv.start) continue;
      const list = byChannel.get(iv.channel) ?? [];
      list.push(iv);
      byChannel.set(iv.channel, list);
    }
    for (const [channel, list] of byChannel) {
      list.sort((a, b) => a.start - b.start || a.end - b.end);
      for (let i = 0; i < list.length; i++) {
        for (let j = i + 1; j < list.length && list[j].start < list[i].end; j++) {
          if (exclusive(list[i], list[j])) continue;
          throw new SchedulingConflictError(
            `'${list[i].uid}' and '${list[j].uid}' overlap on channel ${channel}`,
            { nodeId: list[j].uid, window: { start: list[j].start, end: Math.min(list[i].end, list[j].end) } },
          );
        }
      }
    }
  }

  private collectIntervals(nodes: readonly ScheduledNode[], out: Interval[], cases: ReadonlyMap<string, number>): void {
    for (const node of nodes) {
      switch (node.type) {
        case 'operation':
          if (node.kind === 'play' || node.kind === 'acquire') {
            out.push({ uid: node.uid, channel: node.channel, start: node.start, end: node.end, cases });
          }
          break;
        case 'section':
          this.collectIntervals(node.children, out, cases);
          break;
        case 'loop':
          if (node.compressed) {
            const template = node.iterations[0]?.children ?? [];
            this.verifyChannels(template);
            const inner: Interval[] = [];
            this.collectIntervals(template, inner, cases);
            for (const channel of new Set(inner.map(iv => iv.channel))) {
              out.push({ uid: node.uid, channel, start: node.start, end: node.end, cases });
            }
          } else {
            for (const it of node.iterations) this.collectIntervals(it.children, out, cases);
          }
          break;
        case 'match':
          for (const c of node.cases) {
            const scoped = new Map(cases);
            scoped.set(node.uid, c.state);
            this.collectIntervals(c.children, out, scoped);
          }
          break;
      }
    }
  }
}

/** Operations in different cases of one match never run in the same pass. */
function exclusive(a: Interval, b: Interval): boolean {
  for (const [match, state] of a.cases) {
    const other = b.cases.get(match);
    if (other !== undefined && other !== state) return true;
  }
  return false;
}
