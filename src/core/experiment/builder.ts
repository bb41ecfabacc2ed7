/**
 * Experiment tree builder.
 *
 * Declarations accumulate on a scope stack owned by the builder instance.
 * exit() freezes the innermost scope into an IR node and appends it to its
 * parent; the callback helpers (section, sweep, acquireLoopRt, match, case)
 * wrap enter/exit. Every structural check happens here, before any hardware
 * knowledge is involved.
 */
import { stableStringify } from '../canonical';
import { secondsToTiny } from '../constants';
import { StructureError } from '../errors';
import type { PulseDescriptor } from '../pulse/library';
import { isParameterRef, paramRef } from './parameter';
import type { ParameterRef, ParameterValue, SweepParameter } from './parameter';
import {
  AcquisitionType,
  AveragingMode,
  RepetitionMode,
  SectionAlignment,
  isSectionLike,
  subtreeSignals,
} from './ir';
import type {
  CaseNode,
  Experiment,
  ExperimentNode,
  ModulationType,
  Operation,
  SectionAttributes,
  SectionLike,
  SectionNode,
  SignalCalibrationOverride,
  TriggerSpec,
} from './ir';

/** A sweep parameter passed directly is registered on first use. */
export type ParameterInput = number | SweepParameter | ParameterRef;

export interface SectionOptions {
  uid?: string;
  alignment?: SectionAlignment;
  /** Seconds */
  length?: ParameterInput;
  playAfter?: string | readonly string[];
  onSystemGrid?: boolean;
  trigger?: Readonly<Record<string, TriggerSpec>>;
}

export interface SweepOptions extends SectionOptions {
  parameters: SweepParameter | readonly SweepParameter[];
  resetOscillatorPhase?: boolean;
}

export interface AcquireLoopOptions extends SectionOptions {
  count: number;
  averagingMode?: AveragingMode;
  acquisitionType?: AcquisitionType;
  repetitionMode?: RepetitionMode;
  repetitionTime?: number;
  resetOscillatorPhase?: boolean;
}

export interface MatchOptions extends SectionOptions {
  handle: string;
  local?: boolean;
  feedbackDelay?: number;
}

export interface PlayOptions {
  amplitude?: ParameterInput;
  phase?: ParameterInput;
  length?: ParameterInput;
  incrementOscillatorPhase?: ParameterInput;
  setOscillatorPhase?: ParameterInput;
}

export interface AcquireOptions {
  kernel?: PulseDescriptor;
  length?: ParameterInput;
}

export interface MeasureOptions {
  measureSignal: string;
  measurePulse: PulseDescriptor;
  measureAmplitude?: ParameterInput;
  acquireSignal: string;
  handle: string;
  /** Defaults to the measure pulse when no explicit length is given */
  kernel?: PulseDescriptor;
  length?: ParameterInput;
  /** Delay on the acquire signal before integration starts (s) */
  acquireDelay?: number;
  /** Delay on the measure signal after the readout pulse (s) */
  resetDelay?: number;
}

export interface CalibrationInput {
  oscillator?: { uid: string; frequency: ParameterInput; modulation: ModulationType };
  localOscillatorFrequency?: ParameterInput;
  portDelay?: number;
  range?: number;
  threshold?: number | readonly number[];
}

export type ScopeHeader =
  | { kind: 'section' }
  | { kind: 'sweep'; parameters: string[]; resetOscillatorPhase: boolean }
  | {
      kind: 'acquire_loop_rt';
      count: number;
      averagingMode: AveragingMode;
      acquisitionType: AcquisitionType;
      repetitionMode: RepetitionMode;
      repetitionTime?: number;
      resetOscillatorPhase: boolean;
    }
  | { kind: 'match'; handle: string; local?: boolean; feedbackDelay?: number }
  | { kind: 'case'; state: number };

interface Scope {
  header: ScopeHeader;
  attrs: SectionAttributes;
  children: ExperimentNode[];
  /** The real-time acquisition loop lies inside this scope */
  containsRtLoop: boolean;
}

const ROOT_UID = 'root';

export class ExperimentBuilder {
  readonly uid: string;
  private readonly signals: ReadonlySet<string>;
  private readonly stack: Scope[];
  private readonly uids = new Set<string>([ROOT_UID]);
  private readonly parameters = new Map<string, SweepParameter>();
  private readonly sweptParameters = new Set<string>();
  private readonly pulses = new Map<string, PulseDescriptor>();
  private readonly calibration = new Map<string, SignalCalibrationOverride>();
  private readonly calibrationParameters = new Set<string>();
  private counter = 0;
  private rtLoopSeen = false;

  constructor(opts: { uid: string; signals: readonly string[] }) {
    this.uid = opts.uid;
    this.signals = new Set(opts.signals);
    if (this.signals.size !== opts.signals.length) {
      throw new StructureError(`Experiment '${opts.uid}' declares a signal twice`, { nodeId: opts.uid });
    }
    this.stack = [{
      header: { kind: 'section' },
      attrs: {
        uid: ROOT_UID,
        alignment: SectionAlignment.LEFT,
        playAfter: [],
        onSystemGrid: false,
        trigger: {},
      },
      children: [],
      containsRtLoop: false,
    }];
  }

  // ---- Scope stack ----

  get depth(): number {
    return this.stack.length - 1;
  }

  private top(): Scope {
    return this.stack[this.stack.length - 1];
  }

  private inRealTime(): boolean {
    return this.stack.some(s => s.header.kind === 'acquire_loop_rt');
  }

  private inCase(): boolean {
    return this.stack.some(s => s.header.kind === 'case');
  }

  /** Parameters swept by the open scopes, outermost first. */
  private enclosingParameters(): Set<string> {
    const uids = new Set<string>();
    for (const scope of this.stack) {
      if (scope.header.kind === 'sweep') for (const p of scope.header.parameters) uids.add(p);
    }
    return uids;
  }

  private registerParameter(param: SweepParameter): void {
    const existing = this.parameters.get(param.uid);
    if (existing && (existing.values.length !== param.values.length ||
        existing.values.some((v, i) => v !== param.values[i]))) {
      throw new StructureError(`Parameter '${param.uid}' is declared twice with different values`, { nodeId: param.uid });
    }
    this.parameters.set(param.uid, param);
  }

  /** Register a parameter so that a streamed sweep header can name it. */
  declareParameter(param: SweepParameter): this {
    this.registerParameter(param);
    return this;
  }

  /** Parameters of one sweep step in lockstep; each parameter belongs to one sweep only. */
  private bindSweepParameters(uids: readonly string[], nodeId: string): void {
    if (uids.length === 0) throw new StructureError(`Sweep '${nodeId}' has no parameters`, { nodeId });
    const params = uids.map(uid => {
      const param = this.parameters.get(uid);
      if (!param) throw new StructureError(`Unknown parameter '${uid}' referenced by '${nodeId}'`, { nodeId });
      return param;
    });
    for (const p of params) {
      if (p.values.length !== params[0].values.length) {
        throw new StructureError(`Parameters swept together in '${nodeId}' have different lengths`, { nodeId });
      }
      if (this.sweptParameters.has(p.uid)) {
        throw new StructureError(`Parameter '${p.uid}' is swept by more than one sweep`, { nodeId });
      }
    }
    for (const p of params) this.sweptParameters.add(p.uid);
  }

  private registerPulse(pulse: PulseDescriptor, nodeId: string): void {
    const existing = this.pulses.get(pulse.uid);
    if (existing && existing !== pulse && stableStringify(existing) !== stableStringify(pulse)) {
      throw new StructureError(`Pulse uid '${pulse.uid}' names two different pulses`, { nodeId });
    }
    this.pulses.set(pulse.uid, pulse);
  }

  /**
   * Convert a parameter input into a stored value. A parameter reference must
   * be bound by an enclosing sweep unless `anywhere` is set.
   */
  private parameterValue(input: ParameterInput, nodeId: string, anywhere = false): ParameterValue {
    if (typeof input === 'number') {
      if (!Number.isFinite(input)) throw new StructureError(`Non-finite value in '${nodeId}'`, { nodeId });
      return input;
    }
    if (!isParameterRef(input)) this.registerParameter(input);
    const uid = input.uid;
    if (!this.parameters.has(uid)) {
      throw new StructureError(`Unknown parameter '${uid}' referenced by '${nodeId}'`, { nodeId });
    }
    if (!anywhere && !this.enclosingParameters().has(uid)) {
      throw new StructureError(`Parameter '${uid}' used by '${nodeId}' is not swept by an enclosing sweep`, { nodeId });
    }
    return paramRef(uid);
  }

  private optionalValue(input: ParameterInput | undefined, nodeId: string): ParameterValue | undefined {
    return input === undefined ? undefined : this.parameterValue(input, nodeId);
  }

  private checkSignal(signal: string, nodeId: string): void {
    if (!this.signals.has(signal)) {
      throw new StructureError(`Signal '${signal}' is not declared for experiment '${this.uid}'`, { nodeId });
    }
  }

  private claimUid(uid: string): void {
    if (this.uids.has(uid)) throw new StructureError(`Duplicate uid '${uid}'`, { nodeId: uid });
    this.uids.add(uid);
  }

  /** Open a scope. Prefer the callback helpers unless declarations are streamed. */
  enter(header: ScopeHeader, opts: SectionOptions = {}): this {
    const parent = this.top();
    const uid = opts.uid ?? `${header.kind}_${this.counter++}`;

    if (header.kind === 'case' && parent.header.kind !== 'match') {
      throw new StructureError(`Case '${uid}' must be a direct child of a match`, { nodeId: uid });
    }
    if (header.kind !== 'case' && parent.header.kind === 'match') {
      throw new StructureError(`Match '${parent.attrs.uid}' may only contain cases, got ${header.kind} '${uid}'`, { nodeId: uid });
    }
    if (header.kind !== 'section' && header.kind !== 'case' && this.inCase()) {
      throw new StructureError(`Case bodies may only contain play and delay operations, got ${header.kind} '${uid}'`, { nodeId: uid });
    }
    if (header.kind === 'acquire_loop_rt') {
      if (this.inRealTime()) {
        throw new StructureError(`Real-time acquisition loop '${uid}' is nested in another one`, { nodeId: uid });
      }
      if (this.rtLoopSeen) {
        throw new StructureError(`Experiment '${this.uid}' declares more than one real-time acquisition loop`, { nodeId: uid });
      }
      if (!Number.isInteger(header.count) || header.count < 1) {
        throw new StructureError(`Real-time acquisition loop '${uid}' needs a positive integer count`, { nodeId: uid });
      }
      if (header.repetitionMode === RepetitionMode.CONSTANT && !(header.repetitionTime !== undefined && header.repetitionTime > 0)) {
        throw new StructureError(`Constant repetition in '${uid}' requires a positive repetitionTime`, { nodeId: uid });
      }
      this.rtLoopSeen = true;
    }
    if (header.kind === 'match') {
      if (!this.inRealTime()) {
        throw new StructureError(`Match '${uid}' must be inside the real-time acquisition loop`, { nodeId: uid });
      }
      if (header.feedbackDelay !== undefined && !(header.feedbackDelay >= 0)) {
        throw new StructureError(`Match '${uid}' has a negative feedback delay`, { nodeId: uid });
      }
    }
    if (header.kind === 'case') {
      if (!Number.isInteger(header.state) || header.state < 0) {
        throw new StructureError(`Case '${uid}' needs a non-negative integer state`, { nodeId: uid });
      }
    }

    if (header.kind === 'sweep') this.bindSweepParameters(header.parameters, uid);

    this.claimUid(uid);

    const playAfter = opts.playAfter === undefined ? [] : typeof opts.playAfter === 'string' ? [opts.playAfter] : [...opts.playAfter];
    for (const ref of playAfter) {
      const sibling = parent.children.some(c => isSectionLike(c) && c.uid === ref);
      if (!sibling) {
        throw new StructureError(`Section '${uid}' plays after '${ref}', which is not an earlier sibling`, { nodeId: uid });
      }
    }

    for (const signal of Object.keys(opts.trigger ?? {})) this.checkSignal(signal, uid);

    let length: ParameterValue | undefined;
    if (opts.length !== undefined) {
      length = this.parameterValue(opts.length, uid);
      if (typeof length === 'number' && length < 0) {
        throw new StructureError(`Section '${uid}' has a negative length`, { nodeId: uid });
      }
    }

    this.stack.push({
      header,
      attrs: {
        uid,
        alignment: opts.alignment ?? SectionAlignment.LEFT,
        length,
        playAfter: Object.freeze(playAfter),
        onSystemGrid: opts.onSystemGrid ?? false,
        trigger: Object.freeze({ ...opts.trigger }),
      },
      children: [],
      containsRtLoop: header.kind === 'acquire_loop_rt',
    });
    return this;
  }

  /** Close the innermost scope and append the frozen node to its parent. */
  exit(): SectionLike {
    if (this.stack.length <= 1) {
      throw new StructureError('exit() without a matching enter()', { nodeId: this.uid });
    }
    const scope = this.top();
    this.stack.pop();
    const parent = this.top();

    if (scope.header.kind === 'sweep' && !this.inRealTime() && !scope.containsRtLoop) {
      throw new StructureError(
        `Near-time sweep '${scope.attrs.uid}' must contain the real-time acquisition loop`,
        { nodeId: scope.attrs.uid },
      );
    }
    if (scope.header.kind === 'match' && scope.children.length === 0) {
      throw new StructureError(`Match '${scope.attrs.uid}' has no cases`, { nodeId: scope.attrs.uid });
    }
    checkExplicitLengths(scope);

    const node = freezeScope(scope);
    parent.children.push(node);
    parent.containsRtLoop ||= scope.containsRtLoop;
    return node;
  }

  private scoped(header: ScopeHeader, opts: SectionOptions, body: (b: this) => void): this {
    const depth = this.stack.length;
    this.enter(header, opts);
    body(this);
    if (this.stack.length !== depth + 1) {
      throw new StructureError(`Unbalanced scopes inside '${this.top().attrs.uid}'`, { nodeId: this.top().attrs.uid });
    }
    this.exit();
    return this;
  }

  // ---- Sections ----

  section(opts: SectionOptions, body: (b: this) => void): this {
    return this.scoped({ kind: 'section' }, opts, body);
  }

  sweep(opts: SweepOptions, body: (b: this) => void): this {
    const params = isList(opts.parameters) ? opts.parameters : [opts.parameters];
    for (const p of params) this.registerParameter(p);
    return this.scoped({
      kind: 'sweep',
      parameters: params.map(p => p.uid),
      resetOscillatorPhase: opts.resetOscillatorPhase ?? false,
    }, opts, body);
  }

  acquireLoopRt(opts: AcquireLoopOptions, body: (b: this) => void): this {
    return this.scoped({
      kind: 'acquire_loop_rt',
      count: opts.count,
      averagingMode: opts.averagingMode ?? AveragingMode.CYCLIC,
      acquisitionType: opts.acquisitionType ?? AcquisitionType.INTEGRATION,
      repetitionMode: opts.repetitionMode ?? RepetitionMode.FASTEST,
      repetitionTime: opts.repetitionTime,
      resetOscillatorPhase: opts.resetOscillatorPhase ?? false,
    }, opts, body);
  }

  match(opts: MatchOptions, body: (b: this) => void): this {
    return this.scoped({
      kind: 'match',
      handle: opts.handle,
      local: opts.local,
      feedbackDelay: opts.feedbackDelay,
    }, { ...opts, onSystemGrid: true }, body);
  }

  case(state: number, body: (b: this) => void, opts: SectionOptions = {}): this {
    return this.scoped({ kind: 'case', state }, opts, body);
  }

  // ---- Operations ----

  private addOperation(op: Operation): this {
    const scope = this.top();
    if (scope.header.kind === 'match') {
      throw new StructureError(`Match '${scope.attrs.uid}' may only contain cases, got a ${op.kind}`, { nodeId: op.uid });
    }
    this.checkSignal(op.signal, op.uid);
    if (!this.inRealTime()) {
      throw new StructureError(`Operation '${op.uid}' must be inside the real-time acquisition loop`, { nodeId: op.uid });
    }
    if (this.inCase() && op.kind !== 'play' && op.kind !== 'delay') {
      throw new StructureError(`Case bodies may only contain play and delay operations, got ${op.kind} '${op.uid}'`, { nodeId: op.uid });
    }
    scope.children.push(Object.freeze(op));
    return this;
  }

  private nextOperationUid(): string {
    const scope = this.top();
    return `${scope.attrs.uid}/${scope.children.length}`;
  }

  play(signal: string, pulse: PulseDescriptor, opts: PlayOptions = {}): this {
    const uid = this.nextOperationUid();
    this.registerPulse(pulse, uid);
    const length = this.optionalValue(opts.length, uid);
    if (typeof length === 'number' && !(length > 0)) {
      throw new StructureError(`Play '${uid}' needs a positive length`, { nodeId: uid });
    }
    return this.addOperation({
      kind: 'play',
      uid,
      signal,
      pulse,
      amplitude: this.optionalValue(opts.amplitude, uid),
      phase: this.optionalValue(opts.phase, uid),
      length,
      incrementOscillatorPhase: this.optionalValue(opts.incrementOscillatorPhase, uid),
      setOscillatorPhase: this.optionalValue(opts.setOscillatorPhase, uid),
    });
  }

  delay(signal: string, time: ParameterInput): this {
    const uid = this.nextOperationUid();
    const value = this.parameterValue(time, uid);
    if (typeof value === 'number' && value < 0) {
      throw new StructureError(`Delay '${uid}' has a negative duration`, { nodeId: uid });
    }
    return this.addOperation({ kind: 'delay', uid, signal, time: value });
  }

  acquire(signal: string, handle: string, opts: AcquireOptions = {}): this {
    const uid = this.nextOperationUid();
    if (opts.kernel === undefined && opts.length === undefined) {
      throw new StructureError(`Acquire '${uid}' needs an integration kernel or a length`, { nodeId: uid });
    }
    if (handle.length === 0) throw new StructureError(`Acquire '${uid}' has an empty handle`, { nodeId: uid });
    if (opts.kernel) this.registerPulse(opts.kernel, uid);
    const length = this.optionalValue(opts.length, uid);
    if (typeof length === 'number' && !(length > 0)) {
      throw new StructureError(`Acquire '${uid}' needs a positive length`, { nodeId: uid });
    }
    return this.addOperation({ kind: 'acquire', uid, signal, handle, kernel: opts.kernel, length });
  }

  reserve(signal: string): this {
    return this.addOperation({ kind: 'reserve', uid: this.nextOperationUid(), signal });
  }

  /** Readout pulse plus acquisition, with optional acquire and reset delays. */
  measure(opts: MeasureOptions): this {
    this.play(opts.measureSignal, opts.measurePulse, { amplitude: opts.measureAmplitude });
    if (opts.acquireDelay !== undefined && opts.acquireDelay > 0) this.delay(opts.acquireSignal, opts.acquireDelay);
    this.acquire(opts.acquireSignal, opts.handle, {
      kernel: opts.kernel ?? (opts.length === undefined ? opts.measurePulse : undefined),
      length: opts.length,
    });
    if (opts.resetDelay !== undefined && opts.resetDelay > 0) this.delay(opts.measureSignal, opts.resetDelay);
    return this;
  }

  // ---- Calibration ----

  /** Experiment-level calibration override, merged over the setup's table. */
  setCalibration(signal: string, input: CalibrationInput): this {
    this.checkSignal(signal, signal);
    const track = (value: ParameterValue): ParameterValue => {
      if (typeof value !== 'number') this.calibrationParameters.add(value.uid);
      return value;
    };
    const override: SignalCalibrationOverride = {
      oscillator: input.oscillator && {
        uid: input.oscillator.uid,
        modulation: input.oscillator.modulation,
        frequency: track(this.parameterValue(input.oscillator.frequency, signal, true)),
      },
      localOscillatorFrequency: input.localOscillatorFrequency === undefined
        ? undefined
        : track(this.parameterValue(input.localOscillatorFrequency, signal, true)),
      portDelay: input.portDelay,
      range: input.range,
      threshold: Array.isArray(input.threshold) ? Object.freeze([...input.threshold]) : input.threshold,
    };
    this.calibration.set(signal, Object.freeze(override));
    return this;
  }

  // ---- Finish ----

  build(): Experiment {
    if (this.stack.length !== 1) {
      throw new StructureError(`Scope '${this.top().attrs.uid}' was never closed`, { nodeId: this.top().attrs.uid });
    }
    if (!this.rtLoopSeen) {
      throw new StructureError(`Experiment '${this.uid}' has no real-time acquisition loop`, { nodeId: this.uid });
    }
    for (const uid of this.calibrationParameters) {
      if (!this.sweptParameters.has(uid)) {
        throw new StructureError(`Calibration parameter '${uid}' is not swept by any sweep`, { nodeId: uid });
      }
    }
    const root = this.stack[0];
    const rootNode: SectionNode = Object.freeze({
      kind: 'section',
      ...root.attrs,
      children: Object.freeze([...root.children]),
    });
    return Object.freeze({
      uid: this.uid,
      signals: Object.freeze([...this.signals]),
      parameters: new Map(this.parameters),
      pulses: new Map(this.pulses),
      signalCalibration: Object.freeze(Object.fromEntries(this.calibration)),
      root: rootNode,
    });
  }
}

// ---- Helpers ----

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function isCaseNode(node: ExperimentNode): node is CaseNode {
  return node.kind === 'case';
}

function freezeScope(scope: Scope): SectionLike {
  const children = Object.freeze([...scope.children]);
  const { header, attrs } = scope;
  let node: SectionLike;
  switch (header.kind) {
    case 'section':
      node = { kind: 'section', ...attrs, children };
      break;
    case 'case':
      node = { kind: 'case', state: header.state, ...attrs, children };
      break;
    case 'sweep':
      node = {
        kind: 'sweep',
        parameters: Object.freeze([...header.parameters]),
        resetOscillatorPhase: header.resetOscillatorPhase,
        ...attrs,
        children,
      };
      break;
    case 'acquire_loop_rt':
      node = { ...header, ...attrs, children };
      break;
    case 'match':
      node = { ...header, ...attrs, children: Object.freeze(scope.children.filter(isCaseNode)) };
      break;
  }
  return Object.freeze(node);
}

/**
 * Explicit lengths must nest: no child longer than its parent, and siblings
 * sequenced on a shared signal must fit the parent's length together.
 */
function checkExplicitLengths(scope: Scope): void {
  const parentLength = scope.attrs.length;
  if (typeof parentLength !== 'number') return;
  const limit = secondsToTiny(parentLength);
  const perSignal = new Map<string, number>();
  for (const child of scope.children) {
    if (!isSectionLike(child) || typeof child.length !== 'number') continue;
    const len = secondsToTiny(child.length);
    if (len > limit) {
      throw new StructureError(
        `Section '${child.uid}' is longer than its parent '${scope.attrs.uid}'`,
        { nodeId: child.uid },
      );
    }
    for (const signal of subtreeSignals(child)) {
      const total = (perSignal.get(signal) ?? 0) + len;
      if (total > limit) {
        throw new StructureError(
          `Sections under '${scope.attrs.uid}' on signal '${signal}' have explicit lengths exceeding the parent's`,
          { nodeId: scope.attrs.uid },
        );
      }
      perSignal.set(signal, total);
    }
  }
}
