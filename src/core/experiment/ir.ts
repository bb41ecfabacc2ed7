/**
 * Experiment IR: the immutable tree produced by the builder.
 *
 * Section-like nodes are generic over their operation type so that later
 * stages can carry extra per-operation data (the resolver attaches the
 * physical signal line) without redefining the tree.
 */
import type { PulseDescriptor } from '../pulse/library';
import type { ParameterValue, SweepParameter } from './parameter';

// === Enumerations ===

export const SectionAlignment = {
  LEFT: 'left',
  RIGHT: 'right',
} as const;
export type SectionAlignment = typeof SectionAlignment[keyof typeof SectionAlignment];

export const AveragingMode = {
  CYCLIC: 'cyclic',
  SEQUENTIAL: 'sequential',
  SINGLE_SHOT: 'single_shot',
} as const;
export type AveragingMode = typeof AveragingMode[keyof typeof AveragingMode];

export const AcquisitionType = {
  RAW: 'raw',
  INTEGRATION: 'integration',
  DISCRIMINATION: 'discrimination',
  SPECTROSCOPY: 'spectroscopy',
} as const;
export type AcquisitionType = typeof AcquisitionType[keyof typeof AcquisitionType];

export const RepetitionMode = {
  FASTEST: 'fastest',
  CONSTANT: 'constant',
  AUTO: 'auto',
} as const;
export type RepetitionMode = typeof RepetitionMode[keyof typeof RepetitionMode];

export const ModulationType = {
  HARDWARE: 'hardware',
  SOFTWARE: 'software',
} as const;
export type ModulationType = typeof ModulationType[keyof typeof ModulationType];

// === Operations ===

export interface PlayOperation {
  readonly kind: 'play';
  readonly uid: string;
  readonly signal: string;
  readonly pulse: PulseDescriptor;
  readonly amplitude?: ParameterValue;
  readonly phase?: ParameterValue;
  /** Overrides the pulse length (seconds) */
  readonly length?: ParameterValue;
  readonly incrementOscillatorPhase?: ParameterValue;
  readonly setOscillatorPhase?: ParameterValue;
}

export interface DelayOperation {
  readonly kind: 'delay';
  readonly uid: string;
  readonly signal: string;
  /** Seconds */
  readonly time: ParameterValue;
}

export interface AcquireOperation {
  readonly kind: 'acquire';
  readonly uid: string;
  readonly signal: string;
  readonly handle: string;
  readonly kernel?: PulseDescriptor;
  /** Integration or raw-window length (seconds); defaults to the kernel length */
  readonly length?: ParameterValue;
}

/** Claims a signal for the enclosing section without playing on it */
export interface ReserveOperation {
  readonly kind: 'reserve';
  readonly uid: string;
  readonly signal: string;
}

export type Operation = PlayOperation | DelayOperation | AcquireOperation | ReserveOperation;
export type OperationKind = Operation['kind'];

// === Sections ===

export interface TriggerSpec {
  /** Trigger bit pattern held for the duration of the section */
  readonly state: number;
}

export interface SectionFields<Op extends Operation = Operation> {
  readonly uid: string;
  readonly alignment: SectionAlignment;
  /** Explicit length in seconds */
  readonly length?: ParameterValue;
  readonly playAfter: readonly string[];
  readonly onSystemGrid: boolean;
  /** Trigger outputs keyed by experiment signal */
  readonly trigger: Readonly<Record<string, TriggerSpec>>;
  readonly children: readonly ExperimentNode<Op>[];
}

export type SectionAttributes = Omit<SectionFields, 'children'>;

export interface SectionNode<Op extends Operation = Operation> extends SectionFields<Op> {
  readonly kind: 'section';
}

export interface SweepNode<Op extends Operation = Operation> extends SectionFields<Op> {
  readonly kind: 'sweep';
  /** Parameter uids iterated in lockstep */
  readonly parameters: readonly string[];
  readonly resetOscillatorPhase: boolean;
}

export interface AcquireLoopNode<Op extends Operation = Operation> extends SectionFields<Op> {
  readonly kind: 'acquire_loop_rt';
  readonly count: number;
  readonly averagingMode: AveragingMode;
  readonly acquisitionType: AcquisitionType;
  readonly repetitionMode: RepetitionMode;
  /** Seconds; required for CONSTANT repetition */
  readonly repetitionTime?: number;
  readonly resetOscillatorPhase: boolean;
}

export interface MatchNode<Op extends Operation = Operation> extends SectionFields<Op> {
  readonly kind: 'match';
  readonly handle: string;
  /** Force the local feedback path (acquisition and playback on one unit) */
  readonly local?: boolean;
  /** Declared acquire-to-branch delay in seconds */
  readonly feedbackDelay?: number;
  readonly children: readonly CaseNode<Op>[];
}

export interface CaseNode<Op extends Operation = Operation> extends SectionFields<Op> {
  readonly kind: 'case';
  readonly state: number;
}

export type SectionLike<Op extends Operation = Operation> =
  | SectionNode<Op>
  | SweepNode<Op>
  | AcquireLoopNode<Op>
  | MatchNode<Op>
  | CaseNode<Op>;

export type SectionKind = SectionLike['kind'];

export type ExperimentNode<Op extends Operation = Operation> = SectionLike<Op> | Op;

/** Experiment-level calibration override for one experiment signal */
export interface SignalCalibrationOverride {
  readonly oscillator?: {
    readonly uid: string;
    readonly frequency: ParameterValue;
    readonly modulation: ModulationType;
  };
  readonly localOscillatorFrequency?: ParameterValue;
  readonly portDelay?: number;
  readonly range?: number;
  readonly threshold?: number | readonly number[];
}

export interface Experiment<Op extends Operation = Operation> {
  readonly uid: string;
  readonly signals: readonly string[];
  readonly parameters: ReadonlyMap<string, SweepParameter>;
  readonly pulses: ReadonlyMap<string, PulseDescriptor>;
  readonly signalCalibration: Readonly<Record<string, SignalCalibrationOverride>>;
  readonly root: SectionNode<Op>;
}

// === Tree helpers ===

const SECTION_KINDS: ReadonlySet<string> = new Set<SectionKind>(['section', 'sweep', 'acquire_loop_rt', 'match', 'case']);

export function isSectionLike<Op extends Operation>(node: ExperimentNode<Op>): node is SectionLike<Op> {
  return SECTION_KINDS.has(node.kind);
}

export function isOperation<Op extends Operation>(node: ExperimentNode<Op>): node is Op {
  return !SECTION_KINDS.has(node.kind);
}

/** Pre-order walk; the visitor sees each node with its chain of section ancestors. */
export function walk<Op extends Operation>(
  node: ExperimentNode<Op>,
  visit: (node: ExperimentNode<Op>, ancestors: readonly SectionLike<Op>[]) => void,
  ancestors: readonly SectionLike<Op>[] = [],
): void {
  visit(node, ancestors);
  if (isSectionLike(node)) {
    const chain = [...ancestors, node];
    for (const child of node.children) walk(child, visit, chain);
  }
}

/** Experiment signals touched by a subtree: operations, reserves and trigger outputs. */
export function subtreeSignals<Op extends Operation>(node: ExperimentNode<Op>): Set<string> {
  const signals = new Set<string>();
  walk(node, n => {
    if (isSectionLike(n)) for (const s of Object.keys(n.trigger)) signals.add(s);
    else signals.add(n.signal);
  });
  return signals;
}

function mapChildren<A extends Operation, B extends Operation>(
  children: readonly ExperimentNode<A>[],
  fn: (op: A) => B,
): ExperimentNode<B>[] {
  return children.map(child => (isSectionLike(child) ? mapOperations(child, fn) : fn(child)));
}

function mapCase<A extends Operation, B extends Operation>(node: CaseNode<A>, fn: (op: A) => B): CaseNode<B> {
  return Object.freeze({ ...node, children: Object.freeze(mapChildren(node.children, fn)) });
}

/** Rebuild a subtree with every operation replaced by fn(operation). */
function mapOperations<A extends Operation, B extends Operation>(
  node: SectionLike<A>,
  fn: (op: A) => B,
): SectionLike<B> {
  switch (node.kind) {
    case 'match':
      return Object.freeze({ ...node, children: Object.freeze(node.children.map(c => mapCase(c, fn))) });
    case 'case':
      return mapCase(node, fn);
    case 'section':
      return Object.freeze({ ...node, children: Object.freeze(mapChildren(node.children, fn)) });
    case 'sweep':
      return Object.freeze({ ...node, children: Object.freeze(mapChildren(node.children, fn)) });
    case 'acquire_loop_rt':
      return Object.freeze({ ...node, children: Object.freeze(mapChildren(node.children, fn)) });
  }
}

export function mapRoot<A extends Operation, B extends Operation>(
  root: SectionNode<A>,
  fn: (op: A) => B,
): SectionNode<B> {
  return Object.freeze({ ...root, children: Object.freeze(mapChildren(root.children, fn)) });
}
