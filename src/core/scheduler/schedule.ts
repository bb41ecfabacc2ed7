/**
 * Time-annotated schedule: the scheduler's output.
 *
 * All times are absolute tiny samples from the start of a near-time step.
 * A compressed loop stores one iteration template at iteration 0; iteration k
 * runs k * iterationLength later. Unrolled loops store every iteration.
 */
import type { AcquisitionType, AveragingMode, OperationKind, RepetitionMode, TriggerSpec } from '../experiment/ir';
import type { ParameterValue } from '../experiment/parameter';
import type { FeedbackBinding } from '../feedback/feedback';
import type { ResolvedOperation } from '../setup/resolver';

export interface ScheduledOperation {
  type: 'operation';
  uid: string;
  kind: OperationKind;
  signal: string;
  line: string;
  device: string;
  channel: string;
  start: number;
  end: number;
  /** Device samples played or acquired */
  lengthSamples: number;
  /** Bound value, or a reference to a parameter of an enclosing compressed loop */
  amplitude: ParameterValue;
  phase: ParameterValue;
  setOscillatorPhase?: ParameterValue;
  incrementOscillatorPhase?: ParameterValue;
  op: ResolvedOperation;
}

export interface ScheduledSection {
  type: 'section';
  uid: string;
  kind: 'section' | 'acquire_loop_rt';
  start: number;
  end: number;
  grid: number;
  devices: string[];
  trigger: Readonly<Record<string, TriggerSpec>>;
  children: ScheduledNode[];
}

/** Hardware oscillator whose frequency steps with a loop parameter */
export interface OscillatorSweep {
  device: string;
  signal: string;
  oscillator: number;
  parameter: string;
  values: number[];
}

export interface ScheduledIteration {
  index: number;
  start: number;
  end: number;
  children: ScheduledNode[];
}

export interface ScheduledLoop {
  type: 'loop';
  uid: string;
  loopType: 'average' | 'sweep';
  count: number;
  parameters: string[];
  compressed: boolean;
  iterationLength: number;
  start: number;
  end: number;
  grid: number;
  devices: string[];
  resetOscillatorPhase: boolean;
  oscillatorSweeps: OscillatorSweep[];
  iterations: ScheduledIteration[];
}

export interface ScheduledCase {
  uid: string;
  state: number;
  /** Filler for a state without a declared case */
  empty: boolean;
  start: number;
  end: number;
  children: ScheduledNode[];
}

export interface ScheduledMatch {
  type: 'match';
  uid: string;
  handle: string;
  start: number;
  end: number;
  grid: number;
  devices: string[];
  binding: FeedbackBinding;
  /** Sorted by state */
  cases: ScheduledCase[];
}

export type ScheduledNode = ScheduledOperation | ScheduledSection | ScheduledLoop | ScheduledMatch;

export interface NearTimeAxis {
  uid: string;
  parameters: string[];
  count: number;
}

export interface NearTimeStep {
  index: number;
  /** Index into each near-time axis, outermost first */
  indices: number[];
  /** Near-time parameter values of this step */
  values: Record<string, number>;
  root: ScheduledSection;
}

export interface ScheduledExperiment {
  uid: string;
  systemGrid: number;
  rtLoop: string;
  count: number;
  averagingMode: AveragingMode;
  acquisitionType: AcquisitionType;
  repetitionMode: RepetitionMode;
  nearTimeAxes: NearTimeAxis[];
  steps: NearTimeStep[];
}

/** Depth-first visit; a compressed loop contributes its iteration template once. */
export function forEachScheduled(
  nodes: readonly ScheduledNode[],
  visit: (node: ScheduledNode) => void,
): void {
  for (const node of nodes) {
    visit(node);
    switch (node.type) {
      case 'section':
        forEachScheduled(node.children, visit);
        break;
      case 'loop':
        for (const it of node.iterations) forEachScheduled(it.children, visit);
        break;
      case 'match':
        for (const c of node.cases) forEachScheduled(c.children, visit);
        break;
      case 'operation':
        break;
    }
  }
}
