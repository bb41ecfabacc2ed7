/**
 * Output artifacts of the compiler: device programs in an abstract
 * instruction set, plus the warning record shared by all stages.
 */
import type { DeviceClass } from './constants';
import type { ResolvedPrecompensation } from './setup/resolver';

export interface CompileWarning {
  code: string;
  nodeId?: string;
  message: string;
}

// ============================================================================
// Instruction set
// ============================================================================

/**
 * Play and acquire are issued at the current sequencer clock and do not
 * advance it; only `wait` moves time forward. Loop and branch targets are
 * instruction indices inside the same real-time program.
 */
export type Instruction =
  | { op: 'wait'; samples: number }
  | {
      op: 'play';
      signal: string;
      port: number;
      waveform: number;
      /** Command-table entry: fixed, or selected per iteration of `loop` */
      commandTable?: number | { loop: string; entries: number[] };
    }
  | {
      op: 'acquire';
      signal: string;
      port: number;
      handle: string;
      samples: number;
      kernel?: number;
    }
  | { op: 'loop'; loop: string; count: number }
  | { op: 'endLoop'; loop: string; target: number }
  | { op: 'sync'; mode: 'emit' | 'await'; marker: number }
  | {
      op: 'branch';
      handle: string;
      source: 'local' | 'global';
      marker?: number;
      /** Jump target per discriminated state, indexed by state */
      targets: number[];
    }
  | { op: 'jump'; target: number }
  | {
      op: 'setOscillatorFrequency';
      oscillator: number;
      /** Fixed, or selected per iteration of `loop` */
      frequency: number | { loop: string; values: number[] };
    }
  | { op: 'resetOscillatorPhase' }
  | { op: 'setTrigger'; port: number; value: number }
  | { op: 'relay'; marker: number; from: string; to: string[] }
  | { op: 'end' };

export type InstructionOp = Instruction['op'];

// ============================================================================
// Device program
// ============================================================================

export interface WaveformEntry {
  index: number;
  name: string;
  pulse: string;
  role: 'playback' | 'kernel';
  lengthSamples: number;
  samples: { re: number[]; im: number[] };
}

export interface CommandTableEntry {
  index: number;
  waveform: number;
  amplitude: number;
  phase: number;
  oscillator?: number;
  setOscillatorPhase?: number;
  incrementOscillatorPhase?: number;
}

export interface RealtimeProgram {
  id: number;
  instructions: Instruction[];
}

/** Value the host writes to an instrument node before a near-time step runs */
export interface NodeSetting {
  path: string;
  value: number;
}

export interface NearTimeStepRef {
  indices: number[];
  program: number;
  nodeSettings: NodeSetting[];
}

export interface ChannelSettings {
  signal: string;
  line: string;
  port: number;
  direction: 'out' | 'in';
  portDelay: number;
  range?: number;
  localOscillatorFrequency?: number | { parameter: string };
  oscillator?: {
    uid: string;
    modulation: 'hardware' | 'software';
    index?: number;
    frequency: number | { parameter: string };
  };
  thresholds?: number[];
  precompensation?: ResolvedPrecompensation;
}

export interface DeviceProgram {
  device: string;
  deviceClass: DeviceClass;
  samplingRate: number;
  waveforms: WaveformEntry[];
  commandTable: CommandTableEntry[];
  programs: RealtimeProgram[];
  nearTimeSteps: NearTimeStepRef[];
  channels: ChannelSettings[];
  handles: string[];
}
