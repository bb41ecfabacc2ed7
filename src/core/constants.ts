/**
 * Time base and device-class capability table.
 *
 * All absolute times inside the compiler are integer "tiny samples".
 * One tiny sample is 1/3.6 THz; every supported sampling rate divides
 * TINYSAMPLES_PER_SECOND exactly, so a single integer clock is the finest
 * grid shared by all instruments.
 */

export const TINYSAMPLES_PER_SECOND = 3_600_000_000_000;

export const DeviceClass = {
  HDAWG: 'HDAWG',
  SHFSG: 'SHFSG',
  SHFQA: 'SHFQA',
  SHFQC: 'SHFQC',
  UHFQA: 'UHFQA',
  PQSC: 'PQSC',
} as const;
export type DeviceClass = typeof DeviceClass[keyof typeof DeviceClass];

export interface DeviceCapabilities {
  /** Output/input sampling rate in Hz */
  samplingRate: number;
  /** Playback granularity: every waveform and wait is a multiple of this many samples */
  sampleMultiple: number;
  /** Shortest waveform the sequencer can play, in samples */
  minWaveformLength: number;
  /** Longest waveform that fits in waveform memory, in samples */
  maxWaveformLength: number;
  /** Number of digital (hardware) oscillators */
  hardwareOscillators: number;
  output: boolean;
  acquisition: boolean;
  /** Indexed playback modifiers (amplitude/phase) without re-uploading samples */
  commandTable: boolean;
  /** Sweep amplitude, phase or oscillator frequency inside a real-time loop */
  realtimeParameterSweep: boolean;
  /** Hardware loop instructions; without them every loop is unrolled */
  nativeLoops: boolean;
  /** Can take part in real-time feedback (publish or branch on a discriminated state) */
  feedback: boolean;
  /** Distributes start triggers and feedback markers between devices */
  syncHub: boolean;
  /** Output ports driven by one sequencer; they share precompensation timing */
  channelsPerAwg: number;
}

const NO_CHANNELS: DeviceCapabilities = {
  samplingRate: 2.0e9,
  sampleMultiple: 16,
  minWaveformLength: 0,
  maxWaveformLength: 0,
  hardwareOscillators: 0,
  output: false,
  acquisition: false,
  commandTable: false,
  realtimeParameterSweep: false,
  nativeLoops: false,
  feedback: true,
  syncHub: true,
  channelsPerAwg: 1,
};

export const DEVICE_CAPABILITIES: Readonly<Record<DeviceClass, Readonly<DeviceCapabilities>>> = {
  HDAWG: {
    samplingRate: 2.4e9,
    sampleMultiple: 16,
    minWaveformLength: 32,
    maxWaveformLength: 64 * 1024 * 1024,
    hardwareOscillators: 16,
    output: true,
    acquisition: false,
    commandTable: true,
    realtimeParameterSweep: true,
    nativeLoops: true,
    feedback: true,
    syncHub: false,
    channelsPerAwg: 2,
  },
  SHFSG: {
    samplingRate: 2.0e9,
    sampleMultiple: 16,
    minWaveformLength: 32,
    maxWaveformLength: 98_304,
    hardwareOscillators: 8,
    output: true,
    acquisition: false,
    commandTable: true,
    realtimeParameterSweep: true,
    nativeLoops: true,
    feedback: true,
    syncHub: false,
    channelsPerAwg: 1,
  },
  SHFQA: {
    samplingRate: 2.0e9,
    sampleMultiple: 16,
    minWaveformLength: 32,
    maxWaveformLength: 4096,
    hardwareOscillators: 1,
    output: true,
    acquisition: true,
    commandTable: false,
    // oscillator frequency only (spectroscopy sweeps)
    realtimeParameterSweep: true,
    nativeLoops: true,
    feedback: true,
    syncHub: false,
    channelsPerAwg: 1,
  },
  SHFQC: {
    samplingRate: 2.0e9,
    sampleMultiple: 16,
    minWaveformLength: 32,
    maxWaveformLength: 98_304,
    hardwareOscillators: 8,
    output: true,
    acquisition: true,
    commandTable: true,
    realtimeParameterSweep: true,
    nativeLoops: true,
    feedback: true,
    syncHub: false,
    channelsPerAwg: 1,
  },
  UHFQA: {
    samplingRate: 1.8e9,
    sampleMultiple: 8,
    minWaveformLength: 16,
    maxWaveformLength: 4096,
    hardwareOscillators: 0,
    output: true,
    acquisition: true,
    commandTable: false,
    realtimeParameterSweep: false,
    nativeLoops: true,
    feedback: true,
    syncHub: false,
    channelsPerAwg: 2,
  },
  PQSC: NO_CHANNELS,
};

export function secondsToTiny(seconds: number): number {
  return Math.round(seconds * TINYSAMPLES_PER_SECOND);
}

export function tinyToSeconds(tiny: number): number {
  return tiny / TINYSAMPLES_PER_SECOND;
}

/**
 * Tiny samples per device sample. Returns undefined when the sampling rate
 * does not divide the tiny-sample clock.
 */
export function tinyPerSample(samplingRate: number): number | undefined {
  const ratio = TINYSAMPLES_PER_SECOND / samplingRate;
  const rounded = Math.round(ratio);
  return Math.abs(ratio - rounded) < 1e-9 ? rounded : undefined;
}

// Feedback path constants (seconds), overridable through CompilerSettings
export const DEFAULT_FEEDBACK_LATENCY_LOCAL = 200e-9;
export const DEFAULT_FEEDBACK_LATENCY_GLOBAL = 400e-9;

/** Marker id of the shared start trigger */
export const START_MARKER = 0;
