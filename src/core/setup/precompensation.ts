/**
 * Precompensation timing.
 *
 * Every enabled output filter holds its port back by a fixed number of
 * samples. Signals driven by one sequencer are padded to the same filter set
 * (zero-effect filters) so they share that delay; every signal is then
 * delayed by the difference to the slowest output, rounded up to the system
 * grid, so that all outputs line up again. The compensation splits into a
 * sequencer delay (whole playback granules) and a port delay (the rest).
 */
import { StructureError } from '../errors';
import type { CompileWarning } from '../types';
import { ceilToGrid } from '../scheduler/grid';
import type { Precompensation } from './topology';

/** Filter latency in samples */
export const FILTER_DELAY_SAMPLES = {
  base: 72,
  exponential: 88,
  highPass: 96,
  bounce: 32,
  fir: 136,
} as const;

const ZERO_EXPONENTIAL = { timeconstant: 10e-9, amplitude: 0 };
const ZERO_BOUNCE = { delay: 10e-9, amplitude: 0 };
const IDENTITY_FIR = [1];

export function hasFilters(p: Precompensation | undefined): p is Precompensation {
  return p !== undefined && ((p.exponential?.length ?? 0) > 0 || !!p.highPass || !!p.bounce || !!p.fir);
}

export function precompensationDelaySamples(p: Precompensation | undefined): number {
  if (!hasFilters(p)) return 0;
  let delay = FILTER_DELAY_SAMPLES.base + FILTER_DELAY_SAMPLES.exponential * (p.exponential?.length ?? 0);
  if (p.highPass) delay += FILTER_DELAY_SAMPLES.highPass;
  if (p.bounce) delay += FILTER_DELAY_SAMPLES.bounce;
  if (p.fir) delay += FILTER_DELAY_SAMPLES.fir;
  return delay;
}

// ---- Sequencer groups ----

export interface SequencerSignal {
  signal: string;
  filters?: Precompensation;
}

/**
 * Filters of the signals of one sequencer, padded so that every signal has
 * the union of the enabled filters. All of them must agree on the high-pass.
 */
export function adaptSequencerFilters(group: readonly SequencerSignal[]): Map<string, Precompensation | undefined> {
  const adapted = new Map<string, Precompensation | undefined>(group.map(s => [s.signal, s.filters]));
  if (group.length < 2) return adapted;

  const highPass = !!group[0].filters?.highPass;
  let exponentials = 0;
  let bounce = false;
  let fir = false;
  for (const { signal, filters } of group) {
    if (!!filters?.highPass !== highPass) {
      throw new StructureError(
        `Signals of one sequencer must all enable or all disable the high-pass filter; see '${signal}'`,
        { nodeId: signal },
      );
    }
    exponentials = Math.max(exponentials, filters?.exponential?.length ?? 0);
    bounce ||= !!filters?.bounce;
    fir ||= !!filters?.fir;
  }
  if (exponentials === 0 && !bounce && !fir) return adapted;

  for (const { signal, filters } of group) {
    const exponential = [...(filters?.exponential ?? [])];
    while (exponential.length < exponentials) exponential.push({ ...ZERO_EXPONENTIAL });
    adapted.set(signal, {
      ...filters,
      exponential: exponential.length > 0 ? exponential : undefined,
      bounce: filters?.bounce ?? (bounce ? { ...ZERO_BOUNCE } : undefined),
      fir: filters?.fir ?? (fir ? { coefficients: [...IDENTITY_FIR] } : undefined),
    });
  }
  return adapted;
}

// ---- Delay balancing ----

export interface SignalTiming {
  signal: string;
  tinyPerSample: number;
  sampleMultiple: number;
  delaySamples: number;
}

/** Tiny samples */
export interface DelayCompensation {
  signalDelay: number;
  portDelay: number;
}

export function balanceDelays(timings: readonly SignalTiming[], systemGrid: number): Map<string, DelayCompensation> {
  const slowest = Math.max(0, ...timings.map(t => t.delaySamples * t.tinyPerSample));
  const target = ceilToGrid(slowest, systemGrid);
  const result = new Map<string, DelayCompensation>();
  for (const t of timings) {
    const samples = target / t.tinyPerSample - t.delaySamples;
    const granules = Math.floor(samples / t.sampleMultiple);
    result.set(t.signal, {
      signalDelay: granules * t.sampleMultiple * t.tinyPerSample,
      portDelay: (samples - granules * t.sampleMultiple) * t.tinyPerSample,
    });
  }
  return result;
}

// ---- Ranges ----

/** Values the instrument clamps; compilation goes on with a warning. */
export function checkFilterRanges(signal: string, p: Precompensation): CompileWarning[] {
  const out: string[] = [];
  const hp = p.highPass?.timeconstant;
  if (hp !== undefined && (hp < 208e-12 || hp > 166e-3)) {
    out.push('high-pass timeconstant will be clamped to [208 ps, 166 ms]');
  }
  if (p.bounce && p.bounce.delay > 103.3e-9) out.push('bounce delay will be clamped to 103.3 ns');
  if (p.bounce && Math.abs(p.bounce.amplitude) > 1) out.push('bounce amplitude will be clamped to +/- 1');
  if (p.fir?.coefficients.some(c => Math.abs(c) > 4)) out.push('FIR coefficients will be clamped to +/- 4');
  return out.map(message => ({
    code: 'precompensation_clamped',
    nodeId: signal,
    message: `Precompensation of '${signal}': ${message}`,
  }));
}
