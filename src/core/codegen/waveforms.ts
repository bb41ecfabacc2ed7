/**
 * Per-device waveform and command tables.
 *
 * A waveform is identified by everything that changes its samples: pulse,
 * length override, padded length, amplitude, quantized phase, software
 * modulation frequency and role. Equal requests share one table entry.
 */
import { stableStringify } from '../canonical';
import { sampleEnvelope } from '../pulse/library';
import type { PulseDescriptor } from '../pulse/library';
import type { CommandTableEntry, WaveformEntry } from '../types';

export interface WaveformRequest {
  pulse: PulseDescriptor;
  role: WaveformEntry['role'];
  /** Padded length in device samples */
  lengthSamples: number;
  amplitude: number;
  /** Radians */
  phase: number;
  /** Software oscillator frequency in Hz; 0 for baseband */
  modulationFrequency: number;
}

/** Round a phase to the nearest multiple of 2π / 2^bits inside [0, 2π). */
export function quantizePhase(phase: number, bits: number): number {
  const steps = 2 ** bits;
  const step = (2 * Math.PI) / steps;
  const q = ((Math.round(phase / step) % steps) + steps) % steps;
  return q * step;
}

export class WaveformTable {
  private readonly entries: WaveformEntry[] = [];
  private readonly bySignature = new Map<string, number>();

  constructor(private readonly samplingRate: number, private readonly phaseBits: number) {}

  add(request: WaveformRequest): number {
    const phase = quantizePhase(request.phase, this.phaseBits);
    const signature = stableStringify({ ...request, phase });
    const existing = this.bySignature.get(signature);
    if (existing !== undefined) return existing;

    const samples = sampleEnvelope(request.pulse, {
      samplingRate: this.samplingRate,
      lengthSamples: request.lengthSamples,
      amplitude: request.amplitude,
      phase,
      modulationFrequency: request.modulationFrequency,
    });
    const index = this.entries.length;
    this.entries.push({
      index,
      name: `w${index}_${request.pulse.uid}`,
      pulse: request.pulse.uid,
      role: request.role,
      lengthSamples: request.lengthSamples,
      samples: { re: Array.from(samples.re), im: Array.from(samples.im) },
    });
    this.bySignature.set(signature, index);
    return index;
  }

  list(): WaveformEntry[] {
    return [...this.entries];
  }
}

export class CommandTable {
  private readonly entries: CommandTableEntry[] = [];
  private readonly bySignature = new Map<string, number>();

  constructor(private readonly phaseBits: number) {}

  add(entry: Omit<CommandTableEntry, 'index'>): number {
    const normalized: Omit<CommandTableEntry, 'index'> = {
      ...entry,
      phase: quantizePhase(entry.phase, this.phaseBits),
      setOscillatorPhase: entry.setOscillatorPhase === undefined
        ? undefined
        : quantizePhase(entry.setOscillatorPhase, this.phaseBits),
    };
    const signature = stableStringify(normalized);
    const existing = this.bySignature.get(signature);
    if (existing !== undefined) return existing;
    const index = this.entries.length;
    this.entries.push({ index, ...normalized });
    this.bySignature.set(signature, index);
    return index;
  }

  list(): CommandTableEntry[] {
    return [...this.entries];
  }
}
