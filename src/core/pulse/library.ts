/**
 * Pulse library: semantic pulse requests → immutable pulse descriptors,
 * and descriptor → sampled complex envelope.
 *
 * Functional pulses are evaluated on x ∈ [-1, 1] across their length.
 * A pulse uid not supplied by the caller is derived from the content hash,
 * so identical requests always deduplicate to the same waveform.
 */
import { contentHash } from '../canonical';
import { StructureError } from '../errors';

export const PulseFunction = {
  CONST: 'const',
  GAUSSIAN: 'gaussian',
  DRAG: 'drag',
  GAUSSIAN_SQUARE: 'gaussian_square',
  SAMPLED: 'sampled',
} as const;
export type PulseFunction = typeof PulseFunction[keyof typeof PulseFunction];

export interface PulseDescriptor {
  readonly uid: string;
  readonly fn: PulseFunction;
  /** Length in seconds; absent for sampled pulses, whose length is their sample count */
  readonly length?: number;
  readonly amplitude: number;
  readonly params: Readonly<Record<string, number>>;
  readonly samples?: { readonly re: readonly number[]; readonly im: readonly number[] };
}

export interface ComplexSamples {
  re: Float64Array;
  im: Float64Array;
}

function makePulse(fields: Omit<PulseDescriptor, 'uid'>, uid?: string): PulseDescriptor {
  if (fields.length !== undefined && !(fields.length > 0)) {
    throw new StructureError(`Pulse length must be positive, got ${fields.length}`, { nodeId: uid });
  }
  const id = uid ?? `${fields.fn}_${contentHash(fields).slice(0, 10)}`;
  return Object.freeze({ uid: id, ...fields, params: Object.freeze({ ...fields.params }) });
}

export function constPulse(opts: { uid?: string; length: number; amplitude?: number }): PulseDescriptor {
  return makePulse({ fn: PulseFunction.CONST, length: opts.length, amplitude: opts.amplitude ?? 1, params: {} }, opts.uid);
}

export function gaussianPulse(opts: { uid?: string; length: number; amplitude?: number; sigma?: number }): PulseDescriptor {
  return makePulse({
    fn: PulseFunction.GAUSSIAN,
    length: opts.length,
    amplitude: opts.amplitude ?? 1,
    params: { sigma: opts.sigma ?? 1 / 3 },
  }, opts.uid);
}

/** Gaussian with a derivative quadrature component scaled by beta. */
export function dragPulse(opts: { uid?: string; length: number; amplitude?: number; sigma?: number; beta?: number }): PulseDescriptor {
  return makePulse({
    fn: PulseFunction.DRAG,
    length: opts.length,
    amplitude: opts.amplitude ?? 1,
    params: { sigma: opts.sigma ?? 1 / 3, beta: opts.beta ?? 0.2 },
  }, opts.uid);
}

/** Flat top of `width` seconds with gaussian rise and fall. */
export function gaussianSquarePulse(opts: {
  uid?: string;
  length: number;
  width?: number;
  amplitude?: number;
  sigma?: number;
}): PulseDescriptor {
  const width = opts.width ?? opts.length * 0.9;
  if (width < 0 || width > opts.length) {
    throw new StructureError(`gaussian_square width ${width} must lie within the pulse length ${opts.length}`, { nodeId: opts.uid });
  }
  return makePulse({
    fn: PulseFunction.GAUSSIAN_SQUARE,
    length: opts.length,
    amplitude: opts.amplitude ?? 1,
    params: { sigma: opts.sigma ?? 1 / 3, width },
  }, opts.uid);
}

/** Arbitrary samples; imaginary part defaults to zero. */
export function sampledPulse(opts: { uid?: string; re: readonly number[]; im?: readonly number[]; amplitude?: number }): PulseDescriptor {
  if (opts.re.length === 0) {
    throw new StructureError('Sampled pulse needs at least one sample', { nodeId: opts.uid });
  }
  const im = opts.im ?? new Array<number>(opts.re.length).fill(0);
  if (im.length !== opts.re.length) {
    throw new StructureError(
      `Sampled pulse has ${opts.re.length} real and ${im.length} imaginary samples`,
      { nodeId: opts.uid },
    );
  }
  return makePulse({
    fn: PulseFunction.SAMPLED,
    amplitude: opts.amplitude ?? 1,
    params: {},
    samples: Object.freeze({ re: Object.freeze([...opts.re]), im: Object.freeze([...im]) }),
  }, opts.uid);
}

/** Number of samples the pulse itself spans at the given rate. */
export function pulseLengthSamples(pulse: PulseDescriptor, samplingRate: number): number {
  if (pulse.samples) return pulse.samples.re.length;
  return Math.max(1, Math.round((pulse.length ?? 0) * samplingRate));
}

function gaussianAt(x: number, sigma: number): number {
  return Math.exp(-(x * x) / (2 * sigma * sigma));
}

function envelopeAt(pulse: PulseDescriptor, k: number, n: number): [number, number] {
  const x = n === 1 ? 0 : -1 + (2 * k) / (n - 1);
  const sigma = pulse.params.sigma ?? 1 / 3;
  switch (pulse.fn) {
    case PulseFunction.CONST:
      return [1, 0];
    case PulseFunction.GAUSSIAN:
      return [gaussianAt(x, sigma), 0];
    case PulseFunction.DRAG: {
      const g = gaussianAt(x, sigma);
      const beta = pulse.params.beta ?? 0;
      return [g, beta * (-x / (sigma * sigma)) * g];
    }
    case PulseFunction.GAUSSIAN_SQUARE: {
      const length = pulse.length ?? 0;
      const flat = Math.round((n * (pulse.params.width ?? 0)) / length);
      const edge = (n - flat) / 2;
      if (edge <= 0 || (k >= edge && k < n - edge)) return [1, 0];
      const u = k < edge ? (k - edge) / edge : (k - (n - edge - 1)) / edge;
      return [gaussianAt(u, sigma), 0];
    }
    case PulseFunction.SAMPLED: {
      const samples = pulse.samples;
      return samples ? [samples.re[k] ?? 0, samples.im[k] ?? 0] : [0, 0];
    }
  }
}

export interface SampleOptions {
  samplingRate: number;
  /** Output length; the pulse is zero-padded or truncated to it */
  lengthSamples?: number;
  /** Multiplies the descriptor's own amplitude */
  amplitude?: number;
  /** Phase rotation in radians */
  phase?: number;
  /** Software oscillator frequency in Hz, referenced to the first sample */
  modulationFrequency?: number;
}

/**
 * Sample the complex envelope of a pulse:
 *   s[k] = A · env(k) · e^{i(φ + 2π f k / rate)}
 */
export function sampleEnvelope(pulse: PulseDescriptor, opts: SampleOptions): ComplexSamples {
  const n = pulseLengthSamples(pulse, opts.samplingRate);
  const total = opts.lengthSamples ?? n;
  const re = new Float64Array(total);
  const im = new Float64Array(total);
  const amp = pulse.amplitude * (opts.amplitude ?? 1);
  const phase = opts.phase ?? 0;
  const omega = (2 * Math.PI * (opts.modulationFrequency ?? 0)) / opts.samplingRate;
  const count = Math.min(n, total);
  for (let k = 0; k < count; k++) {
    const [er, ei] = envelopeAt(pulse, k, n);
    const angle = phase + omega * k;
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    re[k] = amp * (er * c - ei * s);
    im[k] = amp * (er * s + ei * c);
  }
  return { re, im };
}
