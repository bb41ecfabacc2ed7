import { describe, it, expect } from 'vitest';
import {
  adaptSequencerFilters,
  balanceDelays,
  checkFilterRanges,
  precompensationDelaySamples,
} from './precompensation';

// ---- Tests ----

describe('precompensationDelaySamples', () => {
  it('is zero without filters', () => {
    expect(precompensationDelaySamples(undefined)).toBe(0);
    expect(precompensationDelaySamples({ exponential: [] })).toBe(0);
  });

  it('adds the latency of every enabled filter to the base latency', () => {
    expect(precompensationDelaySamples({ highPass: { timeconstant: 1e-3 } })).toBe(168);
    expect(precompensationDelaySamples({
      exponential: [{ timeconstant: 1e-6, amplitude: 0.1 }, { timeconstant: 2e-6, amplitude: 0.05 }],
      highPass: { timeconstant: 1e-3 },
      bounce: { delay: 10e-9, amplitude: 0.1 },
      fir: { coefficients: [1, 0.1] },
    })).toBe(72 + 2 * 88 + 96 + 32 + 136);
  });
});

describe('adaptSequencerFilters', () => {
  it('pads every signal of a sequencer to the union of the filters', () => {
    const adapted = adaptSequencerFilters([
      { signal: 'a', filters: { exponential: [{ timeconstant: 1e-6, amplitude: 0.1 }], bounce: { delay: 5e-9, amplitude: 0.2 } } },
      { signal: 'b' },
    ]);
    expect(adapted.get('b')).toEqual({
      exponential: [{ timeconstant: 10e-9, amplitude: 0 }],
      bounce: { delay: 10e-9, amplitude: 0 },
    });
    expect(precompensationDelaySamples(adapted.get('a'))).toBe(precompensationDelaySamples(adapted.get('b')));
  });

  it('leaves a lone signal alone', () => {
    const filters = { highPass: { timeconstant: 1e-3 } };
    expect(adaptSequencerFilters([{ signal: 'a', filters }]).get('a')).toBe(filters);
  });

  it('requires one high-pass setting per sequencer', () => {
    expect(() => adaptSequencerFilters([{ signal: 'a' }, { signal: 'b', filters: { highPass: { timeconstant: 1e-3 } } }]))
      .toThrow("Signals of one sequencer must all enable or all disable the high-pass filter; see 'b'");
  });
});

describe('balanceDelays', () => {
  it('delays every signal up to the slowest one on the system grid', () => {
    // HDAWG: 1500 tiny samples per sample; SHFQA: 1800; system grid 144 000
    const delays = balanceDelays([
      { signal: 'flux', tinyPerSample: 1500, sampleMultiple: 16, delaySamples: 168 },
      { signal: 'drive', tinyPerSample: 1500, sampleMultiple: 16, delaySamples: 0 },
      { signal: 'measure', tinyPerSample: 1800, sampleMultiple: 16, delaySamples: 0 },
    ], 144_000);
    // 168 samples = 252 000 tiny, rounded up to 288 000; flux still needs 24 samples
    expect(delays.get('flux')).toEqual({ signalDelay: 24_000, portDelay: 12_000 });
    expect(delays.get('drive')).toEqual({ signalDelay: 288_000, portDelay: 0 });
    expect(delays.get('measure')).toEqual({ signalDelay: 288_000, portDelay: 0 });
  });

  it('changes nothing without filters', () => {
    const delays = balanceDelays([{ signal: 'drive', tinyPerSample: 1500, sampleMultiple: 16, delaySamples: 0 }], 24_000);
    expect(delays.get('drive')).toEqual({ signalDelay: 0, portDelay: 0 });
  });
});

describe('checkFilterRanges', () => {
  it('warns about values the instrument clamps', () => {
    const warnings = checkFilterRanges('flux', { bounce: { delay: 200e-9, amplitude: 0.5 }, fir: { coefficients: [1, 5] } });
    expect(warnings).toEqual([
      { code: 'precompensation_clamped', nodeId: 'flux', message: "Precompensation of 'flux': bounce delay will be clamped to 103.3 ns" },
      { code: 'precompensation_clamped', nodeId: 'flux', message: "Precompensation of 'flux': FIR coefficients will be clamped to +/- 4" },
    ]);
  });
});
