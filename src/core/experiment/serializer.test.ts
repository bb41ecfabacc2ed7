import { describe, it, expect } from 'vitest';
import { contentHash } from '../canonical';
import { dragPulse, sampledPulse, constPulse } from '../pulse/library';
import { ExperimentBuilder } from './builder';
import { AcquisitionType, ModulationType, SectionAlignment } from './ir';
import type { Experiment } from './ir';
import { linearSweepParameter, sweepParameter } from './parameter';
import { experimentToJson, parseExperiment } from './serializer';
import type { NodeJson } from './serializer';

// ---- Helpers ----

function declared(): Experiment {
  const lo = sweepParameter({ uid: 'lo', values: [6e9, 6.1e9] });
  const amp = linearSweepParameter({ uid: 'amp', start: 0.1, stop: 0.5, count: 3, axisName: 'amplitude' });
  const x90 = dragPulse({ uid: 'x90', length: 40e-9, beta: 0.1 });
  const flat = sampledPulse({ uid: 'flat', re: [0.5, 0.5, 0.5, 0.5], im: [0, 0.1, 0.1, 0] });
  const readout = constPulse({ uid: 'readout', length: 400e-9 });

  return new ExperimentBuilder({ uid: 'exp', signals: ['drive', 'measure', 'acquire'] })
    .sweep({ uid: 'nt', parameters: lo }, nt => nt
      .acquireLoopRt({ uid: 'rt', count: 8, acquisitionType: AcquisitionType.DISCRIMINATION }, rt => rt
        .sweep({ uid: 'amps', parameters: amp }, s => s
          .section({ uid: 'x', alignment: SectionAlignment.RIGHT, trigger: { drive: { state: 1 } } }, x => x
            .play('drive', x90, { amplitude: amp, incrementOscillatorPhase: 0.5 }))
          .section({ uid: 'ro', playAfter: 'x' }, x => x
            .measure({ measureSignal: 'measure', measurePulse: readout, acquireSignal: 'acquire', handle: 'q0', resetDelay: 1e-6 })))
        .match({ uid: 'm', handle: 'q0', local: true, feedbackDelay: 500e-9 }, m => m
          .case(1, c => c.play('drive', flat).delay('drive', 20e-9), { uid: 'm1' }))))
    .setCalibration('measure', { localOscillatorFrequency: lo })
    .setCalibration('drive', {
      oscillator: { uid: 'drive_osc', frequency: 100e6, modulation: ModulationType.HARDWARE },
      threshold: [0.2, 0.4],
    })
    .build();
}

function childrenOf(node: NodeJson | undefined): NodeJson[] {
  return node && 'children' in node ? node.children : [];
}

function firstChild(node: NodeJson | undefined): NodeJson | undefined {
  return childrenOf(node)[0];
}

// ---- Tests ----

describe('experimentToJson / parseExperiment', () => {
  it('turns a declared experiment into JSON and back into an equal experiment', () => {
    const experiment = declared();
    const json = experimentToJson(experiment);
    const { experiment: parsed, errors } = parseExperiment(JSON.parse(JSON.stringify(json)));
    expect(errors).toEqual([]);
    expect(parsed && contentHash(parsed)).toBe(contentHash(experiment));
    expect(parsed && experimentToJson(parsed)).toEqual(json);
  });

  it('stores pulses and parameters by uid', () => {
    const json = experimentToJson(declared());
    expect(Object.keys(json.pulses)).toEqual(['x90', 'readout', 'flat']);
    expect(json.pulses.flat).toEqual({ fn: 'sampled', amplitude: 1, params: {}, samples: { re: [0.5, 0.5, 0.5, 0.5], im: [0, 0.1, 0.1, 0] } });
    expect(json.parameters.lo).toEqual({ values: [6e9, 6.1e9], axisName: 'lo' });

    expect(json.root[0].kind).toBe('sweep');
    // nt → rt → amps → x
    const x = firstChild(firstChild(firstChild(json.root[0])));
    expect(childrenOf(x)).toEqual([{
      kind: 'play',
      signal: 'drive',
      pulse: 'x90',
      amplitude: { kind: 'parameter', uid: 'amp' },
      incrementOscillatorPhase: 0.5,
    }]);
  });

  it('expands a linear parameter', () => {
    const { experiment, errors } = parseExperiment({
      uid: 'lin',
      signals: ['drive'],
      pulses: { p: { fn: 'const', length: 1e-7 } },
      parameters: { t: { start: 0, stop: 1, count: 3 } },
      root: [{
        kind: 'acquire_loop_rt', count: 1, children: [
          { kind: 'sweep', uid: 'sw', parameters: ['t'], children: [{ kind: 'play', signal: 'drive', pulse: 'p', amplitude: { kind: 'parameter', uid: 't' } }] },
        ],
      }],
    });
    expect(errors).toEqual([]);
    expect(experiment?.parameters.get('t')?.values).toEqual([0, 0.5, 1]);
    expect(experiment?.pulses.get('p')?.amplitude).toBe(1);
  });

  it('reports schema violations with their path', () => {
    const { experiment, errors } = parseExperiment({ uid: 'bad', signals: [], root: [{ kind: 'wait' }] });
    expect(experiment).toBeUndefined();
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toMatch(/^Invalid experiment: root\.0\.kind: Invalid discriminator value/);
  });

  it('runs the builder checks on the replayed declaration', () => {
    const { errors } = parseExperiment({
      uid: 'outside',
      signals: ['drive'],
      pulses: { p: { fn: 'const', length: 1e-7 } },
      root: [{ kind: 'play', signal: 'drive', pulse: 'p' }],
    });
    expect(errors.map(e => [e.code, e.message])).toEqual([
      ['structure', "Operation 'root/0' must be inside the real-time acquisition loop"],
    ]);
  });

  it('rejects references to unknown pulses', () => {
    const { errors } = parseExperiment({
      uid: 'missing',
      signals: ['drive'],
      root: [{ kind: 'acquire_loop_rt', count: 1, children: [{ kind: 'play', signal: 'drive', pulse: 'nope' }] }],
    });
    expect(errors.map(e => e.message)).toEqual(["Unknown pulse 'nope'"]);
  });

  it('needs samples for a sampled pulse', () => {
    const { errors } = parseExperiment({ uid: 's', signals: [], pulses: { s: { fn: 'sampled' } }, root: [] });
    expect(errors.map(e => e.message)).toEqual(["Sampled pulse 's' has no samples"]);
  });
});
