import { describe, it, expect } from 'vitest';
import { ExperimentBuilder } from '../experiment/builder';
import { AveragingMode } from '../experiment/ir';
import { linearSweepParameter } from '../experiment/parameter';
import { constPulse } from '../pulse/library';
import { resolveFeedback } from '../feedback/feedback';
import { resolveSignals } from '../setup/resolver';
import type { DeviceSetup } from '../setup/topology';
import { CompilerSettingsSchema, defaultSettings } from '../settings';
import { scheduleExperiment } from './scheduler';
import type { ScheduledExperiment } from './schedule';
import { buildManifest } from './manifest';

const SETUP: DeviceSetup = {
  devices: [{ uid: 'qa', deviceClass: 'SHFQA' }],
  lines: [
    { path: 'q0/measure', device: 'qa', port: 0, direction: 'out' },
    { path: 'q0/acquire', device: 'qa', port: 0, direction: 'in' },
  ],
  calibration: {},
  signalMap: { measure: 'q0/measure', acquire: 'q0/acquire' },
};

const readout = constPulse({ uid: 'readout', length: 500e-9 });
const short = constPulse({ uid: 'short', length: 100e-9 });

function schedule(declare: (b: ExperimentBuilder) => void): ScheduledExperiment {
  const b = new ExperimentBuilder({ uid: 'exp', signals: ['measure', 'acquire'] });
  declare(b);
  const { result } = resolveSignals(b.build(), SETUP);
  if (!result) throw new Error('resolution failed');
  const { schedule: s, errors } = scheduleExperiment(result, resolveFeedback(result, defaultSettings()).bindings);
  if (!s) throw new Error(errors.map(e => e.message).join('\n'));
  return s;
}

function readoutLoop(b: ExperimentBuilder): void {
  b.acquireLoopRt({ uid: 'rt', count: 4 }, rt => rt
    .section({ uid: 'play' }, x => x.play('measure', readout))
    .section({ uid: 'acq', playAfter: 'play' }, x => x.acquire('acquire', 'q0', { kernel: readout })));
}

describe('buildManifest', () => {
  it('expands a compressed averaging loop into one window per shot', () => {
    const manifest = buildManifest(schedule(readoutLoop), defaultSettings());
    expect(manifest.truncated).toBe(false);
    expect(manifest.entries).toHaveLength(8);
    expect(manifest.entries.slice(0, 3)).toEqual([
      {
        step: 0, uid: 'play/0', kind: 'play', signal: 'measure', device: 'qa', section: 'play',
        start: 0, end: 1_814_400, iterations: { 'rt/average': 0 }, state: undefined,
      },
      {
        step: 0, uid: 'acq/0', kind: 'acquire', signal: 'acquire', device: 'qa', section: 'acq',
        start: 1_814_400, end: 3_628_800, iterations: { 'rt/average': 0 }, state: undefined,
      },
      {
        step: 0, uid: 'play/0', kind: 'play', signal: 'measure', device: 'qa', section: 'play',
        start: 3_628_800, end: 5_443_200, iterations: { 'rt/average': 1 }, state: undefined,
      },
    ]);
    expect(manifest.steps).toEqual([{ index: 0, indices: [], values: {}, end: 14_515_200 }]);
  });

  it('stops at the event cap and marks the manifest truncated', () => {
    const settings = CompilerSettingsSchema.parse({ maxManifestEvents: 3 });
    const manifest = buildManifest(schedule(readoutLoop), settings);
    expect(manifest.entries).toHaveLength(3);
    expect(manifest.truncated).toBe(true);
  });

  it('lists the iteration template only when loop expansion is off', () => {
    const settings = CompilerSettingsSchema.parse({ expandLoopsInManifest: false });
    const manifest = buildManifest(schedule(readoutLoop), settings);
    expect(manifest.entries.map(e => e.uid)).toEqual(['play/0', 'acq/0']);
    expect(manifest.truncated).toBe(false);
  });

  it('runs every average of a sweep point before the next point under SEQUENTIAL averaging', () => {
    const t = linearSweepParameter({ uid: 't', start: 100e-9, stop: 300e-9, count: 3 });
    const manifest = buildManifest(schedule(b => b
      .acquireLoopRt({ uid: 'rt', count: 2, averagingMode: AveragingMode.SEQUENTIAL }, rt => rt
        .sweep({ uid: 'sw', parameters: t }, x => x.delay('measure', t).play('measure', short)))), defaultSettings());

    const delays = manifest.entries.filter(e => e.uid === 'sw/0');
    expect(delays.map(e => e.iterations.sw)).toEqual([0, 0, 1, 1, 2, 2]);
    expect(delays.map(e => e.iterations['sw/average'])).toEqual([0, 1, 0, 1, 0, 1]);
    expect(delays.map(e => e.start)).toEqual([0, 748_800, 1_497_600, 2_592_000, 3_686_400, 5_155_200]);
  });
});
