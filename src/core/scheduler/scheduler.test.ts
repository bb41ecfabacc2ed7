import { describe, it, expect } from 'vitest';
import { ExperimentBuilder } from '../experiment/builder';
import { AveragingMode, RepetitionMode, SectionAlignment } from '../experiment/ir';
import { linearSweepParameter, sweepParameter } from '../experiment/parameter';
import { constPulse, sampledPulse } from '../pulse/library';
import { resolveFeedback } from '../feedback/feedback';
import { resolveSignals } from '../setup/resolver';
import type { DeviceSetup } from '../setup/topology';
import { defaultSettings } from '../settings';
import { scheduleExperiment } from './scheduler';
import type { ScheduleResult } from './scheduler';
import type {
  ScheduledExperiment,
  ScheduledLoop,
  ScheduledMatch,
  ScheduledNode,
  ScheduledOperation,
  ScheduledSection,
} from './schedule';

// ---- Helpers ----

const QA_SETUP: DeviceSetup = {
  devices: [{ uid: 'qa', deviceClass: 'SHFQA' }],
  lines: [
    { path: 'q0/measure', device: 'qa', port: 0, direction: 'out' },
    { path: 'q0/acquire', device: 'qa', port: 0, direction: 'in' },
  ],
  calibration: {},
  signalMap: { measure: 'q0/measure', acquire: 'q0/acquire' },
};

const MIXED_SETUP: DeviceSetup = {
  devices: [
    { uid: 'awg', deviceClass: 'HDAWG' },
    { uid: 'qa', deviceClass: 'SHFQA' },
  ],
  lines: [
    { path: 'q0/drive', device: 'awg', port: 0, direction: 'out' },
    { path: 'q0/drive_ef', device: 'awg', port: 0, direction: 'out' },
    { path: 'q0/measure', device: 'qa', port: 0, direction: 'out' },
    { path: 'q0/acquire', device: 'qa', port: 0, direction: 'in' },
  ],
  calibration: {},
  signalMap: { drive: 'q0/drive', drive_ef: 'q0/drive_ef', measure: 'q0/measure', acquire: 'q0/acquire' },
};

const FEEDBACK_SETUP: DeviceSetup = {
  devices: [
    { uid: 'qa', deviceClass: 'SHFQA' },
    { uid: 'sg', deviceClass: 'SHFSG' },
    { uid: 'hub', deviceClass: 'PQSC' },
  ],
  lines: [
    { path: 'q0/measure', device: 'qa', port: 0, direction: 'out' },
    { path: 'q0/acquire', device: 'qa', port: 0, direction: 'in' },
    { path: 'q0/drive', device: 'sg', port: 0, direction: 'out' },
  ],
  calibration: { 'q0/acquire': { threshold: 0.5 } },
  signalMap: { drive: 'q0/drive', measure: 'q0/measure', acquire: 'q0/acquire' },
};

/** 500 ns at 2 GHz: 1000 samples, padded to 1008 = 1 814 400 tiny samples */
const readout = constPulse({ uid: 'readout', length: 500e-9 });
/** 100 ns at 2 GHz: 200 samples, padded to 208 = 374 400 tiny samples */
const short = constPulse({ uid: 'short', length: 100e-9 });

function run(setup: DeviceSetup, signals: string[], declare: (b: ExperimentBuilder) => void): ScheduleResult {
  const b = new ExperimentBuilder({ uid: 'exp', signals });
  declare(b);
  const { result, errors } = resolveSignals(b.build(), setup);
  if (!result) throw new Error(errors.map(e => e.message).join('\n'));
  const feedback = resolveFeedback(result, defaultSettings());
  if (feedback.errors.length > 0) throw new Error(feedback.errors.map(e => e.message).join('\n'));
  return scheduleExperiment(result, feedback.bindings);
}

function schedule(setup: DeviceSetup, signals: string[], declare: (b: ExperimentBuilder) => void): ScheduledExperiment {
  const { schedule: s, errors } = run(setup, signals, declare);
  if (!s) throw new Error(errors.map(e => e.message).join('\n'));
  return s;
}

function loop(node: ScheduledNode | undefined): ScheduledLoop {
  if (node?.type !== 'loop') throw new Error(`expected a loop, got ${node?.type}`);
  return node;
}

function section(node: ScheduledNode | undefined): ScheduledSection {
  if (node?.type !== 'section') throw new Error(`expected a section, got ${node?.type}`);
  return node;
}

function op(node: ScheduledNode | undefined): ScheduledOperation {
  if (node?.type !== 'operation') throw new Error(`expected an operation, got ${node?.type}`);
  return node;
}

function match(node: ScheduledNode | undefined): ScheduledMatch {
  if (node?.type !== 'match') throw new Error(`expected a match, got ${node?.type}`);
  return node;
}

/** Children of the iteration template of the averaging loop */
function shot(s: ScheduledExperiment, step = 0): ScheduledNode[] {
  return loop(s.steps[step].root.children[0]).iterations[0].children;
}

// ---- Tests ----

describe('scheduleExperiment: sequencing', () => {
  it('places an acquire right after the readout pulse it follows', () => {
    const s = schedule(QA_SETUP, ['measure', 'acquire'], b => b
      .acquireLoopRt({ uid: 'rt', count: 4 }, rt => rt
        .section({ uid: 'play' }, x => x.play('measure', readout))
        .section({ uid: 'acq', playAfter: 'play' }, x => x.acquire('acquire', 'q0', { kernel: readout }))));

    expect(s.systemGrid).toBe(28_800);
    const avg = loop(s.steps[0].root.children[0]);
    expect(avg.uid).toBe('rt/average');
    expect(avg.count).toBe(4);
    expect(avg.compressed).toBe(true);
    expect(avg.iterationLength).toBe(3_628_800);
    expect(avg.end).toBe(14_515_200);

    const play = op(section(shot(s)[0]).children[0]);
    const acquire = op(section(shot(s)[1]).children[0]);
    expect([play.start, play.end, play.lengthSamples]).toEqual([0, 1_814_400, 1008]);
    expect([acquire.start, acquire.end]).toEqual([1_814_400, 3_628_800]);
  });

  it('runs operations on different lines in parallel', () => {
    const s = schedule(QA_SETUP, ['measure', 'acquire'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .play('measure', readout)
        .acquire('acquire', 'q0', { kernel: readout })));
    const [play, acquire] = shot(s).map(op);
    expect(play.start).toBe(0);
    expect(acquire.start).toBe(0);
  });

  it('chains operations on one line', () => {
    const s = schedule(QA_SETUP, ['measure', 'acquire'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .play('measure', short)
        .delay('measure', 100e-9)
        .play('measure', short)));
    const [first, wait, second] = shot(s).map(op);
    expect(first.end).toBe(374_400);
    // 100 ns = 360 000, rounded up to the 28 800 grid
    expect([wait.start, wait.end]).toEqual([374_400, 748_800]);
    expect(second.start).toBe(748_800);
  });

  it('aligns sections from different devices on the system grid', () => {
    const s = schedule(MIXED_SETUP, ['drive', 'measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 'a' }, x => x.play('drive', short))
        .section({ uid: 'b', playAfter: 'a', onSystemGrid: true }, x => x.play('measure', short))));

    expect(s.systemGrid).toBe(144_000);
    const a = section(shot(s)[0]);
    const b = section(shot(s)[1]);
    // 100 ns at 2.4 GHz: 240 samples of 1500 tiny samples
    expect([a.start, a.end]).toEqual([0, 360_000]);
    expect(b.grid).toBe(144_000);
    expect([b.start, b.end]).toEqual([432_000, 864_000]);
    expect(op(b.children[0]).end).toBe(806_400);
  });
});

describe('scheduleExperiment: alignment and grid', () => {
  it('packs a RIGHT-aligned section against its end', () => {
    const s = schedule(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 'r', alignment: SectionAlignment.RIGHT, length: 400e-9 }, x => x.play('measure', short))));
    const r = section(shot(s)[0]);
    const play = op(r.children[0]);
    expect([r.start, r.end]).toEqual([0, 1_440_000]);
    expect([play.start, play.end]).toEqual([1_065_600, 1_440_000]);
  });

  it('packs a LEFT-aligned section against its start', () => {
    const s = schedule(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 'l', length: 400e-9 }, x => x.play('measure', short))));
    const l = section(shot(s)[0]);
    expect(op(l.children[0]).start).toBe(l.start);
    expect(l.end).toBe(1_440_000);
  });

  it('ends the last child of a RIGHT section at the section end without an explicit length', () => {
    const s = schedule(QA_SETUP, ['measure', 'acquire'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 'r', alignment: SectionAlignment.RIGHT }, x => x
          .play('measure', readout)
          .acquire('acquire', 'q0', { kernel: short }))));
    const r = section(shot(s)[0]);
    const [play, acquire] = r.children.map(op);
    expect(r.end).toBe(1_814_400);
    expect(play.end).toBe(r.end);
    expect([acquire.start, acquire.end]).toEqual([1_440_000, 1_814_400]);
  });

  it('rejects an explicit length off the grid', () => {
    const { schedule: s, errors } = run(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 's', length: 100e-9 }, x => x.play('measure', short))));
    expect(s).toBeUndefined();
    expect(errors).toHaveLength(1);
    expect(errors[0].code).toBe('grid_violation');
    expect(errors[0].nodeId).toBe('s');
    expect(errors[0].window).toEqual({ start: 0, end: 360_000 });
    expect(errors[0].message).toBe("Length of 's' (360000 tiny samples) is not a multiple of its grid (28800)");
  });

  it('rejects content longer than the explicit length', () => {
    const { errors } = run(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 's', length: 96e-9 }, x => x.play('measure', short))));
    expect(errors[0].code).toBe('scheduling_conflict');
    expect(errors[0].message).toBe("Content of 's' needs 374400 tiny samples but its length is 345600");
  });

  it('pads a short waveform to the device minimum with a warning', () => {
    const tiny = sampledPulse({ uid: 'tiny', re: [1, 1, 1, 1, 1, 1, 1, 1, 1, 1] });
    const { schedule: s, warnings } = run(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt.play('measure', tiny)));
    expect(s && op(shot(s)[0]).lengthSamples).toBe(32);
    expect(warnings).toEqual([{
      code: 'waveform_padded',
      nodeId: 'rt/0',
      message: "Waveform of 'rt/0' padded from 10 to 32 samples on 'qa'",
    }]);
  });
});

describe('scheduleExperiment: channel overlap', () => {
  it('reports two lines of one port playing at once', () => {
    const { schedule: s, errors } = run(MIXED_SETUP, ['drive', 'drive_ef'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .play('drive', short)
        .play('drive_ef', short)));
    expect(s).toBeUndefined();
    expect(errors[0].code).toBe('scheduling_conflict');
    expect(errors[0].message).toBe("'rt/0' and 'rt/1' overlap on channel awg/out0");
    expect(errors[0].window).toEqual({ start: 0, end: 360_000 });
  });

  it('accepts the same lines when sequenced', () => {
    const { errors } = run(MIXED_SETUP, ['drive', 'drive_ef'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .section({ uid: 'a' }, x => x.play('drive', short))
        .section({ uid: 'b', playAfter: 'a' }, x => x.play('drive_ef', short))));
    expect(errors).toEqual([]);
  });
});

describe('scheduleExperiment: loops', () => {
  it('compresses a real-time sweep that only changes amplitude', () => {
    const amp = linearSweepParameter({ uid: 'amp', start: 0.1, stop: 0.5, count: 5 });
    const s = schedule(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 3 }, rt => rt
        .sweep({ uid: 'sw', parameters: amp }, x => x.play('measure', short, { amplitude: amp }))));

    const avg = loop(s.steps[0].root.children[0]);
    const sweep = loop(avg.iterations[0].children[0]);
    expect(sweep.compressed).toBe(true);
    expect(sweep.iterations).toHaveLength(1);
    expect(sweep.iterationLength).toBe(374_400);
    expect(sweep.end).toBe(1_872_000);
    expect(avg.iterationLength).toBe(1_872_000);
    expect(op(sweep.iterations[0].children[0]).amplitude).toEqual({ kind: 'parameter', uid: 'amp' });
  });

  it('unrolls a real-time sweep that changes timing', () => {
    const t = linearSweepParameter({ uid: 't', start: 100e-9, stop: 300e-9, count: 3 });
    const s = schedule(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
        .sweep({ uid: 'sw', parameters: t }, x => x.delay('measure', t).play('measure', short))));

    const sweep = loop(shot(s)[0]);
    expect(sweep.compressed).toBe(false);
    expect(sweep.iterations.map(it => op(it.children[0]).end - op(it.children[0]).start))
      .toEqual([374_400, 720_000, 1_094_400]);
  });

  it('moves the averaging loop inside the sweep for SEQUENTIAL averaging', () => {
    const t = linearSweepParameter({ uid: 't', start: 100e-9, stop: 300e-9, count: 3 });
    const s = schedule(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 2, averagingMode: AveragingMode.SEQUENTIAL }, rt => rt
        .sweep({ uid: 'sw', parameters: t }, x => x.delay('measure', t).play('measure', short))));

    const sweep = loop(s.steps[0].root.children[0]);
    expect(sweep.uid).toBe('sw');
    expect(sweep.iterations).toHaveLength(3);
    const first = loop(sweep.iterations[0].children[0]);
    expect(first.uid).toBe('sw/average');
    expect(first.count).toBe(2);
    expect(first.iterationLength).toBe(748_800);
    expect(sweep.iterations[1].start).toBe(1_497_600);
  });

  it('rejects a play outside the innermost sweep under SEQUENTIAL averaging', () => {
    const t = linearSweepParameter({ uid: 't', start: 100e-9, stop: 300e-9, count: 3 });
    const { schedule: s, errors } = run(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 3, averagingMode: AveragingMode.SEQUENTIAL }, rt => rt
        .section({ uid: 'prep' }, x => x.play('measure', short))
        .sweep({ uid: 'sw', parameters: t }, x => x.delay('measure', t).play('measure', short))));
    expect(s).toBeUndefined();
    expect(errors.map(e => [e.code, e.nodeId, e.message])).toEqual([[
      'unsupported_construct',
      'prep/0',
      "'prep/0' lies outside every innermost sweep of 'rt'; sequential averaging would run it once instead of 3 times",
    ]]);
  });

  it('accepts content outside the sweep under CYCLIC averaging', () => {
    const t = linearSweepParameter({ uid: 't', start: 100e-9, stop: 300e-9, count: 3 });
    const { errors } = run(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({ uid: 'rt', count: 3 }, rt => rt
        .section({ uid: 'prep' }, x => x.play('measure', short))
        .sweep({ uid: 'sw', parameters: t }, x => x.delay('measure', t).play('measure', short))));
    expect(errors).toEqual([]);
  });

  it('pads every shot to the repetition time in CONSTANT mode', () => {
    const s = schedule(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({
        uid: 'rt',
        count: 2,
        repetitionMode: RepetitionMode.CONSTANT,
        repetitionTime: 1e-6,
      }, rt => rt.play('measure', short)));
    const avg = loop(s.steps[0].root.children[0]);
    expect(avg.iterationLength).toBe(3_600_000);
    expect(avg.end).toBe(7_200_000);
  });

  it('rejects a shot longer than the repetition time', () => {
    const { errors } = run(QA_SETUP, ['measure'], b => b
      .acquireLoopRt({
        uid: 'rt',
        count: 2,
        repetitionMode: RepetitionMode.CONSTANT,
        repetitionTime: 50e-9,
      }, rt => rt.play('measure', short)));
    expect(errors[0].code).toBe('scheduling_conflict');
    expect(errors[0].message).toBe("Shot of 'rt/average' takes 374400 tiny samples, longer than the repetition time (201600)");
  });
});

describe('scheduleExperiment: near-time steps', () => {
  it('schedules one independent copy of the real-time loop per near-time value', () => {
    const wait = sweepParameter({ uid: 'wait', values: [0, 8e-9, 16e-9] });
    const s = schedule(QA_SETUP, ['measure'], b => b
      .sweep({ uid: 'nt', parameters: wait }, nt => nt
        .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt.delay('measure', wait).play('measure', short))));

    expect(s.nearTimeAxes).toEqual([{ uid: 'nt', parameters: ['wait'], count: 3 }]);
    expect(s.steps.map(step => step.indices)).toEqual([[0], [1], [2]]);
    expect(s.steps.map(step => step.values.wait)).toEqual([0, 8e-9, 16e-9]);
    expect(s.steps.map((_, i) => op(shot(s, i)[1]).start)).toEqual([0, 28_800, 57_600]);
  });

  it('iterates nested near-time sweeps with the innermost fastest', () => {
    const outer = sweepParameter({ uid: 'outer', values: [1, 2] });
    const inner = sweepParameter({ uid: 'inner', values: [1, 2, 3] });
    const s = schedule(QA_SETUP, ['measure'], b => b
      .sweep({ uid: 'o', parameters: outer }, o => o
        .sweep({ uid: 'i', parameters: inner }, i => i
          .acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt.play('measure', short)))));
    expect(s.steps.map(step => step.indices)).toEqual([[0, 0], [0, 1], [0, 2], [1, 0], [1, 1], [1, 2]]);
    expect(s.steps[4].values).toEqual({ outer: 2, inner: 2 });
  });
});

describe('scheduleExperiment: feedback', () => {
  function feedbackExperiment(b: ExperimentBuilder, cases: number[]): void {
    b.acquireLoopRt({ uid: 'rt', count: 1 }, rt => rt
      .section({ uid: 'readout' }, x => x.acquire('acquire', 'q0', { kernel: readout }))
      .match({ uid: 'm', handle: 'q0', feedbackDelay: 50e-9 }, m => {
        for (const state of cases) m.case(state, c => c.play('drive', short), { uid: `m${state}` });
      }));
  }

  it('starts a match no earlier than the acquire end plus the feedback delay', () => {
    const s = schedule(FEEDBACK_SETUP, ['drive', 'acquire'], b => feedbackExperiment(b, [0, 1]));
    const m = match(shot(s)[1]);
    expect(m.binding.delay).toBe(1_440_000);
    expect(m.start).toBe(3_254_400);
    expect(m.end).toBe(3_628_800);
    expect(m.cases.map(c => [c.uid, c.state, c.end])).toEqual([
      ['m0', 0, 3_628_800],
      ['m1', 1, 3_628_800],
    ]);
  });

  it('fills undeclared states with an empty branch', () => {
    const s = schedule(FEEDBACK_SETUP, ['drive', 'acquire'], b => feedbackExperiment(b, [0]));
    const m = match(shot(s)[1]);
    expect(m.cases.map(c => [c.uid, c.empty])).toEqual([
      ['m0', false],
      ['m/empty_1', true],
    ]);
  });
});
