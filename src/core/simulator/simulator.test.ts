import { describe, it, expect } from 'vitest';
import type { DeviceProgram, Instruction } from '../types';
import { simulate } from './simulator';

// ---- Helpers ----

/** One-program device at 2 GHz: 1800 tiny samples per sample */
function device(uid: string, instructions: Instruction[]): DeviceProgram {
  return {
    device: uid,
    deviceClass: 'SHFSG',
    samplingRate: 2e9,
    waveforms: [],
    commandTable: [],
    programs: [{ id: 0, instructions }],
    nearTimeSteps: [{ indices: [], program: 0, nodeSettings: [] }],
    channels: [],
    handles: [],
  };
}

// ---- Tests ----

describe('simulate', () => {
  it('runs a hardware loop', () => {
    const { events, finished, stalled } = simulate([device('qa', [
      { op: 'loop', loop: 'avg', count: 2 },
      { op: 'play', signal: 'measure', port: 0, waveform: 0 },
      { op: 'wait', samples: 10 },
      { op: 'acquire', signal: 'acquire', port: 0, handle: 'q0', samples: 10 },
      { op: 'wait', samples: 10 },
      { op: 'endLoop', loop: 'avg', target: 1 },
      { op: 'end' },
    ])], { states: (_handle, occurrence) => occurrence });

    expect(events.map(e => [e.time, e.op, e.state])).toEqual([
      [0, 'play', undefined],
      [18_000, 'acquire', 0],
      [36_000, 'play', undefined],
      [54_000, 'acquire', 1],
      [72_000, 'end', undefined],
    ]);
    expect(finished).toEqual({ qa: 72_000 });
    expect(stalled).toEqual([]);
  });

  it('selects command table entries and oscillator frequencies per iteration', () => {
    const { events } = simulate([device('sg', [
      { op: 'loop', loop: 'sw', count: 2 },
      { op: 'setOscillatorFrequency', oscillator: 0, frequency: { loop: 'sw', values: [1e6, 2e6] } },
      { op: 'play', signal: 'drive', port: 0, waveform: 0, commandTable: { loop: 'sw', entries: [4, 7] } },
      { op: 'wait', samples: 16 },
      { op: 'endLoop', loop: 'sw', target: 1 },
      { op: 'end' },
    ])]);
    expect(events.map(e => [e.time, e.op, e.value ?? e.commandTable])).toEqual([
      [0, 'oscillator', 1e6],
      [0, 'play', 4],
      [28_800, 'oscillator', 2e6],
      [28_800, 'play', 7],
      [57_600, 'end', undefined],
    ]);
  });

  it('relays a discriminated state from one device to another', () => {
    const qa = device('qa', [
      { op: 'sync', mode: 'await', marker: 0 },
      { op: 'acquire', signal: 'acquire', port: 0, handle: 'q0', samples: 100 },
      { op: 'wait', samples: 100 },
      { op: 'sync', mode: 'emit', marker: 1 },
      { op: 'end' },
    ]);
    const sg = device('sg', [
      { op: 'sync', mode: 'await', marker: 0 },
      { op: 'wait', samples: 200 },
      { op: 'branch', handle: 'q0', source: 'global', marker: 1, targets: [3, 5] },
      { op: 'play', signal: 'drive', port: 0, waveform: 0 },
      { op: 'jump', target: 6 },
      { op: 'play', signal: 'drive', port: 0, waveform: 1 },
      { op: 'end' },
    ]);
    const hub = device('hub', [
      { op: 'sync', mode: 'emit', marker: 0 },
      { op: 'relay', marker: 1, from: 'qa', to: ['sg'] },
      { op: 'end' },
    ]);

    const { events, finished, stalled } = simulate([qa, sg, hub], { states: () => 1 });
    expect(events).toEqual([
      { time: 0, device: 'hub', op: 'sync', mode: 'emit', marker: 0 },
      { time: 0, device: 'hub', op: 'end' },
      { time: 0, device: 'qa', op: 'sync', mode: 'await', marker: 0 },
      { time: 0, device: 'qa', op: 'acquire', signal: 'acquire', handle: 'q0', state: 1 },
      { time: 0, device: 'sg', op: 'sync', mode: 'await', marker: 0 },
      { time: 180_000, device: 'qa', op: 'sync', mode: 'emit', marker: 1 },
      { time: 180_000, device: 'qa', op: 'end' },
      { time: 360_000, device: 'sg', op: 'branch', handle: 'q0', state: 1 },
      { time: 360_000, device: 'sg', op: 'play', signal: 'drive', waveform: 1 },
      { time: 360_000, device: 'sg', op: 'end' },
    ]);
    expect(finished).toEqual({ hub: 0, qa: 180_000, sg: 360_000 });
    expect(stalled).toEqual([]);
  });

  it('delivers a relayed marker to the devices of the relay, its emitter included', () => {
    const qa = device('qa', [
      { op: 'sync', mode: 'await', marker: 0 },
      { op: 'acquire', signal: 'acquire', port: 0, handle: 'q0', samples: 100 },
      { op: 'wait', samples: 100 },
      { op: 'sync', mode: 'emit', marker: 1 },
      { op: 'branch', handle: 'q0', source: 'global', marker: 1, targets: [6, 5] },
      { op: 'play', signal: 'measure', port: 0, waveform: 0 },
      { op: 'end' },
    ]);
    const awg = device('awg', [{ op: 'sync', mode: 'await', marker: 1 }, { op: 'end' }]);
    const hub = device('hub', [
      { op: 'sync', mode: 'emit', marker: 0 },
      { op: 'relay', marker: 1, from: 'qa', to: ['qa'] },
      { op: 'end' },
    ]);

    const { events, finished, stalled } = simulate([qa, awg, hub], { states: () => 1 });
    expect(events.filter(e => e.device === 'qa' && (e.op === 'branch' || e.op === 'play'))).toEqual([
      { time: 180_000, device: 'qa', op: 'branch', handle: 'q0', state: 1 },
      { time: 180_000, device: 'qa', op: 'play', signal: 'measure', waveform: 0 },
    ]);
    expect(finished).toEqual({ qa: 180_000, hub: 0 });
    expect(stalled).toEqual([{ device: 'awg', marker: 1, time: 0 }]);
  });

  it('branches on a local decision without a marker', () => {
    const { events } = simulate([device('qc', [
      { op: 'acquire', signal: 'acquire', port: 0, handle: 'q0', samples: 32 },
      { op: 'wait', samples: 64 },
      { op: 'branch', handle: 'q0', source: 'local', targets: [3, 4, 4] },
      { op: 'setTrigger', port: 1, value: 1 },
      { op: 'end' },
    ])], { states: () => 2 });
    expect(events.map(e => [e.time, e.op])).toEqual([
      [0, 'acquire'],
      [115_200, 'branch'],
      [115_200, 'end'],
    ]);
  });

  it('reports a device waiting for a marker nobody emits', () => {
    const { finished, stalled } = simulate([
      device('sg', [{ op: 'sync', mode: 'await', marker: 3 }, { op: 'end' }]),
      device('awg', [{ op: 'wait', samples: 5 }, { op: 'end' }]),
    ]);
    expect(finished).toEqual({ awg: 9000 });
    expect(stalled).toEqual([{ device: 'sg', marker: 3, time: 0 }]);
  });

  it('stops a program that runs too long', () => {
    const program = device('qa', [
      { op: 'loop', loop: 'avg', count: 1000 },
      { op: 'wait', samples: 16 },
      { op: 'endLoop', loop: 'avg', target: 1 },
      { op: 'end' },
    ]);
    expect(() => simulate([program], { maxInstructions: 10 })).toThrow("Device 'qa' exceeded 10 instructions");
  });
});
