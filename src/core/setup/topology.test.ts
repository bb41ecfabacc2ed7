import { describe, it, expect } from 'vitest';
import { capabilitiesOf, channelKey, parseSetup, validateTopology } from './topology';
import type { DeviceSetup } from './topology';

describe('parseSetup', () => {
  it('accepts a setup and fills in empty tables', () => {
    const { setup, errors } = parseSetup({
      devices: [{ uid: 'qa', deviceClass: 'SHFQA' }],
      lines: [{ path: 'q0/measure', device: 'qa', port: 0, direction: 'out' }],
    });
    expect(errors).toEqual([]);
    expect(setup?.calibration).toEqual({});
    expect(setup?.signalMap).toEqual({});
  });

  it('reports schema violations with their path', () => {
    const { setup, errors } = parseSetup({ devices: [{ uid: 'x', deviceClass: 'XYZ' }], lines: [] });
    expect(setup).toBeUndefined();
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toContain('Invalid device setup: devices.0.deviceClass: Invalid enum value');
  });

  it('runs the cross-reference checks', () => {
    const { errors } = parseSetup({
      devices: [{ uid: 'qa', deviceClass: 'SHFQA' }],
      lines: [{ path: 'q0/drive', device: 'sg', port: 0, direction: 'out' }],
    });
    expect(errors.map(e => e.message)).toEqual(["Signal line 'q0/drive' refers to unknown device 'sg'"]);
  });
});

describe('parseSetup: precompensation', () => {
  const base = {
    devices: [{ uid: 'awg', deviceClass: 'HDAWG' }],
    lines: [
      { path: 'q0/flux', device: 'awg', port: 0, direction: 'out' },
      { path: 'q0/in', device: 'awg', port: 0, direction: 'in' },
    ],
  };

  it('accepts filters on an output line', () => {
    const { setup, errors } = parseSetup({
      ...base,
      calibration: { 'q0/flux': { precompensation: { exponential: [{ timeconstant: 1e-6, amplitude: 0.1 }], highPass: { timeconstant: 1e-3 } } } },
    });
    expect(errors).toEqual([]);
    expect(setup?.calibration['q0/flux'].precompensation?.exponential).toEqual([{ timeconstant: 1e-6, amplitude: 0.1 }]);
  });

  it('limits the number of FIR coefficients', () => {
    const { errors } = parseSetup({
      ...base,
      calibration: { 'q0/flux': { precompensation: { fir: { coefficients: new Array<number>(41).fill(0) } } } },
    });
    expect(errors.map(e => e.message)).toEqual([
      'Invalid device setup: calibration.q0/flux.precompensation.fir.coefficients: at most 40 FIR coefficients',
    ]);
  });

  it('rejects filters on an input line', () => {
    const { errors } = parseSetup({ ...base, calibration: { 'q0/in': { precompensation: { bounce: { delay: 1e-8, amplitude: 0.2 } } } } });
    expect(errors.map(e => [e.nodeId, e.message])).toEqual([['q0/in', "Precompensation on input line 'q0/in'"]]);
  });
});

describe('validateTopology', () => {
  it('finds duplicates and dangling calibration', () => {
    const setup: DeviceSetup = {
      devices: [{ uid: 'sg', deviceClass: 'SHFSG' }, { uid: 'sg', deviceClass: 'HDAWG' }],
      lines: [
        { path: 'q0/drive', device: 'sg', port: 0, direction: 'out' },
        { path: 'q0/drive', device: 'sg', port: 1, direction: 'out' },
      ],
      calibration: { 'q1/drive': { portDelay: 1e-9 } },
      signalMap: {},
    };
    expect(validateTopology(setup).map(e => [e.nodeId, e.message])).toEqual([
      ['sg', "Duplicate device uid 'sg'"],
      ['q0/drive', "Duplicate signal line 'q0/drive'"],
      ['q1/drive', "Calibration for unknown signal line 'q1/drive'"],
    ]);
  });
});

describe('capabilitiesOf', () => {
  it('merges per-device overrides over the class table', () => {
    const caps = capabilitiesOf({ uid: 'qa', deviceClass: 'SHFQA', capabilities: { nativeLoops: false } });
    expect(caps.nativeLoops).toBe(false);
    expect(caps.samplingRate).toBe(2e9);
    expect(caps.commandTable).toBe(false);
  });
});

describe('channelKey', () => {
  it('names a channel by device, direction and port', () => {
    expect(channelKey({ path: 'q0/acquire', device: 'qa', port: 2, direction: 'in' })).toBe('qa/in2');
  });
});
