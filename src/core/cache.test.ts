import { describe, it, expect } from 'vitest';
import { CompilationCache } from './cache';
import { compilationKey } from './compiler';
import { ExperimentBuilder } from './experiment/builder';
import type { Experiment } from './experiment/ir';
import { constPulse } from './pulse/library';
import type { DeviceSetup } from './setup/topology';

// ---- Helpers ----

const SETUP: DeviceSetup = {
  devices: [{ uid: 'qa', deviceClass: 'SHFQA' }],
  lines: [
    { path: 'q0/measure', device: 'qa', port: 0, direction: 'out' },
    { path: 'q0/acquire', device: 'qa', port: 0, direction: 'in' },
  ],
  calibration: {},
  signalMap: { measure: 'q0/measure', acquire: 'q0/acquire' },
};

function experiment(count: number): Experiment {
  const pulse = constPulse({ uid: 'readout', length: 200e-9 });
  return new ExperimentBuilder({ uid: 'exp', signals: ['measure', 'acquire'] })
    .acquireLoopRt({ uid: 'rt', count }, rt => rt
      .play('measure', pulse)
      .acquire('acquire', 'q0', { kernel: pulse }))
    .build();
}

// ---- Tests ----

describe('CompilationCache', () => {
  it('returns the stored result for equal inputs', () => {
    const cache = new CompilationCache();
    const first = cache.compile(experiment(4), SETUP);
    const second = cache.compile(experiment(4), SETUP);
    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('evicts the least recently used result', () => {
    const cache = new CompilationCache(2);
    cache.compile(experiment(1), SETUP);
    cache.compile(experiment(2), SETUP);
    cache.compile(experiment(1), SETUP);
    cache.compile(experiment(3), SETUP);
    expect(cache.has(compilationKey(experiment(1), SETUP))).toBe(true);
    expect(cache.has(compilationKey(experiment(2), SETUP))).toBe(false);
    expect(cache.has(compilationKey(experiment(3), SETUP))).toBe(true);
    expect(cache.stats()).toEqual({ hits: 1, misses: 3, size: 2 });
  });

  it('caches failed compilations too', () => {
    const cache = new CompilationCache();
    const setup: DeviceSetup = { ...SETUP, signalMap: {} };
    expect(cache.compile(experiment(1), setup).errors).toHaveLength(2);
    cache.compile(experiment(1), setup);
    expect(cache.stats().hits).toBe(1);
  });

  it('starts over when cleared', () => {
    const cache = new CompilationCache();
    cache.compile(experiment(1), SETUP);
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });

  it('rejects a capacity below one', () => {
    expect(() => new CompilationCache(0)).toThrow('Cache capacity must be a positive integer, got 0');
  });
});
