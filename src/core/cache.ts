/**
 * Compilation cache keyed by the content hash of the compiler inputs.
 * Least recently used results are evicted once the capacity is reached.
 */
import { compilationKey, compileExperiment } from './compiler';
import type { CompilationResult } from './compiler';
import type { Experiment } from './experiment/ir';
import type { CompilerSettingsInput } from './settings';
import type { DeviceSetup } from './setup/topology';

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

export class CompilationCache {
  private readonly entries = new Map<string, CompilationResult>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity = 32) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  compile(experiment: Experiment, setup: DeviceSetup, settings: CompilerSettingsInput = {}): CompilationResult {
    const key = compilationKey(experiment, setup, settings);
    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      // Map keeps insertion order: re-insert to mark as most recent
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }
    this.misses++;
    const result = compileExperiment(experiment, setup, settings);
    this.entries.set(key, result);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return result;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
