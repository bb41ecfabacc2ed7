import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { main } from './qseqc';

// ---- Helpers ----

function sample(name: string): string {
  return fileURLToPath(new URL(`./samples/${name}`, import.meta.url));
}

const READOUT = sample('readout.experiment.json');
const READOUT_SETUP = sample('readout.setup.json');
const FEEDBACK = sample('feedback.experiment.json');
const FEEDBACK_SETUP = sample('feedback.setup.json');
const STRICT = sample('strict.settings.json');

function run(...argv: string[]): { code: number; log: string[]; error: string[] } {
  const log: string[] = [];
  const error: string[] = [];
  const code = main(argv, { log: line => log.push(line), error: line => error.push(line) });
  return { code, log, error };
}

// ---- Tests ----

describe('qseqc', () => {
  it('prints usage without an experiment and a setup', () => {
    const { code, log, error } = run(READOUT);
    expect(code).toBe(1);
    expect(log).toEqual([]);
    expect(error[2]).toBe('Usage: qseqc <experiment.json> <setup.json> [settings.json] [options]');
  });

  it('reports a file it cannot read', () => {
    const { code, error } = run('/nonexistent/experiment.json', READOUT_SETUP);
    expect(code).toBe(1);
    expect(error).toEqual(["Error: cannot read file '/nonexistent/experiment.json'"]);
  });

  it('prints only a check mark in quiet mode', () => {
    const { code, log, error } = run(READOUT, READOUT_SETUP, '--quiet');
    expect(code).toBe(0);
    expect(error).toEqual([]);
    expect(log).toEqual([`\x1b[32m✓ ${READOUT}\x1b[0m`]);
  });

  it('summarizes every device program', () => {
    const { code, log } = run(READOUT, READOUT_SETUP);
    expect(code).toBe(0);
    expect(log[0]).toBe(`\x1b[32m✓ ${READOUT}\x1b[0m — compiled successfully`);
    expect(log[2]).toMatch(/^ {2}hash [0-9a-f]{12}$/);
    expect(log[3]).toMatch(/^ {2}qa {9}SHFQA /);
  });

  it('shows the results shape in verbose mode', () => {
    const { log } = run(READOUT, READOUT_SETUP, '--verbose');
    expect(log).toContain('  \x1b[1mResults (integration, single_shot):\x1b[0m');
    expect(log).toContain(`    ${'q0'.padEnd(12)} [4]  rt/average:average`);
  });

  it('writes the compile result as JSON', () => {
    const { code, log } = run(READOUT, READOUT_SETUP, '--json');
    expect(code).toBe(0);
    const parsed: unknown = JSON.parse(log[0]);
    expect(parsed).toMatchObject({
      file: READOUT,
      experiment: 'readout',
      errors: [],
      warnings: [],
      programs: [{ device: 'qa', deviceClass: 'SHFQA' }],
      resultsShape: { handles: [{ handle: 'q0', shape: [4] }] },
    });
  });

  it('lists the program of every device', () => {
    const { log } = run(READOUT, READOUT_SETUP, '--listing');
    expect(log).toContain('    # qa SHFQA @ 2000000000 Hz');
    expect(log).toContain('    program 0:');
  });

  it('prints the feedback latency warning', () => {
    const { code, log } = run(FEEDBACK, FEEDBACK_SETUP);
    expect(code).toBe(0);
    expect(log[1]).toBe(
      "  \x1b[33mwarning: Feedback delay 5e-8s of match 'm' is below the global latency floor 4e-7s; clamped to the floor\x1b[0m",
    );
  });

  it('fails on the same warning with strict settings', () => {
    const { code, log, error } = run(FEEDBACK, FEEDBACK_SETUP, STRICT);
    expect(code).toBe(1);
    expect(log).toEqual([]);
    expect(error).toEqual([
      `\x1b[31m✗ ${FEEDBACK}: 1 error(s)\x1b[0m`,
      "  [scheduling_conflict] m: Feedback delay 5e-8s of match 'm' is below the global latency floor 4e-7s",
    ]);
  });

  it('runs the compiled programs in the simulator', () => {
    const { log } = run(FEEDBACK, FEEDBACK_SETUP, '--simulate');
    expect(log).toContain(`    ${'qa'.padEnd(10)} done at ${3_628_800 / 3.6e12} s`);
    expect(log).toContain(`    ${'sg'.padEnd(10)} done at ${3_628_800 / 3.6e12} s`);
    expect(log.some(line => line.includes('stalled'))).toBe(false);
  });

  it('reports an input that is not an experiment', () => {
    const { code, error } = run(READOUT_SETUP, READOUT_SETUP);
    expect(code).toBe(1);
    expect(error[0]).toBe(`\x1b[31m✗ ${READOUT_SETUP}: 1 error(s)\x1b[0m`);
    expect(error[1]).toMatch(/^ {2}\[structure\]: Invalid experiment: /);
  });
});
