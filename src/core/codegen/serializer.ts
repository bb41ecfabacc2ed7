/**
 * Device program output: canonical JSON for upload and caching, and a
 * human-readable listing for inspection.
 */
import { stableStringify } from '../canonical';
import type { DeviceProgram, Instruction } from '../types';

/** Canonical JSON of a set of device programs; equal programs give equal text. */
export function serializePrograms(programs: readonly DeviceProgram[]): string {
  return stableStringify(programs);
}

function formatValues(values: readonly number[]): string {
  return values.join(', ');
}

/**
 * Format one instruction as a listing line
 */
export function formatInstruction(instr: Instruction): string {
  switch (instr.op) {
    case 'wait':
      return `wait ${instr.samples}`;
    case 'play': {
      const head = `play ${instr.signal}@${instr.port} w${instr.waveform}`;
      if (instr.commandTable === undefined) return head;
      if (typeof instr.commandTable === 'number') return `${head} ct${instr.commandTable}`;
      return `${head} ct[${instr.commandTable.loop}: ${formatValues(instr.commandTable.entries)}]`;
    }
    case 'acquire': {
      const head = `acquire ${instr.signal}@${instr.port} ${instr.handle} ${instr.samples}`;
      return instr.kernel === undefined ? head : `${head} k${instr.kernel}`;
    }
    case 'loop':
      return `loop ${instr.loop} x${instr.count}`;
    case 'endLoop':
      return `endloop ${instr.loop} -> ${instr.target}`;
    case 'sync':
      return `sync ${instr.mode} ${instr.marker}`;
    case 'branch': {
      const marker = instr.marker === undefined ? '' : ` m${instr.marker}`;
      return `branch ${instr.handle} ${instr.source}${marker} -> [${formatValues(instr.targets)}]`;
    }
    case 'jump':
      return `jump -> ${instr.target}`;
    case 'setOscillatorFrequency': {
      const f = instr.frequency;
      return typeof f === 'number'
        ? `osc ${instr.oscillator} freq ${f}`
        : `osc ${instr.oscillator} freq [${f.loop}: ${formatValues(f.values)}]`;
    }
    case 'resetOscillatorPhase':
      return 'reset_phase';
    case 'setTrigger':
      return `trigger ${instr.port} = ${instr.value}`;
    case 'relay':
      return `relay ${instr.marker} ${instr.from} -> ${instr.to.join(', ')}`;
    case 'end':
      return 'end';
  }
}

export function formatProgram(program: DeviceProgram): string {
  const lines: string[] = [`# ${program.device} ${program.deviceClass} @ ${program.samplingRate} Hz`];

  if (program.waveforms.length > 0) {
    lines.push('waveforms:');
    for (const w of program.waveforms) lines.push(`  ${w.index}: ${w.name} ${w.role} ${w.lengthSamples}`);
  }
  if (program.commandTable.length > 0) {
    lines.push('command table:');
    for (const e of program.commandTable) {
      const osc = e.oscillator === undefined ? '' : ` osc${e.oscillator}`;
      lines.push(`  ${e.index}: w${e.waveform} amp ${e.amplitude} phase ${e.phase}${osc}`);
    }
  }
  for (const p of program.programs) {
    lines.push(`program ${p.id}:`);
    p.instructions.forEach((instr, i) => lines.push(`  ${i}: ${formatInstruction(instr)}`));
  }
  if (program.nearTimeSteps.length > 1) {
    lines.push('steps:');
    for (const step of program.nearTimeSteps) {
      const settings = step.nodeSettings.map(s => ` ${s.path}=${s.value}`).join('');
      lines.push(`  [${step.indices.join(', ')}] -> ${step.program}${settings}`);
    }
  }
  return lines.join('\n');
}
