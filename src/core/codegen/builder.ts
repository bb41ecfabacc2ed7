/**
 * ProgramBuilder: accumulates one real-time program in the abstract
 * instruction set.
 *
 * Consecutive waits are merged into one. Jump, branch and loop-end targets
 * may name a label that is placed later; they are recorded as forward
 * references and patched by resolveForwardRefs().
 */
import { StructureError } from '../errors';
import type { CompilerError } from '../errors';
import type { Instruction } from '../types';

const UNRESOLVED = -1;

interface ForwardRef {
  name: string;
  index: number;
  /** Branch target slot; -1 for jump and endLoop targets */
  slot: number;
}

export class ProgramBuilder {
  private instructions: Instruction[] = [];
  private labels = new Map<string, number>();
  private forwardRefs: ForwardRef[] = [];
  private pendingWait = 0;

  wait(samples: number): void {
    if (samples < 0 || !Number.isInteger(samples)) {
      throw new StructureError(`Cannot wait ${samples} samples`);
    }
    this.pendingWait += samples;
  }

  /** Write out the merged pending wait. */
  flush(): void {
    if (this.pendingWait === 0) return;
    this.instructions.push({ op: 'wait', samples: this.pendingWait });
    this.pendingWait = 0;
  }

  emit(instr: Instruction): number {
    this.flush();
    this.instructions.push(instr);
    return this.instructions.length - 1;
  }

  emitJump(label: string): void {
    const index = this.emit({ op: 'jump', target: UNRESOLVED });
    this.forwardRefs.push({ name: label, index, slot: -1 });
  }

  emitEndLoop(loop: string, label: string): void {
    const index = this.emit({ op: 'endLoop', loop, target: UNRESOLVED });
    this.forwardRefs.push({ name: label, index, slot: -1 });
  }

  /** Branch on a discriminated state; labels[i] is the target for state i. */
  emitBranch(branch: { handle: string; source: 'local' | 'global'; marker?: number }, labels: readonly string[]): void {
    const index = this.emit({ op: 'branch', ...branch, targets: labels.map(() => UNRESOLVED) });
    labels.forEach((name, slot) => this.forwardRefs.push({ name, index, slot }));
  }

  label(name: string): number {
    this.flush();
    if (this.labels.has(name)) throw new StructureError(`Label '${name}' placed twice`);
    this.labels.set(name, this.instructions.length);
    return this.instructions.length;
  }

  resolveForwardRefs(errors: CompilerError[], context: string): void {
    for (const ref of this.forwardRefs) {
      const addr = this.labels.get(ref.name);
      const instr = this.instructions[ref.index];
      if (addr === undefined) {
        errors.push(new StructureError(`Unresolved reference: ${ref.name} in ${context}`, { nodeId: context }));
        continue;
      }
      switch (instr.op) {
        case 'jump':
        case 'endLoop':
          instr.target = addr;
          break;
        case 'branch':
          instr.targets[ref.slot] = addr;
          break;
        default:
          errors.push(new StructureError(`Reference ${ref.name} points at a ${instr.op} in ${context}`, { nodeId: context }));
      }
    }
    this.forwardRefs = [];
  }

  build(): Instruction[] {
    this.flush();
    return this.instructions;
  }
}
