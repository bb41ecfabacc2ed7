/**
 * Schedule manifest: a flat list of operation windows for display tools.
 *
 * Compressed loops are expanded iteration by iteration until the event cap is
 * reached; the manifest then reports itself as truncated.
 */
import type { OperationKind } from '../experiment/ir';
import type { CompilerSettings } from '../settings';
import type { ScheduledExperiment, ScheduledNode } from './schedule';

export interface ManifestEntry {
  step: number;
  uid: string;
  kind: OperationKind;
  signal: string;
  device: string;
  /** Innermost enclosing section, loop or case */
  section: string;
  start: number;
  end: number;
  /** Loop uid → iteration index, outermost first */
  iterations: Record<string, number>;
  /** Case state, for operations inside a match */
  state?: number;
}

export interface ManifestStep {
  index: number;
  indices: number[];
  values: Record<string, number>;
  end: number;
}

export interface ScheduleManifest {
  experiment: string;
  systemGrid: number;
  steps: ManifestStep[];
  entries: ManifestEntry[];
  truncated: boolean;
}

interface Frame {
  step: number;
  section: string;
  offset: number;
  iterations: Record<string, number>;
  state?: number;
}

class ManifestWriter {
  readonly entries: ManifestEntry[] = [];
  truncated = false;

  constructor(private readonly limit: number, private readonly expandLoops: boolean) {}

  visit(nodes: readonly ScheduledNode[], frame: Frame): void {
    for (const node of nodes) {
      if (this.truncated) return;
      switch (node.type) {
        case 'operation':
          if (this.entries.length >= this.limit) {
            this.truncated = true;
            return;
          }
          this.entries.push({
            step: frame.step,
            uid: node.uid,
            kind: node.kind,
            signal: node.signal,
            device: node.device,
            section: frame.section,
            start: node.start + frame.offset,
            end: node.end + frame.offset,
            iterations: frame.iterations,
            state: frame.state,
          });
          break;
        case 'section':
          this.visit(node.children, { ...frame, section: node.uid });
          break;
        case 'loop':
          if (node.compressed) {
            const template = node.iterations[0];
            if (!template) break;
            const count = this.expandLoops ? node.count : 1;
            for (let k = 0; k < count && !this.truncated; k++) {
              this.visit(template.children, {
                ...frame,
                section: node.uid,
                offset: frame.offset + k * node.iterationLength,
                iterations: { ...frame.iterations, [node.uid]: k },
              });
            }
          } else {
            for (const it of node.iterations) {
              this.visit(it.children, {
                ...frame,
                section: node.uid,
                iterations: { ...frame.iterations, [node.uid]: it.index },
              });
            }
          }
          break;
        case 'match':
          for (const c of node.cases) {
            this.visit(c.children, { ...frame, section: c.uid, state: c.state });
          }
          break;
      }
    }
  }
}

export function buildManifest(schedule: ScheduledExperiment, settings: CompilerSettings): ScheduleManifest {
  const writer = new ManifestWriter(settings.maxManifestEvents, settings.expandLoopsInManifest);
  for (const step of schedule.steps) {
    writer.visit(step.root.children, { step: step.index, section: step.root.uid, offset: 0, iterations: {} });
  }
  // stable: ties keep tree order
  const entries = [...writer.entries].sort((a, b) => a.step - b.step || a.start - b.start);
  return {
    experiment: schedule.uid,
    systemGrid: schedule.systemGrid,
    steps: schedule.steps.map(s => ({ index: s.index, indices: s.indices, values: s.values, end: s.root.end })),
    entries,
    truncated: writer.truncated,
  };
}
