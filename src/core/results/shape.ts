/**
 * Results-shape descriptor: how the acquisition buffer of every handle is
 * laid out and how it maps onto result axes.
 *
 * A buffer holds one value (or one window of samples for RAW) per executed
 * acquire, in execution order: near-time steps outermost, then the real-time
 * loops enclosing the acquire from the outside in. The shot axes put the
 * average index right after the near-time axes whatever the averaging mode,
 * so CYCLIC and SEQUENTIAL runs of the same experiment give the same shots.
 * The result axes drop the average index for the averaged modes; only
 * SINGLE_SHOT keeps one value per shot.
 */
import { UnsupportedConstructError } from '../errors';
import type { CompilerError } from '../errors';
import { AcquisitionType, AveragingMode } from '../experiment/ir';
import type { ScheduledExperiment, ScheduledLoop, ScheduledNode } from '../scheduler/schedule';
import type { ResolvedExperiment } from '../setup/resolver';

export const AxisKind = {
  NEAR_TIME: 'near_time',
  AVERAGE: 'average',
  SWEEP: 'sweep',
  ACQUIRE: 'acquire',
  SAMPLE: 'sample',
} as const;
export type AxisKind = typeof AxisKind[keyof typeof AxisKind];

export interface ResultAxis {
  name: string;
  kind: AxisKind;
  count: number;
  /** Values of the parameters stepped along this axis */
  parameters: Record<string, number[]>;
}

export interface HandleShape {
  handle: string;
  device: string;
  /** Axes in buffer order, outermost first */
  natural: ResultAxis[];
  /** One axis per shot dimension: near-time, average, sweeps, acquire, sample */
  shotAxes: ResultAxis[];
  /** Result axes; the averaged modes leave out the average axis */
  axes: ResultAxis[];
  shape: number[];
  /** Values in the buffer */
  size: number;
}

export interface ResultsShape {
  experiment: string;
  averagingMode: AveragingMode;
  acquisitionType: AcquisitionType;
  count: number;
  handles: HandleShape[];
}

export interface ShapeResult {
  shape?: ResultsShape;
  errors: CompilerError[];
}

interface AcquireSite {
  device: string;
  chain: ScheduledLoop[];
  ops: Set<string>;
  samples: number;
}

const RANK: Record<AxisKind, number> = {
  near_time: 0,
  average: 1,
  sweep: 2,
  acquire: 3,
  sample: 4,
};

function collectSites(
  nodes: readonly ScheduledNode[],
  chain: ScheduledLoop[],
  sites: Map<string, AcquireSite>,
  errors: CompilerError[],
): void {
  for (const node of nodes) {
    switch (node.type) {
      case 'operation': {
        if (node.op.kind !== 'acquire') break;
        const handle = node.op.handle;
        const site = sites.get(handle);
        if (!site) {
          sites.set(handle, { device: node.device, chain, ops: new Set([node.uid]), samples: node.lengthSamples });
          break;
        }
        const same = site.chain.length === chain.length && site.chain.every((l, i) => l.uid === chain[i].uid);
        if (!same) {
          errors.push(new UnsupportedConstructError(
            `Handle '${handle}' is acquired inside different loops ('${node.uid}' and an earlier acquire)`,
            { nodeId: node.uid },
          ));
        } else if (site.samples !== node.lengthSamples) {
          errors.push(new UnsupportedConstructError(
            `Acquisitions of handle '${handle}' have different lengths`,
            { nodeId: node.uid },
          ));
        }
        site.ops.add(node.uid);
        break;
      }
      case 'section':
        collectSites(node.children, chain, sites, errors);
        break;
      case 'loop':
        // Every iteration has the same structure
        if (node.iterations.length > 0) collectSites(node.iterations[0].children, [...chain, node], sites, errors);
        break;
      case 'match':
        for (const c of node.cases) collectSites(c.children, chain, sites, errors);
        break;
    }
  }
}

function loopAxis(loop: ScheduledLoop, resolved: ResolvedExperiment): ResultAxis {
  const parameters: Record<string, number[]> = {};
  for (const uid of loop.parameters) {
    const param = resolved.experiment.parameters.get(uid);
    if (param) parameters[uid] = [...param.values];
  }
  return {
    name: loop.uid,
    kind: loop.loopType === 'average' ? AxisKind.AVERAGE : AxisKind.SWEEP,
    count: loop.count,
    parameters,
  };
}

export function buildResultsShape(resolved: ResolvedExperiment, schedule: ScheduledExperiment): ShapeResult {
  const errors: CompilerError[] = [];
  const sites = new Map<string, AcquireSite>();
  if (schedule.steps.length > 0) collectSites([schedule.steps[0].root], [], sites, errors);
  if (errors.length > 0) return { errors };

  const nearTime: ResultAxis[] = schedule.nearTimeAxes.map(axis => {
    const parameters: Record<string, number[]> = {};
    for (const uid of axis.parameters) {
      const param = resolved.experiment.parameters.get(uid);
      if (param) parameters[uid] = [...param.values];
    }
    return { name: axis.uid, kind: AxisKind.NEAR_TIME, count: axis.count, parameters };
  });

  const ordered = [...sites].sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  const handles = ordered.map(([handle, site]): HandleShape => {
    const natural = [...nearTime, ...site.chain.map(l => loopAxis(l, resolved))];
    if (site.ops.size > 1) natural.push({ name: 'acquire', kind: AxisKind.ACQUIRE, count: site.ops.size, parameters: {} });
    if (schedule.acquisitionType === AcquisitionType.RAW) {
      natural.push({ name: 'sample', kind: AxisKind.SAMPLE, count: site.samples, parameters: {} });
    }
    // Stable: sweeps keep their nesting order
    const shotAxes = [...natural].sort((a, b) => RANK[a.kind] - RANK[b.kind]);
    const axes = schedule.averagingMode === AveragingMode.SINGLE_SHOT
      ? shotAxes
      : shotAxes.filter(a => a.kind !== AxisKind.AVERAGE);
    return {
      handle,
      device: site.device,
      natural,
      shotAxes,
      axes,
      shape: axes.map(a => a.count),
      size: natural.reduce((n, a) => n * a.count, 1),
    };
  });

  return {
    shape: {
      experiment: schedule.uid,
      averagingMode: schedule.averagingMode,
      acquisitionType: schedule.acquisitionType,
      count: schedule.count,
      handles,
    },
    errors,
  };
}
