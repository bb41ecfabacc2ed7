/**
 * Sweep parameters and parameter references.
 *
 * The experiment tree stores parameters by reference ({ kind: 'parameter', uid });
 * the values live once in the experiment's parameter table.
 */
import { StructureError } from '../errors';

export interface SweepParameter {
  readonly uid: string;
  readonly values: readonly number[];
  readonly axisName: string;
}

export interface ParameterRef {
  readonly kind: 'parameter';
  readonly uid: string;
}

/** A scalar that is either fixed or bound per sweep iteration. */
export type ParameterValue = number | ParameterRef;

export function sweepParameter(opts: { uid: string; values: readonly number[]; axisName?: string }): SweepParameter {
  if (opts.values.length === 0) {
    throw new StructureError(`Sweep parameter '${opts.uid}' has no values`, { nodeId: opts.uid });
  }
  for (const v of opts.values) {
    if (!Number.isFinite(v)) {
      throw new StructureError(`Sweep parameter '${opts.uid}' has a non-finite value`, { nodeId: opts.uid });
    }
  }
  return Object.freeze({
    uid: opts.uid,
    values: Object.freeze([...opts.values]),
    axisName: opts.axisName ?? opts.uid,
  });
}

/** Evenly spaced values from start to stop inclusive. */
export function linearSweepParameter(opts: {
  uid: string;
  start: number;
  stop: number;
  count: number;
  axisName?: string;
}): SweepParameter {
  const { start, stop, count } = opts;
  if (!Number.isInteger(count) || count < 1) {
    throw new StructureError(`Sweep parameter '${opts.uid}' needs a positive integer count`, { nodeId: opts.uid });
  }
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(count === 1 ? start : start + (i * (stop - start)) / (count - 1));
  }
  return sweepParameter({ uid: opts.uid, values, axisName: opts.axisName });
}

export function paramRef(param: SweepParameter | string): ParameterRef {
  return Object.freeze({ kind: 'parameter', uid: typeof param === 'string' ? param : param.uid });
}

export function isParameterRef(value: unknown): value is ParameterRef {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'parameter' && 'uid' in value;
}

export function parameterUids(...values: (ParameterValue | undefined)[]): string[] {
  const uids: string[] = [];
  for (const v of values) {
    if (v !== undefined && typeof v !== 'number') uids.push(v.uid);
  }
  return uids;
}
