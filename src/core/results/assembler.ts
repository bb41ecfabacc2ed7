/**
 * Result assembler: reorders the per-shot acquisition buffers returned by a
 * run into the shot axes of the results shape, and averages them into the
 * result axes for the averaged modes.
 *
 * Views are computed on first access and cached; a handle that is never
 * read is never reordered.
 */
import { AcquisitionType } from '../experiment/ir';
import type { HandleShape, ResultsShape } from './shape';
import { AxisKind } from './shape';

export interface ComplexBuffer {
  re: ArrayLike<number>;
  /** Absent for real-valued results */
  im?: ArrayLike<number>;
}

export interface ComplexArray {
  re: Float64Array;
  im: Float64Array;
}

function stridesOf(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length).fill(1);
  for (let i = shape.length - 2; i >= 0; i--) strides[i] = strides[i + 1] * shape[i + 1];
  return strides;
}

export class HandleResult {
  private _shots: ComplexArray | undefined;
  private _values: ComplexArray | undefined;
  private _states: Int32Array | undefined;

  constructor(
    readonly shape: HandleShape,
    private readonly acquisitionType: AcquisitionType,
    private readonly buffer: ComplexBuffer,
  ) {
    if (buffer.re.length !== shape.size || (buffer.im !== undefined && buffer.im.length !== shape.size)) {
      throw new Error(
        `Result buffer for '${shape.handle}' has ${buffer.re.length} values, expected ${shape.size}`,
      );
    }
  }

  get dims(): number[] {
    return this.shape.shape;
  }

  /** One value per shot, in shot-axis order. */
  shots(): ComplexArray {
    if (!this._shots) this._shots = this.reorder();
    return this._shots;
  }

  /** Samples, integrated values or raw states in result-axis order; averaged modes take the mean over the shots. */
  values(): ComplexArray {
    if (!this._values) {
      this._values = this.shape.axes.length === this.shape.shotAxes.length ? this.shots() : this.average();
    }
    return this._values;
  }

  /** Value at one index tuple of the result axes. */
  at(index: readonly number[]): { re: number; im: number } {
    const dims = this.shape.shape;
    if (index.length !== dims.length || index.some((i, d) => !Number.isInteger(i) || i < 0 || i >= dims[d])) {
      throw new Error(`Index [${index.join(', ')}] is outside shape [${dims.join(', ')}] of '${this.shape.handle}'`);
    }
    const strides = stridesOf(dims);
    const flat = index.reduce((sum, i, d) => sum + i * strides[d], 0);
    const v = this.values();
    return { re: v.re[flat], im: v.im[flat] };
  }

  /** Discriminated state per shot, in shot-axis order. */
  states(): Int32Array {
    if (this.acquisitionType !== AcquisitionType.DISCRIMINATION) {
      throw new Error(`Handle '${this.shape.handle}' holds ${this.acquisitionType} results, not discriminated states`);
    }
    if (!this._states) this._states = Int32Array.from(this.shots().re, v => Math.round(v));
    return this._states;
  }

  /** Mean over the average axis; the other axes keep their order. */
  private average(): ComplexArray {
    const dims = this.shape.shotAxes.map(a => a.count);
    const axis = this.shape.shotAxes.findIndex(a => a.kind === AxisKind.AVERAGE);
    const v = this.shots();
    const outer = dims.slice(0, axis).reduce((n, c) => n * c, 1);
    const count = dims[axis];
    const inner = dims.slice(axis + 1).reduce((n, c) => n * c, 1);
    const re = new Float64Array(outer * inner);
    const im = new Float64Array(outer * inner);
    for (let o = 0; o < outer; o++) {
      for (let a = 0; a < count; a++) {
        const base = (o * count + a) * inner;
        for (let i = 0; i < inner; i++) {
          re[o * inner + i] += v.re[base + i] / count;
          im[o * inner + i] += v.im[base + i] / count;
        }
      }
    }
    return { re, im };
  }

  private reorder(): ComplexArray {
    const { natural, shotAxes, size } = this.shape;
    const naturalStrides = stridesOf(natural.map(a => a.count));
    // Buffer stride of each shot axis
    const strides = shotAxes.map(a => naturalStrides[natural.indexOf(a)]);
    const dims = shotAxes.map(a => a.count);
    const re = new Float64Array(size);
    const im = new Float64Array(size);
    const index = new Array<number>(dims.length).fill(0);
    for (let flat = 0; flat < size; flat++) {
      const src = index.reduce((sum, i, d) => sum + i * strides[d], 0);
      re[flat] = this.buffer.re[src];
      im[flat] = this.buffer.im ? this.buffer.im[src] : 0;
      for (let d = dims.length - 1; d >= 0; d--) {
        if (++index[d] < dims[d]) break;
        index[d] = 0;
      }
    }
    return { re, im };
  }
}

export class ResultSet {
  private readonly results = new Map<string, HandleResult>();

  constructor(readonly shape: ResultsShape, private readonly buffers: Readonly<Record<string, ComplexBuffer>>) {
    for (const handle of Object.keys(buffers)) {
      if (!shape.handles.some(h => h.handle === handle)) throw new Error(`No acquisition produces handle '${handle}'`);
    }
  }

  get handles(): string[] {
    return this.shape.handles.map(h => h.handle);
  }

  handle(name: string): HandleResult {
    const cached = this.results.get(name);
    if (cached) return cached;
    const shape = this.shape.handles.find(h => h.handle === name);
    if (!shape) throw new Error(`No acquisition produces handle '${name}'`);
    const buffer = this.buffers[name];
    if (buffer === undefined) throw new Error(`No result buffer for handle '${name}'`);
    const result = new HandleResult(shape, this.shape.acquisitionType, buffer);
    this.results.set(name, result);
    return result;
  }
}

export function assembleResults(shape: ResultsShape, buffers: Readonly<Record<string, ComplexBuffer>>): ResultSet {
  return new ResultSet(shape, buffers);
}
