/**
 * Device topology, calibration table and signal map: the hardware description
 * the compiler receives from outside. Loaded from JSON and validated with zod.
 */
import { z } from 'zod';
import { DEVICE_CAPABILITIES, DeviceClass } from '../constants';
import type { DeviceCapabilities } from '../constants';
import { StructureError } from '../errors';
import { ModulationType } from '../experiment/ir';
import type { SignalCalibrationOverride } from '../experiment/ir';
import { formatIssues } from '../settings';

export const LineDirection = {
  OUT: 'out',
  IN: 'in',
} as const;
export type LineDirection = typeof LineDirection[keyof typeof LineDirection];

export interface DeviceDescriptor {
  uid: string;
  deviceClass: DeviceClass;
  /** Per-device overrides of the class capability table */
  capabilities?: Partial<DeviceCapabilities>;
}

export interface LogicalSignalLine {
  path: string;
  device: string;
  port: number;
  direction: LineDirection;
}

/** Output filters that correct the distortion of the line to the qubit; times in seconds */
export interface Precompensation {
  exponential?: { timeconstant: number; amplitude: number }[];
  highPass?: { timeconstant: number };
  bounce?: { delay: number; amplitude: number };
  fir?: { coefficients: number[] };
}

/** Calibration of one logical signal line: an experiment override plus the line's filters. */
export interface CalibrationRecord extends SignalCalibrationOverride {
  precompensation?: Precompensation;
}

export interface DeviceSetup {
  devices: DeviceDescriptor[];
  lines: LogicalSignalLine[];
  /** Keyed by logical signal line path */
  calibration: Record<string, CalibrationRecord>;
  /** Experiment signal → logical signal line path */
  signalMap: Record<string, string>;
}

// ---- Schemas ----

const ParameterValueSchema = z.union([
  z.number(),
  z.object({ kind: z.literal('parameter'), uid: z.string().min(1) }).strict(),
]);

export const CalibrationRecordSchema = z.object({
  oscillator: z.object({
    uid: z.string().min(1),
    frequency: ParameterValueSchema,
    modulation: z.nativeEnum(ModulationType),
  }).strict().optional(),
  localOscillatorFrequency: ParameterValueSchema.optional(),
  portDelay: z.number().min(0).optional(),
  range: z.number().optional(),
  threshold: z.union([z.number(), z.array(z.number())]).optional(),
}).strict();

const PrecompensationSchema = z.object({
  exponential: z.array(z.object({ timeconstant: z.number().positive(), amplitude: z.number() }).strict())
    .max(8, 'at most 8 exponential filters')
    .optional(),
  highPass: z.object({ timeconstant: z.number().positive() }).strict().optional(),
  bounce: z.object({ delay: z.number().min(0), amplitude: z.number() }).strict().optional(),
  fir: z.object({ coefficients: z.array(z.number()).min(1).max(40, 'at most 40 FIR coefficients') }).strict().optional(),
}).strict();

const LineCalibrationSchema = CalibrationRecordSchema.extend({
  precompensation: PrecompensationSchema.optional(),
}).strict();

const CapabilitiesSchema = z.object({
  samplingRate: z.number().positive(),
  sampleMultiple: z.number().int().positive(),
  minWaveformLength: z.number().int().min(0),
  maxWaveformLength: z.number().int().min(0),
  hardwareOscillators: z.number().int().min(0),
  output: z.boolean(),
  acquisition: z.boolean(),
  commandTable: z.boolean(),
  realtimeParameterSweep: z.boolean(),
  nativeLoops: z.boolean(),
  feedback: z.boolean(),
  syncHub: z.boolean(),
  channelsPerAwg: z.number().int().positive(),
}).partial().strict();

export const DeviceSetupSchema = z.object({
  devices: z.array(z.object({
    uid: z.string().min(1),
    deviceClass: z.nativeEnum(DeviceClass),
    capabilities: CapabilitiesSchema.optional(),
  }).strict()),
  lines: z.array(z.object({
    path: z.string().min(1),
    device: z.string().min(1),
    port: z.number().int().min(0),
    direction: z.nativeEnum(LineDirection),
  }).strict()),
  calibration: z.record(LineCalibrationSchema).default({}),
  signalMap: z.record(z.string()).default({}),
}).strict();

export function parseSetup(input: unknown): { setup?: DeviceSetup; errors: StructureError[] } {
  const parsed = DeviceSetupSchema.safeParse(input);
  if (!parsed.success) {
    return { errors: [new StructureError(`Invalid device setup: ${formatIssues(parsed.error.issues)}`)] };
  }
  const errors = validateTopology(parsed.data);
  return errors.length > 0 ? { errors } : { setup: parsed.data, errors };
}

// ---- Queries ----

export function capabilitiesOf(device: DeviceDescriptor): DeviceCapabilities {
  return { ...DEVICE_CAPABILITIES[device.deviceClass], ...device.capabilities };
}

export function channelKey(line: LogicalSignalLine): string {
  return `${line.device}/${line.direction}${line.port}`;
}

/** Cross-reference checks the schema cannot express. */
export function validateTopology(setup: DeviceSetup): StructureError[] {
  const errors: StructureError[] = [];
  const devices = new Set<string>();
  for (const d of setup.devices) {
    if (devices.has(d.uid)) errors.push(new StructureError(`Duplicate device uid '${d.uid}'`, { nodeId: d.uid }));
    devices.add(d.uid);
  }
  const lines = new Set<string>();
  for (const line of setup.lines) {
    if (lines.has(line.path)) errors.push(new StructureError(`Duplicate signal line '${line.path}'`, { nodeId: line.path }));
    lines.add(line.path);
    if (!devices.has(line.device)) {
      errors.push(new StructureError(`Signal line '${line.path}' refers to unknown device '${line.device}'`, { nodeId: line.path }));
    }
  }
  for (const [path, calibration] of Object.entries(setup.calibration)) {
    const line = setup.lines.find(l => l.path === path);
    if (!line) {
      errors.push(new StructureError(`Calibration for unknown signal line '${path}'`, { nodeId: path }));
    } else if (calibration.precompensation && line.direction !== LineDirection.OUT) {
      errors.push(new StructureError(`Precompensation on input line '${path}'`, { nodeId: path }));
    }
  }
  return errors;
}
