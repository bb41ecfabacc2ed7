/**
 * Signal & calibration resolver.
 *
 * Maps every experiment signal used by the tree onto its logical signal line,
 * merges the line's calibration with the experiment's overrides, allocates
 * hardware oscillators and checks each operation against the capability
 * flags of the device it lands on, then balances the output delays that
 * precompensation filters introduce. The output tree carries the line and
 * device on every operation.
 */
import { stableStringify } from '../canonical';
import { secondsToTiny, tinyPerSample } from '../constants';
import type { DeviceCapabilities, DeviceClass } from '../constants';
import {
  StructureError,
  UnmappedSignalError,
  UnsupportedConstructError,
  collectErrors,
} from '../errors';
import type { CompilerError } from '../errors';
import { ModulationType, isOperation, mapRoot, walk } from '../experiment/ir';
import type { Experiment, Operation } from '../experiment/ir';
import type { ParameterValue } from '../experiment/parameter';
import { lcmAll } from '../scheduler/grid';
import type { CompileWarning } from '../types';
import {
  adaptSequencerFilters,
  balanceDelays,
  checkFilterRanges,
  hasFilters,
  precompensationDelaySamples,
} from './precompensation';
import type { SequencerSignal } from './precompensation';
import { LineDirection, capabilitiesOf, channelKey, validateTopology } from './topology';
import type { CalibrationRecord, DeviceSetup, LogicalSignalLine, Precompensation } from './topology';

export type ParameterScope = 'near_time' | 'real_time';

export interface ResolvedOscillator {
  uid: string;
  frequency: ParameterValue;
  modulation: ModulationType;
  /** Hardware oscillator slot on the device */
  index?: number;
}

export interface ResolvedCalibration {
  oscillator?: ResolvedOscillator;
  localOscillatorFrequency?: ParameterValue;
  /** Port delay in tiny samples */
  portDelay: number;
  range?: number;
  /** Ascending discrimination thresholds */
  thresholds: number[];
}

/** Filters as programmed on the port, padded to match the other ports of the sequencer */
export interface ResolvedPrecompensation extends Precompensation {
  /** Latency of the filters in samples */
  delaySamples: number;
}

export interface ResolvedSignal {
  signal: string;
  line: string;
  device: string;
  port: number;
  direction: LineDirection;
  channel: string;
  calibration: ResolvedCalibration;
  /** Discrimination alphabet: k thresholds give states 0..k */
  states: number[];
  precompensation?: ResolvedPrecompensation;
}

export interface ResolvedDevice {
  uid: string;
  deviceClass: DeviceClass;
  capabilities: DeviceCapabilities;
  tinyPerSample: number;
  /** Playback granularity in tiny samples */
  grid: number;
  signals: string[];
  /** Hardware oscillator uids by slot */
  oscillators: string[];
  /** A hardware oscillator on this device has its frequency swept in real time */
  hardwareSweptOscillator: boolean;
  /** Tiny samples the whole program waits after the start trigger, to line up precompensated outputs */
  startDelay: number;
}

export type ResolvedOperation = Operation & { readonly line: string; readonly device: string };

export interface ResolvedExperiment {
  experiment: Experiment<ResolvedOperation>;
  signals: ReadonlyMap<string, ResolvedSignal>;
  /** Participating instruments with channels, in topology order */
  devices: ReadonlyMap<string, ResolvedDevice>;
  /** Synchronization hub, present when more than one instrument takes part */
  hub?: ResolvedDevice;
  /** Emits the start trigger when there is no hub */
  leader: string;
  systemGrid: number;
  parameterScope: ReadonlyMap<string, ParameterScope>;
}

export interface ResolveResult {
  result?: ResolvedExperiment;
  errors: CompilerError[];
  warnings: CompileWarning[];
}

/**
 * Pads the filters per sequencer, then delays every signal so that all
 * outputs line up behind the slowest filter chain. The part common to a
 * device becomes its start delay; the rest goes into the port delay.
 */
function compensateFilterDelays(
  signals: ReadonlyMap<string, ResolvedSignal>,
  devices: ReadonlyMap<string, ResolvedDevice>,
  lineFilters: ReadonlyMap<string, Precompensation | undefined>,
  systemGrid: number,
): void {
  const bySequencer = new Map<string, SequencerSignal[]>();
  for (const rs of signals.values()) {
    const device = devices.get(rs.device);
    if (!device || rs.direction !== LineDirection.OUT) continue;
    const key = `${rs.device}/${Math.floor(rs.port / device.capabilities.channelsPerAwg)}`;
    bySequencer.set(key, [...(bySequencer.get(key) ?? []), { signal: rs.signal, filters: lineFilters.get(rs.signal) }]);
  }
  const filters = new Map<string, Precompensation | undefined>();
  for (const group of bySequencer.values()) {
    for (const [signal, f] of adaptSequencerFilters(group)) filters.set(signal, f);
  }
  if (![...filters.values()].some(f => hasFilters(f))) return;

  const timings = [...signals.values()].flatMap(rs => {
    const device = devices.get(rs.device);
    if (!device) return [];
    return [{
      signal: rs.signal,
      tinyPerSample: device.tinyPerSample,
      sampleMultiple: device.capabilities.sampleMultiple,
      delaySamples: precompensationDelaySamples(filters.get(rs.signal)),
    }];
  });
  const compensation = balanceDelays(timings, systemGrid);

  for (const device of devices.values()) {
    const delays = device.signals.map(uid => compensation.get(uid)?.signalDelay ?? 0);
    device.startDelay = delays.length > 0 ? Math.min(...delays) : 0;
  }
  for (const rs of signals.values()) {
    const device = devices.get(rs.device);
    const c = compensation.get(rs.signal);
    if (!device || !c) continue;
    rs.calibration.portDelay += c.portDelay + c.signalDelay - device.startDelay;
    const f = filters.get(rs.signal);
    if (hasFilters(f)) rs.precompensation = { ...f, delaySamples: precompensationDelaySamples(f) };
  }
}

/** Near-time or real-time scope of every swept parameter. */
export function parameterScopes(experiment: Experiment): Map<string, ParameterScope> {
  const scopes = new Map<string, ParameterScope>();
  walk(experiment.root, (node, ancestors) => {
    if (node.kind !== 'sweep') return;
    const rt = ancestors.some(a => a.kind === 'acquire_loop_rt');
    for (const p of node.parameters) scopes.set(p, rt ? 'real_time' : 'near_time');
  });
  return scopes;
}

function mergeCalibration(base: CalibrationRecord | undefined, override: CalibrationRecord | undefined): CalibrationRecord {
  return {
    oscillator: override?.oscillator ?? base?.oscillator,
    localOscillatorFrequency: override?.localOscillatorFrequency ?? base?.localOscillatorFrequency,
    portDelay: override?.portDelay ?? base?.portDelay,
    range: override?.range ?? base?.range,
    threshold: override?.threshold ?? base?.threshold,
    precompensation: base?.precompensation,
  };
}

function thresholdsOf(threshold: number | readonly number[] | undefined): number[] {
  if (threshold === undefined) return [];
  const list = typeof threshold === 'number' ? [threshold] : [...threshold];
  return list.sort((a, b) => a - b);
}

export function resolveSignals(experiment: Experiment, setup: DeviceSetup): ResolveResult {
  const errors: CompilerError[] = [...validateTopology(setup)];
  const warnings: CompileWarning[] = [];
  if (errors.length > 0) return { errors, warnings };

  const linesByPath = new Map(setup.lines.map(l => [l.path, l]));
  const descriptors = new Map(setup.devices.map(d => [d.uid, d]));
  const scopes = parameterScopes(experiment);

  // Signals in order of first use, with the node that first used them
  const firstUse = new Map<string, string>();
  walk(experiment.root, node => {
    if (isOperation(node)) {
      if (!firstUse.has(node.signal)) firstUse.set(node.signal, node.uid);
    } else {
      for (const s of Object.keys(node.trigger)) if (!firstUse.has(s)) firstUse.set(s, node.uid);
    }
  });

  const lineOf = new Map<string, LogicalSignalLine>();
  for (const [signal, nodeId] of firstUse) {
    const path = setup.signalMap[signal];
    if (path === undefined) {
      errors.push(new UnmappedSignalError(`Experiment signal '${signal}' has no entry in the signal map`, { nodeId }));
      continue;
    }
    const line = linesByPath.get(path);
    if (!line) {
      errors.push(new UnmappedSignalError(`Experiment signal '${signal}' maps to unknown signal line '${path}'`, { nodeId }));
      continue;
    }
    lineOf.set(signal, line);
  }
  if (errors.length > 0) return { errors, warnings };

  // ---- Devices ----

  const deviceOrder = setup.devices.map(d => d.uid).filter(uid => [...lineOf.values()].some(l => l.device === uid));
  const devices = new Map<string, ResolvedDevice>();
  for (const uid of deviceOrder) {
    const descriptor = descriptors.get(uid);
    if (!descriptor) continue;
    const capabilities = capabilitiesOf(descriptor);
    const tps = tinyPerSample(capabilities.samplingRate);
    if (tps === undefined) {
      errors.push(new UnsupportedConstructError(
        `Sampling rate ${capabilities.samplingRate} Hz of '${uid}' does not divide the tiny-sample clock`,
        { nodeId: uid },
      ));
      continue;
    }
    devices.set(uid, {
      uid,
      deviceClass: descriptor.deviceClass,
      capabilities,
      tinyPerSample: tps,
      grid: capabilities.sampleMultiple * tps,
      signals: [],
      oscillators: [],
      hardwareSweptOscillator: false,
      startDelay: 0,
    });
  }

  // ---- Calibration and oscillators ----

  const signals = new Map<string, ResolvedSignal>();
  const lineFilters = new Map<string, Precompensation | undefined>();
  const oscillatorOwner = new Map<string, { device: string; frequency: ParameterValue; signal: string }>();
  for (const [signal, line] of lineOf) {
    const device = devices.get(line.device);
    if (!device) continue;
    const nodeId = firstUse.get(signal);
    const merged = mergeCalibration(setup.calibration[line.path], experiment.signalCalibration[signal]);

    for (const value of [merged.oscillator?.frequency, merged.localOscillatorFrequency]) {
      if (value !== undefined && typeof value !== 'number' && !experiment.parameters.has(value.uid)) {
        errors.push(new StructureError(`Calibration of '${signal}' refers to unknown parameter '${value.uid}'`, { nodeId }));
      }
    }
    const lo = merged.localOscillatorFrequency;
    if (lo !== undefined && typeof lo !== 'number' && scopes.get(lo.uid) === 'real_time') {
      errors.push(new UnsupportedConstructError(
        `Local oscillator frequency of '${signal}' cannot be swept in real time`,
        { nodeId },
      ));
    }

    let oscillator: ResolvedOscillator | undefined;
    if (merged.oscillator) {
      const osc = merged.oscillator;
      oscillator = { uid: osc.uid, frequency: osc.frequency, modulation: osc.modulation };
      const rtSwept = typeof osc.frequency !== 'number' && scopes.get(osc.frequency.uid) === 'real_time';
      const owner = oscillatorOwner.get(osc.uid);
      if (owner && owner.device !== device.uid) {
        errors.push(new UnsupportedConstructError(
          `Oscillator '${osc.uid}' is shared between devices '${owner.device}' and '${device.uid}'`,
          { nodeId },
        ));
      } else if (owner && stableStringify(owner.frequency) !== stableStringify(osc.frequency)) {
        errors.push(new StructureError(`Oscillator '${osc.uid}' has two different frequencies`, { nodeId }));
      } else if (owner) {
        warnings.push({
          code: 'oscillator_shared',
          nodeId: osc.uid,
          message: `Oscillator '${osc.uid}' is shared by signals '${owner.signal}' and '${signal}'`,
        });
      }
      if (!owner) oscillatorOwner.set(osc.uid, { device: device.uid, frequency: osc.frequency, signal });

      if (osc.modulation === ModulationType.HARDWARE) {
        let index = device.oscillators.indexOf(osc.uid);
        if (index < 0) {
          device.oscillators.push(osc.uid);
          index = device.oscillators.length - 1;
          if (device.oscillators.length > device.capabilities.hardwareOscillators) {
            errors.push(new UnsupportedConstructError(
              `Device '${device.uid}' (${device.deviceClass}) has ${device.capabilities.hardwareOscillators} hardware oscillators, ` +
              `oscillator '${osc.uid}' would be number ${device.oscillators.length}`,
              { nodeId },
            ));
          }
        }
        oscillator.index = index;
        if (rtSwept) {
          if (!device.capabilities.realtimeParameterSweep) {
            errors.push(new UnsupportedConstructError(
              `Device '${device.uid}' (${device.deviceClass}) cannot sweep oscillator frequencies in real time`,
              { nodeId },
            ));
          }
          device.hardwareSweptOscillator = true;
        }
      } else if (rtSwept) {
        errors.push(new UnsupportedConstructError(
          `Software oscillator '${osc.uid}' on '${signal}' cannot be swept in real time; use hardware modulation`,
          { nodeId },
        ));
      }
    }

    if (hasFilters(merged.precompensation)) warnings.push(...checkFilterRanges(signal, merged.precompensation));
    lineFilters.set(signal, merged.precompensation);

    const thresholds = thresholdsOf(merged.threshold);
    device.signals.push(signal);
    signals.set(signal, {
      signal,
      line: line.path,
      device: device.uid,
      port: line.port,
      direction: line.direction,
      channel: channelKey(line),
      calibration: {
        oscillator,
        localOscillatorFrequency: lo,
        portDelay: secondsToTiny(merged.portDelay ?? 0),
        range: merged.range,
        thresholds,
      },
      states: thresholds.length === 0 ? [] : Array.from({ length: thresholds.length + 1 }, (_, i) => i),
    });
  }

  // ---- Operation capability checks ----

  walk(experiment.root, node => {
    if (isOperation(node)) {
      const rs = signals.get(node.signal);
      const device = rs && devices.get(rs.device);
      if (!rs || !device) return;
      if (node.kind === 'play') {
        if (rs.direction !== LineDirection.OUT) {
          errors.push(new UnsupportedConstructError(`Play '${node.uid}' targets input line '${rs.line}'`, { nodeId: node.uid }));
        } else if (!device.capabilities.output) {
          errors.push(new UnsupportedConstructError(`Device '${device.uid}' has no outputs for play '${node.uid}'`, { nodeId: node.uid }));
        }
      } else if (node.kind === 'acquire') {
        if (rs.direction !== LineDirection.IN) {
          errors.push(new UnsupportedConstructError(`Acquire '${node.uid}' targets output line '${rs.line}'`, { nodeId: node.uid }));
        } else if (!device.capabilities.acquisition) {
          errors.push(new UnsupportedConstructError(
            `Device '${device.uid}' (${device.deviceClass}) cannot acquire`,
            { nodeId: node.uid },
          ));
        }
      }
    } else {
      for (const s of Object.keys(node.trigger)) {
        const rs = signals.get(s);
        if (rs && rs.direction !== LineDirection.OUT) {
          errors.push(new UnsupportedConstructError(`Trigger of '${node.uid}' targets input line '${rs.line}'`, { nodeId: node.uid }));
        }
      }
    }
  });

  if (errors.length > 0) return { errors, warnings };

  // ---- Hub, leader, system grid ----

  let hub: ResolvedDevice | undefined;
  if (devices.size > 1) {
    const hubDescriptor = setup.devices.find(d => capabilitiesOf(d).syncHub);
    if (hubDescriptor) {
      const capabilities = capabilitiesOf(hubDescriptor);
      const tps = tinyPerSample(capabilities.samplingRate) ?? 1;
      hub = {
        uid: hubDescriptor.uid,
        deviceClass: hubDescriptor.deviceClass,
        capabilities,
        tinyPerSample: tps,
        grid: capabilities.sampleMultiple * tps,
        signals: [],
        oscillators: [],
        hardwareSweptOscillator: false,
        startDelay: 0,
      };
    }
  }
  const leader = deviceOrder[0] ?? '';
  const systemGrid = lcmAll([...devices.values()].map(d => d.grid));

  const { errors: precompensationErrors } = collectErrors(
    () => compensateFilterDelays(signals, devices, lineFilters, systemGrid),
  );
  if (precompensationErrors.length > 0) return { errors: precompensationErrors, warnings };

  const root = mapRoot<Operation, ResolvedOperation>(experiment.root, op => {
    const rs = signals.get(op.signal);
    return Object.freeze({ ...op, line: rs?.line ?? '', device: rs?.device ?? '' });
  });

  return {
    result: {
      experiment: { ...experiment, root },
      signals,
      devices,
      hub,
      leader,
      systemGrid,
      parameterScope: scopes,
    },
    errors,
    warnings,
  };
}
