/**
 * Device program simulator: runs the real-time programs of one near-time step
 * on every device against a shared tiny-sample clock and records what each
 * device does and when.
 *
 * Devices advance only through `wait`. A device blocked on a synchronization
 * marker sleeps until it is delivered. A marker the hub relays reaches the
 * devices of the relay, the emitter included; any other marker reaches every
 * other device. Each delivery carries the emitter's latest discriminated state
 * per handle.
 * Acquisition outcomes come from a caller-supplied state oracle.
 */
import { START_MARKER, tinyPerSample } from '../constants';
import type { DeviceProgram, Instruction } from '../types';
import {
  EVT_DEVICE,
  EVT_MARKER,
  clearQueue,
  createEventQueue,
  dequeue,
  enqueue,
  peekTime,
} from './event-queue';

export type TraceOp = 'play' | 'acquire' | 'sync' | 'branch' | 'trigger' | 'oscillator' | 'end';

export interface TraceEvent {
  /** Tiny samples */
  time: number;
  device: string;
  op: TraceOp;
  signal?: string;
  waveform?: number;
  /** Command table entry selected for this play */
  commandTable?: number;
  handle?: string;
  state?: number;
  marker?: number;
  mode?: 'emit' | 'await';
  port?: number;
  value?: number;
}

export interface StalledDevice {
  device: string;
  marker: number;
  time: number;
}

export interface SimulationResult {
  events: TraceEvent[];
  /** Devices that reached `end`, with their end time */
  finished: Record<string, number>;
  stalled: StalledDevice[];
}

/** Discriminated state of the n-th acquisition (0-based) of a handle on a device. */
export type StateOracle = (handle: string, occurrence: number, device: string) => number;

export interface SimulationOptions {
  /** Near-time step to run */
  step?: number;
  states?: StateOracle;
  /** Upper bound on executed instructions per device */
  maxInstructions?: number;
}

interface LoopFrame {
  loop: string;
  count: number;
  iteration: number;
}

interface Delivery {
  marker: number;
  time: number;
  from: string;
  states: ReadonlyMap<string, number>;
}

interface DeviceState {
  uid: string;
  index: number;
  tinyPerSample: number;
  instructions: readonly Instruction[];
  pc: number;
  time: number;
  loops: LoopFrame[];
  /** Current iteration of every active loop */
  iterations: Map<string, number>;
  lastState: Map<string, number>;
  occurrences: Map<string, number>;
  /** Markers received and not yet consumed */
  mailbox: Delivery[];
  blockedOn: number | undefined;
  done: boolean;
  executed: number;
}

/** Feedback marker routed by the hub */
interface RelayRoute {
  from: string;
  to: ReadonlySet<string>;
}

const DEFAULT_MAX_INSTRUCTIONS = 1_000_000;

export class ProgramSimulator {
  private readonly devices: DeviceState[];
  private readonly queue = createEventQueue();
  private readonly deliveries: Delivery[] = [];
  private readonly routes = new Map<number, RelayRoute>();
  private readonly events: TraceEvent[] = [];
  private readonly _evt = { time: 0, type: 0, payload: 0 }; // reusable dequeue scratch
  private readonly states: StateOracle;
  private readonly maxInstructions: number;

  constructor(programs: readonly DeviceProgram[], options: SimulationOptions = {}) {
    const step = options.step ?? 0;
    this.states = options.states ?? (() => 0);
    this.maxInstructions = options.maxInstructions ?? DEFAULT_MAX_INSTRUCTIONS;
    this.devices = programs.map((p, index) => {
      const ref = p.nearTimeSteps[step];
      if (!ref) throw new Error(`Device '${p.device}' has no near-time step ${step}`);
      const program = p.programs.find(rt => rt.id === ref.program);
      if (!program) throw new Error(`Device '${p.device}' has no program ${ref.program}`);
      for (const instr of program.instructions) {
        if (instr.op === 'relay') this.routes.set(instr.marker, { from: instr.from, to: new Set(instr.to) });
      }
      return {
        uid: p.device,
        index,
        tinyPerSample: tinyPerSample(p.samplingRate) ?? 1,
        instructions: program.instructions,
        pc: 0,
        time: 0,
        loops: [],
        iterations: new Map(),
        lastState: new Map(),
        occurrences: new Map(),
        mailbox: [],
        blockedOn: undefined,
        done: false,
        executed: 0,
      };
    });
  }

  run(): SimulationResult {
    clearQueue(this.queue);
    for (const d of this.devices) enqueue(this.queue, 0, EVT_DEVICE, d.index);

    const evt = this._evt;
    while (dequeue(this.queue, evt)) {
      if (evt.type === EVT_MARKER) {
        this.deliver(this.deliveries[evt.payload]);
        continue;
      }
      const device = this.devices[evt.payload];
      // Keep executing this device while it is the soonest
      while (!device.done && device.blockedOn === undefined && device.time <= peekTime(this.queue)) {
        this.execute(device);
      }
      if (!device.done && device.blockedOn === undefined) {
        enqueue(this.queue, device.time, EVT_DEVICE, device.index);
      }
    }

    const finished: Record<string, number> = {};
    const stalled: StalledDevice[] = [];
    for (const d of this.devices) {
      if (d.done) finished[d.uid] = d.time;
      else if (d.blockedOn !== undefined) stalled.push({ device: d.uid, marker: d.blockedOn, time: d.time });
    }
    return { events: this.events, finished, stalled };
  }

  // ========================================================================
  // Markers
  // ========================================================================

  private emit(device: DeviceState, marker: number): void {
    this.deliveries.push({ marker, time: device.time, from: device.uid, states: new Map(device.lastState) });
    enqueue(this.queue, device.time, EVT_MARKER, this.deliveries.length - 1);
  }

  private recipients(delivery: Delivery): DeviceState[] {
    const route = this.routes.get(delivery.marker);
    if (route && route.from === delivery.from) return this.devices.filter(d => route.to.has(d.uid));
    return this.devices.filter(d => d.uid !== delivery.from);
  }

  private deliver(delivery: Delivery): void {
    for (const d of this.recipients(delivery)) {
      if (d.done) continue;
      d.mailbox.push(delivery);
      if (d.blockedOn === delivery.marker) {
        d.blockedOn = undefined;
        enqueue(this.queue, Math.max(d.time, delivery.time), EVT_DEVICE, d.index);
      }
    }
  }

  /** Take the oldest pending delivery of a marker, or block until one arrives. */
  private receive(device: DeviceState, marker: number): Delivery | undefined {
    const i = device.mailbox.findIndex(m => m.marker === marker);
    if (i < 0) {
      device.blockedOn = marker;
      return undefined;
    }
    const [delivery] = device.mailbox.splice(i, 1);
    device.time = Math.max(device.time, delivery.time);
    return delivery;
  }

  // ========================================================================
  // Execution
  // ========================================================================

  private record(device: DeviceState, event: Omit<TraceEvent, 'time' | 'device'>): void {
    this.events.push({ time: device.time, device: device.uid, ...event });
  }

  private iterationOf(device: DeviceState, loop: string): number {
    const k = device.iterations.get(loop);
    if (k === undefined) throw new Error(`Device '${device.uid}' selects by loop '${loop}' outside that loop`);
    return k;
  }

  private execute(device: DeviceState): void {
    if (++device.executed > this.maxInstructions) {
      throw new Error(`Device '${device.uid}' exceeded ${this.maxInstructions} instructions`);
    }
    const instr = device.instructions[device.pc];
    if (!instr) throw new Error(`Device '${device.uid}' ran past the end of its program`);
    let next = device.pc + 1;

    switch (instr.op) {
      case 'wait':
        device.time += instr.samples * device.tinyPerSample;
        break;
      case 'play': {
        const ct = instr.commandTable;
        this.record(device, {
          op: 'play',
          signal: instr.signal,
          waveform: instr.waveform,
          commandTable: ct === undefined || typeof ct === 'number' ? ct : ct.entries[this.iterationOf(device, ct.loop)],
        });
        break;
      }
      case 'acquire': {
        const occurrence = device.occurrences.get(instr.handle) ?? 0;
        device.occurrences.set(instr.handle, occurrence + 1);
        const state = this.states(instr.handle, occurrence, device.uid);
        device.lastState.set(instr.handle, state);
        this.record(device, { op: 'acquire', signal: instr.signal, handle: instr.handle, state });
        break;
      }
      case 'loop':
        device.loops.push({ loop: instr.loop, count: instr.count, iteration: 0 });
        device.iterations.set(instr.loop, 0);
        break;
      case 'endLoop': {
        const frame = device.loops[device.loops.length - 1];
        if (!frame || frame.loop !== instr.loop) {
          throw new Error(`Device '${device.uid}' closes loop '${instr.loop}' that is not open`);
        }
        frame.iteration++;
        if (frame.iteration < frame.count) {
          device.iterations.set(frame.loop, frame.iteration);
          next = instr.target;
        } else {
          device.loops.pop();
          device.iterations.delete(frame.loop);
        }
        break;
      }
      case 'sync':
        if (instr.mode === 'emit') {
          this.emit(device, instr.marker);
        } else if (!this.receive(device, instr.marker)) {
          return; // retried when the marker arrives
        }
        this.record(device, { op: 'sync', mode: instr.mode, marker: instr.marker });
        break;
      case 'branch': {
        let state: number | undefined;
        if (instr.source === 'global') {
          const delivery = this.receive(device, instr.marker ?? START_MARKER);
          if (!delivery) return;
          state = delivery.states.get(instr.handle);
        } else {
          state = device.lastState.get(instr.handle);
        }
        if (state === undefined) {
          throw new Error(`Device '${device.uid}' branches on '${instr.handle}' before any acquisition of it`);
        }
        const target = instr.targets[state];
        if (target === undefined) {
          throw new Error(`Device '${device.uid}' has no branch for state ${state} of '${instr.handle}'`);
        }
        this.record(device, { op: 'branch', handle: instr.handle, state });
        next = target;
        break;
      }
      case 'jump':
        next = instr.target;
        break;
      case 'setOscillatorFrequency': {
        const f = instr.frequency;
        this.record(device, {
          op: 'oscillator',
          port: instr.oscillator,
          value: typeof f === 'number' ? f : f.values[this.iterationOf(device, f.loop)],
        });
        break;
      }
      case 'resetOscillatorPhase':
        break;
      case 'setTrigger':
        this.record(device, { op: 'trigger', port: instr.port, value: instr.value });
        break;
      case 'relay':
        // Routes are set up before the run
        break;
      case 'end':
        device.done = true;
        this.record(device, { op: 'end' });
        return;
    }
    device.pc = next;
  }
}

export function simulate(programs: readonly DeviceProgram[], options: SimulationOptions = {}): SimulationResult {
  return new ProgramSimulator(programs, options).run();
}
