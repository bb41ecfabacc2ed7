/**
 * Feedback resolver: binds every match to the acquisition that feeds it and
 * fixes the acquire-to-branch delay.
 *
 * A match binds to the last acquire with its handle that precedes it in tree
 * order and runs in the same real-time pass (the acquire's enclosing loops
 * are a prefix of the match's). The path is local when the acquiring unit is
 * also the only playback unit, global otherwise; global feedback is routed
 * through the synchronization hub and has the larger latency floor.
 */
import { secondsToTiny } from '../constants';
import {
  AmbiguousCaseError,
  SchedulingConflictError,
  StructureError,
  UnknownHandleError,
  UnsupportedConstructError,
} from '../errors';
import type { CompilerError } from '../errors';
import { AcquisitionType, isOperation, walk } from '../experiment/ir';
import type { AcquireLoopNode, MatchNode, SectionLike } from '../experiment/ir';
import type { ResolvedExperiment, ResolvedOperation } from '../setup/resolver';
import type { CompilerSettings } from '../settings';
import type { CompileWarning } from '../types';

export type FeedbackPath = 'local' | 'global';

export interface FeedbackBinding {
  match: string;
  handle: string;
  /** Uid of the acquire operation producing the decision */
  acquire: string;
  acquireDevice: string;
  playbackDevices: string[];
  path: FeedbackPath;
  /** Declared delay in tiny samples */
  declaredDelay?: number;
  /** Latency floor of the path in tiny samples */
  minimumDelay: number;
  /** Effective acquire-end to branch delay in tiny samples */
  delay: number;
  clamped: boolean;
  /** Full discrimination alphabet */
  states: number[];
  /** States without a declared case; they get an empty branch */
  emptyStates: number[];
  /** Synchronization marker carrying the state through the hub (global path only) */
  marker?: number;
}

export interface FeedbackResult {
  bindings: Map<string, FeedbackBinding>;
  errors: CompilerError[];
  warnings: CompileWarning[];
}

interface SeenAcquire {
  op: ResolvedOperation;
  chain: readonly string[];
}

function loopChain(ancestors: readonly SectionLike<ResolvedOperation>[]): string[] {
  return ancestors.filter(a => a.kind === 'sweep' || a.kind === 'acquire_loop_rt').map(a => a.uid);
}

function isPrefix(prefix: readonly string[], chain: readonly string[]): boolean {
  return prefix.length <= chain.length && prefix.every((uid, i) => chain[i] === uid);
}

function playbackDevices(match: MatchNode<ResolvedOperation>): string[] {
  const devices = new Set<string>();
  for (const c of match.children) {
    walk(c, n => {
      if (isOperation(n)) devices.add(n.device);
    });
  }
  return [...devices].sort();
}

export function resolveFeedback(resolved: ResolvedExperiment, settings: CompilerSettings): FeedbackResult {
  const bindings = new Map<string, FeedbackBinding>();
  const errors: CompilerError[] = [];
  const warnings: CompileWarning[] = [];
  const seen: SeenAcquire[] = [];
  let nextMarker = 1;

  walk(resolved.experiment.root, (node, ancestors) => {
    if (isOperation(node)) {
      if (node.kind === 'acquire') seen.push({ op: node, chain: loopChain(ancestors) });
      return;
    }
    if (node.kind !== 'match') return;

    const loops = ancestors.filter((a): a is AcquireLoopNode<ResolvedOperation> => a.kind === 'acquire_loop_rt');
    if (loops.length !== 1) {
      errors.push(new StructureError(`Match '${node.uid}' must be nested in exactly one real-time acquisition loop`, { nodeId: node.uid }));
      return;
    }
    const rtLoop = loops[0];
    const chain = loopChain(ancestors);

    let source: SeenAcquire | undefined;
    for (let i = seen.length - 1; i >= 0; i--) {
      const candidate = seen[i];
      if (candidate.op.kind === 'acquire' && candidate.op.handle === node.handle && isPrefix(candidate.chain, chain)) {
        source = candidate;
        break;
      }
    }
    if (!source) {
      const elsewhere = seen.some(s => s.op.kind === 'acquire' && s.op.handle === node.handle);
      errors.push(new UnknownHandleError(
        elsewhere
          ? `Handle '${node.handle}' of match '${node.uid}' is not acquired earlier in the same real-time pass`
          : `Handle '${node.handle}' of match '${node.uid}' is never acquired before it`,
        { nodeId: node.uid },
      ));
      return;
    }

    if (rtLoop.acquisitionType !== AcquisitionType.INTEGRATION && rtLoop.acquisitionType !== AcquisitionType.DISCRIMINATION) {
      errors.push(new UnsupportedConstructError(
        `Match '${node.uid}' needs discriminated results, but the acquisition type is ${rtLoop.acquisitionType}`,
        { nodeId: node.uid },
      ));
      return;
    }

    const signal = resolved.signals.get(source.op.signal);
    const states = signal?.states ?? [];
    if (states.length === 0) {
      errors.push(new UnsupportedConstructError(
        `Signal '${source.op.signal}' acquired for match '${node.uid}' has no discrimination threshold`,
        { nodeId: node.uid },
      ));
      return;
    }

    const declared = new Set<number>();
    for (const c of node.children) {
      if (declared.has(c.state)) {
        errors.push(new AmbiguousCaseError(`Match '${node.uid}' declares state ${c.state} twice`, { nodeId: c.uid }));
      } else if (!states.includes(c.state)) {
        errors.push(new AmbiguousCaseError(
          `Case '${c.uid}' state ${c.state} is outside the discrimination alphabet [${states.join(', ')}]`,
          { nodeId: c.uid },
        ));
      }
      declared.add(c.state);
    }

    const acquireDevice = source.op.device;
    const playback = playbackDevices(node);
    const sameUnit = playback.every(d => d === acquireDevice);
    let path: FeedbackPath = (node.local ?? sameUnit) ? 'local' : 'global';
    if (node.local === true && !sameUnit) {
      errors.push(new UnsupportedConstructError(
        `Match '${node.uid}' requests local feedback but plays on ${playback.filter(d => d !== acquireDevice).join(', ')}, not on '${acquireDevice}'`,
        { nodeId: node.uid },
      ));
      path = 'global';
    }
    for (const uid of [acquireDevice, ...playback]) {
      const device = resolved.devices.get(uid);
      if (device && !device.capabilities.feedback) {
        errors.push(new UnsupportedConstructError(`Device '${uid}' (${device.deviceClass}) cannot take part in feedback`, { nodeId: node.uid }));
      }
    }
    if (path === 'global' && !resolved.hub) {
      errors.push(new UnsupportedConstructError(
        `Match '${node.uid}' needs the global feedback path, which requires a synchronization hub`,
        { nodeId: node.uid },
      ));
    }

    const minimumDelay = secondsToTiny(path === 'local' ? settings.feedbackLatencyLocal : settings.feedbackLatencyGlobal);
    const declaredDelay = node.feedbackDelay === undefined ? undefined : secondsToTiny(node.feedbackDelay);
    const clamped = declaredDelay !== undefined && declaredDelay < minimumDelay;
    if (clamped) {
      const message = `Feedback delay ${node.feedbackDelay}s of match '${node.uid}' is below the ${path} latency floor ` +
        `${path === 'local' ? settings.feedbackLatencyLocal : settings.feedbackLatencyGlobal}s`;
      if (settings.strictFeedbackLatency) {
        errors.push(new SchedulingConflictError(message, { nodeId: node.uid }));
      } else {
        warnings.push({ code: 'feedback_latency_clamped', nodeId: node.uid, message: `${message}; clamped to the floor` });
      }
    }

    bindings.set(node.uid, {
      match: node.uid,
      handle: node.handle,
      acquire: source.op.uid,
      acquireDevice,
      playbackDevices: playback,
      path,
      declaredDelay,
      minimumDelay,
      delay: Math.max(declaredDelay ?? 0, minimumDelay),
      clamped,
      states,
      emptyStates: states.filter(s => !declared.has(s)),
      marker: path === 'global' ? nextMarker++ : undefined,
    });
  });

  return { bindings, errors, warnings };
}
