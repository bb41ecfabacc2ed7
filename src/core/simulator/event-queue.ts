/**
 * Sorted event queue backed by a pool-allocated linked list.
 *
 * Events are sorted by time (ascending); events at equal times leave in the
 * order they were enqueued. O(1) dequeue from head, O(n) insertion scan but
 * no array shifting. The pool doubles when it runs out of nodes.
 */

export const EVT_DEVICE = 0;
export const EVT_MARKER = 1;

const NIL = -1; // sentinel for "no node"

export interface EventQueue {
  // Pool storage: parallel arrays indexed by pool slot
  times: Float64Array;
  types: Uint8Array;
  payloads: Uint32Array;
  next: Int32Array;     // next pointer (-1 = end)

  head: number;         // index of first (soonest) event, or NIL
  tail: number;         // index of last event, or NIL
  freeHead: number;     // head of free list, or NIL
}

function linkFree(next: Int32Array, from: number): void {
  for (let i = from; i < next.length - 1; i++) next[i] = i + 1;
  next[next.length - 1] = NIL;
}

export function createEventQueue(capacity = 64): EventQueue {
  const next = new Int32Array(capacity);
  linkFree(next, 0);
  return {
    times: new Float64Array(capacity),
    types: new Uint8Array(capacity),
    payloads: new Uint32Array(capacity),
    next,
    head: NIL,
    tail: NIL,
    freeHead: 0,
  };
}

function grow(q: EventQueue): void {
  const size = q.next.length;
  const times = new Float64Array(size * 2);
  const types = new Uint8Array(size * 2);
  const payloads = new Uint32Array(size * 2);
  const next = new Int32Array(size * 2);
  times.set(q.times);
  types.set(q.types);
  payloads.set(q.payloads);
  next.set(q.next);
  linkFree(next, size);
  q.times = times;
  q.types = types;
  q.payloads = payloads;
  q.next = next;
  q.freeHead = size;
}

/** Allocate a node from the free list. */
function alloc(q: EventQueue): number {
  if (q.freeHead === NIL) grow(q);
  const idx = q.freeHead;
  q.freeHead = q.next[idx];
  return idx;
}

/** Return a node to the free list. */
function free(q: EventQueue, idx: number): void {
  q.next[idx] = q.freeHead;
  q.freeHead = idx;
}

/**
 * Enqueue an event at `time` after every event at the same or an earlier time.
 */
export function enqueue(q: EventQueue, time: number, type: number, payload: number): void {
  const slot = alloc(q);
  q.times[slot] = time;
  q.types[slot] = type;
  q.payloads[slot] = payload;

  if (q.head === NIL) {
    q.next[slot] = NIL;
    q.head = slot;
    q.tail = slot;
    return;
  }
  if (time < q.times[q.head]) {
    q.next[slot] = q.head;
    q.head = slot;
    return;
  }
  // Common case: appending in time order
  if (time >= q.times[q.tail]) {
    q.next[slot] = NIL;
    q.next[q.tail] = slot;
    q.tail = slot;
    return;
  }

  // Scan for insertion point: after the last node with times[cur] <= time
  let prev = q.head;
  let cur = q.next[prev];
  while (cur !== NIL && q.times[cur] <= time) {
    prev = cur;
    cur = q.next[cur];
  }
  q.next[slot] = cur;
  q.next[prev] = slot;
}

/**
 * Peek at the head event time. Returns Infinity if empty.
 */
export function peekTime(q: EventQueue): number {
  return q.head === NIL ? Infinity : q.times[q.head];
}

/**
 * Dequeue the soonest event. Returns false if empty.
 * Writes result into the provided out object to avoid allocation.
 */
export function dequeue(
  q: EventQueue,
  out: { time: number; type: number; payload: number },
): boolean {
  if (q.head === NIL) return false;
  const idx = q.head;
  out.time = q.times[idx];
  out.type = q.types[idx];
  out.payload = q.payloads[idx];
  q.head = q.next[idx];
  if (q.head === NIL) q.tail = NIL;
  free(q, idx);
  return true;
}

/** Clear all events and reset the free list. */
export function clearQueue(q: EventQueue): void {
  linkFree(q.next, 0);
  q.head = NIL;
  q.tail = NIL;
  q.freeHead = 0;
}
