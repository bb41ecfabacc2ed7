import { describe, it, expect } from 'vitest';
import { EVT_DEVICE, EVT_MARKER, clearQueue, createEventQueue, dequeue, enqueue, peekTime } from './event-queue';
import type { EventQueue } from './event-queue';

function drain(q: EventQueue): [number, number, number][] {
  const out = { time: 0, type: 0, payload: 0 };
  const events: [number, number, number][] = [];
  while (dequeue(q, out)) events.push([out.time, out.type, out.payload]);
  return events;
}

describe('EventQueue', () => {
  it('orders by time and keeps arrival order on ties', () => {
    const q = createEventQueue();
    enqueue(q, 5, EVT_DEVICE, 1);
    enqueue(q, 3, EVT_DEVICE, 2);
    enqueue(q, 5, EVT_DEVICE, 3);
    enqueue(q, 4, EVT_MARKER, 4);
    enqueue(q, 3, EVT_MARKER, 5);
    expect(drain(q)).toEqual([
      [3, EVT_DEVICE, 2],
      [3, EVT_MARKER, 5],
      [4, EVT_MARKER, 4],
      [5, EVT_DEVICE, 1],
      [5, EVT_DEVICE, 3],
    ]);
  });

  it('grows past its initial capacity', () => {
    const q = createEventQueue(2);
    for (let i = 0; i < 5; i++) enqueue(q, 10 - i, EVT_DEVICE, i);
    expect(drain(q).map(e => e[2])).toEqual([4, 3, 2, 1, 0]);
  });

  it('reports Infinity when empty and can be cleared', () => {
    const q = createEventQueue();
    expect(peekTime(q)).toBe(Infinity);
    enqueue(q, 7, EVT_DEVICE, 0);
    expect(peekTime(q)).toBe(7);
    clearQueue(q);
    expect(peekTime(q)).toBe(Infinity);
    enqueue(q, 2, EVT_DEVICE, 9);
    expect(drain(q)).toEqual([[2, EVT_DEVICE, 9]]);
  });
});
