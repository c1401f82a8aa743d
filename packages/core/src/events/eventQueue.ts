/**
 * packages/core/src/events/eventQueue.ts — FIFO input queue with coalescing.
 *
 * Why: Pointer motion arrives far faster than frames. Collapsing redundant
 * motion at post time keeps the queue short without reordering anything
 * a widget could observe.
 *
 * Coalescing policies, configurable per event kind:
 *   - replace: the newer event takes the queued one's place
 *   - merge: wheel deltas are summed, position taken from the newer event
 *   - none: never coalesces
 * By default pointerMove replaces, wheel merges, and nothing else coalesces.
 *
 * The search walks back from the tail over at most `maxEvents` entries
 * whose timestamp lies within `maxAgeMs` of the new event. It stops at the
 * first same-class entry of a different kind or target, so a move never
 * jumps ahead of a press, a release or motion over another widget.
 */

import type { WidgetId } from "../tree/types.js";
import {
  type CoalescePolicy,
  type InputEvent,
  type InputEventKind,
  type WheelInput,
  eventClassOf,
} from "./types.js";

export type CoalescePolicyTable = Readonly<Record<InputEventKind, CoalescePolicy>>;

export type CoalesceWindow = Readonly<{ maxEvents: number; maxAgeMs: number }>;

export type QueuedEvent = Readonly<{
  event: InputEvent;
  /** Target resolved at post time; only compared between coalescing candidates. */
  coalesceTarget: WidgetId | null;
}>;

export type PushResult = "queued" | "coalesced";

/** Head compaction threshold. */
const COMPACT_AT = 64;

export function mergeWheel(older: WheelInput, newer: WheelInput): WheelInput {
  return Object.freeze({
    ...newer,
    deltaX: older.deltaX + newer.deltaX,
    deltaY: older.deltaY + newer.deltaY,
  });
}

function combine(older: InputEvent, newer: InputEvent, policy: CoalescePolicy): InputEvent {
  if (policy === "merge" && older.kind === "wheel" && newer.kind === "wheel") {
    return mergeWheel(older, newer);
  }
  return newer;
}

export class EventQueue {
  private items: QueuedEvent[] = [];
  private head = 0;

  constructor(
    private readonly window: CoalesceWindow,
    private readonly policies: CoalescePolicyTable,
  ) {}

  policyOf(kind: InputEventKind): CoalescePolicy {
    return this.policies[kind];
  }

  get length(): number {
    return this.items.length - this.head;
  }

  push(event: InputEvent, coalesceTarget: WidgetId | null): PushResult {
    const at = this.findCoalescible(event, coalesceTarget);
    if (at >= 0) {
      const queued = this.items[at];
      if (queued !== undefined) {
        this.items[at] = Object.freeze({
          event: combine(queued.event, event, this.policyOf(event.kind)),
          coalesceTarget,
        });
        return "coalesced";
      }
    }
    this.items.push(Object.freeze({ event, coalesceTarget }));
    return "queued";
  }

  shift(): QueuedEvent | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head++;
    if (this.head >= this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_AT && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  peek(): QueuedEvent | undefined {
    return this.items[this.head];
  }

  /** Pending events in processing order. */
  toArray(): InputEvent[] {
    const out: InputEvent[] = [];
    for (let i = this.head; i < this.items.length; i++) {
      const item = this.items[i];
      if (item !== undefined) out.push(item.event);
    }
    return out;
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  private findCoalescible(event: InputEvent, target: WidgetId | null): number {
    if (this.policyOf(event.kind) === "none") return -1;
    const cls = eventClassOf(event);
    const stop = Math.max(this.head, this.items.length - this.window.maxEvents);
    for (let i = this.items.length - 1; i >= stop; i--) {
      const queued = this.items[i];
      if (queued === undefined) break;
      if (event.timeMs - queued.event.timeMs > this.window.maxAgeMs) break;
      if (eventClassOf(queued.event) !== cls) continue;
      if (queued.event.kind === event.kind && queued.coalesceTarget === target) return i;
      break;
    }
    return -1;
  }
}
