/**
 * packages/core/src/config.ts — Core configuration and validation.
 *
 * Every knob has a documented default. Invalid values throw
 * WidgetFlowError("WF_INVALID_CONFIG") at construction time, never mid-frame.
 */

import { WidgetFlowError } from "./errors.js";
import {
  type CoalescePolicy,
  INPUT_EVENT_KINDS,
  type InputEventKind,
  MOD_SHIFT,
  isInputEventKind,
} from "./events/types.js";

export type CoalesceWindowConfig = Readonly<{
  /** Trailing queue entries searched for a collapsible event. 0 disables coalescing. */
  maxEvents?: number;
  /** Maximum timestamp distance between the queued event and the new one. */
  maxAgeMs?: number;
}>;

/** A key name plus the exact modifier mask that must be held with it. */
export type KeyBinding = Readonly<{ key: string; mods?: number }>;

export type FocusKeysConfig = Readonly<{
  next?: readonly KeyBinding[];
  prev?: readonly KeyBinding[];
}>;

export type ResolvedKeyBinding = Readonly<{ key: string; mods: number }>;

export type CoalescePolicyConfig = Readonly<Partial<Record<InputEventKind, CoalescePolicy>>>;

export type CoreConfig = Readonly<{
  /** Default drain budget when drain() is called without one. */
  frameBudgetMs?: number;
  coalesceWindow?: CoalesceWindowConfig;
  /** Per-kind coalescing; kinds left out keep their default policy. */
  coalescePolicy?: CoalescePolicyConfig;
  /** Nested Link.set depth at which change callbacks stop firing. */
  maxLinkReentrancy?: number;
  /** Handler faults retained for inspection. */
  faultLogCapacity?: number;
  /** Move focus to the pressed widget before dispatching pointerDown. */
  focusOnPointerDown?: boolean;
  /** Focus keys (Tab / Shift+Tab by default) move focus instead of being dispatched. */
  tabNavigation?: boolean;
  /** Bindings that move focus; a list given here replaces that direction's default. */
  focusKeys?: FocusKeysConfig;
  /** Log deferred work, dead dependents and dropped events. */
  diagnostics?: boolean;
}>;

export type ResolvedCoreConfig = Readonly<{
  frameBudgetMs: number;
  coalesceWindow: Readonly<{ maxEvents: number; maxAgeMs: number }>;
  coalescePolicy: Readonly<Record<InputEventKind, CoalescePolicy>>;
  maxLinkReentrancy: number;
  faultLogCapacity: number;
  focusOnPointerDown: boolean;
  tabNavigation: boolean;
  focusKeys: Readonly<{
    next: readonly ResolvedKeyBinding[];
    prev: readonly ResolvedKeyBinding[];
  }>;
  diagnostics: boolean;
}>;

/** Default configuration values. */
export const DEFAULT_CORE_CONFIG: ResolvedCoreConfig = Object.freeze({
  frameBudgetMs: 8,
  coalesceWindow: Object.freeze({ maxEvents: 8, maxAgeMs: 50 }),
  coalescePolicy: Object.freeze({
    pointerDown: "none",
    pointerUp: "none",
    pointerMove: "replace",
    wheel: "merge",
    keyDown: "none",
    keyUp: "none",
    text: "none",
  }),
  maxLinkReentrancy: 32,
  faultLogCapacity: 64,
  focusOnPointerDown: true,
  tabNavigation: true,
  focusKeys: Object.freeze({
    next: Object.freeze([Object.freeze({ key: "Tab", mods: 0 })]),
    prev: Object.freeze([Object.freeze({ key: "Tab", mods: MOD_SHIFT })]),
  }),
  diagnostics: false,
});

const COALESCE_POLICIES: readonly CoalescePolicy[] = ["replace", "merge", "none"];

function invalidConfig(detail: string): never {
  throw new WidgetFlowError("WF_INVALID_CONFIG", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidConfig(`${name} must be a positive integer`);
  return v;
}

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidConfig(`${name} must be a non-negative integer`);
  return v;
}

function requireNonNegativeNumber(name: string, v: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
    invalidConfig(`${name} must be a finite number >= 0`);
  }
  return v;
}

function readBoolean(name: string, v: boolean | undefined, fallback: boolean): boolean {
  if (v === undefined) return fallback;
  if (typeof v !== "boolean") invalidConfig(`${name} must be a boolean`);
  return v;
}

function resolveCoalescePolicy(
  config: CoalescePolicyConfig | undefined,
  defaults: ResolvedCoreConfig["coalescePolicy"],
): ResolvedCoreConfig["coalescePolicy"] {
  if (config === undefined) return defaults;
  const out: Record<InputEventKind, CoalescePolicy> = { ...defaults };
  for (const [kind, policy] of Object.entries(config)) {
    if (!isInputEventKind(kind)) {
      invalidConfig(
        `coalescePolicy: unknown event kind "${kind}" (expected one of ` +
          `${INPUT_EVENT_KINDS.join(", ")})`,
      );
    }
    if (policy === undefined) continue;
    if (!COALESCE_POLICIES.includes(policy)) {
      invalidConfig(`coalescePolicy.${kind} must be "replace", "merge" or "none"`);
    }
    out[kind] = policy;
  }
  return Object.freeze(out);
}

function resolveBindings(
  name: string,
  bindings: readonly KeyBinding[] | undefined,
  fallback: readonly ResolvedKeyBinding[],
): readonly ResolvedKeyBinding[] {
  if (bindings === undefined) return fallback;
  return Object.freeze(
    bindings.map((b, i) => {
      if (typeof b.key !== "string" || b.key.length === 0) {
        invalidConfig(`${name}[${String(i)}].key must be a non-empty string`);
      }
      const mods =
        b.mods === undefined ? 0 : requireNonNegativeInt(`${name}[${String(i)}].mods`, b.mods);
      return Object.freeze({ key: b.key, mods });
    }),
  );
}

function resolveFocusKeys(
  config: FocusKeysConfig | undefined,
  defaults: ResolvedCoreConfig["focusKeys"],
): ResolvedCoreConfig["focusKeys"] {
  if (config === undefined) return defaults;
  const next = resolveBindings("focusKeys.next", config.next, defaults.next);
  const prev = resolveBindings("focusKeys.prev", config.prev, defaults.prev);
  for (const a of next) {
    if (prev.some((b) => b.key === a.key && b.mods === a.mods)) {
      invalidConfig(
        `focusKeys: "${a.key}" with mods ${String(a.mods)} is bound to both next and prev`,
      );
    }
  }
  return Object.freeze({ next, prev });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveCoreConfig(config: CoreConfig | undefined): ResolvedCoreConfig {
  if (!config) return DEFAULT_CORE_CONFIG;
  const defaults = DEFAULT_CORE_CONFIG;

  const frameBudgetMs =
    config.frameBudgetMs === undefined
      ? defaults.frameBudgetMs
      : requireNonNegativeNumber("frameBudgetMs", config.frameBudgetMs);

  const window = config.coalesceWindow;
  const maxEvents =
    window?.maxEvents === undefined
      ? defaults.coalesceWindow.maxEvents
      : requireNonNegativeInt("coalesceWindow.maxEvents", window.maxEvents);
  const maxAgeMs =
    window?.maxAgeMs === undefined
      ? defaults.coalesceWindow.maxAgeMs
      : requireNonNegativeNumber("coalesceWindow.maxAgeMs", window.maxAgeMs);

  const maxLinkReentrancy =
    config.maxLinkReentrancy === undefined
      ? defaults.maxLinkReentrancy
      : requirePositiveInt("maxLinkReentrancy", config.maxLinkReentrancy);
  const faultLogCapacity =
    config.faultLogCapacity === undefined
      ? defaults.faultLogCapacity
      : requirePositiveInt("faultLogCapacity", config.faultLogCapacity);

  return Object.freeze({
    frameBudgetMs,
    coalesceWindow: Object.freeze({ maxEvents, maxAgeMs }),
    coalescePolicy: resolveCoalescePolicy(config.coalescePolicy, defaults.coalescePolicy),
    maxLinkReentrancy,
    faultLogCapacity,
    focusOnPointerDown: readBoolean(
      "focusOnPointerDown",
      config.focusOnPointerDown,
      defaults.focusOnPointerDown,
    ),
    tabNavigation: readBoolean("tabNavigation", config.tabNavigation, defaults.tabNavigation),
    focusKeys: resolveFocusKeys(config.focusKeys, defaults.focusKeys),
    diagnostics: readBoolean("diagnostics", config.diagnostics, defaults.diagnostics),
  });
}
