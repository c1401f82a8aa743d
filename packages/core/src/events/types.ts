/**
 * Input event types accepted by the event manager.
 *
 * Pointer-class events resolve their target by hit test; keyboard-class
 * events resolve to the focused widget. Every event carries a monotonic
 * `timeMs` stamped by the input source.
 */

export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;
export const MOD_META = 1 << 3;

export const BUTTON_PRIMARY = 0;
export const BUTTON_MIDDLE = 1;
export const BUTTON_SECONDARY = 2;

export type PointerInput = Readonly<{
  kind: "pointerDown" | "pointerUp" | "pointerMove";
  timeMs: number;
  x: number;
  y: number;
  button?: number;
  mods?: number;
}>;

export type WheelInput = Readonly<{
  kind: "wheel";
  timeMs: number;
  x: number;
  y: number;
  deltaX: number;
  deltaY: number;
  mods?: number;
}>;

export type KeyInput = Readonly<{
  kind: "keyDown" | "keyUp";
  timeMs: number;
  /** Key name, e.g. "Enter", "Tab", "a". */
  key: string;
  mods?: number;
}>;

export type TextInput = Readonly<{
  kind: "text";
  timeMs: number;
  text: string;
}>;

export type InputEvent = PointerInput | WheelInput | KeyInput | TextInput;

export type InputEventKind = InputEvent["kind"];

export const INPUT_EVENT_KINDS: readonly InputEventKind[] = Object.freeze([
  "pointerDown",
  "pointerUp",
  "pointerMove",
  "wheel",
  "keyDown",
  "keyUp",
  "text",
]);

export function isInputEventKind(value: string): value is InputEventKind {
  return INPUT_EVENT_KINDS.some((kind) => kind === value);
}

/**
 * How a new event folds into a queued one of the same kind and target.
 * `merge` sums wheel deltas; for every other kind it behaves as `replace`.
 */
export type CoalescePolicy = "replace" | "merge" | "none";

export type EventClass = "pointer" | "keyboard";

export function isPointerInput(event: InputEvent): event is PointerInput | WheelInput {
  return (
    event.kind === "pointerDown" ||
    event.kind === "pointerUp" ||
    event.kind === "pointerMove" ||
    event.kind === "wheel"
  );
}

export function eventClassOf(event: InputEvent): EventClass {
  return isPointerInput(event) ? "pointer" : "keyboard";
}

export function hasMod(event: Readonly<{ mods?: number }>, mod: number): boolean {
  return ((event.mods ?? 0) & mod) !== 0;
}
