/**
 * packages/core/src/tree/widgetTree.ts — Widget arena and tree structure.
 *
 * Why: Owns every widget node and hands out WidgetId handles. Parents own
 * their children; the `parent` field is a back-reference used for traversal
 * only. Destroyed handles stay dead forever, so lookups check liveness.
 *
 * The tree keeps its spatial index in sync:
 *   - a widget is indexed iff it is attached, alive and visible together with
 *     every ancestor
 *   - setBounds on an indexed widget updates the index before returning
 *   - detaching or hiding a widget removes its whole subtree from the index
 *
 * Paint order (the z-order used by hit testing) is depth-first preorder with
 * children left-to-right. It is recomputed lazily after structural changes.
 * The focus chain is cached the same way and also dropped on visibility,
 * enabled and focusable changes.
 */

import { WidgetFlowError } from "../errors.js";
import { EMPTY_RECT, type Rect, isFiniteRect, rectEquals } from "../geometry/rect.js";
import {
  type ReadonlySpatialIndex,
  type SpatialIndex,
  createSpatialIndex,
} from "../spatial/spatialIndex.js";
import type {
  DirtyFlags,
  DirtySink,
  FocusChain,
  MarkDirtyOptions,
  TreeChange,
  TreeChangeListener,
  WidgetCapabilities,
  WidgetId,
  WidgetSpec,
  WidgetView,
} from "./types.js";

type WidgetNode = {
  readonly id: WidgetId;
  label: string | null;
  parent: WidgetId | null;
  children: WidgetId[];
  bounds: Rect;
  dirty: boolean;
  layoutDirty: boolean;
  focusable: boolean;
  enabled: boolean;
  visible: boolean;
  attached: boolean;
  capabilities: WidgetCapabilities;
};

export type WidgetTree = DirtySink &
  Readonly<{
    /** Query-only view of the index the tree maintains. */
    index: ReadonlySpatialIndex;
    createWidget: (spec?: WidgetSpec) => WidgetId;
    setRoot: (id: WidgetId | null) => void;
    root: () => WidgetId | null;
    appendChild: (parent: WidgetId, child: WidgetId) => void;
    /** Detach the widget's subtree from its parent. The widgets stay alive. */
    detach: (id: WidgetId) => void;
    /** Detach and free the widget's subtree. Its handles become dead. */
    destroy: (id: WidgetId) => void;
    isAlive: (id: WidgetId) => boolean;
    isAttached: (id: WidgetId) => boolean;
    isEnabled: (id: WidgetId) => boolean;
    get: (id: WidgetId) => WidgetView | null;
    parentOf: (id: WidgetId) => WidgetId | null;
    childrenOf: (id: WidgetId) => readonly WidgetId[];
    /** Parent first, root last. */
    ancestorsOf: (id: WidgetId) => WidgetId[];
    capabilitiesOf: (id: WidgetId) => WidgetCapabilities | null;
    setBounds: (id: WidgetId, bounds: Rect) => void;
    setVisible: (id: WidgetId, visible: boolean) => void;
    setEnabled: (id: WidgetId, enabled: boolean) => void;
    setFocusable: (id: WidgetId, focusable: boolean) => void;
    setCapabilities: (id: WidgetId, capabilities: WidgetCapabilities) => void;
    markDirty: (id: WidgetId, opts?: MarkDirtyOptions) => boolean;
    /** Clear dirty flags (both by default). Returns false for dead handles. */
    clearDirty: (id: WidgetId, flags?: DirtyFlags) => boolean;
    isDirty: (id: WidgetId) => boolean;
    isLayoutDirty: (id: WidgetId) => boolean;
    dirtyIds: () => WidgetId[];
    layoutDirtyIds: () => WidgetId[];
    /** Preorder position among attached widgets, -1 when not attached. */
    paintOrderOf: (id: WidgetId) => number;
    /** Attached, visible, enabled, focusable widgets in preorder. */
    focusOrder: () => WidgetId[];
    /** The cached focus chain; the same object until the next relevant edit. */
    focusChain: () => FocusChain;
    canReceiveFocus: (id: WidgetId) => boolean;
    hitTest: (x: number, y: number) => WidgetId | null;
    subscribe: (listener: TreeChangeListener) => () => void;
    size: () => number;
    /** "label#id" for log messages. */
    describe: (id: WidgetId) => string;
  }>;

function freezeBounds(id: WidgetId, bounds: Rect): Rect {
  if (!isFiniteRect(bounds)) {
    throw new WidgetFlowError(
      "WF_INVALID_ARGUMENT",
      `setBounds: bounds of widget ${String(id)} must be finite (got ${JSON.stringify(bounds)})`,
    );
  }
  return Object.freeze({ x: bounds.x, y: bounds.y, w: bounds.w, h: bounds.h });
}

export function createWidgetTree(): WidgetTree {
  const nodes = new Map<WidgetId, WidgetNode>();
  const dirtySet = new Set<WidgetId>();
  const layoutSet = new Set<WidgetId>();
  const listeners = new Set<TreeChangeListener>();
  let rootId: WidgetId | null = null;
  let nextId = 1;
  let paintOrder: Map<WidgetId, number> | null = null;
  let focusCache: FocusChain | null = null;

  const index: SpatialIndex = createSpatialIndex({
    compareZ: (a, b) => paintOrderOf(a) - paintOrderOf(b),
  });

  // Pooled traversal stack.
  const stack: WidgetNode[] = [];

  function requireNode(id: WidgetId, op: string): WidgetNode {
    const node = nodes.get(id);
    if (!node) {
      throw new WidgetFlowError("WF_DEAD_HANDLE", `${op}: widget ${String(id)} is not alive`);
    }
    return node;
  }

  function emit(change: TreeChange): void {
    if (change.ids.length === 0) return;
    for (const listener of Array.from(listeners)) listener(change);
  }

  function collectSubtree(start: WidgetNode): WidgetNode[] {
    const out: WidgetNode[] = [];
    stack.length = 0;
    stack.push(start);
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) continue;
      out.push(node);
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = nodes.get(node.children[i] ?? -1);
        if (child) stack.push(child);
      }
    }
    return out;
  }

  function ancestorsVisible(node: WidgetNode): boolean {
    let parentId = node.parent;
    while (parentId !== null) {
      const parent = nodes.get(parentId);
      if (!parent) return true;
      if (!parent.visible) return false;
      parentId = parent.parent;
    }
    return true;
  }

  /** Bring the index in line with attachment and visibility of a subtree. */
  function syncSubtreeIndex(start: WidgetNode): void {
    const pending: Array<readonly [WidgetNode, boolean]> = [[start, ancestorsVisible(start)]];
    while (pending.length > 0) {
      const item = pending.pop();
      if (!item) continue;
      const [node, parentShown] = item;
      const shown = parentShown && node.visible;
      if (node.attached && shown) {
        index.update(node.id, node.bounds);
      } else {
        index.remove(node.id);
      }
      for (const childId of node.children) {
        const child = nodes.get(childId);
        if (child) pending.push([child, shown]);
      }
    }
  }

  function markNode(node: WidgetNode, layout: boolean): void {
    node.dirty = true;
    dirtySet.add(node.id);
    if (!layout) return;
    node.layoutDirty = true;
    layoutSet.add(node.id);
    if (node.parent !== null) {
      const parent = nodes.get(node.parent);
      if (parent) {
        parent.layoutDirty = true;
        layoutSet.add(parent.id);
      }
    }
  }

  function attachSubtree(start: WidgetNode): void {
    for (const node of collectSubtree(start)) {
      node.attached = true;
      markNode(node, true);
    }
    paintOrder = null;
    focusCache = null;
    syncSubtreeIndex(start);
  }

  function detachSubtree(start: WidgetNode): void {
    const ids: WidgetId[] = [];
    for (const node of collectSubtree(start)) {
      node.attached = false;
      index.remove(node.id);
      ids.push(node.id);
    }
    paintOrder = null;
    focusCache = null;
    emit({ kind: "detached", ids });
  }

  function computePaintOrder(): Map<WidgetId, number> {
    const order = new Map<WidgetId, number>();
    if (rootId === null) return order;
    const root = nodes.get(rootId);
    if (!root) return order;
    let n = 0;
    for (const node of collectSubtree(root)) order.set(node.id, n++);
    return order;
  }

  function paintOrderOf(id: WidgetId): number {
    if (paintOrder === null) paintOrder = computePaintOrder();
    return paintOrder.get(id) ?? -1;
  }

  function isAncestor(candidate: WidgetId, of: WidgetNode): boolean {
    let parentId = of.parent;
    while (parentId !== null) {
      if (parentId === candidate) return true;
      parentId = nodes.get(parentId)?.parent ?? null;
    }
    return false;
  }

  function createWidget(spec: WidgetSpec = {}): WidgetId {
    const id = nextId++;
    nodes.set(id, {
      id,
      label: spec.label ?? null,
      parent: null,
      children: [],
      bounds: spec.bounds ? freezeBounds(id, spec.bounds) : EMPTY_RECT,
      dirty: false,
      layoutDirty: false,
      focusable: spec.focusable === true,
      enabled: spec.enabled !== false,
      visible: spec.visible !== false,
      attached: false,
      capabilities: spec.capabilities ?? {},
    });
    return id;
  }

  function setRoot(id: WidgetId | null): void {
    const next = id === null ? null : requireNode(id, "setRoot");
    if (next !== null && next.parent !== null) {
      throw new WidgetFlowError(
        "WF_INVALID_STATE",
        `setRoot: widget ${String(id)} has a parent; detach it first`,
      );
    }
    if (rootId === id) return;
    const prev = rootId === null ? undefined : nodes.get(rootId);
    rootId = null;
    if (prev?.attached) detachSubtree(prev);
    if (next !== null) {
      rootId = next.id;
      attachSubtree(next);
    }
  }

  function appendChild(parentId: WidgetId, childId: WidgetId): void {
    const parent = requireNode(parentId, "appendChild");
    const child = requireNode(childId, "appendChild");
    if (child.parent !== null || rootId === childId) {
      throw new WidgetFlowError(
        "WF_INVALID_STATE",
        `appendChild: widget ${String(childId)} already has a parent; detach it first`,
      );
    }
    if (parentId === childId || isAncestor(childId, parent)) {
      throw new WidgetFlowError(
        "WF_INVALID_ARGUMENT",
        `appendChild: widget ${String(childId)} cannot become a descendant of itself`,
      );
    }
    child.parent = parentId;
    parent.children.push(childId);
    markNode(parent, true);
    if (parent.attached) attachSubtree(child);
  }

  function detach(id: WidgetId): void {
    const node = requireNode(id, "detach");
    if (rootId === id) {
      rootId = null;
      if (node.attached) detachSubtree(node);
      return;
    }
    if (node.parent === null) return;
    const parent = nodes.get(node.parent);
    node.parent = null;
    if (parent) {
      const at = parent.children.indexOf(id);
      if (at >= 0) parent.children.splice(at, 1);
      markNode(parent, true);
    }
    if (node.attached) detachSubtree(node);
  }

  function destroy(id: WidgetId): void {
    const node = nodes.get(id);
    if (!node) return;
    detach(id);
    const ids: WidgetId[] = [];
    for (const gone of collectSubtree(node)) {
      nodes.delete(gone.id);
      dirtySet.delete(gone.id);
      layoutSet.delete(gone.id);
      ids.push(gone.id);
    }
    emit({ kind: "destroyed", ids });
  }

  function setBounds(id: WidgetId, bounds: Rect): void {
    const node = requireNode(id, "setBounds");
    const next = freezeBounds(id, bounds);
    if (rectEquals(node.bounds, next)) return;
    node.bounds = next;
    if (index.has(id)) index.update(id, next);
    markNode(node, false);
  }

  function setVisible(id: WidgetId, visible: boolean): void {
    const node = requireNode(id, "setVisible");
    if (node.visible === visible) return;
    node.visible = visible;
    if (node.attached) focusCache = null;
    markNode(node, true);
    if (!node.attached) return;
    syncSubtreeIndex(node);
    if (!visible) emit({ kind: "hidden", ids: collectSubtree(node).map((n) => n.id) });
  }

  function setEnabled(id: WidgetId, enabled: boolean): void {
    const node = requireNode(id, "setEnabled");
    if (node.enabled === enabled) return;
    node.enabled = enabled;
    if (node.attached) focusCache = null;
    markNode(node, false);
    if (!enabled && node.attached) emit({ kind: "disabled", ids: [id] });
  }

  function setFocusable(id: WidgetId, focusable: boolean): void {
    const node = requireNode(id, "setFocusable");
    if (node.focusable === focusable) return;
    node.focusable = focusable;
    if (node.attached) focusCache = null;
    if (!focusable && node.attached) emit({ kind: "unfocusable", ids: [id] });
  }

  function markDirty(id: WidgetId, opts?: MarkDirtyOptions): boolean {
    const node = nodes.get(id);
    if (!node) return false;
    markNode(node, opts?.layout !== false);
    return true;
  }

  function clearDirty(id: WidgetId, flags: DirtyFlags = "all"): boolean {
    const node = nodes.get(id);
    if (!node) return false;
    if (flags !== "layout") {
      node.dirty = false;
      dirtySet.delete(id);
    }
    if (flags !== "render") {
      node.layoutDirty = false;
      layoutSet.delete(id);
    }
    return true;
  }

  function get(id: WidgetId): WidgetView | null {
    const node = nodes.get(id);
    if (!node) return null;
    return Object.freeze({
      id: node.id,
      label: node.label,
      parent: node.parent,
      children: Object.freeze(node.children.slice()),
      bounds: node.bounds,
      dirty: node.dirty,
      layoutDirty: node.layoutDirty,
      focusable: node.focusable,
      enabled: node.enabled,
      visible: node.visible,
      attached: node.attached,
    });
  }

  function ancestorsOf(id: WidgetId): WidgetId[] {
    const out: WidgetId[] = [];
    let parentId = nodes.get(id)?.parent ?? null;
    while (parentId !== null) {
      const parent = nodes.get(parentId);
      if (!parent) break;
      out.push(parentId);
      parentId = parent.parent;
    }
    return out;
  }

  function computeFocusOrder(): WidgetId[] {
    const out: WidgetId[] = [];
    if (rootId === null) return out;
    const root = nodes.get(rootId);
    if (!root) return out;
    stack.length = 0;
    stack.push(root);
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || !node.visible) continue;
      if (node.focusable && node.enabled) out.push(node.id);
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = nodes.get(node.children[i] ?? -1);
        if (child) stack.push(child);
      }
    }
    return out;
  }

  function focusChain(): FocusChain {
    if (focusCache !== null) return focusCache;
    const order = computeFocusOrder();
    const indexOf = new Map<WidgetId, number>();
    order.forEach((id, i) => indexOf.set(id, i));
    focusCache = Object.freeze({ order: Object.freeze(order), indexOf });
    return focusCache;
  }

  function canReceiveFocus(id: WidgetId): boolean {
    const node = nodes.get(id);
    if (!node) return false;
    return (
      node.attached && node.focusable && node.enabled && node.visible && ancestorsVisible(node)
    );
  }

  function describe(id: WidgetId): string {
    const label = nodes.get(id)?.label;
    return label ? `${label}#${String(id)}` : `#${String(id)}`;
  }

  return Object.freeze({
    index,
    createWidget,
    setRoot,
    root: () => rootId,
    appendChild,
    detach,
    destroy,
    isAlive: (id: WidgetId) => nodes.has(id),
    isAttached: (id: WidgetId) => nodes.get(id)?.attached === true,
    isEnabled: (id: WidgetId) => nodes.get(id)?.enabled === true,
    get,
    parentOf: (id: WidgetId) => nodes.get(id)?.parent ?? null,
    childrenOf: (id: WidgetId): readonly WidgetId[] =>
      Object.freeze(nodes.get(id)?.children.slice() ?? []),
    ancestorsOf,
    capabilitiesOf: (id: WidgetId) => nodes.get(id)?.capabilities ?? null,
    setBounds,
    setVisible,
    setEnabled,
    setFocusable,
    setCapabilities: (id: WidgetId, capabilities: WidgetCapabilities) => {
      requireNode(id, "setCapabilities").capabilities = capabilities;
    },
    markDirty,
    clearDirty,
    isDirty: (id: WidgetId) => nodes.get(id)?.dirty === true,
    isLayoutDirty: (id: WidgetId) => nodes.get(id)?.layoutDirty === true,
    dirtyIds: () => Array.from(dirtySet),
    layoutDirtyIds: () => Array.from(layoutSet),
    paintOrderOf,
    focusOrder: () => focusChain().order.slice(),
    focusChain,
    canReceiveFocus,
    hitTest: (x: number, y: number) => index.queryPoint(x, y),
    subscribe: (listener: TreeChangeListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    size: () => nodes.size,
    describe,
  });
}
