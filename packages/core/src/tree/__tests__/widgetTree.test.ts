import { assert, describe, test } from "@widgetflow/testkit";
import { WidgetFlowError, type WidgetFlowErrorCode } from "../../errors.js";
import { rect } from "../../geometry/rect.js";
import { buildTree } from "../../testing/treeFixture.js";
import type { TreeChange } from "../types.js";
import { createWidgetTree } from "../widgetTree.js";

function hasCode(code: WidgetFlowErrorCode): (e: unknown) => boolean {
  return (e) => e instanceof WidgetFlowError && e.code === code;
}

describe("widget tree - structure", () => {
  test("ids are unique and never reused", () => {
    const tree = createWidgetTree();
    const a = tree.createWidget();
    tree.destroy(a);
    const b = tree.createWidget();
    assert.notEqual(a, b);
    assert.equal(tree.isAlive(a), false);
    assert.equal(tree.get(a), null);
  });

  test("appendChild links both directions and attaches under an attached parent", () => {
    const tree = createWidgetTree();
    const root = tree.createWidget({ label: "root" });
    tree.setRoot(root);
    const child = tree.createWidget({ label: "child" });
    assert.equal(tree.isAttached(child), false);

    tree.appendChild(root, child);
    assert.equal(tree.parentOf(child), root);
    assert.deepEqual(tree.childrenOf(root), [child]);
    assert.equal(tree.isAttached(child), true);
    assert.deepEqual(tree.ancestorsOf(child), [root]);
  });

  test("appendChild rejects a child that already has a parent", () => {
    const tree = createWidgetTree();
    const a = tree.createWidget();
    const b = tree.createWidget();
    const c = tree.createWidget();
    tree.appendChild(a, c);
    assert.throws(() => tree.appendChild(b, c), hasCode("WF_INVALID_STATE"));
  });

  test("appendChild rejects cycles", () => {
    const tree = createWidgetTree();
    const a = tree.createWidget();
    const b = tree.createWidget();
    tree.appendChild(a, b);
    assert.throws(() => tree.appendChild(b, a), hasCode("WF_INVALID_ARGUMENT"));
    assert.throws(() => tree.appendChild(a, a), hasCode("WF_INVALID_ARGUMENT"));
  });

  test("operations on dead handles throw WF_DEAD_HANDLE", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    tree.destroy(w);
    assert.throws(() => tree.setBounds(w, rect(0, 0, 1, 1)), hasCode("WF_DEAD_HANDLE"));
    assert.throws(() => tree.appendChild(w, tree.createWidget()), hasCode("WF_DEAD_HANDLE"));
    assert.equal(tree.markDirty(w), false);
    assert.equal(tree.clearDirty(w), false);
  });

  test("destroy frees the whole subtree and is idempotent", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      children: [{ key: "panel", children: [{ key: "button" }] }],
    });
    const changes: TreeChange[] = [];
    tree.subscribe((c) => changes.push(c));

    tree.destroy(f.id("panel"));
    tree.destroy(f.id("panel"));
    assert.equal(tree.isAlive(f.id("button")), false);
    assert.deepEqual(tree.childrenOf(f.root), []);
    assert.equal(tree.size(), 1);
    assert.deepEqual(changes, [
      { kind: "detached", ids: [f.id("panel"), f.id("button")] },
      { kind: "destroyed", ids: [f.id("panel"), f.id("button")] },
    ]);
  });

  test("describe uses label and id", () => {
    const tree = createWidgetTree();
    const a = tree.createWidget({ label: "save" });
    const b = tree.createWidget();
    assert.equal(tree.describe(a), `save#${String(a)}`);
    assert.equal(tree.describe(b), `#${String(b)}`);
  });
});

describe("widget tree - dirty flags", () => {
  test("attaching marks the subtree dirty for render and layout", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, { key: "root", children: [{ key: "a" }, { key: "b" }] });
    assert.deepEqual(
      tree.dirtyIds().sort((x, y) => x - y),
      [f.root, f.id("a"), f.id("b")],
    );
    assert.equal(tree.isLayoutDirty(f.id("a")), true);
  });

  test("markDirty without layout leaves layout flags alone", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    assert.equal(tree.markDirty(w, { layout: false }), true);
    assert.equal(tree.isDirty(w), true);
    assert.equal(tree.isLayoutDirty(w), false);
  });

  test("clearDirty clears render or layout flags selectively", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    tree.markDirty(w);
    tree.clearDirty(w, "render");
    assert.equal(tree.isDirty(w), false);
    assert.equal(tree.isLayoutDirty(w), true);
    tree.clearDirty(w, "layout");
    assert.deepEqual(tree.layoutDirtyIds(), []);
  });

  test("setBounds marks render-dirty only and skips equal bounds", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget({ bounds: rect(0, 0, 5, 5) });
    tree.setBounds(w, rect(0, 0, 5, 5));
    assert.equal(tree.isDirty(w), false);
    tree.setBounds(w, rect(1, 0, 5, 5));
    assert.equal(tree.isDirty(w), true);
    assert.equal(tree.isLayoutDirty(w), false);
  });

  test("setBounds rejects non-finite values", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    assert.throws(
      () => tree.setBounds(w, rect(0, Number.NaN, 1, 1)),
      hasCode("WF_INVALID_ARGUMENT"),
    );
  });
});

describe("widget tree - spatial index sync", () => {
  test("only attached, visible widgets are indexed", () => {
    const tree = createWidgetTree();
    const root = tree.createWidget({ bounds: rect(0, 0, 100, 100) });
    const loose = tree.createWidget({ bounds: rect(0, 0, 10, 10) });
    tree.setRoot(root);
    assert.equal(tree.index.has(root), true);
    assert.equal(tree.index.has(loose), false);
    assert.equal(tree.hitTest(5, 5), root);
  });

  test("children paint above parents; later siblings above earlier ones", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      bounds: rect(0, 0, 100, 100),
      children: [
        { key: "left", bounds: rect(0, 0, 60, 60) },
        { key: "right", bounds: rect(40, 40, 60, 60) },
      ],
    });
    assert.equal(tree.hitTest(50, 50), f.id("right"));
    assert.equal(tree.hitTest(10, 10), f.id("left"));
    assert.equal(tree.hitTest(90, 5), f.root);
    assert.deepEqual(tree.index.queryPointAll(50, 50), [f.id("right"), f.id("left"), f.root]);
  });

  test("z-order follows tree order, not bounds assignment order", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      children: [{ key: "first" }, { key: "second" }],
    });
    tree.setBounds(f.id("second"), rect(0, 0, 10, 10));
    tree.setBounds(f.id("first"), rect(0, 0, 10, 10));
    assert.equal(tree.hitTest(5, 5), f.id("second"));
  });

  test("setBounds updates the index immediately", () => {
    const tree = createWidgetTree();
    const root = tree.createWidget({ bounds: rect(0, 0, 10, 10) });
    tree.setRoot(root);
    tree.setBounds(root, rect(20, 20, 10, 10));
    assert.equal(tree.hitTest(5, 5), null);
    assert.equal(tree.hitTest(25, 25), root);
  });

  test("detach removes the subtree from the index", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      bounds: rect(0, 0, 100, 100),
      children: [
        {
          key: "panel",
          bounds: rect(0, 0, 50, 50),
          children: [{ key: "btn", bounds: rect(0, 0, 10, 10) }],
        },
      ],
    });
    tree.detach(f.id("panel"));
    assert.equal(tree.isAttached(f.id("btn")), false);
    assert.equal(tree.hitTest(5, 5), f.root);
    assert.equal(tree.index.size(), 1);
    assert.equal(tree.paintOrderOf(f.id("btn")), -1);
  });

  test("hiding removes the subtree from the index; showing restores it", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      bounds: rect(0, 0, 100, 100),
      children: [
        {
          key: "panel",
          bounds: rect(0, 0, 50, 50),
          children: [{ key: "btn", bounds: rect(0, 0, 10, 10) }],
        },
      ],
    });
    const changes: TreeChange[] = [];
    tree.subscribe((c) => changes.push(c));

    tree.setVisible(f.id("panel"), false);
    assert.equal(tree.hitTest(5, 5), f.root);
    assert.deepEqual(changes, [{ kind: "hidden", ids: [f.id("panel"), f.id("btn")] }]);

    tree.setVisible(f.id("panel"), true);
    assert.equal(tree.hitTest(5, 5), f.id("btn"));
  });

  test("a child appended under a hidden parent stays out of the index", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      bounds: rect(0, 0, 100, 100),
      children: [{ key: "panel", visible: false, bounds: rect(0, 0, 50, 50) }],
    });
    const late = tree.createWidget({ bounds: rect(0, 0, 10, 10) });
    tree.appendChild(f.id("panel"), late);
    assert.equal(tree.index.has(late), false);
    assert.equal(tree.index.verifyIntegrity(), true);
  });
});

describe("widget tree - focus eligibility", () => {
  test("focusOrder is preorder over visible, enabled, focusable widgets", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      children: [
        { key: "a", focusable: true },
        {
          key: "group",
          children: [
            { key: "b", focusable: true },
            { key: "c", focusable: true, enabled: false },
          ],
        },
        { key: "hidden", visible: false, children: [{ key: "d", focusable: true }] },
        { key: "e", focusable: true },
      ],
    });
    assert.deepEqual(tree.focusOrder(), [f.id("a"), f.id("b"), f.id("e")]);
    assert.equal(tree.canReceiveFocus(f.id("c")), false);
    assert.equal(tree.canReceiveFocus(f.id("d")), false);
    assert.equal(tree.canReceiveFocus(f.id("a")), true);
  });

  test("focusChain is reused until an edit changes eligibility", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, {
      key: "root",
      children: [
        { key: "a", focusable: true },
        { key: "b", focusable: true },
      ],
    });
    const first = tree.focusChain();
    assert.deepEqual(first.order, [f.id("a"), f.id("b")]);
    assert.equal(first.indexOf.get(f.id("b")), 1);
    tree.setBounds(f.id("a"), rect(0, 0, 5, 5));
    tree.markDirty(f.id("b"));
    assert.equal(tree.focusChain(), first);

    tree.setEnabled(f.id("a"), false);
    const second = tree.focusChain();
    assert.notEqual(second, first);
    assert.deepEqual(second.order, [f.id("b")]);

    const loose = tree.createWidget({ focusable: true });
    assert.equal(tree.focusChain(), second);
    tree.appendChild(f.root, loose);
    assert.deepEqual(tree.focusChain().order, [f.id("b"), loose]);
    tree.setVisible(f.id("b"), false);
    assert.deepEqual(tree.focusChain().order, [loose]);
  });

  test("disabling or making unfocusable notifies subscribers", () => {
    const tree = createWidgetTree();
    const f = buildTree(tree, { key: "root", children: [{ key: "a", focusable: true }] });
    const changes: TreeChange[] = [];
    const unsubscribe = tree.subscribe((c) => changes.push(c));

    tree.setEnabled(f.id("a"), false);
    tree.setEnabled(f.id("a"), true);
    tree.setFocusable(f.id("a"), false);
    unsubscribe();
    tree.setEnabled(f.id("a"), false);

    assert.deepEqual(changes, [
      { kind: "disabled", ids: [f.id("a")] },
      { kind: "unfocusable", ids: [f.id("a")] },
    ]);
  });
});
