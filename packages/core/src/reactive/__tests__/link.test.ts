import { assert, describe, test } from "@widgetflow/testkit";
import { createMemoryLogger } from "../../diagnostics/logger.js";
import { createWidgetTree } from "../../tree/widgetTree.js";
import { bindLink, createLink, createLinkScope } from "../link.js";

describe("Link - dependents", () => {
  test("counter scenario: set(5) dirties the label before returning", () => {
    const tree = createWidgetTree();
    const label = tree.createWidget({ label: "label" });
    const counter = createLink(0, { sink: tree });
    counter.addDependent(label);
    assert.equal(tree.isDirty(label), false);

    counter.set(5);
    assert.equal(tree.isDirty(label), true);
    assert.equal(counter.get(), 5);
  });

  test("set marks exactly the dependent set", () => {
    const tree = createWidgetTree();
    const a = tree.createWidget();
    const b = tree.createWidget();
    const outsider = tree.createWidget();
    const link = createLink("x", { sink: tree });
    link.addDependent(a);
    link.addDependent(b);

    link.set("y");
    assert.deepEqual(tree.dirtyIds().sort((p, q) => p - q), [a, b]);
    assert.equal(tree.isDirty(outsider), false);
  });

  test("set marks widgets for layout and propagates layout to the parent", () => {
    const tree = createWidgetTree();
    const parent = tree.createWidget();
    const child = tree.createWidget();
    tree.appendChild(parent, child);
    tree.clearDirty(parent);
    tree.clearDirty(child);

    const link = createLink(1, { sink: tree });
    link.addDependent(child);
    link.set(2);
    assert.equal(tree.isLayoutDirty(child), true);
    assert.equal(tree.isLayoutDirty(parent), true);
    assert.equal(tree.isDirty(parent), false);
  });

  test("addDependent and removeDependent are idempotent", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    const link = createLink(0, { sink: tree });
    link.addDependent(w);
    link.addDependent(w);
    assert.equal(link.dependentCount(), 1);
    assert.deepEqual(link.dependents(), [w]);

    link.removeDependent(w);
    link.removeDependent(w);
    link.removeDependent(999);
    assert.equal(link.dependentCount(), 0);
    assert.equal(link.hasDependent(w), false);
  });

  test("every set counts as a change, even with an equal value", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    const link = createLink(3, { sink: tree });
    link.addDependent(w);
    const calls: Array<readonly [number, number]> = [];
    link.setOnChange((next, prev) => calls.push([next, prev]));

    link.set(3);
    assert.equal(tree.isDirty(w), true);
    assert.deepEqual(calls, [[3, 3]]);
  });

  test("update applies a function of the previous value", () => {
    const tree = createWidgetTree();
    const link = createLink(10, { sink: tree });
    const seen: number[] = [];
    link.setOnChange((next) => seen.push(next));
    link.update((n) => n + 1);
    link.update((n) => n * 2);
    assert.equal(link.get(), 22);
    assert.deepEqual(seen, [11, 22]);
  });

  test("dependents are marked before the change callback runs", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    const link = createLink(0, { sink: tree });
    link.addDependent(w);
    let dirtyInCallback = false;
    link.setOnChange(() => {
      dirtyInCallback = tree.isDirty(w);
    });
    link.set(1);
    assert.equal(dirtyInCallback, true);
  });

  test("setOnChange(null) removes the callback", () => {
    const tree = createWidgetTree();
    const link = createLink(0, { sink: tree });
    let calls = 0;
    link.setOnChange(() => {
      calls++;
    });
    link.set(1);
    link.setOnChange(null);
    link.set(2);
    assert.equal(calls, 1);
  });

  test("bindLink returns an unbind function", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    const link = createLink(0, { sink: tree });
    const unbind = bindLink(link, w);
    assert.equal(link.hasDependent(w), true);
    unbind();
    assert.equal(link.hasDependent(w), false);
  });

  test("toString shows the value and dependent count", () => {
    const tree = createWidgetTree();
    const link = createLink(42, { sink: tree });
    link.addDependent(tree.createWidget());
    assert.equal(link.toString(), "Link(42, 1 deps)");
  });
});

describe("Link - failure handling", () => {
  test("dead dependents are skipped; with diagnostics they are reported once", () => {
    const tree = createWidgetTree();
    const live = tree.createWidget();
    const dead = tree.createWidget();
    const logger = createMemoryLogger();
    const link = createLink(0, { sink: tree, logger, diagnostics: true });
    link.addDependent(live);
    link.addDependent(dead);
    tree.destroy(dead);

    link.set(1);
    link.set(2);
    assert.equal(tree.isDirty(live), true);
    assert.equal(tree.isAlive(dead), false);
    assert.deepEqual(logger.messages("warn"), [
      `[widgetflow][link] link 1 still lists destroyed widget ${String(dead)} as a dependent. ` +
        "Hint: call removeDependent when the widget is torn down.",
    ]);
  });

  test("dead dependents are silent without diagnostics", () => {
    const tree = createWidgetTree();
    const dead = tree.createWidget();
    const logger = createMemoryLogger();
    const link = createLink(0, { sink: tree, logger });
    link.addDependent(dead);
    tree.destroy(dead);
    link.set(1);
    assert.deepEqual(logger.records(), []);
  });

  test("a throwing change callback is logged and set still completes", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    const logger = createMemoryLogger();
    const link = createLink(0, { sink: tree, logger });
    link.addDependent(w);
    link.setOnChange(() => {
      throw new Error("boom");
    });

    link.set(1);
    assert.equal(link.get(), 1);
    assert.equal(tree.isDirty(w), true);
    assert.deepEqual(logger.messages("error"), [
      "[widgetflow][link] change callback of link 1 threw: Error: boom",
    ]);
  });
});

describe("Link - re-entrancy", () => {
  test("a callback may set another link; both values land", () => {
    const tree = createWidgetTree();
    const scope = createLinkScope({ sink: tree });
    const celsius = scope.createLink(0);
    const fahrenheit = scope.createLink(32);
    celsius.setOnChange((c) => fahrenheit.set((c * 9) / 5 + 32));

    celsius.set(100);
    assert.equal(fahrenheit.get(), 212);
    assert.equal(scope.depth(), 0);
  });

  test("a callback cycle stops at the depth limit with a warning", () => {
    const tree = createWidgetTree();
    const w = tree.createWidget();
    const logger = createMemoryLogger();
    const scope = createLinkScope({ sink: tree, logger, maxReentrancy: 3 });
    const a = scope.createLink(0);
    const b = scope.createLink(0);
    b.addDependent(w);
    let callbacks = 0;
    a.setOnChange((v) => {
      callbacks++;
      b.set(v + 1);
    });
    b.setOnChange((v) => {
      callbacks++;
      a.set(v + 1);
    });

    a.set(1);
    // a(1) -> cb -> b(2) -> cb -> a(3) -> cb -> b(4): callback skipped at depth 3
    assert.equal(callbacks, 3);
    assert.equal(a.get(), 3);
    assert.equal(b.get(), 4);
    assert.equal(tree.isDirty(w), true);
    assert.equal(scope.depth(), 0);
    assert.deepEqual(logger.messages("warn"), [
      "[widgetflow][link] change callback of link 2 skipped: nested set() depth reached 3",
    ]);
  });

  test("links created with createLink have independent depth counters", () => {
    const tree = createWidgetTree();
    const logger = createMemoryLogger();
    const a = createLink(0, { sink: tree, logger, maxReentrancy: 1 });
    const b = createLink(0, { sink: tree, logger, maxReentrancy: 1 });
    let bCalls = 0;
    a.setOnChange((v) => b.set(v));
    b.setOnChange(() => {
      bCalls++;
    });
    a.set(1);
    assert.equal(bCalls, 1);
    assert.deepEqual(logger.records(), []);
  });
});
