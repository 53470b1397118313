import { expect, test } from "vitest";

import { FocusNotInViewError, OutOfBoundsError } from "@flowview/interface";

import { View } from "../src/view.js";
import { makeFlow, testFilterParser } from "./helpers.js";

function threeFlowView(opts: { reversed?: boolean } = {}) {
  const view = new View({ filterParser: testFilterParser, orderReversed: opts.reversed });
  const a = makeFlow({ id: "a", start: 1, method: "GET" });
  const b = makeFlow({ id: "b", start: 2, method: "POST" });
  const c = makeFlow({ id: "c", start: 3, method: "GET" });
  view.add([a, b, c]);
  return { view, a, b, c };
}

test("focuses the first added flow and keeps it as more arrive", () => {
  const { view, a } = threeFlowView();
  expect(view.focus.flow).toBe(a);
  expect(view.focus.index).toBe(0);
});

test("focus-follow moves the focus to each added flow", () => {
  const view = new View({ focusFollow: true });
  const a = makeFlow();
  const b = makeFlow();
  view.add([a]);
  view.add([b]);
  expect(view.focus.flow).toBe(b);
});

test("a new focus starts on the first displayed flow of a non-empty view", () => {
  const { view } = threeFlowView();
  view.focus.setFlow(null);
  view.setReversed(true);
  expect(view.focus.flow?.id).toBe("c");
});

test("removing the focused flow focuses the flow now at its position", () => {
  const { view, b, c } = threeFlowView();
  view.focus.setFlow(b);
  view.remove([b]);
  expect(view.focus.flow).toBe(c);
  expect(view.focus.index).toBe(1);
});

test("removing the focused last flow focuses the new last flow", () => {
  const { view, b, c } = threeFlowView();
  view.focus.setFlow(c);
  view.remove([c]);
  expect(view.focus.flow).toBe(b);
});

test("re-anchoring follows the displayed order when reversed", () => {
  const { view, a, b, c } = threeFlowView({ reversed: true });
  view.focus.setFlow(b);
  view.remove([b]);
  // displayed was [c, b, a]; a now sits where b was
  expect(view.focus.flow).toBe(a);

  view.focus.setFlow(c);
  view.remove([c]);
  expect(view.focus.flow).toBe(a);
});

test("removing another flow leaves the focus alone", () => {
  const { view, a, c } = threeFlowView();
  view.focus.setFlow(c);
  view.remove([a]);
  expect(view.focus.flow).toBe(c);
  expect(view.focus.index).toBe(1);
});

test("emptying the view clears the focus", () => {
  const { view, a, b, c } = threeFlowView();
  view.remove([a, b, c]);
  expect(view.focus.flow).toBeNull();
  expect(view.focus.index).toBeNull();
});

test("re-anchors to the nearest flow when the focus is filtered out", () => {
  const { view, b, c } = threeFlowView();
  view.focus.setFlow(b);
  view.setFilterExpression("~m GET");
  expect(view.focus.flow).toBe(c);
});

test("re-anchors when clearNotMarked drops the focused flow", () => {
  const view = new View();
  const a = makeFlow({ id: "a", start: 1, marked: true });
  const b = makeFlow({ id: "b", start: 2 });
  const c = makeFlow({ id: "c", start: 3, marked: true });
  view.add([a, b, c]);
  view.focus.setFlow(b);
  view.clearNotMarked();
  expect(view.focus.flow).toBe(c);
});

test("clearing the view clears the focus", () => {
  const { view } = threeFlowView();
  view.clear();
  expect(view.focus.flow).toBeNull();
});

test("refuses flows that are not in the view", () => {
  const { view, b } = threeFlowView();
  view.setFilterExpression("~m GET");
  expect(() => view.focus.setFlow(b)).toThrow(FocusNotInViewError);
  expect(() => view.focus.setFlow(makeFlow())).toThrow(FocusNotInViewError);
});

test("setIndex focuses a displayed position and rejects out-of-range ones", () => {
  const { view, c } = threeFlowView();
  view.focus.setIndex(2);
  expect(view.focus.flow).toBe(c);
  expect(() => view.focus.setIndex(3)).toThrow(OutOfBoundsError);
  expect(() => view.focus.setIndex(-1)).toThrow(OutOfBoundsError);
  expect(view.focus.flow).toBe(c);
});

test("announces every focus change", () => {
  const { view, a, b } = threeFlowView();
  const changes: (string | null)[] = [];
  view.focus.change.connect((f) => changes.push(f ? f.id : null));
  view.focus.setFlow(b);
  view.remove([b]);
  view.remove([a]);
  view.clear();
  expect(changes).toEqual(["b", "c", null]);
});

test("the focus is always empty or shown", () => {
  const { view, a, b, c } = threeFlowView();
  const check = () => {
    const f = view.focus.flow;
    if (f) expect(view.contains(f)).toBe(true);
  };
  view.signals.viewRefresh.connect(check);
  view.signals.viewRemove.connect(check);
  view.signals.viewAdd.connect(check);

  view.focus.setFlow(b);
  view.setFilterExpression("~m POST");
  view.setFilterExpression("~m GET");
  view.remove([a]);
  view.add([makeFlow({ method: "GET" })]);
  view.clearNotMarked();
  expect(view.focus.flow).toBeNull();
  expect(view.contains(c)).toBe(false);
});
