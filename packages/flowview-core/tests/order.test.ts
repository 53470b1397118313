import { expect, test } from "vitest";

import { compareOrderValues, resolveOrderName } from "../src/order.js";
import { View } from "../src/view.js";
import { makeFlow } from "./helpers.js";

test("value() of a flow outside the store is computed but not cached", () => {
  const view = new View();
  const outsider = makeFlow({ reqSize: 12 });
  expect(view.orders.size.value(outsider)).toBe(12);
  expect(view.orders.size.cached(outsider)).toBeUndefined();
  expect(view.settings.length).toBe(0);
});

test("value() returns the cached value until refresh", () => {
  const view = new View();
  const f = makeFlow({ reqSize: 1 });
  view.add([f]);
  view.setOrderByName("size");
  f.request.rawContent = new Uint8Array(8);
  expect(view.orders.size.value(f)).toBe(1);
  expect(view.orders.size.refresh(f)).toBe(true);
  expect(view.orders.size.value(f)).toBe(8);
  expect(view.orders.size.refresh(f)).toBe(false);
});

test("order names resolve from full names and one-letter aliases", () => {
  expect(resolveOrderName("time")).toBe("time");
  expect(resolveOrderName("z")).toBe("size");
  expect(resolveOrderName(" m ")).toBe("method");
  expect(resolveOrderName("constructor")).toBeNull();
});

test("numbers compare numerically and strings lexicographically", () => {
  expect(compareOrderValues(9, 10)).toBe(-1);
  expect(compareOrderValues("9", "10")).toBe(1);
  expect(compareOrderValues("GET", "GET")).toBe(0);
});

test("NaN sorts before every other number", () => {
  expect(compareOrderValues(Number.NaN, -Infinity)).toBe(-1);
  expect(compareOrderValues(0, Number.NaN)).toBe(1);
  expect(compareOrderValues(Number.NaN, Number.NaN)).toBe(0);
});
