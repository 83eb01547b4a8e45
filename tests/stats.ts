import test from "ava";
import {
  applyDecay,
  calculateAlpha,
  calculateInstantaneousRate,
} from "../src/stats.js";

test("calculates alpha from tick and window length", (t) => {
  t.is(calculateAlpha(5, 1), 1 - Math.exp(-5 / 60));
  t.is(calculateAlpha(5, 15), 1 - Math.exp(-5 / 900));
});

test("shorter windows react faster", (t) => {
  t.true(calculateAlpha(5, 1) > calculateAlpha(5, 5));
  t.true(calculateAlpha(5, 5) > calculateAlpha(5, 15));
});

test("calculates the per-second rate of one tick", (t) => {
  t.is(calculateInstantaneousRate(10, 5), 2);
  t.is(calculateInstantaneousRate(0, 5), 0);
});

test("moves the rate towards the instantaneous value", (t) => {
  t.is(applyDecay(2, 0, 0.5), 1);
  t.is(applyDecay(1, 3, 0.25), 1.5);
  t.is(applyDecay(4, 4, 0.3), 4); // Steady input keeps the rate
});
