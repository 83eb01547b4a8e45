import test from "ava";
import { DecayingRateEstimator } from "../src/estimator.js";

const alpha = (windowMinutes: number) => 1 - Math.exp(-5 / (windowMinutes * 60));

test("reports 0 before the first tick", (t) => {
  const estimator = new DecayingRateEstimator(1);
  estimator.mark(10);

  t.false(estimator.isSeeded());
  t.is(estimator.getRate(), 0);
  t.is(estimator.getRatePerMinute(), 0);
});

test("accumulates marks without moving the rate", (t) => {
  const estimator = new DecayingRateEstimator(5);
  estimator.mark();
  estimator.mark(3);

  t.is(estimator.getUncounted(), 4);
  t.is(estimator.getRate(), 0);
});

test("seeds the rate on the first tick", (t) => {
  const estimator = new DecayingRateEstimator(15);
  estimator.mark(10);
  estimator.tick();

  t.true(estimator.isSeeded());
  t.is(estimator.getUncounted(), 0);
  t.is(estimator.getRate(), 2); // 10 marks over 5 seconds
  t.is(estimator.getRatePerMinute(), 120);
});

test("decays towards 0 on quiet ticks without reaching it", (t) => {
  const estimator = new DecayingRateEstimator(1);
  estimator.mark(10);
  estimator.tick();
  estimator.tick();

  const expected = 2 + alpha(1) * (0 - 2);
  t.is(estimator.getRate(), expected);
  t.true(expected > 0 && expected < 2);

  estimator.tick();
  t.is(estimator.getRate(), expected + alpha(1) * (0 - expected));
});

test("a rate seeded at 0 stays at 0", (t) => {
  const estimator = new DecayingRateEstimator(1);
  estimator.tick();
  estimator.tick();

  t.true(estimator.isSeeded());
  t.is(estimator.getRate(), 0);
});

test("handles multiple time windows independently", (t) => {
  const windows = [1, 5, 15] as const;
  const estimators = windows.map((w) => new DecayingRateEstimator(w));

  for (const estimator of estimators) {
    estimator.mark(10);
    estimator.tick();
    estimator.tick();
  }

  const [oneMinute, fiveMinutes, fifteenMinutes] = estimators.map((e) =>
    e.getRate()
  );
  t.deepEqual(
    [oneMinute, fiveMinutes, fifteenMinutes],
    windows.map((w) => 2 + alpha(w) * (0 - 2))
  );
  t.true((oneMinute ?? 0) < (fiveMinutes ?? 0));
  t.true((fiveMinutes ?? 0) < (fifteenMinutes ?? 0));
});

test("bursts and evenly spread marks yield the same rate", (t) => {
  const burst = new DecayingRateEstimator(1);
  const spread = new DecayingRateEstimator(1);

  burst.mark(10);
  for (let i = 0; i < 10; i++) spread.mark();

  burst.tick();
  spread.tick();
  t.is(burst.getRate(), spread.getRate());
});

test("uses the configured tick length", (t) => {
  const estimator = new DecayingRateEstimator(1, 10);
  estimator.mark(5);
  estimator.tick();

  t.is(estimator.tickSeconds, 10);
  t.is(estimator.getRate(), 0.5);
});

test("clear returns to the pre-first-tick state", (t) => {
  const estimator = new DecayingRateEstimator(1);
  estimator.mark(5);
  estimator.tick();
  estimator.mark(3);
  estimator.clear();

  t.false(estimator.isSeeded());
  t.is(estimator.getUncounted(), 0);
  t.is(estimator.getRate(), 0);

  estimator.mark(5);
  estimator.tick();
  t.is(estimator.getRate(), 1); // Seeded again, not decayed
});
