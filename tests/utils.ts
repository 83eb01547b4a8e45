import test from "ava";
import { ConfigurationError } from "../src/errors.js";
import {
  getField,
  interpolate,
  isMultipleOf,
  parseDuration,
} from "../src/utils.js";

test("parses durations into seconds", (t) => {
  t.is(parseDuration(15), 15);
  t.is(parseDuration("15s"), 15);
  t.is(parseDuration("2m"), 120);
  t.is(parseDuration("1h"), 3600);
});

test("throws an error for invalid durations", (t) => {
  const error1 = t.throws(() => parseDuration("10x"), {
    instanceOf: ConfigurationError,
  });
  t.is(error1?.message, "Invalid duration format: 10x");

  const error2 = t.throws(() => parseDuration("1d"));
  t.is(error2?.message, "Invalid duration format: 1d");
});

test("checks multiples with float tolerance", (t) => {
  t.true(isMultipleOf(10, 5));
  t.true(isMultipleOf(0.3, 0.1));
  t.false(isMultipleOf(7, 5));
});

test("reads top-level and nested fields", (t) => {
  const record = { response: 404, request: { verb: "GET" } };

  t.is(getField(record, "response"), 404);
  t.is(getField(record, "[request][verb]"), "GET");
  t.is(getField(record, "[request][path]"), undefined);
  t.is(getField(record, "[response][code]"), undefined);
});

test("interpolates field references", (t) => {
  const record = {
    response: 404,
    request: { verb: "GET" },
    tags: ["a", "b"],
  };

  t.is(interpolate("http_%{response}", record), "http_404");
  t.is(interpolate("%{[request][verb]}_%{response}", record), "GET_404");
  t.is(interpolate("tags=%{tags}", record), "tags=a,b");
  t.is(interpolate("req=%{request}", record), 'req={"verb":"GET"}');
});

test("leaves unresolved references in place", (t) => {
  t.is(interpolate("http_%{missing}", { response: 200 }), "http_%{missing}");
  t.is(interpolate("plain", {}), "plain");
});
