/**
 * Tests for trace event emission.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { isTraceEventType, makeEmitter } from "./trace.js";
import type { TraceEvent } from "./trace.js";

describe("Trace emitter", () => {
  it("stamps events with the run id and a timestamp", () => {
    const events: TraceEvent[] = [];
    const emit = makeEmitter("run-1", (e) => events.push(e));
    emit("rescue", undefined, { error: "KeyNotFound" });
    assert.equal(events.length, 1);
    assert.equal(events[0].runId, "run-1");
    assert.equal(events[0].event, "rescue");
    assert.deepEqual(events[0].data, { error: "KeyNotFound" });
    assert.ok(!Number.isNaN(Date.parse(events[0].ts)));
  });

  it("does nothing without a sink", () => {
    assert.doesNotThrow(() => makeEmitter("run-2")("run_start"));
  });

  it("recognises event names", () => {
    assert.equal(isTraceEventType("strand_cancel"), true);
    assert.equal(isTraceEventType("tool_start"), false);
    assert.equal(isTraceEventType(3), false);
  });
});
