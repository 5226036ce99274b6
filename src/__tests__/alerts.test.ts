import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { shouldNotify, createNotifyState } from "../alerts.js";
import type { ConnectionEvent, EventType } from "../config.js";

const ALL: EventType[] = ["connect", "authenticated", "disconnect", "auth_failed"];

function makeEvent(eventType: "connect" | "disconnect" | "auth_failed", clientPort = 51234): ConnectionEvent {
  const base = {
    id: "test",
    timestamp: Date.now(),
    clientIp: "203.0.113.7",
    clientPort,
    username: "alice",
    serverName: "vpn-test",
    serverLocation: "test-region",
    connectedSince: null,
    sessionDuration: null,
  };
  if (eventType === "connect") {
    return { ...base, eventType, source: "snapshot", virtualIp: "10.8.0.4", bytesReceived: 0, bytesSent: 0 };
  }
  if (eventType === "disconnect") {
    return { ...base, eventType, source: "snapshot", virtualIp: null, bytesReceived: null, bytesSent: null };
  }
  return { ...base, eventType, source: "log", virtualIp: null, bytesReceived: null, bytesSent: null };
}

describe("shouldNotify", () => {
  it("allows the first event", () => {
    const state = createNotifyState();
    assert.equal(shouldNotify(makeEvent("connect"), state, ALL), true);
  });

  it("drops event types that are not enabled", () => {
    const state = createNotifyState();
    assert.equal(shouldNotify(makeEvent("connect"), state, ["disconnect"]), false);
    assert.equal(state.recent.length, 0);
  });

  it("deduplicates the same session transition within 1 minute", () => {
    const state = createNotifyState();
    const now = Date.now();
    assert.equal(shouldNotify(makeEvent("connect"), state, ALL, now), true);
    assert.equal(shouldNotify(makeEvent("connect"), state, ALL, now + 1000), false);
    assert.equal(shouldNotify(makeEvent("connect"), state, ALL, now + 59_000), false);
  });

  it("allows the same transition after the window", () => {
    const state = createNotifyState();
    const now = Date.now();
    shouldNotify(makeEvent("connect"), state, ALL, now);
    assert.equal(shouldNotify(makeEvent("connect"), state, ALL, now + 61_000), true);
  });

  it("treats different ports and event types as distinct", () => {
    const state = createNotifyState();
    const now = Date.now();
    assert.equal(shouldNotify(makeEvent("connect", 1), state, ALL, now), true);
    assert.equal(shouldNotify(makeEvent("connect", 2), state, ALL, now), true);
    assert.equal(shouldNotify(makeEvent("disconnect", 1), state, ALL, now), true);
  });

  it("reports every auth failure", () => {
    const state = createNotifyState();
    const now = Date.now();
    assert.equal(shouldNotify(makeEvent("auth_failed"), state, ALL, now), true);
    assert.equal(shouldNotify(makeEvent("auth_failed"), state, ALL, now + 1), true);
    assert.equal(state.recent.length, 2);
  });

  it("rate limits at 10 per minute", () => {
    const state = createNotifyState();
    const now = Date.now();
    for (let i = 0; i < 10; i++) {
      assert.equal(shouldNotify(makeEvent("connect", i), state, ALL, now), true);
    }
    // 11th should be blocked
    assert.equal(shouldNotify(makeEvent("connect", 10), state, ALL, now), false);
    assert.equal(shouldNotify(makeEvent("auth_failed"), state, ALL, now), false);
  });

  it("allows events again after the rate limit window expires", () => {
    const state = createNotifyState();
    const now = Date.now();
    for (let i = 0; i < 10; i++) {
      shouldNotify(makeEvent("connect", i), state, ALL, now);
    }
    assert.equal(shouldNotify(makeEvent("connect", 99), state, ALL, now + 61_000), true);
  });
});
