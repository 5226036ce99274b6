import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SessionRegistry, sessionKey, splitAddress } from "../session-registry.js";

describe("splitAddress", () => {
  it("splits ip and port", () => {
    assert.deepEqual(splitAddress("203.0.113.7:51234"), { clientIp: "203.0.113.7", clientPort: 51234 });
  });

  it("defaults a missing port to 0", () => {
    assert.deepEqual(splitAddress("203.0.113.7"), { clientIp: "203.0.113.7", clientPort: 0 });
  });

  it("defaults a non-numeric port to 0", () => {
    assert.deepEqual(splitAddress("203.0.113.7:abc"), { clientIp: "203.0.113.7", clientPort: 0 });
  });

  it("takes the port after the last colon", () => {
    assert.deepEqual(splitAddress("2001:db8::1:1194"), { clientIp: "2001:db8::1", clientPort: 1194 });
  });
});

describe("sessionKey", () => {
  it("joins ip and port", () => {
    assert.equal(sessionKey("10.0.0.5", 5000), "10.0.0.5:5000");
    assert.equal(sessionKey("10.0.0.5", 0), "10.0.0.5:0");
  });
});

describe("SessionRegistry", () => {
  it("creates inactive entries on first update", () => {
    const registry = new SessionRegistry();
    const entry = registry.update("10.0.0.5:5000", { username: "alice" });
    assert.deepEqual(entry, { active: false, username: "alice", virtualIp: null, connectedSince: null });
    assert.equal(registry.has("10.0.0.5:5000"), true);
    assert.equal(registry.size, 1);
  });

  it("keeps known values when a patch carries null", () => {
    const registry = new SessionRegistry();
    registry.update("k", { username: "alice", virtualIp: "10.8.0.4" });
    const entry = registry.update("k", { active: true, username: null, virtualIp: null });
    assert.deepEqual(entry, { active: true, username: "alice", virtualIp: "10.8.0.4", connectedSince: null });
  });

  it("overwrites with newer non-null values", () => {
    const registry = new SessionRegistry();
    registry.update("k", { username: "alice" });
    assert.equal(registry.update("k", { username: "bob" }).username, "bob");
  });

  it("removes entries and returns the last state", () => {
    const registry = new SessionRegistry();
    registry.update("k", { username: "alice" });
    const removed = registry.remove("k");
    assert.equal(removed?.username, "alice");
    assert.equal(registry.has("k"), false);
    assert.equal(registry.remove("k"), undefined);
  });

  it("round-trips through toJSON", () => {
    const registry = new SessionRegistry();
    registry.update("a", { active: true, username: "alice", connectedSince: 1792399400 });
    const copy = new SessionRegistry(registry.toJSON());
    assert.deepEqual(copy.get("a"), { active: true, username: "alice", virtualIp: null, connectedSince: 1792399400 });
  });

  it("does not share entry objects with its seed", () => {
    const seed = { a: { active: true, username: "alice", virtualIp: null, connectedSince: null } };
    const registry = new SessionRegistry(seed);
    registry.update("a", { username: "bob" });
    assert.equal(seed.a.username, "alice");
  });
});
