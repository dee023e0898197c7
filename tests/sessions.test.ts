import test from "node:test";
import assert from "node:assert/strict";
import { resolveSessionId, sessionIdFor, shouldStartNewSession } from "../src/sessions.js";

test("sessionIdFor formats the UTC timestamp", () => {
  assert.equal(sessionIdFor(new Date("2026-03-09T07:05:03.900Z")), "session_20260309_070503");
});

test("shouldStartNewSession only splits on gaps longer than the threshold", () => {
  const last = { createdAt: "2026-03-09T07:00:00.000Z" };
  assert.equal(shouldStartNewSession(null, new Date("2026-03-09T07:00:00.000Z"), 30), true);
  assert.equal(shouldStartNewSession(last, new Date("2026-03-09T07:30:00.000Z"), 30), false);
  assert.equal(shouldStartNewSession(last, new Date("2026-03-09T07:30:00.001Z"), 30), true);
  assert.equal(shouldStartNewSession({ createdAt: "garbage" }, new Date(), 30), true);
});

test("resolveSessionId continues or restarts the session", () => {
  const last = { sessionId: "session_20260309_070000", createdAt: "2026-03-09T07:00:00.000Z" };
  assert.equal(resolveSessionId(last, new Date("2026-03-09T07:10:00.000Z"), 30), "session_20260309_070000");
  assert.equal(resolveSessionId(last, new Date("2026-03-09T08:00:00.000Z"), 30), "session_20260309_080000");
  assert.equal(resolveSessionId(null, new Date("2026-03-09T08:00:00.000Z"), 30), "session_20260309_080000");
});
