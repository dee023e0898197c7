/**
 * Session boundaries: a conversation's messages are grouped into sessions,
 * and a new session starts once the gap since the previous message exceeds
 * the configured threshold.
 */

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `session_YYYYMMDD_HHMMSS` in UTC. */
export function sessionIdFor(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `session_${date}_${time}`;
}

export function shouldStartNewSession(
  last: { createdAt: string } | null,
  at: Date,
  gapMinutes: number,
): boolean {
  if (!last) return true;
  const lastMs = new Date(last.createdAt).getTime();
  if (!Number.isFinite(lastMs)) return true;
  const gapMs = at.getTime() - lastMs;
  return gapMs > gapMinutes * 60_000;
}

/** Session id for a message written at `at`, continuing `last` when close enough. */
export function resolveSessionId(
  last: { sessionId: string; createdAt: string } | null,
  at: Date,
  gapMinutes: number,
): string {
  if (last && !shouldStartNewSession(last, at, gapMinutes)) return last.sessionId;
  return sessionIdFor(at);
}
