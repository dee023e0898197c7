import type { JobPayload, QueueEntry } from "../types.js";

export type TextPayload = Extract<JobPayload, { kind: "text" }>;
export type VoicePayload = Extract<JobPayload, { kind: "voice" }>;

export interface JobHandler<P extends JobPayload> {
  handle(entry: QueueEntry, payload: P): Promise<void>;
}
