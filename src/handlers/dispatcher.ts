import type { ReplyChannel } from "../collaborators.js";
import type { JobRunner } from "../queue/task-queue.js";
import type { QueueEntry } from "../types.js";
import type { JobHandler, TextPayload, VoicePayload } from "./types.js";

export const FAILURE_APOLOGY =
  "❌ Sorry, I encountered an error processing your message. Please try again.";

export interface JobHandlers {
  text: JobHandler<TextPayload>;
  voice: JobHandler<VoicePayload>;
}

/** Routes each queued job to the handler for its payload kind. */
export class JobDispatcher implements JobRunner {
  constructor(
    private readonly handlers: JobHandlers,
    private readonly reply: ReplyChannel,
  ) {}

  async run(entry: QueueEntry): Promise<void> {
    const { payload } = entry;
    switch (payload.kind) {
      case "text":
        return this.handlers.text.handle(entry, payload);
      case "voice":
        return this.handlers.voice.handle(entry, payload);
    }
  }

  async onFailure(entry: QueueEntry): Promise<void> {
    await this.reply.sendText(entry.conversationKey, FAILURE_APOLOGY);
  }
}
