import type { QueueEntry } from "../types.js";
import type { TutorTurn } from "./turn.js";
import type { JobHandler, TextPayload } from "./types.js";

export class TextJobHandler implements JobHandler<TextPayload> {
  constructor(private readonly turn: TutorTurn) {}

  async handle(entry: QueueEntry, payload: TextPayload): Promise<void> {
    await this.turn.respond(entry, { text: payload.content, kind: "text" });
  }
}
