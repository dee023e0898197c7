import type { ReplyChannel, Transcriber } from "../collaborators.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { QueueEntry } from "../types.js";
import { type TutorTurn, removeFile } from "./turn.js";
import type { JobHandler, VoicePayload } from "./types.js";

export const UNINTELLIGIBLE_AUDIO_REPLY =
  "❌ I couldn't understand the audio. Please try again with clearer speech.";

export function heardReply(transcription: string): string {
  return `📝 I heard: ${transcription}`;
}

export interface VoiceJobHandlerOptions {
  /** Delete the downloaded audio once the job is done. Defaults to true. */
  removeAudio?: boolean;
}

/**
 * Transcribes the clip, echoes what was heard, then runs the shared turn.
 * Nothing is persisted when the clip could not be transcribed.
 */
export class VoiceJobHandler implements JobHandler<VoicePayload> {
  private readonly removeAudio: boolean;

  constructor(
    private readonly turn: TutorTurn,
    private readonly transcriber: Transcriber,
    private readonly reply: ReplyChannel,
    options: VoiceJobHandlerOptions = {},
  ) {
    this.removeAudio = options.removeAudio !== false;
  }

  async handle(entry: QueueEntry, payload: VoicePayload): Promise<void> {
    const key = entry.conversationKey;
    try {
      const text = await this.transcribe(payload.audioPath);
      if (!text) {
        await this.reply.sendText(key, UNINTELLIGIBLE_AUDIO_REPLY);
        return;
      }
      await this.reply.sendText(key, heardReply(text));
      await this.turn.respond(entry, {
        text,
        kind: "voice",
        voiceDuration: payload.durationSeconds,
      });
    } finally {
      if (this.removeAudio) await removeFile(payload.audioPath);
    }
  }

  private async transcribe(audioPath: string): Promise<string | null> {
    try {
      const text = await this.transcriber.transcribe(audioPath);
      const trimmed = text?.trim() ?? "";
      return trimmed.length > 0 ? trimmed : null;
    } catch (err) {
      log.warn(`transcription failed for ${audioPath}: ${errorMessage(err)}`);
      return null;
    }
  }
}
