import type { EnglishLevel, GrammarCorrection, TutorContext } from "./types.js";

/**
 * Interfaces for the services the pipeline calls but does not implement:
 * the chat gateway's reply primitive, grammar checking, speech-to-text,
 * text-to-speech and response generation.
 */

export type ChatAction = "typing" | "record_voice";

export interface ReplyChannel {
  sendText(conversationKey: string, text: string): Promise<void>;
  /** `audioPath` is a local file the channel uploads; the caller deletes it afterwards. */
  sendVoice(conversationKey: string, audioPath: string, caption?: string): Promise<void>;
  sendChatAction?(conversationKey: string, action: ChatAction): Promise<void>;
}

export interface GrammarChecker {
  check(text: string): Promise<GrammarCorrection[]>;
}

export interface Transcriber {
  /** Null (or empty) when nothing intelligible was heard. */
  transcribe(audioPath: string): Promise<string | null>;
}

export interface SpeechSynthesizer {
  /** Path of a freshly written audio file, or null when nothing was produced. */
  synthesize(text: string): Promise<string | null>;
}

export interface GenerationRequest {
  message: string;
  context: TutorContext;
  level: EnglishLevel;
  corrections: GrammarCorrection[];
  isVoice: boolean;
}

export interface GeneratedReply {
  /** Full reply sent to the user. */
  text: string;
  /** The conversational English part, used for speech. */
  englishOnly: string;
  /** Correction notes after the `---` separator, if any. */
  corrections: string | null;
  /** Provider id, or "local" for the built-in fallback. */
  source: string;
  confidence: number;
}

export interface ResponseGenerator {
  /** Throws UpstreamError when no provider produced a reply. */
  generate(request: GenerationRequest): Promise<GeneratedReply>;
}
