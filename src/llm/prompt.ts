import type { EnglishLevel, GrammarCorrection, TutorContext } from "../types.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

const LEVEL_GUIDANCE: Record<EnglishLevel, string> = {
  A1: "Use very simple words, short sentences, present tense mainly.",
  A2: "Use simple vocabulary and basic past and future tenses.",
  B1: "Use everyday vocabulary, various tenses and simple idioms.",
  B2: "Use varied vocabulary, complex sentences and common phrasal verbs.",
  C1: "Use sophisticated vocabulary, idioms and nuanced expressions.",
  C2: "Use native-level vocabulary, cultural references and subtle humor.",
};

/** Grammar rules listed alongside the user's message, at most. */
const MAX_FLAGGED_RULES = 3;

export function buildSystemPrompt(level: EnglishLevel, isVoice: boolean, context: TutorContext): string {
  const lines = [
    "You are a friendly, encouraging English conversation tutor.",
    `Address the student as "${context.userName}" when it feels natural.`,
    `Student level: ${level}. ${LEVEL_GUIDANCE[level]}`,
    "Always answer in English. Keep replies conversational and end with a follow-up question.",
    "If the student made mistakes, add a line containing only --- and then short correction notes.",
  ];
  if (isVoice) {
    lines.push("The student sent a voice message; include a pronunciation tip when relevant.");
  }
  if (!context.isFirstConversation) {
    lines.push("", "Conversation so far:", context.summary);
  }
  return lines.join("\n");
}

export function buildUserContent(message: string, corrections: GrammarCorrection[]): string {
  if (corrections.length === 0) return message;
  const rules = corrections.slice(0, MAX_FLAGGED_RULES).map((c) => c.rule);
  return `${message}\n[Grammar issues detected: ${rules.join(", ")}]`;
}

/**
 * System prompt, then the recent turns, then the new message. The new
 * message is already the last stored user turn, so it is not repeated.
 */
export function buildMessages(
  message: string,
  context: TutorContext,
  level: EnglishLevel,
  corrections: GrammarCorrection[],
  isVoice: boolean,
): ChatMessage[] {
  const history = [...context.recentMessages];
  const last = history[history.length - 1];
  if (last && last.role === "user" && last.content === message) history.pop();

  const messages: ChatMessage[] = [
    { role: "system", content: buildSystemPrompt(level, isVoice, context) },
  ];
  for (const turn of history) {
    if (turn.role === "system") continue;
    messages.push({ role: turn.role, content: turn.content });
  }
  messages.push({ role: "user", content: buildUserContent(message, corrections) });
  return messages;
}
