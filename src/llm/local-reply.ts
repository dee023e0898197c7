import type { GeneratedReply } from "../collaborators.js";
import type { EnglishLevel } from "../types.js";

export const LOCAL_REPLY_SOURCE = "local";
const LOCAL_REPLY_CONFIDENCE = 0.3;

interface KeywordReply {
  keywords: string[];
  reply: string;
}

// Checked in order; the first rule with a matching keyword wins.
const KEYWORD_REPLIES: KeywordReply[] = [
  {
    keywords: ["hungry", "hunger", "eat", "fome", "comer"],
    reply: "To say you want food in English, you can say: I'm hungry. What would you like to eat?",
  },
  {
    keywords: ["how do i say", "how to say", "como se diz", "translate"],
    reply: "Tell me what you want to say and I'll help you find the English words for it.",
  },
  {
    keywords: ["hello", "hi", "hey", "oi", "olá"],
    reply: "Hello! It's great to hear from you. How is your day going?",
  },
  {
    keywords: ["help", "ajuda"],
    reply:
      "I'm here to help you practice English. You can ask how to say something, send a voice message to practice pronunciation, or just chat with me. What would you like to start with?",
  },
  {
    keywords: ["thanks", "thank", "obrigado", "obrigada"],
    reply: "You're welcome! Every question you ask helps you get better. Keep it up!",
  },
];

const LEVEL_DEFAULTS: Record<EnglishLevel, string> = {
  A1: "That's interesting! Can you tell me more about that?",
  A2: "Thanks for sharing that! Can you describe what you did yesterday?",
  B1: "That's a great topic! What's your favorite hobby?",
  B2: "I'm here to help you with English! What would you like to practice today?",
  C1: "I'm excited to continue our English practice! What's on your mind?",
  C2: "Great to chat with you again! What topic shall we explore today?",
};

function mentions(text: string, keyword: string): boolean {
  const padded = ` ${text.toLowerCase().replace(/[^\p{L}\p{N}' ]+/gu, " ")} `;
  return padded.includes(` ${keyword} `);
}

/** Deterministic reply used when no provider could answer. */
export function localReply(message: string, level: EnglishLevel): GeneratedReply {
  const rule = KEYWORD_REPLIES.find((r) => r.keywords.some((k) => mentions(message, k)));
  const text = rule ? rule.reply : LEVEL_DEFAULTS[level];
  return {
    text,
    englishOnly: text,
    corrections: null,
    source: LOCAL_REPLY_SOURCE,
    confidence: LOCAL_REPLY_CONFIDENCE,
  };
}
