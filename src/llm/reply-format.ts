export const CORRECTIONS_SEPARATOR = "---";

/** Split a model reply into its conversational part and its correction notes. */
export function splitReply(content: string): { englishOnly: string; corrections: string | null } {
  const idx = content.indexOf(CORRECTIONS_SEPARATOR);
  if (idx === -1) return { englishOnly: content.trim(), corrections: null };
  const corrections = content.slice(idx + CORRECTIONS_SEPARATOR.length).trim();
  return {
    englishOnly: content.slice(0, idx).trim(),
    corrections: corrections.length > 0 ? corrections : null,
  };
}
