const BLOCKED_PATTERNS: RegExp[] = [/<script/i, /javascript:/i, /data:text\/html/i];
const HTML_TAG = /<[^>]+>/g;

export type TextValidationResult =
  | { ok: true; text: string }
  | { ok: false; reason: "empty" | "too-long" | "blocked"; violations: string[] };

export interface InputValidatorOptions {
  maxTextLength?: number;
  maxAudioBytes?: number;
}

/** Gateway-side checks run before anything is queued. */
export class InputValidator {
  readonly maxTextLength: number;
  readonly maxAudioBytes: number;

  constructor(options: InputValidatorOptions = {}) {
    this.maxTextLength = options.maxTextLength ?? 1000;
    this.maxAudioBytes = options.maxAudioBytes ?? 20 * 1024 * 1024;
  }

  /** Rejects empty, oversized or script-bearing text; strips HTML tags from the rest. */
  validateText(text: string): TextValidationResult {
    const source = typeof text === "string" ? text : "";
    if (source.trim().length === 0) return { ok: false, reason: "empty", violations: [] };
    if (source.length > this.maxTextLength) return { ok: false, reason: "too-long", violations: [] };

    const violations = BLOCKED_PATTERNS.filter((p) => p.test(source)).map((p) => p.source);
    if (violations.length > 0) return { ok: false, reason: "blocked", violations };

    const cleaned = source.trim().replace(HTML_TAG, "").trim();
    if (cleaned.length === 0) return { ok: false, reason: "empty", violations: [] };
    return { ok: true, text: cleaned };
  }

  validateAudio(sizeBytes: number): boolean {
    return Number.isFinite(sizeBytes) && sizeBytes > 0 && sizeBytes <= this.maxAudioBytes;
  }
}
