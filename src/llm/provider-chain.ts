import OpenAI from "openai";
import type { GeneratedReply, GenerationRequest, ResponseGenerator } from "../collaborators.js";
import { UpstreamError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { ProviderConfig } from "../types.js";
import { type ChatMessage, buildMessages } from "./prompt.js";
import { splitReply } from "./reply-format.js";

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

/** One backend able to answer a chat completion. */
export interface ChatProvider {
  readonly id: string;
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/$/, "");
}

function toOpenAiMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

/** Any OpenAI-compatible endpoint (OpenAI, OpenRouter, a local server). */
export class OpenAiCompatibleProvider implements ChatProvider {
  readonly id: string;
  private readonly client: OpenAI;

  constructor(private readonly config: ProviderConfig) {
    this.id = config.id;
    this.client = new OpenAI({
      apiKey: config.apiKey ?? "not-needed",
      baseURL: trimBaseUrl(config.baseUrl),
      maxRetries: 0,
      ...(config.headers ? { defaultHeaders: config.headers } : {}),
    });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: messages.map(toOpenAiMessage),
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      },
      { signal: options.signal },
    );
    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`empty response from ${this.id}`);
    }
    return content;
  }
}

interface AnthropicResponse {
  content?: Array<{ type?: string; text?: string }>;
}

function isAnthropicResponse(value: unknown): value is AnthropicResponse {
  return typeof value === "object" && value !== null;
}

/** Anthropic Messages API over fetch. */
export class AnthropicMessagesProvider implements ChatProvider {
  readonly id: string;

  constructor(
    private readonly config: ProviderConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.id = config.id;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "anthropic-version": "2023-06-01",
      ...this.config.headers,
    };
    if (this.config.apiKey) headers["x-api-key"] = this.config.apiKey;

    // The Messages API takes the system prompt as a separate field.
    const system = messages.find((m) => m.role === "system")?.content;
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: messages.filter((m) => m.role !== "system"),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    };
    if (system) body.system = system;

    const response = await this.fetchImpl(`${trimBaseUrl(this.config.baseUrl)}/messages`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: options.signal,
    });
    if (!response.ok) {
      throw new Error(`Anthropic API error: ${response.status} ${await response.text()}`);
    }

    const data: unknown = await response.json();
    const text = isAnthropicResponse(data)
      ? data.content?.find((block) => block.type === "text")?.text
      : undefined;
    if (!text) {
      throw new Error(`empty response from ${this.id}`);
    }
    return text;
  }
}

export function createProvider(config: ProviderConfig): ChatProvider {
  switch (config.api) {
    case "anthropic-messages":
      return new AnthropicMessagesProvider(config);
    case "openai-completions":
      return new OpenAiCompatibleProvider(config);
  }
}

export interface ProviderChainOptions {
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

/** Confidence recorded for the first provider; each fallback step lowers it. */
const PRIMARY_CONFIDENCE = 0.9;
const FALLBACK_CONFIDENCE_STEP = 0.1;
const MIN_PROVIDER_CONFIDENCE = 0.5;

function providerConfidence(position: number): number {
  const raw = PRIMARY_CONFIDENCE - position * FALLBACK_CONFIDENCE_STEP;
  return Math.max(MIN_PROVIDER_CONFIDENCE, Math.round(raw * 100) / 100);
}

/**
 * Walks the configured providers in order; the first one that answers
 * within the timeout wins.
 */
export class ProviderChain implements ResponseGenerator {
  constructor(
    private readonly providers: ChatProvider[],
    private readonly options: ProviderChainOptions,
  ) {}

  get size(): number {
    return this.providers.length;
  }

  async generate(request: GenerationRequest): Promise<GeneratedReply> {
    if (this.providers.length === 0) {
      throw new UpstreamError("response-generator", "no providers configured");
    }

    const messages = buildMessages(
      request.message,
      request.context,
      request.level,
      request.corrections,
      request.isVoice,
    );

    let lastError: unknown;
    for (let i = 0; i < this.providers.length; i++) {
      const provider = this.providers[i];
      if (!provider) continue;
      try {
        const content = await this.withTimeout(provider, messages);
        if (i > 0) log.info(`response generated by ${provider.id} (fallback ${i})`);
        const { englishOnly, corrections } = splitReply(content);
        return {
          text: content.trim(),
          englishOnly,
          corrections,
          source: provider.id,
          confidence: providerConfidence(i),
        };
      } catch (err) {
        lastError = err;
        log.debug(`provider ${provider.id} failed (${errorMessage(err)}), trying next...`);
      }
    }

    log.warn(`all ${this.providers.length} response providers failed`);
    throw new UpstreamError(
      "response-generator",
      `all ${this.providers.length} providers failed`,
      { cause: lastError },
    );
  }

  private async withTimeout(provider: ChatProvider, messages: ChatMessage[]): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`${provider.id} timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);
    });
    try {
      return await Promise.race([
        provider.complete(messages, {
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createProviderChain(providers: ProviderConfig[], options: ProviderChainOptions): ProviderChain {
  return new ProviderChain(providers.map(createProvider), options);
}
