// Speaker Match - Scoring Client
// One capability, complete(prompt) -> text, behind two interchangeable
// providers. The matcher and scorer only ever see the ScoringClient interface.
//
// No retries here: the SDKs are built with maxRetries: 0 and a failed call
// surfaces as a ProviderError for the caller to contain.

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { ProviderName, ScoringConfig } from "./config.js";
import { ProviderError, errorMessage } from "./errors.js";

// ─── Capability ─────────────────────────────────────────────────────────────────

export interface ScoringClient {
  readonly provider: ProviderName;
  readonly model: string;
  /** Send one prompt, resolve with the model's trimmed text reply. */
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface ScoringClientOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  systemPrompt?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

// ─── Minimal SDK surfaces (structural, so tests can pass fakes) ─────────────────

type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: ChatMessage[];
          temperature?: number;
          max_tokens?: number;
        },
        options?: RequestOptions,
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface AnthropicMessagesClient {
  messages: {
    create(
      params: {
        model: string;
        max_tokens: number;
        temperature?: number;
        system?: string;
        messages: Array<{ role: "user"; content: string }>;
      },
      options?: RequestOptions,
    ): Promise<{
      content: Array<{ type: string; text?: string }>;
    }>;
  };
}

// ─── Error normalization ────────────────────────────────────────────────────────

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

function toProviderError(provider: ProviderName, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const status = statusOf(error);
  const detail = status !== undefined ? `${status} ${errorMessage(error)}` : errorMessage(error);
  return new ProviderError(provider, `completion failed: ${detail}`, status);
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

export class OpenAIScoringClient implements ScoringClient {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly client: OpenAIChatClient;
  private readonly options: ScoringClientOptions;

  constructor(client: OpenAIChatClient, options: ScoringClientOptions) {
    this.client = client;
    this.options = options;
    this.model = options.model;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const messages: ChatMessage[] = [];
    if (this.options.systemPrompt) {
      messages.push({ role: "system", content: this.options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        },
        { signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw toProviderError(this.provider, err);
    }

    const text = content?.trim();
    if (!text) {
      throw new ProviderError(this.provider, "LLM returned empty response");
    }
    return text;
  }
}

// ─── Anthropic ──────────────────────────────────────────────────────────────────

export class AnthropicScoringClient implements ScoringClient {
  readonly provider = "anthropic" as const;
  readonly model: string;
  private readonly client: AnthropicMessagesClient;
  private readonly options: ScoringClientOptions;

  constructor(client: AnthropicMessagesClient, options: ScoringClientOptions) {
    this.client = client;
    this.options = options;
    this.model = options.model;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    let blocks: Array<{ type: string; text?: string }>;
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          ...(this.options.systemPrompt ? { system: this.options.systemPrompt } : {}),
          messages: [{ role: "user", content: prompt }],
        },
        { signal },
      );
      blocks = response.content;
    } catch (err) {
      throw toProviderError(this.provider, err);
    }

    const text = blocks
      .filter((b) => b.type === "text")
      .map((b) => b.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new ProviderError(this.provider, "LLM returned empty response");
    }
    return text;
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/**
 * Build the configured provider on top of its official SDK.
 * `systemPrompt` is sent with every completion.
 */
export function createScoringClient(config: ScoringConfig, systemPrompt?: string): ScoringClient {
  const options: ScoringClientOptions = {
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    systemPrompt,
  };

  switch (config.provider) {
    case "openai": {
      const sdk = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
      return new OpenAIScoringClient(
        {
          chat: {
            completions: {
              create: (params, requestOptions) => sdk.chat.completions.create(params, requestOptions),
            },
          },
        },
        options,
      );
    }
    case "anthropic": {
      const sdk = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
      return new AnthropicScoringClient(
        {
          messages: {
            create: (params, requestOptions) => sdk.messages.create(params, requestOptions),
          },
        },
        options,
      );
    }
    default: {
      const _exhaustive: never = config.provider;
      throw new ProviderError(String(_exhaustive), "unknown provider");
    }
  }
}
