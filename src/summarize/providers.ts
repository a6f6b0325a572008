import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { z } from "zod";
import type { SummarizerSettings } from "../config/index.js";
import { ConfigurationError, isTransientStatus, SummarizationError } from "../errors.js";
import type { Story } from "../hn/index.js";

export interface SummaryRequest {
  story: Story;
  text: string;
  maxLength: number;
  signal?: AbortSignal;
}

/** One LLM backend. Throws on any provider error; callers decide what to do. */
export interface SummaryProvider {
  readonly name: string;
  summarize(request: SummaryRequest): Promise<string>;
}

const PROMPT_TEXT_LIMIT = 4000;

export function buildPrompt(story: Story, text: string, maxLength: number, language: string): string {
  return `Summarize the following article from Hacker News in ${language}.

Title: ${story.title}
URL: ${story.url ?? "(none)"}
Points: ${story.score ?? 0}
Comments: ${story.comments ?? 0}

Content:
${text.slice(0, PROMPT_TEXT_LIMIT)}

Write a concise summary of at most ${maxLength} characters that captures the main points and key details for someone who has not read the article.
Use flowing prose, not bullet points. Respond with just the summary, no preamble.`;
}

function requireKey(settings: SummarizerSettings): string {
  if (!settings.apiKey) {
    throw new ConfigurationError(`No API key resolved for provider ${settings.provider}`);
  }
  return settings.apiKey.value;
}

export class AnthropicProvider implements SummaryProvider {
  readonly name = "anthropic";
  private readonly client: Anthropic;

  constructor(private readonly settings: SummarizerSettings) {
    // Retries are the pipeline's call, not the SDK's
    this.client = new Anthropic({ apiKey: requireKey(settings), maxRetries: 0 });
  }

  async summarize({ story, text, maxLength, signal }: SummaryRequest): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        messages: [
          {
            role: "user",
            content: buildPrompt(story, text, maxLength, this.settings.language),
          },
        ],
      },
      { signal, timeout: this.settings.timeoutMs }
    );

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();
  }
}

export class OpenAIProvider implements SummaryProvider {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(private readonly settings: SummarizerSettings) {
    this.client = new OpenAI({ apiKey: requireKey(settings), maxRetries: 0 });
  }

  async summarize({ story, text, maxLength, signal }: SummaryRequest): Promise<string> {
    const res = await this.client.chat.completions.create(
      {
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        messages: [
          { role: "system", content: "You are a concise technology news editor." },
          { role: "user", content: buildPrompt(story, text, maxLength, this.settings.language) },
        ],
      },
      { signal, timeout: this.settings.timeoutMs }
    );

    return (res.choices[0]?.message.content ?? "").trim();
  }
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
});

export class GeminiProvider implements SummaryProvider {
  readonly name = "gemini";

  constructor(
    private readonly settings: SummarizerSettings,
    private readonly baseUrl = "https://generativelanguage.googleapis.com/v1beta"
  ) {
    requireKey(settings);
  }

  async summarize({ story, text, maxLength, signal }: SummaryRequest): Promise<string> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.settings.model)}:generateContent`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": requireKey(this.settings),
      },
      body: JSON.stringify({
        contents: [
          { role: "user", parts: [{ text: buildPrompt(story, text, maxLength, this.settings.language) }] },
        ],
        generationConfig: {
          maxOutputTokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          topP: 0.95,
        },
      }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new SummarizationError(`Gemini request failed: ${response.status} ${body.slice(0, 200)}`, {
        transient: isTransientStatus(response.status),
      });
    }

    const parsed = GeminiResponseSchema.parse(await response.json());
    const parts = parsed.candidates[0]?.content?.parts ?? [];
    return parts
      .map((part) => part.text ?? "")
      .join("")
      .trim();
  }
}

const OllamaResponseSchema = z.object({ response: z.string() });

/** Ollama's /api/generate; no credential. */
export class LocalModelProvider implements SummaryProvider {
  readonly name = "local-model";

  constructor(private readonly settings: SummarizerSettings) {}

  async summarize({ story, text, maxLength, signal }: SummaryRequest): Promise<string> {
    const baseUrl = (this.settings.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    const response = await fetch(`${baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.settings.model,
        prompt: buildPrompt(story, text, maxLength, this.settings.language),
        stream: false,
        options: {
          num_predict: this.settings.maxTokens,
          temperature: this.settings.temperature,
        },
      }),
      signal,
    });

    if (!response.ok) {
      throw new SummarizationError(`Local model request failed: ${response.status}`, {
        transient: isTransientStatus(response.status),
      });
    }

    return OllamaResponseSchema.parse(await response.json()).response.trim();
  }
}

export function createProvider(settings: SummarizerSettings): SummaryProvider {
  switch (settings.provider) {
    case "gemini":
      return new GeminiProvider(settings);
    case "openai":
      return new OpenAIProvider(settings);
    case "anthropic":
      return new AnthropicProvider(settings);
    case "local-model":
      return new LocalModelProvider(settings);
  }
}
