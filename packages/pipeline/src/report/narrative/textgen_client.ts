// packages/pipeline/src/report/narrative/textgen_client.ts
//
// Client for an OpenAI-compatible chat completions endpoint. Every failure
// (missing credential, timeout, transport, non-2xx, unusable body) surfaces as
// ExternalServiceError so the caller can fall back.

import { z } from "zod";

import type { TextGenSettings } from "../../config";
import { errorMessage, ExternalServiceError } from "../../errors";

export type TextGenerationRequest = {
  prompt: string;
  maxTokens: number;
};

export interface TextGenerationClient {
  complete(req: TextGenerationRequest): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export class ChatCompletionsClient implements TextGenerationClient {
  constructor(
    private readonly settings: TextGenSettings,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async complete(req: TextGenerationRequest): Promise<string> {
    const { apiKey, baseUrl, model, timeoutMs } = this.settings;
    if (!apiKey) throw new ExternalServiceError("credential", "no text-generation credential configured");

    const url = `${baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: [{ role: "user", content: req.prompt }],
          max_tokens: req.maxTokens,
        }),
        signal: controller.signal,
      });
      status = res.status;
      ok = res.ok;
      text = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ExternalServiceError("timeout", `text generation timed out after ${timeoutMs} ms`, { timeout_ms: timeoutMs });
      }
      throw new ExternalServiceError("network", `text generation request failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }

    if (!ok) {
      throw new ExternalServiceError("http", `text generation returned http ${status}`, { status, body: text.slice(0, 200) });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ExternalServiceError("malformed", "text generation response is not JSON");
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    const content = parsed.success ? parsed.data.choices[0].message.content?.trim() : undefined;
    if (!content) throw new ExternalServiceError("malformed", "text generation response has no content");
    return content;
  }
}
