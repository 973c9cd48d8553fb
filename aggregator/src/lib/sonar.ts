import OpenAI from "openai";
import { z } from "zod";
import { reasonForStatus, SourceError, SourceTimeoutError } from "../errors";
import { RawSourceResponse, SOURCE_TAGS } from "../types";
import { Logger } from "./logger";

export interface PrimarySourceClient {
  readonly source: typeof SOURCE_TAGS.primary;
  query(prompt: string, options?: { signal?: AbortSignal }): Promise<RawSourceResponse>;
}

export interface SonarClientConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  logLevel?: string;
}

// Sonar answers in the chat-completions shape plus its own citation fields.
const SonarCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).passthrough()
      }).passthrough()
    )
    .min(1),
  citations: z.array(z.string()).nullish(),
  search_results: z
    .array(
      z.object({
        url: z.string(),
        title: z.string().nullish()
      }).passthrough()
    )
    .nullish()
});

export function toRawSourceResponse(payload: unknown): RawSourceResponse {
  const parsed = SonarCompletionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SourceError(SOURCE_TAGS.primary, "malformed_payload", parsed.error.issues[0]?.message ?? "unexpected payload");
  }

  const { choices, citations, search_results: searchResults } = parsed.data;
  return {
    text: choices[0].message.content ?? "",
    citations: citations ?? [],
    relatedResults: (searchResults ?? []).map((result) => ({
      url: result.url,
      ...(result.title ? { title: result.title } : {})
    }))
  };
}

export class PerplexitySonarClient implements PrimarySourceClient {
  readonly source = SOURCE_TAGS.primary;
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(private readonly config: SonarClientConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0
    });
    this.logger = new Logger("aggregator.sonar", config.logLevel);
  }

  get model(): string {
    return this.config.model;
  }

  async query(prompt: string, options: { signal?: AbortSignal } = {}): Promise<RawSourceResponse> {
    const started = Date.now();
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [{ role: "user", content: prompt }],
          max_tokens: 2048,
          temperature: 0.1,
          top_p: 0.9,
          stream: false
        },
        { signal: options.signal }
      );

      const response = toRawSourceResponse(completion);
      this.logger.debug("sonar_answered", {
        duration_ms: Date.now() - started,
        text_chars: response.text.length,
        citations: response.citations.length
      });
      return response;
    } catch (error) {
      throw this.translate(error);
    }
  }

  private translate(error: unknown): Error {
    if (error instanceof SourceError) {
      return error;
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
      return new SourceTimeoutError(this.source, this.config.timeoutMs);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new SourceError(this.source, "network_error", error.message);
    }
    if (error instanceof OpenAI.APIError) {
      this.logger.warn("sonar_http_error", { status: error.status, message: error.message });
      return new SourceError(this.source, reasonForStatus(error.status), error.message, error.status);
    }
    return new SourceError(this.source, "upstream_error", error instanceof Error ? error.message : String(error));
  }
}
