import { z } from 'zod';
import { ConfigError, RequestError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { redactSecrets } from './redact.js';

export const DEFAULT_MODEL = 'gpt-5-mini';
export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 120_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface CompletionClientConfig {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

const ChoiceSchema = z.object({
  index: z.number().optional(),
  message: z.object({ role: z.string().optional(), content: z.string().nullable().optional() }).optional(),
  text: z.string().optional(),
  finish_reason: z.string().nullable().optional(),
});

const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(ChoiceSchema),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

/**
 * Client for an OpenAI-compatible chat completions endpoint.
 *
 * The credential is passed to each call instead of being held by the client, and
 * every call is exactly one request: retrying is left to the caller.
 */
export class CompletionClient {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: CompletionClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model = config.model ?? DEFAULT_MODEL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Send the prompt as a single user turn and return the first choice's text
   */
  async complete(credential: string, prompt: string, model = this.model): Promise<string> {
    const request: ChatCompletionRequest = {
      model,
      messages: [{ role: 'user', content: prompt }],
    };

    const response = await this.send(credential, request);

    if (response.usage) {
      logger.debug(
        `LLM usage: ${response.usage.prompt_tokens} prompt + ${response.usage.completion_tokens} completion = ${response.usage.total_tokens} total tokens`
      );
    }

    return extractText(response);
  }

  private async send(credential: string, request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    const url = `${this.baseUrl}/chat/completions`;

    logger.debug(`Making LLM request to ${url}`);
    logger.debug(`Model: ${request.model}, prompt: ${request.messages[0]?.content.length ?? 0} chars`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${credential}`,
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw RequestError.network(describeNetworkError(error, this.timeoutMs), error);
    }

    if (!response.ok) {
      let detail: string | undefined;
      try {
        detail = redactSecrets(await response.text(), [credential]).slice(0, 500);
      } catch (error) {
        logger.debug(`Could not read error body: ${describeNetworkError(error, this.timeoutMs)}`);
      }
      throw RequestError.httpStatus(response.status, detail);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw RequestError.network(describeNetworkError(error, this.timeoutMs), error);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw RequestError.malformedResponse('Response body is not valid JSON', error);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw RequestError.malformedResponse(
        `Unexpected response shape: ${parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ')}`,
        parsed.error
      );
    }

    return parsed.data;
  }
}

function extractText(response: ChatCompletionResponse): string {
  const [first] = response.choices;
  if (!first) {
    throw RequestError.malformedResponse('No completion choices returned');
  }

  const text = first.message?.content ?? first.text;
  if (typeof text !== 'string') {
    throw RequestError.malformedResponse('First completion choice has no text');
  }

  return text;
}

function describeNetworkError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `Request timed out after ${timeoutMs}ms`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `Request failed: ${message}`;
}

/**
 * Create a completion client, validating its settings
 */
export function createCompletionClient(config: CompletionClientConfig = {}): CompletionClient {
  if (config.baseUrl !== undefined && !/^https?:\/\//.test(config.baseUrl)) {
    throw ConfigError.invalid(`LLM baseUrl must be an http(s) URL, got ${config.baseUrl}`);
  }

  if (config.timeoutMs !== undefined && (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0)) {
    throw ConfigError.invalid('LLM timeout must be a positive number of milliseconds');
  }

  logger.debug(`Creating LLM client: ${config.model ?? DEFAULT_MODEL} at ${config.baseUrl ?? DEFAULT_BASE_URL}`);

  return new CompletionClient(config);
}
