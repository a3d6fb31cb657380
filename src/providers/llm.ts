import OpenAI from 'openai';
import { ParseError, ProviderError, errorMessage } from '../control-plane/errors.js';
import type { Schema } from '../utils/schema.js';

export interface CompletionRequest<T> {
  prompt: string;
  model: string;
  schema: Schema<T>;
  system?: string;
}

/**
 * Structured completion. Implementations throw `ProviderError` when the call itself fails
 * and `ParseError` when the reply is not JSON matching `schema`.
 */
export interface LlmService {
  complete<T>(request: CompletionRequest<T>): Promise<T>;
}

const DEFAULT_SYSTEM =
  'You are a compliance auditor. Reply with a single JSON object and nothing else.';

export class OpenAiLlmService implements LlmService {
  private readonly client: OpenAI;

  constructor(options: { apiKey: string; baseUrl?: string }) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
  }

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    let raw: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        temperature: 0,
        messages: [
          { role: 'system', content: request.system ?? DEFAULT_SYSTEM },
          { role: 'user', content: request.prompt },
        ],
        response_format: { type: 'json_object' },
      });
      raw = response.choices[0]?.message?.content;
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      throw new ProviderError(`LLM call to ${request.model} failed: ${errorMessage(err)}`, {
        cause: err,
        status,
      });
    }

    if (!raw) {
      throw new ParseError(`LLM ${request.model} returned an empty response`, '');
    }
    return parseStructured(raw, request.schema);
  }
}

/** Parses a JSON reply, tolerating a fenced code block around it. */
export function parseStructured<T>(raw: string, schema: Schema<T>): T {
  const body = raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new ParseError(`LLM returned invalid JSON: ${raw.slice(0, 200)}`, raw);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`LLM reply does not match the expected shape: ${issues}`, raw);
  }
  return result.data;
}
