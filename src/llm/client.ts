import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError, LlmUnavailableError, errorMessage } from '../shared/errors.js';
import { backoffDelay, hasAttemptsLeft, type RetryPolicy } from '../shared/retry.js';
import { sleep as realSleep } from '../shared/utils.js';
import type { Config } from '../shared/config.js';
import type { ClassificationOracle } from './oracle.js';

export type LlmProvider = Config['llm']['provider'];

const DEFAULT_BASE_URLS: Record<LlmProvider, string> = {
  openai: 'https://integrate.api.nvidia.com/v1',
  gemini: 'https://generativelanguage.googleapis.com/v1beta',
};

// OpenAI-compatible chat completions API response shape (partial)
const OpenAIResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

// Gemini generateContent response shape (partial)
const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      }),
    )
    .optional(),
});

interface PreparedRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface LlmClientOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

// Connect and header timeouts surface from fetch as TypeError('fetch failed') with a coded cause.
const TIMEOUT_CAUSE_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'ETIMEDOUT']);

function causeCode(err: Error): string | null {
  const cause: unknown = err.cause;
  if (cause === null || typeof cause !== 'object' || !('code' in cause)) return null;
  return typeof cause.code === 'string' ? cause.code : null;
}

export function isTimeout(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'TimeoutError' || err.name === 'AbortError') return true;
  const code = causeCode(err);
  return code !== null && TIMEOUT_CAUSE_CODES.has(code);
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * HTTP classification oracle. The provider tag picks the wire format;
 * retry behaviour is shared.
 */
export class LlmClient implements ClassificationOracle {
  readonly name: string;
  private readonly provider: LlmProvider;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly cooldownMs: number;
  private readonly retry: RetryPolicy;
  private readonly timeoutAttempts: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: Config['llm'], options: LlmClientOptions = {}) {
    this.provider = config.provider;
    this.baseUrl = (config.base_url || DEFAULT_BASE_URLS[config.provider]).replace(/\/+$/, '');
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
    this.cooldownMs = config.cooldown_ms;
    this.retry = {
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay_ms,
      maxDelayMs: config.retry.max_delay_ms,
    };
    this.timeoutAttempts = config.retry.timeout_attempts;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? realSleep;
    this.name = `${config.provider}:${config.model}`;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async classify(text: string, instructions: string): Promise<string> {
    const request = this.prepare(text, instructions);
    let timeouts = 0;

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      let response: Response;
      try {
        response = await this.fetchImpl(request.url, {
          method: 'POST',
          headers: request.headers,
          body: request.body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        if (isTimeout(err)) {
          timeouts++;
          if (timeouts >= this.timeoutAttempts) {
            throw new LlmUnavailableError(`LLM unreachable after ${timeouts} timeouts`, {
              provider: this.provider,
              timeout_ms: this.timeoutMs,
            });
          }
          logger.warn({ attempt: attempt + 1, timeouts }, 'LLM request timed out, retrying');
          await this.sleep(this.retry.baseDelayMs);
          continue;
        }
        if (!hasAttemptsLeft(this.retry, attempt)) {
          throw new LlmError(`LLM request failed: ${errorMessage(err)}`, {
            provider: this.provider,
            attempts: attempt + 1,
          });
        }
        const delay = backoffDelay(this.retry, attempt);
        logger.warn({ attempt: attempt + 1, delay, error: errorMessage(err) }, 'LLM request failed, retrying');
        await this.sleep(delay);
        continue;
      }

      if (isRetryableStatus(response.status)) {
        if (!hasAttemptsLeft(this.retry, attempt)) break;
        const delay = backoffDelay(this.retry, attempt);
        logger.warn(
          { status: response.status, attempt: attempt + 1, max: this.retry.maxAttempts, delay },
          'LLM rate limited or failing, backing off',
        );
        await this.sleep(delay);
        continue;
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
          status: response.status,
          body: body.slice(0, 500),
        });
      }

      const content = await this.extractContent(response);
      if (this.cooldownMs > 0) await this.sleep(this.cooldownMs);
      logger.debug({ provider: this.provider, chars: content.length }, 'LLM call completed');
      return content;
    }

    throw new LlmError(`LLM API failed after ${this.retry.maxAttempts} attempts`, {
      provider: this.provider,
    });
  }

  private prepare(text: string, instructions: string): PreparedRequest {
    switch (this.provider) {
      case 'openai':
        return {
          url: `${this.baseUrl}/chat/completions`,
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify({
            model: this.model,
            messages: [
              { role: 'system', content: instructions },
              { role: 'user', content: text },
            ],
            max_tokens: this.maxTokens,
            temperature: this.temperature,
          }),
        };
      case 'gemini':
        return {
          url: `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`,
          headers: {
            'Content-Type': 'application/json',
            'x-goog-api-key': this.apiKey,
          },
          body: JSON.stringify({
            contents: [{ parts: [{ text: `${instructions}\n\nText: ${text}` }] }],
            generationConfig: { maxOutputTokens: this.maxTokens, temperature: this.temperature },
          }),
        };
    }
  }

  private async extractContent(response: Response): Promise<string> {
    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new LlmError('LLM response is not valid JSON', { cause: errorMessage(err) });
    }

    switch (this.provider) {
      case 'openai': {
        const parsed = OpenAIResponseSchema.safeParse(data);
        if (!parsed.success) {
          throw new LlmError('Unexpected LLM response shape', {
            response: JSON.stringify(data).slice(0, 200),
          });
        }
        return parsed.data.choices[0].message.content ?? '';
      }
      case 'gemini': {
        const parsed = GeminiResponseSchema.safeParse(data);
        if (!parsed.success) {
          throw new LlmError('Unexpected LLM response shape', {
            response: JSON.stringify(data).slice(0, 200),
          });
        }
        const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
        return parts.map((p) => p.text ?? '').join('');
      }
    }
  }
}

/** Oracle from config, or null when no API key is configured. */
export function createOracle(config: Config['llm'], options: LlmClientOptions = {}): LlmClient | null {
  const client = new LlmClient(config, options);
  return client.isConfigured() ? client : null;
}
