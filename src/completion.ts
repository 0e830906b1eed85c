import OpenAI from 'openai';
import pRetry, { AbortError } from 'p-retry';
import chalk from 'chalk';
import type { ConfigRecord } from './config.js';
import { logDebug } from './logger.js';

export interface CompletionRequest {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
  max_tokens: number;
  temperature: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
  stop?: string;
}

export interface CompletionResult {
  text: string;
  usage?: { inputTokens: number; outputTokens: number };
}

/**
 * The configured endpoint is the API host; requests go to its /v1 root.
 * An endpoint that already names /v1 is used as is.
 */
export function toBaseUrl(endpoint: string): string {
  const trimmed = endpoint.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

export function buildCompletionRequest(
  config: ConfigRecord,
  prompt: string,
): CompletionRequest {
  return {
    model: config.model,
    messages: [{ role: 'user', content: prompt }],
    max_tokens: config.maxTokens,
    temperature: config.temperature,
    top_p: config.topP,
    frequency_penalty: config.frequencyPenalty,
    presence_penalty: config.presencePenalty,
    ...(config.stopSequence !== undefined && { stop: config.stopSequence }),
  };
}

export function createClient(config: ConfigRecord): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: toBaseUrl(config.endpoint),
    timeout: config.timeoutSeconds * 1000,
    // Retries are handled by p-retry
    maxRetries: 0,
  });
}

/**
 * Client errors other than timeouts and rate limits will fail again.
 */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  if (status === 408 || status === 429) return true;
  return status < 400 || status >= 500;
}

export function extractCompletionText(response: {
  choices: Array<{ message: { content: string | null } }>;
}): string {
  return response.choices[0]?.message.content?.trim() ?? '';
}

/**
 * Sends one prompt and returns the completion text, retrying transient
 * failures with exponential backoff.
 */
export async function requestCompletion(params: {
  client: OpenAI;
  config: ConfigRecord;
  prompt: string;
  retries: number;
}): Promise<CompletionResult> {
  const { client, config, prompt, retries } = params;
  const request = buildCompletionRequest(config, prompt);

  return pRetry(
    async () => {
      await logDebug(`Sending request to ${config.model}`);
      const requestStartTime = Date.now();
      try {
        const response = await client.chat.completions.create(request);
        const text = extractCompletionText(response);
        await logDebug(
          `Received response (${text.length} chars) in ${Date.now() - requestStartTime}ms`,
        );
        return {
          text,
          ...(response.usage && {
            usage: {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens,
            },
          }),
        };
      } catch (error) {
        if (
          error instanceof OpenAI.APIError &&
          !isRetryableStatus(error.status)
        ) {
          throw new AbortError(error);
        }
        throw error;
      }
    },
    {
      retries,
      onFailedAttempt: async (error) => {
        const retryMsg = `Retry ${error.attemptNumber}/${retries + 1}: ${error.message}`;
        if (error.retriesLeft > 0) {
          console.error(chalk.yellow(`  ${retryMsg}`));
        }
        await logDebug(retryMsg);
      },
      minTimeout: 1000,
      maxTimeout: 30000,
      factor: 2,
    },
  );
}
