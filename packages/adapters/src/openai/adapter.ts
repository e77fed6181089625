import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import { z } from 'zod';
import { AnalysisServiceError, TimeoutError } from '@diffwatch/shared';
import type { AnalysisConfig } from '@diffwatch/shared';
import type { AnalysisAdapter } from '../adapter';
import type { AnalysisContext } from '../types';

interface ChatRequestBody {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

type APIErrorArgs = ConstructorParameters<typeof APIError>;

/**
 * A non-success response from the analysis service. `responseBody` is the body
 * as the service sent it; JSON bodies are re-serialized.
 */
export class ServiceStatusError extends APIError {
  readonly responseBody: string | undefined;

  constructor(...[status, error, message, headers, responseBody]: [...APIErrorArgs, string | undefined]) {
    super(status, error, message, headers);
    this.responseBody = responseBody;
  }
}

/**
 * The SDK hands status errors only the body's nested `error` field; this client
 * keeps the whole body.
 */
class AnalysisClient extends OpenAI {
  protected override makeStatusError(...[status, error, message, headers]: APIErrorArgs): APIError {
    const responseBody = error !== undefined ? JSON.stringify(error) : message || undefined;
    return new ServiceStatusError(status, error, message, headers, responseBody);
  }
}

function stringifyBody(body: unknown): string | undefined {
  if (body === undefined || body === null) return undefined;
  return typeof body === 'string' ? body : JSON.stringify(body);
}

/**
 * Posts prompts to an OpenAI-compatible chat completion endpoint
 * (`{baseUrl}{endpoint}`), e.g. an Ollama or vLLM server.
 */
export class AnalysisDispatcher implements AnalysisAdapter {
  private client: AnalysisClient;
  private readonly config: AnalysisConfig;

  constructor(config: AnalysisConfig) {
    this.config = config;
    this.client = new AnalysisClient({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai-compatible';
  }

  model(): string {
    return this.config.model;
  }

  async analyze(prompt: string, ctx: AnalysisContext = {}): Promise<string> {
    const body: ChatRequestBody = {
      model: this.config.model,
      messages: [{ role: 'user', content: prompt }],
    };

    let response: unknown;
    try {
      response = await this.client.post<ChatRequestBody, unknown>(this.config.endpoint, {
        body,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
        signal: ctx.abortSignal,
      });
    } catch (error) {
      throw this.mapError(error);
    }

    const parsed = ChatCompletionSchema.safeParse(response);
    if (!parsed.success) {
      throw new AnalysisServiceError('Analysis service returned a malformed completion', {
        body: stringifyBody(response),
        cause: parsed.error,
      });
    }
    return parsed.data.choices[0].message.content;
  }

  private mapError(error: unknown): Error {
    // Checked first: the timeout error is itself an APIError.
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError(
        `Analysis request timed out after ${this.config.timeoutMs}ms`,
        { cause: error },
      );
    }
    if (error instanceof APIError) {
      const body = error instanceof ServiceStatusError ? error.responseBody : stringifyBody(error.error);
      if (!error.status) {
        return new AnalysisServiceError(`Analysis request failed: ${error.message}`, { body, cause: error });
      }
      return new AnalysisServiceError(
        body ? `API error: ${error.status} - ${body}` : `API error: ${error.status}`,
        { status: error.status, body, cause: error },
      );
    }
    return new AnalysisServiceError(
      `Analysis request failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
