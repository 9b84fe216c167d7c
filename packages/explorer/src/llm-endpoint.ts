/**
 * LLM endpoint adapter
 *
 * The oracle only needs "prompt in, text out". `AiSdkEndpoint` provides that
 * over the Vercel AI SDK for Gemini and OpenAI models.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText, type ModelMessage } from 'ai';

export interface OracleMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface OracleRequest {
  system: string;
  messages: OracleMessage[];
}

export interface OracleEndpoint {
  /** Resolve with the raw model text; reject on transport or provider failure */
  complete(request: OracleRequest, signal: AbortSignal): Promise<string>;
}

export type LlmProvider = 'google' | 'openai';

export interface AiSdkEndpointOptions {
  provider: LlmProvider;
  model: string;
  temperature?: number;
  googleApiKey?: string;
  openaiApiKey?: string;
}

export class AiSdkEndpoint implements OracleEndpoint {
  private google: ReturnType<typeof createGoogleGenerativeAI>;
  private openai: ReturnType<typeof createOpenAI>;
  private provider: LlmProvider;
  private modelId: string;
  private temperature: number;

  constructor(options: AiSdkEndpointOptions) {
    const googleKey =
      options.googleApiKey || process.env.GOOGLE_GENERATIVE_AI_API_KEY || process.env.GOOGLE_API_KEY;
    const openaiKey = options.openaiApiKey || process.env.OPENAI_API_KEY;

    this.google = createGoogleGenerativeAI(googleKey ? { apiKey: googleKey } : undefined);
    this.openai = createOpenAI(openaiKey ? { apiKey: openaiKey } : undefined);
    this.provider = options.provider;
    this.modelId = options.model;
    this.temperature = options.temperature ?? 0.4;
  }

  async complete(request: OracleRequest, signal: AbortSignal): Promise<string> {
    const model = this.provider === 'google' ? this.google(this.modelId) : this.openai(this.modelId);

    const messages = request.messages.map(
      (message): ModelMessage =>
        message.role === 'user'
          ? { role: 'user', content: message.content }
          : { role: 'assistant', content: message.content }
    );

    // Retries are owned by the oracle so backoff stays configurable
    const response = await generateText({
      model,
      system: request.system,
      messages,
      temperature: this.temperature,
      maxRetries: 0,
      abortSignal: signal,
    });

    return response.text.trim();
  }
}
