import OpenAI from 'openai';
import { UpstreamCapabilityError } from '../control-plane/errors.js';
import type { CapabilityId } from '../config/capabilities.js';
import type { TokenCounts } from '../analysis/usage.js';

export interface CapabilityRequest {
  capability: CapabilityId;
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface CapabilityResponse {
  content: string;
  tokens: TokenCounts;
}

export interface Capability {
  invoke(request: CapabilityRequest): Promise<CapabilityResponse>;
}

export interface OpenAiCapabilityOptions {
  apiKey: string | null;
  baseUrl: string;
  temperature?: number;
}

export class OpenAiCapability implements Capability {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiCapabilityOptions) {}

  async invoke(request: CapabilityRequest): Promise<CapabilityResponse> {
    const client = this.getClient();

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await client.chat.completions.create(
        {
          model: request.capability,
          temperature: this.options.temperature ?? 0,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          response_format: { type: 'json_object' },
        },
        { signal: request.signal }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamCapabilityError(`${request.capability} request failed: ${message}`, { cause: error });
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new UpstreamCapabilityError(`${request.capability} returned an empty response`);
    }

    return {
      content,
      tokens: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens,
      },
    };
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (!this.options.apiKey) {
      throw new UpstreamCapabilityError(
        'OPENROUTER_API_KEY environment variable is required to call a capability.\n' +
        'Set it with: export OPENROUTER_API_KEY=<key>'
      );
    }
    this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl });
    return this.client;
  }
}
