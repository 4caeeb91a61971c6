// node/src/services/llm-client.ts: low-level client implementing LlmClient for the router

import OpenAI from 'openai';
import type { LlmClient, ModelName, LlmCallOptions } from './model-router';

const DEFAULT_SYSTEM: Record<LlmCallOptions['task'], string> = {
  classification: 'You are a JSON-only intent classifier for a food ordering assistant.',
  extraction: 'You are a JSON-only extractor of food preferences.',
  ranking: 'You design ranking conditions for food recommendations. Respond in JSON.',
  explanation: 'You write one-sentence justifications for food recommendations. Respond in JSON.',
};

export interface ProviderLlmClientOptions {
  apiKey: string;
  smallModel: string;
  mainModel: string;
}

export class ProviderLlmClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(private readonly options: ProviderLlmClientOptions) {
    // retries are owned by the gateway
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async call(model: ModelName, prompt: string, options?: LlmCallOptions): Promise<string> {
    const modelId = model === 'small' ? this.options.smallModel : this.options.mainModel;
    const task = options?.task ?? 'classification';
    const maxTokens = typeof options?.maxTokens === 'number' ? options.maxTokens : 512;

    const res = await this.client.chat.completions.create(
      {
        model: modelId,
        messages: [
          { role: 'system', content: DEFAULT_SYSTEM[task] },
          { role: 'user', content: prompt },
        ],
        temperature: task === 'explanation' ? 0.3 : 0,
        max_tokens: maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal: options?.signal },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}
