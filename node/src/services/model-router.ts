// node/src/services/model-router.ts: central routing per task type

export type ModelName = 'small' | 'main';

export interface LlmCallOptions {
  task: 'classification' | 'extraction' | 'ranking' | 'explanation';
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  call(model: ModelName, prompt: string, options?: LlmCallOptions): Promise<string>;
}

export class SimpleModelRouter {
  constructor(private readonly client: LlmClient) {}

  async classify(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.client.call('small', prompt, { task: 'classification', maxTokens: 64, signal });
  }

  async extract(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.client.call('small', prompt, { task: 'extraction', maxTokens: 400, signal });
  }

  /** Condition generation reasons over the whole journey, so it goes to the main model. */
  async rank(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.client.call('main', prompt, { task: 'ranking', maxTokens: 800, signal });
  }

  async explain(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.client.call('small', prompt, { task: 'explanation', maxTokens: 900, signal });
  }
}
