// node/src/services/llm-gateway.ts: uniform, bounded contract for every generative call
//
// Every response is treated as untrusted: it is parsed, validated against the task's
// payload schema and rejected as a GatewayError when it does not match. Late answers
// are failures too; nothing partial is ever returned.
import { z } from 'zod';
import {
  GatewayError,
  errorMessage,
  type GatewayTask,
} from '@/errors/pipelineErrors';
import { CircuitBreaker, CircuitOpenError } from '@/stability/circuitBreaker';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { withTimeout } from '@/utils/withTimeout';
import { SimpleModelRouter } from './model-router';
import { safeParseJson } from './safe-parse-json';
import { logger } from './logger';
import {
  buildConditionsPrompt,
  buildExplainPrompt,
  buildIntentPrompt,
  buildSlotExtractPrompt,
  type ConditionsRequest,
  type ExplainRequest,
  type IntentRequest,
  type SlotExtractRequest,
} from './prompt-templates';

export interface IntentPayload {
  intent: string;
  confidence?: number;
}

export interface SlotExtractPayload {
  newQuery: boolean;
  slots: Record<string, unknown>;
}

export interface ConditionsPayload {
  conditions: unknown[];
}

export interface ExplainPayload {
  explanations: Array<{ itemId: string; text: string }>;
}

export interface GatewayRequests {
  intent: IntentRequest;
  slot_extract: SlotExtractRequest;
  conditions: ConditionsRequest;
  explain: ExplainRequest;
}

export interface GatewayPayloads {
  intent: IntentPayload;
  slot_extract: SlotExtractPayload;
  conditions: ConditionsPayload;
  explain: ExplainPayload;
}

const payloadSchemas: { [K in GatewayTask]: z.ZodType<GatewayPayloads[K], z.ZodTypeDef, unknown> } = {
  intent: z.object({
    intent: z.string().min(1),
    confidence: z.number().min(0).max(1).optional(),
  }),
  slot_extract: z.object({
    newQuery: z.boolean().default(false),
    slots: z.record(z.unknown()).default({}),
  }),
  conditions: z.object({
    conditions: z.array(z.unknown()),
  }),
  explain: z.object({
    explanations: z.array(z.object({ itemId: z.string(), text: z.string() })),
  }),
};

const promptBuilders: { [K in GatewayTask]: (req: GatewayRequests[K]) => string } = {
  intent: buildIntentPrompt,
  slot_extract: buildSlotExtractPrompt,
  conditions: buildConditionsPrompt,
  explain: buildExplainPrompt,
};

export interface LanguageModelGateway {
  isAvailable(): boolean;
  call<K extends GatewayTask>(
    task: K,
    request: GatewayRequests[K],
    signal?: AbortSignal,
  ): Promise<GatewayPayloads[K]>;
}

export interface ModelGatewayOptions {
  timeoutMs: number;
  maxRetries: number;
}

export class ModelGateway implements LanguageModelGateway {
  constructor(
    private readonly router: SimpleModelRouter | null,
    private readonly options: ModelGatewayOptions,
    private readonly breaker: CircuitBreaker = new CircuitBreaker('llm-gateway', {
      failureThreshold: 3,
      successThreshold: 1,
      resetTimeout: 60_000,
    }),
  ) {}

  isAvailable(): boolean {
    return this.router !== null;
  }

  async call<K extends GatewayTask>(
    task: K,
    request: GatewayRequests[K],
    signal?: AbortSignal,
  ): Promise<GatewayPayloads[K]> {
    const router = this.router;
    if (router === null) {
      throw new GatewayError(task, 'unavailable', 'No language model configured');
    }

    const build: (req: GatewayRequests[K]) => string = promptBuilders[task];
    const prompt = build(request);
    const startedAt = Date.now();

    let raw: string;
    try {
      raw = await this.breaker.execute(() =>
        retryWithBackoff(
          () =>
            withTimeout((callSignal) => this.dispatch(router, task, prompt, callSignal), {
              timeoutMs: this.options.timeoutMs,
              onTimeout: () => new GatewayError(task, 'timeout', `No answer within ${this.options.timeoutMs}ms`),
              onAbort: () => new GatewayError(task, 'timeout', 'Caller abandoned the call'),
              signal,
            }),
          {
            maxRetries: this.options.maxRetries,
            initialDelay: 150,
            maxDelay: 1000,
            shouldRetry: (err) => !signal?.aborted && (!(err instanceof GatewayError) || err.retryable),
          },
        ),
      );
    } catch (err) {
      throw toGatewayError(task, err);
    }

    logger.debug('gateway:response', { task, ms: Date.now() - startedAt, raw: raw.slice(0, 500) });

    const json = safeParseJson(raw, `gateway:${task}`);
    if (json === null) {
      throw new GatewayError(task, 'schema_violation', 'Response is not a JSON object');
    }

    const schema: z.ZodType<GatewayPayloads[K], z.ZodTypeDef, unknown> = payloadSchemas[task];
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new GatewayError(
        task,
        'schema_violation',
        parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`).join('; '),
      );
    }
    return parsed.data;
  }

  private dispatch(
    router: SimpleModelRouter,
    task: GatewayTask,
    prompt: string,
    signal: AbortSignal,
  ): Promise<string> {
    switch (task) {
      case 'intent':
        return router.classify(prompt, signal);
      case 'slot_extract':
        return router.extract(prompt, signal);
      case 'conditions':
        return router.rank(prompt, signal);
      case 'explain':
        return router.explain(prompt, signal);
    }
  }
}

function toGatewayError(task: GatewayTask, err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  if (err instanceof CircuitOpenError) {
    return new GatewayError(task, 'circuit_open', err.message, err);
  }
  return new GatewayError(task, 'transport', errorMessage(err), err);
}
