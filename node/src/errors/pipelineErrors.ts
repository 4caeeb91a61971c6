/**
 * Error types raised inside the recommendation pipeline.
 *
 * Only TotalRetrievalFailure and TurnTimeoutError escape a component; the rest are
 * caught at the component boundary and turned into their deterministic fallback.
 */
import type { ShardFailure } from '@/types/core';

export type GatewayTask = 'intent' | 'slot_extract' | 'conditions' | 'explain';

export type GatewayFailureReason =
  | 'unavailable'
  | 'timeout'
  | 'schema_violation'
  | 'circuit_open'
  | 'transport';

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class GatewayError extends PipelineError {
  readonly code = 'GATEWAY_FAILURE';
  readonly retryable: boolean;

  constructor(
    public readonly task: GatewayTask,
    public readonly reason: GatewayFailureReason,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    // schema violations repeat for the same prompt
    this.retryable = reason === 'transport' || reason === 'timeout';
  }
}

export class ShardError extends PipelineError {
  readonly code = 'SHARD_FAILURE';
  readonly retryable = true;

  constructor(
    public readonly shardId: string,
    public readonly reason: ShardFailure['reason'],
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }

  toFailure(): ShardFailure {
    return { shardId: this.shardId, reason: this.reason, message: this.message };
  }
}

export class TotalRetrievalFailure extends PipelineError {
  readonly code = 'TOTAL_RETRIEVAL_FAILURE';
  readonly retryable = true;

  constructor(public readonly failures: ShardFailure[]) {
    super(`All ${failures.length} shard(s) failed`);
  }
}

export class TurnTimeoutError extends PipelineError {
  readonly code = 'TURN_TIMEOUT';
  readonly retryable = true;

  constructor(public readonly timeoutMs: number) {
    super(`Turn exceeded ${timeoutMs}ms`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
