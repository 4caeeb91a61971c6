// src/services/pipeline-deps.ts: wires collaborators from configuration into an Orchestrator
import type { AppConfig } from '@/config/app.config';
import { loadRecommenderConfig } from '@/config/recommender.config';
import { DialogueManager } from '@/agent/dialogueManager';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import type { SessionStore } from '@/memory/SessionStore';
import { loadLexicon } from '@/slots/lexicon';
import { SlotSchema } from '@/slots/slotSchema';
import { ModelGateway } from './llm-gateway';
import { ProviderLlmClient } from './llm-client';
import { SimpleModelRouter } from './model-router';
import { Orchestrator } from './orchestrator';
import { RerankEngine } from './rerank';
import { ShardRetrievalCoordinator } from './shard-retrieval';
import { JsonCatalogProvider } from './providers/catalog/catalog-provider';
import { JsonPersonaProvider } from './providers/personas/persona-provider';
import { OpenAIEmbedder } from './providers/embedding/openai-embedder';
import { SimpleEmbedder } from './providers/embedding/simple-embedder';
import type { Embedder } from './providers/retrieval-vector-utils';
import { loadShards } from './providers/shards/shard-manifest';
import { logger } from './logger';

export interface Pipeline {
  orchestrator: Orchestrator;
  sessions: SessionStore;
}

function createEmbedder(config: AppConfig): Embedder {
  const apiKey = config.llm.apiKey;
  if (config.retrieval.embedder === 'openai') {
    if (apiKey) return new OpenAIEmbedder({ apiKey });
    logger.warn('pipeline:embedder_fallback', { reason: 'EMBEDDER=openai without OPENAI_API_KEY' });
  }
  return new SimpleEmbedder(64);
}

export function createPipeline(config: AppConfig): Pipeline {
  const recommender = loadRecommenderConfig(config.paths.recommender);
  const lexicon = loadLexicon(config.paths.lexicon);

  const apiKey = config.llm.apiKey;
  const router = apiKey
    ? new SimpleModelRouter(
        new ProviderLlmClient({ apiKey, smallModel: config.llm.smallModel, mainModel: config.llm.mainModel }),
      )
    : null;
  if (!router) logger.warn('pipeline:no_model', { reason: 'OPENAI_API_KEY not set; rule-based fallbacks only' });

  const gateway = new ModelGateway(router, {
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
  });

  const sessions = new InMemorySessionStore({
    ttlMinutes: config.session.ttlMinutes,
    maxSessions: config.session.maxSessions,
  });

  const orchestrator = new Orchestrator({
    sessions,
    personas: JsonPersonaProvider.fromFile(config.paths.personas),
    dialogue: new DialogueManager(gateway, new SlotSchema(lexicon), lexicon, {
      historyWindow: recommender.historyWindow,
      requirements: recommender.requirements,
    }),
    retrieval: new ShardRetrievalCoordinator(loadShards(config.retrieval.manifestPath, createEmbedder(config)), {
      shardTimeoutMs: config.retrieval.shardTimeoutMs,
    }),
    reranker: new RerankEngine(gateway, JsonCatalogProvider.fromFile(config.paths.catalog), recommender),
    config: recommender,
    turnTimeoutMs: config.turnTimeoutMs,
  });

  return { orchestrator, sessions };
}
