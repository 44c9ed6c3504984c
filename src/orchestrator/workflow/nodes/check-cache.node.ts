/**
 * Check Cache Node
 * Exact tier, then semantic tier. The embedding computed for the semantic
 * lookup is kept in state and reused by retrieval and cache population.
 *
 * Flow:
 * - Direct-response intent matched by rules → skip lookup
 * - Hit (exact or semantic) → persistHistory, nothing else runs
 * - Miss → classifyIntent
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { CacheEngineService } from '../../../cache/cache-engine.service';
import type { Embedder } from '../../../providers/types';

export function createCheckCacheNode(
  cacheEngine: CacheEngineService,
  embedder: Embedder,
) {
  const logger = new Logger('CheckCacheNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    if (state.ruleIntent?.action === 'direct_response') {
      logger.log(
        `[CheckCache] status=bypassed intent=${state.ruleIntent.intent?.name ?? 'none'}`,
      );
      return {
        cacheOutcome: { kind: 'miss' },
        currentStage: 'cache_bypassed',
      };
    }

    const startTime = Date.now();
    const lookup = await cacheEngine.lookup(
      state.normalizedQuery,
      state.queryEmbedding ?? (() => embedder.embed(state.normalizedQuery)),
    );
    const cacheDuration = Date.now() - startTime;
    const { outcome } = lookup;

    if (outcome.kind === 'miss') {
      return {
        cacheOutcome: outcome,
        queryEmbedding: lookup.embedding,
        currentStage: 'cache_miss',
        metrics: { ...state.metrics, cacheDuration },
      };
    }

    logger.log(
      `[CheckCache] status=hit tier=${outcome.kind === 'exact_hit' ? 'exact' : 'semantic'} duration=${cacheDuration}ms`,
    );

    return {
      cacheOutcome: outcome,
      queryEmbedding: lookup.embedding,
      answer: outcome.response,
      outcome: 'cache_hit',
      currentStage: 'cache_hit',
      metrics: { ...state.metrics, cacheDuration },
    };
  };
}
