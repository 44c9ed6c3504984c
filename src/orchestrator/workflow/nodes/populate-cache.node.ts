import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { CacheEngineService } from '../../../cache/cache-engine.service';
import type { Embedder } from '../../../providers/types';

/**
 * Populate Cache Node
 * Runs only after a generated answer. Best-effort: the engine logs and
 * drops backend failures.
 */
export function createPopulateCacheNode(
  cacheEngine: CacheEngineService,
  embedder: Embedder,
) {
  const logger = new Logger('PopulateCacheNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    if (state.outcome !== 'generated' || state.answer === null) {
      return { currentStage: 'cache_population_skipped' };
    }

    const startTime = Date.now();
    await cacheEngine.store(
      state.normalizedQuery,
      state.queryEmbedding ?? (() => embedder.embed(state.normalizedQuery)),
      state.answer,
    );

    logger.debug(`[PopulateCache] duration=${Date.now() - startTime}ms`);

    return {
      cachePopulated: true,
      currentStage: 'cache_populated',
    };
  };
}
