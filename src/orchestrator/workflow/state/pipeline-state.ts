/**
 * Pipeline Workflow State Definition
 * One state object per inbound query, threaded through every node.
 */

import { Annotation } from '@langchain/langgraph';
import type { ServiceError } from '../../../common/errors/service.error';
import type { ConfigSnapshot } from '../../../config-store/types/config.types';
import type { CacheOutcome } from '../../../cache/types/cache.types';
import type { IntentMatch } from '../../services/intent-classifier.service';
import type { TopicStage } from '../../services/topic-resolver.service';
import type {
  PipelineOutcome,
  Query,
  RetrievedDocument,
} from '../../types/pipeline.types';

/**
 * Workflow Metrics
 */
export interface PipelineMetrics {
  startTime: number;
  cacheDuration?: number;
  resolutionDuration?: number;
  retrievalDuration?: number;
  generationDuration?: number;
}

export const PipelineState = Annotation.Root({
  // ============================================
  // Input
  // ============================================
  conversationId: Annotation<string>,
  message: Annotation<string>,
  // Fixed for the whole request; a concurrent reload never reaches it
  snapshot: Annotation<ConfigSnapshot>,

  // ============================================
  // Normalize & cache
  // ============================================
  normalizedQuery: Annotation<string>,
  ruleIntent: Annotation<IntentMatch | null>,
  queryEmbedding: Annotation<number[] | null>,
  cacheOutcome: Annotation<CacheOutcome | null>,

  // ============================================
  // Intent & topic
  // ============================================
  intent: Annotation<IntentMatch | null>,
  topic: Annotation<string | null>,
  topicStage: Annotation<TopicStage | null>,

  // ============================================
  // Retrieval & generation
  // ============================================
  documents: Annotation<RetrievedDocument[]>,
  answer: Annotation<string | null>,
  outcome: Annotation<PipelineOutcome | null>,
  failure: Annotation<ServiceError | null>,

  // ============================================
  // Side effects
  // ============================================
  cachePopulated: Annotation<boolean>,
  historyPersisted: Annotation<boolean>,

  // ============================================
  // Workflow metadata
  // ============================================
  currentStage: Annotation<string>,
  errors: Annotation<string[]>,
  metrics: Annotation<PipelineMetrics>,
});

export type PipelineStateType = typeof PipelineState.State;

export function createInitialState(
  query: Query,
  snapshot: ConfigSnapshot,
): PipelineStateType {
  return {
    conversationId: query.conversationId,
    message: query.text,
    snapshot,

    normalizedQuery: '',
    ruleIntent: null,
    queryEmbedding: null,
    cacheOutcome: null,

    intent: null,
    topic: null,
    topicStage: null,

    documents: [],
    answer: null,
    outcome: null,
    failure: null,

    cachePopulated: false,
    historyPersisted: false,

    currentStage: 'init',
    errors: [],
    metrics: {
      startTime: Date.now(),
    },
  };
}
