/**
 * Pipeline Workflow Service
 * Builds the LangGraph StateGraph that answers one query:
 *
 * normalize → checkCache ─hit──────────────────────────────────────┐
 *                 └miss→ classifyIntent ─direct→ respondTemplate ──┤
 *                          ├general→ generate                      │
 *                          └rag→ inferTopic ─→ retrieve → generate │
 *                                   └none→ resolveTopicFallback    │
 *                                            └none→ clarification ─┤
 * generate → populateCache → persistHistory ←──────────────────────┘
 *
 * Stage order is fixed. Exactly one answer leaves each invocation.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { END, START, StateGraph } from '@langchain/langgraph';
import {
  PipelineState,
  createInitialState,
  type PipelineStateType,
} from './state/pipeline-state';
import { createNormalizeNode } from './nodes/normalize.node';
import { createCheckCacheNode } from './nodes/check-cache.node';
import { createClassifyIntentNode } from './nodes/classify-intent.node';
import { createRespondTemplateNode } from './nodes/respond-template.node';
import { createInferTopicNode } from './nodes/infer-topic.node';
import { createResolveTopicFallbackNode } from './nodes/resolve-topic-fallback.node';
import { createRetrieveNode } from './nodes/retrieve.node';
import { createGenerateNode } from './nodes/generate.node';
import { createPopulateCacheNode } from './nodes/populate-cache.node';
import { createPersistHistoryNode } from './nodes/persist-history.node';
import { CacheEngineService } from '../../cache/cache-engine.service';
import { ConversationHistoryService } from '../../history/conversation-history.service';
import { ANSWER_MODEL, EMBEDDER } from '../../providers/provider.tokens';
import type { Embedder, TextGenerator } from '../../providers/types';
import type { ConfigSnapshot } from '../../config-store/types/config.types';
import { IntentClassifierService } from '../services/intent-classifier.service';
import { TopicResolverService } from '../services/topic-resolver.service';
import { RetrievalService } from '../services/retrieval.service';
import { DEFAULT_GENERATION_FAILED } from '../services/prompt-templates';
import { PipelineFailedError } from '../errors/pipeline-errors';
import type { PipelineResult, Query } from '../types/pipeline.types';

export interface PipelineDependencies {
  cacheEngine: CacheEngineService;
  intentClassifier: IntentClassifierService;
  topicResolver: TopicResolverService;
  retrieval: RetrievalService;
  answerModel: TextGenerator;
  embedder: Embedder;
  history: ConversationHistoryService;
}

function routeTopic(state: PipelineStateType): 'resolved' | 'unresolved' | 'failed' {
  if (state.outcome === 'failed') {
    return 'failed';
  }
  return state.topic ? 'resolved' : 'unresolved';
}

export function buildPipelineGraph(deps: PipelineDependencies) {
  return (
    new StateGraph(PipelineState)
      .addNode('normalize', createNormalizeNode(deps.intentClassifier))
      .addNode('checkCache', createCheckCacheNode(deps.cacheEngine, deps.embedder))
      .addNode('classifyIntent', createClassifyIntentNode(deps.intentClassifier))
      .addNode('respondTemplate', createRespondTemplateNode())
      .addNode('inferTopic', createInferTopicNode(deps.topicResolver))
      .addNode(
        'resolveTopicFallback',
        createResolveTopicFallbackNode(deps.topicResolver),
      )
      .addNode('retrieve', createRetrieveNode(deps.retrieval, deps.embedder))
      .addNode('generate', createGenerateNode(deps.answerModel, deps.history))
      .addNode(
        'populateCache',
        createPopulateCacheNode(deps.cacheEngine, deps.embedder),
      )
      .addNode('persistHistory', createPersistHistoryNode(deps.history))
      .addEdge(START, 'normalize')
      .addEdge('normalize', 'checkCache')
      .addConditionalEdges(
        'checkCache',
        (state: PipelineStateType) =>
          state.outcome === 'cache_hit' ? 'cache_hit' : 'cache_miss',
        {
          cache_hit: 'persistHistory',
          cache_miss: 'classifyIntent',
        },
      )
      .addConditionalEdges(
        'classifyIntent',
        (state: PipelineStateType) => state.intent?.action ?? 'call_rag_tool',
        {
          direct_response: 'respondTemplate',
          general_llm_call: 'generate',
          call_rag_tool: 'inferTopic',
        },
      )
      .addEdge('respondTemplate', 'persistHistory')
      // Two distinct prompts, two states; never a retry of the same call
      .addConditionalEdges('inferTopic', routeTopic, {
        resolved: 'retrieve',
        unresolved: 'resolveTopicFallback',
        failed: END,
      })
      .addConditionalEdges('resolveTopicFallback', routeTopic, {
        resolved: 'retrieve',
        unresolved: 'persistHistory',
        failed: END,
      })
      .addEdge('retrieve', 'generate')
      .addConditionalEdges(
        'generate',
        (state: PipelineStateType) =>
          state.outcome === 'generated' ? 'generated' : 'failed',
        {
          generated: 'populateCache',
          failed: END,
        },
      )
      .addEdge('populateCache', 'persistHistory')
      .addEdge('persistHistory', END)
      .compile()
  );
}

@Injectable()
export class PipelineWorkflowService {
  private readonly logger = new Logger(PipelineWorkflowService.name);
  private readonly workflow: ReturnType<typeof buildPipelineGraph>;

  constructor(
    cacheEngine: CacheEngineService,
    intentClassifier: IntentClassifierService,
    topicResolver: TopicResolverService,
    retrieval: RetrievalService,
    @Inject(ANSWER_MODEL) answerModel: TextGenerator,
    @Inject(EMBEDDER) embedder: Embedder,
    history: ConversationHistoryService,
  ) {
    this.workflow = buildPipelineGraph({
      cacheEngine,
      intentClassifier,
      topicResolver,
      retrieval,
      answerModel,
      embedder,
      history,
    });
    this.logger.log('✓ LangGraph pipeline workflow initialized');
  }

  /**
   * Runs one query against the snapshot the caller took. Never throws.
   */
  async handle(query: Query, snapshot: ConfigSnapshot): Promise<PipelineResult> {
    const startTime = Date.now();

    try {
      const state = await this.workflow.invoke(createInitialState(query, snapshot));
      const result = this.toResult(state);
      const { cacheDuration, resolutionDuration, retrievalDuration, generationDuration } =
        state.metrics;

      this.logger.log(
        `[Pipeline] conversation=${query.conversationId} outcome=${result.ok ? result.kind : result.error.code} stage=${state.currentStage} config_version=${snapshot.version} errors=${state.errors.join(',') || 'none'} cache=${cacheDuration ?? '-'}ms resolution=${resolutionDuration ?? '-'}ms retrieval=${retrievalDuration ?? '-'}ms generation=${generationDuration ?? '-'}ms duration=${Date.now() - startTime}ms`,
      );
      return result;
    } catch (error) {
      const failure = new PipelineFailedError(error);
      this.logger.error(
        `[Pipeline] conversation=${query.conversationId} status=failed code=${failure.code} duration=${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );
      return {
        ok: false,
        error: failure,
        text: snapshot.prompts.responseTemplates.generation_failed ?? DEFAULT_GENERATION_FAILED,
      };
    }
  }

  private toResult(state: PipelineStateType): PipelineResult {
    const fallbackText =
      state.snapshot.prompts.responseTemplates.generation_failed ??
      DEFAULT_GENERATION_FAILED;

    if (state.outcome === 'failed') {
      return {
        ok: false,
        error: state.failure ?? new PipelineFailedError('request failed without a cause'),
        text: state.answer ?? fallbackText,
      };
    }

    if (state.outcome === null || state.answer === null) {
      return {
        ok: false,
        error: new PipelineFailedError(`workflow ended at ${state.currentStage} without an answer`),
        text: fallbackText,
      };
    }

    return { ok: true, kind: state.outcome, text: state.answer };
  }
}
