/**
 * Topic Resolver
 * Picks the index a query is about with two distinct prompts:
 * a direct inference over the schema, then a fallback that maps concepts
 * only implied by a field (age → birth_date) to their index.
 *
 * Provider failures are GenerationErrors and propagate; a "None" or
 * unknown answer is a normal outcome of a stage.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ROUTING_MODEL } from '../../providers/provider.tokens';
import type { TextGenerator } from '../../providers/types';
import type {
  IndexSchema,
  PromptConfig,
} from '../../config-store/types/config.types';
import { UnresolvedTopicError } from '../errors/pipeline-errors';
import {
  renderTemplate,
  schemaJson,
  schemaSummary,
} from './prompt-templates';

export type TopicStage = 'primary' | 'fallback';

export type TopicResolution =
  | { resolved: true; index: string; stage: TopicStage }
  | { resolved: false; error: UnresolvedTopicError };

export interface TopicContext {
  prompts: PromptConfig;
  schema: IndexSchema;
}

@Injectable()
export class TopicResolverService {
  private readonly logger = new Logger(TopicResolverService.name);

  constructor(@Inject(ROUTING_MODEL) private readonly model: TextGenerator) {}

  /**
   * Primary stage, then fallback stage when the primary names no known index.
   */
  async resolve(query: string, context: TopicContext): Promise<TopicResolution> {
    const primary = await this.inferPrimary(query, context);
    if (primary) {
      return { resolved: true, index: primary, stage: 'primary' };
    }

    const fallback = await this.resolveFallback(query, context);
    if (fallback) {
      return { resolved: true, index: fallback, stage: 'fallback' };
    }

    return { resolved: false, error: new UnresolvedTopicError(query) };
  }

  async inferPrimary(query: string, context: TopicContext): Promise<string | null> {
    return this.runStage('primary', 'rag_topic_inference', query, context, {
      schema_json: schemaJson(context.schema),
      user_question: query,
    });
  }

  async resolveFallback(query: string, context: TopicContext): Promise<string | null> {
    return this.runStage('fallback', 'fallback_topic_resolver', query, context, {
      schema_summary: schemaSummary(context.schema),
      user_question: query,
    });
  }

  /**
   * Reads a model answer as an index name: first line, quotes and a
   * trailing period stripped, compared case-insensitively.
   * Returns the schema's spelling, or null for "None" and unknown names.
   */
  parseTopic(answer: string, schema: IndexSchema): string | null {
    const [firstLine = ''] = answer.trim().split(/\r?\n/);
    const cleaned = firstLine
      .replace(/^[\s"'`]+|[\s"'`.]+$/g, '')
      .toLowerCase();

    if (cleaned.length === 0 || cleaned === 'none') {
      return null;
    }

    const match = schema.indexes.find(
      (index) => index.name.toLowerCase() === cleaned,
    );
    return match ? match.name : null;
  }

  private async runStage(
    stage: TopicStage,
    templateKey: string,
    query: string,
    context: TopicContext,
    values: Record<string, string>,
  ): Promise<string | null> {
    if (context.schema.indexes.length === 0) {
      this.logger.warn(`[TopicResolver] stage=${stage} status=skipped reason=empty_schema`);
      return null;
    }

    const template = context.prompts.queryTemplates[templateKey];
    if (!template) {
      this.logger.warn(
        `[TopicResolver] stage=${stage} status=skipped reason=missing_template template=${templateKey}`,
      );
      return null;
    }

    const startTime = Date.now();
    const answer = await this.model.complete(renderTemplate(template, values));
    const topic = this.parseTopic(answer, context.schema);

    this.logger.log(
      `[TopicResolver] stage=${stage} status=${topic ? 'resolved' : 'unresolved'} topic=${topic ?? 'none'} raw="${answer.trim().slice(0, 80)}" duration=${Date.now() - startTime}ms query="${query.slice(0, 80)}"`,
    );
    return topic;
  }
}
