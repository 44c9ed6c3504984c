/**
 * Intent Classifier
 * Keyword and pattern matching on the normalized query first; the routing
 * model is asked only when nothing matches and the configuration provides
 * an intent_classification template.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ROUTING_MODEL } from '../../providers/provider.tokens';
import type { TextGenerator } from '../../providers/types';
import type {
  IntentAction,
  IntentDefinition,
  PromptConfig,
} from '../../config-store/types/config.types';
import { renderTemplate } from './prompt-templates';

export type IntentMatchMethod = 'keyword' | 'pattern' | 'model' | 'default';

export interface IntentMatch {
  /** Null when no intent is configured as default */
  intent: IntentDefinition | null;
  action: IntentAction;
  method: IntentMatchMethod;
}

/**
 * Lower-case words separated by single spaces, punctuation dropped.
 */
function toWords(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s']/gu, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .join(' ');
}

@Injectable()
export class IntentClassifierService {
  private readonly logger = new Logger(IntentClassifierService.name);

  constructor(@Inject(ROUTING_MODEL) private readonly model: TextGenerator) {}

  /**
   * Deterministic match against keywords (whole words or phrases) and
   * patterns, in declaration order. No I/O.
   */
  matchRules(
    normalizedQuery: string,
    prompts: PromptConfig,
  ): { intent: IntentDefinition; method: 'keyword' | 'pattern' } | null {
    const words = ` ${toWords(normalizedQuery)} `;

    for (const intent of prompts.intents) {
      const keywordHit = intent.keywords.some((keyword) => {
        const phrase = toWords(keyword);
        return phrase.length > 0 && words.includes(` ${phrase} `);
      });
      if (keywordHit) {
        return { intent, method: 'keyword' };
      }
      if (intent.patterns.some((pattern) => pattern.test(normalizedQuery))) {
        return { intent, method: 'pattern' };
      }
    }
    return null;
  }

  async classify(
    message: string,
    normalizedQuery: string,
    prompts: PromptConfig,
  ): Promise<IntentMatch> {
    const rule = this.matchRules(normalizedQuery, prompts);
    if (rule) {
      return { intent: rule.intent, action: rule.intent.action, method: rule.method };
    }

    const modelPick = await this.classifyWithModel(message, prompts);
    if (modelPick) {
      return { intent: modelPick, action: modelPick.action, method: 'model' };
    }

    return this.defaultIntent(prompts);
  }

  defaultIntent(prompts: PromptConfig): IntentMatch {
    const intent =
      prompts.intents.find((candidate) => candidate.name === prompts.defaultIntent) ??
      null;
    return {
      intent,
      action: intent?.action ?? 'call_rag_tool',
      method: 'default',
    };
  }

  private async classifyWithModel(
    message: string,
    prompts: PromptConfig,
  ): Promise<IntentDefinition | null> {
    const template = prompts.queryTemplates.intent_classification;
    if (!template || prompts.intents.length === 0) {
      return null;
    }

    const descriptions = prompts.intents
      .map((intent) => `- ${intent.name}: ${intent.description}`)
      .join('\n');

    try {
      const answer = await this.model.complete(
        renderTemplate(template, {
          intent_descriptions: descriptions,
          message,
        }),
      );
      const [firstLine = ''] = answer.trim().split(/\r?\n/);
      const name = firstLine.replace(/^[\s"'`]+|[\s"'`.]+$/g, '').toLowerCase();
      const intent =
        prompts.intents.find((candidate) => candidate.name.toLowerCase() === name) ??
        null;

      this.logger.log(
        `[IntentClassifier] method=model intent=${intent?.name ?? 'unknown'} raw="${answer.trim().slice(0, 60)}"`,
      );
      return intent;
    } catch (error) {
      // Classification is advisory; the default intent still gets an answer
      this.logger.warn(
        `[IntentClassifier] method=model status=degraded error=${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
