import {
  buildIndexSchema,
  deepFreeze,
  parsePromptConfig,
} from '../config-store/config-parser';
import type { ConfigSnapshot } from '../config-store/types/config.types';

export function testQueryTemplates(): Record<string, string> {
  return {
    rag_topic_inference: 'PRIMARY {schema_json} Q={user_question}',
    fallback_topic_resolver: 'FALLBACK {schema_summary} Q={user_question}',
    rag_final_answer:
      'ANSWER topic={topic} fields={schema} docs={documents} Q={user_question} H={history}',
    general_conversation: 'CHAT H={history} Q={user_question}',
  };
}

export function testPromptDocument(): Record<string, unknown> {
  return {
    default_intent: 'knowledge_query',
    intents: {
      greeting: {
        description: 'Greetings',
        keywords: ['hi', 'hello', 'good morning'],
        action: 'direct_response',
        template: 'greeting',
      },
      small_talk: {
        description: 'Chit-chat',
        keywords: ['thanks'],
        patterns: ['^who are you\\b'],
        action: 'general_llm_call',
      },
      knowledge_query: {
        description: 'Questions about stored records',
        action: 'call_rag_tool',
      },
    },
    core_prompts: { system: 'SYSTEM' },
    query_templates: testQueryTemplates(),
    response_templates: {
      greeting: 'Hello from the test config',
      clarification: 'Which records do you mean?',
      generation_failed: 'Generation failed, try again',
    },
  };
}

export function testSchema() {
  return buildIndexSchema([
    {
      name: 'profile',
      description: null,
      fields: ['full_name', 'email', 'birth_date'],
    },
    {
      name: 'orders',
      description: null,
      fields: ['order_id', 'status', 'total_amount'],
    },
  ]);
}

export function buildSnapshot(
  promptDocument: Record<string, unknown> = testPromptDocument(),
  version = 1,
): ConfigSnapshot {
  const snapshot: ConfigSnapshot = {
    version,
    prompts: parsePromptConfig(JSON.stringify(promptDocument)),
    schema: testSchema(),
    promptSource: 'local',
    loadedAt: new Date(0),
  };
  return deepFreeze(snapshot);
}
