import type {
  ConfigSnapshot,
  IndexDescriptor,
  IndexSchema,
} from '../../config-store/types/config.types';
import type { RetrievedDocument } from '../types/pipeline.types';

export const NO_DOCUMENTS_TEXT = 'No relevant documents found.';

export const DEFAULT_CLARIFICATION =
  "I'm not sure which information your question refers to. Could you rephrase it or add more detail?";

export const DEFAULT_GENERATION_FAILED =
  "Sorry, I couldn't generate a response right now. Please try again.";

/**
 * Replaces `{name}` placeholders that have a value; any other braces
 * (JSON examples inside templates) are left untouched.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{([a-zA-Z0-9_]+)\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder,
  );
}

/**
 * Prepends core_prompts.system when the configuration defines one.
 */
export function withSystemPrompt(snapshot: ConfigSnapshot, prompt: string): string {
  const system = snapshot.prompts.corePrompts.system;
  return system ? `${system}\n\n${prompt}` : prompt;
}

export function schemaJson(schema: IndexSchema): string {
  return JSON.stringify(
    schema.indexes.map((index) => ({
      name: index.name,
      ...(index.description ? { description: index.description } : {}),
      fields: index.fields,
    })),
    null,
    2,
  );
}

/**
 * One line per index: "- name: fields=a, b".
 */
export function schemaSummary(schema: IndexSchema): string {
  return schema.indexes
    .map((index) => `- ${index.name}: fields=${index.fields.join(', ')}`)
    .join('\n');
}

export function describeIndex(index: IndexDescriptor | undefined): string {
  return index ? index.fields.join(', ') : '';
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function formatDocuments(documents: readonly RetrievedDocument[]): string {
  if (documents.length === 0) {
    return NO_DOCUMENTS_TEXT;
  }

  return documents
    .map((document) => {
      const fields = Object.entries(document.payload)
        .filter(([key]) => key !== 'vector')
        .map(([key, value]) => `  - ${key}: ${formatValue(value)}`);
      return [
        `Document ID: ${document.id} (Score: ${document.score.toFixed(4)})`,
        ...fields,
      ].join('\n');
    })
    .join('\n');
}
