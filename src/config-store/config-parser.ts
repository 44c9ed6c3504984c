import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import {
  IndexSchemaDocument,
  IntentDocument,
  PromptConfigDocument,
} from './dto/prompt-config.document';
import { InvalidConfigError } from './errors/config-errors';
import {
  REQUIRED_QUERY_TEMPLATES,
  type IndexSchema,
  type IntentDefinition,
  type PromptConfig,
  type TemplateMap,
} from './types/config.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(raw: string, document: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigError(
      document,
      `malformed JSON (${error instanceof Error ? error.message : String(error)})`,
      error,
    );
  }
}

function describeViolations(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...describeViolations(error.children ?? [], path)];
  });
}

function validateDocument<T extends object>(
  cls: new () => T,
  value: unknown,
  document: string,
): T {
  if (!isRecord(value)) {
    throw new InvalidConfigError(document, 'expected a JSON object');
  }
  const instance = plainToInstance(cls, value);
  const violations = describeViolations(validateSync(instance));
  if (violations.length > 0) {
    throw new InvalidConfigError(document, violations.join('; '));
  }
  return instance;
}

function toTemplateMap(
  value: Record<string, unknown> | undefined,
  section: string,
): TemplateMap {
  const templates: Record<string, string> = {};
  for (const [key, template] of Object.entries(value ?? {})) {
    if (typeof template !== 'string') {
      throw new InvalidConfigError(
        'prompt configuration',
        `${section}.${key} must be a string`,
      );
    }
    templates[key] = template;
  }
  return templates;
}

export function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

function compilePattern(intent: string, pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch (error) {
    throw new InvalidConfigError(
      'prompt configuration',
      `intents.${intent}.patterns contains an invalid expression: ${pattern}`,
      error,
    );
  }
}

/**
 * Snapshots are shared by every in-flight request; freeze them so a bug
 * cannot mutate configuration another request is reading.
 * RegExp instances are left unfrozen because matching updates lastIndex.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !(value instanceof RegExp)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function parsePromptConfig(raw: string): PromptConfig {
  const document = 'prompt configuration';
  const parsed = validateDocument(
    PromptConfigDocument,
    parseJson(raw, document),
    document,
  );

  const intents: IntentDefinition[] = Object.entries(parsed.intents).map(
    ([name, value]) => {
      const intent = validateDocument(
        IntentDocument,
        value,
        `${document} (intent ${name})`,
      );
      return {
        name,
        description: intent.description ?? '',
        keywords: (intent.keywords ?? [])
          .map(normalizeText)
          .filter((keyword) => keyword.length > 0),
        patterns: (intent.patterns ?? []).map((pattern) =>
          compilePattern(name, pattern),
        ),
        action: intent.action,
        template: intent.template ?? null,
      };
    },
  );

  const queryTemplates = toTemplateMap(parsed.query_templates, 'query_templates');
  const responseTemplates = toTemplateMap(
    parsed.response_templates,
    'response_templates',
  );

  const missing = REQUIRED_QUERY_TEMPLATES.filter(
    (key) => !(key in queryTemplates),
  );
  if (missing.length > 0) {
    throw new InvalidConfigError(
      document,
      `query_templates is missing ${missing.join(', ')}`,
    );
  }

  for (const intent of intents) {
    if (intent.action === 'direct_response') {
      const key = intent.template ?? intent.name;
      if (!(key in responseTemplates)) {
        throw new InvalidConfigError(
          document,
          `intent ${intent.name} responds with response_templates.${key}, which is not defined`,
        );
      }
    }
  }

  const defaultIntent = parsed.default_intent ?? null;
  if (defaultIntent && !intents.some((intent) => intent.name === defaultIntent)) {
    throw new InvalidConfigError(
      document,
      `default_intent ${defaultIntent} is not a defined intent`,
    );
  }

  return deepFreeze({
    intents,
    defaultIntent,
    corePrompts: toTemplateMap(parsed.core_prompts, 'core_prompts'),
    queryTemplates,
    responseTemplates,
  });
}

export function parseIndexSchema(raw: string): IndexSchema {
  const document = 'index schema';
  const parsed = validateDocument(
    IndexSchemaDocument,
    parseJson(raw, document),
    document,
  );
  return buildIndexSchema(
    parsed.indexes.map((index) => ({
      name: index.name,
      description: index.description ?? null,
      fields: index.fields,
    })),
  );
}

export function buildIndexSchema(indexes: IndexSchema['indexes']): IndexSchema {
  const seen = new Set<string>();
  for (const index of indexes) {
    const key = index.name.toLowerCase();
    if (seen.has(key)) {
      throw new InvalidConfigError('index schema', `duplicate index ${index.name}`);
    }
    seen.add(key);
  }
  return deepFreeze({
    indexes: indexes.map((index) => ({
      name: index.name,
      description: index.description,
      fields: [...index.fields],
    })),
  });
}

/**
 * Remote bodies are either the prompt configuration itself or a remote-config
 * document holding it as a string under parameters.<name>.defaultValue.value.
 */
export function extractRemotePromptText(body: string, parameter: string): string {
  const document = 'remote configuration';
  const parsed = parseJson(body, document);
  if (!isRecord(parsed)) {
    throw new InvalidConfigError(document, 'expected a JSON object');
  }

  if (!('parameters' in parsed)) {
    return body;
  }

  const parameters = parsed.parameters;
  const entry = isRecord(parameters) ? parameters[parameter] : undefined;
  const defaultValue = isRecord(entry) ? entry.defaultValue : undefined;
  const value = isRecord(defaultValue) ? defaultValue.value : undefined;
  if (typeof value !== 'string') {
    throw new InvalidConfigError(
      document,
      `parameters.${parameter}.defaultValue.value is missing`,
    );
  }
  return value;
}
