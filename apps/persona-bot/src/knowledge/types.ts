import { z } from 'zod';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * Object keys that JSON.parse keeps but a plain-object rebuild loses
 */
export const RESERVED_KEYS: readonly string[] = ['__proto__'];

export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.includes(key);
}

/**
 * Whether any object nested in a parsed JSON value carries a reserved key
 */
export function containsReservedKey(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.some(containsReservedKey);
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).some(([key, nested]) => isReservedKey(key) || containsReservedKey(nested));
  }
  return false;
}

export const VALUE_TYPES = ['string', 'number', 'boolean', 'null', 'array', 'object'] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export const knowledgeEntrySchema = z.object({
  value: jsonValueSchema,
  /** ISO-8601 time of the last write */
  timestamp: z.string(),
  type: z.enum(VALUE_TYPES),
});

export type KnowledgeEntry = z.infer<typeof knowledgeEntrySchema>;

export const interactionRecordSchema = z.object({
  prompt: z.string(),
  response: z.string(),
  emotion: z.string(),
  timestamp: z.string(),
});

export type InteractionRecord = z.infer<typeof interactionRecordSchema>;

/**
 * On-disk knowledge document
 */
export const knowledgeDocumentSchema = z.object({
  knowledge: z.record(knowledgeEntrySchema).default({}),
  interactions: z.array(interactionRecordSchema).default([]),
  last_updated: z.string().optional(),
});

export type KnowledgeDocument = z.infer<typeof knowledgeDocumentSchema>;

export function valueTypeOf(value: JsonValue): ValueType {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}
