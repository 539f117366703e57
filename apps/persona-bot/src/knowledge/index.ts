export { KnowledgeStore } from './knowledge-store';
export type { KnowledgeStoreOptions } from './knowledge-store';
export {
  valueTypeOf,
  jsonValueSchema,
  knowledgeDocumentSchema,
  RESERVED_KEYS,
  isReservedKey,
  containsReservedKey,
} from './types';
export type { JsonValue, KnowledgeEntry, InteractionRecord, KnowledgeDocument, ValueType } from './types';
