/**
 * Knowledge Store - key/value knowledge and interaction log
 *
 * The whole document is loaded at construction and rewritten after every
 * mutation. In-memory state always takes the update; a failed write only
 * makes the mutating call return false. Keys that would not survive a
 * reload (see RESERVED_KEYS) are refused.
 */

import { JsonFile } from '../persistence/json-file';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';
import {
  InteractionRecord,
  JsonValue,
  KnowledgeDocument,
  KnowledgeEntry,
  containsReservedKey,
  isReservedKey,
  knowledgeDocumentSchema,
  valueTypeOf,
} from './types';

const logger = createLogger('KnowledgeStore');

export interface KnowledgeStoreOptions {
  maxInteractions?: number;
  clock?: () => Date;
}

export class KnowledgeStore {
  private readonly file: JsonFile<KnowledgeDocument>;
  private readonly maxInteractions: number;
  private readonly clock: () => Date;

  private knowledge = new Map<string, KnowledgeEntry>();
  private interactions: InteractionRecord[] = [];

  constructor(filePath: string, options: KnowledgeStoreOptions = {}) {
    this.file = new JsonFile(filePath, knowledgeDocumentSchema);
    this.maxInteractions = options.maxInteractions ?? CONFIG.knowledge.maxInteractions;
    this.clock = options.clock ?? (() => new Date());
    this.reload();
  }

  get filePath(): string {
    return this.file.filePath;
  }

  /**
   * Replace in-memory state with the file's contents
   *
   * A missing file yields an empty store; an unreadable one is logged and
   * also yields an empty store.
   */
  reload(): void {
    try {
      const doc = this.file.read();
      this.knowledge = new Map(Object.entries(doc?.knowledge ?? {}));
      this.interactions = doc?.interactions.slice(-this.maxInteractions) ?? [];
      if (doc) {
        logger.debug(`Loaded ${this.knowledge.size} knowledge entries from ${this.file.filePath}`);
      }
    } catch (error) {
      logger.warn('Could not load knowledge file, starting with an empty knowledge base', {
        filePath: this.file.filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      this.knowledge = new Map();
      this.interactions = [];
    }
  }

  /**
   * Store a value under a key (last write wins)
   * @returns false when the key or value is refused, or the file could not be written
   */
  put(key: string, value: JsonValue): boolean {
    if (isReservedKey(key) || containsReservedKey(value)) {
      logger.warn(`Refusing knowledge entry with a reserved key: ${key}`);
      return false;
    }

    this.knowledge.set(key, {
      value,
      timestamp: this.clock().toISOString(),
      type: valueTypeOf(value),
    });
    return this.persist();
  }

  get(key: string): JsonValue | undefined {
    return this.knowledge.get(key)?.value;
  }

  getEntry(key: string): KnowledgeEntry | undefined {
    return this.knowledge.get(key);
  }

  has(key: string): boolean {
    return this.knowledge.has(key);
  }

  /**
   * Append an exchange, keeping only the most recent interactions
   * @returns false when the file could not be written
   */
  recordInteraction(prompt: string, response: string, emotionId: string): boolean {
    this.interactions.push({
      prompt,
      response,
      emotion: emotionId,
      timestamp: this.clock().toISOString(),
    });

    if (this.interactions.length > this.maxInteractions) {
      this.interactions = this.interactions.slice(-this.maxInteractions);
    }

    return this.persist();
  }

  getInteractions(): readonly InteractionRecord[] {
    return this.interactions;
  }

  getInteractionCount(): number {
    return this.interactions.length;
  }

  getKnowledgeCount(): number {
    return this.knowledge.size;
  }

  private persist(): boolean {
    try {
      this.file.write({
        knowledge: Object.fromEntries(this.knowledge),
        interactions: this.interactions,
        last_updated: this.clock().toISOString(),
      });
      return true;
    } catch (error) {
      logger.error('Failed to persist knowledge base', error);
      return false;
    }
  }
}
