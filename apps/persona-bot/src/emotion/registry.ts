/**
 * EmotionRegistry - Immutable table of emotion definitions
 *
 * Built once at startup and passed to the tracker and classifier.
 */

import { z } from 'zod';
import emotionTable from './data/emotions.json';
import { EMOTION_IDS, BASELINE_EMOTION, EmotionDefinition, EmotionId, isEmotionId } from './types';
import { UnknownEmotionError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('EmotionRegistry');

const labelList = z.array(z.string().min(1));

const definitionSchema = z
  .object({
    id: z.enum(EMOTION_IDS),
    intensityBounds: z.object({
      min: z.number().min(0).max(1),
      max: z.number().min(0).max(1),
    }),
    decayWindowSeconds: z.number().int().positive(),
    triggers: labelList,
    expressions: labelList,
    behaviors: labelList,
    relatedEmotions: labelList,
    physicalManifestations: labelList,
    cognitiveEffects: labelList,
    socialContext: labelList,
  })
  .refine((def) => def.intensityBounds.min <= def.intensityBounds.max, {
    message: 'intensityBounds.min must not exceed intensityBounds.max',
    path: ['intensityBounds'],
  });

export const emotionTableSchema = z.array(definitionSchema);

/**
 * Validate raw definition data
 * @throws ZodError when an entry is malformed
 */
export function parseEmotionTable(raw: unknown): EmotionDefinition[] {
  return emotionTableSchema.parse(raw);
}

export class EmotionRegistry {
  private readonly definitions: ReadonlyMap<EmotionId, Readonly<EmotionDefinition>>;

  constructor(definitions: readonly EmotionDefinition[]) {
    const table = new Map<EmotionId, Readonly<EmotionDefinition>>();

    for (const def of definitions) {
      if (table.has(def.id)) {
        throw new Error(`Duplicate emotion definition: ${def.id}`);
      }
      table.set(def.id, deepFreeze(structuredClone(def)));
    }

    if (!table.has(BASELINE_EMOTION)) {
      throw new Error(`Emotion table must define the baseline emotion ${BASELINE_EMOTION}`);
    }

    this.definitions = table;
  }

  /**
   * Registry over the bundled emotion table
   */
  static fromDefaultTable(): EmotionRegistry {
    return new EmotionRegistry(parseEmotionTable(emotionTable));
  }

  get size(): number {
    return this.definitions.size;
  }

  get baseline(): Readonly<EmotionDefinition> {
    return this.lookup(BASELINE_EMOTION);
  }

  has(id: string): id is EmotionId {
    return isEmotionId(id) && this.definitions.has(id);
  }

  ids(): EmotionId[] {
    return Array.from(this.definitions.keys());
  }

  /**
   * @throws UnknownEmotionError for ids outside the table
   */
  lookup(id: string): Readonly<EmotionDefinition> {
    const def = this.has(id) ? this.definitions.get(id) : undefined;
    if (!def) {
      throw new UnknownEmotionError(id);
    }
    return def;
  }

  /**
   * Like lookup, but substitutes the baseline definition for unknown ids
   */
  resolve(id: string): Readonly<EmotionDefinition> {
    try {
      return this.lookup(id);
    } catch (error) {
      if (error instanceof UnknownEmotionError) {
        logger.warn(`Unknown emotion '${id}', using ${BASELINE_EMOTION}`);
        return this.baseline;
      }
      throw error;
    }
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const values: unknown[] = Object.values(value);
  for (const inner of values) {
    if (inner !== null && typeof inner === 'object') {
      deepFreeze(inner);
    }
  }
  return Object.freeze(value);
}
