/**
 * Emotion Type Definitions
 */

/**
 * Closed set of emotion identifiers
 */
export const EMOTION_IDS = [
  'JOY',
  'CURIOSITY',
  'EXCITEMENT',
  'WONDER',
  'FASCINATION',
  'ENTHUSIASM',
  'DELIGHT',
  'SATISFACTION',
  'CONTENTMENT',
  'SERENITY',
  'CONFIDENCE',
  'DETERMINATION',
  'FOCUS',
  'CLARITY',
  'INSIGHT',
  'EMPATHY',
  'COMPASSION',
  'UNDERSTANDING',
  'PATIENCE',
  'WISDOM',
  'CONCERN',
] as const;

export type EmotionId = (typeof EMOTION_IDS)[number];

/**
 * Emotion guaranteed present when nothing else is active
 */
export const BASELINE_EMOTION: EmotionId = 'CONTENTMENT';

export function isEmotionId(value: string): value is EmotionId {
  const known: readonly string[] = EMOTION_IDS;
  return known.includes(value);
}

/**
 * Static description of one emotion
 */
export interface EmotionDefinition {
  id: EmotionId;

  /** Allowed intensity range, within [0, 1] */
  intensityBounds: { min: number; max: number };

  /** Seconds for a recorded intensity to decay linearly to zero */
  decayWindowSeconds: number;

  triggers: string[];
  expressions: string[];
  behaviors: string[];
  relatedEmotions: string[];
  physicalManifestations: string[];
  cognitiveEffects: string[];
  socialContext: string[];
}

/**
 * Entry in the tracker's active set
 */
export interface ActiveEmotionEntry {
  emotionId: EmotionId;
  intensity: number;
}

/**
 * One recorded emotion, appended on every record call
 */
export interface HistoryRecord {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  emotionId: EmotionId;
  intensity: number;
  context: string;
}

/**
 * Read-only summary of the tracker after a decay pass
 */
export interface EmotionalStateSnapshot {
  dominant: EmotionId;
  active: Partial<Record<EmotionId, number>>;
  recentHistory: HistoryRecord[];
}

/**
 * Result of classifying a piece of text
 */
export interface TextEmotionAnalysis {
  primaryEmotion: EmotionId;
  confidence: number;
  matchedKeywords: string[];
}

/**
 * An expression line and behaviours for an emotion
 */
export interface EmotionExpression {
  emotionId: EmotionId;
  expression: string;
  behaviors: string[];
}
