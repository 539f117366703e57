/**
 * Emotion Module
 * Registry, trigger classifier and emotional state tracker
 */

export { EmotionRegistry, parseEmotionTable, emotionTableSchema } from './registry';
export { TriggerClassifier, DEFAULT_TRIGGER_RULES, QUESTION_EMOTION } from './classifier';
export type { TriggerRule, TriggerClassifierOptions } from './classifier';
export { EmotionalStateTracker, DEFAULT_MODIFIER } from './tracker';
export type { EmotionalStateTrackerOptions } from './tracker';

export { EMOTION_IDS, BASELINE_EMOTION, isEmotionId } from './types';
export type {
  EmotionId,
  EmotionDefinition,
  ActiveEmotionEntry,
  HistoryRecord,
  EmotionalStateSnapshot,
  TextEmotionAnalysis,
  EmotionExpression,
} from './types';
