/**
 * TriggerClassifier - keyword-based emotion classification
 *
 * Rules are evaluated top to bottom and the first rule with a keyword present
 * in the lower-cased text wins, so earlier rules shadow later ones.
 */

import { BASELINE_EMOTION, EmotionId, TextEmotionAnalysis } from './types';
import { EmotionRegistry } from './registry';

export interface TriggerRule {
  emotionId: EmotionId;
  keywords: readonly string[];
}

export const DEFAULT_TRIGGER_RULES: readonly TriggerRule[] = [
  { emotionId: 'EXCITEMENT', keywords: ['excited', 'amazing', 'wonderful'] },
  { emotionId: 'CONCERN', keywords: ['confused', 'unclear', 'help'] },
  { emotionId: 'CURIOSITY', keywords: ['interesting', 'fascinating', 'curious'] },
];

/** Returned for unmatched text containing a question mark */
export const QUESTION_EMOTION: EmotionId = 'CURIOSITY';

export interface TriggerClassifierOptions {
  rules?: readonly TriggerRule[];
  /** Source of randomness in [0, 1) for analysis confidence */
  random?: () => number;
}

export class TriggerClassifier {
  private readonly rules: readonly TriggerRule[];
  private readonly random: () => number;

  constructor(registry: EmotionRegistry, options: TriggerClassifierOptions = {}) {
    this.rules = options.rules ?? DEFAULT_TRIGGER_RULES;
    this.random = options.random ?? Math.random;

    for (const rule of this.rules) {
      // Throws UnknownEmotionError for a rule naming an undefined emotion
      registry.lookup(rule.emotionId);
    }
  }

  classify(text: string): EmotionId {
    return this.match(text.toLowerCase()).emotionId;
  }

  /**
   * Classify text and report the keywords of the winning rule found in it
   */
  analyze(text: string): TextEmotionAnalysis {
    const { emotionId, matchedKeywords } = this.match(text.toLowerCase());

    return {
      primaryEmotion: emotionId,
      confidence: 0.7 + this.random() * 0.25,
      matchedKeywords,
    };
  }

  private match(lowerText: string): { emotionId: EmotionId; matchedKeywords: string[] } {
    for (const rule of this.rules) {
      const matchedKeywords = rule.keywords.filter((keyword) => lowerText.includes(keyword));
      if (matchedKeywords.length > 0) {
        return { emotionId: rule.emotionId, matchedKeywords };
      }
    }

    if (lowerText.includes('?')) {
      return { emotionId: QUESTION_EMOTION, matchedKeywords: [] };
    }
    return { emotionId: BASELINE_EMOTION, matchedKeywords: [] };
  }
}
