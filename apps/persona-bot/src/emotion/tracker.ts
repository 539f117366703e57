/**
 * EmotionalStateTracker - active emotions with linear decay
 *
 * Each recorded emotion fades linearly to zero over its definition's decay
 * window, measured from the latest time it was recorded. Entries that fall
 * below the prune floor are dropped, and the baseline emotion is reseeded
 * whenever a decay pass leaves the active set empty.
 */

import {
  ActiveEmotionEntry,
  BASELINE_EMOTION,
  EmotionExpression,
  EmotionId,
  EmotionalStateSnapshot,
  HistoryRecord,
} from './types';
import { EmotionRegistry } from './registry';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('EmotionalStateTracker');

const MODIFIERS: Partial<Record<EmotionId, string>> = {
  EXCITEMENT: 'thrilling',
  CURIOSITY: 'intriguing',
  CONCERN: 'important',
  CONTENTMENT: 'interesting',
};

export const DEFAULT_MODIFIER = 'fascinating';

export interface EmotionalStateTrackerOptions {
  /** Epoch milliseconds */
  clock?: () => number;
  random?: () => number;
  historyLimit?: number;
  pruneFloor?: number;
  baselineIntensity?: number;
}

export class EmotionalStateTracker {
  // Insertion order decides ties in dominant()
  private readonly active = new Map<EmotionId, number>();
  private history: HistoryRecord[] = [];

  private readonly clock: () => number;
  private readonly random: () => number;
  private readonly historyLimit: number;
  private readonly pruneFloor: number;
  private readonly baselineIntensity: number;

  constructor(
    private readonly registry: EmotionRegistry,
    options: EmotionalStateTrackerOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.historyLimit = options.historyLimit ?? CONFIG.emotion.historyLimit;
    this.pruneFloor = options.pruneFloor ?? CONFIG.emotion.pruneFloor;
    this.baselineIntensity = options.baselineIntensity ?? CONFIG.emotion.baselineIntensity;

    if (!Number.isInteger(this.historyLimit) || this.historyLimit < 1) {
      throw new Error('historyLimit must be a positive integer');
    }

    this.seedBaseline();
  }

  /**
   * Set an emotion's intensity, clamped to its bounds, and log it to history
   *
   * Unknown ids are recorded as the baseline emotion.
   */
  record(emotionId: string, intensity: number, context: string = ''): ActiveEmotionEntry {
    const def = this.registry.resolve(emotionId);
    const { min, max } = def.intensityBounds;
    const clamped = Number.isFinite(intensity) ? Math.min(max, Math.max(min, intensity)) : min;

    this.active.set(def.id, clamped);
    this.history.push({
      timestamp: this.clock(),
      emotionId: def.id,
      intensity: clamped,
      context,
    });

    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-this.historyLimit);
    }

    logger.debug('Recorded emotion', { emotionId: def.id, intensity: clamped });
    return { emotionId: def.id, intensity: clamped };
  }

  /**
   * Decay every active entry to `now` and drop the ones that faded out
   */
  decayAndPrune(now: number = this.clock()): void {
    for (const emotionId of Array.from(this.active.keys())) {
      const windowMs = this.registry.resolve(emotionId).decayWindowSeconds * 1000;
      const latest = this.latestRecord(emotionId);

      if (!latest || now - latest.timestamp > 2 * windowMs) {
        this.active.delete(emotionId);
        continue;
      }

      const elapsed = Math.max(0, now - latest.timestamp);
      const decayFactor = Math.max(0, 1 - elapsed / windowMs);
      const decayed = latest.intensity * decayFactor;

      if (decayed < this.pruneFloor) {
        this.active.delete(emotionId);
      } else {
        this.active.set(emotionId, decayed);
      }
    }

    if (this.active.size === 0) {
      this.seedBaseline();
    }
  }

  /**
   * Emotion with the strictly greatest intensity after decay
   */
  dominant(now: number = this.clock()): EmotionId {
    this.decayAndPrune(now);

    let best: EmotionId = BASELINE_EMOTION;
    let bestIntensity = -Infinity;
    for (const [emotionId, intensity] of this.active) {
      if (intensity > bestIntensity) {
        best = emotionId;
        bestIntensity = intensity;
      }
    }
    return best;
  }

  comprehensiveState(now: number = this.clock()): EmotionalStateSnapshot {
    const dominant = this.dominant(now);

    return {
      dominant,
      active: Object.fromEntries(this.active),
      recentHistory: this.history.slice(-CONFIG.emotion.stateHistoryTail).map((entry) => ({ ...entry })),
    };
  }

  modifierText(emotionId: string): string {
    return this.registry.has(emotionId) ? MODIFIERS[emotionId] ?? DEFAULT_MODIFIER : DEFAULT_MODIFIER;
  }

  /**
   * Pick an expression line for an emotion; unknown ids use the baseline
   */
  express(emotionId: string): EmotionExpression {
    const def = this.registry.resolve(emotionId);
    const index = Math.min(def.expressions.length - 1, Math.floor(this.random() * def.expressions.length));

    return {
      emotionId: def.id,
      expression: def.expressions[index] ?? '',
      behaviors: def.behaviors.slice(0, 2),
    };
  }

  /**
   * One-line summary of an emotion's triggers, relations and effects
   */
  describe(emotionId: string): string {
    const def = this.registry.resolve(emotionId);
    return [
      `${def.id.toLowerCase()}`,
      `triggered by ${def.triggers.slice(0, 3).join(', ')}`,
      `related to ${def.relatedEmotions.slice(0, 3).map((id) => id.toLowerCase()).join(', ')}`,
      `affects ${def.cognitiveEffects.slice(0, 3).join(', ')}`,
    ].join('; ');
  }

  /**
   * Active entries as currently stored, without a decay pass
   */
  getActiveEmotions(): ActiveEmotionEntry[] {
    return Array.from(this.active, ([emotionId, intensity]) => ({ emotionId, intensity }));
  }

  getHistory(): readonly HistoryRecord[] {
    return this.history;
  }

  reset(): void {
    this.active.clear();
    this.history = [];
    this.seedBaseline();
  }

  private latestRecord(emotionId: EmotionId): HistoryRecord | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].emotionId === emotionId) {
        return this.history[i];
      }
    }
    return undefined;
  }

  private seedBaseline(): void {
    this.active.set(BASELINE_EMOTION, this.baselineIntensity);
  }
}
