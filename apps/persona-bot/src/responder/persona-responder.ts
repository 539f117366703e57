/**
 * PersonaResponder - prompt in, canned response out
 *
 * Classifies the prompt, records the emotion, composes a response flavoured
 * by the dominant emotion, and logs the exchange to the knowledge store.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  EmotionExpression,
  EmotionId,
  EmotionRegistry,
  EmotionalStateTracker,
  TextEmotionAnalysis,
  TriggerClassifier,
} from '../emotion';
import { JsonValue, KnowledgeStore } from '../knowledge';
import { Personality, FeatureSettings } from '../settings/schema';
import { CONFIG } from '../utils/config';
import { FeatureDisabledError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { CodeGenerator } from './code-generator';
import { FALLBACK_RESPONSE, ResponseComposer } from './composer';
import { PersonalityProfile, resolvePersonality } from './personalities';

const logger = createLogger('PersonaResponder');

export interface PersonaResponderDeps {
  registry: EmotionRegistry;
  classifier: TriggerClassifier;
  tracker: EmotionalStateTracker;
  knowledge: KnowledgeStore;
  composer?: ResponseComposer;
  codeGenerator?: CodeGenerator;
  personality?: string;
  features?: Partial<FeatureSettings>;
  classifiedIntensity?: number;
  sessionId?: string;
}

export type Capabilities = Record<
  | 'vision_processing'
  | 'multi_step_reasoning'
  | 'knowledge_management'
  | 'emotional_intelligence'
  | 'code_generation'
  | 'adaptive_learning',
  boolean
>;

type FeatureName = keyof Capabilities | 'multi_language_support';

export interface EmotionSnapshot extends EmotionExpression {
  summary: string;
}

export interface PersonalityInfo {
  personality: Personality;
  traits: PersonalityProfile;
  sessionId: string;
  emotionalState: EmotionId;
}

export interface SessionStats {
  sessionId: string;
  personality: Personality;
  interactionsCount: number;
  knowledgeEntries: number;
  currentEmotion: EmotionId;
  capabilities: Capabilities;
}

export interface Decision {
  response: string;
  emotion: EmotionId;
  dominantEmotion: EmotionId;
}

export class PersonaResponder {
  readonly sessionId: string;

  private readonly registry: EmotionRegistry;
  private readonly classifier: TriggerClassifier;
  private readonly tracker: EmotionalStateTracker;
  private readonly knowledge: KnowledgeStore;
  private readonly composer: ResponseComposer;
  private readonly codeGenerator: CodeGenerator;
  private readonly personality: Personality;
  private readonly profile: PersonalityProfile;
  private readonly features: Partial<FeatureSettings>;
  private readonly classifiedIntensity: number;

  constructor(deps: PersonaResponderDeps) {
    this.registry = deps.registry;
    this.classifier = deps.classifier;
    this.tracker = deps.tracker;
    this.knowledge = deps.knowledge;
    this.composer = deps.composer ?? new ResponseComposer();
    this.features = deps.features ?? {};
    this.codeGenerator =
      deps.codeGenerator ??
      new CodeGenerator(this.isEnabled('multi_language_support') ? {} : { languages: ['python'] });
    this.classifiedIntensity = deps.classifiedIntensity ?? CONFIG.emotion.classifiedIntensity;
    this.sessionId = deps.sessionId ?? `session-${uuidv4()}`;

    const { name, profile } = resolvePersonality(deps.personality ?? '');
    if (deps.personality !== undefined && deps.personality !== name) {
      logger.warn(`Unknown personality '${deps.personality}', using ${name}`);
    }
    this.personality = name;
    this.profile = profile;

    logger.info(`PersonaResponder initialized with personality: ${name}`);
  }

  /**
   * Produce a response to a prompt; never throws
   */
  getDecision(prompt: string): string {
    return this.respond(prompt).response;
  }

  /**
   * Like getDecision, also reporting the classified and dominant emotions
   */
  respond(prompt: string): Decision {
    try {
      const emotion = this.classifier.classify(prompt);

      if (this.isEnabled('emotional_intelligence')) {
        this.tracker.record(emotion, this.classifiedIntensity, Array.from(prompt).slice(0, 80).join(''));
      }
      const dominantEmotion = this.isEnabled('emotional_intelligence') ? this.tracker.dominant() : emotion;

      const response = this.composer.compose(prompt, this.tracker.modifierText(dominantEmotion), this.profile);

      if (this.isEnabled('knowledge_management')) {
        this.knowledge.recordInteraction(prompt, response, emotion);
      }

      return { response, emotion, dominantEmotion };
    } catch (error) {
      logger.error('Error generating decision', error);
      return {
        response: FALLBACK_RESPONSE,
        emotion: this.registry.baseline.id,
        dominantEmotion: this.registry.baseline.id,
      };
    }
  }

  analyzeEmotion(text: string): TextEmotionAnalysis {
    return this.classifier.analyze(text);
  }

  storeKnowledge(key: string, value: JsonValue): boolean {
    return this.knowledge.put(key, value);
  }

  retrieveKnowledge(key: string): JsonValue | undefined {
    return this.knowledge.get(key);
  }

  /**
   * Skeleton code for a task
   * @throws FeatureDisabledError when code generation is switched off
   */
  generateCode(language: string, task: string): string {
    if (!this.isEnabled('code_generation')) {
      throw new FeatureDisabledError('code_generation');
    }
    logger.debug(`Generating ${language} code`);
    return this.codeGenerator.generate(language, task);
  }

  /**
   * The dominant emotion with an expression line and a one-line summary
   */
  currentEmotion(): EmotionSnapshot {
    const dominant = this.tracker.dominant();
    return { ...this.tracker.express(dominant), summary: this.tracker.describe(dominant) };
  }

  getCapabilities(): Capabilities {
    return {
      vision_processing: this.isEnabled('vision_processing'),
      multi_step_reasoning: true,
      knowledge_management: this.isEnabled('knowledge_management'),
      emotional_intelligence: this.isEnabled('emotional_intelligence'),
      code_generation: this.isEnabled('code_generation'),
      adaptive_learning: this.isEnabled('adaptive_learning'),
    };
  }

  getPersonalityInfo(): PersonalityInfo {
    return {
      personality: this.personality,
      traits: this.profile,
      sessionId: this.sessionId,
      emotionalState: this.tracker.dominant(),
    };
  }

  getSessionStats(): SessionStats {
    return {
      sessionId: this.sessionId,
      personality: this.personality,
      interactionsCount: this.knowledge.getInteractionCount(),
      knowledgeEntries: this.knowledge.getKnowledgeCount(),
      currentEmotion: this.tracker.dominant(),
      capabilities: this.getCapabilities(),
    };
  }

  getEmotionCount(): number {
    return this.registry.size;
  }

  // Features absent from settings count as enabled
  private isEnabled(feature: FeatureName): boolean {
    return this.features[feature] !== false;
  }
}
