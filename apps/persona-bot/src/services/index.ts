/**
 * ServiceContainer - Singleton for dependency injection
 * Manages lifecycle and dependencies of the persona bot modules
 */

import * as path from 'path';
import { ChatBot } from '../chat/chat-bot';
import { EmotionRegistry } from '../emotion/registry';
import { TriggerClassifier } from '../emotion/classifier';
import { EmotionalStateTracker } from '../emotion/tracker';
import { KnowledgeStore } from '../knowledge/knowledge-store';
import { PersonaResponder } from '../responder/persona-responder';
import { ResponseComposer } from '../responder/composer';
import { SettingsManager, SettingsManagerOptions } from '../settings/settings-manager';
import { getConfig, validateConfig } from '../utils/config';
import { createLogger, parseLogLevel, setDefaultLogLevel } from '../utils/logger';

const logger = createLogger('ServiceContainer');

export interface ServiceOptions extends SettingsManagerOptions {
  /** Overrides emulator.knowledge_file */
  knowledgeFile?: string;
  /** Millisecond clock for the emotion tracker */
  clock?: () => number;
  random?: () => number;
}

export class ServiceContainer {
  private static instance: ServiceContainer | null = null;

  public readonly settings: SettingsManager;
  public readonly registry: EmotionRegistry;
  public readonly classifier: TriggerClassifier;
  public readonly tracker: EmotionalStateTracker;
  public readonly knowledge: KnowledgeStore;
  public readonly responder: PersonaResponder;
  public readonly chatBot: ChatBot;

  constructor(options: ServiceOptions = {}) {
    const config = getConfig();
    validateConfig(config);

    // Step 1: Settings, then the log level they may carry
    this.settings = new SettingsManager(options);
    const emulator = this.settings.getEmulatorConfig();
    this.applyLogLevel(emulator.log_level);

    // Step 2: Emotion model
    this.registry = EmotionRegistry.fromDefaultTable();
    this.classifier = new TriggerClassifier(this.registry, { random: options.random });
    this.tracker = new EmotionalStateTracker(this.registry, {
      clock: options.clock,
      random: options.random,
      historyLimit: config.emotion.historyLimit,
    });

    // Step 3: Knowledge
    this.knowledge = new KnowledgeStore(path.resolve(options.knowledgeFile ?? emulator.knowledge_file));

    // Step 4: Responder and chat glue
    this.responder = new PersonaResponder({
      registry: this.registry,
      classifier: this.classifier,
      tracker: this.tracker,
      knowledge: this.knowledge,
      composer: new ResponseComposer(options.random),
      personality: emulator.personality,
      features: this.settings.getFeatures(),
    });
    this.chatBot = new ChatBot({
      responder: this.responder,
      settings: this.settings,
      contextSize: emulator.max_context_length,
    });

    logger.info('Persona bot services ready', {
      emotions: this.registry.size,
      knowledgeFile: this.knowledge.filePath,
      settingsFile: this.settings.settingsFile,
    });
  }

  public static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  public static resetInstance(): void {
    ServiceContainer.instance = null;
  }

  // LOG_LEVEL from the environment wins over the settings file
  private applyLogLevel(name: string): void {
    if (process.env.LOG_LEVEL) {
      return;
    }
    const level = parseLogLevel(name);
    if (level === undefined) {
      logger.warn(`Unknown log level in settings: ${name}`);
      return;
    }
    setDefaultLogLevel(level);
  }
}

export const getServices = () => ServiceContainer.getInstance();
