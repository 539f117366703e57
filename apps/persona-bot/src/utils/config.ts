/**
 * Persona Bot Configuration
 *
 * Central configuration for tracker constants, caps and service settings.
 * Per-deployment options (personality, chat identity, security lists) live in
 * the settings file handled by SettingsManager.
 */

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Emotional state tracker
   */
  emotion: {
    baselineIntensity: 0.5,  // Intensity of the reseeded CONTENTMENT entry
    pruneFloor: 0.1,         // Entries below this after decay are removed
    historyLimit: 500,       // History records kept (oldest evicted first)
    classifiedIntensity: 0.7, // Intensity recorded for a classified prompt
    stateHistoryTail: 5,     // History records in a comprehensive state
  },

  /**
   * Knowledge store
   */
  knowledge: {
    maxInteractions: 100,    // Interactions kept (oldest evicted first)
  },

  /**
   * Chat bot
   */
  chat: {
    roomContextSize: 10,     // Context lines kept per room
    processedEventLimit: 5000, // Remembered event ids for de-duplication
  },

  /**
   * Settings persistence
   */
  settings: {
    file: process.env.SETTINGS_FILE || './emulator_settings.json',
    backupDir: process.env.SETTINGS_BACKUP_DIR || './settings_backups',
    backupsKept: 10,
  },

  /**
   * API Server Configuration
   */
  api: {
    port: 3000,              // Server port
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',  // Pretty print logs in dev
  },
} as const;

/**
 * Type-safe configuration access
 */
export type AppConfig = typeof CONFIG;

/**
 * Environment-specific configuration overrides
 */
export const getConfig = () => {
  const api = {
    port: process.env.API_PORT ? parseInt(process.env.API_PORT, 10) : CONFIG.api.port,
  };

  const emotion = {
    ...CONFIG.emotion,
    historyLimit: process.env.EMOTION_HISTORY_LIMIT
      ? parseInt(process.env.EMOTION_HISTORY_LIMIT, 10)
      : CONFIG.emotion.historyLimit,
  };

  return {
    ...CONFIG,
    emotion,
    api,
  };
};

export type RuntimeConfig = ReturnType<typeof getConfig>;

/**
 * Validate configuration on startup
 */
export const validateConfig = (config: RuntimeConfig): void => {
  if (config.emotion.pruneFloor < 0 || config.emotion.pruneFloor > 1) {
    throw new Error('Emotion prune floor must be between 0 and 1');
  }
  if (config.emotion.baselineIntensity < config.emotion.pruneFloor) {
    throw new Error('Baseline intensity must not be below the prune floor');
  }
  if (!Number.isInteger(config.emotion.historyLimit) || config.emotion.historyLimit < 1) {
    throw new Error('Emotion history limit must be a positive integer');
  }
  if (config.knowledge.maxInteractions < 1) {
    throw new Error('Interaction cap must be at least 1');
  }

  if (!Number.isInteger(config.api.port) || config.api.port < 1024 || config.api.port > 65535) {
    throw new Error('API port must be between 1024 and 65535');
  }
};

/**
 * Export default configuration
 */
export default getConfig();
