/**
 * Settings schema and defaults
 *
 * Known keys are type-checked; unknown keys in any section, and unknown
 * sections, pass through untouched.
 */

import { z } from 'zod';

export const PERSONALITIES = ['curious_researcher', 'creative_assistant', 'wise_mentor'] as const;

export type Personality = (typeof PERSONALITIES)[number];

const finiteNumber = z.number().finite();
const userList = z.array(z.string());

export const emulatorSectionSchema = z
  .object({
    personality: z.string(),
    log_level: z.string(),
    knowledge_file: z.string(),
    bot_name: z.string().min(1),
    max_context_length: finiteNumber,
    response_timeout: finiteNumber,
  })
  .passthrough();

export const matrixSectionSchema = z
  .object({
    homeserver: z.string(),
    username: z.string(),
    sync_timeout: finiteNumber,
    request_timeout: finiteNumber,
    keepalive_interval: finiteNumber,
    auto_join_rooms: z.boolean(),
    authorized_users: userList,
  })
  .passthrough();

export const featuresSectionSchema = z
  .object({
    emotional_intelligence: z.boolean(),
    multi_language_support: z.boolean(),
    knowledge_management: z.boolean(),
    vision_processing: z.boolean(),
    adaptive_learning: z.boolean(),
    code_generation: z.boolean(),
  })
  .passthrough();

export const securitySectionSchema = z
  .object({
    command_authorization: z.boolean(),
    rate_limiting: z.boolean(),
    max_requests_per_minute: z.number().int().positive(),
    blocked_users: userList,
    allowed_commands: z.array(z.string()),
  })
  .passthrough();

export const performanceSectionSchema = z
  .object({
    max_concurrent_requests: finiteNumber,
    cache_size: finiteNumber,
    cleanup_interval: finiteNumber,
    memory_limit_mb: finiteNumber,
  })
  .passthrough();

export const settingsSchema = z
  .object({
    emulator: emulatorSectionSchema,
    matrix: matrixSectionSchema,
    features: featuresSectionSchema,
    security: securitySectionSchema,
    performance: performanceSectionSchema,
  })
  .passthrough();

export type Settings = z.infer<typeof settingsSchema>;
export type EmulatorSettings = z.infer<typeof emulatorSectionSchema>;
export type ChatSettings = z.infer<typeof matrixSectionSchema>;
export type FeatureSettings = z.infer<typeof featuresSectionSchema>;
export type SecuritySettings = z.infer<typeof securitySectionSchema>;

export const SECTION_NAMES = ['emulator', 'matrix', 'features', 'security', 'performance'] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export function isSectionName(value: string): value is SectionName {
  const known: readonly string[] = SECTION_NAMES;
  return known.includes(value);
}

export const DEFAULT_SETTINGS: Settings = {
  emulator: {
    personality: 'curious_researcher',
    log_level: 'INFO',
    knowledge_file: 'emulator_knowledge.json',
    bot_name: 'persona',
    max_context_length: 10,
    response_timeout: 30,
  },
  matrix: {
    homeserver: 'https://matrix.example.org',
    username: '@persona:matrix.example.org',
    sync_timeout: 30000,
    request_timeout: 10,
    keepalive_interval: 60,
    auto_join_rooms: true,
    authorized_users: [],
  },
  features: {
    emotional_intelligence: true,
    multi_language_support: true,
    knowledge_management: true,
    vision_processing: true,
    adaptive_learning: true,
    code_generation: true,
  },
  security: {
    command_authorization: true,
    rate_limiting: true,
    max_requests_per_minute: 60,
    blocked_users: [],
    allowed_commands: ['?help', '?sys', '?status', '?command'],
  },
  performance: {
    max_concurrent_requests: 10,
    cache_size: 1000,
    cleanup_interval: 3600,
    memory_limit_mb: 512,
  },
};

/**
 * Environment variables read at load time, and the setting each overrides
 */
export const ENV_OVERRIDES: Readonly<Record<string, string>> = {
  MATRIX_HOMESERVER: 'matrix.homeserver',
  MATRIX_USERNAME: 'matrix.username',
  MATRIX_SYNC_TIMEOUT: 'matrix.sync_timeout',
  MATRIX_REQUEST_TIMEOUT: 'matrix.request_timeout',
  MATRIX_KEEPALIVE_INTERVAL: 'matrix.keepalive_interval',
  EMULATOR_PERSONALITY: 'emulator.personality',
  EMULATOR_LOG_LEVEL: 'emulator.log_level',
  EMULATOR_KNOWLEDGE_FILE: 'emulator.knowledge_file',
};

/**
 * Checks that only warn: the value is well-typed but probably a mistake
 */
export function settingsWarnings(settings: Settings): string[] {
  const warnings: string[] = [];

  const personalities: readonly string[] = PERSONALITIES;
  if (!personalities.includes(settings.emulator.personality)) {
    warnings.push(`Invalid personality: ${settings.emulator.personality}`);
  }

  const homeserver = settings.matrix.homeserver;
  if (!homeserver.startsWith('http://') && !homeserver.startsWith('https://')) {
    warnings.push(`Invalid homeserver URL: ${homeserver}`);
  }

  if (!settings.matrix.username.startsWith('@')) {
    warnings.push(`Invalid chat username: ${settings.matrix.username}`);
  }

  const numeric: Array<[string, number]> = [
    ['matrix.sync_timeout', settings.matrix.sync_timeout],
    ['matrix.request_timeout', settings.matrix.request_timeout],
    ['matrix.keepalive_interval', settings.matrix.keepalive_interval],
    ['emulator.max_context_length', settings.emulator.max_context_length],
    ['emulator.response_timeout', settings.emulator.response_timeout],
  ];
  for (const [path, value] of numeric) {
    if (value <= 0) {
      warnings.push(`Invalid numeric setting ${path}: ${value}`);
    }
  }

  return warnings;
}
