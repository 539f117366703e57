/**
 * Responder Module
 * Personalities, response templates and the orchestrating responder
 */

export { PersonaResponder } from './persona-responder';
export type {
  PersonaResponderDeps,
  Capabilities,
  EmotionSnapshot,
  PersonalityInfo,
  SessionStats,
  Decision,
} from './persona-responder';
export { CodeGenerator, SUPPORTED_LANGUAGES, codeKind } from './code-generator';
export type { CodeGeneratorOptions, CodeKind } from './code-generator';
export { ResponseComposer, categorize, FALLBACK_RESPONSE } from './composer';
export type { ResponseCategory } from './composer';
export { PERSONALITY_PROFILES, DEFAULT_PERSONALITY, isPersonality, resolvePersonality } from './personalities';
export type { PersonalityProfile, ResponseStyle } from './personalities';
