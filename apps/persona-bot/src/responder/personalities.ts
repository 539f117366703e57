import { Personality, PERSONALITIES } from '../settings/schema';

export type ResponseStyle = 'detailed_explanatory' | 'encouraging_creative' | 'thoughtful_guidance';

export interface PersonalityProfile {
  coreTraits: string[];
  responseStyle: ResponseStyle;
  emotionalTendency: string;
}

export const PERSONALITY_PROFILES: Readonly<Record<Personality, PersonalityProfile>> = {
  curious_researcher: {
    coreTraits: ['curious', 'analytical', 'methodical', 'truth-seeking'],
    responseStyle: 'detailed_explanatory',
    emotionalTendency: 'intellectual_excitement',
  },
  creative_assistant: {
    coreTraits: ['creative', 'enthusiastic', 'supportive', 'innovative'],
    responseStyle: 'encouraging_creative',
    emotionalTendency: 'optimistic_energy',
  },
  wise_mentor: {
    coreTraits: ['wise', 'patient', 'insightful', 'nurturing'],
    responseStyle: 'thoughtful_guidance',
    emotionalTendency: 'calm_wisdom',
  },
};

export const DEFAULT_PERSONALITY: Personality = 'curious_researcher';

export function isPersonality(value: string): value is Personality {
  const known: readonly string[] = PERSONALITIES;
  return known.includes(value);
}

/**
 * Profile for a personality name; unknown names get the default profile
 */
export function resolvePersonality(name: string): { name: Personality; profile: PersonalityProfile } {
  const resolved = isPersonality(name) ? name : DEFAULT_PERSONALITY;
  return { name: resolved, profile: PERSONALITY_PROFILES[resolved] };
}
