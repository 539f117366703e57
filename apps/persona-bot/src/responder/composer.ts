/**
 * ResponseComposer - canned response templates
 *
 * The prompt's category picks a template set, the random source picks a
 * template, and the emotion modifier fills it in.
 */

import { PersonalityProfile } from './personalities';

export type ResponseCategory = 'programming' | 'explanatory' | 'creative' | 'general';

const CATEGORY_KEYWORDS: ReadonlyArray<[ResponseCategory, readonly string[]]> = [
  ['programming', ['code', 'program', 'function', 'class']],
  ['explanatory', ['explain', 'what', 'how', 'why']],
  ['creative', ['create', 'make', 'build', 'design']],
];

const LANGUAGES = ['python', 'javascript', 'typescript', 'rust', 'java'];

const PROBLEM_ADJECTIVES = ['fascinating', 'intriguing', 'well-structured'];
const LANGUAGE_FOCUS = ['clean syntax', 'performance optimization', 'error handling', 'maintainability'];

const CREATIVE_TEMPLATES = [
  "What an exciting creative challenge! I'm energized by the possibilities here.",
  "I love creative projects like this! Let me share some innovative approaches.",
  'This sparks my imagination! Here are some creative solutions I can envision:',
];

export const FALLBACK_RESPONSE =
  "I apologize, but I encountered an issue processing your request. However, I'm still here and ready to help! " +
  'Could you please rephrase your question or provide additional context?';

export function categorize(prompt: string): ResponseCategory {
  const lower = prompt.toLowerCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return category;
    }
  }
  return 'general';
}

export class ResponseComposer {
  constructor(private readonly random: () => number = Math.random) {}

  /**
   * @param modifier - adjective for the current emotion, e.g. "intriguing"
   */
  compose(prompt: string, modifier: string, personality: PersonalityProfile): string {
    switch (categorize(prompt)) {
      case 'programming':
        return this.programming(prompt);
      case 'explanatory':
        return this.explanatory(modifier, personality);
      case 'creative':
        return this.pick(CREATIVE_TEMPLATES);
      default:
        return this.general(modifier);
    }
  }

  private programming(prompt: string): string {
    const adjective = this.pick(PROBLEM_ADJECTIVES);
    let response = this.pick([
      `I'd be delighted to help with that programming challenge! Based on my analysis, this appears to be a ${adjective} problem.`,
      'Excellent question about programming! Let me approach this systematically, considering both efficiency and readability.',
      "This is a great programming inquiry! I'll provide a solution that follows best practices and includes proper documentation.",
    ]);

    const lower = prompt.toLowerCase();
    if (LANGUAGES.some((language) => lower.includes(language))) {
      response += `\n\nFor this particular language, I recommend focusing on ${this.pick(LANGUAGE_FOCUS)}.`;
    }
    return response;
  }

  private explanatory(modifier: string, personality: PersonalityProfile): string {
    let response = this.pick([
      `What a ${modifier} question! Let me break this down systematically for you.`,
      `I find this topic absolutely ${modifier}! Here's my comprehensive analysis:`,
      `This is a ${modifier} area of inquiry. Allow me to explain the key concepts:`,
    ]);

    if (personality.responseStyle === 'detailed_explanatory') {
      response +=
        '\n\nFrom my knowledge base, I can tell you that this involves multiple interconnected concepts that work together in fascinating ways.';
    }
    return response;
  }

  private general(modifier: string): string {
    return this.pick([
      `That's a ${modifier} point you've raised! I appreciate the opportunity to explore this with you.`,
      `I find your perspective quite ${modifier}. Let me share my thoughts on this matter.`,
      `What a ${modifier} topic for discussion! I'm eager to dive into this with you.`,
    ]);
  }

  private pick(options: readonly string[]): string {
    const index = Math.min(options.length - 1, Math.floor(this.random() * options.length));
    return options[index];
  }
}
