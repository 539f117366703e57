/**
 * CodeGenerator - skeleton code from fixed templates
 *
 * A task mentioning "function" or "class" gets that template, anything else a
 * commented placeholder. Only python and javascript carry templates of their
 * own; the other supported languages borrow the python ones.
 */

export const SUPPORTED_LANGUAGES = [
  'python',
  'javascript',
  'rust',
  'cpp',
  'java',
  'go',
  'c',
  'typescript',
  'kotlin',
  'swift',
] as const;

export type CodeKind = 'function' | 'class' | 'general';

type Template = (task: string) => string;

const TEMPLATES: Readonly<Record<string, Record<'function' | 'class', Template>>> = {
  python: {
    function: (task) =>
      'def example_function(param1, param2):\n' +
      `    """Generated function for: ${task}"""\n` +
      '    # Implementation here\n' +
      '    result = None\n' +
      '    return result',
    class: (task) =>
      'class ExampleClass:\n' +
      `    """Generated class for: ${task}"""\n` +
      '\n' +
      '    def __init__(self, param1, param2):\n' +
      '        # Initialization here\n' +
      '        pass',
  },
  javascript: {
    function: (task) =>
      'function example_function(param1, param2) {\n' +
      `    // Generated function for: ${task}\n` +
      '    // Implementation here\n' +
      '    const result = null;\n' +
      '    return result;\n' +
      '}',
    class: (task) =>
      'class ExampleClass {\n' +
      `    // Generated class for: ${task}\n` +
      '    constructor(param1, param2) {\n' +
      '        // Initialization here\n' +
      '    }\n' +
      '}',
  },
};

export interface CodeGeneratorOptions {
  /** Languages accepted, all of SUPPORTED_LANGUAGES by default */
  languages?: readonly string[];
}

export class CodeGenerator {
  readonly languages: readonly string[];

  constructor(options: CodeGeneratorOptions = {}) {
    this.languages = options.languages ?? SUPPORTED_LANGUAGES;
  }

  isSupported(language: string): boolean {
    return this.languages.includes(language.trim().toLowerCase());
  }

  /**
   * Generate skeleton code; unsupported languages get a comment listing the supported ones
   */
  generate(language: string, task: string): string {
    const lang = language.trim().toLowerCase();
    if (!this.languages.includes(lang)) {
      return `// Language '${language}' not yet supported\n// Supported: ${this.languages.join(', ')}`;
    }

    const kind = codeKind(task);
    if (kind === 'general') {
      const comment = lang === 'python' ? '#' : '//';
      return `${comment} Generated ${lang} code for: ${task}\n${comment} Implementation would go here`;
    }

    const templates = TEMPLATES[lang] ?? TEMPLATES.python;
    return templates[kind](task);
  }
}

export function codeKind(task: string): CodeKind {
  const lower = task.toLowerCase();
  if (lower.includes('function')) {
    return 'function';
  }
  if (lower.includes('class')) {
    return 'class';
  }
  return 'general';
}
