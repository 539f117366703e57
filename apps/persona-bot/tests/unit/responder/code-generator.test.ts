/**
 * CodeGenerator Tests
 */

import { CodeGenerator, SUPPORTED_LANGUAGES, codeKind } from '../../../src/responder/code-generator';

describe('CodeGenerator', () => {
  const generator = new CodeGenerator();

  describe('codeKind', () => {
    it('should pick the template from the task wording', () => {
      expect(codeKind('Write a Function to parse dates')).toBe('function');
      expect(codeKind('a class for a stack')).toBe('class');
      expect(codeKind('a function inside a class')).toBe('function');
      expect(codeKind('sort a list')).toBe('general');
    });
  });

  describe('generate', () => {
    it('should fill the python function template', () => {
      expect(generator.generate('python', 'a function that adds numbers')).toBe(
        [
          'def example_function(param1, param2):',
          '    """Generated function for: a function that adds numbers"""',
          '    # Implementation here',
          '    result = None',
          '    return result',
        ].join('\n')
      );
    });

    it('should fill the javascript class template', () => {
      expect(generator.generate('JavaScript', 'a class for a queue')).toBe(
        [
          'class ExampleClass {',
          '    // Generated class for: a class for a queue',
          '    constructor(param1, param2) {',
          '        // Initialization here',
          '    }',
          '}',
        ].join('\n')
      );
    });

    it('should borrow the python templates for other languages', () => {
      expect(generator.generate('rust', 'a class for a tree')).toBe(generator.generate('python', 'a class for a tree'));
    });

    it('should use a comment placeholder for general tasks', () => {
      expect(generator.generate('go', 'read a config file')).toBe(
        '// Generated go code for: read a config file\n// Implementation would go here'
      );
    });

    it('should list the supported languages for anything else', () => {
      // Act
      const code = generator.generate('cobol', 'a function');

      // Assert
      expect(code).toBe(
        "// Language 'cobol' not yet supported\n" +
          '// Supported: python, javascript, rust, cpp, java, go, c, typescript, kotlin, swift'
      );
    });
  });

  describe('languages', () => {
    it('should support every listed language by default', () => {
      expect(SUPPORTED_LANGUAGES.every((language) => generator.isSupported(language))).toBe(true);
    });

    it('should honour a restricted language list', () => {
      const pythonOnly = new CodeGenerator({ languages: ['python'] });

      expect(pythonOnly.isSupported(' Python ')).toBe(true);
      expect(pythonOnly.isSupported('javascript')).toBe(false);
    });
  });
});
