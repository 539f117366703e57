/**
 * Persona Bot CLI - Inquirer Prompts
 */

import inquirer from 'inquirer';
import chalk from 'chalk';

interface MessageAnswer {
  message: string;
}

/**
 * Prompt for the next chat line
 */
export async function promptMessage(): Promise<string> {
  const { message } = await inquirer.prompt<MessageAnswer>([
    {
      type: 'input',
      name: 'message',
      message: chalk.cyan('You:'),
      prefix: '',
    },
  ]);

  return message.trim();
}
