/**
 * Persona Bot CLI - Welcome Screen
 */

import chalk from 'chalk';

/**
 * Display welcome banner
 */
export function displayWelcome(botName: string, personality: string): void {
  const banner = `
${chalk.cyan('╔' + '═'.repeat(58) + '╗')}
${chalk.cyan('║')}  ${chalk.magenta.bold(botName.padEnd(20))} ${chalk.gray('console chat session'.padEnd(35))}${chalk.cyan('║')}
${chalk.cyan('╚' + '═'.repeat(58) + '╝')}

${chalk.white('Personality:')} ${chalk.green(personality)}

${chalk.cyan.bold('How to chat:')}
  ${chalk.white('•')} Mention ${chalk.magenta(botName)} or ${chalk.magenta('emulator')} in your message
  ${chalk.white('•')} ${chalk.yellow('?help')} lists commands, ${chalk.yellow('!reset')} clears the context
  ${chalk.white('•')} ${chalk.yellow(':state')} shows the emotional state, ${chalk.yellow('quit')} exits

${chalk.gray('─'.repeat(60))}
`;

  console.log(banner);
}

export function displayGoodbye(): void {
  console.log(chalk.yellow('\nGoodbye!'));
}
