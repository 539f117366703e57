/**
 * Persona Bot CLI - Emotional State Display
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { EmotionalStateSnapshot } from '../../emotion';

/**
 * Display active emotions as a table, dominant first
 * @param summary - one-line description of the dominant emotion
 */
export function displayEmotionalState(state: EmotionalStateSnapshot, modifier: string, summary: string): void {
  console.log(chalk.bold(`\n  Dominant: ${chalk.cyan(state.dominant)} ${chalk.gray(`(${modifier})`)}`));
  console.log(chalk.gray(`  ${summary}\n`));

  const table = new Table({
    head: [chalk.white.bold('Emotion'), chalk.white.bold('Intensity'), chalk.white.bold('')],
    colWidths: [18, 11, 24],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  const rows = Object.entries(state.active).sort(([, a = 0], [, b = 0]) => b - a);
  for (const [id, intensity = 0] of rows) {
    const label = id === state.dominant ? chalk.cyan.bold(id) : id;
    table.push([label, intensity.toFixed(2), chalk.green(createProgressBar(intensity, 20))]);
  }

  console.log(table.toString());

  if (state.recentHistory.length > 0) {
    console.log(chalk.gray('\n  Recent:'));
    for (const record of state.recentHistory) {
      const time = new Date(record.timestamp).toLocaleTimeString();
      console.log(chalk.gray(`  ${time}  ${record.emotionId} ${record.intensity.toFixed(2)}  ${record.context}`));
    }
  }
  console.log();
}

/**
 * Create ASCII progress bar for a value in [0, 1]
 */
function createProgressBar(value: number, width: number): string {
  const clamped = Math.max(0, Math.min(1, value));
  const filledWidth = Math.round(clamped * width);

  return '█'.repeat(filledWidth) + '░'.repeat(width - filledWidth);
}
