#!/usr/bin/env node

/**
 * Persona Bot CLI - Entry Point
 *
 * Interactive console chat with the persona bot.
 */

import 'dotenv/config';
import chalk from 'chalk';
import { getServices } from '../services';
import { ConsoleSession } from './session';

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  try {
    const services = getServices();
    const session = new ConsoleSession({
      chatBot: services.chatBot,
      tracker: services.tracker,
      personality: services.responder.getPersonalityInfo().personality,
    });
    await session.run();
    process.exit(0);
  } catch (error) {
    console.error(chalk.red('\nSession error:'), error);
    process.exit(1);
  }
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\nInterrupted. Goodbye!'));
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log(chalk.yellow('\n\nTerminated. Goodbye!'));
  process.exit(0);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\nUnhandled Rejection:'), reason);
  process.exit(1);
});

void main();
