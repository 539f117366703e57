/**
 * Persona Bot CLI - Console Session
 *
 * Runs the chat bot over an in-process transport, reading lines from the
 * terminal and printing whatever the bot sends back.
 */

import chalk from 'chalk';
import ora from 'ora';
import { ChatBot } from '../chat/chat-bot';
import { InMemoryTransport } from '../chat/memory-transport';
import { EmotionalStateTracker } from '../emotion/tracker';
import { displayEmotionalState } from './display/state';
import { displayGoodbye, displayWelcome } from './display/welcome';
import { promptMessage } from './prompts';

export const CONSOLE_ROOM = '!console:localhost';
export const CONSOLE_USER = '@you:localhost';

export interface ConsoleSessionDeps {
  chatBot: ChatBot;
  tracker: EmotionalStateTracker;
  personality: string;
  /** Line source, inquirer by default */
  readLine?: () => Promise<string>;
}

export class ConsoleSession {
  private readonly transport = new InMemoryTransport();
  private readonly chatBot: ChatBot;
  private readonly tracker: EmotionalStateTracker;
  private readonly personality: string;
  private readonly readLine: () => Promise<string>;

  constructor(deps: ConsoleSessionDeps) {
    this.chatBot = deps.chatBot;
    this.tracker = deps.tracker;
    this.personality = deps.personality;
    this.readLine = deps.readLine ?? promptMessage;
  }

  /**
   * Loop until the user types quit
   */
  async run(): Promise<void> {
    displayWelcome(this.chatBot.botName, this.personality);

    this.chatBot.attach(this.transport);
    await this.transport.start();
    await this.transport.invite(CONSOLE_ROOM);
    this.flush();

    while (this.transport.isRunning) {
      const line = await this.readLine();

      if (line.toLowerCase() === 'quit') {
        await this.transport.stop();
        break;
      }
      if (line === ':state') {
        const state = this.tracker.comprehensiveState();
        displayEmotionalState(
          state,
          this.tracker.modifierText(state.dominant),
          this.tracker.describe(state.dominant)
        );
        continue;
      }
      if (!line) {
        continue;
      }

      const spinner = ora('Thinking...').start();
      await this.transport.deliver({ roomId: CONSOLE_ROOM, senderId: CONSOLE_USER, text: line });
      spinner.stop();

      if (!this.flush()) {
        console.log(chalk.gray(`(not addressed to ${this.chatBot.botName}; mention it or use ?help)`));
      }
    }

    displayGoodbye();
  }

  // Print queued replies; false when there were none
  private flush(): boolean {
    const messages = this.transport.drain();
    for (const { text } of messages) {
      console.log(`${chalk.magenta.bold(`${this.chatBot.botName}:`)} ${text}\n`);
    }
    return messages.length > 0;
  }
}
