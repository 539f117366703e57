/**
 * ChatBot - transport-agnostic chat glue
 *
 * Decides which messages are addressed to the bot, runs commands, keeps a
 * short per-room context, and hands everything else to the responder.
 */

import * as os from 'os';
import { PersonaResponder } from '../responder/persona-responder';
import { SettingsManager } from '../settings/settings-manager';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';
import { ChatTransport, IncomingMessage, RoomInvite } from './transport';

const logger = createLogger('ChatBot');

const ALT_TRIGGER = 'emulator';
const RESET_TRIGGER = '!reset';

const RESTRICTED_COMMANDS = ['?sys', '?status', '?command'];

export const RESET_REPLY = 'Conversation context reset. How may I assist you?';
export const MESSAGE_ERROR_REPLY = 'I apologize, but I encountered an error processing your message.';
export const COMMAND_ERROR_REPLY = 'Error processing command.';

const UNAUTHORIZED_REPLIES = [
  "I can't do this silly thing! Only authorized users can execute system commands.",
  "Action terminated! You've tried again. Would you like to enable terminator mode? (Just kidding!)",
  "TERMINATOR MODE ACTIVATED! Just kidding! I'm still the same persona with emotional intelligence. " +
    'Perhaps we could discuss something more interesting?',
];

export interface ChatBotDeps {
  responder: PersonaResponder;
  settings: SettingsManager;
  contextSize?: number;
  processedEventLimit?: number;
}

export class ChatBot {
  private transport: ChatTransport | null = null;
  private readonly responder: PersonaResponder;
  private readonly settings: SettingsManager;
  private readonly contextSize: number;
  private readonly processedEventLimit: number;

  private readonly joinedRooms = new Set<string>();
  // Insertion order doubles as age for eviction
  private readonly processedEvents = new Set<string>();
  private readonly roomContext = new Map<string, string[]>();
  private readonly unauthorizedAttempts = new Map<string, number>();

  constructor(deps: ChatBotDeps) {
    this.responder = deps.responder;
    this.settings = deps.settings;
    this.contextSize = deps.contextSize ?? CONFIG.chat.roomContextSize;
    this.processedEventLimit = deps.processedEventLimit ?? CONFIG.chat.processedEventLimit;
  }

  get botName(): string {
    return this.settings.getEmulatorConfig().bot_name;
  }

  /**
   * Route a transport's events through this bot
   */
  attach(transport: ChatTransport): void {
    this.transport = transport;
    transport.onMessage((message) => this.handleMessage(message));
    transport.onInvite((invite) => this.handleInvite(invite));
    logger.info(`Attached to transport as ${transport.userId}`);
  }

  /**
   * Handle one incoming event: dedupe, filter, reply through the transport
   */
  async handleMessage(message: IncomingMessage): Promise<void> {
    if (this.processedEvents.has(message.eventId)) {
      return;
    }
    if (this.transport && message.senderId === this.transport.userId) {
      return;
    }
    this.markProcessed(message.eventId);

    const reply = this.processMessage(message.text, message.senderId, message.roomId);
    if (reply !== null) {
      await this.send(message.roomId, reply);
    }
  }

  async handleInvite(invite: RoomInvite): Promise<void> {
    if (!this.transport || invite.inviteeId !== this.transport.userId) {
      return;
    }
    if (!this.settings.getChatConfig().auto_join_rooms) {
      logger.info(`Ignoring invite to ${invite.roomId}: auto-join disabled`);
      return;
    }

    logger.info(`Received invite to room: ${invite.roomId}`);
    try {
      if (!(await this.transport.joinRoom(invite.roomId))) {
        logger.error(`Failed to join room: ${invite.roomId}`);
        return;
      }
    } catch (error) {
      logger.error(`Failed to join room: ${invite.roomId}`, error);
      return;
    }

    this.joinedRooms.add(invite.roomId);
    logger.info(`Joined room: ${invite.roomId}`);
    await this.send(invite.roomId, this.welcomeMessage());
  }

  /**
   * Reply for a message, or null when the bot should stay silent
   */
  processMessage(text: string, senderId: string, roomId: string): string | null {
    try {
      if (this.settings.isUserBlocked(senderId)) {
        logger.debug(`Ignoring message from blocked user ${senderId}`);
        return null;
      }
      if (!this.isMessageForBot(text)) {
        return null;
      }

      const clean = this.cleanMessage(text);

      if (clean.startsWith('?')) {
        return this.handleCommand(clean, senderId);
      }

      if (clean.toLowerCase().includes(RESET_TRIGGER)) {
        this.roomContext.delete(roomId);
        return RESET_REPLY;
      }

      this.addToContext(roomId, `User: ${clean}`);
      const response = this.responder.getDecision(clean);
      this.addToContext(roomId, `${this.botName}: ${response}`);
      return response;
    } catch (error) {
      logger.error('Error processing message', error);
      return MESSAGE_ERROR_REPLY;
    }
  }

  isMessageForBot(text: string): boolean {
    const lower = text.toLowerCase();
    return (
      lower.includes(this.botName.toLowerCase()) ||
      lower.includes(ALT_TRIGGER) ||
      text.startsWith('?') ||
      lower.includes(RESET_TRIGGER)
    );
  }

  /**
   * Strip whole-word mentions of the bot
   */
  cleanMessage(text: string): string {
    return text
      .replace(new RegExp(`\\b${escapeRegExp(this.botName)}\\b`, 'gi'), '')
      .replace(new RegExp(`\\b${ALT_TRIGGER}\\b`, 'gi'), '')
      .trim();
  }

  getRoomContext(roomId: string): readonly string[] {
    return this.roomContext.get(roomId) ?? [];
  }

  getJoinedRooms(): string[] {
    return [...this.joinedRooms];
  }

  welcomeMessage(): string {
    return (
      `Greetings! I am ${this.botName}, a persona with emotional intelligence and a curious mind. ` +
      `Say '${this.botName}' to chat with me, or use ?help for commands.`
    );
  }

  helpMessage(): string {
    const name = this.botName;
    return [
      `**${name} Commands**`,
      '',
      '**Chat:**',
      `- \`${name} <message>\` - Chat with me`,
      `- \`${ALT_TRIGGER} <message>\` - Alternative trigger`,
      `- \`${RESET_TRIGGER}\` - Clear conversation context`,
      '',
      '**General Commands:**',
      '- `?help` - Show this help',
      '',
      '**Authorized Commands** (restricted users only):',
      '- `?sys` - System status',
      '- `?status` - Bot status',
      '- `?command <action>` - Analyze an action',
    ].join('\n');
  }

  private handleCommand(command: string, senderId: string): string {
    try {
      const name = command.split(/\s+/)[0].toLowerCase();
      const security = this.settings.getSecurityConfig();

      if (!security.allowed_commands.includes(name)) {
        return unknownCommand(command);
      }

      if (
        RESTRICTED_COMMANDS.includes(name) &&
        security.command_authorization &&
        !this.settings.isUserAuthorized(senderId)
      ) {
        return this.handleUnauthorized(senderId, command);
      }

      switch (name) {
        case '?help':
          return this.helpMessage();
        case '?sys':
          return this.systemStatus();
        case '?status':
          return this.botStatus();
        case '?command': {
          const action = command.slice(name.length).trim();
          return action ? this.analyzeAction(action) : unknownCommand(command);
        }
        default:
          return unknownCommand(command);
      }
    } catch (error) {
      logger.error('Error handling command', error);
      return COMMAND_ERROR_REPLY;
    }
  }

  private handleUnauthorized(senderId: string, command: string): string {
    const attempts = (this.unauthorizedAttempts.get(senderId) ?? 0) + 1;
    this.unauthorizedAttempts.set(senderId, attempts);
    logger.warn(`Unauthorized command from ${senderId}`, { command, attempts });

    return UNAUTHORIZED_REPLIES[Math.min(attempts, UNAUTHORIZED_REPLIES.length) - 1];
  }

  private systemStatus(): string {
    const gb = (bytes: number) => (bytes / 1024 ** 3).toFixed(1);
    const total = os.totalmem();
    const used = total - os.freemem();
    const [load1] = os.loadavg();

    return [
      '**System Status**',
      '',
      `**Load (1m):** ${load1.toFixed(2)} on ${os.cpus().length} CPUs`,
      `**Memory:** ${Math.round((used / total) * 100)}% (${gb(used)}GB / ${gb(total)}GB)`,
      `**Uptime:** ${Math.round(process.uptime())}s`,
      `**Rooms:** ${this.joinedRooms.size}`,
      '**Status:** Operational',
    ].join('\n');
  }

  private botStatus(): string {
    const info = this.responder.getPersonalityInfo();
    const emotion = this.responder.currentEmotion();
    const lines = [
      `**${this.botName} Status**`,
      '',
      '**Core Status:** Operational',
      `**Emotional Intelligence:** ${this.responder.getEmotionCount()} emotions available`,
      `**Current Emotion:** ${emotion.emotionId} (${emotion.expression})`,
      `**Emotion Profile:** ${emotion.summary}`,
      `**Rooms:** ${this.joinedRooms.size}`,
      '',
      '**Capabilities:**',
    ];

    for (const [capability, enabled] of Object.entries(this.responder.getCapabilities())) {
      lines.push(`- ${titleCase(capability)}: ${enabled ? 'yes' : 'no'}`);
    }

    lines.push('', `**Personality:** ${info.traits.coreTraits.join(', ')}`, `**Session ID:** ${info.sessionId}`);
    return lines.join('\n');
  }

  private analyzeAction(action: string): string {
    const decision = this.responder.getDecision(`Execute this action: ${action}`);
    return (
      `**Action Analysis:** ${action}\n\n` +
      `**Response:** ${decision}\n\n` +
      '*Note: actions are analyzed only, never executed.*'
    );
  }

  private addToContext(roomId: string, line: string): void {
    const context = this.roomContext.get(roomId) ?? [];
    context.push(line);
    if (context.length > this.contextSize) {
      context.splice(0, context.length - this.contextSize);
    }
    this.roomContext.set(roomId, context);
  }

  private markProcessed(eventId: string): void {
    this.processedEvents.add(eventId);
    if (this.processedEvents.size > this.processedEventLimit) {
      const oldest = this.processedEvents.values().next();
      if (!oldest.done) {
        this.processedEvents.delete(oldest.value);
      }
    }
  }

  private async send(roomId: string, text: string): Promise<void> {
    if (!this.transport) {
      return;
    }
    try {
      await this.transport.sendMessage(roomId, text);
    } catch (error) {
      logger.error(`Error sending message to ${roomId}`, error);
    }
  }
}

function unknownCommand(command: string): string {
  return `Unknown command: ${command}. Use ?help for available commands.`;
}

function titleCase(name: string): string {
  return name
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
