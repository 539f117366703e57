/**
 * In-process chat transport
 *
 * Events are pushed in by the caller and replies collect in an outbox. Backs
 * the console CLI and stands in for a network client in tests.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger';
import { ChatTransport, IncomingMessage, InviteHandler, MessageHandler } from './transport';

const logger = createLogger('InMemoryTransport');

export interface OutgoingMessage {
  roomId: string;
  text: string;
}

export interface InMemoryTransportOptions {
  userId?: string;
  /** Rooms that refuse joins */
  unjoinableRooms?: string[];
}

export class InMemoryTransport implements ChatTransport {
  readonly userId: string;

  private messageHandler: MessageHandler | null = null;
  private inviteHandler: InviteHandler | null = null;
  private readonly outbox: OutgoingMessage[] = [];
  private readonly joined = new Set<string>();
  private readonly unjoinable: Set<string>;
  private running = false;

  constructor(options: InMemoryTransportOptions = {}) {
    this.userId = options.userId ?? '@persona:localhost';
    this.unjoinable = new Set(options.unjoinableRooms ?? []);
  }

  get isRunning(): boolean {
    return this.running;
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  onInvite(handler: InviteHandler): void {
    this.inviteHandler = handler;
  }

  async sendMessage(roomId: string, text: string): Promise<void> {
    this.outbox.push({ roomId, text });
  }

  async joinRoom(roomId: string): Promise<boolean> {
    if (this.unjoinable.has(roomId)) {
      return false;
    }
    this.joined.add(roomId);
    return true;
  }

  async start(): Promise<void> {
    this.running = true;
    logger.debug(`Transport started for ${this.userId}`);
  }

  async stop(): Promise<void> {
    this.running = false;
    logger.debug(`Transport stopped for ${this.userId}`);
  }

  /**
   * Deliver a message as if it arrived from the network
   * @returns the event, so callers can redeliver it
   */
  async deliver(message: Omit<IncomingMessage, 'eventId'> & { eventId?: string }): Promise<IncomingMessage> {
    const event: IncomingMessage = { ...message, eventId: message.eventId ?? `$${uuidv4()}` };
    if (this.messageHandler) {
      await this.messageHandler(event);
    }
    return event;
  }

  async invite(roomId: string, inviteeId: string = this.userId): Promise<void> {
    if (this.inviteHandler) {
      await this.inviteHandler({ roomId, inviteeId });
    }
  }

  /**
   * Take every message sent so far
   */
  drain(): OutgoingMessage[] {
    return this.outbox.splice(0, this.outbox.length);
  }

  getJoinedRooms(): string[] {
    return [...this.joined];
  }
}
