/**
 * Chat transport contract
 *
 * The bot never talks to a chat network directly; a transport delivers
 * incoming events and carries replies back.
 */

export interface IncomingMessage {
  eventId: string;
  roomId: string;
  senderId: string;
  text: string;
}

export interface RoomInvite {
  roomId: string;
  /** User the invite is addressed to */
  inviteeId: string;
  inviterId?: string;
}

export type MessageHandler = (message: IncomingMessage) => Promise<void>;
export type InviteHandler = (invite: RoomInvite) => Promise<void>;

export interface ChatTransport {
  readonly userId: string;
  onMessage(handler: MessageHandler): void;
  onInvite(handler: InviteHandler): void;
  sendMessage(roomId: string, text: string): Promise<void>;
  /** @returns false when the room could not be joined */
  joinRoom(roomId: string): Promise<boolean>;
  start(): Promise<void>;
  stop(): Promise<void>;
}
