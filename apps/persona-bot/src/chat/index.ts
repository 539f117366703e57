/**
 * Chat Module
 * Transport contract, in-process transport and the chat bot
 */

export { ChatBot, RESET_REPLY, MESSAGE_ERROR_REPLY, COMMAND_ERROR_REPLY } from './chat-bot';
export type { ChatBotDeps } from './chat-bot';
export { InMemoryTransport } from './memory-transport';
export type { InMemoryTransportOptions, OutgoingMessage } from './memory-transport';
export type { ChatTransport, IncomingMessage, RoomInvite, MessageHandler, InviteHandler } from './transport';
