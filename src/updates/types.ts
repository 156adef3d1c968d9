/**
 * Transport-neutral view of a Telegram update, reduced to what routing needs.
 */

export type ChatKind = 'private' | 'group' | 'supergroup' | 'channel';

export interface ChatRef {
  id: number;
  kind: ChatKind;
  title?: string;
}

export interface Sender {
  id: number;
  username?: string;
}

/** Annotated span of the message text; `kind` is Telegram's entity type (mention, bot_command, url, ...). */
export interface Entity {
  kind: string;
  offset: number;
  length: number;
}

export interface PhotoVariant {
  fileId: string;
  width: number;
  height: number;
}

export interface ChatMessage {
  messageId: number;
  chat: ChatRef;
  from?: Sender;
  text?: string;
  entities: Entity[];
  /** Sizes of the same photo, as Telegram delivers them. */
  photo?: PhotoVariant[];
  replyTo?: ChatMessage;
}

export type MembershipStatus = 'creator' | 'administrator' | 'member' | 'restricted' | 'left' | 'kicked';

export type Update =
  | { updateId: number; kind: 'message'; message: ChatMessage }
  | { updateId: number; kind: 'membership'; chat: ChatRef; status: MembershipStatus }
  | { updateId: number; kind: 'other'; type: string };

export type ContinuationKind = 'image' | 'text';

/** What an update asks the bot to do. Computed once per update. */
export type Classification =
  | { kind: 'mention'; message: ChatMessage }
  | { kind: 'command'; message: ChatMessage; verb: string; remainder: string; replyTarget?: ChatMessage }
  | { kind: 'reply_continuation'; message: ChatMessage; continuation: ContinuationKind; replyTarget: ChatMessage }
  | { kind: 'private_default'; message: ChatMessage; text: string; replyTarget?: ChatMessage }
  | { kind: 'membership'; chat: ChatRef; status: MembershipStatus }
  | { kind: 'ignored'; reason: string }
  | { kind: 'unknown'; type: string };

export type UserFacingReply =
  | { kind: 'text'; text: string }
  | { kind: 'photo'; path: string; caption?: string };

export type OutboundReply = UserFacingReply & {
  chatId: number;
  replyToMessageId?: number;
};

export interface ReplySender {
  send(reply: OutboundReply): Promise<void>;
}

export function requesterOf(message: ChatMessage): string {
  if (!message.from) return 'unknown';
  return message.from.username || String(message.from.id);
}
