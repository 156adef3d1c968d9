import type { Update as TelegramUpdate } from 'grammy/types';
import type { ChatKind, ChatMessage, ChatRef, MembershipStatus, Update } from './types.js';

/** The part of a Bot API message the router looks at. grammy's Message satisfies it. */
export interface RawMessage {
  message_id: number;
  chat: RawChat;
  from?: { id: number; is_bot: boolean; username?: string };
  text?: string;
  entities?: Array<{ type: string; offset: number; length: number }>;
  photo?: Array<{ file_id: string; width: number; height: number; file_size?: number }>;
  reply_to_message?: RawMessage;
}

interface RawChat {
  id: number;
  type: string;
  title?: string;
}

const MEMBERSHIP_STATUSES: readonly MembershipStatus[] = ['creator', 'administrator', 'member', 'restricted', 'left', 'kicked'];

export function toUpdate(raw: TelegramUpdate): Update {
  if (raw.message) {
    return { updateId: raw.update_id, kind: 'message', message: toChatMessage(raw.message) };
  }
  if (raw.edited_message) {
    return { updateId: raw.update_id, kind: 'message', message: toChatMessage(raw.edited_message) };
  }
  if (raw.my_chat_member) {
    const status = raw.my_chat_member.new_chat_member.status;
    if (isMembershipStatus(status)) {
      return { updateId: raw.update_id, kind: 'membership', chat: toChatRef(raw.my_chat_member.chat), status };
    }
  }

  const type = Object.keys(raw).find(key => key !== 'update_id') ?? 'empty';
  return { updateId: raw.update_id, kind: 'other', type };
}

export function toChatMessage(raw: RawMessage): ChatMessage {
  return {
    messageId: raw.message_id,
    chat: toChatRef(raw.chat),
    from: raw.from ? { id: raw.from.id, username: raw.from.username } : undefined,
    text: raw.text,
    entities: (raw.entities ?? []).map(e => ({ kind: e.type, offset: e.offset, length: e.length })),
    photo: raw.photo?.map(p => ({ fileId: p.file_id, width: p.width, height: p.height })),
    replyTo: raw.reply_to_message ? toChatMessage(raw.reply_to_message) : undefined,
  };
}

function toChatRef(chat: RawChat): ChatRef {
  return { id: chat.id, kind: toChatKind(chat.type), title: chat.title };
}

function toChatKind(type: string): ChatKind {
  switch (type) {
    case 'private':
    case 'group':
    case 'supergroup':
    case 'channel':
      return type;
    default:
      return 'group';
  }
}

function isMembershipStatus(status: string): status is MembershipStatus {
  return (MEMBERSHIP_STATUSES as readonly string[]).includes(status);
}
