import type { ChatMessage, Classification, Update } from '../updates/types.js';

export interface BotIdentity {
  id: number;
  username?: string;
}

export interface ClassifyOptions {
  bot: BotIdentity;
  /** Chat ids or usernames allowed to talk to the bot. Empty allows everyone. */
  allowlist?: string[];
}

export interface ClassifyResult {
  classification: Classification;
  /** Routing warnings: unrecognized entities and the like. Never fatal. */
  warnings: string[];
}

/**
 * Decide what an update asks for.
 *
 * Messages (plain or edited) are scanned entity by entity; the first mention
 * or bot_command decides, other entity kinds only produce warnings. Without
 * entities, a reply to one of the bot's own messages continues that message
 * (photo → image, text → text). Anything still undecided in a private chat
 * becomes a text request with the whole message.
 */
export function classify(update: Update, opts: ClassifyOptions): ClassifyResult {
  const warnings: string[] = [];

  switch (update.kind) {
    case 'membership':
      return { classification: { kind: 'membership', chat: update.chat, status: update.status }, warnings };
    case 'other':
      return { classification: { kind: 'unknown', type: update.type }, warnings };
    case 'message':
      return { classification: classifyMessage(update.message, opts, warnings), warnings };
  }
}

function classifyMessage(message: ChatMessage, opts: ClassifyOptions, warnings: string[]): Classification {
  if (!isAllowed(message, opts.allowlist ?? [])) {
    return { kind: 'ignored', reason: `chat ${message.chat.id} is not in the allowlist` };
  }

  const text = message.text;
  if (text === undefined) {
    return { kind: 'ignored', reason: 'message has no text' };
  }

  let decided: Classification | undefined;
  for (const entity of message.entities) {
    if (entity.kind === 'mention' || entity.kind === 'bot_command') {
      if (decided) continue;
      decided = entity.kind === 'mention'
        ? { kind: 'mention', message }
        : {
            kind: 'command',
            message,
            verb: text.slice(entity.offset, entity.offset + entity.length),
            remainder: commandRemainder(text),
            replyTarget: message.replyTo,
          };
    } else {
      warnings.push(`Unknown entity type '${entity.kind}'`);
    }
  }
  if (decided) return decided;

  const replyTo = message.replyTo;
  if (message.entities.length === 0 && replyTo && replyTo.from?.id === opts.bot.id) {
    if (replyTo.photo && replyTo.photo.length > 0) {
      return { kind: 'reply_continuation', message, continuation: 'image', replyTarget: replyTo };
    }
    if (replyTo.text !== undefined) {
      return { kind: 'reply_continuation', message, continuation: 'text', replyTarget: replyTo };
    }
    return { kind: 'ignored', reason: 'reply to a bot message without photo or text' };
  }

  if (message.chat.kind === 'private') {
    return { kind: 'private_default', message, text, replyTarget: replyTo };
  }

  return { kind: 'ignored', reason: 'nothing addressed to the bot' };
}

/** Everything after the first whitespace-delimited token. */
export function commandRemainder(text: string): string {
  const match = /^\S*\s/.exec(text);
  return match ? text.slice(match[0].length) : '';
}

function isAllowed(message: ChatMessage, allowlist: string[]): boolean {
  if (allowlist.length === 0) return true;
  if (allowlist.includes(String(message.chat.id))) return true;
  const username = message.from?.username;
  return username !== undefined && allowlist.includes(username);
}
