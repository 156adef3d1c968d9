import type { Replies } from '../config/schema.js';
import type { CommandDispatcher } from '../dispatch/command-dispatcher.js';
import {
  requesterOf,
  type ChatMessage,
  type Classification,
  type OutboundReply,
  type Update,
  type UserFacingReply,
} from '../updates/types.js';
import { classify, type BotIdentity } from './classify.js';
import * as log from '../utils/logger.js';

export interface RouteResult {
  classification: Classification;
  /** At most one: a canned reply or the dispatcher's answer. */
  replies: OutboundReply[];
}

export interface UpdateRouterDeps {
  dispatcher: Pick<CommandDispatcher, 'dispatch'>;
  replies: Pick<Replies, 'mention'>;
  bot: BotIdentity;
  allowlist?: string[];
}

export class UpdateRouter {
  private deps: UpdateRouterDeps;

  constructor(deps: UpdateRouterDeps) {
    this.deps = deps;
  }

  async route(update: Update): Promise<RouteResult> {
    const { classification, warnings } = classify(update, { bot: this.deps.bot, allowlist: this.deps.allowlist });
    for (const warning of warnings) {
      log.warn(`Update ${update.updateId}: ${warning}`);
    }

    if (update.kind === 'message') {
      const { message } = update;
      log.info(`Processing message from ${requesterOf(message)}: ${message.text === undefined ? '<none>' : `'${message.text}'`}`);
    }

    switch (classification.kind) {
      case 'mention':
        return {
          classification,
          replies: [{
            kind: 'text',
            text: this.deps.replies.mention,
            chatId: classification.message.chat.id,
            replyToMessageId: classification.message.messageId,
          }],
        };

      case 'command':
        return this.dispatch(classification, classification.message, classification.verb, classification.remainder, classification.replyTarget);

      case 'reply_continuation': {
        const verb = classification.continuation === 'image' ? '/image' : '/text';
        const text = classification.message.text ?? '';
        return this.dispatch(classification, classification.message, verb, text, classification.replyTarget);
      }

      case 'private_default':
        return this.dispatch(classification, classification.message, '/text', classification.text, classification.replyTarget);

      case 'membership':
        log.info(describeMembership(classification));
        return { classification, replies: [] };

      case 'ignored':
        log.debug(`Update ${update.updateId} ignored: ${classification.reason}`);
        return { classification, replies: [] };

      case 'unknown':
        log.warn(`Unknown update ${update.updateId} of type '${classification.type}'`);
        return { classification, replies: [] };
    }
  }

  private async dispatch(
    classification: Classification,
    message: ChatMessage,
    verb: string,
    argumentText: string,
    replyTarget: ChatMessage | undefined,
  ): Promise<RouteResult> {
    const reply: UserFacingReply = await this.deps.dispatcher.dispatch(verb, argumentText, replyTarget, requesterOf(message));
    return { classification, replies: [{ ...reply, chatId: message.chat.id }] };
  }
}

function describeMembership(c: Extract<Classification, { kind: 'membership' }>): string {
  const place = c.chat.kind === 'private' ? 'private chat' : c.chat.kind;
  const title = c.chat.title ?? String(c.chat.id);
  switch (c.status) {
    case 'creator': return `We have become a creator of the ${place} '${title}'`;
    case 'administrator': return `We have become an administrator of the ${place} '${title}'`;
    case 'member': return `We have become a member of the ${place} '${title}'`;
    case 'restricted': return `We have been restricted in the ${place} '${title}'`;
    case 'left': return `We have left the ${place} '${title}'`;
    case 'kicked': return `We have been kicked from the ${place} '${title}'`;
  }
}
