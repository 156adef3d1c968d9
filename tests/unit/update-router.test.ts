import { describe, it, expect } from 'vitest';
import { UpdateRouter } from '../../src/router/update-router.js';
import type { ChatMessage, Update, UserFacingReply } from '../../src/updates/types.js';
import { BOT_ID, commandEntity, makeMessage, messageUpdate } from '../helpers/test-fixtures.js';

interface DispatchCall {
  verb: string;
  argumentText: string;
  replyTarget?: ChatMessage;
  requester: string;
}

class RecordingDispatcher {
  calls: DispatchCall[] = [];
  async dispatch(verb: string, argumentText: string, replyTarget: ChatMessage | undefined, requester: string): Promise<UserFacingReply> {
    this.calls.push({ verb, argumentText, replyTarget, requester });
    return { kind: 'text', text: `handled ${verb}` };
  }
}

function createRouter() {
  const dispatcher = new RecordingDispatcher();
  const router = new UpdateRouter({
    dispatcher,
    replies: { mention: 'Leave me alone!' },
    bot: { id: BOT_ID, username: 'muse_bot' },
  });
  return { router, dispatcher };
}

describe('UpdateRouter', () => {
  it('should reply to a mention without dispatching', async () => {
    const { router, dispatcher } = createRouter();
    const message = makeMessage({ text: '@muse_bot hi', entities: [{ kind: 'mention', offset: 0, length: 9 }], messageId: 31 });

    const { replies } = await router.route(messageUpdate(message));

    expect(replies).toEqual([{ kind: 'text', text: 'Leave me alone!', chatId: 555, replyToMessageId: 31 }]);
    expect(dispatcher.calls).toHaveLength(0);
  });

  it('should dispatch a command once with the requester', async () => {
    const { router, dispatcher } = createRouter();
    const message = makeMessage({ text: '/image a cat', entities: [commandEntity(6)], username: 'alice' });

    const { classification, replies } = await router.route(messageUpdate(message));

    expect(classification.kind).toBe('command');
    expect(dispatcher.calls).toEqual([{ verb: '/image', argumentText: 'a cat', replyTarget: undefined, requester: 'alice' }]);
    expect(replies).toEqual([{ kind: 'text', text: 'handled /image', chatId: 555 }]);
  });

  it('should route a reply to a bot photo to /image with the whole text', async () => {
    const { router, dispatcher } = createRouter();
    const botPhoto = makeMessage({ fromId: BOT_ID, photo: [{ fileId: 'p', width: 512, height: 512 }] });
    const message = makeMessage({ text: 'add a hat', replyTo: botPhoto });

    await router.route(messageUpdate(message));

    expect(dispatcher.calls).toEqual([{ verb: '/image', argumentText: 'add a hat', replyTarget: botPhoto, requester: 'alice' }]);
  });

  it('should route a reply to a bot text to /text', async () => {
    const { router, dispatcher } = createRouter();
    const botText = makeMessage({ fromId: BOT_ID, text: 'A short story' });
    const message = makeMessage({ text: 'continue', replyTo: botText });

    await router.route(messageUpdate(message));

    expect(dispatcher.calls.map(c => c.verb)).toEqual(['/text']);
  });

  it('should send private chatter to /text', async () => {
    const { router, dispatcher } = createRouter();
    const message = makeMessage({ text: 'how are you?', chatKind: 'private', fromId: 12, username: 'carol' });

    await router.route(messageUpdate(message));

    expect(dispatcher.calls).toEqual([{ verb: '/text', argumentText: 'how are you?', replyTarget: undefined, requester: 'carol' }]);
  });

  it('should fall back to the numeric id when the sender has no username', async () => {
    const { router, dispatcher } = createRouter();
    const message: ChatMessage = { ...makeMessage({ text: 'hi', chatKind: 'private' }), from: { id: 321 } };

    await router.route(messageUpdate(message));

    expect(dispatcher.calls[0].requester).toBe('321');
  });

  it('should produce no reply for membership and unknown updates', async () => {
    const { router, dispatcher } = createRouter();
    const membership: Update = { updateId: 2, kind: 'membership', chat: { id: -5, kind: 'supergroup', title: 'Club' }, status: 'administrator' };
    const other: Update = { updateId: 3, kind: 'other', type: 'channel_post' };

    expect((await router.route(membership)).replies).toEqual([]);
    expect((await router.route(other)).replies).toEqual([]);
    expect(dispatcher.calls).toHaveLength(0);
  });

  it('should stay silent on group chatter', async () => {
    const { router, dispatcher } = createRouter();

    const { classification, replies } = await router.route(messageUpdate(makeMessage({ text: 'just talking' })));

    expect(classification.kind).toBe('ignored');
    expect(replies).toEqual([]);
    expect(dispatcher.calls).toHaveLength(0);
  });
});
