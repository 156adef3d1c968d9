import { describe, it, expect } from 'vitest';
import { classify, commandRemainder } from '../../src/router/classify.js';
import type { Update } from '../../src/updates/types.js';
import { BOT_ID, commandEntity, makeMessage, messageUpdate } from '../helpers/test-fixtures.js';

const OPTS = { bot: { id: BOT_ID, username: 'muse_bot' } };

describe('commandRemainder', () => {
  it('should drop the first token and one separator', () => {
    expect(commandRemainder('/image a cat')).toBe('a cat');
    expect(commandRemainder('/text\nwrite a poem')).toBe('write a poem');
    expect(commandRemainder('/stats')).toBe('');
    expect(commandRemainder('/image  two spaces')).toBe(' two spaces');
  });
});

describe('classify', () => {
  it('should classify a bot_command with verb and remainder', () => {
    const message = makeMessage({ text: '/image a cat', entities: [commandEntity(6)] });
    const { classification, warnings } = classify(messageUpdate(message), OPTS);

    expect(classification).toEqual({
      kind: 'command',
      message,
      verb: '/image',
      remainder: 'a cat',
      replyTarget: undefined,
    });
    expect(warnings).toEqual([]);
  });

  it('should slice the verb by offset and length', () => {
    const message = makeMessage({ text: 'hey /text@muse_bot go', entities: [commandEntity(14, 4)] });
    const { classification } = classify(messageUpdate(message), OPTS);

    expect(classification.kind === 'command' && classification.verb).toBe('/text@muse_bot');
    expect(classification.kind === 'command' && classification.remainder).toBe('/text@muse_bot go');
  });

  it('should carry the reply target of a command', () => {
    const photoMessage = makeMessage({ photo: [{ fileId: 'p1', width: 90, height: 90 }], fromId: 7 });
    const message = makeMessage({ text: '/image brighter', entities: [commandEntity(6)], replyTo: photoMessage });
    const { classification } = classify(messageUpdate(message), OPTS);

    expect(classification.kind === 'command' && classification.replyTarget).toBe(photoMessage);
  });

  it('should classify a mention', () => {
    const message = makeMessage({ text: '@muse_bot hi', entities: [{ kind: 'mention', offset: 0, length: 9 }] });
    expect(classify(messageUpdate(message), OPTS).classification).toEqual({ kind: 'mention', message });
  });

  it('should let the first of mention and command win', () => {
    const message = makeMessage({
      text: '@muse_bot /image a cat',
      entities: [{ kind: 'mention', offset: 0, length: 9 }, commandEntity(6, 10)],
    });
    expect(classify(messageUpdate(message), OPTS).classification.kind).toBe('mention');
  });

  it('should warn about other entity kinds and keep scanning', () => {
    const message = makeMessage({
      text: 'https://example.com /stats',
      entities: [{ kind: 'url', offset: 0, length: 19 }, commandEntity(6, 20)],
    });
    const { classification, warnings } = classify(messageUpdate(message), OPTS);

    expect(classification.kind === 'command' && classification.verb).toBe('/stats');
    expect(warnings).toEqual(["Unknown entity type 'url'"]);
  });

  it('should continue a bot photo as an image request', () => {
    const botPhoto = makeMessage({ fromId: BOT_ID, photo: [{ fileId: 'p1', width: 512, height: 512 }] });
    const message = makeMessage({ text: 'now in blue', replyTo: botPhoto });

    expect(classify(messageUpdate(message), OPTS).classification).toEqual({
      kind: 'reply_continuation',
      message,
      continuation: 'image',
      replyTarget: botPhoto,
    });
  });

  it('should continue a bot text as a text request', () => {
    const botText = makeMessage({ fromId: BOT_ID, text: 'Once upon a time' });
    const message = makeMessage({ text: 'make it shorter', replyTo: botText });
    const { classification } = classify(messageUpdate(message), OPTS);

    expect(classification.kind === 'reply_continuation' && classification.continuation).toBe('text');
  });

  it('should ignore a reply to a bot message without photo or text', () => {
    const botSticker = makeMessage({ fromId: BOT_ID });
    const message = makeMessage({ text: 'lol', replyTo: botSticker, chatKind: 'private' });

    expect(classify(messageUpdate(message), OPTS).classification.kind).toBe('ignored');
  });

  it('should not continue replies to other users in a group', () => {
    const other = makeMessage({ fromId: 77, text: 'hello' });
    const message = makeMessage({ text: 'hi back', replyTo: other });

    expect(classify(messageUpdate(message), OPTS).classification.kind).toBe('ignored');
  });

  it('should default private messages to a text request', () => {
    const message = makeMessage({ text: 'tell me a joke', chatKind: 'private' });

    expect(classify(messageUpdate(message), OPTS).classification).toEqual({
      kind: 'private_default',
      message,
      text: 'tell me a joke',
      replyTarget: undefined,
    });
  });

  it('should default a private message whose entities are all unrecognized', () => {
    const message = makeMessage({
      text: 'see https://example.com',
      entities: [{ kind: 'url', offset: 4, length: 19 }],
      chatKind: 'private',
    });
    const { classification, warnings } = classify(messageUpdate(message), OPTS);

    expect(classification.kind).toBe('private_default');
    expect(warnings).toHaveLength(1);
  });

  it('should ignore messages without text', () => {
    const message = makeMessage({ chatKind: 'private', photo: [{ fileId: 'p', width: 1, height: 1 }] });
    expect(classify(messageUpdate(message), OPTS).classification.kind).toBe('ignored');
  });

  it('should ignore chats outside a non-empty allowlist', () => {
    const message = makeMessage({ text: '/stats', entities: [commandEntity(6)], chatId: 999, username: 'mallory' });
    const opts = { ...OPTS, allowlist: ['555', 'alice'] };

    expect(classify(messageUpdate(message), opts).classification.kind).toBe('ignored');
    expect(classify(messageUpdate(makeMessage({ text: '/stats', entities: [commandEntity(6)] })), opts).classification.kind)
      .toBe('command');
  });

  it('should classify membership changes', () => {
    const update: Update = { updateId: 4, kind: 'membership', chat: { id: -1, kind: 'group', title: 'Friends' }, status: 'kicked' };

    expect(classify(update, OPTS).classification).toEqual({
      kind: 'membership',
      chat: { id: -1, kind: 'group', title: 'Friends' },
      status: 'kicked',
    });
  });

  it('should classify other update shapes as unknown', () => {
    const update: Update = { updateId: 5, kind: 'other', type: 'poll' };
    expect(classify(update, OPTS).classification).toEqual({ kind: 'unknown', type: 'poll' });
  });
});
