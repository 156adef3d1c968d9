import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InputFile, type Bot } from 'grammy';
import type { Update as TelegramUpdate } from 'grammy/types';
import type { MuseConfig } from '../config/schema.js';
import { MediaDownloadError, type MediaFetcher, type TransientMedia } from '../dispatch/media.js';
import type { UpdateBatchProcessor } from '../router/batch-processor.js';
import { toUpdate } from '../updates/telegram-mapper.js';
import type { OutboundReply, ReplySender } from '../updates/types.js';
import * as log from '../utils/logger.js';

const MAX_TELEGRAM_MSG = 4096;
const ALLOWED_UPDATES = ['message', 'edited_message', 'my_chat_member'] as const;

/** The part of grammy's Bot the poll loop uses. */
export interface PollingBot {
  botInfo: { username: string };
  api: {
    getUpdates(other: {
      offset?: number;
      timeout?: number;
      allowed_updates?: ReadonlyArray<(typeof ALLOWED_UPDATES)[number]>;
    }): Promise<TelegramUpdate[]>;
  };
}

/**
 * Telegram Channel — long-polls getUpdates and feeds each batch to the
 * processor. The next offset is always one past the last processed update.
 * Stopping takes effect once the pending poll returns (at most `pollTimeoutSec`).
 */
export class TelegramChannel {
  private bot: PollingBot;
  private config: MuseConfig['telegram'];
  private offset: number | undefined;

  constructor(bot: PollingBot, config: MuseConfig['telegram']) {
    this.bot = bot;
    this.config = config;
  }

  async start(processor: Pick<UpdateBatchProcessor, 'processBatch'>, signal: AbortSignal): Promise<void> {
    log.info(`Telegram: polling as @${this.bot.botInfo.username}`);

    while (!signal.aborted) {
      let batch: TelegramUpdate[];
      try {
        batch = await this.bot.api.getUpdates({
          offset: this.offset,
          timeout: this.config.pollTimeoutSec,
          allowed_updates: ALLOWED_UPDATES,
        });
      } catch (err) {
        if (signal.aborted) break;
        log.error(`Telegram: getUpdates failed: ${log.errorMessage(err)}`);
        log.info(`Telegram: retrying in ${this.config.retryDelayMs / 1000}s...`);
        await delay(this.config.retryDelayMs, signal);
        continue;
      }

      if (batch.length === 0) continue;

      const last = await processor.processBatch(batch.map(toUpdate));
      if (last !== undefined) this.offset = last + 1;
    }

    log.info('Telegram: polling stopped');
  }
}

/** Sends router replies through the Bot API. */
export class TelegramReplySender implements ReplySender {
  private bot: Bot;

  constructor(bot: Bot) {
    this.bot = bot;
  }

  async send(reply: OutboundReply): Promise<void> {
    const replyParameters = reply.replyToMessageId !== undefined
      ? { reply_parameters: { message_id: reply.replyToMessageId } }
      : {};

    if (reply.kind === 'photo') {
      await this.bot.api.sendPhoto(reply.chatId, new InputFile(reply.path), {
        ...replyParameters,
        ...(reply.caption ? { caption: reply.caption } : {}),
      });
      return;
    }

    for (const chunk of chunkMessage(reply.text, MAX_TELEGRAM_MSG)) {
      await this.bot.api.sendMessage(reply.chatId, chunk, replyParameters);
    }
  }
}

/**
 * Downloads Telegram files into a private temp directory. `release()` removes
 * the directory; it never throws.
 */
export class TelegramMediaFetcher implements MediaFetcher {
  private bot: Bot;
  private fileBaseUrl: string;

  constructor(bot: Bot, fileBaseUrl: string) {
    this.bot = bot;
    this.fileBaseUrl = fileBaseUrl;
  }

  async fetch(fileId: string): Promise<TransientMedia> {
    const dir = await mkdtemp(join(tmpdir(), 'muse-media-'));
    const release = async () => {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch (err) {
        log.warn(`Couldn't remove temporary media directory ${dir}: ${log.errorMessage(err)}`);
      }
    };

    try {
      const file = await this.bot.api.getFile(fileId);
      if (!file.file_path) throw new Error(`Telegram returned no file_path for ${fileId}`);

      const response = await fetch(`${this.fileBaseUrl}/bot${this.bot.token}/${file.file_path}`);
      if (!response.ok) throw new Error(`HTTP ${response.status} downloading ${file.file_path}`);

      const path = join(dir, 'photo');
      await writeFile(path, new Uint8Array(await response.arrayBuffer()));
      const bytes = await readFile(path);
      return { bytes, release };
    } catch (err) {
      await release();
      throw new MediaDownloadError(`Couldn't download and save photo ${fileId}: ${log.errorMessage(err)}`, { cause: err });
    }
  }
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/** Split long messages into chunks at newline or space boundaries. */
export function chunkMessage(text: string, maxLen: number): string[] {
  if (text.length <= maxLen) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLen) {
    let splitAt = remaining.lastIndexOf('\n', maxLen);
    if (splitAt <= 0) splitAt = remaining.lastIndexOf(' ', maxLen);
    if (splitAt <= 0) splitAt = maxLen;

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trimStart();
  }

  if (remaining) chunks.push(remaining);
  return chunks;
}
