/**
 * Gateway command — headless mode: long-polls Telegram and answers updates
 * until SIGINT/SIGTERM.
 */

import { Bot } from 'grammy';
import type { MuseConfig } from '../config/schema.js';
import { createApp } from '../bootstrap.js';
import { TelegramChannel, TelegramMediaFetcher, TelegramReplySender } from '../channels/telegram-channel.js';
import { UpdateBatchProcessor } from '../router/batch-processor.js';
import * as log from '../utils/logger.js';

export async function runGateway(config: MuseConfig): Promise<void> {
  const token = config.telegram.token;
  if (!token) {
    throw new Error('Telegram: token is required. Set TELEGRAM_BOT_TOKEN or telegram.token in muse.json');
  }
  if (!config.worker.apiKey) {
    log.warn('Gateway: no worker API key configured (OPENAI_API_KEY), generation requests will likely fail');
  }

  const bot = new Bot(token);
  await bot.init();
  log.info(`Gateway: bot is @${bot.botInfo.username} (${bot.botInfo.id})`);

  const app = await createApp(config, {
    bot: { id: bot.botInfo.id, username: bot.botInfo.username },
    media: new TelegramMediaFetcher(bot, config.telegram.fileBaseUrl),
  });

  // Graceful shutdown
  const ac = new AbortController();
  const { signal } = ac;

  process.on('SIGINT', () => {
    console.log('\nShutting down gateway...');
    ac.abort();
  });
  process.on('SIGTERM', () => ac.abort());

  const processor = new UpdateBatchProcessor(app.router, new TelegramReplySender(bot));
  const channel = new TelegramChannel(bot, config.telegram);

  console.log('Gateway running. Press Ctrl+C to stop.');
  try {
    await channel.start(processor, signal);
  } finally {
    await app.requestLog.close();
  }
}
