/**
 * Shared bootstrap — creates the generation core and wires it together.
 * Used by both the gateway and the one-shot `generate` command.
 */

import type { MuseConfig } from './config/schema.js';
import { RequestLog } from './request-log/request-log.js';
import { GenerationPipeline } from './pipeline/generation-pipeline.js';
import { ProcessWorker } from './pipeline/worker.js';
import type { GenerationWorker } from './pipeline/types.js';
import { CommandDispatcher } from './dispatch/command-dispatcher.js';
import type { MediaFetcher } from './dispatch/media.js';
import { UpdateRouter } from './router/update-router.js';
import type { BotIdentity } from './router/classify.js';

export interface CoreDeps {
  config: MuseConfig;
  requestLog: RequestLog;
  pipeline: GenerationPipeline;
}

export interface AppDeps extends CoreDeps {
  dispatcher: CommandDispatcher;
  router: UpdateRouter;
}

export async function createCore(config: MuseConfig, opts?: { worker?: GenerationWorker }): Promise<CoreDeps> {
  // 1. Request log (process-wide handle, closed on shutdown)
  const requestLog = new RequestLog(config.outputs.requestsLog);
  await requestLog.open();

  // 2. Pipeline
  const pipeline = new GenerationPipeline({
    worker: opts?.worker ?? new ProcessWorker(config.worker.commands),
    credentials: { apiKey: config.worker.apiKey, organization: config.worker.organization },
    outputsDir: config.outputs.dir,
  });

  return { config, requestLog, pipeline };
}

export async function createApp(
  config: MuseConfig,
  opts: { bot: BotIdentity; media: MediaFetcher; worker?: GenerationWorker },
): Promise<AppDeps> {
  const core = await createCore(config, { worker: opts.worker });

  // 3. Dispatcher + router
  const dispatcher = new CommandDispatcher({
    pipeline: core.pipeline,
    requestLog: core.requestLog,
    media: opts.media,
    replies: config.replies,
  });
  const router = new UpdateRouter({
    dispatcher,
    replies: config.replies,
    bot: opts.bot,
    allowlist: config.telegram.allowlist,
  });

  return { ...core, dispatcher, router };
}
