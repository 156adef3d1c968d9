/**
 * Generate command — runs one pipeline job from the shell and prints the
 * artifact path. Writes the same request-log line the bot would.
 */

import type { MuseConfig } from '../config/schema.js';
import { createCore } from '../bootstrap.js';
import { FAILURE_SENTINEL } from '../request-log/request-log.js';
import { artifactPath, type GenerationRequest, type GenerationWorker, type OperationKind } from '../pipeline/types.js';
import * as log from '../utils/logger.js';

export interface GenerateOptions {
  operation: OperationKind;
  requestText: string;
  requester: string;
  /** Contents for image_variation / text_edit, read by the caller. */
  payload?: Uint8Array;
  worker?: GenerationWorker;
}

export async function runGenerate(config: MuseConfig, opts: GenerateOptions): Promise<string | null> {
  const core = await createCore(config, { worker: opts.worker });
  const request: GenerationRequest = {
    requestText: opts.requestText,
    requester: opts.requester,
    operation: opts.operation,
    payload: opts.payload,
  };

  let result: string | null = null;
  try {
    result = artifactPath(await core.pipeline.run(request), request.operation);
  } catch (err) {
    log.error(`Generation failed: ${log.errorMessage(err)}`);
  }

  await core.requestLog.append({
    timestamp: new Date(),
    requester: request.requester,
    result: result ?? FAILURE_SENTINEL,
    requestText: request.requestText,
  });
  await core.requestLog.close();
  return result;
}
