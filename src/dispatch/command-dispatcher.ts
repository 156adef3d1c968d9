import { readFile } from 'node:fs/promises';
import type { Replies } from '../config/schema.js';
import { FAILURE_SENTINEL, type RequestLogRecord } from '../request-log/request-log.js';
import {
  artifactPath,
  isImageOperation,
  type GenerationRequest,
  type OperationKind,
} from '../pipeline/types.js';
import type { ChatMessage, UserFacingReply } from '../updates/types.js';
import { largestVariant, type MediaFetcher, type TransientMedia } from './media.js';
import * as log from '../utils/logger.js';

export interface GenerationRunner {
  run(request: GenerationRequest): Promise<string>;
}

export interface RequestLogSink {
  append(record: RequestLogRecord): Promise<void>;
}

export interface CommandDispatcherDeps {
  pipeline: GenerationRunner;
  requestLog: RequestLogSink;
  media: MediaFetcher;
  replies: Replies;
  readArtifact?: (path: string) => Promise<string>;
}

/**
 * Turns a command verb plus its argument text into a reply.
 *
 * /image and /text go through the generation pipeline and always leave exactly
 * one request-log line behind; the other verbs answer with fixed texts.
 */
export class CommandDispatcher {
  private deps: CommandDispatcherDeps;
  private readArtifact: (path: string) => Promise<string>;

  constructor(deps: CommandDispatcherDeps) {
    this.deps = deps;
    this.readArtifact = deps.readArtifact ?? ((path) => readFile(path, 'utf-8'));
  }

  async dispatch(
    verb: string,
    argumentText: string,
    replyTarget: ChatMessage | undefined,
    requester: string,
  ): Promise<UserFacingReply> {
    const command = normalizeVerb(verb);

    switch (command) {
      case '/stats':
        log.info(`Processing '${command}' command`);
        return { kind: 'text', text: this.deps.replies.stats };

      case '/help':
      case '/start':
        return { kind: 'text', text: this.deps.replies.help };

      case '/image':
        return this.image(argumentText, replyTarget, requester);

      case '/text':
        return this.text(argumentText, replyTarget, requester);

      default:
        log.warn(`Unknown command ${verb}`);
        return { kind: 'text', text: this.deps.replies.unknownCommand };
    }
  }

  private async image(request: string, replyTarget: ChatMessage | undefined, requester: string): Promise<UserFacingReply> {
    const photo = replyTarget?.photo ? largestVariant(replyTarget.photo) : undefined;
    if (!photo) {
      log.info(`Got request '${request}' from user '${requester}' to generate an image`);
      return this.generate({ requestText: request, requester, operation: 'image' });
    }

    log.info(`Got request '${request}' from user '${requester}' associated with an image`);
    let media: TransientMedia;
    try {
      media = await this.deps.media.fetch(photo.fileId);
    } catch (err) {
      log.error(`Couldn't download photo ${photo.fileId}: ${log.errorMessage(err)}`);
      return this.failure();
    }

    try {
      return await this.generate({ requestText: request, requester, operation: 'image_variation', payload: media.bytes });
    } finally {
      await media.release();
    }
  }

  private async text(request: string, replyTarget: ChatMessage | undefined, requester: string): Promise<UserFacingReply> {
    const source = replyTarget?.text;
    if (source === undefined) {
      log.info(`Got request '${request}' from user '${requester}' to complete a text`);
      return this.generate({ requestText: request, requester, operation: 'text_completion' });
    }

    log.info(`Got request '${request}' from user '${requester}' associated with a text message`);
    return this.generate({
      requestText: request,
      requester,
      operation: 'text_edit',
      payload: new TextEncoder().encode(source),
    });
  }

  private async generate(request: GenerationRequest): Promise<UserFacingReply> {
    let reply: UserFacingReply;
    let result: string;

    try {
      const outputDir = await this.deps.pipeline.run(request);
      const path = artifactPath(outputDir, request.operation);
      reply = await this.present(request.operation, path, request.requestText);
      result = path;
    } catch (err) {
      log.error(`Generation ${request.operation} for ${request.requester} failed: ${log.errorMessage(err)}`);
      reply = this.failure();
      result = FAILURE_SENTINEL;
    }

    await this.deps.requestLog.append({
      timestamp: new Date(),
      requester: request.requester,
      result,
      requestText: request.requestText,
    });
    return reply;
  }

  private async present(operation: OperationKind, path: string, request: string): Promise<UserFacingReply> {
    if (isImageOperation(operation)) {
      return { kind: 'photo', path, ...(request ? { caption: request } : {}) };
    }
    return { kind: 'text', text: await this.readArtifact(path) };
  }

  private failure(): UserFacingReply {
    return { kind: 'text', text: this.deps.replies.failure };
  }
}

/** Lowercase, without the `@botname` suffix Telegram adds in groups. */
export function normalizeVerb(verb: string): string {
  const at = verb.indexOf('@');
  return (at === -1 ? verb : verb.slice(0, at)).toLowerCase();
}
