import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { contentAddress } from './content-address.js';
import {
  GenerationFailure,
  artifactPath,
  type GenerationRequest,
  type GenerationWorker,
  type WorkerCredentials,
} from './types.js';
import * as log from '../utils/logger.js';

export const REQUEST_FILE = 'request.txt';
export const REQUESTER_FILE = 'user.txt';

export interface GenerationPipelineDeps {
  worker: GenerationWorker;
  credentials: WorkerCredentials;
  outputsDir: string;
  /** Capture clock, epoch millis. */
  now?: () => number;
}

/**
 * Content-addressed generation job.
 *
 * Flow:
 * 1. address = sha256(requestText + captureMillis)
 * 2. create `<outputsDir>/<address>` (must not exist yet)
 * 3. write request.txt and user.txt for offline audit
 * 4. run the worker against the directory
 * 5. success → directory path; failure → directory and any partial artifact removed,
 *    GenerationFailure thrown
 *
 * The artifact itself lives at `artifactPath(outputDir, operation)`.
 */
export class GenerationPipeline {
  private deps: GenerationPipelineDeps;
  private now: () => number;

  constructor(deps: GenerationPipelineDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  async run(request: GenerationRequest): Promise<string> {
    const address = contentAddress(request.requestText, this.now());
    const outputDir = await this.createOutputDirectory(address);

    try {
      await writeFile(join(outputDir, REQUEST_FILE), request.requestText, 'utf-8');
      await writeFile(join(outputDir, REQUESTER_FILE), request.requester, 'utf-8');
    } catch (err) {
      await this.deleteOutputDirectory(outputDir);
      throw new GenerationFailure(`Couldn't save request attributes into ${outputDir}: ${log.errorMessage(err)}`, { cause: err });
    }

    try {
      await this.deps.worker.runJob({
        outputDir,
        credentials: this.deps.credentials,
        requester: request.requester,
        requestText: request.requestText,
        operation: request.operation,
        payload: request.payload,
      });
    } catch (err) {
      await this.deleteOutputDirectory(outputDir);
      await this.deletePartialArtifact(artifactPath(outputDir, request.operation));
      if (err instanceof GenerationFailure) throw err;
      throw new GenerationFailure(`Error happened while executing the worker: ${log.errorMessage(err)}`, { cause: err });
    }

    log.info(`Generation ${request.operation} for ${request.requester} finished in ${outputDir}`);
    return outputDir;
  }

  private async createOutputDirectory(address: string): Promise<string> {
    const outputDir = join(this.deps.outputsDir, address);
    try {
      await mkdir(this.deps.outputsDir, { recursive: true });
      await mkdir(outputDir);
    } catch (err) {
      throw new GenerationFailure(`Couldn't create directory ${outputDir}: ${log.errorMessage(err)}`, { cause: err });
    }
    return outputDir;
  }

  private async deleteOutputDirectory(outputDir: string): Promise<void> {
    try {
      await rm(outputDir, { recursive: true, force: true });
      log.info(`Deleted directory ${outputDir} since generation has failed`);
    } catch (err) {
      log.warn(`Couldn't delete directory ${outputDir}: ${log.errorMessage(err)}`);
    }
  }

  private async deletePartialArtifact(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err) {
      log.warn(`Couldn't delete partial artifact ${path}: ${log.errorMessage(err)}`);
    }
  }
}
