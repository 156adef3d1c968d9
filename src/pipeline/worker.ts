import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { WorkerCommands } from '../config/schema.js';
import { GenerationFailure, type GenerationJob, type GenerationWorker } from './types.js';
import * as log from '../utils/logger.js';

const workerLog = log.scope('worker');

/**
 * Runs each job as a local process.
 *
 * argv: `<command...> --output <dir> --api-key <key> --organization <org> --request <text> --user <requester>`.
 * The payload goes to stdin, which is then closed. stdout and stderr are
 * forwarded to the `worker` log scope line by line while the process runs.
 * Exit code 0 means the artifact was written.
 *
 * There is no timeout: a worker that never exits blocks its caller.
 */
export class ProcessWorker implements GenerationWorker {
  private commands: WorkerCommands;
  private cwd?: string;

  constructor(commands: WorkerCommands, opts?: { cwd?: string }) {
    this.commands = commands;
    this.cwd = opts?.cwd;
  }

  runJob(job: GenerationJob): Promise<void> {
    const [executable, ...prefix] = this.commands[job.operation];
    const args = [
      ...prefix,
      '--output', job.outputDir,
      '--api-key', job.credentials.apiKey,
      '--organization', job.credentials.organization,
      '--request', job.requestText,
      '--user', job.requester,
    ];

    log.info(`Executing ${job.operation} worker: ${[executable, ...prefix].join(' ')} --output ${job.outputDir}`);

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const fail = (err: GenerationFailure) => {
        if (settled) return;
        settled = true;
        reject(err);
      };

      const child = spawn(executable, args, {
        cwd: this.cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      child.on('error', (err) => {
        fail(new GenerationFailure(`Error happened while executing the worker: ${err.message}`, { cause: err }));
      });

      for (const stream of [child.stdout, child.stderr]) {
        const rl = createInterface({ input: stream, crlfDelay: Infinity });
        rl.on('line', (line) => workerLog.info(line));
      }

      // A worker that exits without reading its input closes the pipe under us
      child.stdin.on('error', (err) => {
        fail(new GenerationFailure(`Couldn't write payload to the worker: ${err.message}`, { cause: err }));
      });
      if (job.payload) {
        child.stdin.end(job.payload);
      } else {
        child.stdin.end();
      }

      child.on('close', (code, signal) => {
        if (settled) return;
        if (code === 0) {
          settled = true;
          resolve();
          return;
        }
        const reason = signal ? `signal ${signal}` : `exit code ${code}`;
        log.error(`Worker execution failed with ${reason}`);
        fail(new GenerationFailure(`Worker execution failed with ${reason}`, { exitCode: code ?? undefined }));
      });
    });
  }
}
