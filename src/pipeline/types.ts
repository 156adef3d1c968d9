export type OperationKind = 'image' | 'image_variation' | 'text_completion' | 'text_edit';

export const OPERATION_KINDS: readonly OperationKind[] = ['image', 'image_variation', 'text_completion', 'text_edit'];

export interface GenerationRequest {
  requestText: string;
  requester: string;
  operation: OperationKind;
  /** Photo bytes for image_variation, UTF-8 text for text_edit. */
  payload?: Uint8Array;
}

export interface WorkerCredentials {
  apiKey: string;
  organization: string;
}

/** One invocation of the external worker. */
export interface GenerationJob {
  outputDir: string;
  credentials: WorkerCredentials;
  requester: string;
  requestText: string;
  operation: OperationKind;
  payload?: Uint8Array;
}

export interface GenerationWorker {
  /** Resolves once the worker has produced its artifact; rejects with GenerationFailure otherwise. */
  runJob(job: GenerationJob): Promise<void>;
}

export class GenerationFailure extends Error {
  readonly exitCode?: number;

  constructor(message: string, opts?: { exitCode?: number; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'GenerationFailure';
    this.exitCode = opts?.exitCode;
  }
}

export function isImageOperation(operation: OperationKind): boolean {
  return operation === 'image' || operation === 'image_variation';
}

/** The worker writes its artifact next to the output directory, not inside it. */
export function artifactPath(outputDir: string, operation: OperationKind): string {
  return outputDir + (isImageOperation(operation) ? '.jpeg' : '.txt');
}

export function isOperationKind(value: string): value is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(value);
}
