import type { PhotoVariant } from '../updates/types.js';

/** Downloaded attachment, held in transient storage until released. */
export interface TransientMedia {
  bytes: Uint8Array;
  release(): Promise<void>;
}

export interface MediaFetcher {
  /** Rejects with MediaDownloadError. */
  fetch(fileId: string): Promise<TransientMedia>;
}

export class MediaDownloadError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'MediaDownloadError';
  }
}

/** Highest-resolution variant; ties go to the later (Telegram lists sizes ascending). */
export function largestVariant(variants: PhotoVariant[]): PhotoVariant | undefined {
  let best: PhotoVariant | undefined;
  for (const variant of variants) {
    if (!best || variant.width * variant.height >= best.width * best.height) {
      best = variant;
    }
  }
  return best;
}
