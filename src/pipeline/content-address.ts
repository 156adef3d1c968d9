import { createHash } from 'node:crypto';

/**
 * Directory name for one generation: SHA-256 of the request text followed by
 * the capture time in epoch milliseconds, hex-encoded.
 *
 * Two identical requests captured in the same millisecond get the same
 * address; the pipeline then fails the second one when it finds the
 * directory already there.
 */
export function contentAddress(requestText: string, captureMillis: number): string {
  return createHash('sha256').update(requestText + String(captureMillis), 'utf8').digest('hex');
}
