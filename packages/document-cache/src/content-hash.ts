import { createHash } from 'node:crypto';

/** SHA-256 of the UTF-8 bytes of the extracted text, hex encoded. */
export const computeContentHash = (text: string): string =>
  createHash('sha256').update(text, 'utf8').digest('hex');
