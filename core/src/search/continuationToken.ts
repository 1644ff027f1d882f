import { BadRequestError } from './errors.js';

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const INVALID_CONTINUATION_TOKEN_MESSAGE = 'The continuation token is invalid.';

export function encodeContinuationToken(token: string): string {
  return Buffer.from(token, 'utf8').toString('base64');
}

/** Decodes a base64 continuation token to its UTF-8 text; whitespace inside the value is ignored. */
export function decodeContinuationToken(raw: string): string {
  const compact = raw.replace(/\s+/g, '');
  if (!BASE64.test(compact)) throw new BadRequestError(INVALID_CONTINUATION_TOKEN_MESSAGE);
  return Buffer.from(compact, 'base64').toString('utf8');
}
