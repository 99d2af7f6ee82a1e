/**
 * Temporary URL signing
 */

import { hmac } from '@noble/hashes/hmac';
import { sha1 } from '@noble/hashes/legacy';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { ValidationError } from '../errors/index.js';

export type TempUrlMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

/**
 * Signs `objectUrl` for use without a token until `expiresAt`.
 *
 * The signature is the hex HMAC-SHA1 of "METHOD\nEXPIRES\nPATH" keyed with
 * the temp URL key stored on the account or container.
 */
export function buildTempUrl(objectUrl: string, key: string, method: TempUrlMethod, expiresAt: Date): string {
  if (key === '') {
    throw ValidationError.invalidArgument('key', 'temp URL key may not be empty');
  }
  const expires = Math.floor(expiresAt.getTime() / 1000);
  if (!Number.isFinite(expires)) {
    throw ValidationError.invalidArgument('expiresAt', 'not a valid date');
  }

  const path = new URL(objectUrl).pathname;
  const signature = bytesToHex(hmac(sha1, utf8ToBytes(key), utf8ToBytes(`${method}\n${expires}\n${path}`)));
  return `${objectUrl}?temp_url_sig=${signature}&temp_url_expires=${expires}`;
}
