import crypto from 'crypto';
import { APP_CONFIG } from '@/lib/constants/config';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/** Same alphabet the generator draws from; anything else is never a stored id. */
export const ANNOUNCEMENT_ID_PATTERN = /^[A-Za-z0-9]+$/;

/**
 * Random announcement id from a CSPRNG (62 symbols, ~71 bits at 12 chars).
 * No lookup against existing records: collisions are left to the entropy.
 */
export function generateAnnouncementId(length: number = APP_CONFIG.announcementIdLength): string {
  let id = '';
  for (let i = 0; i < length; i += 1) {
    id += ALPHABET[crypto.randomInt(ALPHABET.length)];
  }
  return id;
}

export function isAnnouncementId(value: string): boolean {
  return ANNOUNCEMENT_ID_PATTERN.test(value);
}
