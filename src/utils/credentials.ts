export const CREDENTIAL_MASK = '********';

const VISIBLE_CHARS = 4;

/**
 * Strip whitespace and surrounding quotes pasted along with a token
 */
export function normalizeCredential(raw: string): string {
  return raw.trim().replace(/^["']+|["']+$/g, '').trim();
}

/**
 * First and last four characters around a fixed mask. Credentials of eight
 * characters or fewer would be fully revealed that way, so they are masked
 * character for character.
 */
export function maskCredential(raw: string): string {
  if (!raw) return '';
  if (raw.length <= VISIBLE_CHARS * 2) {
    return '*'.repeat(raw.length);
  }
  return raw.slice(0, VISIBLE_CHARS) + CREDENTIAL_MASK + raw.slice(-VISIBLE_CHARS);
}
