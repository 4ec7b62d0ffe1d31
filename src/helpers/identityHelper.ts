/**
 * VRChat user id extraction from free-text chat messages.
 *
 * @module helpers/identityHelper
 */

export const VRC_USER_PREFIX = 'usr_';
/** Length of a full id: prefix plus a hyphenated UUID */
export const VRC_USER_ID_LENGTH = VRC_USER_PREFIX.length + 36;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const VRC_USER_ID_PATTERN = /^usr_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Finds the last `usr_` token in a message and returns it lowercased when the
 * characters following the prefix form a UUID. Only the last occurrence is
 * considered, even when it is truncated and an earlier one is well formed.
 */
export function extractVrcId(text: string): string | undefined {
  const lastIndex = text.lastIndexOf(VRC_USER_PREFIX);
  if (lastIndex === -1) {
    return undefined;
  }

  if (text.length - lastIndex < VRC_USER_ID_LENGTH) {
    return undefined;
  }

  const candidate = text.substring(lastIndex, lastIndex + VRC_USER_ID_LENGTH);
  if (!UUID_PATTERN.test(candidate.substring(VRC_USER_PREFIX.length))) {
    return undefined;
  }

  return candidate.toLowerCase();
}

/**
 * True for an already normalized (lowercase) VRChat user id.
 */
export function isVrcUserId(value: string): boolean {
  return VRC_USER_ID_PATTERN.test(value);
}
