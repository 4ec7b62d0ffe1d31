// src/aggregator/MessageReconciler.ts

/**
 * Turns a channel's message history into VRChat id -> role set mappings.
 *
 * Claim policy:
 * - an author's newest message decides which id that author claims, so
 *   authors can update their link by posting again;
 * - when several authors claim the same id, the oldest of those claims wins,
 *   so a claimed id cannot be taken over by a later poster.
 * The asymmetry is intentional. Equal timestamps fall back to the message
 * position in the history: later position is newer.
 *
 * @module aggregator
 */

import { logger } from "../helpers/cliHelper";
import { extractVrcId } from "../helpers/identityHelper";
import { ChatMessage, IdentityLink, RoleMap, Roster } from "../types";

/**
 * Returns true when `a` is newer than `b`.
 */
const isNewer = (a: IdentityLink, b: IdentityLink): boolean =>
  a.timestamp !== b.timestamp ? a.timestamp > b.timestamp : a.sequence > b.sequence;

/**
 * Extracts every identity claim from a message history.
 * Messages are expected oldest first; their index becomes the claim sequence.
 */
export function extractClaims(messages: readonly ChatMessage[]): IdentityLink[] {
  const claims: IdentityLink[] = [];
  messages.forEach((message, sequence) => {
    const vrcUserId = extractVrcId(message.content);
    if (vrcUserId) {
      claims.push({ vrcUserId, authorId: message.authorId, timestamp: message.timestamp, sequence });
    }
  });
  return claims;
}

/**
 * Applies the claim policy and returns the surviving links, ordered by sequence.
 */
export function reconcileClaims(messages: readonly ChatMessage[]): IdentityLink[] {
  const claims = extractClaims(messages);

  // Pass 1: newest claim per author
  const newestByAuthor = new Map<string, IdentityLink>();
  for (const claim of claims) {
    const current = newestByAuthor.get(claim.authorId);
    if (!current || isNewer(claim, current)) {
      newestByAuthor.set(claim.authorId, claim);
    }
  }

  // Pass 2: oldest surviving claim per VRChat id
  const oldestById = new Map<string, IdentityLink>();
  for (const claim of newestByAuthor.values()) {
    const current = oldestById.get(claim.vrcUserId);
    if (!current || isNewer(current, claim)) {
      oldestById.set(claim.vrcUserId, claim);
    }
  }

  return Array.from(oldestById.values()).sort((a, b) => a.sequence - b.sequence);
}

/**
 * Maps each surviving VRChat id to the role ids its author holds.
 * Authors missing from the roster (e.g. they left the server) are dropped.
 */
export function reconcile(messages: readonly ChatMessage[], roster: Roster): RoleMap {
  const roleMap: RoleMap = new Map();
  for (const link of reconcileClaims(messages)) {
    const roleIds = roster.get(link.authorId);
    if (!roleIds) {
      logger.debug(`Skipping ${link.vrcUserId}: author ${link.authorId} is not on the server`);
      continue;
    }
    roleMap.set(link.vrcUserId, new Set(roleIds));
  }
  return roleMap;
}
