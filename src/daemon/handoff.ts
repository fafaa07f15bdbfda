/**
 * Handoff policy: who may send which message types to whom.
 *
 * The coordinator context is exempt in both directions. Everyone else
 * needs an explicit rule; a broadcast needs the type allowed towards every
 * other context.
 */

import { BROADCAST, type ContextRegistry } from '../lib/registry.js';

export type HandoffDecision =
  | { allowed: true; reason: 'coordinator-sender' | 'coordinator-recipient' | 'rule' }
  | { allowed: false; allowedTypes: readonly string[] };

/**
 * Decide a handoff between known contexts (`to` may be "all").
 * Endpoint existence is checked by the caller.
 */
export function checkHandoff(
  registry: ContextRegistry,
  from: string,
  to: string,
  type: string
): HandoffDecision {
  if (registry.isCoordinator(from)) {
    return { allowed: true, reason: 'coordinator-sender' };
  }

  if (to === BROADCAST) {
    const targets = registry.ids().filter((id) => id !== from && !registry.isCoordinator(id));
    const common = targets.reduce<readonly string[] | null>((acc, target) => {
      const types = registry.allowedTypes(from, target);
      return acc === null ? types : acc.filter((t) => types.includes(t));
    }, null);
    if (common === null || common.includes(type)) {
      return { allowed: true, reason: 'rule' };
    }
    return { allowed: false, allowedTypes: common };
  }

  if (registry.isCoordinator(to)) {
    return { allowed: true, reason: 'coordinator-recipient' };
  }

  const allowedTypes = registry.allowedTypes(from, to);
  if (allowedTypes.includes(type)) {
    return { allowed: true, reason: 'rule' };
  }
  return { allowed: false, allowedTypes };
}
