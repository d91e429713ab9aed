import { log } from './log';
import type { DependencyStanza } from './types';

/**
 * Manual stanzas first, in their own order, then discovered stanzas whose
 * name no earlier stanza has used. Names compare exactly (case-sensitive);
 * a manual stanza replaces a discovered one of the same name wholesale.
 */
export function mergeStanzas(manual: DependencyStanza[], discovered: DependencyStanza[]): DependencyStanza[] {
  const merged: DependencyStanza[] = [];
  const byName = new Map<string, DependencyStanza>();

  for (const stanza of [...manual, ...discovered]) {
    const existing = byName.get(stanza.name);
    if (existing) {
      if (existing.origin === 'manual' && stanza.origin !== 'manual') {
        log.debug(`'${stanza.name}' from ${stanza.source} overridden by '${existing.source}'.`);
      } else {
        log.debug(`Duplicate '${stanza.name}' from ${stanza.source} dropped; keeping the one from ${existing.source}.`);
      }
      continue;
    }
    byName.set(stanza.name, stanza);
    merged.push(stanza);
  }

  return merged;
}
