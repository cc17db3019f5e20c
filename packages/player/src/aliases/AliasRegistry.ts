/**
 * AliasRegistry - named shortcuts for track references
 *
 * Keys resolve independently of any one player. A shared instance
 * (`globalAliases`) lives for the whole process; players accept their own
 * registry for isolation.
 */

import type { AliasKey, TrackReference } from '../types/player';
import { TrackConversion } from '../conversion/TypeConversion';
import { PlayerLogger } from '../utils/logger';

const logger = PlayerLogger.child('AliasRegistry');

export class AliasRegistry {
  private aliases = new Map<AliasKey, TrackReference>();

  /**
   * Register `value` under `key`; the last registration wins
   *
   * @throws TypeConversionError when `value` is not a track value
   */
  register(key: AliasKey, value: unknown): void {
    const reference = TrackConversion.toReference(value);
    const replaced = this.aliases.has(key);
    this.aliases.set(key, reference);

    logger.debug(replaced ? 'Alias replaced' : 'Alias registered', {
      alias: String(key),
      kind: reference.kind,
    });
  }

  getAlias(key: AliasKey): TrackReference | null;
  getAlias<D>(key: AliasKey, defaultValue: D): TrackReference | D;
  getAlias<D>(key: AliasKey, defaultValue?: D): TrackReference | D | null {
    const reference = this.aliases.get(key);
    if (reference !== undefined) return reference;
    return defaultValue === undefined ? null : defaultValue;
  }

  hasAlias(key: AliasKey): boolean {
    return this.aliases.has(key);
  }

  /**
   * Copy of the table; changing it leaves the registry untouched
   */
  allAliases(): Map<AliasKey, TrackReference> {
    return new Map(this.aliases);
  }

  get size(): number {
    return this.aliases.size;
  }
}

/**
 * Process-wide registry used by players that are not given one
 */
export const globalAliases = new AliasRegistry();
