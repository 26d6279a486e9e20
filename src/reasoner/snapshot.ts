import { LoadError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { FactStore } from './factStore.js';
import { loadFactStore, type FactSource } from './knowledge.js';

const log = createLogger('knowledge');

/**
 * The one swap point for the loaded store. Readers take `snapshot()` once per
 * query and keep that reference, so a concurrent reload is never seen half-way.
 */
export class KnowledgeHandle {
  private current: FactStore;

  constructor(store: FactStore, private readonly source: FactSource | null = null) {
    this.current = store;
  }

  static load(source: FactSource): KnowledgeHandle {
    const store = loadFactStore(source);
    log.info(`loaded ${store.size} facts v${store.metadata.version} (${store.metadata.fingerprint}) from ${store.metadata.origin}`);
    return new KnowledgeHandle(store, source);
  }

  snapshot(): FactStore {
    return this.current;
  }

  /**
   * Builds a complete new store and swaps it in. If loading fails the previous
   * snapshot stays in place and the LoadError propagates.
   */
  reload(source: FactSource | null = this.source): FactStore {
    if (!source) throw new LoadError('No fact source configured for reload');
    const previous = this.current.metadata;
    const next = loadFactStore(source);
    this.current = next;
    log.info(`reloaded ${previous.version} (${previous.fingerprint}) -> ${next.metadata.version} (${next.metadata.fingerprint})`);
    return next;
  }
}
