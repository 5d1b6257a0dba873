import type { PricingContext } from '../types.js';

export interface ContextStore {
  /** The context callers should use for new work. */
  current(): PricingContext;
  /**
   * Build a fresh context and swap it in. Readers holding the previous
   * context keep using it unchanged. On failure the current context stays.
   */
  reload(): Promise<PricingContext>;
}

/**
 * Holds the active pricing context and replaces it wholesale on reload.
 *
 * @example
 * ```ts
 * const store = await createContextStore(() => loadPricingContext('./config'));
 * const premium = priceQuote(quote, store.current());
 * await store.reload();
 * ```
 */
export async function createContextStore(load: () => Promise<PricingContext>): Promise<ContextStore> {
  let active = await load();
  let pending: Promise<PricingContext> | null = null;

  return {
    current: () => active,

    reload() {
      // Concurrent reloads share one load
      if (!pending) {
        pending = load()
          .then((next) => {
            active = next;
            return next;
          })
          .finally(() => {
            pending = null;
          });
      }
      return pending;
    },
  };
}
