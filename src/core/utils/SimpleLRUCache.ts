interface CacheSlot<V> {
  value: V;
  expiresAt: number;
}

/**
 * Cache LRU (Least Recently Used) avec durée de vie optionnelle par entrée.
 * LRU cache with optional per-entry time-to-live.
 *
 * @template K Type des clés.
 * @template V Type des valeurs.
 */
export class SimpleLRUCache<K, V> {
  private cache = new Map<K, CacheSlot<V>>();

  /**
   * @param maxEntries Nombre maximal d'entrées conservées.
   * @param ttlMs Durée de vie d'une entrée (Infinity = pas d'expiration).
   * @param onEvict Callback appelé lorsqu'une entrée est évincée pour capacité.
   * @param now Horloge (injectable pour les tests).
   */
  constructor(
    private readonly maxEntries: number,
    private readonly ttlMs: number = Infinity,
    private readonly onEvict?: (key: K, value: V) => void,
    private readonly now: () => number = () => Date.now(),
  ) {}

  /**
   * Retourne la valeur si présente et non expirée ; l'entrée devient la plus récente.
   * Une entrée expirée est supprimée.
   */
  public get(key: K): V | undefined {
    const slot = this.cache.get(key);
    if (slot === undefined) {
      return undefined;
    }
    this.cache.delete(key);
    if (slot.expiresAt <= this.now()) {
      return undefined;
    }
    this.cache.set(key, slot);
    return slot.value;
  }

  public set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }
    this.cache.set(key, { value, expiresAt: this.now() + this.ttlMs });

    if (this.cache.size > this.maxEntries) {
      // La plus ancienne entrée est la première clé de la Map
      const oldest = this.cache.entries().next();
      if (!oldest.done) {
        const [oldestKey, oldestSlot] = oldest.value;
        this.cache.delete(oldestKey);
        this.onEvict?.(oldestKey, oldestSlot.value);
      }
    }
  }

  public delete(key: K): void {
    this.cache.delete(key);
  }

  public clear(): void {
    this.cache.clear();
  }

  /** Nombre d'entrées stockées (expirées comprises tant qu'elles n'ont pas été lues). */
  public get size(): number {
    return this.cache.size;
  }
}
