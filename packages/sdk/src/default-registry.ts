/**
 * The default registry: populated once, from the cache when possible
 *
 * Population order:
 * 1. Load the cache file (when a cache is configured)
 * 2. Otherwise load the type data and immediately save the cache
 *
 * Invariants:
 * - `ensurePopulated()` is idempotent; concurrent callers share one in-flight population
 * - A failed population leaves the registry unpopulated and rethrows
 * - A failed cache save is logged and never fails population
 */

import { RegistryCache } from "./cache.js";
import type { RegistryConfig } from "./config.js";
import { Loader } from "./loader.js";
import { MimeType } from "./mime-type.js";
import type { AddOptions, LookupOptions, MimeTypes } from "./registry.js";
import { ValuePool } from "./value-pool.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

export interface DefaultRegistryOptions {
  /** Cache file path; without it (or `cache`) the cache is not used */
  cachePath?: string;
  /** Data file or directory for the default Loader */
  dataPath?: string;
  loader?: Loader;
  cache?: RegistryCache;
  pool?: ValuePool;
}

export type PopulationSource = "cache" | "loader";

type State =
  | { status: "unpopulated" }
  | { status: "populating"; promise: Promise<MimeTypes> }
  | { status: "populated"; registry: MimeTypes; source: PopulationSource };

export class DefaultRegistry {
  #loader: Loader;
  #cache: RegistryCache | undefined;
  #pool: ValuePool;
  #state: State = { status: "unpopulated" };

  constructor(options: DefaultRegistryOptions = {}) {
    this.#loader = options.loader ?? new Loader(options.dataPath);
    this.#cache = options.cache ?? (options.cachePath ? new RegistryCache(options.cachePath) : undefined);
    this.#pool = options.pool ?? new ValuePool();
  }

  get populated(): boolean {
    return this.#state.status === "populated";
  }

  /**
   * Where the populated registry came from, undefined until populated
   */
  get source(): PopulationSource | undefined {
    return this.#state.status === "populated" ? this.#state.source : undefined;
  }

  get cache(): RegistryCache | undefined {
    return this.#cache;
  }

  /**
   * Populate on first call; later calls return the same registry
   */
  ensurePopulated(): Promise<MimeTypes> {
    switch (this.#state.status) {
      case "populated":
        return Promise.resolve(this.#state.registry);
      case "populating":
        return this.#state.promise;
      case "unpopulated": {
        const promise = this.#populate().catch((err: unknown) => {
          this.#state = { status: "unpopulated" };
          throw err;
        });
        this.#state = { status: "populating", promise };
        return promise;
      }
    }
  }

  async lookup(id: MimeType | RegExp | string, options: LookupOptions = {}): Promise<MimeType[]> {
    const registry = await this.ensurePopulated();
    return registry.lookup(id, options);
  }

  async typeFor(filenames: string | readonly string[]): Promise<MimeType[]> {
    const registry = await this.ensurePopulated();
    return registry.typeFor(filenames);
  }

  /**
   * Add descriptors to the populated registry (not persisted to the cache)
   */
  async add(types: MimeType | Iterable<MimeType>, options: AddOptions = {}): Promise<void> {
    const registry = await this.ensurePopulated();
    if (types instanceof MimeType) {
      registry.addType(types, options);
    } else {
      registry.addTypes(types, options);
    }
  }

  async count(): Promise<number> {
    const registry = await this.ensurePopulated();
    return registry.count;
  }

  async all(): Promise<MimeType[]> {
    const registry = await this.ensurePopulated();
    return [...registry];
  }

  async #populate(): Promise<MimeTypes> {
    const start = performance.now();
    logger.debug("registry.populate.start", { type: this.#cache?.path ?? this.#loader.path });

    let source: PopulationSource = "cache";
    let registry = this.#cache ? await this.#cache.load({ pool: this.#pool }) : undefined;

    if (!registry) {
      source = "loader";
      registry = await this.#loader.load({ pool: this.#pool });
      if (this.#cache) {
        await this.#saveCache(this.#cache, registry);
      }
    }

    this.#state = { status: "populated", registry, source };

    const duration = performance.now() - start;
    metrics.recordPopulateTime(duration);
    logger.debug("registry.populate.end", {
      details: { source, variants: registry.count, durationMs: duration.toFixed(2) },
    });

    return registry;
  }

  async #saveCache(cache: RegistryCache, registry: MimeTypes): Promise<void> {
    try {
      await cache.save(registry);
    } catch (err) {
      logger.warn("cache.save.error", {
        type: cache.path,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Create the default registry; populate it now unless lazy loading is configured
 */
export async function openRegistry(
  config: Partial<RegistryConfig> & Omit<DefaultRegistryOptions, "cachePath" | "dataPath"> = {}
): Promise<DefaultRegistry> {
  const registry = new DefaultRegistry(config);
  if (!config.lazyLoad) {
    await registry.ensurePopulated();
  }
  return registry;
}
