/**
 * Cache Example
 *
 * The first open reads the type data and writes the cache; the second open loads
 * from the cache. A cache from another version is rejected and rebuilt.
 */

import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { RegistryCache, openRegistry, metrics } from "@typereg/sdk";

async function main() {
  const cacheDir = "./examples-data/cache";
  await rm(cacheDir, { recursive: true, force: true });
  await mkdir(cacheDir, { recursive: true });
  const cachePath = join(cacheDir, "types.cache");

  const first = await openRegistry({ cachePath });
  console.log(`First open: ${await first.count()} types from ${first.source}`);

  const second = await openRegistry({ cachePath });
  console.log(`Second open: ${await second.count()} types from ${second.source}`);

  const inspection = await new RegistryCache(cachePath).inspect();
  if (inspection.ok) {
    console.log(`Cache holds ${inspection.types.length} records (version ${inspection.version})`);
  }

  // Lazy registries populate on first use
  const lazy = await openRegistry({ cachePath, lazyLoad: true });
  console.log(`Lazy registry populated before use: ${lazy.populated}`);
  await lazy.lookup("application/json");
  console.log(`Lazy registry populated after use: ${lazy.populated}`);

  const snapshot = metrics.snapshot();
  console.log(`\n📊 Cache hits=${snapshot.cacheHits} misses=${snapshot.cacheMisses} saves=${snapshot.cacheSaves}`);
  console.log(`   Hit rate: ${(metrics.getHitRate() * 100).toFixed(0)}%`);

  await rm(cacheDir, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
