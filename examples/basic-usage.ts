/**
 * Basic Usage Example
 *
 * Looks up content types by name, pattern and file name against the bundled data,
 * then registers a custom type.
 */

import { MimeType, openRegistry } from "@typereg/sdk";

async function main() {
  console.log("📂 Opening registry...");
  const registry = await openRegistry();
  console.log(`✅ Loaded ${await registry.count()} types`);

  // Lookup by name is case-insensitive
  console.log("\n🔎 Looking up text/plain...");
  for (const type of await registry.lookup("TEXT/PLAIN")) {
    console.log(`  ${type} [${type.extensions.join(", ")}] encoding=${type.encoding}`);
  }

  // Patterns return every matching variant, most reliable first
  console.log("\n🔎 Registered types matching /javascript/...");
  const scripts = await registry.lookup(/javascript/, { registered: true });
  console.log(`  ${scripts.map(String).join(", ")}`);

  // File names resolve by extension
  console.log("\n📄 Types for files...");
  for (const file of ["photo.JPG", "config.yaml", "README"]) {
    const types = await registry.typeFor(file);
    console.log(`  ${file}: ${types.length > 0 ? types.map(String).join(", ") : "(unknown)"}`);
  }

  // Custom types join the indexes immediately
  console.log("\n✏️  Adding font/x-demo...");
  await registry.add(new MimeType("font/x-demo", { extensions: ["demo"] }));
  console.log(`  a.demo: ${(await registry.typeFor("a.demo")).map(String).join(", ")}`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
