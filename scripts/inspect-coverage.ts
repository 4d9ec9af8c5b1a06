/**
 * Simple script to list coverages or inspect one of them.
 *
 * Usage:
 *   npx tsx scripts/inspect-coverage.ts
 *   npx tsx scripts/inspect-coverage.ts <coverage>
 *
 * The server defaults to WTSS_HOST, or the public INPE service when unset.
 *
 * Examples:
 *   npx tsx scripts/inspect-coverage.ts
 *   WTSS_HOST=http://localhost:7654 npx tsx scripts/inspect-coverage.ts mod13q1_512
 */

import { WtssClient } from "../src/index.js";

async function main() {
  const [coverage] = process.argv.slice(2);
  const client = new WtssClient();

  console.log(`Server: ${client.host}\n`);

  if (!coverage) {
    const { coverages } = await client.listCoverages();
    console.log(`=== Coverages (${coverages.length}) ===`);
    for (const name of coverages) {
      console.log(`  ${name}`);
    }
    return;
  }

  const description = await client.describeCoverage(coverage);

  console.log(`=== ${coverage} ===`);
  for (const [key, value] of Object.entries(description)) {
    const rendered = typeof value === "object" ? JSON.stringify(value) : String(value);
    const preview = rendered.length > 120 ? `${rendered.slice(0, 117)}...` : rendered;
    console.log(`  ${key}: ${preview}`);
  }

  console.log("\nDone.");
}

main().catch((err) => {
  console.error("Error inspecting coverage:", err);
  process.exit(1);
});
