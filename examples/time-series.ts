/**
 * Example: Fetch the red and nir time series of a MODIS coverage.
 *
 * Prerequisites:
 *   - Set WTSS_HOST to point at another server (defaults to the public INPE service)
 *
 * Run:
 *   npx tsx examples/time-series.ts
 */

import { WtssClient } from "../src/index.js";

async function main() {
  const client = new WtssClient(undefined, { timeoutMs: 30000 });

  console.log(`Fetching red,nir from mod13q1_512 at (-12, -54)`);

  const doc = await client.timeSeries(
    "mod13q1_512",
    ["red", "nir"],
    -12.0,
    -54.0,
    "2000-02-18",
    "2001-12-19"
  );

  const records = WtssClient.toRecords(doc, "%Y-%m-%d");

  console.log("Response:");
  for (const record of records.slice(0, 10)) {
    const date = record.time.toISOString().split("T")[0];
    console.log(`  ${date}  red=${record.values.red}  nir=${record.values.nir}`);
  }
  console.log(`  ... ${records.length} dates in total`);
}

main().catch((err) => {
  console.error("Error:", err.message);
  process.exit(1);
});
