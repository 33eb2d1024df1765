#!/usr/bin/env -S npx tsx
/**
 * runledger CLI: schema maintenance and a quick look at a tracking store.
 *
 * Commands: db upgrade, db version, experiments
 */
import { existsSync, readFileSync } from "node:fs";
import { dbCmd } from "./commands/db.js";
import { experimentsCmd } from "./commands/experiments.js";

// Load .env.local when present
if (existsSync(".env.local")) {
  for (const line of readFileSync(".env.local", "utf8").split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}

const USAGE = `
runledger: experiment tracking store

Commands:
  db upgrade <url>   Apply pending schema migrations
  db version <url>   Show live and expected schema versions
  experiments        List experiments

Options:
  --url=<url>        Database URL (default: $RUNLEDGER_DATABASE_URL)
  --view=<view>      ACTIVE_ONLY (default), DELETED_ONLY or ALL
  --help, -h         Show this help

Examples:
  runledger db upgrade file:./runledger.db
  runledger db version libsql://tracking.example.com
  runledger experiments --url=file:./runledger.db --view=ALL
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "db") {
    await dbCmd(args.slice(1));
  } else if (command === "experiments") {
    await experimentsCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
