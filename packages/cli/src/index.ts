#!/usr/bin/env tsx
import { ConfigError, PlanError } from "@share-seeder/core/errors";
import { parseSeedArgs } from "./args.js";
import { runSeedCommand } from "./run.js";

async function main(): Promise<void> {
  const command = parseSeedArgs(process.argv.slice(2));
  if (command.help) return;
  await runSeedCommand(command.args);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError || err instanceof PlanError) {
    console.error(`share-seeder: ${err.message}`);
    if (err instanceof ConfigError) {
      console.error('Run "share-seeder --help" for usage.');
    }
  } else {
    console.error("share-seeder failed:", err);
  }
  process.exitCode = 1;
});
