import { Command, CommanderError } from "commander";
import { ConfigError } from "@share-seeder/core/errors";

export type SeedArgs = {
  plan: string;
  groups?: string;
  root?: string;
  config?: string;
  batchSize?: number;
  maxWorkers?: number;
  cap?: number;
  manifest?: string;
};

export type ParsedCommand = { help: true } | { help: false; args: SeedArgs };

export interface ParseSeedArgsOptions {
  /** Where help text goes (default: stdout) */
  writeOut?: (text: string) => void;
}

function integerOption(flag: string) {
  return (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value) {
      throw new ConfigError(`--${flag} must be a non-negative integer`, {
        flag,
        value,
      });
    }
    return parsed;
  };
}

export function createSeedProgram(options: ParseSeedArgsOptions = {}): Command {
  return new Command()
    .name("share-seeder")
    .description("Seed a file share from a work plan")
    .requiredOption("--plan <file>", "work plan (JSON array or JSON lines)")
    .option("--groups <file>", "directory groups file ({ domain?, groups })")
    .option("--root <dir>", "root directory holding config.json")
    .option("--config <file>", "config file (default: <root>/config.json)")
    .option("--batch-size <n>", "items per batch", integerOption("batch-size"))
    .option("--max-workers <n>", "concurrent batches", integerOption("max-workers"))
    .option("--cap <n>", "stop submitting once n files were created", integerOption("cap"))
    .option("--manifest <file>", "write the ownership manifest as JSON")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: options.writeOut ?? ((text) => process.stdout.write(text)),
      // errors surface as ConfigError; the entry point prints them
      outputError: () => undefined,
    });
}

/** Parse command line flags (without the node and script entries). Throws ConfigError. */
export function parseSeedArgs(
  argv: string[],
  options: ParseSeedArgsOptions = {},
): ParsedCommand {
  const program = createSeedProgram(options);
  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed") return { help: true };
      throw new ConfigError(err.message.replace(/^error: /, ""), {
        code: err.code,
      });
    }
    throw err;
  }

  const opts = program.opts<SeedArgs>();
  return {
    help: false,
    args: {
      plan: opts.plan,
      groups: opts.groups,
      root: opts.root,
      config: opts.config,
      batchSize: opts.batchSize,
      maxWorkers: opts.maxWorkers,
      cap: opts.cap,
      manifest: opts.manifest,
    },
  };
}
