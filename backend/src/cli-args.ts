export interface CliArgs {
  serve: boolean;
  day: string | null;
}

/**
 * `--serve` starts the API; `--date=YYYY-MM-DD` (or `--date YYYY-MM-DD`, `today`, `tomorrow`)
 * overrides `schedule.day`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {serve: false, day: null};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (arg === "--serve") {
      args.serve = true;
    } else if (arg.startsWith("--date=")) {
      args.day = arg.slice("--date=".length);
    } else if (arg === "--date") {
      const value = argv[index + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("--date expects a value");
      }
      args.day = value;
      index += 1;
    } else {
      throw new Error(`Unknown argument '${arg}'`);
    }
  }
  return args;
}
