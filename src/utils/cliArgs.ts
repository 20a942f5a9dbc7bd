/**
 * Argument parsing for scripts/run-extraction.ts
 */

export interface CliArgs {
  mode: "full" | "incremental";
  limit: number | null;
  afterId: number | null;
  lastOrderId: number | null;
}

function parseInteger(flag: string, value: string | undefined, min: number): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${flag} expects an integer >= ${min}, got "${value ?? ""}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const [mode, ...rest] = argv;
  if (mode !== "full" && mode !== "incremental") {
    throw new Error('Mode must be "full" or "incremental"');
  }

  const args: CliArgs = { mode, limit: null, afterId: null, lastOrderId: null };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const value: string | undefined =
      separator === -1 ? rest[++i] : arg.slice(separator + 1);

    switch (flag) {
      case "--limit":
        // Same bound as the HTTP query schema
        args.limit = parseInteger(flag, value, 1);
        break;
      case "--after-id":
        args.afterId = parseInteger(flag, value, 0);
        break;
      case "--last-order-id":
        args.lastOrderId = parseInteger(flag, value, 0);
        break;
      default:
        throw new Error(`Unknown option: ${flag}`);
    }
  }

  return args;
}
