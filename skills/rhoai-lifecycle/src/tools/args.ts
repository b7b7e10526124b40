export type ParsedArgs = {
  command?: string;
  positionals: string[];
  flags: Record<string, string>;
};

const SHORT_FLAGS: Record<string, string> = {
  "-n": "namespace",
  "-h": "help",
  "-y": "yes",
};

/** Flags that never take a separate value, so `--yes IMAGE` keeps IMAGE positional. */
const BOOLEAN_FLAGS = new Set(["dry-run", "yes", "json", "help"]);

/**
 * Parse command line arguments: `--key value`, `--key=value`, `-n value`,
 * boolean flags (recorded as "true") and positionals. The first positional
 * is the command.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];

    let key: string | undefined;
    if (a.startsWith("--")) {
      key = a.slice(2);
    } else if (SHORT_FLAGS[a]) {
      key = SHORT_FLAGS[a];
    }

    if (key === undefined) {
      positionals.push(a);
      continue;
    }

    const eq = key.indexOf("=");
    if (eq !== -1) {
      flags[key.slice(0, eq)] = key.slice(eq + 1);
      continue;
    }

    if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = "true";
      continue;
    }

    // A value flag with nothing after it is kept as "" and rejected by the schema.
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("-")) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = "";
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}
