import { ZodError } from "zod";
import { parseArgs, ParsedArgs } from "./tools/args.js";
import { showHelp } from "./tools/help.js";
import { Oc } from "./tools/oc.js";
import { Issue, logError, logInfo, logWarn } from "./tools/log.js";
import { InputClosedError } from "./tools/prompt.js";
import { LifecycleOptions } from "./steps/confirm.js";
import {
  ApproveUpgradeInputSchema,
  CaptureInputSchema,
  CleanupInputSchema,
  HardwareProfilesInputSchema,
  InstallInputSchema,
  PrepareUpgradeInputSchema,
  StatusInputSchema,
} from "./schema.js";
import { runInstall } from "./install.js";
import { runApproveUpgrade, runPrepareUpgrade } from "./prepare.js";
import { runCleanup } from "./cleanup.js";
import { runCapture } from "./capture.js";
import { runHardwareProfiles } from "./hardware-profiles.js";
import { formatStatusOutput, runStatus } from "./status.js";

export type CliDeps = LifecycleOptions & {
  oc: Oc;
  env: Record<string, string | undefined>;
};

function reportBlockers(blockers: Issue[]): number {
  for (const b of blockers) logError(b.message);
  const remediation = blockers.flatMap((b) => b.remediation ?? []);
  if (remediation.length > 0) {
    console.error("");
    console.error("Remediation:");
    remediation.forEach((r) => console.error(`  ${r}`));
  }
  return 1;
}

function reportWarnings(warnings: Issue[]): void {
  if (warnings.length === 0) return;
  console.error("");
  logWarn(`Completed with ${warnings.length} warning(s):`);
  for (const w of warnings) logWarn(`  ${w.code}: ${w.message}`);
}

/** Positional arguments each command takes after its name. */
const POSITIONALS: Record<string, number> = { install: 1 };

function camelCase(flag: string): string {
  return flag.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

function kebabCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * Flags keyed the way the schemas name their fields (`--output-dir` is `outputDir`).
 * Every flag is passed on, so a schema rejects the ones its command does not take.
 */
function flagInput(flags: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(flags).map(([k, v]) => [camelCase(k), v]));
}

/** Runs one command. Status and cancellation map to exit codes here. */
async function executeCommand(command: string, parsed: ParsedArgs, deps: CliDeps): Promise<number> {
  const { positionals } = parsed;
  const flags = flagInput(parsed.flags);
  const { oc } = deps;

  const extra = positionals.slice(POSITIONALS[command] ?? 0);
  if (extra.length > 0) {
    logError(`Unexpected argument(s) for ${command}: ${extra.join(" ")}`);
    console.error("Run 'rhoai help <command>' for usage.");
    return 1;
  }
  const opts: LifecycleOptions = { ask: deps.ask, pollIntervalSeconds: deps.pollIntervalSeconds };

  switch (command) {
    case "install": {
      const input = InstallInputSchema.parse({
        ...flags,
        catalogImage: positionals[0] || flags.catalogImage || deps.env.RHOAI_CATALOG_IMAGE || undefined,
      });
      const result = await runInstall(input, oc, opts);
      if (result.status === "error") return reportBlockers(result.blockers);
      reportWarnings(result.warnings);
      return 0;
    }

    case "prepare-upgrade": {
      const input = PrepareUpgradeInputSchema.parse(flags);
      const result = await runPrepareUpgrade(input, oc, opts);
      if (result.status === "error") return reportBlockers(result.blockers);
      reportWarnings(result.warnings);
      if (result.approvalCommand) {
        console.error("");
        logWarn("NEXT STEPS - Manual Approval Required");
        console.error("");
        console.log(result.approvalCommand);
        console.error("");
        logInfo("Or run: rhoai approve-upgrade");
      }
      return 0;
    }

    case "approve-upgrade": {
      const input = ApproveUpgradeInputSchema.parse(flags);
      const result = await runApproveUpgrade(input, oc, opts);
      if (result.status === "error") return reportBlockers(result.blockers);
      reportWarnings(result.warnings);
      return 0;
    }

    case "cleanup": {
      const input = CleanupInputSchema.parse(flags);
      const result = await runCleanup(input, oc, opts);
      if (result.status === "error") return reportBlockers(result.blockers);
      reportWarnings(result.warnings);
      return 0;
    }

    case "capture": {
      const input = CaptureInputSchema.parse(flags);
      const result = await runCapture(input, oc, opts);
      if (result.status === "error") return reportBlockers(result.blockers);
      reportWarnings(result.warnings);
      return 0;
    }

    case "hardware-profiles": {
      const input = HardwareProfilesInputSchema.parse(flags);
      const result = await runHardwareProfiles(input, oc);
      if (!result.ok) return reportBlockers(result.blockers);
      reportWarnings(result.warnings);
      logInfo(result.dryRun ? "Dry run complete, no changes made" : "Configuration complete!");
      return 0;
    }

    case "status": {
      const input = StatusInputSchema.parse(flags);
      const result = await runStatus(oc);
      if (!result.ok) return reportBlockers(result.blockers);
      if (input.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        formatStatusOutput(result).forEach((line) => console.log(line));
      }
      return 0;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'rhoai help' for available commands");
      return 1;
  }
}

function reportConfigError(err: ZodError): void {
  console.error("");
  logError("Configuration Error:");
  for (const issue of err.issues) {
    if (issue.code === "unrecognized_keys") {
      console.error(`   - Unknown option(s): ${issue.keys.map((k) => `--${kebabCase(k)}`).join(", ")}`);
      continue;
    }
    const path = issue.path.join(".");
    console.error(path ? `   - ${path}: ${issue.message}` : `   - ${issue.message}`);
  }
  console.error("");
  console.error("Run 'rhoai help <command>' for usage.");
}

/**
 * CLI entrypoint minus the process wiring. Returns the exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const parsed = parseArgs(argv);
  const command = parsed.command;

  if (!command || command === "help" || parsed.flags["help"] === "true") {
    const topic = command === "help" ? parsed.positionals[0] : command;
    return showHelp(topic) ? 0 : 1;
  }

  try {
    return await executeCommand(command, parsed, deps);
  } catch (err) {
    if (err instanceof ZodError) {
      reportConfigError(err);
      return 1;
    }
    if (err instanceof InputClosedError) {
      logError(err.message);
      return 1;
    }
    throw err;
  }
}
