import { Ask, confirm, prompt } from "../tools/prompt.js";
import { banner, logInfo } from "../tools/log.js";
import { SessionResult } from "./auth.js";

/** Per-run knobs shared by the lifecycle commands. Tests shorten the polling. */
export type LifecycleOptions = {
  ask?: Ask;
  pollIntervalSeconds?: number;
};

export function askFrom(opts: LifecycleOptions): Ask {
  return opts.ask ?? prompt;
}

export type Plan = {
  title: string;
  /** What will be created, changed or removed; one line each. */
  lines: string[];
  question: string;
  proceedMessage: string;
  cancelMessage: string;
};

/**
 * Shows the plan with the target cluster and user appended, then asks for
 * confirmation unless `approved` was given on the command line.
 */
export async function confirmPlan(
  ask: Ask,
  plan: Plan,
  session: Extract<SessionResult, { ok: true }>,
  approved: boolean
): Promise<boolean> {
  console.error("");
  banner(plan.title, [...plan.lines, "", `Cluster: ${session.server}`, `User: ${session.user}`], "warn");
  console.error("");

  if (approved) {
    logInfo(`${plan.proceedMessage} (--yes)`);
    return true;
  }

  const ok = await confirm(ask, plan.question);
  logInfo(ok ? plan.proceedMessage : plan.cancelMessage);
  return ok;
}
