export const GREEN = "\x1b[0;32m";
export const YELLOW = "\x1b[1;33m";
export const RED = "\x1b[0;31m";
export const NC = "\x1b[0m";

export type Issue = {
  code: string;
  message: string;
  /** Steps the operator can take to clear a blocker. */
  remediation?: string[];
};

export function logInfo(message: string): void {
  console.error(`${GREEN}[INFO]${NC} ${message}`);
}

export function logWarn(message: string): void {
  console.error(`${YELLOW}[WARN]${NC} ${message}`);
}

export function logError(message: string): void {
  console.error(`${RED}[ERROR]${NC} ${message}`);
}

/**
 * Prints a section header framed by `=====` rules, at the given level.
 * Extra lines are printed inside the frame.
 */
export function banner(title: string, lines: string[] = [], level: "info" | "warn" = "info"): void {
  const log = level === "warn" ? logWarn : logInfo;
  const rule = "=".repeat(41);
  log(rule);
  log(title);
  if (lines.length > 0) {
    log(rule);
    lines.forEach((l) => log(l));
  }
  log(rule);
}
