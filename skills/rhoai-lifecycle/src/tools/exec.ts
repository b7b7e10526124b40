import { spawn } from "node:child_process";

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  /** Written to the child's stdin, which is then closed (e.g. for `oc apply -f -`). */
  input?: string;
};

/** Exit code reported when the binary itself could not be started. */
export const COMMAND_NOT_FOUND = 127;

const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;
const TIMEOUT_MARGIN_MS = 60 * 1000;

/**
 * Reads a `--timeout=300s` / `--timeout 5m` flag from the argument list.
 * Returns milliseconds, or undefined when the command carries no timeout of its own.
 */
export function parseTimeoutFlag(args: string[]): number | undefined {
  let raw: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith("--timeout=")) {
      raw = a.slice("--timeout=".length);
    } else if (a === "--timeout" && i + 1 < args.length) {
      raw = args[i + 1];
    }
  }
  if (!raw) return undefined;

  const m = raw.match(/^(\d+)(ms|s|m|h)?$/);
  if (!m) return undefined;
  const value = Number(m[1]);
  switch (m[2]) {
    case "ms":
      return value;
    case "m":
      return value * 60 * 1000;
    case "h":
      return value * 60 * 60 * 1000;
    default:
      return value * 1000;
  }
}

const SPINNER_FRAMES = ["|", "/", "-", "\\"];

/** Redraws `label` with a turning bar on stderr until the returned function is called. */
function spin(label: string): () => void {
  const text = label.length > 58 ? `${label.slice(0, 56)}..` : label;
  let frame = 0;
  const interval = setInterval(() => {
    process.stderr.write(`\r${text} ${SPINNER_FRAMES[frame]}`);
    frame = (frame + 1) % SPINNER_FRAMES.length;
  }, 100);
  return () => {
    clearInterval(interval);
    process.stderr.write(`\r${" ".repeat(text.length + 2)}\r`);
  };
}

export function execCmd(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      stdio: [opts?.input !== undefined ? "pipe" : "ignore", "pipe", "pipe"],
    });

    // Commands that wait server-side (oc wait, rollout status, namespace deletion)
    // carry their own --timeout; give them that long plus a margin before we kill them.
    const ownTimeoutMs = parseTimeoutFlag(args);
    const isLongRunningCommand = ownTimeoutMs !== undefined;
    const timeoutMs = isLongRunningCommand ? ownTimeoutMs + TIMEOUT_MARGIN_MS : DEFAULT_TIMEOUT_MS;
    const killTimeout = setTimeout(() => {
      if (child.kill()) {
        console.error(`\n❌ Command timed out after ${timeoutMs / 1000}s and was killed: ${cmd} ${args.join(" ")}`);
      }
    }, timeoutMs);

    let stdout = "";
    let stderr = "";

    const isTTY = typeof process.stderr.isTTY === "boolean" && process.stderr.isTTY;
    const stopSpinner =
      !isLongRunningCommand && isTTY
        ? spin(`${cmd} ${args.slice(0, 2).join(" ")}${args.length > 2 ? "..." : ""}`)
        : undefined;

    let timer: NodeJS.Timeout | undefined;
    let lastElapsedStr = "";

    if (isLongRunningCommand && isTTY) {
      const startTime = Date.now();
      timer = setInterval(() => {
        const elapsed = Math.floor((Date.now() - startTime) / 1000);
        lastElapsedStr = `   ⏳ ${cmd} ${args[0] ?? ""}... [${Math.floor(elapsed / 60)}m ${elapsed % 60}s elapsed]`;
        process.stderr.write(`\r${lastElapsedStr}${" ".repeat(10)}\r`);
      }, 1000);
    }

    const finish = () => {
      clearTimeout(killTimeout);
      stopSpinner?.();
      if (timer) {
        clearInterval(timer);
        if (lastElapsedStr) {
          process.stderr.write(`\r${" ".repeat(lastElapsedStr.length + 15)}\r`);
        }
      }
    };

    child.stdout?.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr?.on("data", (d: Buffer) => (stderr += d.toString()));

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish();
      if (err.code === "ENOENT") {
        resolve({
          code: COMMAND_NOT_FOUND,
          stdout: "",
          stderr: `Command not found: ${cmd}. Install it and make sure it is on your PATH.`,
        });
      } else {
        reject(err);
      }
    });

    child.on("close", (code) => {
      finish();
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });

    if (opts?.input !== undefined && child.stdin) {
      // EPIPE here means the child exited before reading; its exit code reports the failure.
      child.stdin.on("error", (err) => (stderr += `stdin: ${err.message}\n`));
      child.stdin.end(opts.input);
    }
  });
}
