import { execCmd, ExecOptions, COMMAND_NOT_FOUND } from "./exec.js";

export type ShellResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export async function run(cmd: string, args: string[], opts?: ExecOptions): Promise<ShellResult> {
  const result = await execCmd(cmd, args, opts);
  return {
    ok: result.code === 0,
    exitCode: result.code,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

/**
 * True when the API server reported the requested object or kind does not exist.
 * A client that could not run at all is never "not found".
 */
export function isNotFound(result: ShellResult): boolean {
  if (result.exitCode === COMMAND_NOT_FOUND) return false;
  return result.stderr.includes("(NotFound)") || result.stderr.includes("the server doesn't have a resource type");
}
