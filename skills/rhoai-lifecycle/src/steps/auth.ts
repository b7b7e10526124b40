import { Oc } from "../tools/oc.js";
import { Issue } from "../tools/log.js";

export type SessionResult =
  | { ok: true; user: string; server: string }
  | { ok: false; blockers: Issue[] };

/**
 * Validates that the OpenShift client is installed and logged in.
 * Every command runs this first; nothing against the cluster can proceed without a session.
 */
export async function validateClusterSession(oc: Oc): Promise<SessionResult> {
  const client = await oc(["version", "--client"]);
  if (!client.ok) {
    return {
      ok: false,
      blockers: [
        {
          code: "OC_NOT_FOUND",
          message: "oc command not found. Please install the OpenShift CLI.",
          remediation: [
            "Download the client from your cluster's web console (? > Command line tools)",
            "or set OC_BIN to the path of an existing oc binary.",
          ],
        },
      ],
    };
  }

  const whoami = await oc(["whoami"]);
  if (!whoami.ok) {
    return {
      ok: false,
      blockers: [
        {
          code: "UNAUTHENTICATED",
          message: "Not logged in to OpenShift cluster. Please run 'oc login' first.",
          remediation: [
            "oc login --server=<api-url> --token=<token>",
            "Copy a login command from the web console (user menu > Copy login command).",
          ],
        },
      ],
    };
  }

  const server = await oc(["whoami", "--show-server"]);
  return {
    ok: true,
    user: whoami.stdout,
    server: server.ok ? server.stdout : "unknown",
  };
}
