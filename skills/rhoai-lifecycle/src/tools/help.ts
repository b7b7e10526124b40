/**
 * Show general help or command-specific help.
 * Returns false for an unknown command.
 */
export function showHelp(command?: string): boolean {
  if (!command) {
    showGeneralHelp();
    return true;
  }

  const helpText = getCommandHelp(command);
  if (!helpText) {
    console.error(`Unknown command: ${command}`);
    console.error("Run 'rhoai help' to see all commands");
    return false;
  }

  console.error(helpText.trim());
  return true;
}

function showGeneralHelp(): void {
  console.error("RHOAI Lifecycle CLI");
  console.error("=".repeat(60));
  console.error("");
  console.error("Usage:");
  console.error("  rhoai <command> [options]");
  console.error("");
  console.error("Commands:");
  console.error("  help [cmd]          Show help for command");
  console.error("  install [IMAGE]     Install RHOAI 2.25 and its prerequisites");
  console.error("  prepare-upgrade     Prepare a 2.25 cluster for the 3.3 upgrade");
  console.error("  approve-upgrade     Approve the pending RHOAI InstallPlan");
  console.error("  cleanup             Tear down a RHOAI 2.x or 3.x install");
  console.error("  capture             Save pre/post upgrade cluster state to YAML");
  console.error("  hardware-profiles   Add hardware-profile annotations to the KServe ignore list");
  console.error("  status              Show current RHOAI status");
  console.error("");
  console.error("Environment:");
  console.error("  OC_BIN               oc binary to run (default: oc)");
  console.error("  RHOAI_CATALOG_IMAGE  Catalog image for install when none is given");
  console.error("");
  console.error("For detailed help on a command: rhoai help <command>");
}

function getCommandHelp(command: string): string | null {
  const helpTexts: Record<string, string> = {
    install: `
rhoai install - Install RHOAI 2.25

Description:
  Creates the RHOAI CatalogSource, subscribes the Authorino, Serverless and
  Service Mesh 2 operators, installs the RHOAI operator from the stable-2.25
  channel, then creates the DSCInitialization and DataScienceCluster.
  Finishes by running hardware-profiles on redhat-ods-applications.

  The catalog image is picked from the OpenShift version (4.19, 4.20, 4.21)
  unless one is given as argument or in RHOAI_CATALOG_IMAGE.

Options:
  --yes, -y      Skip the confirmation prompt

Example:
  rhoai install
  rhoai install quay.io/example/catalog@sha256:<digest> --yes
`,
    "prepare-upgrade": `
rhoai prepare-upgrade - Prepare RHOAI 2.25 for the upgrade to 3.3

Description:
  Phase 1: sets KServe serving and Service Mesh to Removed and waits for
           the DSC and DSCI to become Ready again.
  Phase 2: uninstalls Authorino, Serverless and Service Mesh 2, installs
           Red Hat Connectivity Link.
  Phase 3: switches the RHOAI subscription to Manual approval on the
           stable-3.3 channel and prints the command that approves it.

Options:
  --yes, -y      Skip the confirmation prompt
`,
    "approve-upgrade": `
rhoai approve-upgrade - Approve the pending RHOAI upgrade

Description:
  Approves the InstallPlan referenced by the rhods-operator subscription
  and waits for the subscription to reach AtLatestKnown.

Options:
  --yes, -y      Skip the confirmation prompt
`,
    cleanup: `
rhoai cleanup - Tear down RHOAI

Description:
  Deletes workloads, the DataScienceCluster and DSCInitialization, the RHOAI
  operator, its prerequisite operators, namespaces and CRDs.
  ⚠️  This is destructive and cannot be undone.

Options:
  --version <2.x|3.x>   Version to clean up (prompted if omitted)
  --yes, -y             Skip the confirmation prompt
`,
    capture: `
rhoai capture - Capture cluster state before or after an upgrade

Description:
  Writes <stage>-upgrade-<kind>.yaml for the DSC, DSCI, profiles, serving
  runtimes, inference services, notebooks and their pods.

Options:
  --stage <pre|post>     Stage to capture (prompted if omitted)
  --output-dir <dir>     Output directory (default: pre-post-cluster-state)
`,
    "hardware-profiles": `
rhoai hardware-profiles - Ignore hardware-profile annotations in KServe

Description:
  Sets opendatahub.io/managed=false on the inferenceservice-config ConfigMap
  and adds the hardware-profile annotations to serviceAnnotationDisallowedList,
  then restarts kserve-controller-manager. Safe to run repeatedly.

Options:
  -n, --namespace <ns>   Namespace of the ConfigMap (required)
  --dry-run              Show what would change without writing

Example:
  rhoai hardware-profiles -n redhat-ods-applications --dry-run
`,
    status: `
rhoai status - Show RHOAI status

Options:
  --json         Print the status as JSON
`,
  };

  return helpTexts[command] ?? null;
}
