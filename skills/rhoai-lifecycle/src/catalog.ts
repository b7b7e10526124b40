import { ResourceRef } from "./tools/oc.js";

export const MARKETPLACE_NAMESPACE = "openshift-marketplace";
export const OPERATORS_NAMESPACE = "openshift-operators";
export const RHOAI_OPERATOR_NAMESPACE = "redhat-ods-operator";
export const RHOAI_APPLICATIONS_NAMESPACE = "redhat-ods-applications";
export const SERVERLESS_NAMESPACE = "openshift-serverless";

export const CATALOG_SOURCE: ResourceRef = {
  kind: "catalogsource",
  name: "rhoai-catalog-dev",
  namespace: MARKETPLACE_NAMESPACE,
};

export const RHOAI_SUBSCRIPTION: ResourceRef = {
  kind: "subscription",
  name: "rhods-operator",
  namespace: RHOAI_OPERATOR_NAMESPACE,
};

export const RHOAI_OPERATOR_GROUP: ResourceRef = {
  kind: "operatorgroup",
  name: "redhat-ods-operator",
  namespace: RHOAI_OPERATOR_NAMESPACE,
};

export const DSC: ResourceRef = { kind: "datasciencecluster", name: "default-dsc" };
export const DSCI: ResourceRef = { kind: "dscinitialization", name: "default-dsci" };

export const INSTALL_CHANNEL = "stable-2.25";
export const UPGRADE_CHANNEL = "stable-3.3";

/** Pinned file-based catalog fragments, by OpenShift minor version. */
export const CATALOG_IMAGES: Record<string, string> = {
  "4.19": "quay.io/rhoai/rhoai-fbc-fragment@sha256:7f3df0e87ed6878cef295a15b1ef3c063121ff1e1fdc3e27d24ba1dbf0c56f51",
  "4.20": "quay.io/rhoai/rhoai-fbc-fragment@sha256:cd03ffb8f71bb6d237ea3b3d04ee9955ac8cdf31f0669f32b73f36aa3740a2a7",
  "4.21": "quay.io/rhoai/rhoai-fbc-fragment@sha256:f6e7db613cd040e53da2d47850477a9b914de18979adaaac47e15dc7c76f8a76",
};

export const FALLBACK_CATALOG_VERSION = "4.20";

/**
 * An operator installed through OLM: its subscription, the pattern its CSV
 * names match, and what else goes with it on uninstall.
 */
export type OperatorSpec = {
  displayName: string;
  subscription: ResourceRef;
  csvPattern: RegExp;
  operatorGroup?: ResourceRef;
  ownNamespace?: string;
};

export const AUTHORINO: OperatorSpec = {
  displayName: "Red Hat Authorino",
  subscription: { kind: "subscription", name: "authorino-operator", namespace: OPERATORS_NAMESPACE },
  csvPattern: /authorino/,
};

export const SERVERLESS: OperatorSpec = {
  displayName: "Red Hat OpenShift Serverless",
  subscription: { kind: "subscription", name: "serverless-operator", namespace: SERVERLESS_NAMESPACE },
  csvPattern: /serverless/,
  operatorGroup: { kind: "operatorgroup", name: "openshift-serverless", namespace: SERVERLESS_NAMESPACE },
  ownNamespace: SERVERLESS_NAMESPACE,
};

export const SERVICE_MESH_2: OperatorSpec = {
  displayName: "Red Hat OpenShift Service Mesh 2",
  subscription: { kind: "subscription", name: "servicemeshoperator", namespace: OPERATORS_NAMESPACE },
  csvPattern: /servicemesh/,
};

export const CONNECTIVITY_LINK: OperatorSpec = {
  displayName: "Red Hat Connectivity Link",
  subscription: { kind: "subscription", name: "rhcl-operator", namespace: OPERATORS_NAMESPACE },
  csvPattern: /rhcl/,
};

export const CONNECTIVITY_LINK_STARTING_CSV = "rhcl-operator.v1.2.1";

/** Dependencies Connectivity Link pulls in; OLM names their subscriptions after channel and source. */
export const AUTHORINO_DEPENDENCY: OperatorSpec = {
  displayName: "Authorino",
  subscription: {
    kind: "subscription",
    name: "authorino-operator-stable-redhat-operators-openshift-marketplace",
    namespace: OPERATORS_NAMESPACE,
  },
  csvPattern: /authorino/,
};

export const DNS_DEPENDENCY: OperatorSpec = {
  displayName: "DNS",
  subscription: {
    kind: "subscription",
    name: "dns-operator-stable-redhat-operators-openshift-marketplace",
    namespace: OPERATORS_NAMESPACE,
  },
  csvPattern: /dns/,
};

export const LIMITADOR_DEPENDENCY: OperatorSpec = {
  displayName: "Limitador",
  subscription: {
    kind: "subscription",
    name: "limitador-operator-stable-redhat-operators-openshift-marketplace",
    namespace: OPERATORS_NAMESPACE,
  },
  csvPattern: /limitador/,
};

export const SERVICE_MESH_3: OperatorSpec = {
  displayName: "Red Hat OpenShift Service Mesh 3",
  subscription: { kind: "subscription", name: "servicemeshoperator3", namespace: OPERATORS_NAMESPACE },
  csvPattern: /servicemeshoperator3/,
};

/** Application-level custom resources, deleted cluster-wide before the platform itself. */
export const WORKLOAD_KINDS = [
  { kind: "inferenceservices.serving.kserve.io", label: "InferenceServices" },
  { kind: "servingruntimes.serving.kserve.io", label: "ServingRuntimes" },
  { kind: "notebooks.kubeflow.org", label: "Notebooks" },
  { kind: "hardwareprofiles.infrastructure.opendatahub.io", label: "HardwareProfiles" },
  { kind: "acceleratorprofiles.dashboard.opendatahub.io", label: "AcceleratorProfiles" },
];

export const PLATFORM_NAMESPACES = [
  "redhat-ods-operator",
  "openshift-serverless",
  "redhat-ods-applications",
  "redhat-ods-monitoring",
  "opendatahub",
  "rhods-notebooks",
  "redhat-ods-applications-auth-provider",
];
