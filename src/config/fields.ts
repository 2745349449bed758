export type FieldType = "string" | "bool";

export type ProviderField = {
  readonly name: string;
  readonly type: FieldType;
  readonly env: string;
  /** Dotted variable name some older configurations export. Read after `env`. */
  readonly legacyEnv?: string;
  readonly default?: string | boolean;
  readonly required?: boolean;
  readonly sensitive?: boolean;
  readonly description: string;
};

export const PROVIDER_FIELDS = [
  {
    name: "url",
    type: "string",
    env: "MIMIR_ADDRESS",
    required: true,
    description: "Address to use when contacting Grafana Mimir.",
  },
  {
    name: "tenant_id",
    type: "string",
    env: "MIMIR_TENANT_ID",
    description: "Tenant ID to use when contacting Grafana Mimir.",
  },
  {
    name: "user",
    type: "string",
    env: "MIMIR_API_USER",
    legacyEnv: "MIMIR_API_USER.",
    description: "API user to use when contacting Grafana Mimir.",
  },
  {
    name: "key",
    type: "string",
    env: "MIMIR_API_KEY",
    default: "",
    sensitive: true,
    description: "API key to use when contacting Grafana Mimir.",
  },
  {
    name: "token",
    type: "string",
    env: "MIMIR_AUTH_TOKEN",
    legacyEnv: "MIMIR_AUTH_TOKEN.",
    sensitive: true,
    description:
      "Authentication token for bearer token or JWT auth when contacting Grafana Mimir.",
  },
  {
    name: "tls_key_path",
    type: "string",
    env: "MIMIR_TLS_KEY_PATH",
    description: "Client TLS key file to use to authenticate to the MIMIR server.",
  },
  {
    name: "tls_cert_path",
    type: "string",
    env: "MIMIR_TLS_CERT_PATH",
    description: "Client TLS certificate file to use to authenticate to the MIMIR server.",
  },
  {
    name: "ca_cert_path",
    type: "string",
    env: "MIMIR_CA_CERT_PATH",
    description: "Certificate CA bundle to use to verify the MIMIR server's certificate.",
  },
  {
    name: "insecure_skip_verify",
    type: "bool",
    env: "MIMIR_INSECURE_SKIP_VERIFY",
    description: "Skip TLS certificate verification.",
  },
  {
    name: "prometheus_http_prefix",
    type: "string",
    env: "MIMIR_API_PREFIX",
    default: "/prometheus",
    description: "Path prefix to use for rules.",
  },
  {
    name: "alertmanager_http_prefix",
    type: "string",
    env: "MIMIR_ALERTMANAGER_HTTP_PREFIX",
    default: "/alertmanager",
    description: "Path prefix to use for alertmanager.",
  },
  {
    name: "store_rules_sha256",
    type: "bool",
    env: "MIMIR_STORE_RULES_SHA256",
    default: false,
    description:
      "Set to true if you want to save only the sha256sum instead of namespace's groups rules definition in the tfstate.",
  },
] as const satisfies readonly ProviderField[];

export type ProviderFieldName = (typeof PROVIDER_FIELDS)[number]["name"];

export const describeField = (field: ProviderField): string =>
  `${field.description} May alternatively be set via the \`${field.env}\` environment variable.`;
