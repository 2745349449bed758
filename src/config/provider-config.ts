import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import type { ConfigError } from "../core/errors.js";
import { warningDiagnostic, type Diagnostic } from "../core/diagnostics.js";
import { parseBool, validateUrlWithHttpOrHttps } from "../core/validate.js";
import { PROVIDER_FIELDS, type ProviderField } from "./fields.js";

export type Env = Readonly<Record<string, string | undefined>>;

export type TlsConfig = {
  readonly caPath?: string;
  readonly certPath?: string;
  readonly keyPath?: string;
  readonly insecureSkipVerify: boolean;
};

export type ProviderConfig = {
  readonly url: string;
  readonly tenantId?: string;
  readonly user?: string;
  readonly key: string;
  readonly token?: string;
  readonly tls: TlsConfig;
  readonly prometheusHttpPrefix: string;
  readonly alertmanagerHttpPrefix: string;
  readonly storeRulesSha256: boolean;
};

export type LoadedProviderConfig = {
  readonly config: ProviderConfig;
  readonly warnings: readonly Diagnostic[];
};

const DeclaredProviderConfigSchema = z
  .object({
    url: z.string().nullish(),
    tenant_id: z.string().nullish(),
    user: z.string().nullish(),
    key: z.string().nullish(),
    token: z.string().nullish(),
    tls_key_path: z.string().nullish(),
    tls_cert_path: z.string().nullish(),
    ca_cert_path: z.string().nullish(),
    insecure_skip_verify: z.boolean().nullish(),
    prometheus_http_prefix: z.string().nullish(),
    alertmanager_http_prefix: z.string().nullish(),
    store_rules_sha256: z.boolean().nullish(),
  })
  .strict();

export type DeclaredProviderConfig = z.input<typeof DeclaredProviderConfigSchema>;

type Resolved = string | boolean | undefined;

const fields: readonly ProviderField[] = PROVIDER_FIELDS;

const readEnv = (env: Env, name: string): string | undefined => {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
};

const resolveField = (
  field: ProviderField,
  declared: Readonly<Record<string, unknown>>,
  env: Env,
  errors: ConfigError[],
  warnings: Diagnostic[],
): Resolved => {
  const value = declared[field.name];
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  let raw = readEnv(env, field.env);
  let source = field.env;
  if (raw === undefined && field.legacyEnv !== undefined) {
    raw = readEnv(env, field.legacyEnv);
    source = field.legacyEnv;
    if (raw !== undefined) {
      warnings.push(
        warningDiagnostic(
          "Deprecated environment variable",
          `"${field.legacyEnv}" is read for "${field.name}"; set "${field.env}" instead.`,
        ),
      );
    }
  }

  if (raw === undefined) {
    return field.default;
  }
  if (field.type === "string") {
    return raw;
  }

  const parsed = parseBool(raw);
  if (parsed === undefined) {
    errors.push({
      field: field.name,
      message: `environment variable "${source}" must be a boolean`,
    });
  }
  return parsed;
};

const stringOf = (value: Resolved): string | undefined =>
  typeof value === "string" && value !== "" ? value : undefined;

const boolOf = (value: Resolved): boolean => value === true;

/**
 * Resolves every provider field from its declared value, then its
 * environment variable, then its default.
 */
export const loadProviderConfig = (
  declared: unknown,
  env: Env,
): Result<LoadedProviderConfig, readonly ConfigError[]> => {
  const parsed = DeclaredProviderConfigSchema.safeParse(declared ?? {});
  if (!parsed.success) {
    return err(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join(".") || "root",
        message: issue.message,
      })),
    );
  }

  const errors: ConfigError[] = [];
  const warnings: Diagnostic[] = [];
  const values = new Map<string, Resolved>(
    fields.map((field) => [field.name, resolveField(field, parsed.data, env, errors, warnings)]),
  );

  for (const field of fields) {
    if (field.required === true && stringOf(values.get(field.name)) === undefined) {
      errors.push({
        field: field.name,
        message: `The argument "${field.name}" is required, but no definition was found.`,
      });
    }
  }

  const url = stringOf(values.get("url"));
  if (url !== undefined) {
    const checked = validateUrlWithHttpOrHttps(url, "url");
    if (checked.isErr()) {
      errors.push({ field: "url", message: checked.error });
    }
  }

  if (errors.length > 0 || url === undefined) {
    return err(errors);
  }

  const tenantId = stringOf(values.get("tenant_id"));
  const user = stringOf(values.get("user"));
  const token = stringOf(values.get("token"));
  const caPath = stringOf(values.get("ca_cert_path"));
  const certPath = stringOf(values.get("tls_cert_path"));
  const keyPath = stringOf(values.get("tls_key_path"));

  const config: ProviderConfig = {
    url,
    ...(tenantId !== undefined ? { tenantId } : {}),
    ...(user !== undefined ? { user } : {}),
    key: stringOf(values.get("key")) ?? "",
    ...(token !== undefined ? { token } : {}),
    tls: {
      ...(caPath !== undefined ? { caPath } : {}),
      ...(certPath !== undefined ? { certPath } : {}),
      ...(keyPath !== undefined ? { keyPath } : {}),
      insecureSkipVerify: boolOf(values.get("insecure_skip_verify")),
    },
    prometheusHttpPrefix: stringOf(values.get("prometheus_http_prefix")) ?? "",
    alertmanagerHttpPrefix: stringOf(values.get("alertmanager_http_prefix")) ?? "",
    storeRulesSha256: boolOf(values.get("store_rules_sha256")),
  };

  return ok({ config, warnings });
};

/**
 * Every value a sensitive field could take, declared or from the
 * environment, so that diagnostics can be scrubbed before anything is
 * configured.
 */
export const sensitiveValues = (declared: unknown, env: Env): readonly string[] => {
  const record: Readonly<Record<string, unknown>> =
    typeof declared === "object" && declared !== null ? { ...declared } : {};

  return fields
    .filter((field) => field.sensitive === true)
    .flatMap((field) => [
      record[field.name],
      env[field.env],
      field.legacyEnv !== undefined ? env[field.legacyEnv] : undefined,
    ])
    .filter((value): value is string => typeof value === "string" && value !== "");
};
