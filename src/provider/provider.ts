import { ok, err, type Result } from "neverthrow";
import { createHttpClient, type ClientConfig } from "../client/http-client.js";
import type { MimirClient } from "../client/types.js";
import { describeField, PROVIDER_FIELDS, type ProviderField } from "../config/fields.js";
import {
  loadProviderConfig,
  sensitiveValues,
  type Env,
  type ProviderConfig,
} from "../config/provider-config.js";
import { fromError, redactDiagnostics, type Diagnostic } from "../core/diagnostics.js";
import type { MimirtoolError } from "../core/errors.js";
import { attribute, type ProviderSchema, type ResourceSchema } from "../core/schema.js";
import { createLogger, type Logger } from "../logger.js";
import { AlertmanagerResource } from "../resources/alertmanager.js";
import type { ProviderContext, ResourceHandler } from "../resources/resource.js";
import { RulerNamespaceResource } from "../resources/ruler-namespace.js";

export const PROVIDER_ADDRESS = "registry.terraform.io/mimirtool/mimirtool";
export const USER_AGENT_PRODUCT = "terraform-provider-mimirtool";

export type ClientFactory = (
  config: ClientConfig,
) => Promise<Result<MimirClient, MimirtoolError>>;

export type ProviderOptions = {
  readonly version: string;
  /** Builds the API client; defaults to the HTTP client. */
  readonly clientFactory?: ClientFactory;
  readonly logger?: Logger;
};

export type Configured = {
  readonly context: ProviderContext;
  readonly diagnostics: readonly Diagnostic[];
};

export type Provider = {
  readonly version: string;
  readonly schema: ResourceSchema;
  readonly resources: ReadonlyMap<string, ResourceHandler>;
  readonly configure: (
    declared: unknown,
    env: Env,
  ) => Promise<Result<Configured, readonly Diagnostic[]>>;
  readonly providerSchema: () => ProviderSchema;
};

const fields: readonly ProviderField[] = PROVIDER_FIELDS;

// `url` may come from the environment, so core must not reject a
// configuration that omits it.
const providerBlock = (): ResourceSchema => ({
  version: 0,
  block: {
    description: "Manages Grafana Mimir ruler namespaces and alertmanager configuration.",
    description_kind: "markdown",
    attributes: Object.fromEntries(
      fields.map((field) => [
        field.name,
        attribute(field.type, describeField(field), { sensitive: field.sensitive === true }),
      ]),
    ),
  },
});

export const userAgent = (version: string): string => `${USER_AGENT_PRODUCT}/${version}`;

export const toClientConfig = (
  config: ProviderConfig,
  version: string,
  logger: Logger,
): ClientConfig => ({
  address: config.url,
  ...(config.tenantId !== undefined ? { id: config.tenantId } : {}),
  ...(config.user !== undefined ? { user: config.user } : {}),
  key: config.key,
  ...(config.token !== undefined ? { authToken: config.token } : {}),
  tls: {
    ...(config.tls.caPath !== undefined ? { caPath: config.tls.caPath } : {}),
    ...(config.tls.certPath !== undefined ? { certPath: config.tls.certPath } : {}),
    ...(config.tls.keyPath !== undefined ? { keyPath: config.tls.keyPath } : {}),
    insecureSkipVerify: config.tls.insecureSkipVerify,
  },
  prometheusHttpPrefix: config.prometheusHttpPrefix,
  alertmanagerHttpPrefix: config.alertmanagerHttpPrefix,
  userAgent: userAgent(version),
  logger,
});

export const defaultClientFactory: ClientFactory = async (config) =>
  (await createHttpClient(config)).map((client): MimirClient => client);

export const createProvider = (options: ProviderOptions): Provider => {
  const logger = options.logger ?? createLogger();
  const clientFactory = options.clientFactory ?? defaultClientFactory;
  const handlers: readonly ResourceHandler[] = [
    new RulerNamespaceResource(),
    new AlertmanagerResource(),
  ];
  const resources = new Map(handlers.map((h) => [h.typeName, h]));
  const schema = providerBlock();

  const configure = async (
    declared: unknown,
    env: Env,
  ): Promise<Result<Configured, readonly Diagnostic[]>> => {
    const secrets = sensitiveValues(declared, env);
    const fail = (error: MimirtoolError) => {
      const diagnostics = redactDiagnostics(fromError(error), secrets);
      logger.error({ diagnostics }, "provider configuration failed");
      return err<Configured, readonly Diagnostic[]>(diagnostics);
    };

    const loaded = loadProviderConfig(declared, env);
    if (loaded.isErr()) {
      return fail({ kind: "config", errors: loaded.error });
    }
    const { config, warnings } = loaded.value;

    const client = await clientFactory(toClientConfig(config, options.version, logger));
    if (client.isErr()) {
      return fail(client.error);
    }

    logger.debug(
      {
        url: config.url,
        tenantId: config.tenantId,
        storeRulesSha256: config.storeRulesSha256,
      },
      "provider configured",
    );

    return ok({
      context: {
        client: client.value,
        storeRulesSha256: config.storeRulesSha256,
        ...(config.tenantId !== undefined ? { tenantId: config.tenantId } : {}),
        logger,
      },
      diagnostics: redactDiagnostics(warnings, secrets),
    });
  };

  const providerSchema = (): ProviderSchema => ({
    format_version: "1.0",
    provider_schemas: {
      [PROVIDER_ADDRESS]: {
        provider: schema,
        resource_schemas: Object.fromEntries(handlers.map((h) => [h.typeName, h.schema])),
        data_source_schemas: {},
      },
    },
  });

  return { version: options.version, schema, resources, configure, providerSchema };
};
