export { ok, err, Result } from "neverthrow";

export type {
  MimirtoolError,
  ClientError,
  ConfigError,
  ValidationError,
  ValidationErrorCode,
} from "./core/errors.js";
export type { Diagnostic, Severity } from "./core/diagnostics.js";
export { fromError, hasErrors, redactDiagnostics } from "./core/diagnostics.js";
export type {
  AttributeSchema,
  ProviderSchema,
  ProviderSchemaEntry,
  ResourceSchema,
  SchemaBlock,
  SchemaType,
} from "./core/schema.js";
export { isUrlWithHttpOrHttps, validateUrlWithHttpOrHttps, parseBool } from "./core/validate.js";

export { PROVIDER_FIELDS } from "./config/fields.js";
export type { ProviderField, ProviderFieldName } from "./config/fields.js";
export { loadProviderConfig } from "./config/provider-config.js";
export type {
  DeclaredProviderConfig,
  Env,
  LoadedProviderConfig,
  ProviderConfig,
  TlsConfig,
} from "./config/provider-config.js";

export type { MimirClient, AlertmanagerConfig, AlertmanagerStatus } from "./client/types.js";
export { HttpMimirClient, createHttpClient } from "./client/http-client.js";
export type { ClientConfig } from "./client/http-client.js";

export {
  parseRuleNamespaceYaml,
  validateRuleGroups,
  canonicalRuleNamespaceYaml,
  ruleNamespaceSha256,
} from "./rules/rule-group.js";
export type { Rule, RuleGroup, RuleGroupsByNamespace, RuleCheckOptions } from "./rules/rule-group.js";

export { MimirResource } from "./resources/resource.js";
export type {
  ProviderContext,
  Plan,
  Prior,
  Created,
  ReadResult,
  Operation,
  OperationInput,
  ResourceHandler,
} from "./resources/resource.js";
export { RulerNamespaceResource } from "./resources/ruler-namespace.js";
export type { RulerNamespaceProps, RulerNamespaceState } from "./resources/ruler-namespace.js";
export { AlertmanagerResource } from "./resources/alertmanager.js";
export type { AlertmanagerProps, AlertmanagerState } from "./resources/alertmanager.js";

export { createProvider, defaultClientFactory, userAgent } from "./provider/provider.js";
export type { ClientFactory, Configured, Provider, ProviderOptions } from "./provider/provider.js";

export { handleRequest } from "./host/protocol.js";
export type { HostRequest, HostResponse } from "./host/protocol.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
