import * as fs from "node:fs/promises";
import { ok, err, Result } from "neverthrow";
import { Agent, fetch, type Dispatcher } from "undici";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { errorMessage, type ClientError, type MimirtoolError } from "../core/errors.js";
import type { TlsConfig } from "../config/provider-config.js";
import type { Logger } from "../logger.js";
import {
  parseRuleGroupListYaml,
  parseRuleGroupYaml,
  ruleGroupYaml,
  type RuleGroup,
  type RuleGroupsByNamespace,
} from "../rules/rule-group.js";
import type { AlertmanagerConfig, AlertmanagerStatus, MimirClient } from "./types.js";

export const ALERTMANAGER_CONFIG_PATH = "/api/v1/alerts";

export type ClientConfig = {
  readonly address: string;
  readonly id?: string;
  readonly user?: string;
  readonly key?: string;
  readonly authToken?: string;
  readonly tls: TlsConfig;
  readonly prometheusHttpPrefix: string;
  readonly alertmanagerHttpPrefix: string;
  readonly userAgent: string;
  readonly logger: Logger;
  /** Replaces the TLS agent built from `tls`. */
  readonly dispatcher?: Dispatcher;
};

type Method = "GET" | "POST" | "DELETE";

const AlertmanagerConfigSchema = z.object({
  alertmanager_config: z.string().default(""),
  template_files: z.record(z.string(), z.string()).nullish(),
});

const AlertmanagerStatusSchema = z.object({
  cluster: z.object({ status: z.string().optional() }).passthrough().optional(),
  versionInfo: z.object({ version: z.string().optional() }).passthrough().optional(),
});

export const joinPath = (...parts: readonly string[]): string =>
  "/" +
  parts
    .map((p) => p.replace(/^\/+|\/+$/g, ""))
    .filter((p) => p !== "")
    .join("/");

/**
 * Escapes one ruler path segment. `.` and `..` are rejected: URL
 * normalization would resolve them against the ruler path.
 */
export const pathSegment = (value: string): Result<string, ClientError> =>
  value === "." || value === ".."
    ? err<string, ClientError>({
        kind: "invalid_path",
        message: `"${value}" is not a valid namespace or group name`,
      })
    : ok<string, ClientError>(encodeURIComponent(value));

const basicAuth = (user: string, password: string): string =>
  `Basic ${Buffer.from(`${user}:${password}`).toString("base64")}`;

export class HttpMimirClient implements MimirClient {
  private readonly endpoint: URL;
  private readonly rulerPath: string;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(
    readonly config: ClientConfig,
    endpoint: URL,
    private readonly dispatcher: Dispatcher | undefined,
  ) {
    this.endpoint = endpoint;
    this.rulerPath = joinPath(config.prometheusHttpPrefix, "config/v1/rules");
    this.headers = buildHeaders(config);
  }

  createRuleGroup = async (
    namespace: string,
    group: RuleGroup,
  ): Promise<Result<void, ClientError>> => {
    const res = await this.rulerRequest("POST", [namespace], ruleGroupYaml(group));
    return res.map(() => undefined);
  };

  getRuleGroup = async (
    namespace: string,
    groupName: string,
  ): Promise<Result<RuleGroup, ClientError>> => {
    const res = await this.rulerRequest("GET", [namespace, groupName]);
    return res.andThen((body) =>
      parseRuleGroupYaml(body).mapErr((message): ClientError => ({ kind: "parse", message })),
    );
  };

  listRules = async (namespace?: string): Promise<Result<RuleGroupsByNamespace, ClientError>> => {
    const res = await this.rulerRequest("GET", namespace === undefined ? [] : [namespace]);
    if (res.isErr()) {
      return res.error.kind === "not_found" ? ok({}) : err(res.error);
    }
    return parseRuleGroupListYaml(res.value).mapErr(
      (message): ClientError => ({ kind: "parse", message }),
    );
  };

  deleteRuleGroup = async (
    namespace: string,
    groupName: string,
  ): Promise<Result<void, ClientError>> => {
    const res = await this.rulerRequest("DELETE", [namespace, groupName]);
    return res.map(() => undefined);
  };

  deleteNamespace = async (namespace: string): Promise<Result<void, ClientError>> => {
    const res = await this.rulerRequest("DELETE", [namespace]);
    return res.map(() => undefined);
  };

  getAlertmanagerConfig = async (): Promise<Result<AlertmanagerConfig, ClientError>> => {
    const res = await this.request("GET", ALERTMANAGER_CONFIG_PATH);
    return res.andThen((body) => {
      const parsed = parseYamlBody(body, AlertmanagerConfigSchema);
      return parsed.map((doc) => ({
        alertmanagerConfig: doc.alertmanager_config,
        templateFiles: doc.template_files ?? {},
      }));
    });
  };

  createAlertmanagerConfig = async (
    config: AlertmanagerConfig,
  ): Promise<Result<void, ClientError>> => {
    const body = stringifyYaml(
      {
        template_files: config.templateFiles,
        alertmanager_config: config.alertmanagerConfig,
      },
      { lineWidth: 0 },
    );
    const res = await this.request("POST", ALERTMANAGER_CONFIG_PATH, body);
    return res.map(() => undefined);
  };

  deleteAlertmanagerConfig = async (): Promise<Result<void, ClientError>> => {
    const res = await this.request("DELETE", ALERTMANAGER_CONFIG_PATH);
    return res.map(() => undefined);
  };

  getAlertmanagerStatus = async (): Promise<Result<AlertmanagerStatus, ClientError>> => {
    const path = joinPath(this.config.alertmanagerHttpPrefix, "api/v2/status");
    const res = await this.request("GET", path);
    return res.andThen((body) =>
      parseYamlBody(body, AlertmanagerStatusSchema).map((doc) => ({
        ...(doc.cluster?.status !== undefined ? { clusterStatus: doc.cluster.status } : {}),
        ...(doc.versionInfo?.version !== undefined ? { version: doc.versionInfo.version } : {}),
      })),
    );
  };

  private rulerRequest = async (
    method: Method,
    segments: readonly string[],
    body?: string,
  ): Promise<Result<string, ClientError>> => {
    const escaped = Result.combine(segments.map(pathSegment));
    if (escaped.isErr()) {
      return err(escaped.error);
    }
    return this.request(method, joinPath(this.rulerPath, ...escaped.value), body);
  };

  private request = async (
    method: Method,
    path: string,
    body?: string,
  ): Promise<Result<string, ClientError>> => {
    const url = new URL(this.endpoint.href);
    url.pathname = joinPath(url.pathname, path);
    const log = this.config.logger.child({ method, path: url.pathname });

    const headers: Record<string, string> = { ...this.headers };
    if (body !== undefined) {
      headers["Content-Type"] = "application/yaml";
    }

    try {
      const res = await fetch(url, {
        method,
        headers,
        ...(body !== undefined ? { body } : {}),
        ...(this.dispatcher !== undefined ? { dispatcher: this.dispatcher } : {}),
      });
      const text = await res.text();
      log.debug({ status: res.status }, "mimir request completed");

      if (res.status === 404) {
        return err({ kind: "not_found", message: `${method} ${url.pathname}: ${text.trim()}` });
      }
      if (res.status < 200 || res.status >= 300) {
        return err({
          kind: "http",
          status: res.status,
          message: `${method} ${url.pathname}: ${text.trim()}`,
        });
      }
      return ok(text);
    } catch (e) {
      log.debug({ error: errorMessage(e) }, "mimir request failed");
      return err({ kind: "network", message: `${method} ${url.pathname}: ${errorMessage(e)}` });
    }
  };
}

const parseYamlBody = <T>(
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, ClientError> => {
  let doc: unknown;
  try {
    doc = parseYaml(body);
  } catch (e) {
    return err<T, ClientError>({ kind: "parse", message: errorMessage(e) });
  }
  const result = schema.safeParse(doc ?? {});
  return result.success
    ? ok<T, ClientError>(result.data)
    : err<T, ClientError>({ kind: "parse", message: result.error.message });
};

const buildHeaders = (config: ClientConfig): Record<string, string> => {
  const headers: Record<string, string> = { "User-Agent": config.userAgent };
  if (config.id !== undefined && config.id !== "") {
    headers["X-Scope-OrgID"] = config.id;
  }

  const key = config.key ?? "";
  if (config.authToken !== undefined && config.authToken !== "") {
    headers["Authorization"] = `Bearer ${config.authToken}`;
  } else if (config.user !== undefined && config.user !== "") {
    headers["Authorization"] = basicAuth(config.user, key);
  } else if (key !== "") {
    headers["Authorization"] = basicAuth(config.id ?? "", key);
  }
  return headers;
};

const readTlsFile = async (path: string): Promise<Result<Buffer, MimirtoolError>> => {
  try {
    return ok(await fs.readFile(path));
  } catch (e) {
    return err({ kind: "io", path, message: errorMessage(e) });
  }
};

const buildTlsAgent = async (tls: TlsConfig): Promise<Result<Agent, MimirtoolError>> => {
  if ((tls.certPath === undefined) !== (tls.keyPath === undefined)) {
    return err({
      kind: "client",
      message: "both a TLS certificate and a TLS key are required for client authentication",
    });
  }

  const connect: { ca?: Buffer; cert?: Buffer; key?: Buffer; rejectUnauthorized: boolean } = {
    rejectUnauthorized: !tls.insecureSkipVerify,
  };
  const files = [
    ["ca", tls.caPath],
    ["cert", tls.certPath],
    ["key", tls.keyPath],
  ] as const;

  for (const [name, path] of files) {
    if (path === undefined) continue;
    const content = await readTlsFile(path);
    if (content.isErr()) {
      return err(content.error);
    }
    connect[name] = content.value;
  }

  return ok(new Agent({ connect }));
};

const needsTlsAgent = (tls: TlsConfig): boolean =>
  tls.insecureSkipVerify ||
  tls.caPath !== undefined ||
  tls.certPath !== undefined ||
  tls.keyPath !== undefined;

/**
 * Builds a client for one tenant. Fails on an unparsable address, on
 * conflicting credentials, and on unreadable TLS material.
 */
export const createHttpClient = async (
  config: ClientConfig,
): Promise<Result<HttpMimirClient, MimirtoolError>> => {
  let endpoint: URL;
  try {
    endpoint = new URL(config.address);
  } catch {
    return err({ kind: "client", message: `invalid Mimir address: ${config.address}` });
  }

  const hasBasicAuth =
    (config.user !== undefined && config.user !== "") ||
    (config.key !== undefined && config.key !== "");
  if (config.authToken !== undefined && config.authToken !== "" && hasBasicAuth) {
    return err({
      kind: "client",
      message: "at most one of basic auth or auth token should be configured",
    });
  }

  if (config.dispatcher !== undefined) {
    return ok(new HttpMimirClient(config, endpoint, config.dispatcher));
  }
  if (!needsTlsAgent(config.tls)) {
    return ok(new HttpMimirClient(config, endpoint, undefined));
  }

  const agent = await buildTlsAgent(config.tls);
  return agent.map((dispatcher) => new HttpMimirClient(config, endpoint, dispatcher));
};
