import { describe, expect, test, vi } from "vitest";
import { err } from "neverthrow";
import { HttpMimirClient } from "../client/http-client.js";
import type { MimirClient } from "../client/types.js";
import type { MimirtoolError } from "../core/errors.js";
import { createLogger, silentLogger } from "../logger.js";
import { FakeMimirClient, fixedClient } from "../testing/index.js";
import { createProvider, PROVIDER_ADDRESS, type ClientFactory } from "./provider.js";

describe("createProvider", () => {
  test("returns the injected client untouched", async () => {
    const client = new FakeMimirClient();
    const provider = createProvider({
      version: "1.2.3",
      clientFactory: fixedClient(client),
      logger: silentLogger(),
    });

    const configured = await provider.configure({ url: "https://mimir.example.com" }, {});
    expect(configured._unsafeUnwrap().context.client).toBe(client);
    expect(client.calls).toEqual([]);
  });

  test("hands the factory the declared values and the stamped user agent", async () => {
    const factory = vi.fn<ClientFactory>(fixedClient(new FakeMimirClient()));
    const provider = createProvider({
      version: "1.2.3",
      clientFactory: factory,
      logger: silentLogger(),
    });

    await provider.configure(
      {
        url: "https://mimir.example.com",
        tenant_id: "team-a",
        ca_cert_path: "/etc/tls/ca.crt",
        insecure_skip_verify: true,
      },
      {},
    );

    expect(factory).toHaveBeenCalledTimes(1);
    const config = factory.mock.calls[0]?.[0];
    expect(config?.address).toBe("https://mimir.example.com");
    expect(config?.id).toBe("team-a");
    expect(config?.tls).toEqual({ caPath: "/etc/tls/ca.crt", insecureSkipVerify: true });
    expect(config?.userAgent).toBe("terraform-provider-mimirtool/1.2.3");
    expect(config?.prometheusHttpPrefix).toBe("/prometheus");
  });

  test("builds an HTTP client matching the configuration by default", async () => {
    const provider = createProvider({ version: "1.2.3", logger: silentLogger() });
    const configured = await provider.configure(
      { url: "https://mimir.example.com", tenant_id: "team-a" },
      {},
    );

    const { client } = configured._unsafeUnwrap().context;
    expect(client).toBeInstanceOf(HttpMimirClient);
    if (client instanceof HttpMimirClient) {
      expect(client.config.address).toBe("https://mimir.example.com");
      expect(client.config.id).toBe("team-a");
    }
  });

  test("exposes store_rules_sha256 on the context", async () => {
    const provider = createProvider({
      version: "1.2.3",
      clientFactory: fixedClient(new FakeMimirClient()),
      logger: silentLogger(),
    });

    const unset = await provider.configure({ url: "https://mimir.example.com" }, {});
    expect(unset._unsafeUnwrap().context.storeRulesSha256).toBe(false);

    const set = await provider.configure(
      { url: "https://mimir.example.com" },
      { MIMIR_STORE_RULES_SHA256: "true" },
    );
    expect(set._unsafeUnwrap().context.storeRulesSha256).toBe(true);
  });

  test("reports client construction failures as diagnostics", async () => {
    const provider = createProvider({ version: "1.2.3", logger: silentLogger() });
    const configured = await provider.configure(
      { url: "https://mimir.example.com", token: "test-token", user: "ops" },
      {},
    );

    expect(configured._unsafeUnwrapErr()).toEqual([
      {
        severity: "error",
        summary: "Unable to create Mimir client",
        detail: "at most one of basic auth or auth token should be configured",
      },
    ]);
  });

  test("scrubs secrets from diagnostics and logs", async () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: "debug",
      destination: { write: (line: string) => lines.push(line) },
    });
    const failing: ClientFactory = async () =>
      err<MimirClient, MimirtoolError>({
        kind: "client",
        message: "rejected credentials test-key/test-token",
      });
    const provider = createProvider({ version: "1.2.3", clientFactory: failing, logger });

    const configured = await provider.configure(
      { url: "https://mimir.example.com", key: "test-key" },
      { MIMIR_AUTH_TOKEN: "test-token" },
    );

    expect(configured._unsafeUnwrapErr()).toEqual([
      {
        severity: "error",
        summary: "Unable to create Mimir client",
        detail: "rejected credentials (sensitive value)/(sensitive value)",
      },
    ]);
    expect(lines.length).toBeGreaterThan(0);
    for (const line of lines) {
      expect(line).not.toContain("test-key");
      expect(line).not.toContain("test-token");
    }
  });

  test("reports configuration errors per field", async () => {
    const provider = createProvider({
      version: "1.2.3",
      clientFactory: fixedClient(new FakeMimirClient()),
      logger: silentLogger(),
    });
    const configured = await provider.configure({ url: "not a url" }, {});
    expect(configured._unsafeUnwrapErr()).toEqual([
      {
        severity: "error",
        summary: "Invalid provider configuration",
        detail: 'expected "url" to be a valid url, got not a url',
        attribute: ["url"],
      },
    ]);
  });

  test("publishes a schema in the providers schema format", () => {
    const provider = createProvider({ version: "1.2.3", logger: silentLogger() });
    const schema = provider.providerSchema();
    const entry = schema.provider_schemas[PROVIDER_ADDRESS];

    expect(Object.keys(entry?.resource_schemas ?? {})).toEqual([
      "mimirtool_ruler_namespace",
      "mimirtool_alertmanager",
    ]);
    const attributes = entry?.provider.block.attributes ?? {};
    expect(attributes["key"]?.sensitive).toBe(true);
    expect(attributes["token"]?.sensitive).toBe(true);
    expect(attributes["url"]?.description).toBe(
      "Address to use when contacting Grafana Mimir. May alternatively be set via the `MIMIR_ADDRESS` environment variable.",
    );
    expect(attributes["store_rules_sha256"]?.type).toBe("bool");
  });
});
