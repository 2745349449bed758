import { describe, expect, test } from "vitest";
import { silentLogger } from "../logger.js";
import { createProvider } from "../provider/provider.js";
import { FakeMimirClient, fixedClient } from "../testing/index.js";
import { runCall } from "./call.js";
import { formatCheckReport, runCheck } from "./check.js";
import { formatDiagnostic } from "./format.js";
import { renderSchema } from "./schema.js";

const providerWith = (client: FakeMimirClient) =>
  createProvider({ version: "1.2.3", clientFactory: fixedClient(client), logger: silentLogger() });

describe("runCall", () => {
  test("answers a request read from text", async () => {
    const client = new FakeMimirClient();
    client.alertmanager = { alertmanagerConfig: "route:\n  receiver: default\n", templateFiles: {} };

    const response = await runCall({
      provider: providerWith(client),
      input: JSON.stringify({
        resource: "mimirtool_alertmanager",
        operation: "read",
        id: "alertmanager",
        props: { config_yaml: "route:\n  receiver: default\n" },
      }),
      env: { MIMIR_ADDRESS: "https://mimir.example.com" },
    });

    expect(response.ok).toBe(true);
  });

  test("fails on input that is not JSON", async () => {
    const response = await runCall({
      provider: providerWith(new FakeMimirClient()),
      input: "not json",
      env: {},
    });
    expect(response.ok).toBe(false);
  });
});

describe("runCheck", () => {
  test("summarizes ruler and alertmanager state", async () => {
    const client = new FakeMimirClient();
    await client.createRuleGroup("team-a", { name: "api", rules: [] });
    await client.createRuleGroup("team-a", { name: "db", rules: [] });
    await client.createRuleGroup("team-b", { name: "api", rules: [] });

    const report = (
      await runCheck(providerWith(client), { MIMIR_ADDRESS: "https://mimir.example.com" })
    )._unsafeUnwrap();

    expect(formatCheckReport(report)).toBe(
      "ruler: 2 namespace(s), 3 rule group(s)\nalertmanager: ready (version 0.27.0)",
    );
  });

  test("redacts credentials from client errors", async () => {
    const client = new FakeMimirClient();
    client.failWith = { kind: "http", status: 401, message: "token test-token rejected" };

    const result = await runCheck(providerWith(client), {
      MIMIR_ADDRESS: "https://mimir.example.com",
      MIMIR_AUTH_TOKEN: "test-token",
    });
    expect(result._unsafeUnwrapErr().map(formatDiagnostic)).toEqual([
      "Error: Mimir API returned status 401: token (sensitive value) rejected",
    ]);
  });

  test("fails without an address", async () => {
    const result = await runCheck(providerWith(new FakeMimirClient()), {});
    expect(result._unsafeUnwrapErr().map(formatDiagnostic)).toEqual([
      'Error: Invalid provider configuration [url]: The argument "url" is required, but no definition was found.',
    ]);
  });
});

describe("renderSchema", () => {
  test("prints the schema as JSON", () => {
    const provider = providerWith(new FakeMimirClient());
    expect(JSON.parse(renderSchema(provider))).toEqual(provider.providerSchema());
  });
});
