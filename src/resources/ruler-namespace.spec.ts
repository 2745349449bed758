import { describe, expect, test } from "vitest";
import { FakeMimirClient, testContext } from "../testing/index.js";
import {
  canonicalRuleNamespaceYaml,
  parseRuleNamespaceYaml,
  ruleNamespaceSha256,
} from "../rules/rule-group.js";
import { RulerNamespaceResource, type RulerNamespaceProps } from "./ruler-namespace.js";

const CONFIG = `
groups:
  - name: api
    rules:
      - record: job:up:sum
        expr: sum by (job) (up)
  - name: alerts
    rules:
      - alert: InstanceDown
        expr: up == 0
        for: 5m
`;

const props = (overrides: Partial<RulerNamespaceProps> = {}): RulerNamespaceProps => ({
  namespace: "team-a",
  config_yaml: CONFIG,
  strict_recording_rules_name_check: false,
  ...overrides,
});

const groupsOf = (text: string) => parseRuleNamespaceYaml(text)._unsafeUnwrap();

describe("RulerNamespaceResource", () => {
  const resource = new RulerNamespaceResource();

  test("creates every group and stores the canonical config", async () => {
    const client = new FakeMimirClient();
    const created = await resource.create(testContext(client), props());

    expect(created._unsafeUnwrap()).toEqual({
      id: "team-a",
      state: { config_yaml: canonicalRuleNamespaceYaml(groupsOf(CONFIG)) },
    });
    expect(client.rules.get("team-a")?.map((g) => g.name)).toEqual(["api", "alerts"]);
  });

  test("stores only the sha256 when the provider asks for it", async () => {
    const client = new FakeMimirClient();
    const created = await resource.create(
      testContext(client, { storeRulesSha256: true }),
      props(),
    );

    expect(created._unsafeUnwrap().state.config_yaml).toBe(ruleNamespaceSha256(groupsOf(CONFIG)));
  });

  test("does not call the API when the config is invalid", async () => {
    const client = new FakeMimirClient();
    const created = await resource.create(
      testContext(client),
      props({ config_yaml: "groups:\n  - name: api\n    rules:\n      - expr: up\n" }),
    );

    const error = created._unsafeUnwrapErr();
    expect(error.kind).toBe("validation");
    expect(client.calls).toEqual([]);
  });

  test.each([".", ".."])("rejects the namespace %j before calling the API", async (namespace) => {
    const client = new FakeMimirClient();
    const created = await resource.invoke(testContext(client), "create", {
      props: { namespace, config_yaml: CONFIG },
    });

    const error = created._unsafeUnwrapErr();
    expect(error.kind === "validation" ? error.errors.map((e) => e.path) : []).toEqual([
      ["namespace"],
    ]);
    expect(client.calls).toEqual([]);
  });

  test("applies the strict recording rule name check", async () => {
    const client = new FakeMimirClient();
    const created = await resource.create(
      testContext(client),
      props({
        config_yaml: "groups:\n  - name: api\n    rules:\n      - record: up_sum\n        expr: sum(up)\n",
        strict_recording_rules_name_check: true,
      }),
    );
    expect(created._unsafeUnwrapErr().kind).toBe("validation");
  });

  test("reads the remote groups back", async () => {
    const client = new FakeMimirClient();
    const ctx = testContext(client);
    await resource.create(ctx, props());

    const read = (await resource.read(ctx, "team-a", props()))._unsafeUnwrap();
    const canonical = canonicalRuleNamespaceYaml(groupsOf(CONFIG));
    expect(read).toEqual({
      exists: true,
      props: { ...props(), config_yaml: canonical },
      state: { config_yaml: canonical },
    });
  });

  test("keeps the declared config when state holds a hash", async () => {
    const client = new FakeMimirClient();
    const ctx = testContext(client, { storeRulesSha256: true });
    await resource.create(ctx, props());

    const read = (await resource.read(ctx, "team-a", props()))._unsafeUnwrap();
    expect(read).toEqual({
      exists: true,
      props: props(),
      state: { config_yaml: ruleNamespaceSha256(groupsOf(CONFIG)) },
    });
  });

  test("reports a namespace without groups as gone", async () => {
    const client = new FakeMimirClient();
    const read = await resource.read(testContext(client), "team-a", props());
    expect(read._unsafeUnwrap()).toEqual({ exists: false });
  });

  test("update pushes desired groups and deletes the rest", async () => {
    const client = new FakeMimirClient();
    const ctx = testContext(client);
    await resource.create(ctx, props());
    client.calls.length = 0;

    const next = props({
      config_yaml: "groups:\n  - name: api\n    rules:\n      - record: job:up:max\n        expr: max(up)\n",
    });
    const state = await resource.update(ctx, "team-a", next);

    expect(state._unsafeUnwrap()).toEqual({
      config_yaml: canonicalRuleNamespaceYaml(groupsOf(next.config_yaml)),
    });
    expect(client.methodsCalled()).toEqual(["listRules", "createRuleGroup", "deleteRuleGroup"]);
    expect(client.rules.get("team-a")?.map((g) => g.name)).toEqual(["api"]);
  });

  test("delete removes the namespace and tolerates it being gone", async () => {
    const client = new FakeMimirClient();
    const ctx = testContext(client);
    await resource.create(ctx, props());

    expect((await resource.delete(ctx, "team-a")).isOk()).toBe(true);
    expect(client.rules.has("team-a")).toBe(false);
    expect((await resource.delete(ctx, "team-a")).isOk()).toBe(true);
  });

  test("surfaces API failures", async () => {
    const client = new FakeMimirClient();
    client.failWith = { kind: "http", status: 500, message: "boom" };
    const created = await resource.create(testContext(client), props());
    expect(created._unsafeUnwrapErr()).toEqual({ kind: "http", status: 500, message: "boom" });
  });

  describe("plan", () => {
    test("plans a create without a prior state", async () => {
      const plan = await resource.plan(testContext(new FakeMimirClient()), props(), null);
      expect(plan._unsafeUnwrap()).toEqual({
        props: props(),
        hasChanges: true,
        requiresReplacement: false,
        diagnostics: [],
      });
    });

    test("sees no change when only formatting differs", async () => {
      const ctx = testContext(new FakeMimirClient(), { storeRulesSha256: true });
      const reordered = `
groups:
- name: alerts
  rules:
  - alert: InstanceDown
    expr: "up == 0"
    for: 5m
- name: api
  rules:
  - record: job:up:sum
    expr: sum by (job) (up)
`;
      const prior = {
        id: "team-a",
        props: props(),
        state: { config_yaml: ruleNamespaceSha256(groupsOf(CONFIG)) },
      };
      const plan = (await resource.plan(ctx, props({ config_yaml: reordered }), prior))._unsafeUnwrap();
      expect(plan.hasChanges).toBe(false);
      expect(plan.requiresReplacement).toBe(false);
    });

    test("requires replacement when the namespace changes", async () => {
      const ctx = testContext(new FakeMimirClient());
      const prior = {
        id: "team-a",
        props: props(),
        state: { config_yaml: canonicalRuleNamespaceYaml(groupsOf(CONFIG)) },
      };
      const plan = (await resource.plan(ctx, props({ namespace: "team-b" }), prior))._unsafeUnwrap();
      expect(plan.hasChanges).toBe(true);
      expect(plan.requiresReplacement).toBe(true);
    });
  });
});
