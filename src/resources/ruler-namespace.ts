import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import type { MimirtoolError } from "../core/errors.js";
import { attribute, type ResourceSchema } from "../core/schema.js";
import {
  canonicalRuleNamespaceYaml,
  parseRuleNamespaceYaml,
  ruleNamespaceSha256,
  type RuleGroup,
} from "../rules/rule-group.js";
import {
  MimirResource,
  type Created,
  type Plan,
  type Prior,
  type ProviderContext,
  type ReadResult,
} from "./resource.js";

const RulerNamespacePropsSchema = z.object({
  namespace: z
    .string()
    .min(1)
    .refine((value) => value !== "." && value !== "..", {
      message: 'namespace must not be "." or ".."',
    }),
  config_yaml: z.string(),
  strict_recording_rules_name_check: z.boolean().default(false),
});

const RulerNamespaceStateSchema = z.object({
  config_yaml: z.string(),
});

export type RulerNamespaceProps = z.output<typeof RulerNamespacePropsSchema>;
export type RulerNamespaceState = z.output<typeof RulerNamespaceStateSchema>;

/** What `config_yaml` holds in state: the canonical document, or its sha256. */
export const storedRules = (ctx: ProviderContext, groups: readonly RuleGroup[]): string =>
  ctx.storeRulesSha256 ? ruleNamespaceSha256(groups) : canonicalRuleNamespaceYaml(groups);

export class RulerNamespaceResource extends MimirResource<RulerNamespaceProps, RulerNamespaceState> {
  override readonly typeName = "mimirtool_ruler_namespace";

  override readonly schema: ResourceSchema = {
    version: 0,
    block: {
      description: "Manages the rule groups of one Grafana Mimir ruler namespace.",
      description_kind: "markdown",
      attributes: {
        id: attribute("string", "The namespace.", { computed: true }),
        namespace: attribute(
          "string",
          "The name of the namespace to create in Grafana Mimir. Changing it forces a new resource.",
          { required: true },
        ),
        config_yaml: attribute(
          "string",
          "The namespace's groups rules definition to create in Grafana Mimir.",
          { required: true },
        ),
        strict_recording_rules_name_check: attribute(
          "bool",
          "Fail when a recording rule name does not match the `level:metric:operation` format.",
        ),
      },
    },
  };

  protected override readonly propsSchema = RulerNamespacePropsSchema;
  protected override readonly stateSchema = RulerNamespaceStateSchema;

  private parseGroups(props: RulerNamespaceProps): Result<readonly RuleGroup[], MimirtoolError> {
    return parseRuleNamespaceYaml(props.config_yaml, {
      strictRecordingRuleNames: props.strict_recording_rules_name_check,
    }).mapErr((errors): MimirtoolError => ({ kind: "validation", errors }));
  }

  override async plan(
    ctx: ProviderContext,
    nextProps: RulerNamespaceProps,
    prior: Prior<RulerNamespaceProps, RulerNamespaceState> | null,
  ): Promise<Result<Plan<RulerNamespaceProps>, MimirtoolError>> {
    const groups = this.parseGroups(nextProps);
    if (groups.isErr()) {
      return err(groups.error);
    }

    if (prior === null) {
      return ok({ props: nextProps, hasChanges: true, requiresReplacement: false, diagnostics: [] });
    }

    const requiresReplacement = prior.props.namespace !== nextProps.namespace;
    const hasChanges =
      requiresReplacement ||
      prior.state.config_yaml !== storedRules(ctx, groups.value) ||
      prior.props.strict_recording_rules_name_check !==
        nextProps.strict_recording_rules_name_check;

    return ok({ props: nextProps, hasChanges, requiresReplacement, diagnostics: [] });
  }

  override async create(
    ctx: ProviderContext,
    props: RulerNamespaceProps,
  ): Promise<Result<Created<RulerNamespaceState>, MimirtoolError>> {
    const groups = this.parseGroups(props);
    if (groups.isErr()) {
      return err(groups.error);
    }

    const pushed = await this.pushGroups(ctx, props.namespace, groups.value);
    if (pushed.isErr()) {
      return err(pushed.error);
    }

    ctx.logger.info(
      { namespace: props.namespace, groups: groups.value.length },
      "ruler namespace created",
    );
    return ok({ id: props.namespace, state: { config_yaml: storedRules(ctx, groups.value) } });
  }

  override async read(
    ctx: ProviderContext,
    id: string,
    props: RulerNamespaceProps,
  ): Promise<Result<ReadResult<RulerNamespaceProps, RulerNamespaceState>, MimirtoolError>> {
    const listed = await ctx.client.listRules(id);
    if (listed.isErr()) {
      return err(listed.error);
    }

    const groups = listed.value[id] ?? [];
    if (groups.length === 0) {
      ctx.logger.warn({ namespace: id }, "ruler namespace not found, removing from state");
      return ok({ exists: false });
    }

    return ok({
      exists: true,
      props: {
        ...props,
        namespace: id,
        config_yaml: ctx.storeRulesSha256 ? props.config_yaml : canonicalRuleNamespaceYaml(groups),
      },
      state: { config_yaml: storedRules(ctx, groups) },
    });
  }

  override async update(
    ctx: ProviderContext,
    id: string,
    nextProps: RulerNamespaceProps,
  ): Promise<Result<RulerNamespaceState, MimirtoolError>> {
    const groups = this.parseGroups(nextProps);
    if (groups.isErr()) {
      return err(groups.error);
    }

    const remote = await ctx.client.listRules(id);
    if (remote.isErr()) {
      return err(remote.error);
    }

    const pushed = await this.pushGroups(ctx, id, groups.value);
    if (pushed.isErr()) {
      return err(pushed.error);
    }

    const wanted = new Set(groups.value.map((g) => g.name));
    for (const stale of remote.value[id] ?? []) {
      if (wanted.has(stale.name)) continue;
      const deleted = await ctx.client.deleteRuleGroup(id, stale.name);
      if (deleted.isErr()) {
        return err(deleted.error);
      }
      ctx.logger.info({ namespace: id, group: stale.name }, "rule group deleted");
    }

    return ok({ config_yaml: storedRules(ctx, groups.value) });
  }

  override async delete(ctx: ProviderContext, id: string): Promise<Result<void, MimirtoolError>> {
    const deleted = await ctx.client.deleteNamespace(id);
    if (deleted.isErr() && deleted.error.kind !== "not_found") {
      return err(deleted.error);
    }
    ctx.logger.info({ namespace: id }, "ruler namespace deleted");
    return ok(undefined);
  }

  private async pushGroups(
    ctx: ProviderContext,
    namespace: string,
    groups: readonly RuleGroup[],
  ): Promise<Result<void, MimirtoolError>> {
    for (const group of groups) {
      const created = await ctx.client.createRuleGroup(namespace, group);
      if (created.isErr()) {
        return err(created.error);
      }
    }
    return ok(undefined);
  }
}
