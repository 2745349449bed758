import { ok, err, type Result } from "neverthrow";
import { isMap, parseDocument, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import type { AlertmanagerConfig } from "../client/types.js";
import type { MimirtoolError, ValidationError } from "../core/errors.js";
import { attribute, type ResourceSchema } from "../core/schema.js";
import {
  MimirResource,
  type Created,
  type Plan,
  type Prior,
  type ProviderContext,
  type ReadResult,
} from "./resource.js";

const AlertmanagerPropsSchema = z.object({
  config_yaml: z.string(),
  templates_config_yaml: z.record(z.string(), z.string()).default({}),
});

const AlertmanagerStateSchema = z.object({
  config_yaml: z.string(),
  templates_config_yaml: z.record(z.string(), z.string()).default({}),
});

export type AlertmanagerProps = z.output<typeof AlertmanagerPropsSchema>;
export type AlertmanagerState = z.output<typeof AlertmanagerStateSchema>;

export const DEFAULT_ALERTMANAGER_ID = "alertmanager";

const invalid = (message: string): ValidationError => ({
  path: ["config_yaml"],
  message,
  code: "INVALID_YAML",
});

/**
 * Parses an alertmanager configuration and re-serializes it with sorted
 * keys, so that formatting differences do not show up as changes.
 */
export const canonicalAlertmanagerYaml = (text: string): Result<string, ValidationError> => {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    return err(invalid(`invalid YAML: ${doc.errors.map((e) => e.message).join("; ")}`));
  }
  if (!isMap(doc.contents)) {
    return err(invalid("alertmanager configuration must be a YAML mapping"));
  }
  if (!isMap(doc.get("route"))) {
    return err(invalid('alertmanager configuration must define a "route" mapping'));
  }
  return ok(stringifyYaml(doc.toJS(), { sortMapEntries: true, lineWidth: 0 }));
};

const sameTemplates = (
  a: Readonly<Record<string, string>>,
  b: Readonly<Record<string, string>>,
): boolean => {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((k) => a[k] === b[k]);
};

const toApiConfig = (props: AlertmanagerProps): AlertmanagerConfig => ({
  alertmanagerConfig: props.config_yaml,
  templateFiles: props.templates_config_yaml,
});

export class AlertmanagerResource extends MimirResource<AlertmanagerProps, AlertmanagerState> {
  override readonly typeName = "mimirtool_alertmanager";

  override readonly schema: ResourceSchema = {
    version: 0,
    block: {
      description: "Manages the alertmanager configuration of the provider's tenant.",
      description_kind: "markdown",
      attributes: {
        id: attribute("string", "The tenant the configuration belongs to.", { computed: true }),
        config_yaml: attribute("string", "The Alertmanager configuration to load in Grafana Mimir.", {
          required: true,
        }),
        templates_config_yaml: attribute(
          ["map", "string"],
          "The templates to load along with the configuration, keyed by file name.",
        ),
      },
    },
  };

  protected override readonly propsSchema = AlertmanagerPropsSchema;
  protected override readonly stateSchema = AlertmanagerStateSchema;

  private stateOf(props: AlertmanagerProps): Result<AlertmanagerState, MimirtoolError> {
    return canonicalAlertmanagerYaml(props.config_yaml)
      .map((config_yaml) => ({
        config_yaml,
        templates_config_yaml: props.templates_config_yaml,
      }))
      .mapErr((error): MimirtoolError => ({ kind: "validation", errors: [error] }));
  }

  override async plan(
    _ctx: ProviderContext,
    nextProps: AlertmanagerProps,
    prior: Prior<AlertmanagerProps, AlertmanagerState> | null,
  ): Promise<Result<Plan<AlertmanagerProps>, MimirtoolError>> {
    const next = this.stateOf(nextProps);
    if (next.isErr()) {
      return err(next.error);
    }

    const hasChanges =
      prior === null ||
      prior.state.config_yaml !== next.value.config_yaml ||
      !sameTemplates(prior.state.templates_config_yaml, next.value.templates_config_yaml);

    return ok({ props: nextProps, hasChanges, requiresReplacement: false, diagnostics: [] });
  }

  override async create(
    ctx: ProviderContext,
    props: AlertmanagerProps,
  ): Promise<Result<Created<AlertmanagerState>, MimirtoolError>> {
    const state = await this.apply(ctx, props);
    return state.map((s) => ({ id: ctx.tenantId ?? DEFAULT_ALERTMANAGER_ID, state: s }));
  }

  override async read(
    ctx: ProviderContext,
    _id: string,
    props: AlertmanagerProps,
  ): Promise<Result<ReadResult<AlertmanagerProps, AlertmanagerState>, MimirtoolError>> {
    const remote = await ctx.client.getAlertmanagerConfig();
    if (remote.isErr()) {
      if (remote.error.kind === "not_found") {
        ctx.logger.warn("alertmanager configuration not found, removing from state");
        return ok({ exists: false });
      }
      return err(remote.error);
    }

    const remoteProps: AlertmanagerProps = {
      ...props,
      config_yaml: remote.value.alertmanagerConfig,
      templates_config_yaml: { ...remote.value.templateFiles },
    };
    return this.stateOf(remoteProps).map(
      (state): ReadResult<AlertmanagerProps, AlertmanagerState> => ({
        exists: true,
        props: remoteProps,
        state,
      }),
    );
  }

  override async update(
    ctx: ProviderContext,
    _id: string,
    nextProps: AlertmanagerProps,
  ): Promise<Result<AlertmanagerState, MimirtoolError>> {
    return this.apply(ctx, nextProps);
  }

  override async delete(ctx: ProviderContext): Promise<Result<void, MimirtoolError>> {
    const deleted = await ctx.client.deleteAlertmanagerConfig();
    if (deleted.isErr() && deleted.error.kind !== "not_found") {
      return err(deleted.error);
    }
    ctx.logger.info("alertmanager configuration deleted");
    return ok(undefined);
  }

  private async apply(
    ctx: ProviderContext,
    props: AlertmanagerProps,
  ): Promise<Result<AlertmanagerState, MimirtoolError>> {
    const state = this.stateOf(props);
    if (state.isErr()) {
      return err(state.error);
    }
    const posted = await ctx.client.createAlertmanagerConfig(toApiConfig(props));
    if (posted.isErr()) {
      return err(posted.error);
    }
    ctx.logger.info(
      { templates: Object.keys(props.templates_config_yaml).length },
      "alertmanager configuration applied",
    );
    return ok(state.value);
  }
}
