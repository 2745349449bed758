import { ok, err, type Result } from "neverthrow";
import type { z } from "zod";
import type { MimirClient } from "../client/types.js";
import type { Diagnostic } from "../core/diagnostics.js";
import type { MimirtoolError, ValidationError } from "../core/errors.js";
import type { ResourceSchema } from "../core/schema.js";
import type { Logger } from "../logger.js";

/**
 * Everything a resource operation may depend on. Built once by the
 * provider's configure step and handed to every operation.
 */
export type ProviderContext = {
  readonly client: MimirClient;
  readonly storeRulesSha256: boolean;
  readonly tenantId?: string;
  readonly logger: Logger;
};

export type Prior<TProps, TState> = {
  readonly id: string;
  readonly props: TProps;
  readonly state: TState;
};

export type Plan<TProps> = {
  readonly props: TProps;
  readonly hasChanges: boolean;
  readonly requiresReplacement: boolean;
  readonly diagnostics: readonly Diagnostic[];
};

export type Created<TState> = { readonly id: string; readonly state: TState };

export type ReadResult<TProps, TState> =
  | { readonly exists: true; readonly props: TProps; readonly state: TState }
  | { readonly exists: false };

export type Operation = "plan" | "create" | "read" | "update" | "delete";

export type OperationInput = {
  readonly id?: string;
  readonly props?: unknown;
  readonly priorProps?: unknown;
  readonly state?: unknown;
};

export type ResourceHandler = {
  readonly typeName: string;
  readonly schema: ResourceSchema;
  readonly invoke: (
    ctx: ProviderContext,
    operation: Operation,
    input: OperationInput,
  ) => Promise<Result<unknown, MimirtoolError>>;
};

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const parseWith = <T>(
  schema: Schema<T>,
  value: unknown,
  label: string,
): Result<T, MimirtoolError> => {
  const result = schema.safeParse(value);
  if (result.success) {
    return ok(result.data);
  }
  const errors: ValidationError[] = result.error.issues.map((issue) => ({
    path: issue.path.map(String),
    message: `${label}: ${issue.message}`,
    code: "INVALID_FIELD_TYPE",
  }));
  return err({ kind: "validation", errors });
};

const requireId = (id: string | undefined): Result<string, MimirtoolError> =>
  id !== undefined && id !== ""
    ? ok(id)
    : err({
        kind: "validation",
        errors: [{ path: ["id"], message: "resource id is required", code: "MISSING_REQUIRED_FIELD" }],
      });

/**
 * Base for managed resources. Subclasses implement the typed operations;
 * `invoke` parses untyped host input and dispatches to them.
 */
export abstract class MimirResource<TProps, TState> implements ResourceHandler {
  abstract readonly typeName: string;
  abstract readonly schema: ResourceSchema;
  protected abstract readonly propsSchema: Schema<TProps>;
  protected abstract readonly stateSchema: Schema<TState>;

  abstract plan(
    ctx: ProviderContext,
    nextProps: TProps,
    prior: Prior<TProps, TState> | null,
  ): Promise<Result<Plan<TProps>, MimirtoolError>>;

  abstract create(
    ctx: ProviderContext,
    props: TProps,
  ): Promise<Result<Created<TState>, MimirtoolError>>;

  abstract read(
    ctx: ProviderContext,
    id: string,
    props: TProps,
  ): Promise<Result<ReadResult<TProps, TState>, MimirtoolError>>;

  abstract update(
    ctx: ProviderContext,
    id: string,
    nextProps: TProps,
    currentProps: TProps,
    currentState: TState,
  ): Promise<Result<TState, MimirtoolError>>;

  abstract delete(
    ctx: ProviderContext,
    id: string,
    props: TProps,
    state: TState,
  ): Promise<Result<void, MimirtoolError>>;

  parseProps(value: unknown): Result<TProps, MimirtoolError> {
    return parseWith(this.propsSchema, value, "props");
  }

  parseState(value: unknown): Result<TState, MimirtoolError> {
    return parseWith(this.stateSchema, value, "state");
  }

  invoke = async (
    ctx: ProviderContext,
    operation: Operation,
    input: OperationInput,
  ): Promise<Result<unknown, MimirtoolError>> => {
    ctx.logger.debug({ resource: this.typeName, operation, id: input.id }, "invoking resource");

    const props = this.parseProps(input.props);
    if (props.isErr()) {
      return err(props.error);
    }

    switch (operation) {
      case "plan": {
        if (input.id === undefined) {
          return this.plan(ctx, props.value, null);
        }
        const prior = this.parsePrior(input);
        if (prior.isErr()) {
          return err(prior.error);
        }
        return this.plan(ctx, props.value, prior.value);
      }
      case "create":
        return this.create(ctx, props.value);
      case "read": {
        const id = requireId(input.id);
        if (id.isErr()) {
          return err(id.error);
        }
        return this.read(ctx, id.value, props.value);
      }
      case "update": {
        const prior = this.parsePrior(input);
        if (prior.isErr()) {
          return err(prior.error);
        }
        const { id, props: currentProps, state } = prior.value;
        const next = await this.update(ctx, id, props.value, currentProps, state);
        return next.map((nextState) => ({ id, state: nextState }));
      }
      case "delete": {
        const id = requireId(input.id);
        if (id.isErr()) {
          return err(id.error);
        }
        const state = this.parseState(input.state);
        if (state.isErr()) {
          return err(state.error);
        }
        const deleted = await this.delete(ctx, id.value, props.value, state.value);
        return deleted.map(() => null);
      }
    }
  };

  private parsePrior(input: OperationInput): Result<Prior<TProps, TState>, MimirtoolError> {
    const id = requireId(input.id);
    if (id.isErr()) {
      return err(id.error);
    }
    const currentProps = this.parseProps(input.priorProps ?? input.props);
    if (currentProps.isErr()) {
      return err(currentProps.error);
    }
    const state = this.parseState(input.state);
    if (state.isErr()) {
      return err(state.error);
    }
    return ok({ id: id.value, props: currentProps.value, state: state.value });
  }
}
