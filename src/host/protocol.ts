import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import { sensitiveValues, type Env } from "../config/provider-config.js";
import {
  errorDiagnostic,
  fromError,
  redactDiagnostics,
  type Diagnostic,
} from "../core/diagnostics.js";
import { errorMessage } from "../core/errors.js";
import type { Provider } from "../provider/provider.js";

const RequestSchema = z.object({
  provider: z.record(z.string(), z.unknown()).default({}),
  resource: z.string().min(1),
  operation: z.enum(["plan", "create", "read", "update", "delete"]),
  id: z.string().optional(),
  props: z.unknown().optional(),
  prior_props: z.unknown().optional(),
  state: z.unknown().optional(),
});

export type HostRequest = z.input<typeof RequestSchema>;

export type HostResponse =
  | { readonly ok: true; readonly result: unknown; readonly diagnostics: readonly Diagnostic[] }
  | { readonly ok: false; readonly diagnostics: readonly Diagnostic[] };

const failure = (diagnostics: readonly Diagnostic[]): HostResponse => ({ ok: false, diagnostics });

export const parseRequestJson = (text: string): Result<unknown, Diagnostic> => {
  try {
    return ok(JSON.parse(text));
  } catch (e) {
    return err(errorDiagnostic("Invalid request", `request is not valid JSON: ${errorMessage(e)}`));
  }
};

/**
 * Runs one resource operation: configures the provider from the request's
 * provider block and the environment, then dispatches to the resource.
 */
export const handleRequest = async (
  provider: Provider,
  raw: unknown,
  env: Env,
): Promise<HostResponse> => {
  const parsed = RequestSchema.safeParse(raw);
  if (!parsed.success) {
    return failure(
      parsed.error.issues.map((issue) =>
        errorDiagnostic("Invalid request", issue.message, issue.path.map(String)),
      ),
    );
  }
  const request = parsed.data;

  const resource = provider.resources.get(request.resource);
  if (resource === undefined) {
    return failure([
      errorDiagnostic("Unknown resource type", `"${request.resource}" is not provided by this provider`),
    ]);
  }

  const configured = await provider.configure(request.provider, env);
  if (configured.isErr()) {
    return failure(configured.error);
  }
  const { context, diagnostics } = configured.value;

  const result = await resource.invoke(context, request.operation, {
    ...(request.id !== undefined ? { id: request.id } : {}),
    props: request.props,
    priorProps: request.prior_props,
    state: request.state,
  });

  if (result.isErr()) {
    const secrets = sensitiveValues(request.provider, env);
    return failure([...diagnostics, ...redactDiagnostics(fromError(result.error), secrets)]);
  }
  return { ok: true, result: result.value, diagnostics };
};
