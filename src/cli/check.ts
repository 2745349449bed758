import { ok, err, type Result } from "neverthrow";
import { sensitiveValues, type Env } from "../config/provider-config.js";
import { fromError, redactDiagnostics, type Diagnostic } from "../core/diagnostics.js";
import type { Provider } from "../provider/provider.js";

export type CheckReport = {
  readonly namespaces: number;
  readonly groups: number;
  readonly alertmanagerStatus?: string;
  readonly alertmanagerVersion?: string;
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Configures the provider from the environment and probes the ruler and
 * alertmanager endpoints.
 */
export const runCheck = async (
  provider: Provider,
  env: Env,
): Promise<Result<CheckReport, readonly Diagnostic[]>> => {
  const configured = await provider.configure({}, env);
  if (configured.isErr()) {
    return err(configured.error);
  }
  const { context, diagnostics } = configured.value;
  const secrets = sensitiveValues({}, env);

  const rules = await context.client.listRules();
  if (rules.isErr()) {
    return err(redactDiagnostics(fromError(rules.error), secrets));
  }
  const namespaces = Object.values(rules.value);

  const status = await context.client.getAlertmanagerStatus();
  if (status.isErr()) {
    return err(redactDiagnostics(fromError(status.error), secrets));
  }

  return ok({
    namespaces: namespaces.length,
    groups: namespaces.reduce((sum, groups) => sum + groups.length, 0),
    ...(status.value.clusterStatus !== undefined
      ? { alertmanagerStatus: status.value.clusterStatus }
      : {}),
    ...(status.value.version !== undefined ? { alertmanagerVersion: status.value.version } : {}),
    diagnostics,
  });
};

export const formatCheckReport = (report: CheckReport): string => {
  const lines = [
    `ruler: ${report.namespaces} namespace(s), ${report.groups} rule group(s)`,
    `alertmanager: ${report.alertmanagerStatus ?? "unknown"} (version ${report.alertmanagerVersion ?? "unknown"})`,
  ];
  return lines.join("\n");
};
