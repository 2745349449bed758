import type { MimirtoolError } from "./errors.js";

export type Severity = "error" | "warning";

export type Diagnostic = {
  readonly severity: Severity;
  readonly summary: string;
  readonly detail: string;
  readonly attribute?: readonly string[];
};

export const errorDiagnostic = (
  summary: string,
  detail: string,
  attribute?: readonly string[],
): Diagnostic => ({
  severity: "error",
  summary,
  detail,
  ...(attribute !== undefined ? { attribute } : {}),
});

export const warningDiagnostic = (summary: string, detail: string): Diagnostic => ({
  severity: "warning",
  summary,
  detail,
});

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((d) => d.severity === "error");

export const fromError = (error: MimirtoolError): readonly Diagnostic[] => {
  switch (error.kind) {
    case "config":
      return error.errors.map((e) =>
        errorDiagnostic("Invalid provider configuration", e.message, [e.field]),
      );
    case "validation":
      return error.errors.map((e) => errorDiagnostic("Invalid configuration", e.message, e.path));
    case "client":
      return [errorDiagnostic("Unable to create Mimir client", error.message)];
    case "http":
      return [errorDiagnostic(`Mimir API returned status ${error.status}`, error.message)];
    case "not_found":
      return [errorDiagnostic("Resource not found", error.message)];
    case "network":
      return [errorDiagnostic("Unable to reach Mimir", error.message)];
    case "invalid_path":
      return [errorDiagnostic("Invalid Mimir API path", error.message)];
    case "io":
      return [errorDiagnostic(`Unable to read ${error.path}`, error.message)];
    case "parse":
      return [errorDiagnostic("Unable to parse Mimir response", error.message)];
  }
};

const REDACTED = "(sensitive value)";

/**
 * Replaces every occurrence of the given secrets in diagnostic text.
 * Empty secrets are ignored.
 */
export const redactDiagnostics = (
  diagnostics: readonly Diagnostic[],
  secrets: readonly (string | undefined)[],
): readonly Diagnostic[] => {
  const needles = secrets.filter((s): s is string => s !== undefined && s !== "");
  if (needles.length === 0) {
    return diagnostics;
  }
  const scrub = (text: string): string =>
    needles.reduce((acc, needle) => acc.split(needle).join(REDACTED), text);

  return diagnostics.map((d) => ({ ...d, summary: scrub(d.summary), detail: scrub(d.detail) }));
};
