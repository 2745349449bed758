import type { Diagnostic } from "../core/diagnostics.js";

export const formatDiagnostic = (d: Diagnostic): string => {
  const where =
    d.attribute !== undefined && d.attribute.length > 0 ? ` [${d.attribute.join(".")}]` : "";
  return `${d.severity === "error" ? "Error" : "Warning"}: ${d.summary}${where}: ${d.detail}`;
};
