export type MimirtoolError =
  | { readonly kind: "config"; readonly errors: readonly ConfigError[] }
  | { readonly kind: "validation"; readonly errors: readonly ValidationError[] }
  | { readonly kind: "client"; readonly message: string }
  | { readonly kind: "http"; readonly status: number; readonly message: string }
  | { readonly kind: "not_found"; readonly message: string }
  | { readonly kind: "network"; readonly message: string }
  | { readonly kind: "invalid_path"; readonly message: string }
  | { readonly kind: "io"; readonly message: string; readonly path: string }
  | { readonly kind: "parse"; readonly message: string };

export type ClientError = Extract<
  MimirtoolError,
  { readonly kind: "http" | "not_found" | "network" | "invalid_path" | "parse" }
>;

export type ConfigError = {
  readonly field: string;
  readonly message: string;
};

export type ValidationError = {
  readonly path: readonly string[];
  readonly message: string;
  readonly code: ValidationErrorCode;
};

export type ValidationErrorCode =
  | "MISSING_REQUIRED_FIELD"
  | "INVALID_FIELD_TYPE"
  | "INVALID_YAML"
  | "DUPLICATE_GROUP"
  | "INVALID_RULE"
  | "INVALID_METRIC_NAME"
  | "UNKNOWN";

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
