import { createHash } from "node:crypto";
import { ok, err, type Result } from "neverthrow";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { errorMessage, type ValidationError, type ValidationErrorCode } from "../core/errors.js";

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

const RuleSchema = z
  .object({
    record: z.string().optional(),
    alert: z.string().optional(),
    expr: scalar,
    for: z.string().optional(),
    keep_firing_for: z.string().optional(),
    labels: z.record(z.string(), scalar).optional(),
    annotations: z.record(z.string(), scalar).optional(),
  })
  .strict();

const RuleGroupSchema = z
  .object({
    name: z.string(),
    interval: z.string().optional(),
    query_offset: z.string().optional(),
    evaluation_delay: z.string().optional(),
    limit: z.number().int().nonnegative().optional(),
    source_tenants: z.array(z.string()).optional(),
    align_evaluation_time_on_interval: z.boolean().optional(),
    rules: z.array(RuleSchema).default([]),
  })
  .strict();

const RuleNamespaceSchema = z.object({ groups: z.array(RuleGroupSchema).default([]) }).strict();

const RuleGroupListSchema = z.record(z.string(), z.array(RuleGroupSchema));

export type Rule = z.output<typeof RuleSchema>;
export type RuleGroup = z.output<typeof RuleGroupSchema>;
export type RuleGroupsByNamespace = Readonly<Record<string, readonly RuleGroup[]>>;

export type RuleCheckOptions = {
  /** Require recording rule names to follow the `level:metric:operation` convention. */
  readonly strictRecordingRuleNames?: boolean;
};

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const ATTRIBUTE = ["config_yaml"] as const;

const createError = (message: string, code: ValidationErrorCode): ValidationError => ({
  path: ATTRIBUTE,
  message,
  code,
});

const parseDocument = (text: string): Result<unknown, ValidationError> => {
  try {
    return ok(parseYaml(text));
  } catch (e) {
    return err(createError(`invalid YAML: ${errorMessage(e)}`, "INVALID_YAML"));
  }
};

const checkRule = (
  group: string,
  index: number,
  rule: Rule,
  options: RuleCheckOptions,
): readonly ValidationError[] => {
  const where = `group "${group}", rule ${index + 1}`;
  const errors: ValidationError[] = [];
  const isRecord = rule.record !== undefined;
  const isAlert = rule.alert !== undefined;

  if (isRecord === isAlert) {
    errors.push(createError(`${where}: exactly one of "record" or "alert" must be set`, "INVALID_RULE"));
  }
  if (rule.expr.trim() === "") {
    errors.push(createError(`${where}: "expr" must not be empty`, "MISSING_REQUIRED_FIELD"));
  }

  if (rule.record !== undefined) {
    if (!METRIC_NAME.test(rule.record)) {
      errors.push(
        createError(`${where}: invalid recording rule name "${rule.record}"`, "INVALID_METRIC_NAME"),
      );
    } else if (options.strictRecordingRuleNames === true && !rule.record.includes(":")) {
      errors.push(
        createError(
          `${where}: recording rule name "${rule.record}" does not match level:metric:operation format, must contain at least one colon`,
          "INVALID_METRIC_NAME",
        ),
      );
    }
    if (rule.for !== undefined || rule.keep_firing_for !== undefined) {
      errors.push(createError(`${where}: "for" is only valid on alerting rules`, "INVALID_RULE"));
    }
    if (rule.annotations !== undefined) {
      errors.push(
        createError(`${where}: "annotations" is only valid on alerting rules`, "INVALID_RULE"),
      );
    }
  }

  if (rule.alert !== undefined && rule.alert.trim() === "") {
    errors.push(createError(`${where}: "alert" must not be empty`, "MISSING_REQUIRED_FIELD"));
  }

  for (const name of Object.keys(rule.labels ?? {})) {
    if (!LABEL_NAME.test(name)) {
      errors.push(createError(`${where}: invalid label name "${name}"`, "INVALID_RULE"));
    }
  }

  return errors;
};

export const validateRuleGroups = (
  groups: readonly RuleGroup[],
  options: RuleCheckOptions = {},
): readonly ValidationError[] => {
  const errors: ValidationError[] = [];
  const seen = new Set<string>();

  for (const group of groups) {
    if (group.name.trim() === "") {
      errors.push(createError("rule group name must not be empty", "MISSING_REQUIRED_FIELD"));
    } else if (seen.has(group.name)) {
      errors.push(createError(`duplicate rule group name "${group.name}"`, "DUPLICATE_GROUP"));
    }
    seen.add(group.name);

    group.rules.forEach((rule, index) => {
      errors.push(...checkRule(group.name, index, rule, options));
    });
  }

  return errors;
};

/**
 * Parses a `groups:` document and checks every group and rule in it.
 */
export const parseRuleNamespaceYaml = (
  text: string,
  options: RuleCheckOptions = {},
): Result<readonly RuleGroup[], readonly ValidationError[]> => {
  const doc = parseDocument(text);
  if (doc.isErr()) {
    return err([doc.error]);
  }

  const result = RuleNamespaceSchema.safeParse(doc.value ?? {});
  if (!result.success) {
    return err(
      result.error.issues.map((issue) =>
        createError(
          `${issue.path.join(".") || "document"}: ${issue.message}`,
          "INVALID_FIELD_TYPE",
        ),
      ),
    );
  }

  const errors = validateRuleGroups(result.data.groups, options);
  return errors.length > 0 ? err(errors) : ok(result.data.groups);
};

export const parseRuleGroupYaml = (text: string): Result<RuleGroup, string> => {
  const doc = parseDocument(text);
  if (doc.isErr()) {
    return err(doc.error.message);
  }
  const result = RuleGroupSchema.safeParse(doc.value);
  return result.success ? ok(result.data) : err(result.error.message);
};

export const parseRuleGroupListYaml = (text: string): Result<RuleGroupsByNamespace, string> => {
  const doc = parseDocument(text);
  if (doc.isErr()) {
    return err(doc.error.message);
  }
  const result = RuleGroupListSchema.safeParse(doc.value ?? {});
  return result.success ? ok(result.data) : err(result.error.message);
};

const compareCodeUnits = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const sortedRecord = (
  record: Readonly<Record<string, string>> | undefined,
): Record<string, string> | undefined =>
  record === undefined
    ? undefined
    : Object.fromEntries(Object.entries(record).sort(([a], [b]) => compareCodeUnits(a, b)));

const canonicalGroup = (group: RuleGroup): RuleGroup => ({
  ...group,
  rules: group.rules.map((rule) => ({
    ...rule,
    labels: sortedRecord(rule.labels),
    annotations: sortedRecord(rule.annotations),
  })),
});

export const ruleGroupYaml = (group: RuleGroup): string =>
  stringifyYaml(canonicalGroup(group), { lineWidth: 0 });

/**
 * Stable serialization: groups sorted by name, label and annotation keys
 * sorted, absent fields omitted.
 */
export const canonicalRuleNamespaceYaml = (groups: readonly RuleGroup[]): string => {
  const sorted = [...groups].sort((a, b) => compareCodeUnits(a.name, b.name)).map(canonicalGroup);
  return stringifyYaml({ groups: sorted }, { lineWidth: 0 });
};

export const sha256Hex = (text: string): string =>
  createHash("sha256").update(text).digest("hex");

export const ruleNamespaceSha256 = (groups: readonly RuleGroup[]): string =>
  sha256Hex(canonicalRuleNamespaceYaml(groups));
