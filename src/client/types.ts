import type { Result } from "neverthrow";
import type { ClientError } from "../core/errors.js";
import type { RuleGroup, RuleGroupsByNamespace } from "../rules/rule-group.js";

export type AlertmanagerConfig = {
  readonly alertmanagerConfig: string;
  readonly templateFiles: Readonly<Record<string, string>>;
};

export type AlertmanagerStatus = {
  readonly clusterStatus?: string;
  readonly version?: string;
};

/**
 * Operations the resources need from Mimir. Every method resolves to a
 * Result; none of them throws.
 */
export type MimirClient = {
  readonly createRuleGroup: (
    namespace: string,
    group: RuleGroup,
  ) => Promise<Result<void, ClientError>>;
  readonly getRuleGroup: (
    namespace: string,
    groupName: string,
  ) => Promise<Result<RuleGroup, ClientError>>;
  readonly listRules: (namespace?: string) => Promise<Result<RuleGroupsByNamespace, ClientError>>;
  readonly deleteRuleGroup: (
    namespace: string,
    groupName: string,
  ) => Promise<Result<void, ClientError>>;
  readonly deleteNamespace: (namespace: string) => Promise<Result<void, ClientError>>;
  readonly getAlertmanagerConfig: () => Promise<Result<AlertmanagerConfig, ClientError>>;
  readonly createAlertmanagerConfig: (
    config: AlertmanagerConfig,
  ) => Promise<Result<void, ClientError>>;
  readonly deleteAlertmanagerConfig: () => Promise<Result<void, ClientError>>;
  readonly getAlertmanagerStatus: () => Promise<Result<AlertmanagerStatus, ClientError>>;
};
