// Shapes follow `terraform providers schema -json`.

export type SchemaType =
  | "string"
  | "number"
  | "bool"
  | "dynamic"
  | readonly ["list", SchemaType]
  | readonly ["set", SchemaType]
  | readonly ["map", SchemaType];

export type AttributeSchema = {
  readonly type: SchemaType;
  readonly description?: string;
  readonly description_kind?: "plain" | "markdown";
  readonly required?: boolean;
  readonly optional?: boolean;
  readonly computed?: boolean;
  readonly sensitive?: boolean;
  readonly deprecated?: boolean;
};

export type SchemaBlock = {
  readonly attributes?: Readonly<Record<string, AttributeSchema>>;
  readonly description?: string;
  readonly description_kind?: "plain" | "markdown";
  readonly deprecated?: boolean;
};

export type ResourceSchema = {
  readonly version: number;
  readonly block: SchemaBlock;
};

export type ProviderSchemaEntry = {
  readonly provider: ResourceSchema;
  readonly resource_schemas?: Readonly<Record<string, ResourceSchema>>;
  readonly data_source_schemas?: Readonly<Record<string, ResourceSchema>>;
};

export type ProviderSchema = {
  readonly format_version: string;
  readonly provider_schemas: Readonly<Record<string, ProviderSchemaEntry>>;
};

type AttributeOptions = {
  readonly required?: boolean;
  readonly computed?: boolean;
  readonly sensitive?: boolean;
};

export const attribute = (
  type: SchemaType,
  description: string,
  options: AttributeOptions = {},
): AttributeSchema => ({
  type,
  description,
  description_kind: "markdown",
  ...(options.required === true ? { required: true } : { optional: true }),
  ...(options.computed === true ? { computed: true } : {}),
  ...(options.sensitive === true ? { sensitive: true } : {}),
});
