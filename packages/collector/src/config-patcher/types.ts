type ConfigValue =
  | string
  | number
  | boolean
  | null
  | readonly ConfigValue[]
  | { readonly [key: string]: ConfigValue };

type ConfigMutation = {
  field: string;
  value: ConfigValue;
};

/**
 * Spelling of the non-string literals in the crawler's configuration syntax.
 */
type LiteralStyle = {
  true: string;
  false: string;
  null: string;
};

type PatchHandle = {
  readonly id: string;
  readonly artifactPath: string;
  readonly checksum: string;
  readonly takenAt: number;
};

type ConfigSnapshot = {
  id: string;
  artifactPath: string;
  checksum: string;
  takenAt: number;
  content: string;
};

export type {
  ConfigMutation,
  ConfigSnapshot,
  ConfigValue,
  LiteralStyle,
  PatchHandle,
};
