export type ConfigScalar = string | number | boolean | null;

export type ConfigSequence = ReadonlyArray<ConfigValue>;

export type ConfigMapping = { readonly [key: string]: ConfigValue };

export type ConfigValue = ConfigScalar | ConfigSequence | ConfigMapping;

export type ConfigFormat = "yaml" | "json";

export interface Mismatch {
  readonly path: string;
  readonly expected: ConfigValue;
  // Absent when the path, an ancestor, or the list item was not found.
  readonly actual?: ConfigValue;
  readonly missing: boolean;
  readonly message: string;
}

export type MismatchReport = ReadonlyArray<Mismatch>;

export interface StageDetails {
  readonly identifier: string;
  readonly description: string;
  readonly type: string;
  readonly spec: ConfigMapping;
}

/** Stages keyed by name, in pipeline order. */
export type StageMap = ReadonlyMap<string, StageDetails>;

export interface StageMismatch extends Mismatch {
  readonly stageName: string;
  readonly stageType: string;
  readonly stepKey?: string;
}

export interface ReportOptions {
  title: string;
  quiet?: boolean;
}
