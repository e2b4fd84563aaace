import type { ConfigFormat } from "./types.js";

export type CliOptions = {
  format?: string;
  quiet?: boolean;
};

export interface Settings {
  format?: ConfigFormat;
  quiet: boolean;
}

const FORMATS: ReadonlyArray<ConfigFormat> = ["yaml", "json"];

export function parseFormat(
  value: string | undefined
): ConfigFormat | undefined {
  if (value === undefined || value === "") return undefined;
  const format = FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    const known = FORMATS.join(", ");
    throw new Error(
      `Unsupported format "${value}" (expected one of: ${known})`
    );
  }
  return format;
}

/**
 * Merges command-line options with CONFIG_CHECK_* environment variables.
 * Command-line options take precedence.
 */
export function resolveSettings(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  return {
    format: parseFormat(options.format ?? env.CONFIG_CHECK_FORMAT),
    quiet: options.quiet ?? env.CONFIG_CHECK_QUIET === "1",
  };
}
