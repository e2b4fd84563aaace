import { readFile } from "fs/promises";
import { extname } from "path";
import yaml from "yaml";
import { z } from "zod";
import type { ZodIssue } from "zod";
import type { ConfigFormat, ConfigValue } from "./types.js";

function describeUnsupported(data: unknown): string {
  if (typeof data === "number") return String(data);
  if (data === undefined) return "undefined";
  if (data instanceof Date) return "a date";
  return `a value of type ${typeof data}`;
}

const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union(
    [
      z.string(),
      z.number(),
      z.boolean(),
      z.null(),
      z.array(configValueSchema),
      z.record(configValueSchema),
    ],
    {
      errorMap: (issue, ctx) => ({
        message:
          issue.code === "invalid_union"
            ? `${describeUnsupported(ctx.data)} is not a configuration value`
            : ctx.defaultError,
      }),
    }
  )
);

/**
 * A failing union nests the failures of its members. The deepest union
 * failure names the offending leaf.
 */
function deepestUnionIssue(
  issues: ReadonlyArray<ZodIssue>
): ZodIssue | undefined {
  let deepest: ZodIssue | undefined;

  for (const issue of issues) {
    if (issue.code !== "invalid_union") continue;

    const candidates = [
      issue,
      deepestUnionIssue(issue.unionErrors.flatMap((error) => error.issues)),
    ];
    for (const candidate of candidates) {
      if (
        candidate &&
        (!deepest || candidate.path.length > deepest.path.length)
      ) {
        deepest = candidate;
      }
    }
  }

  return deepest;
}

export class ConfigParseError extends Error {
  readonly source: string;

  constructor(
    source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to parse ${source}: ${message}`, options);
    this.name = "ConfigParseError";
    this.source = source;
  }
}

export interface ParseOptions {
  format?: ConfigFormat;
  source?: string;
}

export function detectFormat(filePath: string): ConfigFormat {
  return extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
}

function toConfigValue(raw: unknown, source: string): ConfigValue {
  // An empty YAML document parses to undefined.
  const result = configValueSchema.safeParse(raw === undefined ? null : raw);
  if (!result.success) {
    const { issues } = result.error;
    const issue = deepestUnionIssue(issues) ?? issues[0];
    const where =
      issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigParseError(
      source,
      `unsupported value${where}: ${issue?.message ?? "invalid input"}`,
      { cause: result.error }
    );
  }
  return result.data;
}

export function parseConfig(
  text: string,
  options: ParseOptions = {}
): ConfigValue {
  const source = options.source ?? "<text>";
  const format = options.format ?? "yaml";

  let raw: unknown;
  try {
    raw = format === "json" ? JSON.parse(text) : yaml.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(
      source,
      `invalid ${format.toUpperCase()}: ${reason}`,
      { cause: error }
    );
  }

  return toConfigValue(raw, source);
}

/** Parses every document of a multi-document YAML stream. */
export function parseDocuments(
  text: string,
  source: string = "<text>"
): ConfigValue[] {
  const documents = yaml.parseAllDocuments(text);
  const values: ConfigValue[] = [];

  for (const document of documents) {
    const [firstError] = document.errors;
    if (firstError) {
      throw new ConfigParseError(
        source,
        `invalid YAML: ${firstError.message}`,
        { cause: firstError }
      );
    }
    values.push(toConfigValue(document.toJS(), source));
  }

  return values;
}

export async function loadConfigFile(
  filePath: string,
  format?: ConfigFormat
): Promise<ConfigValue> {
  try {
    const content = await readFile(filePath, "utf-8");
    return parseConfig(content, {
      format: format ?? detectFormat(filePath),
      source: filePath,
    });
  } catch (error) {
    console.error(`   ❌ Failed to load ${filePath}:`, error);
    throw error;
  }
}
