import { compare } from "./comparator.js";
import { loadConfigFile } from "./loader.js";
import {
  parsePipeline,
  validateStageConfiguration,
  validateStepsInStage,
  validateWorkspaceConfiguration,
} from "./pipeline.js";
import { printReport } from "./reporter.js";
import type { Settings } from "./settings.js";
import type { ConfigMapping, ConfigValue } from "./types.js";
import { isConfigMapping, selectPath } from "./values.js";

function requireMapping(value: ConfigValue, source: string): ConfigMapping {
  if (!isConfigMapping(value)) {
    throw new Error(`${source} must contain a mapping at its top level`);
  }
  return value;
}

/**
 * File-level entry points behind each CLI command. Each resolves to true
 * when the report is clean.
 */
export class ConfigCheckRunner {
  constructor(private readonly settings: Settings) {}

  async compareFiles(
    expectedPath: string,
    actualPath: string,
    subtree?: string
  ): Promise<boolean> {
    const expected = await loadConfigFile(expectedPath, this.settings.format);
    const actualRoot = await loadConfigFile(actualPath, this.settings.format);

    const actual = subtree ? selectPath(actualRoot, subtree) : actualRoot;
    if (actual === undefined) {
      throw new Error(`Path "${subtree}" not found in ${actualPath}`);
    }

    return printReport(compare(expected, actual, subtree ?? ""), {
      title: `Comparing ${actualPath} against ${expectedPath}`,
      quiet: this.settings.quiet,
    });
  }

  async checkStage(
    pipelinePath: string,
    contextPath: string,
    stageId: string,
    steps: boolean
  ): Promise<boolean> {
    const pipeline = await loadConfigFile(pipelinePath, this.settings.format);
    const stages = parsePipeline(pipeline);
    const context = requireMapping(
      await loadConfigFile(contextPath, this.settings.format),
      contextPath
    );
    console.log(`   📋 Found ${stages.size} stages in ${pipelinePath}`);

    const subject = steps ? "steps" : "configuration";
    const report = steps
      ? validateStepsInStage(stages, stageId, context)
      : validateStageConfiguration(stages, stageId, context);

    return printReport(report, {
      title: `Validating ${subject} of stage '${stageId}'`,
      quiet: this.settings.quiet,
    });
  }

  async checkWorkspace(
    workspacePath: string,
    contextPath: string
  ): Promise<boolean> {
    const workspace = await loadConfigFile(workspacePath, this.settings.format);
    const context = await loadConfigFile(contextPath, this.settings.format);

    return printReport(validateWorkspaceConfiguration(workspace, context), {
      title: `Validating workspace configuration ${workspacePath}`,
      quiet: this.settings.quiet,
    });
  }
}
