import { Command, CommanderError } from "commander";
import { ConfigCheckRunner } from "./runner.js";
import { resolveSettings } from "./settings.js";
import type { CliOptions } from "./settings.js";

export const EXIT_MISMATCH = 1;
export const EXIT_FAILURE = 2;

/**
 * Exit status for an error thrown while parsing or running a command.
 * Help and version output keep commander's own status of 0; every other
 * failure, usage errors included, maps to EXIT_FAILURE so that it stays
 * distinct from a mismatch.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError && error.exitCode === 0) return 0;
  return EXIT_FAILURE;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("config-check")
    .description(
      "Check that actual configuration trees contain the expected settings"
    )
    .option(
      "--format <format>",
      "Parse inputs as yaml or json (default: by file extension)"
    )
    .option("-q, --quiet", "Only print the summary counts");

  // Commands added below inherit the override.
  program.exitOverride();

  const runnerFor = (): ConfigCheckRunner =>
    new ConfigCheckRunner(resolveSettings(program.opts<CliOptions>()));

  const finish = (clean: boolean): void => {
    if (!clean) process.exitCode = EXIT_MISMATCH;
  };

  program
    .command("compare")
    .description("Compare an expected configuration file against an actual one")
    .argument("<expected>", "File holding the expected settings")
    .argument("<actual>", "File holding the observed configuration")
    .option(
      "--path <dotted>",
      "Compare against this subtree of the actual file"
    )
    .action(
      async (expected: string, actual: string, options: { path?: string }) => {
        const runner = runnerFor();
        finish(await runner.compareFiles(expected, actual, options.path));
      }
    );

  program
    .command("stage")
    .description("Validate one stage of a pipeline definition")
    .argument("<pipeline>", "Pipeline YAML file")
    .argument("<context>", "File holding the expected stage or step settings")
    .requiredOption("--stage <id>", "Identifier of the stage to validate")
    .option("--steps", "Treat the context as expected step properties", false)
    .action(
      async (
        pipeline: string,
        context: string,
        options: { stage: string; steps: boolean }
      ) => {
        const runner = runnerFor();
        finish(
          await runner.checkStage(
            pipeline,
            context,
            options.stage,
            options.steps
          )
        );
      }
    );

  program
    .command("workspace")
    .description("Validate a workspace configuration")
    .argument("<workspace>", "File holding the workspace configuration")
    .argument("<context>", "File holding the expected workspace settings")
    .action(async (workspace: string, context: string) => {
      finish(await runnerFor().checkWorkspace(workspace, context));
    });

  return program;
}
