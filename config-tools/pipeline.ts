import { compare } from "./comparator.js";
import { parseConfig } from "./loader.js";
import type {
  ConfigMapping,
  ConfigValue,
  MismatchReport,
  StageDetails,
  StageMap,
  StageMismatch,
} from "./types.js";
import {
  isConfigMapping,
  isConfigSequence,
  joinPath,
  selectPath,
} from "./values.js";

const EMPTY_MAPPING: ConfigMapping = Object.freeze({});

function textField(mapping: ConfigMapping, key: string): string | undefined {
  const value = mapping[key];
  return typeof value === "string" ? value : undefined;
}

function entriesAt(
  tree: ConfigValue | undefined,
  path: string
): ReadonlyArray<ConfigValue> {
  const value = tree === undefined ? undefined : selectPath(tree, path);
  return isConfigSequence(value) ? value : [];
}

function toStageDetails(stage: ConfigMapping): StageDetails {
  const spec = stage["spec"];
  return {
    identifier: textField(stage, "identifier") ?? "",
    description: textField(stage, "description") ?? "",
    type: textField(stage, "type") ?? "",
    spec: isConfigMapping(spec) ? spec : EMPTY_MAPPING,
  };
}

/**
 * Collects the stages of a pipeline definition keyed by stage name.
 * Stages nested under `parallel` are flattened in document order.
 */
export function parsePipeline(tree: ConfigValue): StageMap {
  const flatStages: ConfigMapping[] = [];

  for (const entry of entriesAt(tree, "pipeline.stages")) {
    if (!isConfigMapping(entry)) continue;

    const stage = entry["stage"];
    if (isConfigMapping(stage)) {
      flatStages.push(stage);
      continue;
    }

    for (const parallelEntry of entriesAt(entry, "parallel")) {
      const parallelStage = isConfigMapping(parallelEntry)
        ? parallelEntry["stage"]
        : undefined;
      if (isConfigMapping(parallelStage)) {
        flatStages.push(parallelStage);
      }
    }
  }

  const stages = new Map<string, StageDetails>();
  for (const stage of flatStages) {
    const details = toStageDetails(stage);
    stages.set(textField(stage, "name") ?? details.identifier, details);
  }
  return stages;
}

export function parsePipelineYaml(yamlText: string, source?: string): StageMap {
  return parsePipeline(parseConfig(yamlText, { format: "yaml", source }));
}

export function getStageIdentifier(
  stages: StageMap,
  stageType: string,
  serviceName?: string
): string | undefined {
  for (const stage of stages.values()) {
    if (stage.type !== stageType) continue;
    if (serviceName === undefined) return stage.identifier;

    const serviceRef = selectPath(stage.spec, "service.serviceRef");
    if (
      typeof serviceRef === "string" &&
      serviceRef.toLowerCase() === serviceName.toLowerCase()
    ) {
      return stage.identifier;
    }
  }
  return undefined;
}

function flattenSteps(
  entries: ReadonlyArray<ConfigValue>,
  out: ConfigMapping[]
): void {
  for (const entry of entries) {
    if (!isConfigMapping(entry)) continue;

    const step = entry["step"];
    if (isConfigMapping(step)) {
      out.push(step);
    } else if (isConfigSequence(entry["parallel"])) {
      flattenSteps(entriesAt(entry, "parallel"), out);
    } else if (isConfigMapping(entry["stepGroup"])) {
      flattenSteps(entriesAt(entry, "stepGroup.steps"), out);
    }
  }
}

/**
 * Every step of a stage's execution, with parallel blocks and step groups
 * flattened.
 */
export function collectSteps(stage: StageDetails): ConfigMapping[] {
  const steps: ConfigMapping[] = [];
  flattenSteps(entriesAt(stage.spec, "execution.steps"), steps);
  return steps;
}

function matchesStepKey(step: ConfigMapping, stepKey: string): boolean {
  const wanted = stepKey.toLowerCase();
  return ["type", "name", "identifier"].some(
    (field) => textField(step, field)?.toLowerCase() === wanted
  );
}

function stagesWithId(
  stages: StageMap,
  stageId: string
): Array<[string, StageDetails]> {
  const wanted = stageId.toLowerCase();
  return [...stages].filter(
    ([, stage]) => stage.identifier.toLowerCase() === wanted
  );
}

function stageNotFound(stageId: string, expected: ConfigValue): StageMismatch {
  return Object.freeze({
    path: stageId,
    expected,
    missing: true,
    message: `stage '${stageId}' not found.`,
    stageName: stageId,
    stageType: "",
  });
}

function tagMismatches(
  report: MismatchReport,
  stageName: string,
  stage: StageDetails,
  stepKey?: string
): StageMismatch[] {
  return report.map((mismatch) =>
    Object.freeze({
      ...mismatch,
      stageName,
      stageType: stage.type,
      ...(stepKey === undefined ? {} : { stepKey }),
    })
  );
}

/**
 * Checks the steps of the stage(s) with the given identifier. Each key of
 * `stepContext` names a step by type, name or identifier; its value is the
 * subset of properties every matching step must carry.
 */
export function validateStepsInStage(
  stages: StageMap,
  stageId: string,
  stepContext: ConfigMapping
): StageMismatch[] {
  const matched = stagesWithId(stages, stageId);
  if (matched.length === 0) return [stageNotFound(stageId, stepContext)];

  const mismatches: StageMismatch[] = [];
  for (const [stageName, stage] of matched) {
    const steps = collectSteps(stage);

    for (const [stepKey, expectedProperties] of Object.entries(stepContext)) {
      const path = joinPath(stageName, stepKey);
      const matchingSteps = steps.filter((step) =>
        matchesStepKey(step, stepKey)
      );

      if (matchingSteps.length === 0) {
        mismatches.push(
          Object.freeze({
            path,
            expected: expectedProperties,
            missing: true,
            message:
              `step '${stepKey}' not found in stage '${stageName}' ` +
              `with type '${stage.type}'.`,
            stageName,
            stageType: stage.type,
            stepKey,
          })
        );
        continue;
      }

      for (const step of matchingSteps) {
        mismatches.push(
          ...tagMismatches(
            compare(expectedProperties, step, path),
            stageName,
            stage,
            stepKey
          )
        );
      }
    }
  }
  return mismatches;
}

/** Checks the `spec` of the stage(s) with the given identifier. */
export function validateStageConfiguration(
  stages: StageMap,
  stageId: string,
  stageContext: ConfigMapping
): StageMismatch[] {
  const matched = stagesWithId(stages, stageId);
  if (matched.length === 0) return [stageNotFound(stageId, stageContext)];

  return matched.flatMap(([stageName, stage]) =>
    tagMismatches(
      compare(stageContext, stage.spec, stageName),
      stageName,
      stage
    )
  );
}

export function validateWorkspaceConfiguration(
  workspace: ConfigValue,
  workspaceContext: ConfigValue
): MismatchReport {
  return compare(workspaceContext, workspace);
}
