import type {
  ConfigMapping,
  ConfigScalar,
  ConfigSequence,
  ConfigValue,
  Mismatch,
  MismatchReport,
} from "./types.js";
import {
  formatValue,
  hasKey,
  isConfigMapping,
  isConfigSequence,
  isDeepEqual,
  joinPath,
  scalarEquals,
  shapeOf,
} from "./values.js";

const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ["true", true],
  ["yes", true],
  ["on", true],
  ["false", false],
  ["no", false],
  ["off", false],
]);

/**
 * Checks that an actual configuration tree contains an expected one.
 *
 * Mappings are matched key by key, sequences by membership of each expected
 * item, scalars by value. Keys present only in the actual tree are ignored.
 * Mismatches come back in the pre-order of the expected tree.
 */
export class ConfigComparator {
  compare(
    expected: ConfigValue,
    actual: ConfigValue,
    path: string = ""
  ): MismatchReport {
    const mismatches: Mismatch[] = [];
    this.visit(expected, actual, path, mismatches);
    return mismatches;
  }

  private visit(
    expected: ConfigValue,
    actual: ConfigValue,
    path: string,
    out: Mismatch[]
  ): void {
    if (isConfigMapping(expected)) {
      this.visitMapping(expected, actual, path, out);
    } else if (isConfigSequence(expected)) {
      this.visitSequence(expected, actual, path, out);
    } else {
      this.visitScalar(expected, actual, path, out);
    }
  }

  private visitMapping(
    expected: ConfigMapping,
    actual: ConfigValue,
    path: string,
    out: Mismatch[]
  ): void {
    const where = path || "<root>";
    const shapeNote = isConfigMapping(actual)
      ? ""
      : ` (expected a mapping at '${where}', found ${shapeOf(actual)})`;

    for (const [key, expectedChild] of Object.entries(expected)) {
      const childPath = joinPath(path, key);

      if (!isConfigMapping(actual) || !hasKey(actual, key)) {
        out.push(
          missing(
            childPath,
            expectedChild,
            `configuration key '${childPath}' not found${shapeNote}.`
          )
        );
        continue;
      }

      this.visit(expectedChild, actual[key], childPath, out);
    }
  }

  private visitSequence(
    expected: ConfigSequence,
    actual: ConfigValue,
    path: string,
    out: Mismatch[]
  ): void {
    const shapeNote = isConfigSequence(actual)
      ? ""
      : ` (expected a sequence, found ${shapeOf(actual)})`;

    for (const item of expected) {
      const found =
        isConfigSequence(actual) &&
        actual.some((candidate) => isDeepEqual(item, candidate));

      if (!found) {
        const label = formatValue(item);
        out.push(
          missing(
            path,
            item,
            `expected list item '${label}' not found at '${path}'${shapeNote}.`
          )
        );
      }
    }
  }

  private visitScalar(
    expected: ConfigScalar,
    actual: ConfigValue,
    path: string,
    out: Mismatch[]
  ): void {
    const wanted = coerceExpected(expected, actual);
    if (scalarEquals(wanted, actual)) return;

    const expectedText = formatValue(wanted);
    const actualText = formatValue(actual);
    out.push(
      Object.freeze({
        path,
        expected: wanted,
        actual,
        missing: false,
        message:
          `mismatch at '${path}': ` +
          `expected '${expectedText}', found '${actualText}'.`,
      })
    );
  }
}

// Only a string expectation against a boolean actual is coerced.
function coerceExpected(
  expected: ConfigScalar,
  actual: ConfigValue
): ConfigScalar {
  if (typeof actual !== "boolean" || typeof expected !== "string") {
    return expected;
  }
  const literal = BOOLEAN_LITERALS.get(expected.trim().toLowerCase());
  return literal ?? expected;
}

function missing(
  path: string,
  expected: ConfigValue,
  message: string
): Mismatch {
  return Object.freeze({ path, expected, missing: true, message });
}

const defaultComparator = new ConfigComparator();

export function compare(
  expected: ConfigValue,
  actual: ConfigValue,
  path: string = ""
): MismatchReport {
  return defaultComparator.compare(expected, actual, path);
}
