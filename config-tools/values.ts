import type {
  ConfigMapping,
  ConfigScalar,
  ConfigSequence,
  ConfigValue,
} from "./types.js";

export const isConfigSequence = (
  value: ConfigValue | undefined
): value is ConfigSequence => Array.isArray(value);

export const isConfigMapping = (
  value: ConfigValue | undefined
): value is ConfigMapping =>
  value !== null &&
  value !== undefined &&
  typeof value === "object" &&
  !Array.isArray(value);

export const isConfigScalar = (
  value: ConfigValue | undefined
): value is ConfigScalar =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean";

/** Shape name used in mismatch messages, e.g. "mapping" or "boolean". */
export function shapeOf(value: ConfigValue): string {
  if (value === null) return "null";
  if (isConfigSequence(value)) return "sequence";
  if (isConfigMapping(value)) return "mapping";
  return typeof value;
}

export function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function hasKey(mapping: ConfigMapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(mapping, key);
}

/**
 * Structural equality over configuration values. Mapping key order is
 * ignored, sequence order is not.
 */
export function isDeepEqual(left: ConfigValue, right: ConfigValue): boolean {
  if (isConfigSequence(left)) {
    if (!isConfigSequence(right) || left.length !== right.length) {
      return false;
    }
    return left.every((item, index) => {
      const other = right[index];
      return other !== undefined && isDeepEqual(item, other);
    });
  }

  if (isConfigMapping(left)) {
    if (!isConfigMapping(right)) return false;

    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) return false;

    return leftKeys.every((key) => {
      const leftValue = left[key];
      const rightValue = right[key];
      return (
        leftValue !== undefined &&
        rightValue !== undefined &&
        hasKey(right, key) &&
        isDeepEqual(leftValue, rightValue)
      );
    });
  }

  return scalarEquals(left, right);
}

/** Strict equality, except that NaN equals NaN. */
export function scalarEquals(left: ConfigValue, right: ConfigValue): boolean {
  return left === right || (Number.isNaN(left) && Number.isNaN(right));
}

export function formatValue(value: ConfigValue): string {
  if (typeof value === "string") return value;
  if (isConfigScalar(value)) return String(value);
  return JSON.stringify(value);
}

/**
 * Resolves a dotted path against a tree. Numeric segments index into
 * sequences. Returns undefined when any segment does not resolve.
 */
export function selectPath(
  tree: ConfigValue,
  path: string
): ConfigValue | undefined {
  const segments = path.split(".").filter((segment) => segment.length > 0);
  let current: ConfigValue | undefined = tree;

  for (const segment of segments) {
    if (isConfigMapping(current)) {
      current = hasKey(current, segment) ? current[segment] : undefined;
    } else if (isConfigSequence(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else {
      return undefined;
    }
  }

  return current;
}
