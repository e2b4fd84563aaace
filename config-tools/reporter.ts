import type { Mismatch, MismatchReport, ReportOptions } from "./types.js";

export interface ReportSummary {
  missing: Mismatch[];
  mismatched: Mismatch[];
}

export function summarize(report: MismatchReport): ReportSummary {
  return {
    missing: report.filter((entry) => entry.missing),
    mismatched: report.filter((entry) => !entry.missing),
  };
}

/** Prints a report and returns whether it was clean. */
export function printReport(
  report: MismatchReport,
  options: ReportOptions
): boolean {
  const { missing, mismatched } = summarize(report);

  console.log(`🔍 ${options.title}`);
  console.log(`   📊 Missing entries found: ${missing.length}`);
  console.log(`   📊 Value mismatches found: ${mismatched.length}`);

  if (report.length === 0) {
    console.log("   ✅ Actual configuration satisfies every expected entry");
    return true;
  }

  if (!options.quiet) {
    if (missing.length > 0) {
      console.log("   ⚠️  Missing from actual configuration:");
      missing.forEach((entry) => console.log(`      - ${entry.message}`));
    }
    if (mismatched.length > 0) {
      console.log("   ⚠️  Values that differ:");
      mismatched.forEach((entry) => console.log(`      - ${entry.message}`));
    }
  }

  return false;
}
