import type { MembershipDiff } from "../reconcile.js";

function section(title: string, marker: string, keys: readonly string[]): string[] {
  return [`${title} (${keys.length}):`, ...keys.map((key) => `  ${marker}${key}`)];
}

/** Human-readable report for `collection diff`. */
export function formatDiff(collectionPath: string, diff: MembershipDiff): string {
  const lines = [
    `=== Diff: input vs '${collectionPath}' ===`,
    "",
    ...section("In both", "", diff.inBoth),
    "",
    ...section("Only in input", "+ ", diff.onlyInInput),
    "",
    ...section("Only in collection", "- ", diff.onlyInCollection),
  ];
  if (diff.unresolved.length) {
    lines.push("", ...section("Unresolved citation keys", "? ", diff.unresolved));
  }
  return lines.join("\n");
}
