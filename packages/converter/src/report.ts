import type { Diagnostic } from "@pixelschem/core";
import type { ConvertSummary } from "./types.js";

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `[pixelschem] ${diagnostic.severity}: ${diagnostic.message} (${diagnostic.code})`;
}

export function formatSummary(summary: ConvertSummary): string {
  const lines = [
    `Wrote ${summary.output}`,
    `  source:    ${summary.sourceSize.width}x${summary.sourceSize.height}`,
    `  size:      ${summary.size.width}x${summary.size.height}x1`,
    `  blocks:    ${summary.blockCount}`,
    `  palette:   ${summary.palette.length}`,
    `  unmatched: ${summary.unmatched}`,
    `  sources:   ${summary.sourcesLoaded.join(", ")}`
  ];
  if (summary.previewPath) {
    lines.push(`  preview:   ${summary.previewPath}`);
  }
  lines.push(`  elapsed:   ${summary.elapsedMs}ms`);
  return lines.join("\n");
}
