/**
 * Plain-text formatting for validation summaries and diagnostic reports
 */

import type { DiagnosticSnapshot } from "../diagnostics.js";
import type { ValidationReport } from "../validator.js";
import { formatLabel } from "./base64.js";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

export interface SystemInfo {
  generatedAt: string;
  nodeVersion: string;
  platform: string;
  arch: string;
  markdownPath: string;
  notebookPath?: string;
}

export function formatKb(kb: number): string {
  return `${kb.toFixed(2)} KB`;
}

export function formatImageLines(report: ValidationReport): string[] {
  const lines: string[] = [];
  for (const image of report.images) {
    lines.push(`Image ${image.ordinal}/${report.totalImages} (${image.format}):`);
    if (image.byteLength !== undefined) {
      lines.push("  ✓ Valid base64 data");
      lines.push(`  ✓ Size: ${formatKb(image.byteLength / 1024)}`);
    }
    if (image.valid) {
      lines.push(`  ✓ Valid ${formatLabel(image.format)} header`);
    } else {
      lines.push(`  ❌ ${image.error ?? "Invalid image"}`);
    }
    lines.push("");
  }
  return lines;
}

export function formatValidationSummary(report: ValidationReport): string[] {
  const lines = [
    RULE,
    "SUMMARY",
    RULE,
    `Total images found: ${report.totalImages}`,
    `Valid images: ${report.validImages}`,
    `Invalid images: ${report.invalidImages}`,
  ];

  if (report.imageSizes.length > 0) {
    const total = report.imageSizes.reduce((sum, size) => sum + size, 0);
    const average = total / report.imageSizes.length;
    lines.push("");
    lines.push(`Total image size: ${formatKb(total)} (${(total / 1024).toFixed(2)} MB)`);
    lines.push(`Average image size: ${formatKb(average)}`);
  }

  lines.push("");
  if (report.errors.length > 0) {
    lines.push("⚠️  ERRORS FOUND:");
    lines.push(...report.errors.map((error) => `  - ${error}`));
  } else {
    lines.push("✓ All images are valid!");
  }
  lines.push(RULE);
  return lines;
}

function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}

function formatImageSection(snapshot: DiagnosticSnapshot): string[] {
  const lines = [
    "MARKDOWN ANALYSIS",
    THIN_RULE,
    `Markdown length: ${snapshot.markdownLength} characters`,
    `Images matched (strict pattern): ${snapshot.strictMatchCount}`,
    `Images matched (lenient pattern): ${snapshot.images.length}`,
  ];

  for (const image of snapshot.images) {
    lines.push("");
    lines.push(`Image ${image.ordinal} (${image.format}):`);
    lines.push(`  Raw length: ${image.rawLength}`);
    lines.push(`  Contains whitespace: ${yesNo(image.hasWhitespace)}`);
    lines.push(`  Contains newlines: ${yesNo(image.hasNewlines)}`);
    lines.push(`  First 50 chars: ${JSON.stringify(image.first50)}`);
    lines.push(`  Last 50 chars: ${JSON.stringify(image.last50)}`);
    lines.push(`  Length without whitespace: ${image.cleanedLength}`);
    if (image.decoded) {
      lines.push(`  Decoded: yes (${image.decodedSize ?? 0} bytes)`);
      lines.push(`  First bytes: ${image.firstBytes ?? ""}`);
      lines.push(`  Header valid: ${yesNo(image.headerValid)}`);
    } else {
      lines.push(`  Decoded: no (${image.decodeError ?? "unknown error"})`);
    }
  }
  return lines;
}

function formatNotebookSection(snapshot: DiagnosticSnapshot): string[] {
  const lines = ["NOTEBOOK ANALYSIS", THIN_RULE];
  if (snapshot.notebookError !== undefined) {
    lines.push(`Notebook could not be read: ${snapshot.notebookError}`);
    return lines;
  }
  if (snapshot.notebook === undefined) {
    lines.push("No notebook supplied.");
    return lines;
  }

  const { cellCount, codeCellCount, pngOutputs } = snapshot.notebook;
  lines.push(`Cells: ${cellCount} (${codeCellCount} code)`);
  lines.push(`PNG outputs: ${pngOutputs.length}`);
  for (const output of pngOutputs) {
    lines.push("");
    lines.push(`Cell ${output.cellIndex}, output ${output.outputIndex}:`);
    lines.push(
      `  Payload: ${output.isFragmentList ? `list of ${output.fragmentCount} fragments` : "single string"}`
    );
    lines.push(`  Length: ${output.length}`);
    lines.push(`  Contains newlines: ${yesNo(output.hasNewlines)}`);
    lines.push(`  First 50 chars: ${JSON.stringify(output.first50)}`);
  }
  return lines;
}

const ISSUE_TEMPLATE = [
  "ISSUE REPORT TEMPLATE",
  THIN_RULE,
  "What happened:",
  "  <describe which images do not render and where they are viewed>",
  "",
  "Expected behavior:",
  "  <describe what should be displayed>",
  "",
  "Steps to reproduce:",
  "  1. nb-post convert <notebook>",
  "  2. nb-post validate <markdown>",
  "",
  "Attach this report and, if possible, the notebook.",
];

export function formatDiagnosticReport(snapshot: DiagnosticSnapshot, system: SystemInfo): string {
  const lines = [
    RULE,
    "NB-POST IMAGE DIAGNOSTIC REPORT",
    RULE,
    "",
    "SYSTEM INFORMATION",
    THIN_RULE,
    `Generated: ${system.generatedAt}`,
    `Node.js: ${system.nodeVersion}`,
    `Platform: ${system.platform} (${system.arch})`,
    `Markdown: ${system.markdownPath}`,
    `Notebook: ${system.notebookPath ?? "(none)"}`,
    "",
    ...formatImageSection(snapshot),
    "",
    ...formatNotebookSection(snapshot),
    "",
    ...ISSUE_TEMPLATE,
    RULE,
  ];
  return `${lines.join("\n")}\n`;
}
