/**
 * Cell Renderer
 * Turns one notebook cell and its outputs into Markdown blocks.
 */

import type { CellOutput, CodeCell, NotebookCell } from "./types/notebook.js";

/**
 * Representations tried for execute_result / display_data, highest first.
 * Only the first one present in an output is rendered.
 */
export const OUTPUT_MIME_PRIORITY = [
  "image/png",
  "image/jpeg",
  "image/svg+xml",
  "text/html",
  "text/plain",
] as const;

export type OutputMimeType = (typeof OUTPUT_MIME_PRIORITY)[number];

export function selectOutputMimeType(data: Record<string, string>): OutputMimeType | undefined {
  return OUTPUT_MIME_PRIORITY.find((mimeType) => Object.hasOwn(data, mimeType));
}

export function fencedBlock(content: string, language = ""): string {
  return `\`\`\`${language}\n${content}\n\`\`\``;
}

export function imageReference(format: "png" | "jpeg", base64: string): string {
  return `![output](data:image/${format};base64,${base64})`;
}

function renderDisplayData(data: Record<string, string>): string[] {
  const mimeType = selectOutputMimeType(data);
  if (mimeType === undefined) {
    return [];
  }
  const payload = data[mimeType] ?? "";

  switch (mimeType) {
    case "image/png":
      return [imageReference("png", payload)];
    case "image/jpeg":
      return [imageReference("jpeg", payload)];
    case "image/svg+xml":
    case "text/html":
      return [payload];
    case "text/plain":
      return payload.trim() ? [fencedBlock(payload.trimEnd())] : [];
  }
}

export function renderOutput(output: CellOutput, language: string): string[] {
  switch (output.kind) {
    case "stream":
      return output.text.trim() ? [fencedBlock(output.text.trimEnd())] : [];
    case "execute_result":
    case "display_data":
      return renderDisplayData(output.data);
    case "error":
      return output.traceback.length > 0 ? [fencedBlock(output.traceback.join("\n"), language)] : [];
  }
}

function renderCodeCell(cell: CodeCell, language: string): string[] {
  const blocks: string[] = [];
  // blank source: no code block, outputs still render
  if (cell.source.trim()) {
    blocks.push(fencedBlock(cell.source.trimEnd(), language));
  }
  for (const output of cell.outputs) {
    blocks.push(...renderOutput(output, language));
  }
  return blocks;
}

export function renderCell(cell: NotebookCell, language: string): string[] {
  switch (cell.kind) {
    case "markdown":
      return [cell.source];
    case "code":
      return renderCodeCell(cell, language);
  }
}
