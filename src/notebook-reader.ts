/**
 * Notebook Reader
 * Parses .ipynb JSON into an ordered list of markdown and code cells.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { ZodError } from "zod";
import {
  rawNotebookSchema,
  type CellOutput,
  type NotebookCell,
  type NotebookDocument,
  type RawCell,
  type RawNotebook,
  type RawOutput,
} from "./types/notebook.js";
import { IOError, ParseError, toErrorMessage } from "./utils/error-handler.js";

export const DEFAULT_LANGUAGE = "python";

/**
 * Normalizes a text field that may be a string or a list of fragments.
 * Fragments are concatenated as-is, without separators.
 */
export function coerceText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.filter((fragment): fragment is string => typeof fragment === "string").join("");
  }
  return "";
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Parses notebook JSON and checks its shape without normalizing text fields.
 */
export function parseRawNotebook(text: string): RawNotebook {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Notebook is not valid JSON: ${toErrorMessage(error)}`, { cause: error });
  }

  const result = rawNotebookSchema.safeParse(json);
  if (!result.success) {
    throw new ParseError(`Notebook has an unexpected structure: ${formatZodError(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function normalizeData(data: Record<string, unknown> | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (!data) {
    return normalized;
  }
  for (const [mimeType, payload] of Object.entries(data)) {
    if (typeof payload === "string" || Array.isArray(payload)) {
      normalized[mimeType] = coerceText(payload);
    }
  }
  return normalized;
}

function normalizeOutput(output: RawOutput): CellOutput | undefined {
  switch (output.output_type) {
    case "stream":
      return { kind: "stream", name: output.name, text: coerceText(output.text) };
    case "execute_result":
    case "display_data":
      return { kind: output.output_type, data: normalizeData(output.data) };
    case "error":
      return {
        kind: "error",
        ename: output.ename,
        evalue: output.evalue,
        traceback: output.traceback ?? [],
      };
    default:
      return undefined;
  }
}

function normalizeCell(cell: RawCell, index: number): NotebookCell | undefined {
  const source = coerceText(cell.source);
  switch (cell.cell_type) {
    case "markdown":
      return { kind: "markdown", index, source };
    case "code":
      return {
        kind: "code",
        index,
        source,
        outputs: (cell.outputs ?? [])
          .map(normalizeOutput)
          .filter((output): output is CellOutput => output !== undefined),
      };
    default:
      return undefined;
  }
}

export function resolveLanguage(notebook: RawNotebook): string {
  return (
    notebook.metadata?.language_info?.name ||
    notebook.metadata?.kernelspec?.language ||
    DEFAULT_LANGUAGE
  );
}

export function normalizeNotebook(notebook: RawNotebook): NotebookDocument {
  const cells = (notebook.cells ?? [])
    .map((cell, index) => normalizeCell(cell, index))
    .filter((cell): cell is NotebookCell => cell !== undefined);

  return { cells, language: resolveLanguage(notebook) };
}

export function parseNotebook(text: string): NotebookDocument {
  return normalizeNotebook(parseRawNotebook(text));
}

export function readTextFile(filePath: string): string {
  const absolutePath = resolve(filePath);
  try {
    return readFileSync(absolutePath, "utf-8");
  } catch (error) {
    throw new IOError(`Cannot read ${absolutePath}: ${toErrorMessage(error)}`, absolutePath, {
      cause: error,
    });
  }
}

export function readNotebookFile(filePath: string): NotebookDocument {
  return parseNotebook(readTextFile(filePath));
}
