/**
 * Diagnostics Collector
 *
 * Builds a snapshot for troubleshooting images that do not render. Unlike the
 * validator it uses a lenient pattern that also matches data URIs broken by
 * spaces or line breaks, and it can cross-check the PNG payloads recorded in
 * the source notebook.
 */

import { extractImages, isImageFormat } from "./image-processor.js";
import { coerceText, parseRawNotebook } from "./notebook-reader.js";
import type { RawNotebook } from "./types/notebook.js";
import { decodeBase64, hasValidHeader, toHex, type ImageFormat } from "./utils/base64.js";
import { toErrorMessage } from "./utils/error-handler.js";

/** Accepts spaces, `\n` and `\r` inside the base64 token */
export const LENIENT_IMAGE_PATTERN = /!\[.*?\]\(data:image\/(png|jpeg|jpg);base64,([A-Za-z0-9+/=\n\r ]+)\)/g;

const PREVIEW_LENGTH = 50;
const LEADING_BYTES = 10;

export interface ImageDiagnostic {
  ordinal: number;
  format: ImageFormat;
  rawLength: number;
  hasWhitespace: boolean;
  hasNewlines: boolean;
  first50: string;
  last50: string;
  cleanedLength: number;
  decoded: boolean;
  decodeError?: string;
  decodedSize?: number;
  /** Hex of the first decoded bytes */
  firstBytes?: string;
  headerValid: boolean;
}

export interface NotebookImageDiagnostic {
  cellIndex: number;
  outputIndex: number;
  isFragmentList: boolean;
  fragmentCount: number;
  length: number;
  hasNewlines: boolean;
  first50: string;
}

export interface DiagnosticSnapshot {
  markdownLength: number;
  strictMatchCount: number;
  images: ImageDiagnostic[];
  notebook?: {
    cellCount: number;
    codeCellCount: number;
    pngOutputs: NotebookImageDiagnostic[];
  };
  notebookError?: string;
}

export function extractImagesLeniently(
  markdown: string
): Array<{ ordinal: number; format: ImageFormat; raw: string }> {
  const found: Array<{ ordinal: number; format: ImageFormat; raw: string }> = [];
  for (const match of markdown.matchAll(LENIENT_IMAGE_PATTERN)) {
    const [, format = "", raw = ""] = match;
    if (isImageFormat(format)) {
      found.push({ ordinal: found.length + 1, format, raw });
    }
  }
  return found;
}

export function diagnoseImage(ordinal: number, format: ImageFormat, raw: string): ImageDiagnostic {
  const cleaned = raw.replace(/\s/g, "");
  const diagnostic: ImageDiagnostic = {
    ordinal,
    format,
    rawLength: raw.length,
    hasWhitespace: /\s/.test(raw),
    hasNewlines: /[\r\n]/.test(raw),
    first50: raw.slice(0, PREVIEW_LENGTH),
    last50: raw.slice(-PREVIEW_LENGTH),
    cleanedLength: cleaned.length,
    decoded: false,
    headerValid: false,
  };

  try {
    const bytes = decodeBase64(cleaned);
    diagnostic.decoded = true;
    diagnostic.decodedSize = bytes.length;
    diagnostic.firstBytes = toHex(bytes.subarray(0, LEADING_BYTES));
    diagnostic.headerValid = hasValidHeader(bytes, format);
  } catch (error) {
    diagnostic.decodeError = toErrorMessage(error);
  }

  return diagnostic;
}

export function collectNotebookImages(notebook: RawNotebook): NotebookImageDiagnostic[] {
  const results: NotebookImageDiagnostic[] = [];
  (notebook.cells ?? []).forEach((cell, cellIndex) => {
    if (cell.cell_type !== "code") {
      return;
    }
    (cell.outputs ?? []).forEach((output, outputIndex) => {
      const payload = output.data?.["image/png"];
      if (payload === undefined) {
        return;
      }
      const text = coerceText(payload);
      results.push({
        cellIndex,
        outputIndex,
        isFragmentList: Array.isArray(payload),
        fragmentCount: Array.isArray(payload) ? payload.length : 1,
        length: text.length,
        hasNewlines: /[\r\n]/.test(text),
        first50: text.slice(0, PREVIEW_LENGTH),
      });
    });
  });
  return results;
}

export function collectDiagnostics(markdown: string, notebookText?: string): DiagnosticSnapshot {
  const snapshot: DiagnosticSnapshot = {
    markdownLength: markdown.length,
    strictMatchCount: extractImages(markdown).length,
    images: extractImagesLeniently(markdown).map(({ ordinal, format, raw }) =>
      diagnoseImage(ordinal, format, raw)
    ),
  };

  if (notebookText !== undefined) {
    // an unreadable notebook is recorded, not thrown
    try {
      const notebook = parseRawNotebook(notebookText);
      const cells = notebook.cells ?? [];
      snapshot.notebook = {
        cellCount: cells.length,
        codeCellCount: cells.filter((cell) => cell.cell_type === "code").length,
        pngOutputs: collectNotebookImages(notebook),
      };
    } catch (error) {
      snapshot.notebookError = toErrorMessage(error);
    }
  }

  return snapshot;
}
