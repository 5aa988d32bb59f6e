/**
 * nb-post - Main Entry Point
 */

export { coerceText, parseNotebook, parseRawNotebook, normalizeNotebook, readNotebookFile } from "./notebook-reader.js";
export { renderCell, renderOutput, selectOutputMimeType, OUTPUT_MIME_PRIORITY, type OutputMimeType } from "./cell-renderer.js";
export {
  buildFrontMatter,
  assembleMarkdown,
  renderNotebook,
  convertNotebookDocument,
  convertNotebookToMarkdown,
  type FrontMatter,
} from "./converter.js";
export { extractImages, STRICT_IMAGE_PATTERN, type EmbeddedImage } from "./image-processor.js";
export {
  validateImage,
  validateImages,
  validateMarkdownImages,
  type ImageCheck,
  type ValidationReport,
} from "./validator.js";
export {
  collectDiagnostics,
  extractImagesLeniently,
  LENIENT_IMAGE_PATTERN,
  type DiagnosticSnapshot,
  type ImageDiagnostic,
  type NotebookImageDiagnostic,
} from "./diagnostics.js";
export { createPreviewHtml } from "./preview.js";
export {
  convertNotebookFile,
  convertNotebookFiles,
  findNotebooks,
  validateMarkdownFile,
  writePreviewFile,
  diagnoseFiles,
  type ConvertOptions,
  type ConvertResult,
} from "./orchestrator.js";
export { createProgram } from "./program.js";
export { formatDiagnosticReport, formatValidationSummary } from "./utils/formatters.js";
export { NbPostError, ParseError, DecodeError, IOError } from "./utils/error-handler.js";
export type {
  NotebookDocument,
  NotebookCell,
  CellOutput,
  RawNotebook,
} from "./types/notebook.js";
