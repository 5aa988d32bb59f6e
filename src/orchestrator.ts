/**
 * Orchestrator
 * File-level entry points used by the CLI: convert, batch convert, validate,
 * preview and diagnose.
 */

import { mkdirSync, writeFileSync } from "fs";
import { arch, platform } from "os";
import { basename, dirname, extname, join, resolve } from "path";
import { glob } from "glob";
import { getEnv } from "./config/environment.js";
import { convertNotebookDocument, type FrontMatter } from "./converter.js";
import { collectDiagnostics, type DiagnosticSnapshot } from "./diagnostics.js";
import { parseNotebook, readTextFile } from "./notebook-reader.js";
import { createPreviewHtml } from "./preview.js";
import { IOError, toErrorMessage } from "./utils/error-handler.js";
import { formatDiagnosticReport, type SystemInfo } from "./utils/formatters.js";
import { logDebug } from "./utils/logger.js";
import { validateMarkdownImages, type ValidationReport } from "./validator.js";

export interface ConvertOptions {
  output?: string;
  title?: string;
  categories?: string;
  tags?: string[];
  layout?: string;
  toc?: boolean;
  authorProfile?: boolean;
  /** Directory for the default output file (defaults to process.cwd()) */
  cwd?: string;
  now?: Date;
}

export interface ConvertResult {
  success: boolean;
  sourcePath: string;
  outputPath: string;
  title: string;
  error?: string;
}

export interface DiagnoseOptions {
  notebookPath?: string;
  output?: string;
  now?: Date;
}

export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/**
 * "my-first_notebook" → "My First Notebook"
 */
export function titleFromFileName(stem: string): string {
  return stem
    .replace(/[-_]/g, " ")
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function defaultOutputPath(notebookPath: string, directory: string, now: Date): string {
  return join(directory, `${formatDate(now)}-${fileStem(notebookPath)}.md`);
}

/**
 * Writes UTF-8 text, creating parent directories first
 */
export function writeTextFile(filePath: string, content: string): void {
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content, "utf-8");
  } catch (error) {
    throw new IOError(`Cannot write ${filePath}: ${toErrorMessage(error)}`, filePath, { cause: error });
  }
}

export function resolveFrontMatter(notebookPath: string, options: ConvertOptions): FrontMatter {
  const env = getEnv();
  return {
    layout: options.layout ?? env.NB_POST_LAYOUT,
    title: options.title ?? titleFromFileName(fileStem(notebookPath)),
    categories: options.categories ?? env.NB_POST_CATEGORIES,
    tags: options.tags ?? env.NB_POST_TAGS,
    toc: options.toc ?? env.NB_POST_TOC,
    authorProfile: options.authorProfile ?? env.NB_POST_AUTHOR_PROFILE,
  };
}

/**
 * Converts one notebook file. Parse and I/O errors are thrown before anything
 * is written.
 */
export function convertNotebookFile(notebookPath: string, options: ConvertOptions = {}): ConvertResult {
  const sourcePath = resolve(notebookPath);
  const outputPath = options.output
    ? resolve(options.output)
    : defaultOutputPath(sourcePath, options.cwd ?? process.cwd(), options.now ?? new Date());

  const notebook = parseNotebook(readTextFile(sourcePath));
  const frontMatter = resolveFrontMatter(sourcePath, options);
  const markdown = convertNotebookDocument(notebook, frontMatter);
  logDebug(`${sourcePath}: ${notebook.cells.length} cells, ${markdown.length} characters`);

  writeTextFile(outputPath, markdown);
  return { success: true, sourcePath, outputPath, title: frontMatter.title };
}

export async function findNotebooks(pattern: string, cwd?: string): Promise<string[]> {
  const files = await glob(pattern, { cwd, absolute: true, nodir: true });
  return files.sort();
}

/**
 * Converts every notebook; one failing file does not stop the others.
 */
export function convertNotebookFiles(
  notebookPaths: string[],
  options: Omit<ConvertOptions, "output" | "title"> & { outputDir?: string } = {}
): ConvertResult[] {
  const { outputDir, ...convertOptions } = options;
  const now = convertOptions.now ?? new Date();

  return notebookPaths.map((notebookPath) => {
    const sourcePath = resolve(notebookPath);
    const output = defaultOutputPath(sourcePath, outputDir ? resolve(outputDir) : dirname(sourcePath), now);
    try {
      return convertNotebookFile(sourcePath, { ...convertOptions, output, now });
    } catch (error) {
      return {
        success: false,
        sourcePath,
        outputPath: output,
        title: "",
        error: toErrorMessage(error),
      };
    }
  });
}

export function validateMarkdownFile(markdownPath: string): ValidationReport {
  return validateMarkdownImages(readTextFile(markdownPath));
}

export function previewPathFor(markdownPath: string): string {
  const absolutePath = resolve(markdownPath);
  return join(dirname(absolutePath), `${fileStem(absolutePath)}_preview.html`);
}

export function writePreviewFile(markdownPath: string, output?: string): string {
  const outputPath = output ? resolve(output) : previewPathFor(markdownPath);
  const html = createPreviewHtml(readTextFile(markdownPath), basename(markdownPath));
  writeTextFile(outputPath, html);
  return outputPath;
}

export function debugReportPathFor(markdownPath: string): string {
  const absolutePath = resolve(markdownPath);
  return join(dirname(absolutePath), `${fileStem(absolutePath)}_debug.txt`);
}

export function collectSystemInfo(markdownPath: string, notebookPath: string | undefined, now: Date): SystemInfo {
  return {
    generatedAt: now.toISOString(),
    nodeVersion: process.version,
    platform: platform(),
    arch: arch(),
    markdownPath: resolve(markdownPath),
    notebookPath: notebookPath ? resolve(notebookPath) : undefined,
  };
}

export function diagnoseFiles(
  markdownPath: string,
  options: DiagnoseOptions = {}
): { reportPath: string; snapshot: DiagnosticSnapshot } {
  const markdown = readTextFile(markdownPath);
  const notebookText = options.notebookPath ? readTextFile(options.notebookPath) : undefined;
  const snapshot = collectDiagnostics(markdown, notebookText);

  const system = collectSystemInfo(markdownPath, options.notebookPath, options.now ?? new Date());
  const reportPath = options.output ? resolve(options.output) : debugReportPathFor(markdownPath);
  writeTextFile(reportPath, formatDiagnosticReport(snapshot, system));

  return { reportPath, snapshot };
}
