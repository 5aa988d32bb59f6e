/**
 * Notebook → Markdown post converter
 * Assembles front matter and rendered cells into a single self-contained post.
 *
 * Images are embedded as base64 data URIs, so the resulting file needs no
 * asset directory next to it.
 */

import { renderCell } from "./cell-renderer.js";
import { parseNotebook } from "./notebook-reader.js";
import type { NotebookDocument } from "./types/notebook.js";

export interface FrontMatter {
  layout: string;
  title: string;
  categories: string;
  tags: string[];
  toc: boolean;
  authorProfile: boolean;
}

/**
 * Front matter lines, `---` delimited. Values are written as given.
 */
export function buildFrontMatter(frontMatter: FrontMatter): string[] {
  const tagList = frontMatter.tags.map((tag) => `'${tag}'`).join(", ");
  return [
    "---",
    `layout: ${frontMatter.layout}`,
    `title: "${frontMatter.title}"`,
    `categories: ${frontMatter.categories}`,
    `tag: [${tagList}]`,
    `toc: ${frontMatter.toc}`,
    `author_profile: ${frontMatter.authorProfile}`,
    "---",
  ];
}

export function renderNotebook(notebook: NotebookDocument): string[] {
  return notebook.cells.flatMap((cell) => renderCell(cell, notebook.language));
}

export function assembleMarkdown(frontMatterLines: string[], blocks: string[]): string {
  const lines = [...frontMatterLines, ""];
  for (const block of blocks) {
    lines.push(block, "");
  }
  return lines.join("\n");
}

export function convertNotebookDocument(notebook: NotebookDocument, frontMatter: FrontMatter): string {
  return assembleMarkdown(buildFrontMatter(frontMatter), renderNotebook(notebook));
}

/**
 * Converts notebook JSON text into a Markdown post
 */
export function convertNotebookToMarkdown(notebookText: string, frontMatter: FrontMatter): string {
  return convertNotebookDocument(parseNotebook(notebookText), frontMatter);
}
