/**
 * Notebook document types
 *
 * Raw* types describe the .ipynb JSON as it is found on disk, where text
 * fields may be either a string or a list of fragments. The normalized
 * model below is what the renderer consumes.
 */

import { z } from "zod";

export const textOrFragmentsSchema = z.union([z.string(), z.array(z.string())]);

export type TextOrFragments = z.infer<typeof textOrFragmentsSchema>;

export const rawOutputSchema = z
  .object({
    output_type: z.string().optional(),
    name: z.string().optional(),
    text: textOrFragmentsSchema.optional(),
    data: z.record(z.unknown()).optional(),
    ename: z.string().optional(),
    evalue: z.string().optional(),
    traceback: z.array(z.string()).optional(),
  })
  .passthrough();

export const rawCellSchema = z
  .object({
    cell_type: z.string().optional(),
    source: textOrFragmentsSchema.optional(),
    outputs: z.array(rawOutputSchema).optional(),
  })
  .passthrough();

export const rawNotebookSchema = z
  .object({
    cells: z.array(rawCellSchema).optional(),
    metadata: z
      .object({
        kernelspec: z.object({ language: z.string().optional() }).passthrough().optional(),
        language_info: z.object({ name: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type RawOutput = z.infer<typeof rawOutputSchema>;
export type RawCell = z.infer<typeof rawCellSchema>;
export type RawNotebook = z.infer<typeof rawNotebookSchema>;

export interface StreamOutput {
  kind: "stream";
  name?: string;
  text: string;
}

export interface DisplayOutput {
  kind: "execute_result" | "display_data";
  /** MIME type → normalized payload; non-text payloads are left out */
  data: Record<string, string>;
}

export interface ErrorOutput {
  kind: "error";
  ename?: string;
  evalue?: string;
  traceback: string[];
}

export type CellOutput = StreamOutput | DisplayOutput | ErrorOutput;

export interface MarkdownCell {
  kind: "markdown";
  /** Position in the source document (0-based) */
  index: number;
  source: string;
}

export interface CodeCell {
  kind: "code";
  index: number;
  source: string;
  outputs: CellOutput[];
}

export type NotebookCell = MarkdownCell | CodeCell;

export interface NotebookDocument {
  cells: NotebookCell[];
  language: string;
}
