/**
 * Image Extractor
 * Finds base64 data URI images embedded in Markdown.
 */

import type { ImageFormat } from "./utils/base64.js";

export interface EmbeddedImage {
  /** 1-based position in document order */
  ordinal: number;
  format: ImageFormat;
  base64: string;
  /** The whole `![...](data:...)` match */
  originalSyntax: string;
}

/**
 * Strict pattern: the base64 token may only contain alphabet characters.
 * A data URI broken by whitespace or line breaks does not match at all.
 */
export const STRICT_IMAGE_PATTERN = /!\[.*?\]\(data:image\/(png|jpeg|jpg);base64,([A-Za-z0-9+/=]+)\)/g;

export function isImageFormat(value: string): value is ImageFormat {
  return value === "png" || value === "jpeg" || value === "jpg";
}

/**
 * Extracts embedded images in document order
 */
export function extractImages(markdown: string): EmbeddedImage[] {
  const images: EmbeddedImage[] = [];
  for (const match of markdown.matchAll(STRICT_IMAGE_PATTERN)) {
    const [originalSyntax, format = "", base64 = ""] = match;
    if (!isImageFormat(format)) {
      continue;
    }
    images.push({ ordinal: images.length + 1, format, base64, originalSyntax });
  }
  return images;
}
