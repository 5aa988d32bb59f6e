/**
 * Image Validator
 * Decodes each embedded image and checks its magic bytes.
 */

import { extractImages, type EmbeddedImage } from "./image-processor.js";
import { decodeBase64, formatLabel, hasValidHeader } from "./utils/base64.js";
import { toErrorMessage } from "./utils/error-handler.js";

export interface ImageCheck extends EmbeddedImage {
  valid: boolean;
  /** Set once the payload decoded */
  byteLength?: number;
  headerValid: boolean;
  error?: string;
}

export interface ValidationReport {
  totalImages: number;
  validImages: number;
  invalidImages: number;
  /** `Image <ordinal>: <reason>` in document order */
  errors: string[];
  /** Decoded size in KB of every image that decoded */
  imageSizes: number[];
  images: ImageCheck[];
}

export function validateImage(image: EmbeddedImage): ImageCheck {
  if (/[\r\n]/.test(image.base64)) {
    return { ...image, valid: false, headerValid: false, error: "Contains newline characters" };
  }

  let bytes: Buffer;
  try {
    bytes = decodeBase64(image.base64);
  } catch (error) {
    return {
      ...image,
      valid: false,
      headerValid: false,
      error: `Failed to decode base64: ${toErrorMessage(error)}`,
    };
  }

  const headerValid = hasValidHeader(bytes, image.format);
  return {
    ...image,
    valid: headerValid,
    byteLength: bytes.length,
    headerValid,
    error: headerValid ? undefined : `Invalid ${formatLabel(image.format)} header`,
  };
}

export function validateImages(images: EmbeddedImage[]): ValidationReport {
  const checks = images.map(validateImage);
  const report: ValidationReport = {
    totalImages: checks.length,
    validImages: 0,
    invalidImages: 0,
    errors: [],
    imageSizes: [],
    images: checks,
  };

  for (const check of checks) {
    if (check.byteLength !== undefined) {
      report.imageSizes.push(check.byteLength / 1024);
    }
    if (check.valid) {
      report.validImages += 1;
    } else {
      report.invalidImages += 1;
      report.errors.push(`Image ${check.ordinal}: ${check.error ?? "Invalid image"}`);
    }
  }

  return report;
}

export function validateMarkdownImages(markdown: string): ValidationReport {
  return validateImages(extractImages(markdown));
}
