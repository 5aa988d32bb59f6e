import { DecodeError } from "./error-handler.js";

const BASE64_ALPHABET = /^[A-Za-z0-9+/]$/;

export type ImageFormat = "png" | "jpeg" | "jpg";

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
export const JPEG_SOI_MARKER = Buffer.from([0xff, 0xd8]);

/**
 * Lenient base64 decoding: characters outside the alphabet are skipped, `=`
 * before the third character of a group is ignored, and decoding stops at the
 * first complete padded group. Buffer.from() accepts anything, so the group
 * length is checked here.
 */
export function decodeBase64(text: string): Buffer {
  let data = "";
  let pads = 0;
  let padded = false;

  for (const char of text) {
    const groupPosition = data.length % 4;
    if (char === "=") {
      pads += 1;
      if (groupPosition >= 2 && groupPosition + pads >= 4) {
        padded = true;
        break;
      }
      continue;
    }
    if (!BASE64_ALPHABET.test(char)) {
      continue;
    }
    pads = 0;
    data += char;
  }

  const remainder = data.length % 4;
  if (!padded && remainder === 1) {
    throw new DecodeError(
      `Invalid base64-encoded string: number of data characters (${data.length}) cannot be 1 more than a multiple of 4`
    );
  }
  if (!padded && remainder !== 0) {
    throw new DecodeError("Incorrect padding");
  }
  return Buffer.from(data, "base64");
}

export function signatureFor(format: ImageFormat): Buffer {
  return format === "png" ? PNG_SIGNATURE : JPEG_SOI_MARKER;
}

export function hasValidHeader(bytes: Uint8Array, format: ImageFormat): boolean {
  const signature = signatureFor(format);
  if (bytes.length < signature.length) {
    return false;
  }
  return signature.equals(bytes.subarray(0, signature.length));
}

export function formatLabel(format: ImageFormat): "PNG" | "JPEG" {
  return format === "png" ? "PNG" : "JPEG";
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex").replace(/(..)(?=.)/g, "$1 ");
}
