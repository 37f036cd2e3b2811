import { Buffer } from "node:buffer";
import { PNG } from "pngjs";
import { InvalidImageError, RasterImage } from "@pixelvox/core";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function sniffPng(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

export function decodePng(bytes: Uint8Array): RasterImage {
  if (!sniffPng(bytes)) {
    throw new InvalidImageError("Unsupported image format: only PNG input is decoded");
  }
  let png: PNG;
  try {
    png = PNG.sync.read(Buffer.from(bytes));
  } catch (error) {
    throw new InvalidImageError(`PNG decode failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  return RasterImage.fromRgba(png.width, png.height, new Uint8Array(png.data));
}
