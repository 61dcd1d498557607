import type { ImageFormat } from "./types.js";

export interface ImageInfo {
  format: ImageFormat;
  width: number;
  height: number;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Identify a PNG or JPEG by signature and read its pixel size from the
 * header. Anything else yields undefined.
 */
export function readImageInfo(bytes: Uint8Array): ImageInfo | undefined {
  if (isPng(bytes)) return readPng(bytes);
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return readJpeg(bytes);
  }
  return undefined;
}

function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < 24) return false;
  return PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

function readPng(bytes: Uint8Array): ImageInfo | undefined {
  // IHDR is always the first chunk: width and height at offsets 16 and 20.
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const width = view.getUint32(16);
  const height = view.getUint32(20);
  if (width === 0 || height === 0) return undefined;
  return { format: "png", width, height };
}

function readJpeg(bytes: Uint8Array): ImageInfo | undefined {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 2;
  while (offset + 9 < bytes.length) {
    if (bytes[offset] !== 0xff) return undefined;
    const marker = bytes[offset + 1];
    // Standalone markers carry no length.
    if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset += 2;
      continue;
    }
    const length = view.getUint16(offset + 2);
    const isStartOfFrame =
      marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isStartOfFrame) {
      const height = view.getUint16(offset + 5);
      const width = view.getUint16(offset + 7);
      if (width === 0 || height === 0) return undefined;
      return { format: "jpeg", width, height };
    }
    offset += 2 + length;
  }
  return undefined;
}
