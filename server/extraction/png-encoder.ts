/**
 * Minimal PNG writer for decoded image pixels.
 *
 * Pixel layouts follow pdf.js ImageKind: 1-bit packed grayscale rows
 * (1 = white), 8-bit RGB, 8-bit RGBA.
 */

import pako from "pako";

export const PixelKind = {
  GRAYSCALE_1BPP: 1,
  RGB_24BPP: 2,
  RGBA_32BPP: 3,
} as const;

export type PixelKind = (typeof PixelKind)[keyof typeof PixelKind];

interface PngLayout {
  colorType: number;
  bitDepth: number;
  rowBytes: number;
}

const PNG_SIGNATURE = Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a);

const CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function layoutFor(kind: PixelKind, width: number): PngLayout {
  switch (kind) {
    case PixelKind.GRAYSCALE_1BPP:
      return { colorType: 0, bitDepth: 1, rowBytes: Math.ceil(width / 8) };
    case PixelKind.RGB_24BPP:
      return { colorType: 2, bitDepth: 8, rowBytes: width * 3 };
    case PixelKind.RGBA_32BPP:
      return { colorType: 6, bitDepth: 8, rowBytes: width * 4 };
  }
}

function chunk(type: string, data: Uint8Array): Uint8Array {
  const out = new Uint8Array(12 + data.length);
  const view = new DataView(out.buffer);
  view.setUint32(0, data.length);
  for (let i = 0; i < 4; i++) {
    out[4 + i] = type.charCodeAt(i);
  }
  out.set(data, 8);
  view.setUint32(8 + data.length, crc32(out.subarray(4, 8 + data.length)));
  return out;
}

export function isPixelKind(value: unknown): value is PixelKind {
  return value === PixelKind.GRAYSCALE_1BPP || value === PixelKind.RGB_24BPP || value === PixelKind.RGBA_32BPP;
}

/**
 * Encode raw pixels as a PNG file.
 *
 * @throws Error when the pixel buffer is shorter than width × height requires
 */
export function encodePng(pixels: Uint8Array, width: number, height: number, kind: PixelKind): Uint8Array {
  if (width <= 0 || height <= 0) {
    throw new Error(`Invalid image dimensions ${width}x${height}`);
  }

  const { colorType, bitDepth, rowBytes } = layoutFor(kind, width);
  if (pixels.length < rowBytes * height) {
    throw new Error(`Pixel buffer too short: expected ${rowBytes * height} bytes, got ${pixels.length}`);
  }

  // Each scanline is prefixed with filter type 0 (None)
  const scanlines = new Uint8Array(height * (rowBytes + 1));
  for (let row = 0; row < height; row++) {
    const src = row * rowBytes;
    scanlines.set(pixels.subarray(src, src + rowBytes), row * (rowBytes + 1) + 1);
  }

  const header = new Uint8Array(13);
  const headerView = new DataView(header.buffer);
  headerView.setUint32(0, width);
  headerView.setUint32(4, height);
  header[8] = bitDepth;
  header[9] = colorType;

  const parts = [
    PNG_SIGNATURE,
    chunk("IHDR", header),
    chunk("IDAT", pako.deflate(scanlines)),
    chunk("IEND", new Uint8Array(0)),
  ];

  const png = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    png.set(part, offset);
    offset += part.length;
  }
  return png;
}
