/**
 * CV Engine: template matching for image steps.
 * Decodes PNG screenshots and templates into RGBA pixels and slides the
 * template over the screenshot, scoring each position by color distance.
 */
import { inflateSync } from 'node:zlib';

export interface MatchResult {
  /** Center of the matched region. */
  x: number;
  y: number;
  confidence: number;
  width: number;
  height: number;
}

export interface DecodedImage {
  width: number;
  height: number;
  pixels: Uint8Array; // RGBA, row-major
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

// Samples per pixel for each PNG color type at 8 bits per sample.
const CHANNELS: Partial<Record<number, number>> = {
  0: 1, // grayscale
  2: 3, // RGB
  3: 1, // palette index
  4: 2, // grayscale + alpha
  6: 4, // RGBA
};

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

export class CVEngine {
  /**
   * Find a template image within a screenshot.
   * Returns the best match, or null if either image cannot be decoded or the
   * best confidence is under `threshold`.
   */
  findByTemplate(screenshot: Buffer, template: Buffer, threshold = 0.8): MatchResult | null {
    const src = this.decodePNG(screenshot);
    const tpl = this.decodePNG(template);
    if (!src || !tpl) return null;
    return this.match(src, tpl, threshold);
  }

  match(src: DecodedImage, tpl: DecodedImage, threshold = 0.8): MatchResult | null {
    if (tpl.width > src.width || tpl.height > src.height) return null;

    let bestX = 0;
    let bestY = 0;
    let bestScore = 0;

    // Coarse pass over a grid, then a 1px pass around the best cell
    const step = Math.max(1, Math.floor(Math.min(tpl.width, tpl.height) / 4));

    for (let y = 0; y <= src.height - tpl.height; y += step) {
      for (let x = 0; x <= src.width - tpl.width; x += step) {
        const score = this.compareRegion(src, tpl, x, y);
        if (score > bestScore) {
          bestScore = score;
          bestX = x;
          bestY = y;
        }
      }
    }

    if (step > 1 && bestScore > 0) {
      const refined = this.refineMatch(src, tpl, bestX, bestY, step);
      bestX = refined.x;
      bestY = refined.y;
      bestScore = refined.score;
    }

    if (bestScore < threshold) return null;

    return {
      x: bestX + Math.floor(tpl.width / 2),
      y: bestY + Math.floor(tpl.height / 2),
      confidence: bestScore,
      width: tpl.width,
      height: tpl.height,
    };
  }

  /**
   * Decode an 8-bit, non-interlaced PNG into RGBA pixels.
   * Returns null for anything else.
   */
  decodePNG(buffer: Buffer): DecodedImage | null {
    if (buffer.length < 8 || PNG_SIGNATURE.some((byte, i) => buffer[i] !== byte)) {
      return null;
    }

    let offset = 8;
    let width = 0;
    let height = 0;
    let bitDepth = 0;
    let colorType = -1;
    let interlace = 0;
    let palette: Buffer | null = null;
    let paletteAlpha: Buffer | null = null;
    const idatChunks: Buffer[] = [];

    while (offset + 8 <= buffer.length) {
      const length = buffer.readUInt32BE(offset);
      const type = buffer.toString('ascii', offset + 4, offset + 8);
      const data = buffer.subarray(offset + 8, offset + 8 + length);

      if (type === 'IHDR' && data.length >= 13) {
        width = data.readUInt32BE(0);
        height = data.readUInt32BE(4);
        bitDepth = data[8];
        colorType = data[9];
        interlace = data[12];
      } else if (type === 'PLTE') {
        palette = data;
      } else if (type === 'tRNS') {
        paletteAlpha = data;
      } else if (type === 'IDAT') {
        idatChunks.push(data);
      } else if (type === 'IEND') {
        break;
      }

      offset += 12 + length; // length(4) + type(4) + data + crc(4)
    }

    const channels = CHANNELS[colorType];
    if (width === 0 || height === 0 || idatChunks.length === 0) return null;
    if (bitDepth !== 8 || interlace !== 0 || channels === undefined) return null;
    if (colorType === 3 && !palette) return null;

    let raw: Buffer;
    try {
      raw = inflateSync(Buffer.concat(idatChunks));
    } catch {
      return null;
    }

    const stride = width * channels;
    if (raw.length < height * (stride + 1)) return null;

    const pixels = new Uint8Array(width * height * 4);
    let prev = new Uint8Array(stride);
    let cur = new Uint8Array(stride);

    for (let row = 0; row < height; row++) {
      const rowStart = row * (stride + 1);
      const filter = raw[rowStart];

      for (let i = 0; i < stride; i++) {
        const x = raw[rowStart + 1 + i];
        const a = i >= channels ? cur[i - channels] : 0;
        const b = prev[i];
        const c = i >= channels ? prev[i - channels] : 0;
        switch (filter) {
          case 0:
            cur[i] = x;
            break;
          case 1:
            cur[i] = (x + a) & 0xff;
            break;
          case 2:
            cur[i] = (x + b) & 0xff;
            break;
          case 3:
            cur[i] = (x + ((a + b) >> 1)) & 0xff;
            break;
          case 4:
            cur[i] = (x + paeth(a, b, c)) & 0xff;
            break;
          default:
            return null;
        }
      }

      for (let col = 0; col < width; col++) {
        const s = col * channels;
        const d = (row * width + col) * 4;
        switch (colorType) {
          case 0:
            pixels.set([cur[s], cur[s], cur[s], 255], d);
            break;
          case 2:
            pixels.set([cur[s], cur[s + 1], cur[s + 2], 255], d);
            break;
          case 3: {
            const entry = cur[s];
            const p = entry * 3;
            const rgb = palette && p + 2 < palette.length ? palette.subarray(p, p + 3) : [0, 0, 0];
            const alpha = paletteAlpha && entry < paletteAlpha.length ? paletteAlpha[entry] : 255;
            pixels.set([rgb[0], rgb[1], rgb[2], alpha], d);
            break;
          }
          case 4:
            pixels.set([cur[s], cur[s], cur[s], cur[s + 1]], d);
            break;
          default:
            pixels.set([cur[s], cur[s + 1], cur[s + 2], cur[s + 3]], d);
        }
      }

      [prev, cur] = [cur, prev];
    }

    return { width, height, pixels };
  }

  /**
   * Similarity 0-1 of the template placed at (startX, startY), from the mean
   * per-pixel color distance over a sample of template pixels.
   */
  private compareRegion(
    src: DecodedImage,
    tpl: DecodedImage,
    startX: number,
    startY: number,
  ): number {
    let totalDiff = 0;
    const pixelCount = tpl.width * tpl.height;
    const sampleRate = Math.max(1, Math.floor(pixelCount / 500));
    let sampled = 0;

    for (let ty = 0; ty < tpl.height; ty++) {
      for (let tx = 0; tx < tpl.width; tx++) {
        if ((ty * tpl.width + tx) % sampleRate !== 0) continue;
        sampled++;

        const srcIdx = ((startY + ty) * src.width + (startX + tx)) * 4;
        const tplIdx = (ty * tpl.width + tx) * 4;

        const dr = Math.abs(src.pixels[srcIdx] - tpl.pixels[tplIdx]);
        const dg = Math.abs(src.pixels[srcIdx + 1] - tpl.pixels[tplIdx + 1]);
        const db = Math.abs(src.pixels[srcIdx + 2] - tpl.pixels[tplIdx + 2]);

        totalDiff += (dr + dg + db) / (255 * 3);
      }
    }

    if (sampled === 0) return 0;
    return 1 - totalDiff / sampled;
  }

  private refineMatch(
    src: DecodedImage,
    tpl: DecodedImage,
    coarseX: number,
    coarseY: number,
    step: number,
  ): { x: number; y: number; score: number } {
    let bestX = coarseX;
    let bestY = coarseY;
    let bestScore = 0;

    const minX = Math.max(0, coarseX - step);
    const maxX = Math.min(src.width - tpl.width, coarseX + step);
    const minY = Math.max(0, coarseY - step);
    const maxY = Math.min(src.height - tpl.height, coarseY + step);

    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const score = this.compareRegion(src, tpl, x, y);
        if (score > bestScore) {
          bestScore = score;
          bestX = x;
          bestY = y;
        }
      }
    }

    return { x: bestX, y: bestY, score: bestScore };
  }
}
