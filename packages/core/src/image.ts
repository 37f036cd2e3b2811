import { clampChannel, grayscale, rgbToHsv } from "./color.js";
import { InvalidImageError } from "./errors.js";
import type { BinnedImageRecord, Hsv, ImageSource, Pixel, Rgb } from "./types.js";

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidImageError(`Image must have positive integer dimensions, got ${width}x${height}`);
  }
}

export function assertImageSource(image: ImageSource): void {
  assertDimensions(image.width, image.height);
}

export class RasterImage implements ImageSource {
  private constructor(
    public readonly width: number,
    public readonly height: number,
    private readonly data: Uint8Array
  ) {}

  public static fromRgba(width: number, height: number, data: Uint8Array): RasterImage {
    return RasterImage.fromPacked(width, height, data, 4);
  }

  public static fromRgb(width: number, height: number, data: Uint8Array): RasterImage {
    return RasterImage.fromPacked(width, height, data, 3);
  }

  public static fromFunction(width: number, height: number, fn: (x: number, y: number) => Rgb): RasterImage {
    assertDimensions(width, height);
    const data = new Uint8Array(width * height * 3);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const c = fn(x, y);
        const idx = (y * width + x) * 3;
        data[idx] = clampChannel(c.r);
        data[idx + 1] = clampChannel(c.g);
        data[idx + 2] = clampChannel(c.b);
      }
    }
    return new RasterImage(width, height, data);
  }

  private static fromPacked(width: number, height: number, data: Uint8Array, channels: 3 | 4): RasterImage {
    assertDimensions(width, height);
    if (data.length !== width * height * channels) {
      throw new InvalidImageError(
        `Pixel buffer length ${data.length} does not match ${width}x${height}x${channels}`
      );
    }
    if (channels === 3) {
      return new RasterImage(width, height, Uint8Array.from(data));
    }
    const rgb = new Uint8Array(width * height * 3);
    for (let i = 0, j = 0; i < data.length; i += 4, j += 3) {
      rgb[j] = data[i];
      rgb[j + 1] = data[i + 1];
      rgb[j + 2] = data[i + 2];
    }
    return new RasterImage(width, height, rgb);
  }

  public getPixel(x: number, y: number): Rgb {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`PIXEL_OUT_OF_RANGE (${x},${y}) in ${this.width}x${this.height}`);
    }
    const idx = (y * this.width + x) * 3;
    return { r: this.data[idx], g: this.data[idx + 1], b: this.data[idx + 2] };
  }
}

/**
 * Source image resampled to a square grid of cells. Every conversion method reads from
 * the same instance; the backing arrays are private so nothing downstream can write them.
 */
export class BinnedImage {
  private readonly gray: Float64Array;

  private constructor(
    public readonly resolution: number,
    public readonly sourceWidth: number,
    public readonly sourceHeight: number,
    private readonly rgb: Uint8Array
  ) {
    this.gray = new Float64Array(resolution * resolution);
    for (let i = 0; i < this.gray.length; i++) {
      this.gray[i] = grayscale({ r: rgb[i * 3], g: rgb[i * 3 + 1], b: rgb[i * 3 + 2] });
    }
    Object.freeze(this);
  }

  public static create(resolution: number, sourceWidth: number, sourceHeight: number, rgb: Uint8Array): BinnedImage {
    if (rgb.length !== resolution * resolution * 3) {
      throw new Error(`BINNED_SIZE_MISMATCH expected ${resolution * resolution * 3} bytes, got ${rgb.length}`);
    }
    return new BinnedImage(resolution, sourceWidth, sourceHeight, Uint8Array.from(rgb));
  }

  public static fromRecord(record: BinnedImageRecord): BinnedImage {
    return BinnedImage.create(record.resolution, record.sourceWidth, record.sourceHeight, record.rgb);
  }

  public rgbAt(x: number, y: number): Rgb {
    const idx = (y * this.resolution + x) * 3;
    return { r: this.rgb[idx], g: this.rgb[idx + 1], b: this.rgb[idx + 2] };
  }

  public grayAt(x: number, y: number): number {
    return this.gray[y * this.resolution + x];
  }

  public hsvAt(x: number, y: number): Hsv {
    return rgbToHsv(this.rgbAt(x, y));
  }

  public pixel(x: number, y: number): Pixel {
    const rgb = this.rgbAt(x, y);
    const hsv = rgbToHsv(rgb);
    return {
      x,
      y,
      rgb,
      gray: this.grayAt(x, y),
      hue: hsv.h,
      saturation: hsv.s,
      value: hsv.v
    };
  }

  public toRecord(): BinnedImageRecord {
    return {
      resolution: this.resolution,
      sourceWidth: this.sourceWidth,
      sourceHeight: this.sourceHeight,
      rgb: Uint8Array.from(this.rgb)
    };
  }
}

function cellSpan(cell: number, source: number, resolution: number): [number, number] {
  const start = Math.floor((cell * source) / resolution);
  const end = Math.floor(((cell + 1) * source) / resolution);
  return [start, Math.max(end, start + 1)];
}

export function binImage(image: ImageSource, resolution: number): BinnedImage {
  assertImageSource(image);
  if (!Number.isInteger(resolution) || resolution <= 0) {
    throw new RangeError(`BIN_RESOLUTION_INVALID ${resolution}`);
  }

  const rgb = new Uint8Array(resolution * resolution * 3);
  for (let cy = 0; cy < resolution; cy++) {
    const [y0, y1] = cellSpan(cy, image.height, resolution);
    for (let cx = 0; cx < resolution; cx++) {
      const [x0, x1] = cellSpan(cx, image.width, resolution);
      let r = 0;
      let g = 0;
      let b = 0;
      for (let y = y0; y < y1; y++) {
        for (let x = x0; x < x1; x++) {
          const p = image.getPixel(x, y);
          r += p.r;
          g += p.g;
          b += p.b;
        }
      }
      const n = (y1 - y0) * (x1 - x0);
      const idx = (cy * resolution + cx) * 3;
      rgb[idx] = clampChannel(r / n);
      rgb[idx + 1] = clampChannel(g / n);
      rgb[idx + 2] = clampChannel(b / n);
    }
  }

  return BinnedImage.create(resolution, image.width, image.height, rgb);
}
