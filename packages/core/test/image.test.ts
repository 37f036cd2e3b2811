import { describe, expect, it } from "vitest";
import {
  InvalidImageError,
  RasterImage,
  binImage,
  grayscale,
  rgbToHsv,
  type ImageSource
} from "../src/index.js";

describe("rgbToHsv", () => {
  it("places primaries on the color wheel", () => {
    expect(rgbToHsv({ r: 255, g: 0, b: 0 })).toEqual({ h: 0, s: 1, v: 1 });
    expect(rgbToHsv({ r: 0, g: 255, b: 0 }).h).toBe(120);
    expect(rgbToHsv({ r: 0, g: 0, b: 255 }).h).toBe(240);
    expect(rgbToHsv({ r: 255, g: 0, b: 255 }).h).toBe(300);
  });

  it("reports zero hue and saturation for grays", () => {
    const hsv = rgbToHsv({ r: 128, g: 128, b: 128 });
    expect(hsv.h).toBe(0);
    expect(hsv.s).toBe(0);
    expect(hsv.v).toBeCloseTo(128 / 255, 10);
  });
});

describe("grayscale", () => {
  it("uses luma weights", () => {
    expect(grayscale({ r: 255, g: 255, b: 255 })).toBeCloseTo(255, 9);
    expect(grayscale({ r: 100, g: 0, b: 0 })).toBeCloseTo(29.9, 9);
  });
});

describe("RasterImage", () => {
  it("drops alpha from RGBA input", () => {
    const image = RasterImage.fromRgba(1, 1, Uint8Array.from([10, 20, 30, 0]));
    expect(image.getPixel(0, 0)).toEqual({ r: 10, g: 20, b: 30 });
  });

  it("rejects mismatched buffers and empty dimensions", () => {
    expect(() => RasterImage.fromRgb(2, 2, new Uint8Array(3))).toThrow(InvalidImageError);
    expect(() => RasterImage.fromFunction(0, 3, () => ({ r: 0, g: 0, b: 0 }))).toThrow(InvalidImageError);
  });
});

describe("binImage", () => {
  it("is the identity at source resolution", () => {
    const image = RasterImage.fromFunction(3, 3, (x, y) => ({ r: x * 10, g: y * 10, b: 7 }));
    const binned = binImage(image, 3);
    expect(binned.rgbAt(2, 1)).toEqual({ r: 20, g: 10, b: 7 });
    expect(binned.pixel(2, 1)).toMatchObject({ x: 2, y: 1, rgb: { r: 20, g: 10, b: 7 } });
  });

  it("area-averages and rounds when downsampling", () => {
    const reds = [10, 20, 30, 41];
    const image = RasterImage.fromFunction(2, 2, (x, y) => ({ r: reds[y * 2 + x], g: 0, b: 255 }));
    const binned = binImage(image, 1);
    expect(binned.rgbAt(0, 0)).toEqual({ r: 25, g: 0, b: 255 });
    expect(binned.sourceWidth).toBe(2);
    expect(binned.sourceHeight).toBe(2);
  });

  it("repeats the nearest source pixel when upsampling", () => {
    const image = RasterImage.fromFunction(2, 1, (x) => (x === 0 ? { r: 0, g: 0, b: 0 } : { r: 255, g: 255, b: 255 }));
    const binned = binImage(image, 4);
    expect([0, 1, 2, 3].map((x) => binned.rgbAt(x, 0).r)).toEqual([0, 0, 255, 255]);
    expect([0, 1, 2, 3].map((y) => binned.rgbAt(3, y).r)).toEqual([255, 255, 255, 255]);
  });

  it("rejects zero-area sources before reading any pixel", () => {
    let reads = 0;
    const source: ImageSource = {
      width: 4,
      height: 0,
      getPixel: () => {
        reads++;
        return { r: 0, g: 0, b: 0 };
      }
    };
    expect(() => binImage(source, 4)).toThrow(InvalidImageError);
    expect(reads).toBe(0);
  });

  it("produces a frozen grid that survives a record round trip", () => {
    const image = RasterImage.fromFunction(4, 4, (x, y) => ({ r: x * 60, g: y * 60, b: 90 }));
    const binned = binImage(image, 2);
    expect(Object.isFrozen(binned)).toBe(true);

    const record = binned.toRecord();
    record.rgb[0] = 99;
    expect(binned.rgbAt(0, 0).r).not.toBe(99);
  });
});
