import type { Hsv, Rgb } from "./types.js";

export function grayscale(rgb: Rgb): number {
  return 0.299 * rgb.r + 0.587 * rgb.g + 0.114 * rgb.b;
}

export function rgbToHsv(rgb: Rgb): Hsv {
  const max = Math.max(rgb.r, rgb.g, rgb.b);
  const min = Math.min(rgb.r, rgb.g, rgb.b);
  const delta = max - min;

  let h = 0;
  if (delta > 0) {
    if (max === rgb.r) {
      h = 60 * (((rgb.g - rgb.b) / delta) % 6);
    } else if (max === rgb.g) {
      h = 60 * ((rgb.b - rgb.r) / delta + 2);
    } else {
      h = 60 * ((rgb.r - rgb.g) / delta + 4);
    }
    if (h < 0) h += 360;
    if (h >= 360) h -= 360;
  }

  return {
    h,
    s: max === 0 ? 0 : delta / max,
    v: max / 255
  };
}

export function clampChannel(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}
