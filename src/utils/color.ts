import { randomRange, type RandomSource } from './rng';

/**
 * Display tint handed to the presentation layer alongside each policy.
 * Components are in [0, 1]; `hex` is the equivalent `#rrggbb` string.
 * One instance is shared by a genome, its clones and its archive captures.
 */
export interface DisplayColor {
  readonly hue: number;
  readonly saturation: number;
  readonly brightness: number;
  readonly hex: string;
}

/** Saturation used for every generated bird tint. */
export const DISPLAY_SATURATION = 0.8;
/** Brightness used for every generated bird tint. */
export const DISPLAY_BRIGHTNESS = 0.9;

/**
 * Convert HSB (a.k.a. HSV) components to a `#rrggbb` string.
 *
 * @example
 * hsbToHex(0, 1, 1); // '#ff0000'
 */
export function hsbToHex(hue: number, saturation: number, brightness: number): string {
  const h = (((hue % 1) + 1) % 1) * 6;
  const sector = Math.floor(h);
  const f = h - sector;
  const p = brightness * (1 - saturation);
  const q = brightness * (1 - saturation * f);
  const t = brightness * (1 - saturation * (1 - f));
  const [r, g, b] = [
    [brightness, t, p],
    [q, brightness, p],
    [p, brightness, t],
    [p, q, brightness],
    [t, p, brightness],
    [brightness, p, q],
  ][sector % 6];
  const channel = (v: number) =>
    Math.round(Math.min(1, Math.max(0, v)) * 255)
      .toString(16)
      .padStart(2, '0');
  return `#${channel(r)}${channel(g)}${channel(b)}`;
}

/**
 * Build a color from explicit components.
 */
export function makeDisplayColor(
  hue: number,
  saturation = DISPLAY_SATURATION,
  brightness = DISPLAY_BRIGHTNESS
): DisplayColor {
  return { hue, saturation, brightness, hex: hsbToHex(hue, saturation, brightness) };
}

/**
 * Random hue at the fixed bird saturation/brightness.
 */
export function randomDisplayColor(rng: RandomSource): DisplayColor {
  return makeDisplayColor(randomRange(rng, 0, 1));
}
