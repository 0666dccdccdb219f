import { Palette } from '../effects/Palette';
import { ColorUtils } from '../effects/types';
import paletteColors from './palettes.json';

/** Palette given to new scenes and effects, and used when a name cannot be resolved */
export const DEFAULT_PALETTE_NAME = 'A';

function buildPalettes(source: Record<string, number[][]>): ReadonlyMap<string, Palette> {
  const palettes = new Map<string, Palette>();
  for (const [name, colors] of Object.entries(source)) {
    const rgb = colors.filter(ColorUtils.isRgb);
    if (rgb.length !== colors.length) {
      throw new RangeError(`Built-in palette ${name} has a malformed color`);
    }
    palettes.set(name, Palette.fromColors(rgb));
  }
  return palettes;
}

/**
 * Built-in palettes A-E, six evenly spaced colors each.
 */
export const BUILTIN_PALETTES = buildPalettes(paletteColors);

export const DEFAULT_PALETTE: Palette = (() => {
  const palette = BUILTIN_PALETTES.get(DEFAULT_PALETTE_NAME);
  if (!palette) {
    throw new RangeError(`Built-in palette ${DEFAULT_PALETTE_NAME} is missing`);
  }
  return palette;
})();

/** Fresh mutable copy of the built-in library for a new scene */
export function builtinPaletteLibrary(): Map<string, Palette> {
  return new Map(BUILTIN_PALETTES);
}
