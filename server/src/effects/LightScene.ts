import { DuplicateIdError, NotFoundError } from '../errors';
import { builtinPaletteLibrary, DEFAULT_PALETTE_NAME } from '../presets/defaultPalettes';
import { ColorUtils } from './types';
import type { LightEffect } from './LightEffect';
import type { Palette } from './Palette';
import type { LedBuffer, RGB } from '../types';

interface EffectCrossfade {
  from: LightEffect;
  elapsed: number;
  duration: number;
}

export interface SceneOptions {
  id: string;
  /** Defaults to a copy of the built-in palettes */
  palettes?: ReadonlyMap<string, Palette>;
  currentPalette?: string;
}

/**
 * A set of effects with one active, sharing a named palette library.
 */
export class LightScene {
  readonly id: string;
  private effects: Map<string, LightEffect> = new Map();
  private _activeEffectId: string | null = null;
  private palettes: Map<string, Palette>;
  private _currentPalette: string;
  private crossfade: EffectCrossfade | null = null;

  constructor(options: SceneOptions) {
    if (!options.id) {
      throw new RangeError('Scene id must be a non-empty string');
    }
    this.id = options.id;
    this.palettes = options.palettes ? new Map(options.palettes) : builtinPaletteLibrary();
    if (this.palettes.size === 0) {
      throw new RangeError(`Scene ${options.id} needs at least one palette`);
    }
    this._currentPalette = resolvePaletteName(this.palettes, options.currentPalette ?? DEFAULT_PALETTE_NAME);
  }

  get activeEffectId(): string | null {
    return this._activeEffectId;
  }

  get currentPalette(): string {
    return this._currentPalette;
  }

  /** Crossfade weight of the active effect, or null when none is running */
  get crossfadeProgress(): number | null {
    if (!this.crossfade) return null;
    return ColorUtils.clamp(this.crossfade.elapsed / this.crossfade.duration, 0, 1);
  }

  // ---------------------------------------------------------------------------
  // Effects
  // ---------------------------------------------------------------------------

  /**
   * Add an effect. It takes the scene's current palette; the first effect
   * added becomes active.
   */
  addEffect(effect: LightEffect): void {
    if (this.effects.has(effect.id)) {
      throw new DuplicateIdError('effect', effect.id);
    }
    effect.adoptPalette(this._currentPalette);
    this.effects.set(effect.id, effect);
    if (this._activeEffectId === null) {
      this._activeEffectId = effect.id;
    }
  }

  /**
   * Remove an effect. Removing the active one selects the effect that
   * followed it (or the first remaining), or none when the scene is empty.
   */
  removeEffect(id: string): void {
    if (!this.effects.has(id)) {
      throw new NotFoundError('effect', id);
    }
    const ids = [...this.effects.keys()];
    this.effects.delete(id);

    if (this.crossfade && (this.crossfade.from.id === id || this._activeEffectId === id)) {
      this.crossfade = null;
    }
    if (this._activeEffectId === id) {
      const following = ids.slice(ids.indexOf(id) + 1).find((candidate) => this.effects.has(candidate));
      this._activeEffectId = following ?? this.effects.keys().next().value ?? null;
    }
  }

  getEffect(id: string): LightEffect {
    const effect = this.effects.get(id);
    if (!effect) {
      throw new NotFoundError('effect', id);
    }
    return effect;
  }

  /** Effects in insertion order */
  listEffects(): LightEffect[] {
    return [...this.effects.values()];
  }

  getActiveEffect(): LightEffect | null {
    return this._activeEffectId === null ? null : this.effects.get(this._activeEffectId) ?? null;
  }

  /** Switch immediately, cancelling a crossfade */
  setActiveEffect(id: string): void {
    if (!this.effects.has(id)) {
      throw new NotFoundError('effect', id);
    }
    this._activeEffectId = id;
    this.crossfade = null;
  }

  /**
   * Crossfade to another effect. The target is active from now on; the
   * previous effect keeps animating until the fade completes.
   * @param duration seconds; zero or less switches immediately
   */
  changeEffect(id: string, duration: number): void {
    if (!this.effects.has(id)) {
      throw new NotFoundError('effect', id);
    }
    const from = this.getActiveEffect();
    if (!(duration > 0) || !from || from.id === id) {
      this.setActiveEffect(id);
      return;
    }
    this.crossfade = { from, elapsed: 0, duration };
    this._activeEffectId = id;
  }

  // ---------------------------------------------------------------------------
  // Palettes
  // ---------------------------------------------------------------------------

  get paletteLibrary(): ReadonlyMap<string, Palette> {
    return this.palettes;
  }

  getPalette(name: string): Palette {
    const palette = this.palettes.get(name);
    if (!palette) {
      throw new NotFoundError('palette', name);
    }
    return palette;
  }

  /** Make a palette current for the scene and every effect in it */
  setPalette(name: string): void {
    if (!this.palettes.has(name)) {
      throw new NotFoundError('palette', name);
    }
    this._currentPalette = name;
    for (const effect of this.effects.values()) {
      effect.setPalette(name, this.palettes);
    }
  }

  /**
   * Replace the whole library. Transitions in flight keep their snapshots.
   * Names that disappear fall back to the scene's current palette, which
   * itself falls back to the first new name.
   */
  updatePalettes(palettes: ReadonlyMap<string, Palette>): void {
    if (palettes.size === 0) {
      throw new RangeError(`Scene ${this.id} needs at least one palette`);
    }
    this.palettes = new Map(palettes);
    this._currentPalette = resolvePaletteName(this.palettes, this._currentPalette);
    for (const effect of this.effects.values()) {
      if (!this.palettes.has(effect.paletteName)) {
        effect.adoptPalette(this._currentPalette);
      }
    }
  }

  /** Insert or replace one palette */
  updatePalette(name: string, palette: Palette): void {
    if (!name) {
      throw new RangeError('Palette name must be a non-empty string');
    }
    this.palettes.set(name, palette);
  }

  // ---------------------------------------------------------------------------
  // Replacement from loaded files
  // ---------------------------------------------------------------------------

  /**
   * Swap in a loaded effect list. The active effect is kept when the new
   * list still has it.
   */
  replaceEffects(effects: LightEffect[]): void {
    const next = new Map<string, LightEffect>();
    for (const effect of effects) {
      if (next.has(effect.id)) {
        throw new DuplicateIdError('effect', effect.id);
      }
      next.set(effect.id, effect);
    }
    const active = this._activeEffectId !== null && next.has(this._activeEffectId) ? this._activeEffectId : null;
    this.effects = next;
    this._activeEffectId = active ?? next.keys().next().value ?? null;
    this.crossfade = null;
  }

  /** Take over the content of another scene, keeping this scene's id */
  replaceContent(source: LightScene): void {
    this.palettes = new Map(source.palettes);
    this._currentPalette = source._currentPalette;
    this.effects = new Map(source.effects);
    this._activeEffectId = source._activeEffectId;
    this.crossfade = null;
  }

  // ---------------------------------------------------------------------------
  // Frame
  // ---------------------------------------------------------------------------

  /** Advance the active effect and, during a crossfade, the outgoing one */
  update(dt: number): void {
    const active = this.getActiveEffect();
    active?.update(dt);

    const fade = this.crossfade;
    if (fade) {
      if (fade.from !== active) {
        fade.from.update(dt);
      }
      if (dt > 0) {
        fade.elapsed += dt;
      }
      if (fade.elapsed >= fade.duration) {
        this.crossfade = null;
      }
    }
  }

  render(): LedBuffer {
    const active = this.getActiveEffect();
    if (!active) return [];
    const current = active.render(this.palettes);

    const fade = this.crossfade;
    if (!fade) return current;

    const alpha = ColorUtils.clamp(fade.elapsed / fade.duration, 0, 1);
    const previous = fade.from.render(this.palettes);
    const black: RGB = [0, 0, 0];
    return current.map((color, i) =>
      ColorUtils.quantize(ColorUtils.lerp(previous[i] ?? black, color, alpha))
    );
  }
}

function resolvePaletteName(palettes: ReadonlyMap<string, Palette>, preferred: string): string {
  if (palettes.has(preferred)) return preferred;
  const first = palettes.keys().next();
  if (first.done) {
    throw new RangeError('Palette library is empty');
  }
  return first.value;
}
