import { ActiveSceneError, DuplicateIdError, NotFoundError } from '../errors';
import { sceneManagerToDocument, scenesFromDocument } from '../persistence/SceneSerializer';
import { createDefaultScene } from '../presets/defaultScene';
import { DEFAULT_LED_COUNT } from './types';
import type { LightScene } from './LightScene';
import type { LedBuffer, RemoveActiveScenePolicy, SceneManagerDocument } from '../types';

export interface SceneManagerOptions {
  /** LED count of the idle (all black) frame */
  idleLedCount?: number;
  removeActiveScene?: RemoveActiveScenePolicy;
}

/**
 * Registry of scenes with at most one active.
 */
export class SceneManager {
  private scenes: Map<string, LightScene> = new Map();
  private _activeSceneId: string | null = null;
  readonly idleLedCount: number;
  readonly removeActiveScenePolicy: RemoveActiveScenePolicy;

  constructor(options: SceneManagerOptions = {}) {
    this.idleLedCount = options.idleLedCount ?? DEFAULT_LED_COUNT;
    this.removeActiveScenePolicy = options.removeActiveScene ?? 'reject';
  }

  get activeSceneId(): string | null {
    return this._activeSceneId;
  }

  /** Register a scene; the first one becomes active */
  addScene(scene: LightScene): void {
    if (this.scenes.has(scene.id)) {
      throw new DuplicateIdError('scene', scene.id);
    }
    this.scenes.set(scene.id, scene);
    if (this._activeSceneId === null) {
      this._activeSceneId = scene.id;
    }
  }

  /**
   * Build and register the default scene: one effect with one segment
   * over the built-in palettes.
   * @param id defaults to the lowest free numeric id
   */
  createScene(id?: string): LightScene {
    const sceneId = id ?? this.nextFreeId();
    const scene = createDefaultScene(sceneId, this.idleLedCount);
    this.addScene(scene);
    return scene;
  }

  removeScene(id: string): void {
    if (!this.scenes.has(id)) {
      throw new NotFoundError('scene', id);
    }
    if (this._activeSceneId !== id) {
      this.scenes.delete(id);
      return;
    }

    switch (this.removeActiveScenePolicy) {
      case 'reject':
        throw new ActiveSceneError(id);
      case 'clear':
        this.scenes.delete(id);
        this._activeSceneId = null;
        return;
      case 'next':
        this.scenes.delete(id);
        this._activeSceneId = this.scenes.keys().next().value ?? null;
        return;
    }
  }

  switchScene(id: string): void {
    if (!this.scenes.has(id)) {
      throw new NotFoundError('scene', id);
    }
    this._activeSceneId = id;
  }

  getScene(id: string): LightScene {
    const scene = this.scenes.get(id);
    if (!scene) {
      throw new NotFoundError('scene', id);
    }
    return scene;
  }

  getActiveScene(): LightScene | null {
    return this._activeSceneId === null ? null : this.scenes.get(this._activeSceneId) ?? null;
  }

  /** Scene ids in creation order */
  listScenes(): string[] {
    return [...this.scenes.keys()];
  }

  /** Scenes in creation order */
  allScenes(): LightScene[] {
    return [...this.scenes.values()];
  }

  /**
   * Replace every scene at once; the first becomes active.
   * Nothing changes when the list holds a duplicate id.
   */
  replaceScenes(scenes: LightScene[]): void {
    const next = new Map<string, LightScene>();
    for (const scene of scenes) {
      if (next.has(scene.id)) {
        throw new DuplicateIdError('scene', scene.id);
      }
      next.set(scene.id, scene);
    }
    this.scenes = next;
    this._activeSceneId = scenes.length > 0 ? scenes[0].id : null;
  }

  /**
   * Replace every scene from a scene-manager document.
   * A document that fails validation leaves the manager untouched.
   * Effects without a `led_count` get the idle frame's LED count.
   */
  loadScenes(document: unknown): void {
    this.replaceScenes(scenesFromDocument(document, this.idleLedCount));
  }

  toDocument(): SceneManagerDocument {
    return sceneManagerToDocument(this);
  }

  update(dt: number): void {
    this.getActiveScene()?.update(dt);
  }

  /** Active scene output, or an all-black idle frame */
  render(): LedBuffer {
    const scene = this.getActiveScene();
    if (scene) {
      return scene.render();
    }
    const idle: LedBuffer = [];
    for (let i = 0; i < this.idleLedCount; i++) {
      idle.push([0, 0, 0]);
    }
    return idle;
  }

  private nextFreeId(): string {
    let n = 1;
    while (this.scenes.has(String(n))) {
      n++;
    }
    return String(n);
  }
}
