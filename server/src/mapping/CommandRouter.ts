import { EventEmitter } from 'events';
import { LightControlError, NotFoundError, UnknownParameterError, toError } from '../errors';
import {
  effectsFromDocument,
  effectsToDocument,
  palettesFromDocument,
  palettesToDocument,
  readJsonFile,
  sceneFromDocument,
  sceneToDocument,
  scenesFromDocument,
  writeJsonFile,
} from '../persistence/SceneSerializer';
import { parseAddress } from './addressParser';
import { coerceArgs } from './CommandArgs';
import {
  EFFECT_COMMANDS,
  MANAGER_COMMANDS,
  paletteFromChannels,
  SCENE_COMMANDS,
  SEGMENT_COMMANDS,
  stateReplies,
  type CommandTable,
} from './commands';
import type { OscArgument, OscMessage } from '../osc/OscMessage';
import type { LightScene } from '../effects/LightScene';
import type { SceneManager } from '../effects/SceneManager';
import type { RenderLoop } from '../streaming/RenderLoop';

export interface CommandError {
  address: string;
  code: string;
  message: string;
}

export type CommandOutcome =
  | { ok: true; replies: OscMessage[] }
  | { ok: false; error: CommandError };

export interface CommandRouterOptions {
  /** LED count for effects added without one */
  ledCount: number;
}

type SceneFileCommand = 'save_effects' | 'load_effects' | 'save_palettes' | 'load_palettes' | 'save' | 'load';
type ManagerFileCommand = 'load_scene' | 'save_scenes';

const SCENE_FILE_COMMANDS: ReadonlyArray<SceneFileCommand> = [
  'save_effects',
  'load_effects',
  'save_palettes',
  'load_palettes',
  'save',
  'load',
];
const MANAGER_FILE_COMMANDS: ReadonlyArray<ManagerFileCommand> = ['load_scene', 'save_scenes'];

/**
 * Turns control messages into intents for the render loop.
 *
 * Addresses and arguments are checked as soon as a message arrives; ids
 * are resolved when the intent runs inside a tick. Any failure is logged,
 * emitted as `commandError` and the command is dropped.
 *
 * File loads are read here and applied as one intent. Effect lists are
 * validated inside that intent, since missing palettes default to the
 * scene's current one.
 * Saves take their snapshot inside a tick and write afterwards.
 */
export class CommandRouter extends EventEmitter {
  private loop: RenderLoop;
  private options: CommandRouterOptions;
  private routed = 0;
  private failed = 0;

  constructor(loop: RenderLoop, options: CommandRouterOptions) {
    super();
    this.loop = loop;
    this.options = options;
  }

  /**
   * Route one message. Never rejects; failures are reported in the outcome
   * and through the `commandError` event.
   */
  async dispatch(message: OscMessage): Promise<CommandOutcome> {
    this.routed++;
    try {
      const reply = await this.execute(message);
      const replies = !reply ? [] : Array.isArray(reply) ? reply : [reply];
      return { ok: true, replies };
    } catch (error) {
      return { ok: false, error: this.report(message.address, toError(error)) };
    }
  }

  getStats(): { routed: number; failed: number } {
    return { routed: this.routed, failed: this.failed };
  }

  private async execute(message: OscMessage): Promise<OscMessage | OscMessage[] | void> {
    const { address, args } = message;
    const target = parseAddress(address);

    switch (target.kind) {
      case 'segment': {
        const { scene, effect, segment } = target;
        return this.submit(address, SEGMENT_COMMANDS, target.param, args, 'segment', (manager) => {
          const owner = resolveScene(manager, scene).getEffect(effect);
          return { segment: owner.getSegment(segment), effect: owner };
        });
      }
      case 'effect': {
        const { scene, effect } = target;
        return this.submit(address, EFFECT_COMMANDS, target.param, args, 'effect', (manager) => {
          const owner = manager.getScene(scene);
          return { effect: owner.getEffect(effect), scene: owner };
        });
      }
      case 'scene': {
        const { scene } = target;
        const fileCommand = SCENE_FILE_COMMANDS.find((name) => name === target.param);
        if (fileCommand) {
          const path = coerceArgs(target.param, args, 's').string(0);
          return this.sceneFile(address, scene, fileCommand, path);
        }
        return this.submit(address, SCENE_COMMANDS, target.param, args, 'scene', (manager) => ({
          scene: manager.getScene(scene),
          ledCount: this.options.ledCount,
        }));
      }
      case 'manager': {
        const fileCommand = MANAGER_FILE_COMMANDS.find((name) => name === target.param);
        if (fileCommand) {
          const path = coerceArgs(target.param, args, 's').string(0);
          return this.managerFile(address, fileCommand, path);
        }
        return this.submit(address, MANAGER_COMMANDS, target.param, args, 'scene_manager', (manager) => ({
          manager,
        }));
      }
      case 'palette': {
        // Flat colors for one palette name, applied to every scene
        const { name } = target;
        const palette = paletteFromChannels(name, args);
        return this.loop.run(address, (manager) => {
          for (const scene of manager.allScenes()) {
            scene.updatePalette(name, palette);
          }
        });
      }
      case 'request': {
        if (target.param !== 'init') {
          throw new UnknownParameterError('request', target.param);
        }
        coerceArgs(target.param, args, '', 'i');
        return this.loop.run(address, stateReplies);
      }
    }
  }

  /**
   * Validate against a command table, then run the bound mutation in a tick
   */
  private submit<C>(
    address: string,
    commands: CommandTable<C>,
    param: string,
    args: OscArgument[],
    targetName: string,
    resolve: (manager: SceneManager) => C
  ): Promise<OscMessage | void> {
    const definition = commands.get(param);
    if (!definition) {
      throw new UnknownParameterError(targetName, param);
    }
    const apply = definition.bind(coerceArgs(param, args, definition.args, definition.optional), param);
    return this.loop.run(address, (manager) => apply(resolve(manager)));
  }

  private async sceneFile(
    address: string,
    sceneId: string,
    command: SceneFileCommand,
    path: string
  ): Promise<void> {
    switch (command) {
      case 'save_effects': {
        const document = await this.loop.run(address, (manager) =>
          effectsToDocument(manager.getScene(sceneId).listEffects())
        );
        await writeJsonFile(path, document);
        break;
      }
      case 'save_palettes': {
        const document = await this.loop.run(address, (manager) =>
          palettesToDocument(manager.getScene(sceneId).paletteLibrary)
        );
        await writeJsonFile(path, document);
        break;
      }
      case 'save': {
        const document = await this.loop.run(address, (manager) => sceneToDocument(manager.getScene(sceneId)));
        await writeJsonFile(path, document);
        break;
      }
      case 'load_effects': {
        const document = await readJsonFile(path);
        await this.loop.run(address, (manager) => {
          const scene = manager.getScene(sceneId);
          const effects = effectsFromDocument(document, 'effects', {
            ledCount: this.options.ledCount,
            palette: scene.currentPalette,
          });
          scene.replaceEffects(effects);
        });
        break;
      }
      case 'load_palettes': {
        const palettes = palettesFromDocument(await readJsonFile(path));
        await this.loop.run(address, (manager) => manager.getScene(sceneId).updatePalettes(palettes));
        break;
      }
      case 'load': {
        const loaded = sceneFromDocument(await readJsonFile(path), '', this.options.ledCount);
        await this.loop.run(address, (manager) => manager.getScene(sceneId).replaceContent(loaded));
        break;
      }
    }
    console.log(`[CommandRouter] ${command} for scene ${sceneId}: ${path}`);
  }

  private async managerFile(address: string, command: ManagerFileCommand, path: string): Promise<void> {
    switch (command) {
      case 'save_scenes': {
        const document = await this.loop.run(address, (manager) => manager.toDocument());
        await writeJsonFile(path, document);
        break;
      }
      case 'load_scene': {
        const scenes = scenesFromDocument(await readJsonFile(path), this.options.ledCount);
        await this.loop.run(address, (manager) => manager.replaceScenes(scenes));
        break;
      }
    }
    console.log(`[CommandRouter] ${command}: ${path}`);
  }

  private report(address: string, error: Error): CommandError {
    this.failed++;
    const payload: CommandError = { address, code: errorCode(error), message: error.message };
    console.warn(`[CommandRouter] Dropped ${address} (${payload.code}): ${payload.message}`);
    this.emit('commandError', payload);
    return payload;
  }
}

function resolveScene(manager: SceneManager, sceneId: string | null): LightScene {
  if (sceneId !== null) {
    return manager.getScene(sceneId);
  }
  const active = manager.getActiveScene();
  if (!active) {
    throw new NotFoundError('scene', '(active)');
  }
  return active;
}

function errorCode(error: Error): string {
  if (error instanceof LightControlError) {
    return error.code;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof RangeError ? 'INVALID_VALUE' : 'INTERNAL';
}
