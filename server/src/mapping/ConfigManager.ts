import * as fs from 'fs/promises';
import * as path from 'path';
import { SchemaError } from '../errors';
import { DEFAULT_FPS, DEFAULT_LED_COUNT } from '../effects/types';
import { parseJson } from '../persistence/SceneSerializer';
import type { Config, QueueOverflowPolicy, RemoveActiveScenePolicy } from '../types';

const OVERFLOW_POLICIES: ReadonlyArray<QueueOverflowPolicy> = ['drop-oldest', 'drop-newest'];
const REMOVE_POLICIES: ReadonlyArray<RemoveActiveScenePolicy> = ['reject', 'clear', 'next'];

export class ConfigManager {
  private configPath: string;
  private config: Config;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
    this.env = env;
    this.config = this.applyEnv(ConfigManager.getDefaultConfig());
  }

  /**
   * Get default configuration
   */
  static getDefaultConfig(): Config {
    return {
      fps: DEFAULT_FPS,
      ledCount: DEFAULT_LED_COUNT,
      osc: {
        host: '0.0.0.0',
        port: 9090,
      },
      output: {
        enabled: true,
        host: '127.0.0.1',
        port: 5005,
        address: '/light/serial',
      },
      api: {
        enabled: true,
        port: 3000,
      },
      queue: {
        capacity: 1024,
        overflow: 'drop-oldest',
        maxPerTick: 256,
      },
      removeActiveScene: 'reject',
    };
  }

  /**
   * Load configuration from file, merged over the defaults.
   * A missing file means defaults; anything unreadable or invalid throws.
   */
  async load(): Promise<Config> {
    let text: string;
    try {
      text = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        console.log('[ConfigManager] No config file found, using defaults');
        this.config = this.applyEnv(ConfigManager.getDefaultConfig());
        return this.getConfig();
      }
      throw error;
    }

    const merged = mergeConfig(ConfigManager.getDefaultConfig(), parseJson(text, this.configPath));
    this.config = this.applyEnv(merged);
    console.log(`[ConfigManager] Configuration loaded from ${this.configPath}`);
    return this.getConfig();
  }

  /**
   * Save configuration to file
   */
  async save(config?: Config): Promise<void> {
    if (config) {
      this.config = config;
    }

    const data = JSON.stringify(this.config, null, 2);
    await fs.writeFile(this.configPath, data, 'utf-8');
    console.log(`[ConfigManager] Configuration saved to ${this.configPath}`);
  }

  /**
   * Get current configuration
   */
  getConfig(): Config {
    return structuredClone(this.config);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Environment overrides: PORT (monitor API), OSC_PORT, LED_COUNT, FPS
   */
  private applyEnv(config: Config): Config {
    const port = readIntEnv(this.env, 'PORT');
    const oscPort = readIntEnv(this.env, 'OSC_PORT');
    const ledCount = readIntEnv(this.env, 'LED_COUNT');
    const fps = readIntEnv(this.env, 'FPS');
    return {
      ...config,
      fps: fps ?? config.fps,
      ledCount: ledCount ?? config.ledCount,
      osc: { ...config.osc, port: oscPort ?? config.osc.port },
      api: { ...config.api, port: port ?? config.api.port },
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function readIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new SchemaError(`env.${name}`, `must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Overlay a parsed config file on the defaults. Known keys are type-checked;
 * unknown keys are ignored.
 */
export function mergeConfig(defaults: Config, value: unknown): Config {
  const file = section(value, 'config');
  const osc = section(file.osc, 'osc');
  const output = section(file.output, 'output');
  const api = section(file.api, 'api');
  const queue = section(file.queue, 'queue');

  const config: Config = {
    fps: positiveNumber(file.fps, 'fps') ?? defaults.fps,
    ledCount: positiveInteger(file.ledCount, 'ledCount') ?? defaults.ledCount,
    osc: {
      host: text(osc.host, 'osc.host') ?? defaults.osc.host,
      port: positiveInteger(osc.port, 'osc.port') ?? defaults.osc.port,
    },
    output: {
      enabled: flag(output.enabled, 'output.enabled') ?? defaults.output.enabled,
      host: text(output.host, 'output.host') ?? defaults.output.host,
      port: positiveInteger(output.port, 'output.port') ?? defaults.output.port,
      address: text(output.address, 'output.address') ?? defaults.output.address,
    },
    api: {
      enabled: flag(api.enabled, 'api.enabled') ?? defaults.api.enabled,
      port: positiveInteger(api.port, 'api.port') ?? defaults.api.port,
    },
    queue: {
      capacity: positiveInteger(queue.capacity, 'queue.capacity') ?? defaults.queue.capacity,
      overflow: oneOf(queue.overflow, OVERFLOW_POLICIES, 'queue.overflow') ?? defaults.queue.overflow,
      maxPerTick: positiveInteger(queue.maxPerTick, 'queue.maxPerTick') ?? defaults.queue.maxPerTick,
    },
    removeActiveScene:
      oneOf(file.removeActiveScene, REMOVE_POLICIES, 'removeActiveScene') ?? defaults.removeActiveScene,
  };

  const scenesFile = text(file.scenesFile, 'scenesFile') ?? defaults.scenesFile;
  if (scenesFile !== undefined) {
    config.scenesFile = scenesFile;
  }
  return config;
}

function section(value: unknown, at: string): Record<string, unknown> {
  if (value === undefined) return {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new SchemaError(at, 'must be an object');
  }
  return Object.fromEntries(Object.entries(value));
}

function positiveNumber(value: unknown, at: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new SchemaError(at, 'must be a positive number');
  }
  return value;
}

function positiveInteger(value: unknown, at: string): number | undefined {
  const n = positiveNumber(value, at);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new SchemaError(at, 'must be an integer');
  }
  return n;
}

function text(value: unknown, at: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new SchemaError(at, 'must be a non-empty string');
  }
  return value;
}

function flag(value: unknown, at: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new SchemaError(at, 'must be a boolean');
  }
  return value;
}

function oneOf<T extends string>(value: unknown, allowed: ReadonlyArray<T>, at: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new SchemaError(at, `must be one of ${allowed.join(', ')}`);
  }
  return match;
}
