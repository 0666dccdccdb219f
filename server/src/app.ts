import { ConfigManager } from './mapping/ConfigManager';
import { CommandQueue } from './mapping/CommandQueue';
import { CommandRouter } from './mapping/CommandRouter';
import { SceneManager } from './effects/SceneManager';
import { OscHandler, type OscSender } from './osc/OscHandler';
import { readJsonFile } from './persistence/SceneSerializer';
import { createStartupScene } from './presets/defaultScene';
import { ApiServer } from './server/ApiServer';
import { FrameSender } from './streaming/FrameSender';
import { RenderLoop, type Intent } from './streaming/RenderLoop';
import { toError } from './errors';
import type { OscMessage } from './osc/OscMessage';
import type { Config } from './types';

/**
 * Wires config, scenes, OSC input, frame output and the monitor together.
 */
export class LightControlApp {
  private configManager: ConfigManager;
  private renderLoop: RenderLoop | null = null;
  private oscHandler: OscHandler | null = null;
  private frameSender: FrameSender | null = null;
  private apiServer: ApiServer | null = null;

  constructor(configManager: ConfigManager = new ConfigManager(process.env.CONFIG_PATH)) {
    this.configManager = configManager;
  }

  async start(): Promise<void> {
    console.log('Starting LED strip controller...\n');

    const config = await this.configManager.load();
    const manager = await this.createSceneManager(config);

    const queue = new CommandQueue<Intent>({
      capacity: config.queue.capacity,
      overflow: config.queue.overflow,
    });
    const renderLoop = new RenderLoop(manager, queue, {
      fps: config.fps,
      ledCount: config.ledCount,
      maxIntentsPerTick: config.queue.maxPerTick,
    });
    this.renderLoop = renderLoop;
    const router = new CommandRouter(renderLoop, { ledCount: config.ledCount });

    // Frame output
    if (config.output.enabled) {
      const frameSender = new FrameSender(config.output);
      frameSender.on('error', (error: Error) => {
        console.warn('[FrameSender] Output error:', error.message);
      });
      frameSender.start();
      renderLoop.addSink((frame) => frameSender.sendFrame(frame));
      this.frameSender = frameSender;
      console.log(`✓ Streaming frames to ${config.output.host}:${config.output.port}\n`);
    }

    // OSC input
    const oscHandler = new OscHandler(config.osc);
    oscHandler.on('message', (message: OscMessage, sender: OscSender) => {
      router
        .dispatch(message)
        .then((outcome) => {
          if (outcome.ok) {
            return sendAll(oscHandler, outcome.replies, sender);
          }
        })
        .catch((error: unknown) => {
          console.error('[OSC] Reply failed:', toError(error).message);
        });
    });
    oscHandler.on('error', (error: Error) => {
      console.error('[OSC] Listener error:', error.message);
    });
    await oscHandler.start();
    this.oscHandler = oscHandler;
    console.log(`✓ OSC listening on ${config.osc.host}:${config.osc.port}\n`);

    renderLoop.start();

    // Monitor API
    if (config.api.enabled) {
      const apiServer = new ApiServer(renderLoop, router);
      await apiServer.start(config.api.port);
      this.apiServer = apiServer;
    }
  }

  async stop(): Promise<void> {
    console.log('\nStopping LED strip controller...');
    this.renderLoop?.stop();
    await this.oscHandler?.stop();
    await this.frameSender?.stop();
    await this.apiServer?.stop();
    console.log('✓ Stopped\n');
  }

  private async createSceneManager(config: Config): Promise<SceneManager> {
    const manager = new SceneManager({
      idleLedCount: config.ledCount,
      removeActiveScene: config.removeActiveScene,
    });

    if (config.scenesFile) {
      manager.loadScenes(await readJsonFile(config.scenesFile));
      console.log(`✓ Loaded ${manager.listScenes().length} scene(s) from ${config.scenesFile}\n`);
    } else {
      manager.addScene(createStartupScene('1', config.ledCount));
      console.log('✓ Created startup scene\n');
    }
    return manager;
  }
}

async function sendAll(handler: OscHandler, replies: OscMessage[], target: OscSender): Promise<void> {
  for (const reply of replies) {
    await handler.send(reply, target);
  }
}
