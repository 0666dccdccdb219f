import { LightControlApp } from './app';
import { toError } from './errors';

// Create and start the application
const app = new LightControlApp();

const shutdown = (): void => {
  app
    .stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Error during shutdown:', toError(error).message);
      process.exit(1);
    });
};

// Handle shutdown gracefully
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Start the app
app.start().catch((error: unknown) => {
  console.error('Fatal error:', toError(error).message);
  process.exit(1);
});
