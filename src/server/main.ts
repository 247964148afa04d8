import dotenv from 'dotenv';
import { loadConfig } from '../config/loadConfig';
import { SavedHub } from '../hub';
import { createApp } from './createApp';

// Load environment variables
dotenv.config();

function start(): void {
  const config = loadConfig(process.env);
  const hub = SavedHub.create(config);

  createApp(hub).listen(config.port, () => {
    hub.logger.info('Saved Hub listening', { port: config.port, baseUrl: config.baseUrl });
  });
}

try {
  start();
} catch (error) {
  console.error('Failed to start server:', error);
  process.exit(1);
}
