#!/usr/bin/env node
import { TeamGateServer } from './http/team-gate-server.js';

/**
 * Start the gate on its own. Protected routes only expose /whoami; embed
 * TeamGateServer (or createGateServer) to put an application behind it.
 */
async function main() {
  const configPath = process.env.CONFIG_PATH;
  const server = new TeamGateServer(configPath);

  console.log('Starting team gate...');
  console.log(`Config: ${configPath || 'default'}`);

  try {
    await server.start();
  } catch (error) {
    console.error('Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const shutdown = () => {
    console.log('\nShutting down server...');
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to stop server:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
