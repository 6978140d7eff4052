// server.ts
import 'dotenv/config';
import { createApp, createServices } from './lib/app';
import { loadConfig } from './lib/config';
import { startPolling } from './lib/poller';

const config = loadConfig();
const services = createServices(config);
const { server, io } = createApp(services);

const poller = startPolling(services.pipeline, config.pollIntervalMs, { runImmediately: true });

server.listen(config.port, () => {
  console.log(`Scheduler started. Listening on http://localhost:${config.port} (callbacks via ${config.appUrl})`);
});

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, shutting down`);
  poller.stop();
  services.scheduler.shutdown();
  io.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
