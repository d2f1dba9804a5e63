import { ConfigManager } from './configManager.js';
import { applyDebugSettings, createLogger, NAMESPACES } from './logging.js';
import { createRuntime } from './runtime.js';
import { createApp } from './server.js';
import { createMockWorld } from './world/mockWorld.js';

const mainLog = createLogger(NAMESPACES.server.main);

const TICK_MS = 1000;

const configManager = new ConfigManager();
applyDebugSettings(configManager.getConfig().debug);

const world = createMockWorld();
const runtime = createRuntime(configManager, world);
const app = createApp(runtime);

// Scheduler time advances with the wall clock here; a game host would pass its own frame delta.
let last = Date.now();
const ticker = setInterval(() => {
  const now = Date.now();
  runtime.tick((now - last) / 1000);
  last = now;
}, TICK_MS);

const port = configManager.getServerPort();
const server = app.listen(port, () => {
  mainLog('worldmind listening on http://localhost:%d with %d agents', port, runtime.directory.list().length);
});

function shutdown(): void {
  clearInterval(ticker);
  runtime.queue.clear();
  server.close(() => {
    Promise.all([runtime.queue.whenIdle(), runtime.scheduler.whenIdle()])
      .then(() => process.exit(0))
      .catch(e => {
        mainLog('shutdown failed: %s', e instanceof Error ? e.message : String(e));
        process.exit(1);
      });
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
