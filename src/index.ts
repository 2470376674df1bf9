import path from 'node:path';
import { fileURLToPath } from 'node:url';
import express from 'express';
import { registerRoutes } from './app/routes.js';
import { BroadcastHub } from './broadcast/hub.js';
import { config } from './config/index.js';
import { loadRoundPrompt, promptConfigCandidates } from './config/prompt.js';
import { createModelClientFromConfig } from './generator/modelClient.js';
import { RoundGenerator } from './generator/roundGenerator.js';
import { createHistoryStore } from './history/index.js';
import { RoundScheduler } from './scheduler/roundScheduler.js';
import { SessionRegistry } from './session/sessionRegistry.js';
import { logger, setLogLevel } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

const defaultStaticDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'public');

async function main(): Promise<void> {
  setLogLevel(config.logLevel);

  const { store: history, close: closeHistory } = await createHistoryStore(config.redisUrl);
  const prompt = await loadRoundPrompt(promptConfigCandidates(config.promptConfigPath));

  const model = createModelClientFromConfig();
  if (model) {
    const check = await model.checkConnection();
    if (check.ok) logger.info('model_ready', { model: model.model });
    else logger.warn('model_not_ready', { model: model.model, error: check.error });
  } else {
    logger.warn('model_disabled', { reason: 'OPENAI_API_KEY not set' });
  }

  const sessions = new SessionRegistry();
  const hub = new BroadcastHub();
  const generator = new RoundGenerator({ model, prompt, history });
  const scheduler = new RoundScheduler({
    generator,
    hub,
    sessions,
    pollIntervalMs: config.roundPollIntervalMs,
  });

  const app = express();
  registerRoutes(app, {
    scheduler,
    generator,
    hub,
    sessions,
    history,
    keepAliveMs: config.sseKeepAliveMs,
    staticDir: config.staticDir || defaultStaticDir,
  });

  const host = '0.0.0.0';
  const server = app.listen(config.port, host, () => {
    logger.info('server_listening', { port: config.port, address: `${host}:${config.port}` });
  });

  scheduler.start();

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutting_down', { signal });

    // Ends every open stream so server.close() is not held open by SSE clients.
    hub.closeAll();
    server.close();
    scheduler
      .stop()
      .then(closeHistory)
      .catch(err => logger.error('shutdown_failed', { err: String(err) }))
      .finally(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
  logger.error('startup_failed', { err: String(err) });
  process.exit(1);
});
