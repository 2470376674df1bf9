import type { Express, NextFunction, Request, Response } from 'express';
import express from 'express';
import { runDeliveryLoop } from '../broadcast/delivery.js';
import { formatEvent, type BroadcastHub } from '../broadcast/hub.js';
import type { RoundGenerator } from '../generator/roundGenerator.js';
import type { HistoryStore } from '../history/types.js';
import type { RoundScheduler } from '../scheduler/roundScheduler.js';
import type { SessionRegistry } from '../session/sessionRegistry.js';
import { logger } from '../utils/logger.js';
import { applySessionAction, buildSessionReport, parseSessionQuery } from './handlers/session.js';
import { corsMiddleware } from './middleware/cors.js';
import { makeStaticHandler } from './static.js';

export type AppDeps = {
  scheduler: Pick<RoundScheduler, 'requestRound' | 'getStatus'>;
  generator: Pick<RoundGenerator, 'stats'>;
  hub: BroadcastHub;
  sessions: SessionRegistry;
  history: HistoryStore;
  keepAliveMs: number;
  staticDir: string;
};

export function registerRoutes(app: Express, deps: AppDeps): void {
  app.use(express.json({ limit: '16kb' }));
  app.use(corsMiddleware);

  app.get('/health', (_req, res) => {
    res.status(200).json({
      ok: true,
      ts: Date.now(),
      subscribers: deps.hub.size(),
      using_persisted_backend: deps.history.usingPersistedBackend,
      scheduler: deps.scheduler.getStatus(),
      generation: deps.generator.stats(),
    });
  });

  app.get('/trigger', (_req, res) => {
    if (deps.scheduler.requestRound()) {
      logger.info('round_triggered');
      return res.status(200).json({ message: 'New round generation triggered' });
    }
    return res.status(202).json({ message: 'New round generation already requested' });
  });

  app.get('/stream', (_req, res) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    // Subscribe before requesting, so this viewer receives the round it asks for.
    const sub = deps.hub.subscribe();
    deps.scheduler.requestRound();
    res.write(formatEvent({ type: 'connected', message: 'Connection established' }));

    const ac = new AbortController();
    res.on('close', () => ac.abort());

    runDeliveryLoop(deps.hub, sub, { write: frame => res.write(frame) }, { keepAliveMs: deps.keepAliveMs, signal: ac.signal })
      .then(exit => {
        logger.info('stream_closed', { id: sub.id, exit });
        if (!res.writableEnded) res.end();
      })
      .catch(err => {
        logger.error('stream_failed', { id: sub.id, err: String(err) });
        if (!res.writableEnded) res.end();
      });
  });

  app.get('/session', async (req, res) => {
    try {
      const report = await buildSessionReport(deps, parseSessionQuery(req.query));
      res.status(200).json(report);
    } catch (err) {
      logger.error('session_report_failed', { err: String(err) });
      res.status(500).json({ error: 'session_report_failed' });
    }
  });

  app.post('/session', async (req, res) => {
    try {
      const outcome = await applySessionAction(deps, req.body);
      res.status(outcome.status).json(outcome.body);
    } catch (err) {
      logger.error('session_action_failed', { err: String(err) });
      res.status(500).json({ error: 'session_action_failed' });
    }
  });

  const serveStatic = makeStaticHandler(deps.staticDir);
  app.get('*', (req, res, next) => {
    serveStatic(req, res).catch(next);
  });

  // Malformed JSON bodies land here from express.json().
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.warn('request_failed', { err: String(err) });
    if (res.headersSent) return;
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({ error: status === 400 ? 'invalid_json' : 'internal_error' });
  });
}
