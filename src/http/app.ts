import express from 'express';
import type { Express } from 'express';
import type { FaultOrchestrator } from '../orchestrator/orchestrator.js';
import { assessHealth } from '../system/health.js';
import { logger, describeError } from '../observability/logger.js';
import { cancelFaultHandler, injectFaultHandler, parseHistoryLimit } from './handlers.js';

export function createApp(orchestrator: FaultOrchestrator): Express {
  const app = express();
  app.use(express.json());

  app.post('/faults/:kind', injectFaultHandler(orchestrator));
  app.delete('/faults/:kind', cancelFaultHandler(orchestrator));

  app.get('/faults/active', (_req, res) => {
    res.status(200).json(orchestrator.getActiveFaults());
  });

  app.get('/faults/statistics', (_req, res) => {
    res.status(200).json(orchestrator.getFaultStatistics());
  });

  app.get('/faults/status', (_req, res) => {
    res.status(200).json({ status: orchestrator.getRecoveryStatus() });
  });

  app.get('/faults/history', (req, res) => {
    const historyLimit = orchestrator.limits.recoveryHistoryLimit;
    const limit = parseHistoryLimit(req.query.limit, Math.min(50, historyLimit), historyLimit);
    const outcomes = orchestrator.getRecoveryHistory(limit);

    res.status(200).json({
      outcomes,
      meta: {
        count: outcomes.length,
        limit,
        maxSize: historyLimit,
      },
    });
  });

  app.get('/system', async (_req, res) => {
    try {
      const snapshot = await orchestrator.readSystemState();
      res.status(200).json({
        snapshot,
        health: assessHealth(snapshot),
      });
    } catch (error) {
      logger.error('system_error', 'Failed to read system state', {
        error: describeError(error),
      });
      res.status(500).json({ error: 'Failed to read system state' });
    }
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', (_req, res) => {
    try {
      res.status(200).json({
        ...orchestrator.getMetrics(),
        limits: orchestrator.limits,
        faults: {
          enabled: orchestrator.chaos.isEnabled(),
          config: orchestrator.chaos.isEnabled() ? orchestrator.chaos.getConfig() : null,
        },
      });
    } catch (error) {
      logger.error('metrics_error', 'Failed to generate metrics snapshot', {
        error: describeError(error),
      });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  });

  return app;
}
