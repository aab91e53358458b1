import type { Request, Response } from 'express';
import type { FaultOrchestrator } from '../orchestrator/orchestrator.js';
import type { RejectionCode } from '../faults/types.js';
import { logger, describeError } from '../observability/logger.js';

type DurationParse =
  | { ok: true; durationSeconds: number | undefined }
  | { ok: false; reason: string };

const REJECTION_STATUS: Record<RejectionCode, number> = {
  UNKNOWN_KIND: 404,
  IN_COOLDOWN: 409,
  SHUTTING_DOWN: 503,
};

export function rejectionStatus(code: RejectionCode): number {
  return REJECTION_STATUS[code];
}

export function parseDurationBody(body: unknown): DurationParse {
  if (typeof body !== 'object' || body === null || !('durationSeconds' in body)) {
    return { ok: true, durationSeconds: undefined };
  }

  const value = body.durationSeconds;
  if (value === undefined || value === null) {
    return { ok: true, durationSeconds: undefined };
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return { ok: false, reason: 'durationSeconds must be a positive number' };
  }
  return { ok: true, durationSeconds: value };
}

export function parseHistoryLimit(raw: unknown, fallback: number, max: number): number {
  const limit = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (isNaN(limit)) return fallback;
  return Math.min(Math.max(1, limit), max);
}

export function injectFaultHandler(orchestrator: FaultOrchestrator) {
  return async (req: Request, res: Response): Promise<void> => {
    const { kind } = req.params;

    const duration = parseDurationBody(req.body);
    if (!duration.ok) {
      logger.warn('http_validation', 'Invalid injection request', { kind, reason: duration.reason });
      res.status(400).json({ error: 'Invalid request', reason: duration.reason });
      return;
    }

    try {
      const result = await orchestrator.tryInjectFault(kind, duration.durationSeconds);

      if (!result.accepted) {
        res.status(rejectionStatus(result.error.code)).json({
          error: result.error.message,
          code: result.error.code,
          kind: result.error.kind,
          retryAfterSeconds: result.error.retryAfterSeconds,
        });
        return;
      }

      const { fault } = result;
      res.status(202).json({
        accepted: true,
        faultId: fault.id,
        kind: fault.kind,
        state: fault.state,
        durationSeconds: fault.durationSeconds,
        startedAt: new Date(fault.startedAt).toISOString(),
      });
    } catch (error) {
      logger.error('inject_endpoint_error', 'Unexpected error in inject endpoint', {
        kind,
        error: describeError(error),
      });
      res.status(500).json({ error: 'Internal server error', kind });
    }
  };
}

export function cancelFaultHandler(orchestrator: FaultOrchestrator) {
  return (req: Request, res: Response): void => {
    const { kind } = req.params;

    if (!orchestrator.catalog.has(kind)) {
      res.status(404).json({ error: `Unknown fault kind: ${kind}`, code: 'UNKNOWN_KIND', kind });
      return;
    }

    if (!orchestrator.cancelFault(kind)) {
      res.status(404).json({ error: `No active fault of kind ${kind}`, kind });
      return;
    }

    res.status(200).json({ cancelled: true, kind });
  };
}
