import express, { NextFunction, Request, Response } from 'express';
import { Ajv, type JSONSchemaType } from 'ajv';
import { createLogger, NAMESPACES } from './logging.js';
import type { Runtime } from './runtime.js';
import type { FailureStage, WorkflowResult } from './types/Decision.js';
import { defaultEventDescription } from './jobs/gameEvents.js';

const routesLog = createLogger(NAMESPACES.server.routes);

interface EventBody {
  agentId: string;
  eventKind: string;
  description?: string;
}

const ajv = new Ajv({ allErrors: true, strict: false });
const eventBodySchema: JSONSchemaType<EventBody> = {
  type: 'object',
  required: ['agentId', 'eventKind'],
  properties: {
    agentId: { type: 'string', minLength: 1 },
    eventKind: { type: 'string', minLength: 1 },
    description: { type: 'string', nullable: true }
  }
};
const validateEventBody = ajv.compile(eventBodySchema);

const FAILURE_STATUS: Record<FailureStage, number> = {
  busy: 409,
  stale: 503,
  sense: 502,
  reason: 502
};

export function serializeResult(result: WorkflowResult) {
  if (result.kind === 'success') {
    return {
      kind: result.kind,
      agentId: result.agentId,
      perception: result.perception,
      decision: result.decision,
      actionResults: result.actionResults.map(({ succeeded, message, error }) => ({
        succeeded,
        message,
        ...(error ? { error: error.message } : {})
      }))
    };
  }
  return { kind: result.kind, agentId: result.agentId, stage: result.stage, error: result.error.message };
}

function parseLimit(value: unknown, fallback: number): number {
  if (typeof value !== 'string') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? Math.min(parsed, 500) : fallback;
}

export function createApp(runtime: Runtime): express.Express {
  const { directory, queue, scheduler, thoughtLog, memory, workflow, inFlight, context } = runtime;
  const app = express();

  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/status', (_req, res) => {
    res.json({
      worldReady: context.isWorldReady(),
      enableWorldAI: context.settings.enableWorldAI,
      reasoner: runtime.reasoner.name,
      inFlight: inFlight.list(),
      memory: { totalEntries: memory.totalEntries, capacity: memory.maxEntriesPerAgent },
      queue: { size: queue.size, draining: queue.isDraining, ...queue.stats },
      scheduler: { running: scheduler.isRunning, ...scheduler.stats }
    });
  });

  app.get('/api/thoughts', (req, res) => {
    const limit = parseLimit(req.query.limit, 20);
    const agentId = req.query.agentId;
    const records = typeof agentId === 'string' && agentId
      ? thoughtLog.forAgent(agentId, limit)
      : thoughtLog.latest(limit);
    res.json({ thoughts: records });
  });

  app.get('/api/agents', (_req, res) => {
    res.json({ agents: directory.list() });
  });

  app.get('/api/agents/:id/memory', (req, res) => {
    const agentId = req.params.id;
    if (!directory.get(agentId)) {
      return res.status(404).json({ error: `Agent ${agentId} not found` });
    }
    res.json({ agentId, context: memory.getContext(agentId), entries: memory.entries(agentId) });
  });

  app.post('/api/agents/:id/think', async (req, res, next) => {
    const agentId = req.params.id;
    if (!directory.get(agentId)) {
      return res.status(404).json({ error: `Agent ${agentId} not found` });
    }
    try {
      const result = await workflow.execute(agentId, { trigger: { source: 'manual' } });
      thoughtLog.recordResult(result, 'manual');
      const status = result.kind === 'success' ? 200 : FAILURE_STATUS[result.stage];
      res.status(status).json(serializeResult(result));
    } catch (e) {
      next(e);
    }
  });

  app.post('/api/events', (req, res) => {
    const body: unknown = req.body;
    if (!validateEventBody(body)) {
      const details = (validateEventBody.errors || []).map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
      return res.status(400).json({ error: 'Invalid event', details });
    }
    if (!directory.get(body.agentId)) {
      return res.status(404).json({ error: `Agent ${body.agentId} not found` });
    }
    const description = body.description || defaultEventDescription(body.eventKind);
    const accepted = queue.enqueue(body.agentId, body.eventKind, description);
    res.status(accepted ? 202 : 200).json({ accepted, queued: queue.size });
  });

  app.post('/api/scheduler/run', async (_req, res, next) => {
    try {
      const dispatched = await scheduler.runPass();
      res.json({ dispatched });
    } catch (e) {
      next(e);
    }
  });

  // Body parser failures and anything a route passes on
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Invalid JSON body', detail: err.message });
    }
    const message = err instanceof Error ? err.message : String(err);
    routesLog('unhandled route error: %s', message);
    res.status(500).json({ error: message });
  });

  return app;
}
