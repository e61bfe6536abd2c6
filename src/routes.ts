import express, { type Request, type Response } from 'express';
import type { JobContext } from './context';
import type { Scheduler } from './scheduler';
import {
  addHandles,
  createProject,
  listHandles,
  saveDeliverySettings,
  saveNotificationAccount,
  setProjectActive
} from './projects';
import { isValidTimezone } from './lib/time';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { formatRanking, rankProject } from './jobs/analyze';
import { runDeliver } from './jobs/deliver';

const log = createLogger('api');

type Handler = (req: Request, res: Response) => Promise<unknown>;

function route(name: string, handler: Handler) {
  return (req: Request, res: Response) => {
    handler(req, res).catch((err: unknown) => {
      log.error('request_failed', { route: name, error: errorMessage(err) });
      if (!res.headersSent) res.status(500).send({ error: `${name}-failed`, detail: errorMessage(err) });
    });
  };
}

function bodyField(req: Request, key: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) return undefined;
  return Reflect.get(body, key);
}

function text(req: Request, key: string): string | undefined {
  const value = bodyField(req, key);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function stringList(req: Request, key: string): string[] | undefined {
  const value = bodyField(req, key);
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
  return undefined;
}

export default function createRouter(ctx: JobContext, scheduler: Scheduler): express.Router {
  const router = express.Router();
  const { store } = ctx;

  const findProject = (id: string) => store.first('projects', { where: { id } });

  router.get('/health', (req, res) => {
    res.send({ ok: true, scheduler: scheduler.running, blocked: ctx.fetcher.isBlocked });
  });

  router.get(
    '/projects',
    route('list-projects', async (req, res) => {
      const projects = await store.select('projects', { orderBy: 'createdAt' });
      res.send(
        await Promise.all(projects.map(async (project) => ({ ...project, handles: await listHandles(store, project.id) })))
      );
    })
  );

  router.post(
    '/projects',
    route('create-project', async (req, res) => {
      const name = text(req, 'name');
      const ownerId = text(req, 'ownerId');
      if (!name || !ownerId) return res.status(400).send({ error: 'missing name or ownerId' });
      const project = await createProject(store, { name, ownerId, handles: stringList(req, 'handles') ?? [] });
      res.status(201).send({ ...project, handles: await listHandles(store, project.id) });
    })
  );

  router.patch(
    '/projects/:id',
    route('update-project', async (req, res) => {
      const active = bodyField(req, 'active');
      if (typeof active !== 'boolean') return res.status(400).send({ error: 'active must be a boolean' });
      const changed = await setProjectActive(store, req.params.id, active);
      if (!changed) return res.status(404).send({ error: 'project-not-found' });
      res.send({ success: true, active });
    })
  );

  router.post(
    '/projects/:id/accounts',
    route('add-accounts', async (req, res) => {
      const handles = stringList(req, 'handles');
      if (!handles) return res.status(400).send({ error: 'missing handles' });
      if (!(await findProject(req.params.id))) return res.status(404).send({ error: 'project-not-found' });
      const added = await addHandles(store, req.params.id, handles);
      res.send({ added, handles: await listHandles(store, req.params.id) });
    })
  );

  router.put(
    '/projects/:id/delivery',
    route('save-delivery', async (req, res) => {
      const sendHour = bodyField(req, 'sendHour');
      const timezone = text(req, 'timezone') ?? 'UTC';
      if (typeof sendHour !== 'number' || !Number.isInteger(sendHour) || sendHour < 0 || sendHour > 23) {
        return res.status(400).send({ error: 'sendHour must be an integer 0-23' });
      }
      if (!isValidTimezone(timezone)) return res.status(400).send({ error: 'unknown timezone' });
      if (!(await findProject(req.params.id))) return res.status(404).send({ error: 'project-not-found' });
      res.send(await saveDeliverySettings(store, { projectId: req.params.id, sendHour, timezone }));
    })
  );

  router.put(
    '/owners/:ownerId/notification',
    route('save-notification', async (req, res) => {
      const destination = text(req, 'destination');
      if (!destination) return res.status(400).send({ error: 'missing destination' });
      res.send(await saveNotificationAccount(store, { ownerId: req.params.ownerId, destination }));
    })
  );

  router.get(
    '/projects/:id/reels',
    route('list-reels', async (req, res) => {
      const reels = await store.select('reels', {
        where: { projectId: req.params.id },
        orderBy: 'score',
        descending: true
      });
      res.send(reels);
    })
  );

  // preview ranking: computes but never writes
  router.get(
    '/projects/:id/ranking',
    route('ranking', async (req, res) => {
      const project = await findProject(req.params.id);
      if (!project) return res.status(404).send({ error: 'project-not-found' });
      const ranked = await rankProject(store, project.id);
      res.send({ ranked, report: formatRanking(project, ranked) });
    })
  );

  router.post(
    '/run/monitor',
    route('run-monitor', async (req, res) => {
      const cycle = await scheduler.runMonitorCycle(text(req, 'projectId'));
      if (!cycle) return res.status(503).send({ error: 'shutting-down' });
      const { analyze } = cycle;
      res.send({ monitor: cycle.monitor, analyze: analyze && { failed: analyze.failed, results: analyze.results } });
    })
  );

  router.post(
    '/run/analyze',
    route('run-analyze', async (req, res) => {
      const preview = bodyField(req, 'preview') === true;
      res.send(await scheduler.runAnalyze({ projectId: text(req, 'projectId'), preview }));
    })
  );

  router.post(
    '/run/deliver',
    route('run-deliver', async (req, res) => {
      res.send({ delivered: await runDeliver(ctx, text(req, 'projectId')) });
    })
  );

  return router;
}
