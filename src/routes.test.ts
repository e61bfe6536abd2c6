import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express from 'express';
import axios, { type AxiosInstance } from 'axios';
import type { Server } from 'http';
import createRouter from './routes';
import { Scheduler } from './scheduler';
import { FakeSource, profileBody, testContext } from './test-helpers';
import { createLogger } from './logger';

describe('api routes', () => {
  let server: Server;
  let api: AxiosInstance;
  let ctx: ReturnType<typeof testContext>;
  let scheduler: Scheduler;

  beforeEach(async () => {
    const source = new FakeSource().respond('chef', { status: 200, body: profileBody([{ code: 'r1', views: 10 }]) });
    ctx = testContext({ source });
    scheduler = new Scheduler(ctx, { monitorCadence: () => 0, deliveryCadence: () => 0 }, createLogger('api-test'));

    const app = express();
    app.use(express.json());
    app.use('/api', createRouter(ctx, scheduler));

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    api = axios.create({ baseURL: `http://127.0.0.1:${port}/api`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('creates a project with normalized handles', async () => {
    const res = await api.post('/projects', { name: 'Food', ownerId: 'u1', handles: ['@chef', 'chef, baker'] });
    expect(res.status).toBe(201);
    expect(res.data).toMatchObject({ name: 'Food', ownerId: 'u1', active: true, handles: ['chef', 'baker'] });

    const list = await api.get('/projects');
    expect(list.data).toHaveLength(1);
    expect(list.data[0].handles).toEqual(['chef', 'baker']);
  });

  it('rejects incomplete input', async () => {
    expect((await api.post('/projects', { name: 'Food' })).status).toBe(400);
    expect((await api.patch('/projects/nope', { active: 'yes' })).status).toBe(400);
    expect((await api.patch('/projects/nope', { active: false })).status).toBe(404);
    expect((await api.put('/owners/u1/notification', {})).status).toBe(400);
  });

  it('validates delivery settings', async () => {
    const { data: project } = await api.post('/projects', { name: 'Food', ownerId: 'u1' });

    expect((await api.put(`/projects/${project.id}/delivery`, { sendHour: 24 })).status).toBe(400);
    expect((await api.put(`/projects/${project.id}/delivery`, { sendHour: 9, timezone: 'Mars/Olympus' })).status).toBe(400);
    expect((await api.put('/projects/missing/delivery', { sendHour: 9 })).status).toBe(404);

    const saved = await api.put(`/projects/${project.id}/delivery`, { sendHour: 9, timezone: 'Europe/Berlin' });
    expect(saved.status).toBe(200);
    expect(saved.data).toEqual({ projectId: project.id, sendHour: 9, timezone: 'Europe/Berlin', maxItems: 1 });
  });

  it('runs a monitor cycle and previews the ranking', async () => {
    const { data: project } = await api.post('/projects', { name: 'Food', ownerId: 'u1', handles: ['chef'] });

    const run = await api.post('/run/monitor', {});
    expect(run.status).toBe(200);
    expect(run.data.monitor).toMatchObject({ projects: 1, reels: 1, snapshots: 1, blocked: false });

    const reels = await api.get(`/projects/${project.id}/reels`);
    expect(reels.data).toHaveLength(1);

    const ranking = await api.get(`/projects/${project.id}/ranking`);
    expect(ranking.data).toEqual({ ranked: [], report: 'Food: no analyzable reels' });
  });

  it('runs an on-demand preview analysis', async () => {
    await api.post('/projects', { name: 'Food', ownerId: 'u1' });
    const res = await api.post('/run/analyze', { preview: true });
    expect(res.status).toBe(200);
    expect(res.data.report).toBe('Food: no analyzable reels');
  });

  it('refuses manual runs while shutting down', async () => {
    scheduler.shutdown.request();
    const res = await api.post('/run/monitor', {});
    expect(res.status).toBe(503);
    expect(res.data).toEqual({ error: 'shutting-down' });
  });

  it('reports health', async () => {
    const res = await api.get('/health');
    expect(res.data).toEqual({ ok: true, scheduler: false, blocked: false });
  });
});
