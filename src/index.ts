import express from 'express';
import { loadConfig } from './config';
import { createContext } from './context';
import createRouter from './routes';
import { Scheduler, cronCadence, stopOnSignals } from './scheduler';
import { createLogger } from './logger';

const log = createLogger('server');

const config = loadConfig();
const ctx = createContext(config);
const scheduler = new Scheduler(ctx, {
  projectId: config.projectId,
  monitorCadence: cronCadence(config.monitorCron),
  deliveryCadence: cronCadence(config.deliveryCron)
});

const app = express();
app.use(express.json());
app.use('/api', createRouter(ctx, scheduler));

const server = app.listen(config.port, () => {
  log.info('listening', { url: `http://localhost:${config.port}`, env: config.env });
  scheduler.start();
});

stopOnSignals(scheduler, () => server.close());
