import { Command } from 'commander';
import { loadConfig } from './config';
import { createContext } from './context';
import { Scheduler, cronCadence, stopOnSignals } from './scheduler';
import { runMonitor } from './jobs/monitor';
import { runAnalyze } from './jobs/analyze';
import { runDeliver } from './jobs/deliver';
import { createLogger } from './logger';
import { errorMessage } from './errors';

const log = createLogger('cli');

function buildProgram(): Command {
  const program = new Command();
  program.name('reel-momentum').description('Reel monitoring, momentum scoring and daily delivery');

  program
    .command('monitor')
    .description('Fetch, record and prune once')
    .option('-p, --project <id>', 'only this project')
    .action(async (opts: { project?: string }) => {
      const summary = await runMonitor(createContext(loadConfig()), opts.project);
      console.log(
        `monitor: ${summary.reels} reels, ${summary.snapshots} snapshots, ${summary.pruned + summary.removedMissing} removed${summary.blocked ? ' (source blocked)' : ''}`
      );
    });

  program
    .command('analyze')
    .description('Score reels and pick each project recommendation')
    .option('-p, --project <id>', 'only this project')
    .option('--inspect', 'print the ranking without saving anything')
    .action(async (opts: { project?: string; inspect?: boolean }) => {
      const output = await runAnalyze(createContext(loadConfig()), { projectId: opts.project, preview: opts.inspect });
      if (output.report !== undefined) {
        console.log(output.report);
        return;
      }
      const recommended = output.results.filter((result) => result.recommended).length;
      console.log(`analyze: ${output.results.length} projects, ${recommended} recommendations, ${output.failed} failed`);
    });

  program
    .command('deliver')
    .description('Send due recommendations')
    .option('-p, --project <id>', 'only this project')
    .action(async (opts: { project?: string }) => {
      const delivered = await runDeliver(createContext(loadConfig()), opts.project);
      console.log(`deliver: ${delivered} delivered`);
    });

  program
    .command('schedule')
    .description('Run the monitor and delivery loops until SIGINT/SIGTERM')
    .option('-p, --project <id>', 'only this project')
    .action((opts: { project?: string }) => {
      const config = loadConfig();
      const scheduler = new Scheduler(createContext(config), {
        projectId: opts.project ?? config.projectId,
        monitorCadence: cronCadence(config.monitorCron),
        deliveryCadence: cronCadence(config.deliveryCron)
      });
      stopOnSignals(scheduler);
      scheduler.start();
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.error('command_failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });
