import { join } from 'path';
import { Api } from 'grammy';
import { loadConfig } from './config.js';
import { ScheduledJobs } from './jobs.js';
import { Logger } from './logger.js';
import { Reconciler } from './reconciler.js';
import { StatusClassifier } from './routing/status.js';
import { loadRouting } from './routing/table.js';
import { Scheduler } from './scheduler.js';
import { createServer } from './server.js';
import { createBot } from './bot.js';
import { CompletionActions } from './services/actions.js';
import { CommentRelay } from './services/comments.js';
import { Directory } from './services/directory.js';
import { Notifier } from './services/notifier.js';
import { PartnerBoards } from './services/partners.js';
import { StateManager } from './services/state.js';
import { TaskCreator } from './services/tasks.js';
import { TelegramTransport } from './services/telegram.js';
import { TrackerService } from './services/tracker.js';
import { errorMessage } from './utils/errors.js';
import { Workflow } from './workflow.js';

async function main() {
  // Load config (throws on missing required vars)
  const config = loadConfig();
  const log = new Logger(config.logLevel);
  const routing = loadRouting(config.routingPath);

  console.log('');
  console.log('╔════════════════════════════════════════════════╗');
  console.log('║  Telegram → Yandex Tracker relay               ║');
  console.log('║  Long polling with reconciliation poll         ║');
  console.log('╚════════════════════════════════════════════════╝');
  console.log('');

  log.info(`Org:         ${config.tracker.cloudOrgId ? `cloud ${config.tracker.cloudOrgId}` : config.tracker.orgId}`);
  log.info(`Departments: ${[...routing.departments.keys()].join(', ')}`);
  log.info(`Partners:    queue ${routing.partners.queue}, boards ${routing.partners.autoCreateBoards ? 'auto' : 'off'}`);
  log.info(`Managers:    ${routing.managers.size}`);
  log.info(`Timezone:    ${routing.timezone}`);
  log.info(`Webhook:     port ${config.webhook.port}`);
  log.info(`Secret:      ${config.webhook.secret ? 'enabled' : 'disabled'}`);
  log.info(`Reconcile:   every ${routing.schedule.reconcileIntervalSeconds}s, ${config.reconcileConcurrency} in parallel`);
  console.log('');

  // Init services
  const dbPath = config.dbPath ?? join(process.cwd(), '.relay-bot.db');
  const state = new StateManager(dbPath, log.child('state'));
  const statuses = new StatusClassifier(routing.statuses);
  const tracker = new TrackerService(config.tracker, statuses, log.child('tracker'));

  // Verify connections
  try {
    const me = await tracker.getMyself();
    log.success(`Tracker: ${me.display ?? me.login} (${me.login})`);
  } catch (error) {
    log.error(`Tracker connection failed: ${errorMessage(error)}`);
    process.exit(1);
  }

  const directory = new Directory(routing, state);
  const boards = new PartnerBoards(routing, tracker, log.child('boards'));

  const transport = new TelegramTransport(new Api(config.telegram.token), config.telegram.token);
  const notifier = new Notifier(transport, log.child('notify'));
  const actions = new CompletionActions(state, notifier, log.child('actions'));
  const reconciler = new Reconciler(
    routing,
    state,
    tracker,
    notifier,
    directory,
    actions,
    statuses,
    log.child('reconcile'),
    config.reconcileConcurrency
  );
  const relay = new CommentRelay(state, tracker, transport, notifier, log.child('comments'));
  const creator = new TaskCreator(routing, state, tracker, notifier, directory, boards, log.child('tasks'));
  const workflow = new Workflow(routing, state, tracker, notifier, relay, creator, reconciler, log.child('workflow'));
  const jobs = new ScheduledJobs(routing, state, tracker, notifier, directory, log.child('jobs'));
  const bot = createBot(config.telegram.token, workflow, log.child('bot'));

  const open = state.openEntities();
  if (open.length > 0) {
    log.info(`Tracking ${open.length} open task(s)`);
  }
  console.log('');

  // Start Express server
  const app = createServer(config.webhook, log.child('http'), workflow, reconciler);
  const server = app.listen(config.webhook.port, () => {
    log.success(`HTTP server listening on port ${config.webhook.port}`);
  });

  // Scheduled jobs
  const schedule = routing.schedule;
  const scheduler = new Scheduler(routing.timezone, log.child('scheduler'));
  scheduler.every('reconcile', schedule.reconcileIntervalSeconds, () => reconciler.runCycle(), { runImmediately: true });
  if (schedule.assigneeDigest) {
    scheduler.dailyAt('assignee digest', schedule.assigneeDigest, () => jobs.assigneeDigest());
  }
  for (const time of schedule.overdueSweep) {
    scheduler.dailyAt(`overdue sweep ${time}`, time, () => jobs.overdueSweep(time));
  }
  if (schedule.departmentDigest) {
    scheduler.dailyAt('department digest', schedule.departmentDigest, () => jobs.departmentDigest());
  }
  if (schedule.weeklyReport) {
    const { weekday, time } = schedule.weeklyReport;
    scheduler.weeklyAt('weekly report', weekday, time, () => jobs.weeklyReport());
  }
  scheduler.start();

  // Graceful shutdown
  let stopping = false;
  async function shutdown() {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down...');
    scheduler.stop();
    server.close();
    await bot.stop();
    state.close();
    process.exit(0);
  }

  process.on('SIGINT', () => {
    shutdown().catch((error) => log.error(`Shutdown failed: ${errorMessage(error)}`));
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error) => log.error(`Shutdown failed: ${errorMessage(error)}`));
  });

  await bot.start({
    drop_pending_updates: false,
    onStart: (me) => log.success(`Telegram: @${me.username}`),
  });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
