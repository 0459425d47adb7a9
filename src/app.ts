import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { eventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { createDefaultState } from './infra/storage/defaultState.js';
import { StateStore } from './infra/storage/stateStore.js';
import { HttpLedgerOracle } from './integrations/ledger/httpLedgerOracle.js';
import { InMemoryLedgerOracle, LedgerOracle } from './integrations/ledger/ledgerOracle.js';
import { AdminService } from './services/adminService.js';
import { GovernanceService } from './services/governanceService.js';
import { HolderService } from './services/holderService.js';
import { VotingService } from './services/votingService.js';
import { Clock, isoNow, systemClock } from './utils/time.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  logger: EventLogger;
  ledger: LedgerOracle;
  adminService: AdminService;
  governanceService: GovernanceService;
  votingService: VotingService;
  holderService: HolderService;
}

export interface BuildOptions {
  /** Overrides the ledger chosen from config. */
  ledger?: LedgerOracle;
  clock?: Clock;
}

const resolveLedger = async (config: AppConfig): Promise<LedgerOracle> => {
  if (config.ledger.baseUrl) {
    return new HttpLedgerOracle({ baseUrl: config.ledger.baseUrl, timeoutMs: config.ledger.timeoutMs });
  }
  if (config.paths.ledgerFile) {
    return InMemoryLedgerOracle.fromFile(config.paths.ledgerFile);
  }
  return new InMemoryLedgerOracle();
};

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: config.app.logRequests,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const clock = options.clock ?? systemClock;

  const stateStore = new StateStore(
    config.paths.stateFile,
    () => createDefaultState(config.governance, isoNow(clock)),
  );
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const stopListenerErrors = eventBus.onListenerError((event, error) => {
    logger.log('warn', 'eventBus.listener.failed', { eventType: event, error: String(error) })
      .catch((logError: unknown) => {
        app.log.error({ err: logError }, 'event log write failed');
      });
  });
  app.addHook('onClose', async () => {
    stopListenerErrors();
  });

  const ledger = options.ledger ?? await resolveLedger(config);

  const adminService = new AdminService(stateStore, logger, clock);
  const governanceService = new GovernanceService(stateStore, logger, clock);
  const votingService = new VotingService(stateStore, ledger, logger, clock);
  const holderService = new HolderService(stateStore, ledger);

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    adminService,
    governanceService,
    votingService,
    holderService,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      processPid: process.pid,
    }),
  });

  // Register WebSocket live event feed endpoint.
  await registerWebSocket(app);

  return {
    app,
    stateStore,
    logger,
    ledger,
    adminService,
    governanceService,
    votingService,
    holderService,
  };
}
