import dotenv from 'dotenv';
import { loadConfig } from './config/env.js';
import { FaultCatalog } from './faults/catalog.js';
import { RemediationFailureController } from './faults/controller.js';
import { FaultOrchestrator } from './orchestrator/orchestrator.js';
import { createApp } from './http/app.js';
import { logger, describeError } from './observability/logger.js';

dotenv.config();

const config = loadConfig(process.env);
logger.setLevel(config.logLevel);

const chaos = new RemediationFailureController();
chaos.initialize(process.env);

if (chaos.isEnabled()) {
  logger.warn('faults_initialization', 'Remediation failure injection enabled', {
    config: chaos.getConfig(),
  });
}

const orchestrator = new FaultOrchestrator({
  catalog: new FaultCatalog(config.catalogOverrides),
  chaos,
  limits: config.limits,
});

const app = createApp(orchestrator);

const server = app.listen(config.port, () => {
  logger.info('startup', `Fault orchestrator listening on port ${config.port}`, {
    limits: orchestrator.limits,
    kinds: orchestrator.catalog.kinds(),
    remediationChaos: chaos.isEnabled(),
  });
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info('shutdown', `${signal} received, graceful shutdown`);
  server.close(() => {
    orchestrator.shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('shutdown', 'Failed to stop recovery tasks', { error: describeError(error) });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
