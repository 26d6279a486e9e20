import { createApp } from './app.js';
import { config } from './config.js';
import { DiagnosticEngine } from './engine.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { scoringFromConfig } from './reasoner/scoring.js';
import { KnowledgeHandle } from './reasoner/snapshot.js';
import { loadTriageRules } from './reasoner/triage.js';
import { createResultCache } from './resultCache.js';

const log = createLogger('server');

function main() {
  const knowledge = KnowledgeHandle.load({ kind: 'file', path: config.KNOWLEDGE_PATH });
  const rules = loadTriageRules(config.TRIAGE_RULES_PATH);
  const engine = new DiagnosticEngine(knowledge, rules, scoringFromConfig());
  const cache = createResultCache();

  const app = createApp({ engine, cache });
  const server = app.listen(config.PORT, () => log.info(`Listening on port ${config.PORT}`));

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      cache.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error(`cache close failed: ${describeError(err)}`);
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  log.error(`startup failed: ${describeError(err)}`);
  process.exit(1);
}
