import { config } from 'dotenv';
config();

import { loadCompletionConfig, loadServerConfig } from './core/env.js';
import { createModuleLogger } from './core/logger.js';
import { createApp } from './localServer.js';
import { CompletionClient } from './services/completionClient.js';
import { SummarizationService } from './services/summarizationService.js';

const log = createModuleLogger('main');

const serverConfig = loadServerConfig();
const service = new SummarizationService(new CompletionClient(loadCompletionConfig()));
const app = createApp(service, serverConfig);

const server = app.listen(serverConfig.port, serverConfig.host, () => {
  log.info({ host: serverConfig.host, port: serverConfig.port }, 'Findings summarizer listening');
  log.info({ endpoint: 'POST /api/summarize' }, 'Summarize endpoint');
  log.info({ endpoint: 'POST /api/summarize/stream' }, 'Streaming summarize endpoint (NDJSON)');
});

process.on('unhandledRejection', (reason) => {
  log.error({ reason }, 'Unhandled rejection');
});

function shutdown(signal: string): void {
  log.info({ signal }, 'Shutting down gracefully');
  server.close((err) => {
    if (err) {
      log.error({ err }, 'Server close error');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
