// Process entrypoint: load settings, start listening, and close the server on termination signals.

import { loadSettings } from './config/settings.js';
import { createServer } from './server.js';
import { errorForLog } from './utils/logger.js';

const settings = loadSettings();
const { app } = createServer(settings);

let closing = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (closing) {
    return;
  }
  closing = true;

  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');
  try {
    await app.close();
    app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
    process.exit(0);
  } catch (error) {
    app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
    process.exit(1);
  }
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}

try {
  await app.listen({ host: settings.host, port: settings.port });
  app.log.info(
    { event: 'server_started', host: settings.host, port: settings.port, provider: settings.provider.kind, model: settings.provider.model },
    'server_started'
  );
} catch (error) {
  app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
  process.exit(1);
}
