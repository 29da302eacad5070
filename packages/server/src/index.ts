#!/usr/bin/env tsx
import { loadConfig } from './config';
import { createDashboardServer, type DashboardServer } from './server';
import { RecentProjectsStore } from './state/recentProjects';
import { errorMessage, isNodeError } from './utils';

/** Ports tried past the configured one when it is taken */
const MAX_PORT_ATTEMPTS = 10;

function listen(dashboard: DashboardServer, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      dashboard.server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      dashboard.server.off('error', onError);
      resolve(port);
    };
    dashboard.server.once('error', onError);
    dashboard.server.once('listening', onListening);
    dashboard.server.listen(port, host);
  });
}

async function listenWithRetry(dashboard: DashboardServer, port: number, host: string): Promise<number> {
  for (let attempt = 0; attempt < MAX_PORT_ATTEMPTS; attempt++) {
    try {
      return await listen(dashboard, port + attempt, host);
    } catch (err) {
      if (!isNodeError(err) || err.code !== 'EADDRINUSE') throw err;
      console.warn(`[server] Port ${port + attempt} in use, trying ${port + attempt + 1}`);
    }
  }
  throw new Error(`No free port in ${port}-${port + MAX_PORT_ATTEMPTS - 1}`);
}

async function openStartupProject(dashboard: DashboardServer, startupProject: string | undefined, dataDir: string) {
  let target = startupProject;
  if (!target) {
    const [latest] = await new RecentProjectsStore(dataDir).list();
    target = latest?.path;
  }
  if (!target) return;

  const outcome = await dashboard.sessions.open(target);
  if (!outcome.ok) {
    console.warn(`[server] Could not open ${target}: ${outcome.message}`);
  }
}

async function main() {
  const config = loadConfig();
  const dashboard = createDashboardServer(config);

  const port = await listenWithRetry(dashboard, config.port, config.host);
  console.log(`[server] listening on http://${config.host}:${port}`);
  console.log(`[server] WebSocket on ws://${config.host}:${port}/api/events`);
  if (config.authToken) console.log('[auth] Token authentication enabled');

  await openStartupProject(dashboard, config.startupProject, config.dataDir);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n[server] shutting down...');
    dashboard
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] Error during shutdown:', errorMessage(err));
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('[server] Failed to start:', errorMessage(err));
  process.exit(1);
});
