import express from 'express';
import { existsSync } from 'fs';
import path from 'path';
import { createServer, type IncomingMessage, type Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { DashboardConfig } from './config';
import { authenticate, extractToken, validateToken } from './auth';
import { Broadcaster } from './events/broadcaster';
import { createWsSubscriber } from './events/wsSubscriber';
import { apiErrorHandler, createApiRouter } from './http/routes';
import { fail } from './http/response';
import { FileStateReader } from './state/fileStateReader';
import { RecentProjectsStore } from './state/recentProjects';
import { SessionManager } from './state/sessionManager';
import { StoryOverrideWriter } from './state/storyOverride';
import { ProbeResolver } from './probe/resolver';
import { createDetectors } from './probe/detectors';
import { createSystemSource } from './probe/systemSource';
import type { ProcessSource } from './probe/types';
import { InputDispatcher } from './claude/inputDispatcher';
import { createKeySenders, type KeySender } from './claude/keySenders';
import type { launchClaude } from './claude/launcher';
import type { WatchFactory } from './watcher/types';
import { execFileAsync } from './utils';

/** Seams replaced in tests: the OS process table, keyboard automation, terminal launch, file watching */
export interface ServerOverrides {
  processSource?: ProcessSource;
  keySenders?: KeySender[];
  launch?: typeof launchClaude;
  watchFactory?: WatchFactory;
}

export interface DashboardServer {
  app: express.Express;
  server: Server;
  broadcaster: Broadcaster;
  sessions: SessionManager;
  close(): Promise<void>;
}

export function createDashboardServer(config: DashboardConfig, overrides: ServerOverrides = {}): DashboardServer {
  const app = express();
  const server = createServer(app);

  // Security headers
  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    next();
  });

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const reader = new FileStateReader();
  const processSource = overrides.processSource ?? createSystemSource({ timeoutMs: config.probeTimeoutMs });
  const probe = new ProbeResolver(processSource, createDetectors({ nameMatch: config.probeNameMatch }), {
    order: config.probeOrder,
    timeoutMs: config.probeTimeoutMs,
  });
  const broadcaster = new Broadcaster({ heartbeatIntervalMs: config.heartbeatIntervalMs });
  const recent = new RecentProjectsStore(config.dataDir, config.maxRecentProjects);
  const sessions = new SessionManager({
    reader,
    probe,
    broadcaster,
    recent,
    launchGraceMs: config.launchGraceMs,
    debounceMs: config.debounceMs,
    pollIntervalMs: config.pollIntervalMs,
    watchFactory: overrides.watchFactory,
  });
  const keySenders =
    overrides.keySenders ??
    createKeySenders({ exec: execFileAsync, processes: processSource, timeoutMs: config.dispatchTimeoutMs });
  const dispatcher = new InputDispatcher(probe, keySenders, { timeoutMs: config.dispatchTimeoutMs });

  app.use('/api', express.json({ limit: '1mb' }));
  app.use('/api', authenticate(config.authToken));
  app.use(
    '/api',
    createApiRouter({
      sessions,
      recent,
      probe,
      dispatcher,
      overrides: new StoryOverrideWriter(reader),
      launch: overrides.launch,
      launchGraceMs: config.launchGraceMs,
    })
  );
  app.use('/api', (req, res) => fail(res, 'NOT_FOUND', `No route for ${req.method} ${req.originalUrl}`));
  app.use('/api', apiErrorHandler);

  // Built client, when present
  if (existsSync(config.staticDir)) {
    app.use(express.static(config.staticDir));
    app.get('*', (_req, res) => res.sendFile(path.join(config.staticDir, 'index.html')));
  }

  // Event stream
  const wss = new WebSocketServer({ server, path: '/api/events' });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    if (!validateToken(config.authToken, extractToken(req))) {
      console.warn(`[ws] Unauthorized connection attempt from ${req.socket.remoteAddress}`);
      ws.close(1008, 'Unauthorized');
      return;
    }

    const session = sessions.current;
    const subscriber = createWsSubscriber(ws, broadcaster, session?.root ?? null);
    broadcaster.add(subscriber);
    const connected = broadcaster.sendTo(subscriber, {
      type: 'connected',
      data: { sessionId: session?.id ?? sessions.idleSessionId, projectRoot: session?.root ?? null },
    });
    if (!connected || !session) return;
    for (const event of session.snapshotEvents()) {
      if (!broadcaster.sendTo(subscriber, event)) break;
    }
  });

  broadcaster.startHeartbeat();

  return {
    app,
    server,
    broadcaster,
    sessions,
    close: async () => {
      broadcaster.closeAll();
      await sessions.close();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    },
  };
}
