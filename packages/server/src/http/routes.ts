import path from 'path';
import { Router, type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express';
import { getNextActiveStory, isStoryStatus } from '@bmad-dashboard/shared';
import type { ClaudeStatus, LaunchResult, StoryDetail } from '@bmad-dashboard/shared';
import { ok, fail } from './response';
import type { SessionManager } from '../state/sessionManager';
import { summarize } from '../state/sessionManager';
import type { ProjectSession } from '../state/projectSession';
import type { RecentProjectsStore } from '../state/recentProjects';
import type { StoryOverrideWriter } from '../state/storyOverride';
import { deriveClaudeStatus, emptyTracking, type ClaudeTracking } from '../state/claudeStatus';
import type { ProbeResolver } from '../probe/resolver';
import type { ProjectHint } from '../probe/types';
import type { InputDispatcher } from '../claude/inputDispatcher';
import { parseInputAction } from '../claude/inputDispatcher';
import { launchClaude } from '../claude/launcher';
import { listInstalledModules, isDirectory } from '../parsers/projectConfig';
import { isRecord } from '../parsers/yamlFile';
import {
  validateCreateProject,
  validateInputText,
  validateOpenProject,
  validateProjectPath,
  validateStoryId,
  validateStoryUpdate,
} from '../validation';
import { errorMessage } from '../utils';

export interface GatewayDeps {
  sessions: SessionManager;
  recent: RecentProjectsStore;
  probe: ProbeResolver;
  dispatcher: InputDispatcher;
  overrides: StoryOverrideWriter;
  launch?: typeof launchClaude;
  launchGraceMs: number;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Route a rejected handler promise to the error middleware */
function handle(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function bodyOf(req: Request): Record<string, unknown> {
  return isRecord(req.body) ? req.body : {};
}

function hintOf(session: ProjectSession): ProjectHint {
  return { root: session.root, name: session.name };
}

/**
 * Request/response handlers. Snapshot reads go through the session's
 * refresh, so anything a pull observes is broadcast as well.
 */
export function createApiRouter(deps: GatewayDeps): Router {
  const router = Router();
  const { sessions } = deps;
  const launch = deps.launch ?? launchClaude;
  // launch record for the assistant when no project is open
  let idleTracking: ClaudeTracking = emptyTracking();

  function requireSession(res: Response): ProjectSession | null {
    const session = sessions.current;
    if (!session) fail(res, 'NO_ACTIVE_PROJECT', 'No project is open');
    return session;
  }

  // ================================================================
  // Projects
  // ================================================================

  router.post(
    '/project/open',
    handle(async (req, res) => {
      const error = validateOpenProject(req.body);
      if (error) return fail(res, 'INVALID_REQUEST', error);

      const outcome = await sessions.open(String(bodyOf(req).path));
      if (!outcome.ok) return fail(res, outcome.error, outcome.message);
      ok(res, summarize(outcome.session));
    })
  );

  router.post(
    '/project/create',
    handle(async (req, res) => {
      const error = validateCreateProject(req.body);
      if (error) return fail(res, 'INVALID_REQUEST', error);

      const body = bodyOf(req);
      const config = isRecord(body.config) ? body.config : {};
      const modules = Array.isArray(body.modules) ? body.modules.map(String) : undefined;
      const outcome = await sessions.create({ path: String(body.path), config, modules });
      if (!outcome.ok) return fail(res, outcome.error, outcome.message);
      ok(res, summarize(outcome.session), 201);
    })
  );

  router.get('/project/current', (_req, res) => {
    const session = sessions.current;
    ok(res, session ? summarize(session) : null);
  });

  router.get(
    '/recent-projects',
    handle(async (_req, res) => {
      ok(res, await deps.recent.list());
    })
  );

  router.delete(
    '/recent-projects',
    handle(async (req, res) => {
      const target = bodyOf(req).path ?? req.query.path;
      if (typeof target !== 'string' || !target) return fail(res, 'INVALID_REQUEST', 'path is required');
      ok(res, { removed: await deps.recent.remove(target) });
    })
  );

  router.get(
    '/config',
    handle(async (_req, res) => {
      const session = requireSession(res);
      if (!session) return;
      const [config, modules] = await Promise.all([
        sessions.reader.readConfig(session.root),
        listInstalledModules(session.root),
      ]);
      ok(res, { config, modules });
    })
  );

  // ================================================================
  // Workflow & sprint
  // ================================================================

  router.get(
    '/workflow-status',
    handle(async (_req, res) => {
      const session = requireSession(res);
      if (!session) return;
      const workflow = await session.workflow();
      if (!workflow) return fail(res, 'INTERNAL_ERROR', 'Workflow manifest could not be read; try again');
      ok(res, workflow);
    })
  );

  router.get(
    '/sprint-status',
    handle(async (_req, res) => {
      const session = requireSession(res);
      if (!session) return;
      const sprint = await session.sprint();
      if (!sprint) return fail(res, 'INTERNAL_ERROR', 'Sprint manifest could not be read; try again');
      ok(res, sprint);
    })
  );

  router.get(
    '/implementation-flow',
    handle(async (_req, res) => {
      const session = requireSession(res);
      if (!session) return;
      const trackMode = session.snapshots.workflow?.trackMode;
      ok(res, await sessions.reader.readImplementationFlow(session.root, trackMode));
    })
  );

  router.get(
    '/story/active',
    handle(async (_req, res) => {
      const session = requireSession(res);
      if (!session) return;
      ok(res, getNextActiveStory(await session.sprint()));
    })
  );

  router.get(
    '/story/:storyId',
    handle(async (req, res) => {
      const session = requireSession(res);
      if (!session) return;
      const storyId = req.params.storyId;
      const error = validateStoryId(storyId);
      if (error) return fail(res, 'INVALID_REQUEST', error);

      const sprint = await session.sprint();
      for (const epic of sprint?.epics ?? []) {
        const story = epic.stories.find((s) => s.id === storyId);
        if (!story) continue;
        const detail: StoryDetail = {
          story,
          epic: { id: epic.id, number: epic.number, name: epic.name },
          storyFile: await sessions.reader.locateStoryFile(session.root, storyId),
        };
        return ok(res, detail);
      }
      fail(res, 'NOT_FOUND', `Story ${storyId} not found`);
    })
  );

  router.post(
    '/story/update-status',
    handle(async (req, res) => {
      const error = validateStoryUpdate(req.body);
      const { storyId, status } = bodyOf(req);
      if (error || typeof storyId !== 'string' || !isStoryStatus(status)) {
        return fail(res, 'INVALID_REQUEST', error ?? 'storyId and status are required');
      }
      const session = requireSession(res);
      if (!session) return;

      const outcome = await deps.overrides.apply(session.root, storyId, status);
      if (!outcome.ok) return fail(res, outcome.error, outcome.message);

      session.noteOverride(storyId, status);
      await session.refresh(['sprint']);
      ok(res, outcome.result);
    })
  );

  // ================================================================
  // Agents
  // ================================================================

  router.get(
    '/agents',
    handle(async (_req, res) => {
      const session = requireSession(res);
      if (!session) return;
      ok(res, await session.agents.list());
    })
  );

  router.get(
    '/agents/:name',
    handle(async (req, res) => {
      const session = requireSession(res);
      if (!session) return;
      const agent = await session.agents.get(req.params.name);
      if (!agent) return fail(res, 'NOT_FOUND', `Agent ${req.params.name} not found`);
      ok(res, agent);
    })
  );

  // ================================================================
  // Claude
  // ================================================================

  router.get(
    '/claude/status',
    handle(async (_req, res) => {
      const session = sessions.current;
      if (session) {
        const status = await session.claude();
        if (status) return ok(res, status);
      }
      const derived = deriveClaudeStatus(await deps.probe.probe(null), idleTracking, {
        now: Date.now(),
        launchGraceMs: deps.launchGraceMs,
      });
      idleTracking = derived.tracking;
      const status: ClaudeStatus = derived.status;
      ok(res, status);
    })
  );

  router.post(
    '/claude/launch',
    handle(async (req, res) => {
      const body = bodyOf(req);
      const session = sessions.current;
      const requested = body.path ?? session?.root;
      if (requested === undefined) return fail(res, 'NO_ACTIVE_PROJECT', 'No project is open and no path was given');
      const pathError = validateProjectPath(requested);
      if (pathError) return fail(res, 'INVALID_REQUEST', pathError);

      const projectPath = path.resolve(String(requested));
      if (!(await isDirectory(projectPath))) return fail(res, 'PROJECT_NOT_FOUND', `Directory not found: ${projectPath}`);
      const dangerousMode = body.dangerousMode === true;

      let terminal: string;
      try {
        terminal = await launch(projectPath, dangerousMode);
      } catch (err) {
        console.warn('[gateway] Launch failed:', errorMessage(err));
        return fail(res, 'LAUNCH_FAILED', errorMessage(err));
      }

      if (session && session.root === projectPath) {
        session.recordLaunch();
        await session.refresh(['claude']);
      } else {
        idleTracking = { ...idleTracking, launchedAt: Date.now() };
      }
      console.log(`[gateway] Launched Claude in ${projectPath} via ${terminal}`);
      const result: LaunchResult = {
        status: 'launched',
        path: projectPath,
        dangerousMode,
        message: `Claude launched in a new ${terminal} window`,
      };
      ok(res, result);
    })
  );

  router.post(
    '/claude/send-input',
    handle(async (req, res) => {
      const body = bodyOf(req);
      const action = parseInputAction(body.action);
      if (!action) return fail(res, 'INVALID_ACTION', `Unknown action: ${String(body.action)}`);

      const text = typeof body.text === 'string' ? body.text : '';
      if (action === 'send') {
        const error = validateInputText(body.text);
        if (error) return fail(res, 'INVALID_INPUT', error);
      }

      let hint: ProjectHint | null = null;
      if (body.path !== undefined) {
        const pathError = validateProjectPath(body.path);
        if (pathError) return fail(res, 'INVALID_REQUEST', pathError);
        const root = path.resolve(String(body.path));
        hint = { root, name: path.basename(root) };
      } else if (sessions.current) {
        hint = hintOf(sessions.current);
      }

      const result = await deps.dispatcher.dispatch(hint, action, text);
      if (!result.success) return fail(res, 'SEND_FAILED', result.detail);
      ok(res, result);
    })
  );

  router.get(
    '/claude/debug',
    handle(async (_req, res) => {
      const session = sessions.current;
      ok(res, await deps.probe.inspect(session ? hintOf(session) : null));
    })
  );

  return router;
}

/** Malformed JSON bodies are the client's fault; anything else is ours */
export const apiErrorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isRecord(err) && err.type === 'entity.parse.failed') {
    fail(res, 'INVALID_REQUEST', 'Request body is not valid JSON');
    return;
  }
  console.error(`[gateway] ${req.method} ${req.path} failed:`, errorMessage(err));
  fail(res, 'INTERNAL_ERROR', errorMessage(err));
};
