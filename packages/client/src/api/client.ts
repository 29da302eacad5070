import type {
  ActiveStoryResult,
  Agent,
  ApiResponse,
  ClaudeStatus,
  DispatchResult,
  ImplementationFlow,
  InputAction,
  LaunchResult,
  ProjectConfigInfo,
  ProjectSummary,
  RecentProject,
  SprintStatus,
  StoryDetail,
  StoryOverrideResult,
  StoryStatus,
  WorkflowStatus,
} from '@bmad-dashboard/shared';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  /** Prefix for every route; empty when the client is served by the dashboard server */
  baseUrl?: string;
  token?: string;
  fetch?: FetchLike;
}

export interface CreateProjectRequest {
  path: string;
  config: { user_name: string; output_folder?: string; [key: string]: string | number | boolean | undefined };
  modules?: string[];
}

function isApiResponse<T>(value: unknown): value is ApiResponse<T> {
  if (typeof value !== 'object' || value === null || !('success' in value)) return false;
  if (value.success === true) return 'data' in value;
  return value.success === false && 'error' in value && 'message' in value;
}

/** `?token=` of the page URL, handed on to API calls and the event stream */
export function tokenFromSearch(search: string): string | undefined {
  return new URLSearchParams(search).get('token') ?? undefined;
}

export function eventStreamUrl(location: { protocol: string; host: string }, token?: string): string {
  const scheme = location.protocol === 'https:' ? 'wss:' : 'ws:';
  const query = token ? `?token=${encodeURIComponent(token)}` : '';
  return `${scheme}//${location.host}/api/events${query}`;
}

/**
 * Typed wrapper over the dashboard routes. Every method resolves to the
 * server's envelope; network failures become an INTERNAL_ERROR failure
 * instead of a rejection.
 */
export class ApiClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ApiClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<ApiResponse<T>> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (this.options.token) headers['Authorization'] = `Bearer ${this.options.token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.options.baseUrl ?? ''}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      return { success: false, error: 'INTERNAL_ERROR', message: `Server unreachable: ${err instanceof Error ? err.message : String(err)}` };
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      payload = null;
    }
    if (isApiResponse<T>(payload)) return payload;
    return { success: false, error: 'INTERNAL_ERROR', message: `Unexpected response (HTTP ${res.status}) from ${path}` };
  }

  // Projects
  openProject(path: string) {
    return this.request<ProjectSummary>('POST', '/api/project/open', { path });
  }

  createProject(input: CreateProjectRequest) {
    return this.request<ProjectSummary>('POST', '/api/project/create', input);
  }

  currentProject() {
    return this.request<ProjectSummary | null>('GET', '/api/project/current');
  }

  recentProjects() {
    return this.request<RecentProject[]>('GET', '/api/recent-projects');
  }

  removeRecentProject(path: string) {
    return this.request<{ removed: boolean }>('DELETE', '/api/recent-projects', { path });
  }

  projectConfig() {
    return this.request<ProjectConfigInfo>('GET', '/api/config');
  }

  // Workflow & sprint
  workflowStatus() {
    return this.request<WorkflowStatus>('GET', '/api/workflow-status');
  }

  sprintStatus() {
    return this.request<SprintStatus>('GET', '/api/sprint-status');
  }

  implementationFlow() {
    return this.request<ImplementationFlow>('GET', '/api/implementation-flow');
  }

  activeStory() {
    return this.request<ActiveStoryResult>('GET', '/api/story/active');
  }

  storyDetail(storyId: string) {
    return this.request<StoryDetail>('GET', `/api/story/${encodeURIComponent(storyId)}`);
  }

  updateStoryStatus(storyId: string, status: StoryStatus) {
    return this.request<StoryOverrideResult>('POST', '/api/story/update-status', { storyId, status });
  }

  agents() {
    return this.request<Agent[]>('GET', '/api/agents');
  }

  // Claude
  claudeStatus() {
    return this.request<ClaudeStatus>('GET', '/api/claude/status');
  }

  launchClaude(dangerousMode: boolean) {
    return this.request<LaunchResult>('POST', '/api/claude/launch', { dangerousMode });
  }

  sendInput(action: InputAction, text?: string) {
    return this.request<DispatchResult>('POST', '/api/claude/send-input', text === undefined ? { action } : { action, text });
  }
}
