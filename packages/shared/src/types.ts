// ================================================================
// Workflow
// ================================================================

export type WorkflowItemStatus =
  | 'pending'
  | 'in_progress'
  | 'completed'
  | 'blocked'
  | 'optional'
  | 'recommended'
  | 'conditional'
  | 'skipped';

export type TrackMode = 'standard' | 'quick';

export interface Workflow {
  id: string;
  /** Slash-command name when the manifest provides one, otherwise the id */
  name: string;
  status: WorkflowItemStatus;
  /** Owning agent, e.g. "pm" or "architect" (empty when unassigned) */
  agent: string;
  /** Artifact path relative to the project root, set once the workflow is completed */
  outputPath?: string;
}

export interface Phase {
  id: number;
  name: string;
  status: WorkflowItemStatus;
  /** Completed workflows, not counting skipped/optional/recommended/conditional */
  completedCount: number;
  totalCount: number;
  workflows: Workflow[];
}

export interface ManifestParseError {
  /** Manifest path relative to the project root */
  file: string;
  message: string;
}

export interface WorkflowStatus {
  /** False when the project has no workflow manifest yet */
  fileCreated: boolean;
  project: string;
  /** Raw `selected_track` value */
  track: string;
  trackMode: TrackMode;
  phases: Phase[];
  /** Consistency notes about the manifest content (e.g. several phases in progress) */
  warnings: string[];
  /** Set when the manifest could not be parsed; phases are then the last good read */
  parseError?: ManifestParseError;
  /** Volatile: ISO time of the read that produced this snapshot */
  generatedAt: string;
}

// ================================================================
// Sprint
// ================================================================

export type StoryStatus = 'backlog' | 'drafted' | 'ready-for-dev' | 'in-progress' | 'review' | 'done';

export interface Story {
  /** Human key, e.g. "6-1" */
  id: string;
  /** Full manifest key, e.g. "6-1-user-login" */
  key: string;
  name: string;
  status: StoryStatus;
}

export interface Epic {
  /** Manifest key, e.g. "epic-6" */
  id: string;
  number: number;
  name: string;
  /** Raw epic status (backlog, contexted, in-progress, done, ...) */
  status: string;
  retrospective: string | null;
  stories: Story[];
}

export interface SprintStatus {
  /** False when the project has no sprint manifest yet */
  fileCreated: boolean;
  project: string;
  epics: Epic[];
  message?: string;
  parseError?: ManifestParseError;
  generatedAt: string;
}

export type ActiveStoryResult =
  | { kind: 'story'; story: Story; epic: Pick<Epic, 'id' | 'number' | 'name'> }
  | { kind: 'empty'; reason: 'no_sprint' | 'file_created' | 'no_epics' | 'no_stories' | 'all_done' };

export interface StoryDetail {
  story: Story;
  epic: Pick<Epic, 'id' | 'number' | 'name'>;
  /** Story file relative to the project root, null when none exists yet */
  storyFile: string | null;
}

export interface ImplementationStep {
  id: string;
  name: string;
  status: 'completed' | 'pending';
}

export interface ImplementationFlow {
  trackMode: TrackMode;
  steps: ImplementationStep[];
  nextStep: { id: string; name: string; command: string } | null;
  allCompleted: boolean;
}

export type StoryFileSync = 'updated' | 'deleted' | 'unchanged' | 'missing';

export interface StoryOverrideResult {
  storyId: string;
  status: StoryStatus;
  storyFile: StoryFileSync;
  message: string;
}

// ================================================================
// External assistant
// ================================================================

export type ClaudeRunState = 'stopped' | 'starting' | 'running' | 'error';
export type MatchType = 'project' | 'global' | 'none';
export type DetectorName = 'process' | 'parent-shell' | 'window-title';

export interface ClaudeStatus {
  status: ClaudeRunState;
  pid: number | null;
  cwd: string | null;
  windowTitle: string | null;
  matchType: MatchType;
  /** ISO time the process was launched from the dashboard or first observed */
  startedAt: string | null;
  errorMessage: string | null;
  /** Detector that produced the evidence, when running */
  detectedBy: DetectorName | null;
  /** Volatile: ISO time of the probe */
  checkedAt: string;
}

/** The part of ClaudeStatus pushed to subscribers */
export type ClaudeStatusEvent = Omit<ClaudeStatus, 'checkedAt'>;

export type InputAction = 'send' | 'enter' | 'escape' | 'interrupt';

export interface DispatchResult {
  success: boolean;
  detail: string;
  /** Process the input was delivered to */
  target?: { pid: number | null; windowTitle?: string; via: string };
}

export interface LaunchResult {
  status: 'launched';
  path: string;
  dangerousMode: boolean;
  message: string;
}

// ================================================================
// Agents
// ================================================================

export interface AgentCommand {
  /** Command trigger without the leading "*", e.g. "create-prd" */
  name: string;
  icon: string;
  label: string;
  description: string;
}

export interface Agent {
  /** File stem under .bmad/bmm/agents, e.g. "pm" */
  id: string;
  name: string;
  title: string;
  icon: string;
  description: string;
  commands: AgentCommand[];
}

// ================================================================
// Projects
// ================================================================

export interface RecentProject {
  path: string;
  name: string;
  /** ISO timestamp */
  lastOpened: string;
}

export interface ProjectSummary {
  name: string;
  path: string;
  config: Record<string, unknown>;
}

export interface ProjectConfigInfo {
  config: Record<string, unknown>;
  modules: string[];
}

// ================================================================
// HTTP envelope
// ================================================================

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'INVALID_ACTION'
  | 'INVALID_INPUT'
  | 'UNAUTHORIZED'
  | 'PERMISSION_DENIED'
  | 'PROJECT_NOT_FOUND'
  | 'NOT_A_BMAD_PROJECT'
  | 'NO_ACTIVE_PROJECT'
  | 'ALREADY_EXISTS'
  | 'FILE_NOT_FOUND'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'CREATE_FAILED'
  | 'SAVE_ERROR'
  | 'LAUNCH_FAILED'
  | 'SEND_FAILED'
  | 'INTERNAL_ERROR';

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: ErrorCode;
  message: string;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

// ================================================================
// Event stream
// ================================================================

export type DashboardEvent =
  | { type: 'connected'; data: { sessionId: string; projectRoot: string | null } }
  | { type: 'workflow_update'; data: WorkflowStatus }
  | { type: 'sprint_update'; data: SprintStatus }
  | { type: 'claude_status'; data: ClaudeStatusEvent }
  | { type: 'heartbeat'; data: { timestamp: string } };

export type DashboardEventType = DashboardEvent['type'];
