import type { Phase, TrackMode, Workflow, WorkflowItemStatus } from '@bmad-dashboard/shared';
import { asString, isRecord, parseYamlText } from './yamlFile';

/** Statuses that neither block a phase nor count toward its progress */
export const NON_BLOCKING_STATUSES: ReadonlySet<WorkflowItemStatus> = new Set<WorkflowItemStatus>([
  'skipped',
  'optional',
  'recommended',
  'conditional',
]);

const KNOWN_STATUSES: ReadonlySet<string> = new Set<WorkflowItemStatus>([
  'pending',
  'in_progress',
  'completed',
  'blocked',
  'optional',
  'recommended',
  'conditional',
  'skipped',
]);

const PHASE_NAMES: Record<TrackMode, readonly string[]> = {
  standard: ['Discovery', 'Planning', 'Solutioning', 'Implementation'],
  quick: ['Discovery', 'Planning', 'Implementation'],
};

/** Artifact file each workflow leaves behind once it has run */
export const WORKFLOW_ARTIFACTS: Readonly<Record<string, string>> = {
  'workflow-init': 'bmm-workflow-status.yaml',
  'brainstorm-project': 'brainstorm.md',
  research: 'research.md',
  'tech-spec': 'tech-spec.md',
  'product-brief': 'product-brief.md',
  prd: 'prd.md',
  architecture: 'architecture.md',
  'create-epics-and-stories': 'epics.md',
  'sprint-planning': 'sprint-status.yaml',
};

export interface WorkflowManifest {
  project: string;
  track: string;
  trackMode: TrackMode;
  phases: Phase[];
  warnings: string[];
}

export function detectTrackMode(track: string): TrackMode {
  return track.toLowerCase().includes('quick') ? 'quick' : 'standard';
}

export function phaseName(trackMode: TrackMode, id: number): string {
  return PHASE_NAMES[trackMode][id] ?? `Phase ${id}`;
}

/**
 * A manifest status is either a keyword or, once a workflow has run,
 * the path of the artifact it produced.
 */
export function mapWorkflowStatus(raw: unknown): WorkflowItemStatus {
  const value = asString(raw).trim();
  if (!value || value.toLowerCase() === 'required') return 'pending';

  const lower = value.toLowerCase();
  if (value.includes('/') || lower.endsWith('.md') || lower.endsWith('.yaml')) return 'completed';

  const keyword = lower.replace(/[-\s]+/g, '_');
  if (isWorkflowItemStatus(keyword)) return keyword;
  return 'pending';
}

function isWorkflowItemStatus(value: string): value is WorkflowItemStatus {
  return KNOWN_STATUSES.has(value);
}

export function calculatePhaseStatus(workflows: Workflow[]): WorkflowItemStatus {
  const statuses = workflows.map((w) => w.status);
  if (statuses.includes('in_progress')) return 'in_progress';
  if (statuses.includes('blocked')) return 'blocked';

  const required = statuses.filter((s) => !NON_BLOCKING_STATUSES.has(s));
  if (required.every((s) => s === 'completed')) return 'completed';
  return 'pending';
}

function buildWorkflow(entry: Record<string, unknown>, detectedArtifacts: ReadonlyMap<string, string>): Workflow {
  const id = asString(entry.id);
  let raw = asString(entry.status, 'required');
  let status = mapWorkflowStatus(raw);

  if (status === 'pending') {
    const detected = detectedArtifacts.get(id);
    if (detected) {
      status = 'completed';
      raw = detected;
    }
  }

  const workflow: Workflow = {
    id,
    name: asString(entry.command) || asString(entry.name) || id,
    status,
    agent: asString(entry.agent),
  };
  if (status === 'completed' && raw.includes('/')) {
    workflow.outputPath = raw;
  }
  return workflow;
}

function buildPhase(id: number, name: string, workflows: Workflow[]): Phase {
  const counted = workflows.filter((w) => !NON_BLOCKING_STATUSES.has(w.status));
  return {
    id,
    name,
    status: calculatePhaseStatus(workflows),
    completedCount: counted.filter((w) => w.status === 'completed').length,
    totalCount: counted.length,
    workflows,
  };
}

function toPhaseId(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  const parsed = Number.parseInt(asString(value), 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/** `workflow_status` is a list, or a block string holding a list or a `phases:` mapping */
function resolveEntries(value: unknown, warnings: string[]): Record<string, unknown>[] {
  let list: unknown = value;
  if (typeof value === 'string') {
    const reparsed = parseYamlText(value, 'workflow_status');
    if (reparsed.state !== 'ok') {
      warnings.push('workflow_status text could not be parsed');
      return [];
    }
    list = isRecord(reparsed.value) && 'phases' in reparsed.value ? reparsed.value.phases : reparsed.value;
  }
  if (!Array.isArray(list)) {
    if (list !== undefined && list !== null) warnings.push('workflow_status is not a list');
    return [];
  }
  return list.filter(isRecord);
}

function parseFlat(entries: Record<string, unknown>[], trackMode: TrackMode, detected: ReadonlyMap<string, string>): Phase[] {
  const byPhase = new Map<number, Workflow[]>();
  for (const entry of entries) {
    const phaseId = toPhaseId(entry.phase);
    const workflows = byPhase.get(phaseId) ?? [];
    workflows.push(buildWorkflow(entry, detected));
    byPhase.set(phaseId, workflows);
  }
  return [...byPhase.entries()]
    .sort(([a], [b]) => a - b)
    .map(([id, workflows]) => buildPhase(id, phaseName(trackMode, id), workflows));
}

function parseNested(entries: Record<string, unknown>[], detected: ReadonlyMap<string, string>): Phase[] {
  return entries
    .map((entry) => {
      const id = toPhaseId(entry.phase);
      const workflows = Array.isArray(entry.workflows)
        ? entry.workflows.filter(isRecord).map((wf) => buildWorkflow(wf, detected))
        : [];
      return buildPhase(id, asString(entry.name) || `Phase ${id}`, workflows);
    })
    .sort((a, b) => a.id - b.id);
}

/**
 * Convert a parsed `bmm-workflow-status.yaml` document into phases.
 *
 * Two layouts exist in the wild: a flat list where each workflow names its
 * `phase`, and a nested list of phases that each carry `workflows`.
 * `detectedArtifacts` maps workflow ids to artifact paths already found on
 * disk; a pending workflow with an artifact is reported as completed.
 */
export function parseWorkflowManifest(
  data: Record<string, unknown>,
  detectedArtifacts: ReadonlyMap<string, string> = new Map()
): WorkflowManifest {
  const warnings: string[] = [];
  const track = asString(data.selected_track, 'bmad-method');
  const trackMode = detectTrackMode(track);
  const entries = resolveEntries(data.workflow_status, warnings);

  const isFlat = entries.length > 0 && 'id' in entries[0] && !('workflows' in entries[0]);
  const phases = isFlat ? parseFlat(entries, trackMode, detectedArtifacts) : parseNested(entries, detectedArtifacts);

  const active = phases.filter((p) => p.status === 'in_progress');
  if (active.length > 1) {
    warnings.push(`Multiple phases in progress: ${active.map((p) => p.name).join(', ')}`);
  }

  return {
    project: asString(data.project, 'Unknown Project'),
    track,
    trackMode,
    phases,
    warnings,
  };
}
