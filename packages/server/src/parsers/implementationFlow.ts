import { buildWorkflowCommand } from '@bmad-dashboard/shared';
import type { ImplementationFlow, TrackMode } from '@bmad-dashboard/shared';

export interface ImplementationStepDefinition {
  id: string;
  name: string;
}

const QUICK_FLOW: ImplementationStepDefinition[] = [
  { id: 'tech-spec', name: 'Tech spec' },
  { id: 'create-epics-and-stories', name: 'Epics and stories' },
  { id: 'sprint-planning', name: 'Sprint planning' },
];

const STANDARD_FLOW: ImplementationStepDefinition[] = [
  { id: 'product-brief', name: 'Product brief' },
  { id: 'prd', name: 'PRD' },
  { id: 'architecture', name: 'Architecture' },
  { id: 'create-epics-and-stories', name: 'Epics and stories' },
  { id: 'sprint-planning', name: 'Sprint planning' },
];

export function implementationSteps(trackMode: TrackMode): ImplementationStepDefinition[] {
  return trackMode === 'quick' ? QUICK_FLOW : STANDARD_FLOW;
}

/** Steps up to sprint planning; the first incomplete one is the next step */
export function buildImplementationFlow(trackMode: TrackMode, completed: ReadonlySet<string>): ImplementationFlow {
  const steps = implementationSteps(trackMode).map((step) => ({
    id: step.id,
    name: step.name,
    status: completed.has(step.id) ? ('completed' as const) : ('pending' as const),
  }));
  const next = steps.find((step) => step.status === 'pending');
  return {
    trackMode,
    steps,
    nextStep: next ? { id: next.id, name: next.name, command: buildWorkflowCommand(next.id) } : null,
    allCompleted: next === undefined,
  };
}
