import { useEffect, useState } from 'react';
import { buildWorkflowCommand, type ImplementationFlow, type Phase, type WorkflowStatus } from '@bmad-dashboard/shared';
import type { ApiClient } from '../api/client';
import type { Dashboard } from '../hooks/useDashboard';
import { WORKFLOW_STATUS_DISPLAY, progressPercent } from '../constants/statusDisplay';
import { StatusBadge } from './StatusBadge';

interface WorkflowViewProps {
  workflow: WorkflowStatus | null;
  api: ApiClient;
  run: Dashboard['run'];
}

function PhaseCard({ phase, onRun }: { phase: Phase; onRun: (command: string) => void }) {
  const percent = progressPercent(phase.completedCount, phase.totalCount);
  return (
    <div className={`phase-card phase-${phase.status}`}>
      <div className="phase-header">
        <h3>
          Phase {phase.id}: {phase.name}
        </h3>
        <StatusBadge display={WORKFLOW_STATUS_DISPLAY[phase.status]} />
      </div>
      <div className="progress" aria-label={`${percent}% complete`}>
        <div className="progress-fill" style={{ width: `${percent}%` }} />
      </div>
      <ul className="workflow-list">
        {phase.workflows.map((wf) => (
          <li key={wf.id} className="workflow-item">
            <span className="workflow-name">{wf.name}</span>
            {wf.agent && <span className="workflow-agent">{wf.agent}</span>}
            <StatusBadge display={WORKFLOW_STATUS_DISPLAY[wf.status]} />
            {wf.outputPath ? (
              <span className="workflow-output">{wf.outputPath}</span>
            ) : (
              wf.status !== 'completed' &&
              wf.status !== 'skipped' && (
                <button className="btn btn-small" onClick={() => onRun(buildWorkflowCommand(wf.id))}>
                  Run
                </button>
              )
            )}
          </li>
        ))}
      </ul>
    </div>
  );
}

export function WorkflowView({ workflow, api, run }: WorkflowViewProps) {
  const [flow, setFlow] = useState<ImplementationFlow | null>(null);
  const generatedAt = workflow?.generatedAt;

  useEffect(() => {
    if (!generatedAt) return;
    let cancelled = false;
    api
      .implementationFlow()
      .then((res) => {
        if (!cancelled && res.success) setFlow(res.data);
      })
      .catch((err: unknown) => console.warn('[workflow] Failed to load implementation flow:', err));
    return () => {
      cancelled = true;
    };
  }, [api, generatedAt]);

  const send = (command: string) => {
    run(api.sendInput('send', command), `Sent ${command}`).catch((err: unknown) =>
      console.warn('[workflow] Send failed:', err)
    );
  };

  if (!workflow) return <section className="view"><p className="empty">Waiting for workflow status…</p></section>;

  if (!workflow.fileCreated) {
    return (
      <section className="view">
        <h2>Workflow</h2>
        <p className="empty">This project has no workflow status file yet.</p>
        <button className="btn" onClick={() => send(buildWorkflowCommand('workflow-init'))}>
          Initialize workflow
        </button>
      </section>
    );
  }

  return (
    <section className="view workflow-view">
      <div className="view-header">
        <h2>{workflow.project || 'Workflow'}</h2>
        <span className="track">{workflow.track || workflow.trackMode}</span>
      </div>
      {workflow.parseError && (
        <div className="parse-error" role="alert">
          {workflow.parseError.file}: {workflow.parseError.message}. Showing the last good read.
        </div>
      )}
      {workflow.warnings.map((warning) => (
        <div key={warning} className="warning">
          {warning}
        </div>
      ))}
      {flow?.nextStep && (
        <div className="next-step">
          <span>
            Next: <strong>{flow.nextStep.name}</strong>
          </span>
          <button className="btn btn-small" onClick={() => flow.nextStep && send(flow.nextStep.command)}>
            Run {flow.nextStep.command}
          </button>
        </div>
      )}
      {flow?.allCompleted && <div className="next-step">Planning is complete. Move on to the sprint board.</div>}
      <div className="phase-grid">
        {workflow.phases.map((phase) => (
          <PhaseCard key={phase.id} phase={phase} onRun={send} />
        ))}
      </div>
    </section>
  );
}
