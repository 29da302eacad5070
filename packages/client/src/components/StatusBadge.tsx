import type { StatusDisplay } from '../constants/statusDisplay';

export function StatusBadge({ display }: { display: StatusDisplay }) {
  return (
    <span className="status-badge" style={{ borderColor: display.color, color: display.color }}>
      {display.label}
    </span>
  );
}
