import { useTick } from '../hooks/useTick';

/** "5m ago" style label for an ISO timestamp, relative to `now` */
export function relativeTime(iso: string, now: number): string {
  const timestamp = Date.parse(iso);
  if (Number.isNaN(timestamp)) return 'unknown';
  const delta = Math.max(0, Math.floor((now - timestamp) / 1000));
  if (delta < 5) return 'just now';
  if (delta < 60) return `${delta}s ago`;
  if (delta < 3600) return `${Math.floor(delta / 60)}m ago`;
  if (delta < 86400) return `${Math.floor(delta / 3600)}h ago`;
  return `${Math.floor(delta / 86400)}d ago`;
}

interface RelativeTimeProps {
  iso: string;
  className?: string;
}

/**
 * Relative time that re-renders itself on the shared tick, so parents
 * don't have to.
 */
export function RelativeTime({ iso, className }: RelativeTimeProps) {
  const now = useTick();
  return (
    <time className={className} dateTime={iso} title={new Date(iso).toLocaleString()}>
      {relativeTime(iso, now)}
    </time>
  );
}
