import type { ConnectionStatus } from '../lib/eventStream';

interface ConnectionBannerProps {
  status: ConnectionStatus;
  onRetry: () => void;
}

/**
 * Shown while live updates are interrupted. Once reconnecting has given
 * up, the banner stays until the user retries.
 */
export function ConnectionBanner({ status, onRetry }: ConnectionBannerProps) {
  if (status === 'reconnecting') {
    return <div className="connection-banner connection-banner-warn">Connection lost, reconnecting…</div>;
  }
  if (status !== 'failed') return null;

  return (
    <div className="connection-banner connection-banner-failed" role="alert">
      <span>Live updates stopped. Views refresh every 30 seconds until the connection is back.</span>
      <button className="btn btn-small" onClick={onRetry}>
        Retry now
      </button>
    </div>
  );
}
