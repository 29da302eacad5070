import { useEffect } from 'react';
import type { Notice } from '../state/dashboardState';

const NOTICE_TTL_MS = 6000;

interface NoticeListProps {
  notices: Notice[];
  onDismiss: (id: number) => void;
}

function NoticeItem({ notice, onDismiss }: { notice: Notice; onDismiss: (id: number) => void }) {
  useEffect(() => {
    const timer = setTimeout(() => onDismiss(notice.id), NOTICE_TTL_MS);
    return () => clearTimeout(timer);
  }, [notice.id, onDismiss]);

  return (
    <div className={`notice notice-${notice.level}`} role={notice.level === 'error' ? 'alert' : 'status'}>
      <span className="notice-message">{notice.message}</span>
      <button className="notice-close" aria-label="Dismiss" onClick={() => onDismiss(notice.id)}>
        ×
      </button>
    </div>
  );
}

export function NoticeList({ notices, onDismiss }: NoticeListProps) {
  if (notices.length === 0) return null;
  return (
    <div className="notice-list">
      {notices.map((notice) => (
        <NoticeItem key={notice.id} notice={notice} onDismiss={onDismiss} />
      ))}
    </div>
  );
}
