import { useEffect, useRef } from 'react';
import type { CSSProperties } from 'react';
import { useRealtimeState } from '../hooks/useRealtimeState.js';
import type { RealtimeStateSource } from '../lib/state/ObservableState.js';

export interface TeleprompterViewProps {
  source: RealtimeStateSource;
  /** Shown until the first transcription arrives */
  placeholder?: string;
  fontSize?: number;
  opacity?: number;
  /** Keep the newest text in view as the transcription grows */
  autoScroll?: boolean;
}

export function TeleprompterView({
  source,
  placeholder = 'Ready for your interview...',
  fontSize = 24,
  opacity = 0.85,
  autoScroll = true,
}: TeleprompterViewProps) {
  const { text, connected } = useRealtimeState(source);
  const scrollRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    const el = scrollRef.current;
    if (autoScroll && el) {
      el.scrollTop = el.scrollHeight;
    }
  }, [text, autoScroll]);

  return (
    <div style={{ ...styles.container, opacity }}>
      <StatusIndicator connected={connected} />
      <div ref={scrollRef} data-testid="teleprompter-scroll" style={styles.scroll}>
        <p data-testid="teleprompter-text" style={{ ...styles.text, fontSize }}>
          {text || placeholder}
        </p>
      </div>
    </div>
  );
}

function StatusIndicator({ connected }: { connected: boolean }) {
  const dotStyle = connected
    ? { ...styles.statusDot, backgroundColor: '#00ff00', boxShadow: '0 0 8px #00ff00' }
    : { ...styles.statusDot, backgroundColor: '#ff0000' };

  return (
    <div style={styles.statusIndicator}>
      <div style={dotStyle} />
      <span data-testid="connection-status" style={styles.statusText}>
        {connected ? 'Connected' : 'Disconnected'}
      </span>
    </div>
  );
}

const styles: Record<string, CSSProperties> = {
  container: {
    display: 'flex',
    flexDirection: 'column',
    gap: '12px',
    padding: '16px',
    backgroundColor: 'rgba(0, 0, 0, 0.8)',
    borderRadius: '8px',
    fontFamily: "'Segoe UI', Tahoma, Geneva, Verdana, sans-serif",
  },
  statusIndicator: {
    display: 'flex',
    alignItems: 'center',
    gap: '8px',
  },
  statusDot: {
    width: '10px',
    height: '10px',
    borderRadius: '50%',
    transition: 'all 0.3s ease',
  },
  statusText: {
    color: '#aaaaaa',
    fontSize: '12px',
  },
  scroll: {
    overflowY: 'auto',
    maxHeight: '100%',
  },
  text: {
    color: '#ffffff',
    textAlign: 'center',
    margin: 0,
    whiteSpace: 'pre-wrap',
  },
};
