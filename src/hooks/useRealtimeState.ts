import { useSyncExternalStore } from 'react';
import type { RealtimeSnapshot, RealtimeStateSource } from '../lib/state/ObservableState.js';

/** Re-render whenever the realtime snapshot changes */
export function useRealtimeState(source: RealtimeStateSource): RealtimeSnapshot {
  return useSyncExternalStore(source.subscribe, source.getSnapshot, source.getSnapshot);
}
