export * from './lib/websocket/index.js';
export * from './lib/state/ObservableState.js';
export * from './lib/logger.js';
export * from './config.js';
export { useRealtimeState } from './hooks/useRealtimeState.js';
export { TeleprompterView } from './components/TeleprompterView.js';
export type { TeleprompterViewProps } from './components/TeleprompterView.js';
