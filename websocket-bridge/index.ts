export { DisplayFeed, DISPLAY_CONFIG } from './DisplayFeed';
export type { DisplayFeedOptions, DisplayFeedStats, FrameSource } from './DisplayFeed';
export { WebSocketBridge } from './WebSocketBridge';
export type { BridgeConfig, BridgeStats } from './WebSocketBridge';
export * from './types/MessageTypes';
