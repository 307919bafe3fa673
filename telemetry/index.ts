export { TelemetryRouter, ROUTER_CONFIG } from './TelemetryRouter';
export type {
  FrameHandler,
  FrameTransform,
  SubscribeOptions,
  SubscriberStats,
  RouterStats,
  BackpressureEvent,
} from './TelemetryRouter';
