export { createActivityInvoker } from "./activity-invoker.js";
export type {
  ActivityInvoker,
  ActivityInvokerOptions,
  InvocationOutcome,
  InvocationRequest,
  RemoteActivityTransport,
  RemoteDispatchRequest,
} from "./activity-invoker.js";
export { createLocalActivityRegistry } from "./local-registry.js";
export type { LocalActivityRegistry } from "./local-registry.js";
export { computeBackoffDelay } from "./backoff.js";
