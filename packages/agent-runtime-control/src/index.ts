/**
 * Agent Runtime Control
 *
 * The event stream and approval protocol external surfaces talk to.
 */

export {
  ApprovalBroker,
  type ApprovalBrokerConfig,
  createApprovalBroker,
  type RequestApprovalOptions,
} from "./approval/approvalBroker";
export {
  type AgentEvent,
  createEventBus,
  type EmitOptions,
  EventBus,
  type EventBusConfig,
  type EventBusStats,
  type EventHandler,
  type EventPriority,
  isEventType,
  matchesPattern,
  type Subscription,
  type SubscriptionOptions,
  type WildcardPattern,
} from "./events/eventBus";
