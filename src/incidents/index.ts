export {
  SIGNAL_SOURCES,
  SIGNAL_TYPES,
  SIGNAL_SEVERITY_ORDER,
  SIGNAL_SEVERITY_WEIGHT,
  EVENT_TYPES,
  INCIDENT_STATUSES,
} from './types.js';
export { IncidentTransitionError, canTransition, isTerminal, transitionIncident } from './lifecycle.js';
export {
  deterministicId,
  toSignalSeverity,
  createSignal,
  strongestSeverity,
  baselineEvents,
  specialAccessEvent,
  comboEventType,
  comboEvents,
  configEvents,
} from './signals.js';
export {
  buildFeatureVector,
  isNewApp,
  hasActiveSpecialAccess,
  isHighPriorityTarget,
  hasRecentChanges,
  hasSuspiciousProfile,
  shouldMonitor,
} from './feature-vector.js';
export {
  resolve,
  resolveAll,
  generateHypotheses,
  generateActions,
  CORRELATION_BOOST,
  CORRELATION_MIN_EVENTS,
  UNINSTALL_CONFIDENCE,
  TIMELINE_HIGH_CONFIDENCE_BOOST,
  TIMELINE_CANDIDATE_BOOST,
} from './root-cause.js';
export { SecuritySignalSchema, SecurityEventSchema, SignalSeveritySchema, AppFeatureVectorSchema } from './schema.js';
export { InMemoryEventStore } from './event-store.js';
export { PgEventStore } from './pg-event-store.js';
export type { EventStore, EventQuery } from './event-store.js';
export type { SignalInput } from './signals.js';
export type { FeatureVectorInput } from './feature-vector.js';
export type { ResolveContext, ResolveAllContext } from './root-cause.js';
export type {
  SignalSource,
  SignalType,
  SignalSeverity,
  SecuritySignal,
  EventType,
  SecurityEvent,
  IncidentSeverity,
  IncidentStatus,
  Hypothesis,
  ActionCategory,
  RecommendedAction,
  SecurityIncident,
  IdentityFeatures,
  ChangeFeatures,
  CapabilityFeatures,
  SurfaceFeatures,
  VerdictSummary,
  AppFeatureVector,
} from './types.js';
