export {
  analyze,
  analyzeAll,
  formatAge,
  IMMEDIATE_WINDOW_MS,
  SHORT_WINDOW_MS,
  MEDIUM_WINDOW_MS,
  FRESH_INSTALL_THRESHOLD_MS,
  TIMELINE_WEIGHTS,
  DROPPER_CANDIDATE_SCORE,
  HIGH_CONFIDENCE_DROPPER_SCORE,
} from './install-timeline.js';
export type { TimelinePhase, TimelineSignal, TimelineSignalType, TimelineResult } from './types.js';
