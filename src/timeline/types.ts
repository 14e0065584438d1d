export type TimelinePhase = 'NOT_APPLICABLE' | 'IMMEDIATE' | 'SHORT_TERM' | 'MEDIUM_TERM' | 'ESTABLISHED';

export type TimelineSignalType =
  | 'FRESH_INSTALL'
  | 'IMMEDIATE_NETWORK_BURST'
  | 'IMMEDIATE_SMS_ACCESS'
  | 'SHORT_TERM_ACCESSIBILITY'
  | 'SHORT_TERM_OVERLAY'
  | 'MEDIUM_TERM_ESCALATION'
  | 'BOOT_PERSISTENCE'
  | 'DYNAMIC_CODE_LOADING'
  | 'FRESH_INSTALL_WITH_INSTALLER_PERM'
  | 'LOW_TRUST_AMPLIFIER'
  | 'SIDELOAD_AMPLIFIER';

export interface TimelineSignal {
  type: TimelineSignalType;
  description: string;
  weight: number;
  /** Null for signals that do not depend on install time. */
  timeAfterInstallMs: number | null;
}

export interface TimelineResult {
  packageName: string;
  /** Sum of signal weights clamped to [0, 1]. */
  score: number;
  phase: TimelinePhase;
  signals: TimelineSignal[];
  installAge: number;
  isFreshInstall: boolean;
  isDropperCandidate: boolean;
  isHighConfidenceDropper: boolean;
}
