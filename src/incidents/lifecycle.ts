import type { IncidentStatus, SecurityIncident } from './types.js';

const TRANSITIONS: Readonly<Record<IncidentStatus, readonly IncidentStatus[]>> = {
  OPEN: ['INVESTIGATING', 'RESOLVED', 'DISMISSED', 'FALSE_POSITIVE'],
  INVESTIGATING: ['RESOLVED', 'DISMISSED', 'FALSE_POSITIVE'],
  RESOLVED: [],
  DISMISSED: [],
  FALSE_POSITIVE: [],
};

export class IncidentTransitionError extends Error {
  constructor(
    public readonly from: IncidentStatus,
    public readonly to: IncidentStatus,
  ) {
    super(`Cannot move incident from ${from} to ${to}`);
    this.name = 'IncidentTransitionError';
  }
}

export function isTerminal(status: IncidentStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: IncidentStatus, to: IncidentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Returns a copy in the new status; the input incident is left as is. */
export function transitionIncident(
  incident: SecurityIncident,
  to: IncidentStatus,
  now: number,
): SecurityIncident {
  if (!canTransition(incident.status, to)) {
    throw new IncidentTransitionError(incident.status, to);
  }
  return { ...incident, status: to, updatedAt: now };
}
