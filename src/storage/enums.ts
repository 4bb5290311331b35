// Closed value sets. Anything outside these is a DataContractViolation.

export const PULL_REQUEST_STATES = ['OPEN', 'MERGED', 'DECLINED', 'SUPERSEDED'] as const;
export type PullRequestState = (typeof PULL_REQUEST_STATES)[number];

export const ISSUE_SEVERITIES = ['BLOCKER', 'CRITICAL', 'MAJOR', 'MINOR', 'INFO'] as const;
export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

export const ISSUE_TYPES = ['BUG', 'VULNERABILITY', 'CODE_SMELL'] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

export const ISSUE_STATUSES = ['OPEN', 'CONFIRMED', 'REOPENED', 'RESOLVED', 'CLOSED'] as const;
export type IssueStatus = (typeof ISSUE_STATUSES)[number];

export const HOTSPOT_STATUSES = ['TO_REVIEW', 'IN_REVIEW', 'REVIEWED'] as const;
export type HotspotStatus = (typeof HOTSPOT_STATUSES)[number];

export const HOTSPOT_RESOLUTIONS = ['SAFE', 'ACKNOWLEDGED', 'FIXED'] as const;
export type HotspotResolution = (typeof HOTSPOT_RESOLUTIONS)[number];

/** Taken from the hotspot's vulnerability probability. */
export const HOTSPOT_SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;
export type HotspotSeverity = (typeof HOTSPOT_SEVERITIES)[number];

/** NONE is reported for projects without a computed gate. */
export const QUALITY_GATE_STATUSES = ['OK', 'WARN', 'ERROR', 'NONE'] as const;
export type QualityGateStatus = (typeof QUALITY_GATE_STATUSES)[number];
