// ---------------------------------------------------------------------------
// Session profiles
// ---------------------------------------------------------------------------

/** Inclusive [min, max] range. */
export type Range = readonly [min: number, max: number];

export interface SessionProfile {
  key: string;
  name: string;
  /** Session time budget in seconds */
  sessionDurationSec: Range;
  /** Page budget, integers */
  pagesPerSession: Range;
  /** Delay between successive requests in seconds */
  thinkTimeSec: Range;
  /** Endpoint template -> selection weight, in registration order */
  endpoints: ReadonlyArray<readonly [template: string, weight: number]>;
}

/** Per-session profile selection weights (0-1, normalized before use). */
export type ProfileMix = Readonly<Record<string, number>>;

// ---------------------------------------------------------------------------
// Request and session results
// ---------------------------------------------------------------------------

export interface RequestOutcome {
  /** Endpoint template the request was drawn from */
  template: string;
  /** Resolved path actually requested */
  path: string;
  status: 'ok' | 'error';
  /** HTTP status, or null when the request never got a response */
  httpStatus: number | null;
  latencyMs: number;
  /** Value of the X-Server-ID response header */
  serverId: string | null;
  error?: string;
}

export interface SessionResult {
  profile: string;
  requests: number;
  successes: number;
  failures: number;
  latenciesMs: number[];
  endpointHits: Record<string, number>;
  statusCounts: Record<string, number>;
  serversHit: string[];
  startedAt: number;
  endedAt: number;
  /** True when the session ended because of a stop signal */
  stopped: boolean;
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

export interface PercentileStats {
  mean: number;
  p50: number;
  p95: number;
  max: number;
}

export interface RunSummary {
  sessionsCompleted: number;
  requests: number;
  successes: number;
  errors: number;
  endpointHits: Record<string, number>;
  statusCounts: Record<string, number>;
  profileCounts: Record<string, number>;
  serversHit: string[];
  latency: PercentileStats;
  startedAt: number;
  endedAt: number;
  stopped: boolean;
}

// ---------------------------------------------------------------------------
// Run configuration
// ---------------------------------------------------------------------------

export interface RunConfig {
  /** A registered profile key, a mix of profile keys, or a custom profile */
  profile: string | ProfileMix | SessionProfile;
  concurrency: number;
  durationSec: number;
}

// ---------------------------------------------------------------------------
// Fairness
// ---------------------------------------------------------------------------

export interface TallyEntry {
  instanceId: string;
  count: number;
}

export interface InstanceShare extends TallyEntry {
  share: number;
}

export interface FairnessReport {
  total: number;
  instances: InstanceShare[];
  /** max share minus min share, 0-1 */
  maxMinusMinShare: number;
}

// ---------------------------------------------------------------------------
// WebSocket messages
// ---------------------------------------------------------------------------

export type WSMessage =
  | { type: 'session_complete'; data: SessionResult }
  | { type: 'summary'; data: RunSummary }
  | { type: 'state_change'; data: { running: boolean; config?: RunConfig } }
  | { type: 'scenario_phase'; data: { scenario: string; phase: string; phaseIndex: number; totalPhases: number } };

// ---------------------------------------------------------------------------
// Control API status
// ---------------------------------------------------------------------------

export interface AgentStatus {
  running: boolean;
  config: RunConfig | null;
  targetUrl: string;
  uptimeMs: number;
  activeSessions: number;
  summary: RunSummary | null;
}
