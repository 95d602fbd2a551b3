import type { RequestSender } from './http-client.js';
import { isSessionProfile, profileSelector, type CompiledProfile } from './profiles.js';
import { defaultRng, type Rng } from './rng.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, runSession } from './session.js';
import { SummaryBuilder } from './summary.js';
import type { DiscreteSampler } from './sampler.js';
import type { RequestOutcome, RunConfig, RunSummary, SessionResult } from './types.js';

export type SessionCallback = (result: SessionResult) => void;
export type RequestCallback = (outcome: RequestOutcome) => void;

export interface RunnerOptions {
  targetUrl: string;
  requestTimeoutMs?: number;
  rng?: Rng;
  send?: RequestSender;
  onSessionComplete?: SessionCallback;
  onRequest?: RequestCallback;
  onActiveChange?: (active: number) => void;
}

interface ActiveRun {
  config: RunConfig;
  selector: DiscreteSampler<CompiledProfile>;
  builder: SummaryBuilder;
  stop: AbortController;
  drain: AbortController;
  deadlineTimer: ReturnType<typeof setTimeout>;
  resolve: (summary: RunSummary) => void;
}

export function validateRunConfig(config: RunConfig): void {
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${config.concurrency}`);
  }
  if (!Number.isFinite(config.durationSec) || config.durationSec <= 0) {
    throw new Error(`durationSec must be positive, got ${config.durationSec}`);
  }
}

function describeProfile(profile: RunConfig['profile']): string {
  if (typeof profile === 'string') return profile;
  return isSessionProfile(profile) ? profile.key : JSON.stringify(profile);
}

/**
 * Keeps exactly `concurrency` sessions in flight for the run window. A
 * session that ends early is replaced at once; when the window closes no new
 * sessions start and running ones end after their current request.
 */
export class AgentRunner {
  private readonly options: RunnerOptions;
  private readonly rng: Rng;
  private run: ActiveRun | null = null;
  private active = 0;
  private lastSummary: RunSummary | null = null;

  constructor(options: RunnerOptions) {
    this.options = options;
    this.rng = options.rng ?? defaultRng;
  }

  get running(): boolean {
    return this.run !== null;
  }

  get activeSessions(): number {
    return this.active;
  }

  get currentConfig(): RunConfig | null {
    return this.run ? { ...this.run.config } : null;
  }

  /** Live summary while running, otherwise the last finished one. */
  summary(): RunSummary | null {
    return this.run ? this.run.builder.build() : this.lastSummary;
  }

  /**
   * Starts a run and resolves with its summary once every session has
   * returned. Rejects synchronously-invalid configs and concurrent runs.
   */
  runLoad(config: RunConfig): Promise<RunSummary> {
    if (this.run) {
      return Promise.reject(new Error('A run is already in progress'));
    }
    try {
      validateRunConfig(config);
    } catch (err) {
      return Promise.reject(err);
    }
    let selector: DiscreteSampler<CompiledProfile>;
    try {
      selector = profileSelector(config.profile);
    } catch (err) {
      return Promise.reject(err);
    }

    const builder = new SummaryBuilder();
    const stop = new AbortController();
    const drain = new AbortController();

    let resolve: (s: RunSummary) => void = () => {};
    const done = new Promise<RunSummary>((r) => {
      resolve = r;
    });

    const deadlineTimer = setTimeout(() => {
      console.log('[runner] Run window closed, draining active sessions');
      drain.abort();
      this.maybeFinish(run);
    }, config.durationSec * 1000);

    const run: ActiveRun = { config, selector, builder, stop, drain, deadlineTimer, resolve };
    this.run = run;

    console.log(
      `[runner] Started: target=${this.options.targetUrl} users=${config.concurrency} ` +
      `duration=${config.durationSec}s profile=${describeProfile(config.profile)}`
    );

    for (let i = 0; i < config.concurrency; i++) {
      this.launch(run);
    }
    return done;
  }

  /** Abandons all sessions; the pending runLoad promise resolves promptly. */
  stop(): void {
    const run = this.run;
    if (!run || run.stop.signal.aborted) return;
    console.log(`[runner] Stop requested with ${this.active} active session(s)`);
    run.builder.markStopped();
    clearTimeout(run.deadlineTimer);
    run.stop.abort();
    run.drain.abort();
  }

  private launch(run: ActiveRun): void {
    // A relaunch scheduled by a run that has since finished
    if (this.run !== run) return;
    if (run.drain.signal.aborted) {
      this.maybeFinish(run);
      return;
    }

    const compiled = run.selector.sample(this.rng);
    this.setActive(this.active + 1);

    runSession(compiled, this.options.targetUrl, this.rng, {
      requestTimeoutMs: this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      signal: run.stop.signal,
      drainSignal: run.drain.signal,
      send: this.options.send,
      onRequest: this.options.onRequest,
    })
      .then((result) => {
        run.builder.add(result);
        this.options.onSessionComplete?.(result);
      })
      .catch((err) => {
        console.error('[runner] Unexpected session error:', err);
      })
      .finally(() => {
        this.setActive(this.active - 1);
        // Yield to the event loop so a session that ends instantly cannot
        // starve the deadline timer
        setImmediate(() => this.launch(run));
      });
  }

  private maybeFinish(run: ActiveRun): void {
    if (this.run !== run || this.active > 0) return;
    clearTimeout(run.deadlineTimer);
    run.builder.finish();
    const summary = run.builder.build();
    this.lastSummary = summary;
    this.run = null;
    console.log(
      `[runner] Finished: sessions=${summary.sessionsCompleted} requests=${summary.requests} ` +
      `errors=${summary.errors} stopped=${summary.stopped}`
    );
    run.resolve(summary);
  }

  private setActive(n: number): void {
    this.active = n;
    this.options.onActiveChange?.(n);
  }
}
