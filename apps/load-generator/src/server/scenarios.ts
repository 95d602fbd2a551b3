import { mergeSummaries } from './summary.js';
import type { RunConfig, RunSummary } from './types.js';

export interface RunnerControl {
  runLoad(config: RunConfig): Promise<RunSummary>;
  stop(): void;
}

export interface PhaseSpec {
  label: string;
  users: number;
  durationSec: number;
}

export type ScenarioName = 'normal' | 'peak' | 'flash-sale' | 'gradual-ramp' | 'stress';

export const SCENARIOS: Record<ScenarioName, PhaseSpec[]> = {
  'normal': [{ label: 'Normal day', users: 50, durationSec: 600 }],
  'peak': [{ label: 'Peak hours', users: 120, durationSec: 300 }],
  'flash-sale': [{ label: 'Flash sale burst', users: 150, durationSec: 300 }],
  'gradual-ramp': [
    { label: 'Stage 1', users: 20, durationSec: 30 },
    { label: 'Stage 2', users: 40, durationSec: 30 },
    { label: 'Stage 3', users: 60, durationSec: 30 },
    { label: 'Stage 4', users: 80, durationSec: 30 },
    { label: 'Stage 5', users: 100, durationSec: 30 },
  ],
  'stress': [{ label: 'High load', users: 200, durationSec: 180 }],
};

export function isScenarioName(name: string): name is ScenarioName {
  return Object.hasOwn(SCENARIOS, name);
}

export type PhaseCallback = (scenario: string, phase: PhaseSpec, phaseIndex: number, totalPhases: number) => void;

/** Runs a scenario's phases back to back through one runner. */
export class ScenarioController {
  private runner: RunnerControl;
  private onPhase: PhaseCallback;
  private _active = false;
  private cancelled = false;

  constructor(runner: RunnerControl, onPhase: PhaseCallback = () => {}) {
    this.runner = runner;
    this.onPhase = onPhase;
  }

  get active(): boolean {
    return this._active;
  }

  /**
   * Resolves with the phase summaries merged. A stop ends the current phase
   * and skips the rest.
   */
  async run(name: string, phases: PhaseSpec[], profile: RunConfig['profile']): Promise<RunSummary> {
    if (this._active) {
      throw new Error('A scenario is already running');
    }
    this._active = true;
    this.cancelled = false;
    const summaries: RunSummary[] = [];

    console.log(`[scenario] Starting ${name} (${phases.length} phase(s))`);
    try {
      for (let i = 0; i < phases.length && !this.cancelled; i++) {
        const phase = phases[i];
        console.log(`[scenario] Phase ${i}/${phases.length - 1}: ${phase.label} (${phase.users} users, ${phase.durationSec}s)`);
        this.onPhase(name, phase, i, phases.length);
        summaries.push(await this.runner.runLoad({
          profile,
          concurrency: phase.users,
          durationSec: phase.durationSec,
        }));
      }
    } finally {
      this._active = false;
    }

    console.log(`[scenario] ${name} ${this.cancelled ? 'stopped' : 'complete'}`);
    return mergeSummaries(summaries);
  }

  stop(): void {
    if (!this._active) return;
    this.cancelled = true;
    this.runner.stop();
  }
}
