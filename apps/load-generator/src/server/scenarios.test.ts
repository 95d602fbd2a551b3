import { describe, expect, it, vi } from 'vitest';
import { isScenarioName, ScenarioController, SCENARIOS, type PhaseSpec, type RunnerControl } from './scenarios.js';
import type { RunConfig, RunSummary } from './types.js';

function summaryFor(config: RunConfig): RunSummary {
  return {
    sessionsCompleted: config.concurrency,
    requests: config.concurrency * 2,
    successes: config.concurrency * 2,
    errors: 0,
    endpointHits: { '/': config.concurrency * 2 },
    statusCounts: { '200': config.concurrency * 2 },
    profileCounts: {},
    serversHit: ['r1'],
    latency: { mean: 5, p50: 5, p95: 5, max: 5 },
    startedAt: 0,
    endedAt: 1000,
    stopped: false,
  };
}

class FakeRunner implements RunnerControl {
  readonly configs: RunConfig[] = [];
  stopped = 0;
  private pending: ((s: RunSummary) => void) | null = null;
  private hold: boolean;

  constructor(hold = false) {
    this.hold = hold;
  }

  runLoad(config: RunConfig): Promise<RunSummary> {
    this.configs.push(config);
    if (!this.hold) return Promise.resolve(summaryFor(config));
    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  stop(): void {
    this.stopped++;
    const last = this.configs[this.configs.length - 1];
    if (this.pending && last) {
      this.pending({ ...summaryFor(last), stopped: true });
      this.pending = null;
    }
  }
}

describe('scenario catalogue', () => {
  it('ramps gradually in five equal stages', () => {
    expect(SCENARIOS['gradual-ramp'].map((p) => p.users)).toEqual([20, 40, 60, 80, 100]);
    expect(SCENARIOS['gradual-ramp'].every((p) => p.durationSec === 30)).toBe(true);
  });

  it('recognizes only catalogued names', () => {
    expect(isScenarioName('flash-sale')).toBe(true);
    expect(isScenarioName('toString')).toBe(false);
    expect(isScenarioName('weekend')).toBe(false);
  });
});

describe('ScenarioController', () => {
  it('runs phases in order and merges their summaries', async () => {
    const runner = new FakeRunner();
    const onPhase = vi.fn();
    const controller = new ScenarioController(runner, onPhase);
    const phases: PhaseSpec[] = [
      { label: 'warm', users: 2, durationSec: 1 },
      { label: 'hot', users: 5, durationSec: 2 },
    ];

    const merged = await controller.run('custom', phases, 'shopper');

    expect(runner.configs).toEqual([
      { profile: 'shopper', concurrency: 2, durationSec: 1 },
      { profile: 'shopper', concurrency: 5, durationSec: 2 },
    ]);
    expect(onPhase).toHaveBeenNthCalledWith(1, 'custom', phases[0], 0, 2);
    expect(onPhase).toHaveBeenNthCalledWith(2, 'custom', phases[1], 1, 2);
    expect(merged.sessionsCompleted).toBe(7);
    expect(merged.requests).toBe(14);
    expect(controller.active).toBe(false);
  });

  it('skips remaining phases after stop', async () => {
    const runner = new FakeRunner(true);
    const controller = new ScenarioController(runner);
    const done = controller.run('gradual-ramp', SCENARIOS['gradual-ramp'], 'mix');
    expect(controller.active).toBe(true);

    controller.stop();
    const merged = await done;

    expect(runner.configs).toHaveLength(1);
    expect(runner.stopped).toBe(1);
    expect(merged.stopped).toBe(true);
    expect(merged.sessionsCompleted).toBe(20);
  });

  it('refuses to start while another scenario is running', async () => {
    const runner = new FakeRunner(true);
    const controller = new ScenarioController(runner);
    const first = controller.run('stress', SCENARIOS.stress, 'bot');
    await expect(controller.run('normal', SCENARIOS.normal, 'mix')).rejects.toThrow(/already running/);
    controller.stop();
    await first;
  });
});
