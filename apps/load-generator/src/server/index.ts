#!/usr/bin/env node
/**
 * Organic traffic agent.
 *
 *   loadgen http://192.168.2.50:7777 --users 15 --duration 300
 *   loadgen http://192.168.2.50:7777 --scenario gradual-ramp
 *   loadgen http://192.168.2.50:7777 --profile shopper --fairness-samples 30
 *   loadgen --serve                      # control API on $PORT
 *
 * Options:
 *   --users             Concurrent sessions (default: $DEFAULT_USERS or 50)
 *   --duration          Run window in seconds (default: $DEFAULT_DURATION_SEC or 300)
 *   --profile           Profile key, or "mix" for the weighted profile mix
 *   --scenario          normal | peak | flash-sale | gradual-ramp | stress
 *   --log               Summary log path (default: $SUMMARY_LOG or /tmp/traffic_gen.log)
 *   --fairness-samples  After the run, sample the target's /metrics N times and report fairness
 *   --serve             Start the control server instead of running once
 */
import { parseArgs } from 'node:util';
import { createAgentRunner } from './agent.js';
import { loadConfig, type AppConfig } from './config.js';
import { createControlServer } from './control-server.js';
import { collectTally, computeFairness, formatFairness } from './fairness.js';
import { isScenarioName, ScenarioController, SCENARIOS } from './scenarios.js';
import { formatSummary } from './summary.js';
import { writeSummaryLog } from './summary-log.js';
import type { RunSummary } from './types.js';

function parseCli(config: AppConfig) {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2).filter((a) => a !== '--'),
    options: {
      users: { type: 'string' },
      duration: { type: 'string' },
      profile: { type: 'string' },
      scenario: { type: 'string' },
      log: { type: 'string' },
      'fairness-samples': { type: 'string' },
      serve: { type: 'boolean', default: false },
    },
    strict: true,
    allowPositionals: true,
  });

  const intOption = (name: string, raw: string | undefined, fallback: number): number => {
    if (raw === undefined) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 0) {
      throw new Error(`--${name} must be a non-negative integer, got "${raw}"`);
    }
    return n;
  };

  if (values.scenario !== undefined && !isScenarioName(values.scenario)) {
    throw new Error(`--scenario must be one of ${Object.keys(SCENARIOS).join(', ')}`);
  }

  return {
    targetUrl: positionals[0] ?? config.targetUrl,
    users: intOption('users', values.users, config.defaultUsers),
    durationSec: intOption('duration', values.duration, config.defaultDurationSec),
    profile: values.profile ?? config.defaultProfile,
    scenario: values.scenario,
    logPath: values.log ?? config.summaryLogPath,
    fairnessSamples: intOption('fairness-samples', values['fairness-samples'], 0),
    serve: values.serve ?? false,
  };
}

function serve(config: AppConfig, targetUrl: string): void {
  const control = createControlServer(config, { targetUrl });
  control.server.listen(config.port, () => {
    console.log(`[boot] Control server listening on :${config.port} (target ${targetUrl})`);
  });

  const shutdown = (signal: string): void => {
    console.log(`[boot] ${signal} received, shutting down`);
    control.close().then(
      () => process.exit(0),
      (err) => {
        console.error('[boot] Shutdown error:', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function runOnce(config: AppConfig, cli: ReturnType<typeof parseCli>): Promise<void> {
  const runner = createAgentRunner(config, { targetUrl: cli.targetUrl });
  const scenarios = new ScenarioController(runner);

  const onSignal = (signal: string): void => {
    console.log(`\n[boot] ${signal} received, stopping active sessions`);
    scenarios.stop();
    runner.stop();
  };
  process.once('SIGINT', () => onSignal('SIGINT'));
  process.once('SIGTERM', () => onSignal('SIGTERM'));

  console.log('[boot] Starting organic traffic generator');
  console.log(`[boot] Target: ${cli.targetUrl}`);

  let summary: RunSummary;
  if (cli.scenario && isScenarioName(cli.scenario)) {
    summary = await scenarios.run(cli.scenario, SCENARIOS[cli.scenario], cli.profile);
  } else {
    summary = await runner.runLoad({
      profile: cli.profile,
      concurrency: cli.users,
      durationSec: cli.durationSec,
    });
  }

  console.log(formatSummary(summary));
  await writeSummaryLog(cli.logPath, config.agentId, summary);
  console.log(`[boot] Summary appended to ${cli.logPath}`);

  if (cli.fairnessSamples > 0) {
    const tally = await collectTally(cli.targetUrl, cli.fairnessSamples);
    console.log(formatFairness(computeFairness(tally)));
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const cli = parseCli(config);
  if (cli.serve) {
    serve(config, cli.targetUrl);
    return;
  }
  await runOnce(config, cli);
}

main().catch((err) => {
  console.error('[boot] Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
