export interface AppConfig {
  port: number;
  targetUrl: string;
  defaultUsers: number;
  defaultDurationSec: number;
  defaultProfile: string;
  requestTimeoutMs: number;
  summaryLogPath: string;
  agentId: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInt(env.PORT || '3100', 10),
    targetUrl: env.TARGET_URL || 'http://localhost:7777',
    defaultUsers: parseInt(env.DEFAULT_USERS || '50', 10),
    defaultDurationSec: parseInt(env.DEFAULT_DURATION_SEC || '300', 10),
    defaultProfile: env.DEFAULT_PROFILE || 'mix',
    requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS || '10000', 10),
    summaryLogPath: env.SUMMARY_LOG || '/tmp/traffic_gen.log',
    agentId: env.AGENT_ID || env.HOSTNAME || 'agent',
  };
}
