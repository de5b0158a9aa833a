/**
 * Client configuration
 *
 * Environment defaults; CLI flags override them.
 */

export const DEFAULT_REMOTE = "127.0.0.1:8080";

export type ClientConfig = {
  remote: string;
  udp: boolean;
  debug: boolean;
  pulse: boolean;
  connectTimeout: number | undefined;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    remote: env.WIRECAT_REMOTE || DEFAULT_REMOTE,
    udp: env.WIRECAT_UDP === "1",
    debug: env.WIRECAT_DEBUG === "1",
    pulse: env.WIRECAT_PULSE === "1",
    connectTimeout: parseTimeout(env.WIRECAT_CONNECT_TIMEOUT),
  };
}

function parseTimeout(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const ms = parseInt(value, 10);
  return Number.isFinite(ms) && ms > 0 ? ms : undefined;
}
