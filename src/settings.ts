import { DEFAULT_EXPLANATIONS_FILE } from "./explanations.js";
import { DEFAULT_SSH_CONFIG_PATH } from "./sshConfig.js";
import { DEFAULT_SSHD_CONFIG_PATH } from "./sshdConfig.js";

export interface Settings {
  port: number;
  sshdConfigPath: string;
  sshConfigPath: string;
  explanationsFile: string;
  /** Allowed CORS origin; localhost on any port when unset. */
  corsOrigin?: string;
  production: boolean;
}

const DEFAULT_PORT = 8787;

function parsePort(raw: string | undefined): number {
  if (!raw) return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: parsePort(env.PORT),
    sshdConfigPath: env.SSHD_CONFIG_PATH || DEFAULT_SSHD_CONFIG_PATH,
    sshConfigPath: env.SSH_CONFIG_PATH || DEFAULT_SSH_CONFIG_PATH,
    explanationsFile: env.EXPLANATIONS_FILE || DEFAULT_EXPLANATIONS_FILE,
    corsOrigin: env.CORS_ORIGIN || undefined,
    production: env.NODE_ENV === "production",
  };
}
