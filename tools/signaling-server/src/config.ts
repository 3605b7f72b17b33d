export const DEFAULT_PORT = 3001;

export interface SignalingServerConfig {
  port: number;
  /** Unset binds every interface */
  host?: string;
}

/** Reads `PORT` and `HOST`; an unparseable port is an error rather than a silent default. */
export function resolveServerConfig(env: Record<string, string | undefined>): SignalingServerConfig {
  const rawPort = env.PORT?.trim();
  let port = DEFAULT_PORT;
  if (rawPort) {
    port = Number(rawPort);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`Invalid PORT "${rawPort}"`);
    }
  }
  const host = env.HOST?.trim();
  return host ? { port, host } : { port };
}
