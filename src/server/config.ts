import path from 'node:path';

export interface ServerConfig {
  csvPath: string;
  port: number;
}

export const DEFAULT_PORT = 5173;
export const DEFAULT_CSV_PATH = path.join('public', 'known_exploited_vulnerabilities.csv');

export function resolveServerConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): ServerConfig {
  const port = Number(env.PORT);
  return {
    csvPath: path.resolve(cwd, env.KEV_CSV_PATH || DEFAULT_CSV_PATH),
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT,
  };
}
