/** Environment variable names read by the CLI. */
export const TOOLBRIDGE_ENV = {
  BACKEND: "TOOLBRIDGE_BACKEND",
  LOG_LEVEL: "TOOLBRIDGE_LOG_LEVEL",
  LOG_FORMAT: "TOOLBRIDGE_LOG_FORMAT",
  REQUEST_TIMEOUT: "TOOLBRIDGE_REQUEST_TIMEOUT",
} as const;

export type EnvKey = keyof typeof TOOLBRIDGE_ENV;

export function getEnv(key: EnvKey, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[TOOLBRIDGE_ENV[key]];
  return value === "" ? undefined : value;
}
