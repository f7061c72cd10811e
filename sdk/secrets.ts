export type EnvReader = (key: string) => string | undefined;

const defaultEnvReader: EnvReader = (key) => {
  if (typeof process !== "undefined" && process.env) {
    return process.env[key];
  }
  return undefined;
};

const optionalEnv = (key: string, readEnv: EnvReader): string | undefined => readEnv(key) || undefined;


export const ENV_KEYS = {
  TOGGL_API_TOKEN: "TOGGL_API_TOKEN",
  TOGGL_USERNAME: "TOGGL_USERNAME",
  TOGGL_PASSWORD: "TOGGL_PASSWORD",
  TOGGL_API_URL: "TOGGL_API_URL",
  TOGGL_REPORTS_URL: "TOGGL_REPORTS_URL",
  TOGGL_CREATED_WITH: "TOGGL_CREATED_WITH",
  TOGGL_DEBUG: "TOGGL_DEBUG",
} as const;

/** True when TOGGL_DEBUG is "1", "true" or "yes", in any case. */
export const readDebugFlag = (readEnv: EnvReader = defaultEnvReader): boolean => {
  const value = (readEnv(ENV_KEYS.TOGGL_DEBUG) ?? "").trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes";
};

export type TogglCredentialSecrets =
  | { apiToken: string }
  | { username: string; password: string };

export type TogglSecrets = {
  credentials: TogglCredentialSecrets;
  apiUrl?: string;
  reportsUrl?: string;
  createdWith?: string;
  debug: boolean;
};

/**
 * Reads credentials and settings from the environment. An API token wins over a
 * username/password pair.
 */
export const getTogglSecrets = (readEnv: EnvReader = defaultEnvReader): TogglSecrets => ({
  credentials: getTogglCredentials(readEnv),
  apiUrl: optionalEnv(ENV_KEYS.TOGGL_API_URL, readEnv),
  reportsUrl: optionalEnv(ENV_KEYS.TOGGL_REPORTS_URL, readEnv),
  createdWith: optionalEnv(ENV_KEYS.TOGGL_CREATED_WITH, readEnv),
  debug: readDebugFlag(readEnv),
});

const getTogglCredentials = (readEnv: EnvReader): TogglCredentialSecrets => {
  const apiToken = optionalEnv(ENV_KEYS.TOGGL_API_TOKEN, readEnv);
  if (apiToken) return { apiToken };

  const username = optionalEnv(ENV_KEYS.TOGGL_USERNAME, readEnv);
  const password = optionalEnv(ENV_KEYS.TOGGL_PASSWORD, readEnv);
  if (username && password) return { username, password };

  const missing = username ? ENV_KEYS.TOGGL_PASSWORD : ENV_KEYS.TOGGL_API_TOKEN;
  throw new Error(`Missing required environment variable: ${missing}`);
};
