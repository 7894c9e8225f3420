/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer explicit STAGE; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || process.env.JEST_WORKER_ID !== undefined;
}

export function isLocal(): boolean {
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return process.env.IS_LOCAL === "true" || !isLambda;
}

export interface GetEnvVarOptions<T> {
  parse: (raw: string) => T;
  defaultValue?: T;
}

/**
 * Reads an environment variable with sensible fallbacks and parsing.
 * - Checks NAME__<stage> first (e.g., MAX_RETRIES__prod), then NAME.
 * - If not found, returns `defaultValue`.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined {
  const candidate = process.env[`${name}__${getStage()}`] ?? process.env[name];

  if (candidate != null && candidate !== "") {
    return options.parse(candidate);
  }

  return options.defaultValue;
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue, parse: (raw) => raw });
}
