/**
 * Raised when the service settings (YAML file plus environment variables)
 * fail validation at startup.
 */
export class ConfigLoadError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigLoadError";
    this.issues = issues;
  }
}

/**
 * Raised to callers that need the integer environment id when the current
 * environment code has no row in the environments table.
 */
export class EnvironmentNotResolvedError extends Error {
  readonly code = "environment_not_resolved";
  readonly environmentCode: string;

  constructor(environmentCode: string) {
    super(
      `Cannot resolve an environment id for environment code "${environmentCode}". ` +
        `Ensure the environments table contains a row with env_code = '${environmentCode}'.`,
    );
    this.name = "EnvironmentNotResolvedError";
    this.environmentCode = environmentCode;
  }
}

export function isEnvironmentNotResolvedError(error: unknown): error is EnvironmentNotResolvedError {
  return error instanceof EnvironmentNotResolvedError;
}

/**
 * Raised to callers that need the integer environment id when the store
 * could not be asked. The environment row may well exist.
 */
export class EnvironmentStoreUnavailableError extends Error {
  readonly code = "environment_store_unavailable";
  readonly environmentCode: string;

  constructor(environmentCode: string, cause: Error) {
    super(`Environment store unavailable while resolving the id for environment code "${environmentCode}"`, {
      cause,
    });
    this.name = "EnvironmentStoreUnavailableError";
    this.environmentCode = environmentCode;
  }
}

export function isEnvironmentStoreUnavailableError(error: unknown): error is EnvironmentStoreUnavailableError {
  return error instanceof EnvironmentStoreUnavailableError;
}
