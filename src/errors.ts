/**
 * Error taxonomy shared by the catalogue, the restart coordinator and the HTTP
 * router. Each error carries a stable `code`, an operator-facing `hint` and a
 * structured `details` record so the router can map it to a status code and
 * the logger can record it without string parsing.
 */
export class StatusServiceError extends Error {
  public readonly code: string;
  public readonly hint: string;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    options: { code: string; hint: string; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "StatusServiceError";
    this.code = options.code;
    this.hint = options.hint;
    this.details = Object.freeze({ ...(options.details ?? {}) });
  }
}

/** Raised when settings or the tabs file are missing or invalid. */
export class ConfigurationError extends StatusServiceError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, {
      code: "E-CONFIG-INVALID",
      hint: "fix the environment or the tabs file and restart the service",
      details,
      cause,
    });
    this.name = "ConfigurationError";
  }
}

/** Raised when a tab index does not exist in the catalogue. */
export class NotConfiguredError extends StatusServiceError {
  constructor(index: number) {
    super(`tab index ${index} is out of range`, {
      code: "E-TAB-NOT-FOUND",
      hint: "list the configured tabs through /api/config",
      details: { index },
    });
    this.name = "NotConfiguredError";
  }
}

/** Raised when a restart targets a tab without Kubernetes metadata. */
export class NotRestartableError extends StatusServiceError {
  constructor(index: number) {
    super(`tab index ${index} is not restartable`, {
      code: "E-TAB-NOT-RESTARTABLE",
      hint: "add a k8s block to the tab configuration",
      details: { index },
    });
    this.name = "NotRestartableError";
  }
}

/**
 * Base class of failures tied to one deployment. The namespace and name are
 * appended to the message so published diagnostics identify the workload.
 */
export class RestartError extends StatusServiceError {
  constructor(
    message: string,
    options: { code: string; hint: string; namespace: string; name: string; cause?: unknown },
  ) {
    super(`${message} (namespace=${options.namespace}, deployment=${options.name})`, {
      code: options.code,
      hint: options.hint,
      details: { namespace: options.namespace, name: options.name },
      cause: options.cause,
    });
    this.name = "RestartError";
  }
}

/** Surfaced to the caller when a restart for the same key is already running. */
export class RestartInProgressError extends RestartError {
  constructor(namespace: string, name: string) {
    super("restart already in progress", {
      code: "E-RESTART-IN-PROGRESS",
      hint: "wait for the status stream to report a terminal state",
      namespace,
      name,
    });
    this.name = "RestartInProgressError";
  }
}

/** Recorded when a rollout does not reach a terminal condition in time. */
export class RestartTimeoutError extends RestartError {
  public readonly timeoutMs: number;

  constructor(namespace: string, name: string, timeoutMs: number) {
    super(`restart did not finish within ${Math.round(timeoutMs / 1_000)} seconds`, {
      code: "E-RESTART-TIMEOUT",
      hint: "inspect the deployment events in the cluster",
      namespace,
      name,
    });
    this.name = "RestartTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Any failure reported by the orchestration backend while triggering or
 * watching a rollout. `diagnostic` holds the operator-facing text without the
 * key suffix and is what gets published on the channel.
 */
export class OrchestrationFailureError extends StatusServiceError {
  public readonly diagnostic: string;

  constructor(diagnostic: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(diagnostic, {
      code: "E-ORCHESTRATION-FAILED",
      hint: "check the service account permissions and the cluster API",
      details: { status: options.status ?? null },
      cause: options.cause,
    });
    this.name = "OrchestrationFailureError";
    this.diagnostic = diagnostic;
  }
}

/** Raised by the router when the shared token is missing or wrong. */
export class AuthenticationError extends StatusServiceError {
  constructor(message = "authentication required") {
    super(message, {
      code: "E-AUTH-REQUIRED",
      hint: "send the shared token as a bearer token or log in through /api/auth/login",
    });
    this.name = "AuthenticationError";
  }
}

/** Login with a wrong token, or a session cookie that is missing or forged. */
export class CredentialsRejectedError extends StatusServiceError {
  constructor(message: string) {
    super(message, {
      code: "E-AUTH-REJECTED",
      hint: "log in again with the shared token",
    });
    this.name = "CredentialsRejectedError";
  }
}

/** Request body that is not the JSON document the route expects. */
export class BadRequestError extends StatusServiceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, { code: "E-BAD-REQUEST", hint: "send a JSON body matching the route", details });
    this.name = "BadRequestError";
  }
}

export class PayloadTooLargeError extends StatusServiceError {
  constructor(limitBytes: number) {
    super(`request body exceeds ${limitBytes} bytes`, {
      code: "E-PAYLOAD-TOO-LARGE",
      hint: "the auth endpoints only take a small JSON document",
      details: { limit_bytes: limitBytes },
    });
    this.name = "PayloadTooLargeError";
  }
}

/** Extracts a printable message from an arbitrary thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
