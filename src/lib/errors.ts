/**
 * Raised at startup when the configuration cannot be used
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A transaction author or object owner has no entry in the user directory.
 * Aborts the rest of the request it was raised in.
 */
export class UnresolvableIdentityError extends Error {
  readonly identity: string;

  constructor(identity: string) {
    super(`Unknown Phabricator user: ${identity}`);
    this.name = "UnresolvableIdentityError";
    this.identity = identity;
  }
}

/**
 * Conduit answered with an error code or a non-2xx status
 */
export class ConduitError extends Error {
  readonly method: string;
  readonly code: string | null;

  constructor(method: string, code: string | null, info: string) {
    super(`Conduit call ${method} failed: ${info}`);
    this.name = "ConduitError";
    this.method = method;
    this.code = code;
  }
}
