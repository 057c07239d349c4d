export type DispatchErrorCode =
  | "CONFIG"
  | "DISABLED"
  | "SERIALIZATION"
  | "TRANSPORT"
  | "PERSISTENCE"
  | "PROTOCOL";

/**
 * Base class for everything the dispatcher can fail with. `code` ends up in
 * the serialized log line next to the message.
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;

  constructor(code: DispatchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or missing settings; blocks startup and reload. */
export class ConfigError extends DispatchError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG", message, options);
  }
}

export class DisabledError extends DispatchError {
  constructor() {
    super("DISABLED", "service is not enabled");
  }
}

/** The event could not be rendered as a request body. Never retried. */
export class SerializationError extends DispatchError {
  constructor(message: string, options?: ErrorOptions) {
    super("SERIALIZATION", message, options);
  }
}

/** No response was received from the endpoint. */
export class TransportError extends DispatchError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("TRANSPORT", `failed to reach AlertManager at ${url}: ${reason}`, { cause });
    this.url = url;
  }
}

/** A retry file could not be written. Logged, never returned from a dispatch. */
export class PersistenceError extends DispatchError {
  constructor(message: string, options?: ErrorOptions) {
    super("PERSISTENCE", message, options);
  }
}

/** The endpoint answered with something other than 200. */
export class ProtocolError extends DispatchError {
  readonly statusCode: number;

  constructor(statusCode: number) {
    super("PROTOCOL", `unexpected response code ${statusCode} from AlertManager service`);
    this.statusCode = statusCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
