/** Service-level settings, swapped as a whole on reload. */
export interface ServiceConfig {
  /** Dispatch is refused while false */
  readonly enabled: boolean;
  /** AlertManager endpoint, e.g. http://alertmanager:9093/api/v1/alerts */
  readonly url: string;
  /** Directory where undeliverable payloads are staged for an external retry process */
  readonly retryFolder: string;
  /** Named handlers from the config file; fields left out fall back to `url` / `retryFolder` */
  readonly handlers: Readonly<Record<string, Partial<HandlerConfig>>>;
}

/** Per-handler target; defaults come from the service config. */
export interface HandlerConfig {
  url: string;
  retryFolder: string;
}

/** Options for the self-test. `message` is accepted but not sent. */
export interface TestOptions {
  url: string;
  retryFolder: string;
  message: string;
}
