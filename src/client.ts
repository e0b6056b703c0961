import { config as envConfig } from './config';
import { SapiSession, type SessionOptions } from './lib/session';

export function resolveSessionOptions(options: Partial<SessionOptions> = {}): SessionOptions {
  return {
    endpoint: options.endpoint ?? envConfig.endpoint,
    token: options.token ?? envConfig.token,
    requestTimeoutSec: options.requestTimeoutSec ?? envConfig.requestTimeoutSec,
    headers: options.headers,
    adapter: options.adapter,
  };
}

/**
 * Root client for the service. Holds the resolved configuration and a
 * session on the service endpoint; resources derive their own sessions
 * from it.
 */
export class SapiClient {
  readonly config: SessionOptions;
  readonly session: SapiSession;

  constructor(options: Partial<SessionOptions> = {}) {
    this.config = resolveSessionOptions(options);
    this.session = new SapiSession(this.config);
  }

  static fromClientConfig(client: { config: Partial<SessionOptions> }): SapiClient {
    return new SapiClient(client.config);
  }
}
