import { z } from 'zod';
import { SapiClient } from '../client';
import { formatIssues } from '../lib/decode';
import { RequestValidationError } from '../lib/errors';
import type { SessionOptions } from '../lib/session';
import type { Transport } from '../types/common';

export type ResourceConfig = Partial<SessionOptions> | Transport;

const IdSchema = z.string().min(1, 'Must be a non-empty string');

function isTransport(config: ResourceConfig): config is Transport {
  return 'withPath' in config && typeof config.withPath === 'function';
}

/**
 * Validate an id and encode it as a single path segment.
 */
export function segment(id: string, what: string): string {
  const parse = IdSchema.safeParse(id);
  if (!parse.success) {
    throw new RequestValidationError(`${what} must be a non-empty string`, {
      extras: { issues: formatIssues(parse.error) },
    });
  }
  return encodeURIComponent(parse.data);
}

export abstract class Resource {
  readonly session: Transport;

  protected constructor(config: ResourceConfig, resourcePath: string) {
    const root = isTransport(config) ? config : new SapiClient(config).session;
    this.session = resourcePath ? root.withPath(resourcePath) : root;
  }

  /**
   * Build a resource configured like an existing client.
   */
  static fromClientConfig<R extends Resource>(
    this: new (config: ResourceConfig) => R,
    client: { config: Partial<SessionOptions> },
  ): R {
    return new this(SapiClient.fromClientConfig(client).config);
  }
}
