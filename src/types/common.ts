export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type QueryParams = Record<string, string | number | undefined>;

export type PostOptions =
  | { json: unknown; headers?: Record<string, string> }
  | { body: string; headers?: Record<string, string> };

export type DeleteOptions = {
  json?: unknown;
  headers?: Record<string, string>;
};

/**
 * HTTP capability a resource talks through. Paths are relative to the
 * transport's base; every call resolves to the decoded JSON body.
 */
export interface Transport {
  readonly baseUrl: string;
  withPath(path: string): Transport;
  get(path: string, params?: QueryParams): Promise<unknown>;
  post(path: string, options: PostOptions): Promise<unknown>;
  delete(path: string, options?: DeleteOptions): Promise<unknown>;
}
