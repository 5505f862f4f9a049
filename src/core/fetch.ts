import { Agent, Dispatcher, fetch as undiciFetch } from "undici";

export type FetchFn = typeof undiciFetch;

export const defaultFetch: FetchFn = undiciFetch;

export interface DispatcherOptions {
  ignoreHttpsErrors: boolean;
  /** Upper bound on sockets per origin; matches the worker count. */
  connectionsPerOrigin: number;
}

export function createFetchDispatcher(options: DispatcherOptions): Dispatcher {
  return new Agent({
    connections: Math.max(1, options.connectionsPerOrigin),
    connect: options.ignoreHttpsErrors
      ? {
          rejectUnauthorized: false,
        }
      : undefined,
  });
}
