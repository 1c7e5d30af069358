import type { ListenTarget } from '../monitor/index.js';
import { ConfigurationError } from '../core/errors.js';

/**
 * Endpoint arguments shared by the observer clients.
 */
export interface EndpointArgs {
  /** Positional arguments; the first one is the socket path */
  _: (string | number)[];
  socket?: string | undefined;
  host: string;
  port?: number | undefined;
}

/**
 * Pick the endpoint from the parsed arguments. A socket path wins over a
 * port.
 */
export function resolveEndpoint(args: EndpointArgs): ListenTarget {
  const [positional] = args._;
  const socketPath = args.socket ?? (typeof positional === 'string' ? positional : undefined);
  if (socketPath) {
    return { socketPath };
  }
  if (args.port !== undefined) {
    return { host: args.host, port: args.port };
  }
  throw new ConfigurationError('No monitoring endpoint given: pass a socket path or --port');
}
