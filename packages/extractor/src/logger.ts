import { pino, type Logger } from 'pino';
import { config } from './config.js';

export type { Logger };

export const logger: Logger = pino({
  name: 'clinorder-extractor',
  level: config.logLevel,
});

/** Child logger that stamps every line with the request id. */
export function forRequest(parent: Logger, requestId: string | undefined): Logger {
  return requestId ? parent.child({ requestId }) : parent;
}
