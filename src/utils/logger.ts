import { AsyncLocalStorage } from 'async_hooks';
import winston from 'winston';

export interface RequestContext {
  requestId: string;
  userId?: string;
}

const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Run `fn` with a request context that every log line inside it picks up.
 */
export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return requestContext.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}

const addRequestContext = winston.format((info) => {
  const context = requestContext.getStore();
  if (context) {
    info.requestId = context.requestId;
    if (context.userId) {
      info.userId = context.userId;
    }
  }
  return info;
});

const rootLogger = winston.createLogger({
  level: 'info',
  defaultMeta: { service: 'chat-store' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    addRequestContext(),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;

export function configureLogging(options: { level: string; service?: string; silent?: boolean }): void {
  rootLogger.level = options.level;
  if (options.service) {
    rootLogger.defaultMeta = { service: options.service };
  }
  rootLogger.silent = options.silent ?? false;
}

export function getLogger(component: string): Logger {
  return rootLogger.child({ component });
}
