import pino, { Logger, LoggerOptions } from 'pino';

// Buyer contact details and payment references stay out of the logs
const REDACTED_PATHS = [
     'buyerEmail',
     'recipient',
     'deliveryAddress',
     'paymentTransactionId',
     'request.paymentTransactionId',
     '*.buyerEmail',
     '*.deliveryAddress',
];

export function createLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
     const options: LoggerOptions = {
          level: env.LOG_LEVEL || 'info',
          formatters: {
               level: (label: string) => ({ level: label }),
          },
          serializers: {
               err: pino.stdSerializers.err,
               req: pino.stdSerializers.req,
               res: pino.stdSerializers.res,
          },
          redact: REDACTED_PATHS,
          base: {
               service: env.SERVICE_NAME || 'marketplace-fulfillment',
               environment: env.NODE_ENV || 'production',
          },
     };

     if (env.NODE_ENV === 'development') {
          options.transport = {
               target: 'pino-pretty',
               options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
               },
          };
     }

     return options;
}

export const logger = pino(createLoggerOptions());

export type { Logger };

export function createChildLogger(context: Record<string, unknown>): Logger {
     return logger.child(context);
}
