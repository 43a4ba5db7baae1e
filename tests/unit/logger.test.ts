import pino from 'pino';
import { createChildLogger, createLoggerOptions, logger } from '@fulfillment/shared/src/utils/logger';

function captureLogger(env: NodeJS.ProcessEnv) {
     const lines: string[] = [];
     const log = pino(createLoggerOptions(env), {
          write: (line: string) => {
               lines.push(line);
          },
     });
     return { log, lines };
}

describe('Logger', () => {
     it('should honour LOG_LEVEL', () => {
          expect(logger.level).toBe('silent');
     });

     it('should handle error objects', () => {
          const spy = jest.spyOn(logger, 'error');
          const error = new Error('Test error');
          logger.error({ err: error }, 'An error occurred');
          expect(spy).toHaveBeenCalledWith({ err: error }, 'An error occurred');
          spy.mockRestore();
     });

     describe('createLoggerOptions', () => {
          it('should default to info with the service name in every line', () => {
               const options = createLoggerOptions({});

               expect(options.level).toBe('info');
               expect(options.base).toEqual({
                    service: 'marketplace-fulfillment',
                    environment: 'production',
               });
               expect(options.transport).toBeUndefined();
          });

          it('should pretty print in development', () => {
               const options = createLoggerOptions({ NODE_ENV: 'development' });

               expect(options.transport).toMatchObject({ target: 'pino-pretty' });
          });

          it('should write the level as a label', () => {
               const { log, lines } = captureLogger({ LOG_LEVEL: 'info', NODE_ENV: 'test' });

               log.info({ orderId: 'order-1' }, 'Order placed');

               expect(lines).toHaveLength(1);
               expect(JSON.parse(lines[0])).toMatchObject({
                    level: 'info',
                    service: 'marketplace-fulfillment',
                    environment: 'test',
                    orderId: 'order-1',
                    msg: 'Order placed',
               });
          });

          it('should redact buyer contact details and payment references', () => {
               const { log, lines } = captureLogger({ LOG_LEVEL: 'debug' });

               log.debug(
                    {
                         recipient: 'buyer@example.com',
                         request: { orderId: 'order-1', paymentTransactionId: 'txn-1' },
                    },
                    'Mock full refund'
               );

               const line = JSON.parse(lines[0]);
               expect(line.recipient).toBe('[Redacted]');
               expect(line.request).toEqual({ orderId: 'order-1', paymentTransactionId: '[Redacted]' });
          });
     });

     describe('createChildLogger', () => {
          it('should bind the component to every line', () => {
               const child = createChildLogger({ component: 'order-lifecycle' });
               expect(child.bindings()).toMatchObject({ component: 'order-lifecycle' });
          });

          it('should inherit the root level', () => {
               const child = createChildLogger({ component: 'return-case-workflow' });
               expect(child.level).toBe(logger.level);
          });
     });
});
