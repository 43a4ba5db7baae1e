import { checkConnection, closePool } from '@fulfillment/shared/src/db/client';
import { closeConnection } from '@fulfillment/shared/src/messaging/client';
import { createRefundClient } from '@fulfillment/shared/src/clients/refund-client';
import { loadConfig } from '@fulfillment/shared/src/config/config';
import { AmqpNotificationService } from '@fulfillment/shared/src/services/notification-service';
import { createPgUnitOfWork } from '@fulfillment/shared/src/services/unit-of-work';
import { logger } from '@fulfillment/shared/src/utils/logger';
import { buildApp } from './app';

async function main() {
     const config = loadConfig();

     const unitOfWork = createPgUnitOfWork({
          refundClient: createRefundClient(),
          notifications: new AmqpNotificationService(),
          returnWindowDays: config.returnWindowDays,
     });

     const app = await buildApp({ unitOfWork, checkReadiness: checkConnection });
     const { port, host } = config.ordersApi;

     // Start server
     try {
          await app.listen({ port, host });
          logger.info(`Orders API listening on ${host}:${port}`);
          logger.info(`OpenAPI docs available at http://${host}:${port}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     const onSignal = () => {
          shutdown().catch((err) => {
               logger.error({ err }, 'Shutdown failed');
               process.exit(1);
          });
     };
     process.on('SIGINT', onSignal);
     process.on('SIGTERM', onSignal);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
