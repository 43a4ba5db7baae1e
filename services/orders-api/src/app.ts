import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import type { UnitOfWork } from '@fulfillment/shared/src/services/unit-of-work';
import { registerOrderRoutes } from './routes/orders';
import { registerSubOrderRoutes } from './routes/sub-orders';
import { registerCaseRoutes } from './routes/cases';

export interface AppDependencies {
     unitOfWork: UnitOfWork;
     checkReadiness: () => Promise<boolean>;
     logger?: boolean;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
     const app = Fastify({
          logger: deps.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const correlationId = req.headers['x-correlation-id'];
               return typeof correlationId === 'string' && correlationId
                    ? correlationId
                    : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     // CORS
     await app.register(cors, {
          origin: true,
     });

     // OpenAPI/Swagger
     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Marketplace Fulfillment Orders API',
                    description:
                         'Order, seller sub-order and return case lifecycle for a multi-seller marketplace',
                    version: '1.0.0',
               },
               servers: [{ url: 'http://localhost:3000', description: 'Development' }],
               tags: [
                    { name: 'orders', description: 'Parent orders and payment outcome' },
                    { name: 'sub-orders', description: 'Seller fulfillment of sub-orders and items' },
                    { name: 'cases', description: 'Return and complaint cases' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    const dbHealthy = await deps.checkReadiness();
                    if (!dbHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     const routeDeps = { unitOfWork: deps.unitOfWork };
     await app.register(registerOrderRoutes, { prefix: '/orders', ...routeDeps });
     await app.register(registerSubOrderRoutes, { prefix: '/sub-orders', ...routeDeps });
     await app.register(registerCaseRoutes, { prefix: '/cases', ...routeDeps });

     return app;
}
