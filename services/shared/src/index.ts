// Database
export * from './db/client';

// Messaging
export * from './messaging/client';

// Domain rules
export * from './domain/status-transitions';
export * from './domain/status-derivation';
export * from './domain/status-stamps';
export * from './domain/money';
export * from './domain/numbering';

// Repositories
export * from './repositories/types';
export * from './repositories/pg';

// Services
export * from './services/audit-trail-recorder';
export * from './services/container';
export * from './services/notification-service';
export * from './services/order-aggregate-builder';
export * from './services/order-lifecycle-coordinator';
export * from './services/order-query-service';
export * from './services/parent-refund-cascade';
export * from './services/return-case-workflow';
export * from './services/sub-order-lifecycle-coordinator';
export * from './services/unit-of-work';

// Clients
export * from './clients/refund-client';

// Types
export * from './types/order.types';

// Config
export * from './config/config';

// Utils
export * from './utils/clock';
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/result';
