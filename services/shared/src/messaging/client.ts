import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const ORDER_NOTIFICATIONS_EXCHANGE = 'orders.notifications';
export const NOTIFICATIONS_DLX = 'dlx.notifications';
export const EMAIL_NOTIFICATIONS_QUEUE = 'notifications.email';
export const EMAIL_NOTIFICATIONS_DLQ = 'dlq.notifications.email';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err: unknown) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, reconnecting on next publish');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();

     await ch.assertExchange(ORDER_NOTIFICATIONS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(NOTIFICATIONS_DLX, 'topic', { durable: true });

     await ch.assertQueue(EMAIL_NOTIFICATIONS_QUEUE, {
          durable: true,
          deadLetterExchange: NOTIFICATIONS_DLX,
          deadLetterRoutingKey: EMAIL_NOTIFICATIONS_DLQ,
     });
     await ch.assertQueue(EMAIL_NOTIFICATIONS_DLQ, { durable: true });

     await ch.bindQueue(EMAIL_NOTIFICATIONS_QUEUE, ORDER_NOTIFICATIONS_EXCHANGE, 'notification.#');
     await ch.bindQueue(EMAIL_NOTIFICATIONS_DLQ, NOTIFICATIONS_DLX, EMAIL_NOTIFICATIONS_DLQ);

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     const accepted = ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
     });

     if (!accepted) {
          logger.warn({ exchange, routingKey }, 'RabbitMQ write buffer full, message queued locally');
     }
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
