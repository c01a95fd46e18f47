/**
 * Queue Service
 * Manages the BullMQ queue for outbound replies
 */
import { Queue, type ConnectionOptions, type QueueOptions } from 'bullmq';
import { QUEUES, type MessageSendPayload, type QueueConfig } from '@pedibot/shared';

export type QueueConnection = ConnectionOptions;

class QueueServiceClass {
  private messageQueue: Queue<MessageSendPayload> | null = null;
  private connection: QueueConnection | null = null;

  /**
   * Initialize queue service with Redis connection
   */
  initialize(connection: QueueConnection): void {
    this.connection = connection;
  }

  private createQueue<T>(config: QueueConfig): Queue<T> {
    if (!this.connection) {
      throw new Error('Queue service not initialized. Call initialize() first.');
    }

    const options: QueueOptions = {
      connection: this.connection,
      defaultJobOptions: {
        attempts: config.attempts,
        backoff: config.backoff,
        removeOnComplete: 100,
        removeOnFail: 1000,
      },
    };
    return new Queue<T>(config.name, options);
  }

  /**
   * Get the message sending queue
   */
  getMessageQueue(): Queue<MessageSendPayload> {
    if (!this.messageQueue) {
      this.messageQueue = this.createQueue<MessageSendPayload>(QUEUES.MESSAGE_SEND);
    }
    return this.messageQueue;
  }

  /**
   * Close the queue and forget the connection
   */
  async closeAll(): Promise<void> {
    await this.messageQueue?.close();
    this.messageQueue = null;
    this.connection = null;
  }
}

export const QueueService = new QueueServiceClass();
