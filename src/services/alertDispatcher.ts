import type { Messaging } from 'firebase-admin/messaging';
import { traceCollaborator } from '../observability/tracing.js';
import { errorMessage, logger } from '../utils/logger.js';
import type { AlertDispatcher } from './enrichment/types.js';

// FCM rejects notification payloads above 4 KB.
const MAX_BODY_LENGTH = 3500;

/** Publishes alerts as Firebase Cloud Messaging topic messages. */
export class FirebaseAlertDispatcher implements AlertDispatcher {
  constructor(private readonly messaging: Pick<Messaging, 'send'>) {}

  async publish(message: string, subject: string, target: string): Promise<boolean> {
    try {
      const messageId = await traceCollaborator('alert-topic', 'publish', () => this.messaging.send({
        topic: target,
        notification: {
          title: subject,
          body: message.length > MAX_BODY_LENGTH ? `${message.slice(0, MAX_BODY_LENGTH - 1)}…` : message
        },
        data: {
          type: 'weather_alert',
          subject
        }
      }));
      logger.info('alerts.fcm.sent', { topic: target, message_id: messageId });
      return true;
    } catch (error) {
      logger.error('alerts.fcm.failed', { topic: target, error: errorMessage(error) });
      return false;
    }
  }
}
