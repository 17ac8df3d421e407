import { ComposedMessage } from '../models/email';

/**
 * Delivers composed messages. Implementations own retries and timeouts.
 */
export interface IEmailTransport {
  send(message: ComposedMessage): Promise<void>;
  verifyConnection(): Promise<void>;
}
