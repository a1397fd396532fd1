import { errorMessage, type Logger } from '@vies-batch/shared';

/**
 * Serializes event delivery: each delivery starts after the previous one
 * settled, so listeners see events one at a time and in emission order.
 */
export class ProgressChannel {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger) {}

  send(hook: string, deliver: () => void | Promise<void>): void {
    this.tail = this.tail.then(deliver).catch((error: unknown) => {
      this.logger.warn('Event hook failed', { hook, error: errorMessage(error) });
    });
  }

  /**
   * Resolves once everything sent so far was delivered.
   */
  drain(): Promise<void> {
    return this.tail;
  }
}
