import type { ReplySender, Update } from '../updates/types.js';
import type { UpdateRouter } from './update-router.js';
import * as log from '../utils/logger.js';

/**
 * Processes one polling batch strictly in order. A failing update is logged
 * and skipped; the returned marker always covers it so it is not redelivered.
 */
export class UpdateBatchProcessor {
  private router: Pick<UpdateRouter, 'route'>;
  private sender: ReplySender;

  constructor(router: Pick<UpdateRouter, 'route'>, sender: ReplySender) {
    this.router = router;
    this.sender = sender;
  }

  /** Returns the id of the last processed update, or undefined for an empty batch. */
  async processBatch(updates: Update[]): Promise<number | undefined> {
    log.info(`Processing ${updates.length} update(s)`);

    let lastUpdateId: number | undefined;
    for (const update of updates) {
      try {
        const { replies } = await this.router.route(update);
        for (const reply of replies) {
          await this.sender.send(reply);
        }
      } catch (err) {
        log.error(`Update ${update.updateId} failed: ${log.errorMessage(err)}`);
      }
      lastUpdateId = update.updateId;
    }

    if (lastUpdateId !== undefined) log.info(`Last processed update: ${lastUpdateId}`);
    return lastUpdateId;
  }
}
