import { describe, it, expect } from 'vitest';
import { UpdateBatchProcessor } from '../../src/router/batch-processor.js';
import type { RouteResult } from '../../src/router/update-router.js';
import type { OutboundReply, ReplySender, Update } from '../../src/updates/types.js';

class RecordingSender implements ReplySender {
  sent: OutboundReply[] = [];
  async send(reply: OutboundReply): Promise<void> {
    this.sent.push(reply);
  }
}

function otherUpdate(updateId: number): Update {
  return { updateId, kind: 'other', type: 'poll' };
}

describe('UpdateBatchProcessor', () => {
  it('should process in order and return the last update id', async () => {
    const order: number[] = [];
    const router = {
      async route(update: Update): Promise<RouteResult> {
        order.push(update.updateId);
        return {
          classification: { kind: 'unknown', type: 'poll' },
          replies: [{ kind: 'text', text: `reply ${update.updateId}`, chatId: 1 }],
        };
      },
    };
    const sender = new RecordingSender();
    const processor = new UpdateBatchProcessor(router, sender);

    const last = await processor.processBatch([otherUpdate(7), otherUpdate(8), otherUpdate(9)]);

    expect(last).toBe(9);
    expect(order).toEqual([7, 8, 9]);
    expect(sender.sent.map(r => r.kind === 'text' ? r.text : r.path)).toEqual(['reply 7', 'reply 8', 'reply 9']);
  });

  it('should advance past an update whose routing throws', async () => {
    const router = {
      async route(update: Update): Promise<RouteResult> {
        if (update.updateId === 2) throw new Error('boom');
        return { classification: { kind: 'unknown', type: 'poll' }, replies: [] };
      },
    };
    const processor = new UpdateBatchProcessor(router, new RecordingSender());

    expect(await processor.processBatch([otherUpdate(1), otherUpdate(2)])).toBe(2);
  });

  it('should advance past an update whose reply cannot be sent', async () => {
    const routed: number[] = [];
    const router = {
      async route(update: Update): Promise<RouteResult> {
        routed.push(update.updateId);
        return { classification: { kind: 'unknown', type: 'poll' }, replies: [{ kind: 'text', text: 'x', chatId: 1 }] };
      },
    };
    const sender: ReplySender = {
      async send() {
        throw new Error('Forbidden: bot was blocked by the user');
      },
    };
    const processor = new UpdateBatchProcessor(router, sender);

    expect(await processor.processBatch([otherUpdate(4), otherUpdate(5)])).toBe(5);
    expect(routed).toEqual([4, 5]);
  });

  it('should return undefined for an empty batch', async () => {
    const router = {
      async route(): Promise<RouteResult> {
        throw new Error('not called');
      },
    };
    expect(await new UpdateBatchProcessor(router, new RecordingSender()).processBatch([])).toBeUndefined();
  });
});
