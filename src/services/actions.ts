import type { Logger } from '../logger.js';
import type { OutboundAction, TrackedEntity } from '../types.js';
import type { Notifier } from './notifier.js';
import type { StateManager } from './state.js';

const COMPLETE_PREFIX = 'complete:';

export function completeAction(key: string): OutboundAction {
  return { label: `✅ Complete ${key}`, data: `${COMPLETE_PREFIX}${key}` };
}

export function parseCompleteAction(data: string): string | null {
  if (!data.startsWith(COMPLETE_PREFIX)) return null;
  const key = data.slice(COMPLETE_PREFIX.length).trim();
  return key || null;
}

/**
 * The "complete" buttons on a confirmation message. One message can carry
 * buttons for several entities, so retracting one rebuilds the keyboard from
 * the entities still open on it.
 */
export class CompletionActions {
  constructor(
    private state: StateManager,
    private notifier: Notifier,
    private log: Logger
  ) {}

  async retract(entity: TrackedEntity): Promise<void> {
    const { dmChatId, dmMessageId } = entity;
    if (dmChatId === null || dmMessageId === null) return;

    const remaining = this.state
      .entitiesByDmMessage(dmChatId, dmMessageId)
      .filter((e) => e.key !== entity.key && e.status === 'open');

    const updated = await this.notifier.setActions(
      dmChatId,
      dmMessageId,
      remaining.map((e) => completeAction(e.key))
    );
    if (updated) this.log.debug(`${entity.key} → complete action retracted`);

    this.state.updateEntity(entity.key, { dmChatId: null, dmMessageId: null });
  }
}
