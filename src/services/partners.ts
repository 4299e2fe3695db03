import type { Logger } from '../logger.js';
import { partnerTag, type Routing } from '../routing/table.js';
import type { TrackerBoard } from '../types.js';
import type { TrackerGateway } from './tracker.js';

/**
 * One tracker board per partner, filtered on the partner tag. Each board is
 * requested at most once per process; concurrent callers share the pending
 * request, and a failed creation is remembered as null.
 */
export class PartnerBoards {
  private boards = new Map<string, Promise<TrackerBoard | null>>();

  constructor(
    private routing: Routing,
    private tracker: TrackerGateway,
    private log: Logger
  ) {}

  getOrCreate(partnerId: string): Promise<TrackerBoard | null> {
    if (!this.routing.partners.autoCreateBoards) return Promise.resolve(null);

    const tag = partnerTag(this.routing, partnerId);
    const cached = this.boards.get(tag);
    if (cached) return cached;

    const pending = this.tracker.createBoard(tag, this.routing.partners.queue, tag).then((result) => {
      if (!result.ok) {
        this.log.warn(`Board ${tag} could not be created: ${result.error}`);
        return null;
      }
      this.log.success(`Board ${tag} created (id ${result.value.id})`);
      return result.value;
    });
    this.boards.set(tag, pending);
    return pending;
  }

  boardUrl(board: TrackerBoard): string {
    return `${this.routing.trackerWebUrl}/boards/${board.id}`;
  }
}
