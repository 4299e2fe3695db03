import type { StatusAliases } from './table.js';

export type StatusCategory = 'completed' | 'approval' | 'in-progress' | 'other';

/**
 * Single source of truth for what a tracker status means to us. Closure
 * detection, approval detection and transition resolution all go through here,
 * so the alias sets cannot drift apart.
 *
 * Matching is case-insensitive against both the machine key and the display
 * label; the tracker is inconsistent about which one is filled in.
 */
export class StatusClassifier {
  private completed: Set<string>;
  private approval: Set<string>;
  private inProgress: Set<string>;

  constructor(aliases: StatusAliases) {
    const fold = (list: readonly string[]) => new Set(list.map((s) => s.trim().toLowerCase()));
    this.completed = fold(aliases.completed);
    this.approval = fold(aliases.approval);
    this.inProgress = fold(aliases.inProgress);
  }

  classify(status: { key?: string | null; display?: string | null } | null | undefined): StatusCategory {
    if (!status) return 'other';
    const labels = [status.key, status.display]
      .filter((s): s is string => typeof s === 'string' && s.length > 0)
      .map((s) => s.trim().toLowerCase());

    if (labels.some((l) => this.completed.has(l))) return 'completed';
    if (labels.some((l) => this.approval.has(l))) return 'approval';
    if (labels.some((l) => this.inProgress.has(l))) return 'in-progress';
    return 'other';
  }

  isCompleted(status: { key?: string | null; display?: string | null } | null | undefined): boolean {
    return this.classify(status) === 'completed';
  }

  isApproval(status: { key?: string | null; display?: string | null } | null | undefined): boolean {
    return this.classify(status) === 'approval';
  }
}
