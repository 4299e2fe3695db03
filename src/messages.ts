import { departmentLabel, issueUrl, partnerTag, type Routing } from './routing/table.js';
import type { TrackedEntity, TrackerIssue } from './types.js';

const COMMENT_PREVIEW_LENGTH = 300;

/** Telegram's limit on the text of one message. */
export const MESSAGE_LIMIT = 4096;

/** Shortens to at most `max` characters, counting by code point. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text.trim());
  return chars.length > max ? `${chars.slice(0, max - 1).join('').trimEnd()}…` : chars.join('');
}

/**
 * Splits text into parts no longer than `limit`, breaking between lines. A
 * single line over the limit is cut between code points.
 */
export function splitMessage(text: string, limit = MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const parts: string[] = [];
  let current = '';
  const flush = () => {
    if (current) parts.push(current);
    current = '';
  };

  for (const line of text.split('\n')) {
    const joined = current ? `${current}\n${line}` : line;
    if (joined.length <= limit) {
      current = joined;
      continue;
    }
    flush();
    if (line.length <= limit) {
      current = line;
      continue;
    }
    for (const char of line) {
      if (current.length + char.length > limit) flush();
      current += char;
    }
  }
  flush();
  return parts;
}

function departmentList(routing: Routing): string {
  const tagsByCode = new Map<string, string[]>();
  for (const [tag, code] of routing.hashtags) {
    const tags = tagsByCode.get(code) ?? [];
    tags.push(tag);
    tagsByCode.set(code, tags);
  }
  return [...routing.departments.values()]
    .filter((d) => tagsByCode.has(d.code))
    .map((d) => `${(tagsByCode.get(d.code) ?? []).join(', ')} — ${d.name}`)
    .join('\n');
}

function entityLine(routing: Routing, entity: TrackedEntity, index: number, dateLabel: string, date: string): string {
  return (
    `${index}. ${entity.key}\n` +
    `   📝 ${entity.summary}\n` +
    `   🏢 ${departmentLabel(routing, entity.departmentCode)} (${entity.queue})\n` +
    `   📅 ${dateLabel}${date.slice(0, 10)}\n` +
    `   🔗 ${issueUrl(routing, entity.key)}`
  );
}

// ── Intake ──────────────────────────────────────────────────

export function formatHint(routing: Routing): string {
  return (
    '❌ Could not read the task. Use:\n' +
    `${routing.taskMarker} Task title\n` +
    'Optional details on the next lines.\n\n' +
    'Department tasks:\n' +
    departmentList(routing)
  );
}

export function notPrivileged(routing: Routing): string {
  return (
    `❌ Only managers can create tasks with ${routing.taskMarker}.\n\n` +
    'For department tasks use:\n' +
    departmentList(routing)
  );
}

export interface CreatedItem {
  key: string;
  label: string;
  queue: string;
}

export interface FailedItem {
  label: string;
  error: string;
}

export function groupConfirmation(summary: string, labels: string[]): string {
  return `✅ Task created\n\n📝 ${summary}\n🏢 ${labels.join(', ')}`;
}

export function detailedConfirmation(
  routing: Routing,
  details: { summary: string; deadline: string | null; created: CreatedItem[]; failed: FailedItem[]; boardUrl?: string | null }
): string {
  const lines = [
    '✅ Task created',
    '',
    `📝 ${details.summary}`,
    `⚠️ Priority: ${routing.defaultPriority}`,
  ];
  if (details.deadline) lines.push(`📅 Deadline: ${details.deadline}`);
  lines.push('');

  details.created.forEach((item, i) => {
    lines.push(`${i + 1}. ${item.key} (${item.label}, ${item.queue})`);
    lines.push(`   🔗 ${issueUrl(routing, item.key)}`);
  });

  if (details.boardUrl) {
    lines.push('', `📊 Partner board: ${details.boardUrl}`);
  }

  if (details.failed.length > 0) {
    lines.push('', '⚠️ Not created:');
    for (const failure of details.failed) {
      lines.push(`• ${failure.label}: ${failure.error}`);
    }
  }

  lines.push('', 'Reply to this message to comment on the task. /mytasks lists your open tasks.');
  return lines.join('\n');
}

export function dmUnavailable(): string {
  return '⚠️ Could not message you privately. Send /start to the bot in a private chat.';
}

export function creationFailed(error: string): string {
  return `❌ Could not create the task in Tracker.\n${error || 'Unknown error'}`;
}

// ── Comments ────────────────────────────────────────────────

export function commentAdded(key: string, withPhoto: boolean): string {
  return withPhoto ? `💬 Comment with photo added to ${key}` : `💬 Comment added to ${key}`;
}

export function commentFailed(key: string, error: string): string {
  return `❌ Could not add the comment to ${key}: ${error || 'unknown error'}`;
}

export function commentEmpty(key: string): string {
  return `💬 Nothing to add to ${key}: the reply is empty.`;
}

// ── Reconciliation ──────────────────────────────────────────

export function closureNotice(routing: Routing, entity: TrackedEntity, statusLabel: string): string {
  return (
    `✅ Task closed in Tracker\n\n` +
    `📋 ${entity.key}: ${entity.summary}\n` +
    `📌 Status: ${statusLabel}\n` +
    `🔗 ${issueUrl(routing, entity.key)}`
  );
}

export function approvalNeeded(routing: Routing, entity: TrackedEntity, statusLabel: string): string {
  return (
    `🟡 Task awaits approval\n\n` +
    `📋 ${entity.key}: ${entity.summary}\n` +
    `🏢 ${departmentLabel(routing, entity.departmentCode)}\n` +
    `📌 Status: ${statusLabel}\n` +
    `🔗 ${issueUrl(routing, entity.key)}`
  );
}

export function assignedToYou(routing: Routing, entity: TrackedEntity): string {
  return (
    `📥 A task awaits you\n\n` +
    `📋 ${entity.key}: ${entity.summary}\n` +
    `🏢 ${departmentLabel(routing, entity.departmentCode)}\n` +
    (entity.deadline ? `📅 Deadline: ${entity.deadline}\n` : '') +
    `🔗 ${issueUrl(routing, entity.key)}`
  );
}

export function assigneeChanged(routing: Routing, entity: TrackedEntity, assignee: string): string {
  return (
    `👤 Assignee changed\n\n` +
    `📋 ${entity.key}: ${entity.summary}\n` +
    `➡️ Now: ${assignee}\n` +
    `🔗 ${issueUrl(routing, entity.key)}`
  );
}

export function newComment(routing: Routing, entity: TrackedEntity, author: string, text: string): string {
  return (
    `💬 New comment on ${entity.key}\n` +
    `📝 ${entity.summary}\n\n` +
    `${author}: ${truncate(text, COMMENT_PREVIEW_LENGTH)}\n\n` +
    `🔗 ${issueUrl(routing, entity.key)}`
  );
}

// ── Scheduled jobs ──────────────────────────────────────────

export function overdueReminder(routing: Routing, entity: TrackedEntity): string {
  return (
    `⏰ Task is overdue\n\n` +
    `📋 ${entity.key}: ${entity.summary}\n` +
    `📅 Deadline was ${entity.deadline ?? '?'}\n` +
    `🔗 ${issueUrl(routing, entity.key)}`
  );
}

export function assigneeDigest(routing: Routing, issues: TrackerIssue[]): string {
  const lines = [`☀️ Your open tasks (${issues.length}):`, ''];
  issues.forEach((issue, i) => {
    const status = issue.status?.display ?? issue.status?.key ?? '?';
    lines.push(`${i + 1}. ${issue.key}: ${issue.summary}`);
    lines.push(`   📌 ${status}${issue.deadline ? ` · 📅 ${issue.deadline}` : ''}`);
    lines.push(`   🔗 ${issueUrl(routing, issue.key)}`);
  });
  return lines.join('\n');
}

export function departmentDigest(routing: Routing, day: string, groups: Map<string | null, TrackedEntity[]>): string {
  const total = [...groups.values()].reduce((sum, list) => sum + list.length, 0);
  const lines = [`📊 Open tasks on ${day}: ${total}`, ''];
  const ordered = [...groups.entries()].sort((a, b) =>
    departmentLabel(routing, a[0]).localeCompare(departmentLabel(routing, b[0]))
  );
  for (const [code, entities] of ordered) {
    lines.push(`🏢 ${departmentLabel(routing, code)} (${entities.length})`);
    for (const entity of entities) {
      const overdue = entity.deadline && entity.deadline < day ? ' ⏰' : '';
      lines.push(`• ${entity.key}: ${truncate(entity.summary, 80)}${overdue}`);
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

export interface WeeklyRow {
  code: string | null;
  created: number;
  closed: number;
}

export function weeklyReport(routing: Routing, from: string, to: string, rows: WeeklyRow[]): string {
  const created = rows.reduce((sum, r) => sum + r.created, 0);
  const closed = rows.reduce((sum, r) => sum + r.closed, 0);
  const lines = [`📈 Weekly report ${from} – ${to}`, '', `Created: ${created} · Closed: ${closed}`, ''];
  for (const row of [...rows].sort((a, b) => b.created + b.closed - (a.created + a.closed))) {
    lines.push(`🏢 ${departmentLabel(routing, row.code)}: +${row.created} / ✅${row.closed}`);
  }
  return lines.join('\n').trimEnd();
}

// ── Commands ────────────────────────────────────────────────

export function start(routing: Routing, firstName: string, userId: number, isManager: boolean): string {
  let text =
    `👋 Hi, ${firstName}!\n\n` +
    'I turn chat messages into Yandex Tracker tasks.\n\n' +
    '📝 Departments:\n' +
    `${departmentList(routing)}\n\n` +
    '📋 Commands:\n' +
    '/mytasks — your open tasks\n' +
    '/history — tasks closed this week\n' +
    '/help — help\n';
  if (isManager) {
    text +=
      '\n👔 Manager:\n' +
      `${routing.taskMarker} ${routing.partners.tagPrefix}#ID text — partner task\n` +
      '/partners — partners with open tasks\n';
  }
  return `${text}\n🆔 Your ID: ${userId}`;
}

export function help(routing: Routing, isManager: boolean): string {
  let text =
    '🔧 Commands:\n\n' +
    '/start — getting started\n' +
    '/help — this help\n' +
    '/info — your user and chat ids\n' +
    '/mytasks — your open tasks\n' +
    '/history — tasks closed this week\n';
  if (isManager) {
    text += `/partners — partners with open tasks\n/partner ${routing.partners.tagPrefix}2 — tasks of one partner\n`;
  }
  text +=
    '\n📝 Departments:\n' +
    `${departmentList(routing)}\n\n` +
    '💡 How it works:\n' +
    '• #department + text → a task in Tracker\n' +
    '• Confirmation and a complete button arrive privately\n' +
    '• Reply to a bot message to comment on its task\n' +
    '• Closed tasks drop out of /mytasks\n';
  if (isManager) {
    text += `\n🤝 Partner tasks:\n${routing.taskMarker} ${routing.partners.tagPrefix}#ID task text\n`;
  }
  return text;
}

export function info(userId: number, chatId: number, chatType: string): string {
  return `🆔 User ID: ${userId}\n💬 Chat ID: ${chatId}\n📱 Chat type: ${chatType}`;
}

export function myTasks(routing: Routing, open: TrackedEntity[], justClosed: number): string {
  const closedNote = justClosed > 0 ? `✅ Just closed in Tracker: ${justClosed}\n\n` : '';
  if (open.length === 0) {
    const example = routing.hashtags.keys().next().value;
    return `📭 You have no open tasks.\n\n${closedNote}💡 Create one, for example:\n${example ?? routing.taskMarker} Hire a designer`;
  }
  const items = open.map((e, i) => entityLine(routing, e, i + 1, '', e.createdAt));
  return `${closedNote}📋 Your open tasks (${open.length}):\n\n${items.join('\n\n')}`;
}

export function history(routing: Routing, closed: TrackedEntity[]): string {
  if (closed.length === 0) return '📭 No tasks closed in the last week.';
  const items = closed.map((e, i) => entityLine(routing, e, i + 1, 'Closed: ', e.updatedAt));
  return `📜 Closed this week (${closed.length}):\n\n${items.join('\n\n')}`;
}

export function managersOnly(): string {
  return '❌ This command is for managers only.';
}

export function partnersOverview(routing: Routing, groups: Map<string, TrackedEntity[]>): string {
  if (groups.size === 0) {
    return `📭 No open partner tasks.\n\n💡 Create one: ${routing.taskMarker} ${routing.partners.tagPrefix}#2 text`;
  }
  const tags = [...groups.keys()].sort((a, b) => a.localeCompare(b, 'en', { numeric: true }));
  const total = [...groups.values()].reduce((sum, list) => sum + list.length, 0);
  const lines = ['📊 Partners with open tasks:', ''];
  for (const tag of tags) {
    lines.push(`🔹 ${tag}: ${groups.get(tag)?.length ?? 0}`);
  }
  lines.push('', `Partners: ${groups.size}`, `Tasks: ${total}`, '', `Use /partner ${tags[0]} for details`);
  return lines.join('\n');
}

export function partnerUsage(routing: Routing): string {
  return `❌ Give a partner id.\nExample: /partner ${routing.partners.tagPrefix}2 or /partner 2`;
}

export function partnerTasks(routing: Routing, partnerId: string, entities: TrackedEntity[]): string {
  const tag = partnerTag(routing, partnerId);
  if (entities.length === 0) {
    return `📭 ${tag} has no open tasks.\n\n💡 Create one: ${routing.taskMarker} ${routing.partners.tagPrefix}#${partnerId} text`;
  }
  const items = entities.map(
    (e, i) => `${i + 1}. ${e.key}\n   📝 ${e.summary}\n   🔗 ${issueUrl(routing, e.key)}`
  );
  return `📋 Tasks of ${tag} (${entities.length}):\n\n${items.join('\n\n')}`;
}

// ── Completion ──────────────────────────────────────────────

export function completeNotFound(key: string): string {
  return `❌ Task ${key} is not tracked by this bot.`;
}

export function completeForbidden(key: string): string {
  return `❌ Only the author of ${key} or a manager can complete it.`;
}

export function completeAlreadyClosed(key: string): string {
  return `ℹ️ ${key} is already closed.`;
}

export function completedSuffix(key: string): string {
  return `\n\n✅ ${key} completed`;
}

export function completedInChat(entity: TrackedEntity): string {
  return `✅ Task done!\n\n📝 ${entity.summary}`;
}

export function completeNoTransition(routing: Routing, key: string): string {
  return `❌ ${key} cannot be closed from here: its workflow has no closing step available. Close it manually in Tracker:\n${issueUrl(routing, key)}`;
}

export function completeTransport(routing: Routing, key: string, error: string): string {
  return `❌ Could not complete ${key}: ${error || 'Tracker did not respond'}.\nTry again later or close it manually in Tracker:\n${issueUrl(routing, key)}`;
}
