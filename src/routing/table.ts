import { readFileSync } from 'fs';
import { z } from 'zod';

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

const departmentSchema = z.object({
  name: z.string().min(1),
  queue: z.string().min(1),
  assignee: z.string().nullable().default(null),
  followers: z.array(z.string()).default([]),
});

export const routingSchema = z.object({
  timezone: z.string().default('Europe/Moscow'),
  taskMarker: z.string().min(1),
  originTag: z.string().default('telegram'),
  trackerWebUrl: z.string().url().default('https://tracker.yandex.ru'),
  defaults: z.object({
    queue: z.string().min(1),
    priority: z.string().default('normal'),
    deadlineDays: z.number().int().min(0).nullable().default(0),
  }),
  departments: z.record(departmentSchema),
  hashtags: z.record(z.string()),
  partners: z.object({
    queue: z.string().min(1),
    tagPrefix: z.string().min(1),
    idPattern: z.string().min(1),
    assignees: z.record(z.string()).default({}),
    defaultAssignee: z.string().nullable().default(null),
    autoCreateBoards: z.boolean().default(false),
  }),
  managers: z.array(z.number().int()).default([]),
  loginToHandle: z.record(z.string()).default({}),
  recipients: z
    .object({
      allTasks: z.array(z.string()).default([]),
      approval: z.array(z.string()).default([]),
      departmentDigest: z.array(z.string()).default([]),
      weeklyReport: z.array(z.string()).default([]),
    })
    .default({}),
  statuses: z.object({
    completed: z.array(z.string()).min(1),
    inProgress: z.array(z.string()).default([]),
    approval: z.array(z.string()).default([]),
  }),
  schedule: z
    .object({
      reconcileIntervalSeconds: z.number().int().positive().default(300),
      assigneeDigest: clockTime.nullable().default(null),
      overdueSweep: z.array(clockTime).default([]),
      departmentDigest: clockTime.nullable().default(null),
      weeklyReport: z
        .object({ weekday: z.number().int().min(1).max(7), time: clockTime })
        .nullable()
        .default(null),
    })
    .default({}),
});

export type RoutingInput = z.input<typeof routingSchema>;

export interface Department {
  code: string;
  name: string;
  queue: string;
  assignee: string | null;
  followers: readonly string[];
}

export interface StatusAliases {
  completed: readonly string[];
  inProgress: readonly string[];
  approval: readonly string[];
}

export interface Schedule {
  reconcileIntervalSeconds: number;
  assigneeDigest: string | null;
  overdueSweep: readonly string[];
  departmentDigest: string | null;
  /** ISO weekday, 1 = Monday. */
  weeklyReport: { weekday: number; time: string } | null;
}

export interface Routing {
  timezone: string;
  taskMarker: string;
  originTag: string;
  trackerWebUrl: string;
  defaultQueue: string;
  defaultPriority: string;
  deadlineDays: number | null;
  departments: ReadonlyMap<string, Department>;
  /** Lower-cased hashtag → department code. */
  hashtags: ReadonlyMap<string, string>;
  partners: {
    queue: string;
    tagPrefix: string;
    idPattern: RegExp;
    assignees: ReadonlyMap<string, string>;
    defaultAssignee: string | null;
    autoCreateBoards: boolean;
  };
  managers: ReadonlySet<number>;
  /** Tracker login → Telegram handle, both lower-cased. */
  loginToHandle: ReadonlyMap<string, string>;
  recipients: {
    allTasks: readonly string[];
    approval: readonly string[];
    departmentDigest: readonly string[];
    weeklyReport: readonly string[];
  };
  statuses: StatusAliases;
  schedule: Schedule;
}

const normalizeHandle = (handle: string) => handle.replace(/^@/, '').toLowerCase();

export function buildRouting(input: RoutingInput): Routing {
  const raw = routingSchema.parse(input);

  const departments = new Map<string, Department>();
  for (const [code, dept] of Object.entries(raw.departments)) {
    departments.set(code, { code, ...dept });
  }

  const hashtags = new Map<string, string>();
  for (const [tag, code] of Object.entries(raw.hashtags)) {
    if (!departments.has(code)) {
      throw new Error(`Hashtag ${tag} points at unknown department "${code}"`);
    }
    hashtags.set(tag.toLowerCase(), code);
  }

  let idPattern: RegExp;
  try {
    idPattern = new RegExp(raw.partners.idPattern, 'i');
  } catch (error) {
    throw new Error(`Invalid partners.idPattern: ${error instanceof Error ? error.message : String(error)}`);
  }

  const loginToHandle = new Map<string, string>();
  for (const [login, handle] of Object.entries(raw.loginToHandle)) {
    loginToHandle.set(login.toLowerCase(), normalizeHandle(handle));
  }

  const routing: Routing = {
    timezone: raw.timezone,
    taskMarker: raw.taskMarker,
    originTag: raw.originTag,
    trackerWebUrl: raw.trackerWebUrl.replace(/\/$/, ''),
    defaultQueue: raw.defaults.queue,
    defaultPriority: raw.defaults.priority,
    deadlineDays: raw.defaults.deadlineDays,
    departments,
    hashtags,
    partners: {
      queue: raw.partners.queue,
      tagPrefix: raw.partners.tagPrefix,
      idPattern,
      assignees: new Map(Object.entries(raw.partners.assignees)),
      defaultAssignee: raw.partners.defaultAssignee,
      autoCreateBoards: raw.partners.autoCreateBoards,
    },
    managers: new Set(raw.managers),
    loginToHandle,
    recipients: {
      allTasks: raw.recipients.allTasks.map(normalizeHandle),
      approval: raw.recipients.approval.map(normalizeHandle),
      departmentDigest: raw.recipients.departmentDigest.map(normalizeHandle),
      weeklyReport: raw.recipients.weeklyReport.map(normalizeHandle),
    },
    statuses: raw.statuses,
    schedule: raw.schedule,
  };

  return Object.freeze(routing);
}

export function loadRouting(path: string): Routing {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read routing config at ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const result = routingSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid routing config at ${path}: ${issues}`);
  }
  return buildRouting(result.data);
}

// ── Lookups ─────────────────────────────────────────────────
// Unknown keys are "not configured" (null), never a throw.

export function findDepartment(routing: Routing, code: string | null): Department | null {
  if (!code) return null;
  return routing.departments.get(code) ?? null;
}

export function partnerTag(routing: Routing, partnerId: string): string {
  return `${routing.partners.tagPrefix}${partnerId}`;
}

export function partnerAssignee(routing: Routing, partnerId: string): string | null {
  return routing.partners.assignees.get(partnerId) ?? routing.partners.defaultAssignee;
}

export function isPartnerEntity(routing: Routing, entity: { queue: string; departmentCode: string | null }): boolean {
  return (
    entity.queue === routing.partners.queue &&
    !!entity.departmentCode &&
    entity.departmentCode.startsWith(routing.partners.tagPrefix)
  );
}

/** Human label for a department code, partner tag or the default queue. */
export function departmentLabel(routing: Routing, code: string | null): string {
  if (!code) return 'General';
  return routing.departments.get(code)?.name ?? code;
}

export function issueUrl(routing: Routing, key: string): string {
  return `${routing.trackerWebUrl}/${key}`;
}
