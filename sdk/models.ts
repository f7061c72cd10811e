import { DateTime } from "luxon";
import { z } from "zod";
import { TogglDecodeError } from "./errors";
import { formatTimestamp, parseOptionalTimestamp } from "./timestamps";

/**
 * A workspace the user belongs to.
 */
export type Workspace = {
  id: number;
  /** Rounding step, in minutes, applied in reports */
  rounding_minutes: number;
  /** Rounding direction: -1 down, 0 nearest, 1 up */
  rounding: number;
  name: string;
  premium: boolean;
};

export type Client = {
  /** Workspace ID */
  wid: number;
  id: number;
  name: string;
  archived: boolean;
  notes: string;
};

/**
 * A project. Use `isProjectActive()` rather than `active` alone: a project deleted on the
 * server keeps `active: true` but carries `server_deleted_at`.
 */
export type Project = {
  workspace_id: number;
  id: number;
  client_id: number | null;
  name: string;
  active: boolean;
  /** Only meaningful on paid plans */
  billable: boolean | null;
  server_deleted_at: DateTime | null;
};

export type Task = {
  wid: number;
  /** Project ID */
  pid: number;
  id: number;
  name: string;
};

export type Tag = {
  workspace_id: number;
  id: number;
  name: string;
};

/**
 * A single time entry.
 *
 * An entry is running when `duration` is negative. A missing `stop` alone does not mean the
 * entry is running.
 */
export type TimeEntry = {
  workspace_id: number;
  id: number;
  project_id: number | null;
  task_id: number | null;
  description: string;
  start: DateTime | null;
  stop: DateTime | null;
  /** Tag names, in the order the API returned them */
  tags: string[];
  /** Seconds. Negative while running. */
  duration: number;
  duronly: boolean;
  billable: boolean;
};

/**
 * The authenticated user, with related workspaces, clients, projects, tasks, tags and entries
 * when fetched with `with_related_data=true`.
 */
export type Account = {
  api_token: string;
  timezone: string;
  id: number;
  workspaces: Workspace[];
  clients: Client[];
  projects: Project[];
  tasks: Task[];
  tags: Tag[];
  time_entries: TimeEntry[];
  /** 0 = Sunday .. 6 = Saturday */
  beginning_of_week: number;
};

/**
 * One row of a detailed report. `dur` is in milliseconds.
 */
export type DetailedTimeEntry = {
  id: number;
  pid: number;
  tid: number;
  uid: number;
  user: string;
  description: string;
  project: string;
  project_color: string;
  project_hex_color: string;
  client: string;
  start: DateTime | null;
  end: DateTime | null;
  updated: DateTime | null;
  dur: number;
  billable: boolean;
  tags: string[];
};

export type SummaryReportItem = {
  title: Record<string, string>;
  time: number;
};

export type SummaryReportGroup = {
  id: number;
  time: number;
  title: {
    project: string;
    client: string;
    color: string;
    hex_color: string;
  };
  items: SummaryReportItem[];
};

export type SummaryReport = {
  total_grand: number;
  data: SummaryReportGroup[];
};

export type DetailedReport = {
  total_grand: number;
  total_count: number;
  per_page: number;
  data: DetailedTimeEntry[];
};

// ============================================================================
// Schemas
// ============================================================================

type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// Absent scalars take their zero value; absent references stay null.
const zeroNumber = z.number().nullish().transform((v) => v ?? 0);
const zeroString = z.string().nullish().transform((v) => v ?? "");
const zeroBoolean = z.boolean().nullish().transform((v) => v ?? false);
const optionalNumber = z.number().nullish().transform((v) => v ?? null);
const optionalBoolean = z.boolean().nullish().transform((v) => v ?? null);

const listOf = <T>(schema: Decoder<T>): Decoder<T[]> =>
  z
    .array(schema)
    .nullish()
    .transform((v) => v ?? []);

const isoDateTime: Decoder<DateTime | null> = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (!value) return null;
    const parsed = DateTime.fromISO(value, { setZone: true });
    if (!parsed.isValid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Cannot parse timestamp "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

export const workspaceSchema: Decoder<Workspace> = z.object({
  id: zeroNumber,
  rounding_minutes: zeroNumber,
  rounding: zeroNumber,
  name: zeroString,
  premium: zeroBoolean,
});

export const clientSchema: Decoder<Client> = z.object({
  wid: zeroNumber,
  id: zeroNumber,
  name: zeroString,
  archived: zeroBoolean,
  notes: zeroString,
});

export const projectSchema: Decoder<Project> = z.object({
  workspace_id: zeroNumber,
  id: zeroNumber,
  client_id: optionalNumber,
  name: zeroString,
  active: zeroBoolean,
  billable: optionalBoolean,
  server_deleted_at: isoDateTime,
});

export const taskSchema: Decoder<Task> = z.object({
  wid: zeroNumber,
  pid: zeroNumber,
  id: zeroNumber,
  name: zeroString,
});

export const tagSchema: Decoder<Tag> = z.object({
  workspace_id: zeroNumber,
  id: zeroNumber,
  name: zeroString,
});

/**
 * First phase of time-entry decoding: every field but the timestamps, which stay raw strings.
 */
const rawTimeEntrySchema = z.object({
  workspace_id: zeroNumber,
  id: zeroNumber,
  project_id: optionalNumber,
  task_id: optionalNumber,
  description: zeroString,
  start: z.string().nullish(),
  stop: z.string().nullish(),
  tags: listOf(z.string()),
  duration: zeroNumber,
  duronly: zeroBoolean,
  billable: zeroBoolean,
});

type RawTimeEntry = z.output<typeof rawTimeEntrySchema>;

const decodeTimestampField = (
  raw: RawTimeEntry,
  field: "start" | "stop",
  ctx: z.RefinementCtx
): DateTime | null => {
  try {
    return parseOptionalTimestamp(raw[field]);
  } catch (err) {
    if (!(err instanceof TogglDecodeError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message, path: [field] });
    return null;
  }
};

export const timeEntrySchema: Decoder<TimeEntry> = rawTimeEntrySchema.transform((raw, ctx) => {
  const start = decodeTimestampField(raw, "start", ctx);
  const stop = decodeTimestampField(raw, "stop", ctx);
  return { ...raw, start, stop };
});

export const accountSchema: Decoder<Account> = z.object({
  api_token: zeroString,
  timezone: zeroString,
  id: zeroNumber,
  workspaces: listOf(workspaceSchema),
  clients: listOf(clientSchema),
  projects: listOf(projectSchema),
  tasks: listOf(taskSchema),
  tags: listOf(tagSchema),
  time_entries: listOf(timeEntrySchema),
  beginning_of_week: zeroNumber,
});

const detailedTimeEntrySchema: Decoder<DetailedTimeEntry> = z.object({
  id: zeroNumber,
  pid: zeroNumber,
  tid: zeroNumber,
  uid: zeroNumber,
  user: zeroString,
  description: zeroString,
  project: zeroString,
  project_color: zeroString,
  project_hex_color: zeroString,
  client: zeroString,
  start: isoDateTime,
  end: isoDateTime,
  updated: isoDateTime,
  dur: zeroNumber,
  billable: zeroBoolean,
  tags: listOf(z.string()),
});

const summaryReportItemSchema: Decoder<SummaryReportItem> = z.object({
  title: z
    .record(zeroString)
    .nullish()
    .transform((v) => v ?? {}),
  time: zeroNumber,
});

const summaryReportGroupSchema: Decoder<SummaryReportGroup> = z.object({
  id: zeroNumber,
  time: zeroNumber,
  title: z
    .object({
      project: zeroString,
      client: zeroString,
      color: zeroString,
      hex_color: zeroString,
    })
    .nullish()
    .transform((v) => v ?? { project: "", client: "", color: "", hex_color: "" }),
  items: listOf(summaryReportItemSchema),
});

export const summaryReportSchema: Decoder<SummaryReport> = z.object({
  total_grand: zeroNumber,
  data: listOf(summaryReportGroupSchema),
});

export const detailedReportSchema: Decoder<DetailedReport> = z.object({
  total_grand: zeroNumber,
  total_count: zeroNumber,
  per_page: zeroNumber,
  data: listOf(detailedTimeEntrySchema),
});

export const timeEntryListSchema = listOf(timeEntrySchema);
export const projectListSchema = listOf(projectSchema);
export const clientListSchema = listOf(clientSchema);
export const tagListSchema = listOf(tagSchema);

// ============================================================================
// Decoding
// ============================================================================

const SNIPPET_LENGTH = 200;

const snippet = (data: unknown): string => {
  const text = typeof data === "string" ? data : JSON.stringify(data) ?? String(data);
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}...` : text;
};

/**
 * Parses a response body. An empty body is treated as `null`.
 */
export function parseJson(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TogglDecodeError("Response body is not valid JSON", snippet(text), { cause: err });
  }
}

/**
 * Validates `data` against `schema` and returns the strict record.
 *
 * @param what - Name of the expected shape, used in the error message
 * @throws {TogglDecodeError} carrying a snippet of the payload and the zod issues
 */
export function decode<T>(schema: Decoder<T>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (result.success) return result.data;
  const summary = result.error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
  throw new TogglDecodeError(`Invalid ${what} payload: ${summary}`, snippet(data), {
    cause: result.error,
    issues: result.error.issues,
  });
}

export const decodeAccount = (data: unknown): Account => decode(accountSchema, data, "account");
export const decodeTimeEntry = (data: unknown): TimeEntry => decode(timeEntrySchema, data, "time entry");
export const decodeProject = (data: unknown): Project => decode(projectSchema, data, "project");
export const decodeSummaryReport = (data: unknown): SummaryReport =>
  decode(summaryReportSchema, data, "summary report");
export const decodeDetailedReport = (data: unknown): DetailedReport =>
  decode(detailedReportSchema, data, "detailed report");

// ============================================================================
// Encoding
// ============================================================================

/**
 * Wire form of a time entry for PUT requests. Null references and timestamps are omitted.
 */
export type TimeEntryPayload = {
  workspace_id: number;
  id?: number;
  project_id?: number;
  task_id?: number;
  description: string;
  start?: string;
  stop?: string | null;
  tags: string[];
  duration: number;
  duronly: boolean;
  billable: boolean;
};

export function encodeTimeEntry(entry: TimeEntry): TimeEntryPayload {
  const payload: TimeEntryPayload = {
    workspace_id: entry.workspace_id,
    description: entry.description,
    tags: [...entry.tags],
    duration: entry.duration,
    duronly: entry.duronly,
    billable: entry.billable,
  };
  if (entry.id) payload.id = entry.id;
  if (entry.project_id !== null) payload.project_id = entry.project_id;
  if (entry.task_id !== null) payload.task_id = entry.task_id;
  if (entry.start) payload.start = formatTimestamp(entry.start);
  if (entry.stop) payload.stop = formatTimestamp(entry.stop);
  return payload;
}

export type ProjectPayload = {
  workspace_id: number;
  id: number;
  client_id?: number;
  name: string;
  active: boolean;
  billable?: boolean;
};

export function encodeProject(project: Project): ProjectPayload {
  const payload: ProjectPayload = {
    workspace_id: project.workspace_id,
    id: project.id,
    name: project.name,
    active: project.active,
  };
  if (project.client_id !== null) payload.client_id = project.client_id;
  if (project.billable !== null) payload.billable = project.billable;
  return payload;
}

/**
 * A project exists and is active: `active` is set and the server has not deleted it.
 */
export const isProjectActive = (project: Project): boolean =>
  project.active && project.server_deleted_at === null;
