/**
 * # Toggl Track Session
 *
 * A client for the Toggl Track v9 API and the v2 reporting API.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { TogglSession } from "./session";
 *
 * const session = TogglSession.open("your_api_token");
 * const account = await session.getAccount();
 *
 * const entry = await session.startTimeEntry("Writing docs", account.workspaces[0].id);
 * // ... do work ...
 * await session.stopTimeEntry(entry);
 * ```
 *
 * ## Authentication
 *
 * Every request uses HTTP Basic auth:
 * - `TogglSession.open(token)` sends the API token as the username and "api_token" as the password
 * - `TogglSession.login(username, password)` exchanges a username/password pair for the API token
 *   once; the password is not kept
 *
 * ## Errors
 *
 * Methods reject with a `TogglError` subclass: `TogglTransportError`, `TogglHttpError`,
 * `TogglDecodeError` or, from `unstopTimeEntry()`, `TogglPartialFailureError`.
 * Nothing is retried.
 *
 * @module session
 */

import { DateTime } from "luxon";
import { TogglPartialFailureError } from "./errors";
import { createLogger, type Logger } from "./logger";
import {
  clientListSchema,
  clientSchema,
  decode,
  decodeAccount,
  decodeDetailedReport,
  decodeProject,
  decodeSummaryReport,
  decodeTimeEntry,
  encodeProject,
  encodeTimeEntry,
  parseJson,
  projectListSchema,
  tagListSchema,
  tagSchema,
  timeEntryListSchema,
  type Account,
  type Client,
  type DetailedReport,
  type Project,
  type SummaryReport,
  type Tag,
  type TimeEntry,
} from "./models";
import { resourceUrl, resourceUrlWithId, userResourceUrl } from "./resources";
import type { TogglSecrets } from "./secrets";
import { formatTimestamp } from "./timestamps";
import { TogglTransport, type Credentials, type HttpMethod } from "./transport";

export const TOGGL_API_URL = "https://api.track.toggl.com/api/v9";
export const TOGGL_REPORTS_URL = "https://api.track.toggl.com/reports/api/v2";
export const DEFAULT_APP_NAME = "toggl-track-client";

/**
 * Configuration options for a TogglSession.
 */
export type TogglSessionConfig = {
  /** @default "https://api.track.toggl.com/api/v9" */
  apiUrl?: string;
  /** @default "https://api.track.toggl.com/reports/api/v2" */
  reportsUrl?: string;
  /**
   * Sent as `created_with` on every entry this session creates.
   * @default "toggl-track-client"
   */
  createdWith?: string;
  /**
   * Sent as `user_agent` on report requests.
   * @default "toggl-track-client"
   */
  userAgent?: string;
  /**
   * Custom fetch implementation (useful for testing or non-browser environments).
   * @default globalThis.fetch
   */
  fetchImpl?: typeof fetch;
  /** Diagnostic logger. When omitted, one is created from `debug`. */
  logger?: Logger;
  /** Enables the default logger. Ignored when `logger` is given. */
  debug?: boolean;
  /** Current time, used for new entries and same-day checks. */
  clock?: () => DateTime;
};

/**
 * Options for `startTimeEntry()`. The billable flag only matters on paid plans.
 */
export type StartTimeEntryOptions = {
  projectId?: number;
  taskId?: number;
  tags?: string[];
  billable?: boolean;
};

/**
 * Body of a POST that creates a time entry.
 */
export type TimeEntryCreatePayload = {
  billable: boolean;
  description: string;
  /** -1 marks the entry as running */
  duration: number;
  project_id?: number;
  task_id?: number;
  start?: string;
  stop?: string;
  tags: string[];
  workspace_id: number;
  created_with: string;
};

type ResolvedConfig = {
  apiUrl: string;
  reportsUrl: string;
  createdWith: string;
  userAgent: string;
  logger: Logger;
  clock: () => DateTime;
};

const resolveConfig = (config: TogglSessionConfig): ResolvedConfig => ({
  apiUrl: config.apiUrl ?? TOGGL_API_URL,
  reportsUrl: config.reportsUrl ?? TOGGL_REPORTS_URL,
  createdWith: config.createdWith ?? DEFAULT_APP_NAME,
  userAgent: config.userAgent ?? DEFAULT_APP_NAME,
  logger: config.logger ?? createLogger({ enabled: config.debug ?? false }),
  clock: config.clock ?? (() => DateTime.now()),
});

/**
 * An authenticated connection to Toggl Track. Holds the API token and nothing else that changes;
 * concurrent calls on one session are fine.
 */
export class TogglSession {
  readonly apiToken: string;
  private config: ResolvedConfig;
  private transport: TogglTransport;

  private constructor(apiToken: string, config: ResolvedConfig, transport: TogglTransport) {
    this.apiToken = apiToken;
    this.config = config;
    this.transport = transport;
  }

  /**
   * Opens a session with an existing API token. The token is not checked until the first call.
   */
  static open(apiToken: string, config: TogglSessionConfig = {}): TogglSession {
    const resolved = resolveConfig(config);
    const transport = new TogglTransport({ logger: resolved.logger, fetchImpl: config.fetchImpl });
    return new TogglSession(apiToken, resolved, transport);
  }

  /**
   * Exchanges a username and password for the account's API token and opens a session with it.
   * The password is used for this one request only.
   */
  static async login(username: string, password: string, config: TogglSessionConfig = {}): Promise<TogglSession> {
    const resolved = resolveConfig(config);
    const transport = new TogglTransport({ logger: resolved.logger, fetchImpl: config.fetchImpl });
    const text = await transport.request("GET", resolved.apiUrl, "/me", {
      credentials: { kind: "password", username, password },
    });
    const account = decodeAccount(parseJson(text));
    return new TogglSession(account.api_token, resolved, transport);
  }

  /**
   * Opens a session from environment secrets, logging in when only a username and password are set.
   * Values in `config` take precedence over the environment.
   */
  static fromSecrets(secrets: TogglSecrets, config: TogglSessionConfig = {}): Promise<TogglSession> {
    const merged: TogglSessionConfig = {
      apiUrl: secrets.apiUrl,
      reportsUrl: secrets.reportsUrl,
      createdWith: secrets.createdWith,
      debug: secrets.debug,
      ...config,
    };
    const { credentials } = secrets;
    if ("apiToken" in credentials) return Promise.resolve(TogglSession.open(credentials.apiToken, merged));
    return TogglSession.login(credentials.username, credentials.password, merged);
  }

  private get credentials(): Credentials {
    return { kind: "apiToken", apiToken: this.apiToken };
  }

  private async call(
    method: HttpMethod,
    path: string,
    options?: { query?: Record<string, unknown>; body?: unknown; baseUrl?: string }
  ): Promise<unknown> {
    const text = await this.transport.request(method, options?.baseUrl ?? this.config.apiUrl, path, {
      credentials: this.credentials,
      query: options?.query,
      body: options?.body,
    });
    return parseJson(text);
  }

  private async timeEntryCall(method: HttpMethod, path: string, body?: unknown): Promise<TimeEntry> {
    const data = await this.call(method, path, { body });
    const entry = decodeTimeEntry(data);
    this.config.logger.debug({ entry }, "decoded time entry");
    return entry;
  }

  // ============================================================================
  // ACCOUNT
  // ============================================================================

  /**
   * Returns the user's account with related workspaces, clients, projects, tasks, tags and
   * time entries.
   */
  async getAccount(): Promise<Account> {
    const data = await this.call("GET", "/me", { query: { with_related_data: "true" } });
    return decodeAccount(data);
  }

  // ============================================================================
  // TIME ENTRIES
  // ============================================================================

  private newStartPayload(description: string, workspaceId: number): TimeEntryCreatePayload {
    return {
      billable: false,
      description,
      duration: -1,
      start: formatTimestamp(this.config.clock()),
      tags: [],
      workspace_id: workspaceId,
      created_with: this.config.createdWith,
    };
  }

  private withMetadataFrom(payload: TimeEntryCreatePayload, entry: TimeEntry): TimeEntryCreatePayload {
    const next: TimeEntryCreatePayload = { ...payload, tags: [...entry.tags], billable: entry.billable };
    if (entry.project_id !== null) next.project_id = entry.project_id;
    if (entry.task_id !== null) next.task_id = entry.task_id;
    return next;
  }

  private createTimeEntry(payload: TimeEntryCreatePayload): Promise<TimeEntry> {
    return this.timeEntryCall("POST", resourceUrl("timeEntries", payload.workspace_id), payload);
  }

  /**
   * Starts a running time entry in workspace `wid`.
   *
   * @example
   * ```typescript
   * const entry = await session.startTimeEntry("Code review", 7, { projectId: 12, tags: ["review"] });
   * ```
   */
  startTimeEntry(description: string, wid: number, options: StartTimeEntryOptions = {}): Promise<TimeEntry> {
    const payload = this.newStartPayload(description, wid);
    if (options.projectId !== undefined) payload.project_id = options.projectId;
    if (options.taskId !== undefined) payload.task_id = options.taskId;
    if (options.tags) payload.tags = [...options.tags];
    if (options.billable !== undefined) payload.billable = options.billable;
    return this.createTimeEntry(payload);
  }

  startTimeEntryForProject(
    description: string,
    wid: number,
    projectId: number,
    billable?: boolean
  ): Promise<TimeEntry> {
    return this.startTimeEntry(description, wid, { projectId, billable });
  }

  /**
   * Returns the running entry, or `null` when nothing is running.
   */
  async getCurrentTimeEntry(): Promise<TimeEntry | null> {
    const data = await this.call("GET", `${userResourceUrl("timeEntries")}/current`);
    if (data === null) return null;
    return decodeTimeEntry(data);
  }

  /**
   * Lists the user's entries that started between `startDate` and `endDate`.
   */
  async getTimeEntries(startDate: DateTime, endDate: DateTime): Promise<TimeEntry[]> {
    const data = await this.call("GET", userResourceUrl("timeEntries"), {
      query: { start_date: formatTimestamp(startDate), end_date: formatTimestamp(endDate) },
    });
    return decode(timeEntryListSchema, data, "time entry list");
  }

  updateTimeEntry(entry: TimeEntry): Promise<TimeEntry> {
    this.config.logger.debug({ id: entry.id }, "updating time entry");
    return this.timeEntryCall(
      "PUT",
      resourceUrlWithId("timeEntries", entry.workspace_id, entry.id),
      encodeTimeEntry(entry)
    );
  }

  /**
   * Continues an entry.
   *
   * With `duronly` set and an entry that started today (local time), the same entry is re-opened
   * and keeps its id. Otherwise a new running entry is started with the same description,
   * project, task, tags and billable flag.
   */
  continueTimeEntry(entry: TimeEntry, duronly: boolean): Promise<TimeEntry> {
    this.config.logger.debug({ id: entry.id, duronly }, "continuing time entry");
    const today = this.config.clock().toLocal().toISODate();
    if (duronly && entry.start && entry.start.toLocal().toISODate() === today) {
      return this.reopenTimeEntry(entry);
    }
    return this.createTimeEntry(this.withMetadataFrom(this.newStartPayload(entry.description, entry.workspace_id), entry));
  }

  private reopenTimeEntry(entry: TimeEntry): Promise<TimeEntry> {
    const payload = { ...encodeTimeEntry(entry), duration: -1, stop: null };
    return this.timeEntryCall("PUT", resourceUrlWithId("timeEntries", entry.workspace_id, entry.id), payload);
  }

  /**
   * Starts a copy of `entry` that keeps its original start time, then deletes `entry`.
   *
   * @throws {TogglPartialFailureError} when the copy was created but `entry` could not be deleted;
   * the running copy is on `error.entry`
   * @throws {TogglDecodeError} when the create response cannot be decoded. `entry` is not deleted,
   * but the server may already hold the copy; `error.fragment` has the start of the raw response
   */
  async unstopTimeEntry(entry: TimeEntry): Promise<TimeEntry> {
    this.config.logger.debug({ id: entry.id }, "unstopping time entry");
    const payload = this.withMetadataFrom(this.newStartPayload(entry.description, entry.workspace_id), entry);
    if (entry.start) payload.start = formatTimestamp(entry.start);

    const created = await this.createTimeEntry(payload);
    try {
      await this.deleteTimeEntry(entry);
    } catch (err) {
      throw new TogglPartialFailureError(created, err);
    }
    return created;
  }

  stopTimeEntry(entry: TimeEntry): Promise<TimeEntry> {
    this.config.logger.debug({ id: entry.id }, "stopping time entry");
    return this.timeEntryCall("PATCH", `${resourceUrlWithId("timeEntries", entry.workspace_id, entry.id)}/stop`);
  }

  /**
   * Adds `tag` to, or removes it from, the entry with id `timeEntryId`.
   */
  addRemoveTag(timeEntryId: number, tag: string, add: boolean, wid: number): Promise<TimeEntry> {
    return this.timeEntryCall("PUT", resourceUrlWithId("timeEntries", wid, timeEntryId), {
      tags: [tag],
      tag_action: add ? "add" : "remove",
    });
  }

  async deleteTimeEntry(entry: TimeEntry): Promise<void> {
    this.config.logger.debug({ id: entry.id }, "deleting time entry");
    await this.call("DELETE", resourceUrlWithId("timeEntries", entry.workspace_id, entry.id));
  }

  // ============================================================================
  // PROJECTS
  // ============================================================================

  async getProjects(wid: number): Promise<Project[]> {
    const data = await this.call("GET", resourceUrl("projects", wid));
    return decode(projectListSchema, data, "project list");
  }

  async getProject(id: number, wid: number): Promise<Project> {
    return decodeProject(await this.call("GET", resourceUrlWithId("projects", wid, id)));
  }

  async createProject(name: string, wid: number): Promise<Project> {
    const data = await this.call("POST", resourceUrl("projects", wid), {
      body: { name, wid, active: true },
    });
    return decodeProject(data);
  }

  async updateProject(project: Project): Promise<Project> {
    const data = await this.call("PUT", resourceUrlWithId("projects", project.workspace_id, project.id), {
      body: encodeProject(project),
    });
    return decodeProject(data);
  }

  async deleteProject(project: Project): Promise<void> {
    await this.call("DELETE", resourceUrlWithId("projects", project.workspace_id, project.id));
  }

  // ============================================================================
  // TAGS
  // ============================================================================

  async getTags(wid: number): Promise<Tag[]> {
    return decode(tagListSchema, await this.call("GET", resourceUrl("tags", wid)), "tag list");
  }

  async createTag(name: string, wid: number): Promise<Tag> {
    const data = await this.call("POST", resourceUrl("tags", wid), { body: { name, wid } });
    return decode(tagSchema, data, "tag");
  }

  async updateTag(tag: Tag): Promise<Tag> {
    const data = await this.call("PUT", resourceUrlWithId("tags", tag.workspace_id, tag.id), { body: tag });
    return decode(tagSchema, data, "tag");
  }

  async deleteTag(tag: Tag): Promise<void> {
    await this.call("DELETE", resourceUrlWithId("tags", tag.workspace_id, tag.id));
  }

  // ============================================================================
  // CLIENTS
  // ============================================================================

  async getClients(wid: number): Promise<Client[]> {
    return decode(clientListSchema, await this.call("GET", resourceUrl("clients", wid)), "client list");
  }

  async getClient(id: number, wid: number): Promise<Client> {
    return decode(clientSchema, await this.call("GET", resourceUrlWithId("clients", wid, id)), "client");
  }

  async createClient(name: string, wid: number): Promise<Client> {
    const data = await this.call("POST", resourceUrl("clients", wid), { body: { name, wid } });
    return decode(clientSchema, data, "client");
  }

  async updateClient(client: Client): Promise<Client> {
    const data = await this.call("PUT", resourceUrlWithId("clients", client.wid, client.id), { body: client });
    return decode(clientSchema, data, "client");
  }

  async deleteClient(client: Client): Promise<void> {
    await this.call("DELETE", resourceUrlWithId("clients", client.wid, client.id));
  }

  // ============================================================================
  // REPORTS
  // ============================================================================

  /**
   * Summary report grouped by project, with rounding on. `since` and `until` are
   * `YYYY-MM-DD` dates.
   */
  async getSummaryReport(workspaceId: number, since: string, until: string): Promise<SummaryReport> {
    const data = await this.call("GET", "/summary", {
      baseUrl: this.config.reportsUrl,
      query: {
        user_agent: this.config.userAgent,
        grouping: "projects",
        since,
        until,
        rounding: "on",
        workspace_id: workspaceId,
      },
    });
    const report = decodeSummaryReport(data);
    this.config.logger.debug({ totalGrand: report.total_grand }, "decoded summary report");
    return report;
  }

  /**
   * One page of the detailed report. Pages start at 1.
   */
  async getDetailedReport(workspaceId: number, since: string, until: string, page: number): Promise<DetailedReport> {
    const data = await this.call("GET", "/details", {
      baseUrl: this.config.reportsUrl,
      query: {
        user_agent: this.config.userAgent,
        since,
        until,
        page,
        rounding: "on",
        workspace_id: workspaceId,
      },
    });
    const report = decodeDetailedReport(data);
    this.config.logger.debug({ totalCount: report.total_count, page }, "decoded detailed report");
    return report;
  }
}
