import { TogglHttpError, TogglTransportError } from "./errors";
import type { Logger } from "./logger";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * How a request authenticates. Both are HTTP Basic; an API token is sent as the username with
 * the fixed password "api_token".
 */
export type Credentials =
  | { kind: "apiToken"; apiToken: string }
  | { kind: "password"; username: string; password: string };

export type TransportConfig = {
  logger: Logger;
  /**
   * Custom fetch implementation (useful for testing).
   * @default globalThis.fetch
   */
  fetchImpl?: typeof fetch;
};

export type RequestOptions = {
  credentials: Credentials;
  query?: Record<string, unknown>;
  body?: unknown;
};

export const API_TOKEN_PASSWORD = "api_token";

export const buildQuery = (query?: Record<string, unknown>): string => {
  if (!query) return "";
  const params = new URLSearchParams();
  Object.entries(query).forEach(([key, value]) => {
    if (value === undefined || value === null) return;
    params.set(key, String(value));
  });
  const qs = params.toString();
  return qs ? `?${qs}` : "";
};

export const basicAuthHeader = (credentials: Credentials): string => {
  const [user, pass] =
    credentials.kind === "apiToken"
      ? [credentials.apiToken, API_TOKEN_PASSWORD]
      : [credentials.username, credentials.password];
  return `Basic ${Buffer.from(`${user}:${pass}`, "utf8").toString("base64")}`;
};

/**
 * Performs one HTTP round trip and returns the response body as text.
 *
 * Statuses in [200, 400) succeed. Anything else throws `TogglHttpError` with the body attached.
 * A failure before a response arrives, or while reading its body, throws `TogglTransportError`.
 * There are no retries, and no timeout beyond whatever `fetchImpl` applies.
 */
export class TogglTransport {
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(config: TransportConfig) {
    this.logger = config.logger;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async request(method: HttpMethod, baseUrl: string, path: string, options: RequestOptions): Promise<string> {
    const url = `${baseUrl}${path}${buildQuery(options.query)}`;
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);
    this.logger.debug({ method, url, body }, "toggl request");

    const { response, text } = await this.send(method, url, options.credentials, body);
    this.logger.debug({ method, url, status: response.status, body: text }, "toggl response");
    if (response.status < 200 || response.status >= 400) {
      throw new TogglHttpError(url, response.status, response.statusText, text);
    }
    return text;
  }

  private async send(
    method: HttpMethod,
    url: string,
    credentials: Credentials,
    body: string | undefined
  ): Promise<{ response: Response; text: string }> {
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: basicAuthHeader(credentials),
          "Content-Type": "application/json",
        },
        body,
      });
      return { response, text: await response.text() };
    } catch (err) {
      this.logger.debug({ method, url, err }, "toggl request failed");
      throw new TogglTransportError(url, err);
    }
  }
}
