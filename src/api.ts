/**
 * Typed HTTP client for the patient API, with retries and backoff for reads.
 * Requires Node 18+ or a browser (global fetch).
 */
import type {
  ApiInfo,
  CreatedResponse,
  DataResponse,
  ErrorKind,
  MessageResponse,
  PatientId,
  PatientView,
  SortField,
  SortOrder,
  SortedPatientView,
} from "./types";

export type FetchLike = (
  input: RequestInfo | URL,
  init?: RequestInit
) => Promise<Response>;

type ApiClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  minDelayMs?: number;
  fetchImpl?: FetchLike;
  sleepImpl?: (ms: number) => Promise<void>;
};

/**
 * Non-2xx answer from the API. `detail` and `kind` come from the error body
 * when the server sent one.
 */
export class ApiRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly detail: string,
    public readonly kind: ErrorKind | null
  ) {
    super(`HTTP ${status}: ${detail}`);
    this.name = "ApiRequestError";
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function jitter(ms: number): number {
  const rand = Math.random() * 0.3 + 0.85; // 0.85..1.15
  return Math.round(ms * rand);
}

async function readJsonResponse(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

const ERROR_KINDS: readonly ErrorKind[] = [
  "validation",
  "not_found",
  "conflict",
  "invalid_argument",
  "store_io",
  "store_format",
  "internal",
];

function toRequestError(status: number, statusText: string, body: unknown) {
  if (body && typeof body === "object" && "detail" in body) {
    const detail = String(body.detail);
    const rawKind = "kind" in body ? body.kind : null;
    const kind = ERROR_KINDS.find((k) => k === rawKind) ?? null;
    return new ApiRequestError(status, detail, kind);
  }
  const detail =
    typeof body === "string" && body ? body : statusText || "Request failed";
  return new ApiRequestError(status, detail, null);
}

export class PatientApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly minDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleepImpl: (ms: number) => Promise<void>;

  constructor({
    baseUrl,
    timeoutMs = 15000,
    maxRetries = 3,
    minDelayMs = 200,
    fetchImpl = (input, init) => fetch(input, init),
    sleepImpl = sleep,
  }: ApiClientOptions) {
    this.baseUrl = String(baseUrl || "").replace(/\/$/, "");
    this.timeoutMs = timeoutMs;
    this.maxRetries = maxRetries;
    this.minDelayMs = minDelayMs;
    this.fetchImpl = fetchImpl;
    this.sleepImpl = sleepImpl;
  }

  /**
   * Sends a request and parses the JSON body.
   *
   * Only GET requests are retried (network errors, 500, 503): repeating a
   * write could apply it twice.
   */
  async requestJson(
    path: string,
    init: RequestInit = {}
  ): Promise<{ status: number; body: unknown }> {
    const url = `${this.baseUrl}${path}`;
    const method = (init.method ?? "GET").toUpperCase();
    const retryable = method === "GET";

    let attempt = 0;
    let backoffMs = this.minDelayMs;

    while (true) {
      attempt += 1;

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);

      let res: Response;
      let body: unknown;
      try {
        res = await this.fetchImpl(url, {
          ...init,
          signal: controller.signal,
          headers: {
            ...(init.headers || {}),
            accept: "application/json",
          },
        });
        body = await readJsonResponse(res);
      } catch (err) {
        clearTimeout(timer);
        if (retryable && attempt <= this.maxRetries) {
          await this.sleepImpl(jitter(backoffMs));
          backoffMs = Math.min(backoffMs * 2, 8000);
          continue;
        }
        throw err;
      }
      clearTimeout(timer);

      if (res.ok) return { status: res.status, body };

      // transient server failures
      if (
        retryable &&
        (res.status === 500 || res.status === 503) &&
        attempt <= this.maxRetries
      ) {
        await this.sleepImpl(jitter(backoffMs));
        backoffMs = Math.min(backoffMs * 2, 8000);
        continue;
      }

      throw toRequestError(res.status, res.statusText, body);
    }
  }

  private sendJson(
    method: "POST" | "PUT",
    path: string,
    payload: unknown
  ): Promise<{ status: number; body: unknown }> {
    return this.requestJson(path, {
      method,
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });
  }

  async info(): Promise<ApiInfo> {
    const { body } = await this.requestJson("/info");
    return body as ApiInfo;
  }

  async listPatients(): Promise<Record<PatientId, PatientView>> {
    const { body } = await this.requestJson("/patients");
    return (body as DataResponse<Record<PatientId, PatientView>>).data;
  }

  async getPatient(id: PatientId): Promise<PatientView> {
    const { body } = await this.requestJson(
      `/patients/${encodeURIComponent(id)}`
    );
    return (body as DataResponse<PatientView>).data;
  }

  async sortPatients(
    sortBy: SortField,
    order: SortOrder
  ): Promise<SortedPatientView[]> {
    const path = `/patients/sort?sort_by=${encodeURIComponent(
      sortBy
    )}&order=${encodeURIComponent(order)}`;
    const { body } = await this.requestJson(path);
    return (body as DataResponse<SortedPatientView[]>).data;
  }

  async addPatient(patient: unknown): Promise<CreatedResponse> {
    const { body } = await this.sendJson("POST", "/patients", patient);
    return body as CreatedResponse;
  }

  async updatePatient(id: PatientId, update: unknown): Promise<MessageResponse> {
    const { body } = await this.sendJson(
      "PUT",
      `/patients/${encodeURIComponent(id)}`,
      update
    );
    return body as MessageResponse;
  }

  async deletePatient(id: PatientId): Promise<MessageResponse> {
    const { body } = await this.requestJson(
      `/patients/${encodeURIComponent(id)}`,
      { method: "DELETE" }
    );
    return body as MessageResponse;
  }
}
