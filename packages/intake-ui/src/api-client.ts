import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { SEVERITIES } from '@triage/support';
import type { ClassificationResult, TriageRequest } from '@triage/support';

export const classificationResultSchema = z.object({
  client_id: z.string(),
  summary: z.string(),
  full_summary: z.string().nullable(),
  full_text: z.string(),
  category: z.string(),
  severity: z.enum(SEVERITIES),
  kb_match: z.string(),
  next_step: z.string(),
  analysis_source: z.enum(['llm+kb', 'llm', 'heuristics']),
  llm_raw: z.record(z.unknown()).nullable(),
});

export class TriageApiError extends Error {
  constructor(message: string, readonly status?: number, readonly body?: unknown) {
    super(message);
    this.name = 'TriageApiError';
  }
}

export interface TriageApiClientOptions {
  baseUrl: string;
  /** Timeout for POST /triage, in milliseconds */
  timeoutMs?: number;
  /** Timeout for the liveness probe, in milliseconds */
  healthTimeoutMs?: number;
  /** Preconfigured axios instance, mainly for tests */
  http?: AxiosInstance;
}

/**
 * HTTP client for the triage API.
 */
export class TriageApiClient {
  readonly baseUrl: string;
  private http: AxiosInstance;
  private timeoutMs: number;
  private healthTimeoutMs: number;

  constructor(options: TriageApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 2_000;
    this.http = options.http ?? axios.create({
      baseURL: this.baseUrl,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * True when `GET /` answers 200 within the health timeout.
   */
  async isAlive(): Promise<boolean> {
    try {
      const response = await this.http.get('/', { timeout: this.healthTimeoutMs });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  /**
   * POST /triage and return the classification.
   *
   * @throws TriageApiError on transport errors, non-2xx answers and bodies
   *   that are not a classification
   */
  async classify(request: TriageRequest): Promise<ClassificationResult> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>('/triage', request, { timeout: this.timeoutMs });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response) {
          throw new TriageApiError(
            `Request failed: ${error.response.status} ${describeBody(error.response.data)}`,
            error.response.status,
            error.response.data
          );
        }
        throw new TriageApiError(`Cannot reach API at ${this.baseUrl}: ${error.message}`);
      }
      throw error;
    }

    const parsed = classificationResultSchema.safeParse(response.data);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(body)').join(', ');
      throw new TriageApiError(
        `Unexpected response from ${this.baseUrl}/triage: invalid ${fields}`,
        response.status,
        response.data
      );
    }
    return parsed.data;
  }
}

function describeBody(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}
