import { z } from "zod";
import {
  AuthenticationFailedError,
  ContentFilteredError,
  FuelQaError,
  InputTooLongError,
  OperationCancelledError,
  RateLimitedError,
  RequestTimeoutError,
  ServiceUnavailableError,
  UpstreamRequestError,
  errorMessage,
} from "../../domain/errors.js";
import { createTimedSignal } from "../../utils/abort.js";

export interface JsonRequest<T> {
  service: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * POSTs JSON and validates the response body. Transport failures, timeouts and
 * HTTP error statuses are mapped onto the error taxonomy.
 */
export async function postJson<T>(request: JsonRequest<T>): Promise<T> {
  const timed = createTimedSignal(request.timeoutMs, request.signal);
  try {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...request.headers,
        },
        body: JSON.stringify(request.body),
        signal: timed.signal,
      });
    } catch (error) {
      throw mapTransportError(request, timed.timedOut(), error);
    }

    if (!response.ok) {
      throw mapHttpError(request.service, response.status, await readBody(response), response.headers);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw mapTransportError(request, timed.timedOut(), error);
    }

    const parsed = request.schema.safeParse(data);
    if (!parsed.success) {
      throw new ServiceUnavailableError(
        request.service,
        `unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`,
      );
    }
    return parsed.data;
  } finally {
    timed.dispose();
  }
}

export function mapHttpError(
  service: string,
  status: number,
  body: string,
  headers?: Headers,
): FuelQaError {
  const detail = body.slice(0, 500);

  if (status === 401 || status === 403) {
    return new AuthenticationFailedError(service);
  }
  if (status === 429) {
    return new RateLimitedError(service, parseRetryAfter(headers?.get("retry-after") ?? null));
  }
  if (status === 408 || status >= 500) {
    return new ServiceUnavailableError(service, `HTTP ${status} ${detail}`.trim());
  }
  if (status === 413 || (status === 400 && /maximum context length|too long|too many tokens/i.test(body))) {
    return new InputTooLongError(null, null);
  }
  if (status === 400 && /content[_ ]filter|content management policy/i.test(body)) {
    return new ContentFilteredError(service);
  }
  return new UpstreamRequestError(service, status, detail);
}

export function parseRetryAfter(value: string | null): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - Date.now());
}

function mapTransportError(
  request: { service: string; timeoutMs: number; signal?: AbortSignal },
  timedOut: boolean,
  error: unknown,
): FuelQaError {
  if (timedOut) {
    return new RequestTimeoutError(request.service, request.timeoutMs);
  }
  if (request.signal?.aborted) {
    return new OperationCancelledError(`${request.service} request`);
  }
  return new ServiceUnavailableError(request.service, errorMessage(error), { cause: error });
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}
