import { ApiPartialResponseError, ApiRequestError, ApiResponseError } from "twitter-api-v2";
import { errorMessage } from "../utils/guards.js";

export type PlatformErrorKind =
  | "access-tier"
  | "forbidden"
  | "auth"
  | "not-found"
  | "rate-limited"
  | "transport"
  | "unsupported"
  | "invalid-response";

const ACCESS_TIER_MARKER = "access to a subset of x api";

export class PlatformError extends Error {
  readonly kind: PlatformErrorKind;
  readonly status?: number;

  constructor(kind: PlatformErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PlatformError";
    this.kind = kind;
    this.status = options.status;
  }
}

// 403 + "subset of X API" 문구 = 요금제(액세스 등급) 제한
export function isAccessTierMessage(message: string, status?: number): boolean {
  const normalized = message.toLowerCase();
  const has403 = status === 403 || normalized.includes("403");
  return has403 && normalized.includes(ACCESS_TIER_MARKER);
}

function describeResponseError(error: ApiResponseError): string {
  const details: string[] = [];
  const data: unknown = error.data;
  if (data && typeof data === "object") {
    if ("detail" in data && typeof data.detail === "string") details.push(data.detail);
    if ("errors" in data && Array.isArray(data.errors)) {
      for (const entry of data.errors) {
        if (entry && typeof entry === "object" && "message" in entry && typeof entry.message === "string") {
          details.push(entry.message);
        }
      }
    }
  }
  return details.length > 0 ? `${error.message} (${details.join("; ")})` : error.message;
}

function kindFromStatus(status: number, message: string): PlatformErrorKind {
  if (isAccessTierMessage(message, status)) return "access-tier";
  if (status === 401) return "auth";
  if (status === 403) return "forbidden";
  if (status === 404) return "not-found";
  if (status === 429) return "rate-limited";
  return "transport";
}

/**
 * Maps whatever a twitter-api-v2 call threw onto a {@link PlatformError}.
 * Already-classified errors pass through unchanged.
 */
export function classifyPlatformError(error: unknown): PlatformError {
  if (error instanceof PlatformError) return error;

  if (error instanceof ApiResponseError) {
    const message = describeResponseError(error);
    const kind = error.rateLimitError ? "rate-limited" : kindFromStatus(error.code, message);
    return new PlatformError(kind, message, { status: error.code, cause: error });
  }
  if (error instanceof ApiPartialResponseError) {
    return new PlatformError("invalid-response", error.message, { cause: error });
  }
  if (error instanceof ApiRequestError) {
    return new PlatformError("transport", error.message, { cause: error });
  }

  const message = errorMessage(error);
  if (isAccessTierMessage(message)) {
    return new PlatformError("access-tier", message, { status: 403, cause: error });
  }
  return new PlatformError("transport", message, { cause: error });
}
