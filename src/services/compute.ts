import type { ComputeRuntimeSettings } from "../types/runtime.js";
import { isRecord, readNumber, readString } from "../utils/guards.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class ComputeApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = "ComputeApiError";
    this.status = status;
    this.body = body;
  }
}

export interface ReserveResult {
  gpuId: string;
  raw: Record<string, unknown>;
}

export interface GpuStatus {
  status: string;
  raw: Record<string, unknown>;
}

export interface GenerateRequest {
  prompt: string;
  modelId: string;
  gpuId: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  topK: number;
}

/**
 * Thin REST client for the GPU rental API. Stateless: the reserved GPU id
 * lives in {@link ComputeSession}.
 */
export class ComputeClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(apiKey: string, baseUrl: string, fetchImpl: FetchLike = fetch) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = fetchImpl;
  }

  private async request(method: "GET" | "POST", path: string, body?: Record<string, unknown>): Promise<Record<string, unknown>> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: body ? JSON.stringify(body) : undefined,
    });

    const text = await response.text();
    if (!response.ok) {
      throw new ComputeApiError(`${method} ${path} failed with HTTP ${response.status}`, response.status, text);
    }
    if (!text.trim()) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new ComputeApiError(`${method} ${path} returned invalid JSON`, response.status, text);
    }
    // billing 등 배열 응답은 items로 감싼다
    if (Array.isArray(parsed)) return { items: parsed };
    if (!isRecord(parsed)) {
      throw new ComputeApiError(`${method} ${path} returned a non-object body`, response.status, text);
    }
    return parsed;
  }

  async reserve(modelId: string, maxPrice?: number): Promise<ReserveResult> {
    const payload: Record<string, unknown> = { model_id: modelId };
    if (maxPrice !== undefined) payload.max_price = maxPrice;
    const raw = await this.request("POST", "/v1/gpus/rent", payload);
    const gpuId = readString(raw, "gpu_id");
    if (!gpuId) {
      throw new ComputeApiError("rent response carried no gpu_id", 200, JSON.stringify(raw));
    }
    return { gpuId, raw };
  }

  async status(gpuId: string): Promise<GpuStatus> {
    const raw = await this.request("GET", `/v1/gpus/${encodeURIComponent(gpuId)}`);
    return { status: readString(raw, "status") ?? "pending", raw };
  }

  async release(gpuId: string): Promise<Record<string, unknown>> {
    return this.request("POST", `/v1/gpus/${encodeURIComponent(gpuId)}/release`);
  }

  async generate(request: GenerateRequest): Promise<string> {
    const raw = await this.request("POST", "/v1/generate", {
      prompt: request.prompt,
      model_id: request.modelId,
      gpu_id: request.gpuId,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      top_p: request.topP,
      top_k: request.topK,
    });
    return readString(raw, "text") ?? "";
  }

  async billingHistory(): Promise<Record<string, unknown>> {
    return this.request("GET", "/v1/billing/history");
  }
}

export interface ComputeSessionOptions {
  logger?: LogSink;
  wait?: (ms: number) => Promise<unknown>;
}

export interface GenerationParameters {
  maxTokens: number;
  temperature: number;
  topP: number;
  topK: number;
}

/**
 * Owns the reserved GPU for one agent: reserve on demand, wait for readiness,
 * generate, release on shutdown.
 */
export class ComputeSession {
  private readonly client: ComputeClient;
  private readonly settings: ComputeRuntimeSettings;
  private readonly logger: LogSink;
  private readonly wait: (ms: number) => Promise<unknown>;
  private gpuId: string | null = null;
  private pendingReservation: Promise<string> | null = null;

  constructor(client: ComputeClient, settings: ComputeRuntimeSettings, options: ComputeSessionOptions = {}) {
    this.client = client;
    this.settings = settings;
    this.logger = options.logger ?? createLogger("compute");
    this.wait = options.wait ?? ((ms: number) => sleep(ms));
  }

  get reservedGpuId(): string | null {
    return this.gpuId;
  }

  /**
   * Reserves a GPU when none is held, then polls its status until ready.
   * Not becoming ready in time is logged and tolerated.
   */
  async ensureReady(): Promise<string> {
    if (this.gpuId) return this.gpuId;
    // 동시에 여러 루프가 요청해도 대여는 한 번만
    if (!this.pendingReservation) {
      this.pendingReservation = this.reserveAndPoll().finally(() => {
        this.pendingReservation = null;
      });
    }
    return this.pendingReservation;
  }

  private async reserveAndPoll(): Promise<string> {
    const { gpuId } = await this.client.reserve(this.settings.modelId, this.settings.maxPrice);
    this.gpuId = gpuId;
    this.logger.info({ gpuId, modelId: this.settings.modelId }, "GPU reserved");

    let status = "pending";
    for (let attempt = 1; attempt <= this.settings.readyMaxAttempts; attempt += 1) {
      status = (await this.client.status(gpuId)).status;
      if (status === "ready") {
        this.logger.info({ gpuId, attempt }, "GPU ready for inference");
        return gpuId;
      }
      if (status !== "pending") break;
      this.logger.info({ gpuId, status, attempt }, "Waiting for GPU");
      if (attempt < this.settings.readyMaxAttempts) {
        await this.wait(this.settings.readyPollSeconds * 1000);
      }
    }

    this.logger.warn({ gpuId, status, attempts: this.settings.readyMaxAttempts }, "GPU not ready, proceeding anyway");
    return gpuId;
  }

  async generate(prompt: string, params: GenerationParameters): Promise<string> {
    const gpuId = await this.ensureReady();
    const text = await this.client.generate({
      prompt,
      modelId: this.settings.modelId,
      gpuId,
      ...params,
    });
    this.logger.debug({ chars: text.length }, "Generated text");
    return text;
  }

  async status(): Promise<GpuStatus | null> {
    if (!this.gpuId) return null;
    return this.client.status(this.gpuId);
  }

  async billing(): Promise<Record<string, unknown>> {
    return this.client.billingHistory();
  }

  async release(): Promise<boolean> {
    if (!this.gpuId) {
      this.logger.warn({}, "No GPU to release");
      return false;
    }
    const gpuId = this.gpuId;
    await this.client.release(gpuId);
    this.gpuId = null;
    this.logger.info({ gpuId }, "GPU released");
    return true;
  }
}

// 청구 내역 요약 (지표용)
export function summarizeBilling(raw: Record<string, unknown>): { entries: number; totalCost?: number } {
  const items: unknown[] = Array.isArray(raw.items) ? raw.items : Array.isArray(raw.history) ? raw.history : [];
  let total: number | undefined = readNumber(raw, "total_cost");
  if (total === undefined && items.length > 0) {
    total = items.reduce<number>((sum, item) => sum + (isRecord(item) ? readNumber(item, "amount") ?? 0 : 0), 0);
  }
  return { entries: items.length, totalCost: total };
}
