export type GenerationBackend = "compute" | "anthropic";

export interface LoopIntervalSettings {
  postSeconds: number;
  mentionSeconds: number;
  dmSeconds: number;
}

export interface PlatformRuntimeSettings {
  maxPostLength: number;
  mentionFetchLimit: number;
  dmFetchLimit: number;
  actionDelayMs: number;
  v2DirectMessages: boolean;
}

export interface ComputeRuntimeSettings {
  apiKey: string;
  baseUrl: string;
  modelId: string;
  maxPrice: number;
  readyMaxAttempts: number;
  readyPollSeconds: number;
}

export interface GenerationRuntimeSettings {
  backend: GenerationBackend;
  temperature: number;
  topP: number;
  topK: number;
  anthropicApiKey: string;
  anthropicModel: string;
}

export interface SchedulerRuntimeSettings {
  stopTimeoutMs: number;
}

export interface TwitterCredentials {
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  accessSecret: string;
  bearerToken: string;
}
