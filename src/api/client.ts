import type { AppConfig } from "../config/appConfig.js"
import type { ChatCompletionRequest, ChatCompletionResponse } from "./types.js"

export class ApiError extends Error {
  readonly status: number
  readonly body?: unknown

  constructor(message: string, status: number, body?: unknown) {
    super(message)
    this.name = "ApiError"
    this.status = status
    this.body = body
  }
}

type JsonMethod = "GET" | "POST"

interface RequestOptions {
  body?: unknown
  headers?: Record<string, string>
}

export interface ApiClientConfig {
  readonly baseUrl: string
  readonly apiKey?: string
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const buildUrl = (baseUrl: string, path: string): URL =>
  new URL(path.replace(/^\//, ""), baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`)

const describeFailure = (status: number, payload: unknown): string => {
  const base = `Request failed with status ${status}`
  const error = isRecord(payload) && isRecord(payload.error) ? payload.error : undefined
  return typeof error?.message === "string" && error.message ? `${base}: ${error.message}` : base
}

const requestWithConfig = async <T>(
  config: ApiClientConfig,
  path: string,
  method: JsonMethod,
  options: RequestOptions = {},
): Promise<T> => {
  const url = buildUrl(config.baseUrl, path)
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    ...(options.headers ?? {}),
  }
  if (config.apiKey) {
    headers.Authorization = `Bearer ${config.apiKey}`
  }
  const response = await fetch(url, {
    method,
    headers,
    body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
  })
  const contentType = response.headers.get("content-type") ?? ""
  const isJson = contentType.includes("application/json")
  if (!response.ok) {
    const payload: unknown = isJson
      ? await response.json().catch(() => undefined)
      : await response.text().catch(() => undefined)
    throw new ApiError(describeFailure(response.status, payload), response.status, payload)
  }
  if (!isJson) {
    throw new ApiError(`Expected JSON response, got "${contentType || "unknown"}"`, response.status)
  }
  return (await response.json()) as T
}

export const toApiConfig = (config: Pick<AppConfig, "baseUrl" | "apiKey">): ApiClientConfig => ({
  baseUrl: config.baseUrl,
  apiKey: config.apiKey,
})

export const createApiClient = (config: ApiClientConfig) => ({
  createChatCompletion: (payload: ChatCompletionRequest) =>
    requestWithConfig<ChatCompletionResponse>(config, "/chat/completions", "POST", { body: payload }),
})

export type ApiClientInstance = ReturnType<typeof createApiClient>
