import dotenv from "dotenv"
import { loadUserConfigSync, normalizeRequestMode, type RequestMode } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly apiKey: string | undefined
  readonly baseUrl: string
  readonly model: string
  readonly maxTokens: number
  readonly requestMode: RequestMode
}

export const DEFAULT_BASE_URL = "https://api.openai.com/v1"
export const DEFAULT_MODEL_ID = "gpt-4o-mini"
export const DEFAULT_MAX_TOKENS = 100

const INTEGER_PATTERN = /^\s*\+?\d+\s*$/

/**
 * Token ceiling from an environment string. Anything that is not a positive integer is
 * treated as absent.
 */
export const parseMaxTokens = (raw: string | undefined): number | undefined => {
  if (raw === undefined || !INTEGER_PATTERN.test(raw)) return undefined
  const value = Number(raw)
  return Number.isSafeInteger(value) && value > 0 ? value : undefined
}

const computeConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const userConfig = loadUserConfigSync(env)
  const apiKey = env.OPENAI_API_KEY?.trim() || env.API_KEY?.trim() || undefined
  const baseUrl = env.OPENAI_BASE_URL?.trim() || userConfig.baseUrl || DEFAULT_BASE_URL
  const model = env.OPENAI_MODEL?.trim() || userConfig.model || DEFAULT_MODEL_ID
  const maxTokens =
    parseMaxTokens(env.OPENAI_MAX_TOKENS) ??
    parseMaxTokens(env.MAX_TOKENS) ??
    userConfig.maxTokens ??
    DEFAULT_MAX_TOKENS
  const requestMode = normalizeRequestMode(env.ASCIICHAT_REQUEST_MODE) ?? userConfig.requestMode ?? "blocking"
  return { apiKey, baseUrl, model, maxTokens, requestMode }
}

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => computeConfig(env)
