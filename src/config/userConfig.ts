import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"

export type RequestMode = "blocking" | "background"

export interface UserConfigFile {
  readonly model?: string
  readonly baseUrl?: string
  readonly maxTokens?: number
  readonly requestMode?: RequestMode
}

const resolveConfigPath = (env: NodeJS.ProcessEnv): string => {
  const explicit = env.ASCIICHAT_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".asciichat", "config.json")
}

export const getUserConfigPath = (env: NodeJS.ProcessEnv = process.env): string => resolveConfigPath(env)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const normalizeRequestMode = (value: unknown): RequestMode | undefined => {
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (normalized === "blocking" || normalized === "background") return normalized
  return undefined
}

export const loadUserConfigSync = (env: NodeJS.ProcessEnv = process.env): UserConfigFile => {
  const configPath = resolveConfigPath(env)
  try {
    if (!fs.existsSync(configPath)) return {}
    const raw = fs.readFileSync(configPath, "utf8")
    const parsed = JSON.parse(raw) as unknown
    if (!isRecord(parsed)) return {}
    const model = typeof parsed.model === "string" && parsed.model.trim() ? parsed.model.trim() : undefined
    const baseUrl = typeof parsed.baseUrl === "string" && parsed.baseUrl.trim() ? parsed.baseUrl.trim() : undefined
    const maxTokens =
      typeof parsed.maxTokens === "number" && Number.isInteger(parsed.maxTokens) && parsed.maxTokens > 0
        ? parsed.maxTokens
        : undefined
    const requestMode = normalizeRequestMode(parsed.requestMode)
    return { model, baseUrl, maxTokens, requestMode }
  } catch {
    return {}
  }
}
