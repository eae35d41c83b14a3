import { createApiClient, toApiConfig, type ApiClientInstance } from "../api/client.js"
import type { AppConfig } from "../config/appConfig.js"
import { debugLog } from "../utils/debugLog.js"
import type { CompletionResult } from "./types.js"

export const PLACEHOLDER_RESPONSE = [
  "```",
  "    _____\\    _______",
  "   /      \\  |      /\\",
  "  /_______/  |_____/  \\",
  " |   \\   /        /   /",
  "  \\   \\ MISSING \\/   /",
  "   \\  /   API    \\__/_",
  "    \\/ ___KEY_ /\\",
  "      /  \\    /  \\",
  "     /\\   \\  /   /",
  "       \\   \\/   /",
  "        \\___\\__/",
  "```",
].join("\n")

export interface CompletionGateway {
  complete(prompt: string, maxTokens: number): Promise<CompletionResult>
}

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)))

export interface CompletionGatewayOptions {
  readonly config: Pick<AppConfig, "apiKey" | "baseUrl" | "model">
  readonly client?: ApiClientInstance
}

export const createCompletionGateway = (options: CompletionGatewayOptions): CompletionGateway => {
  const { config } = options
  const client = options.client ?? createApiClient(toApiConfig(config))
  return {
    complete: async (prompt, maxTokens) => {
      if (!config.apiKey) {
        debugLog("gateway", { message: "no api key configured, using placeholder art" })
        return { ok: true, text: PLACEHOLDER_RESPONSE }
      }
      try {
        const response = await client.createChatCompletion({
          model: config.model,
          max_tokens: maxTokens,
          messages: [{ role: "user", content: prompt }],
        })
        const [choice] = response.choices
        if (!choice) {
          return { ok: false, error: new Error("Completion returned no choices") }
        }
        debugLog("gateway", { finishReason: choice.finish_reason, choices: response.choices.length })
        return { ok: true, text: choice.message.content ?? "" }
      } catch (error) {
        debugLog("gateway", { error: String(error) })
        return { ok: false, error: toError(error) }
      }
    },
  }
}
