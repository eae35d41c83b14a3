import React from "react"
import { Command, Options } from "@effect/cli"
import { Effect } from "effect"
import { render } from "ink"
import { ChatSessionController } from "../chat/controller.js"
import { createCompletionGateway } from "../chat/completionGateway.js"
import type { AppConfig } from "../config/appConfig.js"
import { ChatScreen } from "../tui/components/ChatScreen.js"
import { debugLog } from "../utils/debugLog.js"
import { maxTokensOption, modelOption, resolveCommandConfig } from "./shared.js"

const backgroundOption = Options.boolean("background").pipe(
  Options.withDescription("Keep the screen responsive while a completion is in flight"),
)

export const runInteractive = async (config: AppConfig): Promise<string> => {
  if (!config.apiKey) {
    console.warn("[asciichat] No API key found (set OPENAI_API_KEY). Using example art.")
  }
  const controller = new ChatSessionController({
    gateway: createCompletionGateway({ config }),
    maxTokens: config.maxTokens,
    requestMode: config.requestMode,
  })
  const onCompletionError = (error: Error) => {
    console.error(`Completion error: ${error.message}`)
  }
  const onArt = (art: string) => {
    debugLog("chat", { message: "ascii art captured", chars: art.length })
  }
  controller.on("completionError", onCompletionError)
  controller.on("art", onArt)

  const ink = render(<ChatScreen controller={controller} />, { exitOnCtrlC: false })
  try {
    return await controller.untilExited()
  } finally {
    controller.off("completionError", onCompletionError)
    controller.off("art", onArt)
    ink.unmount()
  }
}

export const chatCommand = Command.make(
  "chat",
  {
    model: modelOption,
    maxTokens: maxTokensOption,
    background: backgroundOption,
  },
  ({ model, maxTokens, background }) =>
    Effect.tryPromise(async () => {
      const config = resolveCommandConfig({ model, maxTokens, background })
      debugLog("chat", { model: config.model, maxTokens: config.maxTokens, requestMode: config.requestMode })
      const finalOutput = await runInteractive(config)
      console.log(finalOutput)
    }),
)
