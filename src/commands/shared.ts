import { Options } from "@effect/cli"
import { Option } from "effect"
import { loadAppConfig, type AppConfig } from "../config/appConfig.js"

export const modelOption = Options.text("model").pipe(Options.optional)
export const maxTokensOption = Options.integer("max-tokens").pipe(Options.optional)

export const getOptionValue = <T,>(value: Option.Option<T>): T | null => Option.getOrNull(value)

/** Environment and user config, with command-line flags on top. */
export const resolveCommandConfig = (flags: {
  readonly model: Option.Option<string>
  readonly maxTokens: Option.Option<number>
  readonly background?: boolean
}): AppConfig => {
  const base = loadAppConfig()
  const model = getOptionValue(flags.model)?.trim()
  const maxTokens = getOptionValue(flags.maxTokens)
  return {
    ...base,
    model: model || base.model,
    maxTokens: maxTokens !== null && maxTokens > 0 ? maxTokens : base.maxTokens,
    requestMode: flags.background ? "background" : base.requestMode,
  }
}
