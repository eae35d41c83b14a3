import { Args, Command, Options } from "@effect/cli"
import { Console, Effect } from "effect"
import { createCompletionGateway } from "../chat/completionGateway.js"
import { extractFencedBlock } from "../chat/fencedBlock.js"
import { maxTokensOption, modelOption, resolveCommandConfig } from "./shared.js"

const artOnlyOption = Options.boolean("art-only").pipe(
  Options.withDescription("Print only the fenced block of the reply"),
)

export const askCommand = Command.make(
  "ask",
  {
    prompt: Args.text({ name: "prompt" }),
    model: modelOption,
    maxTokens: maxTokensOption,
    artOnly: artOnlyOption,
  },
  ({ prompt, model, maxTokens, artOnly }) =>
    Effect.gen(function* () {
      const config = resolveCommandConfig({ model, maxTokens })
      const gateway = createCompletionGateway({ config })
      const result = yield* Effect.promise(() => gateway.complete(prompt, config.maxTokens))
      if (!result.ok) {
        process.exitCode = 1
        return yield* Console.error(`Completion error: ${result.error.message}`)
      }
      if (!artOnly) {
        return yield* Console.log(result.text)
      }
      const art = extractFencedBlock(result.text)
      if (art === null) {
        process.exitCode = 1
        return yield* Console.error("No fenced block in the reply.")
      }
      return yield* Console.log(art)
    }),
)
