#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { askCommand } from "./commands/ask.js"
import { chatCommand } from "./commands/chat.js"

const root = Command.make("asciichat", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([chatCommand, askCommand]),
)

const cli = Command.run(root, { name: "asciichat", version: "0.1.0" })

const defaultedToChat = process.argv.length <= 2
const argv = defaultedToChat ? [...process.argv.slice(0, 2), "chat"] : process.argv

cli(argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
