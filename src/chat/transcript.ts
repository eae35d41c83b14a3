import chalk from "chalk"
import type { Message, Speaker } from "./types.js"

export const SPEAKER_LABELS: Record<Speaker, string> = {
  user: "You: ",
  assistant: "Assistant: ",
}

export const LINE_DELIMITER = "\n"

const senderStyle = (text: string): string => chalk.magenta(text)

export const renderMessage = (message: Message): string => `${senderStyle(SPEAKER_LABELS[message.role])}${message.text}`

export class Transcript {
  private readonly messages: Message[] = []

  append(role: Speaker, text: string): Message {
    const message: Message = Object.freeze({ role, text })
    this.messages.push(message)
    return message
  }

  entries(): ReadonlyArray<Message> {
    return [...this.messages]
  }

  get size(): number {
    return this.messages.length
  }

  renderLines(): string[] {
    return this.messages.map(renderMessage)
  }

  flatten(): string {
    return this.renderLines().join(LINE_DELIMITER)
  }
}
