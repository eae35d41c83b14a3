export type ChatRole = "system" | "user" | "assistant"

export interface ChatCompletionMessage {
  readonly role: ChatRole
  readonly content: string
}

export interface ChatCompletionRequest {
  readonly model: string
  readonly max_tokens: number
  readonly messages: ReadonlyArray<ChatCompletionMessage>
}

export interface ChatCompletionChoice {
  readonly index: number
  readonly message: {
    readonly role: ChatRole
    readonly content: string | null
  }
  readonly finish_reason: string | null
}

export interface ChatCompletionResponse {
  readonly id: string
  readonly object: string
  readonly created: number
  readonly model: string
  readonly choices: ReadonlyArray<ChatCompletionChoice>
}

