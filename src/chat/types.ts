export type Speaker = "user" | "assistant"

export interface Message {
  readonly role: Speaker
  readonly text: string
}

/** Subset of Ink's `Key` the chat screen reacts to. */
export interface KeyInfo {
  readonly upArrow?: boolean
  readonly downArrow?: boolean
  readonly leftArrow?: boolean
  readonly rightArrow?: boolean
  readonly return?: boolean
  readonly escape?: boolean
  readonly ctrl?: boolean
  readonly meta?: boolean
  readonly shift?: boolean
  readonly tab?: boolean
  readonly backspace?: boolean
  readonly delete?: boolean
}

export type CompletionResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly error: Error }

export type ChatEvent =
  | { readonly type: "resize"; readonly width: number; readonly height: number }
  | { readonly type: "quit" }
  | { readonly type: "submit" }
  | { readonly type: "scrollUp" }
  | { readonly type: "scrollDown" }
  | { readonly type: "editKey"; readonly input: string; readonly key: KeyInfo }
  | { readonly type: "timerTick" }
  | { readonly type: "completion"; readonly prompt: string; readonly result: CompletionResult }
  | { readonly type: "artAvailable" }

export interface ChatState {
  readonly messages: ReadonlyArray<Message>
  readonly inputValue: string
  readonly cursor: number
  readonly viewportLines: ReadonlyArray<string>
  readonly inputLine: string
  readonly scrollOffset: number
  readonly pendingArt: string | null
  readonly pendingRequest: boolean
  readonly lastError: string | null
  readonly exited: boolean
  readonly finalOutput: string | null
}
