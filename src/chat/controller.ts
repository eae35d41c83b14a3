import { EventEmitter } from "node:events"
import type { RequestMode } from "../config/userConfig.js"
import { debugLog } from "../utils/debugLog.js"
import { toError, type CompletionGateway } from "./completionGateway.js"
import { extractFencedBlock } from "./fencedBlock.js"
import { InputBuffer, type InputBufferOptions } from "./inputBuffer.js"
import { Scrollback, type ScrollbackOptions } from "./scrollback.js"
import { Transcript } from "./transcript.js"
import type { ChatEvent, ChatState, CompletionResult } from "./types.js"

// blank separator, input line, one spare row
const VIEWPORT_RESERVED_ROWS = 3

export interface ChatControllerOptions {
  readonly gateway: CompletionGateway
  readonly maxTokens: number
  readonly requestMode?: RequestMode
  readonly input?: InputBufferOptions
  readonly viewport?: ScrollbackOptions
}

type StateListener = (state: ChatState) => void

/**
 * Owns the transcript, the input buffer and the viewport. Events are applied one at a time in
 * arrival order; in blocking mode a submit holds the queue until the completion returns.
 *
 * Emits `change` (state), `completionError` (Error), `art` (string) and `exit` (final output).
 */
export class ChatSessionController extends EventEmitter {
  private readonly gateway: CompletionGateway
  private readonly maxTokens: number
  private readonly requestMode: RequestMode
  private readonly transcript = new Transcript()
  private readonly input: InputBuffer
  private readonly scrollback: Scrollback
  private queue: Promise<void> = Promise.resolve()
  private pendingArt: string | null = null
  private pendingRequest = false
  private lastError: string | null = null
  private exited = false
  private finalOutput: string | null = null
  private resolveExit: ((output: string) => void) | null = null
  private readonly exitPromise: Promise<string>

  constructor(options: ChatControllerOptions) {
    super()
    this.gateway = options.gateway
    this.maxTokens = options.maxTokens
    this.requestMode = options.requestMode ?? "blocking"
    this.input = new InputBuffer(options.input)
    this.scrollback = new Scrollback(options.viewport)
    this.exitPromise = new Promise<string>((resolve) => {
      this.resolveExit = resolve
    })
  }

  getState(): ChatState {
    return {
      messages: this.transcript.entries(),
      inputValue: this.input.takeValue(),
      cursor: this.input.cursor,
      viewportLines: this.scrollback.visibleLines(),
      inputLine: this.input.view(),
      scrollOffset: this.scrollback.scrollOffset,
      pendingArt: this.pendingArt,
      pendingRequest: this.pendingRequest,
      lastError: this.lastError,
      exited: this.exited,
      finalOutput: this.finalOutput,
    }
  }

  onChange(listener: StateListener): () => void {
    this.on("change", listener)
    listener(this.getState())
    return () => this.off("change", listener)
  }

  /** Viewport, a blank separator, then the input line. */
  view(): string {
    return `${this.scrollback.view()}\n\n${this.input.view()}`
  }

  /** Queues an event. The returned promise settles once it (and everything before it) ran. */
  dispatch(event: ChatEvent): Promise<void> {
    this.queue = this.queue
      .then(() => this.handle(event))
      .catch((error: unknown) => this.recordFailure(event, error))
      .catch((error: unknown) => {
        debugLog("controller", { event: event.type, error: toError(error).message, phase: "listener" })
      })
    return this.queue
  }

  /** Settles once every event queued so far has been handled. */
  idle(): Promise<void> {
    return this.queue
  }

  untilExited(): Promise<string> {
    return this.exitPromise
  }

  private async handle(event: ChatEvent): Promise<void> {
    if (this.exited) return
    switch (event.type) {
      case "resize":
        this.scrollback.resize(event.width, Math.max(1, event.height - VIEWPORT_RESERVED_ROWS))
        this.input.setWidth(event.width)
        this.emitChange()
        return
      case "quit":
        this.quit()
        return
      case "submit":
        await this.submit()
        return
      case "scrollUp":
        this.scrollback.scrollUp(1)
        this.emitChange()
        return
      case "scrollDown":
        this.scrollback.scrollDown(1)
        this.emitChange()
        return
      case "editKey":
        this.input.handleKey(event.input, event.key)
        this.emitChange()
        return
      case "timerTick":
        this.input.blink()
        this.emitChange()
        return
      case "completion":
        this.pendingRequest = false
        this.applyCompletion(event.prompt, event.result)
        return
      case "artAvailable":
        if (this.pendingArt !== null) {
          debugLog("controller", { artLines: this.pendingArt.split("\n").length })
          this.emit("art", this.pendingArt)
        }
        return
      default: {
        const exhaustive: never = event
        return exhaustive
      }
    }
  }

  private quit(): void {
    const output = this.input.takeValue()
    this.exited = true
    this.finalOutput = output
    this.emitChange()
    this.emit("exit", output)
    this.resolveExit?.(output)
  }

  private async submit(): Promise<void> {
    if (this.input.isEmpty()) return
    if (this.pendingRequest) {
      debugLog("controller", { message: "submit ignored while a request is pending" })
      return
    }
    const prompt = this.input.takeValue()
    this.input.reset()
    this.emitChange()
    if (this.requestMode === "background") {
      this.pendingRequest = true
      this.emitChange()
      void this.request(prompt).then((result) => this.dispatch({ type: "completion", prompt, result }))
      return
    }
    this.applyCompletion(prompt, await this.request(prompt))
  }

  private async request(prompt: string): Promise<CompletionResult> {
    try {
      return await this.gateway.complete(prompt, this.maxTokens)
    } catch (error) {
      return { ok: false, error: toError(error) }
    }
  }

  private applyCompletion(prompt: string, result: CompletionResult): void {
    if (!result.ok) {
      this.lastError = result.error.message
      this.emitChange()
      this.emit("completionError", result.error)
      return
    }
    this.lastError = null
    this.transcript.append("user", prompt)
    this.scrollback.setContent(this.transcript.flatten())
    this.transcript.append("assistant", result.text)
    this.scrollback.setContent(this.transcript.flatten())
    this.scrollback.scrollToBottom()
    this.emitChange()

    const art = extractFencedBlock(result.text)
    if (art !== null) {
      this.pendingArt = art
      void this.dispatch({ type: "artAvailable" })
    }
  }

  private recordFailure(event: ChatEvent, error: unknown): void {
    const failure = toError(error)
    debugLog("controller", { event: event.type, error: failure.message })
    this.lastError = failure.message
    this.emitChange()
  }

  private emitChange(): void {
    this.emit("change", this.getState())
  }
}
