import cliTruncate from "cli-truncate"

export const DEFAULT_VIEWPORT_WIDTH = 30
export const DEFAULT_VIEWPORT_HEIGHT = 10

export const GREETING = `Ask the model to create some ascii art!
Type a message and press Enter to send.`

export interface ScrollbackOptions {
  readonly width?: number
  readonly height?: number
  readonly content?: string
}

export class Scrollback {
  private lines: string[] = []
  private offset = 0
  private boxWidth: number
  private boxHeight: number

  constructor(options: ScrollbackOptions = {}) {
    this.boxWidth = Math.max(1, options.width ?? DEFAULT_VIEWPORT_WIDTH)
    this.boxHeight = Math.max(1, options.height ?? DEFAULT_VIEWPORT_HEIGHT)
    this.setContent(options.content ?? GREETING)
  }

  get height(): number {
    return this.boxHeight
  }

  get scrollOffset(): number {
    return this.offset
  }

  content(): string {
    return this.lines.join("\n")
  }

  setContent(text: string): void {
    this.lines = text.split("\n")
    if (this.offset > this.maxOffset()) {
      this.scrollToBottom()
    }
  }

  scrollUp(lines: number): void {
    this.offset = Math.max(0, this.offset - Math.max(0, lines))
  }

  scrollDown(lines: number): void {
    this.offset = Math.min(this.maxOffset(), this.offset + Math.max(0, lines))
  }

  scrollToBottom(): void {
    this.offset = this.maxOffset()
  }

  atBottom(): boolean {
    return this.offset >= this.maxOffset()
  }

  resize(width: number, height: number): void {
    this.boxWidth = Math.max(1, Math.floor(width))
    this.boxHeight = Math.max(1, Math.floor(height))
    this.offset = Math.min(this.offset, this.maxOffset())
  }

  /** Exactly `height` lines, each cut to the box width. */
  visibleLines(): string[] {
    const visible = this.lines
      .slice(this.offset, this.offset + this.boxHeight)
      .map((line) => cliTruncate(line, this.boxWidth))
    while (visible.length < this.boxHeight) visible.push("")
    return visible
  }

  view(): string {
    return this.visibleLines().join("\n")
  }

  private maxOffset(): number {
    return Math.max(0, this.lines.length - this.boxHeight)
  }
}
