import chalk from "chalk"
import cliTruncate from "cli-truncate"
import type { KeyInfo } from "./types.js"

export const DEFAULT_CHAR_LIMIT = 280
export const DEFAULT_INPUT_WIDTH = 80
export const INPUT_PROMPT = "> "
export const INPUT_PLACEHOLDER = "Send a message...(esc to exit)"

export interface InputBufferOptions {
  readonly charLimit?: number
  readonly width?: number
  readonly prompt?: string
  readonly placeholder?: string
}

const isControlCharacter = (char: string): boolean => {
  const code = char.codePointAt(0) ?? 0
  return code < 0x20 || code === 0x7f
}

const isWordCharacter = (char: string | undefined): boolean => char !== undefined && /\w/.test(char)

/**
 * Single-line editable buffer. Positions are counted in code points so surrogate pairs are
 * never split by the cursor or the character limit.
 */
export class InputBuffer {
  private chars: string[] = []
  private cursorIndex = 0
  private width: number
  private cursorVisible = true
  private readonly charLimit: number
  private readonly prompt: string
  private readonly placeholder: string

  constructor(options: InputBufferOptions = {}) {
    this.charLimit = Math.max(0, options.charLimit ?? DEFAULT_CHAR_LIMIT)
    this.width = Math.max(1, options.width ?? DEFAULT_INPUT_WIDTH)
    this.prompt = options.prompt ?? INPUT_PROMPT
    this.placeholder = options.placeholder ?? INPUT_PLACEHOLDER
  }

  get cursor(): number {
    return this.cursorIndex
  }

  takeValue(): string {
    return this.chars.join("")
  }

  isEmpty(): boolean {
    return this.chars.length === 0
  }

  reset(): void {
    this.chars = []
    this.cursorIndex = 0
    this.cursorVisible = true
  }

  setWidth(width: number): void {
    this.width = Math.max(1, Math.floor(width))
  }

  blink(): void {
    this.cursorVisible = !this.cursorVisible
  }

  handleKey(input: string, key: KeyInfo): void {
    this.cursorVisible = true
    if (key.backspace || key.delete) {
      this.deleteBackward()
      return
    }
    if (key.leftArrow) {
      this.moveTo(this.cursorIndex - 1)
      return
    }
    if (key.rightArrow) {
      this.moveTo(this.cursorIndex + 1)
      return
    }
    if (key.ctrl) {
      this.handleControl(input.toLowerCase())
      return
    }
    if (key.meta || key.return || key.escape || key.tab || key.upArrow || key.downArrow) {
      return
    }
    this.insert(input)
  }

  view(): string {
    const promptText = this.prompt
    if (this.chars.length === 0) {
      if (!this.placeholder) {
        return promptText + this.renderCursorCell(" ")
      }
      const [first = " ", ...rest] = Array.from(this.placeholder)
      return cliTruncate(promptText + this.renderCursorCell(first, true) + chalk.dim(rest.join("")), this.width)
    }
    const available = Math.max(1, this.width - Array.from(promptText).length)
    const start = this.cursorIndex >= available ? this.cursorIndex - available + 1 : 0
    const visible = this.chars.slice(start, start + available)
    const cursorOffset = this.cursorIndex - start
    const before = visible.slice(0, cursorOffset).join("")
    const under = visible[cursorOffset] ?? " "
    const after = visible.slice(cursorOffset + 1).join("")
    return promptText + before + this.renderCursorCell(under) + after
  }

  private renderCursorCell(char: string, dimmed = false): string {
    if (this.cursorVisible) return chalk.inverse(char)
    return dimmed ? chalk.dim(char) : char
  }

  private insert(input: string): void {
    for (const char of Array.from(input)) {
      if (isControlCharacter(char)) continue
      if (this.chars.length >= this.charLimit) return
      this.chars.splice(this.cursorIndex, 0, char)
      this.cursorIndex += 1
    }
  }

  private handleControl(letter: string): void {
    switch (letter) {
      case "a":
        this.moveTo(0)
        return
      case "e":
        this.moveTo(this.chars.length)
        return
      case "b":
        this.moveTo(this.cursorIndex - 1)
        return
      case "f":
        this.moveTo(this.cursorIndex + 1)
        return
      case "d":
        this.chars.splice(this.cursorIndex, 1)
        return
      case "h":
        this.deleteBackward()
        return
      case "u":
        this.chars.splice(0, this.cursorIndex)
        this.cursorIndex = 0
        return
      case "k":
        this.chars.splice(this.cursorIndex)
        return
      case "w":
        this.deleteWordBackward()
        return
      default:
        return
    }
  }

  private moveTo(index: number): void {
    this.cursorIndex = Math.max(0, Math.min(index, this.chars.length))
  }

  private deleteBackward(): void {
    if (this.cursorIndex === 0) return
    this.chars.splice(this.cursorIndex - 1, 1)
    this.cursorIndex -= 1
  }

  private deleteWordBackward(): void {
    let index = this.cursorIndex
    while (index > 0 && this.chars[index - 1] === " ") index -= 1
    const targetIsWord = isWordCharacter(this.chars[index - 1])
    while (index > 0 && this.chars[index - 1] !== " " && isWordCharacter(this.chars[index - 1]) === targetIsWord) {
      index -= 1
    }
    this.chars.splice(index, this.cursorIndex - index)
    this.cursorIndex = index
  }
}
