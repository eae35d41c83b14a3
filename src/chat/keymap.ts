import type { ChatEvent, KeyInfo } from "./types.js"

/** esc and ctrl+c quit, enter submits, up/down scroll; everything else edits the input. */
export const keyToEvent = (input: string, key: KeyInfo): ChatEvent => {
  if (key.escape || (key.ctrl && input.toLowerCase() === "c")) {
    return { type: "quit" }
  }
  if (key.return) {
    return { type: "submit" }
  }
  if (key.upArrow) {
    return { type: "scrollUp" }
  }
  if (key.downArrow) {
    return { type: "scrollDown" }
  }
  return { type: "editKey", input, key }
}
