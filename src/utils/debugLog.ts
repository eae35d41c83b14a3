import { appendFileSync } from "node:fs"

const isEnabled = (): boolean =>
  process.env.ASCIICHAT_DEBUG === "1" || Boolean(process.env.ASCIICHAT_DEBUG_LOG?.trim())

export const debugLog = (scope: string, payload: Record<string, unknown> = {}): void => {
  if (!isEnabled()) return
  const line = JSON.stringify({ ts: new Date().toISOString(), scope, ...payload })
  const target = process.env.ASCIICHAT_DEBUG_LOG?.trim()
  if (target) {
    try {
      appendFileSync(target, `${line}\n`, "utf8")
      return
    } catch (error) {
      console.error(JSON.stringify({ scope: "debugLog", error: String(error) }))
    }
  }
  console.error(line)
}
