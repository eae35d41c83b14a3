import { mkdtempSync, readFileSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { afterEach, describe, expect, it, vi } from "vitest"
import { debugLog } from "../src/utils/debugLog.js"

describe("debugLog", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it("stays silent unless enabled", () => {
    vi.stubEnv("ASCIICHAT_DEBUG", "")
    vi.stubEnv("ASCIICHAT_DEBUG_LOG", "")
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    debugLog("test", { value: 1 })
    expect(spy).not.toHaveBeenCalled()
  })

  it("writes one JSON line to stderr when enabled", () => {
    vi.stubEnv("ASCIICHAT_DEBUG", "1")
    vi.stubEnv("ASCIICHAT_DEBUG_LOG", "")
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    debugLog("gateway", { finishReason: "stop" })
    expect(spy).toHaveBeenCalledTimes(1)
    const payload: unknown = JSON.parse(String(spy.mock.calls[0][0]))
    expect(payload).toMatchObject({ scope: "gateway", finishReason: "stop" })
  })

  it("appends to the log file when one is configured", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "asciichat-log-"))
    const file = path.join(dir, "debug.log")
    vi.stubEnv("ASCIICHAT_DEBUG_LOG", file)
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    try {
      debugLog("controller", { event: "submit" })
      debugLog("controller", { event: "quit" })
      const lines = readFileSync(file, "utf8").trim().split("\n")
      expect(lines).toHaveLength(2)
      expect(JSON.parse(lines[1])).toMatchObject({ scope: "controller", event: "quit" })
      expect(spy).not.toHaveBeenCalled()
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })
})
