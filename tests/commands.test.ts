import { Option } from "effect"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { resolveCommandConfig } from "../src/commands/shared.js"

describe("resolveCommandConfig", () => {
  beforeEach(() => {
    vi.stubEnv("ASCIICHAT_USER_CONFIG", "/nonexistent/asciichat/config.json")
    vi.stubEnv("OPENAI_MODEL", "")
    vi.stubEnv("OPENAI_MAX_TOKENS", "")
    vi.stubEnv("MAX_TOKENS", "")
    vi.stubEnv("ASCIICHAT_REQUEST_MODE", "")
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("keeps the environment defaults without flags", () => {
    const config = resolveCommandConfig({ model: Option.none(), maxTokens: Option.none() })
    expect(config).toMatchObject({ model: "gpt-4o-mini", maxTokens: 100, requestMode: "blocking" })
  })

  it("lets flags override the model, token ceiling and request mode", () => {
    const config = resolveCommandConfig({
      model: Option.some(" gpt-test "),
      maxTokens: Option.some(55),
      background: true,
    })
    expect(config).toMatchObject({ model: "gpt-test", maxTokens: 55, requestMode: "background" })
  })

  it("ignores a non-positive token flag", () => {
    const config = resolveCommandConfig({ model: Option.none(), maxTokens: Option.some(0) })
    expect(config.maxTokens).toBe(100)
  })
})
