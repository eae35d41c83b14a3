import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL_ID,
  loadAppConfig,
  parseMaxTokens,
} from "../src/config/appConfig.js"
import { getUserConfigPath, loadUserConfigSync } from "../src/config/userConfig.js"

describe("parseMaxTokens", () => {
  it("accepts positive integers", () => {
    expect(parseMaxTokens("250")).toBe(250)
    expect(parseMaxTokens(" 42 ")).toBe(42)
  })

  it("treats anything else as absent", () => {
    expect(parseMaxTokens(undefined)).toBeUndefined()
    expect(parseMaxTokens("")).toBeUndefined()
    expect(parseMaxTokens("abc")).toBeUndefined()
    expect(parseMaxTokens("12abc")).toBeUndefined()
    expect(parseMaxTokens("1.5")).toBeUndefined()
    expect(parseMaxTokens("0")).toBeUndefined()
    expect(parseMaxTokens("-5")).toBeUndefined()
  })
})

describe("loadAppConfig", () => {
  let dir: string
  let configFile: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "asciichat-config-"))
    configFile = path.join(dir, "config.json")
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it("falls back to defaults", () => {
    const config = loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile })
    expect(config).toEqual({
      apiKey: undefined,
      baseUrl: DEFAULT_BASE_URL,
      model: DEFAULT_MODEL_ID,
      maxTokens: DEFAULT_MAX_TOKENS,
      requestMode: "blocking",
    })
    expect(DEFAULT_MAX_TOKENS).toBe(100)
  })

  it("reads the key and token ceiling from the environment", () => {
    const config = loadAppConfig({
      ASCIICHAT_USER_CONFIG: configFile,
      OPENAI_API_KEY: " test-key ",
      OPENAI_MAX_TOKENS: "300",
      ASCIICHAT_REQUEST_MODE: "Background",
    })
    expect(config.apiKey).toBe("test-key")
    expect(config.maxTokens).toBe(300)
    expect(config.requestMode).toBe("background")
  })

  it("accepts the generic variable names", () => {
    const config = loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile, API_KEY: "test-key", MAX_TOKENS: "64" })
    expect(config.apiKey).toBe("test-key")
    expect(config.maxTokens).toBe(64)
  })

  it("falls back to MAX_TOKENS when OPENAI_MAX_TOKENS is blank or unparsable", () => {
    const blank = loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile, OPENAI_MAX_TOKENS: "", MAX_TOKENS: "50" })
    expect(blank.maxTokens).toBe(50)
    const garbled = loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile, OPENAI_MAX_TOKENS: "lots", MAX_TOKENS: "50" })
    expect(garbled.maxTokens).toBe(50)
  })

  it("treats a blank key as missing", () => {
    expect(loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile, OPENAI_API_KEY: "   " }).apiKey).toBeUndefined()
  })

  it("silently defaults an unparsable token ceiling", () => {
    const config = loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile, OPENAI_MAX_TOKENS: "lots" })
    expect(config.maxTokens).toBe(100)
  })

  it("layers the environment over the user config file", () => {
    writeFileSync(
      configFile,
      JSON.stringify({ model: "file-model", baseUrl: "http://localhost:1234/v1", maxTokens: 200, requestMode: "background" }),
    )
    const fromFile = loadAppConfig({ ASCIICHAT_USER_CONFIG: configFile })
    expect(fromFile).toMatchObject({
      model: "file-model",
      baseUrl: "http://localhost:1234/v1",
      maxTokens: 200,
      requestMode: "background",
    })

    const overridden = loadAppConfig({
      ASCIICHAT_USER_CONFIG: configFile,
      OPENAI_MODEL: "env-model",
      OPENAI_MAX_TOKENS: "oops",
      ASCIICHAT_REQUEST_MODE: "blocking",
    })
    expect(overridden).toMatchObject({ model: "env-model", maxTokens: 200, requestMode: "blocking" })
  })
})

describe("loadUserConfigSync", () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "asciichat-user-"))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it("ignores malformed files and fields", () => {
    const file = path.join(dir, "config.json")
    writeFileSync(file, "{ not json")
    expect(loadUserConfigSync({ ASCIICHAT_USER_CONFIG: file })).toEqual({})

    writeFileSync(file, JSON.stringify({ model: 7, maxTokens: -1, requestMode: "sometimes", baseUrl: " " }))
    expect(loadUserConfigSync({ ASCIICHAT_USER_CONFIG: file })).toEqual({
      model: undefined,
      baseUrl: undefined,
      maxTokens: undefined,
      requestMode: undefined,
    })
  })

  it("resolves the config path from the environment", () => {
    expect(getUserConfigPath({ ASCIICHAT_USER_CONFIG: "/tmp/custom.json" })).toBe(path.resolve("/tmp/custom.json"))
    expect(getUserConfigPath({})).toMatch(/\.asciichat[\\/]config\.json$/)
  })
})
