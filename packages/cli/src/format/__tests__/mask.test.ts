import { type Profile, setEntry } from "@modeldeck/config"
import { describeEnvironment, dumpConfiguration, maskApiKey, maskProfile } from "../mask"

describe("maskApiKey", () => {
  it("masks any non-empty key", () => {
    expect(maskApiKey("sk-real")).toBe("sk-***")
    expect(maskApiKey("x")).toBe("sk-***")
  })

  it("shows an empty or missing key as null", () => {
    expect(maskApiKey("")).toBeNull()
    expect(maskApiKey(undefined)).toBeNull()
  })
})

describe("maskProfile", () => {
  it("replaces only the api key", () => {
    const profile = { provider: "openai", model: "gpt-4", api_key: "sk-1", params: { n: 1 } }

    expect(maskProfile(profile)).toEqual({
      provider: "openai",
      model: "gpt-4",
      api_key: "sk-***",
      params: { n: 1 },
    })
    expect(profile.api_key).toBe("sk-1")
  })
})

describe("dumpConfiguration", () => {
  it("reports an empty document", () => {
    expect(dumpConfiguration({ default_profile: null, profiles: {} })).toBe(
      "No configuration found.\n",
    )
  })

  it("still dumps a document with only a default set", () => {
    expect(dumpConfiguration({ default_profile: "p1", profiles: {} })).toBe(
      "default_profile: p1\nprofiles: {}\n",
    )
  })

  it("masks a profile whose name shadows an object builtin", () => {
    const profiles: Record<string, Profile> = {}
    setEntry(profiles, "__proto__", { provider: "openai", model: "gpt-4", api_key: "sk-1", params: {} })

    expect(dumpConfiguration({ default_profile: "__proto__", profiles })).toBe(
      [
        "default_profile: __proto__",
        "profiles:",
        "  __proto__:",
        "    provider: openai",
        "    model: gpt-4",
        "    api_key: sk-***",
        "    params: {}",
        "",
      ].join("\n"),
    )
  })
})

describe("describeEnvironment", () => {
  it("keeps prefixed variables, sorted, masking api keys", () => {
    const env = {
      MODELDECK_MODEL: "gpt-4",
      MODELDECK_API_KEY: "test-secret",
      MODELDECK_UNSET: undefined,
      HOME: "/home/tester",
    }

    expect(describeEnvironment(env, "MODELDECK_")).toEqual([
      "MODELDECK_API_KEY=sk-***",
      "MODELDECK_MODEL=gpt-4",
    ])
  })
})
