import { describeProfileSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvProfileSource } from "../env-profile-source"

describeProfileSourceContract({
  name: "EnvProfileSource",
  make: async () => ({
    source: new EnvProfileSource({
      env: {
        MODELDECK_PROVIDER: "openai",
        MODELDECK_MODEL: "gpt-4",
        MODELDECK_API_KEY: "sk-env",
      },
    }),
  }),
  setup: async () => {},
  expectedValue: () => ({
    default_profile: "env-profile",
    profiles: {
      "env-profile": { provider: "openai", model: "gpt-4", api_key: "sk-env", params: {} },
    },
  }),
})
