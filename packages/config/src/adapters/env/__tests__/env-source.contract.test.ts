import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  setup: async () => {},
  make: () => new EnvSource({ prefix: "GANTRY_", env: { GANTRY_LOG_LEVEL: "debug", HOME: "/root" } }),
  expectedValue: () => ({ LOG_LEVEL: "debug" }),
})
