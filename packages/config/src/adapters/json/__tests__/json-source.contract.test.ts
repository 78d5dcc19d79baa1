import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { JsonSource } from "../json-source"

describeConfigSourceContract({
  name: "JsonSource",
  setup: async (cwd) => {
    await fs.writeFile(
      path.join(cwd, "gantry.json"),
      JSON.stringify({ log_level: "debug", instances: { voron: { config_path: "voron.cfg" } } }),
    )
  },
  make: (cwd) => new JsonSource({ file: "gantry.json", required: true, cwd }),
  expectedValue: () => ({ log_level: "debug", instances: { voron: { config_path: "voron.cfg" } } }),
})
