import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  files: { ".env.shared": "# defaults\nTZ=UTC\nexport LOG_LEVEL='info'\n" },
  make: (cwd) => new DotenvSource({ id: "shared", file: ".env.shared", required: true, cwd }),
  expected: { TZ: "UTC", LOG_LEVEL: "info" },
})

describeConfigSourceContract({
  name: "DotenvSource (optional, absent)",
  files: {},
  make: (cwd) =>
    new DotenvSource({ id: "dev.local", file: ".env.dev.local", required: false, cwd }),
  expected: {},
})
