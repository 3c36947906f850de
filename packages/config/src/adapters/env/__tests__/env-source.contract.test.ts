import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async () => ({
    source: new EnvSource({ env: { STORE_NAME: "orders" } }),
  }),
  setup: async () => {},
  expectedValue: () => ({ STORE_NAME: "orders" }),
})
