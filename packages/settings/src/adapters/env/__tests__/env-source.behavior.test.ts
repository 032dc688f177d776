import { EnvSource } from "../env-source"
import { nestKeys } from "../nest-keys"

describe("EnvSource behavior", () => {
  it("returns every variable without a prefix", async () => {
    const source = new EnvSource({ env: { SEED: "43", VERBOSE: "yes" } })

    await expect(source.load()).resolves.toEqual({ SEED: "43", VERBOSE: "yes" })
  })

  it("filters by prefix and strips it", async () => {
    const source = new EnvSource({
      env: { STRATA_SEED: "43", PATH: "/usr/bin" },
      prefix: "STRATA_",
    })

    await expect(source.load()).resolves.toEqual({ SEED: "43" })
  })

  it("drops undefined values", async () => {
    const source = new EnvSource({ env: { SEED: undefined, VERBOSE: "yes" } })

    await expect(source.load()).resolves.toEqual({ VERBOSE: "yes" })
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("STRATA_TEST_SEED", "43")

    try {
      const source = new EnvSource({ prefix: "STRATA_TEST_" })

      await expect(source.load()).resolves.toEqual({ SEED: "43" })
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("is named env and infers types", () => {
    const source = new EnvSource({ env: {} })

    expect(source.name).toBe("env")
    expect(source.format).toBe("env")
    expect(source.inferTypes).toBe(true)
  })
})

describe("nestKeys", () => {
  it("keeps keys flat without a divider", () => {
    expect(nestKeys({ a__b: "1" })).toEqual({ a__b: "1" })
  })

  it("nests on the first divider only", () => {
    expect(nestKeys({ a__b__c: "1", a__d: "2" }, "__")).toEqual({ a: { b__c: "1", d: "2" } })
  })

  it("keeps keys that start with the divider flat", () => {
    expect(nestKeys({ __a: "1" }, "__")).toEqual({ __a: "1" })
  })

  it("never lets a scalar replace a section", () => {
    expect(nestKeys({ a__b: "1", a: "2" }, "__")).toEqual({ a: { b: "1" } })
    expect(nestKeys({ a: "2", a__b: "1" }, "__")).toEqual({ a: { b: "1" } })
  })
})
