import { catchError } from "../../__tests__/catch-error"
import { Config } from "../../config"
import { findMissingKeys, validateRequiredKeys } from "../validate-required-keys"

describe("findMissingKeys", () => {
  const config = new Config({ db: { host: "localhost", ports: [5432] }, name: "svc" })

  it("returns nothing when every key is present", () => {
    expect(findMissingKeys(config, ["name", ".db.host", ["db", "ports", 0]])).toEqual([])
  })

  it("returns every missing key in order", () => {
    expect(findMissingKeys(config, [".db.user", "name", ["db", "ports", 1]])).toEqual([
      ".db.user",
      ["db", "ports", 1],
    ])
  })
})

describe("validateRequiredKeys", () => {
  it("passes a complete config", () => {
    const config = new Config({ x: 1, y: 2 })

    expect(() => validateRequiredKeys(config, { kind: "widget", requiredKeys: ["x", "y"] })).not.toThrow()
  })

  it("passes when no keys are required", () => {
    expect(() => validateRequiredKeys(new Config(), { kind: "widget" })).not.toThrow()
  })

  it("names the kind and the missing keys", () => {
    const err = catchError(() =>
      validateRequiredKeys(new Config({ x: 1 }), { kind: "widget", requiredKeys: ["x", "y", ".z.w"] }),
    )

    expect(err).toMatchObject({
      code: "missing_required_keys",
      message: "Missing required keys for widget: y, .z.w",
      context: { kind: "widget", missing: ["y", ".z.w"] },
    })
  })
})
