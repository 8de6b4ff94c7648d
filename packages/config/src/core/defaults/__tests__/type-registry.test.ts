import { catchError } from "../../__tests__/catch-error"
import { TypeRegistry } from "../type-registry"

describe("TypeRegistry", () => {
  it("looks up registered types by exact name", () => {
    const registry = new TypeRegistry({ sqlite: { defaultConfigFile: "sqlite.yaml" } })

    expect(registry.lookup("sqlite")).toEqual({ defaultConfigFile: "sqlite.yaml" })
    expect(registry.has("sqlite")).toBe(true)
    expect(registry.has("SQLite")).toBe(false)
  })

  it("registers types fluently", () => {
    const registry = new TypeRegistry().register("a", {}).register("b", { containerKey: "items" })

    expect(registry.names()).toEqual(["a", "b"])
    expect(registry.lookup("b").containerKey).toBe("items")
  })

  it("replaces a type registered twice", () => {
    const registry = new TypeRegistry({ a: { defaultConfigFile: "one.yaml" } })

    registry.register("a", { defaultConfigFile: "two.yaml" })

    expect(registry.lookup("a").defaultConfigFile).toBe("two.yaml")
  })

  it("throws unknown_type for unregistered names", () => {
    expect(catchError(() => new TypeRegistry().lookup("ghost", "datastore"))).toMatchObject({
      code: "unknown_type",
      message: 'Unknown type "ghost" for datastore',
    })
  })
})
