import path from "node:path"
import { BUILTIN_DEFAULTS_DIR, CONFIG_PATH_ENV, createSearchContext } from "../search-context"

describe("createSearchContext", () => {
  it("orders explicit paths, then the environment, then the built-in directory", () => {
    const context = createSearchContext({
      searchPaths: ["/a", "/b"],
      env: { [CONFIG_PATH_ENV]: ["/c", "/d"].join(path.delimiter) },
      builtinDir: "/builtin",
    })

    expect(context.paths).toEqual(["/a", "/b", "/c", "/d", "/builtin"])
  })

  it("drops empty entries from the environment variable", () => {
    const context = createSearchContext({
      env: { [CONFIG_PATH_ENV]: `${path.delimiter}/c${path.delimiter}${path.delimiter}` },
      builtinDir: "/builtin",
    })

    expect(context.paths).toEqual(["/c", "/builtin"])
  })

  it("defaults to the package's defaults directory", () => {
    const context = createSearchContext({ env: {} })

    expect(context.paths).toEqual([BUILTIN_DEFAULTS_DIR])
    expect(path.basename(BUILTIN_DEFAULTS_DIR)).toBe("defaults")
    expect(path.basename(path.dirname(BUILTIN_DEFAULTS_DIR))).toBe("config")
  })

  it("reads the process environment when none is given", () => {
    vi.stubEnv(CONFIG_PATH_ENV, "/from/process")

    expect(createSearchContext({ builtinDir: "/builtin" }).paths).toEqual(["/from/process", "/builtin"])

    vi.unstubAllEnvs()
  })

  it("returns a frozen value", () => {
    const context = createSearchContext({ env: {} })

    expect(Object.isFrozen(context)).toBe(true)
    expect(Object.isFrozen(context.paths)).toBe(true)
  })
})
