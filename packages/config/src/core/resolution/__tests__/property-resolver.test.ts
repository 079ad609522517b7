import { MemoryMonitor } from "../../../adapters/memory/memory-monitor"
import { Problems } from "../../problems/problems"
import { toPropertyMap } from "../../properties"
import { PropertyResolver, type ResolvableAttribute } from "../property-resolver"

const port: ResolvableAttribute = { propertyName: "port", deprecatedNames: ["old-port"] }
const host: ResolvableAttribute = {
  propertyName: "host",
  deprecatedNames: ["hostname", "server-name"],
}

function setup(properties: Record<string, string>) {
  const used = new Set<string>()
  const resolver = new PropertyResolver(toPropertyMap(properties), used)
  const problems = new Problems(new MemoryMonitor())

  return { resolver, problems, used }
}

describe("PropertyResolver", () => {
  it("resolves the canonical key under the prefix", () => {
    const { resolver, problems } = setup({ "server.port": "8080" })

    expect(resolver.resolve(port, "server.", problems)).toEqual({
      key: "server.port",
      value: "8080",
    })
    expect(problems.all()).toEqual([])
  })

  it("returns undefined when no key has a value", () => {
    const { resolver, problems } = setup({ port: "8080" })

    expect(resolver.resolve(port, "server.", problems)).toBeUndefined()
    expect(problems.all()).toEqual([])
  })

  it("never looks up attributes without a property name", () => {
    const { resolver, problems, used } = setup({ label: "x" })

    expect(resolver.resolve({ propertyName: undefined, deprecatedNames: [] }, "", problems))
      .toBeUndefined()
    expect(used.size).toBe(0)
  })

  it("falls back to a deprecated name with a warning", () => {
    const { resolver, problems } = setup({ "server.old-port": "8080" })

    expect(resolver.resolve(port, "server.", problems)).toEqual({
      key: "server.old-port",
      value: "8080",
    })
    expect(problems.warnings().map((p) => p.message)).toEqual([
      "Configuration property 'server.old-port' has been deprecated. Use 'server.port' instead.",
    ])
    expect(problems.hasErrors()).toBe(false)
  })

  it("accepts a deprecated name that repeats the canonical value", () => {
    const { resolver, problems } = setup({ port: "8080", "old-port": "8080" })

    expect(resolver.resolve(port, "", problems)).toEqual({ key: "port", value: "8080" })
    expect(problems.warnings()).toHaveLength(1)
    expect(problems.hasErrors()).toBe(false)
  })

  it("records a conflict when a deprecated value differs", () => {
    const { resolver, problems } = setup({ port: "8080", "old-port": "9090" })

    expect(resolver.resolve(port, "", problems)).toBeUndefined()
    expect(problems.all()).toEqual([
      {
        severity: "warning",
        kind: "deprecation",
        message: "Configuration property 'old-port' has been deprecated. Use 'port' instead.",
      },
      {
        severity: "error",
        kind: "conflict",
        message: "Value for property 'old-port' (=9090) conflicts with property 'port' (=8080)",
      },
    ])
  })

  it("uses the first deprecated name with a value as operative", () => {
    const { resolver, problems } = setup({ hostname: "a.test", "server-name": "b.test" })

    expect(resolver.resolve(host, "", problems)).toBeUndefined()
    expect(problems.errors().map((p) => p.message)).toEqual([
      "Value for property 'server-name' (=b.test) conflicts with property 'hostname' (=a.test)",
    ])
    expect(problems.warnings()).toHaveLength(2)
  })

  it("treats an empty string as a value", () => {
    const { resolver, problems } = setup({ port: "" })

    expect(resolver.resolve(port, "", problems)).toEqual({ key: "port", value: "" })
  })

  it("ignores errors recorded before the call", () => {
    const { resolver, problems } = setup({ port: "8080" })

    problems.addError("coercion", "earlier attribute")

    expect(resolver.resolve(port, "", problems)).toEqual({ key: "port", value: "8080" })
  })

  it("marks every key it finds as used", () => {
    const { resolver, problems, used } = setup({
      port: "8080",
      "old-port": "8080",
      other: "x",
    })

    resolver.resolve(port, "", problems)

    expect([...used].sort()).toEqual(["old-port", "port"])
  })

  it("does not read inherited object keys", () => {
    const { resolver, problems } = setup({})

    expect(
      resolver.resolve({ propertyName: "toString", deprecatedNames: [] }, "", problems),
    ).toBeUndefined()
  })
})
