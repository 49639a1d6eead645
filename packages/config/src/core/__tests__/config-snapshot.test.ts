import { ConfigSnapshot, createConfigSource } from "../config-snapshot"
import { InvalidPropertyNameError } from "../errors"
import { PropertyName } from "../property-name"

describe("ConfigSnapshot", () => {
  const source = new ConfigSnapshot([
    { key: "app.name", value: "demo", origin: "env" },
    { key: "app.pool.max-size", value: "10", origin: "properties:app.properties" },
    { key: "other.flag", value: "true", origin: "env" },
  ])

  it("looks keys up with relaxed names", () => {
    expect(source.get("app.pool.max-size")).toBe("10")
    expect(source.get("app.pool.maxSize")).toBe("10")
    expect(source.get("APP.POOL.MAX_SIZE")).toBe("10")
    expect(source.has("app.pool.maxsize")).toBe(true)
  })

  it("returns undefined for missing or unparseable keys", () => {
    expect(source.get("app.missing")).toBeUndefined()
    expect(source.get("app..name")).toBeUndefined()
    expect(source.has("app..name")).toBe(false)
  })

  it("explains where a value came from", () => {
    expect(source.origin("app.pool.maxSize")).toBe("properties:app.properties")
    expect(source.origin("app.name")).toBe("env")
    expect(source.origin("app.missing")).toBeUndefined()
  })

  it("lists the sources used, in order of first use", () => {
    expect(source.sourcesUsed()).toEqual(["env", "properties:app.properties"])
  })

  it("keeps insertion order and original keys", () => {
    expect(source.keys()).toEqual(["app.name", "app.pool.max-size", "other.flag"])
    expect(source.size).toBe(3)
  })

  it("finds descendants of a name", () => {
    const keys = source.descendants(PropertyName.parse("app")).map((entry) => entry.key)

    expect(keys).toEqual(["app.name", "app.pool.max-size"])
  })

  it("lets a later entry with the same canonical name win", () => {
    const merged = new ConfigSnapshot([
      { key: "app.max-size", value: "1", origin: "a" },
      { key: "app.port", value: "80", origin: "a" },
      { key: "app.maxsize", value: "2", origin: "b" },
    ])

    expect(merged.size).toBe(2)
    expect(merged.get("app.maxSize")).toBe("2")
    expect(merged.origin("app.max-size")).toBe("b")
    expect(merged.keys()).toEqual(["app.port", "app.maxsize"])
  })

  it("exposes frozen entries", () => {
    const [entry] = source.entries()

    expect(Object.isFrozen(entry)).toBe(true)
  })

  it("throws for invalid keys", () => {
    expect(() => new ConfigSnapshot([{ key: "a..b", value: "x" }])).toThrow(InvalidPropertyNameError)
  })
})

describe("createConfigSource", () => {
  it("builds a snapshot from a record", () => {
    const source = createConfigSource({ "a.b": "1" })

    expect(source.get("a.b")).toBe("1")
    expect(source.origin("a.b")).toBe("inline")
  })

  it("accepts an origin name", () => {
    expect(createConfigSource({ "a.b": "1" }, "test").origin("a.b")).toBe("test")
  })
})
