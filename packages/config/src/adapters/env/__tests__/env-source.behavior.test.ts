import { EnvSource, envNameToKey } from "../env-source"

describe("envNameToKey", () => {
  it("lower-cases and turns underscores into dots", () => {
    expect(envNameToKey("APP_DATASOURCE_URL")).toBe("app.datasource.url")
  })

  it("turns numeric elements into indexes", () => {
    expect(envNameToKey("SERVERS_0_HOST")).toBe("servers[0].host")
    expect(envNameToKey("APP_HOSTS_12")).toBe("app.hosts[12]")
  })

  it("rejects names with empty elements", () => {
    expect(envNameToKey("APP__PORT")).toBeUndefined()
    expect(envNameToKey("_")).toBeUndefined()
    expect(envNameToKey("PORT_")).toBeUndefined()
  })

  it("rejects names without letters or digits", () => {
    expect(envNameToKey("=::")).toBeUndefined()
  })
})

describe("EnvSource behavior", () => {
  it("maps every variable when no prefix", async () => {
    const env = {
      PORT: "3000",
      APP_HOST: "localhost",
      SERVERS_0_HOST: "a.example.test",
    }

    const source = new EnvSource({ env })
    const result = await source.load()

    expect(result).toEqual({
      port: "3000",
      "app.host": "localhost",
      "servers[0].host": "a.example.test",
    })
  })

  it("filters and strips prefix when provided", async () => {
    const env = {
      APP_PORT: "3000",
      APP_POOL_MAX_SIZE: "10",
      OTHER_KEY: "ignored",
      PATH: "/usr/bin",
    }

    const source = new EnvSource({ env, prefix: "APP_" })
    const result = await source.load()

    expect(result).toEqual({
      port: "3000",
      "pool.max.size": "10",
    })
  })

  it("skips variables that do not map to a property name", async () => {
    const source = new EnvSource({ env: { APP__PORT: "1", HOST: "localhost" } })

    expect(await source.load()).toEqual({ host: "localhost" })
  })

  it("uses injected env over process.env", async () => {
    const injected = { CUSTOM: "injected_value" }

    const source = new EnvSource({ env: injected })
    const result = await source.load()

    expect(result).toEqual({ custom: "injected_value" })
    expect(result).not.toHaveProperty("path")
  })
})
