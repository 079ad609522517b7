import { describeConfig } from "../../core/definition/describe-config"
import { types } from "../../core/types"

export enum LogLevel {
  Debug = "debug",
  Info = "info",
  Warn = "warn",
}

export enum Priority {
  Low,
  High,
}

/**
 * Value type with a static `valueOf(string)` factory.
 */
export class Duration {
  constructor(
    readonly amount: number,
    readonly unit: "ms" | "s",
  ) {}

  get millis(): number {
    return this.unit === "s" ? this.amount * 1000 : this.amount
  }

  static valueOf(text: string): Duration {
    const match = /^(\d+)(ms|s)$/.exec(text)

    if (!match) throw new Error(`Invalid duration '${text}'`)

    return new Duration(Number(match[1]), match[2] === "s" ? "s" : "ms")
  }
}

/**
 * Value type built through its string constructor.
 */
export class HostName {
  readonly value: string

  constructor(value: string) {
    if (!/^[a-z0-9.-]+$/.test(value)) throw new Error(`Invalid host name '${value}'`)

    this.value = value
  }
}

export class ServerConfig {
  port = 80
  host = "localhost"
  secure = false
  logLevel = LogLevel.Info
  priority = Priority.Low
  timeout = new Duration(30, "s")
  maxBodyBytes = 1_048_576n
  ratio = 0.5
  label: string | undefined = "default-label"

  static readonly configuration = describeConfig<ServerConfig>()
    .attribute("port", {
      property: "port",
      deprecated: ["old-port"],
      type: types.int,
      set: (config, value) => {
        config.port = value
      },
    })
    .attribute("host", {
      property: "host",
      deprecated: ["hostname", "server-name"],
      type: types.string,
      set: (config, value) => {
        config.host = value
      },
    })
    .attribute("secure", {
      property: "secure",
      type: types.boolean,
      set: (config, value) => {
        config.secure = value
      },
    })
    .attribute("logLevel", {
      property: "log-level",
      type: types.enumOf("LogLevel", LogLevel),
      set: (config, value) => {
        config.logLevel = value
      },
    })
    .attribute("priority", {
      property: "priority",
      type: types.enumOf("Priority", Priority),
      set: (config, value) => {
        config.priority = value
      },
    })
    .attribute("timeout", {
      property: "timeout",
      type: types.classOf(Duration),
      set: (config, value) => {
        config.timeout = value
      },
    })
    .attribute("maxBodyBytes", {
      property: "max-body-bytes",
      type: types.long,
      set: (config, value) => {
        config.maxBodyBytes = value
      },
    })
    .attribute("ratio", {
      property: "ratio",
      type: types.double,
      set: (config, value) => {
        config.ratio = value
      },
    })
    .attribute("label", {
      type: types.string,
      set: (config, value) => {
        config.label = value
      },
    })
    .build()
}

/**
 * Only `port`, with the deprecated alias `old-port`.
 */
export class PortConfig {
  port = 80
  setterCalls = 0

  static readonly configuration = describeConfig<PortConfig>()
    .attribute("port", {
      property: "port",
      deprecated: ["old-port"],
      type: types.int,
      set: (config, value) => {
        config.setterCalls++
        config.port = value
      },
    })
    .build()
}
