import { BaseError } from "@pipeconf/errors"
import { PinoLogger } from "../pino-logger"
import { captureDestination } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("emits JSON with message, bindings and meta", () => {
    const { captured, destination } = captureDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { service: "pipeline" },
    )

    logger.info("configuration loaded", { fragment: "main.config" })

    expect(captured).toHaveLength(1)
    expect(captured[0]?.payload).toMatchObject({
      msg: "configuration loaded",
      service: "pipeline",
      fragment: "main.config",
    })
    expect(typeof captured[0]?.payload.time).toBe("number")
  })

  it("serializes err with its code and cause", () => {
    const { captured, destination } = captureDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    const err = new BaseError("fragment missing", {
      code: "missing_fragment",
      cause: new Error("ENOENT"),
    })

    logger.error("load failed", { err })

    const serialized = captured[0]?.payload.err

    expect(serialized).toMatchObject({
      type: "BaseError",
      message: "fragment missing",
      code: "missing_fragment",
      cause: { type: "Error", message: "ENOENT" },
    })
  })

  it("child() inherits the base sink and level", () => {
    const { captured, destination } = captureDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "engine" })
    const child = base.child({ profile: "incd" })

    child.info("ignored")
    child.warn("logged")

    expect(captured).toHaveLength(1)
    expect(captured[0]?.payload).toMatchObject({
      msg: "logged",
      module: "engine",
      profile: "incd",
    })
  })
})
