import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import * as Unit from "../src/Unit.js"
import { makeFantasyScenario, makeStandardSystem, makeTemperatureUnits } from "./fixtures.js"

describe("test fixtures", () => {
  it.effect("builds the SI mechanics system", () =>
    Effect.gen(function* () {
      const si = yield* makeStandardSystem()

      expect(si.name).toBe("SI")
      expect(si.units.map((unit) => unit.name)).toEqual([
        "kilogram",
        "metre",
        "second",
        "gram",
        "joule",
        "kilojoule",
        "hertz",
        "watt",
      ])
      expect(Unit.coherentDimensions(si)).toEqual(["mass", "length", "time"])
    }),
  )

  it.effect("builds the fantasy scenario", () =>
    Effect.gen(function* () {
      const scenario = yield* makeFantasyScenario()

      expect(scenario.realm.units).toHaveLength(5)
      expect(scenario.calibrations).toHaveLength(3)
      expect(scenario.transform.isInvertible).toBe(true)
      expect(scenario.units.greatMote.key).toBe("Fantasy:great mote")
    }),
  )

  it.effect("builds free-standing temperature units", () =>
    Effect.gen(function* () {
      const { kelvin, celsius } = yield* makeTemperatureUnits()

      expect(kelvin.key).toBe("kelvin")
      expect(kelvin.system).toBe("")
      expect(celsius.aliases).toEqual([])
    }),
  )
})
