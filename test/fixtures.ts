import { Effect } from "effect"
import * as BasisTransform from "../src/BasisTransform.js"
import * as ConversionMap from "../src/ConversionMap.js"
import type { Calibration } from "../src/ConversionGraph.js"
import * as Dimension from "../src/Dimension.js"
import * as Unit from "../src/Unit.js"

/**
 * Three-component basis of an invented measurement tradition.
 */
export const FANTASY = Dimension.unsafeMakeBasis("fantasy", ["spark", "rhythm", "substance"])

/**
 * Rows `length, mass, time`; columns `spark, rhythm, substance`. Spark is
 * energy, rhythm is frequency, substance is mass. Determinant 2.
 */
export const FANTASY_TO_SI_MATRIX = [
  [2, 0, 0],
  [1, 0, 1],
  [-2, -1, 0],
] as const

const standard = (exponents: Readonly<Record<string, number>>) =>
  Dimension.fromRecord(Dimension.STANDARD, exponents)

const fantasy = (exponents: Readonly<Record<string, number>>) => Dimension.fromRecord(FANTASY, exponents)

/**
 * SI mechanics: kilogram, metre and second plus gram, joule, kilojoule, hertz
 * and watt.
 */
export const makeStandardSystem = () =>
  Effect.gen(function* () {
    const energy = yield* standard({ length: 2, mass: 1, time: -2 })
    const base = yield* Unit.makeUnitSystem({
      name: "SI",
      basis: Dimension.STANDARD,
      bases: {
        mass: yield* Unit.makeUnit({ name: "kilogram", aliases: ["kg"], dimension: yield* standard({ mass: 1 }) }),
        length: yield* Unit.makeUnit({ name: "metre", aliases: ["m"], dimension: yield* standard({ length: 1 }) }),
        time: yield* Unit.makeUnit({ name: "second", aliases: ["s"], dimension: yield* standard({ time: 1 }) }),
      },
    })
    return yield* Unit.defineUnits(base, [
      { name: "gram", aliases: ["g"], dimension: yield* standard({ mass: 1 }), scale: "1/1000" },
      { name: "joule", aliases: ["J"], dimension: energy },
      { name: "kilojoule", aliases: ["kJ"], dimension: energy, scale: 1000 },
      { name: "hertz", aliases: ["Hz"], dimension: yield* standard({ time: -1 }) },
      { name: "watt", aliases: ["W"], dimension: yield* standard({ length: 2, mass: 1, time: -3 }) },
    ])
  })

/**
 * Mote, pulse and grain as base units, plus the great mote (twelve motes) and
 * the flux (one mote per pulse period).
 */
export const makeFantasySystem = () =>
  Effect.gen(function* () {
    const base = yield* Unit.makeUnitSystem({
      name: "Fantasy",
      basis: FANTASY,
      bases: {
        spark: yield* Unit.makeUnit({ name: "mote", dimension: yield* fantasy({ spark: 1 }) }),
        rhythm: yield* Unit.makeUnit({ name: "pulse", dimension: yield* fantasy({ rhythm: 1 }) }),
        substance: yield* Unit.makeUnit({ name: "grain", dimension: yield* fantasy({ substance: 1 }) }),
      },
    })
    return yield* Unit.defineUnits(base, [
      { name: "great mote", dimension: yield* fantasy({ spark: 1 }), scale: 12 },
      { name: "flux", dimension: yield* fantasy({ spark: 1, rhythm: 1 }) },
    ])
  })

/**
 * Both systems, the transform between them, and one calibration per fantasy
 * base unit: a mote is 42 joules, a pulse 3 hertz, and 1000 grains make a
 * kilogram (given kilogram first, to exercise the reversed orientation).
 */
export const makeFantasyScenario = () =>
  Effect.gen(function* () {
    const si = yield* makeStandardSystem()
    const realm = yield* makeFantasySystem()
    const transform = yield* BasisTransform.makeBasisTransform({
      source: realm,
      target: si,
      sourceComponents: ["spark", "rhythm", "substance"],
      targetComponents: ["length", "mass", "time"],
      matrix: FANTASY_TO_SI_MATRIX,
    })
    const unit = (system: Unit.UnitSystem, name: string) => Unit.lookup(system, name)
    const units = {
      mote: yield* unit(realm, "mote"),
      pulse: yield* unit(realm, "pulse"),
      grain: yield* unit(realm, "grain"),
      greatMote: yield* unit(realm, "great mote"),
      flux: yield* unit(realm, "flux"),
      kilogram: yield* unit(si, "kilogram"),
      gram: yield* unit(si, "gram"),
      metre: yield* unit(si, "metre"),
      second: yield* unit(si, "second"),
      joule: yield* unit(si, "joule"),
      kilojoule: yield* unit(si, "kilojoule"),
      hertz: yield* unit(si, "hertz"),
      watt: yield* unit(si, "watt"),
    }
    const calibrations: ReadonlyArray<Calibration> = [
      { src: units.mote, dst: units.joule, map: ConversionMap.linear(42) },
      { src: units.pulse, dst: units.hertz, map: ConversionMap.linear(3) },
      { src: units.kilogram, dst: units.grain, map: ConversionMap.linear(1000) },
    ]
    return { si, realm, transform, units, calibrations }
  })

/**
 * Kelvin, celsius and fahrenheit outside any system.
 */
export const makeTemperatureUnits = () =>
  Effect.gen(function* () {
    const temperature = yield* standard({ temperature: 1 })
    return {
      kelvin: yield* Unit.makeUnit({ name: "kelvin", aliases: ["K"], dimension: temperature }),
      celsius: yield* Unit.makeUnit({ name: "celsius", dimension: temperature }),
      fahrenheit: yield* Unit.makeUnit({ name: "fahrenheit", dimension: temperature }),
    }
  })
