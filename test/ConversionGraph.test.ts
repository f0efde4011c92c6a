import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import * as BasisTransform from "../src/BasisTransform.js"
import * as ConversionGraph from "../src/ConversionGraph.js"
import * as ConversionMap from "../src/ConversionMap.js"
import * as Dimension from "../src/Dimension.js"
import {
  DimensionMismatchError,
  DuplicateEdgeError,
  IncompatibleDimensionsError,
  InexactScaleError,
  MissingCalibrationError,
  NoConversionPathError,
  NonInvertibleTransformError,
  NonLinearCalibrationError,
} from "../src/Errors.js"
import * as Rational from "../src/Rational.js"
import * as Unit from "../src/Unit.js"
import { makeFantasyScenario, makeStandardSystem, makeTemperatureUnits } from "./fixtures.js"

const lengthUnit = (name: string) =>
  Effect.flatMap(Dimension.base(Dimension.STANDARD, "length"), (dimension) => Unit.makeUnit({ name, dimension }))

const makeLengths = () =>
  Effect.gen(function* () {
    const si = yield* makeStandardSystem()
    return {
      metre: yield* Unit.lookup(si, "metre"),
      second: yield* Unit.lookup(si, "second"),
      foot: yield* lengthUnit("foot"),
    }
  })

const keys = (units: ReadonlyArray<Unit.Unit>) => units.map((unit) => unit.key)

describe("ConversionGraph", () => {
  describe("addEdge", () => {
    it.effect("registers a map and its inverse", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const graph = yield* ConversionGraph.addEdge(ConversionGraph.empty, foot, metre, ConversionMap.linear("0.3048"))

        expect(ConversionGraph.edges(graph)).toHaveLength(1)
        expect(keys(ConversionGraph.units(graph))).toEqual(["foot", "SI:metre"])
        expect(ConversionGraph.hasEdge(graph, metre, foot)).toBe(true)

        const toMetres = yield* ConversionGraph.convert(graph, foot, metre)
        expect(toMetres).toEqual(ConversionMap.linear("0.3048"))
        expect(yield* ConversionGraph.convertValue(graph, 10, foot, metre)).toBeCloseTo(3.048, 12)

        const toFeet = yield* ConversionGraph.convert(graph, metre, foot)
        expect(Rational.format(toFeet.scale)).toBe("1250/381")
      }),
    )

    it.effect("does not modify the graph it was given", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const graph = yield* ConversionGraph.addEdge(ConversionGraph.empty, foot, metre, ConversionMap.linear("0.3048"))

        expect(ConversionGraph.units(ConversionGraph.empty)).toHaveLength(0)
        expect(ConversionGraph.edges(ConversionGraph.empty)).toHaveLength(0)
        expect(ConversionGraph.edges(graph)).toHaveLength(1)
      }),
    )

    it.effect("refuses to link different dimensions", () =>
      Effect.gen(function* () {
        const { metre, second } = yield* makeLengths()
        const error = yield* ConversionGraph.addEdge(ConversionGraph.empty, metre, second, ConversionMap.identity).pipe(
          Effect.flip,
        )

        expect(error).toBeInstanceOf(IncompatibleDimensionsError)
        expect(error.message).toBe("Cannot link SI:metre [length] to SI:second [time]")
      }),
    )

    it.effect("refuses maps that cannot be inverted", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const error = yield* ConversionGraph.addEdge(ConversionGraph.empty, foot, metre, ConversionMap.linear(0)).pipe(
          Effect.flip,
        )

        expect(error._tag).toBe("NonInvertibleMapError")
      }),
    )

    it.effect("treats re-registering the same map as a no-op", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const once = yield* ConversionGraph.addEdge(ConversionGraph.empty, foot, metre, ConversionMap.linear("0.3048"))
        const twice = yield* ConversionGraph.addEdge(once, foot, metre, ConversionMap.linear("0.3048"))
        const reversed = yield* ConversionGraph.addEdge(twice, metre, foot, ConversionMap.linear("1250/381"))

        expect(ConversionGraph.edges(reversed)).toHaveLength(1)
      }),
    )

    it.effect("refuses a conflicting map for a registered pair", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const graph = yield* ConversionGraph.addEdge(ConversionGraph.empty, foot, metre, ConversionMap.linear("0.3048"))
        const error = yield* ConversionGraph.addEdge(graph, foot, metre, ConversionMap.linear("0.3")).pipe(Effect.flip)

        expect(error).toBeInstanceOf(DuplicateEdgeError)
        expect(error.message).toBe("Edge foot -> SI:metre already maps ×381/1250, refusing ×3/10")
      }),
    )

    it.effect("refuses direct edges that contradict the unit scales", () =>
      Effect.gen(function* () {
        const si = yield* makeStandardSystem()
        const gram = yield* Unit.lookup(si, "gram")
        const kilogram = yield* Unit.lookup(si, "kilogram")

        const error = yield* ConversionGraph.addEdge(ConversionGraph.empty, gram, kilogram, ConversionMap.linear(5)).pipe(
          Effect.flip,
        )
        expect(error).toBeInstanceOf(DuplicateEdgeError)
        expect(error.message).toBe("Edge SI:gram -> SI:kilogram already maps ×1/1000, refusing ×5")

        const agreeing = yield* ConversionGraph.addEdge(ConversionGraph.empty, gram, kilogram, ConversionMap.linear("1/1000"))
        expect(ConversionGraph.edges(agreeing)).toHaveLength(0)
        expect(keys(ConversionGraph.units(agreeing))).toEqual(["SI:gram", "SI:kilogram"])
      }),
    )

    it.effect("refuses a unit key reused with another scale", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const graph = yield* ConversionGraph.addUnit(ConversionGraph.empty, foot)
        const impostor = { ...foot, scale: Rational.from(2) }
        const error = yield* ConversionGraph.addEdge(graph, impostor, metre, ConversionMap.identity).pipe(Effect.flip)

        expect(error._tag).toBe("DuplicateUnitNameError")
        expect(keys(ConversionGraph.units(yield* ConversionGraph.addUnit(graph, foot)))).toEqual(["foot"])
      }),
    )
  })

  describe("convert", () => {
    it.effect("converts both ways across a single edge", () =>
      Effect.gen(function* () {
        const si = yield* makeStandardSystem()
        const joule = yield* Unit.lookup(si, "joule")
        const mote = yield* Unit.makeUnit({ name: "mote", dimension: joule.dimension })
        const graph = yield* ConversionGraph.addEdge(ConversionGraph.empty, mote, joule, ConversionMap.linear(42))

        expect(yield* ConversionGraph.convertValue(graph, 10, mote, joule)).toBe(420)
        const back = yield* ConversionGraph.convert(graph, joule, mote)
        expect(Rational.format(ConversionMap.applyExact(back, Rational.from(420)))).toBe("10")
      }),
    )

    it.effect("links units of one system by their scales", () =>
      Effect.gen(function* () {
        const si = yield* makeStandardSystem()
        const kilogram = yield* Unit.lookup(si, "kilogram")
        const gram = yield* Unit.lookup(si, "gram")
        const metre = yield* Unit.lookup(si, "metre")
        const graph = yield* ConversionGraph.addUnit(ConversionGraph.empty, kilogram).pipe(
          Effect.flatMap((g) => ConversionGraph.addUnit(g, gram)),
          Effect.flatMap((g) => ConversionGraph.addUnit(g, metre)),
        )

        expect(yield* ConversionGraph.convert(graph, gram, kilogram)).toEqual(ConversionMap.linear("1/1000"))
        expect(yield* ConversionGraph.convertValue(graph, 3, kilogram, gram)).toBe(3000)
        expect(ConversionGraph.hasEdge(graph, gram, kilogram)).toBe(true)
        expect(ConversionGraph.hasEdge(graph, gram, metre)).toBe(false)
        expect(ConversionGraph.edges(graph)).toHaveLength(0)
      }),
    )

    it.effect("does not link free-standing units by their scales", () =>
      Effect.gen(function* () {
        const foot = yield* lengthUnit("foot")
        const yard = yield* Effect.flatMap(Dimension.base(Dimension.STANDARD, "length"), (dimension) =>
          Unit.makeUnit({ name: "yard", dimension, scale: 3 }),
        )
        const graph = yield* ConversionGraph.addUnit(ConversionGraph.empty, foot).pipe(
          Effect.flatMap((g) => ConversionGraph.addUnit(g, yard)),
        )

        expect(ConversionGraph.hasEdge(graph, foot, yard)).toBe(false)
      }),
    )

    it.effect("returns the identity for the same unit", () =>
      Effect.gen(function* () {
        const { metre } = yield* makeLengths()
        const map = yield* ConversionGraph.convert(ConversionGraph.empty, metre, metre)

        expect(ConversionMap.isIdentity(map)).toBe(true)
      }),
    )

    it.effect("composes affine maps along a path", () =>
      Effect.gen(function* () {
        const { kelvin, celsius, fahrenheit } = yield* makeTemperatureUnits()
        const graph = yield* ConversionGraph.addEdge(
          ConversionGraph.empty,
          kelvin,
          celsius,
          ConversionMap.affine(1, "-273.15"),
        ).pipe(Effect.flatMap((g) => ConversionGraph.addEdge(g, celsius, fahrenheit, ConversionMap.affine("9/5", 32))))

        const forward = yield* ConversionGraph.convert(graph, kelvin, fahrenheit)
        expect(Rational.format(ConversionMap.applyExact(forward, Rational.from(300)))).toBe("8033/100")

        const backward = yield* ConversionGraph.convert(graph, fahrenheit, kelvin)
        expect(Rational.format(backward.scale)).toBe("5/9")
        expect(Rational.format(backward.offset)).toBe("45967/180")
        expect(Rational.format(ConversionMap.applyExact(backward, Rational.from(32)))).toBe("5463/20")
      }),
    )

    it.effect("fails when the dimensions differ", () =>
      Effect.gen(function* () {
        const { metre, second } = yield* makeLengths()
        const error = yield* ConversionGraph.convert(ConversionGraph.empty, metre, second).pipe(Effect.flip)

        expect(error).toBeInstanceOf(DimensionMismatchError)
        expect(error.message).toBe("Cannot convert SI:metre [length] to SI:second [time]: dimensions do not match")
      }),
    )

    it.effect("does not take equal keys for the same unit when the definitions differ", () =>
      Effect.gen(function* () {
        const { metre } = yield* makeLengths()
        const time = yield* Dimension.base(Dimension.STANDARD, "time")
        const other = yield* Unit.makeUnitSystem({
          name: "SI",
          basis: Dimension.STANDARD,
          bases: { time: yield* Unit.makeUnit({ name: "metre", dimension: time }) },
        })
        const impostor = yield* Unit.lookup(other, "metre")
        expect(impostor.key).toBe(metre.key)

        const error = yield* ConversionGraph.convert(ConversionGraph.empty, metre, impostor).pipe(Effect.flip)
        expect(error).toBeInstanceOf(DimensionMismatchError)
      }),
    )

    it.effect("fails for units the graph does not know", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const error = yield* ConversionGraph.convert(ConversionGraph.empty, foot, metre).pipe(Effect.flip)

        expect(error).toBeInstanceOf(NoConversionPathError)
        expect(error.message).toBe("No conversion from foot to SI:metre: foot is not in the graph")
      }),
    )

    it.effect("fails for disconnected units", () =>
      Effect.gen(function* () {
        const { metre, foot } = yield* makeLengths()
        const league = yield* lengthUnit("league")
        const yard = yield* lengthUnit("yard")
        const graph = yield* ConversionGraph.addEdge(ConversionGraph.empty, foot, metre, ConversionMap.linear("0.3048")).pipe(
          Effect.flatMap((g) => ConversionGraph.addEdge(g, league, yard, ConversionMap.linear(5280))),
        )

        const error = yield* ConversionGraph.convert(graph, foot, yard).pipe(Effect.flip)
        expect(error._tag).toBe("NoConversionPathError")
        if (error._tag === "NoConversionPathError") {
          expect(error.reason).toBe("units are not connected")
        }
      }),
    )

    describe("path selection", () => {
      const makeDiamond = (order: "b-first" | "c-first") =>
        Effect.gen(function* () {
          const a = yield* lengthUnit("a")
          const b = yield* lengthUnit("b")
          const c = yield* lengthUnit("c")
          const d = yield* lengthUnit("d")
          const viaB = [
            [a, b, 2],
            [b, d, 3],
          ] as const
          const viaC = [
            [a, c, 5],
            [c, d, 7],
          ] as const
          const ordered = order === "b-first" ? [...viaB, ...viaC] : [...viaC, ...viaB]
          const graph = yield* Effect.reduce(ordered, ConversionGraph.empty, (g, [src, dst, scale]) =>
            ConversionGraph.addEdge(g, src, dst, ConversionMap.linear(scale)),
          )
          return { graph, a, b, c, d }
        })

      it.effect("breaks ties between equally short paths by insertion order", () =>
        Effect.gen(function* () {
          const first = yield* makeDiamond("b-first")
          const viaB = yield* ConversionGraph.resolve(first.graph, first.a, first.d)
          expect(keys(viaB.units)).toEqual(["a", "b", "d"])
          expect(Rational.format(viaB.map.scale)).toBe("6")

          const second = yield* makeDiamond("c-first")
          const viaC = yield* ConversionGraph.resolve(second.graph, second.a, second.d)
          expect(keys(viaC.units)).toEqual(["a", "c", "d"])
          expect(Rational.format(viaC.map.scale)).toBe("35")
        }),
      )

      it.effect("prefers the path with fewer edges", () =>
        Effect.gen(function* () {
          const { graph, a, d } = yield* makeDiamond("b-first")
          const shortcut = yield* ConversionGraph.addEdge(graph, a, d, ConversionMap.linear(10))
          const path = yield* ConversionGraph.resolve(shortcut, a, d)

          expect(keys(path.units)).toEqual(["a", "d"])
          expect(Rational.format(path.map.scale)).toBe("10")
        }),
      )

      it.effect("gives up on paths longer than the limit", () =>
        Effect.gen(function* () {
          const { graph, a, d } = yield* makeDiamond("b-first")
          const error = yield* ConversionGraph.convert(graph, a, d, { maxPathLength: 1 }).pipe(Effect.flip)

          expect(error._tag).toBe("NoConversionPathError")
          if (error._tag === "NoConversionPathError") {
            expect(error.reason).toBe("no path within 1 edges")
          }
          expect(Rational.format((yield* ConversionGraph.convert(graph, a, d, { maxPathLength: 2 })).scale)).toBe("6")
        }),
      )
    })
  })

  describe("connectSystems", () => {
    it.effect("derives edges between composite units", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)

        expect(yield* ConversionGraph.convertValue(graph, 10, units.mote, units.joule)).toBe(420)
        const back = yield* ConversionGraph.convert(graph, units.joule, units.mote)
        expect(Rational.format(ConversionMap.applyExact(back, Rational.from(420)))).toBe("10")

        const greatMote = yield* ConversionGraph.convert(graph, units.greatMote, units.kilojoule)
        expect(greatMote).toEqual(ConversionMap.linear("63/125"))
        expect(ConversionMap.apply(greatMote, 1)).toBeCloseTo(0.504, 12)

        expect(yield* ConversionGraph.convert(graph, units.flux, units.watt)).toEqual(ConversionMap.linear(126))
        expect(yield* ConversionGraph.convert(graph, units.pulse, units.hertz)).toEqual(ConversionMap.linear(3))
        expect(ConversionMap.isIdentity(yield* ConversionGraph.convert(graph, units.grain, units.gram))).toBe(true)
        expect(Rational.format((yield* ConversionGraph.convert(graph, units.kilojoule, units.mote)).scale)).toBe("500/21")
      }),
    )

    it.effect("gives inverse maps in the two directions between connected units", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)
        const connected = ConversionGraph.units(graph)

        for (const a of connected) {
          for (const b of connected) {
            const there = yield* Effect.either(ConversionGraph.convert(graph, a, b))
            const back = yield* Effect.either(ConversionGraph.convert(graph, b, a))
            if (there._tag === "Right" && back._tag === "Right") {
              expect(ConversionMap.isIdentity(ConversionMap.compose(back.right, there.right))).toBe(true)
            } else {
              expect(there._tag).toBe(back._tag)
            }
          }
        }
        expect(ConversionMap.isIdentity(yield* ConversionGraph.convert(graph, units.watt, units.watt))).toBe(true)
      }),
    )

    it.effect("converts inside a system by the ratio of unit scales", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)
        const path = yield* ConversionGraph.resolve(graph, units.greatMote, units.mote)

        expect(keys(path.units)).toEqual(["Fantasy:great mote", "Fantasy:mote"])
        expect(path.map).toEqual(ConversionMap.linear(12))
        expect(ConversionGraph.hasEdge(graph, units.joule, units.kilojoule)).toBe(true)
      }),
    )

    it.effect("records the transform and tags the derived edges", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units, si } = yield* makeFantasyScenario()
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)

        const recorded = ConversionGraph.transforms(graph)
        expect(recorded.map(BasisTransform.format)).toEqual(["Fantasy -> SI", "SI -> Fantasy"])
        expect(recorded[1]?.source).toBe(si)

        const derived = ConversionGraph.edgesForTransform(graph, transform)
        expect(derived.map((edge) => `${edge.src.name} -> ${edge.dst.name} ${ConversionMap.format(edge.map)}`)).toEqual([
          "mote -> joule ×42",
          "pulse -> hertz ×3",
          "grain -> kilogram ×1/1000",
          "mote -> kilojoule ×21/500",
          "grain -> gram ×1",
          "great mote -> joule ×504",
          "great mote -> kilojoule ×63/125",
          "flux -> watt ×126",
        ])
        expect(ConversionGraph.edges(graph)).toHaveLength(8)
        expect(ConversionGraph.hasEdge(graph, units.flux, units.watt)).toBe(true)
        expect(ConversionGraph.hasEdge(graph, units.flux, units.joule)).toBe(false)
      }),
    )

    it.effect("still rejects conversions between unrelated dimensions", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)

        const error = yield* ConversionGraph.convert(graph, units.mote, units.hertz).pipe(Effect.flip)
        expect(error).toBeInstanceOf(DimensionMismatchError)
        expect(ConversionGraph.comparable(graph, units.mote.dimension, units.joule.dimension)).toBe(true)
        expect(ConversionGraph.comparable(graph, units.joule.dimension, units.mote.dimension)).toBe(true)
      }),
    )

    it.effect("stops looking for comparable dimensions when transforms never cycle back", () =>
      Effect.gen(function* () {
        const mass = yield* Dimension.base(Dimension.STANDARD, "mass")
        const here = yield* Unit.makeUnitSystem({
          name: "Here",
          basis: Dimension.STANDARD,
          bases: { mass: yield* Unit.makeUnit({ name: "kilogram", dimension: mass }) },
        })
        const base = yield* Unit.makeUnitSystem({
          name: "There",
          basis: Dimension.STANDARD,
          bases: { mass: yield* Unit.makeUnit({ name: "lump", dimension: mass }) },
        })
        const there = yield* Unit.defineUnits(base, [
          { name: "square lump", dimension: yield* Dimension.power(mass, 2) },
          { name: "tick", dimension: yield* Dimension.base(Dimension.STANDARD, "time") },
        ])
        const squaring = yield* BasisTransform.makeBasisTransform({
          source: here,
          target: there,
          sourceComponents: ["mass"],
          targetComponents: ["mass"],
          matrix: [[2]],
        })
        const kilogram = yield* Unit.lookup(here, "kilogram")
        const squareLump = yield* Unit.lookup(there, "square lump")
        const tick = yield* Unit.lookup(there, "tick")
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, squaring, [
          { src: kilogram, dst: squareLump, map: ConversionMap.linear(3) },
        ])

        expect(yield* ConversionGraph.convertValue(graph, 2, kilogram, squareLump)).toBe(6)
        expect(ConversionGraph.comparable(graph, kilogram.dimension, squareLump.dimension)).toBe(true)
        const error = yield* ConversionGraph.convert(graph, kilogram, tick).pipe(Effect.flip)
        expect(error).toBeInstanceOf(DimensionMismatchError)
      }),
    )

    it.effect("registers nothing when the transform is singular", () =>
      Effect.gen(function* () {
        const { realm, si, calibrations } = yield* makeFantasyScenario()
        const singular = yield* BasisTransform.makeBasisTransform({
          source: realm,
          target: si,
          sourceComponents: ["spark", "rhythm"],
          targetComponents: ["length", "time"],
          matrix: [
            [1, 2],
            [2, 4],
          ],
        })
        const error = yield* ConversionGraph.connectSystems(ConversionGraph.empty, singular, calibrations).pipe(
          Effect.flip,
        )

        expect(error).toBeInstanceOf(NonInvertibleTransformError)
        expect(error.message).toBe("Basis transform Fantasy -> SI is not invertible: determinant is zero")
      }),
    )

    it.effect("keeps the graph unchanged when a derived edge conflicts", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const graph = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)
        const conflicting = calibrations.map((calibration) =>
          calibration.src.key === units.pulse.key ? { ...calibration, map: ConversionMap.linear(4) } : calibration,
        )

        const error = yield* ConversionGraph.connectSystems(graph, transform, conflicting).pipe(Effect.flip)
        expect(error).toBeInstanceOf(DuplicateEdgeError)
        expect(ConversionGraph.edges(graph)).toHaveLength(8)
        expect(yield* ConversionGraph.convert(graph, units.pulse, units.hertz)).toEqual(ConversionMap.linear(3))
      }),
    )

    it.effect("accepts connecting the same systems twice", () =>
      Effect.gen(function* () {
        const { transform, calibrations } = yield* makeFantasyScenario()
        const once = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, calibrations)
        const twice = yield* ConversionGraph.connectSystems(once, transform, calibrations)

        expect(ConversionGraph.edges(twice)).toHaveLength(8)
        expect(ConversionGraph.transforms(twice)).toHaveLength(2)
      }),
    )

    it.effect("needs a calibration for every source component", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const partial = calibrations.filter((calibration) => calibration.src.key !== units.pulse.key)
        const error = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, partial).pipe(Effect.flip)

        expect(error).toBeInstanceOf(MissingCalibrationError)
        expect(error.message).toBe('Basis transform Fantasy -> SI has no calibration edge for "rhythm"')
      }),
    )

    it.effect("needs calibrations that match the transform", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const wrong = calibrations.map((calibration) =>
          calibration.src.key === units.pulse.key ? { ...calibration, dst: units.second } : calibration,
        )
        const error = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, wrong).pipe(Effect.flip)

        expect(error).toBeInstanceOf(IncompatibleDimensionsError)
        expect(error.message).toBe("Cannot link Fantasy:pulse [rhythm] to SI:second [time]")
      }),
    )

    it.effect("needs linear calibrations", () =>
      Effect.gen(function* () {
        const { transform, calibrations, units } = yield* makeFantasyScenario()
        const shifted = calibrations.map((calibration) =>
          calibration.src.key === units.mote.key ? { ...calibration, map: ConversionMap.affine(42, 1) } : calibration,
        )
        const error = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, shifted).pipe(Effect.flip)

        expect(error).toBeInstanceOf(NonLinearCalibrationError)
        expect(error.message).toBe("Affine map ×42 + 1 cannot be raised to the exponents of spark")
      }),
    )

    it.effect("fails when a fractional exponent gives an irrational scale", () =>
      Effect.gen(function* () {
        const scenario = yield* makeFantasyScenario()
        const [realm] = yield* Unit.defineUnit(scenario.realm, {
          name: "root mote",
          dimension: yield* Dimension.fromRecord(scenario.realm.basis, { spark: "1/2" }),
        })
        const [si] = yield* Unit.defineUnit(scenario.si, {
          name: "root joule",
          dimension: yield* Dimension.fromRecord(Dimension.STANDARD, { length: 1, mass: "1/2", time: -1 }),
        })
        const transform = yield* BasisTransform.makeBasisTransform({
          source: realm,
          target: si,
          sourceComponents: scenario.transform.sourceComponents,
          targetComponents: scenario.transform.targetComponents,
          matrix: scenario.transform.matrix,
        })

        const error = yield* ConversionGraph.connectSystems(ConversionGraph.empty, transform, scenario.calibrations).pipe(
          Effect.flip,
        )
        expect(error).toBeInstanceOf(InexactScaleError)
        expect(error.message).toBe("Scale 42 raised to 1/2 is not rational")
      }),
    )
  })
})
