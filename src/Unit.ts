/**
 * Units and unit systems.
 *
 * A unit is a named, optionally aliased scale for one dimension. Its `scale`
 * anchors it to the coherent unit of its system for that dimension, i.e. the
 * product of the system's base units raised to the dimension's exponents: in a
 * system with base units gram, centimetre and second, `erg` has scale 1 and
 * `kilogram` has scale 1000.
 *
 * A unit system assigns one base unit to each base dimension it supports and
 * keeps an explicit catalog of every unit it defines, keyed by name and alias.
 * Lookups go through that catalog only; systems are immutable and extending one
 * returns a new system.
 *
 * @since 0.1.0
 */

import { Effect, Option, ParseResult, Schema } from "effect"
import * as Dimension from "./Dimension.js"
import {
  DuplicateUnitNameError,
  InvalidBaseUnitError,
  InvalidUnitError,
  ShapeMismatchError,
  UnitNotFoundError,
} from "./Errors.js"
import * as Rational from "./Rational.js"
import { KEY_SEPARATOR, type UnitKey, makeUnitKey } from "./Types.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface Unit {
  readonly key: UnitKey
  readonly name: string
  readonly aliases: ReadonlyArray<string>
  readonly system: string
  readonly dimension: Dimension.Dimension
  readonly scale: Rational.Rational
  readonly isBase: boolean
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitSystem {
  readonly name: string
  readonly basis: Dimension.Basis
  /** Base unit per basis component, in declaration order. */
  readonly bases: ReadonlyMap<string, Unit>
  /** Every unit of the system, in definition order. */
  readonly units: ReadonlyArray<Unit>
  /** Names and aliases resolved to units. */
  readonly catalog: ReadonlyMap<string, Unit>
}

/**
 * Shape of a unit name and its aliases.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const UnitNames = Schema.Struct({
  name: Schema.NonEmptyTrimmedString.pipe(
    Schema.filter((name) => !name.includes(KEY_SEPARATOR) || `must not contain "${KEY_SEPARATOR}"`),
  ),
  aliases: Schema.Array(Schema.NonEmptyTrimmedString),
})

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitSpec {
  readonly name: string
  readonly aliases?: ReadonlyArray<string>
  readonly dimension: Dimension.Dimension
  /** Size relative to the coherent unit for the dimension, default 1. */
  readonly scale?: Rational.RationalInput
}

const decodeNames = Schema.decodeUnknown(UnitNames)

const validateSpec = (
  spec: UnitSpec,
): Effect.Effect<Omit<Unit, "key" | "system" | "isBase">, InvalidUnitError> =>
  Effect.gen(function* () {
    const names = yield* decodeNames({ name: spec.name, aliases: spec.aliases ?? [] }).pipe(
      Effect.mapError(
        (error) =>
          new InvalidUnitError({ name: spec.name, reason: ParseResult.TreeFormatter.formatErrorSync(error) }),
      ),
    )
    const seen = new Set([names.name])
    for (const alias of names.aliases) {
      if (seen.has(alias)) {
        return yield* Effect.fail(
          new InvalidUnitError({ name: names.name, reason: `alias "${alias}" repeats a name or alias` }),
        )
      }
      seen.add(alias)
    }
    const scale = yield* Effect.try({
      try: () => Rational.from(spec.scale ?? Rational.one),
      catch: (error) =>
        new InvalidUnitError({
          name: names.name,
          reason: error instanceof Error ? error.message : String(error),
        }),
    })
    if (!Rational.isPositive(scale)) {
      return yield* Effect.fail(
        new InvalidUnitError({ name: names.name, reason: `scale ${Rational.format(scale)} must be positive` }),
      )
    }
    return { name: names.name, aliases: names.aliases, dimension: spec.dimension, scale }
  })

/**
 * A unit outside any system. Its key is its bare name.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnit = (spec: UnitSpec): Effect.Effect<Unit, InvalidUnitError> =>
  Effect.map(validateSpec(spec), (unit) => ({
    ...unit,
    key: makeUnitKey("", unit.name),
    system: "",
    isBase: false,
  }))

const namesOf = (unit: Pick<Unit, "name" | "aliases">): ReadonlyArray<string> => [unit.name, ...unit.aliases]

const adopt = (system: string, unit: Unit, isBase: boolean): Unit => ({
  ...unit,
  key: makeUnitKey(system, unit.name),
  system,
  isBase,
})

const register = (
  systemName: string,
  catalog: Map<string, Unit>,
  unit: Unit,
): Effect.Effect<void, DuplicateUnitNameError> => {
  const taken = namesOf(unit).find((name) => catalog.has(name))
  if (taken !== undefined) {
    return Effect.fail(new DuplicateUnitNameError({ system: systemName, name: taken }))
  }
  for (const name of namesOf(unit)) {
    catalog.set(name, unit)
  }
  return Effect.void
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitSystemSpec {
  readonly name: string
  readonly basis: Dimension.Basis
  /** Base unit per basis component. */
  readonly bases: Readonly<Record<string, Unit>>
}

/**
 * Builds a unit system from its base units. Each base unit must have the pure
 * dimension of the component it is assigned to and scale 1. The units are
 * adopted by the system: their keys are rewritten to `"<system>:<name>"`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnitSystem = (
  spec: UnitSystemSpec,
): Effect.Effect<UnitSystem, InvalidBaseUnitError | DuplicateUnitNameError | InvalidUnitError> =>
  Effect.gen(function* () {
    if (spec.name.trim().length === 0) {
      return yield* Effect.fail(new InvalidUnitError({ name: spec.name, reason: "system name must not be empty" }))
    }
    if (spec.name.includes(KEY_SEPARATOR)) {
      return yield* Effect.fail(
        new InvalidUnitError({ name: spec.name, reason: `system name must not contain "${KEY_SEPARATOR}"` }),
      )
    }
    const bases = new Map<string, Unit>()
    const catalog = new Map<string, Unit>()
    const units: Array<Unit> = []
    for (const [component, candidate] of Object.entries(spec.bases)) {
      const invalid = (reason: string) =>
        new InvalidBaseUnitError({ system: spec.name, component, unit: candidate.name, reason })
      if (Dimension.indexOf(spec.basis, component) < 0) {
        return yield* Effect.fail(invalid(`basis "${spec.basis.name}" has no such component`))
      }
      if (!Dimension.sameBasis(candidate.dimension.basis, spec.basis)) {
        return yield* Effect.fail(invalid(`dimension belongs to basis "${candidate.dimension.basis.name}"`))
      }
      if (Dimension.pureComponent(candidate.dimension) !== component) {
        return yield* Effect.fail(invalid(`dimension is ${Dimension.format(candidate.dimension)}`))
      }
      if (!Rational.equals(candidate.scale, Rational.one)) {
        return yield* Effect.fail(invalid(`scale is ${Rational.format(candidate.scale)}, expected 1`))
      }
      const unit = adopt(spec.name, candidate, true)
      yield* register(spec.name, catalog, unit)
      bases.set(component, unit)
      units.push(unit)
    }
    return { name: spec.name, basis: spec.basis, bases, units, catalog }
  })

/**
 * Defines a derived unit in a system, returning the extended system and the
 * unit it now owns.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defineUnit = (
  system: UnitSystem,
  spec: UnitSpec,
): Effect.Effect<
  readonly [UnitSystem, Unit],
  InvalidUnitError | DuplicateUnitNameError | ShapeMismatchError
> =>
  Effect.gen(function* () {
    const validated = yield* validateSpec(spec)
    if (!Dimension.sameBasis(validated.dimension.basis, system.basis)) {
      return yield* Effect.fail(
        new ShapeMismatchError({
          operation: "defineUnit",
          reason: `unit "${validated.name}" uses basis "${validated.dimension.basis.name}", system ${system.name} uses "${system.basis.name}"`,
        }),
      )
    }
    const unit: Unit = {
      ...validated,
      key: makeUnitKey(system.name, validated.name),
      system: system.name,
      isBase: false,
    }
    const catalog = new Map(system.catalog)
    yield* register(system.name, catalog, unit)
    const extended: UnitSystem = { ...system, units: [...system.units, unit], catalog }
    return [extended, unit] as const
  })

/**
 * Defines several units at once.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defineUnits = (
  system: UnitSystem,
  specs: ReadonlyArray<UnitSpec>,
): Effect.Effect<UnitSystem, InvalidUnitError | DuplicateUnitNameError | ShapeMismatchError> =>
  Effect.reduce(specs, system, (current, spec) =>
    Effect.map(defineUnit(current, spec), ([extended]) => extended),
  )

/**
 * Resolves a name or alias through the system catalog.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const lookup = (system: UnitSystem, name: string): Effect.Effect<Unit, UnitNotFoundError> => {
  const unit = system.catalog.get(name)
  return unit ? Effect.succeed(unit) : Effect.fail(new UnitNotFoundError({ system: system.name, name }))
}

/**
 * @category Lookups
 * @since 0.1.0
 */
export const baseUnit = (system: UnitSystem, component: string): Option.Option<Unit> =>
  Option.fromNullable(system.bases.get(component))

/**
 * Basis components the system has a base unit for.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const coherentDimensions = (system: UnitSystem): ReadonlyArray<string> => [...system.bases.keys()]

/**
 * @category Predicates
 * @since 0.1.0
 */
export const sameUnit = (left: Unit, right: Unit): boolean => left.key === right.key

/**
 * The unit key, as used in error messages.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const format = (unit: Unit): string => unit.key
