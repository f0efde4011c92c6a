/**
 * The conversion graph: units as nodes, exact maps as edges.
 *
 * A graph is an immutable value. Units live once in an insertion-ordered
 * arena; edges are adjacency lists of arena indices, so every registration
 * stores a map and its inverse and every update returns a new graph. Readers
 * holding an older graph never observe a partial update, which is what makes
 * {@link connectSystems} all-or-nothing.
 *
 * Units of one system with the same dimension are linked as soon as the second
 * of them joins the graph, by the ratio of their scales. A direct edge between
 * them must agree with that ratio.
 *
 * Resolution is a breadth-first search over the adjacency lists in insertion
 * order: the path found is the shortest by edge count, and among equally short
 * paths the one using earlier-registered edges wins. The maps along the path
 * are composed exactly.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import * as BasisTransform from "./BasisTransform.js"
import * as ConversionMap from "./ConversionMap.js"
import * as Dimension from "./Dimension.js"
import {
  type ConnectionError,
  type ConversionError,
  DimensionMismatchError,
  DuplicateEdgeError,
  DuplicateUnitNameError,
  IncompatibleDimensionsError,
  MissingCalibrationError,
  NoConversionPathError,
  NonLinearCalibrationError,
  type RegistrationError,
} from "./Errors.js"
import * as Rational from "./Rational.js"
import type { UnitKey } from "./Types.js"
import type { Unit } from "./Unit.js"

/**
 * `"direct"` for edges registered with {@link addEdge}, `"scale"` for edges
 * between units of one system, otherwise the transform
 * {@link connectSystems} derived the edge from.
 *
 * @category Models
 * @since 0.1.0
 */
export type EdgeOrigin = "direct" | "scale" | BasisTransform.BasisTransform

/**
 * Adjacency entry between arena indices.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Link {
  readonly from: number
  readonly to: number
  readonly map: ConversionMap.ConversionMap
  readonly origin: EdgeOrigin
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface ConversionGraph {
  readonly nodes: ReadonlyArray<Unit>
  readonly index: ReadonlyMap<UnitKey, number>
  readonly adjacency: ReadonlyArray<ReadonlyArray<Link>>
  /** Keyed by `"<from>><to>"` arena indices. */
  readonly links: ReadonlyMap<string, Link>
  /** Forward edges in registration order; inverses and scale edges are implied. */
  readonly registered: ReadonlyArray<Link>
  readonly transforms: ReadonlyArray<BasisTransform.BasisTransform>
}

/**
 * A registered edge as reported by {@link edges}.
 *
 * @category Models
 * @since 0.1.0
 */
export interface GraphEdge {
  readonly src: Unit
  readonly dst: Unit
  readonly map: ConversionMap.ConversionMap
  readonly origin: EdgeOrigin
}

/**
 * One base-unit correspondence handed to {@link connectSystems}. Either
 * orientation is accepted.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Calibration {
  readonly src: Unit
  readonly dst: Unit
  readonly map: ConversionMap.ConversionMap
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface ResolveOptions {
  /** Longest path, in edges, a conversion may follow. */
  readonly maxPathLength?: number
}

/**
 * A resolved conversion and the units it passes through, `src` and `dst`
 * included.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ConversionPath {
  readonly map: ConversionMap.ConversionMap
  readonly units: ReadonlyArray<Unit>
}

/**
 * @category Constants
 * @since 0.1.0
 */
export const DEFAULT_MAX_PATH_LENGTH = 64

/**
 * @category Constructors
 * @since 0.1.0
 */
export const empty: ConversionGraph = {
  nodes: [],
  index: new Map<UnitKey, number>(),
  adjacency: [],
  links: new Map<string, Link>(),
  registered: [],
  transforms: [],
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const make = (): ConversionGraph => empty

const linkKey = (from: number, to: number): string => `${from}>${to}`

const sameUnitDefinition = (left: Unit, right: Unit): boolean =>
  Dimension.equals(left.dimension, right.dimension) && Rational.equals(left.scale, right.scale)

/**
 * Mutable working copy of a graph. Registration stages its changes here and
 * only `build` produces a graph value, so a failed registration leaves the
 * original untouched.
 */
class GraphBuilder {
  private readonly nodes: Array<Unit>
  private readonly index: Map<UnitKey, number>
  private readonly adjacency: Array<Array<Link>>
  private readonly links: Map<string, Link>
  private readonly registered: Array<Link>
  private readonly transforms: Array<BasisTransform.BasisTransform>
  added = 0

  constructor(graph: ConversionGraph) {
    this.nodes = [...graph.nodes]
    this.index = new Map(graph.index)
    this.adjacency = graph.adjacency.map((list) => [...list])
    this.links = new Map(graph.links)
    this.registered = [...graph.registered]
    this.transforms = [...graph.transforms]
  }

  node(unit: Unit): Either.Either<number, DuplicateUnitNameError> {
    const existing = this.index.get(unit.key)
    if (existing === undefined) {
      const position = this.nodes.length
      this.nodes.push(unit)
      this.index.set(unit.key, position)
      this.adjacency.push([])
      this.relate(position, unit)
      return Either.right(position)
    }
    const known = this.nodes[existing]
    return known === undefined || sameUnitDefinition(known, unit)
      ? Either.right(existing)
      : Either.left(new DuplicateUnitNameError({ system: unit.system, name: unit.name }))
  }

  private relate(position: number, unit: Unit): void {
    if (unit.system.length === 0) {
      return
    }
    for (const [other, known] of this.nodes.entries()) {
      if (other === position || known.system !== unit.system || !Dimension.equals(known.dimension, unit.dimension)) {
        continue
      }
      const toKnown = ConversionMap.linear(Rational.divide(unit.scale, known.scale))
      const toUnit = ConversionMap.linear(Rational.divide(known.scale, unit.scale))
      this.connect(
        { from: position, to: other, map: toKnown, origin: "scale" },
        { from: other, to: position, map: toUnit, origin: "scale" },
      )
    }
  }

  private connect(forward: Link, backward: Link): void {
    this.adjacency[forward.from]?.push(forward)
    this.adjacency[backward.from]?.push(backward)
    this.links.set(linkKey(forward.from, forward.to), forward)
    this.links.set(linkKey(backward.from, backward.to), backward)
  }

  link(
    src: Unit,
    dst: Unit,
    map: ConversionMap.ConversionMap,
    origin: EdgeOrigin,
  ): Effect.Effect<void, RegistrationError> {
    const self = this
    return Effect.gen(function* () {
      const inverse = yield* ConversionMap.invert(map)
      const from = yield* self.node(src)
      const to = yield* self.node(dst)
      const existing = self.links.get(linkKey(from, to))
      if (existing !== undefined || from === to) {
        const current = existing?.map ?? ConversionMap.identity
        if (ConversionMap.equals(current, map)) {
          return
        }
        return yield* Effect.fail(
          new DuplicateEdgeError({
            src: src.key,
            dst: dst.key,
            existing: ConversionMap.format(current),
            attempted: ConversionMap.format(map),
          }),
        )
      }
      const forward: Link = { from, to, map, origin }
      self.connect(forward, { from: to, to: from, map: inverse, origin })
      self.registered.push(forward)
      self.added++
    })
  }

  record(transform: BasisTransform.BasisTransform): void {
    if (!this.transforms.some((known) => BasisTransform.equals(known, transform))) {
      this.transforms.push(transform)
    }
  }

  build(): ConversionGraph {
    return {
      nodes: this.nodes,
      index: this.index,
      adjacency: this.adjacency,
      links: this.links,
      registered: this.registered,
      transforms: this.transforms,
    }
  }
}

/**
 * Registers a unit. The only edges it gets are the scale edges to units of its
 * system with the same dimension. Re-adding a unit with the same key is a
 * no-op when it has the same dimension and scale.
 *
 * @category Registration
 * @since 0.1.0
 */
export const addUnit = (
  graph: ConversionGraph,
  unit: Unit,
): Effect.Effect<ConversionGraph, DuplicateUnitNameError> => {
  const builder = new GraphBuilder(graph)
  return Either.map(builder.node(unit), () => builder.build())
}

const incompatible = (src: Unit, dst: Unit) =>
  new IncompatibleDimensionsError({
    src: src.key,
    dst: dst.key,
    srcDimension: Dimension.format(src.dimension),
    dstDimension: Dimension.format(dst.dimension),
  })

/**
 * Registers `map` from `src` to `dst` and its inverse from `dst` to `src`.
 *
 * @category Registration
 * @since 0.1.0
 */
export const addEdge = (
  graph: ConversionGraph,
  src: Unit,
  dst: Unit,
  map: ConversionMap.ConversionMap,
): Effect.Effect<ConversionGraph, RegistrationError> =>
  Effect.gen(function* () {
    if (!Dimension.equals(src.dimension, dst.dimension)) {
      return yield* Effect.fail(incompatible(src, dst))
    }
    const builder = new GraphBuilder(graph)
    yield* builder.link(src, dst, map, "direct")
    yield* Effect.logDebug(builder.added === 0 ? "edge already registered" : "edge registered")
    return builder.build()
  }).pipe(Effect.annotateLogs({ src: src.key, dst: dst.key, map: ConversionMap.format(map) }))

interface Oriented {
  readonly base: Unit
  readonly other: Unit
  readonly map: ConversionMap.ConversionMap
}

const orient = (
  transform: BasisTransform.BasisTransform,
  base: Unit,
  calibrations: ReadonlyArray<Calibration>,
): Effect.Effect<Oriented | undefined, RegistrationError> => {
  const targetSystem = transform.target.name
  for (const calibration of calibrations) {
    if (calibration.src.key === base.key && calibration.dst.system === targetSystem) {
      return Effect.succeed({ base, other: calibration.dst, map: calibration.map })
    }
    if (calibration.dst.key === base.key && calibration.src.system === targetSystem) {
      return Effect.map(ConversionMap.invert(calibration.map), (map) => ({
        base,
        other: calibration.src,
        map,
      }))
    }
  }
  return Effect.succeed(undefined)
}

interface Derived {
  readonly src: Unit
  readonly dst: Unit
  readonly map: ConversionMap.ConversionMap
}

const deriveEdges = (
  transform: BasisTransform.BasisTransform,
  factors: ReadonlyArray<ConversionMap.ConversionMap>,
): Effect.Effect<ReadonlyArray<Derived>, ConnectionError> =>
  Effect.gen(function* () {
    const derived: Array<Derived> = []
    for (const unit of transform.source.units) {
      const image = BasisTransform.project(transform, unit.dimension)
      if (Either.isLeft(image)) {
        continue
      }
      const matches = transform.target.units.filter((candidate) =>
        Dimension.equals(candidate.dimension, image.right),
      )
      if (matches.length === 0) {
        continue
      }
      let coherent = ConversionMap.linear(unit.scale)
      const exponents = BasisTransform.sourceExponents(transform, unit.dimension)
      for (const [position, exponent] of exponents.entries()) {
        const factor = factors[position]
        if (factor === undefined || Rational.isZero(exponent)) {
          continue
        }
        coherent = ConversionMap.compose(yield* ConversionMap.power(factor, exponent), coherent)
      }
      for (const candidate of matches) {
        const toCandidate = yield* ConversionMap.invert(ConversionMap.linear(candidate.scale))
        derived.push({ src: unit, dst: candidate, map: ConversionMap.compose(toCandidate, coherent) })
      }
    }
    return derived
  })

/**
 * Connects two unit systems related by a basis transform.
 *
 * Each calibration relates the source system's base unit for one transform
 * component to a target-system unit of the mapped dimension. The calibration
 * scales, raised to the exponents of each source unit, give an edge from
 * every source unit whose dimension the transform maps to every target unit
 * of the mapped dimension. All edges are derived before any is registered and
 * the whole connection fails if one of them does.
 *
 * @category Registration
 * @since 0.1.0
 */
export const connectSystems = (
  graph: ConversionGraph,
  transform: BasisTransform.BasisTransform,
  calibrations: ReadonlyArray<Calibration>,
): Effect.Effect<ConversionGraph, ConnectionError> =>
  Effect.gen(function* () {
    const inverse = yield* BasisTransform.invert(transform)
    const label = BasisTransform.format(transform)
    const factors: Array<ConversionMap.ConversionMap> = []
    const anchors: Array<Oriented> = []
    for (const component of transform.sourceComponents) {
      const missing = new MissingCalibrationError({ transform: label, component })
      const base = transform.source.bases.get(component)
      if (base === undefined) {
        return yield* Effect.fail(missing)
      }
      const oriented = yield* orient(transform, base, calibrations)
      if (oriented === undefined) {
        return yield* Effect.fail(missing)
      }
      const expected = yield* BasisTransform.applyToDimension(transform, base.dimension)
      if (!Dimension.equals(oriented.other.dimension, expected)) {
        return yield* Effect.fail(incompatible(base, oriented.other))
      }
      if (!ConversionMap.isLinear(oriented.map)) {
        return yield* Effect.fail(
          new NonLinearCalibrationError({
            map: ConversionMap.format(oriented.map),
            exponent: `the exponents of ${component}`,
          }),
        )
      }
      factors.push(ConversionMap.linear(Rational.multiply(oriented.map.scale, oriented.other.scale)))
      anchors.push(oriented)
    }

    const derived = yield* deriveEdges(transform, factors)
    const builder = new GraphBuilder(graph)
    for (const anchor of anchors) {
      yield* builder.link(anchor.base, anchor.other, anchor.map, transform)
    }
    for (const edge of derived) {
      yield* builder.link(edge.src, edge.dst, edge.map, transform)
    }
    builder.record(transform)
    builder.record(inverse)
    yield* Effect.logDebug("systems connected").pipe(
      Effect.annotateLogs({ derived: derived.length, registered: builder.added }),
    )
    return builder.build()
  }).pipe(Effect.annotateLogs({ transform: BasisTransform.format(transform) }))

const dimensionKey = (dimension: Dimension.Dimension): string =>
  `${dimension.basis.name}|${dimension.exponents.map(Rational.format).join(",")}`

/**
 * True when `dst` has the dimension of `src`, or the image of it under a chain
 * of recorded transforms. Chains are at most as long as the number of recorded
 * transforms.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const comparable = (
  graph: ConversionGraph,
  src: Dimension.Dimension,
  dst: Dimension.Dimension,
): boolean => {
  const seen = new Set([dimensionKey(src)])
  const queue = [{ dimension: src, depth: 0 }]
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head]
    if (current === undefined) {
      break
    }
    if (Dimension.equals(current.dimension, dst)) {
      return true
    }
    if (current.depth >= graph.transforms.length) {
      continue
    }
    for (const transform of graph.transforms) {
      const image = BasisTransform.project(transform, current.dimension)
      if (Either.isRight(image) && !seen.has(dimensionKey(image.right))) {
        seen.add(dimensionKey(image.right))
        queue.push({ dimension: image.right, depth: current.depth + 1 })
      }
    }
  }
  return false
}

/**
 * Resolves the conversion from `src` to `dst` and reports the units on the
 * path it follows.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const resolve = (
  graph: ConversionGraph,
  src: Unit,
  dst: Unit,
  options?: ResolveOptions,
): Effect.Effect<ConversionPath, ConversionError> =>
  Effect.gen(function* () {
    if (src.key === dst.key && sameUnitDefinition(src, dst)) {
      return { map: ConversionMap.identity, units: [src] }
    }
    if (!comparable(graph, src.dimension, dst.dimension)) {
      return yield* Effect.fail(
        new DimensionMismatchError({
          src: src.key,
          dst: dst.key,
          srcDimension: Dimension.format(src.dimension),
          dstDimension: Dimension.format(dst.dimension),
        }),
      )
    }
    const noPath = (reason: string) => new NoConversionPathError({ src: src.key, dst: dst.key, reason })
    const from = graph.index.get(src.key)
    const to = graph.index.get(dst.key)
    if (from === undefined || to === undefined) {
      const unknown = from === undefined ? src.key : dst.key
      return yield* Effect.fail(noPath(`${unknown} is not in the graph`))
    }

    const limit = options?.maxPathLength ?? DEFAULT_MAX_PATH_LENGTH
    const path = search(graph, from, to, limit)
    if (Either.isLeft(path)) {
      return yield* Effect.fail(
        noPath(path.left ? `no path within ${limit} edges` : "units are not connected"),
      )
    }
    const links = path.right
    const map = links.reduce((acc, link) => ConversionMap.compose(link.map, acc), ConversionMap.identity)
    const units = [src, ...links.flatMap((link) => graph.nodes[link.to] ?? [])]
    yield* Effect.logDebug("conversion resolved").pipe(Effect.annotateLogs({ edges: links.length }))
    return { map, units }
  }).pipe(Effect.annotateLogs({ src: src.key, dst: dst.key }))

/**
 * Breadth-first search. `Left(true)` when the depth limit cut the search
 * short, `Left(false)` when `to` is unreachable.
 */
const search = (
  graph: ConversionGraph,
  from: number,
  to: number,
  limit: number,
): Either.Either<ReadonlyArray<Link>, boolean> => {
  const via = new Map<number, Link>()
  const depth = new Map<number, number>([[from, 0]])
  const queue = [from]
  let truncated = false
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head]
    if (current === undefined) {
      break
    }
    const reached = depth.get(current) ?? 0
    for (const link of graph.adjacency[current] ?? []) {
      if (depth.has(link.to)) {
        continue
      }
      if (reached >= limit) {
        truncated = true
        break
      }
      depth.set(link.to, reached + 1)
      via.set(link.to, link)
      if (link.to === to) {
        return Either.right(trace(via, from, to))
      }
      queue.push(link.to)
    }
  }
  return Either.left(truncated)
}

const trace = (via: ReadonlyMap<number, Link>, from: number, to: number): ReadonlyArray<Link> => {
  const links: Array<Link> = []
  let current = to
  while (current !== from) {
    const link = via.get(current)
    if (link === undefined) {
      break
    }
    links.push(link)
    current = link.from
  }
  return links.reverse()
}

/**
 * The exact map from `src` values to `dst` values.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const convert = (
  graph: ConversionGraph,
  src: Unit,
  dst: Unit,
  options?: ResolveOptions,
): Effect.Effect<ConversionMap.ConversionMap, ConversionError> =>
  Effect.map(resolve(graph, src, dst, options), (path) => path.map)

/**
 * @category Resolution
 * @since 0.1.0
 */
export const convertValue = (
  graph: ConversionGraph,
  value: number,
  src: Unit,
  dst: Unit,
  options?: ResolveOptions,
): Effect.Effect<number, ConversionError> =>
  Effect.map(convert(graph, src, dst, options), (map) => ConversionMap.apply(map, value))

/**
 * Units in registration order.
 *
 * @category Introspection
 * @since 0.1.0
 */
export const units = (graph: ConversionGraph): ReadonlyArray<Unit> => graph.nodes

const toGraphEdge = (graph: ConversionGraph, link: Link): ReadonlyArray<GraphEdge> => {
  const src = graph.nodes[link.from]
  const dst = graph.nodes[link.to]
  return src === undefined || dst === undefined ? [] : [{ src, dst, map: link.map, origin: link.origin }]
}

/**
 * Registered edges in registration order, one per registration. Implied
 * inverses and scale edges are not listed.
 *
 * @category Introspection
 * @since 0.1.0
 */
export const edges = (graph: ConversionGraph): ReadonlyArray<GraphEdge> =>
  graph.registered.flatMap((link) => toGraphEdge(graph, link))

/**
 * Transforms recorded by {@link connectSystems}, each followed by its inverse.
 *
 * @category Introspection
 * @since 0.1.0
 */
export const transforms = (graph: ConversionGraph): ReadonlyArray<BasisTransform.BasisTransform> =>
  graph.transforms

/**
 * @category Introspection
 * @since 0.1.0
 */
export const edgesForTransform = (
  graph: ConversionGraph,
  transform: BasisTransform.BasisTransform,
): ReadonlyArray<GraphEdge> =>
  edges(graph).filter((edge) => typeof edge.origin === "object" && BasisTransform.equals(edge.origin, transform))

/**
 * Whether any edge links the two units, in either direction.
 *
 * @category Introspection
 * @since 0.1.0
 */
export const hasEdge = (graph: ConversionGraph, src: Unit, dst: Unit): boolean => {
  const from = graph.index.get(src.key)
  const to = graph.index.get(dst.key)
  return from !== undefined && to !== undefined && graph.links.has(linkKey(from, to))
}
