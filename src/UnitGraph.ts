/**
 * `UnitGraph` service: a conversion graph held in a `SynchronizedRef`.
 *
 * Registration replaces the current graph atomically with the updated value;
 * conversions read a snapshot. Code that needs a different graph for a scope
 * provides another layer.
 *
 * @since 0.1.0
 */

import { Config, type ConfigError, Context, Effect, Layer, SynchronizedRef } from "effect"
import type * as BasisTransform from "./BasisTransform.js"
import * as ConversionGraph from "./ConversionGraph.js"
import type * as ConversionMap from "./ConversionMap.js"
import type { ConnectionError, ConversionError, RegistrationError } from "./Errors.js"
import type { Unit } from "./Unit.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface GraphSettings {
  readonly maxPathLength: number
}

/**
 * Reads `UNITS_MAX_PATH_LENGTH`, defaulting to
 * {@link ConversionGraph.DEFAULT_MAX_PATH_LENGTH}.
 *
 * @category Config
 * @since 0.1.0
 */
export const GraphSettingsConfig: Config.Config<GraphSettings> = Config.all({
  maxPathLength: Config.integer("UNITS_MAX_PATH_LENGTH").pipe(
    Config.validate({ message: "must be a positive integer", validation: (value) => value > 0 }),
    Config.withDefault(ConversionGraph.DEFAULT_MAX_PATH_LENGTH),
  ),
})

/**
 * @category Services
 * @since 0.1.0
 */
export interface UnitGraphService {
  readonly graph: Effect.Effect<ConversionGraph.ConversionGraph>
  readonly settings: GraphSettings
  readonly addUnit: (unit: Unit) => Effect.Effect<ConversionGraph.ConversionGraph, RegistrationError>
  readonly addEdge: (
    src: Unit,
    dst: Unit,
    map: ConversionMap.ConversionMap,
  ) => Effect.Effect<ConversionGraph.ConversionGraph, RegistrationError>
  readonly connectSystems: (
    transform: BasisTransform.BasisTransform,
    calibrations: ReadonlyArray<ConversionGraph.Calibration>,
  ) => Effect.Effect<ConversionGraph.ConversionGraph, ConnectionError>
  readonly convert: (src: Unit, dst: Unit) => Effect.Effect<ConversionMap.ConversionMap, ConversionError>
  readonly convertValue: (value: number, src: Unit, dst: Unit) => Effect.Effect<number, ConversionError>
}

const makeService = (
  initial: ConversionGraph.ConversionGraph,
  settings: GraphSettings,
): Effect.Effect<UnitGraphService> =>
  Effect.gen(function* () {
    const graphRef = yield* SynchronizedRef.make(initial)
    const getGraph = SynchronizedRef.get(graphRef)
    const options: ConversionGraph.ResolveOptions = { maxPathLength: settings.maxPathLength }

    const update = <E>(
      change: (graph: ConversionGraph.ConversionGraph) => Effect.Effect<ConversionGraph.ConversionGraph, E>,
    ): Effect.Effect<ConversionGraph.ConversionGraph, E> =>
      SynchronizedRef.updateAndGetEffect(graphRef, change)

    const service: UnitGraphService = {
      graph: getGraph,
      settings,
      addUnit: (unit) => update((graph) => ConversionGraph.addUnit(graph, unit)),
      addEdge: (src, dst, map) => update((graph) => ConversionGraph.addEdge(graph, src, dst, map)),
      connectSystems: (transform, calibrations) =>
        update((graph) => ConversionGraph.connectSystems(graph, transform, calibrations)),
      convert: (src, dst) => Effect.flatMap(getGraph, (graph) => ConversionGraph.convert(graph, src, dst, options)),
      convertValue: (value, src, dst) =>
        Effect.flatMap(getGraph, (graph) => ConversionGraph.convertValue(graph, value, src, dst, options)),
    }

    return service
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class UnitGraph extends Context.Tag("effect-unit-graph/UnitGraph")<UnitGraph, UnitGraphService>() {
  static layer(initial: ConversionGraph.ConversionGraph = ConversionGraph.empty): Layer.Layer<UnitGraph> {
    return UnitGraph.layerWithSettings({ maxPathLength: ConversionGraph.DEFAULT_MAX_PATH_LENGTH }, initial)
  }

  static layerWithSettings(
    settings: GraphSettings,
    initial: ConversionGraph.ConversionGraph = ConversionGraph.empty,
  ): Layer.Layer<UnitGraph> {
    return Layer.effect(this, makeService(initial, settings))
  }

  static layerConfig(
    initial: ConversionGraph.ConversionGraph = ConversionGraph.empty,
  ): Layer.Layer<UnitGraph, ConfigError.ConfigError> {
    return Layer.effect(
      this,
      Effect.flatMap(GraphSettingsConfig, (settings) => makeService(initial, settings)),
    )
  }
}
