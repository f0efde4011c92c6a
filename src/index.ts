/**
 * Dimensional analysis and exact unit conversion over a graph of units.
 *
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * as BasisTransform from "./BasisTransform.js"

/**
 * @since 0.1.0
 */
export * as ConversionGraph from "./ConversionGraph.js"

/**
 * @since 0.1.0
 */
export * as ConversionMap from "./ConversionMap.js"

/**
 * @since 0.1.0
 */
export * as Dimension from "./Dimension.js"

/**
 * @since 0.1.0
 */
export * as Rational from "./Rational.js"

/**
 * @since 0.1.0
 */
export * as Unit from "./Unit.js"

/**
 * @since 0.1.0
 */
export * from "./Errors.js"

/**
 * @since 0.1.0
 */
export { KEY_SEPARATOR, UnitKey, makeUnitKey } from "./Types.js"

/**
 * @since 0.1.0
 */
export { GraphSettingsConfig, UnitGraph } from "./UnitGraph.js"

/**
 * @since 0.1.0
 */
export type { GraphSettings, UnitGraphService } from "./UnitGraph.js"
