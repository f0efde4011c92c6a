/**
 * Branded identifiers.
 *
 * Units are identified in conversion graphs by the name of their owning system
 * and their own name, never by object reference, so two units named `pound`
 * from different systems stay distinct nodes.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Joins the system and unit name in a key. Neither may contain it.
 *
 * @since 0.1.0
 * @category IDs
 */
export const KEY_SEPARATOR = ":"

/**
 * `"<system>:<name>"`, or the bare name for units outside any system.
 *
 * @since 0.1.0
 * @category IDs
 */
export const UnitKey = Schema.NonEmptyString.pipe(Schema.brand("UnitKey"))

/**
 * Type extracted from UnitKey schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type UnitKey = typeof UnitKey.Type

/**
 * @since 0.1.0
 * @category IDs
 */
export const makeUnitKey = (system: string, name: string): UnitKey =>
  UnitKey.make(system.length > 0 ? `${system}${KEY_SEPARATOR}${name}` : name)
