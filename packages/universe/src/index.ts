/**
 * @eq/universe
 *
 * The instrument universe of a run: reference data keyed by instrument id.
 */

export { InstrumentCatalog } from "./catalog";
