/**
 * Bridge Module
 *
 * Links chunks of the semantic layer to entities of the structural layer.
 *
 * @module
 */

export {
  BridgeLinker,
  countMentions,
  scoreEntity,
  selectEntity,
  type BridgeFailure,
  type BridgeLinkerOptions,
  type BridgeReport,
  type BridgeTie,
  type EntityScore,
  type EntitySelection,
} from "./bridge-linker.js";
