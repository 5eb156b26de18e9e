/**
 * Graph store module
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { StoreConfig } from "../../utils/validation.js";
import { MemoryGraphStore } from "./memory-graph-store.js";
import { Neo4jGraphStore, type DriverFactory } from "./neo4j-graph-store.js";

export { MemoryGraphStore } from "./memory-graph-store.js";
export { Neo4jGraphStore, defaultDriverFactory, type DriverFactory } from "./neo4j-graph-store.js";
export * from "./schema.js";

/**
 * Create the store named by `config.engine`. The store is not connected
 * until `initialize()` is called.
 */
export function createGraphStore(config: StoreConfig, dimension: number, driverFactory?: DriverFactory): IGraphStore {
  switch (config.engine) {
    case "memory":
      return new MemoryGraphStore(dimension);
    case "neo4j":
      return new Neo4jGraphStore(config, dimension, driverFactory);
  }
}
