/**
 * In-memory property graph: nodes and directed, labeled edges carrying
 * key/value properties, with adjacency lookups in both directions.
 */

export * from "./src/index.js";
