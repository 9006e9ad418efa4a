/**
 * Configuration entrypoint.
 *
 * Re-exports the environment reader, the settings schema, providers and the
 * cached store.
 */
export * from "./env";
export * from "./definitions";
export * from "./provider";
export * from "./store";
