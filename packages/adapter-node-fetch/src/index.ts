/**
 * @packageDocumentation
 * @module @netcall/adapter-node-fetch
 *
 * Netcall Node-Fetch Adapter Package
 *
 * Sends netcall requests with node-fetch.
 */

export { default } from "./node-fetch-request-adapter";
export type { NodeFetchRequestAdapterOptions } from "./node-fetch-request-adapter";
