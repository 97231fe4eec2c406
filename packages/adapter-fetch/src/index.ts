/**
 * @packageDocumentation
 * @module @netcall/adapter-fetch
 *
 * Netcall Fetch Adapter Package
 *
 * Sends netcall requests with the native Fetch API, without additional dependencies.
 */

export { default } from "./fetch-request-adapter";
export type { FetchRequestAdapterOptions } from "./fetch-request-adapter";
