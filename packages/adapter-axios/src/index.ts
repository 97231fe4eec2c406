/**
 * @packageDocumentation
 * @module @netcall/adapter-axios
 *
 * Netcall Axios Adapter Package
 *
 * Sends netcall requests with Axios. Multipart bodies are encoded with `form-data`.
 */

export { default } from "./axios-request-adapter";
export type { AxiosRequestAdapterOptions } from "./axios-request-adapter";
