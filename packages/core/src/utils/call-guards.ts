import type {
  MultipartRequestable,
  Requestable,
} from "../models/call-params";

/**
 * Type guard to check if a request is sent as `multipart/form-data`.
 */
export function isMultipartRequestable(
  request: Requestable
): request is MultipartRequestable {
  return "multipart" in request && request.multipart === true;
}
