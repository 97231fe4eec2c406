import type nodeFetch from "node-fetch";
import { Request, type RequestInit, type Response } from "node-fetch";

export interface NodeFetchCall {
  url: string;
  init?: RequestInit;
}

export interface NodeFetchMock {
  fetch: typeof nodeFetch;
  calls: NodeFetchCall[];
}

/** Settles once the request's signal is aborted */
export const HOLD = Symbol("hold");

/**
 * node-fetch replacement answering from `reply`, recording every call.
 */
export function createNodeFetchMock(
  reply: (call: NodeFetchCall) => Response | Error | typeof HOLD
): NodeFetchMock {
  const calls: NodeFetchCall[] = [];

  const fetchMock: typeof nodeFetch = (input, init) => {
    const call = {
      url: input instanceof Request ? input.url : input.toString(),
      init,
    };
    calls.push(call);
    const answer = reply(call);

    if (answer === HOLD) {
      return new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("The operation was aborted.");
          error.name = "AbortError";
          reject(error);
        });
      });
    }
    return answer instanceof Error ? Promise.reject(answer) : Promise.resolve(answer);
  };

  return { fetch: fetchMock, calls };
}
