export interface FetchCall {
  url: string;
  init?: RequestInit;
}

export interface FetchMock {
  fetch: typeof fetch;
  calls: FetchCall[];
}

/** Settles once the request's signal is aborted */
export const HOLD = Symbol("hold");

function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * `fetch` implementation answering from `reply`, recording every call.
 */
export function createFetchMock(
  reply: (call: FetchCall) => Response | Error | typeof HOLD
): FetchMock {
  const calls: FetchCall[] = [];

  const fetchMock: typeof fetch = (input, init) => {
    const call = {
      url: input instanceof Request ? input.url : input.toString(),
      init,
    };
    calls.push(call);
    const answer = reply(call);

    if (answer === HOLD) {
      return new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener("abort", () => reject(abortError()));
      });
    }
    return answer instanceof Error ? Promise.reject(answer) : Promise.resolve(answer);
  };

  return { fetch: fetchMock, calls };
}
