import { describe, test } from "node:test";
import * as assert from "node:assert";
import { resolveResponse, type ResolutionContext } from "../response-resolver";
import { CallBuilder } from "../request-call";
import type { Requestable } from "../models/call-params";
import {
  NetworkServiceError,
  StatusValidationError,
} from "../models/network-service-error";
import type { NetworkServiceInterceptor } from "../models/interceptor";
import {
  ResponseTypes,
  type HttpResponse,
  type InterpretedResponse,
} from "../models/response";
import { CompletionQueues } from "../utils/completion-queue";
import type { Logger } from "../utils/logger";

interface LogEntry {
  level: keyof Logger;
  message: string;
  meta?: Record<string, unknown>;
}

function recordingLogger(entries: LogEntry[]): Logger {
  const record =
    (level: keyof Logger) => (message: string, meta?: Record<string, unknown>) => {
      entries.push({ level, message, meta });
    };
  return {
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    debug: record("debug"),
  };
}

const request: Requestable = {
  method: "GET",
  path: "/users",
  encoding: "url",
  statusCodes: [200],
};

const ok: HttpResponse = { status: 200, headers: {}, url: "https://api.example.com/users" };

function context(
  logs: LogEntry[] = [],
  interceptors: NetworkServiceInterceptor[] = []
): ResolutionContext {
  return {
    interceptors,
    isValidationError: (error) => error instanceof StatusValidationError,
    logger: recordingLogger(logs),
  };
}

function builder() {
  return new CallBuilder(request, CompletionQueues.inline);
}

function json(body: unknown, response: HttpResponse = ok, error?: Error): InterpretedResponse {
  return { kind: "json", response, body, error };
}

describe("resolveResponse", () => {
  test("Fails as unreachable without a response", () => {
    const logs: LogEntry[] = [];
    const errors: NetworkServiceError[] = [];
    let invoked = false;
    const call = builder()
      .response(ResponseTypes.json("Users", (_, body) => body), 200, () => {
        invoked = true;
      })
      .error((error) => errors.push(error))
      .make();

    const outcome = resolveResponse(
      call,
      { kind: "json", error: new Error("connect ECONNREFUSED") },
      context(logs)
    );

    assert.strictEqual(invoked, false);
    assert.strictEqual(outcome.ok, false);
    assert.deepStrictEqual(
      errors.map((error) => error.message),
      ["GET /users failed with unreachable: connect ECONNREFUSED"]
    );
    assert.deepStrictEqual(logs, [
      {
        level: "error",
        message: "GET /users failed with unreachable: connect ECONNREFUSED",
        meta: { reason: "unreachable", kind: "json", status: undefined },
      },
    ]);
  });

  test("Fails as skipped when an interceptor vetoes", () => {
    const logs: LogEntry[] = [];
    const seen: unknown[] = [];
    let invoked = false;
    const call = builder()
      .response(ResponseTypes.json("Users", (_, body) => body), 200, () => {
        invoked = true;
      })
      .make();
    const interceptor: NetworkServiceInterceptor = {
      intercept: (_call, response, body) => {
        seen.push(response.status, body);
        return false;
      },
    };

    const outcome = resolveResponse(call, json([1]), context(logs, [interceptor]));

    assert.strictEqual(invoked, false);
    assert.strictEqual(outcome.ok ? undefined : outcome.error.reason, "skipped");
    assert.deepStrictEqual(seen, [200, [1]]);
    assert.deepStrictEqual(logs, [
      {
        level: "warn",
        message: "An interceptor blocked the response",
        meta: { reason: "skipped", kind: "json", status: 200 },
      },
    ]);
  });

  test("Succeeds silently when no handler matches", () => {
    const errors: NetworkServiceError[] = [];
    const call = builder()
      .response(ResponseTypes.string("Text", (_, body) => body), 200, () => {})
      .response(ResponseTypes.json("Created", (_, body) => body), 201, () => {})
      .error((error) => errors.push(error))
      .make();

    const outcome = resolveResponse(call, json({}), context());

    assert.deepStrictEqual(outcome, { ok: true });
    assert.deepStrictEqual(errors, []);
  });

  test("Fails with the transport error when no handler matches", () => {
    const error = new StatusValidationError(500);
    const call = builder().make();

    const outcome = resolveResponse(
      call,
      json({}, { ...ok, status: 500 }, error),
      context()
    );

    assert.strictEqual(outcome.ok, false);
    if (!outcome.ok) {
      assert.strictEqual(outcome.error.reason, "httpError");
      assert.strictEqual(outcome.error.cause, error);
      assert.deepStrictEqual(outcome.error.body, {});
      assert.strictEqual(
        outcome.error.message,
        "GET /users failed with httpError (status 500): Response status code was unacceptable: 500"
      );
    }
  });

  test("Invokes every matching handler in registration order", () => {
    const order: string[] = [];
    const call = builder()
      .response(ResponseTypes.json("First", (_, body) => body), [200, 201], () =>
        order.push("first")
      )
      .response(ResponseTypes.data("Bytes", (_, body) => body), 200, () =>
        order.push("bytes")
      )
      .response(ResponseTypes.json("Second", (_, body) => body), 200, () =>
        order.push("second")
      )
      .make();

    const outcome = resolveResponse(call, json({}), context());

    assert.deepStrictEqual(outcome, { ok: true });
    assert.deepStrictEqual(order, ["first", "second"]);
  });

  test("Delivers the body despite a validation-only error", () => {
    const received: unknown[] = [];
    const call = builder()
      .response(ResponseTypes.json("Problem", (_, body) => body), 422, (body) =>
        received.push(body)
      )
      .make();

    const outcome = resolveResponse(
      call,
      json({ field: "email" }, { ...ok, status: 422 }, new StatusValidationError(422)),
      context()
    );

    assert.deepStrictEqual(outcome, { ok: true });
    assert.deepStrictEqual(received, [{ field: "email" }]);
  });

  test("Fails with other errors before invoking a matching handler", () => {
    let invoked = false;
    const call = builder()
      .response(ResponseTypes.json("Users", (_, body) => body), 200, () => {
        invoked = true;
      })
      .make();

    const outcome = resolveResponse(
      call,
      json(undefined, ok, new Error("socket hang up")),
      context()
    );

    assert.strictEqual(invoked, false);
    assert.strictEqual(outcome.ok ? undefined : outcome.error.reason, "httpError");
  });

  test("Stops at the first construction failure", () => {
    const constructionError = new Error("missing field 'id'");
    const errors: NetworkServiceError[] = [];
    const delivered: string[] = [];
    const call = builder()
      .response(
        ResponseTypes.json("User", () => {
          throw constructionError;
        }),
        200,
        () => delivered.push("user")
      )
      .response(ResponseTypes.json("Raw", (_, body) => body), 200, () =>
        delivered.push("raw")
      )
      .error((error) => errors.push(error))
      .make();

    const outcome = resolveResponse(call, json({}), context());

    assert.deepStrictEqual(delivered, []);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].reason, "deserializationFailure");
    assert.strictEqual(errors[0].cause, constructionError);
    assert.deepStrictEqual(outcome, { ok: false, error: errors[0] });
  });

  test("Stops at a construction failure despite a validation-only error", () => {
    const validationError = new StatusValidationError(422);
    const constructionError = new Error("unexpected problem shape");
    const errors: NetworkServiceError[] = [];
    const delivered: string[] = [];
    const call = builder()
      .response(
        ResponseTypes.json("Problem", () => {
          throw constructionError;
        }),
        422,
        () => delivered.push("problem")
      )
      .response(ResponseTypes.json("Raw", (_, body) => body), 422, () =>
        delivered.push("raw")
      )
      .error((error) => errors.push(error))
      .make();

    const outcome = resolveResponse(
      call,
      json({ field: "email" }, { ...ok, status: 422 }, validationError),
      context()
    );

    assert.deepStrictEqual(delivered, []);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].reason, "deserializationFailure");
    assert.strictEqual(errors[0].cause, constructionError);
    assert.strictEqual(outcome.ok ? undefined : outcome.error, errors[0]);
  });

  test("Logs a throwing response handler and keeps delivering", () => {
    const logs: LogEntry[] = [];
    const delivered: string[] = [];
    const call = builder()
      .response(ResponseTypes.json("First", (_, body) => body), 200, () => {
        throw new Error("handler boom");
      })
      .response(ResponseTypes.json("Second", (_, body) => body), 200, () =>
        delivered.push("second")
      )
      .make();

    const outcome = resolveResponse(call, json({}), context(logs));

    assert.deepStrictEqual(outcome, { ok: true });
    assert.deepStrictEqual(delivered, ["second"]);
    assert.deepStrictEqual(logs, [
      {
        level: "error",
        message: "Response handler for 'First' threw",
        meta: { kind: "json", status: 200, error: "Error: handler boom" },
      },
    ]);
  });

  test("Logs a throwing error handler and still fails", () => {
    const logs: LogEntry[] = [];
    const call = builder()
      .error(() => {
        throw new Error("error handler boom");
      })
      .make();

    const outcome = resolveResponse(
      call,
      { kind: "empty", error: new Error("connect ECONNREFUSED") },
      context(logs)
    );

    assert.strictEqual(outcome.ok ? undefined : outcome.error.reason, "unreachable");
    assert.deepStrictEqual(logs[1], {
      level: "error",
      message: "Error handler threw",
      meta: { reason: "unreachable", error: "Error: error handler boom" },
    });
  });

  test("Treats a throwing interceptor as a veto", () => {
    const interceptorError = new Error("interceptor boom");
    let invoked = false;
    const call = builder()
      .response(ResponseTypes.json("Users", (_, body) => body), 200, () => {
        invoked = true;
      })
      .make();
    const interceptor: NetworkServiceInterceptor = {
      intercept: () => {
        throw interceptorError;
      },
    };

    const outcome = resolveResponse(call, json([1]), context([], [interceptor]));

    assert.strictEqual(invoked, false);
    assert.strictEqual(outcome.ok, false);
    if (!outcome.ok) {
      assert.strictEqual(outcome.error.reason, "skipped");
      assert.strictEqual(outcome.error.cause, interceptorError);
    }
  });

  test("Wraps thrown values that are not errors", () => {
    const call = builder()
      .response(
        ResponseTypes.string("Broken", () => {
          throw "nope";
        }),
        200,
        () => {}
      )
      .make();

    const outcome = resolveResponse(
      call,
      { kind: "string", response: ok, body: "text" },
      context()
    );

    assert.strictEqual(outcome.ok, false);
    if (!outcome.ok) {
      assert.ok(outcome.error.cause instanceof Error);
      assert.strictEqual(
        outcome.error.cause.message,
        "Failed to construct 'Broken' from a 200 response: nope"
      );
    }
  });
});
