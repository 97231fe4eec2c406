import { describe, test } from "node:test";
import * as assert from "node:assert";
import {
  applyPathParameters,
  encodeQuery,
  encodeRequest,
  joinUrl,
  parameterComponents,
} from "../parameter-encoding";

describe("Parameter encoding", () => {
  describe("parameterComponents", () => {
    test("should flatten arrays and nested objects", () => {
      assert.deepStrictEqual(
        parameterComponents({ name: "Ada", roles: ["admin", "owner"] }, "user"),
        [
          ["user[name]", "Ada"],
          ["user[roles][]", "admin"],
          ["user[roles][]", "owner"],
        ]
      );
    });

    test("should skip undefined and keep null as an empty value", () => {
      assert.deepStrictEqual(parameterComponents(undefined, "missing"), []);
      assert.deepStrictEqual(parameterComponents(null, "cleared"), [["cleared", ""]]);
    });

    test("should write booleans literally or numerically", () => {
      assert.deepStrictEqual(parameterComponents(true, "flag"), [["flag", "true"]]);
      assert.deepStrictEqual(parameterComponents(false, "flag", "numeric"), [
        ["flag", "0"],
      ]);
    });
  });

  test("encodeQuery should sort keys and percent-encode", () => {
    assert.strictEqual(
      encodeQuery({ q: "a&b c", page: 2, debug: true }),
      "debug=1&page=2&q=a%26b%20c"
    );
  });

  test("applyPathParameters should substitute every placeholder", () => {
    assert.strictEqual(
      applyPathParameters("/teams/$team/members/$id", { team: "core/api", id: 5 }),
      "/teams/core%2Fapi/members/5"
    );
  });

  test("joinUrl should leave exactly one slash between host and path", () => {
    assert.strictEqual(joinUrl("https://example.com/", "/users"), "https://example.com/users");
    assert.strictEqual(joinUrl("https://example.com", "users"), "https://example.com/users");
    assert.strictEqual(joinUrl("https://example.com/v1//", ""), "https://example.com/v1");
  });

  describe("encodeRequest", () => {
    const url = "https://example.com/users";

    test("should put url parameters into the query for GET", () => {
      assert.deepStrictEqual(
        encodeRequest(url, "GET", {}, "url", { page: 1 }),
        { url: "https://example.com/users?page=1", method: "GET", headers: {} }
      );
      assert.strictEqual(
        encodeRequest(`${url}?sort=name`, "DELETE", {}, "formData", { id: 3 }).url,
        "https://example.com/users?sort=name&id=3"
      );
    });

    test("should put url parameters into a form body for POST", () => {
      assert.deepStrictEqual(
        encodeRequest(url, "POST", {}, "url", { name: "Ada Lovelace" }),
        {
          url,
          method: "POST",
          headers: {
            "Content-Type": "application/x-www-form-urlencoded; charset=utf-8",
          },
          body: "name=Ada%20Lovelace",
        }
      );
    });

    test("should write a JSON body", () => {
      assert.deepStrictEqual(
        encodeRequest(url, "PUT", { Authorization: "Bearer test-token" }, "json", {
          name: "Ada",
        }),
        {
          url,
          method: "PUT",
          headers: {
            Authorization: "Bearer test-token",
            "Content-Type": "application/json",
          },
          body: '{"name":"Ada"}',
        }
      );
    });

    test("should keep an explicit content type", () => {
      const encoded = encodeRequest(
        url,
        "POST",
        { "content-type": "application/vnd.api+json" },
        "json",
        { name: "Ada" }
      );
      assert.deepStrictEqual(encoded.headers, {
        "content-type": "application/vnd.api+json",
      });
    });

    test("should not mutate the given headers", () => {
      const headers = { Accept: "application/json" };
      encodeRequest(url, "POST", headers, "json", { name: "Ada" });
      assert.deepStrictEqual(headers, { Accept: "application/json" });
    });

    test("should leave requests without parameters untouched", () => {
      assert.deepStrictEqual(encodeRequest(url, "POST", {}, "json"), {
        url,
        method: "POST",
        headers: {},
      });
    });
  });
});
