import { describe, test } from "node:test";
import * as assert from "node:assert";
import { validateUrl, SSRFError, type UrlValidationOptions } from "../url-validator";

function rejects(url: string, message: string, options: UrlValidationOptions = {}) {
  assert.throws(
    () => validateUrl(url, options),
    (error: unknown) => error instanceof SSRFError && error.message === message
  );
}

const LOCALHOST =
  "Localhost addresses are not allowed. Set allowLocalhost=true to override.";
const PRIVATE =
  "Private network addresses are not allowed. Set allowPrivateIPs=true to override.";
const LINK_LOCAL = "Link-local addresses are not allowed.";

describe("URL Validator", () => {
  describe("Valid URLs", () => {
    test("should allow public http and https URLs", () => {
      assert.doesNotThrow(() => validateUrl("https://api.example.com/users/123"));
      assert.doesNotThrow(() => validateUrl("http://example.com/search?q=test"));
      assert.doesNotThrow(() => validateUrl("http://172.15.0.1/"));
    });

    test("should reject malformed URLs", () => {
      rejects("not a url", "Invalid URL format: not a url");
    });
  });

  describe("Protocols", () => {
    test("should reject protocols other than http and https", () => {
      rejects(
        "ftp://example.com",
        'Protocol "ftp:" is not allowed. Only http:, https: are permitted.'
      );
    });

    test("should allow configured protocols", () => {
      assert.doesNotThrow(() =>
        validateUrl("file:///tmp/report.json", { allowedProtocols: ["file:"] })
      );
      rejects(
        "https://example.com",
        'Protocol "https:" is not allowed. Only file: are permitted.',
        { allowedProtocols: ["file:"] }
      );
    });
  });

  describe("Localhost protection", () => {
    for (const url of [
      "http://localhost:3000",
      "http://127.0.0.1:3000",
      "http://127.4.0.1/",
      "http://0.0.0.0/",
      "http://[::1]:8080/",
    ]) {
      test(`should reject ${url}`, () => rejects(url, LOCALHOST));
    }

    test("should allow localhost when configured", () => {
      assert.doesNotThrow(() =>
        validateUrl("http://localhost:3000", { allowLocalhost: true })
      );
    });
  });

  describe("Private network protection", () => {
    for (const url of [
      "http://10.0.0.1/",
      "http://172.16.0.1/",
      "http://172.31.255.255/",
      "http://192.168.1.1/",
      "http://[fd12::1]/",
    ]) {
      test(`should reject ${url}`, () => rejects(url, PRIVATE));
    }

    test("should reject link-local addresses", () => {
      rejects("http://169.254.169.254/latest/meta-data", LINK_LOCAL);
      rejects("http://[fe80::1]/", LINK_LOCAL);
    });

    test("should allow private and link-local addresses when configured", () => {
      assert.doesNotThrow(() =>
        validateUrl("http://192.168.1.1/", { allowPrivateIPs: true })
      );
      assert.doesNotThrow(() =>
        validateUrl("http://169.254.169.254/", { allowPrivateIPs: true })
      );
    });
  });

  test("should skip every check when validation is disabled", () => {
    assert.doesNotThrow(() =>
      validateUrl("gopher://127.0.0.1", { disableValidation: true })
    );
  });
});
