import { describe, it, expect } from "vitest";
import { authHeaders, fileNameOf, resolveFileUrl } from "../../../src/tools/files/files-api.js";

describe("resolveFileUrl", () => {
  it("should place relative references under the versioned endpoint", () => {
    expect(resolveFileUrl("http://files.local/", "/files/b1/report.txt")).toBe(
      "http://files.local/v1/files/b1/report.txt",
    );
  });

  it("should use absolute URLs as given", () => {
    expect(resolveFileUrl("http://files.local", "https://cdn.test/a.txt")).toBe("https://cdn.test/a.txt");
  });
});

describe("fileNameOf", () => {
  it("should return the decoded last path segment", () => {
    expect(fileNameOf("files/b1/my%20report.html?download=1")).toBe("my report.html");
    expect(fileNameOf("files/b1/dir/")).toBe("dir");
  });
});

describe("authHeaders", () => {
  it("should send the credential as an Api-Key header", () => {
    expect(authHeaders("test-secret")).toEqual({ "Api-Key": "test-secret" });
    expect(authHeaders(undefined)).toEqual({});
  });
});
