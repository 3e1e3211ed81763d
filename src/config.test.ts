import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_UPLOAD_BYTES,
  expandHome,
  parseTokenFile,
  readTokenFile,
  resolveClientConfig,
} from "./config";
import { ConfigurationError } from "./errors";

describe("parseTokenFile", () => {
  it("reads the ACCESS_TOKEN entry", () => {
    expect(parseTokenFile("ACCESS_TOKEN: test-secret\n")).toBe("test-secret");
  });

  it("splits on the first colon only", () => {
    expect(parseTokenFile("ACCESS_TOKEN:  abc:def  ")).toBe("abc:def");
  });

  it("ignores other keys and lines without a colon", () => {
    const contents = ["# token file", "OTHER: value", "ACCESS_TOKEN: test-secret", "trailing"].join("\r\n");
    expect(parseTokenFile(contents)).toBe("test-secret");
  });

  it("fails when the entry is missing or empty", () => {
    expect(() => parseTokenFile("OTHER: value")).toThrow(ConfigurationError);
    expect(() => parseTokenFile("ACCESS_TOKEN:   ")).toThrow("Token file has no ACCESS_TOKEN entry");
  });
});

describe("expandHome", () => {
  it("expands a leading ~", () => {
    expect(expandHome("~")).toBe(homedir());
    expect(expandHome("~/.web3_storage_token")).toBe(join(homedir(), ".web3_storage_token"));
  });

  it("leaves other paths alone", () => {
    expect(expandHome("/etc/token")).toBe("/etc/token");
    expect(expandHome("relative/~/token")).toBe("relative/~/token");
  });
});

describe("token files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "w3s-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads a token from disk", () => {
    const path = join(dir, "token");
    writeFileSync(path, "ACCESS_TOKEN: test-secret\n");
    expect(readTokenFile(path)).toBe("test-secret");
  });

  it("fails with ConfigurationError for a missing file", () => {
    const path = join(dir, "missing");
    expect(() => readTokenFile(path)).toThrow(ConfigurationError);
  });

  it("fails with ConfigurationError for a directory", () => {
    expect(() => readTokenFile(dir)).toThrow(`Could not read token file ${dir}`);
  });

  describe("resolveClientConfig", () => {
    it("prefers an explicit token", () => {
      const config = resolveClientConfig({ token: "  test-secret  " }, {});
      expect(config).toEqual({
        token: "test-secret",
        baseUrl: DEFAULT_BASE_URL,
        maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("reads the file named by $ACCESS_TOKEN", () => {
      const path = join(dir, "env-token");
      writeFileSync(path, "ACCESS_TOKEN: from-env\n");
      expect(resolveClientConfig({}, { ACCESS_TOKEN: path }).token).toBe("from-env");
    });

    it("falls back to ~/.web3_storage_token", () => {
      vi.stubEnv("HOME", dir);
      writeFileSync(join(dir, ".web3_storage_token"), "ACCESS_TOKEN: from-home\n");
      expect(resolveClientConfig({}, {}).token).toBe("from-home");
    });

    it("fails with ConfigurationError when no token source exists", () => {
      vi.stubEnv("HOME", dir);
      expect(() => resolveClientConfig({}, {})).toThrow("Token file ~/.web3_storage_token does not exist");
    });

    it("prefers tokenPath over $ACCESS_TOKEN", () => {
      const envPath = join(dir, "env-token");
      const optionPath = join(dir, "option-token");
      writeFileSync(envPath, "ACCESS_TOKEN: from-env\n");
      writeFileSync(optionPath, "ACCESS_TOKEN: from-option\n");
      expect(resolveClientConfig({ tokenPath: optionPath }, { ACCESS_TOKEN: envPath }).token).toBe("from-option");
    });

    it("rejects an empty token", () => {
      expect(() => resolveClientConfig({ token: " " }, {})).toThrow("Access token is empty");
    });

    it("strips trailing slashes from the base URL", () => {
      expect(resolveClientConfig({ token: "t", baseUrl: "http://localhost:8787//" }, {}).baseUrl).toBe(
        "http://localhost:8787",
      );
    });

    it("rejects unusable base URLs", () => {
      expect(() => resolveClientConfig({ token: "t", baseUrl: "not a url" }, {})).toThrow(ConfigurationError);
      expect(() => resolveClientConfig({ token: "t", baseUrl: "ftp://example.test" }, {})).toThrow(
        "Base URL must be http(s): ftp://example.test",
      );
    });

    it("rejects a non-positive upload limit", () => {
      expect(() => resolveClientConfig({ token: "t", maxUploadBytes: 0 }, {})).toThrow(
        "maxUploadBytes must be a positive integer",
      );
    });
  });
});
