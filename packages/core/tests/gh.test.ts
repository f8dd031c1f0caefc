import { NotFoundError } from "@outfitter/contracts";
import { createLogger } from "@prcast/shared";
import { spawnSync, type SpawnSyncReturns } from "node:child_process";
import { afterEach, describe, expect, test, vi } from "vitest";

import { createGhRunner, GH_MAX_BUFFER } from "../src";

vi.mock("node:child_process", () => ({ spawnSync: vi.fn() }));

const spawnSyncMock = vi.mocked(spawnSync);

function spawnResult(
  overrides: Partial<SpawnSyncReturns<Buffer>> = {}
): SpawnSyncReturns<Buffer> {
  return {
    pid: 1234,
    output: [],
    stdout: Buffer.alloc(0),
    stderr: Buffer.alloc(0),
    status: 0,
    signal: null,
    ...overrides,
  };
}

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`spawn gh ${code}`);
  error.code = code;
  return error;
}

afterEach(() => {
  spawnSyncMock.mockReset();
  vi.restoreAllMocks();
});

describe("createGhRunner", () => {
  test("runs the configured binary with piped stdout and inherited stderr", () => {
    spawnSyncMock.mockReturnValue(spawnResult());
    const gh = createGhRunner({ bin: "/opt/gh/bin/gh" });

    gh.run(["pr", "list"]);

    expect(spawnSyncMock).toHaveBeenCalledWith("/opt/gh/bin/gh", ["pr", "list"], {
      stdio: ["ignore", "pipe", "inherit"],
      maxBuffer: 50 * 1024 * 1024,
    });
  });

  test("defaults to gh on PATH", () => {
    spawnSyncMock.mockReturnValue(spawnResult());

    const gh = createGhRunner();
    gh.run(["--version"]);

    expect(gh.bin).toBe("gh");
    expect(spawnSyncMock.mock.calls[0]?.[0]).toBe("gh");
  });

  test("returns stdout and exit status", () => {
    spawnSyncMock.mockReturnValue(
      spawnResult({ stdout: Buffer.from("[]\n"), status: 0 })
    );

    const result = createGhRunner().run(["pr", "list"]);

    expect(result.stdout.toString("utf8")).toBe("[]\n");
    expect(result.status).toBe(0);
  });

  test("does not throw on a non-zero exit", () => {
    spawnSyncMock.mockReturnValue(spawnResult({ status: 4 }));

    const result = createGhRunner().run(["pr", "comment", "1"]);

    expect(result.status).toBe(4);
  });

  test("throws NotFoundError when the binary is missing", () => {
    spawnSyncMock.mockReturnValue(
      spawnResult({ error: errnoError("ENOENT"), status: null })
    );

    expect(() => createGhRunner({ bin: "gh-missing" }).run(["pr", "list"])).toThrow(
      NotFoundError
    );
  });

  test("names the missing binary in the error", () => {
    spawnSyncMock.mockReturnValue(
      spawnResult({ error: errnoError("ENOENT"), status: null })
    );

    expect(() => createGhRunner({ bin: "gh-missing" }).run([])).toThrow(
      "'gh-missing' not found. Install the GitHub CLI (https://cli.github.com) or set PRCAST_GH_PATH."
    );
  });

  test("rethrows other spawn failures unchanged", () => {
    const failure = errnoError("EACCES");
    spawnSyncMock.mockReturnValue(spawnResult({ error: failure, status: null }));

    expect(() => createGhRunner().run(["pr", "list"])).toThrow(failure);
  });

  test("returns truncated output when gh overflows the buffer", () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => {});
    spawnSyncMock.mockReturnValue(
      spawnResult({
        error: errnoError("ENOBUFS"),
        stdout: Buffer.from("partial"),
        status: null,
      })
    );
    const gh = createGhRunner({ logger: createLogger({ level: "warn" }) });

    const result = gh.run(["pr", "comment", "3"]);

    expect(result.stdout.toString("utf8")).toBe("partial");
    expect(result.status).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      `[warn] gh output exceeded the buffer limit and was truncated {"component":"gh","args":["pr","comment","3"],"limit":${GH_MAX_BUFFER}}`
    );
  });
});
