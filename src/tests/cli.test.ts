import fsp from "node:fs/promises";
import path from "node:path";
import { buildProgram, formatIngest, formatRescan } from "../cli.js";
import { NullLogger } from "../logger.js";
import { desktopFile, FakeQueryService, mkTmp, pkg, writeFile } from "./util.js";

describe("launcher-cache CLI", () => {
  let tmp: string;
  let appDir: string;
  let service: FakeQueryService;
  let output: string[];
  let logSpy: jest.SpyInstance;

  const run = async (args: string[], env: NodeJS.ProcessEnv = {}) => {
    const program = buildProgram({
      createService: () => service,
      createLogger: () => new NullLogger(),
      env,
    });
    await program.parseAsync(
      [
        "--config",
        path.join(tmp, "absent.conf"),
        "--db",
        path.join(tmp, "desktop-files.db"),
        "--app-dir",
        appDir,
        ...args,
      ],
      { from: "user" },
    );
  };

  beforeEach(async () => {
    tmp = await mkTmp("cli-");
    appDir = path.join(tmp, "applications");
    await fsp.mkdir(appDir, { recursive: true });
    service = new FakeQueryService();
    output = [];
    logSpy = jest.spyOn(console, "log").mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(async () => {
    logSpy.mockRestore();
    process.exitCode = undefined;
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("rescan then lookup", async () => {
    const a = path.join(appDir, "a.desktop");
    await writeFile(a, desktopFile("A"));
    service.owners.set(a, [pkg("pkgA")]);

    await run(["rescan"]);
    await run(["lookup", a]);
    await run(["lookup", path.join(appDir, "other.desktop")]);

    expect(output).toEqual([
      "rescan: 0 checked, 0 removed, 0 updated, 1 added, 0 unresolved",
      `${a}: pkgA (shown)`,
      `${path.join(appDir, "other.desktop")}: not in cache`,
    ]);
    expect(process.exitCode).toBe(1);
  });

  test("ingest records launchers from package ids", async () => {
    const foo = path.join(appDir, "foo.desktop");
    await writeFile(foo, desktopFile("Foo"));
    service.manifests.set("foo;1.0;x86_64;installed", [foo, "/usr/bin/foo"]);

    await run(["ingest", "foo;1.0;x86_64;fedora"]);

    expect(output).toEqual(["ingest: 1 stored from 1 package(s), 2 file(s) listed"]);
    expect(service.fileRequests).toEqual([["foo;1.0;x86_64;installed"]]);
  });

  test("list prints the cache as a table", async () => {
    await run(["list"]);
    expect(output).toEqual(["cache is empty"]);

    const a = path.join(appDir, "a.desktop");
    await writeFile(a, desktopFile("A"));
    service.owners.set(a, [pkg("pkgA")]);
    await run(["rescan"]);
    output.length = 0;

    await run(["list"]);
    expect(output).toHaveLength(1);
    expect(output[0]).toContain("Launchers");
    expect(output[0]).toContain(a);
    expect(output[0]).toContain("pkgA");
  });

  test("a disabled cache does nothing unless forced", async () => {
    const env = { LAUNCHER_CACHE_ENABLED: "false" };
    await run(["rescan"], env);
    expect(output).toEqual([]);
    expect(process.exitCode).toBe(1);
    await expect(fsp.stat(path.join(tmp, "desktop-files.db"))).rejects.toThrow();

    process.exitCode = undefined;
    await run(["--force", "rescan"], env);
    expect(output).toEqual([
      "rescan: 0 checked, 0 removed, 0 updated, 0 added, 0 unresolved",
    ]);
    expect(process.exitCode).toBeUndefined();
  });
});

describe("report formatting", () => {
  test("rescan summary mentions problems only when present", () => {
    expect(
      formatRescan({
        phase: "done",
        aborted: true,
        checked: 3,
        unchanged: 1,
        removed: 1,
        updated: 1,
        candidates: 2,
        added: 0,
        unresolved: 1,
        unparsable: 1,
        failed: 0,
      }),
    ).toBe(
      "rescan: 3 checked, 1 removed, 1 updated, 0 added, 1 unresolved, 1 unparsable (aborted)",
    );
  });

  test("empty ingest", () => {
    expect(
      formatIngest({
        packages: [],
        queried: false,
        files: 0,
        stored: 0,
        skipped: 0,
        unparsable: 0,
        failed: 0,
      }),
    ).toBe("ingest: no installed or updated packages");
  });
});
