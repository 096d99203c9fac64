import fsp from "node:fs/promises";
import path from "node:path";
import { MemoryLogger } from "../logger.js";
import { VisitedSet } from "../visited-set.js";
import { collectLaunchers, iterateLaunchers } from "../walker.js";
import { mkTmp, writeFile } from "./util.js";

describe("launcher walk", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("walker-");
    await writeFile(path.join(tmp, "a.desktop"), "");
    await writeFile(path.join(tmp, "sub", "b.desktop"), "");
    await writeFile(path.join(tmp, "sub", "deeper", "c.desktop"), "");
    await writeFile(path.join(tmp, "sub", "readme.txt"), "");
    await writeFile(path.join(tmp, ".desktop"), "");
    await fsp.mkdir(path.join(tmp, "dir.desktop"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("finds launcher files at every depth", async () => {
    expect(await collectLaunchers(tmp, new VisitedSet())).toEqual([
      path.join(tmp, ".desktop"),
      path.join(tmp, "a.desktop"),
      path.join(tmp, "sub", "b.desktop"),
      path.join(tmp, "sub", "deeper", "c.desktop"),
    ]);
  });

  test("skips paths already visited", async () => {
    const visited = new VisitedSet();
    visited.mark(path.join(tmp, ".desktop"));
    visited.mark(path.join(tmp, "a.desktop"));
    visited.mark(path.join(tmp, "sub", "deeper", "c.desktop"));
    expect(await collectLaunchers(tmp, visited)).toEqual([
      path.join(tmp, "sub", "b.desktop"),
    ]);
  });

  test("honours a custom suffix", async () => {
    expect(await collectLaunchers(tmp, new VisitedSet(), { suffix: ".txt" })).toEqual([
      path.join(tmp, "sub", "readme.txt"),
    ]);
  });

  test("iterates lazily", async () => {
    const seen: string[] = [];
    for await (const p of iterateLaunchers(tmp, new VisitedSet())) {
      seen.push(p);
      break;
    }
    expect(seen).toHaveLength(1);
  });

  test("an unreadable root yields nothing and a warning", async () => {
    const logger = new MemoryLogger();
    const found = await collectLaunchers(path.join(tmp, "missing"), new VisitedSet(), {
      logger,
    });
    expect(found).toEqual([]);
    expect(logger.messages("warn")).toEqual(["failed to open directory"]);
  });

  test("follows symlinked directories once and survives loops", async () => {
    const root = await mkTmp("walker-links-");
    try {
      const shared = path.join(root, "shared");
      await writeFile(path.join(shared, "s.desktop"), "");
      await fsp.mkdir(path.join(root, "apps"));
      await fsp.symlink(shared, path.join(root, "apps", "linked"));
      await fsp.symlink(root, path.join(shared, "loop"));

      expect(await collectLaunchers(path.join(root, "apps"), new VisitedSet())).toEqual([
        path.join(root, "apps", "linked", "s.desktop"),
      ]);
      // reachable twice from the top, reported once
      const fromTop = await collectLaunchers(root, new VisitedSet());
      expect(fromTop).toHaveLength(1);
      expect(path.basename(fromTop[0])).toBe("s.desktop");
    } finally {
      await fsp.rm(root, { recursive: true, force: true });
    }
  });
});
