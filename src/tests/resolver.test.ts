import { MemoryLogger } from "../logger.js";
import { QueryChannel } from "../query-channel.js";
import { OwnershipResolver } from "../resolver.js";
import { FakeQueryService, pkg } from "./util.js";

describe("OwnershipResolver", () => {
  let service: FakeQueryService;
  let resolver: OwnershipResolver;
  let logger: MemoryLogger;

  beforeEach(() => {
    service = new FakeQueryService();
    logger = new MemoryLogger();
    resolver = new OwnershipResolver(new QueryChannel(service), logger);
  });

  test("exactly one match resolves", async () => {
    service.owners.set("/a.desktop", [pkg("gedit")]);
    const res = await resolver.resolveOwner(["/a.desktop"]);
    expect(res).toEqual({ ok: true, owner: pkg("gedit"), exit: "success" });
  });

  test("no match fails", async () => {
    const res = await resolver.resolveOwner(["/a.desktop"]);
    expect(res).toEqual({ ok: false, reason: "none", matches: 0, exit: "success" });
    expect(logger.messages("warn")).toEqual(["ownership is not exactly one package"]);
  });

  test("several matches are ambiguous", async () => {
    service.owners.set("/a.desktop", [pkg("gedit"), pkg("gedit-plugins")]);
    const res = await resolver.resolveOwner(["/a.desktop"]);
    expect(res).toEqual({ ok: false, reason: "ambiguous", matches: 2, exit: "success" });
  });

  test("a failed query with no matches fails", async () => {
    service.exit = "failed";
    const res = await resolver.resolveOwner(["/a.desktop"]);
    expect(res.ok).toBe(false);
    expect(res.exit).toBe("failed");
  });

  test("searches installed packages for every given path", async () => {
    await resolver.resolveOwner(["/a.desktop", "/b.desktop"]);
    expect(service.searches).toEqual([["/a.desktop", "/b.desktop"]]);
  });

  test("manifests flatten to path and owner pairs", async () => {
    service.manifests.set("vim;9.0;amd64;installed", ["/usr/bin/vim", "/v.desktop"]);
    service.manifests.set("emacs;29;amd64;installed", ["/e.desktop"]);
    const files = await resolver.resolveFilesForPackages([
      "vim;9.0;amd64;installed",
      "emacs;29;amd64;installed",
    ]);
    expect(files).toEqual([
      { path: "/usr/bin/vim", owner: "vim", packageId: "vim;9.0;amd64;installed" },
      { path: "/v.desktop", owner: "vim", packageId: "vim;9.0;amd64;installed" },
      { path: "/e.desktop", owner: "emacs", packageId: "emacs;29;amd64;installed" },
    ]);
  });

  test("no packages means no query", async () => {
    expect(await resolver.resolveFilesForPackages([])).toEqual([]);
    expect(service.fileRequests).toEqual([]);
  });
});
