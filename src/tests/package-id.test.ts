import {
  buildPackageId,
  packageName,
  splitPackageId,
  toInstalledPackageId,
} from "../package-id.js";

describe("package ids", () => {
  test("build and split", () => {
    const id = buildPackageId("gedit", "3.38.1-1", "x86_64", "fedora");
    expect(id).toBe("gedit;3.38.1-1;x86_64;fedora");
    expect(splitPackageId(id)).toEqual({
      name: "gedit",
      version: "3.38.1-1",
      arch: "x86_64",
      data: "fedora",
    });
  });

  test("malformed ids do not split", () => {
    expect(splitPackageId("gedit")).toBeNull();
    expect(splitPackageId(";1;x86_64;fedora")).toBeNull();
    expect(splitPackageId("a;b;c;d;e")).toBeNull();
  });

  test("owner name", () => {
    expect(packageName("vim;9.0;amd64;installed")).toBe("vim");
    expect(packageName("not-an-id")).toBe("not-an-id");
  });

  test("installed form rewrites only the data field", () => {
    expect(toInstalledPackageId("gedit;3.38.1-1;x86_64;updates")).toBe(
      "gedit;3.38.1-1;x86_64;installed",
    );
    expect(toInstalledPackageId("weird")).toBe("weird");
  });
});
