import fsp from "node:fs/promises";
import path from "node:path";
import { fileFingerprint, stringFingerprint } from "../fingerprint.js";
import { MemoryLogger } from "../logger.js";
import { mkTmp } from "./util.js";

describe("fileFingerprint", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("fingerprint-");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("md5 hex of the file content", async () => {
    const file = path.join(tmp, "hello.desktop");
    await fsp.writeFile(file, "hello");
    expect(await fileFingerprint(file)).toBe("5d41402abc4b2a76b9719d911017c592");
  });

  test("empty file still has a digest", async () => {
    const file = path.join(tmp, "empty.desktop");
    await fsp.writeFile(file, "");
    expect(await fileFingerprint(file)).toBe("d41d8cd98f00b204e9800998ecf8427e");
  });

  test("changes when the content changes", async () => {
    const file = path.join(tmp, "edit.desktop");
    await fsp.writeFile(file, "one");
    const before = await fileFingerprint(file);
    await fsp.writeFile(file, "two");
    const after = await fileFingerprint(file);
    expect(before).toBe(stringFingerprint("one"));
    expect(after).toBe(stringFingerprint("two"));
    expect(after).not.toBe(before);
  });

  test("large files are streamed to the same digest", async () => {
    const file = path.join(tmp, "big.desktop");
    const data = Buffer.alloc(1_500_000, "a");
    await fsp.writeFile(file, data);
    expect(await fileFingerprint(file)).toBe(stringFingerprint(data));
  });

  test("missing file is absent without a warning", async () => {
    const logger = new MemoryLogger();
    expect(await fileFingerprint(path.join(tmp, "nope.desktop"), { logger })).toBeNull();
    expect(logger.messages("warn")).toEqual([]);
  });

  test("a directory is absent", async () => {
    expect(await fileFingerprint(tmp)).toBeNull();
  });
});
