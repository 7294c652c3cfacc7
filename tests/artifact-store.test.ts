import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArtifactNotFoundError } from "@/lib/errors";
import {
  createArtifactName,
  isArtifactName,
  readArtifact,
  resolveArtifactPath,
  saveArtifact
} from "@/lib/services/artifact-store";

describe("artifact-store", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "artifact-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("生成する名前は slide_ と8桁の16進数", () => {
    const name = createArtifactName();
    expect(name).toMatch(/^slide_[0-9a-f]{8}\.pptx$/);
    expect(isArtifactName(name)).toBe(true);
    expect(isArtifactName("../slide_00000000.pptx")).toBe(false);
  });

  it("保存したファイルを名前で読み出せる", async () => {
    const saved = await saveArtifact(Buffer.from("pptx-bytes"), { dir });

    expect(saved.filePath).toBe(path.join(dir, saved.filename));
    const data = await readArtifact(saved.filename, { dir });
    expect(data.toString()).toBe("pptx-bytes");
  });

  it("名前が衝突したら既存ファイルを上書きせず別名で保存する", async () => {
    await fs.writeFile(path.join(dir, "slide_aaaaaaaa.pptx"), "old");
    const names = ["slide_aaaaaaaa.pptx", "slide_bbbbbbbb.pptx"];

    const saved = await saveArtifact(Buffer.from("new"), { dir, createName: () => names.shift() ?? "" });

    expect(saved.filename).toBe("slide_bbbbbbbb.pptx");
    expect(await fs.readFile(path.join(dir, "slide_aaaaaaaa.pptx"), "utf8")).toBe("old");
    expect(await fs.readFile(path.join(dir, "slide_bbbbbbbb.pptx"), "utf8")).toBe("new");
  });

  it("衝突が続いたら諦める", async () => {
    await fs.writeFile(path.join(dir, "slide_aaaaaaaa.pptx"), "old");

    await expect(
      saveArtifact(Buffer.from("new"), { dir, createName: () => "slide_aaaaaaaa.pptx" })
    ).rejects.toThrow("Could not allocate a unique artifact name after 5 attempts.");
  });

  it("形式外の名前や存在しないファイルは ArtifactNotFoundError", async () => {
    await expect(resolveArtifactPath("../../etc/passwd", { dir })).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(resolveArtifactPath("slide_12345678.pptx", { dir })).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });
});
