import { describe, it, expect } from "vitest";
import { mkdirSync } from "fs";
import { join } from "path";
import { isSupportedImage, listImageFiles, listInputPhotos } from "../../../src/sources/local";
import { InputNotFoundError, InvalidImageFormatError } from "../../../src/errors";
import { makeTempDir, writeFiles } from "../../helpers/fake-engine";

describe("isSupportedImage", () => {
  it("accepts jpg, jpeg and png in any case", () => {
    expect(isSupportedImage("a.jpg")).toBe(true);
    expect(isSupportedImage("a.JPEG")).toBe(true);
    expect(isSupportedImage("/x/y/a.Png")).toBe(true);
    expect(isSupportedImage("a.heic")).toBe(false);
    expect(isSupportedImage("jpg")).toBe(false);
  });
});

describe("listImageFiles", () => {
  it("lists accepted images sorted by path, ignoring hidden files and subdirectories", () => {
    const dir = writeFiles(makeTempDir(), {
      "b.jpg": "",
      "A.png": "",
      "a.jpeg": "",
      ".hidden.jpg": "",
      "notes.txt": "",
    });
    mkdirSync(join(dir, "nested.jpg"));

    expect(listImageFiles(dir)).toEqual([join(dir, "A.png"), join(dir, "a.jpeg"), join(dir, "b.jpg")]);
  });

  it("fails on a missing directory", () => {
    expect(() => listImageFiles(join(makeTempDir(), "absent"))).toThrow(InputNotFoundError);
  });
});

describe("listInputPhotos", () => {
  it("returns a single file as a one-element list", () => {
    const dir = writeFiles(makeTempDir(), { "me.jpg": "" });
    expect(listInputPhotos({ kind: "file", path: join(dir, "me.jpg") })).toEqual([join(dir, "me.jpg")]);
  });

  it("rejects a single file with another extension", () => {
    const dir = writeFiles(makeTempDir(), { "me.bmp": "" });
    expect(() => listInputPhotos({ kind: "file", path: join(dir, "me.bmp") })).toThrow(InvalidImageFormatError);
  });

  it("rejects a directory without images", () => {
    const dir = writeFiles(makeTempDir(), { "notes.txt": "" });
    expect(() => listInputPhotos({ kind: "directory", path: dir })).toThrow(
      `No valid JPEG/PNG images found in input directory: ${dir}`
    );
  });

  it("rejects a missing input", () => {
    expect(() => listInputPhotos({ kind: "file", path: "/definitely/not/here.jpg" })).toThrow(
      "Input file not found: /definitely/not/here.jpg"
    );
  });
});
