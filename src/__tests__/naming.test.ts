import { describe, it, expect } from "vitest";
import path from "node:path";
import { backupPathFor, classify } from "../naming.js";
import type { NamingPolicy } from "../types.js";

const policy: NamingPolicy = {
  originalSuffix: "_original",
  skipSuffix: "_skip",
  skipOriginal: true,
  skipSkip: true,
  compress: true,
  ignoreSuffixCase: false,
};

describe("classify", () => {
  it("skips files whose stem ends with the skip suffix", () => {
    expect(classify("photo_skip.jpg", policy)).toBe("skip");
  });

  it("skips files whose stem ends with the original suffix", () => {
    expect(classify("photo_original.png", policy)).toBe("skip");
  });

  it("processes ordinary files in full", () => {
    expect(classify("photo.jpg", policy)).toBe("full");
  });

  it("only looks at the stem, not the extension", () => {
    expect(classify("photo.jpg_skip", policy)).toBe("full");
    expect(classify("holiday_skip.final.jpg", policy)).toBe("full");
  });

  it("ignores markers when the matching flag is off", () => {
    expect(classify("photo_skip.jpg", { ...policy, skipSkip: false })).toBe("full");
    expect(classify("photo_original.jpg", { ...policy, skipOriginal: false })).toBe("full");
  });

  it("returns backup-only when compression is disabled", () => {
    expect(classify("photo.jpg", { ...policy, compress: false })).toBe("backup-only");
    expect(classify("photo_skip.jpg", { ...policy, compress: false })).toBe("skip");
  });

  it("matches suffixes case-sensitively by default", () => {
    expect(classify("photo_SKIP.jpg", policy)).toBe("full");
    expect(classify("photo_Original.jpg", policy)).toBe("full");
  });

  it("matches suffixes case-insensitively when asked", () => {
    const loose = { ...policy, ignoreSuffixCase: true };
    expect(classify("photo_SKIP.jpg", loose)).toBe("skip");
    expect(classify("photo_Original.jpg", loose)).toBe("skip");
  });

  it("never matches an empty suffix", () => {
    expect(classify("photo.jpg", { ...policy, skipSuffix: "", originalSuffix: "" })).toBe("full");
  });

  it("gives the same answer every time", () => {
    const names = ["a.jpg", "b_skip.png", "c_original.webp", "D_SKIP.gif"];
    const first = names.map((name) => classify(name, policy));
    const second = names.map((name) => classify(name, policy));
    expect(second).toEqual(first);
    expect(first).toEqual(["full", "skip", "skip", "full"]);
  });
});

describe("backupPathFor", () => {
  it("puts the backup in a folder beside the image", () => {
    const file = path.join("photos", "2024", "beach.JPG");
    expect(backupPathFor(file, "original image", "_original")).toBe(
      path.join("photos", "2024", "original image", "beach_original.JPG")
    );
  });

  it("uses an absolute backup folder as given", () => {
    const folder = path.resolve("backups");
    expect(backupPathFor(path.join("photos", "cat.png"), folder, "_orig")).toBe(path.join(folder, "cat_orig.png"));
  });

  it("mirrors subfolders below the scan root inside an absolute backup folder", () => {
    const folder = path.resolve("backups");
    const root = path.resolve("photos");

    expect(backupPathFor(path.join(root, "x", "photo.jpg"), folder, "_original", root)).toBe(
      path.join(folder, "x", "photo_original.jpg")
    );
    expect(backupPathFor(path.join(root, "y", "photo.jpg"), folder, "_original", root)).toBe(
      path.join(folder, "y", "photo_original.jpg")
    );
    expect(backupPathFor(path.join(root, "top.jpg"), folder, "_original", root)).toBe(
      path.join(folder, "top_original.jpg")
    );
  });

  it("falls back to the flat absolute folder for files outside the scan root", () => {
    const folder = path.resolve("backups");
    const root = path.resolve("photos");

    expect(backupPathFor(path.resolve("elsewhere", "a.png"), folder, "_original", root)).toBe(
      path.join(folder, "a_original.png")
    );
  });
});
