import path from "node:path";
import { mkdir } from "node:fs/promises";
import { afterEach, describe, expect, it, vi } from "vitest";
import { listMediaFiles, mediaKind } from "@/lib/mediaFiles";
import { getServerConfig } from "@/lib/serverConfig";
import { makeTempDir, removeDir, touch } from "./helpers";

describe("getServerConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("falls back to defaults", () => {
    expect(getServerConfig({})).toEqual({
      outputRoot: "./output",
      taxonomyPath: "./taxonomy.yaml",
      processingMode: "balanced",
      supabaseUrl: null,
      supabaseServiceRoleKey: null,
      classificationsTable: "classifications",
    });
  });

  it("reads settings from the environment", () => {
    const config = getServerConfig({
      TRAILSORT_OUTPUT_ROOT: "/data/sorted",
      TRAILSORT_TAXONOMY_PATH: "/etc/taxonomy.json",
      TRAILSORT_PROCESSING_MODE: "high_recall",
      NEXT_PUBLIC_SUPABASE_URL: "http://localhost:54321",
      SUPABASE_SERVICE_ROLE_KEY: "test-secret",
      TRAILSORT_CLASSIFICATIONS_TABLE: "trail_runs",
    });

    expect(config).toEqual({
      outputRoot: "/data/sorted",
      taxonomyPath: "/etc/taxonomy.json",
      processingMode: "high_recall",
      supabaseUrl: "http://localhost:54321",
      supabaseServiceRoleKey: "test-secret",
      classificationsTable: "trail_runs",
    });
  });

  it("warns about an unknown processing mode and uses balanced", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(getServerConfig({ TRAILSORT_PROCESSING_MODE: "turbo" }).processingMode).toBe("balanced");
    expect(warn).toHaveBeenCalledWith('[Config] Unknown TRAILSORT_PROCESSING_MODE "turbo", using "balanced"');
  });
});

describe("media files", () => {
  it("recognises video and image extensions in any case", () => {
    expect(mediaKind("/in/CLIP.MP4")).toBe("video");
    expect(mediaKind("trail.webm")).toBe("video");
    expect(mediaKind("photo.JPEG")).toBe("image");
    expect(mediaKind("scan.tif")).toBe("image");
    expect(mediaKind("notes.txt")).toBeNull();
    expect(mediaKind("README")).toBeNull();
  });

  it("lists supported files directly inside a folder, sorted by name", async () => {
    const dir = await makeTempDir();
    try {
      await touch(path.join(dir, "b.jpg"));
      await touch(path.join(dir, "a.mp4"));
      await touch(path.join(dir, "a.mp4.detections.json"));
      await touch(path.join(dir, "notes.txt"));
      await mkdir(path.join(dir, "nested.jpg"));

      expect(await listMediaFiles(dir)).toEqual([path.join(dir, "a.mp4"), path.join(dir, "b.jpg")]);
    } finally {
      await removeDir(dir);
    }
  });
});
