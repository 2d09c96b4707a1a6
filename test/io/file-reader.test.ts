/**
 * Tests for byte sources and file access helpers
 */

import { mkdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError, StreamError } from "../../src/errors";
import {
  BufferByteSource,
  createByteSource,
  exists,
  getMetadata,
  openFileSource,
  StreamByteSource,
} from "../../src/io/file-reader";
import { detectRuntime } from "../../src/io/runtime";
import { chunkedStream, TrackingSource } from "../utils/bif6-fixtures";

const FIXTURES_DIR = join(tmpdir(), `bif6-io-fixtures-${process.pid}`);
const TEST_FILES = {
  small: join(FIXTURES_DIR, "small.bin"),
  large: join(FIXTURES_DIR, "large.bin"),
  empty: join(FIXTURES_DIR, "empty.bin"),
  nonexistent: join(FIXTURES_DIR, "nonexistent.bin"),
  directory: join(FIXTURES_DIR, "test-directory"),
};

const LARGE_CONTENT = Uint8Array.from({ length: 5000 }, (_, index) => index % 251);

beforeAll(() => {
  mkdirSync(FIXTURES_DIR, { recursive: true });
  writeFileSync(TEST_FILES.small, Uint8Array.from([1, 2, 3, 4, 5]));
  writeFileSync(TEST_FILES.large, LARGE_CONTENT);
  writeFileSync(TEST_FILES.empty, new Uint8Array(0));
  mkdirSync(TEST_FILES.directory, { recursive: true });
});

afterAll(() => {
  rmSync(FIXTURES_DIR, { recursive: true, force: true });
});

describe("Runtime Detection", () => {
  test("should detect node", () => {
    expect(detectRuntime()).toBe("node");
  });
});

describe("File helpers", () => {
  test("should detect existing files", async () => {
    expect(await exists(TEST_FILES.small)).toBe(true);
    expect(await exists(TEST_FILES.empty)).toBe(true);
  });

  test("should report missing files and directories as absent", async () => {
    expect(await exists(TEST_FILES.nonexistent)).toBe(false);
    expect(await exists(TEST_FILES.directory)).toBe(false);
  });

  test("should reject paths with null bytes", async () => {
    await expect(exists("bad\0path")).rejects.toBeInstanceOf(FileError);
  });

  test("should read file metadata", async () => {
    const metadata = await getMetadata(TEST_FILES.large);

    expect(metadata.size).toBe(5000);
    expect(metadata.path).toBe(TEST_FILES.large);
    expect(metadata.lastModified).toBeInstanceOf(Date);
  });
});

describe("openFileSource", () => {
  test("should read in order and return fewer bytes at end of file", async () => {
    const source = await openFileSource(TEST_FILES.small);

    expect(Array.from(await source.read(3))).toEqual([1, 2, 3]);
    expect(Array.from(await source.read(3))).toEqual([4, 5]);
    expect(await source.read(3)).toHaveLength(0);

    await source.close();
  });

  test("should assemble reads larger than the buffer size", async () => {
    const source = await openFileSource(TEST_FILES.large, { bufferSize: 1024 });

    const bytes = await source.read(4500);

    expect(bytes).toHaveLength(4500);
    expect(bytes[4499]).toBe(4499 % 251);
    expect(await source.read(1000)).toHaveLength(500);
    await source.close();
  });

  test("should fail reads after close and allow closing twice", async () => {
    const source = await openFileSource(TEST_FILES.small);

    await source.close();
    await source.close();

    await expect(source.read(1)).rejects.toBeInstanceOf(FileError);
  });

  test("should raise FileError for a missing file", async () => {
    try {
      await openFileSource(TEST_FILES.nonexistent);
      expect.unreachable("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(FileError);
      expect((error as FileError).filePath).toBe(TEST_FILES.nonexistent);
    }
  });

  test("should raise FileError with open context when the size check is disabled", async () => {
    try {
      await openFileSource(TEST_FILES.nonexistent, { maxFileSize: 0 });
      expect.unreachable("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(FileError);
      expect((error as FileError).operation).toBe("open");
      expect((error as FileError).message).toContain("runtime: node");
    }
  });

  test("should reject buffer sizes outside the allowed range", async () => {
    await expect(openFileSource(TEST_FILES.small, { bufferSize: 16 })).rejects.toBeInstanceOf(
      FileError
    );
  });
});

describe("BufferByteSource", () => {
  test("should copy out consecutive slices", async () => {
    const data = Uint8Array.from([9, 8, 7, 6]);
    const source = new BufferByteSource(data);

    const first = await source.read(3);
    data[0] = 0;

    expect(Array.from(first)).toEqual([9, 8, 7]);
    expect(Array.from(await source.read(3))).toEqual([6]);
    expect(await source.read(3)).toHaveLength(0);
  });

  test("should fail after close", async () => {
    const source = new BufferByteSource(new Uint8Array(4));
    await source.close();

    await expect(source.read(1)).rejects.toBeInstanceOf(StreamError);
  });
});

describe("StreamByteSource", () => {
  test("should satisfy reads across chunk boundaries", async () => {
    const source = new StreamByteSource(chunkedStream(Uint8Array.from([1, 2, 3, 4, 5, 6, 7]), 3));

    expect(Array.from(await source.read(4))).toEqual([1, 2, 3, 4]);
    expect(Array.from(await source.read(2))).toEqual([5, 6]);
    expect(Array.from(await source.read(4))).toEqual([7]);
    expect(await source.read(4)).toHaveLength(0);

    await source.close();
  });

  test("should wrap stream failures in StreamError", async () => {
    const stream = new ReadableStream<Uint8Array>({
      pull(controller): void {
        controller.error(new Error("socket hang up"));
      },
    });
    const source = new StreamByteSource(stream);

    try {
      await source.read(4);
      expect.unreachable("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(StreamError);
      expect((error as StreamError).message).toBe("Stream read failed: socket hang up");
    }
  });

  test("should fail after close", async () => {
    const source = new StreamByteSource(chunkedStream(new Uint8Array(8), 4));
    await source.close();

    await expect(source.read(1)).rejects.toBeInstanceOf(StreamError);
  });
});

describe("createByteSource", () => {
  test("should wrap bytes and streams", async () => {
    expect(await createByteSource(new Uint8Array(1))).toBeInstanceOf(BufferByteSource);
    expect(await createByteSource(chunkedStream(new Uint8Array(1), 1))).toBeInstanceOf(
      StreamByteSource
    );
  });

  test("should pass custom sources through", async () => {
    const custom = new TrackingSource(new Uint8Array(2));

    expect(await createByteSource(custom)).toBe(custom);
  });

  test("should open file paths", async () => {
    const source = await createByteSource(TEST_FILES.small);

    expect(source.description).toBe(TEST_FILES.small);
    expect(Array.from(await source.read(2))).toEqual([1, 2]);
    await source.close();
  });
});
