import { describe, test, expect } from "vitest";
import { PassThrough } from "node:stream";
import { createOutputSink } from "../src/sink/output-sink.js";
import {
  createMemorySurface,
  createStreamSurface,
} from "../src/sink/surface.js";
import type { MemorySurface } from "../src/sink/surface.js";

function trackedFactory(): { factory: () => MemorySurface; created: MemorySurface[] } {
  const created: MemorySurface[] = [];
  return {
    created,
    factory: () => {
      const surface = createMemorySurface();
      created.push(surface);
      return surface;
    },
  };
}

describe("OutputSink", () => {
  test("appends chunks in arrival order", () => {
    const sink = createOutputSink(createMemorySurface);
    sink.createOrReset();
    sink.append(["C1 line", ""]);
    sink.append(["C2 line", ""]);
    const text = sink.contents();
    expect(text).toBe("C1 line\nC2 line\n");
    expect(text.indexOf("C1")).toBeLessThan(text.indexOf("C2"));
  });

  test("first line of a chunk continues the previous partial line", () => {
    const sink = createOutputSink(createMemorySurface);
    sink.createOrReset();
    sink.append(["comp"]);
    sink.append(["iling", "done", ""]);
    expect(sink.contents()).toBe("compiling\ndone\n");
  });

  test("appendLine adds a trailing line break", () => {
    const sink = createOutputSink(createMemorySurface);
    sink.createOrReset();
    sink.appendLine("status: 1");
    sink.append("next");
    expect(sink.contents()).toBe("status: 1\nnext");
  });

  test("createOrReset twice yields an empty sink both times", () => {
    const sink = createOutputSink(createMemorySurface);
    sink.createOrReset();
    sink.appendLine("old run");
    sink.createOrReset();
    expect(sink.contents()).toBe("");
    sink.createOrReset();
    expect(sink.contents()).toBe("");
  });

  test("reuses a valid surface instead of creating a new one", () => {
    const { factory, created } = trackedFactory();
    const sink = createOutputSink(factory);
    sink.createOrReset();
    sink.appendLine("x");
    sink.createOrReset();
    expect(created).toHaveLength(1);
  });

  test("creates a new surface once the old one was closed", () => {
    const { factory, created } = trackedFactory();
    const sink = createOutputSink(factory);
    sink.createOrReset();
    sink.appendLine("first");
    created[0]!.dispose();
    expect(sink.isActive()).toBe(false);

    sink.createOrReset();
    expect(created).toHaveLength(2);
    expect(sink.isActive()).toBe(true);
    expect(sink.contents()).toBe("");
  });

  test("append without a surface creates one rather than dropping output", () => {
    const { factory, created } = trackedFactory();
    const sink = createOutputSink(factory);
    sink.append(["early", ""]);
    expect(created).toHaveLength(1);
    expect(sink.contents()).toBe("early\n");
  });

  test("focus reaches the surface", () => {
    const { factory, created } = trackedFactory();
    const sink = createOutputSink(factory);
    sink.createOrReset();
    sink.focus();
    sink.focus();
    expect(created[0]!.focusCount).toBe(2);
  });
});

describe("createStreamSurface", () => {
  test("mirrors inserts to the stream", async () => {
    const stream = new PassThrough();
    const written: string[] = [];
    stream.on("data", (chunk: Buffer) => written.push(chunk.toString("utf8")));

    const sink = createOutputSink(() => createStreamSurface(stream));
    sink.createOrReset();
    sink.appendLine("Hammer mode started");
    sink.append(["out", ""]);

    expect(sink.contents()).toBe("Hammer mode started\nout\n");
    await new Promise((resolve) => setImmediate(resolve));
    expect(written.join("")).toBe("Hammer mode started\nout\n");
  });

  test("is invalid once the stream is destroyed", () => {
    const stream = new PassThrough();
    const surface = createStreamSurface(stream);
    expect(surface.isValid()).toBe(true);
    stream.destroy();
    expect(surface.isValid()).toBe(false);
  });
});
