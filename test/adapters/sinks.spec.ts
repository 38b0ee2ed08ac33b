import { describe, it, expect, vi, afterEach } from "vitest";
import { BufferSink, ConsoleSink, createSink } from "../../src/adapters/sinks";

describe("diagnostic sinks", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("buffers blocks one per line", () => {
    const sink = new BufferSink();
    sink.write("first\nLine 1: x\n^");
    sink.write("second");
    expect(sink.contents()).toBe("first\nLine 1: x\n^\nsecond\n");
    sink.clear();
    expect(sink.contents()).toBe("");
  });

  it("prints directly and keeps nothing", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const sink = new ConsoleSink();
    sink.write("block");
    expect(log).toHaveBeenCalledWith("block");
    expect(sink.contents()).toBe("");
  });

  it("picks the sink for a mode", () => {
    expect(createSink("buffered")).toBeInstanceOf(BufferSink);
    expect(createSink("direct")).toBeInstanceOf(ConsoleSink);
  });
});
