import { afterEach, describe, expect, it, vi } from "vitest";
import { createProcessMemoryProbe, idleMemoryProbe } from "../../src/infrastructure/cache/memory-probe.js";

const MB = 1024 * 1024;

const usage = (rssMb: number): NodeJS.MemoryUsage => ({
  rss: rssMb * MB,
  heapTotal: 0,
  heapUsed: 0,
  external: 0,
  arrayBuffers: 0,
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Process memory usage", () => {
  it("reports resident memory as a fraction of the limit", () => {
    vi.spyOn(process, "memoryUsage").mockReturnValue(usage(32));
    expect(createProcessMemoryProbe(128)()).toBe(0.25);
  });

  it("clamps at 1 when usage exceeds the limit", () => {
    vi.spyOn(process, "memoryUsage").mockReturnValue(usage(300));
    expect(createProcessMemoryProbe(256)()).toBe(1);
  });

  it("reads the live process without mocks", () => {
    const fraction = createProcessMemoryProbe(1024 * 1024)();
    expect(fraction).toBeGreaterThan(0);
    expect(fraction).toBeLessThan(1);
  });

  it("the idle reader always reports zero", () => {
    expect(idleMemoryProbe()).toBe(0);
  });
});
