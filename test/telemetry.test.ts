import { describe, expect, it } from "vitest";
import { Telemetry, type TelemetryEvent } from "../src/telemetry/telemetry.js";

describe("telemetry", () => {
  it("delivers events to handlers whose prefix matches", () => {
    const telemetry = new Telemetry();
    const manifest: string[] = [];
    const all: string[] = [];
    telemetry.attach("manifest", ["portwire", "manifest"], (e) => manifest.push(e.event.join(".")));
    telemetry.attach("all", ["portwire"], (e) => all.push(e.event.join(".")));

    telemetry.emit(["manifest", "loaded"], { count: 1 }, {});
    telemetry.emit(["registry", "register"], { count: 1 }, {});

    expect(manifest).toEqual(["portwire.manifest.loaded"]);
    expect(all).toEqual(["portwire.manifest.loaded", "portwire.registry.register"]);
  });

  it("does not prefix an event that already carries the prefix", () => {
    const telemetry = new Telemetry();
    const events: TelemetryEvent[] = [];
    telemetry.attach("t", [], (e) => events.push(e));

    telemetry.emit(["portwire", "manifest", "error"], { count: 1 }, { kind: "io_error" });

    expect(events).toEqual([
      { event: ["portwire", "manifest", "error"], measurements: { count: 1 }, metadata: { kind: "io_error" } },
    ]);
  });

  it("detaches a handler that throws and keeps delivering to others", () => {
    const telemetry = new Telemetry();
    const seen: string[] = [];
    telemetry.attach("bad", ["portwire"], () => {
      throw new Error("boom");
    });
    telemetry.attach("good", ["portwire"], (e) => seen.push(e.event.join(".")));

    telemetry.emit(["a"], {}, {});
    telemetry.emit(["b"], {}, {});

    expect(telemetry.handlerIds()).toEqual(["good"]);
    expect(seen).toEqual(["portwire.a", "portwire.b"]);
  });

  it("rejects a duplicate handler id and allows it again after detach", () => {
    const telemetry = new Telemetry();
    telemetry.attach("h", [], () => undefined);
    expect(() => telemetry.attach("h", [], () => undefined)).toThrow('Telemetry handler "h" is already attached.');

    expect(telemetry.detach("h")).toBe(true);
    expect(telemetry.detach("h")).toBe(false);
    telemetry.attach("h", [], () => undefined);
    expect(telemetry.handlerIds()).toEqual(["h"]);
  });

  describe("measure", () => {
    it("emits the duration with status ok and returns the result", () => {
      const telemetry = new Telemetry();
      const events: TelemetryEvent[] = [];
      telemetry.attach("t", [], (e) => events.push(e));

      expect(telemetry.measure(["rrf", "fuse"], { lists: 2 }, () => 42)).toBe(42);

      expect(events).toHaveLength(1);
      expect(events[0].event).toEqual(["portwire", "rrf", "fuse"]);
      expect(events[0].measurements.duration).toBeGreaterThanOrEqual(0);
      expect(events[0].metadata).toEqual({ lists: 2, status: "ok" });
    });

    it("emits status error and rethrows", () => {
      const telemetry = new Telemetry();
      const events: TelemetryEvent[] = [];
      telemetry.attach("t", [], (e) => events.push(e));

      expect(() =>
        telemetry.measure(["rrf", "fuse"], {}, () => {
          throw new Error("bad k");
        }),
      ).toThrow("bad k");
      expect(events[0].metadata).toEqual({ status: "error", error: "bad k" });
    });
  });

  describe("span", () => {
    it("emits start and stop around a successful call", () => {
      const telemetry = new Telemetry();
      const names: string[] = [];
      telemetry.attach("t", [], (e) => names.push(e.event.join(".")));

      telemetry.span(["manifest", "validate"], { path: "m.yaml" }, () => "done");

      expect(names).toEqual(["portwire.manifest.validate.start", "portwire.manifest.validate.stop"]);
    });

    it("emits exception when the call throws", () => {
      const telemetry = new Telemetry();
      const events: TelemetryEvent[] = [];
      telemetry.attach("t", [], (e) => events.push(e));

      expect(() =>
        telemetry.span(["manifest", "validate"], { path: "m.yaml" }, () => {
          throw new Error("nope");
        }),
      ).toThrow("nope");

      expect(events.map((e) => e.event.at(-1))).toEqual(["start", "exception"]);
      expect(events[1].metadata).toEqual({ path: "m.yaml", error: "nope" });
    });
  });
});
