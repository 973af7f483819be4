import { describe, expect, it } from "vitest";
import { Manifest, MANIFEST_VERSION } from "../src/model/manifest.js";
import { parseUserChannel } from "../src/model/user-channel.js";
import { formatVersion } from "../src/model/version.js";
import { channel, v } from "./helpers.js";

function names(m: Manifest): string[] {
  return m.getChannels().map((c) => formatVersion(c.name));
}

describe("Manifest", () => {
  it("starts empty with the current format version", () => {
    const m = Manifest.empty(new Date("2024-01-01T00:00:00Z"));
    expect(m.manifestVersion).toBe(MANIFEST_VERSION);
    expect(m.date).toBe(1704067200);
    expect(m.getChannels()).toEqual([]);
  });

  describe("getLatestStable", () => {
    it("picks the highest unaliased channel", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.14.0"), channel("0.15.0")]);
      expect(m.getLatestStable()?.name.version).toBe("0.15.0");
    });

    it("ignores tagged pre-releases", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.14.0"), channel("0.15.0")]);
      m.addChannel(channel("0.16.0-custom-build", [], { kind: "tag", name: "custom-dev-build" }));
      expect(m.getLatestStable()?.name.version).toBe("0.15.0");
    });

    it("prefers the explicitly stable channel", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.15.0", [], { kind: "stable" }), channel("0.16.0")]);
      expect(m.getLatestStable()?.name.version).toBe("0.15.0");
    });

    it("returns undefined when nothing is stable-eligible", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("1.0.0", [], { kind: "nightly" })]);
      expect(m.getLatestStable()).toBeUndefined();
    });
  });

  describe("addChannel", () => {
    it("moves the stable alias to a newer stable channel", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.15.0", [], { kind: "stable" })]);
      m.addChannel(channel("0.16.0", [], { kind: "stable" }));
      expect(m.getChannelByName(v("0.15.0"))?.alias).toBeUndefined();
      expect(m.getLatestStable()?.name.version).toBe("0.16.0");
      expect(m.getChannels().filter((c) => c.alias?.kind === "stable")).toHaveLength(1);
    });

    it("strips the stable alias from every channel that carries it", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [
        channel("0.14.0", [], { kind: "stable" }),
        channel("0.15.0", [], { kind: "stable" }),
        channel("0.13.0"),
      ]);
      m.addChannel(channel("0.16.0", [], { kind: "stable" }));
      expect(m.getChannels().filter((c) => c.alias?.kind === "stable").map((c) => formatVersion(c.name))).toEqual([
        "0.16.0",
      ]);
      expect(m.getChannelByName(v("0.14.0"))?.alias).toBeUndefined();
      expect(m.getChannelByName(v("0.15.0"))?.alias).toBeUndefined();
    });

    it("keeps the stable alias when an older channel is added", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.15.0", [], { kind: "stable" })]);
      m.addChannel(channel("0.13.0"));
      expect(m.getChannelByName(v("0.15.0"))?.alias).toEqual({ kind: "stable" });
    });

    it("replaces a channel with the same name", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.14.0"), channel("0.15.0")]);
      m.addChannel(channel("0.14.0", [], { kind: "tag", name: "re" }));
      expect(names(m)).toEqual(["0.15.0", "0.14.0"]);
      expect(m.getChannelByName(v("0.14.0"))?.alias).toEqual({ kind: "tag", name: "re" });
    });

    it("keeps one entry when the same channel is added twice", () => {
      const m = Manifest.empty();
      m.addChannel(channel("0.15.0"));
      m.addChannel(channel("0.15.0"));
      expect(names(m)).toEqual(["0.15.0"]);
    });

    it("treats build metadata as part of the name", () => {
      const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.14.0")]);
      m.addChannel(channel("0.14.0+local"));
      expect(names(m)).toEqual(["0.14.0", "0.14.0+local"]);
    });
  });

  it("falls back to the next stable channel after removal", () => {
    const m = new Manifest(MANIFEST_VERSION, 0, [channel("0.14.0"), channel("0.15.0", [], { kind: "stable" })]);
    m.removeChannel(v("0.15.0"));
    expect(m.getLatestStable()?.name.version).toBe("0.14.0");
    m.removeChannel(v("0.14.0"));
    expect(m.getLatestStable()).toBeUndefined();
  });

  describe("getChannel", () => {
    const m = new Manifest(MANIFEST_VERSION, 0, [
      channel("0.15.0", [], { kind: "stable" }),
      channel("0.16.0", [], { kind: "nightly", tag: "2024-03-01" }),
      channel("0.17.0", [], { kind: "nightly" }),
      channel("0.18.0", [], { kind: "tag", name: "beta" }),
    ]);
    const lookup = (raw: string) => {
      const found = m.getChannel(parseUserChannel(raw));
      return found && formatVersion(found.name);
    };

    it("resolves every user channel form", () => {
      expect(lookup("stable")).toBe("0.15.0");
      expect(lookup("nightly")).toBe("0.17.0");
      expect(lookup("nightly-2024-03-01")).toBe("0.16.0");
      expect(lookup("beta")).toBe("0.18.0");
      expect(lookup("0.16.0")).toBe("0.16.0");
    });

    it("misses unknown names", () => {
      expect(lookup("nightly-1999-01-01")).toBeUndefined();
      expect(lookup("gamma")).toBeUndefined();
      expect(lookup("9.9.9")).toBeUndefined();
    });
  });

  it("falls back to the highest nightly when none is current", () => {
    const m = new Manifest(MANIFEST_VERSION, 0, [
      channel("0.16.0", [], { kind: "nightly", tag: "a" }),
      channel("0.17.0", [], { kind: "nightly", tag: "b" }),
    ]);
    expect(m.getLatestNightly()?.name.version).toBe("0.17.0");
  });
});
