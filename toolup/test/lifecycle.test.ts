import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { install } from "../src/lifecycle/install.js";
import { readInstallState } from "../src/lifecycle/markers.js";
import { readPointer } from "../src/lifecycle/pointers.js";
import { uninstall } from "../src/lifecycle/uninstall.js";
import { update } from "../src/lifecycle/update.js";
import type { Channel } from "../src/model/channel.js";
import { formatVersion } from "../src/model/version.js";
import {
  NIGHTLY_CHANNEL,
  OLD_CHANNEL,
  manifestJson,
  removeTempDirs,
  stableChannelJson,
  testSession,
  toolupFailure,
  v,
  type TestSession,
} from "./helpers.js";

const UPSTREAM = manifestJson(OLD_CHANNEL, stableChannelJson(), NIGHTLY_CHANNEL);

function upstream(s: TestSession, version: string): Channel {
  const c = s.ctx.upstream.getChannelByName(v(version));
  if (!c) throw new Error(`fixture has no channel ${version}`);
  return c;
}

afterEach(() => {
  removeTempDirs();
});

describe("install", () => {
  it("installs every component and records the channel", async () => {
    const s = await testSession(UPSTREAM);
    const saved = await install(s.ctx, upstream(s, "0.15.0"), s.local);
    const sysroot = s.ctx.layout.sysroot(v("0.15.0"));

    expect(s.buildTool.installed).toEqual(["forc", "fmt", "std"]);
    expect(fs.existsSync(path.join(sysroot.root, "lib", "libstd.a"))).toBe(true);
    expect(await readInstallState(sysroot)).toEqual({ kind: "complete", completed: ["forc", "fmt", "std"] });
    expect(fs.statSync(sysroot.script).mode & 0o777).toBe(0o755);
    expect(saved.alias).toEqual({ kind: "stable" });
    expect(await readPointer(s.ctx.layout.stablePointer)).toBe(sysroot.root);

    const reloaded = await s.ctx.store.load();
    expect(reloaded.getLatestStable()?.name.version).toBe("0.15.0");
    expect(s.reporter.diagnostics().map((d) => d.code)).toEqual(["INSTALL_START", "INSTALL_DONE"]);
  });

  it("runs pending setup commands once through the call format", async () => {
    const s = await testSession(UPSTREAM);
    const saved = await install(s.ctx, upstream(s, "0.15.0"), s.local);
    const sysroot = s.ctx.layout.sysroot(v("0.15.0"));

    expect(s.buildTool.commands).toEqual([[path.join(sysroot.bin, "fmt"), "init"]]);
    expect(saved.getComponent("fmt")?.initialized).toBe(true);
    expect((await s.ctx.store.load()).getChannelByName(v("0.15.0"))?.getComponent("fmt")?.initialized).toBe(true);
  });

  it("only warns when a setup command fails", async () => {
    const s = await testSession(UPSTREAM);
    s.buildTool.commandExitCodes.set("init", 3);
    const saved = await install(s.ctx, upstream(s, "0.15.0"), s.local);

    expect(saved.getComponent("fmt")?.initialized).toBeUndefined();
    expect(s.reporter.warnings().map((d) => [d.code, d.message])).toEqual([
      ["INIT_FAILED", "initialization of fmt exited with status 3"],
    ]);
  });

  it("does not move the stable pointer for an older channel", async () => {
    const s = await testSession(UPSTREAM);
    const saved = await install(s.ctx, upstream(s, "0.14.0"), s.local);
    expect(saved.alias).toBeUndefined();
    expect(await readPointer(s.ctx.layout.stablePointer)).toBeUndefined();
  });

  it("does not move the stable pointer for a nightly", async () => {
    const s = await testSession(UPSTREAM);
    await install(s.ctx, upstream(s, "0.16.0"), s.local);
    expect(await readPointer(s.ctx.layout.stablePointer)).toBeUndefined();
  });

  it("refuses to install a complete toolchain twice", async () => {
    const s = await testSession(UPSTREAM);
    await install(s.ctx, upstream(s, "0.15.0"), s.local);
    const err = await toolupFailure(install(s.ctx, upstream(s, "0.15.0"), s.local));
    expect(err.code).toBe("ALREADY_INSTALLED");
    expect(err.message).toBe("the 'Channel stable (0.15.0)' toolchain is already installed");
  });

  it("resumes an interrupted install without redoing finished components", async () => {
    const s = await testSession(UPSTREAM, { behavior: { failBefore: { component: "fmt", exitCode: 101 } } });
    const sysroot = s.ctx.layout.sysroot(v("0.15.0"));

    const err = await toolupFailure(install(s.ctx, upstream(s, "0.15.0"), s.local));
    expect(err.code).toBe("INSTALL_FAILED");
    expect(err.details).toEqual({ exitCode: 101 });
    expect(await readInstallState(sysroot)).toEqual({ kind: "in-progress", completed: ["forc"] });
    expect(fs.existsSync(s.ctx.layout.localManifestPath)).toBe(false);

    s.buildTool.behavior = {};
    await install(s.ctx, upstream(s, "0.15.0"), s.local);
    expect(s.buildTool.installed).toEqual(["forc", "fmt", "std"]);
    expect(await readInstallState(sysroot)).toEqual({ kind: "complete", completed: ["forc", "fmt", "std"] });
  });

  it("fails when the script exits without the completion marker", async () => {
    const s = await testSession(UPSTREAM, { behavior: { skipCompletion: true } });
    expect((await toolupFailure(install(s.ctx, upstream(s, "0.15.0"), s.local))).code).toBe("INSTALL_INCOMPLETE");
  });
});

describe("update", () => {
  it("reports an unchanged channel as up to date", async () => {
    const s = await testSession(UPSTREAM);
    await install(s.ctx, upstream(s, "0.15.0"), s.local);
    const outcomes = await update(s.ctx, { kind: "version", version: v("0.15.0") }, s.local, { pathUpdate: "off" });
    expect(outcomes).toEqual([{ channel: "0.15.0", status: "up-to-date", components: [] }]);
    expect(s.reporter.diagnostics().at(-1)?.message).toBe("Nothing to update, Channel stable (0.15.0) is up to date");
  });

  it("reinstalls only the components that changed upstream", async () => {
    const first = await testSession(UPSTREAM);
    await install(first.ctx, upstream(first, "0.15.0"), first.local);

    const s = await testSession(manifestJson(OLD_CHANNEL, stableChannelJson("0.50.1")), {
      home: first.home,
      cwd: first.cwd,
    });
    const outcomes = await update(s.ctx, { kind: "version", version: v("0.15.0") }, s.local, { pathUpdate: "off" });

    expect(outcomes).toEqual([{ channel: "0.15.0", status: "updated", components: ["forc"] }]);
    expect(s.buildTool.uninstalled).toEqual(["forc"]);
    expect(s.buildTool.installed).toEqual(["forc"]);
    expect(s.reporter.diagnostics().find((d) => d.code === "COMPONENT_UPDATE")?.message).toBe(
      "Updating forc: 0.50.0 -> 0.50.1",
    );
    // fmt keeps its initialization from the first install
    expect(s.buildTool.commands).toEqual([]);

    const forc = (await s.ctx.store.load()).getChannelByName(v("0.15.0"))?.getComponent("forc")?.authority;
    expect(forc?.kind === "registry" && formatVersion(forc.version)).toBe("0.50.1");
  });

  it("keeps the untouched components listed when an update is interrupted", async () => {
    const first = await testSession(UPSTREAM);
    await install(first.ctx, upstream(first, "0.15.0"), first.local);

    const s = await testSession(manifestJson(OLD_CHANNEL, stableChannelJson("0.50.1")), {
      home: first.home,
      cwd: first.cwd,
      behavior: { failBefore: { component: "forc", exitCode: 3 } },
    });
    const err = await toolupFailure(
      update(s.ctx, { kind: "version", version: v("0.15.0") }, s.local, { pathUpdate: "off" }),
    );
    expect(err.code).toBe("INSTALL_FAILED");
    expect(await readInstallState(s.ctx.layout.sysroot(v("0.15.0")))).toEqual({
      kind: "in-progress",
      completed: ["fmt", "std"],
    });
  });

  it("keeps a partial channel partial", async () => {
    const first = await testSession(UPSTREAM);
    const subset = upstream(first, "0.15.0").createSubset(["forc"]);
    if (!subset) throw new Error("empty subset");
    await install(first.ctx, subset.channel, first.local);

    const s = await testSession(manifestJson(stableChannelJson("0.50.1")), { home: first.home, cwd: first.cwd });
    const outcomes = await update(s.ctx, { kind: "version", version: v("0.15.0") }, s.local, { pathUpdate: "off" });

    expect(outcomes[0].components).toEqual(["forc"]);
    const saved = s.local.getChannelByName(v("0.15.0"));
    expect(saved?.isPartial()).toBe(true);
    expect(saved?.components.map((c) => c.name)).toEqual(["forc"]);
  });

  it("installs a newer upstream stable and moves the stable alias", async () => {
    const first = await testSession(UPSTREAM);
    await install(first.ctx, upstream(first, "0.15.0"), first.local);

    const next = { ...stableChannelJson(), name: "0.17.0" };
    const s = await testSession(manifestJson({ ...stableChannelJson(), alias: undefined }, next), {
      home: first.home,
      cwd: first.cwd,
    });
    const outcomes = await update(s.ctx, { kind: "stable" }, s.local, { pathUpdate: "off" });

    expect(outcomes).toEqual([{ channel: "0.17.0", status: "updated", components: ["forc", "fmt", "std"] }]);
    expect(await readPointer(s.ctx.layout.stablePointer)).toBe(s.ctx.layout.sysroot(v("0.17.0")).root);
    expect(s.local.getChannelByName(v("0.15.0"))?.alias).toBeUndefined();
    expect(s.local.getLatestStable()?.name.version).toBe("0.17.0");
  });

  it("is up to date when the installed stable is the newest", async () => {
    const s = await testSession(UPSTREAM);
    await install(s.ctx, upstream(s, "0.15.0"), s.local);
    const outcomes = await update(s.ctx, { kind: "stable" }, s.local, { pathUpdate: "off" });
    expect(outcomes).toEqual([{ channel: "0.15.0", status: "up-to-date", components: [] }]);
    expect(s.reporter.diagnostics().at(-1)?.message).toBe("Nothing to update, you are all up to date");
  });

  it("walks every installed channel and skips local-only ones", async () => {
    const first = await testSession(UPSTREAM);
    await install(first.ctx, upstream(first, "0.14.0"), first.local);
    await install(first.ctx, upstream(first, "0.15.0"), first.local);

    const s = await testSession(manifestJson(stableChannelJson()), { home: first.home, cwd: first.cwd });
    const outcomes = await update(s.ctx, undefined, s.local, { pathUpdate: "off" });
    expect(outcomes).toEqual([
      { channel: "0.14.0", status: "skipped", components: [] },
      { channel: "0.15.0", status: "up-to-date", components: [] },
    ]);
  });

  it("rejects targets without an update rule", async () => {
    const s = await testSession(UPSTREAM);
    expect((await toolupFailure(update(s.ctx, { kind: "stable" }, s.local, { pathUpdate: "off" }))).code).toBe(
      "NOT_INSTALLED",
    );
    expect((await toolupFailure(update(s.ctx, { kind: "nightly" }, s.local, { pathUpdate: "off" }))).code).toBe(
      "UNSUPPORTED_UPDATE_TARGET",
    );
    expect(
      (await toolupFailure(update(s.ctx, { kind: "version", version: v("0.15.0") }, s.local, { pathUpdate: "off" })))
        .code,
    ).toBe("NOT_INSTALLED");
  });
});

describe("uninstall", () => {
  it("removes components, pointers, the manifest entry and the sysroot", async () => {
    const s = await testSession(UPSTREAM);
    await install(s.ctx, upstream(s, "0.15.0"), s.local);
    const sysroot = s.ctx.layout.sysroot(v("0.15.0"));
    fs.symlinkSync(sysroot.root, s.ctx.layout.defaultPointer);

    const removed = await uninstall(s.ctx, { kind: "stable" }, s.local);

    expect(formatVersion(removed.name)).toBe("0.15.0");
    expect(s.buildTool.uninstalled).toEqual(["forc", "fmt"]);
    expect(fs.existsSync(sysroot.root)).toBe(false);
    expect(await readPointer(s.ctx.layout.stablePointer)).toBeUndefined();
    expect(await readPointer(s.ctx.layout.defaultPointer)).toBeUndefined();
    expect((await s.ctx.store.load()).getChannels()).toEqual([]);
  });

  it("falls back to the next stable channel", async () => {
    const s = await testSession(UPSTREAM);
    await install(s.ctx, upstream(s, "0.14.0"), s.local);
    await install(s.ctx, upstream(s, "0.15.0"), s.local);
    await uninstall(s.ctx, { kind: "version", version: v("0.15.0") }, s.local);
    expect(s.local.getLatestStable()?.name.version).toBe("0.14.0");
  });

  it("cleans up after an interrupted install", async () => {
    const s = await testSession(UPSTREAM, { behavior: { failBefore: { component: "fmt", exitCode: 1 } } });
    await toolupFailure(install(s.ctx, upstream(s, "0.15.0"), s.local));

    await uninstall(s.ctx, { kind: "version", version: v("0.15.0") }, s.local);
    expect(s.buildTool.uninstalled).toEqual(["forc"]);
    expect(fs.existsSync(s.ctx.layout.sysroot(v("0.15.0")).root)).toBe(false);
  });

  it("deletes a sysroot that has no marker with a warning", async () => {
    const s = await testSession(UPSTREAM);
    fs.mkdirSync(s.ctx.layout.sysroot(v("0.14.0")).root, { recursive: true });
    await uninstall(s.ctx, { kind: "version", version: v("0.14.0") }, s.local);
    expect(s.reporter.warnings().map((d) => d.code)).toEqual(["NO_INSTALL_MARKER"]);
    expect(fs.existsSync(s.ctx.layout.sysroot(v("0.14.0")).root)).toBe(false);
  });

  it("reports channels that are unknown or not installed", async () => {
    const s = await testSession(UPSTREAM);
    expect((await toolupFailure(uninstall(s.ctx, { kind: "version", version: v("0.14.0") }, s.local))).code).toBe(
      "NOT_INSTALLED",
    );
    const err = await toolupFailure(uninstall(s.ctx, { kind: "other", name: "beta" }, s.local));
    expect(err.code).toBe("CHANNEL_NOT_FOUND");
    expect(err.message).toBe("channel 'beta' doesn't exist or is unavailable");
  });
});
