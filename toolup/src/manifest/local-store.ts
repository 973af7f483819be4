import { readFile } from "node:fs/promises";
import { errnoCode } from "../errors.js";
import { encodeManifest } from "../model/codec.js";
import { Manifest } from "../model/manifest.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { atomicWriteJson } from "../fs/atomic-write.js";
import { parseManifest } from "./source.js";

/** `<home>/manifest.json`: what is installed on this machine. */
export class LocalManifestStore {
  constructor(
    readonly filePath: string,
    private readonly registry: SchemaRegistry,
  ) {}

  /** A missing or empty file is a fresh, empty manifest. */
  async load(): Promise<Manifest> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return Manifest.empty();
      throw e;
    }
    if (raw.trim().length === 0) return Manifest.empty();
    return parseManifest(this.registry, raw, this.filePath);
  }

  async save(manifest: Manifest): Promise<void> {
    await atomicWriteJson(this.filePath, encodeManifest(manifest));
  }
}
