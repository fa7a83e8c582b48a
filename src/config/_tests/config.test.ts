import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { findConfigPath, loadConfig, parseConfig } from "../../config";

function yaml(contents: string): string {
  return contents.trimStart();
}

describe("config", () => {
  it("findConfigPath returns the custom path when file exists", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "patchbay-config-"));
    const p = path.join(tmp, "config.yaml");
    await fs.writeFile(p, "backend: virtual\n", "utf8");
    expect(await findConfigPath(p)).toBe(p);
  });

  it("loadConfig parses YAML and returns a validated object", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "patchbay-config-"));
    const p = path.join(tmp, "my-config.yaml");
    await fs.writeFile(p, yaml(`
backend: virtual
log_level: " DEBUG "
virtual_devices:
  - "Keystep"
  - { name: "Synth", transmit: false }
  - { name: "LoopMIDI", loopback: true }
connections:
  - { from: "Key", to: "Synth" }
  - { from: "Loop", to: "Loop", optional: true }
`), "utf8");
    const cfg = await loadConfig(p);
    expect(cfg).toEqual({
      backend: "virtual",
      log_level: "debug",
      virtual_devices: [
        { name: "Keystep" },
        { name: "Synth", transmit: false },
        { name: "LoopMIDI", loopback: true },
      ],
      connections: [
        { from: "Key", to: "Synth" },
        { from: "Loop", to: "Loop", optional: true },
      ],
    });
  });

  it("applies defaults to an empty document", () => {
    expect(parseConfig("")).toEqual({ backend: "rtmidi", virtual_devices: [], connections: [] });
  });

  it("rejects invalid fields with their path", () => {
    expect(() => parseConfig("backend: alsa\n")).toThrow(/config\.backend/);
    expect(() => parseConfig("connections:\n  - { from: A }\n")).toThrow(/config\.connections\[0\]\.to/);
    expect(() => parseConfig("virtual_devices:\n  - { name: X, loopback: yes please }\n")).toThrow(/config\.virtual_devices\[0\]\.loopback/);
    expect(() => parseConfig("log_level: loud\n")).toThrow(/config\.log_level/);
    expect(() => parseConfig("- a\n- b\n")).toThrow(/racine/);
  });

  it("loadConfig fails when no file is found", async () => {
    const missing = path.join(os.tmpdir(), "patchbay-missing", "nope.yaml");
    await expect(loadConfig(missing)).rejects.toThrow(/config\.yaml/);
  });
});
