import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { SettingsFile, validatePortSettings, type PortSettings } from "./settings.js";

const DEFAULTS: PortSettings = { serverPort: 7000, beaconPort: 7001, endpointPort: 7002 };

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "fleetlink-settings-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("missing settings file yields defaults and writes them back", async () => {
  await withTempDir(async (dir) => {
    const file = new SettingsFile(path.join(dir, "ports.json"), DEFAULTS, validatePortSettings);
    const loaded = await file.load();

    assert.equal(loaded.source, "defaults");
    assert.equal(loaded.warning, undefined);
    assert.deepEqual(loaded.settings, DEFAULTS);
    assert.deepEqual(JSON.parse(await readFile(file.path, "utf8")), DEFAULTS);
  });
});

test("replace persists validated ports for the next load", async () => {
  await withTempDir(async (dir) => {
    const file = new SettingsFile(path.join(dir, "ports.json"), DEFAULTS, validatePortSettings);
    const replaced = await file.replace({ serverPort: 8000, beaconPort: 8001, endpointPort: 8002, extra: "ignored" });

    assert.deepEqual(replaced, { serverPort: 8000, beaconPort: 8001, endpointPort: 8002 });
    const loaded = await file.load();
    assert.equal(loaded.source, "file");
    assert.deepEqual(loaded.settings, replaced);
  });
});

test("replace rejects out-of-range and colliding ports", async () => {
  await withTempDir(async (dir) => {
    const file = new SettingsFile(path.join(dir, "ports.json"), DEFAULTS, validatePortSettings);

    await assert.rejects(
      file.replace({ serverPort: 70000, beaconPort: 7001, endpointPort: 7002 }),
      /serverPort must be an integer between 1 and 65535/
    );
    await assert.rejects(
      file.replace({ serverPort: 7000, beaconPort: 7000, endpointPort: 7002 }),
      /must be distinct/
    );
  });
});

test("invalid JSON falls back to defaults with a warning", async () => {
  await withTempDir(async (dir) => {
    const target = path.join(dir, "ports.json");
    await writeFile(target, "{ not json", "utf8");
    const file = new SettingsFile(target, DEFAULTS, validatePortSettings);
    const loaded = await file.load();

    assert.equal(loaded.source, "defaults");
    assert.match(loaded.warning ?? "", /^Invalid JSON in /);
    assert.deepEqual(loaded.settings, DEFAULTS);
  });
});
